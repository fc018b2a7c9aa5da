// File: src/strategy/index.ts (relative to project root)
import type { TransferRuleName } from "../core/types";
import type { TransferRule } from "./TransferRule";
import { RatioCompounding } from "./RatioCompounding";
import { ValuePreserving } from "./ValuePreserving";

export type { TransferRule } from "./TransferRule";
export { RatioCompounding } from "./RatioCompounding";
export { ValuePreserving } from "./ValuePreserving";

export const TRANSFER_RULE_NAMES: readonly TransferRuleName[] = ["value-preserving", "ratio-compounding"];

export function isTransferRuleName(value: string): value is TransferRuleName {
  return TRANSFER_RULE_NAMES.some((name) => name === value);
}

export function createTransferRule(name: TransferRuleName): TransferRule {
  switch (name) {
    case "value-preserving":
      return new ValuePreserving();
    case "ratio-compounding":
      return new RatioCompounding();
  }
}
