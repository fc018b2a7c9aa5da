// File: src/core/schemas.ts (relative to project root)
import { z } from "zod";
import { DomainError, ShapeError } from "./errors";

/** players × items, numbers only; value ranges are checked by validateInstance. */
export const MatrixSchema = z.array(z.array(z.number()));

export const InstanceSchema = z.object({
  name: z.string().optional(),
  valuations: MatrixSchema,
  allocations: MatrixSchema,
});

export const TransferRuleSchema = z.enum(["value-preserving", "ratio-compounding"], {
  errorMap: () => ({ message: 'must be "value-preserving" or "ratio-compounding"' }),
});

export const InstanceRequestSchema = InstanceSchema.extend({
  stepSize: z.number().positive({ message: "must be a positive number" }).optional(),
  transferRule: TransferRuleSchema.optional(),
  maxSteps: z
    .number()
    .int({ message: "must be a non-negative integer" })
    .nonnegative({ message: "must be a non-negative integer" })
    .optional(),
});

export const ScenarioFileSchema = z.record(InstanceSchema);

export const ApiErrorBodySchema = z.object({
  error: z.enum(["ShapeError", "DomainError", "InternalError", "NotFound"]),
  message: z.string(),
});

export type InstanceInput = z.infer<typeof InstanceSchema>;
export type InstanceRequestInput = z.infer<typeof InstanceRequestSchema>;

// request fields whose values, not structure, are wrong
const OPTION_FIELDS = new Set(["stepSize", "transferRule", "maxSteps"]);

export function formatZodError(e: z.ZodError): string {
  return e.issues
    .map((i) => {
      const path = i.path.length ? i.path.join(".") : "(root)";
      return `${path}: ${i.message}`;
    })
    .join("; ");
}

/**
 * safeParse and throw compact messages. Issues on option fields become DomainError,
 * anything structural a ShapeError.
 */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label: string): T {
  const r = schema.safeParse(data);
  if (r.success) {
    return r.data;
  }
  const msg = `${label} invalid: ${formatZodError(r.error)}`;
  const structural = r.error.issues.some((i) => {
    const field = i.path[0];
    return typeof field !== "string" || !OPTION_FIELDS.has(field);
  });
  throw structural ? new ShapeError(msg) : new DomainError(msg);
}
