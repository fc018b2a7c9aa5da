// File: src/core/errors.ts (relative to project root)

/** Base class for every caller-contract violation raised by the core. */
export class AllocationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A value that cannot enter a ratio or logarithm, or an allocation share outside [0,1]. */
export class DomainError extends AllocationError {
  constructor(
    message: string,
    readonly player?: number,
    readonly item?: number
  ) {
    super(message);
  }
}

/** Valuation and allocation matrices disagree on dimensions. */
export class ShapeError extends AllocationError {
  constructor(
    message: string,
    readonly expected?: number,
    readonly actual?: number
  ) {
    super(message);
  }
}

/** Raised by findNegativeCycle when the graph has no negative cycle reachable from the source. */
export class NoCycleFound extends AllocationError {
  constructor(readonly source: number | null) {
    super(source === null ? "no negative cycle in graph" : `no negative cycle reachable from node ${source}`);
  }
}
