/**
 * A caller broke an operation's precondition, e.g. a gradient with fewer than
 * two colors. Raised when the drawing is constructed, never mid-render.
 */
export class ContractViolationError extends Error {
  constructor(
    readonly operation: string,
    message: string,
  ) {
    super(`${operation}: ${message}`);
    this.name = "ContractViolationError";
  }
}

/**
 * A data-driven drawing used an operation the chosen interpreter does not
 * implement. Builders written in code get a compile error instead.
 */
export class UnsupportedCapabilityError extends Error {
  constructor(readonly capability: string) {
    super(`Drawing uses the "${capability}" capability, which this interpreter does not support`);
    this.name = "UnsupportedCapabilityError";
  }
}
