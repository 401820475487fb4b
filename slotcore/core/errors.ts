//slotcore/core/errors.ts

/**
 * Caller misuse: a precondition of an inventory or item operation did not
 * hold. Not meant to be caught by ordinary control flow.
 */
export class ContractViolationError extends Error {
  constructor(
    readonly op: string,
    readonly reason: string,
  ) {
    super(`${op}: ${reason}`);
    this.name = "ContractViolationError";
  }
}

export class UnsupportedOperationError extends Error {
  constructor(readonly op: string) {
    super(`${op} is not supported`);
    this.name = "UnsupportedOperationError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly keys: string[],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function requires(condition: boolean, op: string, reason: string): asserts condition {
  if (!condition) {
    throw new ContractViolationError(op, reason);
  }
}
