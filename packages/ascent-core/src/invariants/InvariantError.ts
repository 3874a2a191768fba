import type { UnknownRecord } from "../types.js";
import type { InvariantErrorConstructor } from "./types.js";

/**
 * Error raised when a rule is broken, identified by a machine-readable `code`.
 *
 * Catch sites narrow with `InvariantError.hasCode(error, "GENERATOR_RELEASED")`
 * and need not know which subclass threw.
 */
export class InvariantError<TCode extends string = string> extends Error {
  override name = "InvariantError";
  readonly code: TCode;
  /** Values involved in the violation, for logs and test assertions. */
  readonly context: UnknownRecord | undefined;

  constructor(code: TCode, message: string, context?: UnknownRecord) {
    super(message);
    this.code = code;
    this.context = context;
  }

  /**
   * Subclass named `${contextName}InvariantError`, accepting only `TCode`.
   *
   * @example
   * ```typescript
   * const PartitionInvariantError = InvariantError.forContext<PartitionErrorCode>("Partition");
   * throw new PartitionInvariantError("GENERATOR_RELEASED", "Generator was released");
   * ```
   */
  static forContext<TCode extends string>(contextName: string): InvariantErrorConstructor<TCode> {
    const className = `${contextName}InvariantError`;
    const ContextInvariantError = class extends InvariantError<TCode> {
      override name = className;
    };
    Object.defineProperty(ContextInvariantError, "name", { value: className });
    return ContextInvariantError;
  }

  static hasCode<T extends string>(error: unknown, code: T): error is InvariantError<T> {
    return error instanceof InvariantError && error.code === code;
  }
}
