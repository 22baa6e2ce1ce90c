/**
 * Error taxonomy of the compiler core. Every error carries the offending
 * field or quantity, its value and the accepted range so a caller can report
 * it without re-running anything.
 */

function show(v: unknown): string {
  if (v === undefined) return "undefined";
  if (typeof v === "number" && !Number.isFinite(v)) return String(v);
  try {
    return JSON.stringify(v) ?? String(v);
  } catch {
    return String(v);
  }
}

export class SramError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SramError";
  }
}

/** Malformed, missing or out-of-range configuration field, or a broken cross-field rule. */
export class ConfigurationError extends SramError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    public readonly expected: string,
  ) {
    super(`Invalid configuration field '${field}': got ${show(value)}, expected ${expected}`);
    this.name = "ConfigurationError";
  }
}

/** Operating point outside the window the analytical model was fitted for. */
export class ModelRangeError extends SramError {
  constructor(
    public readonly quantity: string,
    public readonly value: number,
    public readonly range: readonly [number, number],
    public readonly processNode: number,
    /** The lower bound itself is rejected. */
    public readonly lowerExclusive: boolean = false,
  ) {
    const lower = lowerExclusive ? "(" : "[";
    super(
      `${quantity} ${show(value)} is outside the supported range ${lower}${range[0]}, ${range[1]}] for the ${processNode}nm model`,
    );
    this.name = "ModelRangeError";
  }
}

export class InvalidActivityFactorError extends SramError {
  constructor(public readonly value: unknown) {
    super(`Activity factor ${show(value)} is outside [0, 1]`);
    this.name = "InvalidActivityFactorError";
  }
}

/** Artifact destination could not be created, written or replaced. */
export class ArtifactWriteError extends SramError {
  constructor(
    public readonly destination: string,
    detail: string,
    cause?: unknown,
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Cannot write artifacts to ${destination} (${detail})${reason}`, { cause });
    this.name = "ArtifactWriteError";
  }
}
