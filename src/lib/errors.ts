export class ConversionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The source file is unreadable, malformed, or lacks the expected columns. */
export class ExtractionError extends ConversionError {
  constructor(
    message: string,
    readonly filePath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The file does not have the shape a bank handler expects. */
export class UnsupportedFormatError extends ConversionError {
  constructor(
    readonly filePath: string,
    readonly bankId: string
  ) {
    super(`${filePath} does not match the ${bankId} format`);
  }
}

export type NormalizedField = "date" | "amount" | "flag";

/** A single row could not be normalized; the row is skipped, not the file. */
export class NormalizationError extends ConversionError {
  constructor(
    readonly row: number,
    readonly field: NormalizedField,
    readonly value: string,
    reason: string
  ) {
    super(`row ${row}: ${field} "${value}" ${reason}`);
  }
}

export class NoMatchingBankError extends ConversionError {
  constructor(readonly filePath: string) {
    super(`No bank configuration matches ${filePath}`);
  }
}

export class ConfigError extends ConversionError {}

export function describeError(error: unknown): string {
  if (error instanceof ConversionError) return error.message;
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
