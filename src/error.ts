export type FuzzyTimeErrorKind = "timezone" | "config";

/** Errors raised for bad configuration. Unparseable text never raises. */
export class FuzzyTimeError extends Error {
  readonly kind: FuzzyTimeErrorKind;
  readonly input?: string;

  constructor(kind: FuzzyTimeErrorKind, message: string, input?: string) {
    super(message);
    this.name = "FuzzyTimeError";
    this.kind = kind;
    this.input = input;
  }

  static timezone(tz: string, cause?: unknown): FuzzyTimeError {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    return new FuzzyTimeError(
      "timezone",
      `invalid timezone '${tz}'${detail}`,
      tz,
    );
  }

  static config(message: string): FuzzyTimeError {
    return new FuzzyTimeError("config", message);
  }

  displayRich(): string {
    if (this.input !== undefined) {
      return `error: ${this.message}\n  ${this.input}`;
    }
    return `error: ${this.message}`;
  }
}
