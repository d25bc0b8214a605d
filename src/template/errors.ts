/**
 * Template errors.
 *
 * Every failure the engine can produce is a TemplateError tagged with a
 * `kind`. Parse-time kinds are raised while tokenizing (before any output
 * is produced); the rest are raised by the evaluator at the token being
 * processed. All of them abort the render.
 */

export type TemplateErrorKind =
  // Parse time
  | "UnclosedTag"
  | "EmptyTag"
  | "InvalidParam"
  | "InvalidForLoopSyntax"
  | "UnclosedRangeParen"
  | "InvalidRangeBound"
  // Evaluation time
  | "UnterminatedForLoop"
  | "UnexpectedEndFor"
  | "UnknownCollection"
  | "UnknownTag"
  | "UnknownLoopVariable"
  | "UnknownLoopField"
  | "UnknownDictionaryKey"
  | "UnknownSecret"
  | "InvalidDurationFormat"
  | "InvalidMemoryOffset"
  | "MemoryOffsetOutOfRange"
  | "UnknownPipe"
  | "InterpolationTypeMismatch";

export class TemplateError extends Error {
  constructor(
    public readonly kind: TemplateErrorKind,
    message: string
  ) {
    super(message);
    this.name = "TemplateError";
  }
}

/** Why a duration string was rejected. */
export type DurationErrorReason = "empty" | "number" | "unit" | "range";

export class InvalidDurationError extends TemplateError {
  constructor(
    public readonly input: string,
    public readonly reason: DurationErrorReason,
    message: string
  ) {
    super("InvalidDurationFormat", message);
    this.name = "InvalidDurationError";
  }
}

export class MemoryOffsetError extends TemplateError {
  constructor(
    public readonly offset: number,
    public readonly available: number
  ) {
    super(
      "MemoryOffsetOutOfRange",
      `no memory at offset ${offset} (have ${available} memories)`
    );
    this.name = "MemoryOffsetError";
  }
}

/**
 * Narrow an unknown thrown value to a TemplateError of a given kind.
 */
export function isTemplateError(
  err: unknown,
  kind?: TemplateErrorKind
): err is TemplateError {
  return err instanceof TemplateError && (kind === undefined || err.kind === kind);
}
