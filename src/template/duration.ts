/**
 * Duration strings for date arithmetic: `<integer><unit>`.
 *
 *   30m   thirty minutes
 *   2h    two hours
 *   -1d   minus one day (a day is always 24 hours)
 */

import { InvalidDurationError } from "./errors.js";
import { parseSignedInt } from "./integers.js";

const MS_PER_MINUTE = 60_000;

const UNIT_MS: Readonly<Record<string, number>> = {
  d: 24 * 60 * MS_PER_MINUTE,
  h: 60 * MS_PER_MINUTE,
  m: MS_PER_MINUTE,
};

/**
 * Parse a duration into milliseconds.
 *
 * @throws InvalidDurationError with reason `empty`, `number`, `unit`, or
 *         `range` when the result is not a safe integer
 */
export function parseDuration(input: string): number {
  if (input === "") {
    throw new InvalidDurationError(input, "empty", "empty duration");
  }

  const numText = input.slice(0, -1);
  const unit = input.slice(-1);

  const amount = parseSignedInt(numText);
  if (amount === undefined) {
    throw new InvalidDurationError(
      input,
      "number",
      `invalid duration number: '${numText}'`
    );
  }

  const unitMs = UNIT_MS[unit];
  if (unitMs === undefined) {
    throw new InvalidDurationError(input, "unit", `unknown duration unit: '${unit}'`);
  }

  const ms = amount * unitMs;
  if (!Number.isSafeInteger(ms)) {
    throw new InvalidDurationError(input, "range", `duration out of range: '${input}'`);
  }
  return ms;
}
