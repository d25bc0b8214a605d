/**
 * Strict integer parsing.
 *
 * `Number("")` is 0 and `parseInt("3abc")` is 3; templates need neither.
 * Only an optional sign followed by decimal digits is accepted, and the
 * result must be a safe integer.
 */

const SIGNED_RE = /^[+-]?\d+$/;
const UNSIGNED_RE = /^\+?\d+$/;

export function parseSignedInt(text: string): number | undefined {
  if (!SIGNED_RE.test(text)) return undefined;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

export function parseUnsignedInt(text: string): number | undefined {
  if (!UNSIGNED_RE.test(text)) return undefined;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}
