/**
 * Tag resolution.
 *
 * Maps a parsed tag to its string value. Names are matched by a fixed,
 * ordered set of rules; the first rule that applies wins:
 *
 *    1. `var.field`       field of a memory-bound loop variable
 *    2. `proxy:<name>`    match URL of a secret
 *    3. `custom:<key>`    dictionary value from the `general` section
 *    4. `date`            now ± offset, YYYY-MM-DD
 *    5. `datetime`        now ± offset, YYYY-MM-DD HH:MM
 *    6. `datetimeiso`     now, RFC 3339
 *    7. `result`          current job result (empty if unset)
 *    8. `message`         inbound message (empty if unset)
 *    9. `sender`          message sender (empty if unset)
 *   10. `memory`          a stored result, `minus=1` (default) is newest
 *   11. `<var>`           bare loop variable
 *   12. anything else     UnknownTag
 *
 * Because the dotted rule comes first, `custom:a.b` is read as field `b`
 * of a loop variable named `custom:a`.
 */

import type { Clock } from "./clock.js";
import { formatDate, formatDateTime, formatRfc3339 } from "./clock.js";
import type { LoopValue, MemoryEntry, RenderContext } from "./context.js";
import { parseDuration } from "./duration.js";
import { MemoryOffsetError, TemplateError } from "./errors.js";
import { parseUnsignedInt } from "./integers.js";
import type { TagContent } from "./tokens.js";

// ---------------------------------------------------------------------------
// Tag classification
// ---------------------------------------------------------------------------

type BuiltinTag =
  | "date"
  | "datetime"
  | "datetimeiso"
  | "result"
  | "message"
  | "sender"
  | "memory";

export type ResolvedTagKind =
  | { kind: "loopField"; variable: string; field: string }
  | { kind: "proxy"; secret: string }
  | { kind: "custom"; key: string }
  | { kind: "builtin"; name: BuiltinTag }
  | { kind: "loopVar"; variable: string };

const BUILTIN_TAGS: ReadonlySet<string> = new Set<BuiltinTag>([
  "date",
  "datetime",
  "datetimeiso",
  "result",
  "message",
  "sender",
  "memory",
]);

function isBuiltinTag(name: string): name is BuiltinTag {
  return BUILTIN_TAGS.has(name);
}

const PROXY_PREFIX = "proxy:";
const CUSTOM_PREFIX = "custom:";

/** Dictionary section read by `custom:` tags. */
export const CUSTOM_SECTION = "general";

/**
 * Classify a tag name. Anything that is not dotted, prefixed or built in
 * is treated as a bare loop variable reference.
 */
export function classifyTag(name: string): ResolvedTagKind {
  const dot = name.indexOf(".");
  if (dot !== -1) {
    return { kind: "loopField", variable: name.slice(0, dot), field: name.slice(dot + 1) };
  }
  if (name.startsWith(PROXY_PREFIX)) {
    return { kind: "proxy", secret: name.slice(PROXY_PREFIX.length) };
  }
  if (name.startsWith(CUSTOM_PREFIX)) {
    return { kind: "custom", key: name.slice(CUSTOM_PREFIX.length) };
  }
  if (isBuiltinTag(name)) {
    return { kind: "builtin", name };
  }
  return { kind: "loopVar", variable: name };
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Resolve a tag against the context.
 *
 * @param clock - Source of "now" for the date tags
 * @throws TemplateError
 */
export function resolveTag(tag: TagContent, ctx: RenderContext, clock: Clock): string {
  const resolved = classifyTag(tag.name);

  switch (resolved.kind) {
    case "loopField":
      return resolveLoopField(resolved.variable, resolved.field, ctx);

    case "proxy": {
      const secret = ctx.secrets.get(resolved.secret);
      if (secret === undefined) {
        throw new TemplateError(
          "UnknownSecret",
          `unknown secret for proxy: '${resolved.secret}'`
        );
      }
      return secret.matchUrl;
    }

    case "custom": {
      const value = ctx.dictionary.get(CUSTOM_SECTION, resolved.key);
      if (value === undefined) {
        throw new TemplateError(
          "UnknownDictionaryKey",
          `unknown dictionary key: 'custom:${resolved.key}'`
        );
      }
      return value;
    }

    case "builtin":
      return resolveBuiltin(resolved.name, tag, ctx, clock);

    case "loopVar": {
      const value = ctx.loopVars.get(resolved.variable);
      if (value === undefined) {
        throw new TemplateError("UnknownTag", `unknown tag: '${tag.name}'`);
      }
      return value.kind === "index" ? String(value.value) : value.entry.result;
    }
  }
}

function resolveBuiltin(
  name: BuiltinTag,
  tag: TagContent,
  ctx: RenderContext,
  clock: Clock
): string {
  switch (name) {
    case "date":
      return formatDate(offsetNow(tag.params, ctx, clock));
    case "datetime":
      return formatDateTime(offsetNow(tag.params, ctx, clock));
    case "datetimeiso":
      return formatRfc3339(clock());
    case "result":
      return ctx.result ?? "";
    case "message":
      return ctx.message ?? "";
    case "sender":
      return ctx.sender ?? "";
    case "memory":
      return resolveMemory(tag.params, ctx.memories).result;
  }
}

function resolveLoopField(variable: string, field: string, ctx: RenderContext): string {
  const value = ctx.loopVars.get(variable);
  if (value === undefined) {
    throw new TemplateError("UnknownLoopVariable", `unknown loop variable: '${variable}'`);
  }

  if (value.kind === "index") {
    throw new TemplateError(
      "UnknownLoopField",
      `index variable '${variable}' has no field '${field}'`
    );
  }

  switch (field) {
    case "date":
      return value.entry.date;
    case "datetime":
      return value.entry.datetime;
    case "result":
      return value.entry.result;
    default:
      throw new TemplateError("UnknownLoopField", `memory has no field '${field}'`);
  }
}

/**
 * Pick a memory by `minus`: absent or 1 is the newest, 2 the one before.
 * `minus=0` is accepted as an alias for the newest.
 */
export function resolveMemory(
  params: ReadonlyMap<string, string>,
  memories: readonly MemoryEntry[]
): MemoryEntry {
  let offset = 0;

  const minusText = params.get("minus");
  if (minusText !== undefined) {
    const minus = parseUnsignedInt(minusText);
    if (minus === undefined) {
      throw new TemplateError("InvalidMemoryOffset", `invalid memory offset: '${minusText}'`);
    }
    offset = minus === 0 ? 0 : minus - 1;
  }

  const entry = memories[offset];
  if (entry === undefined) {
    throw new MemoryOffsetError(offset, memories.length);
  }
  return entry;
}

// ---------------------------------------------------------------------------
// Date offsets
// ---------------------------------------------------------------------------

/**
 * Total offset in milliseconds from the `minus` and `plus` params.
 */
export function computeOffset(
  params: ReadonlyMap<string, string>,
  loopVars: ReadonlyMap<string, LoopValue>
): number {
  let total = 0;

  const minus = params.get("minus");
  if (minus !== undefined) {
    total -= parseDuration(interpolateParam(minus, loopVars));
  }

  const plus = params.get("plus");
  if (plus !== undefined) {
    total += parseDuration(interpolateParam(plus, loopVars));
  }

  return total;
}

function offsetNow(
  params: ReadonlyMap<string, string>,
  ctx: RenderContext,
  clock: Clock
): Date {
  const offset = computeOffset(params, ctx.loopVars);
  const date = new Date(clock().getTime() + offset);
  if (Number.isNaN(date.getTime())) {
    throw new TemplateError("InvalidDurationFormat", `date offset out of range: ${offset}ms`);
  }
  return date;
}

/**
 * Expand a loop index into a param value.
 *
 *   i"d"   with i = 2   →  2d
 *   i"d"   with i unset →  i"d"   (left as written)
 *   m"d"   with m bound to a memory → InterpolationTypeMismatch
 */
export function interpolateParam(
  value: string,
  loopVars: ReadonlyMap<string, LoopValue>
): string {
  const quote = value.indexOf('"');
  if (quote === -1) {
    return value;
  }

  const variable = value.slice(0, quote);
  const bound = loopVars.get(variable);
  if (bound === undefined) {
    return value;
  }

  if (bound.kind !== "index") {
    throw new TemplateError(
      "InterpolationTypeMismatch",
      `loop variable '${variable}' is not an index, cannot interpolate`
    );
  }

  const suffix = value.slice(quote + 1).replace(/"+$/, "");
  return `${bound.value}${suffix}`;
}
