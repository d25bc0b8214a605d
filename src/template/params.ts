/**
 * Tag and parameter parsing.
 *
 * TAG FORMAT:
 *
 *   {% name [param]* [| pipe] %}
 *
 *   name     any run of non-whitespace; may contain `:` (custom:key) or
 *            `.` (i.result)
 *   param    key=value or key:value
 *   pipe     name of a registered pipe applied to the resolved value
 *
 * Rules:
 *   - Parts are separated by spaces or tabs outside double quotes
 *   - Quotes are kept in the captured text: arg="a b" has value `"a b"`
 *   - `=` wins over `:` wherever they appear: key=val:ue → (key, val:ue)
 *   - Keys must be non-empty; values may be empty
 *   - A later param with the same key replaces an earlier one
 */

import { TemplateError } from "./errors.js";
import type { TagContent } from "./tokens.js";

/**
 * Split text into whitespace-separated parts, keeping double-quoted runs
 * (quotes included) together.
 */
export function splitParts(input: string): string[] {
  const parts: string[] = [];
  let current = "";
  let inQuotes = false;

  for (const ch of input) {
    if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if ((ch === " " || ch === "\t") && !inQuotes) {
      if (current !== "") {
        parts.push(current);
        current = "";
      }
    } else {
      current += ch;
    }
  }

  if (current !== "") {
    parts.push(current);
  }

  return parts;
}

/**
 * Split on the first `|`. An empty pipe name after the bar means no pipe.
 */
export function splitPipe(body: string): { body: string; pipe?: string } {
  const pos = body.indexOf("|");
  if (pos === -1) {
    return { body };
  }

  const before = body.slice(0, pos).trim();
  const after = body.slice(pos + 1).trim();
  return after === "" ? { body: before } : { body: before, pipe: after };
}

/**
 * Parse one `key=value` or `key:value` part.
 */
export function parseParam(part: string): [key: string, value: string] {
  // `=` takes precedence over `:` even when a colon comes first
  let pos = part.indexOf("=");
  if (pos === -1) {
    pos = part.indexOf(":");
  }

  if (pos === -1) {
    throw new TemplateError(
      "InvalidParam",
      `invalid parameter (missing '=' or ':'): '${part}'`
    );
  }

  const key = part.slice(0, pos);
  if (key === "") {
    throw new TemplateError("InvalidParam", `empty parameter key in '${part}'`);
  }

  return [key, part.slice(pos + 1)];
}

/**
 * Parse a list of param parts into a map.
 */
export function parseParams(parts: readonly string[]): Map<string, string> {
  const params = new Map<string, string>();
  for (const part of parts) {
    const [key, value] = parseParam(part);
    params.set(key, value);
  }
  return params;
}

/**
 * Parse the trimmed body of a regular (non-control) tag.
 */
export function parseTag(text: string): TagContent {
  const { body, pipe } = splitPipe(text);
  const [name, ...rest] = splitParts(body);

  if (name === undefined) {
    throw new TemplateError("EmptyTag", "empty tag");
  }

  const params = parseParams(rest);
  return pipe === undefined ? { name, params } : { name, params, pipe };
}
