/**
 * Template tokenizer.
 *
 * Splits a template into a flat token list:
 *
 *   "Hello {% custom:name %}{% for i in (1..2) %}.{% endfor %}"
 *     → literal("Hello ") tag(custom:name) forStart(i) literal(".") forEnd
 *
 * Text outside `{% … %}` is copied exactly, whitespace and newlines
 * included. Tag bodies are trimmed before they are parsed. The whole
 * template is tokenized before anything is rendered, so syntax errors
 * are reported before any tag is resolved.
 */

import { TemplateError } from "./errors.js";
import { parseForLoop } from "./for-loop.js";
import { parseTag } from "./params.js";
import type { Token } from "./tokens.js";

const OPEN = "{%";
const CLOSE = "%}";

/**
 * Turn the trimmed text between `{%` and `%}` into a token.
 */
function parseTagBody(body: string): Token {
  if (body === "endfor") {
    return { kind: "forEnd" };
  }

  if (body.startsWith("for ")) {
    return { kind: "forStart", loop: parseForLoop(body.slice(4).trim()) };
  }

  return { kind: "tag", tag: parseTag(body) };
}

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < input.length) {
    const start = input.indexOf(OPEN, pos);
    if (start === -1) {
      tokens.push({ kind: "literal", text: input.slice(pos) });
      break;
    }

    if (start > pos) {
      tokens.push({ kind: "literal", text: input.slice(pos, start) });
    }

    const bodyStart = start + OPEN.length;
    const end = input.indexOf(CLOSE, bodyStart);
    if (end === -1) {
      throw new TemplateError("UnclosedTag", "unclosed tag: missing '%}'");
    }

    tokens.push(parseTagBody(input.slice(bodyStart, end).trim()));
    pos = end + CLOSE.length;
  }

  return tokens;
}
