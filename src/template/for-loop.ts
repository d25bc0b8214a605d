/**
 * For-loop header parsing.
 *
 *   {% for i in (1..3) %}              integer range, both ends inclusive
 *   {% for i in (-3..-1) %}            negative bounds are fine
 *   {% for m in memories limit:3 %}    named collection with loop params
 *
 * The parser accepts any collection name; whether the name exists is
 * decided by the renderer.
 */

import { TemplateError } from "./errors.js";
import { parseSignedInt } from "./integers.js";
import { parseParams, splitParts } from "./params.js";
import type { ForLoop } from "./tokens.js";

/**
 * Split on single spaces into at most `limit` pieces, the last piece
 * keeping whatever follows.
 */
function splitN(text: string, separator: string, limit: number): string[] {
  const pieces: string[] = [];
  let rest = text;
  while (pieces.length < limit - 1) {
    const pos = rest.indexOf(separator);
    if (pos === -1) break;
    pieces.push(rest.slice(0, pos));
    rest = rest.slice(pos + separator.length);
  }
  pieces.push(rest);
  return pieces;
}

function parseBound(text: string, which: "start" | "end"): number {
  const value = parseSignedInt(text.trim());
  if (value === undefined) {
    throw new TemplateError("InvalidRangeBound", `invalid range ${which}: '${text}'`);
  }
  return value;
}

/**
 * Parse the text following `for ` (already trimmed).
 */
export function parseForLoop(body: string): ForLoop {
  const [variable, keyword, rest] = splitN(body, " ", 3);

  if (variable === undefined || rest === undefined || keyword !== "in") {
    throw new TemplateError(
      "InvalidForLoopSyntax",
      `invalid for loop syntax: 'for ${body}'`
    );
  }

  const iterableText = rest.trim();

  if (iterableText.startsWith("(")) {
    const close = iterableText.indexOf(")");
    if (close === -1) {
      throw new TemplateError("UnclosedRangeParen", "unclosed range parenthesis");
    }

    const rangeText = iterableText.slice(1, close);
    const bounds = rangeText.split("..");
    const [startText, endText] = bounds;
    if (bounds.length !== 2 || startText === undefined || endText === undefined) {
      throw new TemplateError("InvalidRangeBound", `invalid range syntax: '${rangeText}'`);
    }

    return {
      variable,
      iterable: {
        kind: "range",
        start: parseBound(startText, "start"),
        end: parseBound(endText, "end"),
      },
      params: new Map(),
    };
  }

  const [name, ...paramParts] = splitParts(iterableText);
  if (name === undefined) {
    throw new TemplateError(
      "InvalidForLoopSyntax",
      `missing collection name in for loop: 'for ${body}'`
    );
  }

  return {
    variable,
    iterable: { kind: "collection", name },
    params: parseParams(paramParts),
  };
}
