/**
 * For-block matching.
 */

import { TemplateError } from "./errors.js";
import type { Token } from "./tokens.js";

export interface ForBody {
  /** Tokens between the for-start and its matching endfor. */
  body: Token[];
  /** Index of the matching endfor within the scanned slice. */
  endIndex: number;
}

/**
 * Find the endfor matching a for-start.
 *
 * `tokens` starts immediately after the for-start. Nested for-blocks are
 * kept whole inside the returned body.
 *
 * @throws TemplateError (UnterminatedForLoop) if no matching endfor exists
 */
export function collectForBody(tokens: readonly Token[]): ForBody {
  let depth = 0;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === undefined) break;

    if (token.kind === "forEnd") {
      if (depth === 0) {
        return { body: tokens.slice(0, i), endIndex: i };
      }
      depth--;
    } else if (token.kind === "forStart") {
      depth++;
    }
  }

  throw new TemplateError("UnterminatedForLoop", "for loop without matching endfor");
}
