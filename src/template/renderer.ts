/**
 * Template renderer.
 *
 * Walks the token list produced by the tokenizer and builds the output:
 *
 *   literal    copied verbatim
 *   tag        resolved (resolver.ts), then passed through its pipe if
 *              one is named (pipes.ts)
 *   forStart   body collected up to the matching endfor (blocks.ts) and
 *              rendered once per item
 *   forEnd     only valid as the end of a block; a stray one is an error
 *
 * LOOP SCOPING:
 *
 *   Each for-block renders against its own copy of the loop variables,
 *   made once when the block is entered and rebound on every iteration.
 *   An inner loop that reuses an outer loop's variable name shadows it
 *   only inside the inner block:
 *
 *     {% for i in (1..2) %}{% for i in (7..8) %}{% i %}{% endfor %}{% i %}{% endfor %}
 *       → "781782"
 *
 * Any error aborts the render; output produced so far is discarded.
 */

import { collectForBody } from "./blocks.js";
import { systemClock, type Clock } from "./clock.js";
import {
  memoryValue,
  indexValue,
  withLoopFrame,
  type LoopValue,
  type RenderContext,
} from "./context.js";
import { TemplateError, isTemplateError } from "./errors.js";
import { parseUnsignedInt } from "./integers.js";
import { createDefaultPipes, type PipeRegistry } from "./pipes.js";
import { resolveTag } from "./resolver.js";
import { tokenize } from "./tokenizer.js";
import type { ForLoop, Token } from "./tokens.js";
import type { Logger } from "../logging/index.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RenderOptions {
  /** Pipes available to `| name`. Defaults to the built-in registry. */
  pipes?: PipeRegistry;
  /** Source of "now" for date tags. Defaults to the system clock. */
  clock?: Clock;
  /** Receives debug output. Nothing is logged when omitted. */
  logger?: Logger;
}

interface RenderEnv {
  pipes: PipeRegistry;
  clock: Clock;
  logger?: Logger;
}

function resolveEnv(options: RenderOptions): RenderEnv {
  return {
    pipes: options.pipes ?? createDefaultPipes(),
    clock: options.clock ?? systemClock,
    logger: options.logger,
  };
}

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

function getCollection(name: string, ctx: RenderContext): LoopValue[] {
  switch (name) {
    case "memories":
      return ctx.memories.map(memoryValue);
    default:
      throw new TemplateError("UnknownCollection", `unknown collection: '${name}'`);
  }
}

function* rangeItems(start: number, end: number): Generator<LoopValue> {
  for (let value = start; value <= end; value++) {
    yield indexValue(value);
  }
}

/**
 * The items a loop iterates, in order, and how many there are. Ranges are
 * produced lazily. A `limit` that is not a non-negative integer is ignored.
 */
export function loopItems(
  loop: ForLoop,
  ctx: RenderContext
): { items: Iterable<LoopValue>; count: number } {
  const { iterable } = loop;

  if (iterable.kind === "range") {
    return {
      items: rangeItems(iterable.start, iterable.end),
      count: Math.max(0, iterable.end - iterable.start + 1),
    };
  }

  const all = getCollection(iterable.name, ctx);
  const limitText = loop.params.get("limit");
  const limit = limitText === undefined ? undefined : parseUnsignedInt(limitText);
  const items = limit === undefined ? all : all.slice(0, Math.min(all.length, limit));

  return { items, count: items.length };
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

async function executeForLoop(
  loop: ForLoop,
  body: readonly Token[],
  ctx: RenderContext,
  env: RenderEnv
): Promise<string> {
  const { items, count } = loopItems(loop, ctx);
  const frame = withLoopFrame(ctx);

  env.logger?.debug("Executing for loop", {
    variable: loop.variable,
    iterable: loop.iterable.kind === "range"
      ? `(${loop.iterable.start}..${loop.iterable.end})`
      : loop.iterable.name,
    iterations: count,
  });

  let output = "";
  for (const item of items) {
    frame.loopVars.set(loop.variable, item);
    output += await evaluate(body, frame.context, env);
  }
  return output;
}

async function evaluate(
  tokens: readonly Token[],
  ctx: RenderContext,
  env: RenderEnv
): Promise<string> {
  let output = "";
  let i = 0;

  while (i < tokens.length) {
    const token = tokens[i];
    if (token === undefined) break;

    switch (token.kind) {
      case "literal":
        output += token.text;
        i++;
        break;

      case "tag": {
        const value = resolveTag(token.tag, ctx, env.clock);
        output += token.tag.pipe === undefined
          ? value
          : await env.pipes.apply(token.tag.pipe, value);
        i++;
        break;
      }

      case "forStart": {
        const { body, endIndex } = collectForBody(tokens.slice(i + 1));
        output += await executeForLoop(token.loop, body, ctx, env);
        // skip the for-start, its body and the matching endfor
        i += endIndex + 2;
        break;
      }

      case "forEnd":
        throw new TemplateError("UnexpectedEndFor", "unexpected endfor outside for loop");
    }
  }

  return output;
}

/**
 * Render already-tokenized template content.
 */
export function renderTokens(
  tokens: readonly Token[],
  ctx: RenderContext,
  options: RenderOptions = {}
): Promise<string> {
  return evaluate(tokens, ctx, resolveEnv(options));
}

/**
 * Render a template string against a context.
 *
 * @throws TemplateError on any syntax or resolution failure
 */
export async function render(
  template: string,
  ctx: RenderContext,
  options: RenderOptions = {}
): Promise<string> {
  const tokens = tokenize(template);
  options.logger?.debug("Template tokenized", {
    tokens: tokens.length,
    chars: template.length,
  });
  return renderTokens(tokens, ctx, options);
}

export type RenderResult =
  | { success: true; output: string }
  | { success: false; error: TemplateError };

/**
 * Like render(), but reports template failures as a value.
 * Errors that are not TemplateErrors (e.g. thrown by a pipe) propagate.
 */
export async function tryRender(
  template: string,
  ctx: RenderContext,
  options: RenderOptions = {}
): Promise<RenderResult> {
  try {
    return { success: true, output: await render(template, ctx, options) };
  } catch (err) {
    if (isTemplateError(err)) {
      return { success: false, error: err };
    }
    throw err;
  }
}
