/**
 * Template engine.
 *
 * Renders agent prompts and output messages from `{% … %}` tags.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * import { buildRenderContext, render } from "./template/index.js";
 *
 * const context = buildRenderContext({
 *   dictionary,                      // Dictionary.load("dictionary.json")
 *   result: "sunny, 24°C",
 *   memories,                        // newest first
 * });
 *
 * const text = await render(
 *   "Hello {% custom:name %}, today is {% date %}.\n" +
 *   "{% for m in memories limit:3 %}{% m.date %}: {% m.result %}\n{% endfor %}",
 *   context
 * );
 * ```
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * TAGS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   {% date minus=1d %}           {% datetime plus=2h %}     {% datetimeiso %}
 *   {% result %}                  {% message %}              {% sender %}
 *   {% memory minus=2 %}          {% custom:<key> %}         {% proxy:<secret> %}
 *   {% for i in (1..3) %}…{% endfor %}
 *   {% for m in memories limit:5 %}{% m.result | summary %}{% endfor %}
 *   {% date minus=i"d" %}         (inside a range loop: i days ago)
 *
 * See resolver.ts for the resolution order.
 */

// Rendering
export {
  render,
  renderTokens,
  tryRender,
  loopItems,
  type RenderOptions,
  type RenderResult,
} from "./renderer.js";

// Context
export {
  buildRenderContext,
  indexValue,
  memoryValue,
  type DictionaryLookup,
  type LoopValue,
  type MemoryEntry,
  type RenderContext,
  type RenderContextInput,
  type SecretRecord,
  type SecretsLookup,
} from "./context.js";

// Parsing
export { tokenize } from "./tokenizer.js";
export { parseTag, parseParam, splitParts, splitPipe } from "./params.js";
export { parseForLoop } from "./for-loop.js";
export { collectForBody, type ForBody } from "./blocks.js";
export type { ForLoop, LoopIterable, TagContent, Token } from "./tokens.js";

// Resolution
export {
  resolveTag,
  classifyTag,
  computeOffset,
  interpolateParam,
  resolveMemory,
  type ResolvedTagKind,
} from "./resolver.js";
export { parseDuration } from "./duration.js";
export {
  systemClock,
  formatDate,
  formatDateTime,
  formatRfc3339,
  type Clock,
} from "./clock.js";

// Pipes
export {
  PipeRegistry,
  createDefaultPipes,
  summaryPipe,
  SUMMARY_PREFIX,
  type Pipe,
} from "./pipes.js";

// Files
export { TemplateLoader, TemplateLoadError, type LoadedTemplate } from "./loader.js";

// Errors
export {
  TemplateError,
  InvalidDurationError,
  MemoryOffsetError,
  isTemplateError,
  type TemplateErrorKind,
  type DurationErrorReason,
} from "./errors.js";
