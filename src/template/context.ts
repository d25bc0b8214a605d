/**
 * Render context.
 *
 * Everything a template can read: the static dictionary, the secrets
 * registry, the current job result, the inbound message and its sender,
 * stored memories (newest first) and the loop variables bound by
 * enclosing for-blocks.
 *
 * The engine only reads the context. For-blocks work on their own copy
 * of `loopVars` (see renderer.ts), so a caller's context is never
 * modified by a render.
 */

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

/** Two-level (section, key) string lookup. */
export interface DictionaryLookup {
  get(section: string, key: string): string | undefined;
}

/** A secret as seen by templates: only the match URL is ever rendered. */
export interface SecretRecord {
  readonly matchUrl: string;
}

export interface SecretsLookup {
  get(name: string): SecretRecord | undefined;
}

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** Snapshot of one past job run. */
export interface MemoryEntry {
  /** YYYY-MM-DD */
  readonly date: string;
  readonly datetime: string;
  readonly result: string;
}

export type LoopValue =
  | { readonly kind: "index"; readonly value: number }
  | { readonly kind: "memory"; readonly entry: MemoryEntry };

export function indexValue(value: number): LoopValue {
  return { kind: "index", value };
}

export function memoryValue(entry: MemoryEntry): LoopValue {
  return { kind: "memory", entry };
}

export interface RenderContext {
  readonly dictionary: DictionaryLookup;
  readonly secrets: SecretsLookup;
  readonly result?: string;
  readonly message?: string;
  readonly sender?: string;
  /** Newest first. */
  readonly memories: readonly MemoryEntry[];
  readonly loopVars: ReadonlyMap<string, LoopValue>;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export interface RenderContextInput {
  dictionary?: DictionaryLookup;
  secrets?: SecretsLookup;
  result?: string;
  message?: string;
  sender?: string;
  memories?: readonly MemoryEntry[];
  loopVars?: ReadonlyMap<string, LoopValue>;
}

const EMPTY_DICTIONARY: DictionaryLookup = { get: () => undefined };
const EMPTY_SECRETS: SecretsLookup = { get: () => undefined };

/**
 * Build a RenderContext from partial input, filling in empty lookups and
 * collections for whatever the caller does not supply.
 */
export function buildRenderContext(input: RenderContextInput = {}): RenderContext {
  return {
    dictionary: input.dictionary ?? EMPTY_DICTIONARY,
    secrets: input.secrets ?? EMPTY_SECRETS,
    result: input.result,
    message: input.message,
    sender: input.sender,
    memories: input.memories ?? [],
    loopVars: input.loopVars ?? new Map<string, LoopValue>(),
  };
}

/**
 * Return a context identical to `ctx` but with its own loop-variable map.
 */
export function withLoopFrame(
  ctx: RenderContext
): { context: RenderContext; loopVars: Map<string, LoopValue> } {
  const loopVars = new Map(ctx.loopVars);
  return { context: { ...ctx, loopVars }, loopVars };
}
