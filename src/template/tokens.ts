/**
 * Token and parse-tree types shared by the tokenizer, parsers and renderer.
 */

/** Parsed contents of a `{% name [param]* [| pipe] %}` tag. */
export interface TagContent {
  readonly name: string;
  readonly params: ReadonlyMap<string, string>;
  readonly pipe?: string;
}

export type LoopIterable =
  | { readonly kind: "range"; readonly start: number; readonly end: number }
  | { readonly kind: "collection"; readonly name: string };

/** Parsed `{% for <variable> in <iterable> [param]* %}`. */
export interface ForLoop {
  readonly variable: string;
  readonly iterable: LoopIterable;
  /** Loop-level params, e.g. `limit`. */
  readonly params: ReadonlyMap<string, string>;
}

export type Token =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "tag"; readonly tag: TagContent }
  | { readonly kind: "forStart"; readonly loop: ForLoop }
  | { readonly kind: "forEnd" };
