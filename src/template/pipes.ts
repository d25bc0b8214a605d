/**
 * Pipes: named transforms applied to a tag's resolved value.
 *
 *   {% memory | summary %}
 *
 * Pipes live in a registry keyed by name, so new ones are added by
 * registration rather than by changing the renderer. A pipe may be
 * asynchronous; the renderer awaits each one before moving on.
 */

import { TemplateError } from "./errors.js";

export type Pipe = (input: string) => string | Promise<string>;

export class PipeRegistry {
  private readonly pipes = new Map<string, Pipe>();

  constructor(initial: Iterable<readonly [string, Pipe]> = []) {
    for (const [name, pipe] of initial) {
      this.pipes.set(name, pipe);
    }
  }

  /** Add or replace a pipe. Names are case-sensitive. */
  register(name: string, pipe: Pipe): this {
    this.pipes.set(name, pipe);
    return this;
  }

  unregister(name: string): boolean {
    return this.pipes.delete(name);
  }

  has(name: string): boolean {
    return this.pipes.has(name);
  }

  names(): string[] {
    return [...this.pipes.keys()].sort();
  }

  /**
   * @throws TemplateError (UnknownPipe) if no pipe has this name
   */
  async apply(name: string, input: string): Promise<string> {
    const pipe = this.pipes.get(name);
    if (pipe === undefined) {
      throw new TemplateError("UnknownPipe", `unknown pipe: '${name}'`);
    }
    return pipe(input);
  }
}

export const SUMMARY_PREFIX = "Summary of: ";

/**
 * Placeholder until summaries are produced by an agent call: marks the
 * text instead of condensing it.
 */
export const summaryPipe: Pipe = (input) => `${SUMMARY_PREFIX}${input}`;

/** A fresh registry holding the built-in pipes. */
export function createDefaultPipes(): PipeRegistry {
  return new PipeRegistry([["summary", summaryPipe]]);
}
