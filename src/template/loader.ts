/**
 * Template file loader.
 *
 * Loads prompt and message templates from disk (.md or .txt files),
 * tokenizes them once and caches the result. Syntax errors therefore
 * surface at load time instead of at the first job run.
 *
 * USAGE:
 *
 *   const loader = new TemplateLoader("templates/");
 *   const daily = loader.load("daily-weather.md");
 *   const prompt = await renderTokens(daily.tokens, context);
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, extname, basename, resolve } from "node:path";

import { tokenize } from "./tokenizer.js";
import type { Token } from "./tokens.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LoadedTemplate {
  /** File name without extension. */
  name: string;
  /** Raw template text. */
  source: string;
  tokens: readonly Token[];
}

/** File extensions recognized as templates. */
const TEMPLATE_EXTENSIONS = new Set([".md", ".txt"]);

function isTemplateFile(path: string, entry: string): boolean {
  return statSync(path).isFile() && TEMPLATE_EXTENSIONS.has(extname(entry).toLowerCase());
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export class TemplateLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, LoadedTemplate>();

  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(
        this.baseDir,
        `Template directory does not exist: ${this.baseDir}`
      );
    }
  }

  /**
   * Load and tokenize one template file. Cached per filename.
   *
   * @param filename - Relative to the base directory
   * @throws TemplateLoadError if the file is missing or not a template
   * @throws TemplateError     if the template does not tokenize
   */
  load(filename: string): LoadedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filePath}`);
    }

    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    const source = readFileSync(filePath, "utf-8");
    const loaded: LoadedTemplate = {
      name: basename(filename, extname(filename)),
      source,
      tokens: tokenize(source),
    };

    this.cache.set(filename, loaded);
    return loaded;
  }

  /**
   * Load every template in the base directory (not recursive).
   */
  loadAll(): Map<string, LoadedTemplate> {
    const result = new Map<string, LoadedTemplate>();
    for (const entry of TemplateLoader.listTemplates(this.baseDir)) {
      result.set(entry, this.load(entry));
    }
    return result;
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * Template filenames in a directory, sorted. Empty if it does not exist.
   */
  static listTemplates(dir: string): string[] {
    const resolved = resolve(dir);
    if (!existsSync(resolved)) return [];

    return readdirSync(resolved)
      .filter((entry) => isTemplateFile(join(resolved, entry), entry))
      .sort();
  }
}
