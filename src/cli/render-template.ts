#!/usr/bin/env node
/**
 * CLI tool to render a template against dictionary, secrets and job data.
 *
 * Useful for checking what a prompt or output message will look like
 * before a job runs it: which memories a loop picks up, what the date
 * tags evaluate to, whether every `custom:` key exists.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Render a template file from the templates directory:
 *   npm run render -- --template daily-weather.md --context run.json
 *
 * Render inline text:
 *   npm run render -- --inline "Hello {% custom:name %}, today is {% date %}"
 *
 * Options:
 *   --template <filename>   Template in the templates directory
 *   --templates <dir>       Templates directory (default: $VATIC_TEMPLATES or templates/)
 *   --inline <text>         Render this text instead of a file
 *   --dictionary <path>     Dictionary JSON (default: $VATIC_DICTIONARY or config/dictionary.json)
 *   --secrets <path>        Secrets JSON (default: $VATIC_SECRETS or config/secrets.json)
 *   --context <path>        Context JSON with result, message, sender, memories
 *   --json                  Output as JSON (includes metadata)
 *   --verbose               Log debug output to stderr
 *   --no-color              Disable ANSI colors
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Rendered
 *   1 - Error (bad arguments, unreadable files, template error)
 */

import { parseArgs } from "node:util";

import {
  config,
  validateConfig,
  Dictionary,
  Secrets,
  loadContextFile,
  ConfigFileError,
} from "../config/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import {
  TemplateLoader,
  buildRenderContext,
  isTemplateError,
  renderTokens,
  tokenize,
  type Clock,
  type Token,
} from "../template/index.js";

// ============================================================
// Types
// ============================================================

export interface RenderRequest {
  /** Template filename inside templateDir. Ignored when inline is set. */
  template?: string;
  templateDir: string;
  inline?: string;
  dictionaryPath: string;
  secretsPath: string;
  contextPath?: string;
  clock?: Clock;
  logger?: Logger;
}

export interface RenderPreview {
  templateName: string;
  rendered: string;
  metadata: {
    tagCount: number;
    loopCount: number;
    memoryCount: number;
    dictionarySections: string[];
    secretNames: string[];
    lineCount: number;
    charCount: number;
  };
}

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: render-template [options]

  npm run render -- --template <filename> [--context <path>]
  npm run render -- --inline "<template text>"

Options:
  --template <filename>   Template in the templates directory
  --templates <dir>       Templates directory (default: ${config.templateDir})
  --inline <text>         Render this text instead of a file
  --dictionary <path>     Dictionary JSON (default: ${config.dictionaryPath})
  --secrets <path>        Secrets JSON (default: ${config.secretsPath})
  --context <path>        Context JSON with result, message, sender, memories
  --json                  Output as JSON (includes metadata)
  --verbose               Log debug output to stderr
  --no-color              Disable ANSI colors
  -h, --help              Show this help message

Exit codes:
  0 - Rendered
  1 - Error (bad arguments, unreadable files, template error)
`;

export function parseCliArgs(argv: string[] = process.argv.slice(2)) {
  const { values } = parseArgs({
    args: argv,
    options: {
      template: { type: "string" },
      templates: { type: "string", default: config.templateDir },
      inline: { type: "string" },
      dictionary: { type: "string", default: config.dictionaryPath },
      secrets: { type: "string", default: config.secretsPath },
      context: { type: "string" },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

let useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function countTokens(tokens: readonly Token[]): { tags: number; loops: number } {
  let tags = 0;
  let loops = 0;
  for (const token of tokens) {
    if (token.kind === "tag") tags++;
    if (token.kind === "forStart") loops++;
  }
  return { tags, loops };
}

// ============================================================
// Rendering
// ============================================================

/**
 * Load the template and its collaborators, then render.
 *
 * @throws TemplateError, TemplateLoadError or ConfigFileError
 */
export async function renderRequest(request: RenderRequest): Promise<RenderPreview> {
  const { logger } = request;

  let templateName: string;
  let tokens: readonly Token[];

  if (request.inline !== undefined) {
    templateName = "(inline)";
    tokens = tokenize(request.inline);
  } else if (request.template !== undefined) {
    const loaded = new TemplateLoader(request.templateDir).load(request.template);
    templateName = loaded.name;
    tokens = loaded.tokens;
  } else {
    throw new Error("Either --template or --inline is required");
  }

  const dictionary = Dictionary.load(request.dictionaryPath);
  const secrets = Secrets.load(request.secretsPath, logger);
  const data = request.contextPath === undefined ? undefined : loadContextFile(request.contextPath);

  logger?.debug("Rendering template", {
    template: templateName,
    dictionarySections: dictionary.sectionNames().length,
    secrets: secrets.size,
    memories: data?.memories.length ?? 0,
  });

  const context = buildRenderContext({
    dictionary,
    secrets,
    result: data?.result,
    message: data?.message,
    sender: data?.sender,
    memories: data?.memories,
  });

  const rendered = await renderTokens(tokens, context, {
    clock: request.clock,
    logger,
  });
  const counts = countTokens(tokens);

  return {
    templateName,
    rendered,
    metadata: {
      tagCount: counts.tags,
      loopCount: counts.loops,
      memoryCount: context.memories.length,
      dictionarySections: dictionary.sectionNames(),
      secretNames: secrets.names(),
      lineCount: rendered.split("\n").length,
      charCount: rendered.length,
    },
  };
}

/**
 * One-line description of a failure for stderr.
 */
export function describeError(err: unknown): string {
  if (err instanceof ConfigFileError) {
    return err.format();
  }
  if (isTemplateError(err)) {
    return `Template error (${err.kind}): ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (args["no-color"]) {
    useColors = false;
  }

  const level = validateConfig();
  initRunId();
  const logger = createLogger({
    level: args.verbose ? "debug" : level,
    stream: "stderr",
  });

  const preview = await renderRequest({
    template: args.template,
    templateDir: args.templates,
    inline: args.inline,
    dictionaryPath: args.dictionary,
    secretsPath: args.secrets,
    contextPath: args.context,
    logger,
  });

  if (args.json) {
    console.log(JSON.stringify(preview, null, 2));
  } else {
    console.error(c("cyan", `── ${preview.templateName} ──`));
    console.error(
      c(
        "dim",
        `  ${preview.metadata.tagCount} tags, ${preview.metadata.loopCount} loops, ` +
          `${preview.metadata.memoryCount} memories`
      )
    );
    console.log(preview.rendered);
  }

  process.exit(0);
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] !== undefined &&
  (process.argv[1].endsWith("render-template.ts") ||
   process.argv[1].endsWith("render-template.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    console.error(c("red", `Error: ${describeError(err)}`));
    process.exit(1);
  });
}
