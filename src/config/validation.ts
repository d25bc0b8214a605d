/**
 * Shared loading and validation for JSON configuration files.
 */

import { existsSync, readFileSync } from "node:fs";
import type { ZodIssue, ZodType, ZodTypeDef } from "zod";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "invalid_json" when the file does not parse */
  code: string;
}

/**
 * A configuration file that could not be read or did not validate.
 */
export class ConfigFileError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly issues: ConfigValidationIssue[],
    message?: string
  ) {
    super(message ?? `Invalid configuration file ${filePath}: ${issues.length} error(s)`);
    this.name = "ConfigFileError";
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [`${this.filePath} failed validation:`];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate already-parsed data against a schema.
 *
 * @throws ConfigFileError listing every issue
 */
export function validateConfigData<Output, Input>(
  data: unknown,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filePath: string,
  prefix: (string | number)[] = []
): Output {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues).map((issue) => ({
      ...issue,
      path: [...prefix, ...issue.path],
    }));
    throw new ConfigFileError(filePath, issues);
  }
  return result.data;
}

/**
 * Read and parse a JSON file. Returns undefined when the file is absent.
 *
 * @throws ConfigFileError if the file is not valid JSON
 */
export function readJsonFile(filePath: string): unknown {
  if (!existsSync(filePath)) {
    return undefined;
  }

  const text = readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigFileError(filePath, [{ path: [], message, code: "invalid_json" }]);
  }
}
