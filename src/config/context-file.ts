/**
 * Render-context files: the job data (result, message, sender, memories)
 * a caller wants a template rendered against, stored as JSON.
 */

import { ConfigFileError, readJsonFile, validateConfigData } from "./validation.js";
import { ContextFileSchema, type ContextFile } from "./schema.js";

/**
 * Load a context file.
 *
 * Memories may be written either as `{ date, datetime, result }` or as a
 * stored run `{ result, createdAt }`, whose date is the first ten
 * characters of `createdAt`. Order is kept: newest first.
 *
 * @throws ConfigFileError if the file is missing, not JSON, or invalid
 */
export function loadContextFile(filePath: string): ContextFile {
  const data = readJsonFile(filePath);
  if (data === undefined) {
    throw new ConfigFileError(
      filePath,
      [{ path: [], message: "file not found", code: "not_found" }],
      `Context file not found: ${filePath}`
    );
  }
  return validateConfigData(data, ContextFileSchema, filePath);
}
