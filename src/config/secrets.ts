/**
 * Secrets registry backing `{% proxy:<name> %}`.
 *
 * Templates only ever see a secret's match URL; the key itself never
 * reaches rendered text and is masked when a secret is serialized.
 */

import { statSync } from "node:fs";

import type { Logger } from "../logging/index.js";
import type { SecretRecord, SecretsLookup } from "../template/context.js";
import { SecretEntrySchema, SecretsFileSchema, type SecretEntryInput } from "./schema.js";
import { readJsonFile, validateConfigData } from "./validation.js";

export interface Secret extends SecretRecord {
  readonly key: string;
  readonly header: string;
  readonly matchUrl: string;
}

const MASK = "***";

export class Secrets implements SecretsLookup {
  private readonly entries = new Map<string, Secret>();

  constructor(entries: Iterable<readonly [string, Secret]> = []) {
    for (const [name, secret] of entries) {
      this.entries.set(name, secret);
    }
  }

  get(name: string): Secret | undefined {
    return this.entries.get(name);
  }

  get size(): number {
    return this.entries.size;
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  toJSON(): Record<string, { key: string; header: string; matchUrl: string }> {
    const masked: Record<string, { key: string; header: string; matchUrl: string }> = {};
    for (const [name, secret] of this.entries) {
      masked[name] = { key: MASK, header: secret.header, matchUrl: secret.matchUrl };
    }
    return masked;
  }

  /**
   * Build a secret from file input, applying the field defaults.
   */
  static entry(input: SecretEntryInput): Secret {
    const parsed = SecretEntrySchema.parse(input);
    return { key: parsed.key, header: parsed.header, matchUrl: parsed.match };
  }

  /**
   * Load a secrets file. A missing file yields an empty registry.
   * Top-level values that are not objects are skipped.
   *
   * @param logger - Warned when the file is readable by group or others
   * @throws ConfigFileError on invalid JSON or mistyped fields
   */
  static load(filePath: string, logger?: Logger): Secrets {
    const data = readJsonFile(filePath);
    if (data === undefined) {
      return new Secrets();
    }

    checkPermissions(filePath, logger);

    const table = validateConfigData(data, SecretsFileSchema, filePath);
    const secrets = new Secrets();

    for (const [name, value] of Object.entries(table)) {
      if (value === null || typeof value !== "object" || Array.isArray(value)) {
        logger?.debug("Skipping non-object secrets entry", { name });
        continue;
      }
      const parsed = validateConfigData(value, SecretEntrySchema, filePath, [name]);
      secrets.entries.set(name, {
        key: parsed.key,
        header: parsed.header,
        matchUrl: parsed.match,
      });
    }

    return secrets;
  }
}

/**
 * Secrets should be readable by their owner only (mode 0600).
 */
function checkPermissions(filePath: string, logger?: Logger): void {
  const mode = statSync(filePath).mode & 0o777;
  if ((mode & 0o077) !== 0) {
    logger?.warn("Secrets file is readable by other users; should be 0600", {
      path: filePath,
      mode: mode.toString(8).padStart(4, "0"),
      fix: `chmod 600 ${filePath}`,
    });
  }
}
