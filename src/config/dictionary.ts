/**
 * Static (section, key) → string lookup backing `{% custom:<key> %}`.
 */

import type { DictionaryLookup } from "../template/context.js";
import { DictionaryFileSchema, type DictionaryEntries } from "./schema.js";
import { readJsonFile, validateConfigData } from "./validation.js";

export class Dictionary implements DictionaryLookup {
  private readonly sections = new Map<string, Map<string, string>>();

  constructor(entries: DictionaryEntries = {}) {
    for (const [section, values] of Object.entries(entries)) {
      this.sections.set(section, new Map(Object.entries(values)));
    }
  }

  /** e.g. `dictionary.get("general", "name")` */
  get(section: string, key: string): string | undefined {
    return this.sections.get(section)?.get(key);
  }

  set(section: string, key: string, value: string): this {
    let values = this.sections.get(section);
    if (values === undefined) {
      values = new Map();
      this.sections.set(section, values);
    }
    values.set(key, value);
    return this;
  }

  hasSection(section: string): boolean {
    return this.sections.has(section);
  }

  sectionNames(): string[] {
    return [...this.sections.keys()].sort();
  }

  /**
   * Load a dictionary file. A missing file yields an empty dictionary.
   *
   * @throws ConfigFileError if the file is not valid JSON or not a
   *         two-level object of strings
   */
  static load(filePath: string): Dictionary {
    const data = readJsonFile(filePath);
    if (data === undefined) {
      return new Dictionary();
    }
    return new Dictionary(validateConfigData(data, DictionaryFileSchema, filePath));
  }
}
