/**
 * Schemas for the JSON files the engine's collaborators hand it.
 *
 * dictionary.json     { "<section>": { "<key>": "<value>" } }
 * secrets.json        { "<name>": { "key": "…", "header": "bearer", "match": "https://…" } }
 * context.json        { "result": "…", "message": "…", "sender": "…", "memories": [ … ] }
 */

import { z } from "zod";

// ============================================================
// Dictionary
// ============================================================

export const DictionaryFileSchema = z.record(
  z.string(),
  z.record(
    z.string(),
    z.string({ invalid_type_error: "dictionary values must be strings" }),
    { invalid_type_error: "dictionary sections must be objects" }
  )
);

export type DictionaryEntries = Record<string, Record<string, string>>;

// ============================================================
// Secrets
// ============================================================

/**
 * One secret. Missing fields fall back to an empty key, a bearer header
 * and an empty match URL.
 */
export const SecretEntrySchema = z.object({
  key: z.string().default(""),
  header: z.string().default("bearer"),
  match: z.string().default(""),
});

export type SecretEntryInput = z.input<typeof SecretEntrySchema>;

export const SecretsFileSchema = z.record(z.string(), z.unknown());

// ============================================================
// Render context
// ============================================================

export const MemoryEntrySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD"),
  datetime: z.string(),
  result: z.string(),
});

/**
 * A stored run as written by the job store: the date and datetime are
 * derived from its creation timestamp.
 */
export const StoredRunSchema = z
  .object({
    result: z.string(),
    createdAt: z.string().min(10, "createdAt must start with YYYY-MM-DD"),
  })
  .transform((run) => ({
    date: run.createdAt.slice(0, 10),
    datetime: run.createdAt,
    result: run.result,
  }));

export const ContextFileSchema = z
  .object({
    result: z.string().optional(),
    message: z.string().optional(),
    sender: z.string().optional(),
    memories: z.array(z.union([MemoryEntrySchema, StoredRunSchema])).default([]),
  })
  .strict();

export type ContextFile = z.output<typeof ContextFileSchema>;
