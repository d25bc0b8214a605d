/**
 * Run IDs tag every log line written while one job run (or one CLI
 * invocation) renders its templates.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short run ID: UTC date plus random hex, e.g. "20250115-a1b2c3".
 */
export function generateRunId(now: Date = new Date()): string {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Start a new run and return its ID.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * The current run ID, or null before initRunId() is called.
 */
export function getRunId(): string | null {
  return currentRunId;
}
