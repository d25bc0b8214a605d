/**
 * vatic-template: tag-based rendering of agent prompts and output
 * messages.
 *
 * The engine lives in ./template; ./config loads the dictionary, secrets
 * and context files a render draws on; ./logging provides the logger the
 * CLI and renderer write to.
 */

export * from "./template/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
