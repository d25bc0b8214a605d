/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { isLogLevel, LOG_LEVELS, type LogLevel } from "../logging/index.js";
import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";

export { ConfigError } from "./env.js";
export { Dictionary } from "./dictionary.js";
export { Secrets, type Secret } from "./secrets.js";
export { loadContextFile } from "./context-file.js";
export {
  ConfigFileError,
  formatZodIssues,
  readJsonFile,
  validateConfigData,
  type ConfigValidationIssue,
} from "./validation.js";
export {
  ContextFileSchema,
  DictionaryFileSchema,
  MemoryEntrySchema,
  SecretEntrySchema,
  SecretsFileSchema,
  StoredRunSchema,
  type ContextFile,
  type DictionaryEntries,
  type SecretEntryInput,
} from "./schema.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level as given; checked by validateConfig() */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Dictionary JSON used by `custom:` tags */
  readonly dictionaryPath: string;
  /** Secrets JSON used by `proxy:` tags */
  readonly secretsPath: string;
  /** Directory of .md/.txt templates */
  readonly templateDir: string;
}

/**
 * Read configuration from the environment. Every value has a default.
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "vatic-template"),
    dictionaryPath: optionalEnv("VATIC_DICTIONARY", "config/dictionary.json"),
    secretsPath: optionalEnv("VATIC_SECRETS", "config/secrets.json"),
    templateDir: optionalEnv("VATIC_TEMPLATES", "templates"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration and return the effective log level.
 * Call at startup to fail fast. DEBUG=true forces the debug level.
 *
 * @throws ConfigError
 */
export function validateConfig(cfg: AppConfig = config): LogLevel {
  if (!(ENVIRONMENTS as readonly string[]).includes(cfg.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${cfg.env}. Must be ${ENVIRONMENTS.join(", ")}.`
    );
  }

  if (!isLogLevel(cfg.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${cfg.logLevel}. Must be ${LOG_LEVELS.join(", ")}.`
    );
  }

  return cfg.debug ? "debug" : cfg.logLevel;
}
