/**
 * Application configuration.
 * Reads the environment once and exposes typed values.
 */

import { ConfigError, optionalEnv, optionalEnvBool, optionalEnvInt, requireEnv } from "./env.js";
import { DEFAULT_EXPLORER_CONFIG } from "./explorer/defaults.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";

export { ConfigError, requireEnv, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";

// Engine tuning lives in its own schema-validated module
export * from "./explorer/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
export type AppEnvironment = (typeof ENVIRONMENTS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: AppEnvironment;
  /** Enable debug mode (forces log level "debug") */
  readonly debug: boolean;
  readonly logLevel: LogLevel;
  readonly appName: string;
  /** Directory of the JSON-file session store */
  readonly dataDir: string;
  /** Provider timeout for each expansion, in ms */
  readonly suggestionTimeoutMs: number;
  /** Only needed by the Gemini suggestion provider */
  readonly geminiApiKey?: string;
  readonly geminiModel?: string;
}

function isEnvironment(value: string): value is AppEnvironment {
  return ENVIRONMENTS.some((environment) => environment === value);
}

/**
 * Load and validate application configuration.
 * Fails fast on malformed values.
 *
 * @throws ConfigError
 */
export function loadAppConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const nodeEnv = optionalEnv("NODE_ENV", "development", env);
  if (!isEnvironment(nodeEnv)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${nodeEnv}. Must be development, production, or test.`
    );
  }

  const debug = optionalEnvBool("DEBUG", false, env);
  const logLevel = optionalEnv("LOG_LEVEL", "info", env);
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`);
  }

  const suggestionTimeoutMs = optionalEnvInt(
    "EXPLORER_TIMEOUT_MS",
    DEFAULT_EXPLORER_CONFIG.suggestions.timeoutMs,
    env
  );
  if (suggestionTimeoutMs <= 0) {
    throw new ConfigError(`Invalid EXPLORER_TIMEOUT_MS: ${suggestionTimeoutMs}. Must be positive.`);
  }

  const config: {
    -readonly [K in keyof AppConfig]: AppConfig[K];
  } = {
    env: nodeEnv,
    debug,
    logLevel: debug ? "debug" : logLevel,
    appName: optionalEnv("APP_NAME", "knowledge-tree-explorer", env),
    dataDir: optionalEnv("EXPLORER_DATA_DIR", "output/sessions", env),
    suggestionTimeoutMs,
  };

  const apiKey = env["GEMINI_API_KEY"];
  if (apiKey !== undefined && apiKey !== "") {
    config.geminiApiKey = apiKey;
    config.geminiModel = optionalEnv("GEMINI_MODEL", "gemini-2.5-flash", env);
  }

  return config;
}

/**
 * Read the Gemini API key, failing when it is absent.
 */
export function requireGeminiApiKey(env: Record<string, string | undefined> = process.env): string {
  return requireEnv("GEMINI_API_KEY", env);
}
