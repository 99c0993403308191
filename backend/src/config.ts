/**
 * Configuration
 *
 * Server settings come from the environment. Scheduling overrides come from
 * an optional deckwise.config.json in the decks directory:
 *
 * ```json
 * { "forecastDays": 60, "scheduler": { "easyBonusModifier": 1.5 } }
 * ```
 */

import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import { formatValidationError } from "@deckwise/shared";
import { createLogger } from "./logger";
import {
  DEFAULT_POLICY,
  SchedulerPolicySchema,
  type SchedulerPolicy,
} from "./spaced-repetition/scheduler-policy";
import { DEFAULT_FORECAST_DAYS } from "./spaced-repetition/statistics";

const log = createLogger("Config");

// =============================================================================
// Constants
// =============================================================================

/**
 * Configuration file name inside the decks directory.
 */
export const CONFIG_FILE_NAME = "deckwise.config.json";

export const DEFAULT_DECKS_DIR = "decks";
export const DEFAULT_PORT = 3000;
export const DEFAULT_HOST = "0.0.0.0";

// =============================================================================
// Schema
// =============================================================================

/**
 * Schema for deckwise.config.json.
 */
const DeckConfigFileSchema = z.object({
  forecastDays: z.number().int().min(0).max(3650).default(DEFAULT_FORECAST_DAYS),
  scheduler: SchedulerPolicySchema.default({}),
});

export type DeckConfig = {
  forecastDays: number;
  policy: SchedulerPolicy;
};

export interface ServerConfig {
  decksDir: string;
  port: number;
  host: string;
}

// =============================================================================
// Environment
// =============================================================================

/**
 * Get the port from environment variable or use default
 */
export function getPort(env: NodeJS.ProcessEnv = process.env): number {
  const envPort = env.PORT;
  if (envPort) {
    const parsed = parseInt(envPort, 10);
    if (!isNaN(parsed) && parsed > 0 && parsed <= 65535) {
      return parsed;
    }
    log.warn(`Invalid PORT "${envPort}", using default ${DEFAULT_PORT}`);
  }
  return DEFAULT_PORT;
}

/**
 * Resolve server settings from the environment.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    decksDir: resolve(env.DECKS_DIR || DEFAULT_DECKS_DIR),
    port: getPort(env),
    host: env.HOST || DEFAULT_HOST,
  };
}

// =============================================================================
// Config File
// =============================================================================

/**
 * Load scheduling overrides for a decks directory.
 * Returns defaults if the file is missing or invalid.
 *
 * @param decksDir - Absolute path to the decks directory
 */
export async function loadDeckConfig(decksDir: string): Promise<DeckConfig> {
  const configPath = join(decksDir, CONFIG_FILE_NAME);
  const defaults: DeckConfig = { forecastDays: DEFAULT_FORECAST_DAYS, policy: DEFAULT_POLICY };

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return defaults;
    }
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Failed to read config from ${configPath}: ${message}`);
    return defaults;
  }

  try {
    const parsed = DeckConfigFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      log.warn(`Invalid config in ${configPath}: ${formatValidationError(parsed.error)}`);
      return defaults;
    }

    log.info(`Loaded config from ${configPath}`);
    return { forecastDays: parsed.data.forecastDays, policy: parsed.data.scheduler };
  } catch (error) {
    // JSON parse error
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Failed to parse config from ${configPath}: ${message}`);
    return defaults;
  }
}
