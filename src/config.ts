/**
 * Server configuration module.
 *
 * Loads config from config/config.{REFLINKR_CONFIG}.json (relative to the
 * working directory) and provides typed access to configuration values.
 */

import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const configSchema = z.object({
  port: z.number().int().positive().optional(),
  host: z.string().url().optional(),
  contentDir: z.string().min(1).optional(),
  dataFile: z.string().min(1).optional(),
  requestCache: z.boolean().optional(),
});

export type ServerConfig = z.infer<typeof configSchema>;

let cachedConfig: ServerConfig | null = null;

/**
 * Load configuration from file. Safe to call multiple times.
 */
export async function loadConfig(configDir = path.join(process.cwd(), "config")): Promise<ServerConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configEnv = process.env.REFLINKR_CONFIG ?? "dev";
  const configFileName = `config.${configEnv}.json`;
  const configPath = path.join(configDir, configFileName);

  if (!(await fs.pathExists(configPath))) {
    console.warn(`Config file ${configFileName} not found, using defaults`);
    cachedConfig = {};
    return cachedConfig;
  }

  const raw: unknown = await fs.readJson(configPath);
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid ${configFileName}: ${details}`);
  }

  console.log(`Loaded config from ${configFileName}`);
  cachedConfig = result.data;
  return cachedConfig;
}

/**
 * Forget the loaded configuration so the next loadConfig reads it again.
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Get configuration synchronously (must call loadConfig first during bootstrap).
 */
export function getConfig(): ServerConfig {
  return cachedConfig ?? {};
}

/**
 * Get server port from config.
 */
export function getServerPort(): number {
  const config = getConfig();
  return Number(process.env.PORT ?? config.port ?? 3000);
}

/**
 * Base URL that link-form references are recognized under.
 */
export function getHost(): string {
  return getConfig().host ?? "http://localhost:3000";
}

export function getContentDir(): string {
  return path.resolve(getConfig().contentDir ?? "content");
}

export function getDataFile(): string {
  return path.resolve(getConfig().dataFile ?? "data/store.json");
}

/**
 * Whether lookups are memoized per request. On unless disabled in config.
 */
export function isRequestCacheEnabled(): boolean {
  return getConfig().requestCache ?? true;
}
