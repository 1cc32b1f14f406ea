import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { DEFAULT_ENGINE_OPTIONS, type EngineOptions } from "../playback/options";
import { ConfigError } from "./errors";

const APP_DIR_NAME = "playdeck";
const CONFIG_FILE = "config.json";
const TOKEN_CACHE_FILE = "token-cache.json";
const DEFAULT_REDIRECT_URI = "http://127.0.0.1:8888/callback";

export interface AppConfig {
  clientId: string;
  redirectUri: string;
  configDir: string;
  tokenCachePath: string;
  sentryDsn?: string;
  engine: EngineOptions;
}

type Environment = NodeJS.ProcessEnv;

export function resolveConfigDir(env: Environment = process.env): string {
  if (env.PLAYDECK_CONFIG_DIR) {
    return env.PLAYDECK_CONFIG_DIR;
  }
  const base = env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(base, APP_DIR_NAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") {
      return {};
    }
    throw new ConfigError(`Cannot read ${path}: ${String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`${path} is not valid JSON: ${String(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${path} must contain a JSON object`);
  }
  return parsed;
}

function parseEngineOptions(raw: unknown, path: string): EngineOptions {
  const options: EngineOptions = { ...DEFAULT_ENGINE_OPTIONS };
  if (raw === undefined) {
    return options;
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`"engine" in ${path} must be an object`);
  }

  for (const key of Object.keys(DEFAULT_ENGINE_OPTIONS)) {
    if (!isEngineKey(key)) continue;
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      throw new ConfigError(`"engine.${key}" in ${path} must be a non-negative number`);
    }
    options[key] = value;
  }
  return options;
}

function isEngineKey(key: string): key is keyof EngineOptions {
  return key in DEFAULT_ENGINE_OPTIONS;
}

/**
 * Builds the runtime configuration. Environment variables win over
 * `config.json` in the config directory.
 */
export async function loadConfig(env: Environment = process.env): Promise<AppConfig> {
  const configDir = resolveConfigDir(env);
  const configPath = join(configDir, CONFIG_FILE);
  const file = await readConfigFile(configPath);

  const fileClientId = typeof file.clientId === "string" ? file.clientId : undefined;
  const clientId = env.SPOTIFY_CLIENT_ID || fileClientId;
  if (!clientId) {
    throw new ConfigError(
      `No Spotify client id: set SPOTIFY_CLIENT_ID or "clientId" in ${configPath}`,
    );
  }

  const fileRedirect =
    typeof file.redirectUri === "string" ? file.redirectUri : undefined;

  return {
    clientId,
    redirectUri: env.SPOTIFY_REDIRECT_URI || fileRedirect || DEFAULT_REDIRECT_URI,
    configDir,
    tokenCachePath: join(configDir, TOKEN_CACHE_FILE),
    sentryDsn: env.SENTRY_DSN || undefined,
    engine: parseEngineOptions(file.engine, configPath),
  };
}
