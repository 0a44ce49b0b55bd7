/**
 * config.ts — Runtime configuration
 *
 * Each setting comes from the process environment first, then from
 * apps/web/.env.local, then from the default below. Live carbon data is
 * off unless its URL is set.
 */

import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";
import { getProjectRoot } from "@/lib/project-root";

export interface AppConfig {
  carbonIntensityApiUrl: string;
  carbonIntensityApiToken: string;
  deviceFootprintApiUrl: string;
  carbonDataTimeoutMs: number;
  auditLogDir: string;
  auditLogEnabled: boolean;
  carbonPriceEurPerTonne: number;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_ENV_FILE = join(getProjectRoot(), "apps", "web", ".env.local");

/** KEY=value lines; `#` comments and surrounding quotes are stripped. */
export function parseEnvFile(content: string): Env {
  const out: Env = {};
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    const m = line.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/);
    if (!m) continue;
    out[m[1]] = m[2].replace(/^(["'])(.*)\1$/, "$2");
  }
  return out;
}

function readEnvFile(path: string): Env {
  if (!existsSync(path)) return {};
  return parseEnvFile(readFileSync(path, "utf-8"));
}

function toNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number(value);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

export function loadConfig(env: Env = process.env, envFile: string = DEFAULT_ENV_FILE): AppConfig {
  const file = readEnvFile(envFile);
  const get = (key: string): string | undefined => {
    const value = env[key] ?? file[key];
    return value === undefined || value.trim() === "" ? undefined : value;
  };

  return {
    carbonIntensityApiUrl: get("CARBON_INTENSITY_API_URL") ?? "",
    carbonIntensityApiToken: get("CARBON_INTENSITY_API_TOKEN") ?? "",
    deviceFootprintApiUrl: get("DEVICE_FOOTPRINT_API_URL") ?? "",
    carbonDataTimeoutMs: toNumber(get("CARBON_DATA_TIMEOUT_MS"), 3000),
    auditLogDir: resolve(getProjectRoot(), get("AUDIT_LOG_DIR") ?? join("data", "audit_logs")),
    auditLogEnabled: toBool(get("AUDIT_LOG_ENABLED"), true),
    carbonPriceEurPerTonne: toNumber(get("CARBON_PRICE_EUR_PER_TONNE"), 80),
  };
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) _config = loadConfig();
  return _config;
}
