import fs from "fs";
import path from "path";
import type { LogLevel } from "./ports/sys/LoggerPort";
import { isLogLevel } from "./ports/sys/LoggerPort";

export interface CommandDefaultsConfig {
  count?: number;
  message?: string;
}

export interface AppConfig {
  logLevel?: LogLevel;
  defaults?: CommandDefaultsConfig;
}

const DEFAULT_CONFIG_FILENAMES = ["loop-timers.config.json", "timers.config.json"];

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return { config: normalizeConfig(parsed), path: resolved };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

export function normalizeConfig(input: unknown): AppConfig {
  const out: AppConfig = {};
  if (!isRecord(input)) {
    console.warn("Config root must be a JSON object; using defaults.");
    return out;
  }

  if (input.logLevel !== undefined) {
    if (isLogLevel(input.logLevel)) {
      out.logLevel = input.logLevel;
    } else {
      console.warn(`Invalid logLevel ${JSON.stringify(input.logLevel)}; expected debug, info, warn or error.`);
    }
  }

  if (input.defaults !== undefined) {
    out.defaults = normalizeDefaults(input.defaults);
  }

  return out;
}

function normalizeDefaults(input: unknown): CommandDefaultsConfig {
  const out: CommandDefaultsConfig = {};
  if (!isRecord(input)) {
    console.warn("Config defaults must be an object; ignoring.");
    return out;
  }

  const { count, message } = input;
  if (typeof count === "number" && Number.isInteger(count) && count > 0) {
    out.count = count;
  } else if (count !== undefined) {
    console.warn(`Invalid defaults.count ${JSON.stringify(count)}; expected a positive integer.`);
  }

  if (typeof message === "string" && message.trim()) {
    out.message = message.trim();
  } else if (message !== undefined) {
    console.warn(`Invalid defaults.message ${JSON.stringify(message)}; expected a non-empty string.`);
  }

  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
