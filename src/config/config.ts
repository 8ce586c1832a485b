// pattern: Imperative Shell

import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema, type AppConfig } from "./schema.js";
import { ConfigurationMissingError } from "../errors.js";

export type { AppConfig, ModelConfig, GroundingConfig, AnalysisConfig, SearchConnection } from "./schema.js";

const DEFAULT_CONFIG_FILE = "config.toml";

type Env = Readonly<Record<string, string | undefined>>;

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(source: Section, key: string): Section {
  const value = source[key];
  return isRecord(value) ? { ...value } : {};
}

function setIfPresent(target: Section, key: string, value: string | undefined): void {
  if (value !== undefined && value !== "") {
    target[key] = value;
  }
}

function setNumberIfPresent(target: Section, key: string, value: string | undefined): void {
  if (value !== undefined && value !== "") {
    target[key] = Number(value);
  }
}

function readConfigFile(configPath: string | undefined): Section {
  const explicit = configPath !== undefined;
  const resolvedPath = resolve(configPath ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(resolvedPath)) {
    if (explicit) {
      throw new ConfigurationMissingError([`config file not found: ${resolvedPath}`]);
    }
    return {};
  }

  try {
    return TOML.parse(readFileSync(resolvedPath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationMissingError([`could not parse ${resolvedPath}: ${reason}`]);
  }
}

/**
 * Apply environment overrides on top of the parsed TOML sections.
 * Secrets and deployment handles normally come from the environment (or a .env file).
 */
function applyEnvOverrides(parsed: Section, env: Env): Section {
  const model = section(parsed, "model");
  setIfPresent(model, "api_key", env["AZURE_OPENAI_API_KEY"] || env["OPENAI_API_KEY"]);
  setIfPresent(model, "name", env["MODEL_DEPLOYMENT_NAME"]);
  setIfPresent(model, "api_version", env["MODEL_API_VERSION"]);
  setIfPresent(model, "endpoint", env["AZURE_ENDPOINT"]);

  const grounding = section(parsed, "grounding");
  setIfPresent(grounding, "project_endpoint", env["PROJECT_CLIENT_ENDPOINT"]);
  setIfPresent(grounding, "connection", env["GROUNDING_CONNECTION_NAME"]);
  setIfPresent(grounding, "brave_api_key", env["BRAVE_API_KEY"]);
  setIfPresent(grounding, "tavily_api_key", env["TAVILY_API_KEY"]);

  const analysis = section(parsed, "analysis");
  setIfPresent(analysis, "subject", env["ANALYSIS_SUBJECT"]);
  setNumberIfPresent(analysis, "interval_seconds", env["POLL_INTERVAL_SECONDS"]);

  return { ...parsed, model, grounding, analysis };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Load the process-wide configuration once at startup.
 * The file is optional unless a path is given explicitly (argument or MARKET_ROUNDTABLE_CONFIG).
 */
export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const parsed = readConfigFile(configPath ?? env["MARKET_ROUNDTABLE_CONFIG"]);
  const merged = applyEnvOverrides(parsed, env);

  const result = AppConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationMissingError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }

  return deepFreeze(result.data);
}
