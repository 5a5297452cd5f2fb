/**
 * Layered configuration
 *
 * Precedence, highest first:
 *   explicit override > LOOPWRIGHT_* env > <cwd>/.loopwright.json > ~/.loopwright/config.json > defaults
 *
 * Layers are merged key by key, then validated once with a zod schema. An
 * unreadable or malformed file is skipped with a warning; a value of the wrong
 * type fails loudly with ConfigError.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigError, describeError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import {
  APP_DIR_NAME,
  DEFAULT_CONFIG,
  ENV_PREFIX,
  GLOBAL_CONFIG_FILE,
  PROJECT_CONFIG_FILE,
} from "./defaults.js";

// ============== Schema ==============

/** Env values "1"/"0" arrive as numbers; accept them for boolean keys. */
const booleanish = z.preprocess((value) => (value === 1 ? true : value === 0 ? false : value), z.boolean());

export const PermissionRuleConfigSchema = z.object({
  tool_pattern: z.string().default("*"),
  path_pattern: z.string().optional(),
  command_pattern: z.string().optional(),
  permission: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["allow", "deny", "ask"])),
  priority: z.number().int().default(0),
  description: z.string().default(""),
});

export const ConfigSchema = z.object({
  provider: z.string().min(1).default(DEFAULT_CONFIG.provider),
  model: z.string().min(1).default(DEFAULT_CONFIG.model),
  api_key: z.string().min(1).optional(),
  max_tokens: z.number().int().positive().default(DEFAULT_CONFIG.max_tokens),
  system_prompt: z.string().default(DEFAULT_CONFIG.system_prompt),

  max_turns: z.number().int().positive().default(DEFAULT_CONFIG.max_turns),
  max_output_length: z.number().int().positive().default(DEFAULT_CONFIG.max_output_length),
  context_limit: z.number().int().positive().default(DEFAULT_CONFIG.context_limit),
  compact_threshold: z.number().gt(0).lte(1).default(DEFAULT_CONFIG.compact_threshold),
  preserve_recent_messages: z.number().int().min(1).default(DEFAULT_CONFIG.preserve_recent_messages),
  chars_per_token: z.number().positive().default(DEFAULT_CONFIG.chars_per_token),
  enable_auto_compaction: booleanish.default(DEFAULT_CONFIG.enable_auto_compaction),

  approval_enabled: booleanish.default(DEFAULT_CONFIG.approval_enabled),
  show_diff: booleanish.default(DEFAULT_CONFIG.show_diff),
  permission_rules: z.array(PermissionRuleConfigSchema).default([]),

  debug: booleanish.default(DEFAULT_CONFIG.debug),
});

export type ConfigValues = z.output<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type ConfigKey = keyof ConfigValues;

function parseConfig(raw: Record<string, unknown>): ConfigValues {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((issue) => issue.path.join(".")))];
    const details = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`, { keys, cause: result.error });
  }
  return result.data;
}

// ============== Layers ==============

export type ConfigSource = "global" | "project";

function readJsonLayer(file: string, logger: Logger): Record<string, unknown> | undefined {
  if (!fs.existsSync(file)) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    logger.warn(`ignoring config file ${file}: ${describeError(err)}`);
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    logger.warn(`ignoring config file ${file}: expected a JSON object`);
    return undefined;
  }
  return { ...parsed };
}

/**
 * Parse an environment value: true/yes, false/no, numbers, else the raw string
 */
export function parseEnvValue(value: string): unknown {
  const lower = value.trim().toLowerCase();
  if (lower === "true" || lower === "yes") return true;
  if (lower === "false" || lower === "no") return false;
  if (lower !== "" && Number.isFinite(Number(lower))) return Number(lower);
  return value;
}

export function readEnvLayer(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    // Prompts and keys stay strings even when they look numeric
    layer[configKey] =
      configKey === "api_key" || configKey === "model" || configKey === "system_prompt" ? value : parseEnvValue(value);
  }
  return layer;
}

// ============== Config ==============

export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<ConfigInput>;
  logger?: Logger;
}

export class Config {
  private values: ConfigValues;
  readonly sources: ReadonlyArray<{ source: ConfigSource; file: string }>;

  constructor(values: Record<string, unknown> = {}, sources: Array<{ source: ConfigSource; file: string }> = []) {
    this.values = parseConfig(values);
    this.sources = sources;
  }

  get<K extends ConfigKey>(key: K): ConfigValues[K] {
    return this.values[key];
  }

  /** Explicit override; validated like every other layer. */
  set<K extends ConfigKey>(key: K, value: ConfigInput[K]): void {
    this.values = parseConfig({ ...this.values, [key]: value });
  }

  toJSON(): ConfigValues {
    return { ...this.values };
  }
}

export function loadConfig(opts: LoadConfigOptions = {}): Config {
  const logger = opts.logger ?? createLogger("config");
  const cwd = opts.cwd ?? process.cwd();
  const homeDir = opts.homeDir ?? os.homedir();

  const merged: Record<string, unknown> = {};
  const sources: Array<{ source: ConfigSource; file: string }> = [];

  const globalFile = path.join(homeDir, APP_DIR_NAME, GLOBAL_CONFIG_FILE);
  const globalLayer = readJsonLayer(globalFile, logger);
  if (globalLayer) {
    Object.assign(merged, globalLayer);
    sources.push({ source: "global", file: globalFile });
  }

  const projectFile = path.join(cwd, PROJECT_CONFIG_FILE);
  const projectLayer = readJsonLayer(projectFile, logger);
  if (projectLayer) {
    Object.assign(merged, projectLayer);
    sources.push({ source: "project", file: projectFile });
  }

  Object.assign(merged, readEnvLayer(opts.env ?? process.env));

  for (const [key, value] of Object.entries(opts.overrides ?? {})) {
    if (value !== undefined) merged[key] = value;
  }

  return new Config(merged, sources);
}
