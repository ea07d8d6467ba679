import { promises as fs } from "node:fs";
import path from "node:path";
import { createHash } from "node:crypto";
import TOML from "@iarna/toml";
import { z } from "zod";
import { ConfigError } from "./core/errors.js";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const ConfigSchema = z.object({
  projectId: z.string().default(""),
  runtime: z
    .object({
      serviceName: z.string().default("")
    })
    .default({}),
  telegram: z
    .object({
      tokenEnv: z.string().min(1).default("SWITCHBOARD_BOT_TOKEN"),
      dropPendingUpdates: z.boolean().default(false)
    })
    .default({}),
  operators: z
    .object({
      ids: z.array(z.number().int().positive()).default([]),
      usernames: z.array(z.string()).default([]),
      resolveRetrySec: z.number().positive().default(60)
    })
    .default({}),
  rateLimit: z
    .object({
      capacity: z.number().int().positive().default(5),
      fillRate: z.number().positive().default(5),
      pollIntervalMs: z.number().int().positive().default(50)
    })
    .default({}),
  forwarding: z
    .object({
      maxRetries: z.number().int().positive().default(4),
      acquireTimeoutMs: z.number().int().nonnegative().default(3000),
      throttleMarginMs: z.number().int().nonnegative().default(500),
      backoffBaseMs: z.number().int().nonnegative().default(200),
      exhaustedBackoffMs: z.number().int().nonnegative().default(200)
    })
    .default({}),
  correlation: z
    .object({
      maxEntries: z.number().int().positive().default(10_000)
    })
    .default({}),
  transcript: z
    .object({
      enabled: z.boolean().default(true)
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default("info")
    })
    .default({})
});

export type SwitchboardConfig = z.infer<typeof ConfigSchema>;

export interface RuntimePaths {
  projectRoot: string;
  stateDir: string;
  dbPath: string;
  configPath: string;
  logsDir: string;
  pidPath: string;
}

export function getRuntimePaths(projectRoot: string): RuntimePaths {
  const stateDir = path.join(projectRoot, ".switchboard");
  return {
    projectRoot,
    stateDir,
    dbPath: path.join(stateDir, "switchboard.db"),
    configPath: path.join(stateDir, "config.toml"),
    logsDir: path.join(stateDir, "logs"),
    pidPath: path.join(stateDir, "switchboardd.pid")
  };
}

function slugify(input: string): string {
  const out = input.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "");
  return out || "project";
}

export function computeServiceName(projectRoot: string, projectId?: string): string {
  const id = slugify(projectId ?? path.basename(projectRoot));
  const hash = createHash("sha1").update(projectRoot).digest("hex").slice(0, 8);
  return `switchboardd-${id}-${hash}`;
}

export function defaultConfig(projectRoot: string): SwitchboardConfig {
  const cfg = ConfigSchema.parse({ projectId: path.basename(projectRoot) });
  return normalizeConfig(cfg, projectRoot);
}

export async function ensureRuntimeDirs(paths: RuntimePaths): Promise<void> {
  await fs.mkdir(paths.stateDir, { recursive: true });
  await fs.mkdir(paths.logsDir, { recursive: true });
}

export function parseConfig(raw: unknown, projectRoot: string): SwitchboardConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return normalizeConfig(result.data, projectRoot);
}

export async function loadConfig(paths: RuntimePaths): Promise<SwitchboardConfig> {
  const raw = await fs.readFile(paths.configPath, "utf8");
  let parsed: TOML.JsonMap;
  try {
    parsed = TOML.parse(raw);
  } catch (err) {
    throw new ConfigError(`Cannot parse ${paths.configPath}`, { path: paths.configPath }, { cause: err });
  }
  return parseConfig(parsed, paths.projectRoot);
}

export async function saveConfig(paths: RuntimePaths, cfg: SwitchboardConfig): Promise<void> {
  await fs.writeFile(paths.configPath, TOML.stringify(cfg), "utf8");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function loadOrCreateConfig(paths: RuntimePaths): Promise<SwitchboardConfig> {
  try {
    return await loadConfig(paths);
  } catch (err) {
    if (!isMissingFile(err)) {
      throw err;
    }
    const cfg = defaultConfig(paths.projectRoot);
    await saveConfig(paths, cfg);
    return cfg;
  }
}

export function normalizeUsername(name: string): string {
  return name.trim().replace(/^@+/, "").toLowerCase();
}

export function normalizeConfig(cfg: SwitchboardConfig, projectRoot = cfg.projectId): SwitchboardConfig {
  const normalized = cfg;
  if (!normalized.projectId) {
    normalized.projectId = path.basename(projectRoot);
  }
  if (!normalized.runtime.serviceName) {
    normalized.runtime.serviceName = computeServiceName(projectRoot, normalized.projectId);
  }
  normalized.operators.ids = [...new Set(normalized.operators.ids)];
  normalized.operators.usernames = [
    ...new Set(normalized.operators.usernames.map(normalizeUsername).filter((name) => name.length > 0))
  ];
  if (normalized.forwarding.maxRetries > 10) {
    normalized.forwarding.maxRetries = 10;
  }
  return normalized;
}

export function resolveBotToken(cfg: SwitchboardConfig, env: NodeJS.ProcessEnv = process.env): string {
  const token = env[cfg.telegram.tokenEnv]?.trim();
  if (!token) {
    throw new ConfigError(`Bot token is missing. Set ${cfg.telegram.tokenEnv} in the environment.`, {
      tokenEnv: cfg.telegram.tokenEnv
    });
  }
  return token;
}
