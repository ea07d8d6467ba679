#!/usr/bin/env node
import { Command } from "commander";
import { spawn } from "node:child_process";
import { promises as fs } from "node:fs";
import path from "node:path";
import process from "node:process";
import {
  ensureRuntimeDirs,
  getRuntimePaths,
  loadOrCreateConfig,
  normalizeUsername,
  saveConfig,
  type RuntimePaths,
  type SwitchboardConfig
} from "./config.js";
import { Db } from "./core/db.js";
import { Logger } from "./core/logger.js";
import { commandExists, parseUserId, runCommand, runInteractiveCommand } from "./core/utils.js";
import type { HealthCheckResult } from "./types.js";

const logger = new Logger("cli");

function resolveProjectRoot(input?: string): string {
  return input ? path.resolve(input) : process.cwd();
}

function projectRootOf(cmd: Command): string {
  let root: Command | null = cmd;
  while (root?.parent) {
    root = root.parent;
  }
  const value: unknown = root?.opts().projectRoot;
  return resolveProjectRoot(typeof value === "string" ? value : undefined);
}

async function openDb(paths: RuntimePaths): Promise<Db> {
  await ensureRuntimeDirs(paths);
  const db = new Db(paths.dbPath);
  await db.migrate();
  return db;
}

async function getConfig(projectRoot: string): Promise<{ paths: RuntimePaths; cfg: SwitchboardConfig }> {
  const paths = getRuntimePaths(projectRoot);
  await ensureRuntimeDirs(paths);
  const cfg = await loadOrCreateConfig(paths);
  return { paths, cfg };
}

function parseIdList(value: string): number[] {
  const ids: number[] = [];
  for (const part of value.split(",")) {
    const id = parseUserId(part);
    if (id === null) {
      throw new Error(`Invalid operator id '${part.trim()}'`);
    }
    ids.push(id);
  }
  return ids;
}

async function installSystemdUnit(projectRoot: string, cfg: SwitchboardConfig): Promise<void> {
  const service = cfg.runtime.serviceName;
  const paths = getRuntimePaths(projectRoot);
  const envPath = path.join(paths.stateDir, "switchboardd.env");
  const unit = `[Unit]
Description=Switchboard relay daemon (${cfg.projectId})
After=network-online.target

[Service]
Type=simple
WorkingDirectory=${projectRoot}
EnvironmentFile=${envPath}
ExecStart=${process.execPath} ${projectRoot}/dist/daemon.js
Restart=always
RestartSec=2

[Install]
WantedBy=multi-user.target
`;

  const localUnitPath = path.join(paths.stateDir, `${service}.service`);
  await fs.writeFile(localUnitPath, unit, "utf8");
  try {
    await fs.access(envPath);
  } catch {
    await fs.writeFile(
      envPath,
      `SWITCHBOARD_PROJECT_ROOT=${projectRoot}\n${cfg.telegram.tokenEnv}=\n`,
      { encoding: "utf8", mode: 0o600 }
    );
    process.stdout.write(`Wrote ${envPath}; put the bot token in ${cfg.telegram.tokenEnv}.\n`);
  }

  const hasSystemctl = await commandExists("systemctl");
  if (!hasSystemctl) {
    logger.warn("systemctl not found. Skipping systemd install.", { unit: localUnitPath });
    return;
  }

  const copyCode = await runInteractiveCommand("bash", ["-lc", `sudo cp '${localUnitPath}' /etc/systemd/system/${service}.service`]);
  if (copyCode !== 0) {
    logger.warn("could not install systemd unit automatically", {
      hint: `Manual install: sudo cp '${localUnitPath}' /etc/systemd/system/${service}.service`
    });
    return;
  }

  const enableCode = await runInteractiveCommand("bash", ["-lc", `sudo systemctl daemon-reload && sudo systemctl enable --now ${service}`]);
  if (enableCode !== 0) {
    logger.warn("could not enable service automatically", {
      hint: `Run: sudo systemctl daemon-reload && sudo systemctl enable --now ${service}`
    });
    return;
  }
  logger.info("systemd unit installed", { service });
}

async function doctorChecks(paths: RuntimePaths, cfg: SwitchboardConfig, env: NodeJS.ProcessEnv = process.env): Promise<HealthCheckResult[]> {
  const checks: HealthCheckResult[] = [];

  try {
    await fs.access(paths.configPath);
    checks.push({ name: "config", ok: true, details: paths.configPath });
  } catch {
    checks.push({ name: "config", ok: false, details: "missing config.toml" });
  }

  const token = env[cfg.telegram.tokenEnv]?.trim();
  checks.push({
    name: "telegram:token",
    ok: Boolean(token),
    details: token ? `${cfg.telegram.tokenEnv} is set` : `${cfg.telegram.tokenEnv} is not set`
  });

  const operatorCount = cfg.operators.ids.length + cfg.operators.usernames.length;
  checks.push({
    name: "operators",
    ok: operatorCount > 0,
    details:
      operatorCount > 0
        ? `ids: ${cfg.operators.ids.join(", ") || "-"}; usernames: ${cfg.operators.usernames.map((name) => `@${name}`).join(", ") || "-"}`
        : "no operators configured"
  });

  checks.push({
    name: "rate-limit",
    ok: cfg.rateLimit.fillRate <= 30,
    details: `${cfg.rateLimit.fillRate}/s, burst ${cfg.rateLimit.capacity}`
  });

  return checks;
}

const program = new Command();

program
  .name("switchboard")
  .description("Telegram relay between users and operators")
  .option("-p, --project-root <path>", "Project root path")
  .showHelpAfterError();

program
  .command("init")
  .description("Create or update the configuration file")
  .option("--operator-ids <ids>", "Comma-separated numeric operator ids")
  .option("--operator-usernames <names>", "Comma-separated operator usernames")
  .option("--token-env <name>", "Environment variable holding the bot token")
  .action(async (opts: { operatorIds?: string; operatorUsernames?: string; tokenEnv?: string }, cmd: Command) => {
    const { paths, cfg } = await getConfig(projectRootOf(cmd));
    if (opts.operatorIds) {
      cfg.operators.ids = [...new Set([...cfg.operators.ids, ...parseIdList(opts.operatorIds)])];
    }
    if (opts.operatorUsernames) {
      const names = opts.operatorUsernames.split(",").map(normalizeUsername).filter((name) => name.length > 0);
      cfg.operators.usernames = [...new Set([...cfg.operators.usernames, ...names])];
    }
    if (opts.tokenEnv) {
      cfg.telegram.tokenEnv = opts.tokenEnv;
    }
    await saveConfig(paths, cfg);
    const db = await openDb(paths);
    await db.close();
    process.stdout.write(`Configuration written to ${paths.configPath}\n`);
    process.stdout.write("Run 'switchboard doctor' to verify.\n");
  });

program
  .command("doctor")
  .action(async (_opts: unknown, cmd: Command) => {
    const { paths, cfg } = await getConfig(projectRootOf(cmd));
    const checks = await doctorChecks(paths, cfg);
    let hasFail = false;
    for (const check of checks) {
      process.stdout.write(`${check.ok ? "[OK]" : "[WARN]"} ${check.name}: ${check.details}\n`);
      if (!check.ok) {
        hasFail = true;
      }
    }
    if (hasFail) {
      process.exitCode = 1;
    }
  });

program
  .command("sessions")
  .description("List pending, active and banned users from the database")
  .action(async (_opts: unknown, cmd: Command) => {
    const paths = getRuntimePaths(projectRootOf(cmd));
    const db = await openDb(paths);
    try {
      const [pending, active, banned] = await Promise.all([db.listPending(), db.listActive(), db.listBanned()]);
      const rows = [
        ...active.map((s) => ({ userId: s.userId, state: "active", name: s.displayName ?? "-" })),
        ...pending.map((s) => ({ userId: s.userId, state: "pending", name: s.displayName ?? "-" })),
        ...banned.map((userId) => ({ userId, state: "banned", name: "-" }))
      ];
      console.table(rows);
    } finally {
      await db.close();
    }
  });

program
  .command("transcript")
  .description("Show recent relayed messages for a user")
  .argument("<userId>", "Numeric user id")
  .option("-n, --limit <count>", "Number of messages", "50")
  .action(async (rawUserId: string, opts: { limit: string }, cmd: Command) => {
    const userId = parseUserId(rawUserId);
    if (userId === null) {
      throw new Error(`Invalid user id '${rawUserId}'`);
    }
    const limit = Number.parseInt(opts.limit, 10);
    const paths = getRuntimePaths(projectRootOf(cmd));
    const db = await openDb(paths);
    try {
      const entries = await db.listMessages(userId, Number.isFinite(limit) && limit > 0 ? limit : 50);
      for (const entry of entries) {
        process.stdout.write(`${entry.createdAt} [${entry.role}] ${entry.body}\n`);
      }
      if (entries.length === 0) {
        process.stdout.write(`No messages stored for ${userId}\n`);
      }
    } finally {
      await db.close();
    }
  });

program
  .command("install-service")
  .description("Install and enable the systemd unit")
  .action(async (_opts: unknown, cmd: Command) => {
    const projectRoot = projectRootOf(cmd);
    const { cfg } = await getConfig(projectRoot);
    await installSystemdUnit(projectRoot, cfg);
  });

for (const verb of ["start", "stop", "restart"] as const) {
  program.command(verb).action(async (_opts: unknown, cmd: Command) => {
    const { cfg } = await getConfig(projectRootOf(cmd));
    const result = await runInteractiveCommand("bash", ["-lc", `sudo systemctl ${verb} ${cfg.runtime.serviceName}`]);
    if (result !== 0) {
      throw new Error(`Failed to ${verb} ${cfg.runtime.serviceName}`);
    }
    process.stdout.write(`${cfg.runtime.serviceName}: ${verb} ok\n`);
  });
}

program
  .command("status")
  .action(async (_opts: unknown, cmd: Command) => {
    const { cfg } = await getConfig(projectRootOf(cmd));
    const result = await runCommand("bash", ["-lc", `systemctl is-active ${cfg.runtime.serviceName}`], { timeoutMs: 3_000 });
    process.stdout.write((result.stdout.trim() || "unknown") + "\n");
  });

program
  .command("logs")
  .option("--follow", "Follow logs", false)
  .action(async (opts: { follow: boolean }, cmd: Command) => {
    const { cfg } = await getConfig(projectRootOf(cmd));
    const service = cfg.runtime.serviceName;
    const args = opts.follow ? ["-u", service, "-f"] : ["-u", service, "-n", "200"];
    const proc = spawn("journalctl", args, { stdio: "inherit" });
    await new Promise<void>((resolve) => {
      proc.on("exit", () => resolve());
    });
  });

program.parseAsync(process.argv).catch((err) => {
  process.stderr.write(`Error: ${String(err)}\n`);
  process.exit(1);
});
