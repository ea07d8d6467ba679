#!/usr/bin/env node
import { promises as fs } from "node:fs";
import process from "node:process";
import { Telegraf } from "telegraf";
import { ensureRuntimeDirs, getRuntimePaths, loadOrCreateConfig, resolveBotToken } from "./config.js";
import { Db } from "./core/db.js";
import { errorMessage } from "./core/errors.js";
import { Logger, parseLogLevel, setLogLevel } from "./core/logger.js";
import { TelegramProvider, toInboundMessage } from "./adapters/telegramProvider.js";
import { createRelayRuntime } from "./relay/runtime.js";
import type { OperatorDirectory } from "./relay/operators.js";
import type { MessagingProvider } from "./types.js";

const logger = new Logger("daemon");

/**
 * Resolves operator usernames now and keeps retrying the unresolved ones: an
 * operator cannot be looked up until they have opened a chat with the bot.
 */
function scheduleOperatorResolution(
  operators: OperatorDirectory,
  provider: MessagingProvider,
  retrySec: number
): () => void {
  let timer: NodeJS.Timeout | null = null;
  let stopped = false;

  const attempt = async (): Promise<void> => {
    await operators.resolveUsernames(provider);
    const missing = operators.unresolvedUsernames();
    if (missing.length === 0 || stopped) {
      return;
    }
    logger.info("operator usernames still unresolved", { missing, retrySec });
    timer = setTimeout(() => {
      attempt().catch((err) => logger.error("operator resolution failed", { error: errorMessage(err) }));
    }, retrySec * 1000);
    timer.unref();
  };

  attempt().catch((err) => logger.error("operator resolution failed", { error: errorMessage(err) }));
  return () => {
    stopped = true;
    if (timer) {
      clearTimeout(timer);
    }
  };
}

async function main(): Promise<void> {
  const projectRoot = process.env.SWITCHBOARD_PROJECT_ROOT || process.cwd();
  const paths = getRuntimePaths(projectRoot);
  await ensureRuntimeDirs(paths);

  const cfg = await loadOrCreateConfig(paths);
  setLogLevel(parseLogLevel(process.env.SWITCHBOARD_LOG_LEVEL) ?? cfg.logging.level);
  const token = resolveBotToken(cfg);

  await fs.writeFile(paths.pidPath, `${process.pid}\n`, "utf8");
  const db = new Db(paths.dbPath);
  await db.migrate();

  const bot = new Telegraf(token);
  const provider = new TelegramProvider(bot.telegram);
  const { registry, operators, router } = createRelayRuntime(cfg, provider, db);
  await registry.load();

  if (cfg.operators.ids.length === 0 && cfg.operators.usernames.length === 0) {
    logger.warn("no operators configured; user messages cannot be relayed", { configPath: paths.configPath });
  }
  const stopResolution = scheduleOperatorResolution(operators, provider, cfg.operators.resolveRetrySec);

  bot.on("message", (ctx) => {
    const inbound = toInboundMessage(ctx.message);
    if (!inbound) {
      return;
    }
    // handled off the update loop so one slow copy does not hold up other chats
    router.handleInbound(inbound).catch((err) => {
      logger.error("inbound handling failed", {
        chatId: inbound.chatId,
        messageId: inbound.messageId,
        error: errorMessage(err)
      });
    });
  });

  bot.catch((err) => {
    logger.error("update handler error", { error: errorMessage(err) });
  });

  let stopping = false;
  const stop = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info("shutdown requested", { signal });
    stopResolution();
    bot.stop(signal);
    await db.close();
    await fs.rm(paths.pidPath, { force: true });
    process.exit(0);
  };

  process.once("SIGINT", () => {
    void stop("SIGINT");
  });
  process.once("SIGTERM", () => {
    void stop("SIGTERM");
  });

  logger.info("switchboardd started", { projectRoot, operators: operators.chatIds().length });
  await bot.launch({ allowedUpdates: ["message"], dropPendingUpdates: cfg.telegram.dropPendingUpdates });
}

void main().catch((err) => {
  logger.error("fatal daemon crash", { error: errorMessage(err) });
  process.exit(1);
});
