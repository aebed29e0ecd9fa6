import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig, requireEnv } from "./config";
import type { AppConfig } from "./config";
import { createDedupStore } from "./store/dedup-store";
import { createHealthState } from "./delivery/health";
import { createCircuitBreaker } from "./delivery/circuit-breaker";
import { createTelegramTarget } from "./delivery/telegram";
import { createDeliveryWorker } from "./delivery/worker";
import { createLlmClient } from "./llm/client";
import { createLlmTranslator } from "./llm/translator";
import type { Translator } from "./llm/translator";
import { createFetchSession } from "./pipeline/fetcher";
import { createOrchestrator } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("newswire-relay starting");

  let config: AppConfig;
  let botToken: string;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
    botToken = requireEnv("TELEGRAM_BOT_TOKEN");
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    {
      groups: config.groups.map((group) => group.name),
      destination: config.delivery.destinationId,
    },
    "config loaded",
  );

  const store = createDedupStore({
    path: resolve(config.store.path),
    maxRecords: config.store.maxRecords,
    logger,
  });
  const loaded = await store.load();
  logger.info(loaded, "dedup store loaded");

  const health = createHealthState(() => new Date(), config.health.errorWindowMinutes);
  const breaker = createCircuitBreaker(config.circuitBreaker);
  const shutdown = new AbortController();

  const worker = createDeliveryWorker({
    target: createTelegramTarget({
      botToken,
      timeoutMs: config.delivery.requestTimeoutMs,
      parseMode: config.delivery.parseMode,
      disablePreview: config.delivery.disablePreview,
      logger,
      signal: shutdown.signal,
    }),
    options: config.delivery,
    breaker,
    health,
    logger,
    signal: shutdown.signal,
  });

  let translator: Translator | null = null;
  if (config.translation.enabled) {
    try {
      translator = createLlmTranslator(createLlmClient(config.translation), {
        ...config.translation,
        signal: shutdown.signal,
      });
      logger.info(
        {
          provider: config.translation.provider,
          model: config.translation.model,
          targetLanguage: config.translation.targetLanguage,
        },
        "translator initialised",
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ error: message }, "translator init failed, translation disabled");
    }
  }

  const orchestrator = createOrchestrator({
    config,
    store,
    worker,
    health,
    session: createFetchSession(config.fetch.sessionRotateAfter),
    logger,
    translator,
    shutdown,
  });

  if (config.delivery.startupMessage) {
    const result = await worker.deliver({
      text: config.delivery.startupMessage,
      imageUrl: null,
    });
    if (!result.ok) {
      logger.warn({ kind: result.kind, error: result.error }, "startup message not delivered");
    }
  }

  for (const group of config.groups) {
    orchestrator.runNow(group.name).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ group: group.name, error: message }, "initial cycle failed");
    });
  }

  const app = createApiServer({
    config,
    store,
    health,
    orchestrator,
    breakerState: worker.breakerState,
    logger,
  });
  const server = app.listen(PORT, () => {
    logger.info({ port: PORT }, "api server listening");
  });

  const closeServer = () =>
    new Promise<void>((resolveClose, rejectClose) => {
      server.close((err) => {
        if (err) rejectClose(err);
        else resolveClose();
      });
    });

  registerShutdownHandlers({
    orchestrator,
    graceMs: config.shutdown.graceMs,
    closeServer,
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
