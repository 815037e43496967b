import "dotenv/config";
import { createApiServer } from "./apiServer.js";
import { FileRoleConfigSource } from "./agentRoles.js";
import { loadRuntimeConfig } from "./config.js";
import { drainPool, getPool } from "./db.js";
import { DeliveryRouter, type DeliveryPublisher } from "./deliveryRouter.js";
import { NatsDeliveryPublisher, startDeliveryRelay } from "./deliveryRelay.js";
import { makeEventBus, type EventBus, type PushSubscription } from "./eventBus.js";
import { toErrorString } from "./errors.js";
import { closeGenerationService } from "./generation.js";
import { PgInFlightIndex } from "./inFlightIndex.js";
import { logger, setLogContext } from "./logger.js";
import { ResearchWorkflow } from "./researchWorkflow.js";
import { PgSessionStore } from "./sessionStore.js";
import { initTelemetry, shutdownTelemetry } from "./telemetry.js";
import { loadWorkflowDefinition } from "./workflowDefinition.js";

async function main(): Promise<void> {
  initTelemetry();
  const config = loadRuntimeConfig();
  setLogContext({ service: "research-workflow" });

  if (!config.disableAuth && !config.apiToken) {
    throw new Error("API_TOKEN is required (or set DISABLE_AUTH=1 for local development)");
  }
  if (config.databaseUrl) process.env.DATABASE_URL = config.databaseUrl;

  const workflowDef = loadWorkflowDefinition(config.workflowPath);
  const router = new DeliveryRouter(config.subscriberBufferSize);

  let bus: EventBus | null = null;
  let relay: PushSubscription | null = null;
  let publisher: DeliveryPublisher = router;
  if (config.natsUrl) {
    bus = await makeEventBus(config.natsUrl);
    relay = await startDeliveryRelay(bus, config.natsStream, router);
    publisher = new NatsDeliveryPublisher(bus);
  } else {
    logger.info("NATS_URL not set, delivering to local subscribers only");
  }

  const workflow = new ResearchWorkflow({
    store: new PgSessionStore(),
    inFlight: new PgInFlightIndex(),
    roles: new FileRoleConfigSource(config.agentRolesPath),
    workflow: workflowDef,
    router,
    publisher,
    laneConcurrency: config.laneConcurrency,
    idempotencyCache: config.idempotencyCache,
  });

  const server = createApiServer(workflow, {
    auth: { token: config.apiToken, disabled: config.disableAuth },
    healthCheck: async () => {
      await getPool().query("SELECT 1");
    },
  });
  server.listen(config.apiPort, () => {
    logger.info("research workflow API listening", {
      port: config.apiPort,
      phases: workflowDef.phases,
      relay: config.natsUrl ? "nats" : "local",
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("shutdown signal received, draining...", { signal });
    server.close();
    await workflow.shutdown(config.shutdownGraceMs);
    const steps: Array<[string, () => Promise<void>]> = [
      ["relay", async () => relay?.unsubscribe()],
      ["event bus", async () => bus?.close()],
      ["generation", closeGenerationService],
      ["pool", drainPool],
      ["telemetry", shutdownTelemetry],
    ];
    for (const [name, step] of steps) {
      await step().catch((e: unknown) => logger.warn("shutdown step failed", { step: name, error: toErrorString(e) }));
    }
    logger.info("graceful shutdown complete");
    process.exit(0);
  };
  const onSignal = (signal: string) => () => {
    shutdown(signal).catch((e: unknown) => {
      logger.error("shutdown failed", { error: toErrorString(e) });
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal("SIGTERM"));
  process.on("SIGINT", onSignal("SIGINT"));
}

main().catch((e: unknown) => {
  logger.error("fatal startup error", { error: toErrorString(e) });
  process.exit(1);
});
