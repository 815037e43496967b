import { z } from "zod";
import type { DeliveryMessage, DeliveryPublisher, DeliveryRouter } from "./deliveryRouter.js";
import type { EventBus, PushSubscription } from "./eventBus.js";
import { childLogger } from "./logger.js";
import { sessionStateSchema } from "./sessionState.js";

export const DELIVERY_SUBJECT_PREFIX = "research.delivery";

const log = childLogger({ component: "delivery_relay" });

const taskNotice = {
  channel: z.literal("state"),
  sessionId: z.string(),
  version: z.number().int(),
  taskType: z.string(),
  idempotencyKey: z.string(),
  reason: z.string(),
};

const deliveryMessageSchema = z.union([
  z.object({
    channel: z.literal("state"),
    kind: z.literal("snapshot"),
    sessionId: z.string(),
    version: z.number().int(),
    snapshot: sessionStateSchema,
  }),
  z.object({ channel: z.literal("state"), kind: z.literal("resync"), sessionId: z.string(), version: z.number().int() }),
  z.object({ ...taskNotice, kind: z.enum(["task_failed", "task_stale", "task_cancelled"]) }),
  z.object({
    channel: z.literal("stream"),
    sessionId: z.string(),
    taskType: z.string(),
    idempotencyKey: z.string(),
    seq: z.number().int().nonnegative(),
    chunk: z.string(),
  }),
]);

export function parseDeliveryMessage(data: Record<string, unknown>): DeliveryMessage | null {
  const res = deliveryMessageSchema.safeParse(data);
  return res.success ? res.data : null;
}

/** Publishes to JetStream; every replica's relay feeds its own router from there. */
export class NatsDeliveryPublisher implements DeliveryPublisher {
  constructor(private readonly bus: EventBus) {}

  async publish(message: DeliveryMessage): Promise<void> {
    await this.bus.publish(`${DELIVERY_SUBJECT_PREFIX}.${message.channel}`, { ...message });
  }
}

/**
 * Subscribe this replica's router to the delivery subjects. Malformed messages
 * are logged and skipped.
 */
export async function startDeliveryRelay(
  bus: EventBus,
  stream: string,
  router: DeliveryRouter,
): Promise<PushSubscription> {
  await bus.ensureStream(stream, [`${DELIVERY_SUBJECT_PREFIX}.>`]);
  const sub = await bus.subscribeEphemeral(stream, `${DELIVERY_SUBJECT_PREFIX}.>`, async (msg) => {
    const message = parseDeliveryMessage(msg.data);
    if (!message) {
      log.warn("dropping malformed delivery message", { message_id: msg.id });
      return;
    }
    router.deliver(message);
  });
  log.info("delivery relay started", { stream });
  return sub;
}
