import {
  connect,
  createInbox,
  consumerOpts,
  StringCodec,
  type JetStreamClient,
  type JetStreamManager,
  type JetStreamSubscription,
  type NatsConnection,
} from "nats";
import { toErrorString } from "./errors.js";
import { logger } from "./logger.js";
import { withRetry } from "./resilience.js";

const sc = StringCodec();

export interface EventBusMessage {
  id: string;
  data: Record<string, unknown>;
}

export interface PushSubscription {
  unsubscribe(): Promise<void>;
}

export interface EventBus {
  publish(subject: string, data: Record<string, unknown>): Promise<string>;
  /**
   * Ephemeral push subscription (no durable consumer): new messages only, reconnects
   * with backoff until unsubscribed. For per-replica fan-out where missed messages
   * are covered by a resync.
   */
  subscribeEphemeral(
    stream: string,
    subject: string,
    handler: (msg: EventBusMessage) => Promise<void>,
  ): Promise<PushSubscription>;
  ensureStream(stream: string, subjects: string[]): Promise<void>;
  close(): Promise<void>;
}

const CONNECT_TIMEOUT_MS = 10000;
const RESUBSCRIBE_BACKOFF_MS = 1000;
const RESUBSCRIBE_BACKOFF_MAX_MS = 30000;

/** 1 day in nanoseconds (NATS uses ns for max_age). Delivery messages are short-lived. */
const DEFAULT_MAX_AGE_NS = 24 * 60 * 60 * 1e9;
/** 256 MB max stream size. */
const DEFAULT_MAX_BYTES = 256 * 1024 * 1024;

export function decodeMessage(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return { raw };
  } catch {
    return { raw };
  }
}

function isStreamNotFound(e: unknown): boolean {
  return /stream not found/i.test(toErrorString(e));
}

export async function makeEventBus(natsUrl?: string): Promise<EventBus> {
  const url = natsUrl ?? process.env.NATS_URL ?? "nats://localhost:4222";
  const nc: NatsConnection = await connect({
    servers: url,
    timeout: CONNECT_TIMEOUT_MS,
    maxReconnectAttempts: 10,
  });
  const js: JetStreamClient = nc.jetstream();
  const jsm: JetStreamManager = await nc.jetstreamManager();

  const publishBytes = async (subject: string, payload: Uint8Array): Promise<string> => {
    const ack = await withRetry(() => js.publish(subject, payload), {
      maxRetries: 3,
      backoffMs: 300,
      retryableCheck: () => true,
    });
    return `${ack.seq}`;
  };

  const ensureStreamFn = async (stream: string, subjects: string[]): Promise<void> => {
    try {
      const info = await jsm.streams.info(stream);
      const current = info.config?.subjects ?? [];
      const merged = [...new Set([...current, ...subjects])];
      if (merged.length > current.length) {
        await jsm.streams.update(stream, { subjects: merged });
      }
      return;
    } catch (e) {
      if (!isStreamNotFound(e)) throw e;
    }
    try {
      await jsm.streams.add({
        name: stream,
        subjects,
        max_age: DEFAULT_MAX_AGE_NS,
        max_bytes: DEFAULT_MAX_BYTES,
      });
    } catch (addErr) {
      // Another replica may have created it in the meantime.
      await jsm.streams.info(stream).catch(() => {
        throw addErr;
      });
    }
  };

  return {
    async publish(subject, data) {
      return publishBytes(subject, sc.encode(JSON.stringify(data)));
    },

    async ensureStream(stream, subjects) {
      await ensureStreamFn(stream, subjects);
    },

    async subscribeEphemeral(stream, subject, handler) {
      await ensureStreamFn(stream, [subject]);
      let closed = false;
      let currentSub: JetStreamSubscription | null = null;

      const destroyCurrent = async (): Promise<void> => {
        const sub = currentSub;
        currentSub = null;
        if (!sub) return;
        await sub.destroy().catch((e: unknown) => {
          logger.warn("failed to destroy subscription", { subject, error: toErrorString(e) });
        });
      };

      const loop = async (): Promise<void> => {
        let delayMs = RESUBSCRIBE_BACKOFF_MS;
        while (!closed) {
          try {
            const opts = consumerOpts().deliverTo(createInbox()).ackExplicit().deliverNew().filterSubject(subject);
            currentSub = await js.subscribe(subject, opts);
            delayMs = RESUBSCRIBE_BACKOFF_MS;
            for await (const m of currentSub) {
              if (closed) break;
              try {
                await handler({ id: String(m.seq), data: decodeMessage(sc.decode(m.data)) });
              } catch (err) {
                logger.error("event handler failed", { subject, message_id: String(m.seq), error: toErrorString(err) });
              } finally {
                m.ack();
              }
            }
          } catch (err) {
            if (closed) break;
            logger.error("ephemeral subscribe error, reconnecting", { subject, error: toErrorString(err) });
            await destroyCurrent();
            await new Promise((r) => setTimeout(r, delayMs));
            delayMs = Math.min(delayMs * 2, RESUBSCRIBE_BACKOFF_MAX_MS);
          }
        }
      };
      loop().catch((err: unknown) => {
        logger.error("ephemeral subscribe loop stopped", { subject, error: toErrorString(err) });
      });

      return {
        async unsubscribe() {
          closed = true;
          await destroyCurrent();
        },
      };
    },

    async close() {
      await nc.drain();
    },
  };
}
