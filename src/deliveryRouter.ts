import { childLogger } from "./logger.js";
import { recordResync, recordStreamDropped } from "./metrics.js";
import type { SessionState } from "./sessionState.js";

export type Channel = "state" | "stream";

export type TaskNoticeKind = "task_failed" | "task_stale" | "task_cancelled";

export type StateMessage =
  | { channel: "state"; kind: "snapshot"; sessionId: string; version: number; snapshot: SessionState }
  | { channel: "state"; kind: "resync"; sessionId: string; version: number }
  | {
      channel: "state";
      kind: TaskNoticeKind;
      sessionId: string;
      version: number;
      taskType: string;
      idempotencyKey: string;
      reason: string;
    };

export interface StreamMessage {
  channel: "stream";
  sessionId: string;
  taskType: string;
  idempotencyKey: string;
  /** Per-task emission counter, starting at 0. */
  seq: number;
  chunk: string;
}

export type DeliveryMessage = StateMessage | StreamMessage;

/** Where the workflow pushes. The local router, or the NATS relay in front of it. */
export interface DeliveryPublisher {
  publish(message: DeliveryMessage): Promise<void>;
}

export function snapshotMessage(snapshot: SessionState): StateMessage {
  return { channel: "state", kind: "snapshot", sessionId: snapshot.sessionId, version: snapshot.version, snapshot };
}

/**
 * Bounded FIFO with a single reader. `next()` resolves with the next message,
 * or null once the queue is closed.
 */
export class ChannelQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiter: ((value: T | null) => void) | null = null;
  private _closed = false;

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Hand straight to a waiting reader, else buffer. Caller enforces capacity. */
  push(item: T): void {
    if (this._closed) return;
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w(item);
      return;
    }
    this.items.push(item);
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  clear(): void {
    this.items = [];
  }

  /** Take everything buffered without waiting. */
  drain(): T[] {
    const out = this.items;
    this.items = [];
    return out;
  }

  next(): Promise<T | null> {
    const head = this.items.shift();
    if (head !== undefined) return Promise.resolve(head);
    if (this._closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.items = [];
    const w = this.waiter;
    this.waiter = null;
    w?.(null);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = await this.next();
      if (item === null) return;
      yield item;
    }
  }
}

export interface Subscription {
  readonly id: number;
  readonly sessionId: string;
  readonly state: ChannelQueue<StateMessage>;
  readonly stream: ChannelQueue<StreamMessage>;
  readonly closed: boolean;
  close(): void;
}

const log = childLogger({ component: "delivery_router" });

class RouterSubscription implements Subscription {
  readonly state: ChannelQueue<StateMessage>;
  readonly stream: ChannelQueue<StreamMessage>;
  /** Highest version handed to the state queue (snapshot or resync). */
  private lastVersion: number | null = null;

  constructor(
    readonly id: number,
    readonly sessionId: string,
    capacity: number,
    private readonly onClose: (sub: RouterSubscription) => void,
  ) {
    this.state = new ChannelQueue(capacity);
    this.stream = new ChannelQueue(capacity);
  }

  get closed(): boolean {
    return this.state.closed;
  }

  close(): void {
    if (this.closed) return;
    this.state.close();
    this.stream.close();
    this.onClose(this);
  }

  offerStream(msg: StreamMessage): void {
    if (this.stream.size >= this.stream.capacity) {
      this.stream.shift();
      recordStreamDropped();
    }
    this.stream.push(msg);
  }

  offerState(msg: StateMessage): void {
    const last = this.lastVersion;
    if (last !== null && msg.version < last) return;
    if (msg.kind === "snapshot" || msg.kind === "resync") {
      if (last !== null && msg.version === last) return;
      if (msg.kind === "snapshot" && last !== null && msg.version > last + 1) {
        this.enqueueState({ channel: "state", kind: "resync", sessionId: this.sessionId, version: msg.version });
      }
      this.lastVersion = msg.version;
    }
    this.enqueueState(msg);
  }

  private enqueueState(msg: StateMessage): void {
    if (msg.kind === "resync") recordResync();
    if (this.state.size < this.state.capacity) {
      this.state.push(msg);
      return;
    }
    // Overflow: whatever is queued is superseded by one resync at the newest version.
    const version = Math.max(msg.version, this.lastVersion ?? msg.version);
    this.lastVersion = version;
    this.state.clear();
    this.state.push({ channel: "state", kind: "resync", sessionId: this.sessionId, version });
    recordResync();
    log.warn("state queue overflow, resync queued", { session_id: this.sessionId, subscription: this.id, version });
  }
}

/**
 * Per-subscriber delivery with two independent bounded queues:
 * stream (drop oldest on overflow) and state (version-ordered, resync on gaps and overflow).
 */
export class DeliveryRouter implements DeliveryPublisher {
  private readonly subscribers = new Map<string, Set<RouterSubscription>>();
  private nextId = 1;

  constructor(private readonly bufferSize = 256) {
    if (!Number.isInteger(bufferSize) || bufferSize < 1) {
      throw new Error(`subscriber buffer size must be a positive integer, got ${bufferSize}`);
    }
  }

  subscribe(sessionId: string): Subscription {
    const sub = new RouterSubscription(this.nextId++, sessionId, this.bufferSize, (s) => this.detach(s));
    let set = this.subscribers.get(sessionId);
    if (!set) {
      set = new Set();
      this.subscribers.set(sessionId, set);
    }
    set.add(sub);
    log.debug("subscribed", { session_id: sessionId, subscription: sub.id });
    return sub;
  }

  /** Route to every open subscriber of the message's session. Never blocks. */
  deliver(message: DeliveryMessage): void {
    const set = this.subscribers.get(message.sessionId);
    if (!set) return;
    for (const sub of set) {
      if (message.channel === "stream") sub.offerStream(message);
      else sub.offerState(message);
    }
  }

  async publish(message: DeliveryMessage): Promise<void> {
    this.deliver(message);
  }

  subscriberCount(sessionId: string): number {
    return this.subscribers.get(sessionId)?.size ?? 0;
  }

  closeAll(): void {
    for (const set of [...this.subscribers.values()]) {
      for (const sub of [...set]) sub.close();
    }
    this.subscribers.clear();
  }

  private detach(sub: RouterSubscription): void {
    const set = this.subscribers.get(sub.sessionId);
    if (!set) return;
    set.delete(sub);
    if (set.size === 0) this.subscribers.delete(sub.sessionId);
  }
}
