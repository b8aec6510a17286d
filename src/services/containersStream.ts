import type { ContainerSummary, ContainersMessage, Snapshot } from "../models/container";
import { createLogger } from "../utils/logger";

const logger = createLogger({ file: "containersStream" });

export const MIN_INTERVAL_SEC = 0.2;

export interface Subscriber {
  send(payload: string): Promise<void>;
}

export type SnapshotCollector = () => Promise<ContainerSummary[]>;

export type ContainersStreamOptions = {
  intervalSec: number;
  now?: () => number;
};

type BroadcastTask = {
  abort: AbortController;
  done: Promise<void>;
};

export function serializeContainers(containers: ContainerSummary[]): string {
  const message: ContainersMessage = { type: "containers", containers };
  return JSON.stringify(message);
}

/**
 * Holds the latest serialized view of all containers and pushes it to stream
 * subscribers.
 *
 * Pull callers read the cached snapshot through getSnapshot/getPayload and join an
 * in-flight refresh instead of starting another one. The broadcast task runs only while
 * at least one subscriber is registered: it refreshes on every interval or as soon as
 * poke() is called, and sends the same payload string to every subscriber.
 */
export class ContainersStream {
  private collect: SnapshotCollector;
  private intervalMs: number;
  private now: () => number;

  private snapshot: Snapshot | null = null;
  private inFlight: Promise<Snapshot> | null = null;

  private subscribers = new Set<Subscriber>();
  private task: BroadcastTask | null = null;

  private pokeRequested = false;
  private wake: (() => void) | null = null;

  constructor(collect: SnapshotCollector, options: ContainersStreamOptions) {
    this.collect = collect;
    this.intervalMs = Math.max(MIN_INTERVAL_SEC, options.intervalSec) * 1000;
    this.now = options.now ?? (() => globalThis.performance.now());
  }

  get refreshIntervalMs(): number {
    return this.intervalMs;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  get isBroadcasting(): boolean {
    return this.task !== null;
  }

  async getSnapshot(opts: { maxAgeMs?: number } = {}): Promise<ContainerSummary[]> {
    const snap = await this.ensureSnapshot(opts.maxAgeMs);
    return structuredClone(snap.containers);
  }

  async getPayload(opts: { maxAgeMs?: number } = {}): Promise<string> {
    const snap = await this.ensureSnapshot(opts.maxAgeMs);
    return snap.payload;
  }

  private ensureSnapshot(maxAgeMs?: number): Promise<Snapshot> {
    const snap = this.snapshot;
    if (snap && (maxAgeMs === undefined || this.now() - snap.capturedAt <= maxAgeMs)) {
      return Promise.resolve(snap);
    }
    if (this.inFlight) return this.inFlight;
    return this.startRefresh();
  }

  /**
   * Collects a new snapshot and replaces the cached one. If another refresh is in
   * flight, waits for it to settle first, so the result always reflects the runtime state
   * after this call was made. The returned containers are a copy of the cached ones.
   */
  async refresh(): Promise<Snapshot> {
    while (this.inFlight) {
      await this.settle(this.inFlight);
    }
    const snap = await this.startRefresh();
    return { ...snap, containers: structuredClone(snap.containers) };
  }

  private startRefresh(): Promise<Snapshot> {
    const p: Promise<Snapshot> = this.collectSnapshot().finally(() => {
      if (this.inFlight === p) this.inFlight = null;
    });
    this.inFlight = p;
    return p;
  }

  private async collectSnapshot(): Promise<Snapshot> {
    const containers = await this.collect();
    const snap: Snapshot = {
      capturedAt: this.now(),
      payload: serializeContainers(containers),
      containers,
    };
    this.snapshot = snap;
    return snap;
  }

  private async settle(p: Promise<Snapshot>): Promise<void> {
    try {
      await p;
    } catch (e) {
      // the caller that started the refresh gets the error
      logger.debug(`waited on a failed refresh: ${e}`);
    }
  }

  async register(subscriber: Subscriber): Promise<boolean> {
    const payload = await this.getPayload();
    try {
      await subscriber.send(payload);
    } catch (e) {
      logger.debug(`initial send failed, subscriber dropped: ${e}`);
      return false;
    }
    this.subscribers.add(subscriber);
    if (!this.task) this.startTask();
    logger.debug(`subscriber registered (count=${this.subscribers.size})`);
    return true;
  }

  unregister(subscriber: Subscriber): void {
    if (!this.subscribers.delete(subscriber)) return;
    logger.debug(`subscriber unregistered (count=${this.subscribers.size})`);
    if (this.subscribers.size === 0) this.stopTask();
  }

  poke(): void {
    this.pokeRequested = true;
    if (this.wake) this.wake();
  }

  async close(): Promise<void> {
    this.subscribers.clear();
    const task = this.task;
    this.stopTask();
    if (task) await task.done;
  }

  private startTask(): void {
    const abort = new AbortController();
    const done = this.run(abort.signal).catch((e) => {
      logger.error(`[stream] broadcast loop stopped: ${e}`);
    });
    this.task = { abort, done };
  }

  private stopTask(): void {
    const task = this.task;
    if (!task) return;
    this.task = null;
    task.abort.abort();
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.waitForNextCycle(signal);
      if (signal.aborted) break;
      let snap: Snapshot;
      try {
        snap = await this.refresh();
      } catch (e) {
        logger.error(`[stream] refresh failed: ${e}`);
        continue;
      }
      if (signal.aborted) break;
      await this.broadcast(snap.payload);
    }
  }

  private async broadcast(payload: string): Promise<void> {
    const targets = Array.from(this.subscribers);
    const results = await Promise.allSettled(targets.map((s) => s.send(payload)));
    results.forEach((r, i) => {
      if (r.status === "rejected") {
        logger.debug(`send failed, subscriber dropped: ${r.reason}`);
        this.unregister(targets[i]);
      }
    });
  }

  private waitForNextCycle(signal: AbortSignal): Promise<void> {
    if (this.pokeRequested) {
      this.pokeRequested = false;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const finish = () => {
        clearTimeout(timer);
        signal.removeEventListener("abort", finish);
        if (this.wake === finish) this.wake = null;
        this.pokeRequested = false;
        resolve();
      };
      const timer = setTimeout(finish, this.intervalMs);
      this.wake = finish;
      signal.addEventListener("abort", finish, { once: true });
    });
  }
}
