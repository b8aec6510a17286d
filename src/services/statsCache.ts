import type { ContainerHandle, RawStats } from "../models/container";
import type { RuntimeClient } from "./runtime";
import { createLogger } from "../utils/logger";

const logger = createLogger({ file: "statsCache" });

export const STATS_CACHE_TTL_MS = 2000;
export const STATS_MAX_CONCURRENCY = 4;

export type StatsCacheEntry = {
  containerId: string;
  capturedAt: number;
  raw: RawStats | null;
};

export type StatsCacheOptions = {
  now?: () => number;
};

/**
 * Short-lived cache of one-shot stats samples keyed by container id, so that the
 * snapshot refresh and the metrics endpoint do not ask the daemon twice for the same
 * container within the TTL. Entries expire on lookup and are pruned when a container
 * disappears from the runtime.
 */
export class StatsCache {
  private client: RuntimeClient;
  private entries = new Map<string, StatsCacheEntry>();
  private now: () => number;

  constructor(client: RuntimeClient, options: StatsCacheOptions = {}) {
    this.client = client;
    this.now = options.now ?? (() => globalThis.performance.now());
  }

  get size(): number {
    return this.entries.size;
  }

  private lookup(containerId: string): StatsCacheEntry | null {
    const entry = this.entries.get(containerId);
    if (!entry) return null;
    if (this.now() - entry.capturedAt <= STATS_CACHE_TTL_MS) return entry;
    this.entries.delete(containerId);
    return null;
  }

  private async fetchOne(handle: ContainerHandle): Promise<RawStats | null> {
    try {
      return await this.client.fetchStats(handle);
    } catch (e) {
      logger.warn(`stats fetch failed for ${handle.name}: ${e}`);
      return null;
    }
  }

  async getOrFetch(containers: ReadonlyArray<ContainerHandle>): Promise<Map<string, RawStats | null>> {
    const result = new Map<string, RawStats | null>();
    const misses: ContainerHandle[] = [];
    for (const c of containers) {
      if (c.status !== "running") {
        result.set(c.id, null);
        continue;
      }
      const cached = this.lookup(c.id);
      if (cached) {
        result.set(c.id, cached.raw);
      } else {
        misses.push(c);
      }
    }
    if (misses.length === 0) return result;

    const inflight = new Set<Promise<void>>();
    for (const handle of misses) {
      while (inflight.size >= STATS_MAX_CONCURRENCY) {
        await Promise.race(inflight);
      }
      const p: Promise<void> = this.fetchOne(handle).then((raw) => {
        this.entries.set(handle.id, { containerId: handle.id, capturedAt: this.now(), raw });
        result.set(handle.id, raw);
        inflight.delete(p);
      });
      inflight.add(p);
    }
    await Promise.all(inflight);
    return result;
  }

  prune(liveIds: Iterable<string>): number {
    const live = new Set(liveIds);
    let removed = 0;
    for (const id of Array.from(this.entries.keys())) {
      if (!live.has(id)) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
