import { StatsCache, STATS_CACHE_TTL_MS, STATS_MAX_CONCURRENCY } from "./statsCache";
import type { RuntimeClient } from "./runtime";
import type { ContainerHandle, RawStats } from "../models/container";

function handle(id: string, status = "running"): ContainerHandle {
  return { id, name: `name-${id}`, status, hostPort: null };
}

function sampleStats(usage: number): RawStats {
  return { memory_stats: { usage } };
}

function makeClient(fetchStats: jest.Mock) {
  const client: RuntimeClient = {
    listContainers: jest.fn(),
    getContainer: jest.fn(),
    fetchStats,
    performAction: jest.fn(),
    fetchLogs: jest.fn(),
    inspect: jest.fn(),
  };
  return client;
}

describe("StatsCache", () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1000;
  });

  test("reuses samples within the TTL", async () => {
    const fetchStats = jest.fn(async (h: ContainerHandle) => sampleStats(h.id === "a" ? 1 : 2));
    const cache = new StatsCache(makeClient(fetchStats), { now });

    const first = await cache.getOrFetch([handle("a"), handle("b")]);
    expect(first.get("a")).toEqual(sampleStats(1));
    expect(first.get("b")).toEqual(sampleStats(2));
    expect(fetchStats).toHaveBeenCalledTimes(2);

    clock += 1500;
    const second = await cache.getOrFetch([handle("a"), handle("b")]);
    expect(second.get("a")).toEqual(sampleStats(1));
    expect(fetchStats).toHaveBeenCalledTimes(2);
  });

  test("fetches again once an entry is older than the TTL", async () => {
    const fetchStats = jest.fn(async () => sampleStats(5));
    const cache = new StatsCache(makeClient(fetchStats), { now });

    await cache.getOrFetch([handle("a")]);
    clock += STATS_CACHE_TTL_MS + 100;
    await cache.getOrFetch([handle("a")]);
    expect(fetchStats).toHaveBeenCalledTimes(2);
  });

  test("skips containers that are not running", async () => {
    const fetchStats = jest.fn(async () => sampleStats(5));
    const cache = new StatsCache(makeClient(fetchStats), { now });

    const result = await cache.getOrFetch([handle("a", "exited"), handle("b", "paused")]);
    expect(result.get("a")).toBeNull();
    expect(result.get("b")).toBeNull();
    expect(fetchStats).not.toHaveBeenCalled();
    expect(cache.size).toBe(0);
  });

  test("stores null for a failed fetch and reuses it within the TTL", async () => {
    const fetchStats = jest.fn(async () => {
      throw new Error("daemon went away");
    });
    const cache = new StatsCache(makeClient(fetchStats), { now });

    const first = await cache.getOrFetch([handle("a")]);
    expect(first.get("a")).toBeNull();
    const second = await cache.getOrFetch([handle("a")]);
    expect(second.get("a")).toBeNull();
    expect(fetchStats).toHaveBeenCalledTimes(1);
  });

  test("runs at most four fetches at a time", async () => {
    let active = 0;
    let peak = 0;
    const fetchStats = jest.fn(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setImmediate(r));
      active--;
      return sampleStats(1);
    });
    const cache = new StatsCache(makeClient(fetchStats), { now });

    const handles = Array.from({ length: 10 }, (_, i) => handle(`c${i}`));
    const result = await cache.getOrFetch(handles);
    expect(result.size).toBe(10);
    expect(fetchStats).toHaveBeenCalledTimes(10);
    expect(peak).toBe(STATS_MAX_CONCURRENCY);
  });

  test("prune drops entries of containers that are gone", async () => {
    const fetchStats = jest.fn(async () => sampleStats(1));
    const cache = new StatsCache(makeClient(fetchStats), { now });

    await cache.getOrFetch([handle("a"), handle("b"), handle("c")]);
    expect(cache.size).toBe(3);
    expect(cache.prune(["b"])).toBe(2);
    expect(cache.size).toBe(1);
    expect(cache.prune(["b"])).toBe(0);
  });
});
