import { cpuPercent, memMb, roundTo } from "./metrics";

describe("cpuPercent", () => {
  test("uses deltas against the previous sample and online cpu count", () => {
    const stats = {
      cpu_stats: { cpu_usage: { total_usage: 300 }, system_cpu_usage: 2000, online_cpus: 1 },
      precpu_stats: { cpu_usage: { total_usage: 200 }, system_cpu_usage: 1800 },
    };
    expect(cpuPercent(stats)).toBe(50);
  });

  test("falls back to the per-cpu usage length", () => {
    const stats = {
      cpu_stats: {
        cpu_usage: { total_usage: 150, percpu_usage: [1, 2, 3, 4] },
        system_cpu_usage: 1100,
      },
      precpu_stats: { cpu_usage: { total_usage: 100 }, system_cpu_usage: 1000 },
    };
    expect(cpuPercent(stats)).toBe(200);
  });

  test("assumes one cpu when nothing reports the count", () => {
    const stats = {
      cpu_stats: { cpu_usage: { total_usage: 150 }, system_cpu_usage: 1100 },
      precpu_stats: { cpu_usage: { total_usage: 100 }, system_cpu_usage: 1000 },
    };
    expect(cpuPercent(stats)).toBe(50);
  });

  test("returns null without a positive system delta", () => {
    const stats = {
      cpu_stats: { cpu_usage: { total_usage: 300 }, system_cpu_usage: 1000, online_cpus: 2 },
      precpu_stats: { cpu_usage: { total_usage: 200 }, system_cpu_usage: 1000 },
    };
    expect(cpuPercent(stats)).toBeNull();
  });

  test("returns null without a positive cpu delta", () => {
    const stats = {
      cpu_stats: { cpu_usage: { total_usage: 200 }, system_cpu_usage: 2000, online_cpus: 2 },
      precpu_stats: { cpu_usage: { total_usage: 200 }, system_cpu_usage: 1000 },
    };
    expect(cpuPercent(stats)).toBeNull();
  });

  test("returns null when zero cpus are online", () => {
    const stats = {
      cpu_stats: { cpu_usage: { total_usage: 300 }, system_cpu_usage: 2000, online_cpus: 0 },
      precpu_stats: { cpu_usage: { total_usage: 200 }, system_cpu_usage: 1000 },
    };
    expect(cpuPercent(stats)).toBeNull();
  });

  test("treats missing sections as zero", () => {
    expect(cpuPercent({})).toBeNull();
    expect(cpuPercent(null)).toBeNull();
    expect(cpuPercent({ cpu_stats: { cpu_usage: { total_usage: "x" } } })).toBeNull();
  });
});

describe("memMb", () => {
  test("converts bytes to mebibytes", () => {
    expect(memMb({ memory_stats: { usage: 104857600 } })).toBe(100);
    expect(memMb({ memory_stats: { usage: 1572864 } })).toBe(1.5);
  });

  test("returns null without a numeric usage", () => {
    expect(memMb({})).toBeNull();
    expect(memMb({ memory_stats: {} })).toBeNull();
    expect(memMb({ memory_stats: { usage: "12" } })).toBeNull();
    expect(memMb(undefined)).toBeNull();
  });
});

describe("roundTo", () => {
  test("rounds to the given digits", () => {
    expect(roundTo(12.345, 1)).toBe(12.3);
    expect(roundTo(99.96, 1)).toBe(100);
    expect(roundTo(511.5, 0)).toBe(512);
    expect(roundTo(null, 1)).toBeNull();
  });
});
