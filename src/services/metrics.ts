import type { CpuStats, RawStats } from "../models/container";

function toNumber(v: unknown): number {
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}

function asCpuStats(v: unknown): CpuStats {
  return v !== null && typeof v === "object" ? v : {};
}

function totalUsage(cpu: CpuStats): number {
  const usage = cpu.cpu_usage;
  if (usage === null || typeof usage !== "object") return 0;
  return toNumber(usage.total_usage);
}

function onlineCpuCount(cpu: CpuStats): number {
  if (cpu.online_cpus !== undefined && cpu.online_cpus !== null) {
    return toNumber(cpu.online_cpus);
  }
  const percpu = cpu.cpu_usage?.percpu_usage;
  if (Array.isArray(percpu) && percpu.length > 0) return percpu.length;
  return 1;
}

/**
 * CPU usage in percent of one core, from the delta between the current and the previous
 * counters of a one-shot stats sample. Returns null when either delta is not positive.
 */
export function cpuPercent(stats: RawStats | null | undefined): number | null {
  if (stats === null || stats === undefined || typeof stats !== "object") return null;
  const cpu = asCpuStats(stats.cpu_stats);
  const pre = asCpuStats(stats.precpu_stats);
  const cpuDelta = totalUsage(cpu) - totalUsage(pre);
  const sysDelta = toNumber(cpu.system_cpu_usage) - toNumber(pre.system_cpu_usage);
  const onlineCpus = onlineCpuCount(cpu);
  if (cpuDelta > 0 && sysDelta > 0 && onlineCpus > 0) {
    return (cpuDelta / sysDelta) * onlineCpus * 100.0;
  }
  return null;
}

export function memMb(stats: RawStats | null | undefined): number | null {
  if (stats === null || stats === undefined || typeof stats !== "object") return null;
  const mem = stats.memory_stats;
  if (mem === null || typeof mem !== "object") return null;
  const usage = mem.usage;
  if (typeof usage !== "number" || !Number.isFinite(usage)) return null;
  return usage / (1024 * 1024);
}

export function roundTo(value: number | null, digits: number): number | null {
  if (value === null) return null;
  const scale = 10 ** digits;
  return Math.round(value * scale) / scale;
}
