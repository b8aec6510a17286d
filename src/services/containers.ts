import { Config } from "../config";
import type {
  ContainerHandle,
  ContainerMetrics,
  ContainerSummary,
  ExecCommand,
  ExecProfile,
  RawStats,
} from "../models/container";
import { InvalidOperationError } from "../models/errors";
import { cpuPercent, memMb, roundTo } from "./metrics";
import type { RuntimeClient } from "./runtime";
import type { StatsCache } from "./statsCache";
import { createLogger } from "../utils/logger";

const logger = createLogger({ file: "containers" });

const CONTAINER_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export type ContainersServiceOptions = {
  linkScheme?: string;
  linkHost?: string;
  logMaxTail?: number;
  execShell?: string;
  wslDistro?: string;
  execProfiles?: ReadonlyArray<string>;
};

export function parseExecProfiles(names: ReadonlyArray<string>): ExecProfile[] {
  const out: ExecProfile[] = [];
  for (const raw of names) {
    const name = raw.trim().toLowerCase();
    if (name === "all") return ["docker", "wsl"];
    if ((name === "docker" || name === "wsl") && !out.includes(name)) out.push(name);
  }
  return out.length > 0 ? out : ["docker"];
}

export function toMetrics(raw: RawStats | null): ContainerMetrics {
  if (!raw) return { cpu: null, mem_mb: null };
  return {
    cpu: roundTo(cpuPercent(raw), 1),
    mem_mb: roundTo(memMb(raw), 0),
  };
}

export class ContainersService {
  private client: RuntimeClient;
  private statsCache: StatsCache;
  private linkScheme: string;
  private linkHost: string;
  private logMaxTail: number;
  private execShell: string;
  private wslDistro: string;
  private execProfiles: ExecProfile[];

  constructor(client: RuntimeClient, statsCache: StatsCache, options: ContainersServiceOptions = {}) {
    this.client = client;
    this.statsCache = statsCache;
    this.linkScheme = options.linkScheme ?? Config.LINK_SCHEME;
    this.linkHost = options.linkHost ?? Config.LINK_HOST;
    this.logMaxTail = Math.max(1, options.logMaxTail ?? Config.LOG_MAX_TAIL);
    this.execShell = options.execShell ?? Config.EXEC_SHELL;
    this.wslDistro = options.wslDistro ?? Config.WSL_DISTRO;
    this.execProfiles = parseExecProfiles(options.execProfiles ?? Config.EXEC_COMMAND_PROFILES);
  }

  buildLink(hostPort: string | null): string | null {
    if (!hostPort) return null;
    return `${this.linkScheme}://${this.linkHost}:${hostPort}`;
  }

  private async collectStats(
    containers: ReadonlyArray<ContainerHandle>,
  ): Promise<Map<string, RawStats | null>> {
    const statsMap = await this.statsCache.getOrFetch(containers);
    const removed = this.statsCache.prune(containers.map((c) => c.id));
    if (removed > 0) {
      logger.debug(`pruned ${removed} stats entries of removed containers`);
    }
    return statsMap;
  }

  async listSummaries(input: { includeMetrics: boolean }): Promise<ContainerSummary[]> {
    const containers = await this.client.listContainers(true);
    const statsMap = input.includeMetrics
      ? await this.collectStats(containers)
      : new Map<string, RawStats | null>();
    return containers.map((c) => {
      const metrics = toMetrics(statsMap.get(c.id) ?? null);
      return {
        name: c.name,
        status: c.status,
        link: this.buildLink(c.hostPort),
        cpu: metrics.cpu,
        mem_mb: metrics.mem_mb,
      };
    });
  }

  async getMetrics(names?: ReadonlyArray<string>): Promise<Record<string, ContainerMetrics>> {
    const containers = await this.client.listContainers(true);
    const wanted = names && names.length > 0 ? new Set(names) : null;
    const targets = wanted ? containers.filter((c) => wanted.has(c.name)) : containers;
    const statsMap = wanted
      ? await this.statsCache.getOrFetch(targets)
      : await this.collectStats(targets);
    const out: Record<string, ContainerMetrics> = {};
    for (const c of targets) {
      out[c.name] = toMetrics(statsMap.get(c.id) ?? null);
    }
    return out;
  }

  async getLogs(name: string, tail: number): Promise<string> {
    const t = Number.isFinite(tail) ? Math.floor(tail) : 1;
    const n = Math.max(1, Math.min(t, this.logMaxTail));
    const handle = await this.client.getContainer(name);
    try {
      const buf = await this.client.fetchLogs(handle, n);
      return buf.toString("utf8");
    } catch (e) {
      logger.warn(`log fetch failed for ${name}: ${e}`);
      return `[error] ${e instanceof Error ? e.message : String(e)}`;
    }
  }

  async inspect(name: string): Promise<Record<string, unknown>> {
    const handle = await this.client.getContainer(name);
    return await this.client.inspect(handle);
  }

  buildExecCommands(name: string): ExecCommand[] {
    if (!CONTAINER_NAME_PATTERN.test(name)) {
      throw new InvalidOperationError(`invalid container name: ${name}`);
    }
    const exec = `docker exec -it ${name} ${this.execShell}`;
    return this.execProfiles.map((profile) => ({
      profile,
      command: profile === "wsl" ? `wsl -d ${this.wslDistro} ${exec}` : exec,
    }));
  }
}
