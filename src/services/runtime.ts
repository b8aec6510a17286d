import type Docker from "dockerode";
import type {
  ContainerAction,
  ContainerHandle,
  RawStats,
} from "../models/container";
import { NotFoundError } from "../models/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger({ file: "runtime" });

export interface RuntimeClient {
  listContainers(all: boolean): Promise<ContainerHandle[]>;
  getContainer(name: string): Promise<ContainerHandle>;
  fetchStats(handle: ContainerHandle): Promise<RawStats | null>;
  performAction(handle: ContainerHandle, action: ContainerAction): Promise<void>;
  fetchLogs(handle: ContainerHandle, tail: number): Promise<Buffer>;
  inspect(handle: ContainerHandle): Promise<Record<string, unknown>>;
}

type PortBindingLike = { HostIp?: unknown; HostPort?: unknown } | null | undefined;

export function firstHostPortFromList(
  ports: ReadonlyArray<{ PrivatePort?: unknown; PublicPort?: unknown }>,
): string | null {
  for (const p of ports) {
    if (typeof p.PublicPort === "number" && p.PublicPort > 0) {
      return String(p.PublicPort);
    }
  }
  return null;
}

export function firstHostPortFromInspect(
  ports: Record<string, ReadonlyArray<PortBindingLike> | null | undefined> | null | undefined,
): string | null {
  for (const mappings of Object.values(ports ?? {})) {
    if (!mappings || mappings.length === 0) continue;
    const hostPort = mappings[0]?.HostPort;
    if (typeof hostPort === "string" && hostPort.length > 0) return hostPort;
  }
  return null;
}

function looksMultiplexed(buf: Buffer): boolean {
  return buf.length >= 8 && buf[0] <= 2 && buf[1] === 0 && buf[2] === 0 && buf[3] === 0;
}

/**
 * Strips the 8-byte stream headers the daemon puts in front of every log chunk of a
 * container that runs without a TTY. Output of TTY containers is returned as is.
 */
export function demuxLogFrames(buf: Buffer): Buffer {
  if (!looksMultiplexed(buf)) return buf;
  const parts: Buffer[] = [];
  let offset = 0;
  while (offset + 8 <= buf.length) {
    const size = buf.readUInt32BE(offset + 4);
    const start = offset + 8;
    const end = Math.min(start + size, buf.length);
    parts.push(buf.subarray(start, end));
    offset = end;
  }
  return Buffer.concat(parts);
}

export function statusCodeOf(e: unknown): number | undefined {
  if (e !== null && typeof e === "object" && "statusCode" in e) {
    if (typeof e.statusCode === "number") return e.statusCode;
  }
  return undefined;
}

function stripSlash(name: string): string {
  return name.replace(/^\//, "");
}

export class DockerRuntimeClient implements RuntimeClient {
  private docker: Docker;

  constructor(docker: Docker) {
    this.docker = docker;
  }

  async listContainers(all: boolean): Promise<ContainerHandle[]> {
    const infos = await this.docker.listContainers({ all });
    return infos.map((info) => ({
      id: info.Id,
      name: stripSlash(info.Names?.[0] ?? info.Id.slice(0, 12)),
      status: info.State,
      hostPort: firstHostPortFromList(info.Ports ?? []),
    }));
  }

  async getContainer(name: string): Promise<ContainerHandle> {
    let info: Docker.ContainerInspectInfo;
    try {
      info = await this.docker.getContainer(name).inspect();
    } catch (e) {
      if (statusCodeOf(e) === 404) {
        throw new NotFoundError(`No such container: ${name}`);
      }
      throw e;
    }
    return {
      id: info.Id,
      name: stripSlash(info.Name),
      status: info.State.Status,
      hostPort: firstHostPortFromInspect(info.NetworkSettings?.Ports),
    };
  }

  async fetchStats(handle: ContainerHandle): Promise<RawStats | null> {
    try {
      const stats: RawStats = await this.docker.getContainer(handle.id).stats({ stream: false });
      return stats;
    } catch (e) {
      logger.debug(`stats fetch failed for ${handle.name}: ${e}`);
      return null;
    }
  }

  async performAction(handle: ContainerHandle, action: ContainerAction): Promise<void> {
    const container = this.docker.getContainer(handle.id);
    try {
      if (action === "restart") {
        await container.restart();
      } else if (action === "stop") {
        await container.stop();
      } else {
        await container.start();
      }
    } catch (e) {
      const code = statusCodeOf(e);
      if (code === 304) {
        logger.info(`${action} ${handle.name}: already in the requested state`);
        return;
      }
      if (code === 404) {
        throw new NotFoundError(`No such container: ${handle.name}`);
      }
      throw e;
    }
  }

  async fetchLogs(handle: ContainerHandle, tail: number): Promise<Buffer> {
    const buf = await this.docker.getContainer(handle.id).logs({
      stdout: true,
      stderr: true,
      tail,
      follow: false,
    });
    return demuxLogFrames(buf);
  }

  async inspect(handle: ContainerHandle): Promise<Record<string, unknown>> {
    try {
      const info = await this.docker.getContainer(handle.id).inspect();
      return { ...info };
    } catch (e) {
      if (statusCodeOf(e) === 404) {
        throw new NotFoundError(`No such container: ${handle.name}`);
      }
      throw e;
    }
  }
}
