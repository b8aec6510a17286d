import os from "os";
import Docker from "dockerode";
import { Config } from "../config";
import { createLogger } from "./logger";

const logger = createLogger({ file: "servers" });

export function getSampleAddr(): string {
  const ifs = os.networkInterfaces();
  for (const addrs of Object.values(ifs)) {
    for (const a of addrs ?? []) {
      if (!a.internal && a.family === "IPv4") {
        return a.address;
      }
    }
  }
  return "127.0.0.1";
}

export function dockerOptionsFromHost(host: string, socketPath: string): Docker.DockerOptions {
  const trimmed = host.trim();
  if (trimmed === "") return { socketPath };
  if (trimmed.startsWith("unix://")) return { socketPath: trimmed.slice("unix://".length) };
  const u = new URL(trimmed.replace(/^tcp:\/\//, "http://"));
  const protocol = u.protocol === "https:" ? "https" : "http";
  const port = u.port !== "" ? Number(u.port) : protocol === "https" ? 2376 : 2375;
  return { host: u.hostname, port, protocol };
}

export function makeDockerClient(): Docker {
  return new Docker(dockerOptionsFromHost(Config.DOCKER_HOST, Config.DOCKER_SOCKET_PATH));
}

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export async function connectDockerWithRetry(timeout = 60): Promise<Docker> {
  const target = Config.DOCKER_HOST || Config.DOCKER_SOCKET_PATH;
  logger.info(`docker connect: ${target}`);
  const deadline = Date.now() + timeout * 1000;
  let attempt = 0;
  for (;;) {
    const docker = makeDockerClient();
    try {
      await docker.ping();
      return docker;
    } catch (e) {
      attempt++;
      if (Date.now() >= deadline) {
        throw new Error(
          `docker connect failed for ${timeout} sec: ${e instanceof Error ? e.message : String(e)}`,
        );
      }
      logger.warn(`[servers] docker connect failed (attempt ${attempt})`);
      await sleep(1000);
    }
  }
}
