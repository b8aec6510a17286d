import { Config } from "../config";
import { isContainerAction } from "../models/container";
import { InvalidOperationError } from "../models/errors";
import type { RuntimeClient } from "./runtime";
import { createLogger } from "../utils/logger";

const logger = createLogger({ file: "containerActions" });

export type ContainerActionServiceOptions = {
  actionDelayMs?: number;
};

function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export class ContainerActionService {
  private client: RuntimeClient;
  private actionDelayMs: number;

  constructor(client: RuntimeClient, options: ContainerActionServiceOptions = {}) {
    this.client = client;
    this.actionDelayMs = Math.max(0, options.actionDelayMs ?? Config.ACTION_DELAY_SECONDS * 1000);
  }

  /**
   * Runs start/stop/restart on the named container and then waits once for the settle
   * delay so that the daemon reports the new state on the next listing. Propagating the
   * new state to stream subscribers is up to the caller.
   */
  async performAction(name: string, action: string): Promise<void> {
    if (!isContainerAction(action)) {
      throw new InvalidOperationError("invalid operation");
    }
    const handle = await this.client.getContainer(name);
    await this.client.performAction(handle, action);
    logger.info(`${action} ${name}: done`);
    if (this.actionDelayMs > 0) {
      await sleep(this.actionDelayMs);
    }
  }
}
