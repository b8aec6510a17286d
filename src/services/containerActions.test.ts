import { ContainerActionService } from "./containerActions";
import type { RuntimeClient } from "./runtime";
import type { ContainerHandle } from "../models/container";
import { InvalidOperationError, NotFoundError } from "../models/errors";

const WEB: ContainerHandle = { id: "abc123", name: "web", status: "running", hostPort: "8080" };

function makeClient() {
  const getContainer = jest.fn(async (name: string) => {
    if (name === WEB.name) return WEB;
    throw new NotFoundError(`No such container: ${name}`);
  });
  const performAction = jest.fn(async () => {});
  const client: RuntimeClient = {
    listContainers: jest.fn(),
    getContainer,
    fetchStats: jest.fn(),
    performAction,
    fetchLogs: jest.fn(),
    inspect: jest.fn(),
  };
  return { client, getContainer, performAction };
}

const flush = () => new Promise<void>((r) => setImmediate(r));

describe("ContainerActionService", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  test("runs the action on the resolved container", async () => {
    const { client, performAction } = makeClient();
    const svc = new ContainerActionService(client, { actionDelayMs: 0 });
    await svc.performAction("web", "stop");
    expect(performAction).toHaveBeenCalledTimes(1);
    expect(performAction).toHaveBeenCalledWith(WEB, "stop");
  });

  test("rejects unknown actions before touching the runtime", async () => {
    const { client, getContainer, performAction } = makeClient();
    const svc = new ContainerActionService(client, { actionDelayMs: 0 });
    await expect(svc.performAction("web", "pause")).rejects.toBeInstanceOf(InvalidOperationError);
    await expect(svc.performAction("web", "")).rejects.toThrow("invalid operation");
    expect(getContainer).not.toHaveBeenCalled();
    expect(performAction).not.toHaveBeenCalled();
  });

  test("propagates not found without running an action", async () => {
    const { client, performAction } = makeClient();
    const svc = new ContainerActionService(client, { actionDelayMs: 0 });
    await expect(svc.performAction("ghost", "start")).rejects.toThrow("No such container: ghost");
    expect(performAction).not.toHaveBeenCalled();
  });

  test("waits for the settle delay after the action", async () => {
    jest.useFakeTimers({ doNotFake: ["setImmediate", "nextTick", "queueMicrotask"] });
    const { client, performAction } = makeClient();
    const svc = new ContainerActionService(client, { actionDelayMs: 100 });
    let settled = false;
    const done = svc.performAction("web", "restart").then(() => {
      settled = true;
    });
    await flush();
    expect(performAction).toHaveBeenCalledWith(WEB, "restart");
    expect(settled).toBe(false);

    await jest.advanceTimersByTimeAsync(100);
    await done;
    expect(settled).toBe(true);
  });
});
