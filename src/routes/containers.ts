import { Router, Request, Response } from "express";
import { Config } from "../config";
import { InvalidOperationError } from "../models/errors";
import type { ContainersService } from "../services/containers";
import type { ContainerActionService } from "../services/containerActions";
import type { ContainersStream } from "../services/containersStream";
import { getPathParam, getQueryList, getQueryParam, parseIntParam, strToBool } from "./utils";

export type ContainersRouterDeps = {
  containersService: ContainersService;
  actionService: ContainerActionService;
  stream: ContainersStream;
  logDefaultTail?: number;
};

export default function createContainersRouter(deps: ContainersRouterDeps) {
  const router = Router();
  const { containersService, actionService, stream } = deps;
  const logDefaultTail = deps.logDefaultTail ?? Config.LOG_DEFAULT_TAIL;

  router.get("/", async (req: Request, res: Response) => {
    const includeMetrics = strToBool(getQueryParam(req, "includeMetrics"), true);
    if (includeMetrics) {
      const data = await stream.getSnapshot({ maxAgeMs: stream.refreshIntervalMs });
      res.json(data);
      return;
    }
    res.json(await containersService.listSummaries({ includeMetrics: false }));
  });

  router.get("/metrics", async (req: Request, res: Response) => {
    const names = getQueryList(req, "names");
    res.json(await containersService.getMetrics(names));
  });

  router.post("/:name/:action", async (req: Request, res: Response) => {
    await actionService.performAction(getPathParam(req, "name"), getPathParam(req, "action"));
    stream.poke();
    res.json({ ok: true });
  });

  router.get("/:name/logs", async (req: Request, res: Response) => {
    const tail = parseIntParam(getQueryParam(req, "tail"));
    if (tail !== null && !Number.isFinite(tail)) {
      throw new InvalidOperationError("tail must be an integer");
    }
    const text = await containersService.getLogs(getPathParam(req, "name"), tail ?? logDefaultTail);
    res.type("text/plain").send(text);
  });

  router.get("/:name/exec", (req: Request, res: Response) => {
    const name = getPathParam(req, "name");
    res.json({ name, commands: containersService.buildExecCommands(name) });
  });

  router.get("/:name/inspect", async (req: Request, res: Response) => {
    res.json(await containersService.inspect(getPathParam(req, "name")));
  });

  return router;
}
