import { Router, Request, Response } from "express";
import { Config } from "../config";

export default function createRootRouter() {
  const router = Router();

  router.get("/health", (req: Request, res: Response) => {
    res.status(200).json({ result: "ok" });
  });

  router.get("/settings", (req: Request, res: Response) => {
    res.status(200).json({
      title: Config.APP_TITLE,
      autoRefreshSeconds: Config.AUTO_REFRESH_SECONDS,
      logRefreshSeconds: Config.LOG_REFRESH_SECONDS,
      logDefaultTail: Config.LOG_DEFAULT_TAIL,
      logMaxTail: Config.LOG_MAX_TAIL,
    });
  });

  return router;
}
