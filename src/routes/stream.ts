import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import { WebSocket, WebSocketServer } from "ws";
import { StreamingSendError } from "../models/errors";
import type { ContainersStream, Subscriber } from "../services/containersStream";
import { createLogger } from "../utils/logger";
import type { AuthHelpers } from "./authHelpers";

const logger = createLogger({ file: "streamRouter" });

export class WebSocketSubscriber implements Subscriber {
  private ws: WebSocket;

  constructor(ws: WebSocket) {
    this.ws = ws;
  }

  send(payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ws.readyState !== WebSocket.OPEN) {
        reject(new StreamingSendError());
        return;
      }
      this.ws.send(payload, (err) => {
        if (err) reject(new StreamingSendError(err.message));
        else resolve();
      });
    });
  }
}

export type StreamEndpointOptions = {
  path: string;
  authHelpers: AuthHelpers;
  heartbeatMs: number;
};

export type StreamEndpoint = {
  close(): void;
};

function rejectUpgrade(socket: Duplex, status: string, extraHeaders: string[] = []): void {
  const lines = [`HTTP/1.1 ${status}`, ...extraHeaders, "Connection: close", "", ""];
  socket.end(lines.join("\r\n"));
}

/**
 * Serves the containers stream over WebSocket on the given path of an HTTP server.
 * Each connection is a subscriber of the stream for as long as it stays open; a ping
 * every heartbeat interval terminates connections whose peer went away silently.
 */
export function attachContainersStream(
  server: Server,
  stream: ContainersStream,
  options: StreamEndpointOptions,
): StreamEndpoint {
  const wss = new WebSocketServer({ noServer: true });
  const alive = new WeakMap<WebSocket, boolean>();

  server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    if (pathname !== options.path) {
      rejectUpgrade(socket, "404 Not Found");
      return;
    }
    const auth = options.authHelpers.authorize(req.headers.authorization, req.socket.remoteAddress);
    if (auth !== "ok") {
      rejectUpgrade(socket, "401 Unauthorized", ['WWW-Authenticate: Basic realm="condash"']);
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  wss.on("connection", (ws: WebSocket) => {
    const subscriber = new WebSocketSubscriber(ws);
    let closed = false;
    alive.set(ws, true);

    const cleanup = () => {
      if (closed) return;
      closed = true;
      stream.unregister(subscriber);
    };
    ws.on("pong", () => alive.set(ws, true));
    ws.on("close", cleanup);
    ws.on("error", (err) => {
      logger.debug(`[stream] socket error: ${err}`);
      cleanup();
      ws.terminate();
    });

    void stream
      .register(subscriber)
      .then((ok) => {
        if (!ok) {
          ws.terminate();
        } else if (closed) {
          stream.unregister(subscriber);
        }
      })
      .catch((e) => {
        logger.error(`[stream] register failed: ${e}`);
        ws.close(1011, "snapshot unavailable");
      });
  });

  const heartbeat = setInterval(() => {
    for (const ws of wss.clients) {
      if (alive.get(ws) === false) {
        ws.terminate();
        continue;
      }
      alive.set(ws, false);
      ws.ping();
    }
  }, options.heartbeatMs);
  heartbeat.unref();

  return {
    close: () => {
      clearInterval(heartbeat);
      for (const ws of wss.clients) ws.terminate();
      wss.close();
    },
  };
}
