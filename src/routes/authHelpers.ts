import { createHash, timingSafeEqual } from "crypto";
import type { NextFunction, Request, Response } from "express";

export type AuthGateOptions = {
  enabled: boolean;
  username: string;
  password: string;
  allowLoopback: boolean;
};

export type AuthResult = "ok" | "missing" | "invalid";

export type BasicCredentials = {
  username: string;
  password: string;
};

function digest(s: string): Buffer {
  return createHash("sha256").update(s, "utf8").digest();
}

function safeEqual(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export class AuthHelpers {
  private options: AuthGateOptions;

  constructor(options: AuthGateOptions) {
    this.options = options;
  }

  static isLoopback(addr: string | undefined | null): boolean {
    if (!addr) return false;
    const a = addr.replace(/^::ffff:/i, "");
    if (a === "localhost" || a === "::1") return true;
    return /^127(\.\d{1,3}){3}$/.test(a);
  }

  static parseBasicAuth(header: string | undefined): BasicCredentials | null {
    if (typeof header !== "string") return null;
    const m = /^Basic\s+([A-Za-z0-9+/=]+)\s*$/i.exec(header);
    if (!m) return null;
    const decoded = Buffer.from(m[1], "base64").toString("utf8");
    const idx = decoded.indexOf(":");
    if (idx < 0) return null;
    return { username: decoded.slice(0, idx), password: decoded.slice(idx + 1) };
  }

  authorize(authorization: string | undefined, remoteAddress: string | undefined): AuthResult {
    if (!this.options.enabled) return "ok";
    if (this.options.allowLoopback && AuthHelpers.isLoopback(remoteAddress)) return "ok";
    const creds = AuthHelpers.parseBasicAuth(authorization);
    if (!creds) return "missing";
    const userOk = safeEqual(creds.username, this.options.username);
    const passOk = safeEqual(creds.password, this.options.password);
    return userOk && passOk ? "ok" : "invalid";
  }

  requireAuth = (req: Request, res: Response, next: NextFunction): void => {
    const result = this.authorize(req.headers.authorization, req.socket.remoteAddress);
    if (result === "ok") {
      next();
      return;
    }
    res.setHeader("WWW-Authenticate", 'Basic realm="condash"');
    res
      .status(401)
      .json({ error: result === "missing" ? "authentication required" : "invalid credentials" });
  };
}
