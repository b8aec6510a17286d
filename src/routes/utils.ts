import type { Request } from "express";

export function strToBool(str: string | undefined, defaultValue: boolean): boolean {
  if (typeof str !== "string") return defaultValue;
  const s = str.trim().toLowerCase();
  if (["true", "yes", "1", "on"].includes(s)) return true;
  if (["false", "no", "0", "off"].includes(s)) return false;
  return defaultValue;
}

export function getQueryParam(req: Request, key: string): string | undefined {
  const v: unknown = req.query[key];
  if (typeof v === "string") return v;
  if (Array.isArray(v) && typeof v[0] === "string") return v[0];
  return undefined;
}

export function getQueryList(req: Request, key: string): string[] | undefined {
  const v: unknown = req.query[key];
  const raw = typeof v === "string" ? [v] : Array.isArray(v) ? v : [];
  const out: string[] = [];
  for (const item of raw) {
    if (typeof item !== "string") continue;
    for (const part of item.split(",")) {
      const s = part.trim();
      if (s.length > 0 && !out.includes(s)) out.push(s);
    }
  }
  return out.length > 0 ? out : undefined;
}

export function parseIntParam(v: string | undefined): number | null {
  if (typeof v !== "string" || v.trim().length === 0) return null;
  if (!/^\s*-?\d+\s*$/.test(v)) return Number.NaN;
  return Number.parseInt(v, 10);
}

export function getPathParam(req: Request, key: string): string {
  const v: unknown = req.params[key];
  if (typeof v === "string") return v;
  if (Array.isArray(v)) return v.filter((s) => typeof s === "string").join("/");
  return "";
}
