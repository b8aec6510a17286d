export class Config {
  static readonly HTTP_HOST = envStr("CONDASH_HTTP_HOST", "0.0.0.0");
  static readonly HTTP_PORT = envNum("CONDASH_HTTP_PORT", 8000);
  static readonly APP_TITLE = envStr("CONDASH_APP_TITLE", "Container Dashboard");
  static readonly DOCKER_SOCKET_PATH = envStr("CONDASH_DOCKER_SOCKET_PATH", "/var/run/docker.sock");
  static readonly DOCKER_HOST = envStr("CONDASH_DOCKER_HOST", "");
  static readonly AUTO_REFRESH_SECONDS = clamp(envNum("CONDASH_AUTO_REFRESH_SECONDS", 10), 0.2);
  static readonly LOG_REFRESH_SECONDS = clamp(envNum("CONDASH_LOG_REFRESH_SECONDS", 5), 1);
  static readonly ACTION_DELAY_SECONDS = clamp(envNum("CONDASH_ACTION_DELAY_SECONDS", 0.1), 0);
  static readonly LINK_SCHEME = envStr("CONDASH_LINK_SCHEME", "http");
  static readonly LINK_HOST = envStr("CONDASH_LINK_HOST", "localhost");
  static readonly LOG_MAX_TAIL = clamp(Math.floor(envNum("CONDASH_LOG_MAX_TAIL", 5000)), 1);
  static readonly LOG_DEFAULT_TAIL = clamp(
    Math.floor(envNum("CONDASH_LOG_DEFAULT_TAIL", 200)),
    1,
    Config.LOG_MAX_TAIL,
  );
  static readonly EXEC_SHELL = envStr("CONDASH_EXEC_SHELL", "bash");
  static readonly WSL_DISTRO = envStr("CONDASH_WSL_DISTRO", "Ubuntu");
  static readonly EXEC_COMMAND_PROFILES = envStrCsv("CONDASH_EXEC_COMMAND_PROFILES", ["all"]);
  static readonly AUTH_ENABLED = envBool("CONDASH_AUTH_ENABLED", false);
  static readonly AUTH_USERNAME = envStr("CONDASH_AUTH_USERNAME", "");
  static readonly AUTH_PASSWORD = envStr("CONDASH_AUTH_PASSWORD", "");
  static readonly AUTH_ALLOW_LOOPBACK = envBool("CONDASH_AUTH_ALLOW_LOOPBACK", true);
  static readonly WS_HEARTBEAT_SECONDS = clamp(envNum("CONDASH_WS_HEARTBEAT_SECONDS", 30), 1);
  static readonly LOG_FORMAT = envStr("CONDASH_LOG_FORMAT", "");
}

export function clamp(value: number, min: number, max?: number): number {
  let v = Math.max(value, min);
  if (max !== undefined) v = Math.min(v, max);
  return v;
}

export function envStr(name: string, def?: string, treatEmptyAsUndefined = false): string {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  return v;
}

export function envNum(name: string, def?: number, treatEmptyAsUndefined = false): number {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  const n = Number(v);
  if (isNaN(n)) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} is not a valid number: ${v}`);
  }
  return n;
}

export function envBool(name: string, def?: boolean, treatEmptyAsUndefined = false): boolean {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  const vv = v.toLowerCase();
  if (["1", "true", "yes", "on"].includes(vv)) return true;
  if (["0", "false", "no", "off"].includes(vv)) return false;
  if (def !== undefined) return def;
  throw new Error(`Env var ${name} is not a valid boolean: ${v}`);
}

export function envStrCsv(name: string, def?: string[], treatEmptyAsUndefined = false): string[] {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
