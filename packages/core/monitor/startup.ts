import os from "node:os";
import path from "node:path";
import { parseLogLevel, type LogLevel } from "../logger";
import { DEFAULT_CONNECT_TIMEOUT_MS } from "../messaging/socketChannel";
import { DEFAULT_POLL_INTERVAL_MS } from "../clipboard/platform/polling";
import { parseMimeTypeList } from "./config";

export type CliOptions = {
  socketPath?: string;
  formats?: string;
  pollIntervalMs?: string;
  connectTimeoutMs?: string;
  logLevel?: string;
  help?: boolean;
};

export type StartupConfig = {
  socketPath: string;
  trackedMimeTypes: string[];
  pollIntervalMs: number;
  connectTimeoutMs: number;
  logLevel: LogLevel;
};

export type Env = Record<string, string | undefined>;

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--socket":
        opts.socketPath = argv[i + 1];
        i++;
        break;
      case "--formats":
        opts.formats = argv[i + 1];
        i++;
        break;
      case "--poll-interval":
        opts.pollIntervalMs = argv[i + 1];
        i++;
        break;
      case "--connect-timeout":
        opts.connectTimeoutMs = argv[i + 1];
        i++;
        break;
      case "--log-level":
        opts.logLevel = argv[i + 1];
        i++;
        break;
      case "--verbose":
      case "-v":
        opts.logLevel = "debug";
        break;
      case "--help":
      case "-h":
        opts.help = true;
        break;
      default:
        break;
    }
  }
  return opts;
}

export function usage(): string {
  return [
    "Usage:",
    "  clip-monitor [--socket <path>] [--formats <mime list>] [--poll-interval <ms>]",
    "               [--connect-timeout <ms>] [--log-level debug|info|warn|error|silent]",
    "",
    "Environment:",
    "  CLIPMON_SOCKET, CLIPMON_FORMATS, CLIPMON_POLL_INTERVAL_MS,",
    "  CLIPMON_CONNECT_TIMEOUT_MS, CLIPMON_LOG_LEVEL",
    "",
    "Mime lists are separated by ';', ',' or whitespace, e.g. \"text/plain;text/html\".",
  ].join("\n");
}

function safeUserName(env: Env): string {
  try {
    return os.userInfo().username;
  } catch {
    return env.USER || env.USERNAME || "user";
  }
}

/** Per-user endpoint the server listens on for its monitor. */
export function defaultMonitorSocketPath(
  platform: NodeJS.Platform = process.platform,
  user: string = safeUserName(process.env)
): string {
  const name = `clipmon-${user.replace(/[^A-Za-z0-9_.-]/g, "_")}-monitor`;
  if (platform === "win32") return `\\\\.\\pipe\\${name}`;
  return path.join(os.tmpdir(), `${name}.sock`);
}

export function coerceNumber(value: unknown, fallback: number) {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

/** Command line wins over environment, environment over defaults. */
export function resolveStartupConfig(opts: CliOptions, env: Env = process.env): StartupConfig {
  return {
    socketPath: opts.socketPath || env.CLIPMON_SOCKET || defaultMonitorSocketPath(process.platform, safeUserName(env)),
    trackedMimeTypes: parseMimeTypeList(opts.formats ?? env.CLIPMON_FORMATS ?? ""),
    pollIntervalMs: Math.max(
      50,
      coerceNumber(opts.pollIntervalMs ?? env.CLIPMON_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS)
    ),
    connectTimeoutMs: coerceNumber(
      opts.connectTimeoutMs ?? env.CLIPMON_CONNECT_TIMEOUT_MS,
      DEFAULT_CONNECT_TIMEOUT_MS
    ),
    logLevel: parseLogLevel(opts.logLevel) ?? parseLogLevel(env.CLIPMON_LOG_LEVEL) ?? "info",
  };
}
