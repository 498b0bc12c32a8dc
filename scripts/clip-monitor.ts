#!/usr/bin/env node
import process from "node:process";
import * as log from "../packages/core/logger";
import { createPollingClipboardPlatform } from "../packages/core/clipboard/platform/polling";
import { connectSocketChannel, type SocketIpcChannel } from "../packages/core/messaging/socketChannel";
import { createClipboardMonitor } from "../packages/core/monitor/engine";
import { parseArgs, resolveStartupConfig, usage } from "../packages/core/monitor/startup";

async function main() {
  const opts = parseArgs(process.argv.slice(2));
  if (opts.help) {
    console.log(usage());
    return;
  }

  const config = resolveStartupConfig(opts, process.env);
  log.setLogLevel(config.logLevel);

  let channel: SocketIpcChannel;
  try {
    channel = await connectSocketChannel(config.socketPath, { timeoutMs: config.connectTimeoutMs });
  } catch (err) {
    log.error("Cannot connect to server!", {
      socketPath: config.socketPath,
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }

  const platform = createPollingClipboardPlatform({ pollIntervalMs: config.pollIntervalMs });
  let stopping = false;

  function shutdown(reason: string, code: number) {
    if (stopping) return;
    stopping = true;
    log.info(`Shutting down (${reason})`);
    try {
      monitor.stop();
      platform.stop();
      channel.close();
    } catch (err) {
      log.error("Error during shutdown", err);
    } finally {
      process.exit(code);
    }
  }

  const monitor = createClipboardMonitor({
    platform,
    channel,
    trackedMimeTypes: config.trackedMimeTypes,
    onFatal: () => shutdown("channel read failure", 1),
  });

  channel.onClosed(() => shutdown("server disconnected", 0));
  process.on("SIGINT", () => shutdown("SIGINT", 0));
  process.on("SIGTERM", () => shutdown("SIGTERM", 0));
  process.on("uncaughtException", (err) => {
    log.error("Uncaught exception", err);
    shutdown("uncaughtException", 1);
  });

  monitor.start();
  platform.start();
}

main().catch((err: unknown) => {
  log.error("Fatal startup error", err);
  process.exit(1);
});
