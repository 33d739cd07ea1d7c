import { CalcEnvironment, HttpOfficeBridge, InMemoryOfficeBridge, type OfficeBridge } from "@calc-env/core";
import { buildApp } from "./app";
import { loadConfig, type AppConfig } from "./config";
import { createLogger } from "./observability/logger";

function createBridge(config: AppConfig): OfficeBridge {
  switch (config.officeBridge) {
    case "http":
      return new HttpOfficeBridge({ url: config.officeBridgeUrl, timeoutMs: config.officeBridgeTimeoutMs });
    case "memory":
      return new InMemoryOfficeBridge();
    default: {
      const exhaustive: never = config.officeBridge;
      throw new Error(`Unsupported office bridge: ${String(exhaustive)}`);
    }
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const environment = new CalcEnvironment({
    bridge: createBridge(config),
    baseFile: config.baseFile,
    goalFile: config.goalFile,
    connectAttempts: config.officeConnectAttempts,
    connectDelayMs: config.officeConnectDelayMs,
    logger: logger.child({ component: "environment" })
  });

  const app = buildApp({ environment, config, logger });
  app.addHook("onClose", async () => {
    const closed = await environment.close();
    if (!closed.success) app.log.warn({ error: closed.error_message }, "env_close_failed");
  });

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, "shutting_down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "shutdown_failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({ port: config.port, host: config.host });
  app.log.info({ bridge: config.officeBridge }, "env_server_started");
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
});
