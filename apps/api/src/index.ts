import "dotenv/config";
import { ConfigurationError, createLogger, loadConfig, type AppConfig } from "@tollgate/shared";
import { buildApp } from "./app.js";
import { initTelemetry } from "./telemetry/init.js";

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  createLogger("error").fatal({ err: error }, "Invalid configuration");
  process.exit(1);
}

const shutdownTelemetry = await initTelemetry(config);

let built: Awaited<ReturnType<typeof buildApp>>;
try {
  built = await buildApp(config);
} catch (error) {
  const message = error instanceof ConfigurationError ? "Invalid configuration" : "Failed to initialize";
  createLogger(config.LOG_LEVEL).fatal({ err: error }, message);
  await shutdownTelemetry();
  process.exit(1);
}

const { app, close } = built;
let shuttingDown = false;

const shutdown = async (signal: string) => {
  if (shuttingDown) {
    return;
  }

  shuttingDown = true;
  app.log.info({ signal }, "Graceful shutdown started");

  try {
    await close();
    await shutdownTelemetry();
    app.log.info("Graceful shutdown completed");
    process.exit(0);
  } catch (error) {
    app.log.error({ err: error }, "Graceful shutdown failed");
    process.exit(1);
  }
};

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

try {
  await app.listen({
    host: "0.0.0.0",
    port: config.PORT
  });
} catch (error) {
  app.log.error({ err: error }, "Failed to start server");
  await close();
  await shutdownTelemetry();
  process.exit(1);
}
