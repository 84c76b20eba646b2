import mongoose from "mongoose";
import { createApp } from "./app.ts";
import { loadConfig } from "./config/env.ts";
import { createMongoRepositories } from "./repositories/index.ts";
import { createServices } from "./services/index.ts";
import { describeError, logError, logInfo } from "./utils/logger.ts";

function redactUri(uri: string): string {
  return uri.replace(/\/\/[^@/]*@/, "//***@");
}

async function main(): Promise<void> {
  const config = loadConfig();

  await mongoose.connect(config.mongoUri);
  logInfo("mongo_connected", { uri: redactUri(config.mongoUri) });

  const services = createServices(createMongoRepositories());
  await services.templates.seedDefaults();

  const app = createApp(services, { uploadMaxBytes: config.uploadMaxBytes });
  const server = app.listen(config.port, config.host, () => {
    logInfo("server_listening", { host: config.host, port: config.port, env: config.nodeEnv });
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logInfo("server_shutdown", { signal });
    server.close(() => {
      mongoose
        .disconnect()
        .then(() => {
          logInfo("mongo_disconnected");
          process.exit(0);
        })
        .catch((error: unknown) => {
          logError("mongo_disconnect_failed", describeError(error));
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logError("server_start_failed", describeError(error));
  process.exit(1);
});
