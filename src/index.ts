import dotenv from "dotenv";
import { ReportProcessor } from "./controllers/report-processor/index.js";
import { HttpServer } from "./services/http-server.js";
import { createAzureCredential } from "./utils/azure-credentials.js";
import { loadConfig } from "./utils/config.js";
import { FileShareClient } from "./utils/file-share-client/index.js";
import logger from "./utils/logger.js";
import { ReportIndexClient } from "./utils/search-client/index.js";

// Load environment variables
dotenv.config();

// Below the pod's default 30s termination grace period
const SHUTDOWN_GRACE_MS = 25_000;

let shuttingDown = false;
let processor: ReportProcessor | null = null;
let server: HttpServer | null = null;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info(`Received ${signal}, shutting down...`);

  if (processor) {
    processor.stopPolling();
    if (processor.running) {
      logger.info("Waiting for the running pass to finish...");
      const idle = await processor.waitForIdle(SHUTDOWN_GRACE_MS);
      if (!idle) {
        logger.warn(
          `Pass still running after ${SHUTDOWN_GRACE_MS / 1000}s, exiting anyway`,
        );
      }
    }
  }
  if (server) {
    await server.stop();
  }

  logger.info("Exiting...");
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err) => {
    logger.error(`Error during shutdown: ${err}`);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

async function main() {
  logger.info("Starting File Processor Service");

  const config = loadConfig();
  const credential = createAzureCredential(config.managedIdentityClientId);

  const store = FileShareClient.connect(
    config.storage,
    config.storage.shareName,
    credential,
  );
  const index = ReportIndexClient.fromConnection(config.search, credential);

  processor = new ReportProcessor(store, index, config.processor);

  server = new HttpServer(processor, config.httpPort);
  await server.start();

  await processor.initialize();
  processor.startPolling();

  logger.info(
    `Watching share '${config.storage.shareName}' directory '${config.processor.directoryPath || "/"}'`,
  );
}

main().catch((err) => {
  logger.error(`Failed to start File Processor Service: ${err}`);
  process.exit(1);
});
