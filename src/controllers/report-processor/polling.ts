import { setTimeout as sleep } from "timers/promises";
import { errorMessage } from "../../utils/errors.js";
import logger from "../../utils/logger.js";
import { ReportProcessor } from "./index.js";

/**
 * Poll the share: one pass now, then one pass per interval counted from
 * the end of the previous pass
 */
export function startPolling(
  this: ReportProcessor,
  intervalSeconds: number = this.config.pollIntervalSeconds,
) {
  if (this.pollingEnabled) {
    return;
  }
  this.pollingEnabled = true;
  // A tick left over from an earlier start must not reschedule itself
  const generation = ++this.pollGeneration;
  const current = () => this.pollingEnabled && this.pollGeneration === generation;

  const tick = async () => {
    if (!current()) return;
    this.pollTimer = null;
    try {
      await this.processFiles();
    } catch (error) {
      logger.error(`Polling pass failed: ${errorMessage(error)}`);
    }
    if (current()) {
      this.pollTimer = setTimeout(() => {
        tick().catch((err: Error) => {
          logger.error(`Poll timer error: ${err}`);
        });
      }, intervalSeconds * 1000);
    }
  };

  tick().catch((err: Error) => {
    logger.error(`Poll timer error: ${err}`);
  });

  logger.info(`Started polling every ${intervalSeconds} seconds`);
}

export function stopPolling(this: ReportProcessor) {
  if (!this.pollingEnabled) {
    return;
  }
  this.pollingEnabled = false;
  this.pollGeneration++;
  if (this.pollTimer) {
    clearTimeout(this.pollTimer);
    this.pollTimer = null;
  }
  logger.info("Stopped polling");
}

/**
 * Resolve once no pass is running. Resolves false when the pass is still
 * running after timeoutMs.
 */
export async function waitForIdle(
  this: ReportProcessor,
  timeoutMs: number,
  intervalMs: number = 200,
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (this.running) {
    if (Date.now() >= deadline) {
      return false;
    }
    await sleep(intervalMs);
  }
  return true;
}
