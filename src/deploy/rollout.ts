import * as k8s from "@kubernetes/client-node";
import { setTimeout as sleep } from "timers/promises";
import { RolloutTimeoutError } from "../utils/errors.js";
import logger from "../utils/logger.js";

export type RolloutState =
  | { state: "done"; message: string }
  | { state: "waiting"; message: string }
  | { state: "failed"; message: string };

/**
 * Rollout progress of a Deployment, phrased the way kubectl rollout status
 * reports it
 */
export function evaluateRollout(deployment: k8s.V1Deployment): RolloutState {
  const name = deployment.metadata?.name ?? "";
  const generation = deployment.metadata?.generation ?? 0;
  const status: k8s.V1DeploymentStatus = deployment.status ?? {};

  if (generation > (status.observedGeneration ?? 0)) {
    return {
      state: "waiting",
      message: "Waiting for deployment spec update to be observed...",
    };
  }

  const progressing = status.conditions?.find((c) => c.type === "Progressing");
  if (progressing?.reason === "ProgressDeadlineExceeded") {
    return {
      state: "failed",
      message: `deployment "${name}" exceeded its progress deadline`,
    };
  }

  const desired = deployment.spec?.replicas;
  const updated = status.updatedReplicas ?? 0;
  const replicas = status.replicas ?? 0;
  const available = status.availableReplicas ?? 0;

  if (desired !== undefined && updated < desired) {
    return {
      state: "waiting",
      message: `Waiting for deployment "${name}" rollout to finish: ${updated} out of ${desired} new replicas have been updated...`,
    };
  }
  if (replicas > updated) {
    return {
      state: "waiting",
      message: `Waiting for deployment "${name}" rollout to finish: ${replicas - updated} old replicas are pending termination...`,
    };
  }
  if (available < updated) {
    return {
      state: "waiting",
      message: `Waiting for deployment "${name}" rollout to finish: ${available} of ${updated} updated replicas are available...`,
    };
  }
  return {
    state: "done",
    message: `deployment "${name}" successfully rolled out`,
  };
}

export interface RolloutWatchOptions {
  timeoutMs?: number;
  intervalMs?: number;
  onProgress?: (message: string) => void;
}

/**
 * Poll a Deployment until its rollout finishes (kubectl rollout status)
 */
export async function waitForRollout(
  client: { getDeployment(name: string): Promise<k8s.V1Deployment | null> },
  name: string,
  options: RolloutWatchOptions = {},
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? 300_000;
  const intervalMs = options.intervalMs ?? 2_000;
  const deadline = Date.now() + timeoutMs;
  let lastMessage = "";

  for (;;) {
    const deployment = await client.getDeployment(name);
    if (!deployment) {
      throw new Error(`deployment "${name}" not found`);
    }

    const result = evaluateRollout(deployment);
    if (result.message !== lastMessage) {
      lastMessage = result.message;
      if (options.onProgress) {
        options.onProgress(result.message);
      } else {
        logger.info(result.message);
      }
    }

    if (result.state === "done") return result.message;
    if (result.state === "failed") throw new Error(result.message);

    if (Date.now() >= deadline) {
      throw new RolloutTimeoutError(name, lastMessage);
    }
    await sleep(intervalMs);
  }
}
