import * as k8s from "@kubernetes/client-node";
import { K8sClientContext, PodSummary } from "./k8s-client-types.js";

export function summarizePod(pod: k8s.V1Pod): PodSummary {
  const statuses = pod.status?.containerStatuses ?? [];
  const total = pod.spec?.containers.length ?? statuses.length;
  const ready = statuses.filter((s) => s.ready).length;

  return {
    name: pod.metadata?.name ?? "",
    phase: pod.status?.phase ?? "Unknown",
    ready: `${ready}/${total}`,
    restarts: statuses.reduce((sum, s) => sum + s.restartCount, 0),
    image: pod.spec?.containers[0]?.image,
  };
}

export const podOperations = {
  /**
   * List Pods, optionally by label selector (kubectl get pods)
   */
  async listPods(
    this: K8sClientContext,
    labelSelector?: string,
  ): Promise<PodSummary[]> {
    const response = await this.k8sApi.listNamespacedPod({
      namespace: this.namespace,
      labelSelector,
    });
    return response.items.map(summarizePod);
  },

  /**
   * Read a Pod's log (kubectl logs)
   */
  async getLogs(
    this: K8sClientContext,
    name: string,
    options: { container?: string; tailLines?: number } = {},
  ): Promise<string> {
    return this.k8sApi.readNamespacedPodLog({
      name,
      namespace: this.namespace,
      container: options.container,
      tailLines: options.tailLines,
    });
  },
};
