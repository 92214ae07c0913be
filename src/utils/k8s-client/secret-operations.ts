import * as k8s from "@kubernetes/client-node";
import { isConflict } from "../errors.js";
import logger from "../logger.js";
import { ApplyResult, K8sClientContext } from "./k8s-client-types.js";

export const secretOperations = {
  /**
   * Create an Opaque secret, or replace it when it already exists
   * (kubectl create secret generic)
   */
  async ensureSecret(
    this: K8sClientContext,
    name: string,
    data: Record<string, string>,
  ): Promise<ApplyResult> {
    const body: k8s.V1Secret = {
      apiVersion: "v1",
      kind: "Secret",
      metadata: { name, namespace: this.namespace },
      type: "Opaque",
      stringData: data,
    };

    try {
      await this.k8sApi.createNamespacedSecret({
        namespace: this.namespace,
        body,
      });
      logger.info(`Created secret ${name}`);
      return "created";
    } catch (error) {
      if (!isConflict(error)) {
        throw error;
      }
    }

    await this.k8sApi.replaceNamespacedSecret({
      name,
      namespace: this.namespace,
      body,
    });
    logger.info(`Secret ${name} already exists, replaced it`);
    return "replaced";
  },
};
