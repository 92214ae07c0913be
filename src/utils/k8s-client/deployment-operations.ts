import * as k8s from "@kubernetes/client-node";
import { isConflict, isNotFound } from "../errors.js";
import logger from "../logger.js";
import { ApplyResult, K8sClientContext } from "./k8s-client-types.js";

export const deploymentOperations = {
  /**
   * Get a Deployment by name
   */
  async getDeployment(
    this: K8sClientContext,
    name: string,
  ): Promise<k8s.V1Deployment | null> {
    try {
      return await this.appsApi.readNamespacedDeployment({
        name,
        namespace: this.namespace,
      });
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  },

  /**
   * Create a Deployment, or replace the existing one with the same name
   */
  async applyDeployment(
    this: K8sClientContext,
    deployment: k8s.V1Deployment,
  ): Promise<ApplyResult> {
    const name = deployment.metadata?.name;
    if (!name) {
      throw new Error("Deployment manifest has no metadata.name");
    }

    try {
      await this.appsApi.createNamespacedDeployment({
        namespace: this.namespace,
        body: deployment,
      });
      logger.info(`Created deployment ${name}`);
      return "created";
    } catch (error) {
      if (!isConflict(error)) {
        throw error;
      }
    }

    await this.appsApi.replaceNamespacedDeployment({
      name,
      namespace: this.namespace,
      body: deployment,
    });
    logger.info(`Replaced deployment ${name}`);
    return "replaced";
  },

  /**
   * Point one container of a Deployment at a new image (kubectl set image)
   */
  async setImage(
    this: K8sClientContext,
    name: string,
    container: string,
    image: string,
  ): Promise<k8s.V1Deployment> {
    const deployment = await this.appsApi.readNamespacedDeployment({
      name,
      namespace: this.namespace,
    });
    const containers = deployment.spec?.template.spec?.containers ?? [];
    const target = containers.find((c) => c.name === container);
    if (!target) {
      const known = containers.map((c) => c.name).join(", ");
      throw new Error(
        `Container ${container} not found in deployment ${name} (containers: ${known})`,
      );
    }

    if (target.image === image) {
      logger.info(`Deployment ${name} already runs ${image}`);
      return deployment;
    }

    logger.info(`Updating ${name}/${container}: ${target.image} -> ${image}`);
    target.image = image;
    return this.appsApi.replaceNamespacedDeployment({
      name,
      namespace: this.namespace,
      body: deployment,
    });
  },
};
