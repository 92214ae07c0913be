import * as k8s from "@kubernetes/client-node";
import { deploymentOperations } from "./deployment-operations.js";
import { AppsApi, CoreApi, K8sClientContext } from "./k8s-client-types.js";
import { podOperations } from "./pod-operations.js";
import { secretOperations } from "./secret-operations.js";

/**
 * Kubernetes client wrapper for deploying and inspecting the processor
 */
export class KubernetesClient implements K8sClientContext {
  public k8sApi: CoreApi;
  public appsApi: AppsApi;
  public namespace: string;

  // Mix in the operations
  public ensureSecret: typeof secretOperations.ensureSecret;

  public getDeployment: typeof deploymentOperations.getDeployment;
  public applyDeployment: typeof deploymentOperations.applyDeployment;
  public setImage: typeof deploymentOperations.setImage;

  public listPods: typeof podOperations.listPods;
  public getLogs: typeof podOperations.getLogs;

  constructor(
    namespace: string = process.env.NAMESPACE || "default",
    apis?: { core: CoreApi; apps: AppsApi },
  ) {
    if (apis) {
      this.k8sApi = apis.core;
      this.appsApi = apis.apps;
    } else {
      const kc = new k8s.KubeConfig();
      kc.loadFromDefault();
      this.k8sApi = kc.makeApiClient(k8s.CoreV1Api);
      this.appsApi = kc.makeApiClient(k8s.AppsV1Api);
    }
    this.namespace = namespace;

    this.ensureSecret = secretOperations.ensureSecret.bind(this);

    // Bind deployment operations
    this.getDeployment = deploymentOperations.getDeployment.bind(this);
    this.applyDeployment = deploymentOperations.applyDeployment.bind(this);
    this.setImage = deploymentOperations.setImage.bind(this);

    // Bind pod operations
    this.listPods = podOperations.listPods.bind(this);
    this.getLogs = podOperations.getLogs.bind(this);
  }
}
