import * as k8s from "@kubernetes/client-node";

export type CoreApi = Pick<
  k8s.CoreV1Api,
  | "createNamespacedSecret"
  | "replaceNamespacedSecret"
  | "listNamespacedPod"
  | "readNamespacedPodLog"
>;

export type AppsApi = Pick<
  k8s.AppsV1Api,
  | "readNamespacedDeployment"
  | "createNamespacedDeployment"
  | "replaceNamespacedDeployment"
>;

// Interface for the Kubernetes client context (used as 'this')
export interface K8sClientContext {
  namespace: string;
  k8sApi: CoreApi;
  appsApi: AppsApi;
}

export type ApplyResult = "created" | "replaced";

export interface PodSummary {
  name: string;
  phase: string;
  ready: string;
  restarts: number;
  image?: string;
}
