import * as k8s from "@kubernetes/client-node";

export const APP_NAME = "file-processor";
export const DEFAULT_SECRET_NAME = "file-processor-secrets";

// Settings that hold credentials and must travel in the secret
export const SECRET_ENV_KEYS = ["SEARCH_KEY", "STORAGE_CONN_STRING"] as const;

// Settings copied into the Deployment as plain env vars when set
export const PLAIN_ENV_KEYS = [
  "SEARCH_ENDPOINT",
  "INDEX_NAME",
  "STORAGE_ACCOUNT",
  "AZURE_CLIENT_ID",
  "FILESHARE_NAME",
  "DIRECTORY_PATH",
  "POLL_INTERVAL",
  "PROCESSED_FOLDER",
  "ERROR_FOLDER",
  "FILE_EXTENSION",
  "LOG_LEVEL",
] as const;

export interface DeploymentOptions {
  image: string;
  name?: string;
  replicas?: number;
  secretName?: string;
  env?: Record<string, string>;
  port?: number;
  cpu?: string;
  memory?: string;
}

/**
 * Pick the plain (non-secret) settings from an environment
 */
export function plainEnvFrom(
  source: NodeJS.ProcessEnv,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of PLAIN_ENV_KEYS) {
    const value = source[key];
    if (value !== undefined && value !== "") {
      env[key] = value;
    }
  }
  return env;
}

/**
 * Create the Deployment manifest for the processor
 */
export function createDeploymentManifest(
  options: DeploymentOptions,
): k8s.V1Deployment {
  const name = options.name || APP_NAME;
  const port = options.port ?? 8080;
  const cpu = options.cpu || "100m";
  const memory = options.memory || "256Mi";
  const labels = { app: name };

  const env: k8s.V1EnvVar[] = Object.entries(options.env ?? {}).map(
    ([key, value]) => ({ name: key, value }),
  );
  env.push({ name: "HTTP_PORT", value: `${port}` });

  return {
    apiVersion: "apps/v1",
    kind: "Deployment",
    metadata: { name, labels },
    spec: {
      replicas: options.replicas ?? 1,
      selector: { matchLabels: labels },
      template: {
        metadata: { labels },
        spec: {
          containers: [
            {
              name,
              image: options.image,
              imagePullPolicy: "IfNotPresent",
              ports: [{ name: "http", containerPort: port }],
              env,
              envFrom: [
                {
                  secretRef: {
                    name: options.secretName || DEFAULT_SECRET_NAME,
                  },
                },
              ],
              resources: {
                requests: { cpu, memory },
                limits: { cpu, memory },
              },
              livenessProbe: {
                httpGet: { path: "/healthz", port: "http" },
                initialDelaySeconds: 10,
                periodSeconds: 30,
              },
              readinessProbe: {
                httpGet: { path: "/readyz", port: "http" },
                initialDelaySeconds: 5,
                periodSeconds: 10,
              },
            },
          ],
        },
      },
    },
  };
}
