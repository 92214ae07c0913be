import { Command, InvalidArgumentError } from "commander";
import * as k8s from "@kubernetes/client-node";
import { ApplyResult, PodSummary } from "../utils/k8s-client/k8s-client-types.js";
import {
  APP_NAME,
  DEFAULT_SECRET_NAME,
  SECRET_ENV_KEYS,
  createDeploymentManifest,
  plainEnvFrom,
} from "./manifest.js";
import { waitForRollout } from "./rollout.js";

// The operations the CLI needs from a Kubernetes client
export interface DeployClient {
  ensureSecret(name: string, data: Record<string, string>): Promise<ApplyResult>;
  getDeployment(name: string): Promise<k8s.V1Deployment | null>;
  applyDeployment(deployment: k8s.V1Deployment): Promise<ApplyResult>;
  setImage(
    name: string,
    container: string,
    image: string,
  ): Promise<k8s.V1Deployment>;
  listPods(labelSelector?: string): Promise<PodSummary[]>;
  getLogs(
    name: string,
    options?: { container?: string; tailLines?: number },
  ): Promise<string>;
}

export interface CliDeps {
  clientFor(namespace: string): DeployClient;
  env: NodeJS.ProcessEnv;
  print(line: string): void;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}

/**
 * Split "container=image" as accepted by kubectl set image
 */
export function parseImageAssignment(value: string): {
  container: string;
  image: string;
} {
  const eq = value.indexOf("=");
  if (eq <= 0 || eq === value.length - 1) {
    throw new Error(`Expected <container>=<image>, got "${value}"`);
  }
  return { container: value.slice(0, eq), image: value.slice(eq + 1) };
}

/**
 * Collect secret values from the environment. Without explicit keys, the
 * credential settings that are present are used.
 */
export function secretDataFrom(
  env: NodeJS.ProcessEnv,
  keys?: string[],
): Record<string, string> {
  const data: Record<string, string> = {};
  if (keys && keys.length > 0) {
    for (const key of keys) {
      const value = env[key];
      if (!value) {
        throw new Error(`Environment variable ${key} is not set`);
      }
      data[key] = value;
    }
    return data;
  }

  for (const key of SECRET_ENV_KEYS) {
    const value = env[key];
    if (value) data[key] = value;
  }
  if (Object.keys(data).length === 0) {
    throw new Error(
      `No secret values found; set one of ${SECRET_ENV_KEYS.join(", ")}`,
    );
  }
  return data;
}

export function formatPods(pods: PodSummary[]): string[] {
  const rows = [["NAME", "READY", "STATUS", "RESTARTS"]];
  for (const pod of pods) {
    rows.push([pod.name, pod.ready, pod.phase, `${pod.restarts}`]);
  }
  const widths = rows[0].map((_, col) =>
    Math.max(...rows.map((row) => row[col].length)),
  );
  return rows.map((row) =>
    row
      .map((cell, col) => (col === row.length - 1 ? cell : cell.padEnd(widths[col] + 3)))
      .join(""),
  );
}

/**
 * Build the file-processor-deploy command line program
 */
export function createDeployProgram(deps: CliDeps): Command {
  const program = new Command();
  program
    .name("file-processor-deploy")
    .description("Deploy and operate the file processor on Kubernetes")
    .option(
      "-n, --namespace <ns>",
      "Kubernetes namespace",
      deps.env.NAMESPACE || "default",
    );

  const client = () => deps.clientFor(program.opts<{ namespace: string }>().namespace);

  program
    .command("secret")
    .description("Create or replace the processor's secret from environment variables")
    .argument("[name]", "secret name", DEFAULT_SECRET_NAME)
    .option("--from-env <keys...>", "environment variables to store")
    .action(async (name: string, opts: { fromEnv?: string[] }) => {
      const data = secretDataFrom(deps.env, opts.fromEnv);
      const result = await client().ensureSecret(name, data);
      deps.print(`secret/${name} ${result} (${Object.keys(data).join(", ")})`);
    });

  program
    .command("apply")
    .description("Create or replace the processor Deployment")
    .requiredOption("--image <image>", "container image")
    .option("--name <name>", "deployment name", APP_NAME)
    .option("--replicas <n>", "replica count", parsePositiveInt, 1)
    .option("--secret <name>", "secret providing credentials", DEFAULT_SECRET_NAME)
    .action(
      async (opts: {
        image: string;
        name: string;
        replicas: number;
        secret: string;
      }) => {
        const manifest = createDeploymentManifest({
          image: opts.image,
          name: opts.name,
          replicas: opts.replicas,
          secretName: opts.secret,
          env: plainEnvFrom(deps.env),
        });
        const result = await client().applyDeployment(manifest);
        deps.print(`deployment.apps/${opts.name} ${result}`);
      },
    );

  program
    .command("set-image")
    .description("Update the image of a deployment container")
    .argument("<deployment>", "deployment name")
    .argument("<assignment>", "<container>=<image>")
    .action(async (deployment: string, assignment: string) => {
      const { container, image } = parseImageAssignment(assignment);
      await client().setImage(deployment, container, image);
      deps.print(`deployment.apps/${deployment} image updated`);
    });

  program
    .command("rollout-status")
    .description("Wait until a deployment finishes rolling out")
    .argument("[deployment]", "deployment name", APP_NAME)
    .option("--timeout <seconds>", "give up after this many seconds", parsePositiveInt, 300)
    .action(async (deployment: string, opts: { timeout: number }) => {
      await waitForRollout(client(), deployment, {
        timeoutMs: opts.timeout * 1000,
        onProgress: deps.print,
      });
    });

  program
    .command("pods")
    .description("List pods")
    .option("-l, --selector <selector>", "label selector", `app=${APP_NAME}`)
    .action(async (opts: { selector: string }) => {
      const pods = await client().listPods(opts.selector);
      if (pods.length === 0) {
        deps.print("No resources found.");
        return;
      }
      formatPods(pods).forEach((line) => deps.print(line));
    });

  program
    .command("logs")
    .description("Print a pod's log")
    .argument("<pod>", "pod name")
    .option("-c, --container <name>", "container name")
    .option("--tail <lines>", "number of lines from the end", parsePositiveInt)
    .action(
      async (pod: string, opts: { container?: string; tail?: number }) => {
        const log = await client().getLogs(pod, {
          container: opts.container,
          tailLines: opts.tail,
        });
        deps.print(log.replace(/\n$/, ""));
      },
    );

  return program;
}
