#!/usr/bin/env node
import dotenv from "dotenv";
import { createDeployProgram } from "./deploy/cli.js";
import { errorMessage } from "./utils/errors.js";
import { KubernetesClient } from "./utils/k8s-client/index.js";
import logger from "./utils/logger.js";

// Secret values come from the operator's environment or a local .env
dotenv.config();

const program = createDeployProgram({
  clientFor: (namespace) => new KubernetesClient(namespace),
  env: process.env,
  print: (line) => console.log(line),
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(errorMessage(error));
  process.exitCode = 1;
});
