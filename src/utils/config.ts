import { z } from "zod";
import { AppConfig } from "../models/types.js";
import { ConfigError } from "./errors.js";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z
  .object({
    SEARCH_ENDPOINT: z.string().url(),
    SEARCH_KEY: optionalString,
    INDEX_NAME: z.string().min(1).default("testreports"),
    STORAGE_CONN_STRING: optionalString,
    STORAGE_ACCOUNT: optionalString,
    AZURE_CLIENT_ID: optionalString,
    FILESHARE_NAME: z.string().min(1),
    DIRECTORY_PATH: z.string().default(""),
    POLL_INTERVAL: z.coerce.number().int().positive().default(60),
    PROCESSED_FOLDER: z.string().min(1).default("processed"),
    ERROR_FOLDER: z.string().min(1).default("error"),
    FILE_EXTENSION: z.string().min(1).default(".html"),
    HTTP_PORT: z.coerce.number().int().positive().default(8080),
  })
  .refine((env) => env.STORAGE_CONN_STRING || env.STORAGE_ACCOUNT, {
    message: "either STORAGE_CONN_STRING or STORAGE_ACCOUNT must be set",
    path: ["STORAGE_CONN_STRING"],
  });

function trimSlashes(path: string): string {
  return path.replace(/^\/+|\/+$/g, "");
}

// Routing a report into the folder it was read from would delete it
function checkFolders(directoryPath: string, folders: Record<string, string>) {
  const issues: string[] = [];
  for (const [key, folder] of Object.entries(folders)) {
    if (!folder) {
      issues.push(`${key}: must not be the share root`);
    } else if (folder === directoryPath) {
      issues.push(`${key}: must differ from DIRECTORY_PATH`);
    }
  }
  if (issues.length > 0) {
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
  }
}

/**
 * Build the service configuration from environment variables
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const vars = parsed.data;

  let storage: AppConfig["storage"];
  if (vars.STORAGE_CONN_STRING) {
    storage = {
      kind: "connection-string",
      connectionString: vars.STORAGE_CONN_STRING,
      shareName: vars.FILESHARE_NAME,
    };
  } else if (vars.STORAGE_ACCOUNT) {
    storage = {
      kind: "managed-identity",
      accountName: vars.STORAGE_ACCOUNT,
      shareName: vars.FILESHARE_NAME,
    };
  } else {
    throw new ConfigError(
      "Invalid configuration: either STORAGE_CONN_STRING or STORAGE_ACCOUNT must be set",
    );
  }

  const directoryPath = trimSlashes(vars.DIRECTORY_PATH);
  const processedFolder = trimSlashes(vars.PROCESSED_FOLDER);
  const errorFolder = trimSlashes(vars.ERROR_FOLDER);
  checkFolders(directoryPath, {
    PROCESSED_FOLDER: processedFolder,
    ERROR_FOLDER: errorFolder,
  });

  return {
    search: {
      endpoint: vars.SEARCH_ENDPOINT,
      indexName: vars.INDEX_NAME,
      apiKey: vars.SEARCH_KEY,
    },
    storage,
    managedIdentityClientId: vars.AZURE_CLIENT_ID,
    processor: {
      directoryPath,
      processedFolder,
      errorFolder,
      fileExtension: vars.FILE_EXTENSION,
      pollIntervalSeconds: vars.POLL_INTERVAL,
    },
    httpPort: vars.HTTP_PORT,
  };
}
