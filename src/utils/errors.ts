function statusOf(error: unknown): number | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  if (
    "response" in error &&
    typeof error.response === "object" &&
    error.response !== null &&
    "statusCode" in error.response &&
    typeof error.response.statusCode === "number"
  ) {
    return error.response.statusCode;
  }
  // @kubernetes/client-node ApiException carries the HTTP status in `code`
  if ("code" in error && typeof error.code === "number") {
    return error.code;
  }
  return undefined;
}

/**
 * True for a 404 from Azure (RestError) or Kubernetes (ApiException)
 */
export function isNotFound(error: unknown): boolean {
  return statusOf(error) === 404;
}

/**
 * True for a 409 from Azure or Kubernetes
 */
export function isConflict(error: unknown): boolean {
  return statusOf(error) === 409;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class IndexingError extends Error {
  constructor(
    public readonly key: string,
    detail: string,
  ) {
    super(`Failed to index document ${key}: ${detail}`);
    this.name = "IndexingError";
  }
}

export class RolloutTimeoutError extends Error {
  constructor(
    public readonly deployment: string,
    public readonly lastMessage: string,
  ) {
    super(`Timed out waiting for rollout of ${deployment}: ${lastMessage}`);
    this.name = "RolloutTimeoutError";
  }
}
