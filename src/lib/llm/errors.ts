export class ProviderError extends Error {
  readonly provider: string;
  readonly status: number | undefined;
  /** True when the same request may succeed if sent again */
  readonly transient: boolean;

  constructor(
    provider: string,
    message: string,
    options: { status?: number; transient: boolean; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.provider = provider;
    this.status = options.status;
    this.transient = options.transient;
  }
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const TRANSPORT_ERROR_NAMES = new Set([
  "AbortError",
  "TimeoutError",
  "APIConnectionError",
  "APIConnectionTimeoutError",
  "APIUserAbortError",
]);

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value === "object" && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

/**
 * Transport-level failures carry no HTTP status: SDK connection errors
 * (a `status` key holding undefined), aborted or timed-out fetches, and
 * Node socket errors, possibly wrapped as the `cause` of a fetch TypeError.
 */
function isTransportFailure(error: unknown, depth = 0): boolean {
  if (typeof error !== "object" || error === null || depth > 3) return false;

  if ("status" in error && readProperty(error, "status") === undefined) return true;

  const name = readProperty(error, "name");
  if (typeof name === "string" && TRANSPORT_ERROR_NAMES.has(name)) return true;

  const code = readProperty(error, "code");
  if (typeof code === "string" && NETWORK_ERROR_CODES.has(code)) return true;

  return isTransportFailure(readProperty(error, "cause"), depth + 1);
}

/**
 * Maps anything a provider SDK throws onto a ProviderError.
 */
export function toProviderError(provider: string, error: unknown, label = provider): ProviderError {
  if (error instanceof ProviderError) return error;

  const message = `${label} API error: ${error instanceof Error ? error.message : String(error)}`;
  const status = readProperty(error, "status");

  if (typeof status === "number") {
    return new ProviderError(provider, message, {
      status,
      transient: isTransientStatus(status),
      cause: error,
    });
  }

  return new ProviderError(provider, message, {
    transient: isTransportFailure(error),
    cause: error,
  });
}
