import { silentLogger, type ILogger } from "../logging";
import { ProviderError, toProviderError } from "./errors";
import type {
  FallbackSource,
  GenerateOptions,
  GenerationClientConfig,
  GenerationResult,
  LLMAttemptLog,
  LLMRequest,
  LLMResponse,
} from "./types";

export interface GenerationClientDeps {
  fallbacks: FallbackSource;
  logger?: ILogger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

type FallbackReason = "retries_exhausted" | "deadline";

// attempt(n) → done | retry | fallback | failed
type GenerationState =
  | { kind: "attempt"; n: number }
  | { kind: "retry"; n: number; delayMs: number }
  | { kind: "done"; response: LLMResponse }
  | { kind: "fallback"; reason: FallbackReason }
  | { kind: "failed"; error: ProviderError };

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class GenerationClient {
  private config: GenerationClientConfig;
  private fallbacks: FallbackSource;
  private logger: ILogger;
  private now: () => number;
  private sleep: (ms: number) => Promise<void>;

  constructor(config: GenerationClientConfig, deps: GenerationClientDeps) {
    this.config = config;
    this.fallbacks = deps.fallbacks;
    this.logger = (deps.logger ?? silentLogger).child({ component: "llm.generation" });
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? delay;
  }

  /**
   * Sends the request, retrying transient failures with exponential backoff.
   * Resolves with fallback text once retries or the deadline run out; never
   * rejects.
   */
  async generate(request: LLMRequest, options: GenerateOptions): Promise<GenerationResult> {
    const start = this.now();
    const deadlineAt = options.deadlineAt ?? Number.POSITIVE_INFINITY;
    const attempts: LLMAttemptLog[] = [];
    let state: GenerationState = { kind: "attempt", n: 0 };

    for (;;) {
      switch (state.kind) {
        case "attempt":
          state = await this.attempt(state.n, request, deadlineAt, attempts);
          break;

        case "retry":
          await this.sleep(state.delayMs);
          state = { kind: "attempt", n: state.n };
          break;

        case "done": {
          const latencyMs = this.now() - start;
          this.logger.info("Generation succeeded", {
            attempts: attempts.length,
            model: state.response.model,
            latencyMs,
          });
          return {
            success: true,
            text: {
              content: state.response.content,
              source: "generated",
              model: state.response.model,
              latencyMs,
              attempts,
            },
          };
        }

        case "fallback":
          return this.fallback(state.reason, options.domain, start, attempts);

        case "failed": {
          const latencyMs = this.now() - start;
          this.logger.error("Generation failed with a permanent error", state.error, {
            attempts: attempts.length,
            status: state.error.status,
            latencyMs,
          });
          return {
            success: false,
            code: "PERMANENT_PROVIDER_ERROR",
            error: state.error.message,
            attempts,
            latencyMs,
          };
        }
      }
    }
  }

  private async attempt(
    n: number,
    request: LLMRequest,
    deadlineAt: number,
    attempts: LLMAttemptLog[]
  ): Promise<GenerationState> {
    const provider = this.config.provider;
    const remaining = deadlineAt - this.now();
    if (remaining <= 0) {
      return { kind: "fallback", reason: "deadline" };
    }

    const timeoutMs = Math.min(this.config.attemptTimeoutMs, remaining);
    const attemptStart = this.now();

    try {
      const response = await this.callWithTimeout(request, timeoutMs);
      const log: LLMAttemptLog = {
        attempt: n,
        provider: provider.name,
        model: response.model,
        latencyMs: this.now() - attemptStart,
        success: true,
      };
      attempts.push(log);
      this.logger.debug("Generation attempt succeeded", { ...log });
      return { kind: "done", response };
    } catch (caught) {
      const error = toProviderError(provider.name, caught);
      const log: LLMAttemptLog = {
        attempt: n,
        provider: provider.name,
        model: "unknown",
        latencyMs: this.now() - attemptStart,
        success: false,
        transient: error.transient,
        status: error.status,
        error: error.message,
      };
      attempts.push(log);
      this.logger.warn("Generation attempt failed", { ...log });

      if (!error.transient) {
        return { kind: "failed", error };
      }
      if (n >= this.config.maxRetries) {
        return { kind: "fallback", reason: "retries_exhausted" };
      }

      const delayMs = this.config.baseDelayMs * 2 ** n;
      if (this.now() + delayMs >= deadlineAt) {
        return { kind: "fallback", reason: "deadline" };
      }
      return { kind: "retry", n: n + 1, delayMs };
    }
  }

  /**
   * Enforces the per-attempt bound even if the provider ignores its signal.
   */
  private callWithTimeout(request: LLMRequest, timeoutMs: number): Promise<LLMResponse> {
    const provider = this.config.provider;
    const controller = new AbortController();

    return new Promise<LLMResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(
          new ProviderError(provider.name, `${provider.name} attempt timed out after ${timeoutMs}ms`, {
            transient: true,
          })
        );
      }, timeoutMs);

      provider.call(request, { timeoutMs, signal: controller.signal }).then(
        (response) => {
          clearTimeout(timer);
          resolve(response);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private fallback(
    reason: FallbackReason,
    domain: string,
    start: number,
    attempts: LLMAttemptLog[]
  ): GenerationResult {
    const latencyMs = this.now() - start;
    const content = this.fallbacks.render(domain);

    if (content === null) {
      this.logger.error("Generation unavailable and no fallback template exists", undefined, {
        reason,
        domain,
        attempts: attempts.length,
        latencyMs,
      });
      return {
        success: false,
        code: "FALLBACK_UNAVAILABLE",
        error: `No fallback template for domain "${domain}"`,
        attempts,
        latencyMs,
      };
    }

    this.logger.error("Generation unavailable; serving fallback template", undefined, {
      reason,
      domain,
      attempts: attempts.length,
      latencyMs,
    });
    return {
      success: true,
      text: { content, source: "fallback", model: "fallback-template", latencyMs, attempts },
    };
  }
}
