import { Logger } from "../core/logger.js";
import { DeliveryFailedError, PermanentError, ThrottleError, errorMessage } from "../core/errors.js";
import { systemClock, type Clock } from "../core/utils.js";
import type { ChatId, DeliveredMessage, MessageRef, MessagingProvider } from "../types.js";
import type { RateLimiter } from "./rateLimiter.js";

export interface ForwarderOptions {
  maxRetries: number;
  acquireTimeoutMs: number;
  throttleMarginMs: number;
  backoffBaseMs: number;
  exhaustedBackoffMs: number;
}

export class Forwarder {
  private readonly logger = new Logger("forwarder");

  constructor(
    private readonly provider: MessagingProvider,
    private readonly limiter: RateLimiter,
    private readonly options: ForwarderOptions,
    private readonly clock: Clock = systemClock
  ) {}

  /** Takes a token for a send that is not a copy; an empty bucket delays it but never drops it. */
  async pace(): Promise<boolean> {
    const gotToken = await this.limiter.acquire(this.options.acquireTimeoutMs);
    if (!gotToken) {
      await this.clock.sleep(this.options.exhaustedBackoffMs);
    }
    return gotToken;
  }

  async forward(source: MessageRef, destination: ChatId): Promise<DeliveredMessage> {
    const { maxRetries } = this.options;
    let lastError: unknown = null;

    for (let attempt = 0; attempt < maxRetries; attempt += 1) {
      const gotToken = await this.limiter.acquire(this.options.acquireTimeoutMs);
      if (!gotToken) {
        // the bucket only paces; an empty one delays the copy but never drops it
        await this.clock.sleep(this.options.exhaustedBackoffMs * 2 ** attempt);
      }

      try {
        return await this.provider.deliverCopy(source, destination);
      } catch (err) {
        lastError = err;

        if (err instanceof ThrottleError) {
          const waitMs = err.retryAfterSec * 1000 + this.options.throttleMarginMs;
          this.logger.warn("provider throttled copy", { destination, attempt: attempt + 1, waitMs });
          if (attempt === maxRetries - 1) {
            break;
          }
          await this.clock.sleep(waitMs);
          continue;
        }

        if (err instanceof PermanentError) {
          this.logger.warn("destination rejected copy", { destination, error: err.message });
          throw new DeliveryFailedError(destination, attempt + 1, { cause: err });
        }

        this.logger.warn("copy failed", { destination, attempt: attempt + 1, error: errorMessage(err) });
        if (attempt === maxRetries - 1) {
          break;
        }
        await this.clock.sleep(this.options.backoffBaseMs * (attempt + 1));
      }
    }

    this.logger.error("copy retries exhausted", { destination, attempts: maxRetries, error: errorMessage(lastError) });
    throw new DeliveryFailedError(destination, maxRetries, { cause: lastError });
  }
}
