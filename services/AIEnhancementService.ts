import { AIProviderError, OperationCancelled, errorMessage } from '../utils/errors';
import { Semaphore, sleep as defaultSleep, withTimeout } from '../utils/concurrency';
import { AIEvaluation, AIProvider } from './GeminiAIProvider';

export interface AIEnhancementOptions {
  enabled: boolean;
  model: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  maxConcurrent: number;
}

export type AIOutcome =
  | { status: 'ok'; evaluation: AIEvaluation; attempts: number }
  | { status: 'disabled' }
  | { status: 'failed'; error: AIProviderError; attempts: number };

/**
 * Wraps an AIProvider with a per-call timeout, bounded retries with exponential
 * backoff and a cap on outstanding calls. Never throws: a disabled or failed
 * evaluation is reported so the caller omits the AI sub-score.
 */
export class AIEnhancementService {
  private readonly provider: AIProvider | null;
  private readonly options: AIEnhancementOptions;
  private readonly semaphore: Semaphore;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    provider: AIProvider | null,
    options: AIEnhancementOptions,
    sleep: (ms: number) => Promise<void> = defaultSleep
  ) {
    this.provider = provider;
    this.options = options;
    this.semaphore = new Semaphore(options.maxConcurrent);
    this.sleep = sleep;
  }

  get enabled(): boolean {
    return this.options.enabled && this.provider !== null;
  }

  get model(): string {
    return this.options.model;
  }

  get inFlight(): number {
    return this.semaphore.inFlight;
  }

  async evaluate(resumeText: string, jobText: string, signal?: AbortSignal): Promise<AIOutcome> {
    const provider = this.provider;
    if (!this.options.enabled || !provider) {
      return { status: 'disabled' };
    }

    const request = { resumeText, jobText, model: this.options.model };
    let attempts = 0;
    let lastError = new AIProviderError('network', 'AI evaluation was not attempted');

    for (let retry = 0; retry <= this.options.maxRetries; retry++) {
      if (signal?.aborted) {
        return cancelled(attempts);
      }

      try {
        const evaluation = await this.semaphore.run(() => {
          // The batch may have been cancelled while this call waited for a slot.
          if (signal?.aborted) {
            return Promise.reject(new OperationCancelled());
          }
          attempts++;
          return withTimeout(
            inner => provider.evaluate(request, inner),
            this.options.timeoutMs,
            () => new AIProviderError('timeout', `AI evaluation timed out after ${this.options.timeoutMs}ms`),
            signal
          );
        });
        return { status: 'ok', evaluation, attempts };
      } catch (error) {
        if (error instanceof OperationCancelled || signal?.aborted) {
          return cancelled(attempts);
        }
        lastError = error instanceof AIProviderError ? error : new AIProviderError('network', errorMessage(error));
        if (!lastError.retryable || retry === this.options.maxRetries) {
          break;
        }
        const delay = this.options.retryBaseDelayMs * Math.pow(2, retry);
        console.warn(
          `[AIEnhancementService] ${lastError.kind} error (attempt ${attempts}/${this.options.maxRetries + 1}), retrying in ${delay}ms:`,
          lastError.message
        );
        await this.sleep(delay);
      }
    }

    console.error(`[AIEnhancementService] AI evaluation failed after ${attempts} attempt(s): ${lastError.message}`);
    return { status: 'failed', error: lastError, attempts };
  }
}

function cancelled(attempts: number): AIOutcome {
  return { status: 'failed', error: new AIProviderError('rejected', 'AI evaluation cancelled'), attempts };
}
