import type { HttpHeaders, TransportRequest } from '@rest-operations/core';
import { PollRoundError } from './errors';
import { MAX_DELAY_MS, parseRetryAfter } from './retryAfter';

export const IN_PROGRESS_STATUS = 202;
export const RETRY_AFTER_HEADER = 'Retry-After';

const CREDENTIAL_HEADERS = new Set(['authorization', 'proxy-authorization', 'cookie']);

const sameOrigin = (a: string, b: string): boolean => {
  try {
    return new URL(a).origin === new URL(b).origin;
  } catch {
    return false;
  }
};

export interface PollStrategyContext {
  /** Name of the operation being polled; poll requests carry it. */
  operation: string;
  /**
   * Statuses, besides 202, that end polling. When omitted every non-202
   * status ends polling.
   */
  terminalStatuses?: ReadonlySet<number>;
  /**
   * Headers sent with every poll request. Credential headers are only sent
   * while the poll URL shares the origin of `originalUrl`.
   */
  headers?: HttpHeaders;
  /** URL of the request that started the operation. */
  originalUrl?: string;
}

/**
 * Polling contract for one family of long-running operation conventions.
 *
 * A strategy owns the poll state of exactly one operation: the current poll
 * URL, the current delay, and whether the operation has finished. Only
 * {@link updateFrom} mutates that state, and once done a strategy stays done.
 * Strategies are not safe to drive from more than one loop at a time.
 */
export abstract class PollStrategy {
  private delayMs: number;

  protected constructor(
    protected readonly context: PollStrategyContext,
    delayInMilliseconds: number,
  ) {
    this.delayMs = Math.min(Math.max(0, delayInMilliseconds), MAX_DELAY_MS);
  }

  get operation(): string {
    return this.context.operation;
  }

  /** Delay to wait before the next poll request. */
  get delayInMilliseconds(): number {
    return this.delayMs;
  }

  /** Absolute URL the next poll request targets. */
  abstract get pollUrl(): string;

  /** Builds the next GET request against the current poll URL. */
  abstract createPollRequest(): TransportRequest;

  /**
   * Inspects a poll response and updates the poll state. Resolves with the
   * same response; rejects with {@link PollRoundError} for statuses outside
   * the accepted set.
   */
  abstract updateFrom(response: Response): Promise<Response>;

  abstract isDone(): boolean;

  /** Adopts the server's `Retry-After` hint when present; otherwise keeps the current delay. */
  protected updateDelayFrom(response: Response): void {
    const hint = parseRetryAfter(response.headers.get(RETRY_AFTER_HEADER));
    if (hint !== undefined) {
      this.delayMs = hint;
    }
  }

  protected ensureExpectedStatus(response: Response, inProgressStatuses: readonly number[]): void {
    const status = response.status;
    if (inProgressStatuses.includes(status)) return;
    const terminal = this.context.terminalStatuses;
    if (!terminal || terminal.has(status)) return;

    throw new PollRoundError(
      `Unexpected status ${status} while polling ${this.context.operation} at ${this.pollUrl}`,
      status,
      this.pollUrl,
      this.context.operation,
    );
  }

  protected createGetRequest(url: string): TransportRequest {
    const { headers = {}, originalUrl } = this.context;
    const trusted = originalUrl !== undefined && sameOrigin(url, originalUrl);
    return {
      operation: this.context.operation,
      method: 'GET',
      url,
      headers: Object.fromEntries(
        Object.entries(headers).filter(([name]) => trusted || !CREDENTIAL_HEADERS.has(name.toLowerCase())),
      ),
    };
  }
}
