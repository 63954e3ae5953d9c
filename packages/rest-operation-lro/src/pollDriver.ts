import { discardBody, errorMessage, type HttpTransport, type Logger, type TransportRequest } from '@rest-operations/core';
import type { PollStrategy } from './PollStrategy';

export interface PollRound {
  /** 1-based index of the poll request. */
  attempt: number;
  request: TransportRequest;
  response: Response;
  /** Delay that was waited before this request. */
  delayMs: number;
  done: boolean;
}

export interface PollSummary {
  operation: string;
  attempts: number;
  pollUrl: string;
  status?: number;
  durationMs: number;
}

export interface PollObserver {
  onStart?(ctx: { operation: string; pollUrl: string; delayMs: number }): void | Promise<void>;
  onPoll?(round: PollRound): void | Promise<void>;
  onComplete?(summary: PollSummary): void | Promise<void>;
}

export type Sleep = (ms: number) => Promise<void>;

export interface PollOptions {
  transport: HttpTransport;
  logger?: Logger;
  observer?: PollObserver;
  /** Waits between rounds; defaults to a timer. */
  sleep?: Sleep;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Drives a strategy one round at a time, yielding every poll round and
 * returning the last poll response once the strategy reports done. The body
 * of an in-progress response is readable until the consumer asks for the
 * next round; after that it is cancelled. Rounds are
 * strictly sequential: a request is only sent after the previous response has
 * been applied to the strategy.
 */
export async function* pollStream(
  strategy: PollStrategy,
  options: PollOptions,
): AsyncGenerator<PollRound, Response | undefined, void> {
  const { transport, logger, observer } = options;
  const sleep = options.sleep ?? defaultSleep;
  const operation = strategy.operation;
  const startedAt = Date.now();
  let attempt = 0;
  let last: Response | undefined;

  await notify(logger, operation, () =>
    observer?.onStart?.({ operation, pollUrl: strategy.pollUrl, delayMs: strategy.delayInMilliseconds }),
  );

  while (!strategy.isDone()) {
    const delayMs = strategy.delayInMilliseconds;
    await sleep(delayMs);

    attempt += 1;
    const request = strategy.createPollRequest();
    logger?.debug('lro.poll.attempt', { operation, url: request.url, attempt, delayMs });

    let response: Response;
    try {
      response = await strategy.updateFrom(await transport(request));
    } catch (error) {
      logger?.error('lro.poll.failed', { operation, url: request.url, attempt, error: errorMessage(error) });
      throw error;
    }

    last = response;
    const round: PollRound = { attempt, request, response, delayMs, done: strategy.isDone() };
    await notify(logger, operation, () => observer?.onPoll?.(round));
    try {
      yield round;
    } finally {
      // Only the final response is handed back; release intermediate ones.
      if (!round.done) {
        await discardBody(response);
      }
    }
  }

  const summary: PollSummary = {
    operation,
    attempts: attempt,
    pollUrl: strategy.pollUrl,
    status: last?.status,
    durationMs: Date.now() - startedAt,
  };
  logger?.info('lro.poll.complete', { ...summary });
  await notify(logger, operation, () => observer?.onComplete?.(summary));
  return last;
}

/** Polls until the strategy is done and resolves with the final poll response. */
export async function pollUntilDone(strategy: PollStrategy, options: PollOptions): Promise<Response> {
  const runner = pollStream(strategy, options);
  let next = await runner.next();
  while (!next.done) {
    next = await runner.next();
  }
  if (!next.value) {
    throw new Error(`Poll strategy for ${strategy.operation} finished before any poll request was sent`);
  }
  return next.value;
}

async function notify(
  logger: Logger | undefined,
  operation: string,
  callback: () => void | Promise<void> | undefined,
): Promise<void> {
  try {
    await callback();
  } catch (error) {
    logger?.warn('lro.observer.error', { operation, error: errorMessage(error) });
  }
}
