import {
  discardBody,
  type HttpHeaders,
  type Logger,
  type OperationDescriptor,
  type OperationDispatcher,
} from '@rest-operations/core';
import { pollUntilDone, type PollObserver, type Sleep } from './pollDriver';
import { DEFAULT_POLL_STRATEGY_FACTORIES, selectPollStrategy, type PollStrategyFactory } from './selectPollStrategy';

export const DEFAULT_POLL_DELAY_MS = 30_000;

// Poll requests are body-less GETs. Credentials are dropped per poll URL by the strategy.
const pollHeaders = (headers: HttpHeaders): HttpHeaders =>
  Object.fromEntries(Object.entries(headers).filter(([name]) => name.toLowerCase() !== 'content-type'));

export interface LongRunningOptions {
  /** Delay before the first poll and until the server sends a hint. */
  initialDelayMs?: number;
  factories?: readonly PollStrategyFactory[];
  /**
   * Fail a poll round with PollRoundError when its status is neither 202 nor
   * one of the descriptor's expected statuses. By default any non-202 status
   * ends polling and the final response is interpreted as usual.
   */
  strictPollStatuses?: boolean;
  logger?: Logger;
  observer?: PollObserver;
  sleep?: Sleep;
}

/**
 * Sends an operation once and, when the service answers with a recognised
 * long-running convention, polls until the operation finishes. Resolves with
 * the final response decoded by the descriptor's success body.
 *
 * The descriptor must list 202 among its expected statuses for an
 * in-progress answer to be accepted.
 */
export async function executeLongRunning<TArgs, TResult>(
  dispatcher: OperationDispatcher,
  descriptor: OperationDescriptor<TArgs, TResult>,
  args: TArgs,
  options: LongRunningOptions = {},
): Promise<TResult> {
  const request = dispatcher.createRequest(descriptor, args);
  const initialResponse = await dispatcher.send(request);

  if (!descriptor.expectedStatuses.has(initialResponse.status)) {
    return dispatcher.interpret(descriptor, initialResponse);
  }

  const strategy = selectPollStrategy(
    request,
    initialResponse,
    {
      delayInMilliseconds: options.initialDelayMs ?? DEFAULT_POLL_DELAY_MS,
      context: {
        operation: descriptor.name,
        terminalStatuses: options.strictPollStatuses ? descriptor.expectedStatuses : undefined,
        headers: pollHeaders(request.headers),
        originalUrl: request.url,
      },
    },
    options.factories ?? DEFAULT_POLL_STRATEGY_FACTORIES,
  );

  if (!strategy) {
    return dispatcher.interpret(descriptor, initialResponse);
  }

  await discardBody(initialResponse);
  options.logger?.info('lro.poll.start', {
    operation: descriptor.name,
    url: strategy.pollUrl,
    status: initialResponse.status,
  });

  const finalResponse = await pollUntilDone(strategy, {
    transport: (pollRequest) => dispatcher.send(pollRequest),
    logger: options.logger,
    observer: options.observer,
    sleep: options.sleep,
  });

  return dispatcher.interpret(descriptor, finalResponse);
}
