import type { TransportRequest } from '@rest-operations/core';
import { LocationPollStrategy, type PollStrategyOptions } from './LocationPollStrategy';
import type { PollStrategy } from './PollStrategy';

export type { PollStrategyOptions } from './LocationPollStrategy';

/**
 * Inspects the initial exchange and returns a strategy when it recognises the
 * convention, otherwise undefined. Factories must not perform I/O.
 */
export type PollStrategyFactory = (
  originalRequest: TransportRequest,
  initialResponse: Response,
  options: PollStrategyOptions,
) => PollStrategy | undefined;

export const locationPollStrategyFactory: PollStrategyFactory = (originalRequest, initialResponse, options) =>
  LocationPollStrategy.tryToCreate(originalRequest, initialResponse, options);

export const DEFAULT_POLL_STRATEGY_FACTORIES: readonly PollStrategyFactory[] = Object.freeze([
  locationPollStrategyFactory,
]);

/** Returns the strategy of the first factory that accepts the exchange. */
export function selectPollStrategy(
  originalRequest: TransportRequest,
  initialResponse: Response,
  options: PollStrategyOptions,
  factories: readonly PollStrategyFactory[] = DEFAULT_POLL_STRATEGY_FACTORIES,
): PollStrategy | undefined {
  for (const factory of factories) {
    const strategy = factory(originalRequest, initialResponse, options);
    if (strategy) return strategy;
  }
  return undefined;
}
