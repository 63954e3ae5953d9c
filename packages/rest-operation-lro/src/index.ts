export { PollRoundError } from './errors';
export { MAX_DELAY_MS, parseRetryAfter } from './retryAfter';
export { PollStrategy, IN_PROGRESS_STATUS, RETRY_AFTER_HEADER, type PollStrategyContext } from './PollStrategy';
export { LocationPollStrategy, LOCATION_HEADER, resolveLocation } from './LocationPollStrategy';
export {
  DEFAULT_POLL_STRATEGY_FACTORIES,
  locationPollStrategyFactory,
  selectPollStrategy,
  type PollStrategyFactory,
  type PollStrategyOptions,
} from './selectPollStrategy';
export {
  pollStream,
  pollUntilDone,
  type PollObserver,
  type PollOptions,
  type PollRound,
  type PollSummary,
  type Sleep,
} from './pollDriver';
export { DEFAULT_POLL_DELAY_MS, executeLongRunning, type LongRunningOptions } from './executeLongRunning';
