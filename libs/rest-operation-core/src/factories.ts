import { OperationDispatcher } from './OperationDispatcher';
import { ConsoleLogger } from './logging';
import type { DispatcherConfig } from './types';

/**
 * Creates an OperationDispatcher with defaults suitable for most use cases.
 *
 * Defaults applied:
 * - Transport: fetch-based (via fetchTransport)
 * - Codec: JSON with zod shape validation
 * - Logger: console logger
 *
 * @example
 * ```typescript
 * const dispatcher = createDefaultDispatcher({ clientName: 'widgets-api' });
 * await dispatcher.execute(deleteWidget, { id: 'w-1' });
 * ```
 */
export function createDefaultDispatcher(config: DispatcherConfig = {}): OperationDispatcher {
  return new OperationDispatcher({
    ...config,
    logger: config.logger ?? new ConsoleLogger(),
  });
}
