import { jsonCodec } from './codec/jsonCodec';
import { Deferred } from './deferred';
import type { OperationDescriptor } from './descriptor';
import { ErrorConstructionError } from './errors';
import { errorMessage } from './logging';
import { buildRequest } from './requestBuilder';
import { fetchTransport } from './transport/fetchTransport';
import type {
  Codec,
  DispatcherConfig,
  HttpHeaders,
  HttpTransport,
  Logger,
  LoggerMeta,
  MetricsSink,
  OperationMetricsInfo,
  TransportRequest,
} from './types';

const DEFAULT_CLIENT_NAME = 'rest-operations';

/**
 * Executes operation descriptors: builds the request, sends it through the
 * transport exactly once, and interprets the response according to the
 * descriptor's declared return and body shapes.
 *
 * The dispatcher keeps no per-call state, so one instance can serve any number
 * of concurrent invocations.
 *
 * @example
 * ```typescript
 * const getWidget = defineOperation({
 *   name: 'widgets.get',
 *   method: 'GET',
 *   host: 'api.example.com',
 *   path: pathTemplate('/widgets/{id}', (args: { id: string }) => ({ id: args.id })),
 *   expectedStatuses: [200],
 *   returns: 'blockingValue',
 *   successBody: responseBody.typed(widgetSchema),
 * });
 *
 * const widget = await dispatcher.execute(getWidget, { id: 'w-1' });
 * ```
 */
export class OperationDispatcher {
  private readonly clientName: string;
  private readonly transport: HttpTransport;
  private readonly codec: Codec;
  private readonly logger?: Logger;
  private readonly metrics?: MetricsSink;
  private readonly defaultHeaders?: HttpHeaders;

  constructor(config: DispatcherConfig = {}) {
    this.clientName = config.clientName ?? DEFAULT_CLIENT_NAME;
    this.transport = config.transport ?? fetchTransport;
    this.codec = config.codec ?? jsonCodec;
    this.logger = config.logger;
    this.metrics = config.metrics;
    this.defaultHeaders = config.defaultHeaders;
  }

  execute<TArgs, TResult>(descriptor: OperationDescriptor<TArgs, TResult, 'fireAndForget'>, args: TArgs): Promise<null>;
  execute<TArgs, TResult>(
    descriptor: OperationDescriptor<TArgs, TResult, 'deferredCompletion'>,
    args: TArgs,
  ): Deferred<void>;
  execute<TArgs, TResult>(
    descriptor: OperationDescriptor<TArgs, TResult, 'deferredValue'>,
    args: TArgs,
  ): Deferred<TResult>;
  execute<TArgs, TResult>(descriptor: OperationDescriptor<TArgs, TResult, 'blockingValue'>, args: TArgs): Promise<TResult>;
  execute<TArgs, TResult>(
    descriptor: OperationDescriptor<TArgs, TResult>,
    args: TArgs,
  ): Promise<TResult | null> | Deferred<TResult> | Deferred<void>;
  execute<TArgs, TResult>(
    descriptor: OperationDescriptor<TArgs, TResult>,
    args: TArgs,
  ): Promise<TResult | null> | Deferred<TResult> | Deferred<void> {
    switch (descriptor.returnShape) {
      case 'fireAndForget':
        return this.dispatch(descriptor, args).then(() => null);
      case 'deferredCompletion':
        return new Deferred<void>(async () => {
          await this.dispatch(descriptor, args);
        });
      case 'deferredValue':
        return new Deferred(() => this.dispatch(descriptor, args));
      case 'blockingValue':
        return this.dispatch(descriptor, args);
    }
  }

  /** Resolves the request plan for one invocation without sending it. */
  createRequest<TArgs, TResult>(descriptor: OperationDescriptor<TArgs, TResult>, args: TArgs): TransportRequest {
    return buildRequest(descriptor, args, this.codec, this.defaultHeaders);
  }

  /** Sends a request through the configured transport. Transport errors propagate unchanged. */
  async send(request: TransportRequest): Promise<Response> {
    const logMeta = this.baseLogMeta(request);
    this.logger?.debug('operation.request.send', logMeta);
    try {
      return await this.transport(request);
    } catch (error) {
      this.logger?.error('operation.transport.failed', { ...logMeta, error: errorMessage(error) });
      throw error;
    }
  }

  /**
   * Validates the response status against the descriptor and decodes the
   * success body. An unexpected status rejects with the declared error kind.
   */
  async interpret<TArgs, TResult>(descriptor: OperationDescriptor<TArgs, TResult>, response: Response): Promise<TResult> {
    if (!descriptor.expectedStatuses.has(response.status)) {
      this.logger?.warn('operation.status.unexpected', {
        client: this.clientName,
        operation: descriptor.name,
        method: descriptor.method,
        status: response.status,
        expected: [...descriptor.expectedStatuses],
      });
      throw await this.createStatusError(descriptor, response);
    }
    return descriptor.successBody.decode(response, this.codec);
  }

  private async dispatch<TArgs, TResult>(descriptor: OperationDescriptor<TArgs, TResult>, args: TArgs): Promise<TResult> {
    const request = this.createRequest(descriptor, args);
    const logMeta = this.baseLogMeta(request);
    const startedAt = Date.now();
    let status = 0;
    this.logger?.debug('operation.dispatch.start', logMeta);
    try {
      const response = await this.send(request);
      status = response.status;
      const value = await this.interpret(descriptor, response);
      const durationMs = Date.now() - startedAt;
      this.logger?.info('operation.dispatch.success', { ...logMeta, status, durationMs });
      await this.recordMetrics({ ...this.metricsBase(request), status, ok: true, durationMs });
      return value;
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      const failedMeta = { ...logMeta, status, durationMs, error: errorMessage(error) };
      // A received response means the service answered; anything else is a transport failure.
      if (status) {
        this.logger?.warn('operation.dispatch.failed', failedMeta);
      } else {
        this.logger?.error('operation.dispatch.failed', failedMeta);
      }
      await this.recordMetrics({
        ...this.metricsBase(request),
        status,
        ok: false,
        durationMs,
        errorMessage: errorMessage(error),
      });
      throw error;
    }
  }

  private async createStatusError<TArgs, TResult>(
    descriptor: OperationDescriptor<TArgs, TResult>,
    response: Response,
  ): Promise<Error> {
    const status = response.status;
    const responseText = await this.tryReadText(descriptor, response);
    // Error-body decoding failures propagate in place of the status error.
    const construct = descriptor.error.prepare(responseText, this.codec);

    try {
      const error = construct(`Status code ${status}, ${responseText ?? ''}`, response);
      if (!(error instanceof Error)) {
        throw new TypeError(`${descriptor.error.name} factory did not return an Error`);
      }
      return error;
    } catch (cause) {
      let message = `Status code ${status}, but an instance of ${descriptor.error.name} cannot be created.`;
      if (responseText) {
        message += ` Response content: "${responseText}"`;
      }
      return new ErrorConstructionError(message, status, descriptor.error.name, responseText, cause);
    }
  }

  private async tryReadText<TArgs, TResult>(
    descriptor: OperationDescriptor<TArgs, TResult>,
    response: Response,
  ): Promise<string | undefined> {
    try {
      return await response.clone().text();
    } catch (error) {
      this.logger?.debug('operation.error_body.unreadable', {
        client: this.clientName,
        operation: descriptor.name,
        status: response.status,
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  private async recordMetrics(info: OperationMetricsInfo): Promise<void> {
    try {
      await this.metrics?.recordOperation?.(info);
    } catch (error) {
      this.logger?.warn('operation.metrics.error', {
        client: this.clientName,
        operation: info.operation,
        error: errorMessage(error),
      });
    }
  }

  private metricsBase(request: TransportRequest) {
    return {
      clientName: this.clientName,
      operation: request.operation,
      method: request.method,
      url: request.url,
    };
  }

  private baseLogMeta(request: TransportRequest): LoggerMeta {
    return {
      client: this.clientName,
      operation: request.operation,
      method: request.method,
      url: request.url,
    };
  }
}
