import type { ZodType, ZodTypeDef } from 'zod';

export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

/**
 * A declared body shape. Any zod schema works; input may differ from output
 * so schemas with defaults or transforms are accepted.
 */
export type Shape<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Resolved request for one invocation (the request plan). Built fresh per
 * call and discarded once the call completes.
 */
export interface TransportRequest {
  /** Fully-qualified operation name, for diagnostics. */
  operation: string;
  method: HttpMethod;
  /** Absolute URL including the encoded query string. */
  url: string;
  headers: HttpHeaders;
  body?: string;
}

/**
 * Transport abstraction. Sends one request and resolves with the platform
 * Fetch API response; rejects on network or read failures.
 */
export interface HttpTransport {
  (request: TransportRequest): Promise<Response>;
}

export interface Codec {
  serialize(value: unknown): string;
  deserialize<T>(text: string, shape: Shape<T>): T;
}

export type LoggerMeta = Record<string, unknown> & {
  operation?: string;
  method?: HttpMethod;
  url?: string;
  status?: number;
  durationMs?: number;
};

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export interface OperationMetricsInfo {
  clientName: string;
  operation: string;
  method: HttpMethod;
  url: string;
  /** 0 when no response was received. */
  status: number;
  ok: boolean;
  durationMs: number;
  errorMessage?: string;
}

export interface MetricsSink {
  recordOperation?(info: OperationMetricsInfo): void | Promise<void>;
}

export interface DispatcherConfig {
  /** Name reported in logs and metrics. Defaults to "rest-operations". */
  clientName?: string;
  transport?: HttpTransport;
  codec?: Codec;
  logger?: Logger;
  metrics?: MetricsSink;
  /** Headers sent with every request; descriptor headers override them. */
  defaultHeaders?: HttpHeaders;
}
