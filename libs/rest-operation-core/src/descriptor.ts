import { OperationDefinitionError } from './errors';
import { restErrorKind, type ErrorKind, type ResponseBodyShape } from './shapes';
import type { HttpMethod } from './types';

/**
 * How an operation delivers its result. Fixed when the descriptor is defined.
 *
 * - `fireAndForget`: resolves `null` once the status has been validated.
 * - `deferredValue`: a lazy single-notification {@link Deferred} of the decoded value.
 * - `deferredCompletion`: a lazy single-notification {@link Deferred} without a value.
 * - `blockingValue`: sends immediately; the promise resolves to the decoded value.
 */
export type ReturnShape = 'fireAndForget' | 'deferredValue' | 'deferredCompletion' | 'blockingValue';

export type Resolver<TArgs, T> = (args: TArgs) => T;

export interface QueryBinding<TArgs> {
  readonly name: string;
  /** Already percent-encoded; `undefined` omits the parameter. */
  readonly encodedValue: Resolver<TArgs, string | undefined>;
}

export interface HeaderBinding<TArgs> {
  readonly name: string;
  readonly value: Resolver<TArgs, string | undefined>;
}

/**
 * Immutable per-operation metadata. Safe to share across concurrent calls.
 */
export interface OperationDescriptor<TArgs, TResult, TShape extends ReturnShape = ReturnShape> {
  readonly name: string;
  readonly method: HttpMethod;
  readonly scheme: Resolver<TArgs, string>;
  readonly host: Resolver<TArgs, string>;
  readonly path: Resolver<TArgs, string>;
  readonly query: readonly QueryBinding<TArgs>[];
  readonly headers: readonly HeaderBinding<TArgs>[];
  readonly body?: Resolver<TArgs, unknown>;
  readonly expectedStatuses: ReadonlySet<number>;
  readonly returnShape: TShape;
  readonly successBody: ResponseBodyShape<TResult>;
  readonly error: ErrorKind;
}

export type AnyOperationDescriptor = OperationDescriptor<never, unknown>;

export interface OperationDefinition<TArgs, TResult, TShape extends ReturnShape> {
  /** Fully-qualified name, e.g. `widgets.get`. */
  name: string;
  method: HttpMethod;
  /** Defaults to `https`. */
  scheme?: string | Resolver<TArgs, string>;
  host: string | Resolver<TArgs, string>;
  path: string | Resolver<TArgs, string>;
  query?: readonly QueryBinding<TArgs>[];
  headers?: readonly HeaderBinding<TArgs>[];
  body?: Resolver<TArgs, unknown>;
  expectedStatuses: readonly number[];
  returns: TShape;
  successBody: ResponseBodyShape<TResult>;
  /** Defaults to {@link restErrorKind}. */
  error?: ErrorKind;
}

const constant = <TArgs>(value: string | Resolver<TArgs, string>): Resolver<TArgs, string> =>
  typeof value === 'string' ? () => value : value;

export function defineOperation<TArgs, TResult, TShape extends ReturnShape>(
  definition: OperationDefinition<TArgs, TResult, TShape>,
): OperationDescriptor<TArgs, TResult, TShape> {
  const name = definition.name.trim();
  if (!name) {
    throw new OperationDefinitionError('Operation name must not be empty', definition.name);
  }
  if (definition.expectedStatuses.length === 0) {
    throw new OperationDefinitionError(`${name}: at least one expected status code is required`, name);
  }
  for (const status of definition.expectedStatuses) {
    if (!Number.isInteger(status) || status < 100 || status > 599) {
      throw new OperationDefinitionError(`${name}: invalid expected status code ${status}`, name);
    }
  }

  const resultless =
    definition.returns === 'fireAndForget' || definition.returns === 'deferredCompletion' || definition.method === 'HEAD';
  if (resultless && definition.successBody.kind !== 'none') {
    throw new OperationDefinitionError(
      `${name}: ${definition.method} operations returning ${definition.returns} cannot declare a ${definition.successBody.kind} success body`,
      name,
    );
  }

  return Object.freeze({
    name,
    method: definition.method,
    scheme: constant(definition.scheme ?? 'https'),
    host: constant(definition.host),
    path: constant(definition.path),
    query: Object.freeze([...(definition.query ?? [])]),
    headers: Object.freeze([...(definition.headers ?? [])]),
    body: definition.body,
    expectedStatuses: new Set(definition.expectedStatuses),
    returnShape: definition.returns,
    successBody: definition.successBody,
    error: definition.error ?? restErrorKind,
  });
}
