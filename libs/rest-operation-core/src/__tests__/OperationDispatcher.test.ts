import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { header, pathTemplate, queryParam } from '../bindings';
import { defineOperation } from '../descriptor';
import { ErrorConstructionError, RestError, SerializationError } from '../errors';
import { OperationDispatcher } from '../OperationDispatcher';
import { defineErrorKind, responseBody } from '../shapes';
import type { DispatcherConfig, Logger, MetricsSink, TransportRequest } from '../types';

const jsonResponse = (body: unknown, init?: ResponseInit) =>
  new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });

const widgetSchema = z.object({ id: z.string(), name: z.string() });

interface WidgetArgs {
  id: string;
  verbose?: boolean;
}

const widgetPath = pathTemplate('/widgets/{id}', (args: WidgetArgs) => ({ id: args.id }));

const getWidget = defineOperation({
  name: 'widgets.get',
  method: 'GET',
  host: 'api.example.com',
  path: widgetPath,
  query: [queryParam('verbose', (args: WidgetArgs) => args.verbose)],
  headers: [header<WidgetArgs>('X-Client', 'test')],
  expectedStatuses: [200],
  returns: 'blockingValue',
  successBody: responseBody.typed(widgetSchema),
});

const getWidgetLater = defineOperation({
  name: 'widgets.getLater',
  method: 'GET',
  host: 'api.example.com',
  path: widgetPath,
  expectedStatuses: [200],
  returns: 'deferredValue',
  successBody: responseBody.typed(widgetSchema),
});

const touchWidget = defineOperation({
  name: 'widgets.touch',
  method: 'POST',
  host: 'api.example.com',
  path: pathTemplate('/widgets/{id}/touch', (args: WidgetArgs) => ({ id: args.id })),
  expectedStatuses: [202],
  returns: 'deferredCompletion',
  successBody: responseBody.none(),
});

const deleteWidget = defineOperation({
  name: 'widgets.delete',
  method: 'DELETE',
  host: 'api.example.com',
  path: widgetPath,
  expectedStatuses: [200, 204],
  returns: 'fireAndForget',
  successBody: responseBody.none(),
});

const widgetExists = defineOperation({
  name: 'widgets.exists',
  method: 'HEAD',
  host: 'api.example.com',
  path: widgetPath,
  expectedStatuses: [200],
  returns: 'blockingValue',
  successBody: responseBody.none(),
});

const createWidget = defineOperation({
  name: 'widgets.create',
  method: 'POST',
  host: 'api.example.com',
  path: '/widgets',
  body: (args: { name: string }) => ({ name: args.name }),
  expectedStatuses: [201],
  returns: 'blockingValue',
  successBody: responseBody.typed(widgetSchema),
});

const problemSchema = z.object({ code: z.string() });

class WidgetServiceError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body?: z.infer<typeof problemSchema>,
  ) {
    super(message);
    this.name = 'WidgetServiceError';
  }
}

const widgetServiceError = defineErrorKind(
  'WidgetServiceError',
  problemSchema,
  (message, response, body) => new WidgetServiceError(message, response.status, body),
);

const findWidget = defineOperation({
  name: 'widgets.find',
  method: 'GET',
  host: 'api.example.com',
  path: widgetPath,
  expectedStatuses: [200],
  returns: 'blockingValue',
  successBody: responseBody.typed(widgetSchema),
  error: widgetServiceError,
});

describe('OperationDispatcher', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  const createDispatcher = (overrides: DispatcherConfig = {}) =>
    new OperationDispatcher({ clientName: 'test-client', logger, ...overrides });

  it('sends a blocking request and decodes the typed body', async () => {
    const transport = vi.fn(async (_request: TransportRequest) => jsonResponse({ id: 'w-1', name: 'Sprocket' }));
    const dispatcher = createDispatcher({ transport });

    const widget = await dispatcher.execute(getWidget, { id: 'w-1', verbose: true });

    expect(widget).toEqual({ id: 'w-1', name: 'Sprocket' });
    expect(transport).toHaveBeenCalledTimes(1);
    expect(transport.mock.calls[0][0]).toEqual({
      operation: 'widgets.get',
      method: 'GET',
      url: 'https://api.example.com/widgets/w-1?verbose=true',
      headers: { 'X-Client': 'test' },
    });
  });

  it('omits unresolved query parameters and encodes path values', async () => {
    const transport = vi.fn(async (_request: TransportRequest) => jsonResponse({ id: 'w 1', name: 'Sprocket' }));
    const dispatcher = createDispatcher({ transport });

    await dispatcher.execute(getWidget, { id: 'w 1' });

    expect(transport.mock.calls[0][0].url).toBe('https://api.example.com/widgets/w%201');
  });

  it('serializes the declared body as JSON on top of default headers', async () => {
    const transport = vi.fn(async (_request: TransportRequest) =>
      jsonResponse({ id: 'w-2', name: 'Gear' }, { status: 201 }),
    );
    const dispatcher = createDispatcher({ transport, defaultHeaders: { Authorization: 'Bearer test-token' } });

    const created = await dispatcher.execute(createWidget, { name: 'Gear' });

    expect(created).toEqual({ id: 'w-2', name: 'Gear' });
    const request = transport.mock.calls[0][0];
    expect(request.method).toBe('POST');
    expect(request.url).toBe('https://api.example.com/widgets');
    expect(request.body).toBe('{"name":"Gear"}');
    expect(request.headers).toEqual({
      Authorization: 'Bearer test-token',
      'Content-Type': 'application/json',
    });
  });

  it('resolves fire-and-forget operations to null even when the response has a body', async () => {
    const response = jsonResponse({ deleted: true });
    const transport = vi.fn(async (_request: TransportRequest) => response);
    const dispatcher = createDispatcher({ transport });

    await expect(dispatcher.execute(deleteWidget, { id: 'w-1' })).resolves.toBeNull();
    expect(response.bodyUsed).toBe(true);
  });

  it('still validates the status of fire-and-forget operations', async () => {
    const transport = vi.fn(async (_request: TransportRequest) => new Response(null, { status: 409 }));
    const dispatcher = createDispatcher({ transport });

    await expect(dispatcher.execute(deleteWidget, { id: 'w-1' })).rejects.toBeInstanceOf(RestError);
  });

  it('resolves HEAD operations to null', async () => {
    const transport = vi.fn(async (_request: TransportRequest) => new Response(null, { status: 200 }));
    const dispatcher = createDispatcher({ transport });

    await expect(dispatcher.execute(widgetExists, { id: 'w-1' })).resolves.toBeNull();
    expect(transport.mock.calls[0][0].method).toBe('HEAD');
  });

  it('defers the request until the first subscription and sends it once', async () => {
    const transport = vi.fn(async (_request: TransportRequest) => jsonResponse({ id: 'w-1', name: 'Sprocket' }));
    const dispatcher = createDispatcher({ transport });

    const deferred = dispatcher.execute(getWidgetLater, { id: 'w-1' });
    expect(deferred.started).toBe(false);
    expect(transport).not.toHaveBeenCalled();

    const [first, second] = await Promise.all([deferred, deferred]);
    const third = await deferred;

    expect(deferred.started).toBe(true);
    expect(first).toEqual({ id: 'w-1', name: 'Sprocket' });
    expect(second).toBe(first);
    expect(third).toBe(first);
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('delivers the same failure to every subscriber of a deferred result', async () => {
    const transport = vi.fn(async (_request: TransportRequest) => new Response('', { status: 500 }));
    const dispatcher = createDispatcher({ transport });

    const deferred = dispatcher.execute(getWidgetLater, { id: 'w-1' });
    const first = await deferred.toPromise().catch((error: unknown) => error);
    const second = await deferred.toPromise().catch((error: unknown) => error);

    expect(first).toBeInstanceOf(RestError);
    expect(second).toBe(first);
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('completes deferred completions without a value', async () => {
    const transport = vi.fn(async (_request: TransportRequest) => new Response(null, { status: 202 }));
    const dispatcher = createDispatcher({ transport });

    const completion = dispatcher.execute(touchWidget, { id: 'w-1' });
    expect(transport).not.toHaveBeenCalled();

    await expect(completion.toPromise()).resolves.toBeUndefined();
    expect(transport.mock.calls[0][0].url).toBe('https://api.example.com/widgets/w-1/touch');
  });

  it('rejects unexpected statuses even when the body is a valid success body', async () => {
    const transport = vi.fn(async (_request: TransportRequest) =>
      jsonResponse({ id: 'w-1', name: 'Sprocket' }, { status: 201 }),
    );
    const dispatcher = createDispatcher({ transport });

    const error = await dispatcher.execute(getWidget, { id: 'w-1' }).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(RestError);
    if (!(error instanceof RestError)) return;
    expect(error.status).toBe(201);
    expect(error.message).toBe('Status code 201, {"id":"w-1","name":"Sprocket"}');
    expect(error.body).toEqual({ id: 'w-1', name: 'Sprocket' });
    expect(logger.warn).toHaveBeenCalledWith(
      'operation.status.unexpected',
      expect.objectContaining({ operation: 'widgets.get', status: 201, expected: [200] }),
    );
    expect(logger.warn).toHaveBeenCalledWith(
      'operation.dispatch.failed',
      expect.objectContaining({ operation: 'widgets.get', status: 201 }),
    );
  });

  it('builds the declared error kind with the decoded error body', async () => {
    const transport = vi.fn(async (_request: TransportRequest) => jsonResponse({ code: 'NotFound' }, { status: 404 }));
    const dispatcher = createDispatcher({ transport });

    const error = await dispatcher.execute(findWidget, { id: 'w-9' }).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(WidgetServiceError);
    if (!(error instanceof WidgetServiceError)) return;
    expect(error.status).toBe(404);
    expect(error.body).toEqual({ code: 'NotFound' });
    expect(error.message).toContain('Status code 404');
    expect(error.message).toBe('Status code 404, {"code":"NotFound"}');
  });

  it('builds the error without a body when the error body cannot be read', async () => {
    const failingBody = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error('connection reset'));
      },
    });
    const transport = vi.fn(async (_request: TransportRequest) => new Response(failingBody, { status: 500 }));
    const dispatcher = createDispatcher({ transport });

    const error = await dispatcher.execute(getWidget, { id: 'w-1' }).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(RestError);
    if (!(error instanceof RestError)) return;
    expect(error.message).toBe('Status code 500, ');
    expect(error.body).toBeUndefined();
    expect(logger.debug).toHaveBeenCalledWith(
      'operation.error_body.unreadable',
      expect.objectContaining({ operation: 'widgets.get', status: 500 }),
    );
  });

  it('propagates error-body decoding failures instead of the status error', async () => {
    const transport = vi.fn(async (_request: TransportRequest) => jsonResponse({ reason: 'gone' }, { status: 404 }));
    const dispatcher = createDispatcher({ transport });

    await expect(dispatcher.execute(findWidget, { id: 'w-1' })).rejects.toBeInstanceOf(SerializationError);
  });

  it('reports an ErrorConstructionError when the error factory throws', async () => {
    const broken = defineErrorKind('BrokenError', z.unknown(), () => {
      throw new Error('factory exploded');
    });
    const operation = defineOperation({
      name: 'widgets.broken',
      method: 'GET',
      host: 'api.example.com',
      path: '/widgets',
      expectedStatuses: [200],
      returns: 'blockingValue',
      successBody: responseBody.none(),
      error: broken,
    });
    const transport = vi.fn(async (_request: TransportRequest) => jsonResponse({ reason: 'oops' }, { status: 500 }));
    const dispatcher = createDispatcher({ transport });

    const error = await dispatcher.execute(operation, {}).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ErrorConstructionError);
    if (!(error instanceof ErrorConstructionError)) return;
    expect(error.message).toBe(
      'Status code 500, but an instance of BrokenError cannot be created. Response content: "{"reason":"oops"}"',
    );
    expect(error.status).toBe(500);
    expect(error.errorKind).toBe('BrokenError');
    expect(error.responseText).toBe('{"reason":"oops"}');
    expect(error.cause).toBeInstanceOf(Error);
  });

  it('leaves the response content out of the construction failure when the body is empty', async () => {
    const broken = defineErrorKind('BrokenError', z.unknown(), () => {
      throw new Error('factory exploded');
    });
    const operation = defineOperation({
      name: 'widgets.broken',
      method: 'GET',
      host: 'api.example.com',
      path: '/widgets',
      expectedStatuses: [200],
      returns: 'blockingValue',
      successBody: responseBody.none(),
      error: broken,
    });
    const transport = vi.fn(async (_request: TransportRequest) => new Response(null, { status: 503 }));
    const dispatcher = createDispatcher({ transport });

    await expect(dispatcher.execute(operation, {})).rejects.toThrow(
      'Status code 503, but an instance of BrokenError cannot be created.',
    );
  });

  it('decodes raw bytes and raw streams', async () => {
    const download = defineOperation({
      name: 'files.download',
      method: 'GET',
      host: 'files.example.com',
      path: '/blob',
      expectedStatuses: [200],
      returns: 'blockingValue',
      successBody: responseBody.bytes(),
    });
    const stream = defineOperation({
      name: 'files.stream',
      method: 'GET',
      host: 'files.example.com',
      path: '/blob',
      expectedStatuses: [200],
      returns: 'blockingValue',
      successBody: responseBody.stream(),
    });
    const transport = vi.fn(async (_request: TransportRequest) => new Response('abc'));
    const dispatcher = createDispatcher({ transport });

    const bytes = await dispatcher.execute(download, {});
    expect(Array.from(bytes)).toEqual([97, 98, 99]);

    const body = await dispatcher.execute(stream, {});
    expect(body).not.toBeNull();
    expect(await new Response(body).text()).toBe('abc');
  });

  it('propagates transport errors unchanged', async () => {
    const failure = new Error('socket hang up');
    const transport = vi.fn(async (_request: TransportRequest): Promise<Response> => {
      throw failure;
    });
    const dispatcher = createDispatcher({ transport });

    await expect(dispatcher.execute(getWidget, { id: 'w-1' })).rejects.toBe(failure);
    expect(logger.error).toHaveBeenCalledWith(
      'operation.transport.failed',
      expect.objectContaining({ operation: 'widgets.get', error: 'socket hang up' }),
    );
    expect(logger.error).toHaveBeenCalledWith(
      'operation.dispatch.failed',
      expect.objectContaining({ operation: 'widgets.get', status: 0 }),
    );
  });

  it('records metrics for each dispatch', async () => {
    const metrics: MetricsSink = { recordOperation: vi.fn() };
    const transport = vi.fn(async (_request: TransportRequest) => jsonResponse({ id: 'w-1', name: 'Sprocket' }));
    const dispatcher = createDispatcher({ transport, metrics });

    await dispatcher.execute(getWidget, { id: 'w-1' });

    expect(metrics.recordOperation).toHaveBeenCalledWith(
      expect.objectContaining({
        clientName: 'test-client',
        operation: 'widgets.get',
        method: 'GET',
        url: 'https://api.example.com/widgets/w-1',
        status: 200,
        ok: true,
      }),
    );
    expect(logger.info).toHaveBeenCalledWith(
      'operation.dispatch.success',
      expect.objectContaining({ operation: 'widgets.get', status: 200 }),
    );
  });

  it('logs and ignores metrics sink failures', async () => {
    const metrics: MetricsSink = {
      recordOperation: vi.fn(async () => {
        throw new Error('sink offline');
      }),
    };
    const transport = vi.fn(async (_request: TransportRequest) => jsonResponse({ id: 'w-1', name: 'Sprocket' }));
    const dispatcher = createDispatcher({ transport, metrics });

    await expect(dispatcher.execute(getWidget, { id: 'w-1' })).resolves.toEqual({ id: 'w-1', name: 'Sprocket' });
    expect(logger.warn).toHaveBeenCalledWith('operation.metrics.error', {
      client: 'test-client',
      operation: 'widgets.get',
      error: 'sink offline',
    });
  });

  it('exposes request building, sending and interpretation separately', async () => {
    const transport = vi.fn(async (_request: TransportRequest) => jsonResponse({ id: 'w-1', name: 'Sprocket' }));
    const dispatcher = createDispatcher({ transport });

    const request = dispatcher.createRequest(getWidget, { id: 'w-1' });
    expect(transport).not.toHaveBeenCalled();

    const response = await dispatcher.send(request);
    await expect(dispatcher.interpret(getWidget, response)).resolves.toEqual({ id: 'w-1', name: 'Sprocket' });
  });
});
