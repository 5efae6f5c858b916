import { getEventListeners } from 'events';
import {
  CancelledError,
  CLIENT_GROUP,
  executionStrategyFor,
  InterruptedPollError,
  InvalidArgumentError,
  InvalidOperationVerbError,
  OperationDescriptor,
  OperationInvoker,
  OperationLogger,
  OperationNotFoundError,
  OperationRegistry,
  OperationsClient,
  Page,
  PollState,
  RegisteredOperation,
  ServiceResponseError,
  TransportError,
  TransportResponse,
} from '../../runtime/typescript';
import { FakeTransport, respond } from './support/FakeTransport';
import { createWidget, getWidget, widgetGroups } from './support/widgets';

function clientFor(transport: FakeTransport, logger = jest.fn(), logLevel: 'none' | 'basic' | 'detailed' = 'none') {
  return new OperationsClient({
    transport,
    groups: widgetGroups,
    baseUrl: 'https://svc.test/',
    pollingInterval: 0,
    enableRequestLogging: logLevel !== 'none',
    logLevel,
    logger,
  });
}

function registered(descriptor: OperationDescriptor): RegisteredOperation {
  const registry = new OperationRegistry([]);
  return { descriptor, group: registry.group(CLIENT_GROUP), isNextPageOperation: false };
}

function provisioning(state: string): Record<string, unknown> {
  return { name: 'w1', properties: { provisioningState: state } };
}

describe('executionStrategyFor', () => {
  const registry = new OperationRegistry(widgetGroups);

  test('dispatches on the descriptor flags', () => {
    expect(executionStrategyFor(registry.resolve('createOrUpdate', 'widgets'))).toBe('long-running');
    expect(executionStrategyFor(registry.resolve('list', 'widgets'))).toBe('paged');
    expect(executionStrategyFor(registry.resolve('get', 'widgets'))).toBe('plain');
  });

  test('calls next page operations directly', () => {
    expect(executionStrategyFor(registry.resolve('listNext', 'widgets'))).toBe('plain');
  });

  test('prefers long running when an operation is also pageable', () => {
    const both: OperationDescriptor = { ...createWidget, extensions: { longRunning: true, pageable: {} } };
    expect(executionStrategyFor(registered(both))).toBe('long-running');
  });
});

describe('OperationInvoker', () => {
  test('rejects a long running GET before anything is sent', async () => {
    const transport = new FakeTransport([respond(202)]);
    const invoker = new OperationInvoker({
      transport,
      logger: new OperationLogger({ enableRequestLogging: false }),
      polling: { pollingInterval: 0 },
    });
    const pollGet: OperationDescriptor = { ...getWidget, name: 'getStatus', extensions: { longRunning: true } };

    await expect(invoker.invoke(registered(pollGet), { widgetName: 'w1' })).rejects.toThrow(InvalidOperationVerbError);
    expect(transport.calls).toHaveLength(0);
  });
});

describe('OperationsClient', () => {
  test('invokes a plain operation and returns its body', async () => {
    const transport = new FakeTransport([respond(200, { name: 'w 1' })]);

    await expect(clientFor(transport).invoke('get', { widgetName: 'w 1' }, { group: 'widgets' })).resolves.toEqual({
      name: 'w 1',
    });
    expect(transport.calls).toEqual([
      { verb: 'GET', url: 'https://svc.test/widgets/w%201', request: { query: {}, headers: {} } },
    ]);
  });

  test('returns nothing for an operation without a response body', async () => {
    const transport = new FakeTransport([respond(200, 'pong')]);

    await expect(clientFor(transport).invoke('ping')).resolves.toBeUndefined();
    expect(transport.calls[0].url).toBe('https://svc.test/ping');
  });

  test('resolves group names the way they were registered', async () => {
    const transport = new FakeTransport([respond(200, { name: 'w1' })]);
    const client = clientFor(transport);

    expect(client.resolve('get', 'widgets').descriptor).toBe(getWidget);
    await expect(client.invoke('get', { widgetName: 'w1' }, { group: 'widgets' })).resolves.toEqual({ name: 'w1' });
  });

  test('fails with OperationNotFoundError for an unknown operation', async () => {
    const transport = new FakeTransport();

    await expect(clientFor(transport).invoke('missing')).rejects.toThrow(OperationNotFoundError);
    await expect(clientFor(transport).invoke('missing', {}, { group: 'widgets' })).rejects.toThrow(
      "Operation 'missing' not found in group 'widgets'"
    );
  });

  test('rejects a call missing a required argument before sending it', async () => {
    const transport = new FakeTransport();

    await expect(clientFor(transport).invoke('get', {}, { group: 'widgets' })).rejects.toThrow(
      new InvalidArgumentError('get', 'widgetName')
    );
    expect(transport.calls).toHaveLength(0);
  });

  test('fails with ServiceResponseError on an unexpected status code', async () => {
    const transport = new FakeTransport([respond(404, { error: 'NotFound' })]);

    const error = await clientFor(transport)
      .invoke('get', { widgetName: 'w1' }, { group: 'widgets' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceResponseError);
    expect(error).toMatchObject({
      message: "'get' failed with status code 404",
      statusCode: 404,
      body: { error: 'NotFound' },
    });
  });

  test('checks status codes against the declared ones', async () => {
    const transport = new FakeTransport([respond(202, provisioning('Creating'))]);

    await expect(
      clientFor(transport).invoke('createOrUpdate', { widgetName: 'w1', body: { color: 'red' } }, { group: 'widgets' })
    ).rejects.toThrow("'createOrUpdate' failed with status code 202");
    expect(transport.calls).toHaveLength(1);
  });

  test('wraps transport failures in TransportError', async () => {
    const cause = new Error('ECONNRESET');
    const transport = new FakeTransport([cause]);

    const error = await clientFor(transport)
      .invoke('get', { widgetName: 'w1' }, { group: 'widgets' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'GET https://svc.test/widgets/w1 failed: ECONNRESET', cause });
  });

  test('pages through a pageable operation and sends grouped fields as parameters', async () => {
    const transport = new FakeTransport([
      respond(200, { value: [1, 2], nextLink: 'https://svc.test/widgets?page=2' }),
      respond(200, { value: [3] }),
    ]);

    const items = await clientFor(transport).invoke(
      'list',
      { apiVersion: '2024-01-01', listOptions: { filter: "color eq 'red'", clientRequestId: 'req-1' } },
      { group: 'widgets' }
    );

    expect(items).toEqual([1, 2, 3]);
    expect(transport.calls).toEqual([
      {
        verb: 'GET',
        url: 'https://svc.test/widgets',
        request: {
          query: { 'api-version': '2024-01-01', filter: "color eq 'red'" },
          headers: { 'x-ms-client-request-id': 'req-1' },
        },
      },
      {
        verb: 'GET',
        url: 'https://svc.test/widgets?page=2',
        request: {
          query: { 'api-version': '2024-01-01' },
          headers: { 'x-ms-client-request-id': 'req-1' },
        },
      },
    ]);
  });

  test('calls a next page operation once when invoked directly', async () => {
    const transport = new FakeTransport([respond(200, { value: [3], nextLink: 'https://svc.test/widgets?page=3' })]);

    await expect(
      clientFor(transport).invoke('listNext', { nextLink: 'https://svc.test/widgets?page=2' }, { group: 'widgets' })
    ).resolves.toEqual({ value: [3], nextLink: 'https://svc.test/widgets?page=3' });
    expect(transport.calls).toHaveLength(1);
  });

  test('streams pages', async () => {
    const transport = new FakeTransport([
      respond(200, { value: ['g1'], nextLink: 'https://svc.test/gadgets?page=2' }),
      respond(200, { value: ['g2'] }),
    ]);
    const pages: Page[] = [];

    for await (const page of clientFor(transport).pages('listByWidget', { widgetName: 'w1' }, { group: 'gadgets' })) {
      pages.push(page);
    }

    expect(pages).toEqual([{ items: ['g1'], continuationToken: 'https://svc.test/gadgets?page=2' }, { items: ['g2'] }]);
    expect(transport.calls.map((call) => call.url)).toEqual([
      'https://svc.test/widgets/w1/gadgets',
      'https://svc.test/gadgets?page=2',
    ]);
  });

  test('sends a long running PUT and polls the resource', async () => {
    const transport = new FakeTransport([
      respond(201, provisioning('Creating')),
      respond(200, provisioning('Succeeded')),
    ]);

    await expect(
      clientFor(transport).invoke('createOrUpdate', { widgetName: 'w1', body: { color: 'red' } }, { group: 'widgets' })
    ).resolves.toEqual(provisioning('Succeeded'));
    expect(transport.calls).toEqual([
      {
        verb: 'PUT',
        url: 'https://svc.test/widgets/w1',
        request: { query: {}, headers: {}, body: { color: 'red' } },
      },
      { verb: 'GET', url: 'https://svc.test/widgets/w1', request: {} },
    ]);
  });

  test('begin hands back a handle that tracks poll state', async () => {
    const transport = new FakeTransport([
      respond(201, provisioning('Creating')),
      respond(200, provisioning('Updating')),
      respond(200, provisioning('Succeeded')),
    ]);
    const onPoll = jest.fn();

    const handle = clientFor(transport).begin(
      'createOrUpdate',
      { widgetName: 'w1', body: { color: 'red' } },
      { group: 'widgets', onPoll }
    );

    await expect(handle.pollUntilDone()).resolves.toEqual(provisioning('Succeeded'));
    expect(handle.isCancelled).toBe(false);
    expect(handle.pollState).toMatchObject({ status: 'Succeeded', pollCount: 2 });
    expect(onPoll).toHaveBeenCalledTimes(2);
    expect(transport.calls[0].request.signal).toBeInstanceOf(AbortSignal);
  });

  test('cancelling a handle interrupts polling', async () => {
    const transport = new FakeTransport([respond(201, provisioning('Creating')), respond(200, provisioning('Succeeded'))]);
    const states: PollState[] = [];

    const handle = clientFor(transport).begin(
      'createOrUpdate',
      { widgetName: 'w1', body: { color: 'red' } },
      { group: 'widgets', pollingInterval: 60_000, onPoll: (state) => states.push({ ...state }) }
    );
    await new Promise((resolve) => setTimeout(resolve, 10));
    handle.cancel();

    await expect(handle.result).rejects.toThrow(new InterruptedPollError("Polling 'createOrUpdate' was interrupted"));
    expect(handle.isCancelled).toBe(true);
    expect(handle.pollState).toBeUndefined();
    expect(states).toHaveLength(0);
    expect(transport.calls).toHaveLength(1);
  });

  test('a handle started with an aborted signal sends nothing', async () => {
    const transport = new FakeTransport([respond(200, { name: 'w1' })]);
    const controller = new AbortController();
    controller.abort();

    const handle = clientFor(transport).begin('get', { widgetName: 'w1' }, { group: 'widgets', signal: controller.signal });

    await expect(handle.result).rejects.toThrow(new CancelledError("'widgets.get' was cancelled"));
    expect(handle.isCancelled).toBe(true);
    expect(transport.calls).toHaveLength(0);
  });

  test('cancelling a handle settles at once when the transport ignores the signal', async () => {
    const transport = new FakeTransport([() => new Promise<TransportResponse>(() => {})]);

    const handle = clientFor(transport).begin('get', { widgetName: 'w1' }, { group: 'widgets' });
    expect(transport.calls).toHaveLength(1);
    handle.cancel();

    await expect(handle.result).rejects.toThrow(new CancelledError("'widgets.get' was cancelled"));
  });

  test('aborting an invoke cancels an in-flight call', async () => {
    const controller = new AbortController();
    const transport = new FakeTransport([() => new Promise<TransportResponse>(() => {})]);

    const result = clientFor(transport).invoke('get', { widgetName: 'w1' }, { group: 'widgets', signal: controller.signal });
    controller.abort();

    await expect(result).rejects.toBeInstanceOf(CancelledError);
  });

  test('aborting while a later page is in flight discards the pages fetched', async () => {
    const controller = new AbortController();
    const transport = new FakeTransport([
      respond(200, { value: [1], nextLink: 'https://svc.test/widgets?page=2' }),
      () => {
        controller.abort();
        return new Promise<TransportResponse>(() => {});
      },
    ]);

    const error = await clientFor(transport)
      .invoke('list', { apiVersion: '2024-01-01' }, { group: 'widgets', signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toMatchObject({ message: "'widgets.listNext' was cancelled", pagesProcessed: 1 });
  });

  test('handles detach from a shared parent signal once they settle', async () => {
    const parent = new AbortController();
    const transport = new FakeTransport([
      respond(200, { name: 'w1' }),
      respond(200, { name: 'w2' }),
      respond(404, { error: 'NotFound' }),
    ]);
    const client = clientFor(transport);

    const handles = ['w1', 'w2', 'w3'].map((widgetName) =>
      client.begin('get', { widgetName }, { group: 'widgets', signal: parent.signal })
    );
    expect(getEventListeners(parent.signal, 'abort')).toHaveLength(3);

    await Promise.allSettled(handles.map((handle) => handle.result));

    expect(getEventListeners(parent.signal, 'abort')).toHaveLength(0);
  });

  test('aborting a shared parent signal cancels a running handle', async () => {
    const parent = new AbortController();
    const transport = new FakeTransport([() => new Promise<TransportResponse>(() => {})]);

    const handle = clientFor(transport).begin('get', { widgetName: 'w1' }, { group: 'widgets', signal: parent.signal });
    parent.abort();

    await expect(handle.result).rejects.toBeInstanceOf(CancelledError);
    expect(handle.isCancelled).toBe(true);
    expect(getEventListeners(parent.signal, 'abort')).toHaveLength(0);
  });

  test('logs one line per call at the basic level', async () => {
    const logger = jest.fn();
    const transport = new FakeTransport([respond(200, { name: 'w1' })]);

    await clientFor(transport, logger, 'basic').invoke('get', { widgetName: 'w1' }, { group: 'widgets' });

    expect(logger.mock.calls).toEqual([
      ['🔍 widgets.get - Invoking (plain)'],
      ['↩️  widgets.get - GET https://svc.test/widgets/w1: 200'],
    ]);
  });

  test('adds the arguments at the detailed level', async () => {
    const logger = jest.fn();
    const transport = new FakeTransport([respond(200, { name: 'w1' })]);

    await clientFor(transport, logger, 'detailed').invoke('get', { widgetName: 'w1' }, { group: 'widgets' });

    expect(logger).toHaveBeenCalledWith('🔍 widgets.get - Arguments:', JSON.stringify({ widgetName: 'w1' }, null, 2));
  });
});
