import { getDefaultPollingOptions, PollingDefaults } from './config';
import { LoggingOptions, OperationLogger } from './logging';
import { InvokeOptions, OperationInvoker } from './OperationInvoker';
import { OperationRegistry, RegisteredOperation } from './OperationRegistry';
import { OperationArgs, OperationGroupDefinition, Page, PollState, Transport } from './types';

export interface OperationsClientOptions extends LoggingOptions {
  transport: Transport;
  groups: readonly OperationGroupDefinition[];
  /** Prefixed to relative operation URLs */
  baseUrl?: string;
  /** Default wait between status checks in ms. Falls back to OPERATIONS_POLLING_INTERVAL_MS, then 1000 */
  pollingInterval?: number;
}

export interface ClientInvokeOptions extends InvokeOptions {
  /** Operation group to resolve in. The client's own operations when absent */
  group?: string;
}

/**
 * A started operation that can be awaited or cancelled.
 */
export class OperationHandle {
  private readonly controller = new AbortController();
  private latestPollState?: Readonly<PollState>;
  readonly result: Promise<unknown>;

  constructor(
    run: (signal: AbortSignal, onPoll: (state: Readonly<PollState>) => void) => Promise<unknown>,
    parentSignal?: AbortSignal
  ) {
    const onParentAbort = () => this.controller.abort();
    if (parentSignal?.aborted) {
      this.controller.abort();
    } else {
      parentSignal?.addEventListener('abort', onParentAbort, { once: true });
    }
    this.result = run(this.controller.signal, (state) => {
      this.latestPollState = state;
    });

    // Detach from a shared parent signal once settled
    const detach = () => parentSignal?.removeEventListener('abort', onParentAbort);
    void this.result.then(detach, detach);
  }

  /** Latest status check of a long running operation */
  get pollState(): Readonly<PollState> | undefined {
    return this.latestPollState;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    this.controller.abort();
  }

  pollUntilDone(): Promise<unknown> {
    return this.result;
  }
}

/**
 * Invokes operations by name. `invoke` settles with the final result, `begin` hands back a cancellable
 * {@link OperationHandle} and `pages` streams the pages of a pageable operation.
 */
export class OperationsClient {
  readonly registry: OperationRegistry;
  private readonly invoker: OperationInvoker;

  constructor(options: OperationsClientOptions) {
    const { transport, groups, baseUrl, pollingInterval, ...logging } = options;
    const polling: PollingDefaults =
      pollingInterval === undefined ? getDefaultPollingOptions() : { pollingInterval };

    this.registry = new OperationRegistry(groups);
    this.invoker = new OperationInvoker({
      transport,
      baseUrl,
      polling,
      logger: new OperationLogger(logging),
    });
  }

  resolve(operationName: string, groupName?: string): RegisteredOperation {
    return this.registry.resolve(operationName, groupName);
  }

  async invoke(operationName: string, args: OperationArgs = {}, options: ClientInvokeOptions = {}): Promise<unknown> {
    const { group, ...invokeOptions } = options;
    return this.invoker.invoke(this.resolve(operationName, group), args, invokeOptions);
  }

  begin(operationName: string, args: OperationArgs = {}, options: ClientInvokeOptions = {}): OperationHandle {
    const { group, signal, onPoll, ...invokeOptions } = options;
    const operation = this.resolve(operationName, group);
    return new OperationHandle(
      (handleSignal, recordPoll) =>
        this.invoker.invoke(operation, args, {
          ...invokeOptions,
          signal: handleSignal,
          onPoll: (state) => {
            recordPoll(state);
            onPoll?.(state);
          },
        }),
      signal
    );
  }

  async *pages(operationName: string, args: OperationArgs = {}, options: ClientInvokeOptions = {}): AsyncGenerator<Page> {
    const { group, ...invokeOptions } = options;
    yield* this.invoker.pages(this.resolve(operationName, group), args, invokeOptions);
  }
}
