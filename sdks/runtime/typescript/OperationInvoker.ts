import { PollingDefaults } from './config';
import { CancelledError } from './errors';
import { OperationLogger } from './logging';
import { RegisteredOperation } from './OperationRegistry';
import { operationLabel, Pager, PagingOptions } from './Pager';
import { Poller, PollOptions } from './Poller';
import { pollingStrategyFor } from './PollingStrategy';
import { buildRequest, checkStatus, sendRequest } from './request';
import { OperationArgs, Page, Transport, TransportResponse } from './types';

export type ExecutionStrategy = 'long-running' | 'paged' | 'plain';

export interface InvokeOptions extends PagingOptions, PollOptions {
  signal?: AbortSignal;
}

export interface InvokerSettings {
  transport: Transport;
  logger: OperationLogger;
  polling: PollingDefaults;
  baseUrl?: string;
}

/**
 * Long running wins over pageable when a descriptor carries both flags.
 */
export function executionStrategyFor(operation: RegisteredOperation): ExecutionStrategy {
  const { extensions } = operation.descriptor;
  if (extensions.longRunning) return 'long-running';
  if (extensions.pageable && !operation.isNextPageOperation) return 'paged';
  return 'plain';
}

/**
 * Chooses between a direct call, the pager and the poller for one registered operation.
 */
export class OperationInvoker {
  private readonly pager: Pager;
  private readonly poller: Poller;

  constructor(private readonly settings: InvokerSettings) {
    this.pager = new Pager((operation, args, signal) => this.call(operation, args, signal), settings.logger);
    this.poller = new Poller(settings.transport, settings.logger, settings.polling);
  }

  async invoke(operation: RegisteredOperation, args: OperationArgs, options: InvokeOptions = {}): Promise<unknown> {
    const strategy = executionStrategyFor(operation);
    this.settings.logger.basic(`🔍 ${operationLabel(operation)} - Invoking (${strategy})`);
    this.settings.logger.detailed(`🔍 ${operationLabel(operation)} - Arguments:`, args);

    switch (strategy) {
      case 'long-running': {
        // Rejects unsupported verbs before anything is sent
        pollingStrategyFor(operation.descriptor);
        const { url, response } = await this.send(operation, args, options.signal);
        return this.poller.pollToCompletion({ url, response }, operation.descriptor, options);
      }
      case 'paged':
        return this.pager.page(operation, args, options);
      case 'plain': {
        const response = await this.call(operation, args, options.signal);
        return operation.descriptor.responseBodyKind === 'none' ? undefined : response.body;
      }
    }
  }

  /**
   * Streams the pages of an operation, read with its `pageable` layout or the default `value`/`nextLink` one.
   */
  pages(operation: RegisteredOperation, args: OperationArgs, options: InvokeOptions = {}): AsyncGenerator<Page> {
    return this.pager.pages(operation, args, options);
  }

  /** Sends one call of `operation` and checks its status code. */
  async call(operation: RegisteredOperation, args: OperationArgs, signal?: AbortSignal): Promise<TransportResponse> {
    const { response } = await this.send(operation, args, signal);
    return response;
  }

  private async send(
    operation: RegisteredOperation,
    args: OperationArgs,
    signal?: AbortSignal
  ): Promise<{ url: string; response: TransportResponse }> {
    const { descriptor } = operation;
    const prepared = buildRequest(descriptor, args, this.settings.baseUrl);
    const response = await sendRequest(
      this.settings.transport,
      descriptor.httpVerb,
      prepared,
      () => new CancelledError(`'${operationLabel(operation)}' was cancelled`),
      signal
    );
    this.settings.logger.basic(`↩️  ${operationLabel(operation)} - ${descriptor.httpVerb} ${prepared.url}: ${response.statusCode}`);
    return { url: prepared.url, response: checkStatus(descriptor, response) };
  }
}
