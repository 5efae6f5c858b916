import { PollingDefaults } from './config';
import { InterruptedPollError, OperationError, OperationFailedError, ServiceResponseError } from './errors';
import { OperationLogger } from './logging';
import { pollingStrategyFor, PollingStrategy } from './PollingStrategy';
import { getHeader, sendRequest } from './request';
import { isRecord, OperationDescriptor, PollState, PollStatus, Transport, TransportResponse } from './types';

export interface PollOptions {
  signal?: AbortSignal;
  /** Wait between status checks in ms when the service sends no retry-after. Defaults to the client's interval */
  pollingInterval?: number;
  /** Called after every status check */
  onPoll?: (state: Readonly<PollState>) => void;
}

/** The initiating call of a long running operation */
export interface InitiatingCall {
  url: string;
  response: TransportResponse;
}

/** Where the status of a response is read from */
export type StatusSource = 'resource-body' | 'status-body' | 'http-status';

interface StatusEndpoint {
  url: string;
  source: StatusSource;
}

export function parsePollStatus(value: string): PollStatus {
  switch (value.toLowerCase()) {
    case 'succeeded':
      return 'Succeeded';
    case 'failed':
      return 'Failed';
    case 'canceled':
    case 'cancelled':
      return 'Canceled';
    default:
      return 'InProgress';
  }
}

function statusFromHttp(statusCode: number): PollStatus {
  if (statusCode === 202) return 'InProgress';
  if (statusCode >= 200 && statusCode < 300) return 'Succeeded';
  return 'Failed';
}

function resourceState(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const properties = body.properties;
  if (isRecord(properties) && typeof properties.provisioningState === 'string') {
    return properties.provisioningState;
  }
  if (typeof body.provisioningState === 'string') return body.provisioningState;
  if (typeof body.status === 'string') return body.status;
  return undefined;
}

export function readPollStatus(response: TransportResponse, source: StatusSource): PollStatus {
  if (source === 'http-status') {
    return statusFromHttp(response.statusCode);
  }
  const state =
    source === 'resource-body'
      ? resourceState(response.body)
      : isRecord(response.body) && typeof response.body.status === 'string'
        ? response.body.status
        : undefined;
  return state === undefined ? statusFromHttp(response.statusCode) : parsePollStatus(state);
}

/** Wait asked for by a retry-after header in ms, given either as seconds or as an HTTP date */
export function retryAfter(response: TransportResponse): number | undefined {
  const header = getHeader(response.headers, 'retry-after')?.trim();
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? seconds * 1000 : undefined;
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

/** Status checks and result fetches must answer 2xx; anything else is a service error, not an operation status */
function checkPollResponse(descriptor: OperationDescriptor, response: TransportResponse): TransportResponse {
  if (response.statusCode < 200 || response.statusCode >= 300) {
    throw new ServiceResponseError(descriptor.name, response.statusCode, response.body);
  }
  return response;
}

function isEmptyBody(body: unknown): boolean {
  return body === undefined || body === null || body === '';
}

function delay(ms: number, signal: AbortSignal | undefined, interrupted: () => Error): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(interrupted());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(interrupted());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Drives a long running operation from its initiating response to a terminal status.
 */
export class Poller {
  constructor(
    private readonly transport: Transport,
    private readonly log: OperationLogger,
    private readonly defaults: PollingDefaults
  ) {}

  async pollToCompletion(
    initiating: InitiatingCall,
    descriptor: OperationDescriptor,
    options: PollOptions = {}
  ): Promise<unknown> {
    const strategy = pollingStrategyFor(descriptor);
    const interrupted = () => new InterruptedPollError(`Polling '${descriptor.name}' was interrupted`);

    const state: PollState = {
      status: readPollStatus(
        initiating.response,
        strategy.kind === 'resource-polling' ? 'resource-body' : 'http-status'
      ),
      pollCount: 0,
      lastResponse: initiating.response,
      startedAt: Date.now(),
    };

    try {
      const endpoint = this.statusEndpoint(strategy, initiating);
      if (state.status === 'InProgress' && !endpoint) {
        throw new OperationFailedError(
          `'${descriptor.name}' is in progress but the response names no status URL`,
          state.status,
          initiating.response.body
        );
      }

      while (endpoint && state.status === 'InProgress') {
        await delay(
          retryAfter(state.lastResponse) ?? options.pollingInterval ?? this.defaults.pollingInterval,
          options.signal,
          interrupted
        );
        const response = await sendRequest(
          this.transport,
          'GET',
          { url: endpoint.url, request: {} },
          interrupted,
          options.signal
        );
        state.pollCount++;
        state.lastResponse = checkPollResponse(descriptor, response);
        state.status = readPollStatus(response, endpoint.source);

        const elapsed = Date.now() - state.startedAt;
        this.log.basic(`⏳ ${descriptor.name} - Poll ${state.pollCount}: ${state.status} after ${elapsed}ms`);
        this.log.detailed(`⏳ ${descriptor.name} - Poll ${state.pollCount}:`, response.body);
        options.onPoll?.({ ...state });
      }

      if (state.status === 'Failed' || state.status === 'Canceled') {
        throw new OperationFailedError(
          `Long running operation '${descriptor.name}' ended with status ${state.status}`,
          state.status,
          state.lastResponse.body
        );
      }

      return await this.finalResult(descriptor, strategy, initiating, state, endpoint, options.signal, interrupted);
    } catch (error) {
      if (error instanceof OperationError) {
        error.annotate({ pollCount: state.pollCount });
      }
      throw error;
    }
  }

  private statusEndpoint(strategy: PollingStrategy, initiating: InitiatingCall): StatusEndpoint | undefined {
    if (strategy.kind === 'resource-polling') {
      return { url: initiating.url, source: 'resource-body' };
    }
    const headers = initiating.response.headers;
    const asyncOperation = getHeader(headers, 'azure-asyncoperation') ?? getHeader(headers, 'operation-location');
    if (asyncOperation) {
      return { url: asyncOperation, source: 'status-body' };
    }
    const location = getHeader(headers, 'location');
    return location ? { url: location, source: 'http-status' } : undefined;
  }

  private async finalResult(
    descriptor: OperationDescriptor,
    strategy: PollingStrategy,
    initiating: InitiatingCall,
    state: PollState,
    endpoint: StatusEndpoint | undefined,
    signal: AbortSignal | undefined,
    interrupted: () => InterruptedPollError
  ): Promise<unknown> {
    if (strategy.kind === 'resource-polling') {
      if (!isEmptyBody(state.lastResponse.body)) {
        return state.lastResponse.body;
      }
      return this.fetch(descriptor, initiating.url, signal, interrupted);
    }

    if (strategy.finalResult === 'void') {
      return undefined;
    }
    // Polling the location URL already returned the result
    if (endpoint?.source === 'http-status' && state.pollCount > 0) {
      return state.lastResponse.body;
    }
    const location = getHeader(initiating.response.headers, 'location');
    if (location) {
      return this.fetch(descriptor, location, signal, interrupted);
    }
    return state.pollCount === 0 ? initiating.response.body : undefined;
  }

  private async fetch(
    descriptor: OperationDescriptor,
    url: string,
    signal: AbortSignal | undefined,
    interrupted: () => InterruptedPollError
  ): Promise<unknown> {
    const response = await sendRequest(this.transport, 'GET', { url, request: {} }, interrupted, signal);
    return checkPollResponse(descriptor, response).body;
  }
}
