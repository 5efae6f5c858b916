export type HttpVerb = 'GET' | 'PUT' | 'PATCH' | 'POST' | 'DELETE';

export type ResponseBodyKind = 'scalar' | 'sequence' | 'none';

/** Where an argument goes on the request. A `url` parameter replaces the whole request URL. */
export type ParameterLocation = 'path' | 'query' | 'header' | 'body' | 'url';

export interface ParameterSpec {
  readonly name: string;
  readonly location: ParameterLocation;
  /** Name on the wire, when it differs from `name` */
  readonly serializedName?: string;
  readonly required?: boolean;
}

/**
 * A single logical argument bundling several declared fields,
 * e.g. `listOptions: { clientRequestId, filter }`.
 */
export interface GroupedParameterSpec {
  readonly name: string;
  readonly fields: readonly string[];
}

export interface NextOperationRef {
  readonly operationName: string;
  /** Group holding the next operation. Absent means the same group. */
  readonly groupName?: string;
}

export interface PageableExtension {
  /** Body property holding the page items. Defaults to `value` */
  readonly itemName?: string;
  /** Body property holding the continuation link. Defaults to `nextLink`; `null` means a single page */
  readonly nextLinkName?: string | null;
}

export interface OperationExtensions {
  readonly pageable?: PageableExtension;
  readonly longRunning?: boolean;
  readonly [flag: string]: unknown;
}

export interface OperationDescriptor {
  readonly name: string;
  readonly httpVerb: HttpVerb;
  readonly url: string;
  readonly parameters: readonly ParameterSpec[];
  readonly extensions: OperationExtensions;
  readonly responseBodyKind: ResponseBodyKind;
  readonly nextOperationRef?: NextOperationRef;
  readonly groupedParameterSpec?: GroupedParameterSpec;
  /** Status codes the operation answers with. Any 2xx when absent */
  readonly expectedStatusCodes?: readonly number[];
}

export interface OperationGroupDefinition {
  readonly name: string;
  readonly operations: readonly OperationDescriptor[];
}

export type OperationArgs = Readonly<Record<string, unknown>>;

export interface TransportRequest {
  query?: Record<string, string>;
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

export interface TransportResponse {
  statusCode: number;
  headers: Record<string, string>;
  body?: unknown;
}

/**
 * Sends already-assembled requests. Encoding, authentication and retries live behind this interface.
 */
export interface Transport {
  call(verb: HttpVerb, url: string, args: TransportRequest): Promise<TransportResponse>;
}

export interface Page<T = unknown> {
  readonly items: readonly T[];
  readonly continuationToken?: string;
}

export type PollStatus = 'InProgress' | 'Succeeded' | 'Failed' | 'Canceled';

export interface PollState {
  status: PollStatus;
  pollCount: number;
  lastResponse: TransportResponse;
  startedAt: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
