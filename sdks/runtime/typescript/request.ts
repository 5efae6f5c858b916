import { CancelledError, InvalidArgumentError, OperationError, ServiceResponseError, TransportError } from './errors';
import {
  GroupedParameterSpec,
  HttpVerb,
  isRecord,
  OperationArgs,
  OperationDescriptor,
  ParameterSpec,
  Transport,
  TransportRequest,
  TransportResponse,
} from './types';

export interface PreparedRequest {
  url: string;
  request: TransportRequest;
}

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

function toParameterString(value: unknown): string {
  if (Array.isArray(value)) return value.map(String).join(',');
  if (isRecord(value)) return JSON.stringify(value);
  return String(value);
}

function argumentValue(
  parameter: ParameterSpec,
  args: OperationArgs,
  groupSpec: GroupedParameterSpec | undefined,
  groupValue: Record<string, unknown> | undefined
): unknown {
  if (Object.prototype.hasOwnProperty.call(args, parameter.name)) {
    return args[parameter.name];
  }
  // Fields of a grouped argument are sent as individual parameters
  if (groupSpec && groupValue && groupSpec.fields.includes(parameter.name)) {
    return groupValue[parameter.name];
  }
  return undefined;
}

export function resolveUrl(url: string, baseUrl?: string): string {
  if (!baseUrl || ABSOLUTE_URL.test(url)) return url;
  return `${baseUrl.replace(/\/+$/, '')}/${url.replace(/^\/+/, '')}`;
}

/**
 * Assembles the URL, query, headers and body for one call of `descriptor`.
 */
export function buildRequest(descriptor: OperationDescriptor, args: OperationArgs, baseUrl?: string): PreparedRequest {
  const groupSpec = descriptor.groupedParameterSpec;
  const rawGroup = groupSpec ? args[groupSpec.name] : undefined;
  const groupValue = isRecord(rawGroup) ? rawGroup : undefined;

  let url = descriptor.url;
  let fullUrl: string | undefined;
  const query: Record<string, string> = {};
  const headers: Record<string, string> = {};
  const request: TransportRequest = { query, headers };

  for (const parameter of descriptor.parameters) {
    const value = argumentValue(parameter, args, groupSpec, groupValue);
    if (value === undefined || value === null) {
      if (parameter.required) {
        throw new InvalidArgumentError(descriptor.name, parameter.name);
      }
      continue;
    }

    const wireName = parameter.serializedName ?? parameter.name;
    switch (parameter.location) {
      case 'url':
        fullUrl = String(value);
        break;
      case 'path':
        url = url.split(`{${wireName}}`).join(encodeURIComponent(toParameterString(value)));
        break;
      case 'query':
        query[wireName] = toParameterString(value);
        break;
      case 'header':
        headers[wireName] = toParameterString(value);
        break;
      case 'body':
        request.body = value;
        break;
    }
  }

  return { url: resolveUrl(fullUrl ?? url, baseUrl), request };
}

export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

/** Settles with `call`, or rejects with `cancelled()` as soon as `signal` fires. */
async function raceAbort<T>(call: Promise<T>, signal: AbortSignal, cancelled: () => CancelledError): Promise<T> {
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(cancelled());
      return;
    }
    onAbort = () => reject(cancelled());
    signal.addEventListener('abort', onAbort, { once: true });
  });
  try {
    return await Promise.race([call, aborted]);
  } finally {
    if (onAbort) signal.removeEventListener('abort', onAbort);
  }
}

/**
 * Calls the transport, turning its rejections into `TransportError`,
 * or into the caller's cancellation error once `signal` has fired,
 * whether or not the transport itself honours the signal.
 */
export async function sendRequest(
  transport: Transport,
  verb: HttpVerb,
  prepared: PreparedRequest,
  cancelled: () => CancelledError,
  signal?: AbortSignal
): Promise<TransportResponse> {
  if (signal?.aborted) throw cancelled();
  try {
    if (!signal) {
      return await transport.call(verb, prepared.url, prepared.request);
    }
    return await raceAbort(transport.call(verb, prepared.url, { ...prepared.request, signal }), signal, cancelled);
  } catch (error) {
    if (error instanceof CancelledError) throw error;
    if (signal?.aborted) throw cancelled();
    if (error instanceof OperationError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransportError(`${verb} ${prepared.url} failed: ${reason}`, error);
  }
}

export function checkStatus(descriptor: OperationDescriptor, response: TransportResponse): TransportResponse {
  const expected = descriptor.expectedStatusCodes;
  const accepted = expected && expected.length > 0
    ? expected.includes(response.statusCode)
    : response.statusCode >= 200 && response.statusCode < 300;
  if (!accepted) {
    throw new ServiceResponseError(descriptor.name, response.statusCode, response.body);
  }
  return response;
}
