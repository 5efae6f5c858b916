import { InvalidOperationVerbError } from './errors';
import { OperationDescriptor } from './types';

/**
 * How a long running operation is followed up after the initiating call.
 *
 * - `resource-polling` (PUT, PATCH): status checks GET the original resource URL and the final result is the resource.
 * - `operation-polling` (POST, DELETE): status checks GET an operation status URL taken from the initiating response.
 *   DELETE completes with no result.
 */
export type PollingStrategy =
  | { readonly kind: 'resource-polling' }
  | { readonly kind: 'operation-polling'; readonly finalResult: 'payload' | 'void' };

const strategies = new WeakMap<OperationDescriptor, PollingStrategy>();

function selectPollingStrategy(descriptor: OperationDescriptor): PollingStrategy {
  switch (descriptor.httpVerb) {
    case 'PUT':
    case 'PATCH':
      return { kind: 'resource-polling' };
    case 'POST':
      return { kind: 'operation-polling', finalResult: 'payload' };
    case 'DELETE':
      return { kind: 'operation-polling', finalResult: 'void' };
    default:
      throw new InvalidOperationVerbError(descriptor.name, descriptor.httpVerb);
  }
}

/** Chooses the strategy once per descriptor; later calls reuse it. */
export function pollingStrategyFor(descriptor: OperationDescriptor): PollingStrategy {
  let strategy = strategies.get(descriptor);
  if (!strategy) {
    strategy = selectPollingStrategy(descriptor);
    strategies.set(descriptor, strategy);
  }
  return strategy;
}
