import { CancelledError, OperationError } from './errors';
import { OperationLogger } from './logging';
import { RegisteredOperation } from './OperationRegistry';
import { deriveGroupedArgument } from './ParameterGroupingTransformer';
import {
  isRecord,
  OperationArgs,
  OperationDescriptor,
  Page,
  PageableExtension,
  TransportResponse,
} from './types';

/** Returned by an `onPage` callback: keep fetching, or finish with the items gathered so far */
export type PagingBehavior = 'continue' | 'stop';

export interface PagingOptions {
  signal?: AbortSignal;
  /** Fail with `CancelledError` once this many pages were fetched and the service still reports more */
  maxPages?: number;
  /** Progress callback for `page()` */
  onPage?: (page: Page, index: number) => PagingBehavior | void;
}

export type OperationCaller = (
  operation: RegisteredOperation,
  args: OperationArgs,
  signal?: AbortSignal
) => Promise<TransportResponse>;

export function readPage(body: unknown, pageable: PageableExtension | undefined): Page {
  if (Array.isArray(body)) {
    return { items: body };
  }
  if (!isRecord(body)) {
    return { items: [] };
  }
  const itemName = pageable?.itemName ?? 'value';
  const nextLinkName = pageable?.nextLinkName === undefined ? 'nextLink' : pageable.nextLinkName;

  const rawItems = body[itemName];
  const items: unknown[] = Array.isArray(rawItems) ? rawItems : [];
  const link = nextLinkName === null ? undefined : body[nextLinkName];
  return typeof link === 'string' && link !== '' ? { items, continuationToken: link } : { items };
}

/**
 * Arguments for the next page call: the continuation link goes to the next operation's first parameter,
 * same-named arguments of the originating call are carried over and the grouped argument is re-derived.
 */
export function nextPageArguments(
  origin: OperationDescriptor,
  originArgs: OperationArgs,
  next: OperationDescriptor,
  continuationToken: string
): OperationArgs {
  const [primary, ...rest] = next.parameters;
  if (!primary) {
    throw new Error(`Next page operation '${next.name}' declares no parameter for the continuation link`);
  }
  const groupFields = next.groupedParameterSpec?.fields ?? [];
  const args: Record<string, unknown> = {};
  for (const parameter of rest) {
    if (groupFields.includes(parameter.name)) continue;
    if (Object.prototype.hasOwnProperty.call(originArgs, parameter.name)) {
      args[parameter.name] = originArgs[parameter.name];
    }
  }
  return {
    ...args,
    ...deriveGroupedArgument(origin, originArgs, next),
    [primary.name]: continuationToken,
  };
}

export function operationLabel(operation: RegisteredOperation): string {
  return operation.group.name ? `${operation.group.name}.${operation.descriptor.name}` : operation.descriptor.name;
}

/**
 * Follows continuation links of a pageable operation, one page at a time and strictly in order.
 */
export class Pager {
  constructor(
    private readonly call: OperationCaller,
    private readonly log: OperationLogger
  ) {}

  /**
   * Lazily fetches pages. The sequence only ends when the service stops sending a continuation link,
   * so callers should bound it with `maxPages` or a signal when the service is not trusted.
   */
  async *pages(origin: RegisteredOperation, args: OperationArgs, options: PagingOptions = {}): AsyncGenerator<Page> {
    let operation = origin;
    let operationArgs = args;
    let pagesProcessed = 0;

    try {
      for (;;) {
        if (options.signal?.aborted) {
          throw new CancelledError(`Paging '${operationLabel(origin)}' was cancelled`);
        }
        const response = await this.call(operation, operationArgs, options.signal);
        const page = readPage(
          response.body,
          operation.descriptor.extensions.pageable ?? origin.descriptor.extensions.pageable
        );
        pagesProcessed++;
        this.log.basic(`📄 ${operationLabel(origin)} - Page ${pagesProcessed}: ${page.items.length} item(s)`);
        this.log.detailed(`📄 ${operationLabel(origin)} - Page ${pagesProcessed}:`, response.body);

        yield page;

        if (page.continuationToken === undefined) {
          return;
        }
        if (options.maxPages !== undefined && pagesProcessed >= options.maxPages) {
          throw new CancelledError(`Page limit of ${options.maxPages} reached for '${operationLabel(origin)}'`);
        }
        operation = this.resolveNext(origin);
        operationArgs = nextPageArguments(origin.descriptor, args, operation.descriptor, page.continuationToken);
      }
    } catch (error) {
      if (error instanceof OperationError) {
        error.annotate({ pagesProcessed });
      }
      throw error;
    }
  }

  /**
   * Fetches every page and returns the concatenated items in fetch order.
   * Nothing is returned when paging fails or is cancelled part way.
   */
  async page(origin: RegisteredOperation, args: OperationArgs, options: PagingOptions = {}): Promise<unknown[]> {
    const items: unknown[] = [];
    let index = 0;
    for await (const page of this.pages(origin, args, options)) {
      items.push(...page.items);
      if (options.onPage?.(page, index++) === 'stop') {
        break;
      }
    }
    return items;
  }

  private resolveNext(origin: RegisteredOperation): RegisteredOperation {
    const ref = origin.nextOperation ?? {
      operationName: `${origin.descriptor.name}Next`,
      groupName: origin.group.name,
    };
    return origin.group.resolve(ref.operationName, ref.groupName);
  }
}
