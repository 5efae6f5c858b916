import { OperationNotFoundError } from './errors';
import { pollingStrategyFor } from './PollingStrategy';
import { NextOperationRef, OperationDescriptor, OperationGroupDefinition } from './types';

/** Name of the group holding the operations declared on the client itself */
export const CLIENT_GROUP = '';

export interface RegisteredOperation {
  readonly descriptor: OperationDescriptor;
  readonly group: OperationGroup;
  /** Reached only through another operation's next reference; never wrapped in a pager itself */
  readonly isNextPageOperation: boolean;
  /** Next page reference with its group name normalized */
  readonly nextOperation?: Required<NextOperationRef>;
}

interface MutableRegistration {
  descriptor: OperationDescriptor;
  group: OperationGroup;
  isNextPageOperation: boolean;
  nextOperation?: Required<NextOperationRef>;
}

/**
 * `WidgetsOperations`, `Widgets` and `widgets` all register as `widgets`.
 */
export function normalizeGroupName(name: string): string {
  let normalized = name.trim();
  if (normalized.length > 'Operations'.length && normalized.endsWith('Operations')) {
    normalized = normalized.slice(0, -'Operations'.length);
  }
  return normalized.charAt(0).toLowerCase() + normalized.slice(1);
}

export class OperationGroup {
  private readonly operations = new Map<string, RegisteredOperation>();

  constructor(
    readonly name: string,
    readonly registry: OperationRegistry
  ) {}

  /** @internal */
  add(operation: RegisteredOperation): void {
    if (this.operations.has(operation.descriptor.name)) {
      throw new Error(`Duplicate operation '${operation.descriptor.name}' in group '${this.name}'`);
    }
    this.operations.set(operation.descriptor.name, operation);
  }

  has(operationName: string): boolean {
    return this.operations.has(operationName);
  }

  list(): RegisteredOperation[] {
    return [...this.operations.values()];
  }

  /**
   * Resolves within this group, or through the owning registry when `groupName` names another group.
   */
  resolve(operationName: string, groupName?: string): RegisteredOperation {
    if (groupName !== undefined && groupName !== this.name) {
      return this.registry.resolve(operationName, groupName);
    }
    const operation = this.operations.get(operationName);
    if (!operation) {
      throw new OperationNotFoundError(operationName, this.name || undefined);
    }
    return operation;
  }
}

/**
 * Maps (group, operation name) to registered operations. Built once; read-only afterwards.
 */
export class OperationRegistry {
  private readonly groups = new Map<string, OperationGroup>();

  constructor(definitions: readonly OperationGroupDefinition[]) {
    const registrations: MutableRegistration[] = [];

    for (const definition of definitions) {
      const name = normalizeGroupName(definition.name);
      if (this.groups.has(name)) {
        throw new Error(`Duplicate operation group '${name}'`);
      }
      const group = new OperationGroup(name, this);
      this.groups.set(name, group);
      for (const descriptor of definition.operations) {
        if (descriptor.extensions.longRunning) {
          // Fails fast on verbs without a polling family
          pollingStrategyFor(descriptor);
        }
        registrations.push({ descriptor, group, isNextPageOperation: false });
      }
    }
    if (!this.groups.has(CLIENT_GROUP)) {
      this.groups.set(CLIENT_GROUP, new OperationGroup(CLIENT_GROUP, this));
    }

    this.linkNextOperations(registrations);

    for (const registration of registrations) {
      registration.group.add({ ...registration });
    }
  }

  private linkNextOperations(registrations: MutableRegistration[]): void {
    const byKey = new Map<string, MutableRegistration>();
    for (const registration of registrations) {
      byKey.set(`${registration.group.name}/${registration.descriptor.name}`, registration);
    }

    for (const registration of registrations) {
      const { descriptor, group } = registration;
      if (!descriptor.extensions.pageable) continue;

      const ref = descriptor.nextOperationRef;
      const nextOperation = ref
        ? {
            operationName: ref.operationName,
            groupName: ref.groupName === undefined ? group.name : normalizeGroupName(ref.groupName),
          }
        : { operationName: `${descriptor.name}Next`, groupName: group.name };
      const target = byKey.get(`${nextOperation.groupName}/${nextOperation.operationName}`);

      if (!ref && !target) continue;
      registration.nextOperation = nextOperation;
      if (!target) continue;

      if (target.descriptor.parameters.length === 0) {
        throw new Error(
          `Next page operation '${nextOperation.operationName}' must declare a parameter for the continuation link`
        );
      }
      // A pageable operation naming itself as its next operation is still an entry point
      if (target !== registration) {
        target.isNextPageOperation = true;
      }
    }
  }

  group(groupName: string): OperationGroup {
    const group = this.groups.get(groupName);
    if (!group) {
      throw new OperationNotFoundError('', groupName);
    }
    return group;
  }

  groupNames(): string[] {
    return [...this.groups.keys()];
  }

  /**
   * Resolves `operationName` in `groupName`, or among the client's own operations when no group is given.
   */
  resolve(operationName: string, groupName?: string): RegisteredOperation {
    const group = this.groups.get(groupName ?? CLIENT_GROUP);
    if (!group) {
      throw new OperationNotFoundError(operationName, groupName);
    }
    return group.resolve(operationName);
  }
}
