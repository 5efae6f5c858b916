import {
  normalizeGroupName,
  OperationDescriptor,
  OperationGroupDefinition,
} from '../../../sdks/runtime/typescript';
import { ValidationIssue, ValidationResult } from './types';

const POLLABLE_VERBS = new Set(['PUT', 'PATCH', 'POST', 'DELETE']);

interface Located {
  descriptor: OperationDescriptor;
  groupName: string;
  location: string;
}

function locationOf(groupName: string, operationName: string): string {
  return groupName ? `${groupName}.${operationName}` : operationName;
}

/**
 * Checks a descriptor set for the problems the runtime registry would reject, or silently mishandle, at startup.
 */
export function validateOperationGroups(definitions: readonly OperationGroupDefinition[]): ValidationResult {
  const issues: ValidationIssue[] = [];
  const index = new Map<string, Map<string, OperationDescriptor>>();
  const all: Located[] = [];

  for (const definition of definitions) {
    const groupName = normalizeGroupName(definition.name);
    const operations = index.get(groupName) ?? new Map<string, OperationDescriptor>();
    index.set(groupName, operations);

    for (const descriptor of definition.operations) {
      const location = locationOf(groupName, descriptor.name);
      if (operations.has(descriptor.name)) {
        issues.push({
          type: 'duplicate-operation',
          message: `Operation ${location} is declared more than once`,
          location,
          groupName,
          operationName: descriptor.name,
          severity: 'error'
        });
        continue;
      }
      operations.set(descriptor.name, descriptor);
      all.push({ descriptor, groupName, location });
    }
  }

  for (const { descriptor, groupName, location } of all) {
    const { extensions } = descriptor;
    const base = { location, groupName, operationName: descriptor.name };

    if (extensions.longRunning && !POLLABLE_VERBS.has(descriptor.httpVerb)) {
      issues.push({
        ...base,
        type: 'invalid-long-running-verb',
        message: `Long running operation ${location} uses ${descriptor.httpVerb}; only PUT, PATCH, POST and DELETE can be polled`,
        severity: 'error'
      });
    }

    if (!extensions.pageable) continue;

    if (extensions.longRunning) {
      issues.push({
        ...base,
        type: 'pageable-and-long-running',
        message: `${location} is both pageable and long running; it will be polled and not paged`,
        severity: 'warning'
      });
    }

    const ref = descriptor.nextOperationRef;
    const targetGroup = ref?.groupName === undefined ? groupName : normalizeGroupName(ref.groupName);
    const targetName = ref?.operationName ?? `${descriptor.name}Next`;
    const target = index.get(targetGroup)?.get(targetName);

    if (!target) {
      if (ref) {
        issues.push({
          ...base,
          type: 'unresolved-next-operation',
          message: `Next operation ${locationOf(targetGroup, targetName)} of ${location} does not exist`,
          severity: 'error'
        });
      }
      continue;
    }

    if (target.parameters.length === 0) {
      issues.push({
        ...base,
        type: 'next-operation-without-parameters',
        message: `Next operation ${locationOf(targetGroup, targetName)} declares no parameter for the continuation link`,
        severity: 'error'
      });
    }

    const targetSpec = target.groupedParameterSpec;
    if (targetSpec && target !== descriptor) {
      const sourceFields = new Set(descriptor.groupedParameterSpec?.fields ?? []);
      const missing = targetSpec.fields.filter((field) => !sourceFields.has(field));
      if (missing.length > 0) {
        issues.push({
          ...base,
          type: 'grouped-field-mismatch',
          message: `Grouped fields ${missing.join(', ')} of ${locationOf(targetGroup, targetName)} are not in the group of ${location}`,
          severity: 'warning'
        });
      }
    }
  }

  const errorCount = issues.filter((issue) => issue.severity === 'error').length;
  return {
    issues,
    totalIssues: issues.length,
    errorCount,
    warningCount: issues.length - errorCount,
    summary: {
      groups: [...index.keys()],
      operationCount: all.length,
      pageableOperations: all.filter((entry) => entry.descriptor.extensions.pageable).map((entry) => entry.location),
      longRunningOperations: all.filter((entry) => entry.descriptor.extensions.longRunning).map((entry) => entry.location)
    }
  };
}
