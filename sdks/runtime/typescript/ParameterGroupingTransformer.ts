import { GroupedParameterSpec, isRecord, OperationArgs, OperationDescriptor } from './types';

export type GroupedParameterValue = Record<string, unknown>;

/**
 * Derives the grouped argument of a related (next page or status) operation from the
 * grouped argument of the operation that started the chain.
 *
 * Only the fields the target group declares are copied. An absent source group stays absent:
 * no empty target instance is built for it.
 */
export function transformGroupedParameter(
  source: Readonly<GroupedParameterValue> | null | undefined,
  target: GroupedParameterSpec
): GroupedParameterValue | undefined {
  if (source === null || source === undefined) {
    return undefined;
  }
  const derived: GroupedParameterValue = {};
  for (const field of target.fields) {
    const value = source[field];
    if (value !== undefined) {
      derived[field] = value;
    }
  }
  return derived;
}

/**
 * Applies {@link transformGroupedParameter} between two descriptors' argument sets.
 * Returns the entry to merge into the target's arguments, or an empty object when either side
 * declares no group.
 */
export function deriveGroupedArgument(
  source: OperationDescriptor,
  sourceArgs: OperationArgs,
  target: OperationDescriptor
): OperationArgs {
  const sourceSpec = source.groupedParameterSpec;
  const targetSpec = target.groupedParameterSpec;
  if (!sourceSpec || !targetSpec) {
    return {};
  }
  const sourceValue = sourceArgs[sourceSpec.name];
  const derived = transformGroupedParameter(isRecord(sourceValue) ? sourceValue : undefined, targetSpec);
  return derived === undefined ? {} : { [targetSpec.name]: derived };
}
