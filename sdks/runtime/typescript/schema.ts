import { z } from 'zod';
import { OperationGroupDefinition } from './types';

const parameterSchema = z.object({
  name: z.string().min(1),
  location: z.enum(['path', 'query', 'header', 'body', 'url']),
  serializedName: z.string().optional(),
  required: z.boolean().optional(),
});

const extensionsSchema = z
  .object({
    pageable: z
      .object({
        itemName: z.string().optional(),
        nextLinkName: z.string().nullable().optional(),
      })
      .optional(),
    longRunning: z.boolean().optional(),
  })
  .catchall(z.unknown());

const descriptorSchema = z.object({
  name: z.string().min(1),
  httpVerb: z.enum(['GET', 'PUT', 'PATCH', 'POST', 'DELETE']),
  url: z.string(),
  parameters: z.array(parameterSchema),
  extensions: extensionsSchema,
  responseBodyKind: z.enum(['scalar', 'sequence', 'none']),
  nextOperationRef: z
    .object({
      operationName: z.string().min(1),
      groupName: z.string().optional(),
    })
    .optional(),
  groupedParameterSpec: z
    .object({
      name: z.string().min(1),
      fields: z.array(z.string()),
    })
    .optional(),
  expectedStatusCodes: z.array(z.number().int()).optional(),
});

const groupsSchema = z.array(
  z.object({
    name: z.string(),
    operations: z.array(descriptorSchema),
  })
);

/**
 * Validates descriptor JSON, such as the file written by the descriptor tool, before it reaches the registry.
 */
export function parseOperationGroups(data: unknown): OperationGroupDefinition[] {
  const result = groupsSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => {
        const path = issue.path.length ? issue.path.join('.') : '(root)';
        return `${path}: ${issue.message}`;
      })
      .join('; ');
    throw new Error(`Invalid operation descriptors: ${details}`);
  }
  return result.data;
}
