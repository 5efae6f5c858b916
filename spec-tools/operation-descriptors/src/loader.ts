import * as fs from 'fs';
import * as YAML from 'yaml';
import { OpenAPIV3 } from 'openapi-types';
import {
  GroupedParameterSpec,
  HttpVerb,
  isRecord,
  NextOperationRef,
  normalizeGroupName,
  OperationDescriptor,
  OperationGroupDefinition,
  OperationExtensions,
  PageableExtension,
  ParameterLocation,
  ParameterSpec,
  ResponseBodyKind,
} from '../../../sdks/runtime/typescript';
import { OperationExtensionFields } from './types';

type Document = OpenAPIV3.Document<OperationExtensionFields>;
type Operation = OpenAPIV3.OperationObject<OperationExtensionFields>;

const VERBS: ReadonlyArray<[OpenAPIV3.HttpMethods, HttpVerb]> = [
  [OpenAPIV3.HttpMethods.GET, 'GET'],
  [OpenAPIV3.HttpMethods.PUT, 'PUT'],
  [OpenAPIV3.HttpMethods.PATCH, 'PATCH'],
  [OpenAPIV3.HttpMethods.POST, 'POST'],
  [OpenAPIV3.HttpMethods.DELETE, 'DELETE'],
];

const HANDLED_EXTENSIONS = new Set(['x-ms-pageable', 'x-ms-long-running-operation']);
const WHOLE_URL_PATH = /^\{(\w+)\}$/;
const PARAMETER_REF = '#/components/parameters/';

export function isOpenApiDocument(value: unknown): value is Document {
  return isRecord(value) && typeof value.openapi === 'string' && isRecord(value.paths);
}

export function readOpenApiDocument(specPath: string): Document {
  const parsed: unknown = YAML.parse(fs.readFileSync(specPath, 'utf8'));
  if (!isOpenApiDocument(parsed)) {
    throw new Error(`Not an OpenAPI 3 document: ${specPath}`);
  }
  return parsed;
}

function camelCase(name: string): string {
  return name.charAt(0).toLowerCase() + name.slice(1);
}

/**
 * `Widgets_ListNext` names operation `listNext` in group `widgets`; an id without `_` belongs to the client itself.
 */
export function splitOperationId(operationId: string): { groupName: string; operationName: string } {
  const separator = operationId.indexOf('_');
  if (separator < 0) {
    return { groupName: '', operationName: camelCase(operationId) };
  }
  return {
    groupName: normalizeGroupName(operationId.slice(0, separator)),
    operationName: camelCase(operationId.slice(separator + 1)),
  };
}

function resolveParameter(
  document: Document,
  parameter: OpenAPIV3.ReferenceObject | OpenAPIV3.ParameterObject
): OpenAPIV3.ParameterObject {
  if (!('$ref' in parameter)) {
    return parameter;
  }
  const target = parameter.$ref.startsWith(PARAMETER_REF)
    ? document.components?.parameters?.[parameter.$ref.slice(PARAMETER_REF.length)]
    : undefined;
  if (!target || '$ref' in target) {
    throw new Error(`Cannot resolve parameter reference ${parameter.$ref}`);
  }
  return target;
}

function isWireLocation(value: string): value is 'path' | 'query' | 'header' {
  return value === 'path' || value === 'query' || value === 'header';
}

function groupingName(parameter: OpenAPIV3.ParameterObject, operationName: string): string | undefined {
  if (!('x-ms-parameter-grouping' in parameter)) {
    return undefined;
  }
  const grouping = parameter['x-ms-parameter-grouping'];
  return isRecord(grouping) && typeof grouping.name === 'string' ? grouping.name : `${operationName}Options`;
}

function readParameters(
  document: Document,
  path: string,
  pathItem: OpenAPIV3.PathItemObject<OperationExtensionFields>,
  operation: Operation,
  operationName: string
): { parameters: ParameterSpec[]; groupedParameterSpec?: GroupedParameterSpec } {
  const urlParameter = WHOLE_URL_PATH.exec(path)?.[1];
  const parameters: ParameterSpec[] = [];
  let group: { name: string; fields: string[] } | undefined;

  for (const raw of [...(pathItem.parameters ?? []), ...(operation.parameters ?? [])]) {
    const parameter = resolveParameter(document, raw);
    if (parameter.in === 'cookie') continue;

    if (!isWireLocation(parameter.in)) {
      throw new Error(`Unsupported parameter location '${parameter.in}' for ${parameter.name}`);
    }
    const location: ParameterLocation = parameter.in === 'path' && parameter.name === urlParameter ? 'url' : parameter.in;
    parameters.push({ name: parameter.name, location, required: parameter.required === true });

    const groupName = groupingName(parameter, operationName);
    if (groupName !== undefined) {
      // Only the first group of an operation is carried to related operations
      group ??= { name: groupName, fields: [] };
      if (group.name === groupName) group.fields.push(parameter.name);
    }
  }

  if (operation.requestBody) {
    const required = '$ref' in operation.requestBody ? false : operation.requestBody.required === true;
    parameters.push({ name: 'body', location: 'body', required });
  }
  return group ? { parameters, groupedParameterSpec: group } : { parameters };
}

function readPageable(value: unknown): { pageable: PageableExtension; nextOperationRef?: NextOperationRef } | undefined {
  if (!isRecord(value)) {
    return value === true ? { pageable: {} } : undefined;
  }
  const pageable: { itemName?: string; nextLinkName?: string | null } = {};
  if (typeof value.itemName === 'string') pageable.itemName = value.itemName;
  if (value.nextLinkName === null || typeof value.nextLinkName === 'string') pageable.nextLinkName = value.nextLinkName;

  if (typeof value.operationName !== 'string') {
    return { pageable };
  }
  const { groupName, operationName } = splitOperationId(value.operationName);
  return {
    pageable,
    nextOperationRef: value.operationName.includes('_') ? { operationName, groupName } : { operationName },
  };
}

function responseBodyKind(operation: Operation, pageable: boolean): ResponseBodyKind {
  if (pageable) return 'sequence';
  const success = operation.responses['200'] ?? operation.responses['201'];
  if (!success) return 'none';
  if ('$ref' in success) return 'scalar';
  const schema = success.content?.['application/json']?.schema;
  if (!schema) return 'none';
  return !('$ref' in schema) && schema.type === 'array' ? 'sequence' : 'scalar';
}

function readOperation(
  document: Document,
  path: string,
  pathItem: OpenAPIV3.PathItemObject<OperationExtensionFields>,
  operation: Operation,
  httpVerb: HttpVerb,
  operationName: string
): OperationDescriptor {
  const extensions: { -readonly [K in keyof OperationExtensions]: OperationExtensions[K] } = {};
  for (const [key, value] of Object.entries(operation)) {
    if (key.startsWith('x-') && !HANDLED_EXTENSIONS.has(key)) {
      extensions[key] = value;
    }
  }

  const paging = readPageable(operation['x-ms-pageable']);
  if (paging) extensions.pageable = paging.pageable;
  if (operation['x-ms-long-running-operation'] === true) extensions.longRunning = true;

  const { parameters, groupedParameterSpec } = readParameters(document, path, pathItem, operation, operationName);
  const expectedStatusCodes = Object.keys(operation.responses)
    .filter((code) => /^\d{3}$/.test(code))
    .map(Number);

  return {
    name: operationName,
    httpVerb,
    url: path,
    parameters,
    extensions,
    responseBodyKind: responseBodyKind(operation, paging !== undefined),
    ...(paging?.nextOperationRef ? { nextOperationRef: paging.nextOperationRef } : {}),
    ...(groupedParameterSpec ? { groupedParameterSpec } : {}),
    ...(expectedStatusCodes.length > 0 ? { expectedStatusCodes } : {}),
  };
}

/**
 * Builds the operation group definitions the runtime registry consumes.
 */
export function loadOperationGroups(document: Document): OperationGroupDefinition[] {
  const groups = new Map<string, OperationDescriptor[]>();

  for (const [path, pathItem] of Object.entries(document.paths)) {
    if (!pathItem) continue;
    for (const [method, httpVerb] of VERBS) {
      const operation = pathItem[method];
      if (!operation) continue;
      if (!operation.operationId) {
        throw new Error(`${httpVerb} ${path} has no operationId`);
      }
      const { groupName, operationName } = splitOperationId(operation.operationId);
      const operations = groups.get(groupName) ?? [];
      operations.push(readOperation(document, path, pathItem, operation, httpVerb, operationName));
      groups.set(groupName, operations);
    }
  }

  return [...groups.entries()].map(([name, operations]) => ({ name, operations }));
}
