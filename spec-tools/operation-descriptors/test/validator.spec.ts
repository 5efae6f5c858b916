import * as path from 'path';
import { OperationDescriptor } from '../../../sdks/runtime/typescript';
import { loadOperationGroups, readOpenApiDocument } from '../src/loader';
import { validateOperationGroups } from '../src/validator';

function operation(name: string, overrides: Partial<OperationDescriptor> = {}): OperationDescriptor {
  return {
    name,
    httpVerb: 'GET',
    url: `/${name}`,
    parameters: [{ name: 'nextLink', location: 'url', required: true }],
    extensions: {},
    responseBodyKind: 'scalar',
    ...overrides,
  };
}

describe('validateOperationGroups', () => {
  test('summarizes the fixture document and flags the grouped field it cannot carry', () => {
    const result = validateOperationGroups(loadOperationGroups(readOpenApiDocument(path.join(__dirname, 'fixtures', 'widgets.yaml'))));

    expect(result.summary).toEqual({
      groups: ['widgets', 'gadgets', ''],
      operationCount: 7,
      pageableOperations: ['widgets.list', 'widgets.listNext', 'gadgets.listByWidget'],
      longRunningOperations: ['widgets.createOrUpdate', 'widgets.delete'],
    });
    expect(result.errorCount).toBe(0);
    expect(result.issues).toEqual([
      {
        type: 'grouped-field-mismatch',
        message: 'Grouped fields x-request-id of widgets.listNext are not in the group of gadgets.listByWidget',
        location: 'gadgets.listByWidget',
        groupName: 'gadgets',
        operationName: 'listByWidget',
        severity: 'warning',
      },
    ]);
  });

  test('reports a next operation that does not exist', () => {
    const result = validateOperationGroups([
      {
        name: 'Widgets',
        operations: [operation('list', { extensions: { pageable: {} }, nextOperationRef: { operationName: 'listMore' } })],
      },
    ]);

    expect(result.issues).toEqual([
      expect.objectContaining({
        type: 'unresolved-next-operation',
        message: 'Next operation widgets.listMore of widgets.list does not exist',
        severity: 'error',
      }),
    ]);
    expect(result.errorCount).toBe(1);
  });

  test('accepts a pageable operation without any next operation', () => {
    const result = validateOperationGroups([
      { name: 'Widgets', operations: [operation('list', { extensions: { pageable: { nextLinkName: null } } })] },
    ]);
    expect(result.totalIssues).toBe(0);
  });

  test('reports a long running GET', () => {
    const result = validateOperationGroups([
      { name: '', operations: [operation('refresh', { extensions: { longRunning: true } })] },
    ]);

    expect(result.issues.map((issue) => [issue.type, issue.location, issue.severity])).toEqual([
      ['invalid-long-running-verb', 'refresh', 'error'],
    ]);
  });

  test('reports a default next operation without parameters', () => {
    const result = validateOperationGroups([
      {
        name: 'Widgets',
        operations: [operation('list', { extensions: { pageable: {} } }), operation('listNext', { parameters: [] })],
      },
    ]);

    expect(result.issues.map((issue) => issue.type)).toEqual(['next-operation-without-parameters']);
  });

  test('warns about operations that are pageable and long running', () => {
    const result = validateOperationGroups([
      { name: 'Widgets', operations: [operation('import', { httpVerb: 'POST', extensions: { pageable: {}, longRunning: true } })] },
    ]);

    expect(result.issues).toEqual([
      expect.objectContaining({
        type: 'pageable-and-long-running',
        message: 'widgets.import is both pageable and long running; it will be polled and not paged',
        severity: 'warning',
      }),
    ]);
    expect(result.warningCount).toBe(1);
  });

  test('reports duplicates across group spellings', () => {
    const result = validateOperationGroups([
      { name: 'WidgetsOperations', operations: [operation('get')] },
      { name: 'widgets', operations: [operation('get')] },
    ]);

    expect(result.issues.map((issue) => issue.message)).toEqual(['Operation widgets.get is declared more than once']);
    expect(result.summary.operationCount).toBe(1);
  });
});
