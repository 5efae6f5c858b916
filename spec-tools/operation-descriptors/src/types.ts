export interface ValidationIssue {
  type:
    | 'unresolved-next-operation'
    | 'invalid-long-running-verb'
    | 'next-operation-without-parameters'
    | 'grouped-field-mismatch'
    | 'pageable-and-long-running'
    | 'duplicate-operation';
  message: string;
  location: string;
  groupName?: string;
  operationName?: string;
  severity: 'error' | 'warning';
}

export interface ValidationResult {
  issues: ValidationIssue[];
  totalIssues: number;
  errorCount: number;
  warningCount: number;
  summary: {
    groups: string[];
    operationCount: number;
    pageableOperations: string[];
    longRunningOperations: string[];
  };
}

/** Operation-level vendor extensions read from the document */
export interface OperationExtensionFields {
  'x-ms-pageable'?: unknown;
  'x-ms-long-running-operation'?: unknown;
}
