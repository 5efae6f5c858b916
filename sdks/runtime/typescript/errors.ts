import { PollStatus } from './types';

export interface OperationProgress {
  /** Pages fully processed before the error */
  pagesProcessed?: number;
  /** Status checks completed before the error */
  pollCount?: number;
}

/**
 * Base class for every error raised by the operation runtime.
 */
export class OperationError extends Error {
  pagesProcessed?: number;
  pollCount?: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OperationError';
    // Ensure the prototype chain is correctly set up
    Object.setPrototypeOf(this, OperationError.prototype);
  }

  annotate(progress: OperationProgress): this {
    if (progress.pagesProcessed !== undefined) this.pagesProcessed = progress.pagesProcessed;
    if (progress.pollCount !== undefined) this.pollCount = progress.pollCount;
    return this;
  }
}

export class OperationNotFoundError extends OperationError {
  readonly operationName: string;
  readonly groupName?: string;

  constructor(operationName: string, groupName?: string) {
    super(
      !operationName
        ? `Operation group '${groupName}' not found`
        : groupName
          ? `Operation '${operationName}' not found in group '${groupName}'`
          : `Operation '${operationName}' not found`
    );
    this.name = 'OperationNotFoundError';
    Object.setPrototypeOf(this, OperationNotFoundError.prototype);
    this.operationName = operationName;
    this.groupName = groupName;
  }
}

export class InvalidOperationVerbError extends OperationError {
  readonly httpVerb: string;

  constructor(operationName: string, httpVerb: string) {
    super(`Invalid long running operation HTTP method ${httpVerb} on '${operationName}'`);
    this.name = 'InvalidOperationVerbError';
    Object.setPrototypeOf(this, InvalidOperationVerbError.prototype);
    this.httpVerb = httpVerb;
  }
}

export class InvalidArgumentError extends OperationError {
  readonly parameterName: string;

  constructor(operationName: string, parameterName: string) {
    super(`Missing required parameter '${parameterName}' for '${operationName}'`);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
    this.parameterName = parameterName;
  }
}

export class TransportError extends OperationError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export class ServiceResponseError extends OperationError {
  readonly statusCode: number;
  readonly body: unknown;

  constructor(operationName: string, statusCode: number, body: unknown) {
    super(`'${operationName}' failed with status code ${statusCode}`);
    this.name = 'ServiceResponseError';
    Object.setPrototypeOf(this, ServiceResponseError.prototype);
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class OperationFailedError extends OperationError {
  readonly status: PollStatus;
  /** Body of the last status check */
  readonly lastBody: unknown;

  constructor(message: string, status: PollStatus, lastBody: unknown) {
    super(message);
    this.name = 'OperationFailedError';
    Object.setPrototypeOf(this, OperationFailedError.prototype);
    this.status = status;
    this.lastBody = lastBody;
  }
}

export class CancelledError extends OperationError {
  constructor(message = 'Operation was cancelled') {
    super(message);
    this.name = 'CancelledError';
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

export class InterruptedPollError extends CancelledError {
  constructor(message = 'Long running operation was interrupted') {
    super(message);
    this.name = 'InterruptedPollError';
    Object.setPrototypeOf(this, InterruptedPollError.prototype);
  }
}
