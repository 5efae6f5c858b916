export * from './types';
export * from './errors';
export { getDefaultLoggingOptions, OperationLogger } from './logging';
export type { LogFunction, LoggingOptions, LogLevel } from './logging';
export { getDefaultPollingOptions } from './config';
export type { PollingDefaults } from './config';
export { CLIENT_GROUP, normalizeGroupName, OperationGroup, OperationRegistry } from './OperationRegistry';
export type { RegisteredOperation } from './OperationRegistry';
export { deriveGroupedArgument, transformGroupedParameter } from './ParameterGroupingTransformer';
export type { GroupedParameterValue } from './ParameterGroupingTransformer';
export { nextPageArguments, Pager, readPage } from './Pager';
export type { OperationCaller, PagingBehavior, PagingOptions } from './Pager';
export { parsePollStatus, Poller, readPollStatus, retryAfter } from './Poller';
export type { InitiatingCall, PollOptions, StatusSource } from './Poller';
export { pollingStrategyFor } from './PollingStrategy';
export type { PollingStrategy } from './PollingStrategy';
export { executionStrategyFor, OperationInvoker } from './OperationInvoker';
export type { ExecutionStrategy, InvokeOptions, InvokerSettings } from './OperationInvoker';
export { OperationHandle, OperationsClient } from './OperationsClient';
export type { ClientInvokeOptions, OperationsClientOptions } from './OperationsClient';
export { parseOperationGroups } from './schema';
