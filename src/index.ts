export type * from './types/index.js';
export * from './modules/errors.js';
export { Logger, getLogger, resetLogger, type LoggerContext, type EventType } from './modules/logger.js';
export { loadConfig, getConfig, resetConfig, DEFAULTS } from './modules/config.js';
export { MetricsCollector, MetricName, type MetricDimensions } from './modules/metrics.js';
export * from './modules/stack-status.js';
export * from './modules/parameter-encoder.js';
export { CloudFormationStackClient, translateError, type StackOperationClient } from './modules/stack-client.js';
export { formatFailure, listFailures } from './modules/failure-aggregator.js';
export * from './modules/stack-queries.js';
export * from './modules/lifecycle-tracker.js';
export * from './modules/stack-lifecycle.js';
export { validateStackName, STACK_NAME_MAX_LENGTH } from './modules/stack-name.js';
export { validateTemplate, TemplateValidationError, type ValidatedTemplate } from './modules/template-validator.js';
export { parseLifecycleRequest, LIFECYCLE_OPERATIONS, type LifecycleOperation, type LifecycleRequest } from './modules/request-parser.js';
export { createHandler, handler, type HandlerResponse, type HandlerDependencies } from './handler.js';
