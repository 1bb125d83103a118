/**
 * @fileoverview Public entry point.
 *
 * Hosts supply a PrinterTransport; everything above it is exported from here:
 * the wire codec and status parser, readiness checks and self-healing, device
 * selection, the print workflow, and the configuration and error plumbing they
 * share.
 */

// Protocol
export * from './protocol/sgd-codec';
export * from './protocol/status-parser';

// Types
export * from './types/printer';
export * from './types/readiness';
export * from './types/auto-correction';
export * from './types/print-workflow';
export * from './types/config';

// Services
export { TransportBridge, callTransport } from './services/TransportBridge';
export { PrinterReadiness } from './services/PrinterReadiness';
export { CorrectionLog, CorrectedReadiness } from './services/CorrectedReadiness';
export { StateChangeVerifier } from './services/StateChangeVerifier';
export type { VerifyOptions } from './services/StateChangeVerifier';
export { AutoCorrector } from './services/AutoCorrector';
export type { AutoCorrectorDependencies } from './services/AutoCorrector';
export { ReadinessManager, collectBlockingIssues } from './services/ReadinessManager';
export type { ReadinessManagerOptions } from './services/ReadinessManager';
export { DiscoveryLog, InMemoryConnectionHistory } from './services/ConnectionHistory';
export type { Clock, DiscoveryLogOptions } from './services/ConnectionHistory';
export {
  SmartDeviceSelector,
  DEFAULT_SELECTOR_WEIGHTS,
  createSelectorContext,
  sortedPrinters
} from './services/SmartDeviceSelector';
export type { SelectionOptions, SelectorContext, SelectorWeights } from './services/SmartDeviceSelector';
export { PrintWorkflow, estimateDwellMs } from './services/PrintWorkflow';
export type { PrintWorkflowDependencies } from './services/PrintWorkflow';

// Configuration
export { ConfigManager, getConfigManager, toEnvironmentName } from './managers/ConfigManager';

// Utilities
export * from './utils/error.utils';
export { EventEmitter } from './utils/EventEmitter';
export type { EventListener } from './utils/EventEmitter';
export { RetryPolicy } from './utils/RetryPolicy';
export type { RetryPolicyConfig, RetryResult, RetryStats, RetryableOperation } from './utils/RetryPolicy';
export { TimeoutPolicy, PolicyWrapper } from './utils/TimeoutPolicy';
export { TimeoutError, isTimeoutError, sleep, withTimeout } from './utils/timeout.utils';
export { validate, validateToResult, parseWithDefault, formatValidationErrors } from './utils/validation.utils';
export type { ValidationIssue, ValidationResult } from './utils/validation.utils';
export { createLogger, setVerboseLogging, isVerboseLoggingEnabled } from './utils/logging';
export type { Logger } from './utils/logging';
