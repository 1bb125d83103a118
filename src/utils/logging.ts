/**
 * @fileoverview Namespaced console logging.
 *
 * Every line is prefixed with `[Namespace]`. Verbose output is printed only when
 * DEBUG is set, NODE_ENV is development, or debug mode was switched on through
 * configuration.
 */

let verboseOverride = false;

/**
 * Turn verbose output on or off regardless of the environment
 */
export function setVerboseLogging(enabled: boolean): void {
  verboseOverride = enabled;
}

export function isVerboseLoggingEnabled(): boolean {
  return verboseOverride || Boolean(process.env.DEBUG) || process.env.NODE_ENV === 'development';
}

/**
 * Log verbose debug message with namespace
 */
export function logVerbose(namespace: string, message: string, ...args: unknown[]): void {
  if (isVerboseLoggingEnabled()) {
    console.debug(`[${namespace}]`, message, ...args);
  }
}

export function logInfo(namespace: string, message: string, ...args: unknown[]): void {
  console.info(`[${namespace}]`, message, ...args);
}

export function logWarning(namespace: string, message: string, ...args: unknown[]): void {
  console.warn(`[${namespace}]`, message, ...args);
}

export function logError(namespace: string, message: string, ...args: unknown[]): void {
  console.error(`[${namespace}]`, message, ...args);
}

/**
 * Logger bound to one namespace
 */
export interface Logger {
  verbose(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(namespace: string): Logger {
  return {
    verbose: (message, ...args) => logVerbose(namespace, message, ...args),
    info: (message, ...args) => logInfo(namespace, message, ...args),
    warn: (message, ...args) => logWarning(namespace, message, ...args),
    error: (message, ...args) => logError(namespace, message, ...args)
  };
}
