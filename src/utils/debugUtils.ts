/**
 * Debug utility for standardized logging
 *
 * This utility provides consistent logging across the engine with easy
 * ways to turn on/off logging for different components or log levels.
 */

// Disabled in production and under the test runner
const ENABLE_DEBUG_LOGGING = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

// Enable/disable logging for specific components
const DEBUG_COMPONENTS = {
  graph: true,
  solver: true,
  heuristics: true,
  generator: true
};

export type DebugComponent = keyof typeof DEBUG_COMPONENTS;

// Log levels
export enum LogLevel {
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  DEBUG = 'debug'
}

/**
 * Log a message if debugging is enabled for the component
 * @param component The component generating the log
 * @param message The message to log
 * @param data Optional data to include with the log
 * @param level The log level (default: INFO)
 */
export const debugLog = (
  component: DebugComponent,
  message: string,
  data?: unknown,
  level: LogLevel = LogLevel.INFO
): void => {
  if (!ENABLE_DEBUG_LOGGING || !DEBUG_COMPONENTS[component]) {
    return;
  }

  const prefix = `[${component}]`;

  switch (level) {
    case LogLevel.ERROR:
      console.error(prefix, message, data ?? '');
      break;
    case LogLevel.WARN:
      console.warn(prefix, message, data ?? '');
      break;
    case LogLevel.DEBUG:
      console.debug(prefix, message, data ?? '');
      break;
    case LogLevel.INFO:
    default:
      console.log(prefix, message, data ?? '');
  }
};
