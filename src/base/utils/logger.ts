/**
 * Console logger for view-index
 *
 * Lines read `[timestamp] <component>:<level> - message [key=value ...]`.
 * Debug lines are written only when the component's debug level is on,
 * either through VIEW_INDEX_DEBUG or VIEW_INDEX_DEBUG_<COMPONENT>.
 */

import { isDebugEnabled, type DebugComponent } from './debug.js';

export type LogLevel = 'error' | 'warn' | 'debug';

export type LogContext = Record<string, unknown>;

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return `"${value}"`;
  }
  if (value instanceof Set) {
    return JSON.stringify([...value]);
  }
  if (value !== null && typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function write(level: LogLevel, component: DebugComponent, message: string, context?: LogContext): void {
  const pairs = context ? Object.entries(context).map(([key, value]) => `${key}=${formatValue(value)}`) : [];
  const suffix = pairs.length > 0 ? ` [${pairs.join(' ')}]` : '';
  const line = `[${new Date().toISOString()}] ${component}:${level} - ${message}${suffix}`;

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export const logger = {
  error: (component: DebugComponent, message: string, context?: LogContext) =>
    write('error', component, message, context),

  warn: (component: DebugComponent, message: string, context?: LogContext) =>
    write('warn', component, message, context),

  debug: (component: DebugComponent, message: string, context?: LogContext) => {
    if (isDebugEnabled(component)) {
      write('debug', component, message, context);
    }
  },
};
