/**
 * Structured logging for the MCP server using pino
 *
 * Logs go to a file (mcp-server.jsonl) because stdout carries the MCP
 * protocol in stdio mode. See getLogDirectory() for the per-OS location.
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { ensureLogDirectory, getMcpServerLogPath } from './paths.js';

// Session ID for correlation across log entries
let currentSessionId: string | undefined;

// False when no file transport is attached; the logger must then stay silent
let fileLogging = false;

export function setSessionId(sessionId: string): void {
  currentSessionId = sessionId;
}

/**
 * Create the pino logger instance
 *
 * File-only, never stdout/stderr. Falls back to a silent logger when the
 * level is `silent` or the log directory cannot be created.
 */
function createLogger(): Logger {
  // Unknown levels are reported by loadConfig(); pino would throw here
  const requested = (process.env['LOG_LEVEL'] ?? 'info').toLowerCase();
  const level = requested === 'silent' || requested in pino.levels.values ? requested : 'info';

  const options: LoggerOptions = {
    name: 'mcp-server',
    level,
    base: {
      component: 'mcp-server',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (level === 'silent' || !ensureLogDirectory()) {
    return pino({ ...options, level: 'silent' });
  }

  fileLogging = true;
  const rotationSizeMb = parseInt(process.env['ASSISTANT_MCP_LOG_ROTATION_SIZE_MB'] ?? '50', 10);
  const rotationCount = parseInt(process.env['ASSISTANT_MCP_LOG_ROTATION_COUNT'] ?? '5', 10);

  return pino(
    options,
    pino.transport({
      target: 'pino-roll',
      options: {
        file: getMcpServerLogPath(),
        size: `${rotationSizeMb}m`,
        limit: { count: rotationCount },
        mkdir: true,
      },
    })
  );
}

const logger = createLogger();

/**
 * Change the level after startup (config file may override LOG_LEVEL).
 * Ignored without a file transport: pino's default destination is stdout.
 */
export function setLogLevel(level: string): void {
  if (fileLogging) {
    logger.level = level;
  }
}

export function createSessionLogger(sessionId?: string): Logger {
  const sid = sessionId ?? currentSessionId;
  if (sid) {
    return logger.child({ session_id: sid });
  }
  return logger;
}

export function logInfo(msg: string, context?: Record<string, unknown>): void {
  const log = createSessionLogger();
  if (context) {
    log.info(context, msg);
  } else {
    log.info(msg);
  }
}

export function logDebug(msg: string, context?: Record<string, unknown>): void {
  const log = createSessionLogger();
  if (context) {
    log.debug(context, msg);
  } else {
    log.debug(msg);
  }
}

export function logWarn(msg: string, context?: Record<string, unknown>): void {
  const log = createSessionLogger();
  if (context) {
    log.warn(context, msg);
  } else {
    log.warn(msg);
  }
}

/**
 * Log an error message, flattening `error` into message and stack fields
 */
export function logError(msg: string, error?: unknown, context?: Record<string, unknown>): void {
  const log = createSessionLogger();
  const errorContext: Record<string, unknown> = { ...context };

  if (error instanceof Error) {
    errorContext['error'] = error.message;
    errorContext['stack'] = error.stack;
  } else if (error !== undefined) {
    errorContext['error'] = String(error);
  }

  log.error(errorContext, msg);
}

/**
 * Log a tool invocation
 */
export function logToolCall(
  tool: string,
  durationMs?: number,
  success?: boolean,
  context?: Record<string, unknown>
): void {
  const log = createSessionLogger();
  log.info(
    {
      tool,
      duration_ms: durationMs,
      success,
      ...context,
    },
    'Tool called'
  );
}
