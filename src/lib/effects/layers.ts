/**
 * Core service layers for dependency injection
 * These layers provide the foundation for the Effect-based architecture
 */

import chalk from 'chalk';
import { Context, Effect, Layer } from 'effect';
import { type HttpError, HttpStatusError, NetworkError, TimeoutError } from './errors.js';

// ============= HTTP Client Layer =============
export interface HttpClientService {
  readonly request: (url: string, options?: RequestInit) => Effect.Effect<unknown, HttpError>;
  readonly get: (url: string, headers?: Record<string, string>) => Effect.Effect<unknown, HttpError>;
  readonly post: (url: string, body: unknown, headers?: Record<string, string>) => Effect.Effect<unknown, HttpError>;
}

export class HttpClientServiceTag extends Context.Tag('HttpClientService')<HttpClientServiceTag, HttpClientService>() {}

export const DEFAULT_HTTP_TIMEOUT_MS = 30000;

/** Abort `controller` when `signal` aborts; returns the function that unlinks them */
export const linkAbortSignal = (signal: AbortSignal, controller: AbortController): (() => void) => {
  const onAbort = () => controller.abort();
  signal.addEventListener('abort', onAbort, { once: true });
  return () => signal.removeEventListener('abort', onAbort);
};

export const makeHttpClient = (
  timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS,
  allowInTests: boolean = Boolean(process.env.ALLOW_REAL_API_CALLS),
): HttpClientService => {
  // Prevent real HTTP calls in test environment unless explicitly allowed
  if (process.env.NODE_ENV === 'test' && !allowInTests) {
    throw new Error(
      'Real HTTP calls detected in test environment! ' +
        'Tests must intercept requests with msw (see src/test/setup-msw.ts). ' +
        'If you really need to make real calls, set ALLOW_REAL_API_CALLS=true',
    );
  }

  const makeRequest = (url: string, options?: RequestInit): Effect.Effect<unknown, HttpError> =>
    Effect.tryPromise({
      try: async (signal) => {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
        const unlink = linkAbortSignal(signal, controller);

        try {
          const response = await fetch(url, {
            ...options,
            signal: controller.signal,
          });

          const text = await response.text();
          if (!response.ok) {
            throw new HttpStatusError(
              `HTTP ${response.status}: ${response.statusText}${text ? ` - ${text}` : ''}`,
              response.status,
              text,
            );
          }

          return text.length > 0 ? JSON.parse(text) : {};
        } finally {
          clearTimeout(timeoutId);
          unlink();
        }
      },
      catch: (error): HttpError => {
        if (error instanceof HttpStatusError) {
          return error;
        }
        if (error instanceof Error && error.name === 'AbortError') {
          return new TimeoutError(`Request timeout: ${url}`, error);
        }
        return new NetworkError(`Request failed: ${error instanceof Error ? error.message : String(error)}`, error);
      },
    });

  return {
    request: makeRequest,

    get: (url: string, headers?: Record<string, string>) => makeRequest(url, { method: 'GET', headers }),

    post: (url: string, body: unknown, headers?: Record<string, string>) =>
      makeRequest(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...headers,
        },
        body: typeof body === 'string' ? body : JSON.stringify(body),
      }),
  };
};

export const HttpClientServiceLive = Layer.effect(
  HttpClientServiceTag,
  Effect.sync(() => makeHttpClient()),
);

// ============= Logger Layer =============
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerService {
  readonly debug: (message: string, context?: Record<string, unknown>) => Effect.Effect<void>;
  readonly info: (message: string, context?: Record<string, unknown>) => Effect.Effect<void>;
  readonly warn: (message: string, context?: Record<string, unknown>) => Effect.Effect<void>;
  readonly error: (message: string, error?: unknown, context?: Record<string, unknown>) => Effect.Effect<void>;
}

export class LoggerServiceTag extends Context.Tag('LoggerService')<LoggerServiceTag, LoggerService>() {}

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

export const resolveLogLevel = (fallback: LogLevel = 'info'): LogLevel => {
  const fromEnv = process.env.KADENA_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : fallback;
};

const colors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

export const formatLog = (level: LogLevel, message: string, context?: Record<string, unknown>): string => {
  const timestamp = new Date().toISOString();
  const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `[${timestamp}] ${level.toUpperCase()}: ${message}${contextStr}`;
};

export const makeConsoleLogger = (minLevel: LogLevel): LoggerService => {
  const enabled = (level: LogLevel) => LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);

  const write = (level: LogLevel, message: string, context?: Record<string, unknown>) =>
    Effect.sync(() => {
      if (!enabled(level)) return;
      const line = colors[level](formatLog(level, message, context));
      switch (level) {
        case 'debug':
          console.debug(line);
          break;
        case 'info':
          console.info(line);
          break;
        case 'warn':
          console.warn(line);
          break;
        case 'error':
          console.error(line);
          break;
      }
    });

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, error, context) =>
      write('error', message, error === undefined ? context : { ...context, error: describeError(error) }),
  };
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const makeLoggerLayer = (level: LogLevel) => Layer.succeed(LoggerServiceTag, makeConsoleLogger(level));

// ============= Combined Application Layer =============
export const makeAppLayer = (level: LogLevel) => Layer.merge(HttpClientServiceLive, makeLoggerLayer(level));
