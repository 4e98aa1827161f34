/**
 * Test layers for Effect-based testing
 * These layers provide test doubles for the services in layers.ts
 */

import { Effect, Layer } from 'effect';
import {
  type HttpClientService,
  HttpClientServiceTag,
  type LoggerService,
  LoggerServiceTag,
  type LogLevel,
  makeHttpClient,
} from './layers.js';

export interface RecordedLog {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

// ============= Test Logger =============
export class RecordingLogger implements LoggerService {
  readonly entries: RecordedLog[] = [];

  debug = (message: string, context?: Record<string, unknown>) => this.record('debug', message, context);
  info = (message: string, context?: Record<string, unknown>) => this.record('info', message, context);
  warn = (message: string, context?: Record<string, unknown>) => this.record('warn', message, context);
  error = (message: string, error?: unknown, context?: Record<string, unknown>) =>
    this.record(
      'error',
      message,
      error === undefined ? context : { ...context, error: error instanceof Error ? error.message : String(error) },
    );

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message);
  }

  private record(level: LogLevel, message: string, context?: Record<string, unknown>): Effect.Effect<void> {
    return Effect.sync(() => {
      this.entries.push({ level, message, context });
    });
  }
}

export const makeTestLoggerLayer = (logger: RecordingLogger = new RecordingLogger()) =>
  Layer.succeed(LoggerServiceTag, logger);

// ============= Test HTTP Layer =============
// Requests still go through fetch so msw handlers can intercept them
export const makeTestHttpClient = (): HttpClientService => makeHttpClient(2000, true);

export const TestHttpClientServiceLive = Layer.effect(HttpClientServiceTag, Effect.sync(makeTestHttpClient));

export const makeTestLayer = (logger: RecordingLogger = new RecordingLogger()) =>
  Layer.merge(TestHttpClientServiceLive, makeTestLoggerLayer(logger));
