/**
 * Chainweb Module Operations
 * Generic client for a Pact module: local reads, signed sends and receipt polling
 */

import { Duration, Effect, pipe, Schedule, Schema } from 'effect';
import ora from 'ora';
import type { ChainwebEndpoint } from '../../config.js';
import { assembleCode, type PactArgument } from '../../chainweb/pact-code.js';
import { mkMeta, type PactCommand, prepareExecCmd, type SendRequest } from '../../chainweb/exec-cmd.js';
import { ChainwebError, type HttpError, HttpStatusError, ParseError } from '../errors.js';
import type { HttpClientService, LoggerService } from '../layers.js';
import {
  type CommandResult,
  CommandResultSchema,
  PollResponseSchema,
  type PollResponse,
  SendResponseSchema,
  type SendResponse,
} from './schemas.js';

export type EndpointType = 'local' | 'send' | 'poll';

export type ChainwebRequestError = HttpError | ParseError;
export type ChainwebReadError = ChainwebRequestError | ChainwebError;

/** Namespaces the oracle modules are deployed under, per network id */
export const DEFAULT_NAMESPACES: Readonly<Record<string, string>> = {
  testnet04: 'n_61b7d03ff34ca7e599e3551df8dcd4a3c1bf7524',
  mainnet01: 'free',
};

export const resolveNamespace = (endpoint: ChainwebEndpoint): string =>
  endpoint.namespace ?? DEFAULT_NAMESPACES[endpoint.network] ?? 'free';

export const READ_GAS_LIMIT = 600;
export const DEFAULT_RECEIPT_RETRIES = 4;

/**
 * Seconds to wait before a receipt poll attempt: 60 for the first attempt,
 * then halving from 60 (attempt 2 → 60, 3 → 30, 4 → 15).
 */
export function calculateBackoff(retryAttempt: number): number {
  const initialBackoff = 60;
  const backoffFactor = 2;
  if (retryAttempt === 1) {
    return initialBackoff;
  }
  return initialBackoff / backoffFactor ** (retryAttempt - 2);
}

export const createRetrySchedule = (): Schedule.Schedule<unknown, unknown> =>
  pipe(Schedule.exponential(Duration.millis(500)), Schedule.intersect(Schedule.recurs(3)), Schedule.jittered);

const isRetryable = (error: HttpError): boolean => !(error instanceof HttpStatusError) || error.retryable;

export interface ChainwebModuleOptions {
  /** Retry policy for failed HTTP requests (network errors and 5xx) */
  retrySchedule?: Schedule.Schedule<unknown, unknown>;
  /** Delay between receipt polls, given the polls still remaining */
  pollDelay?: (retryAttempt: number) => Duration.DurationInput;
  /** Show a terminal spinner while waiting for receipts */
  spinner?: boolean;
}

export class ChainwebModule {
  readonly rpcApi: string;
  readonly networkId: string;
  readonly explorer: string | undefined;
  readonly chainId: string;
  readonly namespace: string;

  private readonly retrySchedule: Schedule.Schedule<unknown, unknown>;
  private readonly pollDelay: (retryAttempt: number) => Duration.DurationInput;
  private readonly spinner: boolean;

  constructor(
    protected readonly http: HttpClientService,
    protected readonly logger: LoggerService,
    endpoint: ChainwebEndpoint,
    readonly moduleName: string,
    options: ChainwebModuleOptions = {},
  ) {
    this.rpcApi = endpoint.url;
    this.networkId = endpoint.network;
    this.explorer = endpoint.explorer;
    this.chainId = String(endpoint.chainId);
    this.namespace = resolveNamespace(endpoint);
    this.retrySchedule = options.retrySchedule ?? createRetrySchedule();
    this.pollDelay = options.pollDelay ?? ((attempt) => Duration.seconds(calculateBackoff(attempt)));
    this.spinner = options.spinner ?? true;
  }

  endpointUrl(type: EndpointType): string {
    return `${this.rpcApi}${type}`;
  }

  /** Fully qualified function name inside this module */
  qualify(functionName: string): string {
    return `${this.namespace}.${this.moduleName}.${functionName}`;
  }

  mkReadCmd(functionName: string, args: Readonly<Record<string, PactArgument>> = {}): PactCommand {
    return this.mkLocalCmd(this.qualify(functionName), args);
  }

  /**
   * POST a command payload to one of the Pact API endpoints.
   * Network failures and 5xx responses are retried; 4xx responses are not.
   */
  request(data: unknown, type: EndpointType): Effect.Effect<unknown, HttpError> {
    const url = this.endpointUrl(type);
    return pipe(
      this.logger.debug('Chainweb request', { url }),
      Effect.flatMap(() => this.http.post(url, data)),
      Effect.retry({ schedule: this.retrySchedule, while: isRetryable }),
      Effect.tapError((error) => this.logger.error(`Chainweb ${type} request failed`, error, { url })),
    );
  }

  read(
    functionName: string,
    args: Readonly<Record<string, PactArgument>> = {},
  ): Effect.Effect<unknown, ChainwebReadError> {
    return this.local(this.mkReadCmd(functionName, args));
  }

  /**
   * Read from a module other than this one, e.g. `coin` or `<namespace>.f-TRB`
   */
  readAnyModule(
    moduleNameWithNamespace: string,
    functionName: string,
    args: Readonly<Record<string, PactArgument>> = {},
  ): Effect.Effect<unknown, ChainwebReadError> {
    return this.local(this.mkLocalCmd(`${moduleNameWithNamespace}.${functionName}`, args));
  }

  /** Submit a signed command and return its request keys */
  send(cmd: SendRequest): Effect.Effect<SendResponse, ChainwebRequestError> {
    return pipe(
      this.request(cmd, 'send'),
      Effect.flatMap((data) =>
        Schema.decodeUnknown(SendResponseSchema)(data).pipe(
          Effect.mapError((error) => new ParseError('Invalid send response', 'requestKeys', data, error)),
        ),
      ),
      Effect.tap((response) => this.logger.debug('Transaction sent', { requestKeys: response.requestKeys })),
    );
  }

  /**
   * Poll for the receipt of a sent transaction. The poll endpoint answers `{}`
   * until the transaction is mined; it is polled again at once, then up to
   * `retryCount - 1` more times with a backoff between polls.
   * Resolves with the transaction status, `success` or `failure`.
   */
  fetchReceiptWithRetry(
    requestKeys: SendResponse,
    retryCount: number = DEFAULT_RECEIPT_RETRIES,
  ): Effect.Effect<CommandResult['result']['status'], ChainwebReadError> {
    const self = this;
    const [reqKey] = requestKeys.requestKeys;

    return Effect.gen(function* () {
      const spinner = self.spinner ? ora('Fetching receipt from chainweb for confirmation...').start() : null;

      const poll = pipe(
        self.request({ requestKeys: requestKeys.requestKeys }, 'poll'),
        Effect.flatMap((data) =>
          Schema.decodeUnknown(PollResponseSchema)(data).pipe(
            Effect.mapError((error) => new ParseError('Invalid poll response', 'poll', data, error)),
          ),
        ),
      );

      const result = yield* pipe(
        Effect.gen(function* () {
          let response = yield* poll;
          let remaining = retryCount;
          while (Object.keys(response).length === 0 && remaining > 0) {
            response = yield* poll;
            remaining -= 1;
            if (Object.keys(response).length === 0 && remaining > 0) {
              yield* Effect.sleep(self.pollDelay(remaining));
            }
          }
          return response;
        }),
        Effect.ensuring(Effect.sync(() => spinner?.stop())),
      );

      if (Object.keys(result).length === 0) {
        return yield* Effect.fail(new ChainwebError('Unable to fetch receipt from API'));
      }

      const status = yield* self.parseTxReceipt(reqKey, result);
      yield* self.logger.info(`Link to receipt: ${self.explorer}/tx/${reqKey}`);
      yield* self.logger.info(`Transaction status: ${status}`);
      return status;
    });
  }

  parseTxReceipt(
    requestKey: string,
    receipt: PollResponse,
  ): Effect.Effect<CommandResult['result']['status'], ChainwebError> {
    const entry = receipt[requestKey];
    return entry
      ? Effect.succeed(entry.result.status)
      : Effect.fail(new ChainwebError(`No receipt for request key ${requestKey}`));
  }

  protected mkLocalCmd(qualifiedFunction: string, args: Readonly<Record<string, PactArgument>>): PactCommand {
    const pactCode = assembleCode(qualifiedFunction, args);
    return prepareExecCmd({ pactCode, meta: mkMeta({ gasLimit: READ_GAS_LIMIT, chainId: this.chainId }) });
  }

  // /local takes a single unsigned command, not a batch
  private local(cmd: PactCommand): Effect.Effect<unknown, ChainwebReadError> {
    return pipe(
      this.request(cmd, 'local'),
      Effect.flatMap((data) =>
        Schema.decodeUnknown(CommandResultSchema)(data).pipe(
          Effect.mapError((error) => new ParseError('Error reading from chainweb', 'local', data, error)),
        ),
      ),
      Effect.flatMap(({ result }) =>
        result.status === 'success'
          ? Effect.succeed(result.data)
          : Effect.fail(new ChainwebError(result.error.message)),
      ),
    );
  }
}
