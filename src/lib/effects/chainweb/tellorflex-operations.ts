/**
 * TellorFlex Operations
 * Staking, value submission and staker reads against the tellorflex Pact module
 */

import { Effect, pipe, Schema } from 'effect';
import type { ChainwebEndpoint } from '../../config.js';
import { type ChainwebMeta, type KeyPair, mkMeta, type SendRequest, simpleExecCmd } from '../../chainweb/exec-cmd.js';
import { formatWei } from '../../chainweb/units.js';
import type { LocalKeyset } from '../../keystore/chained-keyset.js';
import { ChainwebError, ParseError, TransactionFailedError } from '../errors.js';
import type { HttpClientService, LoggerService } from '../layers.js';
import { type ChainwebModuleOptions, ChainwebModule, type ChainwebReadError } from './module-operations.js';
import { PactNumberSchema, pactToBigInt, pactToNumber, type StakerInfoResponse, StakerInfoResponseSchema } from './schemas.js';

export type TransactionError = ChainwebReadError | TransactionFailedError;

export interface StakerInfo {
  startDate: number;
  stakeBalance: bigint;
  lockedBalance: bigint;
  rewardDebt: bigint;
  lastReport: number;
  reportsCount: number;
  startVoteCount: number;
  startVoteTally: number;
  isStaked: boolean;
}

export const emptyStakerInfo = (): StakerInfo => ({
  startDate: 0,
  stakeBalance: 0n,
  lockedBalance: 0n,
  rewardDebt: 0n,
  lastReport: 0,
  reportsCount: 0,
  startVoteCount: 0,
  startVoteTally: 0,
  isStaked: false,
});

export function parseStakerInfo(response?: StakerInfoResponse): StakerInfo {
  if (!response) {
    return emptyStakerInfo();
  }
  return {
    startDate: pactToNumber(response['start-date']),
    stakeBalance: pactToBigInt(response['staked-balance']),
    lockedBalance: pactToBigInt(response['locked-balance']),
    rewardDebt: pactToBigInt(response['reward-debt']),
    lastReport: pactToNumber(response['reporter-last-timestamp']),
    reportsCount: pactToNumber(response['reports-submitted']),
    startVoteCount: pactToNumber(response['start-vote-count']),
    startVoteTally: pactToNumber(response['start-vote-tally']),
    isStaked: response['is-staked'],
  };
}

// The module answers reads for accounts and query ids it has never seen with this error
const isRowNotFound = (error: ChainwebReadError, key: string): boolean =>
  error instanceof ChainwebError && error.message.endsWith(`row not found: ${key}`);

export class TellorFlex extends ChainwebModule {
  constructor(
    http: HttpClientService,
    logger: LoggerService,
    readonly account: LocalKeyset,
    endpoint: ChainwebEndpoint,
    readonly gasPrice: number,
    readonly gasLimit: number,
    options: ChainwebModuleOptions = {},
  ) {
    super(http, logger, endpoint, 'tellorflex', options);
  }

  buildMeta(): ChainwebMeta {
    return mkMeta({
      sender: this.account.accountName,
      gasPrice: this.gasPrice,
      gasLimit: this.gasLimit,
      chainId: this.chainId,
    });
  }

  /**
   * Deposit `amount` (18-decimal TRB units) as stake for the account.
   * The TRB transfer, gas and staker capabilities are scoped to the last key.
   */
  depositStake(amount: bigint): Effect.Effect<string, TransactionError> {
    const reporter = this.account.accountName;
    const pactCode = `(${this.qualify('deposit-stake')} (read-msg "reporter") (read-keyset "keyset") (read-integer "amount"))`;
    const keyPairs: KeyPair[] = this.account.signature();
    const last = keyPairs[keyPairs.length - 1];
    if (last) {
      last.clist = [
        { name: `${this.namespace}.f-TRB.TRANSFER`, args: [reporter, 'tellorflex', { decimal: formatWei(amount) }] },
        { name: 'coin.GAS', args: [] },
        { name: this.qualify('STAKER'), args: [reporter] },
      ];
    }

    const cmd = simpleExecCmd({
      pactCode,
      keyPairs,
      envData: { amount, keyset: this.account.guard(), reporter },
      meta: this.buildMeta(),
      networkId: this.networkId,
    });

    return this.transact(cmd, 'deposit-stake');
  }

  submitValue(
    queryId: string,
    value: string,
    nonce: number,
    queryData: string,
  ): Effect.Effect<string, TransactionError> {
    const pactCode =
      `(${this.qualify('submit-value')} (read-string "queryId") (read-string "value") (read-integer "nonce") ` +
      '(read-string "queryData") (read-string "staker"))';
    const staker = this.account.accountName;

    const cmd = simpleExecCmd({
      pactCode,
      keyPairs: this.account.signature(),
      envData: { queryId, value, nonce, queryData, staker },
      meta: this.buildMeta(),
      networkId: this.networkId,
    });

    return this.transact(cmd, 'submit-value');
  }

  /** Staker info; an account that never staked reads as all zeros */
  getStakerInfo(staker: string): Effect.Effect<StakerInfo, ChainwebReadError> {
    return pipe(
      this.read('get-staker-info', { staker }),
      Effect.flatMap((data) =>
        Schema.decodeUnknown(StakerInfoResponseSchema)(data).pipe(
          Effect.mapError((error) => new ParseError('Invalid staker info', 'staker', data, error)),
        ),
      ),
      Effect.flatMap((response) =>
        Effect.try({
          try: () => parseStakerInfo(response),
          catch: (error) => new ParseError('Invalid staker info', 'staker', response, error),
        }),
      ),
      Effect.catchIf(
        (error) => isRowNotFound(error, staker),
        () => Effect.succeed(emptyStakerInfo()),
      ),
    );
  }

  getNewValueCountByQueryId(queryId: string): Effect.Effect<number, ChainwebReadError> {
    return pipe(
      this.read('get-new-value-count-by-query-id', { queryId }),
      Effect.flatMap((data) => this.decodeNumber(data, 'queryId')),
      Effect.map(pactToNumber),
      Effect.catchIf(
        (error) => isRowNotFound(error, queryId),
        () => Effect.succeed(0),
      ),
    );
  }

  /** Minimum stake required to report, in 18-decimal TRB units */
  stakeAmount(): Effect.Effect<bigint, ChainwebReadError> {
    return pipe(
      this.read('stake-amount'),
      Effect.flatMap((data) => this.decodeNumber(data, 'stakeAmount')),
      Effect.flatMap((value) =>
        Effect.try({
          try: () => pactToBigInt(value),
          catch: (error) => new ParseError('Invalid stake amount', 'stakeAmount', value, error),
        }),
      ),
    );
  }

  private decodeNumber(data: unknown, field: string) {
    return Schema.decodeUnknown(PactNumberSchema)(data).pipe(
      Effect.mapError((error) => new ParseError(`Invalid ${field} response`, field, data, error)),
    );
  }

  private transact(cmd: SendRequest, label: string): Effect.Effect<string, TransactionError> {
    const self = this;
    return Effect.gen(function* () {
      const requestKeys = yield* self.send(cmd);
      const [requestKey] = requestKeys.requestKeys;
      const status = yield* self.fetchReceiptWithRetry(requestKeys).pipe(
        Effect.mapError((error) =>
          error instanceof ChainwebError ? new ChainwebError(`${error.message}: for ${label} txn`, error) : error,
        ),
      );
      if (status === 'failure') {
        return yield* Effect.fail(new TransactionFailedError(`${label} txn failed`, requestKey));
      }
      return status;
    });
  }
}
