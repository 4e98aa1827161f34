/**
 * Kadena oracle reporter
 *
 * Keeps the account staked in TellorFlex, waits out the reporter lock and
 * submits fresh SpotPrice values on an interval.
 */

import { Duration, Effect, pipe, Schema } from 'effect';
import { hash, urlsafeBase64EncodeString } from '../chainweb/encoding.js';
import { toWei, weiToNumber } from '../chainweb/units.js';
import type { ChainwebEndpoint } from '../config.js';
import { PactNumberSchema, pactToNumber } from '../effects/chainweb/schemas.js';
import type { ChainwebModule } from '../effects/chainweb/module-operations.js';
import type { StakerInfo, TellorFlex } from '../effects/chainweb/tellorflex-operations.js';
import { errorMessage, ParseError, ReporterError } from '../effects/errors.js';
import type { HttpClientService, LoggerService } from '../effects/layers.js';
import type { QueryCatalog } from '../feeds/catalog.js';
import { type DataFeed, type SpotPriceQuery, suggestRandomFeed } from '../feeds/datafeed.js';
import type { LocalKeyset } from '../keystore/chained-keyset.js';
import { formatTimedelta, formatUnixTime } from '../utils/date-formatter.js';

/** Twelve hours: the lock after a report when staked exactly one stake amount */
export const REPORTER_LOCK_SECONDS = 43200;

// ============= Query encoding =============
/** Query data as the oracle module expects it: `{SpotPrice: {eth,usd}}`, URL-safe base64 */
export const encodeQueryData = (query: SpotPriceQuery): string =>
  urlsafeBase64EncodeString(`{SpotPrice: {${query.asset},${query.currency}}}`);

export const queryIdFor = (queryData: string): string => hash(queryData);

/** Price scaled to 18 decimals as an integer string, URL-safe base64 */
export const encodeValue = (price: number): string => urlsafeBase64EncodeString(toWei(price).toString());

// ============= Connectivity =============
export const connectivityUrl = (endpoint: ChainwebEndpoint): string => new URL('/info', endpoint.url).toString();

export const makeConnectivityCheck =
  (http: HttpClientService, url: string) => (): Effect.Effect<boolean> =>
    pipe(
      http.get(url),
      Effect.as(true),
      Effect.catchAll(() => Effect.succeed(false)),
    );

// ============= Reporter =============
export interface KadenaReporterOptions {
  account: LocalKeyset;
  oracle: TellorFlex;
  /** The TRB token module */
  token: ChainwebModule;
  catalog: QueryCatalog;
  http: HttpClientService;
  logger: LoggerService;
  /** Fixed feed; a random catalog feed is chosen for every report when absent */
  datafeed?: DataFeed;
  /** Seconds between loop iterations */
  waitPeriod?: number;
  /** KDA needed for gas before attempting a report */
  minNativeTokenBalance?: number;
  /** Desired total stake in TRB */
  stake?: number;
  isOnline?: () => Effect.Effect<boolean>;
  /** Current time in milliseconds */
  now?: () => number;
  rng?: () => number;
}

export class KadenaReporter {
  readonly account: LocalKeyset;
  readonly accountName: string;
  readonly waitPeriod: number;
  readonly minNativeTokenBalance: number;
  readonly stake: number;

  private readonly oracle: TellorFlex;
  private readonly token: ChainwebModule;
  private readonly catalog: QueryCatalog;
  private readonly http: HttpClientService;
  private readonly logger: LoggerService;
  private readonly randomFeed: boolean;
  private readonly onlineCheck: () => Effect.Effect<boolean>;
  private readonly now: () => number;
  private readonly rng: () => number;

  private datafeed: DataFeed | undefined;
  private stakerInfo: StakerInfo | null = null;
  private stakeAmount: bigint | null = null;

  constructor(options: KadenaReporterOptions) {
    this.account = options.account;
    this.accountName = options.account.accountName;
    this.oracle = options.oracle;
    this.token = options.token;
    this.catalog = options.catalog;
    this.http = options.http;
    this.logger = options.logger;
    this.datafeed = options.datafeed;
    this.randomFeed = options.datafeed === undefined;
    this.waitPeriod = options.waitPeriod ?? 7;
    this.minNativeTokenBalance = options.minNativeTokenBalance ?? 0.25;
    this.stake = options.stake ?? 0;
    this.onlineCheck = options.isOnline ?? (() => Effect.succeed(true));
    this.now = options.now ?? Date.now;
    this.rng = options.rng ?? Math.random;
  }

  /** Snapshot of the staker info tracked across loop iterations */
  get trackedStakerInfo(): StakerInfo | null {
    return this.stakerInfo ? { ...this.stakerInfo } : null;
  }

  /**
   * Deposit `stake` (18-decimal TRB units) after checking the wallet covers it
   */
  depositStake(stake: bigint): Effect.Effect<void, ReporterError> {
    const self = this;
    return Effect.gen(function* () {
      const walletBalance = yield* pipe(
        self.token.read('get-balance', { account: self.accountName }),
        Effect.flatMap((data) =>
          Schema.decodeUnknown(PactNumberSchema)(data).pipe(
            Effect.mapError((error) => new ParseError('Invalid TRB balance', 'balance', data, error)),
          ),
        ),
        Effect.map(pactToNumber),
        Effect.mapError((error) => new ReporterError(error.message, error)),
      );
      yield* self.logger.info(`Current wallet TRB balance: ${walletBalance}`);

      if (weiToNumber(stake) > walletBalance) {
        return yield* Effect.fail(new ReporterError('Not enough TRB in the account to cover the stake'));
      }

      yield* self.oracle.depositStake(stake).pipe(
        Effect.mapError(
          (error) =>
            new ReporterError(
              `Unable to stake deposit: ${error.message} Make sure ${self.accountName} has enough of the current ` +
                "chain's currency and the oracle's currency (TRB)",
              error,
            ),
        ),
      );
    });
  }

  /**
   * Make sure the account holds at least the oracle's stake amount and the
   * desired stake, depositing the difference when it does not.
   */
  ensureStaked(): Effect.Effect<void, ReporterError> {
    const self = this;
    return Effect.gen(function* () {
      const stakeAmount = yield* self.oracle
        .stakeAmount()
        .pipe(Effect.mapError((error) => new ReporterError(`Unable to read current stake amount: ${error.message}`, error)));
      yield* self.logger.info(`Current Oracle stakeAmount: ${weiToNumber(stakeAmount)}`);

      const stakeInfo = yield* self.oracle
        .getStakerInfo(self.accountName)
        .pipe(
          Effect.mapError((error) => new ReporterError(`Unable to read reporters staker info: ${error.message}`, error)),
        );

      const tracked = self.stakerInfo ?? { ...stakeInfo };
      self.stakerInfo = tracked;

      // a lower balance than last seen means the account is probably in dispute
      if (tracked.stakeBalance > stakeInfo.stakeBalance) {
        yield* self.logger.info('your staked balance has decreased and account might be in dispute');
      }
      tracked.stakeBalance = stakeInfo.stakeBalance;
      tracked.isStaked = stakeInfo.isStaked;

      if (!stakeInfo.isStaked) {
        yield* self
          .depositStake(stakeAmount)
          .pipe(Effect.mapError((error) => new ReporterError(`Unable to deposit initial stake: ${error.message}`, error)));
        tracked.stakeBalance += stakeAmount;
        tracked.isStaked = true;
        yield* self.logger.info('Successfully deposited initial stake');
      }

      tracked.lastReport = stakeInfo.lastReport;
      tracked.reportsCount = stakeInfo.reportsCount;

      yield* self.logger.info('STAKER INFO', {
        startDate: formatUnixTime(stakeInfo.startDate),
        stakedBalance: weiToNumber(stakeInfo.stakeBalance),
        lockedBalance: weiToNumber(stakeInfo.lockedBalance),
        lastReport: formatUnixTime(stakeInfo.lastReport),
        reportsCount: stakeInfo.reportsCount,
      });

      if (self.stakeAmount !== null) {
        if (self.stakeAmount < stakeAmount) {
          yield* self.logger.info('Stake amount has increased possibly due to TRB price change.');
        } else if (self.stakeAmount > stakeAmount) {
          yield* self.logger.info('Stake amount has decreased possibly due to TRB price change.');
        }
      }
      self.stakeAmount = stakeAmount;

      const stakedBalance = tracked.stakeBalance;
      const desiredStake = toWei(self.stake);
      if (stakeAmount > stakedBalance || desiredStake > stakedBalance) {
        yield* self.logger.info('Depositing stake...');
        const requiredDiff = stakeAmount - stakedBalance;
        const desiredDiff = desiredStake - stakedBalance;
        const diff = requiredDiff > desiredDiff ? requiredDiff : desiredDiff;
        yield* self.depositStake(diff);
        tracked.stakeBalance += diff;
      }
    });
  }

  /** Fails while the reporter lock from the last report is still running */
  checkReporterLock(): Effect.Effect<void, ReporterError> {
    const stakerInfo = this.stakerInfo;
    const stakeAmount = this.stakeAmount;
    if (stakerInfo === null || stakeAmount === null || stakeAmount <= 0n) {
      return Effect.fail(new ReporterError('Unable to calculate reporter lock remaining time'));
    }

    const multiple = stakerInfo.stakeBalance / stakeAmount;
    if (multiple <= 0n) {
      return Effect.fail(new ReporterError('Staked balance is below the stake amount required to report'));
    }

    const reporterLock = REPORTER_LOCK_SECONDS / Number(multiple);
    const timeRemaining = Math.round(stakerInfo.lastReport + reporterLock - this.now() / 1000);
    if (timeRemaining > 0) {
      return Effect.fail(new ReporterError(`Currently in reporter lock. Time left: ${formatTimedelta(timeRemaining)}`));
    }
    return Effect.void;
  }

  fetchDatafeed(): Effect.Effect<DataFeed, ReporterError> {
    const self = this;
    return Effect.gen(function* () {
      if (self.randomFeed) {
        yield* self.logger.info('Fetching random datafeed...');
        self.datafeed = suggestRandomFeed(self.catalog, self.http, self.logger, self.rng);
      }
      const feed = self.datafeed;
      if (!feed) {
        return yield* Effect.fail(new ReporterError('Unable to suggest datafeed'));
      }
      return feed;
    });
  }

  isOnline(): Effect.Effect<boolean> {
    return this.onlineCheck();
  }

  /** Whether the account holds enough KDA to pay for gas */
  hasNativeToken(): Effect.Effect<boolean> {
    const self = this;
    return pipe(
      self.token.readAnyModule('coin', 'get-balance', { account: self.accountName }),
      Effect.flatMap((data) => Schema.decodeUnknown(PactNumberSchema)(data)),
      Effect.map(pactToNumber),
      Effect.flatMap((balance) => {
        if (balance < self.minNativeTokenBalance) {
          return pipe(
            self.logger.warn(
              `${self.accountName} has insufficient native tokens. Balance: ${balance}, Expected: ${self.minNativeTokenBalance}.`,
            ),
            Effect.as(false),
          );
        }
        return Effect.succeed(true);
      }),
      Effect.catchAll((error) =>
        pipe(self.logger.warn(`Error fetching native token balance for ${self.accountName}: ${errorMessage(error)}`), Effect.as(false)),
      ),
    );
  }

  /**
   * Stake check, reporter lock, fresh datapoint, then one submit-value.
   * Resolves with the receipt status.
   */
  reportOnce(): Effect.Effect<string, ReporterError> {
    const self = this;
    return Effect.gen(function* () {
      yield* self.ensureStaked();
      yield* self.checkReporterLock();

      const feed = yield* self.fetchDatafeed();
      yield* self.logger.info(`Current query: ${feed.descriptor}`);

      const datapoint = yield* feed
        .fetchNewDatapoint()
        .pipe(Effect.mapError((error) => new ReporterError(`Unable to retrieve updated datafeed value. ${error.message}`, error)));

      const queryData = encodeQueryData(feed.query);
      const queryId = queryIdFor(queryData);
      const value = yield* Effect.try({
        try: () => encodeValue(datapoint.value),
        catch: (error) => new ReporterError(`Error encoding response value ${datapoint.value}`, error),
      });

      const nonce = yield* self.oracle
        .getNewValueCountByQueryId(queryId)
        .pipe(Effect.mapError((error) => new ReporterError(`Unable to get nonce: ${error.message}`, error)));

      yield* self.logger.info('Sending submitValue transaction', { queryId, nonce, value: datapoint.value });
      return yield* self.oracle
        .submitValue(queryId, value, nonce, queryData)
        .pipe(Effect.mapError((error) => new ReporterError(`Unable to submit value: ${error.message}`, error)));
    });
  }

  /**
   * Report on an interval. Runs forever without `reportCount`.
   * Failed reports are logged and the loop carries on.
   */
  report(reportCount?: number): Effect.Effect<void> {
    const self = this;
    return Effect.gen(function* () {
      yield* self.logger.info(`Reporting with account: ${self.accountName}`);
      let remaining = reportCount;

      while (remaining === undefined || remaining > 0) {
        const online = yield* self.isOnline();
        if (online) {
          if (yield* self.hasNativeToken()) {
            yield* self.reportOnce().pipe(Effect.catchAll((error) => self.logger.warn(error.message)));
          }
        } else {
          yield* self.logger.warn('Unable to connect to the internet!');
        }

        yield* self.logger.info(`Sleeping for ${self.waitPeriod} seconds`);
        yield* Effect.sleep(Duration.seconds(self.waitPeriod));

        if (remaining !== undefined) {
          remaining -= 1;
        }
      }
    });
  }
}
