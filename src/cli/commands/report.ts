import chalk from 'chalk';
import { Console, Effect, type Layer } from 'effect';
import { ConfigManager, type KadenaConfig } from '../../lib/config.js';
import { ChainwebModule, type ChainwebModuleOptions } from '../../lib/effects/chainweb/module-operations.js';
import { TellorFlex } from '../../lib/effects/chainweb/tellorflex-operations.js';
import { ConfigError, NotFoundError, ValidationError } from '../../lib/effects/errors.js';
import {
  HttpClientServiceTag,
  LoggerServiceTag,
  makeAppLayer,
  resolveLogLevel,
} from '../../lib/effects/layers.js';
import { loadQueryCatalog, type QueryCatalog } from '../../lib/feeds/catalog.js';
import { type DataFeed, feedFromEntry } from '../../lib/feeds/datafeed.js';
import { Keystore } from '../../lib/keystore/chained-keyset.js';
import {
  connectivityUrl,
  KadenaReporter,
  type KadenaReporterOptions,
  makeConnectivityCheck,
} from '../../lib/reporter/kadena-reporter.js';
import { formatList } from '../formatters/account.js';
import type { ReportOptions } from '../utils/options.js';
import { askForAccountPassword } from '../utils/prompts.js';
import {
  buildSpotFromInput,
  checkEndpoint,
  getAccountsFromName,
  printReporterSettings,
  setupConfig,
} from '../utils/reporter-setup.js';

export interface ReportDeps {
  configManager?: ConfigManager;
  keystore?: Keystore;
  catalog?: QueryCatalog;
  layer?: Layer.Layer<HttpClientServiceTag | LoggerServiceTag>;
  moduleOptions?: ChainwebModuleOptions;
  reporter?: Pick<KadenaReporterOptions, 'isOnline' | 'now' | 'rng'>;
  /** Limit the continuous loop; unbounded when absent */
  reportCount?: number;
}

const spotTag = (feed: DataFeed): string => `${feed.query.asset}-${feed.query.currency}-spot`;

const reportEffect = (options: ReportOptions, deps: ReportDeps) =>
  Effect.gen(function* () {
    const configManager = deps.configManager ?? new ConfigManager();
    const keystore = deps.keystore ?? new Keystore();

    const accounts = yield* getAccountsFromName(keystore, options.account);
    const [first] = accounts;
    if (!first) {
      return yield* Effect.fail(new NotFoundError(`Account ${options.account} not found`));
    }
    yield* Console.log(`Using keyset: ${formatList(accounts.map((account) => account.name))}`);

    const stored = yield* configManager.getConfig();
    const config: KadenaConfig = {
      main: { ...stored.main, chainId: first.chains[0] ?? stored.main.chainId, network: options.network },
      endpoints: stored.endpoints,
    };
    const catalog = deps.catalog ?? (yield* loadQueryCatalog());

    const program = Effect.gen(function* () {
      const http = yield* HttpClientServiceTag;
      const logger = yield* LoggerServiceTag;

      const settings = yield* setupConfig(config, options.account, keystore, configManager, logger, {
        skipConfirm: options.yes,
      });
      const endpoint = yield* checkEndpoint(settings.config, logger);
      const account = settings.account;
      if (!endpoint || !account) {
        return yield* Effect.fail(new ConfigError('Accounts and/or endpoint unset.'));
      }

      const password = options.password ?? (yield* askForAccountPassword(account.name));
      yield* account.unlock(password);
      const keyset = yield* account.keyset;

      let datafeed: DataFeed | undefined;
      if (options.buildSpot) {
        datafeed = yield* buildSpotFromInput(catalog, http, logger);
      } else if (options.queryTag !== undefined) {
        const entry = catalog.find(options.queryTag);
        if (!entry) {
          return yield* Effect.fail(
            new ValidationError(
              `No corresponding datafeed found for query tag: ${options.queryTag}`,
              'queryTag',
              options.queryTag,
            ),
          );
        }
        datafeed = feedFromEntry(entry, http, logger);
      }

      yield* printReporterSettings(
        {
          queryTag: datafeed ? spotTag(datafeed) : undefined,
          chainId: settings.config.main.chainId,
          gasLimit: options.gasLimit,
          gasPrice: options.gasPrice,
          stake: options.stake,
          minNativeTokenBalance: options.minNativeTokenBalance,
        },
        options.yes,
      );

      const oracle = new TellorFlex(
        http,
        logger,
        keyset,
        endpoint,
        options.gasPrice,
        options.gasLimit,
        deps.moduleOptions,
      );
      const token = new ChainwebModule(http, logger, endpoint, 'f-TRB', deps.moduleOptions);
      const reporter = new KadenaReporter({
        account: keyset,
        oracle,
        token,
        catalog,
        http,
        logger,
        datafeed,
        waitPeriod: options.waitPeriod,
        stake: options.stake,
        minNativeTokenBalance: options.minNativeTokenBalance,
        isOnline: makeConnectivityCheck(http, connectivityUrl(endpoint)),
        ...deps.reporter,
      });

      if (options.submitOnce) {
        yield* reporter.reportOnce().pipe(
          Effect.tap((status) => logger.info(`Submitted value, status: ${status}`)),
          Effect.tapError((error) => logger.error(error.message)),
        );
      } else {
        yield* reporter.report(deps.reportCount);
      }
    });

    yield* program.pipe(Effect.provide(deps.layer ?? makeAppLayer(resolveLogLevel(config.main.loglevel))));
  });

/**
 * Stake if needed and submit SpotPrice values to the TellorFlex oracle
 */
export async function report(options: ReportOptions, deps: ReportDeps = {}) {
  try {
    await Effect.runPromise(
      reportEffect(options, deps).pipe(Effect.tapError((error) => Console.error(chalk.red(error.message)))),
    );
  } catch (_error) {
    process.exit(1);
  }
}
