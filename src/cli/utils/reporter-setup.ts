/**
 * Interactive reporter setup: confirm or update the chain id, endpoint and
 * account before reporting.
 */

import { confirm, input, select } from '@inquirer/prompts';
import chalk from 'chalk';
import { Console, Effect, Schema } from 'effect';
import {
  type ChainwebEndpoint,
  ChainwebEndpointSchema,
  type ConfigManager,
  getEndpoint,
  type KadenaConfig,
} from '../../lib/config.js';
import type { ConfigError, FileError, KeystoreError, ParseError, ValidationError } from '../../lib/effects/errors.js';
import type { HttpClientService, LoggerService } from '../../lib/effects/layers.js';
import type { QueryCatalog } from '../../lib/feeds/catalog.js';
import { buildSpotFeed, type DataFeed } from '../../lib/feeds/datafeed.js';
import type { ChainedAccount, Keystore } from '../../lib/keystore/chained-keyset.js';
import { formatEndpoint, formatList } from '../formatters/account.js';
import { formatReporterSettings, type ReporterSettings } from '../formatters/settings.js';
import { askForNewPassword, prompt } from './prompts.js';

type SetupError = ConfigError | FileError | KeystoreError | ParseError | ValidationError;

export interface SetupResult {
  config: KadenaConfig;
  account: ChainedAccount | null;
}

const ADD_ACCOUNT = 'add account...';

/** The configured endpoint, or null (with a warning) when there is none */
export const checkEndpoint = (config: KadenaConfig, logger: LoggerService): Effect.Effect<ChainwebEndpoint | null> =>
  getEndpoint(config).pipe(
    Effect.catchAll((error) => logger.warn(`No endpoints found: ${error.message}`).pipe(Effect.as(null))),
  );

export const checkAccounts = (
  keystore: Keystore,
  config: KadenaConfig,
  accountName: string,
): Effect.Effect<ChainedAccount[], FileError | ParseError> =>
  keystore
    .find({ chainId: config.main.chainId, name: accountName })
    .pipe(Effect.catchTag('NotFoundError', () => Effect.succeed([])));

/**
 * Show the current settings and let the user keep or update them.
 * New endpoints are saved to the endpoints file.
 */
export function setupConfig(
  config: KadenaConfig,
  accountName: string,
  keystore: Keystore,
  configManager: ConfigManager,
  logger: LoggerService,
  { skipConfirm = false }: { skipConfirm?: boolean } = {},
): Effect.Effect<SetupResult, SetupError> {
  return Effect.gen(function* () {
    const accounts = yield* checkAccounts(keystore, config, accountName);
    const endpoint = yield* checkEndpoint(config, logger);
    const [current] = accounts;

    yield* Console.log(`Your current settings...\nYour chain id: ${config.main.chainId}\n`);
    yield* Console.log(endpoint ? formatEndpoint(endpoint) : 'No endpoints set.');
    yield* Console.log(
      current ? `Your account: ${current.name} at address ${formatList(current.address)}` : 'No accounts set.',
    );

    const keepSettings =
      skipConfirm ||
      (yield* prompt(() => confirm({ message: 'Proceed with current settings (y) or update (n)?', default: true })));
    if (keepSettings) {
      yield* Console.log('Keeping current settings...');
      return { config, account: current ?? null };
    }

    let chainId = config.main.chainId;
    const updateChainId = yield* prompt(() =>
      confirm({ message: `Chain_id is ${chainId}. Do you want to update it?`, default: false }),
    );
    if (updateChainId) {
      chainId = yield* prompt(() =>
        input({
          message: 'Enter a new chain id',
          validate: (value) => /^\d+$/.test(value.trim()) || 'Chain id must be a non-negative integer',
        }),
      ).pipe(Effect.map((value) => Number(value.trim())));
    }

    const updated: KadenaConfig = { main: { ...config.main, chainId }, endpoints: [...config.endpoints] };

    const newEndpoint = yield* setupEndpoint(updated, chainId, logger);
    if (newEndpoint) {
      updated.endpoints = [newEndpoint, ...updated.endpoints.filter((existing) => existing !== newEndpoint)];
      yield* Console.log(`${newEndpoint.url} added!`);
    }

    yield* Console.log(`Your account name: ${current?.name ?? 'None'}`);
    const newAccount = yield* setupAccount(keystore, chainId);
    if (newAccount) {
      yield* Console.log(`${newAccount.name} selected!`);
    }

    yield* configManager.saveEndpoints(updated.endpoints);

    return { config: updated, account: newAccount };
  });
}

export function setupEndpoint(
  config: KadenaConfig,
  chainId: number,
  logger: LoggerService,
): Effect.Effect<ChainwebEndpoint | null, ConfigError> {
  return Effect.gen(function* () {
    const endpoint = yield* checkEndpoint(config, logger);
    if (endpoint) {
      const keep = yield* prompt(() =>
        confirm({ message: `Do you want to use this endpoint on chain_id ${chainId}?`, default: true }),
      );
      return keep ? endpoint : yield* promptForEndpoint(chainId);
    }
    yield* Console.log(`No endpoints are available for chain_id ${chainId}. Please add one:`);
    return yield* promptForEndpoint(chainId);
  });
}

export function promptForEndpoint(chainId: number): Effect.Effect<ChainwebEndpoint | null, ConfigError> {
  return Effect.gen(function* () {
    const rpcUrl = yield* prompt(() => input({ message: 'Enter RPC URL' }));
    const explorer = yield* prompt(() => input({ message: 'Enter block explorer URL' }));
    const network = yield* prompt(() => input({ message: 'Enter network name' }));

    const url = rpcUrl.trim().endsWith('/') ? rpcUrl.trim() : `${rpcUrl.trim()}/`;
    return yield* Schema.decodeUnknown(ChainwebEndpointSchema)({
      chainId,
      network: network.trim(),
      provider: 'n/a',
      url,
      explorer: explorer.trim() || undefined,
    }).pipe(
      Effect.catchAll((error) =>
        Console.error(chalk.red(`Cannot add endpoint: invalid endpoint properties ${error.message}`)).pipe(
          Effect.as(null),
        ),
      ),
    );
  });
}

export function setupAccount(keystore: Keystore, chainId: number): Effect.Effect<ChainedAccount | null, SetupError> {
  return Effect.gen(function* () {
    const accounts = yield* keystore
      .find({ chainId })
      .pipe(Effect.catchTag('NotFoundError', () => Effect.succeed([])));
    if (accounts.length === 0) {
      return yield* promptForAccount(keystore, chainId);
    }

    const choice = yield* prompt(() =>
      select({
        message: `You have these accounts on chain_id ${chainId}`,
        choices: [
          ...accounts.map((account) => ({
            name: `${account.name} ${account.address.join(' ')}`,
            value: account.name,
          })),
          { name: ADD_ACCOUNT, value: ADD_ACCOUNT },
        ],
      }),
    );

    const selected = accounts.find((account) => account.name === choice);
    if (!selected) {
      return yield* promptForAccount(keystore, chainId);
    }
    yield* Console.log(`Account ${selected.name} at ${formatList(selected.address)} selected.`);
    return selected;
  });
}

/** Create a new keyset from user input; null when it could not be added */
export function promptForAccount(
  keystore: Keystore,
  defaultChainId: number,
): Effect.Effect<ChainedAccount | null, ConfigError | KeystoreError | FileError> {
  return Effect.gen(function* () {
    const name = yield* prompt(() => input({ message: 'Enter account name' }));
    const privateKeys = yield* prompt(() => input({ message: 'Enter private key/s' }));
    const chainId = yield* prompt(() =>
      input({
        message: 'Enter chain id',
        default: String(defaultChainId),
        validate: (value) => /^\d+$/.test(value.trim()) || 'Chain id must be a non-negative integer',
      }),
    );
    const pred = yield* prompt(() => input({ message: 'Enter predicate', default: 'keys-all' }));

    const accountName = name.trim();
    const rejected = (message: string) => Console.error(chalk.red(`Cannot add account: ${message}`)).pipe(Effect.as(null));

    return yield* askForNewPassword(accountName).pipe(
      Effect.flatMap((password) =>
        keystore.addKeyset({
          name: accountName,
          pred: pred.trim(),
          chains: Number(chainId.trim()),
          keys: privateKeys.split(/\s+/).filter(Boolean),
          password,
        }),
      ),
      Effect.catchTags({
        AccountExistsError: () => rejected(`Account ${accountName} already exists`),
        ValidationError: (error) => rejected(`Invalid account properties ${error.message}`),
        ConfirmPasswordError: () => rejected('Passwords do not match'),
      }),
    );
  });
}

/** Account lookup by name; prints how to add one when nothing matches */
export function getAccountsFromName(
  keystore: Keystore,
  name: string | undefined,
): Effect.Effect<ChainedAccount[], FileError | ParseError> {
  return keystore.find(name ? { name } : {}).pipe(
    Effect.catchTag('NotFoundError', () => Effect.succeed([])),
    Effect.tap((accounts) =>
      accounts.length === 0
        ? Console.log(
            `No keyset found named: "${name}".\nAdd one with the keyset subcommand.\nFor more info run: \`kadena keyset add --help\``,
          )
        : Effect.void,
    ),
  );
}

/** Ask for the asset and currency of a SpotPrice feed */
export function buildSpotFromInput(
  catalog: QueryCatalog,
  http: HttpClientService,
  logger: LoggerService,
): Effect.Effect<DataFeed, ConfigError> {
  return Effect.gen(function* () {
    yield* Console.log('Building SpotPrice: ');
    const required = (value: string) => value.trim().length > 0 || 'A value is required';
    const asset = yield* prompt(() => input({ message: 'Enter value for QueryParameter asset', validate: required }));
    const currency = yield* prompt(() =>
      input({ message: 'Enter value for QueryParameter currency', validate: required }),
    );
    return buildSpotFeed(asset.trim(), currency.trim(), catalog, http, logger);
  });
}

/** Print the reporter settings and wait for ENTER unless `skipConfirm` */
export function printReporterSettings(
  settings: ReporterSettings,
  skipConfirm = false,
): Effect.Effect<void, ConfigError> {
  return Effect.gen(function* () {
    for (const line of formatReporterSettings(settings)) {
      yield* Console.log(line);
    }
    if (!skipConfirm) {
      yield* prompt(() => input({ message: 'Press [ENTER] to confirm settings.' }));
    }
  });
}
