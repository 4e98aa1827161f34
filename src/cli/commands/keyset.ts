import chalk from 'chalk';
import { Console, Effect, pipe } from 'effect';
import { ValidationError } from '../../lib/effects/errors.js';
import { Keystore } from '../../lib/keystore/chained-keyset.js';
import { formatAccountLine, formatAddedAccount, formatList } from '../formatters/account.js';
import { getOption, parseChainIds, parseKdf, positionalArgs } from '../utils/options.js';
import { askForAccountPassword, askForNewPassword } from '../utils/prompts.js';

const runCommand = async <A, E extends { message: string }>(effect: Effect.Effect<A, E>) => {
  try {
    await Effect.runPromise(effect.pipe(Effect.tapError((error) => Console.error(chalk.red(error.message)))));
  } catch (_error) {
    process.exit(1);
  }
};

// ============= add =============
const addKeysetEffect = (args: readonly string[], keystore: Keystore) =>
  Effect.gen(function* () {
    const [name, keyList, pred, ...chainArgs] = positionalArgs(args, ['--password', '--kdf']);
    if (!name || !keyList || !pred || chainArgs.length === 0) {
      return yield* Effect.fail(
        new ValidationError('Usage: kadena keyset add <name> "<private keys>" <predicate> <chain-id...>'),
      );
    }

    if (keystore.exists(name)) {
      yield* Console.log(`Account ${name} already exists.`);
      return;
    }

    const chains = yield* parseChainIds(chainArgs);
    const kdf = yield* parseKdf(getOption(args, ['--kdf']));
    const password = getOption(args, ['--password']) ?? (yield* askForNewPassword(name));

    const account = yield* keystore.addKeyset({
      name,
      pred,
      chains,
      keys: keyList.split(/\s+/).filter(Boolean),
      password,
      kdf,
    });
    yield* Console.log(formatAddedAccount(account));
  });

export const keysetAdd = (args: readonly string[], keystore: Keystore = new Keystore()) =>
  runCommand(addKeysetEffect(args, keystore));

// ============= find =============
const findKeysetsEffect = (args: readonly string[], keystore: Keystore) =>
  Effect.gen(function* () {
    const chainArg = getOption(args, ['--chain-id']);
    const chainId = chainArg === undefined ? undefined : (yield* parseChainIds([chainArg]))[0];
    const address = getOption(args, ['--address'])?.split(/\s+/).filter(Boolean);

    const accounts = yield* keystore.find({ name: getOption(args, ['--name']), chainId, address });
    yield* Console.log(`Found ${accounts.length} accounts.`);
    for (const account of accounts) {
      yield* Console.log(formatAccountLine(account));
    }
  });

export const keysetFind = (args: readonly string[], keystore: Keystore = new Keystore()) =>
  runCommand(findKeysetsEffect(args, keystore));

// ============= key =============
const showKeysEffect = (args: readonly string[], keystore: Keystore) =>
  Effect.gen(function* () {
    const [name] = positionalArgs(args, ['-p', '--password']);
    if (!name) {
      return yield* Effect.fail(new ValidationError('Usage: kadena keyset key <name> [--password p]'));
    }
    if (!keystore.exists(name)) {
      yield* Console.log(`Account ${name} does not exist.`);
      return;
    }

    const account = yield* keystore.get(name);
    const password = getOption(args, ['-p', '--password']) ?? (yield* askForAccountPassword(name));

    const unlocked = yield* pipe(
      account.unlock(password),
      Effect.as(true),
      Effect.catchTag('DecryptionError', () => Console.log('Invalid Password').pipe(Effect.as(false))),
    );
    if (!unlocked) {
      return;
    }
    const keys = yield* account.keys;
    yield* Console.log(`Private keys: ${formatList(keys)}`);
  });

export const keysetKey = (args: readonly string[], keystore: Keystore = new Keystore()) =>
  runCommand(showKeysEffect(args, keystore));

// ============= delete =============
const deleteKeysetEffect = (args: readonly string[], keystore: Keystore) =>
  Effect.gen(function* () {
    const [name] = positionalArgs(args);
    if (!name) {
      return yield* Effect.fail(new ValidationError('Usage: kadena keyset delete <name>'));
    }
    yield* pipe(
      keystore.delete(name),
      Effect.tap(() => Console.log(`Deleted account ${name}.`)),
      Effect.catchTag('NotFoundError', (error) => Console.log(error.message)),
    );
  });

export const keysetDelete = (args: readonly string[], keystore: Keystore = new Keystore()) =>
  runCommand(deleteKeysetEffect(args, keystore));
