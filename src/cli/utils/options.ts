import { Effect } from 'effect';
import { ValidationError } from '../../lib/effects/errors.js';
import { isKdfProfile, KDF_PROFILES, type KdfLimits } from '../../lib/keystore/keyfile.js';
import { type Network, normalizeNetwork } from '../../lib/config.js';

/**
 * Value of an option given as `--name value` or `--name=value`.
 * `names` lists every alias, e.g. ['-gl', '--gas-limit'].
 */
export function getOption(args: readonly string[], names: readonly string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    for (const name of names) {
      if (arg === name) {
        const next = args[i + 1];
        return next !== undefined && !isFlag(next) ? next : undefined;
      }
      if (arg.startsWith(`${name}=`)) {
        return arg.slice(name.length + 1);
      }
    }
  }
  return undefined;
}

export const hasFlag = (args: readonly string[], names: readonly string[]): boolean =>
  args.some((arg) => names.includes(arg));

// Negative numbers are values, not flags
const isFlag = (arg: string): boolean => arg.startsWith('-') && !/^-\d/.test(arg);

/**
 * Arguments that are neither flags nor the values of `valueOptions`
 */
export function positionalArgs(args: readonly string[], valueOptions: readonly string[] = []): string[] {
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isFlag(arg)) {
      if (valueOptions.includes(arg)) i++;
      continue;
    }
    positionals.push(arg);
  }
  return positionals;
}

export function parseNumberOption(
  args: readonly string[],
  names: readonly string[],
  fallback: number,
  { integer = false }: { integer?: boolean } = {},
): Effect.Effect<number, ValidationError> {
  const raw = getOption(args, names);
  if (raw === undefined) {
    return Effect.succeed(fallback);
  }
  const value = Number(raw);
  const label = names[names.length - 1] ?? 'option';
  if (raw.trim() === '' || !Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    return Effect.fail(
      new ValidationError(`Invalid value for ${label}: "${raw}" is not ${integer ? 'an integer' : 'a number'}`, label, raw),
    );
  }
  if (value < 0) {
    return Effect.fail(new ValidationError(`Invalid value for ${label}: must not be negative`, label, raw));
  }
  return Effect.succeed(value);
}

export function parseChainIds(values: readonly string[]): Effect.Effect<number[], ValidationError> {
  const chains: number[] = [];
  for (const value of values) {
    const chain = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(chain)) {
      return Effect.fail(new ValidationError(`Invalid chain id: "${value}"`, 'chains', value));
    }
    chains.push(chain);
  }
  return Effect.succeed(chains);
}

export function parseKdf(value: string | undefined): Effect.Effect<KdfLimits | undefined, ValidationError> {
  if (value === undefined) {
    return Effect.succeed(undefined);
  }
  return isKdfProfile(value)
    ? Effect.succeed(KDF_PROFILES[value])
    : Effect.fail(
        new ValidationError(
          `Invalid value for --kdf: "${value}" (choose from ${Object.keys(KDF_PROFILES).join(', ')})`,
          'kdf',
          value,
        ),
      );
}

// ============= report =============
export interface ReportOptions {
  account: string;
  network: Network;
  queryTag?: string;
  buildSpot: boolean;
  gasLimit: number;
  gasPrice: number;
  waitPeriod: number;
  stake: number;
  minNativeTokenBalance: number;
  submitOnce: boolean;
  password?: string;
  yes: boolean;
}

export const REPORT_DEFAULTS = {
  gasLimit: 150000,
  gasPrice: 1e-7,
  waitPeriod: 7,
  stake: 10,
  minNativeTokenBalance: 0.25,
} as const;

export function parseReportOptions(args: readonly string[]): Effect.Effect<ReportOptions, ValidationError> {
  return Effect.gen(function* () {
    const account = getOption(args, ['-a', '--account']);
    if (!account) {
      return yield* Effect.fail(new ValidationError('Missing option --account', 'account'));
    }

    const networkArg = getOption(args, ['-n', '--network']);
    if (!networkArg) {
      return yield* Effect.fail(new ValidationError('Missing option --network', 'network'));
    }
    const network = normalizeNetwork(networkArg);
    if (!network) {
      return yield* Effect.fail(
        new ValidationError(`Invalid network "${networkArg}" (use testnet04 or mainnet01)`, 'network', networkArg),
      );
    }

    const gasLimit = yield* parseNumberOption(args, ['-gl', '--gas-limit'], REPORT_DEFAULTS.gasLimit, { integer: true });
    const gasPrice = yield* parseNumberOption(args, ['-gp', '--gas-price'], REPORT_DEFAULTS.gasPrice);
    const waitPeriod = yield* parseNumberOption(args, ['-wp', '--wait-period'], REPORT_DEFAULTS.waitPeriod, {
      integer: true,
    });
    const stake = yield* parseNumberOption(args, ['-s', '--stake'], REPORT_DEFAULTS.stake);
    const minNativeTokenBalance = yield* parseNumberOption(
      args,
      ['-mnb', '--min-native-token-balance'],
      REPORT_DEFAULTS.minNativeTokenBalance,
    );

    // the last of --submit-once / --submit-continuous wins
    const submitOnce = args.lastIndexOf('--submit-once') > args.lastIndexOf('--submit-continuous');

    return {
      account,
      network,
      queryTag: getOption(args, ['-qt', '--query-tag']),
      buildSpot: hasFlag(args, ['-b', '--build-spot']),
      gasLimit,
      gasPrice,
      waitPeriod,
      stake,
      minNativeTokenBalance,
      submitOnce,
      password: getOption(args, ['-pwd', '--password']),
      yes: hasFlag(args, ['-y', '--yes']),
    };
  });
}
