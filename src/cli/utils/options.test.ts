import { Effect } from 'effect';
import { describe, expect, it } from 'vitest';
import { KDF_PROFILES } from '../../lib/keystore/keyfile.js';
import {
  getOption,
  hasFlag,
  parseChainIds,
  parseKdf,
  parseNumberOption,
  parseReportOptions,
  positionalArgs,
} from './options.js';

describe('getOption', () => {
  it('reads spaced and inline values', () => {
    expect(getOption(['-a', 'alice'], ['-a', '--account'])).toBe('alice');
    expect(getOption(['--account=bob'], ['-a', '--account'])).toBe('bob');
  });

  it('does not take the next flag as a value', () => {
    expect(getOption(['--account', '--yes'], ['--account'])).toBeUndefined();
  });

  it('accepts negative numbers as values', () => {
    expect(getOption(['--stake', '-5'], ['--stake'])).toBe('-5');
  });
});

describe('positionalArgs', () => {
  it('skips flags and the values of value options', () => {
    expect(positionalArgs(['alice', '--password', 'test-secret', 'keys-all', '-y', '1'], ['--password'])).toEqual([
      'alice',
      'keys-all',
      '1',
    ]);
  });
});

describe('hasFlag', () => {
  it('matches any alias', () => {
    expect(hasFlag(['-y'], ['-y', '--yes'])).toBe(true);
    expect(hasFlag(['--yes-please'], ['-y', '--yes'])).toBe(false);
  });
});

describe('parseNumberOption', () => {
  it('falls back when the option is absent', async () => {
    await expect(Effect.runPromise(parseNumberOption([], ['--gas-limit'], 150000))).resolves.toBe(150000);
  });

  it('rejects fractions for integer options', async () => {
    await expect(
      Effect.runPromise(parseNumberOption(['--gas-limit', '1.5'], ['-gl', '--gas-limit'], 0, { integer: true })),
    ).rejects.toThrow('Invalid value for --gas-limit: "1.5" is not an integer');
  });

  it('rejects negative values', async () => {
    await expect(Effect.runPromise(parseNumberOption(['-s', '-1'], ['-s', '--stake'], 10))).rejects.toThrow(
      'Invalid value for --stake: must not be negative',
    );
  });
});

describe('parseChainIds', () => {
  it('parses non-negative integers', async () => {
    await expect(Effect.runPromise(parseChainIds(['0', '1', '19']))).resolves.toEqual([0, 1, 19]);
    await expect(Effect.runPromise(parseChainIds(['one']))).rejects.toThrow('Invalid chain id: "one"');
  });
});

describe('parseKdf', () => {
  it('maps profile names to limits', async () => {
    await expect(Effect.runPromise(parseKdf('interactive'))).resolves.toEqual(KDF_PROFILES.interactive);
    await expect(Effect.runPromise(parseKdf(undefined))).resolves.toBeUndefined();
    await expect(Effect.runPromise(parseKdf('fast'))).rejects.toThrow(
      'Invalid value for --kdf: "fast" (choose from interactive, moderate, sensitive)',
    );
  });
});

describe('parseReportOptions', () => {
  it('applies defaults', async () => {
    const options = await Effect.runPromise(parseReportOptions(['-a', 'reporter1', '-n', 'testnet']));
    expect(options).toEqual({
      account: 'reporter1',
      network: 'testnet04',
      queryTag: undefined,
      buildSpot: false,
      gasLimit: 150000,
      gasPrice: 1e-7,
      waitPeriod: 7,
      stake: 10,
      minNativeTokenBalance: 0.25,
      submitOnce: false,
      password: undefined,
      yes: false,
    });
  });

  it('reads every option', async () => {
    const options = await Effect.runPromise(
      parseReportOptions([
        '--account=reporter1',
        '--network',
        'mainnet01',
        '-qt',
        'eth-usd-spot',
        '-gl',
        '200000',
        '-gp',
        '0.00001',
        '-wp',
        '30',
        '-s',
        '20',
        '-mnb',
        '1',
        '--submit-once',
        '-pwd',
        'test-secret',
        '-y',
      ]),
    );
    expect(options).toMatchObject({
      account: 'reporter1',
      network: 'mainnet01',
      queryTag: 'eth-usd-spot',
      gasLimit: 200000,
      gasPrice: 0.00001,
      waitPeriod: 30,
      stake: 20,
      minNativeTokenBalance: 1,
      submitOnce: true,
      password: 'test-secret',
      yes: true,
    });
  });

  it('lets the last submit flag win', async () => {
    const args = ['-a', 'r', '-n', 'testnet04', '--submit-once', '--submit-continuous'];
    await expect(Effect.runPromise(parseReportOptions(args))).resolves.toMatchObject({ submitOnce: false });
  });

  it('requires the account and a known network', async () => {
    await expect(Effect.runPromise(parseReportOptions(['-n', 'testnet04']))).rejects.toThrow('Missing option --account');
    await expect(Effect.runPromise(parseReportOptions(['-a', 'r']))).rejects.toThrow('Missing option --network');
    await expect(Effect.runPromise(parseReportOptions(['-a', 'r', '-n', 'devnet']))).rejects.toThrow(
      'Invalid network "devnet" (use testnet04 or mainnet01)',
    );
  });
});
