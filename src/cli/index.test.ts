import { beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';
import { main, packageVersion } from './index.js';

describe('kadena CLI', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  it('shows help without arguments', async () => {
    await main([]);
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('kadena - TellorFlex oracle reporter for Kadena'));
  });

  it('prints the package version', async () => {
    expect(packageVersion()).toBe('0.1.0');
    await main(['--version']);
    expect(logSpy).toHaveBeenCalledWith('Version: 0.1.0');
  });

  it('shows command help', async () => {
    await main(['keyset', 'add', '--help']);
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('kadena keyset - Manage encrypted keysets'));

    await main(['report', '--help']);
    expect(logSpy).toHaveBeenLastCalledWith(expect.stringContaining('The oracle modules are only deployed on chain 1.'));
  });

  it('exits on unknown commands', async () => {
    await expect(main(['stake'])).rejects.toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Unknown command: stake'));
    expect(logSpy).toHaveBeenCalledWith('Run "kadena help" for usage information');
  });

  it('exits on unknown subcommands', async () => {
    await expect(main(['config', 'reset'])).rejects.toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Unknown config subcommand: reset'));

    await expect(main(['keyset'])).rejects.toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenLastCalledWith(expect.stringContaining('Unknown keyset subcommand: (none)'));
  });

  it('validates report options before running', async () => {
    await expect(main(['report', '--account', 'reporter1'])).rejects.toThrow('process.exit(1)');
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Missing option --network'));
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('kadena report - Report values to the TellorFlex oracle'));
  });
});
