import { Duration, Schedule } from 'effect';
import type { ChainwebModuleOptions } from '../lib/effects/chainweb/module-operations.js';
import { LocalKeyset } from '../lib/keystore/chained-keyset.js';
import type { KdfLimits } from '../lib/keystore/keyfile.js';

/** Placeholder ed25519 seeds, never used outside tests */
export const TEST_SECRET_KEYS = ['11'.repeat(32), '22'.repeat(32)] as const;

export const TEST_PASSWORD = 'test-secret';

/** Cheap argon2 limits so tests do not spend seconds per key */
export const FAST_KDF: KdfLimits = { opslimit: 3, memlimit: 8 * 1024 * 1024 };

/** No HTTP retries, no poll delays, no spinner */
export const testModuleOptions: ChainwebModuleOptions = {
  retrySchedule: Schedule.stop,
  pollDelay: () => Duration.zero,
  spinner: false,
};

export const makeTestKeyset = (name = 'reporter1', keys: readonly string[] = [TEST_SECRET_KEYS[0]]) =>
  new LocalKeyset(name, keys, 'keys-all');
