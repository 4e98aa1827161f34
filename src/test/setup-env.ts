import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

// Tests never touch the real home directory or the network
process.env.NODE_ENV = 'test';
delete process.env.ALLOW_REAL_API_CALLS;
delete process.env.KADENA_LOG_LEVEL;

const root = mkdtempSync(join(tmpdir(), 'kadena-reporter-test-'));
process.env.KADENA_CONFIG_DIR = join(root, 'config');
process.env.KADENA_KEYSTORE_DIR = join(root, 'keystore');
