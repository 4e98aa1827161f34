import { mkdtempSync, readFileSync, statSync, writeFileSync, mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Effect } from 'effect';
import { beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigManager,
  DEFAULT_ENDPOINTS,
  DEFAULT_MAIN_CONFIG,
  findEndpoints,
  getChainEndpoint,
  getEndpoint,
  normalizeNetwork,
} from './config.js';

describe('ConfigManager', () => {
  let configDir: string;
  let manager: ConfigManager;

  beforeEach(() => {
    configDir = join(mkdtempSync(join(tmpdir(), 'kadena-config-')), 'cfg');
    manager = new ConfigManager(configDir);
  });

  it('falls back to defaults without config files', async () => {
    const config = await Effect.runPromise(manager.getConfig());
    expect(config.main).toEqual(DEFAULT_MAIN_CONFIG);
    expect(config.endpoints).toEqual(DEFAULT_ENDPOINTS);
  });

  it('creates missing files once', async () => {
    const created = await Effect.runPromise(manager.init());
    expect(created).toEqual([join(configDir, 'config.json'), join(configDir, 'endpoints.json')]);
    expect(statSync(manager.mainFile).mode & 0o777).toBe(0o600);

    await expect(Effect.runPromise(manager.init())).resolves.toEqual([]);
  });

  it('reads saved settings', async () => {
    await Effect.runPromise(manager.saveMain({ loglevel: 'debug', chainId: 1, network: 'mainnet01' }));
    const config = await Effect.runPromise(manager.getConfig());
    expect(config.main).toEqual({ loglevel: 'debug', chainId: 1, network: 'mainnet01' });

    const file: unknown = JSON.parse(readFileSync(manager.mainFile, 'utf-8'));
    expect(file).toEqual({ loglevel: 'debug', chainId: 1, network: 'mainnet01' });
  });

  it('refuses endpoints without a trailing slash', async () => {
    const [endpoint] = DEFAULT_ENDPOINTS;
    if (!endpoint) throw new Error('missing default endpoint');
    await expect(
      Effect.runPromise(manager.saveEndpoints([{ ...endpoint, url: 'https://node.test/api' }])),
    ).rejects.toThrow('Invalid endpoint');
  });

  it('reports invalid JSON', async () => {
    mkdirSync(configDir, { recursive: true });
    writeFileSync(manager.mainFile, '{ not json', 'utf-8');
    await expect(Effect.runPromise(manager.getConfig())).rejects.toThrow(`Invalid JSON in config file ${manager.mainFile}`);
  });

  it('reports files that do not match the schema', async () => {
    mkdirSync(configDir, { recursive: true });
    writeFileSync(manager.mainFile, JSON.stringify({ loglevel: 'loud', chainId: 1, network: 'testnet04' }), 'utf-8');
    await expect(Effect.runPromise(manager.getConfig())).rejects.toThrow(`Invalid config schema in ${manager.mainFile}`);
  });
});

describe('endpoints', () => {
  it('finds endpoints by chain and network', () => {
    expect(findEndpoints(DEFAULT_ENDPOINTS, { network: 'mainnet01' }).map((e) => e.url)).toEqual([
      'https://api.chainweb.com/chainweb/0.0/mainnet01/chain/1/pact/api/v1/',
    ]);
    expect(findEndpoints(DEFAULT_ENDPOINTS, { chainId: 2 })).toEqual([]);
    expect(getChainEndpoint(DEFAULT_ENDPOINTS, 1)?.network).toBe('mainnet01');
  });

  it('resolves the configured endpoint', async () => {
    const endpoint = await Effect.runPromise(
      getEndpoint({ main: DEFAULT_MAIN_CONFIG, endpoints: [...DEFAULT_ENDPOINTS] }),
    );
    expect(endpoint.url).toBe('https://api.testnet.chainweb.com/chainweb/0.0/testnet04/chain/1/pact/api/v1/');
  });

  it('fails when no endpoint serves the chain', async () => {
    await expect(
      Effect.runPromise(getEndpoint({ main: { ...DEFAULT_MAIN_CONFIG, chainId: 5 }, endpoints: [...DEFAULT_ENDPOINTS] })),
    ).rejects.toThrow('Endpoint not found for chain_id=5');
  });
});

describe('normalizeNetwork', () => {
  it('accepts ids and aliases', () => {
    expect(normalizeNetwork('testnet')).toBe('testnet04');
    expect(normalizeNetwork('MAINNET')).toBe('mainnet01');
    expect(normalizeNetwork('mainnet01')).toBe('mainnet01');
    expect(normalizeNetwork('devnet')).toBeUndefined();
  });
});
