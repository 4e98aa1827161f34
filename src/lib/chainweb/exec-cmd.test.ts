import nacl from 'tweetnacl';
import { describe, expect, it } from 'vitest';
import { TEST_SECRET_KEYS } from '../../test/fixtures.js';
import { restorePublicKey } from '../keystore/keyfile.js';
import { hash, hashBin, hexToBytes } from './encoding.js';
import {
  attachSignatures,
  mkMeta,
  mkPublicSend,
  mkSigner,
  prepareExecCmd,
  signMessage,
  simpleExecCmd,
  stringifyCommand,
} from './exec-cmd.js';

const keyPair = { publicKey: restorePublicKey(TEST_SECRET_KEYS[0]), secretKey: TEST_SECRET_KEYS[0] };

describe('mkMeta', () => {
  it('fills defaults', () => {
    expect(mkMeta({ creationTime: 100 })).toEqual({
      creationTime: 100,
      ttl: 1800,
      gasLimit: 0,
      chainId: '0',
      gasPrice: 0,
      sender: '',
    });
  });

  it('requires an integer gas limit', () => {
    expect(() => mkMeta({ gasLimit: 1.5 })).toThrow('Expected gasLimit to be an integer');
  });
});

describe('stringifyCommand', () => {
  it('writes bigints as exact integers', () => {
    expect(stringifyCommand({ amount: 10n ** 19n, n: 1 })).toBe('{"amount":10000000000000000000,"n":1}');
  });
});

describe('signing', () => {
  it('signs the BLAKE2b hash of the message', () => {
    const signed = signMessage('payload', keyPair);
    expect(signed.hash).toBe(hash('payload'));
    expect(signed.pubKey).toBe(keyPair.publicKey);
    expect(nacl.sign.detached.verify(hashBin('payload'), hexToBytes(signed.sig), hexToBytes(keyPair.publicKey))).toBe(
      true,
    );
  });

  it('rejects incomplete key pairs', () => {
    expect(() => signMessage('payload', { publicKey: '', secretKey: TEST_SECRET_KEYS[0] })).toThrow(
      "Invalid key pair: expected to find 'publicKey' and 'secretKey'.",
    );
  });

  it('attaches one signature per key pair', () => {
    const second = { publicKey: restorePublicKey(TEST_SECRET_KEYS[1]), secretKey: TEST_SECRET_KEYS[1] };
    const { hash: digest, sigs } = attachSignatures('payload', [keyPair, second]);
    expect(digest).toBe(hash('payload'));
    expect(sigs.map((sig) => sig.pubKey)).toEqual([keyPair.publicKey, second.publicKey]);
  });

  it('omits empty capability lists from signers', () => {
    expect(mkSigner({ ...keyPair, clist: [] })).toEqual({ pubKey: keyPair.publicKey });
    expect(mkSigner({ ...keyPair, clist: [{ name: 'coin.GAS', args: [] }] })).toEqual({
      pubKey: keyPair.publicKey,
      clist: [{ name: 'coin.GAS', args: [] }],
    });
  });
});

describe('prepareExecCmd', () => {
  const meta = mkMeta({ sender: 'reporter1', chainId: '1', gasLimit: 1000, gasPrice: 1e-7, creationTime: 1700000000 });

  it('serializes the payload and hashes it', () => {
    const command = prepareExecCmd({
      pactCode: '(free.tellorflex.stake-amount )',
      meta,
      keyPairs: [keyPair],
      envData: { amount: 5n },
      networkId: 'testnet04',
      nonce: 'nonce-1',
    });

    expect(JSON.parse(command.cmd)).toEqual({
      networkId: 'testnet04',
      payload: { exec: { data: { amount: 5 }, code: '(free.tellorflex.stake-amount )' } },
      signers: [{ pubKey: keyPair.publicKey }],
      meta,
      nonce: 'nonce-1',
    });
    expect(command.hash).toBe(hash(command.cmd));
    expect(command.sigs).toHaveLength(1);
  });

  it('leaves unsigned commands without signatures and data', () => {
    const command = prepareExecCmd({ pactCode: '(coin.details "k:1")', meta, nonce: 'n' });
    const parsed: unknown = JSON.parse(command.cmd);
    expect(parsed).toMatchObject({ networkId: null, payload: { exec: { data: null } }, signers: [] });
    expect(command.sigs).toEqual([]);
  });

  it('wraps commands for /send', () => {
    const command = prepareExecCmd({ pactCode: '(+ 1 2)', meta, nonce: 'n' });
    expect(mkPublicSend(command)).toEqual({ cmds: [command] });
    expect(simpleExecCmd({ pactCode: '(+ 1 2)', meta, nonce: 'n' })).toEqual({ cmds: [command] });
  });
});
