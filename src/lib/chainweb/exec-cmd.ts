import nacl from 'tweetnacl';
import { bytesToHex, hashBin, hexToBytes, urlsafeBase64EncodeBytes } from './encoding.js';

// ============= Pact JSON values =============
export type PactValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | { readonly decimal: string }
  | { readonly int: string | number }
  | readonly PactValue[]
  | { readonly [key: string]: PactValue };

export interface Capability {
  name: string;
  args: PactValue[];
}

export interface KeyPair {
  publicKey: string;
  secretKey: string;
  clist?: Capability[];
}

export interface Signer {
  pubKey: string;
  clist?: Capability[];
}

export interface ChainwebMeta {
  creationTime: number;
  ttl: number;
  gasLimit: number;
  chainId: string;
  gasPrice: number;
  sender: string;
}

export interface PactCommand {
  hash: string;
  sigs: Array<{ sig: string }>;
  cmd: string;
}

export interface SendRequest {
  cmds: PactCommand[];
}

export interface SignedHash {
  hash: string;
  sig: string;
  pubKey: string;
}

// ============= Metadata =============
export interface MetaOptions {
  sender?: string;
  chainId?: string;
  gasPrice?: number;
  gasLimit?: number;
  creationTime?: number;
  ttl?: number;
}

export function mkMeta({
  sender = '',
  chainId = '0',
  gasPrice = 0,
  gasLimit = 0,
  creationTime = Math.floor(Date.now() / 1000),
  ttl = 1800,
}: MetaOptions = {}): ChainwebMeta {
  if (!Number.isInteger(gasLimit)) {
    throw new TypeError('Expected gasLimit to be an integer');
  }
  if (!Number.isInteger(creationTime) || !Number.isInteger(ttl)) {
    throw new TypeError('Expected creationTime and ttl to be integers');
  }

  return { creationTime, ttl, gasLimit, chainId, gasPrice, sender };
}

/** Current UTC time as used for command nonces, e.g. `2024-01-15T14:30:00.000Z UTC` */
export const formattedTime = (): string => `${new Date().toISOString()} UTC`;

// ============= Serialization =============
const BIGINT_MARKER = '__pact_bigint__';

/**
 * Compact JSON where bigints are written as exact integer literals.
 * Stake amounts are denominated in 1e-18 TRB and overflow a double.
 */
export function stringifyCommand(value: unknown): string {
  const json = JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? `${BIGINT_MARKER}${v}` : v));
  return json.replace(new RegExp(`"${BIGINT_MARKER}(-?\\d+)"`, 'g'), '$1');
}

// ============= Signing =============
export function signMessage(msg: string, keyPair: KeyPair): SignedHash {
  if (!keyPair.publicKey || !keyPair.secretKey) {
    throw new TypeError("Invalid key pair: expected to find 'publicKey' and 'secretKey'.");
  }

  const hashBytes = hashBin(msg);
  const signingKey = nacl.sign.keyPair.fromSeed(hexToBytes(keyPair.secretKey));
  const signature = nacl.sign.detached(hashBytes, signingKey.secretKey);

  return {
    hash: urlsafeBase64EncodeBytes(hashBytes),
    sig: bytesToHex(signature),
    pubKey: keyPair.publicKey,
  };
}

export function attachSignatures(msg: string, keyPairs: readonly KeyPair[]): { hash: string; sigs: SignedHash[] } {
  const hashValue = urlsafeBase64EncodeBytes(hashBin(msg));
  const sigs = keyPairs.map((keyPair) => signMessage(msg, keyPair));

  if (sigs.some((signed) => signed.hash !== hashValue)) {
    throw new TypeError('Signatures for different hashes found');
  }

  return { hash: hashValue, sigs };
}

export const mkSigner = (keyPair: KeyPair): Signer =>
  keyPair.clist && keyPair.clist.length > 0
    ? { pubKey: keyPair.publicKey, clist: keyPair.clist }
    : { pubKey: keyPair.publicKey };

// ============= Commands =============
export interface ExecCommandOptions {
  pactCode: string;
  meta: ChainwebMeta;
  keyPairs?: readonly KeyPair[];
  envData?: Readonly<Record<string, PactValue>>;
  networkId?: string;
  nonce?: string;
}

/**
 * Build a signed exec command: the serialized payload, its BLAKE2b hash and
 * one ed25519 signature of that hash per key pair.
 */
export function prepareExecCmd({
  pactCode,
  meta,
  keyPairs = [],
  envData,
  networkId,
  nonce = formattedTime(),
}: ExecCommandOptions): PactCommand {
  const cmd = stringifyCommand({
    networkId: networkId ?? null,
    payload: { exec: { data: envData && Object.keys(envData).length > 0 ? envData : null, code: pactCode } },
    signers: keyPairs.map(mkSigner),
    meta,
    nonce,
  });

  const { hash, sigs } = attachSignatures(cmd, keyPairs);
  return {
    hash,
    sigs: sigs.map(({ sig }) => ({ sig })),
    cmd,
  };
}

export const mkPublicSend = (cmds: PactCommand | PactCommand[]): SendRequest => ({
  cmds: Array.isArray(cmds) ? cmds : [cmds],
});

export function simpleExecCmd(options: ExecCommandOptions): SendRequest {
  return mkPublicSend(prepareExecCmd(options));
}
