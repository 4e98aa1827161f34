import { randomBytes } from 'node:crypto';
import argon2 from 'argon2';
import { Effect } from 'effect';
import nacl from 'tweetnacl';
import { bytesToHex, hexToBytes } from '../chainweb/encoding.js';
import { DecryptionError, KeystoreError, ValidationError } from '../effects/errors.js';

export const SALT_BYTES = 16;

/**
 * Argon2i cost parameters, named after libsodium's crypto_pwhash_argon2i limits.
 * `memlimit` is in bytes.
 */
export interface KdfLimits {
  opslimit: number;
  memlimit: number;
}

export const KDF_PROFILES = {
  interactive: { opslimit: 4, memlimit: 33554432 },
  moderate: { opslimit: 6, memlimit: 134217728 },
  sensitive: { opslimit: 8, memlimit: 536870912 },
} as const satisfies Record<string, KdfLimits>;

export type KdfProfile = keyof typeof KDF_PROFILES;

export const isKdfProfile = (value: string): value is KdfProfile => Object.hasOwn(KDF_PROFILES, value);

/** Keyfiles written without explicit limits were encrypted with the sensitive profile */
export const DEFAULT_KDF: KdfLimits = KDF_PROFILES.sensitive;

export interface EncryptedKey {
  ciphertext: string;
  nonce: string;
  salt: string;
  opslimit?: number;
  memlimit?: number;
}

const deriveKey = (password: string, salt: Uint8Array, limits: KdfLimits) =>
  Effect.tryPromise({
    try: () =>
      argon2.hash(password, {
        type: argon2.argon2i,
        raw: true,
        salt: Buffer.from(salt),
        hashLength: nacl.secretbox.keyLength,
        timeCost: limits.opslimit,
        memoryCost: Math.floor(limits.memlimit / 1024),
        parallelism: 1,
      }),
    catch: (error) => new KeystoreError(`Key derivation failed: ${error}`, error),
  });

const parseHex = (value: string, field: string) =>
  Effect.try({
    try: () => hexToBytes(value),
    catch: (error) => new ValidationError(`Invalid hex in ${field}`, field, value, error),
  });

/**
 * Encrypt private keys (hex ed25519 seeds) with a password.
 * Every key gets its own salt and nonce.
 */
export function encrypt(
  privateKeys: readonly string[],
  password: string,
  limits: KdfLimits = DEFAULT_KDF,
): Effect.Effect<EncryptedKey[], KeystoreError | ValidationError> {
  return Effect.forEach(privateKeys, (privateKey) =>
    Effect.gen(function* () {
      const plaintext = yield* parseHex(privateKey, 'privateKey');
      const salt = new Uint8Array(randomBytes(SALT_BYTES));
      const nonce = new Uint8Array(randomBytes(nacl.secretbox.nonceLength));
      const key = yield* deriveKey(password, salt, limits);
      const ciphertext = nacl.secretbox(plaintext, nonce, new Uint8Array(key));

      const entry: EncryptedKey = { ciphertext: bytesToHex(ciphertext), nonce: bytesToHex(nonce), salt: bytesToHex(salt) };
      if (limits.opslimit !== DEFAULT_KDF.opslimit || limits.memlimit !== DEFAULT_KDF.memlimit) {
        entry.opslimit = limits.opslimit;
        entry.memlimit = limits.memlimit;
      }
      return entry;
    }),
  );
}

export function decrypt(
  encryptions: readonly EncryptedKey[],
  password: string,
): Effect.Effect<string[], KeystoreError | ValidationError | DecryptionError> {
  return Effect.forEach(encryptions, (encryption) =>
    Effect.gen(function* () {
      const salt = yield* parseHex(encryption.salt, 'salt');
      const nonce = yield* parseHex(encryption.nonce, 'nonce');
      const ciphertext = yield* parseHex(encryption.ciphertext, 'ciphertext');
      const limits: KdfLimits = {
        opslimit: encryption.opslimit ?? DEFAULT_KDF.opslimit,
        memlimit: encryption.memlimit ?? DEFAULT_KDF.memlimit,
      };
      const key = yield* deriveKey(password, salt, limits);
      const plaintext = nacl.secretbox.open(ciphertext, nonce, new Uint8Array(key));
      if (!plaintext) {
        return yield* Effect.fail(new DecryptionError('Decryption failed. Ciphertext failed verification'));
      }
      return bytesToHex(plaintext);
    }),
  );
}

/**
 * Restore the hex public key of an ed25519 key pair from its 32 byte seed.
 */
export function restorePublicKey(seed: string): string {
  if (!seed) {
    throw new ValidationError('seed for KeyPair generation not provided', 'seed');
  }
  if (seed.length !== 64) {
    throw new ValidationError('Seed for KeyPair generation has bad size', 'seed', seed.length);
  }
  const keyPair = nacl.sign.keyPair.fromSeed(hexToBytes(seed));
  return bytesToHex(keyPair.publicKey);
}
