import { blake2b } from '@noble/hashes/blake2b';

/**
 * URL-safe base64 without padding, the encoding Chainweb uses for hashes,
 * request keys and TellorFlex query data.
 */
export function urlsafeBase64EncodeBytes(input: Uint8Array): string {
  return Buffer.from(input).toString('base64url');
}

export function urlsafeBase64EncodeString(input: string): string {
  return urlsafeBase64EncodeBytes(Buffer.from(input, 'utf-8'));
}

export function urlsafeBase64DecodeString(input: string): string {
  return Buffer.from(b64urlDecodeArr(input)).toString('utf-8');
}

export function b64urlDecodeArr(input: string): Uint8Array {
  const rem = input.length % 4;
  const padded = rem > 0 ? input + '='.repeat(4 - rem) : input;
  return new Uint8Array(Buffer.from(padded.replace(/-/g, '+').replace(/_/g, '/'), 'base64'));
}

/** BLAKE2b with a 32 byte digest over the UTF-8 bytes of `input` */
export function hashBin(input: string): Uint8Array {
  return blake2b(Buffer.from(input, 'utf-8'), { dkLen: 32 });
}

export function hash(input: string): string {
  return urlsafeBase64EncodeBytes(hashBin(input));
}

export const bytesToHex = (bytes: Uint8Array): string => Buffer.from(bytes).toString('hex');

export const hexToBytes = (hex: string): Uint8Array => {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new TypeError(`Invalid hex string: ${hex.length > 16 ? `${hex.slice(0, 16)}...` : hex}`);
  }
  return new Uint8Array(Buffer.from(hex, 'hex'));
};
