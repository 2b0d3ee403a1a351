// src/crypto/command-cipher.ts

import forge from 'node-forge';
import { RSA_BLOCK_SIZE } from '../constants/constants.js';
import { NbeEncryptionError, NbeFrameDecodeError, NbeFrameEncodeError } from '../errors.js';
import type { RsaPublicKey } from '../types/nbe-types.js';
import { concatUint8Arrays, hexToBytes, randomBytes, toHex } from '../utils/utils.js';

/**
 * Parses the controller key as published in `misc.rsa_key`:
 * base64 of an X.509 SubjectPublicKeyInfo.
 */
export function parsePublicKey(base64: string): RsaPublicKey {
  const body = base64.replace(/\s+/g, '');
  if (body.length === 0) {
    throw new NbeEncryptionError('RSA public key is empty');
  }
  try {
    return forge.pki.publicKeyFromPem(
      `-----BEGIN PUBLIC KEY-----\n${body}\n-----END PUBLIC KEY-----`
    );
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new NbeEncryptionError(`Invalid RSA public key: ${reason}`);
  }
}

/**
 * Raw RSA over one 64-byte block.
 *
 * The frame body is padded with random bytes up to the block size, read as a
 * big-endian integer `m`, and `m^e mod n` is returned big-endian without
 * leading zero bytes. There is no PKCS#1 padding; the controller expects the
 * bare exponentiation.
 */
export function encryptCommand(body: Uint8Array, key: RsaPublicKey): Uint8Array {
  if (body.length > RSA_BLOCK_SIZE) {
    throw new NbeFrameEncodeError(
      `Frame body of ${body.length} bytes does not fit the ${RSA_BLOCK_SIZE}-byte RSA block`
    );
  }
  const block = concatUint8Arrays([body, randomBytes(RSA_BLOCK_SIZE - body.length)]);
  const m = new forge.jsbn.BigInteger(toHex(block), 16);
  const hex = m.modPow(key.e, key.n).toString(16);
  return hex === '0' ? new Uint8Array(0) : hexToBytes(hex);
}

/**
 * Inverse of {@link encryptCommand} for the controller side. Returns the full
 * 64-byte block, padding included.
 */
export function decryptCommand(cipher: Uint8Array, key: forge.pki.rsa.PrivateKey): Uint8Array {
  if (cipher.length === 0) {
    throw new NbeFrameDecodeError('Encrypted frame has no body');
  }
  const c = new forge.jsbn.BigInteger(toHex(cipher), 16);
  const m = hexToBytes(c.modPow(key.d, key.n).toString(16));
  if (m.length > RSA_BLOCK_SIZE) {
    throw new NbeFrameDecodeError('Decrypted block is larger than the RSA block size');
  }
  const block = new Uint8Array(RSA_BLOCK_SIZE);
  block.set(m, RSA_BLOCK_SIZE - m.length);
  return block;
}

/**
 * Base64 SubjectPublicKeyInfo of a key, the form the controller publishes.
 */
export function exportPublicKey(key: RsaPublicKey): string {
  return forge.util.encode64(forge.asn1.toDer(forge.pki.publicKeyToAsn1(key)).getBytes());
}
