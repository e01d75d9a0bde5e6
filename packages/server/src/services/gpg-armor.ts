/**
 * ASCII-armored OpenPGP public keys
 *
 * Only the first packet is read: it must be a version 4 public key, whose
 * fingerprint is SHA-1 over 0x99, the two-byte body length and the body.
 * The key id is the low 64 bits of the fingerprint.
 */

import crypto from 'crypto';
import { InvalidInputError } from '@terrashelf/core';

const PUBLIC_KEY_TAG = 6;
const BEGIN_MARKER = '-----BEGIN PGP PUBLIC KEY BLOCK-----';
const END_MARKER = '-----END PGP PUBLIC KEY BLOCK-----';

export interface ArmoredPublicKey {
  fingerprint: string;
  keyId: string;
}

function dearmor(armor: string): Buffer {
  const lines = armor.replace(/\r/g, '').split('\n').map(line => line.trim());
  const begin = lines.indexOf(BEGIN_MARKER);
  const end = lines.indexOf(END_MARKER);
  if (begin === -1 || end === -1 || end < begin) {
    throw new InvalidInputError('GPG key is not an ASCII-armored public key block');
  }

  // Armor headers end at the first blank line
  let bodyStart = begin + 1;
  const blank = lines.indexOf('', bodyStart);
  if (blank !== -1 && blank < end) {
    bodyStart = blank + 1;
  }

  const base64 = lines
    .slice(bodyStart, end)
    .filter(line => line !== '' && !line.startsWith('='))
    .join('');
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(base64)) {
    throw new InvalidInputError('GPG key armor contains invalid characters');
  }
  return Buffer.from(base64, 'base64');
}

function firstPacket(data: Buffer): { tag: number; body: Buffer } {
  const header = data[0];
  if (header === undefined || data.length < 6 || (header & 0x80) === 0) {
    throw new InvalidInputError('GPG key does not start with an OpenPGP packet');
  }

  let tag: number;
  let length: number;
  let offset: number;
  if ((header & 0x40) !== 0) {
    tag = header & 0x3f;
    const first = data[1] ?? 0;
    if (first < 192) {
      length = first;
      offset = 2;
    } else if (first < 224) {
      length = ((first - 192) << 8) + (data[2] ?? 0) + 192;
      offset = 3;
    } else if (first === 255) {
      length = data.readUInt32BE(2);
      offset = 6;
    } else {
      throw new InvalidInputError('GPG key uses partial packet lengths');
    }
  } else {
    tag = (header >> 2) & 0x0f;
    const lengthType = header & 0x03;
    if (lengthType === 0) {
      length = data[1] ?? 0;
      offset = 2;
    } else if (lengthType === 1) {
      length = data.readUInt16BE(1);
      offset = 3;
    } else if (lengthType === 2) {
      length = data.readUInt32BE(1);
      offset = 5;
    } else {
      throw new InvalidInputError('GPG key uses an indeterminate packet length');
    }
  }

  if (offset + length > data.length) {
    throw new InvalidInputError('GPG key packet is truncated');
  }
  return { tag, body: data.subarray(offset, offset + length) };
}

/**
 * Fingerprint and key id of an armored version 4 public key
 *
 * @throws InvalidInputError when the armor or the first packet is not usable
 */
export function readArmoredPublicKey(armor: string): ArmoredPublicKey {
  const { tag, body } = firstPacket(dearmor(armor));
  if (tag !== PUBLIC_KEY_TAG) {
    throw new InvalidInputError('GPG key block does not start with a public key packet');
  }
  if (body[0] !== 4) {
    throw new InvalidInputError(`Unsupported OpenPGP key version: ${body[0] ?? 'none'}`);
  }
  if (body.length > 0xffff) {
    throw new InvalidInputError('GPG public key packet is too large');
  }

  const prefix = Buffer.from([0x99, (body.length >> 8) & 0xff, body.length & 0xff]);
  const fingerprint = crypto.createHash('sha1').update(prefix).update(body).digest('hex').toUpperCase();
  return { fingerprint, keyId: fingerprint.slice(-16) };
}
