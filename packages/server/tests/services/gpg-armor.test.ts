import crypto from 'crypto';
import { describe, expect, it } from 'vitest';
import { readArmoredPublicKey } from '../../src/services/gpg-armor.js';

const BODY = Buffer.concat([
  Buffer.from([4, 0x65, 0x00, 0x00, 0x00, 1]),
  Buffer.from([0x00, 0x40]),
  Buffer.alloc(8, 0xab),
  Buffer.from([0x00, 0x11, 0x01, 0x00, 0x01]),
]);

const FINGERPRINT = crypto
  .createHash('sha1')
  .update(Buffer.from([0x99, 0x00, BODY.length]))
  .update(BODY)
  .digest('hex')
  .toUpperCase();

function armor(packet: Buffer, headers: string[] = []): string {
  return [
    '-----BEGIN PGP PUBLIC KEY BLOCK-----',
    ...headers,
    '',
    packet.toString('base64'),
    '=AbCd',
    '-----END PGP PUBLIC KEY BLOCK-----',
  ].join('\r\n');
}

describe('readArmoredPublicKey', () => {
  it('should fingerprint a new-format public key packet', () => {
    const packet = Buffer.concat([Buffer.from([0xc6, BODY.length]), BODY]);
    expect(readArmoredPublicKey(armor(packet, ['Comment: test key']))).toEqual({
      fingerprint: FINGERPRINT,
      keyId: FINGERPRINT.slice(-16),
    });
  });

  it('should read old-format packet framing', () => {
    // Tag 6 with a one-byte length
    const packet = Buffer.concat([Buffer.from([0x98, BODY.length]), BODY]);
    expect(readArmoredPublicKey(armor(packet)).fingerprint).toBe(FINGERPRINT);
  });

  it('should refuse a block that is not armored', () => {
    expect(() => readArmoredPublicKey('mQENBF...')).toThrow('GPG key is not an ASCII-armored public key block');
  });

  it('should refuse a first packet that is not a public key', () => {
    const packet = Buffer.concat([Buffer.from([0xc2, BODY.length]), BODY]);
    expect(() => readArmoredPublicKey(armor(packet))).toThrow('GPG key block does not start with a public key packet');
  });

  it('should refuse keys other than version 4', () => {
    const v3 = Buffer.from(BODY);
    v3[0] = 3;
    const packet = Buffer.concat([Buffer.from([0xc6, v3.length]), v3]);
    expect(() => readArmoredPublicKey(armor(packet))).toThrow('Unsupported OpenPGP key version: 3');
  });
});
