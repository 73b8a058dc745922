import { describe, expect, it } from 'vitest';
import { DecryptionError, FieldCipher, isEncrypted } from '../encryption';

describe('FieldCipher', () => {
    const cipher = new FieldCipher('test-secret-key');

    it('opens what it sealed', () => {
        const sealed = cipher.encrypt('launch codes: 1234');

        expect(isEncrypted(sealed)).toBe(true);
        expect(cipher.decrypt(sealed)).toBe('launch codes: 1234');
    });

    it('draws a fresh IV for every value', () => {
        expect(cipher.encrypt('same')).not.toBe(cipher.encrypt('same'));
    });

    it('refuses values sealed with another key', () => {
        const sealed = new FieldCipher('another-test-key').encrypt('hello');

        expect(() => cipher.decrypt(sealed)).toThrow(DecryptionError);
    });

    it('refuses tampered values', () => {
        const payload = Buffer.from(cipher.encrypt('hello').slice('DBENC:'.length), 'base64');
        payload[payload.length - 1] ^= 0xff;

        expect(() => cipher.decrypt(`DBENC:${payload.toString('base64')}`)).toThrow(DecryptionError);
    });

    it('refuses unmarked and truncated values', () => {
        expect(() => cipher.decrypt('hello')).toThrow('Value is not database-encrypted');
        expect(() => cipher.decrypt('DBENC:AAAA')).toThrow('Encrypted value too short');
    });
});

describe('isEncrypted', () => {
    it('recognises the prefix marker', () => {
        expect(isEncrypted('DBENC:abc')).toBe(true);
        expect(isEncrypted('plain')).toBe(false);
    });
});
