import { createCipheriv, createDecipheriv, randomBytes, pbkdf2Sync } from 'node:crypto';

/**
 * Application-level encryption for at-rest protection of secret fields.
 * SQLite stores plain values, so text, prompt and answer are sealed
 * before they are written.
 */

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32; // 256 bits
const IV_LENGTH = 12; // 96 bits, GCM standard nonce
const TAG_LENGTH = 16;
const PBKDF2_ITERATIONS = 100000;
const KEY_DERIVATION_SALT = 'burnbox:field-cipher:v1';
const DB_ENCRYPTION_PREFIX = 'DBENC:'; // Prefix to mark database-encrypted values

export class DecryptionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'DecryptionError';
    }
}

/**
 * Seals and opens column values with a key derived once from `DB_ENCRYPTION_KEY`.
 *
 * Format: `DBENC:` + base64(iv | authTag | ciphertext). Every call to `encrypt`
 * draws a fresh IV, so equal plaintexts never produce equal column values.
 */
export class FieldCipher {
    private readonly key: Buffer;

    constructor(secret: string) {
        this.key = pbkdf2Sync(secret, KEY_DERIVATION_SALT, PBKDF2_ITERATIONS, KEY_LENGTH, 'sha256');
    }

    encrypt(value: string): string {
        const iv = randomBytes(IV_LENGTH);
        const cipher = createCipheriv(ALGORITHM, this.key, iv);
        const encrypted = Buffer.concat([
            cipher.update(value, 'utf8'),
            cipher.final(),
        ]);
        const result = Buffer.concat([iv, cipher.getAuthTag(), encrypted]);
        return DB_ENCRYPTION_PREFIX + result.toString('base64');
    }

    /**
     * @throws {DecryptionError} when the value is unmarked, truncated, or was sealed with another key
     */
    decrypt(encryptedValue: string): string {
        if (!isEncrypted(encryptedValue)) {
            throw new DecryptionError('Value is not database-encrypted');
        }

        const data = Buffer.from(encryptedValue.substring(DB_ENCRYPTION_PREFIX.length), 'base64');
        if (data.length < IV_LENGTH + TAG_LENGTH) {
            throw new DecryptionError('Encrypted value too short');
        }

        const iv = data.subarray(0, IV_LENGTH);
        const tag = data.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
        const encrypted = data.subarray(IV_LENGTH + TAG_LENGTH);

        try {
            const decipher = createDecipheriv(ALGORITHM, this.key, iv);
            decipher.setAuthTag(tag);
            return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8');
        } catch (error) {
            const errorMsg = error instanceof Error ? error.message : String(error);
            // Usually DB_ENCRYPTION_KEY changed or the row is corrupted
            throw new DecryptionError(`Database decryption failed: ${errorMsg}`);
        }
    }
}

/**
 * Checks if a value is database-encrypted (has the prefix marker)
 */
export function isEncrypted(value: string): boolean {
    return value.startsWith(DB_ENCRYPTION_PREFIX);
}
