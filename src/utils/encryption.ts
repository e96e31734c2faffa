import crypto from "crypto";

const ALGORITHM = "aes-256-cbc";
const KEY_LENGTH = 32;

/**
 * Normalizes a configured secret to the 32-byte AES key, padding short
 * secrets and truncating long ones.
 */
export function deriveKey(secret: string): Buffer {
    if (!secret) {
        throw new Error("Encryption secret must not be empty");
    }
    if (secret.length < KEY_LENGTH) {
        return Buffer.from(secret.padEnd(KEY_LENGTH, "0"));
    }
    return Buffer.from(secret.slice(0, KEY_LENGTH));
}

/**
 * Encrypt a string using AES-256-CBC as `<iv hex>:<ciphertext hex>`.
 * Returns empty string for empty input.
 */
export function encrypt(text: string, key: Buffer): string {
    if (!text) return "";
    const iv = crypto.randomBytes(16);
    const cipher = crypto.createCipheriv(ALGORITHM, key, iv);
    const encrypted = Buffer.concat([cipher.update(text), cipher.final()]);
    return iv.toString("hex") + ":" + encrypted.toString("hex");
}

/**
 * Decrypt a string produced by `encrypt`. Throws when the key is wrong or the
 * payload is not in the expected format.
 */
export function decrypt(text: string, key: Buffer): string {
    if (!text) return "";
    const parts = text.split(":");
    if (parts.length < 2) {
        throw new Error("Encrypted value is not in iv:ciphertext format");
    }
    const iv = Buffer.from(parts[0], "hex");
    const encryptedText = Buffer.from(parts.slice(1).join(":"), "hex");
    const decipher = crypto.createDecipheriv(ALGORITHM, key, iv);
    const decrypted = Buffer.concat([
        decipher.update(encryptedText),
        decipher.final(),
    ]);
    return decrypted.toString();
}
