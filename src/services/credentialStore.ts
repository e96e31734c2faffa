import { promises as fsPromises } from "fs";
import path from "path";
import { z } from "zod";
import { CredentialStore, Credentials } from "./types";
import { decrypt, deriveKey, encrypt } from "../utils/encryption";
import { getErrorCode, getErrorMessage, wrapNodeError } from "../utils/errors";
import { createLogger, Logger } from "../utils/logger";

const storedCredentialsSchema = z.object({
    username: z.string().min(1),
    password: z.string(),
    encrypted: z.boolean().default(false),
});

export interface FileCredentialStoreOptions {
    filePath: string;
    /** When set, the password is stored AES-256-CBC encrypted. */
    secret?: string;
    logger?: Logger;
}

/**
 * Credentials persisted as a single owner-readable JSON file.
 */
export class FileCredentialStore implements CredentialStore {
    private readonly key: Buffer | null;
    private readonly log: Logger;

    constructor(private readonly options: FileCredentialStoreOptions) {
        this.key = options.secret ? deriveKey(options.secret) : null;
        this.log = options.logger ?? createLogger("credentials");
    }

    async load(): Promise<Credentials | null> {
        let raw: string;
        try {
            raw = await fsPromises.readFile(this.options.filePath, "utf8");
        } catch (error) {
            if (getErrorCode(error) === "ENOENT") {
                return null;
            }
            throw wrapNodeError(error, this.options.filePath);
        }

        let stored: z.infer<typeof storedCredentialsSchema>;
        try {
            stored = storedCredentialsSchema.parse(JSON.parse(raw));
        } catch (error) {
            this.log.warn("Ignoring unreadable credentials file", {
                filePath: this.options.filePath,
                error: getErrorMessage(error),
            });
            return null;
        }

        if (!stored.encrypted) {
            return { username: stored.username, password: stored.password };
        }

        if (!this.key) {
            this.log.warn("Stored password is encrypted but no secret is configured");
            return null;
        }

        try {
            return {
                username: stored.username,
                password: decrypt(stored.password, this.key),
            };
        } catch (error) {
            this.log.warn("Stored password could not be decrypted", {
                error: getErrorMessage(error),
            });
            return null;
        }
    }

    async save(credentials: Credentials): Promise<void> {
        const payload = {
            username: credentials.username,
            password: this.key
                ? encrypt(credentials.password, this.key)
                : credentials.password,
            encrypted: this.key !== null,
        };

        const filePath = this.options.filePath;
        const partialPath = `${filePath}.${process.pid}.partial`;
        try {
            await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
            await fsPromises.writeFile(partialPath, JSON.stringify(payload, null, 2), {
                mode: 0o600,
            });
            await fsPromises.rename(partialPath, filePath);
        } catch (error) {
            await fsPromises.rm(partialPath, { force: true }).catch((cleanupError) => {
                this.log.debug("Failed to remove partial credentials file", {
                    error: cleanupError,
                });
            });
            throw wrapNodeError(error, filePath);
        }
    }

    async clear(): Promise<void> {
        await fsPromises.rm(this.options.filePath, { force: true });
    }
}
