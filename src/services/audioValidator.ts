import { parseBuffer } from "music-metadata";
import { DecodeError, ErrorCode, getErrorMessage } from "../utils/errors";

export interface AudioInspection {
    /** Normalized container tag, used as the cache entry's format. */
    format: string;
    durationMs?: number;
}

export interface AudioValidator {
    inspect(bytes: Buffer, mimeType?: string): Promise<AudioInspection>;
}

const CONTAINER_FORMATS: Array<[RegExp, string]> = [
    [/m4a|mp4|isom|mp42|3gp/i, "m4a"],
    [/mpeg/i, "mp3"],
    [/ogg/i, "ogg"],
    [/flac/i, "flac"],
    [/wave|riff/i, "wav"],
    [/aac|adts/i, "aac"],
];

export function normalizeContainer(container: string): string {
    for (const [pattern, format] of CONTAINER_FORMATS) {
        if (pattern.test(container)) {
            return format;
        }
    }
    return container.toLowerCase().replace(/[^a-z0-9]/g, "") || "bin";
}

/**
 * Parses container headers to reject truncated or non-audio downloads before
 * they are admitted to the cache.
 */
export class MusicMetadataValidator implements AudioValidator {
    async inspect(bytes: Buffer, mimeType?: string): Promise<AudioInspection> {
        if (bytes.length === 0) {
            throw new DecodeError(ErrorCode.CORRUPT_FILE, "Audio payload is empty");
        }

        let container: string | undefined;
        let durationSec: number | undefined;
        try {
            const metadata = await parseBuffer(
                bytes,
                mimeType ? { mimeType, size: bytes.length } : { size: bytes.length },
                { duration: false, skipCovers: true }
            );
            container = metadata.format.container;
            durationSec = metadata.format.duration;
        } catch (error) {
            throw new DecodeError(
                ErrorCode.CORRUPT_FILE,
                "Audio payload could not be parsed",
                { originalError: getErrorMessage(error) }
            );
        }

        if (!container) {
            throw new DecodeError(
                ErrorCode.UNSUPPORTED_FORMAT,
                "Audio container not recognised"
            );
        }

        return {
            format: normalizeContainer(container),
            durationMs:
                durationSec !== undefined ? Math.round(durationSec * 1000) : undefined,
        };
    }
}
