import path from "path";

const PARTIAL_SUFFIX = ".partial";
const FORMAT_PATTERN = /[^a-z0-9]/g;

export const buildCachePath = (
    basePath: string,
    ...segments: string[]
): string => path.join(basePath, ...segments);

export const normalizeFormatTag = (format: string): string =>
    format.toLowerCase().replace(FORMAT_PATTERN, "") || "bin";

/**
 * Track ids are opaque service tokens; base64url keeps them reversible and
 * safe as a single path segment.
 */
export const encodeCacheFileName = (trackId: string, format: string): string =>
    `${Buffer.from(trackId, "utf8").toString("base64url")}.${normalizeFormatTag(format)}`;

export const decodeCacheFileName = (
    fileName: string
): { trackId: string; format: string } | null => {
    if (fileName.endsWith(PARTIAL_SUFFIX)) {
        return null;
    }

    const separator = fileName.lastIndexOf(".");
    if (separator <= 0 || separator === fileName.length - 1) {
        return null;
    }

    const encodedId = fileName.slice(0, separator);
    const format = fileName.slice(separator + 1);
    if (!/^[A-Za-z0-9_-]+$/.test(encodedId)) {
        return null;
    }

    const trackId = Buffer.from(encodedId, "base64url").toString("utf8");
    if (
        trackId.length === 0 ||
        Buffer.from(trackId, "utf8").toString("base64url") !== encodedId
    ) {
        return null;
    }
    return { trackId, format };
};

export const buildPartialFileName = (fileName: string, sequence: number): string =>
    `${fileName}.${process.pid}-${sequence}${PARTIAL_SUFFIX}`;

export const isPartialFileName = (fileName: string): boolean =>
    fileName.endsWith(PARTIAL_SUFFIX);
