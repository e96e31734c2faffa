/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value
            : String(fallback);
    return Number.parseInt(source, 10);
}

export function parseEnvFloat(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value
            : String(fallback);
    return Number.parseFloat(source);
}

/** "true", "1", "yes" and "on" (any case) enable a flag; anything else disables it. */
export function parseEnvFlag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value.trim().length === 0) {
        return fallback;
    }
    return ["true", "1", "yes", "on"].includes(value.trim().toLowerCase());
}

export function parseEnvCsv(value: string | undefined): string[] | undefined {
    if (value === undefined) {
        return undefined;
    }
    return value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}
