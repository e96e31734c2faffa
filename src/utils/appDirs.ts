import * as os from "os";
import * as path from "path";

export const APP_DIR_NAME = "tunewell";

/** Per-user cache root, following XDG on Linux and the platform convention elsewhere. */
export function userCacheDir(
    env: NodeJS.ProcessEnv = process.env,
    platform: NodeJS.Platform = process.platform,
    home: string = os.homedir()
): string {
    if (platform === "win32") {
        return env.LOCALAPPDATA || path.join(home, "AppData", "Local");
    }
    if (platform === "darwin") {
        return path.join(home, "Library", "Caches");
    }
    return env.XDG_CACHE_HOME || path.join(home, ".cache");
}

export function userConfigDir(
    env: NodeJS.ProcessEnv = process.env,
    platform: NodeJS.Platform = process.platform,
    home: string = os.homedir()
): string {
    if (platform === "win32") {
        return env.APPDATA || path.join(home, "AppData", "Roaming");
    }
    if (platform === "darwin") {
        return path.join(home, "Library", "Application Support");
    }
    return env.XDG_CONFIG_HOME || path.join(home, ".config");
}
