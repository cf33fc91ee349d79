import { config } from "dotenv";
import fs from "node:fs";
import path from "node:path";

interface Settings {
    [key: string]: string | undefined;
}

/**
 * Walks up from `startDir` looking for a .env file.
 */
export function findNearestEnvFile(startDir = process.cwd()): string | null {
    let currentDir = startDir;

    while (currentDir !== path.parse(currentDir).root) {
        const envPath = path.join(currentDir, ".env");
        if (fs.existsSync(envPath)) {
            return envPath;
        }
        currentDir = path.dirname(currentDir);
    }

    const rootEnvPath = path.join(path.parse(currentDir).root, ".env");
    return fs.existsSync(rootEnvPath) ? rootEnvPath : null;
}

/**
 * Merges the nearest .env into process.env. Variables already set in the
 * environment win over the file.
 */
export function loadEnvConfig(startDir?: string): Settings {
    const envPath = findNearestEnvFile(startDir);
    if (envPath) {
        config({ path: envPath });
    }
    return process.env;
}

export const settings = loadEnvConfig();

export default settings;
