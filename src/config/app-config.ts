import dotenv from "dotenv";

dotenv.config();

export const DEFAULT_SCHEDULE_BASE_URL = "https://etrain.info";
export const DEFAULT_ERROR_BANNER_SELECTOR = ".alert-danger, .alert-warning, .errormsg";

export interface AppConfig {
    port: number;
    scheduleBaseUrl: string;
    fetchTimeoutMs: number;
    timeZone: string;
    corsOrigins: string[];
    errorBannerSelector: string;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
    }
    return value;
}

function readTimeZone(env: NodeJS.ProcessEnv): string {
    const raw = env.APP_TIMEZONE?.trim();
    if (!raw) {
        return Intl.DateTimeFormat().resolvedOptions().timeZone;
    }

    try {
        new Intl.DateTimeFormat("en-US", { timeZone: raw });
    } catch {
        throw new ConfigError(`APP_TIMEZONE is not a valid IANA time zone: "${raw}"`);
    }
    return raw;
}

/**
 * Reads the service configuration from the environment (after `.env` has been loaded).
 * Throws a ConfigError on values that cannot be used.
 */
export function getAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const baseUrl = (env.SCHEDULE_BASE_URL || DEFAULT_SCHEDULE_BASE_URL).trim();
    if (!/^https?:\/\//i.test(baseUrl)) {
        throw new ConfigError(`SCHEDULE_BASE_URL must start with http:// or https://, got "${baseUrl}"`);
    }

    const corsOrigins = (env.CORS_ORIGINS || "")
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0);

    return {
        port: readPositiveInt(env, "PORT", 3000),
        scheduleBaseUrl: baseUrl,
        fetchTimeoutMs: readPositiveInt(env, "FETCH_TIMEOUT_MS", 30000),
        timeZone: readTimeZone(env),
        corsOrigins,
        errorBannerSelector: env.ERROR_BANNER_SELECTOR?.trim() || DEFAULT_ERROR_BANNER_SELECTOR,
    };
}
