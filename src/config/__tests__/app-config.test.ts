import { ConfigError, DEFAULT_ERROR_BANNER_SELECTOR, getAppConfig } from "../app-config";

describe("getAppConfig", () => {
    test("falls back to defaults", () => {
        const config = getAppConfig({});

        expect(config).toEqual({
            port: 3000,
            scheduleBaseUrl: "https://etrain.info",
            fetchTimeoutMs: 30000,
            timeZone: Intl.DateTimeFormat().resolvedOptions().timeZone,
            corsOrigins: [],
            errorBannerSelector: DEFAULT_ERROR_BANNER_SELECTOR,
        });
    });

    test("reads values from the environment", () => {
        const config = getAppConfig({
            PORT: "8080",
            SCHEDULE_BASE_URL: "http://localhost:9000",
            FETCH_TIMEOUT_MS: "5000",
            APP_TIMEZONE: "Asia/Kolkata",
            CORS_ORIGINS: "http://localhost:3000, http://localhost:8080,",
            ERROR_BANNER_SELECTOR: "#error",
        });

        expect(config).toEqual({
            port: 8080,
            scheduleBaseUrl: "http://localhost:9000",
            fetchTimeoutMs: 5000,
            timeZone: "Asia/Kolkata",
            corsOrigins: ["http://localhost:3000", "http://localhost:8080"],
            errorBannerSelector: "#error",
        });
    });

    test.each([
        [{ PORT: "abc" }, "PORT must be a positive integer"],
        [{ FETCH_TIMEOUT_MS: "-5" }, "FETCH_TIMEOUT_MS must be a positive integer"],
        [{ APP_TIMEZONE: "Mars/Olympus" }, "APP_TIMEZONE is not a valid IANA time zone"],
        [{ SCHEDULE_BASE_URL: "ftp://schedule.test" }, "SCHEDULE_BASE_URL must start with http:// or https://"],
    ])("rejects %p", (env, message) => {
        expect(() => getAppConfig(env)).toThrow(ConfigError);
        expect(() => getAppConfig(env)).toThrow(message);
    });
});
