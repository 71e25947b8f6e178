import { HttpScheduleFetcher, ScheduleFetchError } from "../schedule-fetcher.service";

const url = "https://schedule.test/trains/Howrah-Jn-HWH-to-Chittaranjan-CRJ?date=20260310";

describe("HttpScheduleFetcher", () => {
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
        errorSpy.mockRestore();
    });

    test("returns the page body and sends browser-like headers", async () => {
        const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
        fetchImpl.mockResolvedValue(new Response("<html>ok</html>", { status: 200 }));

        const html = await new HttpScheduleFetcher(1000, fetchImpl).fetchSchedulePage(url);

        expect(html).toBe("<html>ok</html>");
        expect(fetchImpl).toHaveBeenCalledTimes(1);
        expect(fetchImpl).toHaveBeenCalledWith(
            url,
            expect.objectContaining({
                headers: expect.objectContaining({
                    "User-Agent": expect.stringContaining("Mozilla/5.0"),
                    "Accept-Language": "en-US,en;q=0.5",
                }),
                signal: expect.any(AbortSignal),
            })
        );
    });

    test("turns an error status into a ScheduleFetchError", async () => {
        const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
        fetchImpl.mockResolvedValue(new Response("busy", { status: 503 }));

        const error = await new HttpScheduleFetcher(1000, fetchImpl).fetchSchedulePage(url).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ScheduleFetchError);
        if (error instanceof ScheduleFetchError) {
            expect(error.status).toBe(503);
            expect(error.url).toBe(url);
            expect(error.message).toBe("Schedule page returned HTTP 503");
        }
    });

    test("wraps network failures without retrying", async () => {
        const fetchImpl = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
        fetchImpl.mockRejectedValue(new TypeError("fetch failed"));

        const error = await new HttpScheduleFetcher(1000, fetchImpl).fetchSchedulePage(url).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ScheduleFetchError);
        if (error instanceof ScheduleFetchError) {
            expect(error.message).toBe("Failed to fetch schedule page: fetch failed");
            expect(error.status).toBeUndefined();
        }
        expect(fetchImpl).toHaveBeenCalledTimes(1);
    });
});
