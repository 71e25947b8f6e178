import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { DEFAULT_ERROR_BANNER_SELECTOR } from "../../config/app-config";
import { TrainSearchQuery } from "../../models/train-search";
import { ScheduleFetcher, ScheduleFetchError } from "../schedule-fetcher.service";
import { INVALID_STATIONS_MESSAGE, NO_TRAINS_MESSAGE, TrainSearchService } from "../train-search.service";
import { schedulePage, trainRow } from "./schedule-fixtures";

class StaticPageFetcher implements ScheduleFetcher {
    readonly requested: string[] = [];

    constructor(private readonly html: string) {}

    async fetchSchedulePage(url: string): Promise<string> {
        this.requested.push(url);
        return this.html;
    }
}

const query: TrainSearchQuery = {
    source: { name: "Howrah Jn", code: "HWH" },
    destination: { name: "Chittaranjan", code: "CRJ" },
};

const now = new Date("2026-03-10T08:00:00Z");

function createService(fetcher: ScheduleFetcher, timeZone = "UTC"): TrainSearchService {
    return new TrainSearchService(fetcher, {
        scheduleBaseUrl: "https://schedule.test",
        timeZone,
        errorBannerSelector: DEFAULT_ERROR_BANNER_SELECTOR,
    });
}

const expressPage = schedulePage([
    trainRow({ num: "12339", name: "Coalfield Express", typ: "Express", st: "10:00" }),
    trainRow({ num: "13011", name: "Intercity Express", typ: "Express", st: "09:00" }),
]);

describe("TrainSearchService", () => {
    beforeEach(() => {
        jest.spyOn(console, "log").mockImplementation(() => undefined);
        jest.spyOn(console, "warn").mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("fetches today's page and returns the selected trains", async () => {
        const fetcher = new StaticPageFetcher(expressPage);

        const outcome = await createService(fetcher).searchTrains(query, { now });

        expect(fetcher.requested).toEqual([
            "https://schedule.test/trains/Howrah-Jn-HWH-to-Chittaranjan-CRJ?date=20260310",
        ]);
        expect(outcome.status).toBe("ok");
        if (outcome.status === "ok") {
            expect(outcome.policy).toBe("non_local");
            expect(outcome.totalFound).toBe(2);
            expect(outcome.trains.map((train) => train.train_number)).toEqual(["13011", "12339"]);
            expect(outcome.trains[0].departure_datetime).toBe("2026-03-10 09:00:00");
        }
    });

    test("uses the calendar date of the configured time zone", async () => {
        const fetcher = new StaticPageFetcher(expressPage);

        await createService(fetcher, "Asia/Kolkata").searchTrains(query, { now: new Date("2026-03-10T20:00:00Z") });

        expect(fetcher.requested[0]).toBe("https://schedule.test/trains/Howrah-Jn-HWH-to-Chittaranjan-CRJ?date=20260311");
    });

    test("reports invalid stations when the error banner is shown", async () => {
        const page = schedulePage(
            [trainRow({ num: "1", st: "09:00" })],
            '<div class="alert alert-warning">Station code not found</div>'
        );

        const outcome = await createService(new StaticPageFetcher(page)).searchTrains(query, { now });

        expect(outcome).toEqual({
            status: "invalid_stations",
            url: "https://schedule.test/trains/Howrah-Jn-HWH-to-Chittaranjan-CRJ?date=20260310",
            message: INVALID_STATIONS_MESSAGE,
        });
    });

    test("reports no trains for a page without rows", async () => {
        const outcome = await createService(new StaticPageFetcher(schedulePage([]))).searchTrains(query, { now });

        expect(outcome.status).toBe("no_trains");
        if (outcome.status === "no_trains") {
            expect(outcome.message).toBe(NO_TRAINS_MESSAGE);
        }
    });

    test("reports no trains when every row is malformed", async () => {
        const page = schedulePage(["<tr data-train='{broken'><td></td></tr>"]);

        const outcome = await createService(new StaticPageFetcher(page)).searchTrains(query, { now });

        expect(outcome.status).toBe("no_trains");
    });

    test("propagates fetch failures", async () => {
        const fetcher: ScheduleFetcher = {
            fetchSchedulePage: async (url) => {
                throw new ScheduleFetchError("Schedule page returned HTTP 500", url, 500);
            },
        };

        await expect(createService(fetcher).searchTrains(query, { now })).rejects.toThrow(ScheduleFetchError);
    });

    test("writes the selection to a JSON file when asked", async () => {
        const dir = await mkdtemp(path.join(tmpdir(), "train-search-"));
        const outputJson = path.join(dir, "next_3_trains.json");

        try {
            const outcome = await createService(new StaticPageFetcher(expressPage)).searchTrains(query, {
                now,
                outputJson,
            });

            const saved: unknown = JSON.parse(await readFile(outputJson, "utf8"));
            expect(outcome.status).toBe("ok");
            if (outcome.status === "ok") {
                expect(saved).toEqual(outcome.trains);
            }
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });
});
