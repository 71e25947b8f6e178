import { instrumentedFetch, serverTracer } from "../utils/otel-utils";

const BROWSER_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
};

export class ScheduleFetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "ScheduleFetchError";
  }
}

export interface ScheduleFetcher {
  fetchSchedulePage(url: string): Promise<string>;
}

export class HttpScheduleFetcher implements ScheduleFetcher {
  constructor(
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  /**
   * GETs the schedule page and returns its HTML. Single attempt, no retries.
   */
  async fetchSchedulePage(url: string): Promise<string> {
    let response: Response;
    try {
      response = await instrumentedFetch(
        serverTracer,
        "fetch.schedule.page",
        url,
        { headers: BROWSER_HEADERS, signal: AbortSignal.timeout(this.timeoutMs) },
        { "schedule.timeout_ms": this.timeoutMs },
        this.fetchImpl
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error("❌ Errore download pagina orari", { url, reason });
      throw new ScheduleFetchError(`Failed to fetch schedule page: ${reason}`, url);
    }

    if (!response.ok) {
      console.error("❌ La pagina orari ha risposto con un errore", { url, status: response.status });
      throw new ScheduleFetchError(`Schedule page returned HTTP ${response.status}`, url, response.status);
    }

    return response.text();
  }
}
