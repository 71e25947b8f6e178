import { AppConfig } from "../config/app-config";
import { TrainRecord } from "../models/train-record";
import { TrainSearchOptions, TrainSearchOutcome, TrainSearchQuery } from "../models/train-search";
import { buildScheduleUrl } from "../utils/schedule-url";
import { formatCompactDate, toWallClock } from "../utils/local-time";
import { createProcessingSpan, recordSpanError, serverTracer } from "../utils/otel-utils";
import { extractTrainRecords, hasUpstreamErrorBanner, loadScheduleDocument } from "./record-extractor.service";
import { HttpScheduleFetcher, ScheduleFetcher } from "./schedule-fetcher.service";
import { SelectionOptions, selectTrains } from "./train-selection.service";
import { serializeTrain, writeTrainsJson } from "./train-export.service";

export const NO_TRAINS_MESSAGE = "No trains found between the specified stations.";
export const INVALID_STATIONS_MESSAGE = "Invalid station codes: the schedule site did not recognise the station pair.";

export interface TrainSearchSettings {
  scheduleBaseUrl: string;
  timeZone: string;
  errorBannerSelector: string;
  selection?: Partial<SelectionOptions>;
}

export class TrainSearchService {
  constructor(
    private readonly fetcher: ScheduleFetcher,
    private readonly settings: TrainSearchSettings
  ) {}

  private extractPage(html: string): { rejected: boolean; records: TrainRecord[] } {
    const span = createProcessingSpan(serverTracer, "trains.extract", { "trains.html.size": html.length });

    try {
      const $ = loadScheduleDocument(html);
      const rejected = hasUpstreamErrorBanner($, this.settings.errorBannerSelector);
      const records = rejected ? [] : extractTrainRecords($);
      span.setAttributes({ "trains.extracted.count": records.length, "trains.rejected": rejected });
      return { rejected, records };
    } catch (error) {
      recordSpanError(span, error);
      throw error;
    } finally {
      span.end();
    }
  }

  /**
   * Fetches today's schedule page for the station pair and picks the trains
   * worth catching. "now" is read once and reused for the whole query.
   */
  async searchTrains(query: TrainSearchQuery, options: TrainSearchOptions = {}): Promise<TrainSearchOutcome> {
    const now = options.now ?? new Date();
    const { timeZone } = this.settings;
    const date = formatCompactDate(toWallClock(now, timeZone));
    const url = buildScheduleUrl(this.settings.scheduleBaseUrl, query.source, query.destination, date);

    const span = serverTracer.startSpan("trains.search", {
      attributes: {
        "trains.source.code": query.source.code,
        "trains.destination.code": query.destination.code,
        "trains.query.date": date,
      },
    });

    try {
      console.log(
        `🔍 Ricerca treni ${query.source.name} (${query.source.code}) → ${query.destination.name} (${query.destination.code})`,
        { date, url }
      );

      const html = await this.fetcher.fetchSchedulePage(url);

      const { rejected, records } = this.extractPage(html);

      if (rejected) {
        console.warn("⚠️ Il sito degli orari ha rifiutato la coppia di stazioni", { url });
        span.setAttributes({ "trains.outcome": "invalid_stations" });
        return { status: "invalid_stations", url, message: INVALID_STATIONS_MESSAGE };
      }

      console.log(`✅ Treni trovati nella pagina: ${records.length}`);

      const selection = selectTrains(records, { now, timeZone }, this.settings.selection);
      if (selection.policy === null || selection.trains.length === 0) {
        span.setAttributes({ "trains.outcome": "no_trains" });
        return { status: "no_trains", url, message: NO_TRAINS_MESSAGE };
      }

      const trains = selection.trains.map(serializeTrain);
      console.log(`✅ Treni selezionati: ${trains.length}`, { policy: selection.policy });

      if (options.outputJson) {
        await writeTrainsJson(options.outputJson, trains);
      }

      span.setAttributes({
        "trains.outcome": "ok",
        "trains.selection.policy": selection.policy,
        "trains.selected.count": trains.length,
      });

      return {
        status: "ok",
        url,
        policy: selection.policy,
        totalFound: records.length,
        trains,
      };
    } catch (error) {
      recordSpanError(span, error);
      throw error;
    } finally {
      span.end();
    }
  }
}

export function createTrainSearchService(config: AppConfig, fetchImpl?: typeof fetch): TrainSearchService {
  return new TrainSearchService(new HttpScheduleFetcher(config.fetchTimeoutMs, fetchImpl), {
    scheduleBaseUrl: config.scheduleBaseUrl,
    timeZone: config.timeZone,
    errorBannerSelector: config.errorBannerSelector,
  });
}
