import { ScheduledTrain, TrainRecord } from "../models/train-record";
import { SelectionClock, SelectionPolicy, SelectionResult } from "../models/selection-result";
import {
  DEFAULT_LOCAL_WINDOW_MINUTES,
  DEFAULT_SELECTION_LIMIT,
  DEFAULT_TRAIN_CATEGORIES,
  TrainCategoryKeywords,
} from "../config/train-categories";
import { addDays, addMinutes, atClockTime, formatWallClock, parseClockTime, toWallClock } from "../utils/local-time";
import { instrumentSync, serverTracer } from "../utils/otel-utils";

export interface SelectionOptions {
  categories: TrainCategoryKeywords;
  limit: number;
  localWindowMinutes: number;
}

export const DEFAULT_SELECTION_OPTIONS: SelectionOptions = {
  categories: DEFAULT_TRAIN_CATEGORIES,
  limit: DEFAULT_SELECTION_LIMIT,
  localWindowMinutes: DEFAULT_LOCAL_WINDOW_MINUTES,
};

const UNKNOWN_DEPARTURE_OFFSET_DAYS = 365;

function matchesAny(record: TrainRecord, keywords: readonly string[]): boolean {
  const name = record.trainName.toLowerCase();
  const type = record.trainType.toLowerCase();
  return keywords.some((keyword) => name.includes(keyword) || type.includes(keyword));
}

export function isNonLocalTrain(
  record: TrainRecord,
  categories: TrainCategoryKeywords = DEFAULT_TRAIN_CATEGORIES
): boolean {
  return matchesAny(record, categories.nonLocal);
}

export function isLocalTrain(record: TrainRecord, categories: TrainCategoryKeywords = DEFAULT_TRAIN_CATEGORIES): boolean {
  return matchesAny(record, categories.local);
}

export function hasNonLocalTrains(
  records: readonly TrainRecord[],
  categories: TrainCategoryKeywords = DEFAULT_TRAIN_CATEGORIES
): boolean {
  return records.some((record) => isNonLocalTrain(record, categories));
}

export function hasLocalTrains(
  records: readonly TrainRecord[],
  categories: TrainCategoryKeywords = DEFAULT_TRAIN_CATEGORIES
): boolean {
  return records.some((record) => isLocalTrain(record, categories));
}

/**
 * Next occurrence of the record's departure time at or after `nowLocal`
 * (a wall-clock value). Records without a usable time get a date a year
 * out so they sort last.
 */
function resolveDeparture(record: TrainRecord, nowLocal: Date): Date {
  const unknown = addDays(nowLocal, UNKNOWN_DEPARTURE_OFFSET_DAYS);
  if (!record.departureTime) {
    return unknown;
  }

  try {
    const departure = atClockTime(nowLocal, parseClockTime(record.departureTime));
    return departure < nowLocal ? addDays(departure, 1) : departure;
  } catch (error) {
    console.warn("⚠️ Orario di partenza non valido", {
      trainNumber: record.trainNumber || "Unknown",
      departureTime: record.departureTime,
      error: error instanceof Error ? error.message : String(error),
    });
    return unknown;
  }
}

/**
 * Places a record on the wall clock `nowLocal`, already converted to the
 * selection's time zone.
 */
export function scheduleDepartureAt(record: TrainRecord, nowLocal: Date): ScheduledTrain {
  return { ...record, departureDateTime: resolveDeparture(record, nowLocal) };
}

export function scheduleDeparture(record: TrainRecord, clock: SelectionClock): ScheduledTrain {
  return scheduleDepartureAt(record, toWallClock(clock.now, clock.timeZone));
}

/**
 * Chooses which trains are worth showing right now.
 *
 * Records are placed on the clock, sorted by departure (stable, so trains at
 * the same minute keep page order), then the set is classified:
 * - local and non-local present: next `limit` trains (`mixed`)
 * - only non-local: next `limit` non-local trains, never padded (`non_local`)
 * - only local: every train inside the local window (`local`), or the next
 *   `limit` when the window is empty (`local_fallback`)
 * - neither: next `limit` trains (`other`)
 */
export function selectTrains(
  records: readonly TrainRecord[],
  clock: SelectionClock,
  options: Partial<SelectionOptions> = {}
): SelectionResult {
  const { categories, limit, localWindowMinutes } = { ...DEFAULT_SELECTION_OPTIONS, ...options };

  if (records.length === 0) {
    return { policy: null, trains: [] };
  }

  return instrumentSync(
    serverTracer,
    "trains.select",
    (span) => {
      const nowLocal = toWallClock(clock.now, clock.timeZone);
      console.log("🕒 Selezione treni", { now: formatWallClock(nowLocal), timeZone: clock.timeZone });

      const sorted: ScheduledTrain[] = records
        .map((record) => scheduleDepartureAt(record, nowLocal))
        .sort((a, b) => a.departureDateTime.getTime() - b.departureDateTime.getTime());

      const hasNonLocal = hasNonLocalTrains(sorted, categories);
      const hasLocal = hasLocalTrains(sorted, categories);

      let policy: SelectionPolicy;
      let trains: ScheduledTrain[];

      if (hasNonLocal && hasLocal) {
        policy = "mixed";
        trains = sorted.slice(0, limit);
        console.log(`🚄 Treni regionali e non regionali, mostro i prossimi ${limit}`);
      } else if (hasNonLocal) {
        policy = "non_local";
        trains = sorted.filter((train) => isNonLocalTrain(train, categories)).slice(0, limit);
        console.log(`🚄 Solo treni non regionali, mostro i prossimi ${limit}`);
      } else if (hasLocal) {
        const windowEnd = addMinutes(nowLocal, localWindowMinutes);
        const inWindow = sorted.filter((train) => train.departureDateTime <= windowEnd);
        console.log("🔍 Solo treni regionali", {
          windowEnd: formatWallClock(windowEnd),
          found: inWindow.length,
        });

        if (inWindow.length > 0) {
          policy = "local";
          trains = inWindow;
        } else {
          policy = "local_fallback";
          trains = sorted.slice(0, limit);
          console.log(`⚠️ Nessun regionale entro ${localWindowMinutes} minuti, mostro i prossimi ${limit}`);
        }
      } else {
        policy = "other";
        trains = sorted.slice(0, limit);
        console.log(`🚂 Nessuna categoria riconosciuta, mostro i prossimi ${limit}`);
      }

      span.setAttributes({
        "trains.input.count": records.length,
        "trains.selected.count": trains.length,
        "trains.selection.policy": policy,
      });

      return { policy, trains };
    },
    { "trains.time_zone": clock.timeZone }
  );
}
