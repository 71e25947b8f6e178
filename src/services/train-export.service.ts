import { readFile, writeFile } from "fs/promises";
import { ScheduledTrain, TrainRecordJson } from "../models/train-record";
import { formatWallClock, parseWallClock } from "../utils/local-time";

export function serializeTrain(train: ScheduledTrain): TrainRecordJson {
  return {
    train_number: train.trainNumber,
    train_name: train.trainName,
    train_type: train.trainType,
    source: train.source,
    departure_time: train.departureTime,
    destination: train.destination,
    arrival_time: train.arrivalTime,
    duration: train.duration,
    booking_available: train.bookingAvailable,
    advance_reservation_period: train.advanceReservationPeriod,
    start_date: train.startDate,
    end_date: train.endDate,
    booking_classes: [...train.bookingClasses],
    notices: [...train.notices],
    has_pantry: train.hasPantry,
    is_limited_run: train.isLimitedRun,
    departure_datetime: formatWallClock(train.departureDateTime),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(item: Record<string, unknown>, key: string): string {
  const value = item[key];
  if (typeof value !== "string") {
    throw new TypeError(`Field "${key}" must be a string`);
  }
  return value;
}

function readBoolean(item: Record<string, unknown>, key: string): boolean {
  const value = item[key];
  if (typeof value !== "boolean") {
    throw new TypeError(`Field "${key}" must be a boolean`);
  }
  return value;
}

function readStringList(item: Record<string, unknown>, key: string): string[] {
  const value = item[key];
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string")) {
    throw new TypeError(`Field "${key}" must be an array of strings`);
  }
  return value;
}

/**
 * Decodes one exported train. Throws a TypeError when a field is missing or has the wrong type.
 */
export function deserializeTrain(value: unknown): ScheduledTrain {
  if (!isRecord(value)) {
    throw new TypeError("Exported train must be an object");
  }

  const departureText = readString(value, "departure_datetime");
  const departureDateTime = parseWallClock(departureText);
  if (!departureDateTime) {
    throw new TypeError(`Field "departure_datetime" is not YYYY-MM-DD HH:MM:SS: "${departureText}"`);
  }

  return {
    trainNumber: readString(value, "train_number"),
    trainName: readString(value, "train_name"),
    trainType: readString(value, "train_type"),
    source: readString(value, "source"),
    departureTime: readString(value, "departure_time"),
    destination: readString(value, "destination"),
    arrivalTime: readString(value, "arrival_time"),
    duration: readString(value, "duration"),
    bookingAvailable: readBoolean(value, "booking_available"),
    advanceReservationPeriod: readString(value, "advance_reservation_period"),
    startDate: readString(value, "start_date"),
    endDate: readString(value, "end_date"),
    bookingClasses: readStringList(value, "booking_classes"),
    notices: readStringList(value, "notices"),
    hasPantry: readBoolean(value, "has_pantry"),
    isLimitedRun: readBoolean(value, "is_limited_run"),
    departureDateTime,
  };
}

export async function writeTrainsJson(filePath: string, trains: TrainRecordJson[]): Promise<void> {
  await writeFile(filePath, JSON.stringify(trains, null, 2), "utf8");
  console.log(`💾 Salvati ${trains.length} treni in ${filePath}`);
}

export async function readTrainsJson(filePath: string): Promise<ScheduledTrain[]> {
  const parsed: unknown = JSON.parse(await readFile(filePath, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new TypeError(`${filePath} does not contain a JSON array`);
  }
  return parsed.map((item) => deserializeTrain(item));
}
