import { load, Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { TrainRecord } from "../models/train-record";
import { DEFAULT_ERROR_BANNER_SELECTOR } from "../config/app-config";

export const TRAIN_ROW_SELECTOR = "tr[data-train]";

export type TrainRowResult =
  | { ok: true; record: TrainRecord }
  | { ok: false; error: string };

export function loadScheduleDocument(html: string): CheerioAPI {
  return load(html);
}

function isBlobObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function blobString(blob: Record<string, unknown>, key: string): string {
  const value = blob[key];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return "";
}

function getBookingClasses(row: Cheerio<Element>): string[] {
  const container = row.find("div.flexRow").first();
  if (container.length === 0) {
    return [];
  }

  const links = container.find("a.cavlink");
  return links.toArray().map((_, index) => links.eq(index).text().trim());
}

export function cleanNotice(raw: string): string {
  return raw.replace(/<[^>]+>/g, "").replace(/&quot;/g, '"');
}

function getNotices(row: Cheerio<Element>): string[] {
  const notices: string[] = [];
  row.find("i.icon-info-circled").each((_, icon) => {
    if ("etitle" in icon.attribs) {
      notices.push(cleanNotice(icon.attribs.etitle));
    }
  });
  return notices;
}

/**
 * Decodes one schedule row. Never throws: a malformed `data-train` blob comes
 * back as `{ ok: false }`.
 */
export function decodeTrainRow(row: Cheerio<Element>): TrainRowResult {
  const raw = row.attr("data-train");
  if (raw === undefined) {
    return { ok: false, error: "missing data-train attribute" };
  }

  let blob: unknown;
  try {
    blob = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `invalid data-train JSON: ${reason}` };
  }

  if (!isBlobObject(blob)) {
    return { ok: false, error: "data-train is not a JSON object" };
  }

  return {
    ok: true,
    record: {
      trainNumber: blobString(blob, "num"),
      trainName: blobString(blob, "name"),
      trainType: blobString(blob, "typ"),
      source: blobString(blob, "s"),
      departureTime: blobString(blob, "st"),
      destination: blobString(blob, "d"),
      arrivalTime: blobString(blob, "dt"),
      duration: blobString(blob, "tt"),
      bookingAvailable: row.attr("book") === "1",
      advanceReservationPeriod: row.attr("ar") ?? "0",
      startDate: row.attr("sd") ?? "",
      endDate: row.attr("ed") ?? "",
      bookingClasses: getBookingClasses(row),
      notices: getNotices(row),
      hasPantry: row.find("i.icon-food").length > 0,
      isLimitedRun: row.find("i.icon-date").length > 0,
    },
  };
}

/**
 * All decodable train rows of a schedule page, in document order.
 */
export function extractTrainRecords($: CheerioAPI): TrainRecord[] {
  const records: TrainRecord[] = [];

  $(TRAIN_ROW_SELECTOR).each((index, element) => {
    const result = decodeTrainRow($(element));
    if (result.ok) {
      records.push(result.record);
    } else {
      console.warn("⚠️ Riga orario ignorata", { row: index, error: result.error });
    }
  });

  return records;
}

/**
 * True when the page carries the banner the schedule site shows for
 * unknown station codes.
 */
export function hasUpstreamErrorBanner($: CheerioAPI, selector: string = DEFAULT_ERROR_BANNER_SELECTOR): boolean {
  return $(selector).length > 0;
}
