import { TrainRecord } from "../../models/train-record";

export interface RowOptions {
    attrs?: Record<string, string>;
    inner?: string;
}

/** One schedule row; the blob is written into a single-quoted attribute. */
export function trainRow(blob: Record<string, string | number>, { attrs = {}, inner = "" }: RowOptions = {}): string {
    const extra = Object.entries(attrs)
        .map(([key, value]) => ` ${key}="${value}"`)
        .join("");
    return `<tr data-train='${JSON.stringify(blob)}'${extra}><td>${inner}</td></tr>`;
}

export function schedulePage(rows: string[], banner = ""): string {
    return `<html><body>${banner}<table class="trainlist">${rows.join("")}</table></body></html>`;
}

export function makeRecord(overrides: Partial<TrainRecord> = {}): TrainRecord {
    return {
        trainNumber: "10000",
        trainName: "Train",
        trainType: "",
        source: "Howrah Jn",
        departureTime: "09:00",
        destination: "Chittaranjan",
        arrivalTime: "12:00",
        duration: "03h 00m",
        bookingAvailable: false,
        advanceReservationPeriod: "0",
        startDate: "",
        endDate: "",
        bookingClasses: [],
        notices: [],
        hasPantry: false,
        isLimitedRun: false,
        ...overrides,
    };
}
