import { StationRef } from "../models/train-search";

/**
 * "Howrah Jn", "hwh" -> "Howrah-Jn-HWH"
 */
export function slugify(name: string, code: string): string {
    return `${name.trim().replace(/ /g, "-")}-${code.trim().toUpperCase()}`;
}

export function buildScheduleUrl(
    baseUrl: string,
    source: StationRef,
    destination: StationRef,
    date?: string
): string {
    const base = baseUrl.replace(/\/+$/, "");
    const url = `${base}/trains/${slugify(source.name, source.code)}-to-${slugify(destination.name, destination.code)}`;
    return date ? `${url}?date=${date}` : url;
}
