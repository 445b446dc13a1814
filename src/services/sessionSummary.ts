import { differenceInSeconds, format } from "date-fns";
import type { SessionTotals } from "../types/telemetry";

export function toDate(seconds: number): Date {
  return new Date(seconds * 1000);
}

export function formatClock(seconds: number): string {
  return format(toDate(seconds), "HH:mm:ss");
}

export function formatTimestamp(seconds: number): string {
  return format(toDate(seconds), "yyyy-MM-dd'T'HH:mm:ss");
}

export function formatSessionDuration(totals: SessionTotals): string {
  const end = totals.endedAt ?? totals.startedAt;
  const elapsed = Math.max(0, differenceInSeconds(toDate(end), toDate(totals.startedAt)));
  return `${Math.floor(elapsed / 60)}m ${elapsed % 60}s`;
}

export function formatSessionSummary(totals: SessionTotals): string[] {
  const rule = "═".repeat(56);
  const peak =
    totals.peakAt === null
      ? `${totals.peakOccupancy} vehicles`
      : `${totals.peakOccupancy} vehicles at ${formatClock(totals.peakAt)}`;
  return [
    rule,
    "  TRAFFIC SESSION SUMMARY",
    rule,
    `  Started         : ${formatTimestamp(totals.startedAt)}`,
    `  Duration        : ${formatSessionDuration(totals)}`,
    `  Total vehicles  : ${totals.uniqueVehicles} unique IDs`,
    `  Peak traffic    : ${peak}`,
    `  Incidents       : ${totals.incidents}`,
    `  Speed events    : ${totals.violations}`,
    rule,
  ];
}
