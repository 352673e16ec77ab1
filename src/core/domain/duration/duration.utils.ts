import { FormatError } from "../errors";
import { DURATION_PATTERN, SECONDS_PER_HOUR, SECONDS_PER_MINUTE } from "./duration.consts";

/**
 * Parses the time part of an ISO 8601 duration (`PT2H`, `PT1H30M`, `PT45S`).
 * Components are optional but must appear in hours, minutes, seconds order.
 */
export function parseDuration(text: string): number {
  const match = DURATION_PATTERN.exec(text.trim());
  if (!match) {
    throw new FormatError("Invalid duration format", text);
  }

  const [, hours, minutes, seconds] = match;
  if (hours === undefined && minutes === undefined && seconds === undefined) {
    throw new FormatError("Duration has no components", text);
  }

  return (
    Number.parseInt(hours ?? "0", 10) * SECONDS_PER_HOUR +
    Number.parseInt(minutes ?? "0", 10) * SECONDS_PER_MINUTE +
    Number.parseInt(seconds ?? "0", 10)
  );
}

// Minutes truncate on purpose: 90 seconds reads "1 minutes".
export function formatDuration(seconds: number): string {
  if (seconds >= SECONDS_PER_HOUR) {
    return `${(seconds / SECONDS_PER_HOUR).toFixed(1)} hours`;
  }
  if (seconds >= SECONDS_PER_MINUTE) {
    return `${Math.trunc(seconds / SECONDS_PER_MINUTE)} minutes`;
  }
  return `${seconds} seconds`;
}

export function describeDuration(value: number | string): string {
  if (typeof value === "number") {
    return formatDuration(value);
  }
  try {
    return formatDuration(parseDuration(value));
  } catch (error) {
    if (error instanceof FormatError) {
      return value;
    }
    throw error;
  }
}

export function isValidDuration(text: string): boolean {
  try {
    parseDuration(text);
    return true;
  } catch {
    return false;
  }
}
