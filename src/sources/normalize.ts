/**
 * Helpers shared by the adapters to turn loosely typed provider fields into
 * canonical values. Anything unknown becomes null rather than a default.
 */

const DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})/;

/**
 * Calendar date of an ISO timestamp ("2024-08-16T19:00:00Z" -> "2024-08-16")
 */
export function toCalendarDate(timestamp: string): string | null {
  const match = DATE_PREFIX.exec(timestamp);
  return match?.[1] ?? null;
}

/**
 * Calendar date (UTC) of a unix timestamp in seconds
 */
export function unixToCalendarDate(seconds: number): string | null {
  if (!Number.isFinite(seconds)) {
    return null;
  }
  return toCalendarDate(new Date(seconds * 1000).toISOString());
}

export function countOrNull(value: number | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  return Number.isInteger(value) && value >= 0 ? value : null;
}

export function oddsOrNull(value: number | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  return Number.isFinite(value) && value > 0 ? value : null;
}

/**
 * A final score is either fully known or unknown
 */
export function pairGoals(
  home: number | null | undefined,
  away: number | null | undefined
): { homeGoals: number | null; awayGoals: number | null } {
  const homeGoals = countOrNull(home);
  const awayGoals = countOrNull(away);

  if (homeGoals === null || awayGoals === null) {
    return { homeGoals: null, awayGoals: null };
  }

  return { homeGoals, awayGoals };
}

export function teamNameOrNull(name: string | null | undefined): string | null {
  const trimmed = name?.trim();
  return trimmed === undefined || trimmed === "" ? null : trimmed;
}
