/**
 * Season and year-range checks shared by the HTTP and CLI surfaces
 */

import { ValidationError } from "../errors.js";

export const SEASON_PATTERN = /^\d{4}$/;
export const MIN_SEASON = 2010;
export const MAX_SEASONS_PER_UPDATE = 10;
export const MAX_TEAM_NAME_LENGTH = 50;

/**
 * Check a list of requested seasons. Seasons may run up to next year,
 * whose fixtures are published before it starts.
 */
export function validateSeasons(
  seasons: string[],
  currentYear: number
): string[] {
  if (seasons.length > MAX_SEASONS_PER_UPDATE) {
    throw new ValidationError(
      `At most ${String(MAX_SEASONS_PER_UPDATE)} seasons can be updated at once`,
      { count: seasons.length }
    );
  }

  const maxSeason = currentYear + 1;
  const invalid = seasons.filter((season) => {
    if (!SEASON_PATTERN.test(season)) {
      return true;
    }
    const year = Number.parseInt(season, 10);
    return year < MIN_SEASON || year > maxSeason;
  });

  if (invalid.length > 0) {
    throw new ValidationError(
      `Invalid seasons: ${invalid.join(", ")}. Seasons must be years between ${String(MIN_SEASON)} and ${String(maxSeason)}`,
      { invalid }
    );
  }

  return seasons;
}

/**
 * Seasons of an inclusive year range, after checking its bounds
 */
export function seasonsInRange(
  startYear: number,
  endYear: number,
  currentYear: number
): string[] {
  if (!Number.isInteger(startYear) || !Number.isInteger(endYear)) {
    throw new ValidationError("Start and end year must be whole numbers");
  }

  if (startYear > endYear) {
    throw new ValidationError(
      `Start year ${String(startYear)} is after end year ${String(endYear)}`
    );
  }

  if (startYear < MIN_SEASON) {
    throw new ValidationError(
      `Invalid year range. Minimum year is ${String(MIN_SEASON)}`
    );
  }

  if (startYear > currentYear || endYear > currentYear + 1) {
    throw new ValidationError(
      `Invalid year range. Maximum year is ${String(currentYear + 1)}`
    );
  }

  const seasons: string[] = [];
  for (let year = startYear; year <= endYear; year++) {
    seasons.push(String(year));
  }
  return seasons;
}
