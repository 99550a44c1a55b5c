import { SourceUnavailableError } from "../errors.js";
import { sourceLogger } from "../logger.js";
import {
  buildUrl,
  parseBody,
  probe,
  requestJson,
  type RequestOptions,
} from "./http.js";
import {
  countOrNull,
  oddsOrNull,
  pairGoals,
  teamNameOrNull,
  unixToCalendarDate,
} from "./normalize.js";

import type { AdapterOptions, SourceAdapter } from "./types.js";
import type { Match } from "../types/index.js";
import type {
  FootyStatsLeague,
  FootyStatsMatch,
  FootyStatsResponse,
} from "../types/providers.js";

const BASE_URL = "https://api.football-data-api.com";
const LEAGUE_NAME = "Premier League";
const LEAGUE_COUNTRY = "England";
const MAX_PER_PAGE = 1000;

/**
 * Find the FootyStats season id of the Premier League season starting in
 * the given year. Season years are reported as "20242025" (or "2024" for
 * single-year leagues).
 */
export function findSeasonId(
  leagues: FootyStatsLeague[],
  season: string
): number | null {
  const league = leagues.find(
    (entry) =>
      (entry.league_name ?? entry.name).endsWith(LEAGUE_NAME) &&
      (entry.country === undefined || entry.country === LEAGUE_COUNTRY)
  );

  const match = league?.season?.find((entry) =>
    String(entry.year).startsWith(season)
  );

  return match?.id ?? null;
}

/**
 * FootyStats reports -1 for statistics it does not have and 0 goals for
 * matches that have not been played
 */
export function mapFootyStatsMatch(
  item: FootyStatsMatch,
  season: string
): Match | null {
  const homeTeam = teamNameOrNull(item.home_name);
  const awayTeam = teamNameOrNull(item.away_name);
  const date = unixToCalendarDate(item.date_unix);

  if (homeTeam === null || awayTeam === null || date === null) {
    return null;
  }

  const goals =
    item.status === "complete"
      ? pairGoals(item.homeGoalCount, item.awayGoalCount)
      : { homeGoals: null, awayGoals: null };

  return {
    id: item.id,
    date,
    season,
    league: LEAGUE_NAME,
    homeTeam,
    awayTeam,
    ...goals,
    homeOdds: oddsOrNull(item.odds_ft_1),
    awayOdds: oddsOrNull(item.odds_ft_2),
    homeRating: null,
    awayRating: null,
    homeErrors: null,
    awayErrors: null,
    homeRedCards: countOrNull(item.team_a_red_cards),
    awayRedCards: countOrNull(item.team_b_red_cards),
    homeShots: countOrNull(item.team_a_shots),
    awayShots: countOrNull(item.team_b_shots),
  };
}

/**
 * FootyStats: resolves the season id from the league list, then fetches
 * the season's matches
 */
export class FootyStatsAdapter implements SourceAdapter {
  readonly name = "footystats" as const;
  readonly highVolume = true;

  private baseUrl: string;

  constructor(private options: AdapterOptions) {
    this.baseUrl = options.baseUrl ?? BASE_URL;
  }

  isConfigured(): boolean {
    return this.options.apiKey !== "";
  }

  async fetchSeason(season: string): Promise<Match[]> {
    if (!this.isConfigured()) {
      throw new SourceUnavailableError(this.name, "API key not configured");
    }

    const leagues = await this.fetchData<FootyStatsLeague>(
      this.leagueListUrl()
    );
    const seasonId = parseBody(this.name, "league list", () =>
      findSeasonId(leagues, season)
    );

    if (seasonId === null) {
      throw new SourceUnavailableError(
        this.name,
        `No ${LEAGUE_NAME} season found for ${season}`
      );
    }

    sourceLogger.info(
      { provider: this.name, season, seasonId },
      "Fetching season matches"
    );

    const items = await this.fetchData<FootyStatsMatch>(
      buildUrl(this.baseUrl, "/league-matches", {
        key: this.options.apiKey,
        season_id: seasonId,
        max_per_page: MAX_PER_PAGE,
      })
    );

    const matches = parseBody(this.name, "matches", () =>
      items
        .map((item) => mapFootyStatsMatch(item, season))
        .filter((match): match is Match => match !== null)
    );

    sourceLogger.info(
      { provider: this.name, season, count: matches.length },
      "Fetched season matches"
    );
    return matches;
  }

  async ping(): Promise<boolean> {
    return probe(this.name, this.leagueListUrl(), this.requestOptions());
  }

  private async fetchData<T>(url: string): Promise<T[]> {
    const body = await requestJson<FootyStatsResponse<T>>(
      this.name,
      url,
      this.requestOptions()
    );

    if (body.success === false) {
      throw new SourceUnavailableError(
        this.name,
        body.message ?? "Request was not successful"
      );
    }

    if (!Array.isArray(body.data)) {
      throw new SourceUnavailableError(this.name, "Response has no data list");
    }

    return body.data;
  }

  private leagueListUrl(): string {
    return buildUrl(this.baseUrl, "/league-list", {
      key: this.options.apiKey,
      chosen_leagues_only: "true",
    });
  }

  private requestOptions(): RequestOptions {
    return { timeoutMs: this.options.timeoutMs };
  }
}
