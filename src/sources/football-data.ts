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
  oddsOrNull,
  pairGoals,
  teamNameOrNull,
  toCalendarDate,
} from "./normalize.js";
import {
  EMPTY_MATCH_DETAILS,
  type Match,
  type TeamStatistics,
} from "../types/index.js";

import type { AdapterOptions, SourceAdapter, StandingsSource } from "./types.js";
import type {
  FootballDataMatch,
  FootballDataMatchesResponse,
  FootballDataStandingsResponse,
} from "../types/providers.js";

const BASE_URL = "https://api.football-data.org/v4";
const PREMIER_LEAGUE_ID = 2021;
const LEAGUE_NAME = "Premier League";

/**
 * Translate one football-data.org match. Fixtures whose teams are not yet
 * known (cup draws, TBD) yield null.
 */
export function mapFootballDataMatch(
  match: FootballDataMatch,
  season: string
): Match | null {
  const homeTeam = teamNameOrNull(match.homeTeam.name);
  const awayTeam = teamNameOrNull(match.awayTeam.name);
  const date = toCalendarDate(match.utcDate);

  if (homeTeam === null || awayTeam === null || date === null) {
    return null;
  }

  return {
    id: match.id,
    date,
    season,
    league: LEAGUE_NAME,
    homeTeam,
    awayTeam,
    ...pairGoals(match.score?.fullTime?.home, match.score?.fullTime?.away),
    ...EMPTY_MATCH_DETAILS,
    homeOdds: oddsOrNull(match.odds?.homeWin),
    awayOdds: oddsOrNull(match.odds?.awayWin),
  };
}

/**
 * football-data.org v4: Premier League matches and standings.
 * The free tier allows 10 requests per minute.
 */
export class FootballDataAdapter implements SourceAdapter, StandingsSource {
  readonly name = "football-data" as const;
  readonly highVolume = true;

  private baseUrl: string;

  constructor(private options: AdapterOptions) {
    this.baseUrl = options.baseUrl ?? BASE_URL;
  }

  isConfigured(): boolean {
    return this.options.apiKey !== "";
  }

  async fetchSeason(season: string): Promise<Match[]> {
    this.assertConfigured();

    const url = buildUrl(
      this.baseUrl,
      `/competitions/${String(PREMIER_LEAGUE_ID)}/matches`,
      { season }
    );
    sourceLogger.info({ provider: this.name, season }, "Fetching season matches");

    const data = await requestJson<FootballDataMatchesResponse>(
      this.name,
      url,
      this.requestOptions()
    );

    if (!Array.isArray(data.matches)) {
      throw new SourceUnavailableError(this.name, "Response has no matches list");
    }

    const items = data.matches;
    const matches = parseBody(this.name, "matches", () => {
      const mapped: Match[] = [];
      for (const item of items) {
        const match = mapFootballDataMatch(item, season);
        if (match !== null) {
          mapped.push(match);
        }
      }
      return mapped;
    });

    const dropped = items.length - matches.length;
    if (dropped > 0) {
      sourceLogger.debug(
        { provider: this.name, season, dropped },
        "Skipped matches without known teams"
      );
    }

    sourceLogger.info(
      { provider: this.name, season, count: matches.length },
      "Fetched season matches"
    );
    return matches;
  }

  async fetchStandings(season: string): Promise<TeamStatistics[]> {
    this.assertConfigured();

    const url = buildUrl(
      this.baseUrl,
      `/competitions/${String(PREMIER_LEAGUE_ID)}/standings`,
      { season }
    );
    sourceLogger.debug({ provider: this.name, season }, "Fetching standings");

    const data = await requestJson<FootballDataStandingsResponse>(
      this.name,
      url,
      this.requestOptions()
    );

    // The first table is the overall (TOTAL) one
    const table = data.standings?.[0]?.table ?? [];

    return parseBody(this.name, "standings", () =>
      table.map((row) => ({
        team: row.team.name,
        season,
        matchesPlayed: row.playedGames,
        wins: row.won,
        draws: row.draw,
        losses: row.lost,
        goalsFor: row.goalsFor,
        goalsAgainst: row.goalsAgainst,
        rating: null,
        errors: null,
        redCards: null,
        shots: null,
      }))
    );
  }

  async ping(): Promise<boolean> {
    return probe(
      this.name,
      buildUrl(this.baseUrl, "/competitions"),
      this.requestOptions()
    );
  }

  private requestOptions(): RequestOptions {
    return {
      headers: { "X-Auth-Token": this.options.apiKey },
      timeoutMs: this.options.timeoutMs,
    };
  }

  private assertConfigured(): void {
    if (!this.isConfigured()) {
      throw new SourceUnavailableError(this.name, "API key not configured");
    }
  }
}
