import { SourceUnavailableError } from "../errors.js";
import { sourceLogger } from "../logger.js";
import {
  buildUrl,
  parseBody,
  probe,
  requestJson,
  type RequestOptions,
} from "./http.js";
import { pairGoals, teamNameOrNull, toCalendarDate } from "./normalize.js";
import { EMPTY_MATCH_DETAILS, type Match } from "../types/index.js";

import type { AdapterOptions, SourceAdapter } from "./types.js";
import type {
  ApiFootballFixture,
  ApiFootballResponse,
} from "../types/providers.js";

const BASE_URL = "https://api-football-v1.p.rapidapi.com/v3";
const RAPIDAPI_HOST = "api-football-v1.p.rapidapi.com";
const PREMIER_LEAGUE_ID = 39;
const DEFAULT_LEAGUE_NAME = "Premier League";

export function mapApiFootballFixture(
  item: ApiFootballFixture,
  season: string
): Match | null {
  const homeTeam = teamNameOrNull(item.teams.home.name);
  const awayTeam = teamNameOrNull(item.teams.away.name);
  const date = toCalendarDate(item.fixture.date);

  if (homeTeam === null || awayTeam === null || date === null) {
    return null;
  }

  const league = item.league?.name?.trim();

  return {
    id: item.fixture.id,
    date,
    season,
    league: league === undefined || league === "" ? DEFAULT_LEAGUE_NAME : league,
    homeTeam,
    awayTeam,
    ...EMPTY_MATCH_DETAILS,
    ...pairGoals(item.goals?.home, item.goals?.away),
  };
}

/**
 * API-Football v3 through RapidAPI
 */
export class ApiFootballAdapter implements SourceAdapter {
  readonly name = "api-football" as const;
  readonly highVolume = false;

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

    const url = buildUrl(this.baseUrl, "/fixtures", {
      league: PREMIER_LEAGUE_ID,
      season,
    });
    sourceLogger.info({ provider: this.name, season }, "Fetching season fixtures");

    const data = await requestJson<ApiFootballResponse<ApiFootballFixture>>(
      this.name,
      url,
      this.requestOptions()
    );

    // API-Football reports auth and quota problems in the body with HTTP 200
    if (hasErrors(data.errors)) {
      throw new SourceUnavailableError(
        this.name,
        `Provider reported errors: ${JSON.stringify(data.errors)}`
      );
    }

    if (!Array.isArray(data.response)) {
      throw new SourceUnavailableError(this.name, "Response has no fixtures list");
    }

    const items = data.response;
    const matches = parseBody(this.name, "fixtures", () =>
      items
        .map((item) => mapApiFootballFixture(item, season))
        .filter((match): match is Match => match !== null)
    );

    sourceLogger.info(
      { provider: this.name, season, count: matches.length },
      "Fetched season fixtures"
    );
    return matches;
  }

  async ping(): Promise<boolean> {
    return probe(
      this.name,
      buildUrl(this.baseUrl, "/status"),
      this.requestOptions()
    );
  }

  private requestOptions(): RequestOptions {
    return {
      headers: {
        "X-RapidAPI-Key": this.options.apiKey,
        "X-RapidAPI-Host": RAPIDAPI_HOST,
      },
      timeoutMs: this.options.timeoutMs,
    };
  }
}

function hasErrors(errors: unknown): boolean {
  if (Array.isArray(errors)) {
    return errors.length > 0;
  }
  if (errors !== null && typeof errors === "object") {
    return Object.keys(errors).length > 0;
  }
  return false;
}
