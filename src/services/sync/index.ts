// Sync Services - Re-exports
export { TeamService } from "./teams.js";
export {
  TeamStatsService,
  DEFAULT_TEAM_STATS,
  resolveTeamStats,
  type MatchTeamValues,
  type ResolvedTeamStats,
  type TeamStatisticsSource,
} from "./team-stats.js";
export { FixtureSyncService, assertValidMatch } from "./fixtures.js";
export { emptyCounts, mergeSummaries } from "./summary.js";
