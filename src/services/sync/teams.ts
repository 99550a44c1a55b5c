import { syncLogger } from "../../logger.js";

import type { Database, NewTeam } from "../../db/schema.js";
import type { Kysely } from "kysely";

// ============================================================================
// Team Service
// ============================================================================

export class TeamService {
  constructor(private db: Kysely<Database>) {}

  /**
   * Id of the team with this exact name, inserting it on first encounter
   */
  async ensureTeam(name: string): Promise<number> {
    const existing = await this.db
      .selectFrom("teams")
      .select("id")
      .where("name", "=", name)
      .executeTakeFirst();

    if (existing) {
      return existing.id;
    }

    const newTeam: NewTeam = {
      name,
      full_name: name,
      created_at: new Date().toISOString(),
    };

    const result = await this.db
      .insertInto("teams")
      .values(newTeam)
      .returning("id")
      .executeTakeFirstOrThrow();

    syncLogger.debug({ team: name, id: result.id }, "Created team");
    return result.id;
  }
}
