import { describe, it, expect } from "vitest";

import { upsertEnvValues } from "../../../src/cli/utils/env-file.js";

describe("upsertEnvValues", () => {
  it("should write new content", () => {
    expect(upsertEnvValues("", { FOOTBALL_DATA_API_KEY: "test-secret" })).toBe(
      "FOOTBALL_DATA_API_KEY=test-secret\n"
    );
  });

  it("should replace existing keys in place and keep other lines", () => {
    const content = [
      "# providers",
      "FOOTBALL_DATA_API_KEY=old",
      "PORT=3000",
      "export RAPIDAPI_KEY=old",
      "",
    ].join("\n");

    expect(
      upsertEnvValues(content, {
        FOOTBALL_DATA_API_KEY: "test-secret",
        RAPIDAPI_KEY: "",
      })
    ).toBe("# providers\nFOOTBALL_DATA_API_KEY=test-secret\nPORT=3000\nRAPIDAPI_KEY=\n");
  });

  it("should append keys that are not present", () => {
    expect(upsertEnvValues("PORT=3000", { FOOTYSTATS_API_KEY: "test-secret" })).toBe(
      "PORT=3000\nFOOTYSTATS_API_KEY=test-secret\n"
    );
  });
});
