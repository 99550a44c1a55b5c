import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";

import { confirm, password } from "@inquirer/prompts";
import chalk from "chalk";

import { PROVIDER_ENV_KEYS } from "../../config.js";
import { errorMessage } from "../../errors.js";
import { PROVIDER_NAMES } from "../../types/index.js";
import { upsertEnvValues } from "../utils/env-file.js";

import type { Command } from "commander";

export function registerSetupEnvCommand(program: Command): void {
  program
    .command("setup-env")
    .description("Write provider API keys to a .env file")
    .option("--file <path>", "Target file", ".env")
    .action(async (options: { file: string }) => {
      const target = resolve(options.file);

      try {
        const existing = existsSync(target) ? readFileSync(target, "utf8") : "";

        if (existing !== "") {
          const proceed = await confirm({
            message: `${options.file} exists. Update the API keys in it?`,
            default: true,
          });
          if (!proceed) {
            console.log("Aborted");
            return;
          }
        }

        console.log(
          chalk.gray("Leave a key empty to skip that provider; synthetic data is used when none is set.\n")
        );

        const values: Record<string, string> = {};
        for (const provider of PROVIDER_NAMES) {
          const key = PROVIDER_ENV_KEYS[provider];
          values[key] = (
            await password({ message: `${key} (${provider}):`, mask: "*" })
          ).trim();
        }

        writeFileSync(target, upsertEnvValues(existing, values), "utf8");

        const configured = Object.values(values).filter((v) => v !== "").length;
        console.log(
          chalk.green(
            `\nWrote ${options.file} (${String(configured)} of ${String(PROVIDER_NAMES.length)} providers configured)`
          )
        );
      } catch (error) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
