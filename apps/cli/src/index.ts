#!/usr/bin/env -S npx tsx
import { Command } from "commander";
import { handleRun } from "./commands/run";
import { handleSchedule } from "./commands/schedule";
import { DEFAULT_PURGE_TTL_MS, handlePurge } from "./commands/purge";

const program = new Command();
program
  .name("aer-digest")
  .description("Fetch, summarize and announce the daily AER ST1/ST100 releases");

program
  .command("run")
  .description("Run the pipeline once for a dataset")
  .requiredOption("--dataset <code>", "Dataset to process (ST1|ST100)")
  .option("--date <date>", "Report date to backfill, YYYY-MM-DD")
  .option("--format <format>", "Output format (json|text)", "json")
  .action(async (options: { dataset: string; date?: string; format: string }) => {
    const result = await handleRun({
      dataset: options.dataset,
      date: options.date,
      format: options.format
    });
    if (result.status !== "succeeded") {
      process.exitCode = 1;
    }
  });

program
  .command("schedule")
  .description("Run the pipeline for each dataset on a fixed interval")
  .requiredOption("--dataset <code...>", "Datasets to process (ST1|ST100)")
  .option("--interval <ms>", "Interval between runs in milliseconds", (value) => Number.parseInt(value, 10))
  .action(async (options: { dataset: string[]; interval?: number }) => {
    await handleSchedule({ datasets: options.dataset, interval: options.interval });
  });

program
  .command("purge")
  .description("Delete staged reports older than the TTL")
  .option("--ttl <ms>", "Maximum age in milliseconds", (value) => Number.parseInt(value, 10), DEFAULT_PURGE_TTL_MS)
  .action(async (options: { ttl: number }) => {
    await handlePurge({ ttl: options.ttl });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`[cli] ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
