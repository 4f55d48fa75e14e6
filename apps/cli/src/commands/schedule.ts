import {
  createPipeline,
  loadConfig,
  parseInvocation,
  type PipelineResult,
  type ReportPipeline
} from "../../../../packages/core/src/index";
import type { DatasetCode, ReportDate } from "../../../../packages/ingestor/src/index";
import { createSubsystemLogger, type Logger, type SubsystemLogger } from "../../../../packages/staging/src/index";

const DEFAULT_INTERVAL_MS = 24 * 60 * 60 * 1000;

export type PipelineRunner = Pick<ReportPipeline, "run">;

export interface ScheduleOptions {
  datasets: string[];
  interval?: number;
  runOnce?: boolean;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
  logger?: Logger;
  pipeline?: PipelineRunner;
}

export async function handleSchedule(options: ScheduleOptions): Promise<PipelineResult[]> {
  const interval = options.interval ?? DEFAULT_INTERVAL_MS;
  if (!Number.isInteger(interval) || interval <= 0) {
    throw new Error(`Invalid --interval value: ${options.interval}`);
  }

  const log = createSubsystemLogger("scheduler", options.logger);
  const datasets = options.datasets.map((dataset) => parseInvocation({ dataset }).dataset);
  const config = loadConfig(options.env ?? process.env);
  const pipeline =
    options.pipeline ?? createPipeline(config, { fetchImpl: options.fetchImpl, logger: options.logger });

  const tick = async (): Promise<PipelineResult[]> => {
    const results: PipelineResult[] = [];
    for (const dataset of datasets) {
      const result = await runDataset(pipeline, dataset, config.reportDateOverride, log.error);
      if (result) {
        log.info(`${result.dataset} ${result.reportDate ?? ""} finished with ${result.status}`);
        results.push(result);
      }
    }
    return results;
  };

  if (options.runOnce) {
    return tick();
  }

  log.info(`running ${datasets.join(", ")} every ${interval}ms`);
  const schedule = createSchedule(tick, interval, log);

  const handleSignal = (signal: NodeJS.Signals) => {
    log.info(`received ${signal}, shutting down`);
    void schedule.stop().finally(() => {
      process.exit(0);
    });
  };

  process.once("SIGINT", handleSignal);
  process.once("SIGTERM", handleSignal);

  schedule.start();

  return new Promise<PipelineResult[]>(() => {
    // Keep the process running until a signal is received.
  });
}

export interface Schedule {
  start(): void;
  // Resolves once the run in flight, if any, has finished.
  stop(): Promise<void>;
}

// Runs the tick immediately and then on every interval, never two at once.
export function createSchedule(tick: () => Promise<unknown>, interval: number, log: SubsystemLogger): Schedule {
  let tickPromise: Promise<void> | null = null;
  let intervalHandle: NodeJS.Timeout | undefined;

  const scheduleTick = () => {
    if (tickPromise) {
      log.warn("previous run still in progress, skipping this tick");
      return;
    }
    tickPromise = tick()
      .then(
        () => undefined,
        (error: unknown) => {
          log.error(`scheduled run failed: ${error instanceof Error ? error.message : String(error)}`);
        }
      )
      .finally(() => {
        tickPromise = null;
      });
  };

  return {
    start() {
      scheduleTick();
      intervalHandle = setInterval(scheduleTick, interval);
    },
    async stop() {
      clearInterval(intervalHandle);
      intervalHandle = undefined;
      if (tickPromise) {
        await tickPromise;
      }
    }
  };
}

async function runDataset(
  pipeline: PipelineRunner,
  dataset: DatasetCode,
  dateOverride: ReportDate | undefined,
  report: (message: string) => void
): Promise<PipelineResult | undefined> {
  try {
    return await pipeline.run(dataset, dateOverride);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    report(`run for ${dataset} aborted: ${reason}`);
    return undefined;
  }
}
