/**
 * CLI runner — parse options, stream rows from the API into the chosen sink
 */

import type { FetchRunCounters, HttpRequestFn, RunStatus, SleepFn } from "@/types";
import { HhClient } from "@/clients/hh";
import { resolveFetchConfig } from "@/config/fetchConfig";
import { ConfigurationError } from "@/config/configurationError";
import { createFetchAccumulator, createFetchStream } from "@/fetch";
import { createRowSink, resolveOutputPath } from "@/output";
import { EXIT_CONFIG_ERROR, EXIT_FAILURE, EXIT_OK } from "@/constants/cli";
import { parseCliArgs, USAGE } from "./args";
import * as logger from "@/logger";

/**
 * Injection points for tests; production uses fetch, real sleep and the clock
 */
export type CliDeps = {
  httpRequest?: HttpRequestFn;
  sleep?: SleepFn;
  now?: () => Date;
};

export type CliRunResult = {
  path: string;
  rows: number;
  counters: FetchRunCounters;
};

/**
 * Run one fetch end-to-end
 *
 * @returns Output path and counters, or undefined when only help was printed
 * @throws {ConfigurationError} Before any request or file is created
 * @throws {FatalHttpError} When a page request fails for good (the sink is closed as failed)
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  deps: CliDeps = {},
): Promise<CliRunResult | undefined> {
  const options = parseCliArgs(argv, env);
  if (options.help) {
    console.log(USAGE);
    return undefined;
  }

  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const config = resolveFetchConfig(options.fetch, startedAt);
  const client = new HhClient({
    userAgent: options.userAgent,
    baseUrl: options.baseUrl,
    timeoutMs: options.timeoutMs,
    retry: deps.sleep ? { sleep: deps.sleep } : undefined,
    httpRequest: deps.httpRequest,
  });

  const accumulator = createFetchAccumulator();
  const rows = createFetchStream(config, {
    client,
    sleep: deps.sleep,
    accumulator,
    now: () => startedAt,
  });

  const path = resolveOutputPath(options.out, options.format, startedAt);
  const sink = createRowSink(options.format, path, config);

  let status: RunStatus = "failure";
  try {
    for await (const row of rows) {
      await sink.write(row);
    }
    status = "success";
  } finally {
    await sink.close(status, accumulator.counters);
  }

  const total = accumulator.counters.rows_emitted;
  console.log(`Saved ${total} rows to ${path}`);
  return { path, rows: total, counters: { ...accumulator.counters } };
}

/**
 * Run the CLI and map failures to an exit code
 */
export async function executeCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  deps: CliDeps = {},
): Promise<number> {
  try {
    await runCli(argv, env, deps);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error("Invalid configuration", { error: error.message });
      console.error(`Error: ${error.message}\n\n${USAGE}`);
      return EXIT_CONFIG_ERROR;
    }

    logger.error("Fetch failed", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return EXIT_FAILURE;
  }
}
