#!/usr/bin/env npx tsx
/**
 * TruthScan command-line entry point.
 *
 * Usage: npx tsx scripts/truthscan.ts [--claim <text>] [--days <n>] [--no-synthetic]
 */

import * as path from "path";
import { ZodError } from "zod";
import { CliUsageError, parseCliArgs, USAGE, type CliCommand } from "../src/lib/cli-args";
import { CatalogError, loadCatalog, resolveRunConfig } from "../src/lib/config-loader";
import { createRunLogger } from "../src/lib/logger";
import { AnalysisOrchestrator, createAnalysisRequest } from "../src/lib/orchestrator";
import { FileSystemOutputSink } from "../src/lib/output-sink";
import { createSeededRandom, defaultRandom } from "../src/lib/random";
import { BANNER, ReportWriteError } from "../src/lib/report-serializer";
import { MirrorSearchFetcher } from "../src/lib/social-fetcher";

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.error(USAGE);
      return 1;
    }
    throw err;
  }

  if (command.kind === "help") {
    console.log(USAGE);
    return 0;
  }

  const { options } = command;
  const { config, overrides, skippedOverrides } = resolveRunConfig(process.env);
  const outputDir = options.outputDir ?? config.outputDir;
  const logFile = config.logFile === null ? null : path.resolve(outputDir, config.logFile);

  console.log(BANNER);
  console.log("Compiling satellite imagery, flight tracking, military and social media references");
  console.log("for a human analyst. No claim is verified automatically.\n");

  const logger = createRunLogger({ logFile });
  for (const o of overrides) {
    logger.info(`[Config] ${o.envVar} -> ${o.fieldPath}`);
  }
  if (skippedOverrides.length > 0) {
    logger.warn(`[Config] Skipped overrides: ${skippedOverrides.join(", ")}`);
  }

  try {
    const request = createAnalysisRequest({
      claim: options.claim,
      days: options.days,
      synthetic: options.synthetic,
    });
    const catalog = loadCatalog(options.catalogPath);

    const orchestrator = new AnalysisOrchestrator({
      catalog,
      socialSource: new MirrorSearchFetcher(config.fetcher, logger),
      output: new FileSystemOutputSink(outputDir),
      logger,
      random: options.seed === undefined ? defaultRandom : createSeededRandom(options.seed),
    });

    const { report } = await orchestrator.run(request);
    console.log("\n" + report.summary);
    return 0;
  } catch (err) {
    if (err instanceof ZodError) {
      logger.error(`[CLI] Invalid request: ${err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
      return 1;
    }
    if (err instanceof CatalogError || err instanceof ReportWriteError) {
      logger.error(`[CLI] ${err.message}`);
      return 1;
    }
    throw err;
  } finally {
    await logger.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("[CLI] Fatal error:", err);
    process.exitCode = 1;
  });
