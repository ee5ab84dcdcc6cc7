/**
 * Analysis Orchestrator
 *
 * Runs the four analysis phases in order (satellite, flight, military,
 * social media), each over one catalog table, then writes the report once.
 *
 * A failure while processing one table entry is logged and that entry is
 * left out; it never aborts the phase or the run. A report write failure
 * does abort the run.
 *
 * @module orchestrator
 */

import { AnalysisRequestSchema, type Catalog } from "./config-schemas";
import { computeDateRange, formatTimestamp, systemClock, type Clock } from "./date-range";
import type { Logger } from "./logger";
import type { OutputSink } from "./output-sink";
import { defaultRandom, type RandomSource } from "./random";
import { writeReport, type WrittenReport } from "./report-serializer";
import { placeholderPath, renderSatellitePlaceholder } from "./satellite-placeholder";
import type { SocialPostSource } from "./social-fetcher";
import { resolveSocialPosts } from "./social-resolution";
import { SourceCatalog } from "./source-catalog";
import { SyntheticDataGenerator } from "./synthetic-data";
import type {
  AnalysisRequest,
  AnalysisResult,
  DateRange,
  FlightFinding,
  MilitaryFinding,
  SatelliteFinding,
  SocialFinding,
} from "./types";

export interface OrchestratorDeps {
  catalog: Catalog;
  socialSource: SocialPostSource;
  output: OutputSink;
  logger: Logger;
  random?: RandomSource;
  now?: Clock;
}

export interface AnalysisRun {
  result: AnalysisResult;
  report: WrittenReport;
}

/**
 * Validate and freeze a request. Throws a ZodError on bad input.
 */
export function createAnalysisRequest(input: AnalysisRequest): AnalysisRequest {
  return Object.freeze(AnalysisRequestSchema.parse(input));
}

interface PhaseContext {
  request: AnalysisRequest;
  dateRange: DateRange;
  generator: SyntheticDataGenerator;
}

export class AnalysisOrchestrator {
  private readonly sources: SourceCatalog;
  private readonly random: RandomSource;
  private readonly now: Clock;

  constructor(private readonly deps: OrchestratorDeps) {
    this.sources = new SourceCatalog(deps.catalog);
    this.random = deps.random ?? defaultRandom;
    this.now = deps.now ?? systemClock;
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const run = await this.run(request);
    return run.result;
  }

  /** Like {@link analyze}, but also returns where the report was written. */
  async run(request: AnalysisRequest): Promise<AnalysisRun> {
    const { logger } = this.deps;
    // One clock reading for the whole run keeps every date consistent
    const startedAt = this.now();
    const ctx: PhaseContext = {
      request,
      dateRange: computeDateRange(startedAt, request.days),
      generator: new SyntheticDataGenerator(this.deps.catalog.synthetic, {
        days: request.days,
        random: this.random,
        now: () => startedAt,
      }),
    };

    logger.info(`[Analysis] Starting analysis for claim: ${request.claim}`);

    const satellite = await this.satellitePhase(ctx);
    const flights = this.flightPhase(ctx);
    const military = this.militaryPhase(ctx);
    const social = await this.socialPhase(ctx);

    const result: AnalysisResult = {
      claim: request.claim,
      analysisDate: formatTimestamp(startedAt),
      dateRange: ctx.dateRange,
      satellite,
      flights,
      military,
      social,
    };

    logger.info("[Report] Generating final analysis summary...");
    const report = await writeReport(result, this.deps.output);
    logger.info(`[Report] Results saved to ${report.resultsPath} and ${report.summaryPath}`);

    return { result, report };
  }

  // ==========================================================================
  // PHASES
  // ==========================================================================

  private async satellitePhase(ctx: PhaseContext): Promise<SatelliteFinding[]> {
    const { logger, output } = this.deps;
    logger.info("[Satellite] Analyzing satellite imagery...");
    const findings: SatelliteFinding[] = [];

    for (const site of this.sources.nuclearSites) {
      try {
        logger.info(`[Satellite] Building imagery links for ${site.name}`);
        const sources = this.sources.satelliteSources(site.coordinates);
        const imagePath = placeholderPath(site.name, ctx.dateRange.end);
        const svg = renderSatellitePlaceholder({
          siteName: site.name,
          coordinates: site.coordinates,
          dateRange: ctx.dateRange,
          sources,
        });
        const written = await output.write(imagePath, svg);
        logger.info(`[Satellite] Created imagery placeholder: ${written}`);

        findings.push({
          siteName: site.name,
          coordinates: { ...site.coordinates },
          dateRange: { ...ctx.dateRange },
          sources,
          placeholderImage: imagePath,
          analysisTip: this.sources.satelliteTip,
        });
      } catch (err) {
        logger.error(`[Satellite] Error processing ${site.name}`, err);
      }
    }

    logger.info(`[Satellite] Analyzed ${findings.length} of ${this.sources.nuclearSites.length} sites`);
    return findings;
  }

  private flightPhase(ctx: PhaseContext): FlightFinding[] {
    const { logger } = this.deps;
    logger.info("[Flight] Analyzing flight data...");
    const findings: FlightFinding[] = [];

    for (const area of this.sources.searchAreas) {
      try {
        logger.info(`[Flight] Collecting flight data sources for ${area.name}`);
        const finding: FlightFinding = {
          area: area.name,
          bounds: area.bounds,
          dateRange: { ...ctx.dateRange },
          sources: this.sources.flightSources(),
          analysisTips: this.sources.flightTips,
        };
        if (ctx.request.synthetic) {
          finding.syntheticFlights = ctx.generator.flights(area.name);
          logger.info(`[Flight] Added ${finding.syntheticFlights.length} synthetic flight entries for ${area.name}`);
        }
        findings.push(finding);
      } catch (err) {
        logger.error(`[Flight] Error processing ${area.name}`, err);
      }
    }

    logger.info(`[Flight] Flight data analysis completed for ${findings.length} areas`);
    return findings;
  }

  private militaryPhase(ctx: PhaseContext): MilitaryFinding[] {
    const { logger } = this.deps;
    logger.info("[Military] Analyzing military movements...");
    const findings: MilitaryFinding[] = [];

    for (const base of this.sources.airBases) {
      try {
        logger.info(`[Military] Collecting sources for activity near ${base.name}`);
        const finding: MilitaryFinding = {
          baseName: base.name,
          affiliation: base.affiliation ?? "Unknown",
          coordinates: { ...base.coordinates },
          dateRange: { ...ctx.dateRange },
          sources: this.sources.militarySources(base),
          analysisTips: this.sources.militaryTips,
        };
        if (ctx.request.synthetic) {
          finding.syntheticActivity = ctx.generator.military(base);
          logger.info(
            `[Military] Added ${finding.syntheticActivity.length} synthetic activity entries for ${base.name}`,
          );
        }
        findings.push(finding);
      } catch (err) {
        logger.error(`[Military] Error processing ${base.name}`, err);
      }
    }

    logger.info(`[Military] Military movements analysis completed for ${findings.length} bases`);
    return findings;
  }

  private async socialPhase(ctx: PhaseContext): Promise<SocialFinding[]> {
    const { logger, socialSource } = this.deps;
    logger.info("[Social] Analyzing social media data...");
    const findings: SocialFinding[] = [];

    for (const term of this.sources.searchTerms) {
      try {
        logger.info(`[Social] Searching for mentions of '${term}'`);
        const resolution = await resolveSocialPosts(term, {
          source: socialSource,
          generator: ctx.generator,
          syntheticEnabled: ctx.request.synthetic,
        });

        if (resolution.origin === "none") {
          logger.warn(`[Social] No posts for '${term}', leaving it out of the report`);
          continue;
        }
        if (resolution.origin === "synthetic") {
          logger.info(`[Social] Added ${resolution.posts.length} synthetic posts for '${term}'`);
        }

        findings.push({
          searchTerm: term,
          dateRange: { ...ctx.dateRange },
          resultsCount: resolution.posts.length,
          origin: resolution.origin,
          posts: resolution.posts,
        });
      } catch (err) {
        logger.error(`[Social] Error processing '${term}'`, err);
      }
    }

    logger.info(`[Social] Social media analysis completed for ${this.sources.searchTerms.length} search terms`);
    return findings;
  }
}
