/**
 * Report Serializer
 *
 * Renders an AnalysisResult as the fixed-schema JSON document and as the
 * plain-text summary, and writes both through an OutputSink.
 *
 * @module report-serializer
 */

import { z } from "zod";
import { describeError } from "./logger";
import type { OutputSink } from "./output-sink";
import type {
  AnalysisResult,
  Coordinates,
  ExternalSourceRef,
  FlightRecord,
  MilitaryActivityRecord,
  SocialPost,
} from "./types";
import { APP_VERSION, TOOL_NAME } from "./version";

export const RESULTS_PATH = "analysis_results/truthscan_results.json";
export const SUMMARY_PATH = "analysis_results/truthscan_summary.txt";

export const BANNER = [
  "=".repeat(60),
  `  ${TOOL_NAME.toUpperCase()} v${APP_VERSION}`,
  "  Open-source intelligence reference aggregator",
  "=".repeat(60),
].join("\n");

export const CAVEATS = [
  "No imagery, flight or signal data was analyzed; every link must be reviewed by hand.",
  "Social media posts are unverified and may be unrelated to the claim.",
  "Free data sources have limited history, coverage and resolution.",
  "This report compiles references only and does not assess whether the claim is true.",
];

export const DEEPER_ANALYSIS = [
  "Purchasing commercial satellite imagery",
  "Using paid flight tracking services",
  "Engaging professional military analysts",
  "Accessing official social media APIs",
];

export const SYNTHETIC_DISCLAIMER =
  'NOTE: Records marked "synthetic": true in the detailed results were generated for\n' +
  "illustration only. They are not observations and must not be cited as evidence.";

// ============================================================================
// DOCUMENT SCHEMA
// ============================================================================

const DateRangeDoc = z.object({ start: z.string(), end: z.string() });
const CoordinatesDoc = z.tuple([z.number(), z.number()]);

const SourceDoc = z.object({
  name: z.string(),
  url: z.string(),
  notes: z.string(),
  access_tier: z.enum(["free", "limited-free"]),
  type: z.string().optional(),
  query_term: z.string().optional(),
  region: z.string().optional(),
});

const FlightDoc = z.object({
  date: z.string(),
  area: z.string(),
  aircraft_type: z.string(),
  altitude: z.number(),
  speed: z.number(),
  pattern: z.string(),
  transponder: z.enum(["Active", "Intermittent"]),
  notes: z.string(),
  synthetic: z.boolean(),
});

const MilitaryDoc = z.object({
  date: z.string(),
  type: z.string(),
  significance: z.enum(["Low", "Medium", "High"]),
  description: z.string(),
  confidence: z.string(),
  synthetic: z.boolean(),
});

const PostDoc = z.object({
  platform: z.string(),
  user: z.string(),
  content: z.string(),
  date: z.string(),
  synthetic: z.boolean(),
  source: z.string(),
});

export const ReportDocumentSchema = z.object({
  tool: z.string(),
  version: z.string(),
  claim: z.string(),
  analysis_date: z.string(),
  satellite_analysis: z.array(
    z.object({
      site_name: z.string(),
      coordinates: CoordinatesDoc,
      date_range: DateRangeDoc,
      satellite_sources: z.array(SourceDoc),
      placeholder_image: z.string(),
      analysis_tip: z.string(),
    }),
  ),
  flight_data: z.array(
    z.object({
      area: z.string(),
      geographic_bounds: z.string(),
      date_range: DateRangeDoc,
      free_data_sources: z.array(SourceDoc),
      analysis_tips: z.array(z.string()),
      synthetic_sample_data: z.array(FlightDoc).optional(),
    }),
  ),
  military_movements: z.array(
    z.object({
      base_name: z.string(),
      type: z.string(),
      coordinates: CoordinatesDoc,
      date_range: DateRangeDoc,
      free_data_sources: z.array(SourceDoc),
      analysis_tips: z.array(z.string()),
      synthetic_activity_data: z.array(MilitaryDoc).optional(),
    }),
  ),
  social_media: z.array(
    z.object({
      search_term: z.string(),
      date_range: DateRangeDoc,
      results_count: z.number().int().nonnegative(),
      data_origin: z.enum(["live", "synthetic"]),
      posts: z.array(PostDoc),
    }),
  ),
});

export type ReportDocument = z.infer<typeof ReportDocumentSchema>;
type SourceDocument = z.infer<typeof SourceDoc>;

// ============================================================================
// MAPPING
// ============================================================================

function coordinatesDoc(c: Coordinates): [number, number] {
  return [c.lat, c.lon];
}

function sourceDoc(ref: ExternalSourceRef): SourceDocument {
  const doc: SourceDocument = {
    name: ref.name,
    url: ref.url,
    notes: ref.notes,
    access_tier: ref.accessTier,
  };
  if (ref.type !== undefined) doc.type = ref.type;
  if (ref.queryTerm !== undefined) doc.query_term = ref.queryTerm;
  if (ref.region !== undefined) doc.region = ref.region;
  return doc;
}

function flightDoc(r: FlightRecord) {
  return {
    date: r.date,
    area: r.area,
    aircraft_type: r.aircraftType,
    altitude: r.altitude,
    speed: r.speed,
    pattern: r.pattern,
    transponder: r.transponder,
    notes: r.notes,
    synthetic: r.synthetic,
  };
}

function militaryDoc(r: MilitaryActivityRecord) {
  return {
    date: r.date,
    type: r.activityType,
    significance: r.significance,
    description: r.description,
    confidence: r.confidence,
    synthetic: r.synthetic,
  };
}

function postDoc(p: SocialPost) {
  return {
    platform: p.platform,
    user: p.user,
    content: p.content,
    date: p.date,
    synthetic: p.synthetic,
    source: p.source,
  };
}

export function toReportDocument(result: AnalysisResult): ReportDocument {
  return {
    tool: TOOL_NAME,
    version: APP_VERSION,
    claim: result.claim,
    analysis_date: result.analysisDate,
    satellite_analysis: result.satellite.map((f) => ({
      site_name: f.siteName,
      coordinates: coordinatesDoc(f.coordinates),
      date_range: { ...f.dateRange },
      satellite_sources: f.sources.map(sourceDoc),
      placeholder_image: f.placeholderImage,
      analysis_tip: f.analysisTip,
    })),
    flight_data: result.flights.map((f) => ({
      area: f.area,
      geographic_bounds: f.bounds,
      date_range: { ...f.dateRange },
      free_data_sources: f.sources.map(sourceDoc),
      analysis_tips: [...f.analysisTips],
      ...(f.syntheticFlights ? { synthetic_sample_data: f.syntheticFlights.map(flightDoc) } : {}),
    })),
    military_movements: result.military.map((f) => ({
      base_name: f.baseName,
      type: f.affiliation,
      coordinates: coordinatesDoc(f.coordinates),
      date_range: { ...f.dateRange },
      free_data_sources: f.sources.map(sourceDoc),
      analysis_tips: [...f.analysisTips],
      ...(f.syntheticActivity ? { synthetic_activity_data: f.syntheticActivity.map(militaryDoc) } : {}),
    })),
    social_media: result.social.map((f) => ({
      search_term: f.searchTerm,
      date_range: { ...f.dateRange },
      results_count: f.resultsCount,
      data_origin: f.origin,
      posts: f.posts.map(postDoc),
    })),
  };
}

/** Pretty-printed JSON with 4-space indentation. */
export function serializeReport(result: AnalysisResult): string {
  return JSON.stringify(toReportDocument(result), null, 4);
}

/** Parse and validate a previously written results file. */
export function parseReportDocument(json: string): ReportDocument {
  return ReportDocumentSchema.parse(JSON.parse(json));
}

// ============================================================================
// SUMMARY
// ============================================================================

export interface ReportCounts {
  sites: number;
  areas: number;
  bases: number;
  searchTerms: number;
  posts: number;
  syntheticRecords: number;
}

export function countReport(result: AnalysisResult): ReportCounts {
  const syntheticFlights = result.flights.reduce((n, f) => n + (f.syntheticFlights?.length ?? 0), 0);
  const syntheticActivity = result.military.reduce((n, f) => n + (f.syntheticActivity?.length ?? 0), 0);
  const syntheticPosts = result.social.reduce(
    (n, f) => n + f.posts.filter((p) => p.synthetic).length,
    0,
  );

  return {
    sites: result.satellite.length,
    areas: result.flights.length,
    bases: result.military.length,
    searchTerms: result.social.length,
    posts: result.social.reduce((n, f) => n + f.resultsCount, 0),
    syntheticRecords: syntheticFlights + syntheticActivity + syntheticPosts,
  };
}

export function renderSummary(result: AnalysisResult): string {
  const counts = countReport(result);
  const lines = [
    BANNER,
    "",
    "TRUTHSCAN ANALYSIS REPORT",
    "=========================",
    `Claim: ${result.claim}`,
    `Analysis date: ${result.analysisDate}`,
    `Date range analyzed: ${result.dateRange.start} to ${result.dateRange.end}`,
    "",
    "ANALYSIS SCOPE:",
    `- Satellite imagery links for ${counts.sites} sites analyzed`,
    `- Flight tracking sources for ${counts.areas} areas analyzed`,
    `- Military activity sources for ${counts.bases} bases analyzed`,
    `- Social media results for ${counts.searchTerms} search terms analyzed (${counts.posts} posts found)`,
    `- Synthetic records included: ${counts.syntheticRecords}`,
    "",
    "CAVEATS:",
    ...CAVEATS.map((c) => `- ${c}`),
    "",
    "FOR DEEPER ANALYSIS, CONSIDER:",
    ...DEEPER_ANALYSIS.map((d) => `- ${d}`),
    "",
    SYNTHETIC_DISCLAIMER,
    "",
  ];
  return lines.join("\n");
}

// ============================================================================
// WRITING
// ============================================================================

export class ReportWriteError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Cannot write report file ${path}: ${describeError(cause)}`, { cause });
    this.name = "ReportWriteError";
  }
}

export interface WrittenReport {
  resultsPath: string;
  summaryPath: string;
  summary: string;
}

async function writeOrFail(sink: OutputSink, relativePath: string, content: string): Promise<string> {
  try {
    return await sink.write(relativePath, content);
  } catch (err) {
    throw new ReportWriteError(relativePath, err);
  }
}

export async function writeReport(result: AnalysisResult, sink: OutputSink): Promise<WrittenReport> {
  const summary = renderSummary(result);
  const resultsPath = await writeOrFail(sink, RESULTS_PATH, serializeReport(result));
  const summaryPath = await writeOrFail(sink, SUMMARY_PATH, summary);
  return { resultsPath, summaryPath, summary };
}
