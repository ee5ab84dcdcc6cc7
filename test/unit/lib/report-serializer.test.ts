/**
 * Report Serializer Tests
 *
 * JSON document shape, round-trip through the schema, summary text and
 * write failures.
 */

import { describe, expect, it } from "vitest";
import {
  BANNER,
  countReport,
  parseReportDocument,
  renderSummary,
  ReportWriteError,
  RESULTS_PATH,
  serializeReport,
  SUMMARY_PATH,
  toReportDocument,
  writeReport,
} from "@/lib/report-serializer";
import type { AnalysisResult, FlightRecord } from "@/lib/types";
import { FailingOutputSink, livePost, MemoryOutputSink } from "@test/helpers/test-helpers";

const range = { start: "2026-03-08", end: "2026-03-15" };

const flight: FlightRecord = {
  kind: "flight",
  date: "2026-03-10",
  area: "Kahuta Region",
  aircraftType: "C-130",
  altitude: 7000,
  speed: 250,
  pattern: "Unusual circling pattern",
  transponder: "Intermittent",
  notes: "Unusual activity - requires verification",
  synthetic: true,
};

function sampleResult(): AnalysisResult {
  return {
    claim: "X strikes Y",
    analysisDate: "2026-03-15 12:30:45",
    dateRange: range,
    satellite: [
      {
        siteName: "Test Site",
        coordinates: { lat: 10.5, lon: 20.25 },
        dateRange: range,
        sources: [{ name: "Maps", url: "https://maps.test/@10.5,20.25", notes: "", accessTier: "free" }],
        placeholderImage: "satellite_images/Test_Site_2026-03-15_free.svg",
        analysisTip: "Look for changes",
      },
    ],
    flights: [
      {
        area: "Kahuta Region",
        bounds: "33.5-33.7,73.3-73.5",
        dateRange: range,
        sources: [{ name: "Tracker", url: "https://tracker.test/", notes: "n", accessTier: "limited-free", type: "free tier" }],
        analysisTips: ["tip"],
        syntheticFlights: [flight, { ...flight, altitude: 20000, transponder: "Active" }],
      },
    ],
    military: [
      {
        baseName: "Test Air Base",
        affiliation: "Test Air Force",
        coordinates: { lat: 1, lon: 2 },
        dateRange: range,
        sources: [
          { name: "Events", url: "https://events.test/", notes: "", accessTier: "free", queryTerm: "Test Air Base military activity" },
        ],
        analysisTips: [],
      },
    ],
    social: [
      {
        searchTerm: "alpha",
        dateRange: range,
        resultsCount: 2,
        origin: "live",
        posts: [livePost("one"), livePost("two")],
      },
      {
        searchTerm: "beta",
        dateRange: range,
        resultsCount: 1,
        origin: "synthetic",
        posts: [{ ...livePost("made up", "Synthetic_User_1234"), synthetic: true }],
      },
    ],
  };
}

describe("toReportDocument", () => {
  it("uses snake_case keys and coordinate pairs", () => {
    const doc = toReportDocument(sampleResult());
    expect(doc.tool).toBe("TruthScan");
    expect(doc.version).toBe("1.0.0");
    expect(doc.analysis_date).toBe("2026-03-15 12:30:45");
    expect(doc.satellite_analysis[0].coordinates).toEqual([10.5, 20.25]);
    expect(doc.flight_data[0].geographic_bounds).toBe("33.5-33.7,73.3-73.5");
    expect(doc.flight_data[0].free_data_sources[0]).toEqual({
      name: "Tracker",
      url: "https://tracker.test/",
      notes: "n",
      access_tier: "limited-free",
      type: "free tier",
    });
    expect(doc.flight_data[0].synthetic_sample_data?.[0].aircraft_type).toBe("C-130");
    expect(doc.military_movements[0].type).toBe("Test Air Force");
    expect(doc.military_movements[0].free_data_sources[0].query_term).toBe("Test Air Base military activity");
    expect(doc.social_media.map((s) => s.data_origin)).toEqual(["live", "synthetic"]);
  });

  it("omits synthetic collections that were not generated", () => {
    const doc = toReportDocument(sampleResult());
    expect("synthetic_activity_data" in doc.military_movements[0]).toBe(false);
  });
});

describe("serializeReport / parseReportDocument", () => {
  it("round-trips collection lengths and synthetic flags", () => {
    const json = serializeReport(sampleResult());
    expect(json.split("\n")[1]).toBe('    "tool": "TruthScan",');

    const doc = parseReportDocument(json);
    expect(doc.satellite_analysis).toHaveLength(1);
    expect(doc.flight_data[0].synthetic_sample_data?.map((f) => f.synthetic)).toEqual([true, true]);
    expect(doc.social_media.map((s) => s.posts.map((p) => p.synthetic))).toEqual([[false, false], [true]]);
  });

  it("rejects a document missing a collection", () => {
    const broken: Record<string, unknown> = { ...toReportDocument(sampleResult()) };
    delete broken.social_media;
    expect(() => parseReportDocument(JSON.stringify(broken))).toThrow();
  });
});

describe("summary", () => {
  it("counts posts from results_count and every synthetic record", () => {
    expect(countReport(sampleResult())).toEqual({
      sites: 1,
      areas: 1,
      bases: 1,
      searchTerms: 2,
      posts: 3,
      syntheticRecords: 3,
    });
  });

  it("renders the scope, caveats and disclaimer", () => {
    const lines = renderSummary(sampleResult()).split("\n");
    const afterBanner = lines.slice(BANNER.split("\n").length);
    expect(afterBanner.slice(0, 15)).toEqual([
      "",
      "TRUTHSCAN ANALYSIS REPORT",
      "=========================",
      "Claim: X strikes Y",
      "Analysis date: 2026-03-15 12:30:45",
      "Date range analyzed: 2026-03-08 to 2026-03-15",
      "",
      "ANALYSIS SCOPE:",
      "- Satellite imagery links for 1 sites analyzed",
      "- Flight tracking sources for 1 areas analyzed",
      "- Military activity sources for 1 bases analyzed",
      "- Social media results for 2 search terms analyzed (3 posts found)",
      "- Synthetic records included: 3",
      "",
      "CAVEATS:",
    ]);
    expect(lines).toContain("- Social media posts are unverified and may be unrelated to the claim.");
    const next = lines.indexOf("FOR DEEPER ANALYSIS, CONSIDER:");
    expect(lines.slice(next, next + 6)).toEqual([
      "FOR DEEPER ANALYSIS, CONSIDER:",
      "- Purchasing commercial satellite imagery",
      "- Using paid flight tracking services",
      "- Engaging professional military analysts",
      "- Accessing official social media APIs",
      "",
    ]);
    expect(lines.indexOf("CAVEATS:")).toBeLessThan(next);
    expect(lines[1]).toBe("  TRUTHSCAN v1.0.0");
  });
});

describe("writeReport", () => {
  it("writes the JSON results and the text summary", async () => {
    const sink = new MemoryOutputSink();
    const written = await writeReport(sampleResult(), sink);
    expect(written.resultsPath).toBe(`memory://${RESULTS_PATH}`);
    expect(written.summaryPath).toBe(`memory://${SUMMARY_PATH}`);
    expect(sink.files.get(SUMMARY_PATH)).toBe(written.summary);
    expect(parseReportDocument(sink.files.get(RESULTS_PATH) ?? "").claim).toBe("X strikes Y");
  });

  it("wraps a sink failure in ReportWriteError", async () => {
    const sink = new FailingOutputSink(/\.txt$/);
    await expect(writeReport(sampleResult(), sink)).rejects.toThrow(ReportWriteError);
    await expect(writeReport(sampleResult(), sink)).rejects.toThrow(
      `Cannot write report file ${SUMMARY_PATH}: EACCES: permission denied, open '${SUMMARY_PATH}'`,
    );
  });
});
