/**
 * Core types for TruthScan runs.
 *
 * Internal shapes are camelCase; the snake_case report document lives in
 * report-serializer.ts.
 *
 * @module types
 */

// ============================================================================
// REQUEST
// ============================================================================

export interface AnalysisRequest {
  readonly claim: string;
  /** Lookback window, in whole days. */
  readonly days: number;
  /** Whether synthetic records may be generated when no real data exists. */
  readonly synthetic: boolean;
}

/** Calendar dates formatted as YYYY-MM-DD, inclusive on both ends. */
export interface DateRange {
  start: string;
  end: string;
}

// ============================================================================
// REFERENCE DATA
// ============================================================================

export interface Coordinates {
  lat: number;
  lon: number;
}

export type PoiCategory = "nuclear-site" | "air-base";

export interface PointOfInterest {
  name: string;
  category: PoiCategory;
  coordinates: Coordinates;
  affiliation?: string;
}

export interface SearchArea {
  name: string;
  /** Free-form lat/lon box, e.g. "33.5-33.7,73.3-73.5". */
  bounds: string;
}

export type AccessTier = "free" | "limited-free";

export interface ExternalSourceRef {
  name: string;
  url: string;
  notes: string;
  accessTier: AccessTier;
  type?: string;
  queryTerm?: string;
  region?: string;
}

// ============================================================================
// ACTIVITY RECORDS
// ============================================================================

export type Transponder = "Active" | "Intermittent";
export type Significance = "Low" | "Medium" | "High";

export interface FlightRecord {
  kind: "flight";
  date: string;
  area: string;
  aircraftType: string;
  altitude: number;
  speed: number;
  pattern: string;
  transponder: Transponder;
  notes: string;
  synthetic: boolean;
}

export interface MilitaryActivityRecord {
  kind: "military";
  date: string;
  activityType: string;
  significance: Significance;
  description: string;
  confidence: string;
  synthetic: boolean;
}

export interface SocialPost {
  kind: "social";
  /** YYYY-MM-DD for synthetic posts; whatever the mirror reported otherwise. */
  date: string;
  platform: string;
  user: string;
  content: string;
  source: string;
  synthetic: boolean;
}

export type ActivityRecord = FlightRecord | MilitaryActivityRecord | SocialPost;

// ============================================================================
// FINDINGS
// ============================================================================

export interface SatelliteFinding {
  siteName: string;
  coordinates: Coordinates;
  dateRange: DateRange;
  sources: ExternalSourceRef[];
  placeholderImage: string;
  analysisTip: string;
}

export interface FlightFinding {
  area: string;
  bounds: string;
  dateRange: DateRange;
  sources: ExternalSourceRef[];
  analysisTips: string[];
  syntheticFlights?: FlightRecord[];
}

export interface MilitaryFinding {
  baseName: string;
  affiliation: string;
  coordinates: Coordinates;
  dateRange: DateRange;
  sources: ExternalSourceRef[];
  analysisTips: string[];
  syntheticActivity?: MilitaryActivityRecord[];
}

export type SocialOrigin = "live" | "synthetic";

export interface SocialFinding {
  searchTerm: string;
  dateRange: DateRange;
  resultsCount: number;
  origin: SocialOrigin;
  posts: SocialPost[];
}

export interface AnalysisResult {
  claim: string;
  /** Local time, YYYY-MM-DD HH:MM:SS. */
  analysisDate: string;
  dateRange: DateRange;
  satellite: SatelliteFinding[];
  flights: FlightFinding[];
  military: MilitaryFinding[];
  social: SocialFinding[];
}
