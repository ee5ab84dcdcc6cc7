/**
 * Synthetic Data Generator
 *
 * Produces illustrative flight, military-activity and social-media records
 * for contexts where no real data is available. Every record it returns is
 * tagged `synthetic: true`.
 *
 * @module synthetic-data
 */

import type { SocialCategory, SyntheticCatalog } from "./config-schemas";
import { formatDate, shiftDays, systemClock, type Clock } from "./date-range";
import { defaultRandom, pick, randomInt, weightedPick, type RandomSource } from "./random";
import type { FlightRecord, MilitaryActivityRecord, PointOfInterest, SocialPost } from "./types";

export const SYNTHETIC_BATCH_SIZE = 5;

export const NORMAL_FLIGHT_PROFILE = {
  altitude: [15000, 35000],
  speed: [350, 500],
  pattern: "Standard transit",
  transponder: "Active",
  notes: "Normal military movement",
} as const;

export const UNUSUAL_FLIGHT_PROFILE = {
  altitude: [5000, 10000],
  speed: [200, 350],
  pattern: "Unusual circling pattern",
  transponder: "Intermittent",
  notes: "Unusual activity - requires verification",
} as const;

export const MILITARY_CONFIDENCE = "Medium - requires verification";
export const SYNTHETIC_PLATFORM = "Twitter (synthetic)";
export const SYNTHETIC_SOURCE = "Algorithmically generated for analysis";

export interface SyntheticDataOptions {
  /** Lookback window; dates are drawn from [today - days, today]. */
  days: number;
  random?: RandomSource;
  now?: Clock;
}

/**
 * Resolve the template category for a search term. Rules are checked in
 * order against the lower-cased term; the first keyword hit wins.
 */
export function socialCategoryFor(catalog: SyntheticCatalog, searchTerm: string): SocialCategory {
  const term = searchTerm.toLowerCase();
  for (const rule of catalog.socialRules) {
    if (rule.keywords.some((keyword) => term.includes(keyword.toLowerCase()))) {
      return rule.category;
    }
  }
  return catalog.defaultSocialCategory;
}

/** Replace every {token} occurrence with a value drawn from its list. */
export function fillSocialTemplate(
  template: string,
  values: Record<string, readonly string[]>,
  random: RandomSource,
): string {
  let text = template;
  for (const [token, options] of Object.entries(values)) {
    const placeholder = `{${token}}`;
    if (text.includes(placeholder)) {
      text = text.replaceAll(placeholder, pick(random, options));
    }
  }
  return text;
}

export class SyntheticDataGenerator {
  private readonly random: RandomSource;
  private readonly now: Clock;
  private readonly days: number;

  constructor(
    private readonly catalog: SyntheticCatalog,
    options: SyntheticDataOptions,
  ) {
    this.random = options.random ?? defaultRandom;
    this.now = options.now ?? systemClock;
    this.days = options.days;
  }

  /** Record 0 is always the unusual profile; the rest are routine transits. */
  flights(area: string): FlightRecord[] {
    const records: FlightRecord[] = [];
    for (let i = 0; i < SYNTHETIC_BATCH_SIZE; i++) {
      const profile = i === 0 ? UNUSUAL_FLIGHT_PROFILE : NORMAL_FLIGHT_PROFILE;
      records.push({
        kind: "flight",
        date: this.randomDate(),
        area,
        aircraftType: pick(this.random, this.catalog.aircraftTypes),
        altitude: randomInt(this.random, profile.altitude[0], profile.altitude[1]),
        speed: randomInt(this.random, profile.speed[0], profile.speed[1]),
        pattern: profile.pattern,
        transponder: profile.transponder,
        notes: profile.notes,
        synthetic: true,
      });
    }
    return records;
  }

  military(base: Pick<PointOfInterest, "name">): MilitaryActivityRecord[] {
    const records: MilitaryActivityRecord[] = [];
    for (let i = 0; i < SYNTHETIC_BATCH_SIZE; i++) {
      const activity = weightedPick(this.random, this.catalog.militaryActivities, (a) => a.weight);
      records.push({
        kind: "military",
        date: this.randomDate(),
        activityType: activity.type,
        significance: activity.significance,
        description: `${activity.type} observed at ${base.name}`,
        confidence: MILITARY_CONFIDENCE,
        synthetic: true,
      });
    }
    return records;
  }

  socialPosts(searchTerm: string): SocialPost[] {
    const templates = this.catalog.socialTemplates[socialCategoryFor(this.catalog, searchTerm)];
    const posts: SocialPost[] = [];
    for (let i = 0; i < SYNTHETIC_BATCH_SIZE; i++) {
      const template = pick(this.random, templates);
      posts.push({
        kind: "social",
        date: this.randomDate(),
        platform: SYNTHETIC_PLATFORM,
        user: `Synthetic_User_${randomInt(this.random, 1000, 10000)}`,
        content: fillSocialTemplate(template, this.catalog.socialValues, this.random),
        source: SYNTHETIC_SOURCE,
        synthetic: true,
      });
    }
    return posts;
  }

  private randomDate(): string {
    const daysAgo = randomInt(this.random, 0, this.days + 1);
    return formatDate(shiftDays(this.now(), -daysAgo));
  }
}
