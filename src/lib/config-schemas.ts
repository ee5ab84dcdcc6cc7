/**
 * Configuration Schemas
 *
 * Zod schemas for the run configuration, the analysis request and the
 * reference catalog (sites, areas, bases, search terms, link templates and
 * synthetic-data tables).
 *
 * @module config-schemas
 */

import { z } from "zod";

// ============================================================================
// RUN CONFIG
// ============================================================================

export const FetcherConfigSchema = z.object({
  mirrors: z.array(z.string().url()).min(1).max(10),
  timeoutMs: z.number().int().min(1000).max(60000),
  maxEntries: z.number().int().min(1).max(50),
  userAgent: z.string().min(1),
});

export type FetcherConfig = z.infer<typeof FetcherConfigSchema>;

export const RunConfigSchema = z.object({
  outputDir: z.string().min(1),
  // null disables the log file; console output is always on
  logFile: z.string().min(1).nullable(),
  fetcher: FetcherConfigSchema,
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

export const DEFAULT_RUN_CONFIG: RunConfig = {
  outputDir: ".",
  logFile: "truthscan.log",
  fetcher: {
    mirrors: [
      "https://nitter.net",
      "https://nitter.lacontrevoie.fr",
      "https://nitter.poast.org",
    ],
    timeoutMs: 10000,
    maxEntries: 10,
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
  },
};

// ============================================================================
// ANALYSIS REQUEST
// ============================================================================

export const DEFAULT_CLAIM = "India strikes Pakistan nuclear sites";
export const DEFAULT_DAYS = 7;

export const AnalysisRequestSchema = z.object({
  claim: z.string().trim().min(1, "claim must not be empty"),
  days: z.number().int().positive(),
  synthetic: z.boolean(),
});

// ============================================================================
// CATALOG SCHEMA (1.0.0)
// ============================================================================

export const CATALOG_SCHEMA_VERSION = "1.0.0";

const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

const PointOfInterestSchema = z.object({
  name: z.string().min(1),
  category: z.enum(["nuclear-site", "air-base"]),
  coordinates: CoordinatesSchema,
  affiliation: z.string().min(1).optional(),
});

const SearchAreaSchema = z.object({
  name: z.string().min(1),
  bounds: z.string().min(1),
});

const SourceTemplateSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
  notes: z.string(),
  accessTier: z.enum(["free", "limited-free"]),
  type: z.string().optional(),
  queryTerm: z.string().optional(),
  region: z.string().optional(),
});

export type SourceTemplate = z.infer<typeof SourceTemplateSchema>;

const MilitaryActivitySchema = z.object({
  type: z.string().min(1),
  significance: z.enum(["Low", "Medium", "High"]),
  weight: z.number().positive(),
});

export type MilitaryActivityType = z.infer<typeof MilitaryActivitySchema>;

const SocialCategorySchema = z.enum(["conflict", "nuclear", "military"]);

export type SocialCategory = z.infer<typeof SocialCategorySchema>;

const TOKEN_PATTERN = /\{([a-z_]+)\}/g;

/** Placeholder tokens (without braces) referenced by a template string. */
export function templateTokens(template: string): string[] {
  return Array.from(template.matchAll(TOKEN_PATTERN), (m) => m[1]);
}

export const SOCIAL_TEMPLATES_PER_CATEGORY = 5;

export const SyntheticCatalogSchema = z
  .object({
    aircraftTypes: z.array(z.string().min(1)).min(1),
    militaryActivities: z.array(MilitaryActivitySchema).min(1),
    socialRules: z.array(
      z.object({
        category: SocialCategorySchema,
        keywords: z.array(z.string().min(1)).min(1),
      }),
    ),
    defaultSocialCategory: SocialCategorySchema,
    socialTemplates: z.object({
      conflict: z.array(z.string().min(1)).length(SOCIAL_TEMPLATES_PER_CATEGORY),
      nuclear: z.array(z.string().min(1)).length(SOCIAL_TEMPLATES_PER_CATEGORY),
      military: z.array(z.string().min(1)).length(SOCIAL_TEMPLATES_PER_CATEGORY),
    }),
    socialValues: z.record(z.string(), z.array(z.string().min(1)).min(1)),
  })
  .superRefine((value, ctx) => {
    for (const [category, templates] of Object.entries(value.socialTemplates)) {
      templates.forEach((template, index) => {
        for (const token of templateTokens(template)) {
          if (!value.socialValues[token]) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["socialTemplates", category, index],
              message: `Template references unknown token {${token}}`,
            });
          }
        }
      });
    }
  });

export type SyntheticCatalog = z.infer<typeof SyntheticCatalogSchema>;

export const CatalogSchema = z.object({
  schemaVersion: z.literal(CATALOG_SCHEMA_VERSION),
  nuclearSites: z.array(PointOfInterestSchema).min(1),
  searchAreas: z.array(SearchAreaSchema).min(1),
  airBases: z.array(PointOfInterestSchema).min(1),
  searchTerms: z.array(z.string().min(1)).min(1),
  sources: z.object({
    satellite: z.array(SourceTemplateSchema),
    flight: z.array(SourceTemplateSchema),
    military: z.array(SourceTemplateSchema),
  }),
  analysisTips: z.object({
    satellite: z.string(),
    flight: z.array(z.string()),
    military: z.array(z.string()),
  }),
  synthetic: SyntheticCatalogSchema,
});

export type Catalog = z.infer<typeof CatalogSchema>;
