/**
 * Configuration Loader
 *
 * Resolves the run configuration (defaults + environment overrides) and loads
 * the reference catalog from its JSON file.
 *
 * @module config-loader
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import {
  CatalogSchema,
  DEFAULT_RUN_CONFIG,
  RunConfigSchema,
  type Catalog,
  type RunConfig,
} from "./config-schemas";

export type { Catalog, RunConfig } from "./config-schemas";
export { DEFAULT_RUN_CONFIG } from "./config-schemas";

export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL("../../configs/catalog.default.json", import.meta.url),
);

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

type Env = Record<string, string | undefined>;

// "on" | "off" | "allowlist:VAR1,VAR2"
type OverridePolicy = string;

function getOverridePolicy(env: Env): OverridePolicy {
  return env.TRUTHSCAN_CONFIG_ENV_OVERRIDES || "on";
}

const splitList = (v: string) => v.split(",").map((s) => s.trim()).filter(Boolean);

const RUN_ENV_MAP: Record<string, { fieldPath: string; parser: (v: string) => unknown }> = {
  TRUTHSCAN_OUTPUT_DIR: { fieldPath: "outputDir", parser: (v) => v },
  TRUTHSCAN_LOG_FILE: { fieldPath: "logFile", parser: (v) => (v === "off" ? null : v) },
  TRUTHSCAN_FETCH_TIMEOUT_MS: { fieldPath: "fetcher.timeoutMs", parser: (v) => parseInt(v, 10) },
  TRUTHSCAN_FETCH_MAX_ENTRIES: { fieldPath: "fetcher.maxEntries", parser: (v) => parseInt(v, 10) },
  TRUTHSCAN_MIRRORS: { fieldPath: "fetcher.mirrors", parser: splitList },
  TRUTHSCAN_USER_AGENT: { fieldPath: "fetcher.userAgent", parser: (v) => v },
};

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  appliedValue: unknown;
}

export interface ResolvedRunConfig {
  config: RunConfig;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setByPath(target: Record<string, unknown>, fieldPath: string, value: unknown): void {
  const parts = fieldPath.split(".");
  let node: Record<string, unknown> = target;
  for (const part of parts.slice(0, -1)) {
    const next = node[part];
    if (!isRecord(next)) {
      throw new Error(`Config path "${fieldPath}" does not resolve to an object`);
    }
    node = next;
  }
  node[parts[parts.length - 1]] = value;
}

// ============================================================================
// OVERRIDE RESOLUTION
// ============================================================================

/**
 * Apply TRUTHSCAN_* environment overrides on top of a base config.
 *
 * Each override is applied tentatively; one that would make the config fail
 * schema validation is skipped and reported in `skippedOverrides`.
 */
export function resolveRunConfig(
  env: Env = process.env,
  base: RunConfig = DEFAULT_RUN_CONFIG,
): ResolvedRunConfig {
  const policy = getOverridePolicy(env);
  const skippedOverrides: string[] = [];
  const overrides: OverrideRecord[] = [];

  let result: RunConfig = structuredClone(base);
  if (policy === "off") {
    return { config: result, overrides, skippedOverrides };
  }

  let allowlist: Set<string> | null = null;
  if (policy.startsWith("allowlist:")) {
    allowlist = new Set(splitList(policy.slice("allowlist:".length)));
  }

  for (const [envVar, mapping] of Object.entries(RUN_ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined || raw === "") continue;
    if (allowlist && !allowlist.has(envVar)) {
      skippedOverrides.push(envVar);
      continue;
    }

    const tentative: Record<string, unknown> = structuredClone(result);
    const value = mapping.parser(raw);
    setByPath(tentative, mapping.fieldPath, value);

    const validation = RunConfigSchema.safeParse(tentative);
    if (!validation.success) {
      console.warn(
        `[Config] Ignoring ${envVar}: ${validation.error.issues.map((i) => i.message).join("; ")}`,
      );
      skippedOverrides.push(envVar);
      continue;
    }

    result = validation.data;
    overrides.push({ envVar, fieldPath: mapping.fieldPath, appliedValue: value });
  }

  return { config: result, overrides, skippedOverrides };
}

// ============================================================================
// CATALOG
// ============================================================================

export class CatalogError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
  ) {
    super(message);
    this.name = "CatalogError";
  }
}

export function parseCatalog(content: string, filePath = "<inline>"): Catalog {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new CatalogError(filePath, `Invalid JSON in catalog ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new CatalogError(filePath, `Invalid catalog ${filePath}: ${details}`);
  }
  return parsed.data;
}

/**
 * Load and validate a catalog file. Defaults to configs/catalog.default.json.
 */
export function loadCatalog(filePath: string = DEFAULT_CATALOG_PATH): Catalog {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new CatalogError(filePath, `Cannot read catalog ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseCatalog(content, filePath);
}
