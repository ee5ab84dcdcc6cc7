/**
 * Source Catalog
 *
 * Turns the catalog's link templates into ExternalSourceRef lists for a point
 * of interest or search area. No network calls.
 *
 * @module source-catalog
 */

import type { Catalog, SourceTemplate } from "./config-schemas";
import type { Coordinates, ExternalSourceRef, PointOfInterest, SearchArea } from "./types";

export interface TemplateValues {
  lat?: number;
  lon?: number;
  query?: string;
}

/**
 * Substitute {lat}, {lon} and {query}. Tokens without a value stay as-is.
 * Values are inserted verbatim; `url` templates get them URI-encoded by
 * {@link buildSourceRefs}.
 */
export function fillTemplate(
  template: string,
  values: TemplateValues,
  encode: (value: string) => string = (v) => v,
): string {
  return template.replace(/\{(lat|lon|query)\}/g, (token, key: keyof TemplateValues) => {
    const value = values[key];
    return value === undefined ? token : encode(String(value));
  });
}

export function buildSourceRefs(
  templates: readonly SourceTemplate[],
  values: TemplateValues,
): ExternalSourceRef[] {
  return templates.map((t) => {
    const ref: ExternalSourceRef = {
      name: t.name,
      url: fillTemplate(t.url, values, encodeURIComponent),
      notes: fillTemplate(t.notes, values),
      accessTier: t.accessTier,
    };
    if (t.type !== undefined) ref.type = t.type;
    if (t.queryTerm !== undefined) ref.queryTerm = fillTemplate(t.queryTerm, values);
    if (t.region !== undefined) ref.region = t.region;
    return ref;
  });
}

export class SourceCatalog {
  constructor(private readonly catalog: Catalog) {}

  get nuclearSites(): readonly PointOfInterest[] {
    return this.catalog.nuclearSites;
  }

  get searchAreas(): readonly SearchArea[] {
    return this.catalog.searchAreas;
  }

  get airBases(): readonly PointOfInterest[] {
    return this.catalog.airBases;
  }

  get searchTerms(): readonly string[] {
    return this.catalog.searchTerms;
  }

  get satelliteTip(): string {
    return this.catalog.analysisTips.satellite;
  }

  get flightTips(): string[] {
    return [...this.catalog.analysisTips.flight];
  }

  get militaryTips(): string[] {
    return [...this.catalog.analysisTips.military];
  }

  /** Imagery-browser and maps deep links for a site. */
  satelliteSources(coordinates: Coordinates): ExternalSourceRef[] {
    return buildSourceRefs(this.catalog.sources.satellite, {
      lat: coordinates.lat,
      lon: coordinates.lon,
    });
  }

  flightSources(): ExternalSourceRef[] {
    return buildSourceRefs(this.catalog.sources.flight, {});
  }

  militarySources(base: PointOfInterest): ExternalSourceRef[] {
    return buildSourceRefs(this.catalog.sources.military, {
      lat: base.coordinates.lat,
      lon: base.coordinates.lon,
      query: base.name,
    });
  }
}
