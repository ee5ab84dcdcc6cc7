/**
 * Satellite placeholder images
 *
 * Self-contained SVG cards listing a site's coordinates and the free imagery
 * links to check by hand. Stand-ins for imagery the tool never downloads.
 *
 * @module satellite-placeholder
 */

import type { Coordinates, DateRange, ExternalSourceRef } from "./types";

const WIDTH = 800;
const HEIGHT = 600;
const LINE_HEIGHT = 30;
const MARGIN = 50;

const ANALYSIS_TIPS = [
  "- Compare with historical imagery when available",
  "- Look for new craters, debris fields, or structural damage",
  "- Check for smoke plumes or fire damage",
  "- Examine access roads for increased activity",
];

export interface PlaceholderInput {
  siteName: string;
  coordinates: Coordinates;
  dateRange: DateRange;
  sources: readonly ExternalSourceRef[];
}

/** Relative path of a site's placeholder, e.g. satellite_images/Kundian_Nuclear_Complex_2026-10-19_free.svg */
export function placeholderPath(siteName: string, endDate: string): string {
  return `satellite_images/${siteName.replace(/ /g, "_")}_${endDate}_free.svg`;
}

export function placeholderLines(input: PlaceholderInput): string[] {
  const lines = [
    `Site: ${input.siteName}`,
    `Coordinates: ${input.coordinates.lat}, ${input.coordinates.lon}`,
    `Date Range: ${input.dateRange.start} to ${input.dateRange.end}`,
    "",
    "FREE SATELLITE IMAGERY SOURCES:",
  ];
  for (const source of input.sources) {
    lines.push("", `${source.name}:`, source.url);
  }
  lines.push("", "ANALYSIS TIPS:", ...ANALYSIS_TIPS);
  return lines;
}

export function renderSatellitePlaceholder(input: PlaceholderInput): string {
  const lines = placeholderLines(input);
  const height = Math.max(HEIGHT, MARGIN * 2 + lines.length * LINE_HEIGHT);
  const text = lines
    .map((line, i) =>
      line === ""
        ? ""
        : `  <text x="${MARGIN}" y="${MARGIN + i * LINE_HEIGHT}">${esc(line)}</text>`,
    )
    .filter(Boolean)
    .join("\n");

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${height}" viewBox="0 0 ${WIDTH} ${height}">
  <rect width="100%" height="100%" fill="rgb(240,240,240)"/>
  <g font-family="monospace" font-size="14" fill="rgb(0,0,0)">
${text}
  </g>
</svg>
`;
}

function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
