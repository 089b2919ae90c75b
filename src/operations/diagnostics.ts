/**
 * Read-support diagnostic chart
 *
 * Renders the log10 read-support density of each match class as an SVG
 * polyline, with the chosen threshold drawn as a dashed vertical line.
 */

import type { ClassifiedObservation, MatchClass, ThresholdEstimate } from "../types";
import { MATCH_CLASSES } from "../types";
import { densityGrid, gaussianKde } from "./core/statistics";

const WIDTH = 640;
const HEIGHT = 400;
const MARGIN = { top: 36, right: 120, bottom: 44, left: 56 };
const GRID_POINTS = 256;

const CLASS_COLORS: Readonly<Record<MatchClass, string>> = {
  Exact: "#1b9e77",
  Approx: "#7570b3",
  OtherGene: "#d95f02",
  NoGene: "#666666",
};

export interface ClassDensity {
  readonly matchClass: MatchClass;
  readonly sampleSize: number;
  readonly points: ReadonlyArray<{ x: number; y: number }>;
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * log10 read-support densities per match class over [0, upper]
 *
 * Classes with fewer than two positive values have no density and are
 * returned with an empty point list.
 */
export function classDensities(
  observations: readonly ClassifiedObservation[],
  upper: number
): ClassDensity[] {
  return MATCH_CLASSES.map((matchClass) => {
    const logs = observations
      .filter((o) => o.matchClass === matchClass && o.totalDupsWtMut > 0)
      .map((o) => Math.log10(o.totalDupsWtMut));
    const points = logs.length < 2 ? [] : densityGrid(gaussianKde(logs), 0, upper, GRID_POINTS);
    return { matchClass, sampleSize: logs.length, points };
  });
}

/**
 * Render the diagnostic chart as a standalone SVG document
 */
export function renderReadSupportChart(
  observations: readonly ClassifiedObservation[],
  threshold: ThresholdEstimate,
  targetGene: string
): string {
  let maxLog = 3;
  for (const o of observations) {
    if (o.totalDupsWtMut > 0) maxLog = Math.max(maxLog, Math.log10(o.totalDupsWtMut));
  }
  const xMax = Math.ceil(maxLog);
  const densities = classDensities(observations, xMax);

  let yMax = 0;
  for (const d of densities) {
    for (const p of d.points) yMax = Math.max(yMax, p.y);
  }
  if (yMax === 0) yMax = 1;

  const pw = WIDTH - MARGIN.left - MARGIN.right;
  const ph = HEIGHT - MARGIN.top - MARGIN.bottom;
  const sx = (x: number): number => MARGIN.left + (x / xMax) * pw;
  const sy = (y: number): number => MARGIN.top + ph - (y / yMax) * ph;

  let svg = `<svg viewBox="0 0 ${WIDTH} ${HEIGHT}" width="${WIDTH}" height="${HEIGHT}" xmlns="http://www.w3.org/2000/svg" font-family="sans-serif">`;
  svg += `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`;
  svg += `<text x="${MARGIN.left + pw / 2}" y="20" text-anchor="middle" font-size="13">${escapeXml(targetGene)} read support by match class</text>`;

  // axes
  svg += `<line x1="${MARGIN.left}" y1="${MARGIN.top + ph}" x2="${MARGIN.left + pw}" y2="${MARGIN.top + ph}" stroke="#333" stroke-width="1"/>`;
  svg += `<line x1="${MARGIN.left}" y1="${MARGIN.top}" x2="${MARGIN.left}" y2="${MARGIN.top + ph}" stroke="#333" stroke-width="1"/>`;
  for (let tick = 0; tick <= xMax; tick++) {
    const x = sx(tick);
    svg += `<line x1="${x}" y1="${MARGIN.top + ph}" x2="${x}" y2="${MARGIN.top + ph + 4}" stroke="#333" stroke-width="1"/>`;
    svg += `<text x="${x}" y="${MARGIN.top + ph + 16}" text-anchor="middle" font-size="10">${10 ** tick}</text>`;
  }
  svg += `<text x="${MARGIN.left + pw / 2}" y="${HEIGHT - 8}" text-anchor="middle" font-size="11">WT + MUT reads per UMI (log scale)</text>`;
  svg += `<text x="14" y="${MARGIN.top + ph / 2}" text-anchor="middle" font-size="11" transform="rotate(-90, 14, ${MARGIN.top + ph / 2})">density</text>`;

  for (const d of densities) {
    if (d.points.length === 0) continue;
    const pts = d.points.map((p) => `${sx(p.x).toFixed(2)},${sy(p.y).toFixed(2)}`).join(" ");
    svg += `<polyline points="${pts}" fill="none" stroke="${CLASS_COLORS[d.matchClass]}" stroke-width="1.5" stroke-linejoin="round"/>`;
  }

  if (Number.isFinite(threshold.value) && threshold.value > 0) {
    const x = sx(Math.min(Math.log10(threshold.value), xMax));
    svg += `<line x1="${x}" y1="${MARGIN.top}" x2="${x}" y2="${MARGIN.top + ph}" stroke="#e7298a" stroke-width="1.5" stroke-dasharray="5,4"/>`;
    svg += `<text x="${x + 4}" y="${MARGIN.top + 12}" font-size="10" fill="#e7298a">threshold ${threshold.value.toFixed(2)}</text>`;
  }

  // legend
  const legendX = MARGIN.left + pw + 16;
  densities.forEach((d, i) => {
    const y = MARGIN.top + 12 + i * 18;
    svg += `<line x1="${legendX}" y1="${y - 4}" x2="${legendX + 16}" y2="${y - 4}" stroke="${CLASS_COLORS[d.matchClass]}" stroke-width="2"/>`;
    svg += `<text x="${legendX + 22}" y="${y}" font-size="10">${d.matchClass} (n=${d.sampleSize})</text>`;
  });

  svg += "</svg>\n";
  return svg;
}
