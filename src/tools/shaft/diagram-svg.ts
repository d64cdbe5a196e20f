/**
 * SVG rendering of a shaft: stepped profile with bearings and loads on top,
 * resultant bending moment and torque diagrams below.
 */
import type { Shaft } from "../../shaft/geometry.js";
import type { BearingReaction, ShaftDiagrams } from "../../shaft/statics.js";

const WIDTH = 800;
const HEIGHT = 620;
const MARGIN = { top: 50, right: 60, bottom: 30, left: 80 };
const PLOT_WIDTH = WIDTH - MARGIN.left - MARGIN.right;
const PROFILE_MID = MARGIN.top + 70;
const PROFILE_HALF_HEIGHT = 40;
const DIAGRAM_HEIGHT = 160;
const MOMENT_TOP = PROFILE_MID + 110;
const TORQUE_TOP = MOMENT_TOP + DIAGRAM_HEIGHT + 60;

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

function fmt(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(2);
}

/** Zero-based diagram panel with a frame, a zero line and value labels. */
function drawPanel(lines: string[], top: number, range: number, label: string): void {
  const left = MARGIN.left;
  const right = left + PLOT_WIDTH;
  const bottom = top + DIAGRAM_HEIGHT;
  lines.push(`<text x="${left - 5}" y="${top - 6}" text-anchor="end" font-size="12" font-weight="bold">${label}</text>`);
  lines.push(`<rect x="${left}" y="${top}" width="${PLOT_WIDTH}" height="${DIAGRAM_HEIGHT}" fill="white" stroke="#ddd" stroke-width="0.5"/>`);
  lines.push(`<line x1="${left}" y1="${bottom}" x2="${right}" y2="${bottom}" stroke="#999" stroke-width="0.5"/>`);
  for (let i = 1; i <= 4; i++) {
    const y = bottom - (i / 4) * DIAGRAM_HEIGHT;
    lines.push(`<line x1="${left}" y1="${y}" x2="${right}" y2="${y}" stroke="#eee" stroke-width="0.5"/>`);
    lines.push(`<text x="${left - 4}" y="${y + 3}" text-anchor="end" font-size="9" fill="#888">${((i / 4) * range).toFixed(1)}</text>`);
  }
  lines.push(`<text x="${left - 4}" y="${bottom + 3}" text-anchor="end" font-size="9" fill="#888">0</text>`);
}

/** Filled area under |values| against x. */
function areaPath(xs: number[], values: number[], xScale: (x: number) => number, yScale: (v: number) => number): string {
  const first = xs[0] ?? 0;
  const last = xs[xs.length - 1] ?? 0;
  let d = `M ${xScale(first)} ${yScale(0)}`;
  xs.forEach((x, i) => {
    d += ` L ${xScale(x)} ${yScale(Math.abs(values[i] ?? 0))}`;
  });
  return `${d} L ${xScale(last)} ${yScale(0)} Z`;
}

export function generateShaftSvg(
  shaft: Shaft,
  diagrams: ShaftDiagrams,
  reactions: BearingReaction[],
  title: string,
): string {
  const length = shaft.getTotalLength() || 1;
  const xScale = (x: number) => MARGIN.left + (x / length) * PLOT_WIDTH;

  const maxDiameter = Math.max(1, ...shaft.nodes.flatMap((n) => [n.diameterLeft, n.diameterRight]));
  const radiusScale = (d: number) => (d / maxDiameter) * PROFILE_HALF_HEIGHT;

  // Moments in N·m for display, like the torques.
  const moments = diagrams.ma.map((m) => m / 1000);
  const torques = diagrams.tm.map((t, i) => Math.hypot(t, diagrams.ta[i] ?? 0));
  const mRange = Math.max(...moments.map(Math.abs), 0) * 1.15 || 1;
  const tRange = Math.max(...torques.map(Math.abs), 0) * 1.15 || 1;
  const mScale = (m: number) => MOMENT_TOP + DIAGRAM_HEIGHT - (m / mRange) * DIAGRAM_HEIGHT;
  const tScale = (t: number) => TORQUE_TOP + DIAGRAM_HEIGHT - (t / tRange) * DIAGRAM_HEIGHT;

  const lines: string[] = [];
  lines.push(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${WIDTH} ${HEIGHT}" width="${WIDTH}" height="${HEIGHT}" font-family="Arial, sans-serif" font-size="11">`);
  lines.push(`<rect width="${WIDTH}" height="${HEIGHT}" fill="#fafafa" rx="4"/>`);
  lines.push(`<text x="${WIDTH / 2}" y="22" text-anchor="middle" font-size="14" font-weight="bold">${escapeXml(title)}</text>`);
  lines.push(`<defs><marker id="arrow" markerWidth="8" markerHeight="8" refX="4" refY="8" orient="auto"><path d="M0,0 L4,8 L8,0" fill="#d32f2f"/></marker></defs>`);

  // ── Profile ──
  lines.push(`<line x1="${xScale(0) - 10}" y1="${PROFILE_MID}" x2="${xScale(length) + 10}" y2="${PROFILE_MID}" stroke="#999" stroke-width="0.5" stroke-dasharray="8,3,2,3"/>`);
  for (const segment of shaft.getSegments()) {
    const x1 = xScale(segment.startNode.position);
    const x2 = xScale(segment.endNode.position);
    const r = radiusScale(segment.diameter);
    lines.push(`<rect x="${x1}" y="${PROFILE_MID - r}" width="${x2 - x1}" height="${2 * r}" fill="#cfd8dc" stroke="#455a64" stroke-width="1"/>`);
    lines.push(`<text x="${(x1 + x2) / 2}" y="${PROFILE_MID + 4}" text-anchor="middle" font-size="9" fill="#263238">Ø${fmt(segment.diameter)}</text>`);
  }

  for (const node of shaft.nodes) {
    const element = node.element;
    if (!element) continue;
    const x = xScale(node.position);
    const r = radiusScale(Math.max(node.diameterLeft, node.diameterRight));
    if (element.kind === "bearing") {
      const y = PROFILE_MID + r;
      lines.push(`<polygon points="${x},${y} ${x - 9},${y + 14} ${x + 9},${y + 14}" fill="none" stroke="#333" stroke-width="1.5"/>`);
      lines.push(`<text x="${x}" y="${y + 26}" text-anchor="middle" font-size="9">${escapeXml(element.name)}</text>`);
    } else {
      const half = element.kind === "spur_gear" ? radiusScale(element.pitchDiameter) : radiusScale(element.diameter);
      const w = Math.max(4, (element.width / length) * PLOT_WIDTH);
      lines.push(`<rect x="${x - w / 2}" y="${PROFILE_MID - half}" width="${w}" height="${2 * half}" fill="#ffe0b2" fill-opacity="0.6" stroke="#e65100" stroke-width="1"/>`);
      lines.push(`<text x="${x}" y="${PROFILE_MID - half - 4}" text-anchor="middle" font-size="9" fill="#e65100">${escapeXml(element.name)}</text>`);
    }
  }

  const { forces } = shaft.getAllLoads();
  for (const force of forces) {
    const x = xScale(force.position);
    const top = PROFILE_MID - PROFILE_HALF_HEIGHT - 30;
    lines.push(`<line x1="${x}" y1="${top}" x2="${x}" y2="${PROFILE_MID - PROFILE_HALF_HEIGHT - 14}" stroke="#d32f2f" stroke-width="2" marker-end="url(#arrow)"/>`);
    lines.push(`<text x="${x + 4}" y="${top + 6}" fill="#d32f2f" font-size="9">${fmt(force.magnitude)} N</text>`);
  }

  // ── Resultant bending moment ──
  drawPanel(lines, MOMENT_TOP, mRange, "Moment (N·m)");
  if (diagrams.x.length > 0) {
    lines.push(`<path d="${areaPath(diagrams.x, moments, xScale, mScale)}" fill="#1565c0" fill-opacity="0.3" stroke="#1565c0" stroke-width="1.5"/>`);
    let peak = 0;
    moments.forEach((m, i) => {
      if (m > (moments[peak] ?? 0)) peak = i;
    });
    const px = xScale(diagrams.x[peak] ?? 0);
    const py = mScale(moments[peak] ?? 0);
    lines.push(`<circle cx="${px}" cy="${py}" r="3" fill="#d32f2f"/>`);
    lines.push(`<text x="${px + 5}" y="${py - 5}" fill="#d32f2f" font-size="10">${(moments[peak] ?? 0).toFixed(2)} N·m</text>`);
  }

  // ── Torque ──
  drawPanel(lines, TORQUE_TOP, tRange, "Torque (N·m)");
  if (diagrams.x.length > 0) {
    lines.push(`<path d="${areaPath(diagrams.x, torques, xScale, tScale)}" fill="#7b1fa2" fill-opacity="0.25" stroke="#7b1fa2" stroke-width="1.5"/>`);
  }

  const reactionText = reactions
    .map((r) => `${escapeXml(r.name)}: ${Math.hypot(r.ry, r.rz).toFixed(1)} N`)
    .join(" | ");
  lines.push(`<text x="${WIDTH / 2}" y="${HEIGHT - 10}" text-anchor="middle" font-size="10" fill="#555">${reactionText}</text>`);

  lines.push(`</svg>`);
  return lines.join("\n");
}
