/**
 * System prompt for the shaft design agent: persona, tool summaries, working
 * conventions, project context files and runtime details.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

// ─── Context file loading ────────────────────────────────────────────────────

const CONTEXT_FILE_NAMES = [
  "CONTEXT.md",
  "INSTRUCTIONS.md",
  "INSTRUCTIONS.txt",
  ".shaft-designer/CONTEXT.md",
];

export type ContextFile = { path: string; content: string };

export function loadContextFiles(workspaceDir: string): ContextFile[] {
  const files: ContextFile[] = [];
  for (const name of CONTEXT_FILE_NAMES) {
    let content: string;
    try {
      content = fs.readFileSync(path.join(workspaceDir, name), "utf-8").trim();
    } catch {
      continue; // not present
    }
    if (content) files.push({ path: name, content });
  }
  return files;
}

// ─── Runtime info ────────────────────────────────────────────────────────────

export type RuntimeInfo = {
  host: string;
  os: string;
  arch: string;
  node: string;
  model: string;
  provider: string;
};

export function detectRuntime(provider: string, modelId: string): RuntimeInfo {
  return {
    host: os.hostname(),
    os: process.platform,
    arch: process.arch,
    node: process.version,
    model: modelId,
    provider,
  };
}

// ─── Tool summaries ──────────────────────────────────────────────────────────

const TOOL_SUMMARIES: Record<string, string> = {
  read: "Read file contents",
  write: "Create or overwrite files",
  edit: "Make precise edits to files",
  bash: "Run shell commands",
  shaft_analysis:
    "Bearing reactions, shear/moment/torque diagrams and per-segment fatigue check of a stepped shaft (SVG output)",
  shaft_optimize: "Resize start diameter and shoulders to the smallest standard diameters meeting the safety factor",
  shaft_endurance_limit: "Marin-corrected endurance limit Se with every factor",
};

const DESIGN_CONVENTIONS = [
  "## Shaft Conventions",
  "- Positions are mm from the left end; diameters mm; forces N; torques N·m; strengths MPa.",
  "- The shaft starts at start_diameter_mm. A shoulder at position p sets the diameter from p to the next shoulder.",
  "- Exactly two bearings support the shaft. Bending is resolved in the Y (vertical) and Z (horizontal) planes; force angles are measured from +Y toward +Z.",
  "- On a rotating shaft every transverse load gives fully reversed bending; steady torque is mean, fluctuating torque is alternating.",
  "- Gears and pulleys with power_kw and rpm generate their own tangential (and, for spur gears, radial) force and torque. Mark driven elements role=output.",
  "- Stress concentration at fillets, keyways and ring grooves is given as kf_bending / kf_torsion on the shoulder or as a stress_raiser feature. State the chart values you assume.",
  "- Typical workflow: shaft_analysis on the initial layout, shaft_optimize to size it, then shaft_analysis again to confirm PASS.",
];

// ─── System prompt builder ───────────────────────────────────────────────────

export function buildSystemPrompt(params: {
  workspaceDir: string;
  runtime: RuntimeInfo;
  toolNames: string[];
  contextFiles: ContextFile[];
  thinkingLevel?: string;
  now?: Date;
}): string {
  const { workspaceDir, runtime, toolNames, contextFiles, thinkingLevel } = params;

  const toolLines = toolNames.map((name) => {
    const summary = TOOL_SUMMARIES[name];
    return summary ? `- ${name}: ${summary}` : `- ${name}`;
  });

  const userTimezone = Intl.DateTimeFormat().resolvedOptions().timeZone;
  const currentTime = (params.now ?? new Date()).toLocaleString("en-US", {
    timeZone: userTimezone,
    dateStyle: "full",
    timeStyle: "long",
  });

  const lines = [
    "You are shaft-designer, an assistant for mechanical design of rotating power-transmission shafts.",
    "You lay out stepped shafts with bearings, gears and pulleys, solve their statics, and size them for fatigue (Marin-corrected endurance limit, DE-ASME elliptic criterion).",
    "Use the shaft tools for every number you report; do not estimate reactions, moments or diameters by hand.",
    "",
    "## Tooling",
    "Tool names are case-sensitive. Call tools exactly as listed.",
    toolLines.join("\n"),
    "",
    ...DESIGN_CONVENTIONS,
    "",
    "## Tool Call Style",
    "Do not narrate routine tool calls. Summarize results with the governing segment, its safety factor and the recommended diameters.",
    "",
    "## Workspace",
    `Your working directory is: ${workspaceDir}`,
    "Save SVG diagrams inside this directory unless the user asks otherwise.",
    "",
    "## Current Date & Time",
    `Time zone: ${userTimezone}`,
    `Current time: ${currentTime}`,
    "",
  ];

  if (contextFiles.length > 0) {
    lines.push("# Project Context", "", "The following project context files have been loaded:", "");
    for (const file of contextFiles) {
      lines.push(`## ${file.path}`, "", file.content, "");
    }
  }

  const runtimeParts = [
    `host=${runtime.host}`,
    `os=${runtime.os} (${runtime.arch})`,
    `node=${runtime.node}`,
    `model=${runtime.provider}/${runtime.model}`,
    `thinking=${thinkingLevel ?? "off"}`,
  ];
  lines.push("## Runtime", `Runtime: ${runtimeParts.join(" | ")}`);

  return lines.join("\n");
}
