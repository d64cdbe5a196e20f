/**
 * Barrel file: exports all tool definitions for shaft-designer.
 *
 * Each tool follows the pattern: createXxxToolDefinition() → ToolDefinition
 */

// ─── Shaft ──────────────────────────────────────────────────────────────────
import { createShaftAnalysisToolDefinition } from "./shaft/shaft-analysis.js";
import { createShaftOptimizeToolDefinition } from "./shaft/shaft-optimize.js";
import { createEnduranceLimitToolDefinition } from "./shaft/endurance-limit.js";

// ─── Re-export all individual creators ──────────────────────────────────────
export {
  createShaftAnalysisToolDefinition,
  createShaftOptimizeToolDefinition,
  createEnduranceLimitToolDefinition,
};

// ─── Convenience: build all tools at once ───────────────────────────────────

export function createAllToolDefinitions() {
  return [
    createShaftAnalysisToolDefinition(),
    createShaftOptimizeToolDefinition(),
    createEnduranceLimitToolDefinition(),
  ];
}
