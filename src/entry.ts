#!/usr/bin/env node
/**
 * shaft-designer: terminal agent for shaft layout, statics and fatigue sizing.
 *
 * Runs a PI SDK agent session per prompt with the shaft tools registered next
 * to the built-in file and shell tools.
 */
import {
  ensureDirs,
  ensureApiKeyInEnv,
  apiKeyEnvNames,
  resolveModelAndAuth,
  resolveSessionFile,
  newSessionId,
  applySystemPromptToSession,
  extractAssistantText,
  extractToolCalls,
  DEFAULT_PROVIDER,
  DEFAULT_MODEL,
  AGENT_DIR,
  APP_NAME,
} from "./shared.js";
import readline from "node:readline/promises";
import { stdin, stdout } from "node:process";
import {
  createAgentSession,
  SessionManager,
  SettingsManager,
} from "@mariozechner/pi-coding-agent";
import { streamSimple } from "@mariozechner/pi-ai";
import { buildSystemPrompt, detectRuntime, loadContextFiles } from "./system-prompt.js";
import { createAllToolDefinitions } from "./tools/index.js";

const dim = (text: string) => `\x1b[2m${text}\x1b[0m`;
const red = (text: string) => `\x1b[31m${text}\x1b[0m`;

// ─── Custom tools ────────────────────────────────────────────────────────────

// Tool parameters are plain JSON schema; the SDK's tool type expects TypeBox schemas.
function buildCustomTools(): any[] {
  return createAllToolDefinitions();
}

// ─── REPL ────────────────────────────────────────────────────────────────────

type ThinkingMode = "off" | "on";

async function main() {
  ensureDirs();

  const provider = DEFAULT_PROVIDER;
  const modelId = DEFAULT_MODEL;
  const workspaceDir = process.cwd();
  let sessionId = newSessionId();
  let sessionFile = resolveSessionFile(sessionId);
  let thinking: ThinkingMode = "off";

  if (!ensureApiKeyInEnv(provider)) {
    console.error(red(`No API key found for ${provider}.`));
    console.error(`Set ${apiKeyEnvNames(provider)[0]} in the environment or in .env.`);
    process.exit(1);
  }

  const { model, authStorage, modelRegistry } = resolveModelAndAuth(provider, modelId);

  const runtime = detectRuntime(provider, modelId);
  const contextFiles = loadContextFiles(workspaceDir);
  const customTools = buildCustomTools();
  const toolNames = ["read", "bash", "edit", "write", ...createAllToolDefinitions().map((t) => t.name)];
  const contextLabel = contextFiles.length > 0 ? contextFiles.map((f) => f.path).join(", ") : "none";

  console.log(dim(`┌ ${APP_NAME}`));
  console.log(dim(`│ model: ${provider}/${modelId}`));
  console.log(dim(`│ workspace: ${workspaceDir}`));
  console.log(dim(`│ session: ${sessionId}`));
  console.log(dim(`│ context: ${contextLabel}`));
  console.log(dim(`│ tools: ${toolNames.join(", ")}`));
  console.log(dim(`└ /new /think /status /quit`));
  console.log();

  const rl = readline.createInterface({ input: stdin, output: stdout });

  while (true) {
    let input: string;
    try {
      input = await rl.question("\x1b[1m> \x1b[0m");
    } catch {
      break; // EOF
    }

    const trimmed = input.trim();
    if (!trimmed) continue;

    if (trimmed === "/quit" || trimmed === "/exit") break;
    if (trimmed === "/new") {
      sessionId = newSessionId();
      sessionFile = resolveSessionFile(sessionId);
      console.log(dim(`New session: ${sessionId}`) + "\n");
      continue;
    }
    if (trimmed === "/think" || trimmed.startsWith("/think ")) {
      const arg = trimmed.slice("/think".length).trim().toLowerCase();
      thinking = arg === "on" || arg === "off" ? arg : thinking === "off" ? "on" : "off";
      console.log(dim(`Thinking: ${thinking}`) + "\n");
      continue;
    }
    if (trimmed === "/status") {
      console.log(dim(`Model: ${provider}/${modelId}`));
      console.log(dim(`Session: ${sessionId}`));
      console.log(dim(`Thinking: ${thinking}`));
      console.log(dim(`Context files: ${contextLabel}`) + "\n");
      continue;
    }

    const startTime = Date.now();
    try {
      const { session } = await createAgentSession({
        cwd: workspaceDir,
        agentDir: AGENT_DIR,
        authStorage,
        modelRegistry,
        model,
        thinkingLevel: thinking === "on" ? "medium" : "off",
        customTools,
        sessionManager: SessionManager.open(sessionFile),
        settingsManager: SettingsManager.create(workspaceDir, AGENT_DIR),
      });

      applySystemPromptToSession(
        session,
        buildSystemPrompt({ workspaceDir, runtime, toolNames, contextFiles, thinkingLevel: thinking }),
      );
      session.agent.streamFn = streamSimple;

      try {
        await session.prompt(trimmed);

        const agentError = session.agent.state.error;
        if (agentError) console.error(red(`Agent error: ${agentError}`));

        const toolCalls = extractToolCalls(session.messages);
        if (toolCalls.length > 0) console.log(dim(`[tools: ${toolCalls.join(", ")}]`));

        const text = session.getLastAssistantText() ?? extractAssistantText(session.messages);
        if (text) console.log(text);

        console.log(dim(`(${((Date.now() - startTime) / 1000).toFixed(1)}s)`) + "\n");
      } finally {
        session.dispose();
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      console.error(red(`Error: ${error.message}`));
      if (error.cause) console.error(dim(String(error.cause)));
      console.log();
    }
  }

  rl.close();
  console.log(dim("Bye."));
  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
