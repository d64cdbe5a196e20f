/**
 * Setup shared by the CLI: environment, state directories, provider auth,
 * model resolution and agent-session helpers.
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  AuthStorage,
  ModelRegistry,
  type createAgentSession,
} from "@mariozechner/pi-coding-agent";
import type { Api, Model } from "@mariozechner/pi-ai";
import type { AgentMessage } from "@mariozechner/pi-agent-core";

// ─── .env loading ────────────────────────────────────────────────────────────

/** Parses KEY=VALUE lines; blank lines, comments and lines without `=` are skipped. */
export function parseDotEnv(content: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    let value = trimmed.slice(eqIdx + 1).trim();
    if (value.length >= 2 && /^(["']).*\1$/.test(value)) value = value.slice(1, -1);
    if (key) vars[key] = value;
  }
  return vars;
}

/** Loads `.env` from `dir`; variables already set in the environment win. */
export function loadDotEnv(dir = process.cwd()) {
  let content: string;
  try {
    content = fs.readFileSync(path.join(dir, ".env"), "utf-8");
  } catch {
    return; // no .env
  }
  for (const [key, value] of Object.entries(parseDotEnv(content))) {
    if (!(key in process.env)) process.env[key] = value;
  }
}

// Module-level constants below read the environment.
loadDotEnv();

// ─── Configuration ───────────────────────────────────────────────────────────

export const APP_NAME = "shaft-designer";
export const APP_HOME = path.join(os.homedir(), `.${APP_NAME}`);
export const AGENT_ID = process.env.SHAFT_DESIGNER_AGENT ?? "main";
export const AGENT_DIR = path.join(APP_HOME, "agents", AGENT_ID, "agent");
export const MODELS_JSON = path.join(AGENT_DIR, "models.json");
export const AUTH_PROFILES_JSON = path.join(AGENT_DIR, "auth-profiles.json");
export const SESSION_DIR = path.join(APP_HOME, "state", "sessions");

export const DEFAULT_PROVIDER = process.env.SHAFT_DESIGNER_PROVIDER ?? "anthropic";
export const DEFAULT_MODEL = process.env.SHAFT_DESIGNER_MODEL ?? "claude-sonnet-4-20250514";

export function ensureDirs() {
  for (const dir of [APP_HOME, AGENT_DIR, SESSION_DIR]) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

// ─── Auth ────────────────────────────────────────────────────────────────────

type AuthProfile = { type: string; provider: string; token?: string };
type AuthProfiles = {
  profiles?: Record<string, AuthProfile>;
  lastGood?: Record<string, string>;
};

/** Token for `provider`: the last profile that worked, else the first that matches. */
export function findProfileToken(data: AuthProfiles, provider: string): string | undefined {
  const profiles = data.profiles ?? {};
  const lastGoodKey = data.lastGood?.[provider];
  const lastGood = lastGoodKey ? profiles[lastGoodKey] : undefined;
  if (lastGood?.token) return lastGood.token;

  return Object.values(profiles).find((p) => p.provider === provider && p.token)?.token;
}

function loadApiKeyFromProfiles(provider: string): string | undefined {
  try {
    const data: AuthProfiles = JSON.parse(fs.readFileSync(AUTH_PROFILES_JSON, "utf-8"));
    return findProfileToken(data, provider);
  } catch {
    return undefined; // missing or unreadable
  }
}

export const ENV_KEY_MAP: Record<string, string[]> = {
  anthropic: ["ANTHROPIC_API_KEY"],
  openai: ["OPENAI_API_KEY"],
  google: ["GOOGLE_API_KEY", "GEMINI_API_KEY"],
  groq: ["GROQ_API_KEY"],
  xai: ["XAI_API_KEY"],
  mistral: ["MISTRAL_API_KEY"],
  openrouter: ["OPENROUTER_API_KEY"],
  cerebras: ["CEREBRAS_API_KEY"],
};

export function apiKeyEnvNames(provider: string): string[] {
  return ENV_KEY_MAP[provider] ?? [`${provider.toUpperCase()}_API_KEY`];
}

export function ensureApiKeyInEnv(provider: string): boolean {
  const envKeys = apiKeyEnvNames(provider);
  if (envKeys.some((key) => process.env[key])) return true;

  const apiKey = loadApiKeyFromProfiles(provider);
  const primary = envKeys[0];
  if (apiKey && primary) {
    process.env[primary] = apiKey;
    return true;
  }
  return false;
}

// ─── Model resolution ────────────────────────────────────────────────────────

const API_TYPES: Record<string, string> = {
  anthropic: "anthropic",
  openai: "openai-responses",
  google: "google",
  ollama: "ollama",
};

/** Model description for ids the registry does not know; OpenAI-compatible by default. */
function fallbackModel(provider: string, modelId: string): Model<Api> {
  return {
    id: modelId,
    name: modelId,
    api: API_TYPES[provider] ?? "openai",
    provider,
    input: ["text", "image"],
    reasoning: true,
    cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 },
    contextWindow: 200_000,
    maxTokens: 64_000,
  } as Model<Api>;
}

export function resolveModelAndAuth(provider: string, modelId: string) {
  const authStorage = new AuthStorage(path.join(AGENT_DIR, "auth.json"));
  const modelRegistry = new ModelRegistry(authStorage, MODELS_JSON);
  const model = modelRegistry.find(provider, modelId) ?? fallbackModel(provider, modelId);
  return { model, authStorage, modelRegistry };
}

// ─── Sessions ────────────────────────────────────────────────────────────────

export type AgentSession = Awaited<ReturnType<typeof createAgentSession>>["session"];

export function newSessionId(): string {
  return `shaft-${Date.now()}`;
}

export function resolveSessionFile(sessionId: string): string {
  return path.join(SESSION_DIR, `${sessionId}.json`);
}

/** Replaces the SDK's system prompt and keeps it from being rebuilt. */
export function applySystemPromptToSession(session: AgentSession, systemPrompt: string) {
  session.agent.setSystemPrompt(systemPrompt);
  const mutable = session as unknown as {
    _baseSystemPrompt?: string;
    _rebuildSystemPrompt?: (toolNames: string[]) => string;
  };
  mutable._baseSystemPrompt = systemPrompt;
  mutable._rebuildSystemPrompt = () => systemPrompt;
}

// ─── Transcript helpers ──────────────────────────────────────────────────────

/** The part of an agent message the helpers below read. */
export type TranscriptMessage = Pick<AgentMessage, "role"> & { content?: unknown };

function partField(part: unknown, field: "text" | "name", type: string): string | undefined {
  if (typeof part !== "object" || part === null) return undefined;
  if (!("type" in part) || part.type !== type || !(field in part)) return undefined;
  const value: unknown = Reflect.get(part, field);
  return typeof value === "string" ? value : undefined;
}

export function extractAssistantText(messages: readonly TranscriptMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const msg = messages[i];
    if (!msg || msg.role !== "assistant") continue;
    if (typeof msg.content === "string") return msg.content;
    if (Array.isArray(msg.content)) {
      const parts: unknown[] = msg.content;
      const text = parts.map((part) => partField(part, "text", "text") ?? "").join("");
      if (text) return text;
    }
  }
  return "";
}

export function extractToolCalls(messages: readonly TranscriptMessage[]): string[] {
  const toolCalls: string[] = [];
  for (const msg of messages) {
    if (msg.role !== "assistant" || !Array.isArray(msg.content)) continue;
    const parts: unknown[] = msg.content;
    for (const part of parts) {
      if (typeof part === "object" && part !== null && "type" in part && part.type === "toolCall") {
        toolCalls.push(partField(part, "name", "toolCall") ?? "unknown");
      }
    }
  }
  return toolCalls;
}
