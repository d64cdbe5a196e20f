import { describe, expect, it } from "vitest";
import {
  apiKeyEnvNames,
  extractAssistantText,
  extractToolCalls,
  findProfileToken,
  parseDotEnv,
  type TranscriptMessage,
} from "../shared.js";
import { buildSystemPrompt, type RuntimeInfo } from "../system-prompt.js";

describe("parseDotEnv", () => {
  it("reads assignments and skips comments", () => {
    const content = [
      "# provider",
      "SHAFT_DESIGNER_PROVIDER=openai",
      "",
      "OPENAI_API_KEY = \"test-key\"",
      "not an assignment",
      "EMPTY=",
    ].join("\n");

    expect(parseDotEnv(content)).toEqual({
      SHAFT_DESIGNER_PROVIDER: "openai",
      OPENAI_API_KEY: "test-key",
      EMPTY: "",
    });
  });
});

describe("auth lookup", () => {
  it("prefers the last good profile", () => {
    const data = {
      profiles: {
        first: { type: "api_key", provider: "anthropic", token: "token-a" },
        second: { type: "api_key", provider: "anthropic", token: "token-b" },
      },
      lastGood: { anthropic: "second" },
    };
    expect(findProfileToken(data, "anthropic")).toBe("token-b");
    expect(findProfileToken({ profiles: data.profiles }, "anthropic")).toBe("token-a");
    expect(findProfileToken(data, "openai")).toBeUndefined();
  });

  it("derives environment variable names", () => {
    expect(apiKeyEnvNames("google")).toEqual(["GOOGLE_API_KEY", "GEMINI_API_KEY"]);
    expect(apiKeyEnvNames("acme")).toEqual(["ACME_API_KEY"]);
  });
});

describe("transcript helpers", () => {
  const messages: TranscriptMessage[] = [
    { role: "user", content: "size the shaft" },
    {
      role: "assistant",
      content: [
        { type: "text", text: "Running the analysis." },
        { type: "toolCall", id: "1", name: "shaft_analysis", arguments: {} },
      ],
    },
    { role: "toolResult", content: [{ type: "text", text: "{}" }] },
    {
      role: "assistant",
      content: [
        { type: "toolCall", id: "2", name: "shaft_optimize", arguments: {} },
        { type: "text", text: "Start diameter " },
        { type: "text", text: "30 mm." },
      ],
    },
  ];

  it("lists tool calls in order", () => {
    expect(extractToolCalls(messages)).toEqual(["shaft_analysis", "shaft_optimize"]);
  });

  it("returns the text of the last assistant message", () => {
    expect(extractAssistantText(messages)).toBe("Start diameter 30 mm.");
    expect(extractAssistantText([{ role: "user", content: "hi" }])).toBe("");
  });
});

describe("buildSystemPrompt", () => {
  const runtime: RuntimeInfo = {
    host: "bench",
    os: "linux",
    arch: "x64",
    node: "v20.0.0",
    model: "test-model",
    provider: "anthropic",
  };

  it("lists tools with their summaries", () => {
    const prompt = buildSystemPrompt({
      workspaceDir: "/work",
      runtime,
      toolNames: ["read", "shaft_optimize", "custom_tool"],
      contextFiles: [],
    });
    const lines = prompt.split("\n");

    expect(lines).toContain("- read: Read file contents");
    expect(lines).toContain(
      "- shaft_optimize: Resize start diameter and shoulders to the smallest standard diameters meeting the safety factor",
    );
    expect(lines).toContain("- custom_tool");
    expect(lines).toContain("Your working directory is: /work");
    expect(lines.at(-1)).toBe(
      "Runtime: host=bench | os=linux (x64) | node=v20.0.0 | model=anthropic/test-model | thinking=off",
    );
  });

  it("appends context files", () => {
    const prompt = buildSystemPrompt({
      workspaceDir: "/work",
      runtime,
      toolNames: [],
      contextFiles: [{ path: "CONTEXT.md", content: "Gearbox stage 2 output shaft." }],
      thinkingLevel: "on",
    });
    expect(prompt).toContain("## CONTEXT.md\n\nGearbox stage 2 output shaft.\n");
    expect(prompt.endsWith("thinking=on")).toBe(true);
  });
});
