import { describe, it, expect } from "vitest";
import { boundLogText, buildAnalysisPrompt, DEFAULT_QUERY } from "./analysis-prompt.js";

describe("boundLogText", () => {
  it("returns short logs unchanged", () => {
    expect(boundLogText("abc", 3)).toBe("abc");
  });

  it("keeps the head and a larger tail of long logs", () => {
    const text = "0123456789".repeat(2);

    expect(boundLogText(text, 10)).toBe(
      "012\n\n... [log truncated from 20 to 10 chars] ...\n\n3456789"
    );
  });
});

describe("buildAnalysisPrompt", () => {
  it("places the question before the logs", () => {
    const prompt = buildAnalysisPrompt("ERROR: disk full", "Which step failed?", 1_000);

    expect(prompt.endsWith("## Question\nWhich step failed?\n\n## Logs\nERROR: disk full\n")).toBe(true);
    expect(prompt.startsWith("You are an expert in Azure DevOps build and release pipelines.\n")).toBe(true);
  });

  it("falls back to the default question", () => {
    const prompt = buildAnalysisPrompt("log", "   ", 1_000);

    expect(prompt).toContain(`## Question\n${DEFAULT_QUERY}\n`);
  });

  it("bounds the log text", () => {
    const prompt = buildAnalysisPrompt("x".repeat(50), "Why?", 20);

    expect(prompt).toContain(`## Logs\n${"x".repeat(6)}\n\n... [log truncated from 50 to 20 chars] ...\n\n${"x".repeat(14)}\n`);
  });
});
