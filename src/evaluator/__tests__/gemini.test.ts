import { describe, it, expect, beforeEach, vi } from "vitest";

const { generateContent, GoogleGenAI } = vi.hoisted(() => {
  const generateContent = vi.fn();
  const GoogleGenAI = vi.fn(function () {
    return { models: { generateContent } };
  });
  return { generateContent, GoogleGenAI };
});

vi.mock("@google/genai", () => ({ GoogleGenAI }));

import { createGeminiGenerator } from "../gemini.js";

describe("createGeminiGenerator", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("sends only the model and the prompt as contents", async () => {
    generateContent.mockResolvedValue({ text: "Overall Rating: 9/10" });
    const generate = createGeminiGenerator("test-key");

    const text = await generate({ model: "gemini-2.5-flash", prompt: "Evaluate this" });

    expect(text).toBe("Overall Rating: 9/10");
    expect(generateContent).toHaveBeenCalledWith({
      model: "gemini-2.5-flash",
      contents: "Evaluate this",
    });
  });

  it("creates the client lazily, once, with the api key", async () => {
    generateContent.mockResolvedValue({ text: "ok" });
    const generate = createGeminiGenerator("test-key");
    expect(GoogleGenAI).not.toHaveBeenCalled();

    await generate({ model: "gemini-2.5-flash", prompt: "a" });
    await generate({ model: "gemini-2.5-flash", prompt: "b" });

    expect(GoogleGenAI).toHaveBeenCalledTimes(1);
    expect(GoogleGenAI).toHaveBeenCalledWith({ apiKey: "test-key" });
  });

  it("rejects a response without text, naming the finish reason", async () => {
    generateContent.mockResolvedValue({ text: undefined, candidates: [{ finishReason: "MAX_TOKENS" }] });
    const generate = createGeminiGenerator("test-key");

    await expect(generate({ model: "gemini-2.5-pro", prompt: "p" })).rejects.toThrow(
      "Empty response from gemini-2.5-pro (finish reason: MAX_TOKENS)",
    );
  });

  it("rejects a response with no candidates", async () => {
    generateContent.mockResolvedValue({ candidates: [] });
    const generate = createGeminiGenerator("test-key");

    await expect(generate({ model: "gemini-2.5-flash", prompt: "p" })).rejects.toThrow(
      "Empty response from gemini-2.5-flash",
    );
  });

  it("rejects whitespace-only text", async () => {
    generateContent.mockResolvedValue({ text: "  \n " });
    const generate = createGeminiGenerator("test-key");

    await expect(generate({ model: "gemini-2.5-flash", prompt: "p" })).rejects.toThrow("Empty response");
  });

  it("lets service failures reject", async () => {
    generateContent.mockRejectedValue(new Error("API key not valid"));
    const generate = createGeminiGenerator("test-key");

    await expect(generate({ model: "gemini-2.5-flash", prompt: "p" })).rejects.toThrow("API key not valid");
  });
});
