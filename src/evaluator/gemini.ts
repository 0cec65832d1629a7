import { GoogleGenAI } from "@google/genai";

export interface GenerateRequest {
  model: string;
  prompt: string;
}

/** Opaque text-in/text-out model call. Rejects on any service failure. */
export type TextGenerator = (request: GenerateRequest) => Promise<string>;

function finishReason(response: object): string | undefined {
  if (!("candidates" in response) || !Array.isArray(response.candidates)) return undefined;
  const first: unknown = response.candidates[0];
  if (typeof first === "object" && first !== null && "finishReason" in first && typeof first.finishReason === "string") {
    return first.finishReason;
  }
  return undefined;
}

/** Reply text; a response without any (token cap, safety block, no candidates) is a failure. */
function extractText(response: unknown, model: string): string {
  if (typeof response !== "object" || response === null) {
    throw new Error(`Malformed response from ${model}`);
  }
  if ("text" in response && typeof response.text === "string" && response.text.trim().length > 0) {
    return response.text;
  }
  const reason = finishReason(response);
  throw new Error(reason ? `Empty response from ${model} (finish reason: ${reason})` : `Empty response from ${model}`);
}

/**
 * Build a {@link TextGenerator} backed by the Gemini API.
 * The client is created lazily on the first call.
 */
export function createGeminiGenerator(apiKey: string): TextGenerator {
  let genAI: GoogleGenAI | null = null;

  function getGenAI(): GoogleGenAI {
    if (!genAI) {
      genAI = new GoogleGenAI({ apiKey });
    }
    return genAI;
  }

  return async ({ model, prompt }) => {
    const response = await getGenAI().models.generateContent({
      model,
      contents: prompt,
    });
    return extractText(response, model);
  };
}
