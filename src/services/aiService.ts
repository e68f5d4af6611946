import { GoogleGenAI } from "@google/genai";
import { config } from "../config";
import type { GenerationRequest, TextGenerator } from "../models/types";

export class AIResponseValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AIResponseValidationError";
  }
}

/**
 * Single-shot text generation against Gemini with the given key.
 * Errors from the SDK are left untouched so the caller can read their
 * HTTP status and decide what happens to the key.
 */
export const generateText: TextGenerator = async (
  apiKey: string,
  { systemPrompt, prompt }: GenerationRequest,
) => {
  const ai = new GoogleGenAI({
    apiKey,
    httpOptions: { timeout: config.aiTimeoutMs },
  });

  const response = await ai.models.generateContent({
    model: config.geminiModel,
    contents: prompt,
    config: {
      systemInstruction: systemPrompt,
      temperature: config.aiTemperature,
      maxOutputTokens: config.aiMaxOutputTokens,
    },
  });

  const text = response.text?.trim() ?? "";
  if (!text) {
    throw new AIResponseValidationError("Empty response from AI");
  }

  return text;
};
