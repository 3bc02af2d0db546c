import { GoogleGenerativeAI } from "@google/generative-ai";
import type { Config } from "../config";
import { ExternalServiceUnavailableError } from "../domain/errors";

export interface LlmClient {
  readonly configured: boolean;
  chat(system: string, user: string): Promise<string>;
}

export function createGeminiClient(settings: Config["gemini"]): LlmClient {
  const { apiKey } = settings;
  if (!apiKey) {
    return {
      configured: false,
      async chat() {
        throw new ExternalServiceUnavailableError("gemini", "GEMINI_API_KEY environment variable not set");
      }
    };
  }

  const model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: settings.model });

  return {
    configured: true,
    async chat(system, user) {
      try {
        const result = await model.generateContent(`${system}\n\nUser message: ${user}`);
        return result.response.text();
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ExternalServiceUnavailableError("gemini", `Gemini chat failed: ${reason}`);
      }
    }
  };
}
