import { z } from "zod";

const CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";
const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_TIMEOUT_MS = 60000;

export interface TextGenerator {
  generate(prompt: string, system: string): Promise<string>;
}

export interface OpenAITextGeneratorOptions {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  maxTokens?: number;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

export class OpenAITextGenerator implements TextGenerator {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxTokens: number;

  constructor(options: OpenAITextGeneratorOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxTokens = options.maxTokens ?? 2000;
  }

  async generate(prompt: string, system: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(CHAT_COMPLETIONS_URL, {
        method: "POST",
        signal: controller.signal,
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: "system", content: system },
            { role: "user", content: prompt },
          ],
          temperature: 0.3,
          max_tokens: this.maxTokens,
        }),
      });

      if (!response.ok) {
        throw new Error(`Text generation request failed: HTTP ${response.status}`);
      }

      const parsed = ChatCompletionSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error("Text generation returned an unexpected response shape");
      }

      const content = parsed.data.choices[0].message.content;
      if (!content) {
        throw new Error("Text generation returned an empty response");
      }
      return content;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/** Returns null when no API key is configured. */
export function createTextGenerator(apiKey?: string | null): TextGenerator | null {
  const key = apiKey?.trim();
  if (!key) return null;
  return new OpenAITextGenerator({ apiKey: key });
}
