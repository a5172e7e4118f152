import OpenAI from "openai";

/** Prompt in, free text out. Implementations may throw; callers degrade. */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export const DEFAULT_LLM_BASE_URL = "http://localhost:11434/v1";
export const DEFAULT_LLM_MODEL = "mistral";

export type OpenAiTextGeneratorOptions = {
  baseUrl?: string;
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
};

/**
 * Chat-completion generator for any OpenAI-compatible endpoint. The defaults
 * point at a local Ollama server.
 */
export class OpenAiTextGenerator implements TextGenerator {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAiTextGeneratorOptions = {}) {
    this.model = options.model ?? DEFAULT_LLM_MODEL;
    this.client = new OpenAI({
      baseURL: options.baseUrl ?? DEFAULT_LLM_BASE_URL,
      // Local servers ignore the key, but the client requires one.
      apiKey: options.apiKey ?? "ollama",
      timeout: options.timeoutMs ?? 30_000,
      maxRetries: 0,
    });
  }

  async generate(prompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      temperature: 0,
    });
    return completion.choices[0]?.message?.content?.trim() ?? "";
  }
}

// ── Lenient JSON helpers ────────────────────────────────────────────────────

export function stripCodeFences(s: string): string {
  const trimmed = s.trim();
  const m = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  if (m) {
    return (m[1] ?? "").trim();
  }
  return trimmed;
}

function tryParseArray(candidate: string): unknown[] | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Pull the first JSON array out of model output that may carry prose around
 * it: first the widest bracketed span, then each line that holds one.
 */
export function extractJsonArray(text: string): unknown[] | null {
  const cleaned = stripCodeFences(text);

  const span = cleaned.match(/\[[\s\S]*\]/);
  if (span) {
    const arr = tryParseArray(span[0]);
    if (arr) {
      return arr;
    }
  }

  for (const line of cleaned.split("\n")) {
    const m = line.match(/\[.*\]/);
    if (!m) {
      continue;
    }
    const arr = tryParseArray(m[0]);
    if (arr) {
      return arr;
    }
  }
  return null;
}
