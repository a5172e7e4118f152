import { Type, type Static } from "@sinclair/typebox";
import { Ajv } from "ajv";
import { DEFAULT_LLM_BASE_URL, DEFAULT_LLM_MODEL } from "./llm.js";
import { resolveRecipeDbPath } from "./recipe-store.js";
import type { ExtractionMethod } from "./types.js";
import { DEFAULT_USDA_BASE_URL } from "./usda.js";

// ── Plugin config schema ────────────────────────────────────────────────────

export const MealAnalyzerConfigSchema = Type.Object(
  {
    recipeDbPath: Type.Optional(Type.String({ minLength: 1 })),
    extractionMethod: Type.Optional(
      Type.Union([Type.Literal("ner"), Type.Literal("llm"), Type.Literal("hybrid")]),
    ),
    usda: Type.Optional(
      Type.Object(
        {
          apiKey: Type.Optional(Type.String()),
          baseUrl: Type.Optional(Type.String({ minLength: 1 })),
          timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
        },
        { additionalProperties: false },
      ),
    ),
    llm: Type.Optional(
      Type.Object(
        {
          baseUrl: Type.Optional(Type.String({ minLength: 1 })),
          apiKey: Type.Optional(Type.String()),
          model: Type.Optional(Type.String({ minLength: 1 })),
          timeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
        },
        { additionalProperties: false },
      ),
    ),
  },
  { additionalProperties: false },
);

export type MealAnalyzerPluginConfig = Static<typeof MealAnalyzerConfigSchema>;

export type MealAnalyzerConfig = {
  recipeDbPath: string;
  extractionMethod: ExtractionMethod;
  usda: { apiKey: string | undefined; baseUrl: string; timeoutMs: number };
  llm: { baseUrl: string; apiKey: string | undefined; model: string; timeoutMs: number };
};

const validateConfig = new Ajv({ allErrors: true, strict: false }).compile<MealAnalyzerPluginConfig>(
  MealAnalyzerConfigSchema,
);

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  return env[key]?.trim() || undefined;
}

/**
 * Validate the host-supplied plugin config and fill the gaps from the
 * environment and defaults.
 */
export function resolveConfig(
  pluginConfig: Record<string, unknown> = {},
  env: NodeJS.ProcessEnv = process.env,
): MealAnalyzerConfig {
  if (!validateConfig(pluginConfig)) {
    const msg =
      validateConfig.errors
        ?.map((e) => `${e.instancePath || "<root>"} ${e.message || "invalid"}`)
        .join("; ") ?? "invalid";
    throw new Error(`meal-analyzer config failed validation: ${msg}`);
  }

  const cfg = pluginConfig;
  return {
    recipeDbPath: cfg.recipeDbPath ?? resolveRecipeDbPath(env),
    extractionMethod: cfg.extractionMethod ?? "hybrid",
    usda: {
      apiKey: cfg.usda?.apiKey?.trim() || envValue(env, "USDA_API_KEY"),
      baseUrl: cfg.usda?.baseUrl ?? DEFAULT_USDA_BASE_URL,
      timeoutMs: cfg.usda?.timeoutMs ?? 10_000,
    },
    llm: {
      baseUrl: cfg.llm?.baseUrl ?? envValue(env, "MEAL_ANALYZER_LLM_BASE_URL") ?? DEFAULT_LLM_BASE_URL,
      apiKey: cfg.llm?.apiKey?.trim() || envValue(env, "OPENAI_API_KEY"),
      model: cfg.llm?.model ?? envValue(env, "MEAL_ANALYZER_LLM_MODEL") ?? DEFAULT_LLM_MODEL,
      timeoutMs: cfg.llm?.timeoutMs ?? 30_000,
    },
  };
}
