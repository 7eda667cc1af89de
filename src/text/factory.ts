import type { RunConfig } from "../core/types.js";
import type { TextGenerationFailure } from "../core/errors.js";
import type { RandomSource } from "../core/random.js";
import { AiTextProvider } from "./ai-provider.js";
import { ProceduralTextProvider } from "./procedural.js";
import { FallbackTextProvider } from "./provider.js";
import type { TextProvider } from "./provider.js";

export interface TextProviderSetup {
  random: RandomSource;
  signal?: AbortSignal;
  onFallback?: (failure: TextGenerationFailure) => void;
}

/**
 * Procedural text on its own, or AI text backed by procedural text when
 * the run asks for AI. Chosen once per run.
 */
export function createTextProvider(run: RunConfig, setup: TextProviderSetup): TextProvider {
  const procedural = new ProceduralTextProvider({ chars: run.chars, random: setup.random });
  if (run.textSource !== "ai" || !run.ai) return procedural;

  const ai = new AiTextProvider({
    provider: run.ai.provider,
    model: run.ai.model,
    baseUrl: run.ai.baseUrl ?? undefined,
    apiKey: run.ai.apiKey ?? undefined,
    temperature: run.ai.temperature,
    maxTokens: run.ai.maxTokens,
    attempts: run.ai.attempts,
    chars: run.chars,
    signal: setup.signal,
  });
  return new FallbackTextProvider(ai, procedural, { onFallback: setup.onFallback });
}
