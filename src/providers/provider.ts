// ── Unified LLM provider ───────────────────────────────────────────

const OPENROUTER_BASE = "https://openrouter.ai/api/v1";
const OLLAMA_BASE = "http://localhost:11434";

export type ProviderKind = "openrouter" | "ollama" | "openai-compat";

export const PROVIDER_KINDS: readonly ProviderKind[] = ["openrouter", "ollama", "openai-compat"];

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface CompletionResponse {
  content: string;
  model: string;
}

export interface ProviderOpts {
  baseUrl?: string;
  apiKey?: string;
  /** AbortSignal to cancel the request (e.g. on Ctrl-C) */
  signal?: AbortSignal;
}

const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 800;

export async function complete(
  provider: ProviderKind,
  req: CompletionRequest,
  opts?: ProviderOpts,
): Promise<CompletionResponse> {
  switch (provider) {
    case "openrouter":
      return completeOpenRouter(req, opts);
    case "openai-compat":
      return completeOpenAICompat(req, opts);
    case "ollama":
      return completeOllama(req, opts);
    default:
      throw new Error(`Unknown provider: ${String(provider)}`);
  }
}

// ── OpenRouter ──────────────────────────────────────────────────────

async function completeOpenRouter(
  req: CompletionRequest,
  opts?: ProviderOpts,
): Promise<CompletionResponse> {
  const apiKey = opts?.apiKey || process.env.OPENROUTER_API_KEY;
  if (!apiKey) throw new Error("OPENROUTER_API_KEY not set");

  const baseUrl = opts?.baseUrl || process.env.OPENROUTER_BASE_URL || OPENROUTER_BASE;

  const res = await fetch(`${baseUrl}/chat/completions`, {
    method: "POST",
    signal: opts?.signal,
    headers: {
      Authorization: `Bearer ${apiKey}`,
      "Content-Type": "application/json",
      "X-Title": "match-cut",
    },
    body: JSON.stringify({
      model: req.model,
      messages: req.messages,
      temperature: req.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: req.maxTokens ?? DEFAULT_MAX_TOKENS,
    }),
  });

  if (!res.ok) {
    const text = await res.text();
    throw new Error(`OpenRouter ${res.status}: ${text}`);
  }

  return { content: openAIContent(await res.json()), model: req.model };
}

// ── OpenAI-compatible (llama.cpp, vLLM, etc.) ──────────────────────

async function completeOpenAICompat(
  req: CompletionRequest,
  opts?: ProviderOpts,
): Promise<CompletionResponse> {
  if (!opts?.baseUrl) throw new Error("openai-compat provider requires a baseUrl");

  const baseUrl = opts.baseUrl;

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };
  if (opts.apiKey) {
    headers.Authorization = `Bearer ${opts.apiKey}`;
  }

  // Build body, optionally omitting temperature
  function buildBody(includeTemp: boolean) {
    const body: Record<string, unknown> = {
      model: req.model,
      messages: req.messages,
      max_tokens: req.maxTokens ?? DEFAULT_MAX_TOKENS,
    };
    if (includeTemp) {
      body.temperature = req.temperature ?? DEFAULT_TEMPERATURE;
    }
    return body;
  }

  let res = await fetch(`${baseUrl}/chat/completions`, {
    method: "POST",
    signal: opts.signal,
    headers,
    body: JSON.stringify(buildBody(true)),
  });

  // Some servers pin temperature; retry once without it, but only when
  // the temperature was our default rather than an explicit setting.
  if (!res.ok) {
    const text = await res.text();
    const isTemperatureError =
      text.toLowerCase().includes("temperature") && req.temperature === undefined;
    if (!isTemperatureError) {
      throw new Error(`OpenAI-compat ${res.status}: ${text}`);
    }
    res = await fetch(`${baseUrl}/chat/completions`, {
      method: "POST",
      signal: opts.signal,
      headers,
      body: JSON.stringify(buildBody(false)),
    });
    if (!res.ok) {
      const retryText = await res.text();
      throw new Error(`OpenAI-compat ${res.status}: ${retryText}`);
    }
  }

  return { content: openAIContent(await res.json()), model: req.model };
}

// ── Ollama ──────────────────────────────────────────────────────────

async function completeOllama(
  req: CompletionRequest,
  opts?: ProviderOpts,
): Promise<CompletionResponse> {
  const baseUrl = opts?.baseUrl || process.env.OLLAMA_BASE_URL || OLLAMA_BASE;

  const res = await fetch(`${baseUrl}/api/chat`, {
    method: "POST",
    signal: opts?.signal,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      model: req.model,
      messages: req.messages,
      stream: false,
      options: {
        temperature: req.temperature ?? DEFAULT_TEMPERATURE,
        num_predict: req.maxTokens ?? DEFAULT_MAX_TOKENS,
      },
    }),
  });

  if (!res.ok) {
    const text = await res.text();
    throw new Error(`Ollama ${res.status}: ${text}`);
  }

  const json: unknown = await res.json();
  const message = isRecord(json) ? json.message : undefined;
  const content = isRecord(message) && typeof message.content === "string" ? message.content : "";
  return { content, model: req.model };
}

// ── Response helpers ────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function openAIContent(json: unknown): string {
  if (!isRecord(json) || !Array.isArray(json.choices)) return "";
  const first: unknown = json.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return "";
  return typeof first.message.content === "string" ? first.message.content : "";
}
