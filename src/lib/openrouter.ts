import env from '../config/env';
import { HttpError } from '../modules/observability-ops/http-error';

type ChatRole = 'system' | 'user' | 'assistant';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatCompletionUsage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
} | null;

export type ChatCompletionInput = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
};

export type ChatCompletionResult = {
  id: string;
  model: string;
  content: string;
  usage: ChatCompletionUsage;
  latencyMs: number;
};

type OpenRouterUsagePayload = {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
} | null;

type OpenRouterResponse = {
  id?: string;
  model?: string;
  choices?: Array<{
    message?: {
      content?: string;
    };
  }>;
  usage?: OpenRouterUsagePayload;
};

type CreateClientOptions = {
  apiKey?: string | null;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  now?: () => number;
  defaultMaxTokens?: number;
};

const DEFAULT_MAX_TOKENS = 2000;

const toHttpError = (status: number, message: string, details?: unknown) =>
  new HttpError(status, message, 'INFERENCE_PROVIDER_FAILURE', details);

const finiteOrUndefined = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined;

const normalizeUsage = (payload: OpenRouterUsagePayload): ChatCompletionUsage => {
  if (!payload || typeof payload !== 'object') {
    return null;
  }

  const promptTokens = finiteOrUndefined(payload.prompt_tokens);
  const completionTokens = finiteOrUndefined(payload.completion_tokens);
  const totalTokens =
    finiteOrUndefined(payload.total_tokens) ??
    (promptTokens !== undefined && completionTokens !== undefined ? promptTokens + completionTokens : undefined);

  if (promptTokens === undefined && completionTokens === undefined && totalTokens === undefined) {
    return null;
  }

  return { promptTokens, completionTokens, totalTokens };
};

export type OpenRouterChatClient = {
  createChatCompletion(input: ChatCompletionInput): Promise<ChatCompletionResult>;
};

export const createOpenRouterClient = (options: CreateClientOptions = {}): OpenRouterChatClient => {
  const apiKey = options.apiKey === undefined ? env.OPENROUTER_API_KEY ?? null : options.apiKey;
  const baseUrl = (options.baseUrl ?? env.OPENROUTER_BASE_URL).replace(/\/+$/, '');
  const timeoutMs = options.timeoutMs ?? env.INFERENCE_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? globalThis.fetch?.bind(globalThis);
  const now = options.now ?? (() => Date.now());
  const maxTokensDefault = options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;

  if (!fetchImpl) {
    throw new Error('Fetch implementation is required for OpenRouter client');
  }

  return {
    async createChatCompletion(input: ChatCompletionInput): Promise<ChatCompletionResult> {
      if (!apiKey || apiKey.trim().length === 0) {
        throw new HttpError(503, 'OpenRouter credentials are not configured.', 'INFERENCE_NOT_CONFIGURED');
      }

      const startedAt = now();
      let response: Response;
      try {
        response = await fetchImpl(`${baseUrl}/chat/completions`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${apiKey}`
          },
          body: JSON.stringify({
            model: input.model,
            messages: input.messages,
            temperature: input.temperature,
            max_tokens: input.maxTokens ?? maxTokensDefault
          }),
          signal: AbortSignal.timeout(timeoutMs)
        });
      } catch (error) {
        if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
          throw new HttpError(504, `Inference request timed out after ${timeoutMs}ms.`, 'INFERENCE_TIMEOUT');
        }
        throw toHttpError(502, `Inference request failed: ${error instanceof Error ? error.message : String(error)}`);
      }
      const latencyMs = Math.max(0, now() - startedAt);

      if (!response.ok) {
        let errorDetails: unknown = null;
        try {
          errorDetails = await response.json();
        } catch {
          errorDetails = { status: response.status };
        }
        throw toHttpError(502, `OpenRouter request failed with status ${response.status}.`, {
          status: response.status,
          response: errorDetails
        });
      }

      const payload = (await response.json()) as OpenRouterResponse;
      const choice = payload?.choices?.[0]?.message?.content;

      if (!choice || typeof choice !== 'string') {
        throw toHttpError(502, 'OpenRouter returned an unexpected response format.', {
          payload
        });
      }

      return {
        id: payload.id ?? 'openrouter-completion',
        model: payload.model ?? input.model,
        content: choice,
        usage: normalizeUsage(payload.usage ?? null),
        latencyMs
      };
    }
  };
};
