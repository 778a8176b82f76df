import { z } from "zod";
import type { Logger } from "../types/index.js";

export type ChatModelProvider = "openai" | "deepseek";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatModelClientOptions {
  provider?: ChatModelProvider;
  apiKey?: string | null;
  baseURL?: string;
  model?: string;
  requestTimeoutMs?: number;
  headers?: Record<string, string>;
  logger?: Logger;
}

export interface ChatCompletionOptions {
  temperature?: number;
  maxTokens?: number;
  responseFormat?: "json_object" | "text";
  signal?: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatCompletion {
  content: string;
  usage: TokenUsage;
}

interface ProviderDefaults {
  apiKeyEnv: string;
  baseUrlEnv: string;
  modelEnv: string;
  baseURL: string;
  model: string;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({ content: z.string().nullable().optional() })
          .optional(),
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

const PROVIDER_DEFAULTS: Record<ChatModelProvider, ProviderDefaults> = {
  openai: {
    apiKeyEnv: "OPENAI_API_KEY",
    baseUrlEnv: "OPENAI_BASE_URL",
    modelEnv: "OPENAI_MODEL",
    baseURL: "https://api.openai.com/v1",
    model: "gpt-4o-mini",
  },
  deepseek: {
    apiKeyEnv: "DEEPSEEK_API_KEY",
    baseUrlEnv: "DEEPSEEK_BASE_URL",
    modelEnv: "DEEPSEEK_MODEL",
    baseURL: "https://api.deepseek.com/v1",
    model: "deepseek-chat",
  },
};

const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export class ChatModelError extends Error {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly rateLimited: boolean
  ) {
    super(message);
    this.name = "ChatModelError";
  }
}

export class ChatModelClient {
  private readonly provider: ChatModelProvider;

  private readonly apiKey: string | null;

  private readonly endpoint: string;

  private readonly model: string;

  private readonly requestTimeoutMs: number;

  private readonly headers: Record<string, string>;

  private readonly logger: Logger;

  constructor(options?: ChatModelClientOptions) {
    this.provider = resolveProvider(options);
    const defaults = PROVIDER_DEFAULTS[this.provider];

    const resolvedApiKey =
      options?.apiKey ?? process.env[defaults.apiKeyEnv] ?? null;
    this.apiKey =
      typeof resolvedApiKey === "string" && resolvedApiKey.length > 0
        ? resolvedApiKey
        : null;

    const baseURL =
      options?.baseURL ?? process.env[defaults.baseUrlEnv] ?? defaults.baseURL;

    this.endpoint = `${stripTrailingSlash(baseURL)}/chat/completions`;

    this.model =
      options?.model ?? process.env[defaults.modelEnv] ?? defaults.model;

    this.requestTimeoutMs =
      typeof options?.requestTimeoutMs === "number"
        ? options.requestTimeoutMs
        : DEFAULT_REQUEST_TIMEOUT_MS;

    this.headers = {
      "Content-Type": "application/json",
      ...(options?.headers ?? {}),
    };

    this.logger = options?.logger ?? console;
    const headerKeys = Object.keys(options?.headers ?? {});
    this.logger.info("[ChatModelClient] Initialized", {
      provider: this.provider,
      baseURL,
      model: this.model,
      requestTimeoutMs: this.requestTimeoutMs,
      hasApiKey: Boolean(this.apiKey),
      customHeaderKeys: headerKeys.length > 0 ? headerKeys : undefined,
    });
  }

  public async complete(
    messages: ChatMessage[],
    options?: ChatCompletionOptions
  ): Promise<ChatCompletion> {
    if (!this.apiKey) {
      throw new ChatModelError(
        `ChatModelClient (${this.provider}) is not configured with an API key`,
        null,
        false
      );
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const onOuterAbort = () => controller.abort();
    options?.signal?.addEventListener("abort", onOuterAbort, { once: true });

    try {
      const body: Record<string, unknown> = {
        model: this.model,
        temperature: options?.temperature ?? 0.2,
        max_tokens: options?.maxTokens ?? 1_200,
        messages,
      };

      if (options?.responseFormat === "json_object") {
        body.response_format = { type: "json_object" };
      }

      this.logger.debug("[ChatModelClient] Request", {
        provider: this.provider,
        endpoint: this.endpoint,
        messages: messages.length,
        responseFormat: options?.responseFormat ?? "text",
      });

      let response: Response;
      try {
        response = await fetch(this.endpoint, {
          method: "POST",
          headers: {
            ...this.headers,
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ChatModelError(
          `${capitalize(this.provider)} request failed: ${message}`,
          null,
          false
        );
      }

      if (!response.ok) {
        let errText = "";
        try {
          errText = await response.text();
        } catch (error) {
          errText = error instanceof Error ? error.message : "";
        }
        throw new ChatModelError(
          `${capitalize(this.provider)} request failed with status ${
            response.status
          } ${response.statusText}${errText ? `: ${errText}` : ""}`,
          response.status,
          response.status === 429
        );
      }

      const parsed = ChatCompletionResponseSchema.safeParse(
        await response.json()
      );
      if (!parsed.success) {
        throw new ChatModelError(
          `${capitalize(this.provider)} returned an unexpected payload`,
          response.status,
          false
        );
      }
      const json = parsed.data;
      const content = json.choices?.[0]?.message?.content?.trim();
      if (!content) {
        throw new ChatModelError(
          `${capitalize(
            this.provider
          )} response did not contain any message content`,
          response.status,
          false
        );
      }

      const promptTokens = json.usage?.prompt_tokens ?? 0;
      const completionTokens = json.usage?.completion_tokens ?? 0;
      return {
        content,
        usage: {
          promptTokens,
          completionTokens,
          totalTokens: json.usage?.total_tokens ?? promptTokens + completionTokens,
        },
      };
    } finally {
      clearTimeout(timeout);
      options?.signal?.removeEventListener("abort", onOuterAbort);
    }
  }
}

function resolveProvider(options?: ChatModelClientOptions): ChatModelProvider {
  if (options?.provider) {
    return options.provider;
  }

  const envProvider = (process.env.LLM_PROVIDER ?? "").toLowerCase();
  if (envProvider === "openai" || envProvider === "deepseek") {
    return envProvider;
  }

  const preferredProviders: ChatModelProvider[] = ["openai", "deepseek"];

  for (const provider of preferredProviders) {
    const keyEnv = PROVIDER_DEFAULTS[provider].apiKeyEnv;
    if (process.env[keyEnv]) {
      return provider;
    }
  }

  return "openai";
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

function capitalize(value: string): string {
  if (!value) return value;
  return value.charAt(0).toUpperCase() + value.slice(1);
}
