import type { ZodError, ZodType, ZodTypeDef } from "zod";
import {
  ChatModelClient,
  ChatModelError,
  type ChatMessage,
  type TokenUsage,
} from "./ChatModelClient.js";

export type ModelPurpose = "resolver" | "watchdog" | "guest" | "step";

export interface StructuredRequest<T> {
  purpose: ModelPurpose;
  messages: ChatMessage[];
  schema: ZodType<T, ZodTypeDef, unknown>;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export type StructuredResult<T> =
  | { kind: "ok"; value: T; raw: string; usage: TokenUsage }
  | {
      kind: "schema_violation";
      issues: string[];
      raw: string;
      usage: TokenUsage;
    }
  | {
      kind: "transport_error";
      message: string;
      rateLimited: boolean;
      aborted: boolean;
    };

/**
 * A model call as a plain function of its prompt: it never throws and
 * never retries. Callers decide what to do with each result kind.
 */
export interface StructuredModel {
  call<T>(request: StructuredRequest<T>): Promise<StructuredResult<T>>;
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

export function validateStructured<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  raw: string,
  usage: TokenUsage
): StructuredResult<T> {
  let candidate: unknown;
  try {
    candidate = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      kind: "schema_violation",
      issues: [`(root): response is not valid JSON (${message})`],
      raw,
      usage,
    };
  }
  const parsed = schema.safeParse(candidate);
  if (!parsed.success) {
    return {
      kind: "schema_violation",
      issues: formatZodIssues(parsed.error),
      raw,
      usage,
    };
  }
  return { kind: "ok", value: parsed.data, raw, usage };
}

export class ChatStructuredModel implements StructuredModel {
  constructor(private readonly client: ChatModelClient) {}

  public async call<T>(
    request: StructuredRequest<T>
  ): Promise<StructuredResult<T>> {
    try {
      const completion = await this.client.complete(request.messages, {
        responseFormat: "json_object",
        ...(request.temperature !== undefined
          ? { temperature: request.temperature }
          : {}),
        ...(request.maxTokens !== undefined
          ? { maxTokens: request.maxTokens }
          : {}),
        ...(request.signal ? { signal: request.signal } : {}),
      });
      return validateStructured(
        request.schema,
        stripCodeFence(completion.content),
        completion.usage
      );
    } catch (error) {
      return {
        kind: "transport_error",
        message: error instanceof Error ? error.message : String(error),
        rateLimited: error instanceof ChatModelError && error.rateLimited,
        aborted: request.signal?.aborted ?? false,
      };
    }
  }
}

function stripCodeFence(content: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(content.trim());
  return fenced?.[1] ?? content;
}
