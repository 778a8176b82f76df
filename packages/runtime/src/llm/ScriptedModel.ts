import type { TokenUsage } from "./ChatModelClient.js";
import {
  validateStructured,
  type ModelPurpose,
  type StructuredModel,
  type StructuredRequest,
  type StructuredResult,
} from "./StructuredModel.js";

export type ScriptedReply =
  | { kind: "json"; value: unknown }
  | { kind: "raw"; text: string }
  | { kind: "transport"; message: string; rateLimited: boolean }
  | { kind: "hang" };

export const scripted = {
  json: (value: unknown): ScriptedReply => ({ kind: "json", value }),
  raw: (text: string): ScriptedReply => ({ kind: "raw", text }),
  transport: (message: string, rateLimited = false): ScriptedReply => ({
    kind: "transport",
    message,
    rateLimited,
  }),
  hang: (): ScriptedReply => ({ kind: "hang" }),
};

export interface RecordedCall {
  purpose: ModelPurpose;
  messages: StructuredRequest<unknown>["messages"];
}

export const SCRIPTED_USAGE: TokenUsage = {
  promptTokens: 100,
  completionTokens: 20,
  totalTokens: 120,
};

/**
 * Deterministic stand-in for a language model. Replies are queued per
 * purpose and consumed in order; an empty queue is a transport error.
 */
export class ScriptedModel implements StructuredModel {
  public readonly calls: RecordedCall[] = [];

  private readonly queues = new Map<ModelPurpose, ScriptedReply[]>();

  constructor(script: Partial<Record<ModelPurpose, ScriptedReply[]>> = {}) {
    for (const [purpose, replies] of Object.entries(script)) {
      if (isPurpose(purpose) && replies) {
        this.queues.set(purpose, [...replies]);
      }
    }
  }

  public enqueue(purpose: ModelPurpose, ...replies: ScriptedReply[]): this {
    const queue = this.queues.get(purpose) ?? [];
    queue.push(...replies);
    this.queues.set(purpose, queue);
    return this;
  }

  public callsFor(purpose: ModelPurpose): RecordedCall[] {
    return this.calls.filter((call) => call.purpose === purpose);
  }

  public remaining(purpose: ModelPurpose): number {
    return this.queues.get(purpose)?.length ?? 0;
  }

  public async call<T>(
    request: StructuredRequest<T>
  ): Promise<StructuredResult<T>> {
    this.calls.push({
      purpose: request.purpose,
      messages: [...request.messages],
    });
    const reply = this.queues.get(request.purpose)?.shift();
    if (!reply) {
      return {
        kind: "transport_error",
        message: `No scripted reply left for ${request.purpose}`,
        rateLimited: false,
        aborted: false,
      };
    }

    switch (reply.kind) {
      case "json":
        return validateStructured(
          request.schema,
          JSON.stringify(reply.value),
          SCRIPTED_USAGE
        );
      case "raw":
        return validateStructured(request.schema, reply.text, SCRIPTED_USAGE);
      case "transport":
        return {
          kind: "transport_error",
          message: reply.message,
          rateLimited: reply.rateLimited,
          aborted: false,
        };
      case "hang":
        await waitForAbort(request.signal);
        return {
          kind: "transport_error",
          message: "Request aborted",
          rateLimited: false,
          aborted: true,
        };
    }
  }
}

const PURPOSES: readonly ModelPurpose[] = [
  "resolver",
  "watchdog",
  "guest",
  "step",
];

function isPurpose(value: string): value is ModelPurpose {
  return PURPOSES.some((purpose) => purpose === value);
}

function waitForAbort(signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (!signal || signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
