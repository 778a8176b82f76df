import type { Deadline } from "../core/Deadline.js";
import {
  DeadlineExceededError,
  ModelTransportError,
  RateLimitExhaustedError,
  SchemaViolationError,
} from "../errors/PipelineError.js";
import type { Logger, PipelineStage } from "../types/index.js";
import type { ChatMessage } from "./ChatModelClient.js";
import type { StructuredModel, StructuredRequest } from "./StructuredModel.js";
import type { UsageMeter } from "./UsageMeter.js";

export interface ModelCallPolicy {
  maxSchemaRetries: number;
  maxTransportRetries: number;
  retryBackoffMs: number;
}

export interface ModelCallOptions<T> {
  model: StructuredModel;
  request: Omit<StructuredRequest<T>, "signal">;
  policy: ModelCallPolicy;
  deadline: Deadline;
  stage: PipelineStage;
  meter?: UsageMeter;
  logger?: Logger;
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Runs one logical model call. Schema violations are re-prompted with
 * the validation issues; transport failures back off linearly. Both are
 * bounded by the policy and by the task deadline.
 */
export async function callWithRetries<T>(
  options: ModelCallOptions<T>
): Promise<T> {
  const { model, request, policy, deadline, stage, meter } = options;
  const logger = options.logger ?? console;
  let messages: ChatMessage[] = [...request.messages];
  let schemaRetries = 0;
  let transportRetries = 0;

  for (;;) {
    deadline.check(stage);
    const startedAt = Date.now();
    const result = await deadline.race(
      model.call({ ...request, messages, signal: deadline.signal }),
      stage
    );
    const elapsed = Date.now() - startedAt;

    if (result.kind === "ok") {
      meter?.record(request.purpose, result.usage, elapsed);
      return result.value;
    }

    if (result.kind === "schema_violation") {
      meter?.record(request.purpose, result.usage, elapsed);
      if (schemaRetries >= policy.maxSchemaRetries) {
        throw new SchemaViolationError(stage, result.issues, schemaRetries + 1);
      }
      schemaRetries += 1;
      logger.warn(`[${request.purpose}] Schema violation, re-prompting`, {
        attempt: schemaRetries,
        issues: result.issues,
      });
      messages = [
        ...messages,
        { role: "assistant", content: result.raw },
        {
          role: "user",
          content: [
            "Your previous reply did not match the required JSON schema:",
            ...result.issues.map((issue) => `- ${issue}`),
            "Reply again with a single corrected JSON object only.",
          ].join("\n"),
        },
      ];
      continue;
    }

    meter?.record(request.purpose, null, elapsed);
    if (result.aborted || deadline.expired) {
      throw new DeadlineExceededError(stage, deadline.budgetMs);
    }
    if (transportRetries >= policy.maxTransportRetries) {
      throw result.rateLimited
        ? new RateLimitExhaustedError(stage, transportRetries + 1)
        : new ModelTransportError(stage, result.message);
    }
    transportRetries += 1;
    logger.warn(`[${request.purpose}] Model call failed, backing off`, {
      attempt: transportRetries,
      rateLimited: result.rateLimited,
      message: result.message,
    });
    await deadline.race(sleep(policy.retryBackoffMs * transportRetries), stage);
  }
}
