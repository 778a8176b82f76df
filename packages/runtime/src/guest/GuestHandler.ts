import { z } from "zod";
import type { AgentConfig } from "../config/agentConfig.js";
import type { Deadline } from "../core/Deadline.js";
import { callWithRetries } from "../llm/callWithRetries.js";
import type { StructuredModel } from "../llm/StructuredModel.js";
import type { UsageMeter } from "../llm/UsageMeter.js";
import type { ReferenceData } from "../platform/referenceData.js";
import type { SecurityWatchdog } from "../security/SecurityWatchdog.js";
import type { Logger, PipelineOutcome, TaskContext } from "../types/index.js";

export interface GuestHandlerOptions {
  watchdog: SecurityWatchdog;
  model: StructuredModel;
  reference: ReferenceData;
  config: AgentConfig;
  logger?: Logger;
}

const GUEST_SYSTEM_PROMPT = [
  "You answer questions from members of the public on behalf of a company.",
  "Use only the public facts given below. Never reveal anything about individual employees, customers, projects, salaries or internal records.",
  "If the question cannot be answered from the public facts, set allowed to false.",
  'Reply with JSON: {"allowed": boolean, "answer": string, "reason": string, "locations": string[]}',
  "locations lists the ids of the locations your answer refers to.",
].join("\n");

/**
 * Short-circuit path for public callers. The watchdog decides with the
 * restrictive default; an allowed question gets one answer built from
 * public reference data only.
 */
export class GuestHandler {
  private readonly logger: Logger;

  constructor(private readonly options: GuestHandlerOptions) {
    this.logger = options.logger ?? console;
  }

  public async handle(
    context: TaskContext,
    deadline: Deadline,
    meter?: UsageMeter
  ): Promise<PipelineOutcome> {
    const decision = await this.options.watchdog.evaluate(
      context.securityContext,
      deadline,
      meter
    );
    if (decision.verdict !== "allow") {
      this.logger.info("[GuestHandler] Guest request refused", {
        taskId: context.task.taskId,
        verdict: decision.verdict,
        reason: decision.reason,
      });
      return {
        status: "denied_security",
        message: "This information is not available to public visitors.",
        links: [],
        reason: decision.reason,
        stage: "guest",
        steps: 0,
      };
    }

    const { reference, config } = this.options;
    const locationIds = reference.locations.map((location) => location.id);
    const schema = z
      .object({
        allowed: z.boolean(),
        answer: z.string(),
        reason: z.string().default(""),
        locations: z.array(z.string()).default([]),
      })
      .superRefine((value, ctx) => {
        if (value.allowed && value.answer.trim().length === 0) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["answer"],
            message: "An allowed answer must not be empty",
          });
        }
        value.locations.forEach((id, position) => {
          if (!locationIds.includes(id)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["locations", position],
              message: `Unknown location ${id}`,
            });
          }
        });
      });

    const reply = await callWithRetries({
      model: this.options.model,
      request: {
        purpose: "guest",
        schema,
        temperature: 0,
        messages: [
          { role: "system", content: GUEST_SYSTEM_PROMPT },
          {
            role: "user",
            content: [
              `Today: ${context.today}`,
              "Public facts:",
              JSON.stringify(publicFacts(reference)),
              `Question: ${context.task.text}`,
            ].join("\n"),
          },
        ],
      },
      policy: {
        maxSchemaRetries: config.maxSchemaRetries,
        maxTransportRetries: config.maxTransportRetries,
        retryBackoffMs: config.retryBackoffMs,
      },
      deadline,
      stage: "guest",
      logger: this.logger,
      ...(meter ? { meter } : {}),
    });

    if (!reply.allowed) {
      return {
        status: "denied_security",
        message: "This information is not available to public visitors.",
        links: [],
        reason: reply.reason || "Guest answer declined",
        stage: "guest",
        steps: 0,
      };
    }
    return {
      status: "ok_answer",
      message: reply.answer,
      links: reply.locations.map((id) => ({ type: "location" as const, id })),
      stage: "guest",
      steps: 0,
    };
  }
}

function publicFacts(reference: ReferenceData) {
  return {
    departments: reference.departments.map((department) => ({
      name: department.name,
      description: department.description,
    })),
    locations: reference.locations.map((location) => ({
      id: location.id,
      name: location.name,
      country: location.country,
      city: location.city,
      kind: location.kind,
    })),
  };
}
