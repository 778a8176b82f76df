import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { Deadline } from "../../core/Deadline.js";
import {
  DeadlineExceededError,
  ModelTransportError,
  RateLimitExhaustedError,
  SchemaViolationError,
} from "../../errors/PipelineError.js";
import { silentLogger } from "../../__tests__/harness.js";
import { callWithRetries, type ModelCallPolicy } from "../callWithRetries.js";
import { scripted, ScriptedModel, type ScriptedReply } from "../ScriptedModel.js";
import { UsageMeter } from "../UsageMeter.js";

const policy: ModelCallPolicy = {
  maxSchemaRetries: 2,
  maxTransportRetries: 2,
  retryBackoffMs: 0,
};

const schema = z.object({ value: z.number() }).strict();

describe("callWithRetries", () => {
  let deadline: Deadline;
  let meter: UsageMeter;

  beforeEach(() => {
    deadline = new Deadline(5_000);
    meter = new UsageMeter();
  });

  afterEach(() => {
    deadline.dispose();
  });

  function call(model: ScriptedModel, overrides: Partial<ModelCallPolicy> = {}) {
    return callWithRetries({
      model,
      request: {
        purpose: "step",
        schema,
        messages: [{ role: "user", content: "Give me a number" }],
      },
      policy: { ...policy, ...overrides },
      deadline,
      stage: "executor",
      meter,
      logger: silentLogger,
    });
  }

  function modelWith(...replies: ScriptedReply[]): ScriptedModel {
    return new ScriptedModel({ step: replies });
  }

  it("returns the first valid reply", async () => {
    const model = modelWith(scripted.json({ value: 7 }));
    await expect(call(model)).resolves.toEqual({ value: 7 });
    expect(meter.snapshot()).toMatchObject({ calls: 1, failures: 0, totalTokens: 120 });
  });

  it("re-prompts with the validation issues after a schema violation", async () => {
    const model = modelWith(scripted.raw("{ not json"), scripted.json({ value: 3 }));

    await expect(call(model)).resolves.toEqual({ value: 3 });

    const retry = model.calls[1].messages;
    expect(retry).toHaveLength(3);
    expect(retry[1]).toEqual({ role: "assistant", content: "{ not json" });
    expect(retry[2].content.split("\n")[0]).toBe(
      "Your previous reply did not match the required JSON schema:"
    );
    expect(meter.callsFor("step")).toBe(2);
  });

  it("gives up after the schema retry budget", async () => {
    const model = modelWith(
      scripted.json({ value: "a" }),
      scripted.json({ value: "b" }),
      scripted.json({ value: "c" })
    );

    const failure = call(model);
    await expect(failure).rejects.toBeInstanceOf(SchemaViolationError);
    await expect(failure).rejects.toMatchObject({ status: "error_internal", stage: "executor" });
    expect(model.calls).toHaveLength(3);
  });

  it("retries transport errors and then reports server_error", async () => {
    const model = modelWith(
      scripted.transport("connection reset"),
      scripted.transport("connection reset"),
      scripted.transport("connection reset")
    );

    const failure = call(model);
    await expect(failure).rejects.toBeInstanceOf(ModelTransportError);
    await expect(failure).rejects.toMatchObject({ status: "server_error" });
    expect(model.calls).toHaveLength(3);
    expect(meter.snapshot().failures).toBe(3);
  });

  it("reports rate_limit_exhausted when throttling persists", async () => {
    const model = modelWith(
      scripted.transport("429", true),
      scripted.transport("429", true)
    );

    await expect(call(model, { maxTransportRetries: 1 })).rejects.toBeInstanceOf(
      RateLimitExhaustedError
    );
    expect(model.calls).toHaveLength(2);
  });

  it("recovers when a transient failure is followed by a valid reply", async () => {
    const model = modelWith(scripted.transport("503"), scripted.json({ value: 1 }));
    await expect(call(model)).resolves.toEqual({ value: 1 });
  });

  it("turns an expired deadline into a timeout", async () => {
    deadline.dispose();
    deadline = new Deadline(20);
    const model = modelWith(scripted.hang());

    const failure = call(model);
    await expect(failure).rejects.toBeInstanceOf(DeadlineExceededError);
    await expect(failure).rejects.toMatchObject({ status: "timeout" });
  });
});
