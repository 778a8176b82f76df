import { describe, expect, it } from "vitest";
import {
  BackendError,
  RepeatedToolFailureError,
} from "../../errors/PipelineError.js";
import type { ToolErrorKind, ToolResult } from "../../types/index.js";
import { EMPTY_STREAK, StepReflector } from "../StepReflector.js";

function failed(kind: ToolErrorKind, tool: ToolResult["tool"] = "projects.get"): ToolResult {
  return {
    success: false,
    tool,
    error: { kind, message: `${kind} failure`, parameters: {} },
    latencyMs: 2,
  };
}

const succeeded: ToolResult = {
  success: true,
  tool: "projects.get",
  output: {},
  latencyMs: 2,
};

describe("StepReflector", () => {
  const reflector = new StepReflector(3);

  it("continues and resets the streak after a success", () => {
    expect(reflector.reflect(succeeded, { key: "projects.get:conflict", count: 2 })).toEqual({
      directive: "continue",
      streak: EMPTY_STREAK,
    });
  });

  it("never counts not_found toward the streak", () => {
    let streak = EMPTY_STREAK;
    for (let i = 0; i < 5; i++) {
      const reflection = reflector.reflect(failed("not_found"), streak);
      expect(reflection.directive).toBe("continue");
      streak = reflection.streak;
    }
    expect(streak).toEqual(EMPTY_STREAK);
  });

  it("aborts when the same tool fails the same way too often", () => {
    const first = reflector.reflect(failed("invalid_arguments"), EMPTY_STREAK);
    const second = reflector.reflect(failed("invalid_arguments"), first.streak);
    const third = reflector.reflect(failed("invalid_arguments"), second.streak);

    expect(second).toEqual({
      directive: "continue",
      streak: { key: "projects.get:invalid_arguments", count: 2 },
    });
    expect(third.directive).toBe("abort");
    if (third.directive === "abort") {
      expect(third.error).toBeInstanceOf(RepeatedToolFailureError);
      expect(third.error.status).toBe("error_internal");
      expect(third.error.message).toBe(
        "Tool projects.get failed with invalid_arguments 3 times in a row"
      );
    }
  });

  it("restarts the count when the failure changes", () => {
    const first = reflector.reflect(failed("conflict"), EMPTY_STREAK);
    const second = reflector.reflect(failed("conflict", "projects.updateTeam"), first.streak);
    expect(second.streak).toEqual({ key: "projects.updateTeam:conflict", count: 1 });
  });

  it("treats backend failures as fatal", () => {
    const reflection = reflector.reflect(failed("backend"), EMPTY_STREAK);
    expect(reflection.directive).toBe("abort");
    if (reflection.directive === "abort") {
      expect(reflection.error).toBeInstanceOf(BackendError);
      expect(reflection.error.status).toBe("server_error");
    }
  });
});
