import { z, type ZodTypeAny } from "zod";
import {
  ToolNameSchema,
  type AnyToolAdapter,
  type ToolAdapter,
  type ToolErrorKind,
  type ToolRegistry,
} from "../types/index.js";

/**
 * Raised inside a tool to report a typed failure that is not a platform
 * status (a conflict, a rejected argument combination).
 */
export class ToolFailure extends Error {
  constructor(
    public readonly kind: ToolErrorKind,
    message: string,
    public readonly parameters: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "ToolFailure";
  }
}

export function defineTool<I, O>(tool: ToolAdapter<I, O>): ToolAdapter<I, O> {
  return tool;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  mutates: boolean;
  arguments: string;
}

export class InMemoryToolRegistry implements ToolRegistry {
  private tools = new Map<string, AnyToolAdapter>();

  private sealed = false;

  constructor(tools: AnyToolAdapter[] = []) {
    tools.forEach((tool) => {
      this.register(tool);
    });
  }

  public register(tool: AnyToolAdapter): void {
    if (this.sealed) {
      throw new Error(`Tool registry is sealed; cannot register ${tool.id}`);
    }
    if (this.tools.has(tool.id)) {
      throw new Error(`Tool ${tool.id} is already registered`);
    }
    this.tools.set(tool.id, tool);
  }

  /** 初始化结束后调用，之后注册表只读 */
  public seal(): this {
    this.sealed = true;
    return this;
  }

  public get(toolId: string): AnyToolAdapter | undefined {
    const tag = ToolNameSchema.safeParse(toolId);
    if (!tag.success) {
      return undefined;
    }
    return this.tools.get(tag.data);
  }

  public list(): AnyToolAdapter[] {
    return Array.from(this.tools.values());
  }
}

export function describeTool(tool: AnyToolAdapter): ToolDescriptor {
  return {
    name: tool.id,
    description: tool.description,
    mutates: tool.mutates,
    arguments: describeSchema(tool.inputSchema),
  };
}

/**
 * Renders a zod schema as a compact, prompt-friendly signature, e.g.
 * `{ ids: string[], limit?: number }`.
 */
export function describeSchema(schema: ZodTypeAny): string {
  if (schema instanceof z.ZodObject) {
    const fields = Object.entries<ZodTypeAny>(schema.shape).map(
      ([key, value]) => {
        const optional = value.isOptional();
        return `${key}${optional ? "?" : ""}: ${describeSchema(unwrap(value))}`;
      }
    );
    return fields.length > 0 ? `{ ${fields.join(", ")} }` : "{}";
  }
  if (schema instanceof z.ZodArray) {
    return `${describeSchema(schema.element)}[]`;
  }
  if (schema instanceof z.ZodEnum) {
    return schema.options.map((option: string) => `"${option}"`).join(" | ");
  }
  if (schema instanceof z.ZodString) return "string";
  if (schema instanceof z.ZodNumber) return "number";
  if (schema instanceof z.ZodBoolean) return "boolean";
  if (
    schema instanceof z.ZodOptional ||
    schema instanceof z.ZodDefault ||
    schema instanceof z.ZodNullable ||
    schema instanceof z.ZodEffects
  ) {
    return describeSchema(unwrap(schema));
  }
  return "unknown";
}

function unwrap(schema: ZodTypeAny): ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return unwrap(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return unwrap(schema.removeDefault());
  }
  if (schema instanceof z.ZodEffects) {
    return unwrap(schema.innerType());
  }
  return schema;
}
