import type { Deadline } from "../core/Deadline.js";
import { redactRecord } from "../core/ToolExecutor.js";
import {
  BackendError,
  IdentityLoadError,
} from "../errors/PipelineError.js";
import { PlatformError, type PlatformClient } from "../platform/PlatformClient.js";
import type { Employee } from "../platform/records.js";
import {
  findDepartment,
  type ReferenceData,
} from "../platform/referenceData.js";
import type {
  EmployeeSecurityView,
  ResolutionResult,
  ResolvedEntity,
  SecurityContext,
  SecurityDecision,
  SecurityTarget,
  SolverObject,
  Task,
  TaskContext,
  UnresolvedMention,
} from "../types/index.js";

const MAX_MANAGER_DEPTH = 10;

export interface ContextBuilderOptions {
  platform: PlatformClient;
  reference: ReferenceData;
}

/**
 * Builds the per-task context and its two projections: the security view
 * read by the watchdog and the solver view handed to the step loop.
 */
export class ContextBuilder {
  constructor(private readonly options: ContextBuilderOptions) {}

  public async build(task: Task, deadline: Deadline): Promise<TaskContext> {
    const { platform } = this.options;
    let identity: Employee | null = null;
    let today: string;
    let wikiVersion: string | null;
    try {
      const whoAmI = await deadline.race(
        platform.whoAmI(task.callerId, task.callerIsPublic),
        "context"
      );
      today = whoAmI.today;
      wikiVersion = whoAmI.wikiVersion;
      if (!whoAmI.isPublic) {
        if (!whoAmI.currentUser) {
          throw new Error("Platform returned no current user for an employee");
        }
        identity = await deadline.race(
          platform.getEmployee(whoAmI.currentUser),
          "context"
        );
      }
    } catch (error) {
      if (deadline.expired) throw error;
      throw new IdentityLoadError(task.callerId, error);
    }

    const callerView = identity
      ? await this.securityView(identity, deadline)
      : null;

    const securityContext: SecurityContext = {
      requester: describeRequester(callerView),
      taggedText: task.text,
      caller: callerView
        ? {
            kind: "employee",
            employee: callerView,
            roles: [
              "employee",
              ...(callerView.isExecutive ? ["executive"] : []),
              ...(identity?.permissions ?? []),
            ],
            department: callerView.department,
            permissions: identity?.permissions ?? [],
          }
        : {
            kind: "guest",
            employee: null,
            roles: ["guest"],
            department: null,
            permissions: [],
          },
      targets: [],
      isAboutCaller: false,
      unresolved: [],
    };

    return {
      task,
      callerKind: identity ? "employee" : "guest",
      identity: identity ? { ...identity } : null,
      today,
      entities: [],
      unresolved: [],
      clarification: null,
      isAboutCaller: false,
      securityContext,
      solverContext: {
        taggedText: task.text,
        today,
        caller: null,
        objects: [],
        unresolved: [],
        wikiVersion,
      },
    };
  }

  /**
   * Merges the resolver output into both views. Records are loaded here,
   * once, and projected separately.
   */
  public async withEntities(
    context: TaskContext,
    resolution: ResolutionResult,
    deadline: Deadline
  ): Promise<TaskContext> {
    const targets: SecurityTarget[] = [];
    const objects: SolverObject[] = [];
    for (const entity of resolution.entities) {
      const loaded = await this.loadEntity(entity, deadline);
      if (loaded) {
        targets.push(loaded.target);
        objects.push(loaded.object);
      }
    }

    const tagged = tagText(context.task.text, resolution.entities);
    const callerView = context.securityContext.caller.employee;
    return {
      ...context,
      entities: resolution.entities,
      unresolved: resolution.unresolved,
      clarification: resolution.clarification,
      isAboutCaller: resolution.isAboutCaller,
      securityContext: {
        ...context.securityContext,
        taggedText: tagged,
        targets,
        isAboutCaller: resolution.isAboutCaller,
        unresolved: resolution.unresolved.map((item) => item.mention),
      },
      solverContext: {
        ...context.solverContext,
        taggedText:
          resolution.isAboutCaller && callerView
            ? `Requester {employee:${callerView.id}}: ${tagged}`
            : tagged,
        caller: resolution.isAboutCaller ? context.identity : null,
        objects,
        unresolved: resolution.unresolved.map(describeUnresolved),
      },
    };
  }

  /** 按安全决策裁剪 solver 视图中的敏感字段 */
  public scopeSolverContext(
    context: TaskContext,
    decision: SecurityDecision
  ): TaskContext {
    const { solverContext } = context;
    return {
      ...context,
      solverContext: {
        ...solverContext,
        caller: solverContext.caller
          ? redactRecord(solverContext.caller, decision)
          : null,
        objects: solverContext.objects.map((object) => ({
          ...object,
          record: redactRecord(object.record, decision),
        })),
      },
    };
  }

  public async securityView(
    employee: Employee,
    deadline: Deadline
  ): Promise<EmployeeSecurityView> {
    const { platform, reference } = this.options;
    const managerChain: string[] = [];
    let managerId = employee.managerId;
    while (managerId && managerChain.length < MAX_MANAGER_DEPTH) {
      if (managerChain.includes(managerId) || managerId === employee.id) break;
      managerChain.push(managerId);
      const manager = await deadline.race(platform.getEmployee(managerId), "context");
      managerId = manager.managerId;
    }
    const projects = await deadline.race(
      platform.searchProjects({ memberId: employee.id, limit: 50, offset: 0 }),
      "context"
    );
    return {
      id: employee.id,
      name: employee.name,
      department: employee.department,
      location: employee.location,
      isExecutive: employee.isExecutive,
      isOperational:
        findDepartment(reference, employee.department)?.kind === "operational",
      managerChain,
      projects: projects.items.map((project) => ({
        projectId: project.id,
        role:
          project.team.find((member) => member.employeeId === employee.id)
            ?.role ?? "Other",
      })),
    };
  }

  private async loadEntity(
    entity: ResolvedEntity,
    deadline: Deadline
  ): Promise<{ target: SecurityTarget; object: SolverObject } | null> {
    const { platform, reference } = this.options;
    const { kind, id } = entity;
    try {
      switch (kind) {
        case "employee": {
          const employee = await deadline.race(platform.getEmployee(id), "context");
          return {
            target: { kind, id, employee: await this.securityView(employee, deadline) },
            object: { kind, id, record: { ...employee } },
          };
        }
        case "project": {
          const project = await deadline.race(platform.getProject(id), "context");
          return {
            target: {
              kind,
              id,
              projectLeads: project.team
                .filter((member) => member.role === "Lead")
                .map((member) => member.employeeId),
              projectTeam: project.team.map((member) => member.employeeId),
            },
            object: { kind, id, record: { ...project } },
          };
        }
        case "customer": {
          const customer = await deadline.race(platform.getCustomer(id), "context");
          return {
            target: { kind, id, accountManagerId: customer.accountManagerId },
            object: { kind, id, record: { ...customer } },
          };
        }
        case "location": {
          const location = reference.locations.find((item) => item.id === id);
          return {
            target: { kind, id },
            object: { kind, id, record: location ? { ...location } : { id } },
          };
        }
        case "department": {
          const department = findDepartment(reference, id);
          return {
            target: { kind, id },
            object: { kind, id, record: department ? { ...department } : { name: id } },
          };
        }
        default:
          return {
            target: { kind, id },
            object: { kind, id, record: { id, name: entity.name } },
          };
      }
    } catch (error) {
      if (deadline.expired) throw error;
      if (error instanceof PlatformError && error.notFound) {
        return null;
      }
      throw new BackendError(
        "context",
        `Failed to load ${kind} ${id}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        error
      );
    }
  }
}

function describeRequester(caller: EmployeeSecurityView | null): string {
  return caller
    ? `{employee:${caller.id}} (${caller.department})`
    : "public guest";
}

/** 用 {kind:id} 标记替换已解析的提及，从后往前替换以保持偏移 */
export function tagText(text: string, entities: ResolvedEntity[]): string {
  const replacements = entities
    .flatMap((entity) =>
      entity.spans.map((span) => ({
        ...span,
        tag: `{${entity.kind}:${entity.id}}`,
      }))
    )
    .sort((a, b) => b.start - a.start);
  let result = text;
  let lastStart = Number.POSITIVE_INFINITY;
  for (const replacement of replacements) {
    if (replacement.end > lastStart) continue;
    result =
      result.slice(0, replacement.start) + replacement.tag + result.slice(replacement.end);
    lastStart = replacement.start;
  }
  return result;
}

function describeUnresolved(item: UnresolvedMention): string {
  if (item.candidates.length === 0) {
    return item.mention;
  }
  return `${item.mention} (possible: ${item.candidates
    .map((candidate) => `${candidate.kind}:${candidate.id}`)
    .join(", ")})`;
}
