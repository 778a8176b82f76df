import { z } from "zod";
import type { PlatformClient } from "../platform/PlatformClient.js";
import {
  EmployeeSchema,
  LeveledItemSchema,
  TeamMemberSchema,
  toEmployeeBrief,
  type Project,
} from "../platform/records.js";
import { defineTool } from "../registry/ToolRegistry.js";
import type { AnyToolAdapter } from "../types/index.js";

const EmployeeBriefSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  title: z.string(),
  department: z.string(),
  location: z.string(),
  managerId: z.string().nullable(),
});

const PagingSchema = {
  limit: z.number().int().min(1).max(20).default(10),
  offset: z.number().int().min(0).default(0),
};

export function createEmployeeTools(platform: PlatformClient): AnyToolAdapter[] {
  const search = defineTool({
    id: "employees.search",
    description:
      "Search employees by free text (name, email, title), location id, department, manager id or skill. Paged.",
    entity: "employee",
    mutates: false,
    inputSchema: z
      .object({
        query: z.string().min(1).optional(),
        location: z.string().min(1).optional(),
        department: z.string().min(1).optional(),
        managerId: z.string().min(1).optional(),
        skill: z.string().min(1).optional(),
        ...PagingSchema,
      })
      .strict(),
    outputSchema: z.object({
      employees: z.array(EmployeeBriefSchema),
      nextOffset: z.number().nullable(),
    }),
    async execute({ params }) {
      const page = await platform.searchEmployees(params);
      return {
        employees: page.items.map(toEmployeeBrief),
        nextOffset: page.nextOffset,
      };
    },
  });

  const get = defineTool({
    id: "employees.get",
    description:
      "Load full employee records (skills, wills, projects context) for up to 10 ids. Fails with not_found on the first unknown id.",
    entity: "employee",
    mutates: false,
    inputSchema: z
      .object({ ids: z.array(z.string().min(1)).min(1).max(10) })
      .strict(),
    outputSchema: z.object({ employees: z.array(EmployeeSchema) }),
    async execute({ params }) {
      const employees = [];
      for (const id of params.ids) {
        employees.push(await platform.getEmployee(id));
      }
      return { employees };
    },
  });

  const current = defineTool({
    id: "employees.current",
    description: "Who is asking: the caller's own employee record and today's date.",
    entity: "employee",
    mutates: false,
    inputSchema: z.object({}).strict(),
    outputSchema: z.object({
      employee: EmployeeBriefSchema.nullable(),
      today: z.string(),
    }),
    async execute({ callerId, today }) {
      if (!callerId) {
        return { employee: null, today };
      }
      const employee = await platform.getEmployee(callerId);
      return { employee: toEmployeeBrief(employee), today };
    },
  });

  const update = defineTool({
    id: "employees.update",
    description:
      "Update one employee: location, department, notes, salary, skills or wills. Lists replace the stored list.",
    entity: "employee",
    mutates: true,
    inputSchema: z
      .object({
        id: z.string().min(1),
        location: z.string().min(1).optional(),
        department: z.string().min(1).optional(),
        notes: z.string().optional(),
        salary: z.number().nonnegative().optional(),
        skills: z.array(LeveledItemSchema).optional(),
        wills: z.array(LeveledItemSchema).optional(),
      })
      .strict(),
    outputSchema: z.object({ employee: EmployeeSchema }),
    subjects: (params) => [params.id],
    async execute({ params }) {
      const { id, ...changes } = params;
      return { employee: await platform.updateEmployee(id, changes) };
    },
  });

  const workload = defineTool({
    id: "employees.workload",
    description:
      "Sum each employee's time slices across the projects they are on. By default only active projects count.",
    entity: "employee",
    mutates: false,
    inputSchema: z
      .object({
        ids: z.array(z.string().min(1)).min(1).max(20),
        activeOnly: z.boolean().default(true),
      })
      .strict(),
    outputSchema: z.object({
      workloads: z.array(
        z.object({
          employeeId: z.string(),
          /** 各项目 timeSlice 之和，可能大于 1 */
          allocation: z.number(),
          projects: z.array(
            z.object({
              projectId: z.string(),
              role: TeamMemberSchema.shape.role,
              timeSlice: z.number(),
            })
          ),
        })
      ),
    }),
    async execute({ params }) {
      const workloads = [];
      for (const employeeId of params.ids) {
        await platform.getEmployee(employeeId);
        const projects: Project[] = [];
        let offset: number | null = 0;
        while (offset !== null) {
          const page = await platform.searchProjects({
            memberId: employeeId,
            ...(params.activeOnly ? { status: "active" as const } : {}),
            limit: 50,
            offset,
          });
          projects.push(...page.items);
          offset = page.nextOffset;
        }
        const slices = projects.flatMap((project) =>
          project.team
            .filter((member) => member.employeeId === employeeId)
            .map((member) => ({
              projectId: project.id,
              role: member.role,
              timeSlice: member.timeSlice,
            }))
        );
        workloads.push({
          employeeId,
          allocation:
            Math.round(slices.reduce((sum, slice) => sum + slice.timeSlice, 0) * 100) /
            100,
          projects: slices,
        });
      }
      return { workloads };
    },
  });

  return [search, get, current, update, workload];
}
