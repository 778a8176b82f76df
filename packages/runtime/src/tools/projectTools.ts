import { z } from "zod";
import type { PlatformClient } from "../platform/PlatformClient.js";
import {
  ProjectSchema,
  ProjectStatusSchema,
  TeamMemberSchema,
  toEmployeeBrief,
} from "../platform/records.js";
import { defineTool, ToolFailure } from "../registry/ToolRegistry.js";
import type { AnyToolAdapter } from "../types/index.js";

const ProjectBriefSchema = z.object({
  id: z.string(),
  name: z.string(),
  customerId: z.string().nullable(),
  status: ProjectStatusSchema,
});

export function createProjectTools(platform: PlatformClient): AnyToolAdapter[] {
  const search = defineTool({
    id: "projects.search",
    description:
      "Search projects by free text, customer id, status or team member id. Paged.",
    entity: "project",
    mutates: false,
    inputSchema: z
      .object({
        query: z.string().min(1).optional(),
        customerId: z.string().min(1).optional(),
        status: ProjectStatusSchema.optional(),
        memberId: z.string().min(1).optional(),
        limit: z.number().int().min(1).max(20).default(10),
        offset: z.number().int().min(0).default(0),
      })
      .strict(),
    outputSchema: z.object({
      projects: z.array(ProjectBriefSchema),
      nextOffset: z.number().nullable(),
    }),
    async execute({ params }) {
      const page = await platform.searchProjects(params);
      return {
        projects: page.items.map(({ id, name, customerId, status }) => ({
          id,
          name,
          customerId,
          status,
        })),
        nextOffset: page.nextOffset,
      };
    },
  });

  const get = defineTool({
    id: "projects.get",
    description: "Load one project with its team.",
    entity: "project",
    mutates: false,
    inputSchema: z.object({ id: z.string().min(1) }).strict(),
    outputSchema: z.object({ project: ProjectSchema }),
    async execute({ params }) {
      return { project: await platform.getProject(params.id) };
    },
  });

  const leads = defineTool({
    id: "projects.leads",
    description: "List the employees with the Lead role on a project.",
    entity: "project",
    mutates: false,
    inputSchema: z.object({ id: z.string().min(1) }).strict(),
    outputSchema: z.object({
      projectId: z.string(),
      leads: z.array(
        z.object({ id: z.string(), name: z.string(), title: z.string() })
      ),
    }),
    async execute({ params }) {
      const project = await platform.getProject(params.id);
      const leadIds = project.team
        .filter((member) => member.role === "Lead")
        .map((member) => member.employeeId);
      const result = [];
      for (const id of leadIds) {
        const brief = toEmployeeBrief(await platform.getEmployee(id));
        result.push({ id: brief.id, name: brief.name, title: brief.title });
      }
      return { projectId: project.id, leads: result };
    },
  });

  const updateStatus = defineTool({
    id: "projects.updateStatus",
    description: "Change the status of one project.",
    entity: "project",
    mutates: true,
    inputSchema: z
      .object({ id: z.string().min(1), status: ProjectStatusSchema })
      .strict(),
    outputSchema: z.object({ project: ProjectSchema }),
    subjects: (params) => [params.id],
    async execute({ params }) {
      const current = await platform.getProject(params.id);
      if (current.status === params.status) {
        throw new ToolFailure(
          "conflict",
          `Project ${params.id} is already ${params.status}`,
          { id: params.id, status: params.status }
        );
      }
      return {
        project: await platform.updateProjectStatus(params.id, params.status),
      };
    },
  });

  const updateTeam = defineTool({
    id: "projects.updateTeam",
    description:
      "Replace the team of one project. Pass the complete new team; members not listed are removed.",
    entity: "project",
    mutates: true,
    inputSchema: z
      .object({
        id: z.string().min(1),
        team: z.array(TeamMemberSchema).max(50),
      })
      .strict(),
    outputSchema: z.object({ project: ProjectSchema }),
    subjects: (params) => [params.id],
    async execute({ params }) {
      const seen = new Set<string>();
      for (const member of params.team) {
        if (seen.has(member.employeeId)) {
          throw new ToolFailure(
            "invalid_arguments",
            `Employee ${member.employeeId} appears twice in the team`,
            { employeeId: member.employeeId }
          );
        }
        seen.add(member.employeeId);
      }
      return {
        project: await platform.updateProjectTeam(params.id, params.team),
      };
    },
  });

  return [search, get, leads, updateStatus, updateTeam];
}
