import { z } from "zod";
import type { PlatformClient } from "../platform/PlatformClient.js";
import {
  TimeEntrySchema,
  TimeEntryStatusSchema,
  type TimeEntry,
} from "../platform/records.js";
import { defineTool, ToolFailure } from "../registry/ToolRegistry.js";
import type { AnyToolAdapter } from "../types/index.js";

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

// summaryByEmployee 最多翻这么多页，避免无界扫描
const SUMMARY_PAGE_LIMIT = 50;

export function createTimeTools(platform: PlatformClient): AnyToolAdapter[] {
  const log = defineTool({
    id: "time.log",
    description:
      "Log a time entry for an employee, optionally against a project or customer.",
    entity: "timeentry",
    mutates: true,
    inputSchema: z
      .object({
        employeeId: z.string().min(1),
        projectId: z.string().min(1).nullable().default(null),
        customerId: z.string().min(1).nullable().default(null),
        date: IsoDate,
        hours: z.number().positive().max(24),
        work: z.string().default(""),
        billable: z.boolean(),
      })
      .strict(),
    outputSchema: z.object({ entry: TimeEntrySchema }),
    subjects: (params) => [params.employeeId],
    async execute({ params, today }) {
      if (params.date > today) {
        throw new ToolFailure(
          "invalid_arguments",
          `Cannot log time in the future (${params.date} > ${today})`,
          { date: params.date }
        );
      }
      const entry = await platform.logTime({ ...params, status: "draft" });
      return { entry };
    },
  });

  const update = defineTool({
    id: "time.update",
    description:
      "Change fields of one time entry by id. Fields left out keep their current value.",
    entity: "timeentry",
    mutates: true,
    inputSchema: z
      .object({
        id: z.string().min(1),
        projectId: z.string().min(1).nullable().optional(),
        customerId: z.string().min(1).nullable().optional(),
        date: IsoDate.optional(),
        hours: z.number().positive().max(24).optional(),
        work: z.string().optional(),
        billable: z.boolean().optional(),
        status: TimeEntryStatusSchema.optional(),
      })
      .strict(),
    outputSchema: z.object({ entry: TimeEntrySchema }),
    async execute({ params, today }) {
      const { id, ...changes } = params;
      if (Object.keys(changes).length === 0) {
        throw new ToolFailure("invalid_arguments", "Nothing to change", { id });
      }
      if (changes.date && changes.date > today) {
        throw new ToolFailure(
          "invalid_arguments",
          `Cannot move time into the future (${changes.date} > ${today})`,
          { date: changes.date }
        );
      }
      return { entry: await platform.updateTimeEntry(id, changes) };
    },
  });

  const search = defineTool({
    id: "time.search",
    description:
      "Search time entries by employee id, project id and inclusive date range. Paged.",
    entity: "timeentry",
    mutates: false,
    inputSchema: z
      .object({
        employeeId: z.string().min(1).optional(),
        projectId: z.string().min(1).optional(),
        dateFrom: IsoDate.optional(),
        dateTo: IsoDate.optional(),
        limit: z.number().int().min(1).max(50).default(20),
        offset: z.number().int().min(0).default(0),
      })
      .strict(),
    outputSchema: z.object({
      entries: z.array(TimeEntrySchema),
      nextOffset: z.number().nullable(),
    }),
    async execute({ params }) {
      const page = await platform.searchTime(params);
      return { entries: page.items, nextOffset: page.nextOffset };
    },
  });

  const summary = defineTool({
    id: "time.summaryByEmployee",
    description:
      "Total and billable hours per employee over an inclusive date range.",
    entity: "timeentry",
    mutates: false,
    inputSchema: z
      .object({
        employeeIds: z.array(z.string().min(1)).min(1).max(20),
        dateFrom: IsoDate.optional(),
        dateTo: IsoDate.optional(),
      })
      .strict(),
    outputSchema: z.object({
      summaries: z.array(
        z.object({
          employeeId: z.string(),
          totalHours: z.number(),
          billableHours: z.number(),
          entries: z.number().int(),
        })
      ),
    }),
    async execute({ params }) {
      const summaries = [];
      for (const employeeId of params.employeeIds) {
        const entries: TimeEntry[] = [];
        let offset: number | null = 0;
        for (let page = 0; offset !== null && page < SUMMARY_PAGE_LIMIT; page++) {
          const result = await platform.searchTime({
            employeeId,
            ...(params.dateFrom ? { dateFrom: params.dateFrom } : {}),
            ...(params.dateTo ? { dateTo: params.dateTo } : {}),
            limit: 50,
            offset,
          });
          entries.push(...result.items);
          offset = result.nextOffset;
        }
        summaries.push({
          employeeId,
          totalHours: round(entries.reduce((sum, e) => sum + e.hours, 0)),
          billableHours: round(
            entries
              .filter((entry) => entry.billable)
              .reduce((sum, e) => sum + e.hours, 0)
          ),
          entries: entries.length,
        });
      }
      return { summaries };
    },
  });

  return [log, update, search, summary];
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
