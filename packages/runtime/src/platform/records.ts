import { z } from "zod";

export const LeveledItemSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    /** 1-10 */
    level: z.number().int().min(1).max(10),
  })
  .strict();

export const EmployeeSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    email: z.string().min(1),
    /** 职位名称，如 "Plant Manager" */
    title: z.string().min(1),
    department: z.string().min(1),
    /** 所在地点 ID */
    location: z.string().min(1),
    managerId: z.string().min(1).nullable(),
    isExecutive: z.boolean().default(false),
    /** 显式授予的权限标签 */
    permissions: z.array(z.string().min(1)).default([]),
    salary: z.number().nonnegative(),
    notes: z.string().default(""),
    skills: z.array(LeveledItemSchema).default([]),
    wills: z.array(LeveledItemSchema).default([]),
  })
  .strict();

export const ProjectStatusSchema = z.enum([
  "idea",
  "exploring",
  "active",
  "paused",
  "archived",
]);

export const TeamMemberSchema = z
  .object({
    employeeId: z.string().min(1),
    role: z.enum(["Lead", "Engineer", "Designer", "QA", "Ops", "Other"]),
    /** 投入比例，0-1 */
    timeSlice: z.number().min(0).max(1),
  })
  .strict();

export const ProjectSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    aliases: z.array(z.string().min(1)).default([]),
    customerId: z.string().min(1).nullable(),
    status: ProjectStatusSchema,
    description: z.string().default(""),
    team: z.array(TeamMemberSchema).default([]),
  })
  .strict();

export const CustomerSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    location: z.string().min(1),
    dealPhase: z.enum(["idea", "exploring", "active", "paused", "archived"]),
    accountManagerId: z.string().min(1).nullable(),
    brief: z.string().default(""),
  })
  .strict();

export const TimeEntryStatusSchema = z.enum(["draft", "submitted", "approved"]);

export const TimeEntrySchema = z
  .object({
    id: z.string().min(1),
    employeeId: z.string().min(1),
    projectId: z.string().min(1).nullable(),
    customerId: z.string().min(1).nullable(),
    /** YYYY-MM-DD */
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    hours: z.number().positive().max(24),
    work: z.string().default(""),
    billable: z.boolean(),
    status: TimeEntryStatusSchema.default("draft"),
  })
  .strict();

export const WikiPageSchema = z
  .object({
    path: z.string().min(1),
    content: z.string(),
  })
  .strict();

export const CompanyFixtureSchema = z
  .object({
    today: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    wikiVersion: z.string().nullable().default(null),
    employees: z.array(EmployeeSchema),
    projects: z.array(ProjectSchema),
    customers: z.array(CustomerSchema),
    timeEntries: z.array(TimeEntrySchema).default([]),
    wiki: z.array(WikiPageSchema).default([]),
  })
  .strict();

export const DepartmentSchema = z
  .object({
    name: z.string().min(1),
    kind: z.enum(["office", "operational"]),
    description: z.string().min(1),
  })
  .strict();

export const LocationSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    country: z.string().min(1),
    city: z.string().min(1),
    kind: z.enum(["office", "plant", "warehouse"]),
    aliases: z.array(z.string().min(1)).default([]),
    description: z.string().default(""),
  })
  .strict();

export type LeveledItem = z.infer<typeof LeveledItemSchema>;
export type Employee = z.infer<typeof EmployeeSchema>;
export type ProjectStatus = z.infer<typeof ProjectStatusSchema>;
export type TeamMember = z.infer<typeof TeamMemberSchema>;
export type Project = z.infer<typeof ProjectSchema>;
export type Customer = z.infer<typeof CustomerSchema>;
export type TimeEntry = z.infer<typeof TimeEntrySchema>;
export type WikiPage = z.infer<typeof WikiPageSchema>;
export type CompanyFixture = z.infer<typeof CompanyFixtureSchema>;
export type CompanyFixtureInput = z.input<typeof CompanyFixtureSchema>;
export type Department = z.infer<typeof DepartmentSchema>;
export type Location = z.infer<typeof LocationSchema>;

export interface EmployeeBrief {
  id: string;
  name: string;
  email: string;
  title: string;
  department: string;
  location: string;
  managerId: string | null;
}

export function toEmployeeBrief(employee: Employee): EmployeeBrief {
  return {
    id: employee.id,
    name: employee.name,
    email: employee.email,
    title: employee.title,
    department: employee.department,
    location: employee.location,
    managerId: employee.managerId,
  };
}
