import type { OutboundResponse } from "../types/index.js";
import type {
  Customer,
  Employee,
  LeveledItem,
  Project,
  ProjectStatus,
  TeamMember,
  TimeEntry,
  WikiPage,
} from "./records.js";

/**
 * Failure reported by the platform API. `status` follows HTTP semantics:
 * 404 is an ordinary "not found", everything else is a backend failure.
 */
export class PlatformError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly operation: PlatformOperation
  ) {
    super(message);
    this.name = "PlatformError";
  }

  public get notFound(): boolean {
    return this.status === 404;
  }
}

export interface WhoAmI {
  isPublic: boolean;
  currentUser: string | null;
  today: string;
  wikiVersion: string | null;
}

export interface Page<T> {
  items: T[];
  /** 下一页的 offset，没有更多数据时为 null */
  nextOffset: number | null;
}

export interface PageRequest {
  limit: number;
  offset: number;
}

export interface EmployeeQuery extends PageRequest {
  query?: string;
  location?: string;
  department?: string;
  managerId?: string;
  skill?: string;
}

export interface EmployeeUpdate {
  location?: string;
  department?: string;
  notes?: string;
  skills?: LeveledItem[];
  wills?: LeveledItem[];
  salary?: number;
}

export interface ProjectQuery extends PageRequest {
  query?: string;
  customerId?: string;
  status?: ProjectStatus;
  memberId?: string;
}

export interface CustomerQuery extends PageRequest {
  query?: string;
  location?: string;
  dealPhase?: Customer["dealPhase"];
  accountManagerId?: string;
}

export interface TimeQuery extends PageRequest {
  employeeId?: string;
  projectId?: string;
  dateFrom?: string;
  dateTo?: string;
}

export type NewTimeEntry = Omit<TimeEntry, "id">;

/** 未给出的字段保持原值 */
export type TimeEntryUpdate = Partial<Omit<TimeEntry, "id" | "employeeId">>;

export interface DirectorySnapshot {
  employees: Employee[];
  projects: Project[];
  customers: Customer[];
}

export type PlatformOperation =
  | "whoAmI"
  | "directory"
  | "getEmployee"
  | "searchEmployees"
  | "updateEmployee"
  | "getProject"
  | "searchProjects"
  | "updateProjectStatus"
  | "updateProjectTeam"
  | "getCustomer"
  | "searchCustomers"
  | "logTime"
  | "updateTimeEntry"
  | "searchTime"
  | "listWiki"
  | "getWikiPage"
  | "putWikiPage"
  | "deleteWikiPage"
  | "provideResponse";

/**
 * The platform collaborator: task identity, company records and the
 * sink for the final answer.
 */
export interface PlatformClient {
  whoAmI(callerId: string, isPublic: boolean): Promise<WhoAmI>;
  directory(): Promise<DirectorySnapshot>;
  getEmployee(id: string): Promise<Employee>;
  searchEmployees(query: EmployeeQuery): Promise<Page<Employee>>;
  updateEmployee(id: string, update: EmployeeUpdate): Promise<Employee>;
  getProject(id: string): Promise<Project>;
  searchProjects(query: ProjectQuery): Promise<Page<Project>>;
  updateProjectStatus(id: string, status: ProjectStatus): Promise<Project>;
  updateProjectTeam(id: string, team: TeamMember[]): Promise<Project>;
  getCustomer(id: string): Promise<Customer>;
  searchCustomers(query: CustomerQuery): Promise<Page<Customer>>;
  logTime(entry: NewTimeEntry): Promise<TimeEntry>;
  updateTimeEntry(id: string, update: TimeEntryUpdate): Promise<TimeEntry>;
  searchTime(query: TimeQuery): Promise<Page<TimeEntry>>;
  listWiki(): Promise<string[]>;
  getWikiPage(path: string): Promise<WikiPage>;
  /** 创建或覆盖一页 */
  putWikiPage(page: WikiPage): Promise<WikiPage>;
  deleteWikiPage(path: string): Promise<void>;
  provideResponse(taskId: string, response: OutboundResponse): Promise<void>;
}
