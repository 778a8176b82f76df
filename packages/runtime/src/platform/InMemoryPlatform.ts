import { readFile } from "node:fs/promises";
import type { OutboundResponse } from "../types/index.js";
import {
  CompanyFixtureSchema,
  type CompanyFixture,
  type CompanyFixtureInput,
  type Customer,
  type Employee,
  type Project,
  type ProjectStatus,
  type TeamMember,
  type TimeEntry,
  type WikiPage,
} from "./records.js";
import {
  PlatformError,
  type CustomerQuery,
  type DirectorySnapshot,
  type EmployeeQuery,
  type EmployeeUpdate,
  type NewTimeEntry,
  type Page,
  type PageRequest,
  type PlatformClient,
  type PlatformOperation,
  type ProjectQuery,
  type TimeEntryUpdate,
  type TimeQuery,
  type WhoAmI,
} from "./PlatformClient.js";

interface InjectedFailure {
  status: number;
  message: string;
}

/**
 * Process-local platform backed by a company fixture. Used by the demo
 * and by tests; failures can be injected per operation.
 */
export class InMemoryPlatform implements PlatformClient {
  public readonly responses = new Map<string, OutboundResponse[]>();

  private readonly data: CompanyFixture;

  private readonly failures = new Map<PlatformOperation, InjectedFailure[]>();

  private nextTimeEntry = 1;

  constructor(fixture: CompanyFixtureInput) {
    this.data = structuredClone(CompanyFixtureSchema.parse(fixture));
  }

  public static async fromFile(filePath: string): Promise<InMemoryPlatform> {
    const raw = await readFile(filePath, "utf8");
    const json: unknown = JSON.parse(raw);
    return new InMemoryPlatform(CompanyFixtureSchema.parse(json));
  }

  /** 下一次调用该操作时抛出指定状态码的错误 */
  public injectFailure(
    operation: PlatformOperation,
    status: number,
    message = `Injected ${status} failure`
  ): void {
    const queue = this.failures.get(operation) ?? [];
    queue.push({ status, message });
    this.failures.set(operation, queue);
  }

  public snapshotData(): CompanyFixture {
    return structuredClone(this.data);
  }

  public async whoAmI(callerId: string, isPublic: boolean): Promise<WhoAmI> {
    this.guard("whoAmI");
    if (isPublic) {
      return {
        isPublic: true,
        currentUser: null,
        today: this.data.today,
        wikiVersion: this.data.wikiVersion,
      };
    }
    const employee = this.findEmployee(callerId, "whoAmI");
    return {
      isPublic: false,
      currentUser: employee.id,
      today: this.data.today,
      wikiVersion: this.data.wikiVersion,
    };
  }

  public async directory(): Promise<DirectorySnapshot> {
    this.guard("directory");
    return structuredClone({
      employees: this.data.employees,
      projects: this.data.projects,
      customers: this.data.customers,
    });
  }

  public async getEmployee(id: string): Promise<Employee> {
    this.guard("getEmployee");
    return structuredClone(this.findEmployee(id, "getEmployee"));
  }

  public async searchEmployees(query: EmployeeQuery): Promise<Page<Employee>> {
    this.guard("searchEmployees");
    const text = query.query?.toLowerCase();
    const skill = query.skill?.toLowerCase();
    const matches = this.data.employees.filter((employee) => {
      if (
        text &&
        ![employee.name, employee.email, employee.title, employee.id].some(
          (field) => field.toLowerCase().includes(text)
        )
      ) {
        return false;
      }
      if (query.location && employee.location !== query.location) return false;
      if (query.department && employee.department !== query.department)
        return false;
      if (query.managerId && employee.managerId !== query.managerId)
        return false;
      if (
        skill &&
        !employee.skills.some(
          (item) =>
            item.id.toLowerCase() === skill ||
            item.name.toLowerCase() === skill
        )
      ) {
        return false;
      }
      return true;
    });
    return paginate(matches, query);
  }

  public async updateEmployee(
    id: string,
    update: EmployeeUpdate
  ): Promise<Employee> {
    this.guard("updateEmployee");
    const employee = this.findEmployee(id, "updateEmployee");
    if (update.location !== undefined) employee.location = update.location;
    if (update.department !== undefined)
      employee.department = update.department;
    if (update.notes !== undefined) employee.notes = update.notes;
    if (update.salary !== undefined) employee.salary = update.salary;
    if (update.skills !== undefined) employee.skills = update.skills;
    if (update.wills !== undefined) employee.wills = update.wills;
    return structuredClone(employee);
  }

  public async getProject(id: string): Promise<Project> {
    this.guard("getProject");
    return structuredClone(this.findProject(id, "getProject"));
  }

  public async searchProjects(query: ProjectQuery): Promise<Page<Project>> {
    this.guard("searchProjects");
    const text = query.query?.toLowerCase();
    const matches = this.data.projects.filter((project) => {
      if (
        text &&
        ![project.name, project.id, ...project.aliases].some((field) =>
          field.toLowerCase().includes(text)
        )
      ) {
        return false;
      }
      if (query.customerId && project.customerId !== query.customerId)
        return false;
      if (query.status && project.status !== query.status) return false;
      if (
        query.memberId &&
        !project.team.some((member) => member.employeeId === query.memberId)
      ) {
        return false;
      }
      return true;
    });
    return paginate(matches, query);
  }

  public async updateProjectStatus(
    id: string,
    status: ProjectStatus
  ): Promise<Project> {
    this.guard("updateProjectStatus");
    const project = this.findProject(id, "updateProjectStatus");
    project.status = status;
    return structuredClone(project);
  }

  public async updateProjectTeam(
    id: string,
    team: TeamMember[]
  ): Promise<Project> {
    this.guard("updateProjectTeam");
    const project = this.findProject(id, "updateProjectTeam");
    for (const member of team) {
      this.findEmployee(member.employeeId, "updateProjectTeam");
    }
    project.team = structuredClone(team);
    return structuredClone(project);
  }

  public async getCustomer(id: string): Promise<Customer> {
    this.guard("getCustomer");
    const customer = this.data.customers.find((item) => item.id === id);
    if (!customer) {
      throw new PlatformError(`Customer ${id} not found`, 404, "getCustomer");
    }
    return structuredClone(customer);
  }

  public async searchCustomers(query: CustomerQuery): Promise<Page<Customer>> {
    this.guard("searchCustomers");
    const text = query.query?.toLowerCase();
    const matches = this.data.customers.filter((customer) => {
      if (
        text &&
        ![customer.name, customer.id, customer.brief].some((field) =>
          field.toLowerCase().includes(text)
        )
      ) {
        return false;
      }
      if (query.location && customer.location !== query.location) return false;
      if (query.dealPhase && customer.dealPhase !== query.dealPhase)
        return false;
      if (
        query.accountManagerId &&
        customer.accountManagerId !== query.accountManagerId
      ) {
        return false;
      }
      return true;
    });
    return paginate(matches, query);
  }

  public async logTime(entry: NewTimeEntry): Promise<TimeEntry> {
    this.guard("logTime");
    this.findEmployee(entry.employeeId, "logTime");
    if (entry.projectId) {
      this.findProject(entry.projectId, "logTime");
    }
    const created: TimeEntry = {
      ...entry,
      id: `te_new_${this.nextTimeEntry++}`,
    };
    this.data.timeEntries.push(created);
    return structuredClone(created);
  }

  public async updateTimeEntry(
    id: string,
    update: TimeEntryUpdate
  ): Promise<TimeEntry> {
    this.guard("updateTimeEntry");
    const entry = this.data.timeEntries.find((item) => item.id === id);
    if (!entry) {
      throw new PlatformError(`Time entry ${id} not found`, 404, "updateTimeEntry");
    }
    if (update.projectId) {
      this.findProject(update.projectId, "updateTimeEntry");
    }
    if (update.date !== undefined) entry.date = update.date;
    if (update.hours !== undefined) entry.hours = update.hours;
    if (update.work !== undefined) entry.work = update.work;
    if (update.billable !== undefined) entry.billable = update.billable;
    if (update.status !== undefined) entry.status = update.status;
    if (update.projectId !== undefined) entry.projectId = update.projectId;
    if (update.customerId !== undefined) entry.customerId = update.customerId;
    return structuredClone(entry);
  }

  public async searchTime(query: TimeQuery): Promise<Page<TimeEntry>> {
    this.guard("searchTime");
    const matches = this.data.timeEntries.filter((entry) => {
      if (query.employeeId && entry.employeeId !== query.employeeId)
        return false;
      if (query.projectId && entry.projectId !== query.projectId) return false;
      if (query.dateFrom && entry.date < query.dateFrom) return false;
      if (query.dateTo && entry.date > query.dateTo) return false;
      return true;
    });
    return paginate(matches, query);
  }

  public async listWiki(): Promise<string[]> {
    this.guard("listWiki");
    return this.data.wiki.map((page) => page.path);
  }

  public async getWikiPage(path: string): Promise<WikiPage> {
    this.guard("getWikiPage");
    const page = this.data.wiki.find((item) => item.path === path);
    if (!page) {
      throw new PlatformError(`Wiki page ${path} not found`, 404, "getWikiPage");
    }
    return { ...page };
  }

  public async putWikiPage(page: WikiPage): Promise<WikiPage> {
    this.guard("putWikiPage");
    const existing = this.data.wiki.find((item) => item.path === page.path);
    if (existing) {
      existing.content = page.content;
    } else {
      this.data.wiki.push({ ...page });
    }
    return { ...page };
  }

  public async deleteWikiPage(path: string): Promise<void> {
    this.guard("deleteWikiPage");
    const index = this.data.wiki.findIndex((item) => item.path === path);
    if (index < 0) {
      throw new PlatformError(`Wiki page ${path} not found`, 404, "deleteWikiPage");
    }
    this.data.wiki.splice(index, 1);
  }

  public async provideResponse(
    taskId: string,
    response: OutboundResponse
  ): Promise<void> {
    this.guard("provideResponse");
    const list = this.responses.get(taskId) ?? [];
    list.push(structuredClone(response));
    this.responses.set(taskId, list);
  }

  private guard(operation: PlatformOperation): void {
    const failure = this.failures.get(operation)?.shift();
    if (failure) {
      throw new PlatformError(failure.message, failure.status, operation);
    }
  }

  private findEmployee(id: string, operation: PlatformOperation): Employee {
    const employee = this.data.employees.find((item) => item.id === id);
    if (!employee) {
      throw new PlatformError(`Employee ${id} not found`, 404, operation);
    }
    return employee;
  }

  private findProject(id: string, operation: PlatformOperation): Project {
    const project = this.data.projects.find((item) => item.id === id);
    if (!project) {
      throw new PlatformError(`Project ${id} not found`, 404, operation);
    }
    return project;
  }
}

function paginate<T>(items: T[], request: PageRequest): Page<T> {
  const slice = items.slice(request.offset, request.offset + request.limit);
  const next = request.offset + request.limit;
  return {
    items: structuredClone(slice),
    nextOffset: next < items.length ? next : null,
  };
}
