import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  DepartmentSchema,
  LocationSchema,
  type Department,
  type Location,
} from "./records.js";

export interface ReferenceData {
  departments: Department[];
  locations: Location[];
}

async function readJson<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const raw = await readFile(filePath, "utf8");
  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(
      `Invalid reference data in ${filePath}: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
  }
  return parsed.data;
}

/**
 * Public company reference data: departments and locations. Safe to
 * show to guests.
 */
export async function loadReferenceData(
  dataDir: string
): Promise<ReferenceData> {
  const [departments, locations] = await Promise.all([
    readJson(path.join(dataDir, "departments.json"), z.array(DepartmentSchema)),
    readJson(path.join(dataDir, "locations.json"), z.array(LocationSchema)),
  ]);
  return { departments, locations };
}

export function findDepartment(
  reference: ReferenceData,
  name: string
): Department | undefined {
  return reference.departments.find(
    (department) => department.name.toLowerCase() === name.toLowerCase()
  );
}
