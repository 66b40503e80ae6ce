import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { z } from "zod";
import type { CampusMap, CourseSection, InformationData } from "../types.js";
import {
  coursesFileSchema, informationFileSchema, mapFileSchema, toCampusMap, toCourseSections, toInformationData,
} from "./schemas.js";

export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../../data", import.meta.url));

export interface CampusData {
  map: CampusMap;
  courses: CourseSection[];
  information: InformationData;
}

async function readJson<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>> {
  const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new Error(`Invalid data in ${path}: ${issues}`);
  }
  return parsed.data;
}

export async function loadCampusData(dataDir: string = DEFAULT_DATA_DIR): Promise<CampusData> {
  const mapFile = await readJson(join(dataDir, "map.json"), mapFileSchema);
  const coursesFile = await readJson(join(dataDir, "courses.json"), coursesFileSchema);
  const informationFile = await readJson(join(dataDir, "information.json"), informationFileSchema);
  return {
    map: toCampusMap(mapFile),
    courses: toCourseSections(coursesFile),
    information: toInformationData(informationFile),
  };
}
