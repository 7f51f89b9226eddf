/**
 * Project registry: which projects exist and where their checkouts live.
 *
 * File format:
 *   { "projects": { "<id>": { "path": "/abs/path", "defaultBranch": "main" } } }
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod/v4";
import type { ProjectDirectory } from "./types.ts";

const projectSchema = z.object({
  path: z.string().min(1),
  defaultBranch: z.string().min(1).optional(),
  description: z.string().optional(),
});

const projectsFileSchema = z.object({
  projects: z.record(z.string().min(1), projectSchema),
});

export type ProjectEntry = z.infer<typeof projectSchema>;

export interface Project extends ProjectEntry {
  id: string;
}

export class ProjectRegistry implements ProjectDirectory {
  private readonly projects: Map<string, Project>;

  constructor(projects: Project[] = []) {
    this.projects = new Map(projects.map((p) => [p.id, p]));
  }

  async projectExists(projectId: string): Promise<boolean> {
    return this.projects.has(projectId);
  }

  get(projectId: string): Project | undefined {
    return this.projects.get(projectId);
  }

  list(): Project[] {
    return [...this.projects.values()].sort((a, b) => a.id.localeCompare(b.id));
  }
}

/**
 * Parse a projects file. Relative paths resolve against the file's
 * directory. Throws with the validation problems when the file is malformed.
 */
export function parseProjectsFile(raw: string, filePath: string): Project[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = projectsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`${filePath} is malformed:\n${z.prettifyError(parsed.error)}`);
  }

  const baseDir = path.dirname(filePath);
  return Object.entries(parsed.data.projects).map(([id, entry]) => ({
    id,
    ...entry,
    path: path.resolve(baseDir, entry.path),
  }));
}

/** A missing file is an empty registry. */
export function loadProjectRegistry(filePath: string): ProjectRegistry {
  if (!fs.existsSync(filePath)) {
    console.warn(`[projects] No projects file at ${filePath}; /bind will reject every project`);
    return new ProjectRegistry();
  }
  const projects = parseProjectsFile(fs.readFileSync(filePath, "utf-8"), filePath);
  console.log(`[projects] Loaded ${projects.length} project(s) from ${filePath}`);
  return new ProjectRegistry(projects);
}
