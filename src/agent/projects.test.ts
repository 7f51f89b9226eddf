import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ProjectRegistry, loadProjectRegistry, parseProjectsFile } from "./projects.ts";

describe("parseProjectsFile", () => {
  it("resolves relative paths against the file's directory", () => {
    const projects = parseProjectsFile(
      JSON.stringify({
        projects: {
          webapp: { path: "../code/webapp", defaultBranch: "develop" },
          api: { path: "/abs/api" },
        },
      }),
      "/etc/branchline/projects.json",
    );

    expect(projects).toEqual([
      { id: "webapp", path: "/etc/code/webapp", defaultBranch: "develop" },
      { id: "api", path: "/abs/api" },
    ]);
  });

  it("rejects invalid JSON", () => {
    expect(() => parseProjectsFile("{", "/x/projects.json")).toThrow("/x/projects.json is not valid JSON");
  });

  it("rejects a file that does not match the schema", () => {
    expect(() => parseProjectsFile(JSON.stringify({ projects: { a: {} } }), "/x/projects.json")).toThrow(
      "/x/projects.json is malformed",
    );
  });
});

describe("ProjectRegistry", () => {
  it("answers projectExists and lists projects by id", async () => {
    const registry = new ProjectRegistry([
      { id: "web", path: "/w" },
      { id: "api", path: "/a" },
    ]);

    expect(await registry.projectExists("web")).toBe(true);
    expect(await registry.projectExists("mobile")).toBe(false);
    expect(registry.get("api")?.path).toBe("/a");
    expect(registry.list().map((p) => p.id)).toEqual(["api", "web"]);
  });
});

describe("loadProjectRegistry", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "branchline-projects-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns an empty registry when the file is missing", () => {
    expect(loadProjectRegistry(path.join(tmpDir, "missing.json")).list()).toEqual([]);
  });

  it("loads projects from disk", async () => {
    const file = path.join(tmpDir, "projects.json");
    fs.writeFileSync(file, JSON.stringify({ projects: { webapp: { path: "webapp" } } }));

    const registry = loadProjectRegistry(file);

    expect(registry.get("webapp")?.path).toBe(path.join(tmpDir, "webapp"));
  });
});
