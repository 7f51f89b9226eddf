import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { registerBindingCommands } from "./bindings.ts";
import { registerResolveCommand } from "./resolve.ts";
import { registerRunCommand } from "./run.ts";
import { registerSessionsCommand } from "./sessions.ts";

function getVersion(): string {
  try {
    // Walk up from this file to find package.json
    let dir = path.dirname(fileURLToPath(import.meta.url));
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, "package.json");
      if (fs.existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
        if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
          return pkg.version;
        }
        return "0.0.0";
      }
      dir = path.dirname(dir);
    }
  } catch (err) {
    console.warn("[cli] Could not read package version:", err);
  }
  return "0.0.0";
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("branchline")
    .description("Discord bridge that maps channels to git branches of coding-agent projects")
    .version(getVersion());

  registerRunCommand(program);
  registerBindingCommands(program);
  registerSessionsCommand(program);
  registerResolveCommand(program);

  return program;
}
