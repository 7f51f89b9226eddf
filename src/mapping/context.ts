/**
 * Resolves the (project, branch) pair a channel works on.
 *
 * Project: explicit binding, then the channel's category (when category
 * inference is enabled), then the configured default project.
 * Branch: per-message override, then the binding's fixed branch, then the
 * channel name.
 */

import type { Binding } from "../state/types.ts";
import { classifyChannelName, validateBranchName, type BranchOptions } from "./branch.ts";

export type ProjectSource = "binding" | "category" | "default";
export type BranchSource = "override" | "binding" | "channel";

export interface ChannelContext {
  projectId: string;
  projectSource: ProjectSource;
  branch: string;
  branchSource: BranchSource;
}

export interface ChannelDescriptor {
  channelName: string;
  categoryName?: string;
}

export interface ContextOptions extends BranchOptions {
  inferProjectFromCategory?: boolean;
  defaultProject?: string;
}

/** "Web Platform" → "web-platform" */
export function inferProjectFromCategoryName(categoryName: string): string {
  return categoryName.trim().toLowerCase().replace(/\s+/g, "-");
}

export function resolveChannelContext(
  channel: ChannelDescriptor,
  binding: Binding | undefined,
  override: string | undefined,
  options: ContextOptions = {},
): ChannelContext | null {
  let projectId: string | undefined;
  let projectSource: ProjectSource | undefined;

  if (binding) {
    projectId = binding.projectId;
    projectSource = "binding";
  } else if (options.inferProjectFromCategory && channel.categoryName?.trim()) {
    projectId = inferProjectFromCategoryName(channel.categoryName);
    projectSource = "category";
  } else if (options.defaultProject) {
    projectId = options.defaultProject;
    projectSource = "default";
  }

  if (projectId === undefined || projectSource === undefined) return null;

  if (override !== undefined) {
    return {
      projectId,
      projectSource,
      branch: validateBranchName(override),
      branchSource: "override",
    };
  }

  if (binding?.branch) {
    return { projectId, projectSource, branch: binding.branch, branchSource: "binding" };
  }

  return {
    projectId,
    projectSource,
    branch: classifyChannelName(channel.channelName, options).branch,
    branchSource: "channel",
  };
}
