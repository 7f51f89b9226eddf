/**
 * Channel name → branch inference, plus the `@branch` per-message override.
 *
 * Everything here is pure: the same channel name always yields the same
 * branch, whatever was resolved before.
 */

import { BridgeError } from "../errors.ts";

export const DEFAULT_MAIN_BRANCH = "main";

const MAIN_BRANCH_NAMES = new Set(["main", "master"]);
const ISSUE_PATTERN = /^issue-(\d+)(?:-(.+))?$/;
const FEAT_PATTERN = /^feat[-/](.+)$/;

const MAX_BRANCH_LENGTH = 100;
const BRANCH_CHARS = /^[A-Za-z0-9._/-]+$/;

/** Platform-wide mentions that look like an override but are not one. */
const RESERVED_MENTIONS = new Set(["everyone", "here"]);

export type ChannelKind = "main" | "issue" | "feature" | "literal";

export interface ChannelClassification {
  kind: ChannelKind;
  branch: string;
  /** Issue number, for `issue-<n>` channels */
  issue?: number;
}

export interface BranchOptions {
  /** Branch that `main` and `master` channels map to (default: "main") */
  mainBranch?: string;
}

export interface BranchOverride {
  branch: string;
  /** Message text with the `@branch` prefix removed */
  remainder: string;
}

export function classifyChannelName(
  channelName: string,
  options: BranchOptions = {},
): ChannelClassification {
  const name = channelName.trim().toLowerCase();

  if (MAIN_BRANCH_NAMES.has(name)) {
    return { kind: "main", branch: options.mainBranch ?? DEFAULT_MAIN_BRANCH };
  }

  const issue = ISSUE_PATTERN.exec(name);
  if (issue) {
    const [, num, description] = issue;
    return {
      kind: "issue",
      branch: description ? `issue-${num}-${description}` : `issue-${num}`,
      issue: Number(num),
    };
  }

  const feat = FEAT_PATTERN.exec(name);
  if (feat) {
    return { kind: "feature", branch: `feat-${feat[1]}` };
  }

  return { kind: "literal", branch: name };
}

/**
 * Returns the reason a branch name is rejected, or null when it is usable.
 *
 * Accepted: ASCII letters, digits, `.`, `_`, `-` and `/`, up to 100 chars,
 * with the git ref-name restrictions that apply to that alphabet.
 */
export function branchNameProblem(branch: string): string | null {
  if (branch.length === 0) return "branch name is empty";
  if (branch.length > MAX_BRANCH_LENGTH) {
    return `branch name is longer than ${MAX_BRANCH_LENGTH} characters`;
  }
  if (!BRANCH_CHARS.test(branch)) {
    return "only letters, digits, '.', '_', '-' and '/' are allowed";
  }
  if (/^[-/.]/.test(branch)) return "branch name cannot start with '-', '/' or '.'";
  if (/[/.]$/.test(branch)) return "branch name cannot end with '/' or '.'";
  if (branch.includes("..")) return "branch name cannot contain '..'";
  if (branch.includes("//")) return "branch name cannot contain '//'";
  if (branch.includes("/.")) return "path components cannot start with '.'";
  if (branch.endsWith(".lock")) return "branch name cannot end with '.lock'";
  return null;
}

export function validateBranchName(branch: string): string {
  const problem = branchNameProblem(branch);
  if (problem) {
    throw new BridgeError("InvalidBranchName", `Invalid branch \`${branch}\`: ${problem}.`);
  }
  return branch;
}

const OVERRIDE_PATTERN = /^@(\S+)(?:\s+([\s\S]*))?$/;

function matchOverride(text: string): { token: string; rest: string } | null {
  const match = OVERRIDE_PATTERN.exec(text.trimStart());
  if (!match) return null;

  const [, token, rest] = match;
  if (!token || RESERVED_MENTIONS.has(token)) return null;
  return { token, rest: rest ?? "" };
}

/** Whether the text starts with an `@branch` prefix, valid or not. */
export function hasBranchOverride(text: string): boolean {
  return matchOverride(text) !== null;
}

/**
 * Parse a leading `@branch` prefix. Returns null when the text has none.
 * Throws `InvalidBranchName` when the prefix is present but unusable.
 */
export function parseBranchOverride(text: string): BranchOverride | null {
  const match = matchOverride(text);
  if (!match) return null;
  return { branch: validateBranchName(match.token), remainder: match.rest.trim() };
}

/** Override wins verbatim; otherwise the channel name is classified. */
export function resolveBranch(
  channelName: string,
  explicitOverride?: string,
  options: BranchOptions = {},
): string {
  if (explicitOverride !== undefined) {
    return validateBranchName(explicitOverride);
  }
  return classifyChannelName(channelName, options).branch;
}
