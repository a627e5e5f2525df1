import { readFile } from "node:fs/promises";
import path from "node:path";
import type { ZodIssue } from "zod";
import {
  InvalidProjectConfigError,
  PROJECT_CONFIG_FILENAME,
  ProjectConfigNotFoundError,
  projectConfigSchema,
  projectTitleSchema,
  type ProjectConfig
} from "../../core/config/index.js";
import { errnoOf } from "../../core/store/errors.js";

export const PROJECT_TITLE_ENV = "SAVEKEEP_PROJECT";

export interface LoadProjectConfigParams {
  cwd?: string;
  filename?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Reads the project title from `SAVEKEEP_PROJECT`, or from `savekeep.json` in
 * the working directory when the variable is unset.
 */
export async function loadProjectConfig(params: LoadProjectConfigParams = {}): Promise<ProjectConfig> {
  const env = params.env ?? process.env;
  const override = env[PROJECT_TITLE_ENV];
  if (override !== undefined && override.trim() !== "") {
    const title = projectTitleSchema.safeParse(override);
    if (!title.success) {
      throw new InvalidProjectConfigError(PROJECT_TITLE_ENV, formatIssue(title.error.issues[0]));
    }
    return { project: { title: title.data } };
  }

  const configPath = path.join(params.cwd ?? process.cwd(), params.filename ?? PROJECT_CONFIG_FILENAME);
  let content: string;
  try {
    content = await readFile(configPath, "utf8");
  } catch (error) {
    if (errnoOf(error) === "ENOENT") {
      throw new ProjectConfigNotFoundError(configPath, PROJECT_TITLE_ENV);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new InvalidProjectConfigError(configPath, "invalid JSON");
  }

  const parsed = projectConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidProjectConfigError(configPath, formatIssue(parsed.error.issues[0]));
  }
  return parsed.data;
}

function formatIssue(issue: ZodIssue | undefined): string {
  if (!issue) {
    return "unknown error";
  }
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
