import { z } from "zod";
import { env, type Env } from "./env.js";
import { isDateKey } from "./utils/date.js";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export interface TodoColumns {
  title: string;
  due: string;
  assignee: string;
  chore: string;
}

export interface RunnerConfig {
  notionToken: string;
  choresDatabaseId: string;
  roomiesDatabaseId: string;
  todosDatabaseId: string;
  /** Calendar date (YYYY-MM-DD) of week 0 of the rotation. */
  rotationStart: string;
  dueInDays: number;
  timeZone: string;
  notionTimeoutMs: number;
  dryRun: boolean;
  columns: TodoColumns;
}

const required = (name: string) =>
  z.string().trim().min(1, `${name} must be set`);

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const schema = z.object({
  NOTION_TOKEN: required("NOTION_TOKEN"),
  CHORES_DATABASE_ID: required("CHORES_DATABASE_ID"),
  ROOMIES_DATABASE_ID: required("ROOMIES_DATABASE_ID"),
  TODOS_DATABASE_ID: required("TODOS_DATABASE_ID"),
  ROTATION_START: z
    .string()
    .refine(isDateKey, "ROTATION_START must be a YYYY-MM-DD date"),
  DUE_IN_DAYS: z.number().int().min(0, "DUE_IN_DAYS must be >= 0"),
  TIME_ZONE: z.string().refine(isTimeZone, "TIME_ZONE is not a known zone"),
  NOTION_TIMEOUT_MS: z.number().int().positive(),
  DRY_RUN: z.string().transform((s) => /^(1|true|yes)$/i.test(s.trim())),
  TODO_TITLE_COLUMN: z.string().min(1),
  TODO_DUE_COLUMN: z.string().min(1),
  TODO_ASSIGNEE_COLUMN: z.string().min(1),
  TODO_CHORE_COLUMN: z.string().min(1),
});

/**
 * Validate env into the runner config. `overrides` wins over the loaded env;
 * the entry point uses it for command-line flags.
 */
export function loadRunnerConfig(
  source: Env = env,
  overrides: Partial<Pick<RunnerConfig, "dryRun">> = {},
): RunnerConfig {
  const parsed = schema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const c = parsed.data;
  return {
    notionToken: c.NOTION_TOKEN,
    choresDatabaseId: c.CHORES_DATABASE_ID,
    roomiesDatabaseId: c.ROOMIES_DATABASE_ID,
    todosDatabaseId: c.TODOS_DATABASE_ID,
    rotationStart: c.ROTATION_START,
    dueInDays: c.DUE_IN_DAYS,
    timeZone: c.TIME_ZONE,
    notionTimeoutMs: c.NOTION_TIMEOUT_MS,
    dryRun: overrides.dryRun ?? c.DRY_RUN,
    columns: {
      title: c.TODO_TITLE_COLUMN,
      due: c.TODO_DUE_COLUMN,
      assignee: c.TODO_ASSIGNEE_COLUMN,
      chore: c.TODO_CHORE_COLUMN,
    },
  };
}
