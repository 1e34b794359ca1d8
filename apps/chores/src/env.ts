import dotenv from "dotenv";
import { join, resolve } from "path";

const PROJECT_ROOT = resolve(join(__dirname, "..", "..", ".."));

// Load .env from project root so it works when the scheduler runs from anywhere
dotenv.config({ path: join(PROJECT_ROOT, ".env") });

function str(name: string, defaultValue: string): string {
  const v = process.env[name];
  return (typeof v === "string" && v.trim()) || defaultValue;
}
function num(name: string, defaultValue: number): number {
  const v = process.env[name];
  if (v === undefined || v === "") return defaultValue;
  const n = Number(v);
  return Number.isFinite(n) ? n : defaultValue;
}

/** Loaded once at startup. Use this instead of process.env everywhere. */
export const env = {
  /** Namespaces passed to debug.enable(); an empty DEBUG= silences the runner. */
  DEBUG: process.env.DEBUG ?? "chores:*",
  NOTION_TOKEN: str("NOTION_TOKEN", ""),
  CHORES_DATABASE_ID: str("CHORES_DATABASE_ID", ""),
  ROOMIES_DATABASE_ID: str("ROOMIES_DATABASE_ID", ""),
  TODOS_DATABASE_ID: str("TODOS_DATABASE_ID", ""),
  /** Week 0 of the rotation. Any date works; changing it shifts every assignment. */
  ROTATION_START: str("ROTATION_START", "2025-12-07"),
  DUE_IN_DAYS: num("DUE_IN_DAYS", 7),
  /** IANA zone used to turn the due instant into a calendar date. Defaults to the host zone. */
  TIME_ZONE: str("TIME_ZONE", Intl.DateTimeFormat().resolvedOptions().timeZone),
  /** Notion client request timeout. Default 60 seconds (the client's own default). */
  NOTION_TIMEOUT_MS: num("NOTION_TIMEOUT_MS", 60_000),
  DRY_RUN: str("DRY_RUN", "false"),
  TODO_TITLE_COLUMN: str("TODO_TITLE_COLUMN", "name"),
  TODO_DUE_COLUMN: str("TODO_DUE_COLUMN", "do by"),
  TODO_ASSIGNEE_COLUMN: str("TODO_ASSIGNEE_COLUMN", "responsible roomie"),
  TODO_CHORE_COLUMN: str("TODO_CHORE_COLUMN", "chore"),
} as const;

export type Env = { [K in keyof typeof env]: (typeof env)[K] };
