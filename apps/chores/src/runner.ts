/**
 * Weekly assignment run: read chores and roomies, rotate, write one to-do per chore.
 * One linear pass; any failure ends the run and nothing already written is undone.
 */
import createDebug from "debug";
import type { HouseholdStore } from "./data/household-store.js";
import { assignRoomies, NoRoomiesError } from "./rotation/assign.js";
import { addDays, toDateKey, weeksBetween } from "./utils/date.js";
import type {
  Assignment,
  CreatedTodo,
  RunSummary,
  TodoDraft,
} from "./types.js";

const debug = createDebug("chores:runner");

export class TodoCreationError extends Error {
  constructor(
    readonly draft: TodoDraft,
    readonly created: CreatedTodo[],
    options: { cause: unknown },
  ) {
    super(
      `Failed to create to-do for ${draft.chore.name} (${created.length} created before the failure)`,
      options,
    );
    this.name = "TodoCreationError";
  }
}

export interface RunOptions {
  store: HouseholdStore;
  now: Date;
  /** YYYY-MM-DD of rotation week 0. */
  rotationStart: string;
  dueInDays: number;
  timeZone: string;
  dryRun?: boolean;
}

export function todoTitle(roomieName: string, dueDate: string): string {
  return `🧹 ${roomieName}'s chore for ${dueDate}`;
}

export function buildDrafts(
  assignments: Assignment[],
  dueAt: Date,
  timeZone: string,
): TodoDraft[] {
  const dueDate = toDateKey(dueAt, timeZone);
  return assignments.map(({ chore, roomie }) => ({
    chore,
    roomie,
    title: todoTitle(roomie.name, dueDate),
    dueAt,
    dueDate,
  }));
}

export async function runWeeklyChores(opts: RunOptions): Promise<RunSummary> {
  const { store, now } = opts;
  const dryRun = opts.dryRun ?? false;
  const week = weeksBetween(opts.rotationStart, now, opts.timeZone);

  const chores = await store.listChores();
  if (chores.length === 0) {
    debug("No chores found; nothing to assign");
    return { choreCount: 0, roomieCount: 0, week, dryRun, todos: [] };
  }

  const roomies = await store.listRoomies();
  if (roomies.length === 0) throw new NoRoomiesError();

  debug(
    "Found %d chore(s) and %d roomie(s); rotation week %d",
    chores.length,
    roomies.length,
    week,
  );

  const drafts = buildDrafts(
    assignRoomies(chores, roomies, week),
    addDays(now, opts.dueInDays),
    opts.timeZone,
  );
  const summary = {
    choreCount: chores.length,
    roomieCount: roomies.length,
    week,
    dryRun,
  };

  if (dryRun) {
    for (const d of drafts) {
      debug("[dry run] %s -> %s (due %s)", d.chore.name, d.roomie.name, d.dueDate);
    }
    return { ...summary, todos: drafts };
  }

  const created: CreatedTodo[] = [];
  for (const draft of drafts) {
    let pageId: string;
    try {
      pageId = await store.createTodo(draft);
    } catch (err) {
      throw new TodoCreationError(draft, created, { cause: err });
    }
    created.push({ ...draft, pageId });
    debug(
      "Created %s for %s (due %s)",
      draft.chore.name,
      draft.roomie.name,
      draft.dueDate,
    );
  }

  debug("Completed: %d/%d to-do(s) created", created.length, drafts.length);
  return { ...summary, todos: created };
}
