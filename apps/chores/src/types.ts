import type { PageObjectResponse } from "@notionhq/client/build/src/api-endpoints";

/** Emoji page icon as Notion returns it; also accepted when creating pages. */
export type EmojiIcon = Extract<
  NonNullable<PageObjectResponse["icon"]>,
  { type: "emoji" }
>;

export interface Roomie {
  id: string;
  name: string;
  icon: EmojiIcon | null;
}

export interface Chore {
  id: string;
  name: string;
  icon: EmojiIcon | null;
}

export interface Assignment {
  chore: Chore;
  roomie: Roomie;
}

/** A to-do ready to be written to the to-dos database. */
export interface TodoDraft extends Assignment {
  title: string;
  /** Due instant: invocation time + the due offset in days. */
  dueAt: Date;
  /** dueAt as YYYY-MM-DD in the configured time zone. */
  dueDate: string;
}

export interface CreatedTodo extends TodoDraft {
  pageId: string;
}

export interface RunSummary {
  choreCount: number;
  roomieCount: number;
  /** Rotation week the assignments were computed for. */
  week: number;
  dryRun: boolean;
  /** Created to-dos, or the unsent drafts on a dry run. */
  todos: Array<CreatedTodo | TodoDraft>;
}
