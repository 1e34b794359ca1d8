import createDebug from "debug";
import type { NotionApi, DatabasePage } from "./notion.js";
import type { TodoColumns } from "../config.js";
import type { Chore, EmojiIcon, Roomie, TodoDraft } from "../types.js";

const debug = createDebug("chores:store");

export interface HouseholdStore {
  listChores(): Promise<Chore[]>;
  listRoomies(): Promise<Roomie[]>;
  /** Returns the id of the created to-do page. */
  createTodo(draft: TodoDraft): Promise<string>;
}

export interface HouseholdStoreOptions {
  choresDatabaseId: string;
  roomiesDatabaseId: string;
  todosDatabaseId: string;
  columns: TodoColumns;
}

/** Plain text of the page's title property; "" when it has none. */
export function pageTitle(page: DatabasePage): string {
  for (const prop of Object.values(page.properties)) {
    if (prop.type === "title") {
      return (prop.title ?? [])
        .map((t) => t.plain_text)
        .join("")
        .trim();
    }
  }
  return "";
}

export function pageEmoji(page: DatabasePage): EmojiIcon | null {
  const icon = page.icon;
  return icon?.type === "emoji" ? { type: "emoji", emoji: icon.emoji } : null;
}

export function initHouseholdStore(
  api: NotionApi,
  options: HouseholdStoreOptions,
): HouseholdStore {
  const { columns } = options;

  async function queryAll(databaseId: string): Promise<DatabasePage[]> {
    const pages: DatabasePage[] = [];
    let cursor: string | undefined;
    do {
      const batch = await api.queryDatabase(databaseId, cursor);
      pages.push(...batch.pages);
      cursor = batch.nextCursor ?? undefined;
    } while (cursor);
    return pages;
  }

  /** Chores and roomies share a shape: titled pages with an optional emoji. */
  async function listNamed(
    databaseId: string,
    kind: string,
  ): Promise<Array<{ id: string; name: string; icon: EmojiIcon | null }>> {
    const records: Array<{ id: string; name: string; icon: EmojiIcon | null }> =
      [];
    for (const page of await queryAll(databaseId)) {
      const name = pageTitle(page);
      if (!name) {
        debug("Skipping untitled %s page %s", kind, page.id);
        continue;
      }
      records.push({ id: page.id, name, icon: pageEmoji(page) });
    }
    debug("Loaded %d %s(s)", records.length, kind);
    return records;
  }

  return {
    listChores(): Promise<Chore[]> {
      return listNamed(options.choresDatabaseId, "chore");
    },

    listRoomies(): Promise<Roomie[]> {
      return listNamed(options.roomiesDatabaseId, "roomie");
    },

    async createTodo(draft: TodoDraft): Promise<string> {
      const page = await api.createPage({
        parent: { database_id: options.todosDatabaseId },
        icon: draft.chore.icon,
        properties: {
          [columns.title]: { title: [{ text: { content: draft.title } }] },
          [columns.due]: { date: { start: draft.dueDate } },
          [columns.assignee]: { relation: [{ id: draft.roomie.id }] },
          [columns.chore]: { relation: [{ id: draft.chore.id }] },
        },
      });
      return page.id;
    },
  };
}
