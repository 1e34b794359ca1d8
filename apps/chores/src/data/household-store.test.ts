import type { CreatePageParameters } from "@notionhq/client/build/src/api-endpoints";
import { initHouseholdStore, pageTitle } from "./household-store.js";
import type { DatabasePage, NotionApi } from "./notion.js";
import type { TodoDraft } from "../types.js";

const columns = {
  title: "name",
  due: "do by",
  assignee: "responsible roomie",
  chore: "chore",
};

function page(
  id: string,
  title: string[],
  icon: DatabasePage["icon"] = null,
): DatabasePage {
  return {
    id,
    icon,
    properties: {
      Notes: { type: "rich_text" },
      Name: { type: "title", title: title.map((t) => ({ plain_text: t })) },
    },
  };
}

/** In-process NotionApi: each database is a list of result batches. */
function fakeNotion(databases: Record<string, DatabasePage[][]>) {
  const queries: Array<{ databaseId: string; cursor?: string }> = [];
  const created: CreatePageParameters[] = [];
  const api: NotionApi = {
    async queryDatabase(databaseId, startCursor) {
      queries.push({ databaseId, cursor: startCursor });
      const batches = databases[databaseId] ?? [[]];
      const index = startCursor ? Number(startCursor) : 0;
      return {
        pages: batches[index],
        nextCursor: index + 1 < batches.length ? String(index + 1) : null,
      };
    },
    async createPage(params) {
      created.push(params);
      return { id: `page-${created.length}` };
    },
  };
  return { api, queries, created };
}

function store(api: NotionApi) {
  return initHouseholdStore(api, {
    choresDatabaseId: "chores-db",
    roomiesDatabaseId: "roomies-db",
    todosDatabaseId: "todos-db",
    columns,
  });
}

describe("household store", () => {
  test("follows cursors until the last batch", async () => {
    const notion = fakeNotion({
      "chores-db": [
        [page("c1", ["Kitchen"]), page("c2", ["Bathroom"])],
        [page("c3", ["Trash"])],
      ],
    });
    const chores = await store(notion.api).listChores();
    expect(chores.map((c) => c.name)).toEqual(["Kitchen", "Bathroom", "Trash"]);
    expect(notion.queries).toEqual([
      { databaseId: "chores-db", cursor: undefined },
      { databaseId: "chores-db", cursor: "1" },
    ]);
  });

  test("skips pages without a title", async () => {
    const notion = fakeNotion({
      "roomies-db": [[page("r1", ["Alice"]), page("r2", []), page("r3", ["  "])]],
    });
    const roomies = await store(notion.api).listRoomies();
    expect(roomies).toEqual([{ id: "r1", name: "Alice", icon: null }]);
  });

  test("keeps emoji icons and drops other icon kinds", async () => {
    const notion = fakeNotion({
      "chores-db": [
        [
          page("c1", ["Kitchen"], { type: "emoji", emoji: "🍳" }),
          page("c2", ["Yard"], {
            type: "external",
            external: { url: "https://example.com/yard.png" },
          }),
        ],
      ],
    });
    const chores = await store(notion.api).listChores();
    expect(chores.map((c) => c.icon)).toEqual([
      { type: "emoji", emoji: "🍳" },
      null,
    ]);
  });

  test("creates a to-do page with relations, due date and chore icon", async () => {
    const notion = fakeNotion({});
    const draft: TodoDraft = {
      chore: { id: "c1", name: "Kitchen", icon: { type: "emoji", emoji: "🍳" } },
      roomie: { id: "r1", name: "Alice", icon: null },
      title: "🧹 Alice's chore for 2026-01-12",
      dueAt: new Date("2026-01-12T12:00:00Z"),
      dueDate: "2026-01-12",
    };
    const pageId = await store(notion.api).createTodo(draft);
    expect(pageId).toBe("page-1");
    expect(notion.created).toEqual([
      {
        parent: { database_id: "todos-db" },
        icon: { type: "emoji", emoji: "🍳" },
        properties: {
          name: { title: [{ text: { content: "🧹 Alice's chore for 2026-01-12" } }] },
          "do by": { date: { start: "2026-01-12" } },
          "responsible roomie": { relation: [{ id: "r1" }] },
          chore: { relation: [{ id: "c1" }] },
        },
      },
    ]);
  });
});

describe("pageTitle", () => {
  test("joins rich text segments", () => {
    expect(pageTitle(page("c1", ["Kitchen", " & ", "bath"]))).toBe(
      "Kitchen & bath",
    );
  });

  test("is empty when no property is a title", () => {
    expect(
      pageTitle({ id: "x", icon: null, properties: { Notes: { type: "rich_text" } } }),
    ).toBe("");
  });
});
