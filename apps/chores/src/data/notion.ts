/**
 * Shared Notion client plus the narrow NotionApi the household store talks to.
 * Tests hand the store an in-process NotionApi instead of a real client.
 */
import createDebug from "debug";
import { Client, LogLevel } from "@notionhq/client";
import type {
  CreatePageParameters,
  PageObjectResponse,
  QueryDatabaseResponse,
} from "@notionhq/client/build/src/api-endpoints";

const debug = createDebug("chores:notion");

/** The slice of a page property the store reads: titles only. */
export interface PageProperty {
  type: string;
  title?: Array<{ plain_text: string }>;
}

export interface DatabasePage {
  id: string;
  icon: PageObjectResponse["icon"];
  properties: Record<string, PageProperty>;
}

export interface DatabasePageBatch {
  pages: DatabasePage[];
  /** Cursor for the next batch, or null when this was the last one. */
  nextCursor: string | null;
}

export interface NotionApi {
  queryDatabase(
    databaseId: string,
    startCursor?: string,
  ): Promise<DatabasePageBatch>;
  createPage(params: CreatePageParameters): Promise<{ id: string }>;
}

export interface NotionClientOptions {
  token: string;
  timeoutMs: number;
}

let client: Client | null = null;

export function getNotion(options: NotionClientOptions): Client {
  if (!client) {
    client = new Client({
      auth: options.token,
      timeoutMs: options.timeoutMs,
      logLevel: LogLevel.INFO,
      logger: (level, message, extraInfo) => {
        debug("[%s] %s %o", level, message, extraInfo);
      },
    });
  }
  return client;
}

type QueryResult = QueryDatabaseResponse["results"][number];

function isFullPageObject(result: QueryResult): result is PageObjectResponse {
  return result.object === "page" && "properties" in result;
}

/** Adapt a Notion client to NotionApi. Rows come back oldest first so the rotation order is stable. */
export function createNotionApi(notion: Client): NotionApi {
  return {
    async queryDatabase(databaseId, startCursor) {
      const response = await notion.databases.query({
        database_id: databaseId,
        start_cursor: startCursor,
        sorts: [{ timestamp: "created_time", direction: "ascending" }],
      });
      const pages = response.results
        .filter(isFullPageObject)
        .map((page) => ({
          id: page.id,
          icon: page.icon,
          properties: page.properties,
        }));
      return {
        pages,
        nextCursor: response.has_more ? response.next_cursor : null,
      };
    },

    async createPage(params) {
      const page = await notion.pages.create(params);
      return { id: page.id };
    },
  };
}
