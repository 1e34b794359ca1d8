/**
 * One-shot entry point for the weekly scheduler: `node dist/chores/src/index.js [--dry-run]`.
 * Exits 0 after a completed (or empty) run and 1 on any failure.
 */
import createDebug from "debug";
import { env, type Env } from "./env.js";
import { loadRunnerConfig, type RunnerConfig } from "./config.js";
import { createNotionApi, getNotion } from "./data/notion.js";
import {
  initHouseholdStore,
  type HouseholdStore,
} from "./data/household-store.js";
import { runWeeklyChores } from "./runner.js";

const debug = createDebug("chores:main");

export interface MainDeps {
  source: Env;
  openStore: (config: RunnerConfig) => HouseholdStore;
  now: () => Date;
}

function openNotionStore(config: RunnerConfig): HouseholdStore {
  const notion = getNotion({
    token: config.notionToken,
    timeoutMs: config.notionTimeoutMs,
  });
  return initHouseholdStore(createNotionApi(notion), {
    choresDatabaseId: config.choresDatabaseId,
    roomiesDatabaseId: config.roomiesDatabaseId,
    todosDatabaseId: config.todosDatabaseId,
    columns: config.columns,
  });
}

const defaultDeps: MainDeps = {
  source: env,
  openStore: openNotionStore,
  now: () => new Date(),
};

/** Run once; resolves to the process exit code. */
export async function main(
  argv: string[],
  deps: MainDeps = defaultDeps,
): Promise<number> {
  try {
    const config = loadRunnerConfig(
      deps.source,
      argv.includes("--dry-run") ? { dryRun: true } : {},
    );
    const store = deps.openStore(config);

    debug("Starting chores run%s", config.dryRun ? " (dry run)" : "");
    const summary = await runWeeklyChores({
      store,
      now: deps.now(),
      rotationStart: config.rotationStart,
      dueInDays: config.dueInDays,
      timeZone: config.timeZone,
      dryRun: config.dryRun,
    });
    debug(
      "Run finished: week %d, %d to-do(s)%s",
      summary.week,
      summary.todos.length,
      summary.dryRun ? " planned" : " created",
    );
    return 0;
  } catch (err) {
    debug("Chores run failed: %o", err);
    return 1;
  }
}

if (require.main === module) {
  createDebug.enable(env.DEBUG);
  void main(process.argv.slice(2)).then((code) => process.exit(code));
}
