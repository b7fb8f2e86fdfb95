import { writeFile } from "fs/promises";
import type { BeeminderApi, DatapointRecord, GoalSummary } from "../beeminder/types";
import { BeelineError } from "../errors";
import { consoleLogger, type Logger } from "../logger";
import { VERSION } from "../version";
import type { BackupData, GoalWithDatapoints } from "./types";

export const DEFAULT_BACKUP_FILE = "beedata.json";

export interface BackupOptions {
  logger?: Logger;
  version?: string;
  now?: () => Date;
}

type BackupSource = Pick<BeeminderApi, "getGoals" | "getArchivedGoals" | "getDatapointRecords">;

async function fetchGoalList(load: () => Promise<GoalSummary[]>, kind: string): Promise<GoalSummary[]> {
  try {
    return await load();
  } catch (error) {
    throw new BeelineError(`Failed to fetch ${kind} goals`, { cause: error });
  }
}

/**
 * Fetch every active and archived goal with its full datapoint history.
 * Goals are fetched one at a time, in the order Beeminder lists them. Goals
 * and datapoints are stored as Beeminder sent them.
 */
export async function createBackup(client: BackupSource, options: BackupOptions = {}): Promise<BackupData> {
  const { logger = consoleLogger, version = VERSION, now = () => new Date() } = options;

  logger.info("Starting backup...");

  logger.info("Fetching active goals...");
  const active = await fetchGoalList(() => client.getGoals(), "active");

  logger.info("Fetching archived goals...");
  const archived = await fetchGoalList(() => client.getArchivedGoals(), "archived");

  const total = active.length + archived.length;
  logger.info(`Found ${active.length} active goals and ${archived.length} archived goals`);

  let processed = 0;
  const collect = async (goals: GoalSummary[], kind: string): Promise<GoalWithDatapoints[]> => {
    const entries: GoalWithDatapoints[] = [];
    for (const goal of goals) {
      processed++;
      logger.info(`Fetching datapoints for ${kind} goal: ${goal.slug} (${processed}/${total})`);
      let datapoints: DatapointRecord[];
      try {
        datapoints = await client.getDatapointRecords(goal.slug, { sort: "timestamp" });
      } catch (error) {
        throw new BeelineError(`Failed to fetch datapoints for ${kind} goal: ${goal.slug}`, { cause: error });
      }
      logger.info(`  Found ${datapoints.length} datapoints`);
      entries.push({ goal: goal.fields, datapoints });
    }
    return entries;
  };

  const activeEntries = await collect(active, "active");
  const archivedEntries = await collect(archived, "archived");

  return {
    metadata: {
      backup_timestamp: now().toISOString(),
      beeline_version: version,
    },
    goals: {
      active: activeEntries,
      archived: archivedEntries,
    },
  };
}

export async function writeBackup(filename: string, data: BackupData): Promise<void> {
  try {
    await writeFile(filename, JSON.stringify(data, null, 2), "utf-8");
  } catch (error) {
    throw new BeelineError(`Failed to write backup data to file: ${filename}`, { cause: error });
  }
}
