import { loadConfig } from "../lib/config";
import { createClient } from "../lib/beeminder";
import { createBackup, writeBackup, DEFAULT_BACKUP_FILE } from "../lib/backup";

export async function backup(filename: string = DEFAULT_BACKUP_FILE): Promise<void> {
  const client = createClient(loadConfig());
  const data = await createBackup(client);

  console.log(`Writing backup to file: ${filename}`);
  await writeBackup(filename, data);
  console.log(`Backup completed successfully! Saved to: ${filename}`);
}
