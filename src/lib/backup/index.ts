// Types
export type { BackupData, GoalWithDatapoints } from "./types";

// Backup
export { createBackup, writeBackup, DEFAULT_BACKUP_FILE } from "./backup";
export type { BackupOptions } from "./backup";
