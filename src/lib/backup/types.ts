import type { DatapointRecord } from "../beeminder/types";

export interface GoalWithDatapoints {
  goal: Record<string, unknown>;
  /** As Beeminder sent them, oldest first */
  datapoints: DatapointRecord[];
}

export interface BackupData {
  metadata: {
    backup_timestamp: string; // ISO date
    beeline_version: string;
  };
  goals: {
    active: GoalWithDatapoints[];
    archived: GoalWithDatapoints[];
  };
}
