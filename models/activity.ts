// models/activity.ts
export interface Activity {
  description: string;
  schedule: string;
  // Informational only; signup does not check it.
  max_participants: number;
  participants: string[];
}

// Keyed by the activity's display name, e.g. "Chess Club".
export type ActivityMap = Record<string, Activity>;
