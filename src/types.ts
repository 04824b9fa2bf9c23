/** Shared types for clickup-import. */

/** One CSV record keyed by header column. Short rows leave keys undefined. */
export type Row = Record<string, string | undefined>;

export type Priority = 1 | 2 | 3 | 4;

export interface CustomFieldValue {
  id: string;
  value: string;
}

export interface TaskPayload {
  name: string;
  description?: string;
  due_date?: number; // epoch milliseconds, UTC
  priority?: Priority;
  status?: string;
  tags?: string[];
  assignees?: string[];
  subtasks?: Array<{ name: string }>;
  custom_fields?: CustomFieldValue[];
}

export type CreateTaskResult =
  | { ok: true; id: string; url: string }
  | { ok: false; error: string };

export interface SuccessEntry {
  kind: "success";
  name: string;
  row: number;
  taskId: string;
  url: string;
}

export interface FailureEntry {
  kind: "failure";
  name: string;
  row: number;
  error: string;
}

export type ResultEntry = SuccessEntry | FailureEntry;

export interface Config {
  clickup: {
    api_token: string;
    list_id: string;
    base_url: string;
  };
}
