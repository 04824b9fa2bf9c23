/** Map one CSV row onto a ClickUp task-creation payload. */

import { parseDate } from "./date-parser.js";
import type { CustomFieldValue, Priority, Row, TaskPayload } from "./types.js";

export const CUSTOM_FIELD_PREFIX = "custom_";

const PRIORITY_MAP = new Map<string, Priority>([
  ["urgent", 1],
  ["high", 2],
  ["normal", 3],
  ["low", 4],
]);

export type MapResult =
  | { skip: true }
  | { skip: false; payload: TaskPayload; warnings: string[] };

/** Split a list cell, trim each segment, and drop the empty ones. */
export function splitList(value: string, separator: string): string[] {
  return value
    .split(separator)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function mapPriority(value: string): Priority | undefined {
  return PRIORITY_MAP.get(value.trim().toLowerCase());
}

interface Extracted<T> {
  value?: T;
  warning?: string;
}

interface FieldRule {
  column: string;
  /** Writes the extracted value onto the payload; returns a warning, if any. */
  apply: (payload: TaskPayload, raw: string) => string | undefined;
}

function rule<K extends keyof TaskPayload>(
  column: string,
  key: K,
  extract: (raw: string) => Extracted<TaskPayload[K]>,
): FieldRule {
  return {
    column,
    apply: (payload, raw) => {
      const { value, warning } = extract(raw);
      if (value !== undefined) payload[key] = value;
      return warning;
    },
  };
}

function nonEmpty<T>(items: T[]): Extracted<T[]> {
  return items.length > 0 ? { value: items } : {};
}

// Evaluated in order; a rule only runs when its column is present and non-empty.
const FIELD_RULES: FieldRule[] = [
  rule("due_date", "due_date", (raw) => {
    const ms = parseDate(raw);
    return ms === null ? { warning: `could not parse due date "${raw}"` } : { value: ms };
  }),
  rule("priority", "priority", (raw) => ({ value: mapPriority(raw) })),
  rule("status", "status", (raw) => ({ value: raw })),
  rule("tags", "tags", (raw) => nonEmpty(splitList(raw, ","))),
  rule("assignees", "assignees", (raw) => nonEmpty(splitList(raw, ","))),
  rule("subtasks", "subtasks", (raw) =>
    nonEmpty(splitList(raw, ";").map((name) => ({ name }))),
  ),
];

export function mapRow(row: Row, rowNumber: number): MapResult {
  const name = (row.name ?? "").trim();
  if (!name) return { skip: true };

  const payload: TaskPayload = {
    name,
    description: row.description ?? "",
  };
  const warnings: string[] = [];

  for (const { column, apply } of FIELD_RULES) {
    const raw = row[column];
    if (!raw) continue;
    const warning = apply(payload, raw);
    if (warning) warnings.push(`Row ${rowNumber}: ${warning}`);
  }

  const customFields: CustomFieldValue[] = [];
  for (const [key, value] of Object.entries(row)) {
    if (key.startsWith(CUSTOM_FIELD_PREFIX) && value) {
      customFields.push({ id: key.slice(CUSTOM_FIELD_PREFIX.length), value });
    }
  }
  if (customFields.length > 0) payload.custom_fields = customFields;

  return { skip: false, payload, warnings };
}
