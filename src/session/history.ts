import { modelShortLabel } from "../evaluator/criteria.js";
import type { EvaluationRecord } from "./types.js";

export const EMPTY_HISTORY_MESSAGE = "No evaluation history yet. Analyze some text to see it here.";

const TITLE_PREVIEW_CHARS = 50;

export interface HistoryEntry extends EvaluationRecord {
  /** Position in chronological order, 0 = oldest */
  index: number;
  model_label: string;
  title: string;
}

/** Records newest first, decorated for display. */
export function listHistory(records: readonly EvaluationRecord[]): HistoryEntry[] {
  return records
    .map((record, index) => ({
      ...record,
      index,
      model_label: modelShortLabel(record.model_identifier),
      title: `${record.timestamp} - ${record.original_text.slice(0, TITLE_PREVIEW_CHARS)}...`,
    }))
    .reverse();
}
