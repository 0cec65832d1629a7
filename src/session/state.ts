import type { ModelTier } from "../evaluator/criteria.js";
import type { EvaluationRecord, LastEvaluation, SessionSettings } from "./types.js";

export const DEFAULT_SETTINGS: Readonly<Omit<SessionSettings, "model">> = {
  feedback_level: "Detailed",
  dark_mode: false,
  temperature: 0.7,
  max_tokens: 400,
};

export interface SessionStateOptions {
  maxRecords: number;
  defaultTier: ModelTier;
}

/**
 * Everything one user session owns: its evaluation history, its settings and
 * the last single-text evaluation. Handlers receive it by reference; there is
 * no process-wide instance.
 */
export class SessionState {
  readonly id: string;
  readonly createdAt: string;
  private records: EvaluationRecord[] = [];
  private current: SessionSettings;
  private lastEvaluation: LastEvaluation | null = null;
  private readonly maxRecords: number;

  constructor(id: string, opts: SessionStateOptions) {
    this.id = id;
    this.createdAt = new Date().toISOString();
    this.maxRecords = opts.maxRecords;
    this.current = { ...DEFAULT_SETTINGS, model: opts.defaultTier };
  }

  /** Records in chronological order. */
  history(): readonly EvaluationRecord[] {
    return this.records;
  }

  append(record: EvaluationRecord): EvaluationRecord {
    const frozen = Object.freeze({ ...record });
    this.records.push(frozen);
    if (this.records.length > this.maxRecords) {
      this.records = this.records.slice(-this.maxRecords);
    }
    return frozen;
  }

  /** Timestamp of the newest record, or null when history is empty. */
  lastTimestamp(): string | null {
    const last = this.records[this.records.length - 1];
    return last ? last.timestamp : null;
  }

  clearHistory(): { cleared: number } {
    const count = this.records.length;
    this.records = [];
    return { cleared: count };
  }

  settings(): Readonly<SessionSettings> {
    return this.current;
  }

  updateSettings(patch: Partial<SessionSettings>): Readonly<SessionSettings> {
    this.current = { ...this.current, ...patch };
    return this.current;
  }

  rememberLast(text: string, feedback: string): void {
    this.lastEvaluation = { text, feedback };
  }

  last(): LastEvaluation | null {
    return this.lastEvaluation;
  }
}
