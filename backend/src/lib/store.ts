import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import {
  APPLICATION_STAGES,
  APPLICATION_TYPES,
  EVENT_TRANSITIONS,
  SKIP_REASONS,
  type ApplicationEvent,
  type ApplicationRecord,
  type ApplicationStage,
  type RunSummary,
  type SkipDecision,
  type SkipEntry,
  type SkipReason,
} from "../types.js";

interface ApplicationRow {
  id: string;
  company_key: string;
  role_key: string;
  display_company: string;
  display_role: string;
  current_stage: string;
  application_type: string;
  date_first_applied: number;
  last_updated: number;
  notes: string;
}

interface EventRow {
  message_id: string;
  record_id: string;
  thread_id: string;
  occurred_at: number;
  stage_guess: string;
  applied: number;
  transition: string;
  note: string;
}

interface SkipRow {
  message_id: string;
  reason: string;
  permanent: number;
  detail: string;
  attempts: number;
  created_at: number;
  updated_at: number;
}

interface RunRow {
  id: number;
  started_at: number;
  finished_at: number;
  initial: number;
  scanned: number;
  excluded: number;
  new_records: number;
  updated_records: number;
  stage_changes: number;
  skipped: number;
  skip_reasons: string;
  interrupted: number;
  failure_reason: string | null;
  sink_error: string | null;
}

export interface ApplicationFilter {
  stage?: ApplicationStage;
  companyKey?: string;
}

export type NewRunSummary = Omit<RunSummary, "id">;

const oneOf = <T extends string>(values: readonly T[], value: string, label: string): T => {
  const found = values.find((candidate) => candidate === value);
  if (found === undefined) {
    throw new Error(`Unexpected ${label} "${value}" in tracker store`);
  }
  return found;
};

const parseSkipReasons = (raw: string): Partial<Record<SkipReason, number>> => {
  const parsed: unknown = JSON.parse(raw);
  const counts: Partial<Record<SkipReason, number>> = {};
  if (typeof parsed !== "object" || parsed === null) {
    return counts;
  }
  for (const [key, value] of Object.entries(parsed)) {
    const reason = SKIP_REASONS.find((candidate) => candidate === key);
    if (reason && typeof value === "number") {
      counts[reason] = value;
    }
  }
  return counts;
};

const toEvent = (row: EventRow): ApplicationEvent => ({
  messageId: row.message_id,
  recordId: row.record_id,
  threadId: row.thread_id,
  occurredAt: new Date(row.occurred_at),
  stageGuess: oneOf(APPLICATION_STAGES, row.stage_guess, "stage"),
  applied: row.applied === 1,
  transition: oneOf(EVENT_TRANSITIONS, row.transition, "transition"),
  note: row.note,
});

const toSkip = (row: SkipRow): SkipEntry => ({
  messageId: row.message_id,
  reason: oneOf(SKIP_REASONS, row.reason, "skip reason"),
  permanent: row.permanent === 1,
  detail: row.detail,
  attempts: row.attempts,
  createdAt: new Date(row.created_at),
  updatedAt: new Date(row.updated_at),
});

const toRun = (row: RunRow): RunSummary => ({
  id: row.id,
  startedAt: new Date(row.started_at),
  finishedAt: new Date(row.finished_at),
  initial: row.initial === 1,
  scanned: row.scanned,
  excluded: row.excluded,
  newRecords: row.new_records,
  updatedRecords: row.updated_records,
  stageChanges: row.stage_changes,
  skipped: row.skipped,
  skipReasons: parseSkipReasons(row.skip_reasons),
  interrupted: row.interrupted === 1,
  failureReason: row.failure_reason,
  sinkError: row.sink_error,
});

/**
 * Durable tracker state on SQLite. All methods are synchronous; callers that need
 * several writes to land together wrap them in `transaction`.
 */
export class TrackerStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.ensureSchema();
  }

  close(): void {
    this.db.close();
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS applications (
        id TEXT PRIMARY KEY,
        company_key TEXT NOT NULL,
        role_key TEXT NOT NULL,
        display_company TEXT NOT NULL,
        display_role TEXT NOT NULL,
        current_stage TEXT NOT NULL,
        application_type TEXT NOT NULL,
        date_first_applied INTEGER NOT NULL,
        last_updated INTEGER NOT NULL,
        notes TEXT NOT NULL DEFAULT '',
        UNIQUE(company_key, role_key),
        CHECK (last_updated >= date_first_applied)
      );

      CREATE TABLE IF NOT EXISTS application_events (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        message_id TEXT NOT NULL UNIQUE,
        record_id TEXT NOT NULL,
        thread_id TEXT NOT NULL,
        occurred_at INTEGER NOT NULL,
        stage_guess TEXT NOT NULL,
        applied INTEGER NOT NULL,
        transition TEXT NOT NULL,
        note TEXT NOT NULL DEFAULT '',
        FOREIGN KEY (record_id) REFERENCES applications(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_application_events_record ON application_events(record_id, occurred_at);
      CREATE INDEX IF NOT EXISTS idx_application_events_thread ON application_events(thread_id);

      CREATE TABLE IF NOT EXISTS skip_entries (
        message_id TEXT PRIMARY KEY,
        reason TEXT NOT NULL,
        permanent INTEGER NOT NULL,
        detail TEXT NOT NULL DEFAULT '',
        attempts INTEGER NOT NULL DEFAULT 1,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS run_summaries (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        started_at INTEGER NOT NULL,
        finished_at INTEGER NOT NULL,
        initial INTEGER NOT NULL,
        scanned INTEGER NOT NULL,
        excluded INTEGER NOT NULL,
        new_records INTEGER NOT NULL,
        updated_records INTEGER NOT NULL,
        stage_changes INTEGER NOT NULL,
        skipped INTEGER NOT NULL,
        skip_reasons TEXT NOT NULL,
        interrupted INTEGER NOT NULL,
        failure_reason TEXT,
        sink_error TEXT
      );

      CREATE TABLE IF NOT EXISTS classifier_usage (
        day TEXT PRIMARY KEY,
        calls INTEGER NOT NULL DEFAULT 0
      );
    `);
  }

  // Applications

  private eventIdsFor(recordIds: string[]): Map<string, string[]> {
    const grouped = new Map<string, string[]>(recordIds.map((id) => [id, []]));
    if (recordIds.length === 0) {
      return grouped;
    }
    const rows = this.db
      .prepare<unknown[], Pick<EventRow, "message_id" | "record_id">>(
        `SELECT message_id, record_id FROM application_events
         WHERE record_id IN (${recordIds.map(() => "?").join(", ")})
         ORDER BY occurred_at ASC, seq ASC`,
      )
      .all(...recordIds);
    for (const row of rows) {
      grouped.get(row.record_id)?.push(row.message_id);
    }
    return grouped;
  }

  private toRecords(rows: ApplicationRow[]): ApplicationRecord[] {
    const eventIds = this.eventIdsFor(rows.map((row) => row.id));
    return rows.map((row) => ({
      id: row.id,
      companyKey: row.company_key,
      roleKey: row.role_key,
      displayCompany: row.display_company,
      displayRole: row.display_role,
      currentStage: oneOf(APPLICATION_STAGES, row.current_stage, "stage"),
      applicationType: oneOf(APPLICATION_TYPES, row.application_type, "application type"),
      dateFirstApplied: new Date(row.date_first_applied),
      lastUpdated: new Date(row.last_updated),
      notes: row.notes,
      eventIds: eventIds.get(row.id) ?? [],
    }));
  }

  getApplication(id: string): ApplicationRecord | null {
    const row = this.db.prepare<[string], ApplicationRow>("SELECT * FROM applications WHERE id = ?").get(id);
    return row ? (this.toRecords([row])[0] ?? null) : null;
  }

  findApplicationByKey(companyKey: string, roleKey: string): ApplicationRecord | null {
    const row = this.db
      .prepare<[string, string], ApplicationRow>("SELECT * FROM applications WHERE company_key = ? AND role_key = ?")
      .get(companyKey, roleKey);
    return row ? (this.toRecords([row])[0] ?? null) : null;
  }

  listApplications(filter: ApplicationFilter = {}): ApplicationRecord[] {
    const clauses: string[] = [];
    const params: string[] = [];
    if (filter.stage) {
      clauses.push("current_stage = ?");
      params.push(filter.stage);
    }
    if (filter.companyKey) {
      clauses.push("company_key = ?");
      params.push(filter.companyKey);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const rows = this.db
      .prepare<string[], ApplicationRow>(`SELECT * FROM applications ${where} ORDER BY last_updated DESC, id ASC`)
      .all(...params);
    return this.toRecords(rows);
  }

  insertApplication(record: ApplicationRecord): void {
    this.db
      .prepare(
        `INSERT INTO applications (
          id, company_key, role_key, display_company, display_role, current_stage,
          application_type, date_first_applied, last_updated, notes
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        record.id,
        record.companyKey,
        record.roleKey,
        record.displayCompany,
        record.displayRole,
        record.currentStage,
        record.applicationType,
        record.dateFirstApplied.getTime(),
        record.lastUpdated.getTime(),
        record.notes,
      );
  }

  updateApplication(record: ApplicationRecord): void {
    this.db
      .prepare(
        `UPDATE applications SET
          current_stage = ?, application_type = ?, date_first_applied = ?, last_updated = ?, notes = ?
        WHERE id = ?`,
      )
      .run(
        record.currentStage,
        record.applicationType,
        record.dateFirstApplied.getTime(),
        record.lastUpdated.getTime(),
        record.notes,
        record.id,
      );
  }

  // Events

  insertEvent(event: ApplicationEvent): void {
    this.db
      .prepare(
        `INSERT INTO application_events (
          message_id, record_id, thread_id, occurred_at, stage_guess, applied, transition, note
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        event.messageId,
        event.recordId,
        event.threadId,
        event.occurredAt.getTime(),
        event.stageGuess,
        event.applied ? 1 : 0,
        event.transition,
        event.note,
      );
  }

  isEventMerged(messageId: string): boolean {
    return this.db.prepare<[string], { one: number }>("SELECT 1 AS one FROM application_events WHERE message_id = ?").get(messageId) !== undefined;
  }

  listEvents(recordId: string): ApplicationEvent[] {
    return this.db
      .prepare<[string], EventRow>("SELECT * FROM application_events WHERE record_id = ? ORDER BY occurred_at ASC, seq ASC")
      .all(recordId)
      .map(toEvent);
  }

  listKnownThreadIds(): Set<string> {
    const rows = this.db
      .prepare<[], { thread_id: string }>("SELECT DISTINCT thread_id FROM application_events WHERE thread_id <> ''")
      .all();
    return new Set(rows.map((row) => row.thread_id));
  }

  // Skips

  getSkip(messageId: string): SkipEntry | null {
    const row = this.db.prepare<[string], SkipRow>("SELECT * FROM skip_entries WHERE message_id = ?").get(messageId);
    return row ? toSkip(row) : null;
  }

  /** Records a skip decision. A permanent entry is never downgraded by a later retry-eligible one. */
  upsertSkip(messageId: string, decision: SkipDecision, now: Date = new Date()): SkipEntry {
    const existing = this.getSkip(messageId);
    if (!existing) {
      this.db
        .prepare(
          `INSERT INTO skip_entries (message_id, reason, permanent, detail, attempts, created_at, updated_at)
           VALUES (?, ?, ?, ?, 1, ?, ?)`,
        )
        .run(messageId, decision.reason, decision.permanent ? 1 : 0, decision.detail, now.getTime(), now.getTime());
    } else if (existing.permanent && !decision.permanent) {
      this.db
        .prepare("UPDATE skip_entries SET attempts = attempts + 1, updated_at = ? WHERE message_id = ?")
        .run(now.getTime(), messageId);
    } else {
      this.db
        .prepare(
          `UPDATE skip_entries SET reason = ?, permanent = ?, detail = ?, attempts = attempts + 1, updated_at = ?
           WHERE message_id = ?`,
        )
        .run(decision.reason, decision.permanent ? 1 : 0, decision.detail, now.getTime(), messageId);
    }

    const stored = this.getSkip(messageId);
    if (!stored) {
      throw new Error(`Skip entry for ${messageId} was not persisted`);
    }
    return stored;
  }

  deleteSkip(messageId: string): boolean {
    return this.db.prepare("DELETE FROM skip_entries WHERE message_id = ?").run(messageId).changes > 0;
  }

  /** Clears a retry-eligible entry; permanent entries stay. */
  clearRetrySkip(messageId: string): boolean {
    return this.db.prepare("DELETE FROM skip_entries WHERE message_id = ? AND permanent = 0").run(messageId).changes > 0;
  }

  listSkips(filter: { permanent?: boolean } = {}): SkipEntry[] {
    const rows =
      filter.permanent === undefined
        ? this.db.prepare<[], SkipRow>("SELECT * FROM skip_entries ORDER BY updated_at DESC, message_id ASC").all()
        : this.db
            .prepare<[number], SkipRow>("SELECT * FROM skip_entries WHERE permanent = ? ORDER BY updated_at DESC, message_id ASC")
            .all(filter.permanent ? 1 : 0);
    return rows.map(toSkip);
  }

  listSkipIds(permanent: boolean): string[] {
    return this.db
      .prepare<[number], { message_id: string }>("SELECT message_id FROM skip_entries WHERE permanent = ? ORDER BY message_id ASC")
      .all(permanent ? 1 : 0)
      .map((row) => row.message_id);
  }

  /** Retry-eligible ids whose reason is one of `reasons`. */
  listRetrySkipIds(reasons: readonly SkipReason[]): string[] {
    if (reasons.length === 0) {
      return [];
    }
    const placeholders = reasons.map(() => "?").join(", ");
    return this.db
      .prepare<string[], { message_id: string }>(
        `SELECT message_id FROM skip_entries WHERE permanent = 0 AND reason IN (${placeholders}) ORDER BY message_id ASC`,
      )
      .all(...reasons)
      .map((row) => row.message_id);
  }

  // Runs

  insertRunSummary(summary: NewRunSummary): RunSummary {
    const result = this.db
      .prepare(
        `INSERT INTO run_summaries (
          started_at, finished_at, initial, scanned, excluded, new_records, updated_records,
          stage_changes, skipped, skip_reasons, interrupted, failure_reason, sink_error
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        summary.startedAt.getTime(),
        summary.finishedAt.getTime(),
        summary.initial ? 1 : 0,
        summary.scanned,
        summary.excluded,
        summary.newRecords,
        summary.updatedRecords,
        summary.stageChanges,
        summary.skipped,
        JSON.stringify(summary.skipReasons),
        summary.interrupted ? 1 : 0,
        summary.failureReason,
        summary.sinkError,
      );
    return { ...summary, id: Number(result.lastInsertRowid) };
  }

  listRunSummaries(limit = 20): RunSummary[] {
    return this.db
      .prepare<[number], RunRow>("SELECT * FROM run_summaries ORDER BY id DESC LIMIT ?")
      .all(limit)
      .map(toRun);
  }

  // Classifier quota

  getClassifierUsage(day: string): number {
    return this.db.prepare<[string], { calls: number }>("SELECT calls FROM classifier_usage WHERE day = ?").get(day)?.calls ?? 0;
  }

  incrementClassifierUsage(day: string): number {
    this.db
      .prepare("INSERT INTO classifier_usage (day, calls) VALUES (?, 1) ON CONFLICT(day) DO UPDATE SET calls = calls + 1")
      .run(day);
    return this.getClassifierUsage(day);
  }
}
