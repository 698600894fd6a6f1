import { logger } from "../lib/logger.js";
import type { TrackerStore } from "../lib/store.js";
import type { RunSummary, SkipDecision, SkipReason } from "../types.js";
import type { MergeOutcome } from "./applicationService.js";

const log = logger.child("ledger");

// Transient failures. Only these are fetched again by id outside the scan window;
// pre-filter discards come back only when a later scan lists them.
export const REFETCH_REASONS: readonly SkipReason[] = [
  "fetch_failed",
  "quota_exhausted",
  "classifier_unavailable",
  "classifier_invalid_response",
  "persistence_error",
];

// A refetchable skip turns permanent once it has failed this many times.
export const MAX_RETRY_ATTEMPTS = 5;

export interface Exclusions {
  // Never submitted again.
  permanent: Set<string>;
  // Re-fetched by id on the next run, whatever the scan window.
  retry: string[];
}

export const loadExclusions = (store: TrackerStore): Exclusions => ({
  permanent: new Set(store.listSkipIds(true)),
  retry: store.listRetrySkipIds(REFETCH_REASONS),
});

/** Collects the outcome of every message in one run and writes the summary at the end. */
export class RunLedger {
  private readonly startedAt: Date;
  private scanned = 0;
  private excluded = 0;
  private newRecords = 0;
  private updatedRecords = 0;
  private stageChanges = 0;
  private skipped = 0;
  private readonly skipReasons: Partial<Record<SkipReason, number>> = {};
  private interrupted = false;
  private failureReason: string | null = null;
  private sinkError: string | null = null;
  private finished: RunSummary | null = null;

  constructor(
    private readonly store: TrackerStore,
    private readonly initial: boolean,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.startedAt = this.now();
  }

  addScanned(count: number): void {
    this.scanned += count;
  }

  addExcluded(count: number): void {
    this.excluded += count;
  }

  recordSkip(messageId: string, decision: SkipDecision): void {
    const previous = this.store.getSkip(messageId);
    const attempts = (previous?.attempts ?? 0) + 1;
    const exhausted =
      previous?.permanent !== true &&
      !decision.permanent &&
      REFETCH_REASONS.includes(decision.reason) &&
      attempts >= MAX_RETRY_ATTEMPTS;
    const settled = exhausted ? { ...decision, permanent: true, detail: `${decision.detail} (gave up after ${attempts} attempts)` } : decision;
    const entry = this.store.upsertSkip(messageId, settled, this.now());
    this.skipped += 1;
    this.skipReasons[decision.reason] = (this.skipReasons[decision.reason] ?? 0) + 1;
    log.info("Skipped message", {
      messageId,
      reason: decision.reason,
      permanent: entry.permanent,
      attempts: entry.attempts,
      detail: settled.detail,
    });
  }

  recordMerge(outcome: MergeOutcome): void {
    if (outcome.kind === "created") {
      this.newRecords += 1;
      return;
    }
    if (outcome.kind === "updated") {
      this.updatedRecords += 1;
      if (outcome.stageChanged) {
        this.stageChanges += 1;
      }
    }
  }

  markInterrupted(): void {
    this.interrupted = true;
  }

  markFailed(reason: string): void {
    this.failureReason = reason;
  }

  markSinkError(reason: string): void {
    this.sinkError = reason;
  }

  get changedRecords(): number {
    return this.newRecords + this.updatedRecords;
  }

  finish(): RunSummary {
    if (this.finished) {
      return this.finished;
    }
    this.finished = this.store.insertRunSummary({
      startedAt: this.startedAt,
      finishedAt: this.now(),
      initial: this.initial,
      scanned: this.scanned,
      excluded: this.excluded,
      newRecords: this.newRecords,
      updatedRecords: this.updatedRecords,
      stageChanges: this.stageChanges,
      skipped: this.skipped,
      skipReasons: { ...this.skipReasons },
      interrupted: this.interrupted,
      failureReason: this.failureReason,
      sinkError: this.sinkError,
    });
    return this.finished;
  }
}
