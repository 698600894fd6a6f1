import dayjs from "dayjs";
import { config } from "../config.js";
import { RunInProgressError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { TrackerStore } from "../lib/store.js";
import type { ClassificationProvider, MailboxSource, RawEvent, RecordSink, RunSummary } from "../types.js";
import { applyClassifiedEvent } from "./applicationService.js";
import { classifyEvent, type ClassifyOutcome } from "./classifierAdapter.js";
import { evaluatePreFilter } from "./preFilter.js";
import { RunLedger, loadExclusions } from "./runLedger.js";

const log = logger.child("sync");

export interface PipelineOptions {
  initial: boolean;
  scanDays: number;
  concurrency: number;
  minConfidence: number;
  dailyQuota: number;
  rulesFirst: boolean;
  fuzzyThreshold: number;
  allowDomains: string[];
  denyDomains: string[];
  now?: () => Date;
}

export interface PipelineDeps {
  store: TrackerStore;
  mailbox: MailboxSource;
  provider: ClassificationProvider;
  sink: RecordSink;
}

export const pipelineOptionsFromConfig = (initial: boolean): PipelineOptions => ({
  initial,
  scanDays: initial ? config.INITIAL_SCAN_DAYS : config.DAILY_SCAN_DAYS,
  concurrency: config.CLASSIFIER_CONCURRENCY,
  minConfidence: config.CLASSIFIER_MIN_CONFIDENCE,
  dailyQuota: config.CLASSIFIER_DAILY_QUOTA,
  rulesFirst: config.CLASSIFIER_RULES_FIRST,
  fuzzyThreshold: config.FUZZY_MATCH_THRESHOLD,
  allowDomains: config.PREFILTER_ALLOW_DOMAINS,
  denyDomains: config.PREFILTER_DENY_DOMAINS,
});

export const runWithConcurrency = async <T>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> => {
  if (items.length === 0) return;
  const queue = [...items];
  const workers = Array.from({ length: Math.max(1, concurrency) }).map(async () => {
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined) return;
      await worker(next);
    }
  });
  await Promise.all(workers);
};

export const sortEvents = (events: RawEvent[]): RawEvent[] =>
  [...events].sort((a, b) => a.receivedAt.getTime() - b.receivedAt.getTime() || a.id.localeCompare(b.id));

const collectCandidates = async (
  deps: PipelineDeps,
  options: PipelineOptions,
  ledger: RunLedger,
  now: Date,
): Promise<RawEvent[]> => {
  const { store, mailbox } = deps;
  const exclusions = loadExclusions(store);

  const ranged = await mailbox.fetchRange({ after: dayjs(now).subtract(options.scanDays, "day").toDate() });
  const seen = new Set([...ranged.events.map((event) => event.id), ...ranged.failures.map((failure) => failure.messageId)]);
  const retryIds = exclusions.retry.filter((id) => !seen.has(id));
  const retried = retryIds.length > 0 ? await mailbox.fetchByIds(retryIds) : { events: [], failures: [] };

  const byId = new Map<string, RawEvent>();
  for (const event of [...ranged.events, ...retried.events]) {
    byId.set(event.id, event);
  }
  const failures = [...ranged.failures, ...retried.failures].filter(
    (failure) => !byId.has(failure.messageId) && !exclusions.permanent.has(failure.messageId),
  );

  ledger.addScanned(byId.size + failures.length);
  for (const failure of failures) {
    ledger.recordSkip(failure.messageId, { reason: "fetch_failed", permanent: failure.missing === true, detail: failure.error });
  }

  const candidates: RawEvent[] = [];
  let excluded = 0;
  for (const event of byId.values()) {
    if (exclusions.permanent.has(event.id) || store.isEventMerged(event.id)) {
      excluded += 1;
    } else {
      candidates.push(event);
    }
  }
  ledger.addExcluded(excluded);

  log.info("Collected candidate messages", {
    fetched: byId.size,
    retried: retryIds.length,
    failures: failures.length,
    excluded,
    candidates: candidates.length,
  });
  return sortEvents(candidates);
};

const commitOutcome = (
  deps: PipelineDeps,
  options: PipelineOptions,
  ledger: RunLedger,
  event: RawEvent,
  outcome: ClassifyOutcome,
): void => {
  if (outcome.kind === "skip") {
    const { kind: _kind, ...decision } = outcome;
    ledger.recordSkip(event.id, decision);
    return;
  }

  try {
    const merged = applyClassifiedEvent(deps.store, event, outcome.result, { fuzzyThreshold: options.fuzzyThreshold });
    ledger.recordMerge(merged);
  } catch (error) {
    log.error("Failed to commit classified message", { messageId: event.id, error });
    ledger.recordSkip(event.id, { reason: "persistence_error", permanent: false, detail: errorMessage(error) });
  }
};

/**
 * One sync run: fetch, exclude, pre-filter, classify on a bounded pool and commit
 * each outcome in timestamp order as soon as every earlier message has one.
 */
export const runPipeline = async (deps: PipelineDeps, options: PipelineOptions, signal?: AbortSignal): Promise<RunSummary> => {
  const now = options.now ?? (() => new Date());
  const ledger = new RunLedger(deps.store, options.initial, now);

  try {
    const candidates = await collectCandidates(deps, options, ledger, now());
    // Threads of earlier kept messages count too, so a thread reads the same in one run or several.
    const knownThreadIds = deps.store.listKnownThreadIds();

    const kept: RawEvent[] = [];
    for (const event of candidates) {
      const verdict = evaluatePreFilter(event, {
        knownThreadIds,
        allowDomains: options.allowDomains,
        denyDomains: options.denyDomains,
      });
      if (verdict.action === "keep") {
        kept.push(event);
        if (event.threadId) {
          knownThreadIds.add(event.threadId);
        }
      } else {
        const { action: _action, ...decision } = verdict;
        ledger.recordSkip(event.id, decision);
      }
    }

    const outcomes = new Map<number, ClassifyOutcome>();
    let nextCommit = 0;
    const flush = (): void => {
      let outcome = outcomes.get(nextCommit);
      while (outcome) {
        const event = kept[nextCommit];
        if (event) {
          commitOutcome(deps, options, ledger, event, outcome);
        }
        outcomes.delete(nextCommit);
        nextCommit += 1;
        outcome = outcomes.get(nextCommit);
      }
    };

    await runWithConcurrency(
      kept.map((_, index) => index),
      options.concurrency,
      async (index) => {
        const event = kept[index];
        if (!event || signal?.aborted) {
          return;
        }
        const outcome = await classifyEvent(event, deps.provider, {
          minConfidence: options.minConfidence,
          dailyQuota: options.dailyQuota,
          rulesFirst: options.rulesFirst,
          usage: deps.store,
          now,
        });
        outcomes.set(index, outcome);
        flush();
      },
    );

    if (signal?.aborted) {
      ledger.markInterrupted();
      log.warn("Sync run interrupted", { committed: nextCommit, pending: kept.length - nextCommit });
    }
  } catch (error) {
    log.error("Sync run failed", error);
    ledger.markFailed(errorMessage(error));
  }

  if (ledger.changedRecords > 0) {
    try {
      await deps.sink.upsert(deps.store.listApplications());
    } catch (error) {
      log.error("Record sink failed", { sink: deps.sink.name, error });
      ledger.markSinkError(errorMessage(error));
    }
  }

  const summary = ledger.finish();
  log.info("Sync run finished", {
    runId: summary.id,
    scanned: summary.scanned,
    excluded: summary.excluded,
    newRecords: summary.newRecords,
    updatedRecords: summary.updatedRecords,
    stageChanges: summary.stageChanges,
    skipped: summary.skipped,
    interrupted: summary.interrupted,
    failureReason: summary.failureReason,
  });
  return summary;
};

/** Pushes every stored record to the sink without fetching. */
export const exportRecords = async (store: TrackerStore, sink: RecordSink): Promise<number> => {
  const records = store.listApplications();
  await sink.upsert(records);
  return records.length;
};

/** Serialises runs: a second request while one is active is rejected, not queued. */
export class SyncCoordinator {
  private active: Promise<RunSummary> | null = null;
  private controller: AbortController | null = null;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly optionsFor: (initial: boolean) => PipelineOptions = pipelineOptionsFromConfig,
  ) {}

  get isRunning(): boolean {
    return this.active !== null;
  }

  async run(initial = false): Promise<RunSummary> {
    if (this.active) {
      throw new RunInProgressError();
    }
    const controller = new AbortController();
    this.controller = controller;
    this.active = runPipeline(this.deps, this.optionsFor(initial), controller.signal);
    try {
      return await this.active;
    } finally {
      this.active = null;
      this.controller = null;
    }
  }

  abort(): void {
    this.controller?.abort();
  }

  /** Aborts the active run and waits until its summary is written. */
  async close(): Promise<void> {
    const active = this.active;
    this.abort();
    if (!active) {
      return;
    }
    try {
      await active;
    } catch (error) {
      log.warn("Active run ended with an error during shutdown", error);
    }
  }
}
