import { randomUUID } from "node:crypto";
import { PersistenceError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { TrackerStore } from "../lib/store.js";
import type { ApplicationEvent, ApplicationRecord, ApplicationStage, EventTransition, RawEvent } from "../types.js";
import { displayCompanyName, displayRoleTitle, normalizeCompany, normalizeRole } from "../utils/normalize.js";
import type { AcceptedClassification } from "./classifierAdapter.js";
import { resolveMatch, type MatchResolution } from "./matcher.js";
import { decideTransition } from "./stageMachine.js";

const log = logger.child("applications");

export interface ApplicationSummary {
  id: string;
  company: string;
  role: string;
  companyKey: string;
  roleKey: string;
  stage: ApplicationStage;
  type: ApplicationRecord["applicationType"];
  dateFirstApplied: string;
  lastUpdated: string;
  notes: string;
  eventIds: string[];
}

export interface ApplicationEventDto {
  messageId: string;
  threadId: string;
  occurredAt: string;
  stageGuess: ApplicationStage;
  applied: boolean;
  transition: EventTransition;
  note: string;
}

export interface ApplicationDetail extends ApplicationSummary {
  events: ApplicationEventDto[];
}

export interface ListApplicationsFilters {
  stage?: ApplicationStage;
  company?: string;
}

export type MergeOutcome =
  | { kind: "duplicate" }
  | { kind: "created"; record: ApplicationRecord; ambiguousWith: string[] }
  | {
      kind: "updated";
      record: ApplicationRecord;
      matchedBy: "exact" | "fuzzy";
      stageChanged: boolean;
      transition: EventTransition;
    };

export interface MergeOptions {
  fuzzyThreshold: number;
}

const mapSummary = (record: ApplicationRecord): ApplicationSummary => ({
  id: record.id,
  company: record.displayCompany,
  role: record.displayRole,
  companyKey: record.companyKey,
  roleKey: record.roleKey,
  stage: record.currentStage,
  type: record.applicationType,
  dateFirstApplied: record.dateFirstApplied.toISOString(),
  lastUpdated: record.lastUpdated.toISOString(),
  notes: record.notes,
  eventIds: record.eventIds,
});

const mapEvent = (event: ApplicationEvent): ApplicationEventDto => ({
  messageId: event.messageId,
  threadId: event.threadId,
  occurredAt: event.occurredAt.toISOString(),
  stageGuess: event.stageGuess,
  applied: event.applied,
  transition: event.transition,
  note: event.note,
});

export const listApplications = (store: TrackerStore, filters: ListApplicationsFilters = {}): ApplicationSummary[] =>
  store
    .listApplications({
      ...(filters.stage ? { stage: filters.stage } : {}),
      ...(filters.company ? { companyKey: normalizeCompany(filters.company) } : {}),
    })
    .map(mapSummary);

export const getApplicationDetail = (store: TrackerStore, id: string): ApplicationDetail | null => {
  const record = store.getApplication(id);
  if (!record) {
    return null;
  }
  return {
    ...mapSummary(record),
    events: store.listEvents(id).map(mapEvent),
  };
};

export const buildNoteLine = (event: RawEvent, classification: AcceptedClassification): string => {
  const summary = (classification.notes ?? event.subject).replace(/\s+/g, " ").trim();
  return `${event.receivedAt.toISOString().slice(0, 10)} ${classification.stage}: ${summary}`;
};

const appendNote = (notes: string, line: string): string => (notes ? `${notes}\n${line}` : line);

const earlier = (a: Date, b: Date): Date => (a.getTime() <= b.getTime() ? a : b);
const later = (a: Date, b: Date): Date => (a.getTime() >= b.getTime() ? a : b);

const mergeInto = (
  store: TrackerStore,
  record: ApplicationRecord,
  event: RawEvent,
  classification: AcceptedClassification,
  matchedBy: "exact" | "fuzzy",
): MergeOutcome => {
  const decision = decideTransition(record.currentStage, classification.stage);
  const note = buildNoteLine(event, classification);
  const stageChanged = decision.apply && decision.next !== record.currentStage;

  const next: ApplicationRecord = {
    ...record,
    currentStage: decision.next,
    applicationType: record.applicationType === "unknown" ? classification.type : record.applicationType,
    dateFirstApplied: earlier(record.dateFirstApplied, event.receivedAt),
    lastUpdated: later(record.lastUpdated, event.receivedAt),
    notes: appendNote(record.notes, note),
  };

  store.updateApplication(next);
  store.insertEvent({
    messageId: event.id,
    recordId: record.id,
    threadId: event.threadId,
    occurredAt: event.receivedAt,
    stageGuess: classification.stage,
    applied: decision.apply,
    transition: decision.reason,
    note,
  });

  log.debug("Folded event into application", {
    messageId: event.id,
    recordId: record.id,
    matchedBy,
    from: record.currentStage,
    to: decision.next,
    reason: decision.reason,
  });

  return {
    kind: "updated",
    record: { ...next, eventIds: [...record.eventIds, event.id] },
    matchedBy,
    stageChanged,
    transition: decision.reason,
  };
};

const createRecord = (
  store: TrackerStore,
  keys: { companyKey: string; roleKey: string },
  event: RawEvent,
  classification: AcceptedClassification,
  ambiguousWith: string[],
): MergeOutcome => {
  const note = buildNoteLine(event, classification);
  const record: ApplicationRecord = {
    id: randomUUID(),
    companyKey: keys.companyKey,
    roleKey: keys.roleKey,
    displayCompany: displayCompanyName(classification.company),
    displayRole: displayRoleTitle(classification.role),
    currentStage: classification.stage,
    applicationType: classification.type,
    dateFirstApplied: event.receivedAt,
    lastUpdated: event.receivedAt,
    notes: note,
    eventIds: [event.id],
  };

  store.insertApplication(record);
  store.insertEvent({
    messageId: event.id,
    recordId: record.id,
    threadId: event.threadId,
    occurredAt: event.receivedAt,
    stageGuess: classification.stage,
    applied: true,
    transition: "created",
    note,
  });

  if (ambiguousWith.length > 0) {
    log.warn("Ambiguous fuzzy match, created a separate application", {
      messageId: event.id,
      recordId: record.id,
      candidates: ambiguousWith,
    });
  }

  return { kind: "created", record, ambiguousWith };
};

/**
 * Folds one accepted classification into the store inside a single transaction:
 * idempotence check, match, stage decision, audit row and retry-skip cleanup.
 */
export const applyClassifiedEvent = (
  store: TrackerStore,
  event: RawEvent,
  classification: AcceptedClassification,
  options: MergeOptions,
): MergeOutcome => {
  try {
    return store.transaction((): MergeOutcome => {
      if (store.isEventMerged(event.id)) {
        return { kind: "duplicate" };
      }

      const keys = {
        companyKey: normalizeCompany(classification.company),
        roleKey: normalizeRole(classification.role),
      };
      const exact = store.findApplicationByKey(keys.companyKey, keys.roleKey);
      const resolution: MatchResolution = exact
        ? { kind: "exact", record: exact }
        : resolveMatch(keys, store.listApplications(), options.fuzzyThreshold);

      const outcome =
        resolution.kind === "none"
          ? createRecord(
              store,
              keys,
              event,
              classification,
              resolution.ambiguous ? resolution.candidates.map((candidate) => candidate.record.id) : [],
            )
          : mergeInto(store, resolution.record, event, classification, resolution.kind);

      store.clearRetrySkip(event.id);
      return outcome;
    });
  } catch (error) {
    throw new PersistenceError(`Failed to commit message ${event.id}`, event.id, { cause: error });
  }
};
