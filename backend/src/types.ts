export const APPLICATION_STAGES = [
  "Applied",
  "In Review",
  "OA/Assessment",
  "Phone Screen",
  "Interview Scheduled",
  "Interviewed",
  "Offer",
  "Rejected",
  "Withdrawn",
] as const;

export type ApplicationStage = (typeof APPLICATION_STAGES)[number];

export const NOT_AN_APPLICATION = "not-an-application";

export type StageGuess = ApplicationStage | typeof NOT_AN_APPLICATION;

export const APPLICATION_TYPES = ["full-time", "internship", "unknown"] as const;

export type ApplicationType = (typeof APPLICATION_TYPES)[number];

export interface RawEvent {
  id: string;
  threadId: string;
  fromEmail: string;
  fromDisplayName: string;
  senderDomain: string;
  subject: string;
  receivedAt: Date;
  bodyExcerpt: string;
}

export interface ClassificationResult {
  company: string | null;
  role: string | null;
  type: ApplicationType;
  stageGuess: StageGuess;
  confidence: number;
  notes?: string;
}

export interface ApplicationRecord {
  id: string;
  companyKey: string;
  roleKey: string;
  displayCompany: string;
  displayRole: string;
  currentStage: ApplicationStage;
  applicationType: ApplicationType;
  dateFirstApplied: Date;
  lastUpdated: Date;
  notes: string;
  eventIds: string[];
}

export const SKIP_REASONS = [
  "denylisted_domain",
  "personal_domain",
  "job_board_domain",
  "excluded_subject",
  "no_application_signal",
  "quota_exhausted",
  "classifier_unavailable",
  "classifier_invalid_response",
  "not_an_application",
  "missing_fields",
  "low_confidence",
  "fetch_failed",
  "persistence_error",
] as const;

export type SkipReason = (typeof SKIP_REASONS)[number];

export interface SkipDecision {
  reason: SkipReason;
  permanent: boolean;
  detail: string;
}

export interface SkipEntry extends SkipDecision {
  messageId: string;
  attempts: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface RunSummary {
  id: number;
  startedAt: Date;
  finishedAt: Date;
  initial: boolean;
  scanned: number;
  excluded: number;
  newRecords: number;
  updatedRecords: number;
  stageChanges: number;
  skipped: number;
  skipReasons: Partial<Record<SkipReason, number>>;
  interrupted: boolean;
  failureReason: string | null;
  sinkError: string | null;
}

export const EVENT_TRANSITIONS = ["created", "advance", "terminal_override", "terminal_sticky", "no_regression"] as const;

export type EventTransition = (typeof EVENT_TRANSITIONS)[number];

/** Audit row linking one message to the record it was folded into. */
export interface ApplicationEvent {
  messageId: string;
  recordId: string;
  threadId: string;
  occurredAt: Date;
  stageGuess: ApplicationStage;
  applied: boolean;
  transition: EventTransition;
  note: string;
}

export interface ClassificationInput {
  sender: string;
  subject: string;
  bodyExcerpt: string;
}

export interface ClassificationProvider {
  readonly name: string;
  classify(input: ClassificationInput): Promise<ClassificationResult>;
}

export interface FetchRange {
  after: Date;
  before?: Date;
}

export interface FetchFailure {
  messageId: string;
  error: string;
  // The mailbox no longer has the message (deleted or never existed).
  missing?: boolean;
}

export interface FetchResult {
  events: RawEvent[];
  failures: FetchFailure[];
}

export interface MailboxSource {
  fetchRange(range: FetchRange): Promise<FetchResult>;
  fetchByIds(ids: readonly string[]): Promise<FetchResult>;
}

export interface RecordSink {
  readonly name: string;
  upsert(records: readonly ApplicationRecord[]): Promise<void>;
}
