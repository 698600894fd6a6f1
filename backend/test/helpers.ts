import type { AcceptedClassification } from "../src/services/classifierAdapter.js";
import type {
  ApplicationRecord,
  ClassificationInput,
  ClassificationProvider,
  ClassificationResult,
  FetchRange,
  FetchResult,
  MailboxSource,
  RawEvent,
  RecordSink,
} from "../src/types.js";

export const makeEvent = (overrides: Partial<RawEvent> = {}): RawEvent => ({
  id: "msg-1",
  threadId: "thread-1",
  fromEmail: "no-reply@acme.com",
  fromDisplayName: "Acme Recruiting",
  senderDomain: "acme.com",
  subject: "Thank you for applying to Acme",
  receivedAt: new Date("2024-03-01T10:00:00.000Z"),
  bodyExcerpt: "We received your application for the Software Engineer role.",
  ...overrides,
});

export const makeResult = (overrides: Partial<ClassificationResult> = {}): ClassificationResult => ({
  company: "Acme",
  role: "Software Engineer",
  type: "full-time",
  stageGuess: "Applied",
  confidence: 0.9,
  ...overrides,
});

export const makeRecord = (overrides: Partial<ApplicationRecord> = {}): ApplicationRecord => ({
  id: "rec-1",
  companyKey: "acme",
  roleKey: "software engineer",
  displayCompany: "Acme",
  displayRole: "Software Engineer",
  currentStage: "Applied",
  applicationType: "full-time",
  dateFirstApplied: new Date("2024-03-01T10:00:00.000Z"),
  lastUpdated: new Date("2024-03-01T10:00:00.000Z"),
  notes: "",
  eventIds: ["msg-1"],
  ...overrides,
});

export class MemoryUsage {
  readonly calls = new Map<string, number>();

  getClassifierUsage(day: string): number {
    return this.calls.get(day) ?? 0;
  }

  incrementClassifierUsage(day: string): number {
    const next = this.getClassifierUsage(day) + 1;
    this.calls.set(day, next);
    return next;
  }
}

export const makeAccepted = (overrides: Partial<AcceptedClassification> = {}): AcceptedClassification => ({
  company: "Acme",
  role: "Software Engineer",
  type: "full-time",
  stage: "Applied",
  confidence: 0.9,
  notes: null,
  ...overrides,
});

/** In-process mailbox: `range` is what the scan window returns, `archive` what can be fetched by id. */
export class FakeMailbox implements MailboxSource {
  range: RawEvent[];
  readonly archive = new Map<string, RawEvent>();
  readonly unreachable = new Set<string>();
  readonly missing = new Set<string>();
  readonly byIdRequests: string[][] = [];
  rangeError: Error | null = null;

  constructor(events: RawEvent[]) {
    this.range = events;
    for (const event of events) {
      this.archive.set(event.id, event);
    }
  }

  async fetchRange(_range: FetchRange): Promise<FetchResult> {
    if (this.rangeError) {
      throw this.rangeError;
    }
    return this.split(this.range.map((event) => event.id));
  }

  async fetchByIds(ids: readonly string[]): Promise<FetchResult> {
    this.byIdRequests.push([...ids]);
    return this.split(ids);
  }

  private split(ids: readonly string[]): FetchResult {
    const result: FetchResult = { events: [], failures: [] };
    for (const id of ids) {
      const event = this.archive.get(id);
      if (this.missing.has(id)) {
        result.failures.push({ messageId: id, error: "Requested entity was not found.", missing: true });
      } else if (!event || this.unreachable.has(id)) {
        result.failures.push({ messageId: id, error: "socket hang up" });
      } else {
        result.events.push(event);
      }
    }
    return result;
  }
}

/** Answers by subject; unknown subjects are not applications. */
export class FakeProvider implements ClassificationProvider {
  readonly name = "fake";
  readonly calls: ClassificationInput[] = [];
  readonly delays = new Map<string, number>();
  hold: Promise<void> | null = null;

  constructor(
    private readonly answers: Map<string, ClassificationResult | Error>,
  ) {}

  async classify(input: ClassificationInput): Promise<ClassificationResult> {
    this.calls.push(input);
    if (this.hold) {
      await this.hold;
    }
    const delay = this.delays.get(input.subject) ?? 0;
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
    const answer = this.answers.get(input.subject);
    if (answer instanceof Error) {
      throw answer;
    }
    return answer ?? makeResult({ stageGuess: "not-an-application", company: null, role: null });
  }
}

export class FakeSink implements RecordSink {
  readonly name = "memory";
  readonly upserts: ApplicationRecord[][] = [];
  failure: Error | null = null;

  async upsert(records: readonly ApplicationRecord[]): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    this.upserts.push([...records]);
  }
}
