import assert from "node:assert/strict";
import { afterEach, before, beforeEach, describe, it } from "node:test";
import { RunInProgressError, SinkError, TransientClassifyError, TransientFetchError } from "../src/lib/errors.js";
import { logger } from "../src/lib/logger.js";
import { TrackerStore } from "../src/lib/store.js";
import { MAX_RETRY_ATTEMPTS } from "../src/services/runLedger.js";
import { SyncCoordinator, runPipeline, type PipelineOptions } from "../src/services/syncService.js";
import type { ClassificationInput, ClassificationProvider, ClassificationResult, RawEvent } from "../src/types.js";
import { FakeMailbox, FakeProvider, FakeSink, makeEvent, makeResult } from "./helpers.js";

const options = (overrides: Partial<PipelineOptions> = {}): PipelineOptions => ({
  initial: false,
  scanDays: 7,
  concurrency: 3,
  minConfidence: 0.7,
  dailyQuota: 100,
  rulesFirst: false,
  fuzzyThreshold: 0.8,
  allowDomains: [],
  denyDomains: [],
  now: () => new Date("2024-03-20T07:00:00.000Z"),
  ...overrides,
});

const googleMail = (id: string, day: number, subject: string): RawEvent =>
  makeEvent({
    id,
    threadId: `thread-${id}`,
    fromEmail: "careers@google.com",
    fromDisplayName: "Google Careers",
    senderDomain: "google.com",
    subject,
    receivedAt: new Date(`2024-03-0${day}T10:00:00.000Z`),
    bodyExcerpt: subject,
  });

const googleAnswers = new Map<string, ClassificationResult | Error>([
  ["Thank you for applying to Google", makeResult({ company: "Google LLC", role: "SWE", stageGuess: "Applied" })],
  ["Google online assessment", makeResult({ company: "Google", role: "Software Engineer Intern", stageGuess: "OA/Assessment" })],
  ["Google interview: phone screen", makeResult({ company: "Google", role: "SWE", stageGuess: "Phone Screen" })],
  ["Thanks for interviewing with Google", makeResult({ company: "Google LLC", role: "Software Engineer Intern", stageGuess: "Interviewed" })],
  ["Your offer from Google", makeResult({ company: "Google", role: "SWE", stageGuess: "Offer" })],
  ["An update on your application", makeResult({ company: "Google", role: "Software Engineer Intern", stageGuess: "Rejected" })],
]);

// Fetched newest first, as the mailbox lists them.
const googleThread = (): RawEvent[] => [
  googleMail("g6", 6, "An update on your application"),
  googleMail("g5", 5, "Your offer from Google"),
  googleMail("g4", 4, "Thanks for interviewing with Google"),
  googleMail("g3", 3, "Google interview: phone screen"),
  googleMail("g2", 2, "Google online assessment"),
  googleMail("g1", 1, "Thank you for applying to Google"),
];

const personalMail = (): RawEvent =>
  makeEvent({
    id: "p1",
    threadId: "thread-p1",
    fromEmail: "friend@gmail.com",
    fromDisplayName: "A Friend",
    senderDomain: "gmail.com",
    subject: "Re: catching up",
    bodyExcerpt: "How did the interview go?",
  });

let store: TrackerStore;
let sink: FakeSink;

before(() => {
  logger.setLevel("silent");
});

beforeEach(() => {
  store = new TrackerStore(":memory:");
  sink = new FakeSink();
});

afterEach(() => {
  store.close();
});

describe("runPipeline", () => {
  it("collapses an application thread into one record that ends Rejected", async () => {
    const provider = new FakeProvider(googleAnswers);
    provider.delays.set("Thank you for applying to Google", 20);
    provider.delays.set("Google interview: phone screen", 10);
    const mailbox = new FakeMailbox(googleThread());

    const summary = await runPipeline({ store, mailbox, provider, sink }, options());

    const records = store.listApplications();
    assert.equal(records.length, 1);
    assert.equal(records[0]?.currentStage, "Rejected");
    assert.equal(records[0]?.displayCompany, "Google");
    assert.equal(records[0]?.dateFirstApplied.toISOString(), "2024-03-01T10:00:00.000Z");
    assert.equal(records[0]?.lastUpdated.toISOString(), "2024-03-06T10:00:00.000Z");
    assert.deepEqual(records[0]?.eventIds, ["g1", "g2", "g3", "g4", "g5", "g6"]);
    assert.deepEqual(
      store.listEvents(records[0]?.id ?? "").map((event) => event.transition),
      ["created", "advance", "advance", "advance", "advance", "terminal_override"],
    );

    assert.equal(summary.scanned, 6);
    assert.equal(summary.newRecords, 1);
    assert.equal(summary.updatedRecords, 5);
    assert.equal(summary.stageChanges, 5);
    assert.equal(summary.skipped, 0);
    assert.equal(sink.upserts.length, 1);
    assert.equal(sink.upserts[0]?.length, 1);
  });

  it("discards personal mail before any classifier call", async () => {
    const provider = new FakeProvider(googleAnswers);
    const mailbox = new FakeMailbox([personalMail()]);

    const summary = await runPipeline({ store, mailbox, provider, sink }, options());

    assert.equal(provider.calls.length, 0);
    assert.deepEqual(summary.skipReasons, { personal_domain: 1 });
    assert.equal(store.getSkip("p1")?.permanent, true);
    assert.equal(store.listApplications().length, 0);
    assert.equal(sink.upserts.length, 0);
  });

  it("changes nothing when the same mail is processed again", async () => {
    const provider = new FakeProvider(googleAnswers);
    const mailbox = new FakeMailbox([...googleThread(), personalMail()]);
    const deps = { store, mailbox, provider, sink };

    await runPipeline(deps, options());
    const firstPass = store.listApplications();
    const second = await runPipeline(deps, options());

    assert.deepEqual(store.listApplications(), firstPass);
    assert.equal(provider.calls.length, 6);
    assert.equal(second.scanned, 7);
    assert.equal(second.excluded, 7);
    assert.equal(second.newRecords, 0);
    assert.equal(second.updatedRecords, 0);
    assert.equal(second.skipped, 0);
    assert.equal(store.getSkip("p1")?.attempts, 1);
    assert.equal(sink.upserts.length, 1);
  });

  it("retries a message after a transient classifier failure and clears its skip", async () => {
    const answers = new Map<string, ClassificationResult | Error>([
      ["Thank you for applying to Acme", new TransientClassifyError("Ollama request failed with status 503")],
    ]);
    const provider = new FakeProvider(answers);
    const mailbox = new FakeMailbox([makeEvent({ id: "r1" })]);
    const deps = { store, mailbox, provider, sink };

    const first = await runPipeline(deps, options());
    assert.deepEqual(first.skipReasons, { classifier_unavailable: 1 });
    assert.equal(store.getSkip("r1")?.permanent, false);

    // Out of the scan window now; only the retry list brings it back.
    mailbox.range = [];
    answers.set("Thank you for applying to Acme", makeResult());
    const second = await runPipeline(deps, options());

    assert.deepEqual(mailbox.byIdRequests, [["r1"]]);
    assert.equal(second.newRecords, 1);
    assert.equal(store.getSkip("r1"), null);
    assert.deepEqual(store.listApplications()[0]?.eventIds, ["r1"]);
  });

  it("keeps permanent skips out of later runs", async () => {
    const provider = new FakeProvider(new Map());
    const mailbox = new FakeMailbox([makeEvent({ id: "n1", subject: "Your application newsletter" })]);
    const deps = { store, mailbox, provider, sink };

    const first = await runPipeline(deps, options());
    const second = await runPipeline(deps, options());

    assert.deepEqual(first.skipReasons, { excluded_subject: 1 });
    assert.equal(second.excluded, 1);
    assert.equal(second.skipped, 0);
    assert.equal(store.getSkip("n1")?.attempts, 1);
  });

  it("commits same-key messages in timestamp order whatever order they finish in", async () => {
    const answers = new Map<string, ClassificationResult | Error>([
      ["Thank you for applying to Acme", makeResult({ stageGuess: "Applied" })],
      ["Acme interview invitation", makeResult({ stageGuess: "Interview Scheduled" })],
    ]);
    const provider = new FakeProvider(answers);
    provider.delays.set("Thank you for applying to Acme", 30);
    const mailbox = new FakeMailbox([
      makeEvent({ id: "a2", subject: "Acme interview invitation", receivedAt: new Date("2024-03-08T10:00:00.000Z") }),
      makeEvent({ id: "a1", subject: "Thank you for applying to Acme", receivedAt: new Date("2024-03-01T10:00:00.000Z") }),
    ]);

    await runPipeline({ store, mailbox, provider, sink }, options({ concurrency: 2 }));

    const records = store.listApplications();
    assert.equal(records.length, 1);
    assert.equal(records[0]?.currentStage, "Interview Scheduled");
    assert.deepEqual(
      store.listEvents(records[0]?.id ?? "").map((event) => [event.messageId, event.transition]),
      [
        ["a1", "created"],
        ["a2", "advance"],
      ],
    );
  });

  it("records fetch failures as retryable and fetches them by id next time", async () => {
    const provider = new FakeProvider(new Map([["Thank you for applying to Acme", makeResult()]]));
    const mailbox = new FakeMailbox([makeEvent({ id: "f1" })]);
    mailbox.unreachable.add("f1");
    const deps = { store, mailbox, provider, sink };

    const first = await runPipeline(deps, options());
    assert.deepEqual(first.skipReasons, { fetch_failed: 1 });
    assert.equal(first.scanned, 1);

    mailbox.unreachable.clear();
    mailbox.range = [];
    const second = await runPipeline(deps, options());

    assert.deepEqual(mailbox.byIdRequests, [["f1"]]);
    assert.equal(second.newRecords, 1);
  });

  it("folds a reply into its tracked thread whether it arrives in the same run or a later one", async () => {
    const opener = makeEvent({ id: "t1", threadId: "thread-acme", subject: "Your application to Acme" });
    const reply = makeEvent({
      id: "t2",
      threadId: "thread-acme",
      subject: "Re: Following up",
      receivedAt: new Date("2024-03-03T10:00:00.000Z"),
      bodyExcerpt: "We have decided not to move forward.",
    });
    const answers = new Map<string, ClassificationResult | Error>([
      ["Your application to Acme", makeResult({ stageGuess: "Applied" })],
      ["Re: Following up", makeResult({ stageGuess: "Rejected" })],
    ]);

    const together = new TrackerStore(":memory:");
    try {
      await runPipeline(
        { store: together, mailbox: new FakeMailbox([reply, opener]), provider: new FakeProvider(answers), sink },
        options(),
      );
      assert.equal(together.listApplications()[0]?.currentStage, "Rejected");
      assert.deepEqual(together.listApplications()[0]?.eventIds, ["t1", "t2"]);
    } finally {
      together.close();
    }

    const mailbox = new FakeMailbox([opener]);
    const deps = { store, mailbox, provider: new FakeProvider(answers), sink };
    await runPipeline(deps, options());
    mailbox.range = [reply, opener];
    mailbox.archive.set(reply.id, reply);
    const second = await runPipeline(deps, options());

    const records = store.listApplications();
    assert.equal(records.length, 1);
    assert.equal(records[0]?.currentStage, "Rejected");
    assert.deepEqual(records[0]?.eventIds, ["t1", "t2"]);
    assert.equal(second.excluded, 1);
    assert.equal(second.skipped, 0);
    assert.equal(store.getSkip("t2"), null);
  });

  it("re-fetches only transient skips by id and gives up on missing or exhausted ones", async () => {
    const mailbox = new FakeMailbox([
      makeEvent({ id: "l1", subject: "Quick hello" }),
      makeEvent({ id: "gone" }),
      makeEvent({ id: "r1", subject: "Initech application received" }),
    ]);
    mailbox.missing.add("gone");
    mailbox.unreachable.add("r1");
    const deps = { store, mailbox, provider: new FakeProvider(new Map()), sink };

    const first = await runPipeline(deps, options());
    assert.deepEqual(first.skipReasons, { fetch_failed: 2, no_application_signal: 1 });
    assert.equal(store.getSkip("gone")?.permanent, true);

    mailbox.range = [];
    for (let run = 0; run < MAX_RETRY_ATTEMPTS; run += 1) {
      await runPipeline(deps, options());
    }

    assert.deepEqual(mailbox.byIdRequests, Array.from({ length: MAX_RETRY_ATTEMPTS - 1 }, () => ["r1"]));
    assert.equal(store.getSkip("r1")?.permanent, true);
    assert.equal(store.getSkip("r1")?.detail, `socket hang up (gave up after ${MAX_RETRY_ATTEMPTS} attempts)`);
    assert.equal(store.getSkip("l1")?.permanent, false);
    assert.equal(store.getSkip("l1")?.attempts, 1);
  });

  it("stops calling the provider once the daily quota is spent", async () => {
    const provider = new FakeProvider(
      new Map([
        ["Thank you for applying to Acme", makeResult()],
        ["Initech application received", makeResult({ company: "Initech" })],
      ]),
    );
    const mailbox = new FakeMailbox([
      makeEvent({ id: "q1" }),
      makeEvent({ id: "q2", subject: "Initech application received", receivedAt: new Date("2024-03-02T10:00:00.000Z") }),
    ]);

    const summary = await runPipeline({ store, mailbox, provider, sink }, options({ concurrency: 1, dailyQuota: 1 }));

    assert.equal(provider.calls.length, 1);
    assert.equal(summary.newRecords, 1);
    assert.deepEqual(summary.skipReasons, { quota_exhausted: 1 });
    assert.equal(store.getSkip("q2")?.detail, "daily classifier quota 1 reached (1 calls on 2024-03-20)");
    assert.equal(store.getClassifierUsage("2024-03-20"), 1);
  });

  it("keeps committed records when the sink fails", async () => {
    sink.failure = new SinkError("Google Sheets export failed: 403");
    const provider = new FakeProvider(new Map([["Thank you for applying to Acme", makeResult()]]));

    const summary = await runPipeline({ store, mailbox: new FakeMailbox([makeEvent()]), provider, sink }, options());

    assert.equal(summary.sinkError, "Google Sheets export failed: 403");
    assert.equal(summary.failureReason, null);
    assert.equal(store.listApplications().length, 1);
  });

  it("records a failed run when the mailbox cannot be listed", async () => {
    const mailbox = new FakeMailbox([]);
    mailbox.rangeError = new TransientFetchError("Gmail listing failed: invalid_grant");

    const summary = await runPipeline({ store, mailbox, provider: new FakeProvider(new Map()), sink }, options());

    assert.equal(summary.failureReason, "Gmail listing failed: invalid_grant");
    assert.equal(store.listRunSummaries()[0]?.failureReason, "Gmail listing failed: invalid_grant");
  });
});

describe("SyncCoordinator", () => {
  it("rejects overlapping runs and stops dequeuing on abort", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const calls: ClassificationInput[] = [];
    const provider: ClassificationProvider = {
      name: "gated",
      classify: async (input) => {
        calls.push(input);
        await gate;
        return makeResult({ company: input.subject.split(" ")[0] ?? "Acme" });
      },
    };
    const mailbox = new FakeMailbox([
      makeEvent({ id: "c1", subject: "Acme application received" }),
      makeEvent({ id: "c2", subject: "Initech application received", receivedAt: new Date("2024-03-02T10:00:00.000Z") }),
      makeEvent({ id: "c3", subject: "Globex application received", receivedAt: new Date("2024-03-03T10:00:00.000Z") }),
    ]);
    const coordinator = new SyncCoordinator({ store, mailbox, provider, sink }, () => options({ concurrency: 1 }));

    const running = coordinator.run(false);
    assert.equal(coordinator.isRunning, true);
    await assert.rejects(coordinator.run(false), RunInProgressError);

    while (calls.length === 0) {
      await new Promise((resolve) => setImmediate(resolve));
    }
    coordinator.abort();
    release();
    const summary = await running;

    assert.equal(summary.interrupted, true);
    assert.equal(summary.newRecords, 1);
    assert.equal(calls.length, 1);
    assert.deepEqual(
      store.listApplications().map((record) => record.displayCompany),
      ["Acme"],
    );
    assert.equal(coordinator.isRunning, false);
  });
});
