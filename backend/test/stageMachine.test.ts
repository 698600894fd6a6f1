import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { decideTransition, isApplicationStage, isTerminalStage } from "../src/services/stageMachine.js";
import type { ApplicationStage } from "../src/types.js";

const applyStageSequence = (start: ApplicationStage, guesses: ApplicationStage[]): ApplicationStage =>
  guesses.reduce((stage, guess) => decideTransition(stage, guess).next, start);

describe("decideTransition", () => {
  it("advances to a higher rank", () => {
    assert.deepEqual(decideTransition("Applied", "Phone Screen"), {
      apply: true,
      next: "Phone Screen",
      reason: "advance",
    });
  });

  it("never regresses", () => {
    assert.deepEqual(decideTransition("Interviewed", "In Review"), {
      apply: false,
      next: "Interviewed",
      reason: "no_regression",
    });
    assert.equal(decideTransition("Offer", "Offer").reason, "no_regression");
  });

  it("lets a terminal stage override any progress stage", () => {
    assert.deepEqual(decideTransition("Offer", "Rejected"), {
      apply: true,
      next: "Rejected",
      reason: "terminal_override",
    });
  });

  it("keeps terminal records terminal", () => {
    assert.deepEqual(decideTransition("Rejected", "Interview Scheduled"), {
      apply: false,
      next: "Rejected",
      reason: "terminal_sticky",
    });
    assert.equal(decideTransition("Rejected", "Withdrawn").next, "Withdrawn");
  });
});

describe("stage sequences", () => {
  it("ends at the highest stage reached when no terminal stage arrives", () => {
    assert.equal(applyStageSequence("Applied", ["Interviewed", "OA/Assessment", "Phone Screen"]), "Interviewed");
  });

  it("ends terminal once a terminal stage arrives", () => {
    assert.equal(applyStageSequence("Applied", ["OA/Assessment", "Rejected", "Offer"]), "Rejected");
  });
});

describe("stage guards", () => {
  it("recognises stage names", () => {
    assert.equal(isApplicationStage("OA/Assessment"), true);
    assert.equal(isApplicationStage("not-an-application"), false);
    assert.equal(isTerminalStage("Withdrawn"), true);
    assert.equal(isTerminalStage("Offer"), false);
  });
});
