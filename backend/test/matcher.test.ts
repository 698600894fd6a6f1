import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { resolveMatch, scoreCompany, scoreRole } from "../src/services/matcher.js";
import { makeRecord } from "./helpers.js";

describe("scoring", () => {
  it("scores company keys by equality, prefix and containment", () => {
    assert.equal(scoreCompany("stripe", "stripe"), 1);
    assert.equal(scoreCompany("goldman", "goldman sachs"), 0.9);
    assert.equal(scoreCompany("the walt disney", "walt disney"), 0.8);
    assert.equal(scoreCompany("stripe", "square"), 0);
  });

  it("scores roles by token overlap", () => {
    assert.equal(scoreRole("software engineer", "software engineer"), 1);
    assert.equal(scoreRole("backend software engineer", "software engineer"), 2 / 3);
    assert.equal(scoreRole("data scientist", "software engineer"), 0);
  });
});

describe("resolveMatch", () => {
  it("prefers an exact key match", () => {
    const exact = makeRecord({ id: "exact" });
    const near = makeRecord({ id: "near", companyKey: "acme labs" });

    const resolution = resolveMatch({ companyKey: "acme", roleKey: "software engineer" }, [near, exact], 0.8);
    assert.equal(resolution.kind, "exact");
    assert.equal(resolution.kind === "exact" && resolution.record.id, "exact");
  });

  it("falls back to the strongest fuzzy candidate", () => {
    const record = makeRecord({ id: "gs", companyKey: "goldman sachs" });

    const resolution = resolveMatch({ companyKey: "goldman", roleKey: "software engineer" }, [record], 0.8);
    assert.deepEqual(resolution, { kind: "fuzzy", record, score: 0.9 });
  });

  it("rejects candidates under the threshold", () => {
    const record = makeRecord({ companyKey: "goldman sachs", roleKey: "backend software engineer" });

    const resolution = resolveMatch({ companyKey: "goldman", roleKey: "software engineer" }, [record], 0.8);
    assert.deepEqual(resolution, { kind: "none", ambiguous: false, candidates: [] });
  });

  it("breaks score ties by recency", () => {
    const older = makeRecord({ id: "older", companyKey: "acme labs", lastUpdated: new Date("2024-01-01T00:00:00.000Z") });
    const newer = makeRecord({ id: "newer", companyKey: "acme robotics", lastUpdated: new Date("2024-02-01T00:00:00.000Z") });

    const resolution = resolveMatch({ companyKey: "acme", roleKey: "software engineer" }, [older, newer], 0.8);
    assert.equal(resolution.kind === "fuzzy" && resolution.record.id, "newer");
  });

  it("creates nothing when the best candidates are indistinguishable", () => {
    const first = makeRecord({ id: "a", companyKey: "acme labs" });
    const second = makeRecord({ id: "b", companyKey: "acme robotics" });

    const resolution = resolveMatch({ companyKey: "acme", roleKey: "software engineer" }, [first, second], 0.8);
    assert.equal(resolution.kind, "none");
    assert.equal(resolution.kind === "none" && resolution.ambiguous, true);
    assert.equal(resolution.kind === "none" && resolution.candidates.length, 2);
  });
});
