import type { ApplicationRecord } from "../types.js";

export interface RecordKeys {
  companyKey: string;
  roleKey: string;
}

export interface ScoredCandidate {
  record: ApplicationRecord;
  score: number;
}

export type MatchResolution =
  | { kind: "exact"; record: ApplicationRecord }
  | { kind: "fuzzy"; record: ApplicationRecord; score: number }
  | { kind: "none"; ambiguous: boolean; candidates: ScoredCandidate[] };

const tokens = (key: string): string[] => key.split(/\s+/).filter(Boolean);

const startsWithTokens = (longer: string[], shorter: string[]): boolean =>
  shorter.length > 0 && shorter.length < longer.length && shorter.every((token, index) => longer[index] === token);

const containsTokens = (haystack: string[], needle: string[]): boolean => {
  if (needle.length === 0 || needle.length > haystack.length) {
    return false;
  }
  for (let offset = 0; offset + needle.length <= haystack.length; offset += 1) {
    if (needle.every((token, index) => haystack[offset + index] === token)) {
      return true;
    }
  }
  return false;
};

/** 1.0 equal, 0.9 when one key leads the other ("goldman" / "goldman sachs"), 0.8 when contained, else 0. */
export const scoreCompany = (a: string, b: string): number => {
  if (a === b) {
    return 1;
  }
  const left = tokens(a);
  const right = tokens(b);
  if (startsWithTokens(left, right) || startsWithTokens(right, left)) {
    return 0.9;
  }
  if (containsTokens(left, right) || containsTokens(right, left)) {
    return 0.8;
  }
  return 0;
};

/** 1.0 equal, otherwise Jaccard overlap of the token sets. */
export const scoreRole = (a: string, b: string): number => {
  if (a === b) {
    return 1;
  }
  const left = new Set(tokens(a));
  const right = new Set(tokens(b));
  const union = new Set([...left, ...right]);
  if (union.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) {
      shared += 1;
    }
  }
  return shared / union.size;
};

export const scoreMatch = (a: RecordKeys, b: RecordKeys): number =>
  scoreCompany(a.companyKey, b.companyKey) * scoreRole(a.roleKey, b.roleKey);

/**
 * Resolves canonical keys against existing records: exact key first, then the best
 * fuzzy candidate at or above `threshold`. When the two best candidates tie on score
 * and recency there is no safe choice and the resolution is `none` with `ambiguous`.
 */
export const resolveMatch = (keys: RecordKeys, records: readonly ApplicationRecord[], threshold: number): MatchResolution => {
  const exact = records.find((record) => record.companyKey === keys.companyKey && record.roleKey === keys.roleKey);
  if (exact) {
    return { kind: "exact", record: exact };
  }

  const candidates = records
    .map((record) => ({ record, score: scoreMatch(keys, record) }))
    .filter((candidate) => candidate.score > 0 && candidate.score >= threshold)
    .sort((a, b) => b.score - a.score || b.record.lastUpdated.getTime() - a.record.lastUpdated.getTime());

  const [best, runnerUp] = candidates;
  if (!best) {
    return { kind: "none", ambiguous: false, candidates };
  }
  if (
    runnerUp &&
    runnerUp.score === best.score &&
    runnerUp.record.lastUpdated.getTime() === best.record.lastUpdated.getTime()
  ) {
    return { kind: "none", ambiguous: true, candidates };
  }
  return { kind: "fuzzy", record: best.record, score: best.score };
};
