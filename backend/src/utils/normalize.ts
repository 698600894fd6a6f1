export const UNKNOWN_COMPANY_KEY = "unknown-company";
export const UNKNOWN_ROLE_KEY = "unknown-role";

const LEGAL_SUFFIXES = new Set([
  "llc",
  "inc",
  "incorporated",
  "corp",
  "corporation",
  "ltd",
  "limited",
  "co",
  "company",
  "plc",
  "llp",
  "lp",
  "gmbh",
  "ag",
  "sa",
  "pty",
]);

// Sender display names often carry these after the employer name ("Acme Careers").
const COMPANY_TRAILING_NOISE = new Set(["careers", "career", "jobs", "recruiting", "hiring", "team", "talent", "and"]);

const COMPANY_ALIASES: Record<string, string> = {
  alphabet: "google",
  "meta platforms": "meta",
  facebook: "meta",
  "amazon com": "amazon",
  "amazon com services": "amazon",
  "amazon web services": "aws",
  "international business machines": "ibm",
  "j p morgan": "jpmorgan",
  "jp morgan": "jpmorgan",
  "jpmorgan chase": "jpmorgan",
  "jp morgan chase": "jpmorgan",
  "j p morgan chase": "jpmorgan",
};

const ROLE_ABBREVIATIONS: Record<string, string> = {
  swe: "software engineer",
  sde: "software engineer",
  pm: "product manager",
  apm: "associate product manager",
  tpm: "technical program manager",
  ml: "machine learning",
  ai: "artificial intelligence",
  sre: "site reliability engineer",
  qa: "quality assurance",
  ux: "user experience",
  ui: "user interface",
  eng: "engineer",
  engr: "engineer",
  dev: "developer",
  mgr: "manager",
};

const ROLE_PHRASES: Array<[RegExp, string]> = [
  [/\bsoftware development engineer\b/g, "software engineer"],
  [/\bsoftware engineering\b/g, "software engineer"],
  [/\bfront end\b/g, "frontend"],
  [/\bback end\b/g, "backend"],
  [/\bfull stack\b/g, "fullstack"],
  [/\b(software|frontend|backend|fullstack|web|mobile|ios|android) developer\b/g, "$1 engineer"],
  [/\bco op\b/g, "coop"],
  [/\bfull time\b/g, "fulltime"],
  [/\bpart time\b/g, "parttime"],
  [/\bnew grad(?:uate)?\b/g, "newgrad"],
];

// Tokens that describe the arrangement or seniority rather than the position.
const ROLE_NOISE = new Set([
  "intern",
  "interns",
  "internship",
  "internships",
  "coop",
  "fulltime",
  "parttime",
  "contract",
  "contractor",
  "remote",
  "hybrid",
  "onsite",
  "newgrad",
  "i",
  "ii",
  "iii",
  "iv",
  "sr",
  "jr",
  "senior",
  "junior",
  "associate",
  "lead",
  "staff",
  "principal",
  "summer",
  "fall",
  "winter",
  "spring",
  "the",
  "position",
  "role",
  "opening",
]);

const tokenize = (input: string, keep: RegExp): string[] =>
  input
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(keep, " ")
    .split(/\s+/)
    .filter(Boolean);

const stripLegalSuffixes = (tokens: string[]): string[] => {
  const result = [...tokens];
  let changed = true;
  while (changed && result.length > 1) {
    changed = false;
    const last = result[result.length - 1];
    if (LEGAL_SUFFIXES.has(last) || COMPANY_TRAILING_NOISE.has(last)) {
      result.pop();
      changed = true;
      continue;
    }
    // "L.L.C." tokenizes to l l c
    if (result.length > 3 && result.slice(-3).join("") === "llc") {
      result.splice(-3, 3);
      changed = true;
    }
  }
  return result;
};

/** Canonical company key used for matching. Never throws; empty input maps to `unknown-company`. */
export const normalizeCompany = (input: string | null | undefined): string => {
  const tokens = stripLegalSuffixes(tokenize(input ?? "", /[^a-z0-9]+/g));
  const joined = tokens.join(" ");
  if (!joined) {
    return UNKNOWN_COMPANY_KEY;
  }
  return COMPANY_ALIASES[joined] ?? joined;
};

/** Canonical role key used for matching. Never throws; empty input maps to `unknown-role`. */
export const normalizeRole = (input: string | null | undefined): string => {
  const expanded = tokenize(input ?? "", /[^a-z0-9+#]+/g)
    .map((token) => ROLE_ABBREVIATIONS[token] ?? token)
    .join(" ");

  if (!expanded) {
    return UNKNOWN_ROLE_KEY;
  }

  let phrased = expanded;
  for (const [pattern, replacement] of ROLE_PHRASES) {
    phrased = phrased.replace(pattern, replacement);
  }

  const meaningful = phrased.split(" ").filter((token) => !ROLE_NOISE.has(token) && !/^\d{4}$/.test(token));
  if (meaningful.length === 0) {
    return phrased;
  }
  return meaningful.join(" ");
};

export const cleanDisplayValue = (value: string): string =>
  value
    .replace(/\s+/g, " ")
    .replace(/^[\s"'`.,:;|()[\]{}<>-]+|[\s"'`,:;|()[\]{}<>-]+$/g, "")
    .trim();

export const displayCompanyName = (input: string): string => {
  const cleaned = cleanDisplayValue(input).replace(
    /,?\s+(?:L\.?L\.?C|Inc|Incorporated|Corp|Corporation|Ltd|Limited|Co|PLC|LLP|LP|GmbH)\.?$/i,
    "",
  );
  return cleaned || "Unknown Company";
};

export const displayRoleTitle = (input: string): string => cleanDisplayValue(input).slice(0, 120) || "Unknown Role";

export const buildRecordKey = (companyKey: string, roleKey: string): string => `${companyKey}::${roleKey}`;

export const extractEmailAddress = (raw: string): string => {
  const match = raw.match(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i);
  return match?.[0]?.toLowerCase() ?? raw.trim().toLowerCase();
};

export const extractDomainFromEmail = (email: string): string => {
  const normalized = extractEmailAddress(email);
  const parts = normalized.split("@");
  return parts[1] ?? "";
};

export const inferCompanyNameFromDomain = (domain: string): string => {
  if (!domain) {
    return "Unknown Company";
  }
  const firstLabel = domain.split(".")[0] ?? domain;
  return firstLabel
    .split("-")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
};
