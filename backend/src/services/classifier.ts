import type { ApplicationStage, ClassificationResult, RawEvent } from "../types.js";
import { cleanDisplayValue, inferCompanyNameFromDomain } from "../utils/normalize.js";

export interface RuleClassification {
  matchedRule: string;
  result: ClassificationResult;
}

interface RuleDefinition {
  stage: ApplicationStage;
  label: string;
  keywords: string[];
}

// First match wins, so the more decisive outcomes come first.
const RULES: RuleDefinition[] = [
  {
    stage: "Rejected",
    label: "rejected",
    keywords: [
      "unfortunately",
      "not moving forward",
      "not be moving forward",
      "other candidates",
      "regret to inform",
      "not selected",
      "position has been filled",
      "pursue other",
      "will not be considered",
    ],
  },
  {
    stage: "Withdrawn",
    label: "withdrawn",
    keywords: ["application has been withdrawn", "withdrawn your application", "you withdrew"],
  },
  {
    stage: "Offer",
    label: "offer",
    keywords: ["pleased to offer", "offer letter", "extend an offer", "we'd like to extend", "job offer"],
  },
  {
    stage: "Interviewed",
    label: "interviewed",
    keywords: ["thank you for interviewing", "thanks for interviewing", "following your interview", "after your interview"],
  },
  {
    stage: "Phone Screen",
    label: "phone-screen",
    keywords: ["phone screen", "recruiter call", "introductory call", "schedule a call"],
  },
  {
    stage: "Interview Scheduled",
    label: "interview",
    keywords: ["interview", "onsite", "meet with the team"],
  },
  {
    stage: "OA/Assessment",
    label: "assessment",
    keywords: ["assessment", "coding challenge", "online test", "codesignal", "hackerrank", "take-home"],
  },
  {
    stage: "Applied",
    label: "received",
    keywords: [
      "application received",
      "thank you for applying",
      "thanks for applying",
      "application submitted",
      "submitted successfully",
      "we received your",
      "we've received your",
      "we've got your",
    ],
  },
  {
    stage: "In Review",
    label: "in-review",
    keywords: ["under review", "reviewing your application", "being reviewed"],
  },
];

const ROLE_SUBJECT_PATTERNS: RegExp[] = [
  /thank\s+you\s+for\s+your\s+interest\s+[-–—]\s+([^,\n]+?)(?:\s*,\s*(?:summer|fall|winter|spring)\s+\d{4}|\s+\d{6,}|\s*$)/i,
  /(?:application|applied)\s+(?:for|to)\s+(?:the\s+)?(.+?)\s+(?:position\s+|role\s+)?(?:at|@)\s/i,
  /your\s+application\s+for\s+(?:the\s+)?(.+?)(?:\s+(?:position|role))?(?:\s+at\s.*|\s*$)/i,
  /(?:position|role):\s*(.+?)(?:\s+at\s.*|\s*$)/i,
  /^(.+?)\s+[-–—|]\s+(?:application|applied)/i,
];

const ROLE_BODY_PATTERNS: RegExp[] = [
  /(?:applying for|application for|reviewing your application for)\s+(?:the\s+)?([^.\n]{5,80}?)(?:\s+position|\s+role|\s+at\s|\.|\n|$)/i,
  /interest in the\s+([^.\n]{5,80}?)\s+(?:position|role)/i,
  /(?:position|role):\s*([^\n,]{5,80})/i,
];

// ATS hosts put the employer in the subdomain (acme.greenhouse.io).
const ATS_SUBDOMAIN = /^([a-z0-9-]+)\.(?:lever\.co|greenhouse\.io|myworkdayjobs\.com|ashbyhq\.com|recruitee\.com|rippling\.com|bamboohr\.com|workable\.com)$/;
const ATS_HOSTS = /(?:greenhouse|lever\.co|workday|ashbyhq|smartrecruiters|icims|taleo|jobvite|successfactors|recruitee|rippling|bamboohr|workable)/;
const GENERIC_LABELS = new Set(["mail", "email", "noreply", "no-reply", "donotreply", "careers", "jobs", "hire", "us", "talent", "recruiting", "app", "www", "boards", "notifications"]);
const GENERIC_DISPLAY = /^(?:no-?reply|do-?not-?reply|notifications?|recruiting|careers|talent acquisition|hiring team)$/i;
const DISPLAY_NOISE = /\s+(?:careers|recruiting|talent(?:\s+acquisition)?|hiring(?:\s+team)?|jobs|team|via\s+.+)$/i;

const titleCase = (value: string): string =>
  value
    .split(/[\s._-]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");

const companyFromDisplayName = (displayName: string): string | null => {
  const cleaned = cleanDisplayValue(displayName);
  if (!cleaned || GENERIC_DISPLAY.test(cleaned) || cleaned.includes("@")) {
    return null;
  }
  const stripped = cleaned.replace(DISPLAY_NOISE, "").trim();
  return stripped || null;
};

export const companyFromSender = (event: Pick<RawEvent, "fromEmail" | "fromDisplayName" | "senderDomain">): string | null => {
  const domain = event.senderDomain.toLowerCase();
  if (!domain) {
    return companyFromDisplayName(event.fromDisplayName);
  }

  const atsSubdomain = domain.match(ATS_SUBDOMAIN)?.[1];
  if (atsSubdomain && !GENERIC_LABELS.has(atsSubdomain)) {
    return titleCase(atsSubdomain);
  }

  if (ATS_HOSTS.test(domain)) {
    // Workday mails from <tenant>@myworkday.com.
    const local = event.fromEmail.split("@")[0] ?? "";
    if (domain.includes("workday") && local && !GENERIC_LABELS.has(local)) {
      return titleCase(local);
    }
    return companyFromDisplayName(event.fromDisplayName);
  }

  const labels = domain.split(".").filter((label) => !GENERIC_LABELS.has(label));
  if (labels.length < 2) {
    return companyFromDisplayName(event.fromDisplayName);
  }
  return inferCompanyNameFromDomain(labels.slice(-2).join("."));
};

const cleanRole = (value: string): string | null => {
  const role = cleanDisplayValue(value.replace(/\s+\d{6,}\s*$/, "").replace(/\s+(?:position|role)$/i, ""));
  return role.length > 3 && role.length < 100 ? role : null;
};

export const roleFromText = (subject: string, body: string): string | null => {
  for (const pattern of ROLE_SUBJECT_PATTERNS) {
    const match = subject.match(pattern)?.[1];
    const role = match ? cleanRole(match) : null;
    if (role) {
      return role;
    }
  }
  for (const pattern of ROLE_BODY_PATTERNS) {
    const match = body.match(pattern)?.[1];
    const role = match ? cleanRole(match) : null;
    if (role && !/\b(?:we|you|your|thank)\b/i.test(role)) {
      return role;
    }
  }
  return null;
};

export const detectStage = (subject: string, body: string): { stage: ApplicationStage; matchedRule: string } | null => {
  const combined = `${subject}\n${body}`.toLowerCase();
  for (const rule of RULES) {
    const keyword = rule.keywords.find((candidate) => combined.includes(candidate));
    if (keyword) {
      return { stage: rule.stage, matchedRule: `${rule.label}:${keyword}` };
    }
  }
  return null;
};

/**
 * Keyword classification without a model call. Answers only when company, role and
 * stage are all recognisable; anything less is left to the provider.
 */
export const classifyWithRules = (
  event: Pick<RawEvent, "fromEmail" | "fromDisplayName" | "senderDomain" | "subject" | "bodyExcerpt">,
): RuleClassification | null => {
  const company = companyFromSender(event);
  const role = roleFromText(event.subject, event.bodyExcerpt);
  const stage = detectStage(event.subject, event.bodyExcerpt);
  if (!company || !role || !stage) {
    return null;
  }

  const internship = /\bintern(?:ship)?s?\b/i.test(`${event.subject} ${event.bodyExcerpt}`);
  return {
    matchedRule: stage.matchedRule,
    result: {
      company,
      role,
      type: internship ? "internship" : "unknown",
      stageGuess: stage.stage,
      confidence: 0.85,
      notes: `Matched ${stage.matchedRule} in "${event.subject.slice(0, 80)}"`,
    },
  };
};
