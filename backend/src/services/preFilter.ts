import type { RawEvent, SkipDecision } from "../types.js";

export type PreFilterVerdict =
  | { action: "keep"; reason: "allowlisted_domain" | "tracked_thread" | "ats_domain" | "application_signal" }
  | ({ action: "discard" } & SkipDecision);

export interface PreFilterContext {
  // Threads that contributed to a tracked application or had an earlier message kept.
  knownThreadIds: ReadonlySet<string>;
  allowDomains?: readonly string[];
  denyDomains?: readonly string[];
}

const PERSONAL_DOMAINS = new Set([
  "gmail.com",
  "googlemail.com",
  "yahoo.com",
  "hotmail.com",
  "outlook.com",
  "live.com",
  "icloud.com",
  "me.com",
  "aol.com",
  "proton.me",
  "protonmail.com",
]);

// Sender domains that never carry application updates (auth codes, consumer
// platforms, newsletter relays).
const NOISE_DOMAINS = new Set([
  "accountprotection.microsoft.com",
  "account.microsoft.com",
  "accounts.google.com",
  "airbnb.com",
  "booking.com",
  "expedia.com",
  "uber.com",
  "meetup.com",
  "email.meetup.com",
  "eventbrite.com",
  "mailchimp.com",
  "constantcontact.com",
  "sendgrid.net",
  "klaviyo.com",
  "substack.com",
  "medium.com",
  "facebookmail.com",
  "twitter.com",
  "instagram.com",
  "tiktok.com",
  "ebay.com",
  "etsy.com",
  "paypal.com",
]);

const JOB_BOARD_DOMAINS = ["linkedin.com", "indeed.com", "glassdoor.com", "ziprecruiter.com", "monster.com", "simplyhired.com", "handshake.com", "joinhandshake.com"];

const ATS_DOMAINS = [
  "greenhouse.io",
  "greenhouse-mail.io",
  "lever.co",
  "workday.com",
  "myworkday.com",
  "myworkdayjobs.com",
  "ashbyhq.com",
  "smartrecruiters.com",
  "jobvite.com",
  "icims.com",
  "taleo.net",
  "successfactors.com",
  "jazz.co",
  "recruitee.com",
  "bamboohr.com",
  "rippling.com",
  "dover.com",
  "workable.com",
  "applytojob.com",
  "wellfound.com",
  "ultipro.com",
  "brassring.com",
];

const HARD_REJECT_SUBJECTS = [
  "job alert",
  "jobs you might like",
  "jobs you may like",
  "recommended jobs",
  "newsletter",
  "digest",
  "viewed your profile",
  "connection request",
  "do you want to finish your application",
  "you have new application updates this week",
  "matched new opportunities",
  "found jobs",
  "mock interview",
];

const APPLICATION_SUBJECT_KEYWORDS = [
  "applied",
  "application",
  "thanks for applying",
  "thank you for applying",
  "thank you for your interest",
  "thanks for your interest",
  "your interest",
  "thanks from",
  "follow-up",
  "update",
  "recruiting",
  "we received",
  "we've got your",
  "interview",
  "assessment",
  "coding challenge",
  "offer",
  "unfortunately",
  "next steps",
  "confirmation",
  "confirmed",
  "careers",
  "position",
  "role",
  "candidate",
];

const REPLY_PREFIX = /^\s*(?:re|fwd?|aw)\s*:/i;

const matchesDomain = (domain: string, candidates: Iterable<string>): string | null => {
  for (const candidate of candidates) {
    if (domain === candidate || domain.endsWith(`.${candidate}`)) {
      return candidate;
    }
  }
  return null;
};

const discard = (reason: SkipDecision["reason"], permanent: boolean, detail: string): PreFilterVerdict => ({
  action: "discard",
  reason,
  permanent,
  detail,
});

/**
 * Cheap rules that run before any classification call. Structural verdicts (who sent
 * it, what kind of mailing it is) are permanent; the keyword heuristic is not, so a
 * later rule or model change can pick those messages up again.
 */
export const evaluatePreFilter = (event: RawEvent, context: PreFilterContext): PreFilterVerdict => {
  const domain = event.senderDomain.toLowerCase();
  const subject = event.subject.toLowerCase();

  const denied = matchesDomain(domain, context.denyDomains ?? []);
  if (denied) {
    return discard("denylisted_domain", true, `sender domain ${domain} is denylisted (${denied})`);
  }

  if (matchesDomain(domain, context.allowDomains ?? [])) {
    return { action: "keep", reason: "allowlisted_domain" };
  }

  const noise = matchesDomain(domain, NOISE_DOMAINS);
  if (noise) {
    return discard("denylisted_domain", true, `sender domain ${domain} is denylisted (${noise})`);
  }

  if (PERSONAL_DOMAINS.has(domain)) {
    return discard("personal_domain", true, `sender domain ${domain} is a personal mailbox`);
  }

  const board = matchesDomain(domain, JOB_BOARD_DOMAINS);
  if (board) {
    return discard("job_board_domain", true, `sender domain ${domain} is a job board (${board})`);
  }

  const rejectedPhrase = HARD_REJECT_SUBJECTS.find((phrase) => subject.includes(phrase));
  if (rejectedPhrase) {
    return discard("excluded_subject", true, `subject contains "${rejectedPhrase}"`);
  }

  // Follow-ups in a tracked thread rarely repeat the application keywords.
  if (event.threadId && context.knownThreadIds.has(event.threadId) && REPLY_PREFIX.test(event.subject)) {
    return { action: "keep", reason: "tracked_thread" };
  }

  if (matchesDomain(domain, ATS_DOMAINS)) {
    return { action: "keep", reason: "ats_domain" };
  }

  if (APPLICATION_SUBJECT_KEYWORDS.some((keyword) => subject.includes(keyword))) {
    return { action: "keep", reason: "application_signal" };
  }

  return discard("no_application_signal", false, `no application keyword in subject "${event.subject.slice(0, 80)}"`);
};
