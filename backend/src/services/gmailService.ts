import dayjs from "dayjs";
import { google, type gmail_v1 } from "googleapis";
import { config, hasGoogleConfig } from "../config.js";
import { TransientFetchError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { FetchFailure, FetchRange, FetchResult, MailboxSource, RawEvent } from "../types.js";
import { parseGmailMessage } from "./emailParser.js";

const log = logger.child("gmail");

const LIST_PAGE_SIZE = 500;
const GET_REQUEST_DELAY_MS = 150;

const SUBJECT_TERMS = [
  "application",
  "applied",
  "interview",
  "assessment",
  "offer",
  "unfortunately",
  "regret",
  "position",
  "role",
  "candidate",
  "hiring",
  "recruit",
  "decision",
  "onsite",
  '"thank you for applying"',
  '"your application"',
  '"application received"',
  '"next steps"',
  '"phone screen"',
  '"coding challenge"',
  '"not selected"',
  '"other candidates"',
];

const SENDER_TERMS = [
  "greenhouse",
  "lever",
  "workday",
  "myworkdayjobs",
  "ashbyhq",
  "icims",
  "taleo",
  "smartrecruiters",
  "jobvite",
  "successfactors",
  "brassring",
  "bamboohr",
  "recruitee",
  "rippling",
  "dover",
  "careers",
  "recruiting",
  "talent",
  "jobs",
];

const EXCLUSIONS = [
  '-subject:"job alert"',
  '-subject:"jobs you may like"',
  '-subject:"recommended jobs"',
  "-subject:newsletter",
  "-in:trash",
  "-in:spam",
];

export interface GoogleCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface GmailSourceOptions {
  requestDelayMs?: number;
}

/** Gmail search query: application keywords in the subject or a recruiting sender, minus alerts and trash. */
export const buildGmailQuery = (range: FetchRange): string => {
  const subject = SUBJECT_TERMS.map((term) => `subject:${term}`).join(" OR ");
  const from = SENDER_TERMS.map((term) => `from:${term}`).join(" OR ");
  const window = [`after:${dayjs(range.after).format("YYYY/MM/DD")}`];
  if (range.before) {
    window.push(`before:${dayjs(range.before).format("YYYY/MM/DD")}`);
  }
  return `${window.join(" ")} (${subject} OR ${from}) ${EXCLUSIONS.join(" ")}`;
};

const numericStatus = (value: unknown): number | null => {
  const status = Number(value);
  return Number.isInteger(status) && status >= 400 && status < 600 ? status : null;
};

export const httpStatusOf = (error: unknown): number | null => {
  if (typeof error !== "object" || error === null) {
    return null;
  }
  if ("code" in error && numericStatus(error.code)) {
    return numericStatus(error.code);
  }
  if ("status" in error && numericStatus(error.status)) {
    return numericStatus(error.status);
  }
  if ("response" in error && typeof error.response === "object" && error.response !== null && "status" in error.response) {
    return numericStatus(error.response.status);
  }
  return null;
};

export const isQuotaExceededError = (error: unknown): boolean => {
  const status = httpStatusOf(error);
  if (status === 429) {
    return true;
  }
  const details = errorMessage(error).toLowerCase();
  return status === 403 && (details.includes("quota") || details.includes("rate limit"));
};

const sleep = async (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const createGmailClient = (credentials: GoogleCredentials): gmail_v1.Gmail => {
  const oauth2Client = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret);
  oauth2Client.setCredentials({ refresh_token: credentials.refreshToken });
  return google.gmail({ version: "v1", auth: oauth2Client });
};

export const credentialsFromConfig = (): GoogleCredentials => {
  if (!hasGoogleConfig) {
    throw new Error("Gmail is not configured. Set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN.");
  }
  return {
    clientId: config.GOOGLE_CLIENT_ID,
    clientSecret: config.GOOGLE_CLIENT_SECRET,
    refreshToken: config.GOOGLE_REFRESH_TOKEN,
  };
};

/** Mailbox source backed by the Gmail API, authorised with a pre-provisioned refresh token. */
export class GmailMailboxSource implements MailboxSource {
  private readonly requestDelayMs: number;

  constructor(
    private readonly gmail: gmail_v1.Gmail,
    options: GmailSourceOptions = {},
  ) {
    this.requestDelayMs = options.requestDelayMs ?? GET_REQUEST_DELAY_MS;
  }

  async fetchRange(range: FetchRange): Promise<FetchResult> {
    const query = buildGmailQuery(range);
    const ids = await this.listMessageIds(query);
    log.info("Listed candidate messages", { count: ids.length, query });
    return this.fetchMessages(ids);
  }

  async fetchByIds(ids: readonly string[]): Promise<FetchResult> {
    return this.fetchMessages(ids);
  }

  private async listMessageIds(query: string): Promise<string[]> {
    const ids = new Set<string>();
    let pageToken: string | undefined;

    try {
      do {
        const listResponse = await this.gmail.users.messages.list({
          userId: "me",
          q: query,
          maxResults: LIST_PAGE_SIZE,
          pageToken,
        });
        for (const message of listResponse.data.messages ?? []) {
          if (message.id) {
            ids.add(message.id);
          }
        }
        pageToken = listResponse.data.nextPageToken ?? undefined;
      } while (pageToken);
    } catch (error) {
      throw new TransientFetchError(`Gmail listing failed: ${errorMessage(error)}`, { cause: error });
    }

    return Array.from(ids);
  }

  private async fetchMessages(ids: readonly string[]): Promise<FetchResult> {
    const events: RawEvent[] = [];
    const failures: FetchFailure[] = [];

    for (let index = 0; index < ids.length; index += 1) {
      const id = ids[index];
      if (id === undefined) {
        continue;
      }
      try {
        const response = await this.gmail.users.messages.get({ userId: "me", id, format: "full" }, { retry: false });
        const event = parseGmailMessage(response.data);
        if (event) {
          events.push(event);
        } else {
          failures.push({ messageId: id, error: "Gmail returned a message without id" });
        }
      } catch (error) {
        if (isQuotaExceededError(error)) {
          const remaining = ids.slice(index);
          log.warn("Gmail API quota exceeded; deferring the remaining messages", {
            fetched: events.length,
            deferred: remaining.length,
          });
          failures.push(...remaining.map((messageId) => ({ messageId, error: "Gmail API quota exceeded" })));
          break;
        }

        const code = httpStatusOf(error);
        log.warn("Failed to fetch Gmail message", {
          messageId: id,
          code,
          reason: errorMessage(error),
        });
        failures.push({ messageId: id, error: errorMessage(error), missing: code === 404 || code === 410 });
      }

      if (this.requestDelayMs > 0 && index < ids.length - 1) {
        await sleep(this.requestDelayMs);
      }
    }

    return { events, failures };
  }
}

/** Stands in when no Google credentials are configured; every run ends with a recorded failure. */
export class UnconfiguredMailboxSource implements MailboxSource {
  async fetchRange(): Promise<FetchResult> {
    throw new TransientFetchError("Gmail is not configured. Set GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN.");
  }

  async fetchByIds(): Promise<FetchResult> {
    return this.fetchRange();
  }
}
