import * as cheerio from "cheerio";
import type { gmail_v1 } from "googleapis";
import type { RawEvent } from "../types.js";
import { extractDomainFromEmail, extractEmailAddress } from "../utils/normalize.js";

export const MAX_BODY_WORDS = 400;

const FOOTER_ONLY = [
  /^unsubscribe\s*$/i,
  /^privacy policy\s*$/i,
  /^terms of service\s*$/i,
  /^all rights reserved\.?\s*$/i,
  /^manage your email preferences\s*$/i,
  /^view (?:this email )?in (?:your )?browser\s*$/i,
];

const pickHeader = (headers: gmail_v1.Schema$MessagePartHeader[] | undefined, key: string): string => {
  if (!headers) {
    return "";
  }
  return headers.find((header) => header.name?.toLowerCase() === key.toLowerCase())?.value ?? "";
};

const decodeBase64Url = (value: string): string => {
  const base64 = value.replace(/-/g, "+").replace(/_/g, "/");
  const padding = base64.length % 4;
  const normalized = padding === 0 ? base64 : base64.padEnd(base64.length + (4 - padding), "=");
  return Buffer.from(normalized, "base64").toString("utf8");
};

export const extractDisplayName = (raw: string): string => {
  const cleaned = raw.trim();
  if (!cleaned) {
    return "";
  }

  const withAngle = cleaned.match(/^(.*?)</);
  if (!withAngle) {
    return "";
  }
  return (withAngle[1] ?? "")
    .replace(/^"+|"+$/g, "")
    .replace(/\s+/g, " ")
    .trim();
};

const collectBodyParts = (part: gmail_v1.Schema$MessagePart | undefined): { text: string[]; html: string[] } => {
  if (!part) {
    return { text: [], html: [] };
  }

  const text: string[] = [];
  const html: string[] = [];

  if (part.body?.data) {
    if (part.mimeType === "text/plain") {
      text.push(decodeBase64Url(part.body.data));
    }
    if (part.mimeType === "text/html") {
      html.push(decodeBase64Url(part.body.data));
    }
  }

  for (const child of part.parts ?? []) {
    const nested = collectBodyParts(child);
    text.push(...nested.text);
    html.push(...nested.html);
  }

  return { text, html };
};

export const htmlToText = (html: string): string => {
  const $ = cheerio.load(html);
  $("script, style, head, noscript").remove();
  $("br").replaceWith("\n");
  $("p, div, tr, li, h1, h2, h3, h4, table").after("\n");
  return $.root().text();
};

/**
 * Reduces a message body to the lines worth classifying: markup, quoted replies and
 * footer-only lines are dropped and the result is capped at MAX_BODY_WORDS words.
 */
export const cleanBody = (body: string | null | undefined): string => {
  if (!body) {
    return "";
  }

  const text = /<[a-z][\s\S]*>/i.test(body) ? htmlToText(body) : body;
  const cleaned: string[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/\u00a0/g, " ").trim();
    if (!line || line.startsWith(">") || line.startsWith("|")) {
      continue;
    }
    if (/^On .+ wrote:?$/.test(line)) {
      break;
    }
    if (line.length < 100 && FOOTER_ONLY.some((pattern) => pattern.test(line))) {
      continue;
    }
    cleaned.push(line.replace(/ {2,}/g, " "));
  }

  const words = cleaned.join("\n").split(/\s+/).filter(Boolean);
  if (words.length > MAX_BODY_WORDS) {
    return `${words.slice(0, MAX_BODY_WORDS).join(" ")}\n[...truncated...]`;
  }
  return cleaned.join("\n").trim();
};

const resolveReceivedAt = (internalDate: string | null | undefined, dateHeader: string): Date => {
  const fromInternal = internalDate ? Number(internalDate) : Number.NaN;
  if (Number.isFinite(fromInternal) && fromInternal > 0) {
    return new Date(fromInternal);
  }
  const fromHeader = Date.parse(dateHeader);
  return Number.isNaN(fromHeader) ? new Date() : new Date(fromHeader);
};

/** Turns a Gmail `format=full` message into a RawEvent. Returns null when the message has no id. */
export const parseGmailMessage = (message: gmail_v1.Schema$Message): RawEvent | null => {
  if (!message.id) {
    return null;
  }

  const headers = message.payload?.headers ?? [];
  const fromRaw = pickHeader(headers, "from");
  const collected = collectBodyParts(message.payload);
  const bodyText = collected.text.join("\n").trim();
  const bodyHtml = collected.html.join("\n").trim();
  const fromEmail = extractEmailAddress(fromRaw);

  return {
    id: message.id,
    threadId: message.threadId ?? "",
    fromEmail,
    fromDisplayName: extractDisplayName(fromRaw),
    senderDomain: extractDomainFromEmail(fromEmail),
    subject: pickHeader(headers, "subject").trim(),
    receivedAt: resolveReceivedAt(message.internalDate, pickHeader(headers, "date")),
    bodyExcerpt: cleanBody(bodyText || bodyHtml),
  };
};
