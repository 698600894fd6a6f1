import { InvalidClassifierResponseError, TransientClassifyError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import {
  NOT_AN_APPLICATION,
  type ApplicationStage,
  type ApplicationType,
  type ClassificationProvider,
  type ClassificationResult,
  type RawEvent,
  type SkipDecision,
} from "../types.js";
import { classifyWithRules } from "./classifier.js";

const log = logger.child("classifier");

/** A classification that passed every acceptance rule. */
export interface AcceptedClassification {
  company: string;
  role: string;
  type: ApplicationType;
  stage: ApplicationStage;
  confidence: number;
  notes: string | null;
}

export type ClassifyOutcome =
  | { kind: "classified"; result: AcceptedClassification; source: "rules" | "provider" }
  | ({ kind: "skip" } & SkipDecision);

/** Per-day call counter backing the classifier quota. */
export interface UsageCounter {
  getClassifierUsage(day: string): number;
  incrementClassifierUsage(day: string): number;
}

export interface ClassifyOptions {
  minConfidence: number;
  dailyQuota: number;
  rulesFirst: boolean;
  usage: UsageCounter;
  now?: () => Date;
}

const skip = (reason: SkipDecision["reason"], permanent: boolean, detail: string): ClassifyOutcome => ({
  kind: "skip",
  reason,
  permanent,
  detail,
});

export const usageDay = (date: Date): string => date.toISOString().slice(0, 10);

/** Applies the acceptance rules to a provider answer. */
export const evaluateClassification = (
  result: ClassificationResult,
  minConfidence: number,
  source: "rules" | "provider" = "provider",
): ClassifyOutcome => {
  if (result.stageGuess === NOT_AN_APPLICATION) {
    return skip("not_an_application", true, result.notes ?? "classifier marked the message as not an application");
  }

  const company = result.company?.trim();
  const role = result.role?.trim();
  if (!company || !role) {
    const missing = [company ? null : "company", role ? null : "role"].filter((field): field is string => field !== null);
    return skip("missing_fields", true, `missing ${missing.join(" and ")}`);
  }

  if (result.confidence < minConfidence) {
    return skip("low_confidence", true, `confidence ${result.confidence} below threshold ${minConfidence}`);
  }

  return {
    kind: "classified",
    result: {
      company,
      role,
      type: result.type,
      stage: result.stageGuess,
      confidence: result.confidence,
      notes: result.notes?.trim() || null,
    },
    source,
  };
};

export const classifyEvent = async (
  event: RawEvent,
  provider: ClassificationProvider,
  options: ClassifyOptions,
): Promise<ClassifyOutcome> => {
  if (options.rulesFirst) {
    const ruled = classifyWithRules(event);
    if (ruled && ruled.result.confidence >= options.minConfidence) {
      log.debug("Rule classifier answered", { messageId: event.id, matchedRule: ruled.matchedRule });
      return evaluateClassification(ruled.result, options.minConfidence, "rules");
    }
    if (ruled) {
      log.debug("Rule answer below the confidence threshold, asking the provider", {
        messageId: event.id,
        matchedRule: ruled.matchedRule,
      });
    }
  }

  const day = usageDay(options.now?.() ?? new Date());
  const used = options.usage.getClassifierUsage(day);
  if (used >= options.dailyQuota) {
    return skip("quota_exhausted", false, `daily classifier quota ${options.dailyQuota} reached (${used} calls on ${day})`);
  }
  // Counted before the call; in-flight calls hold their slot.
  options.usage.incrementClassifierUsage(day);

  let result: ClassificationResult;
  try {
    result = await provider.classify({
      sender: event.fromDisplayName ? `${event.fromDisplayName} <${event.fromEmail}>` : event.fromEmail,
      subject: event.subject,
      bodyExcerpt: event.bodyExcerpt,
    });
  } catch (error) {
    if (error instanceof TransientClassifyError) {
      return skip("classifier_unavailable", false, error.message);
    }
    if (error instanceof InvalidClassifierResponseError) {
      return skip("classifier_invalid_response", false, error.message);
    }
    log.error("Unexpected classifier failure", { messageId: event.id, provider: provider.name, error });
    return skip("classifier_unavailable", false, errorMessage(error));
  }

  return evaluateClassification(result, options.minConfidence);
};
