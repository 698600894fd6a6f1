import { z } from "zod";
import { config } from "../config.js";
import { InvalidClassifierResponseError, TransientClassifyError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import {
  APPLICATION_STAGES,
  APPLICATION_TYPES,
  NOT_AN_APPLICATION,
  type ClassificationInput,
  type ClassificationProvider,
  type ClassificationResult,
} from "../types.js";

const stageSchema = z.union([z.enum(APPLICATION_STAGES), z.literal(NOT_AN_APPLICATION)]);

const ollamaClassificationSchema = z.object({
  company: z.string().nullish(),
  role: z.string().nullish(),
  type: z.enum(APPLICATION_TYPES).catch("unknown"),
  stage: stageSchema,
  confidence: z.coerce.number().min(0).max(1),
  notes: z.string().nullish(),
});

const generateResponseSchema = z.object({
  response: z.string().optional(),
});

export type OllamaClassification = z.infer<typeof ollamaClassificationSchema>;

export interface OllamaOptions {
  enabled: boolean;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  maxAttempts: number;
}

export type ParsedClassification = { ok: true; value: ClassificationResult } | { ok: false; error: string };

const defaultOptions = (): OllamaOptions => ({
  enabled: config.OLLAMA_ENABLED,
  baseUrl: config.OLLAMA_BASE_URL,
  model: config.OLLAMA_MODEL,
  timeoutMs: config.OLLAMA_TIMEOUT_MS,
  maxAttempts: config.CLASSIFIER_MAX_ATTEMPTS,
});

export const extractJsonCandidate = (text: string): string | null => {
  // Reasoning models wrap their chain of thought in <think>...</think>
  const cleaned = text.replace(/<think>[\s\S]*?<\/think>/gi, "").trim();

  if (cleaned.startsWith("{") && cleaned.endsWith("}")) {
    return cleaned;
  }

  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) {
    return null;
  }

  return cleaned.slice(start, end + 1);
};

const trimToNull = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

export const parseClassification = (raw: string): ParsedClassification => {
  const text = raw.replace(/<think>[\s\S]*?<\/think>/gi, "").trim();
  if (text.toLowerCase() === "null") {
    return {
      ok: true,
      value: { company: null, role: null, type: "unknown", stageGuess: NOT_AN_APPLICATION, confidence: 1 },
    };
  }

  const candidate = extractJsonCandidate(text);
  if (!candidate) {
    return { ok: false, error: "Ollama did not return JSON payload" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (error) {
    return { ok: false, error: `Malformed JSON: ${errorMessage(error)}` };
  }

  const validated = ollamaClassificationSchema.safeParse(parsed);
  if (!validated.success) {
    return { ok: false, error: validated.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ") };
  }

  const notes = trimToNull(validated.data.notes);
  return {
    ok: true,
    value: {
      company: trimToNull(validated.data.company),
      role: trimToNull(validated.data.role),
      type: validated.data.type,
      stageGuess: validated.data.stage,
      confidence: validated.data.confidence,
      ...(notes ? { notes } : {}),
    },
  };
};

export const buildPrompt = (input: ClassificationInput): string => {
  return [
    "You are an email extraction engine for a job application tracker.",
    "Classify the email and return ONLY valid JSON, no other text.",
    "Schema:",
    "{",
    '  "company": string | null,',
    '  "role": string | null,',
    '  "type": "full-time" | "internship" | "unknown",',
    `  "stage": ${[...APPLICATION_STAGES, NOT_AN_APPLICATION].map((stage) => `"${stage}"`).join(" | ")},`,
    '  "confidence": number between 0 and 1,',
    '  "notes": one short line summarising the update',
    "}",
    "Rules:",
    `1) Use "${NOT_AN_APPLICATION}" for job alerts, newsletters, marketing and anything that is not a response to an application the recipient submitted.`,
    "2) company is the hiring employer, never the applicant tracking system (Greenhouse, Lever, Workday).",
    "3) role is the position title as written in the email.",
    "4) If a field is unknown, return null for it.",
    "",
    `from: ${input.sender}`,
    `subject: ${input.subject}`,
    `body: ${input.bodyExcerpt.slice(0, 6000)}`,
  ].join("\n");
};

const callOllama = async (options: OllamaOptions, prompt: string): Promise<string> => {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

  let response: Response;
  try {
    response = await fetch(`${options.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: options.model,
        prompt,
        stream: false,
        format: "json",
        options: {
          temperature: 0.1,
        },
      }),
      signal: controller.signal,
    });
  } catch (error) {
    const reason = controller.signal.aborted ? `timed out after ${options.timeoutMs}ms` : errorMessage(error);
    throw new TransientClassifyError(`Ollama request failed: ${reason}`, { cause: error });
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    throw new TransientClassifyError(`Ollama request failed with status ${response.status}`);
  }

  const body = generateResponseSchema.safeParse(await response.json().catch(() => null));
  return body.success ? String(body.data.response ?? "").trim() : "";
};

export const classifyWithOllama = async (
  input: ClassificationInput,
  overrides: Partial<OllamaOptions> = {},
): Promise<ClassificationResult> => {
  const options = { ...defaultOptions(), ...overrides };
  if (!options.enabled) {
    throw new TransientClassifyError("Ollama disabled");
  }

  const prompt = buildPrompt(input);
  const attempts = Math.max(1, options.maxAttempts);

  let lastError = "Unknown Ollama error";
  let lastRaw: string | undefined;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    const raw = await callOllama(options, prompt);
    const parsed = parseClassification(raw);
    if (parsed.ok) {
      return parsed.value;
    }

    lastError = parsed.error;
    lastRaw = raw;
    logger.warn("Ollama returned an invalid classification payload", {
      attempt,
      maxAttempts: attempts,
      error: parsed.error,
    });
  }

  throw new InvalidClassifierResponseError(`Invalid classifier payload after ${attempts} attempts: ${lastError}`, lastRaw);
};

export const createOllamaProvider = (overrides: Partial<OllamaOptions> = {}): ClassificationProvider => {
  const model = overrides.model ?? config.OLLAMA_MODEL;
  return {
    name: `ollama:${model}`,
    classify: (input) => classifyWithOllama(input, overrides),
  };
};
