import { APPLICATION_STAGES, type ApplicationStage } from "../types.js";

/**
 * Application lifecycle: a total order over the progress stages plus two absorbing
 * terminal stages that sit outside it.
 */
export const STAGE_RANK = {
  Applied: 0,
  "In Review": 1,
  "OA/Assessment": 2,
  "Phone Screen": 3,
  "Interview Scheduled": 4,
  Interviewed: 5,
  Offer: 6,
} as const satisfies Record<Exclude<ApplicationStage, "Rejected" | "Withdrawn">, number>;

export type ProgressStage = keyof typeof STAGE_RANK;
export type TerminalStage = Exclude<ApplicationStage, ProgressStage>;

const TERMINAL_STAGES: ReadonlySet<ApplicationStage> = new Set<TerminalStage>(["Rejected", "Withdrawn"]);

export type TransitionReason = "advance" | "terminal_override" | "terminal_sticky" | "no_regression";

export interface TransitionDecision {
  apply: boolean;
  next: ApplicationStage;
  reason: TransitionReason;
}

export const isTerminalStage = (stage: ApplicationStage): stage is TerminalStage => TERMINAL_STAGES.has(stage);

export const isApplicationStage = (value: string): value is ApplicationStage =>
  (APPLICATION_STAGES as readonly string[]).includes(value);

export const decideTransition = (current: ApplicationStage, incoming: ApplicationStage): TransitionDecision => {
  if (isTerminalStage(incoming)) {
    return { apply: true, next: incoming, reason: "terminal_override" };
  }
  if (isTerminalStage(current)) {
    return { apply: false, next: current, reason: "terminal_sticky" };
  }
  if (STAGE_RANK[incoming] > STAGE_RANK[current]) {
    return { apply: true, next: incoming, reason: "advance" };
  }
  return { apply: false, next: current, reason: "no_regression" };
};
