import type { ConversationStage, PersistedStage } from "@kitchen-assistant/contracts";

export class InvalidStageTransitionError extends Error {
  readonly from: ConversationStage;
  readonly to: ConversationStage;

  constructor(from: ConversationStage, to: ConversationStage) {
    super(`invalid stage transition ${from} -> ${to}`);
    this.name = "InvalidStageTransitionError";
    this.from = from;
    this.to = to;
  }
}

const TRANSITIONS: Record<ConversationStage, readonly ConversationStage[]> = {
  INITIAL: ["COLLECTING_PREFS"],
  COLLECTING_PREFS: ["COLLECTING_PREFS", "PANTRY_OP", "SEARCHING", "GENERAL"],
  PANTRY_OP: ["SEARCHING", "GENERAL", "COLLECTING_PREFS", "AWAITING_SELECTION"],
  SEARCHING: ["PRESENTING_OPTIONS", "COLLECTING_PREFS"],
  GENERAL: ["SEARCHING", "COLLECTING_PREFS", "AWAITING_SELECTION"],
  PRESENTING_OPTIONS: ["AWAITING_SELECTION"],
  AWAITING_SELECTION: ["AWAITING_SELECTION", "PANTRY_OP", "SEARCHING", "GENERAL", "ADAPTING", "COLLECTING_PREFS"],
  ADAPTING: ["DONE", "AWAITING_SELECTION"],
  DONE: ["COLLECTING_PREFS"],
  ERROR: ["COLLECTING_PREFS"],
};

export function canTransition(from: ConversationStage, to: ConversationStage): boolean {
  return to === "ERROR" || TRANSITIONS[from].includes(to);
}

/**
 * Tracks the stages one turn passes through. Every move is checked against
 * the transition table; ERROR is reachable from anywhere.
 */
export class SessionStateMachine {
  private current: ConversationStage;
  private readonly visited: ConversationStage[];

  constructor(start: ConversationStage) {
    this.current = start;
    this.visited = [start];
  }

  get stage(): ConversationStage {
    return this.current;
  }

  get path(): ConversationStage[] {
    return [...this.visited];
  }

  transition(to: ConversationStage): ConversationStage {
    if (!canTransition(this.current, to)) {
      throw new InvalidStageTransitionError(this.current, to);
    }
    this.current = to;
    this.visited.push(to);
    return to;
  }

  /** Moves to `to` unless already there. */
  ensure(to: ConversationStage): ConversationStage {
    return this.current === to ? to : this.transition(to);
  }

  /** Walks to the stage a session rests in between turns. */
  settle(hasPendingCandidates: boolean): PersistedStage {
    switch (this.current) {
      case "INITIAL":
      case "ERROR":
      case "DONE":
        this.transition("COLLECTING_PREFS");
        return "COLLECTING_PREFS";
      case "COLLECTING_PREFS":
        return "COLLECTING_PREFS";
      case "AWAITING_SELECTION":
        return hasPendingCandidates ? "AWAITING_SELECTION" : this.rest(false);
      case "PRESENTING_OPTIONS":
        this.transition("AWAITING_SELECTION");
        return "AWAITING_SELECTION";
      case "PANTRY_OP":
      case "GENERAL":
        return this.rest(hasPendingCandidates);
      case "SEARCHING":
        this.transition("COLLECTING_PREFS");
        return "COLLECTING_PREFS";
      case "ADAPTING":
        this.transition("AWAITING_SELECTION");
        return "AWAITING_SELECTION";
    }
  }

  private rest(hasPendingCandidates: boolean): PersistedStage {
    const target: PersistedStage = hasPendingCandidates ? "AWAITING_SELECTION" : "COLLECTING_PREFS";
    this.transition(target);
    return target;
  }
}

export function isPersistedStage(stage: ConversationStage): stage is PersistedStage {
  return stage === "COLLECTING_PREFS" || stage === "AWAITING_SELECTION";
}
