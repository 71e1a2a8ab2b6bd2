import type {
  ConversationStage,
  IntentType,
  PantryDelta,
  PreferenceDelta,
  Preferences,
} from "@kitchen-assistant/contracts";
import type { DelegationFailure } from "../router/delegation-router.js";

export type AmbiguityReason = "unclear" | "invalid_selection";

export type Intent =
  | { type: "mutate_pantry"; deltas: PantryDelta[] }
  | { type: "search_recipes"; query: string }
  | { type: "select_recommendation"; index: number }
  | { type: "general_query"; question: string; acknowledgeOnly: boolean; aboutPantry: boolean }
  | { type: "ambiguous"; reason: AmbiguityReason; clarification: string };

export type ClassifierContext = {
  stage: ConversationStage;
  message: string;
  preferences: Preferences;
  pendingCount: number;
  now: Date;
};

export type Classification = {
  intents: Intent[];
  preferenceDelta: PreferenceDelta;
  source: "heuristic" | "model";
  degraded?: DelegationFailure;
};

const EXECUTION_RANK: Record<IntentType, number> = {
  mutate_pantry: 0,
  select_recommendation: 1,
  general_query: 2,
  search_recipes: 3,
  ambiguous: 4,
};

/** Stable order in which intents run: every pantry mutation precedes every search. */
export function orderIntents(intents: Intent[]): Intent[] {
  return intents
    .map((intent, position) => ({ intent, position }))
    .toSorted(
      (left, right) =>
        EXECUTION_RANK[left.intent.type] - EXECUTION_RANK[right.intent.type] || left.position - right.position,
    )
    .map((entry) => entry.intent);
}

export const UNCLEAR_CLARIFICATION =
  "I can update your pantry, suggest recipes from what you have, or answer a cooking question. What would you like to do?";

export function selectionClarification(pendingCount: number): string {
  if (pendingCount === 0) {
    return "There are no recipe options to choose from yet. Ask me for recipe ideas first.";
  }
  return pendingCount === 1
    ? "There is only one option right now. Reply 1 to choose it."
    : `Please choose an option between 1 and ${pendingCount}.`;
}

/** Resolves a requested option number against the session, or explains why it cannot. */
export function resolveSelection(index: number, stage: ConversationStage, pendingCount: number): Intent {
  if (stage === "AWAITING_SELECTION" && Number.isInteger(index) && index >= 1 && index <= pendingCount) {
    return { type: "select_recommendation", index };
  }
  return {
    type: "ambiguous",
    reason: "invalid_selection",
    clarification: selectionClarification(stage === "AWAITING_SELECTION" ? pendingCount : 0),
  };
}
