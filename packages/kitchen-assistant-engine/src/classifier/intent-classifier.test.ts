import { describe, expect, it, vi } from "vitest";
import type { Collaborators, TextGenerator } from "../collaborators/types.js";
import { emptyPreferences } from "../domain/preferences.js";
import { silentLogger } from "../logger.js";
import { DelegationRouter } from "../router/delegation-router.js";
import { IntentClassifier } from "./intent-classifier.js";
import type { ClassifierContext } from "./intents.js";

function createRouter(textGenerator?: TextGenerator): DelegationRouter {
  const collaborators: Collaborators = {
    inventory: {
      getInventory: vi.fn(async () => []),
      applyDelta: vi.fn(async () => []),
    },
    search: {
      embed: vi.fn(async () => []),
      query: vi.fn(async () => []),
    },
  };
  if (textGenerator) {
    collaborators.textGenerator = textGenerator;
  }
  return new DelegationRouter({ collaborators, timeoutMs: 100, logger: silentLogger });
}

function context(message: string, overrides: Partial<ClassifierContext> = {}): ClassifierContext {
  return {
    stage: "COLLECTING_PREFS",
    message,
    preferences: emptyPreferences(),
    pendingCount: 0,
    now: new Date("2026-03-10T12:00:00.000Z"),
    ...overrides,
  };
}

describe("IntentClassifier", () => {
  it("uses the rules when no text generator is configured", async () => {
    const classifier = new IntentClassifier({ logger: silentLogger });

    const result = await classifier.classify(context("I used 2 eggs"), createRouter());

    expect(result).toEqual({
      intents: [{ type: "mutate_pantry", deltas: [{ name: "egg", change: -2 }] }],
      preferenceDelta: {},
      source: "heuristic",
    });
  });

  it("orders model intents so pantry changes run first and keeps parsed preferences", async () => {
    const complete = vi.fn(async () => ({
      intents: [
        { type: "search_recipes", query: "pasta" },
        { type: "mutate_pantry", items: [{ name: "Tomatoes", change: 3 }] },
      ],
      preferences: {
        dietaryRestrictions: [],
        allergies: ["peanut"],
        cuisinePreferences: [],
        skillLevel: null,
      },
    }));
    const classifier = new IntentClassifier({ logger: silentLogger });

    const result = await classifier.classify(
      context("I bought 3 tomatoes and I'm vegan, any pasta ideas?"),
      createRouter({ complete }),
    );

    expect(complete).toHaveBeenCalledTimes(1);
    expect(result.source).toBe("model");
    expect(result.intents).toEqual([
      { type: "mutate_pantry", deltas: [{ name: "tomato", change: 3 }] },
      { type: "search_recipes", query: "pasta" },
    ]);
    expect(result.preferenceDelta).toEqual({ allergies: ["peanut"], dietaryRestrictions: ["vegan"] });
  });

  it("falls back to the rules when the model answer does not validate", async () => {
    const classifier = new IntentClassifier({ logger: silentLogger });

    const result = await classifier.classify(
      context("I bought 2 chicken breasts, what can I make?"),
      createRouter({ complete: vi.fn(async () => ({ intents: [] })) }),
    );

    expect(result.source).toBe("heuristic");
    expect(result.degraded?.reason).toBe("invalid_response");
    expect(result.intents.map((intent) => intent.type)).toEqual(["mutate_pantry", "search_recipes"]);
  });

  it("validates model selections against the pending options", async () => {
    const classifier = new IntentClassifier({ logger: silentLogger });
    const complete = vi.fn(async () => ({
      intents: [{ type: "select_recommendation", index: 4 }],
      preferences: { dietaryRestrictions: [], allergies: [], cuisinePreferences: [], skillLevel: null },
    }));

    const result = await classifier.classify(
      context("that last pasta one", { stage: "AWAITING_SELECTION", pendingCount: 3 }),
      createRouter({ complete }),
    );

    expect(result.intents).toEqual([
      { type: "ambiguous", reason: "invalid_selection", clarification: "Please choose an option between 1 and 3." },
    ]);
  });

  it("does not ask the model about plain option numbers", async () => {
    const complete = vi.fn(async () => ({}));
    const classifier = new IntentClassifier({ logger: silentLogger });

    const result = await classifier.classify(
      context("option 2", { stage: "AWAITING_SELECTION", pendingCount: 3 }),
      createRouter({ complete }),
    );

    expect(complete).not.toHaveBeenCalled();
    expect(result.intents).toEqual([{ type: "select_recommendation", index: 2 }]);
  });

  it("skips the model entirely when disabled", async () => {
    const complete = vi.fn(async () => ({}));
    const classifier = new IntentClassifier({ useModel: false, logger: silentLogger });

    await classifier.classify(context("what can I make?"), createRouter({ complete }));

    expect(complete).not.toHaveBeenCalled();
  });
});
