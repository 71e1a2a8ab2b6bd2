import type { RankedRecommendation, StructuredPayload } from "@kitchen-assistant/contracts";
import { describe, expect, it, vi } from "vitest";
import type { TextGenerator } from "../collaborators/types.js";
import { emptyPreferences } from "../domain/preferences.js";
import { silentLogger } from "../logger.js";
import { DelegationRouter } from "../router/delegation-router.js";
import {
  ResponseSynthesizer,
  TEMPLATED_ANSWER,
  acknowledgePreferences,
  describeDelta,
  describePantry,
} from "./response-synthesizer.js";

const synthesizer = new ResponseSynthesizer({ logger: silentLogger });

function createRouter(textGenerator?: TextGenerator): DelegationRouter {
  return new DelegationRouter({
    collaborators: {
      inventory: { getInventory: vi.fn(async () => []), applyDelta: vi.fn(async () => []) },
      search: { embed: vi.fn(async () => []), query: vi.fn(async () => []) },
      textGenerator,
    },
    timeoutMs: 100,
    logger: silentLogger,
  });
}

const recommendation: RankedRecommendation = {
  recipe: {
    id: "spinach-omelette",
    title: "Spinach Omelette",
    ingredients: [{ name: "egg" }, { name: "spinach" }],
    instructions: ["Whisk and cook."],
    tags: ["vegetarian"],
    sourceScore: 0.6,
  },
  compositeScore: 96,
  coverageFraction: 1,
  missingIngredients: [],
  pantryIngredientsUsed: ["egg", "spinach"],
  usesExpiring: true,
  expiringIngredientsUsed: ["spinach"],
  semanticScore: 60,
  expirationBonus: 10,
  preferenceBonus: 0,
  dietUnverified: [],
  reasons: ["uses 2 of 2 ingredients from your pantry", "uses expiring spinach", "needs nothing extra"],
};

const searchPayload: StructuredPayload = {
  pantrySummary: {
    items: [
      { name: "egg", quantity: 6 },
      { name: "spinach", quantity: 1, unit: "bag", expirationDate: "2026-03-11" },
    ],
    expiringSoon: [{ name: "spinach", daysRemaining: 1 }],
    applied: [{ name: "egg", change: 6 }],
    source: "live",
  },
  recommendations: [recommendation],
};

describe("describe helpers", () => {
  it("phrases pantry changes", () => {
    expect(describeDelta({ name: "chicken", change: 2, unit: "breast" })).toBe("added 2 chicken breasts");
    expect(describeDelta({ name: "garlic", change: -1, unit: "clove" })).toBe("used 1 garlic clove");
    expect(describeDelta({ name: "spinach", change: 2, unit: "bunch" })).toBe("added 2 spinach bunches");
    expect(describeDelta({ name: "pasta", change: 500, unit: "g" })).toBe("added 500 g pasta");
    expect(describeDelta({ name: "egg", change: -3 })).toBe("used 3 egg");
    expect(describeDelta({ name: "milk", change: 0, removeAll: true })).toBe("removed milk");
  });

  it("lists the pantry with what expires soon", () => {
    expect(describePantry({ items: [], expiringSoon: [], applied: [], source: "live" })).toBe("Your pantry is empty.");
    expect(
      describePantry({
        items: [
          { name: "egg", quantity: 6 },
          { name: "spinach", quantity: 1, unit: "bag" },
        ],
        expiringSoon: [{ name: "spinach", daysRemaining: 1 }],
        applied: [],
        source: "cached",
      }),
    ).toBe("You have 2 item(s): egg (6), spinach (1 bag). Use soon: spinach (1 day).");
  });

  it("acknowledges stated preferences", () => {
    expect(acknowledgePreferences(emptyPreferences())).toBe("Got it.");
    expect(
      acknowledgePreferences({ ...emptyPreferences(), allergies: ["peanut"], dietaryRestrictions: ["vegan"], servings: 4 }),
    ).toBe("Got it. I'll keep that in mind: avoiding peanut; keeping it vegan; cooking for 4.");
  });
});

describe("ResponseSynthesizer.explain", () => {
  it("explains recommendations with pantry changes and expiring items", () => {
    expect(synthesizer.explain(searchPayload)).toBe(
      [
        "Pantry updated: added 6 egg.",
        "Use soon: spinach (1 day).",
        "Here is 1 recipe for you:",
        "1. Spinach Omelette (score 96): uses 2 of 2 ingredients from your pantry; uses expiring spinach; needs nothing extra",
        "Reply with a number to get the full recipe.",
      ].join("\n"),
    );
  });

  it("never returns an empty explanation when nothing qualifies", () => {
    expect(synthesizer.explain({ shoppingList: ["saffron", "leek"], degraded: ["search.query timed out"] })).toBe(
      [
        "No safe recipe fits what you have. Buying these would open up options: saffron, leek.",
        "Some services were unavailable, so this answer may be limited.",
      ].join("\n"),
    );
  });

  it("names the options a preference change took off the list", () => {
    expect(synthesizer.explain({ textAnswer: "Got it.", withdrawnOptions: ["Beef Rice", "Chicken Rice"] })).toBe(
      ["Got it.", "Beef Rice, Chicken Rice no longer fit your preferences, so I took them off the list."].join("\n"),
    );
  });

  it("explains a withheld recipe through its violations", () => {
    expect(
      synthesizer.explain({
        violations: [
          { kind: "allergen", ingredient: "parmesan", constraint: "dairy", message: "parmesan conflicts with the dairy allergy" },
        ],
      }),
    ).toBe(
      "I can't show that recipe safely: parmesan conflicts with the dairy allergy. Pick another option or ask for new ideas.",
    );
  });
});

describe("ResponseSynthesizer.synthesize", () => {
  it("keeps the templated text without a text generator", async () => {
    const outcome = await synthesizer.synthesize(searchPayload, createRouter());

    expect(outcome).toEqual({ text: synthesizer.explain(searchPayload), source: "template" });
  });

  it("uses a valid model explanation", async () => {
    const complete = vi.fn(async () => ({ explanation: "The omelette uses your spinach before it turns." }));
    const outcome = await synthesizer.synthesize(searchPayload, createRouter({ complete }));

    expect(outcome).toEqual({ text: "The omelette uses your spinach before it turns.", source: "model" });
  });

  it("falls back to the template on an invalid model explanation", async () => {
    const outcome = await synthesizer.synthesize(searchPayload, createRouter({ complete: vi.fn(async () => ({})) }));

    expect(outcome.source).toBe("template");
    expect(outcome.failure?.reason).toBe("invalid_response");
  });
});

describe("ResponseSynthesizer.answer", () => {
  it("answers through text generation", async () => {
    const complete = vi.fn(async () => ({ answer: "Cooked rice keeps 4 to 6 days in the fridge." }));
    const outcome = await synthesizer.answer("how long does cooked rice keep?", emptyPreferences(), createRouter({ complete }));

    expect(outcome).toEqual({ text: "Cooked rice keeps 4 to 6 days in the fridge.", source: "model" });
  });

  it("uses templated text when generation fails", async () => {
    const complete = vi.fn(async () => {
      throw new Error("provider down");
    });
    const outcome = await synthesizer.answer("how long does cooked rice keep?", emptyPreferences(), createRouter({ complete }));

    expect(outcome.text).toBe(TEMPLATED_ANSWER);
    expect(outcome.failure?.reason).toBe("error");
  });
});
