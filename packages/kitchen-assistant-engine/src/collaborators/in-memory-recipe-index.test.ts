import { describe, expect, it } from "vitest";
import { InMemoryRecipeIndex, embedText, loadRecipeCatalog, tokenizeText } from "./in-memory-recipe-index.js";

describe("InMemoryRecipeIndex", () => {
  it("loads the bundled catalog with unique ids", () => {
    const catalog = loadRecipeCatalog();
    expect(catalog).toHaveLength(20);
    expect(new Set(catalog.map((recipe) => recipe.id)).size).toBe(20);
  });

  it("tokenizes without stop words and singularizes", () => {
    expect(tokenizeText("What can I make with Tomatoes?")).toEqual(["tomato"]);
  });

  it("produces unit-length embeddings", () => {
    const vector = embedText("tomato garlic pasta");
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    expect(vector).toHaveLength(256);
    expect(norm).toBeCloseTo(1, 6);
    expect(embedText("the and")).toEqual(new Array<number>(256).fill(0));
  });

  it("ranks the closest recipe first", async () => {
    const index = new InMemoryRecipeIndex();
    const hits = await index.query(await index.embed("tomato garlic pasta"), 2);

    expect(hits.map((hit) => hit.recipe.id)).toEqual(["tomato-garlic-pasta", "creamy-tomato-soup"]);
    expect(hits[0]?.similarity).toBeCloseTo(0.756, 3);
  });

  it("drops recipes containing excluded ingredients", async () => {
    const index = new InMemoryRecipeIndex();
    const hits = await index.query(await index.embed("peanut noodles"), 20, {
      excludeIngredients: ["peanut"],
    });

    expect(hits.map((hit) => hit.recipe.id)).not.toContain("peanut-noodles");
    expect(hits).toHaveLength(19);
  });

  it("scores keyword queries by the fraction of terms matched", async () => {
    const index = new InMemoryRecipeIndex();
    const hits = await index.keywordQuery(["chickpeas", "cucumber"], 5);

    expect(hits.map((hit) => [hit.recipe.id, hit.similarity])).toEqual([
      ["chickpea-salad", 1],
      ["greek-salad", 0.5],
    ]);
    expect(await index.keywordQuery(["the"], 5)).toEqual([]);
  });
});
