import { describe, expect, it } from "vitest";
import { JsonSubstitutionCatalog } from "./json-substitution-catalog.js";

describe("JsonSubstitutionCatalog", () => {
  it("looks up alternatives by normalized name", async () => {
    const catalog = new JsonSubstitutionCatalog();

    expect(await catalog.lookup("Butter")).toEqual(["olive oil", "coconut oil", "margarine"]);
    expect(await catalog.lookup("eggs")).toEqual(["flaxseed", "banana"]);
  });

  it("returns nothing for unknown ingredients", async () => {
    const catalog = new JsonSubstitutionCatalog(new Map());
    expect(await catalog.lookup("saffron")).toEqual([]);
  });
});
