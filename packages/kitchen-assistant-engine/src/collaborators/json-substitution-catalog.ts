import { readFileSync } from "node:fs";
import { z } from "zod";
import { normalizeIngredientName } from "../domain/ingredients.js";
import type { SubstitutionCatalog } from "./types.js";

const SubstitutionTableSchema = z.record(z.string(), z.array(z.string().min(1)));

const DEFAULT_TABLE_URL = new URL("../../data/substitutions.json", import.meta.url);

export function loadSubstitutionTable(source: URL = DEFAULT_TABLE_URL): Map<string, string[]> {
  const table = SubstitutionTableSchema.parse(JSON.parse(readFileSync(source, "utf8")));
  return new Map(
    Object.entries(table).map(([ingredient, alternatives]) => [
      normalizeIngredientName(ingredient),
      alternatives.map(normalizeIngredientName),
    ]),
  );
}

export class JsonSubstitutionCatalog implements SubstitutionCatalog {
  private readonly table: Map<string, string[]>;

  constructor(table: Map<string, string[]> = loadSubstitutionTable()) {
    this.table = table;
  }

  async lookup(ingredient: string): Promise<string[]> {
    return [...(this.table.get(normalizeIngredientName(ingredient)) ?? [])];
  }
}
