import { readFileSync } from "node:fs";
import { CandidateRecipeSchema, type CandidateRecipe, type SearchHit } from "@kitchen-assistant/contracts";
import { z } from "zod";
import { containsTokenSequence, ingredientTokens, singularize } from "../domain/ingredients.js";
import type { SearchFilter, SearchIndex } from "./types.js";

const EMBEDDING_DIMENSIONS = 256;

const STOP_WORDS = new Set([
  "a",
  "an",
  "and",
  "can",
  "cook",
  "for",
  "i",
  "idea",
  "in",
  "make",
  "me",
  "my",
  "of",
  "on",
  "please",
  "recipe",
  "some",
  "something",
  "the",
  "to",
  "what",
  "with",
]);

const DEFAULT_CATALOG_URL = new URL("../../data/recipes.json", import.meta.url);

export function loadRecipeCatalog(source: URL = DEFAULT_CATALOG_URL): CandidateRecipe[] {
  return z.array(CandidateRecipeSchema).parse(JSON.parse(readFileSync(source, "utf8")));
}

export function tokenizeText(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0 && !STOP_WORDS.has(token))
    .map(singularize);
}

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < token.length; index += 1) {
    hash ^= token.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** Hashed bag-of-words embedding, L2-normalized. */
export function embedText(text: string): number[] {
  const vector = new Array<number>(EMBEDDING_DIMENSIONS).fill(0);
  for (const token of tokenizeText(text)) {
    const bucket = fnv1a(token) % EMBEDDING_DIMENSIONS;
    vector[bucket] = (vector[bucket] ?? 0) + 1;
  }

  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  return norm === 0 ? vector : vector.map((value) => value / norm);
}

function cosine(left: number[], right: number[]): number {
  let dot = 0;
  for (let index = 0; index < Math.min(left.length, right.length); index += 1) {
    dot += (left[index] ?? 0) * (right[index] ?? 0);
  }
  return Math.min(1, Math.max(0, dot));
}

function recipeDocument(recipe: CandidateRecipe): string {
  return [
    recipe.title,
    ...recipe.ingredients.map((ingredient) => ingredient.name),
    ...recipe.tags,
    recipe.cuisine ?? "",
  ].join(" ");
}

type IndexedRecipe = {
  recipe: CandidateRecipe;
  vector: number[];
  tokens: Set<string>;
};

function compareHits(left: SearchHit, right: SearchHit): number {
  return right.similarity - left.similarity || left.recipe.id.localeCompare(right.recipe.id);
}

/**
 * Recipe search held in process: cosine similarity over hashed embeddings and
 * a keyword query scoring the fraction of terms a recipe mentions.
 */
export class InMemoryRecipeIndex implements SearchIndex {
  private readonly entries: IndexedRecipe[];

  constructor(recipes: CandidateRecipe[] = loadRecipeCatalog()) {
    this.entries = recipes.map((recipe) => {
      const document = recipeDocument(recipe);
      return { recipe, vector: embedText(document), tokens: new Set(tokenizeText(document)) };
    });
  }

  get size(): number {
    return this.entries.length;
  }

  async embed(text: string): Promise<number[]> {
    return embedText(text);
  }

  async query(vector: number[], topK: number, filter?: SearchFilter): Promise<SearchHit[]> {
    return this.entries
      .filter((entry) => !excludedByFilter(entry.recipe, filter))
      .map((entry) => ({ recipe: structuredClone(entry.recipe), similarity: cosine(vector, entry.vector) }))
      .toSorted(compareHits)
      .slice(0, topK);
  }

  async keywordQuery(terms: string[], topK: number): Promise<SearchHit[]> {
    const wanted = [...new Set(terms.flatMap(tokenizeText))];
    if (wanted.length === 0) {
      return [];
    }

    return this.entries
      .map((entry) => ({
        recipe: structuredClone(entry.recipe),
        similarity: wanted.filter((term) => entry.tokens.has(term)).length / wanted.length,
      }))
      .filter((hit) => hit.similarity > 0)
      .toSorted(compareHits)
      .slice(0, topK);
  }
}

function excludedByFilter(recipe: CandidateRecipe, filter: SearchFilter | undefined): boolean {
  const excluded = (filter?.excludeIngredients ?? []).map(ingredientTokens).filter((tokens) => tokens.length > 0);
  if (excluded.length === 0) {
    return false;
  }

  return recipe.ingredients.some((ingredient) => {
    const tokens = ingredientTokens(ingredient.name);
    return excluded.some((needle) => containsTokenSequence(tokens, needle));
  });
}
