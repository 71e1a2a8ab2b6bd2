import type { PantryDelta, PantryItem, SearchHit } from "@kitchen-assistant/contracts";

export type InventoryStore = {
  getInventory: (sessionId: string, signal?: AbortSignal) => Promise<PantryItem[]>;
  applyDelta: (sessionId: string, deltas: PantryDelta[], signal?: AbortSignal) => Promise<PantryItem[]>;
};

export type SearchFilter = {
  excludeIngredients?: string[];
};

export type SearchIndex = {
  embed: (text: string, signal?: AbortSignal) => Promise<number[]>;
  query: (
    vector: number[],
    topK: number,
    filter?: SearchFilter,
    signal?: AbortSignal,
  ) => Promise<SearchHit[]>;
  keywordQuery?: (terms: string[], topK: number, signal?: AbortSignal) => Promise<SearchHit[]>;
};

export type TextGenerationRequest = {
  system: string;
  prompt: string;
  schemaName: string;
  jsonSchema: Record<string, unknown>;
};

export type TextGenerator = {
  complete: (request: TextGenerationRequest, signal?: AbortSignal) => Promise<unknown>;
};

export type SubstitutionCatalog = {
  lookup: (ingredient: string, signal?: AbortSignal) => Promise<string[]>;
};

export type Collaborators = {
  inventory: InventoryStore;
  search: SearchIndex;
  textGenerator?: TextGenerator;
  substitutions?: SubstitutionCatalog;
};
