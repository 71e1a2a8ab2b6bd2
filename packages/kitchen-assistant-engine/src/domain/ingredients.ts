const UNIT_ALIASES: Record<string, string> = {
  g: "g",
  gram: "g",
  grams: "g",
  kg: "kg",
  kilo: "kg",
  kilos: "kg",
  kilogram: "kg",
  kilograms: "kg",
  ml: "ml",
  milliliter: "ml",
  milliliters: "ml",
  l: "l",
  liter: "l",
  liters: "l",
  litre: "l",
  litres: "l",
  oz: "oz",
  ounce: "oz",
  ounces: "oz",
  lb: "lb",
  lbs: "lb",
  pound: "lb",
  pounds: "lb",
  cup: "cup",
  cups: "cup",
  tbsp: "tbsp",
  tablespoon: "tbsp",
  tablespoons: "tbsp",
  tsp: "tsp",
  teaspoon: "tsp",
  teaspoons: "tsp",
  dozen: "count",
  each: "count",
  count: "count",
};

type Measure = { dimension: "mass" | "volume"; inBase: number };

// Grams for mass, milliliters for volume.
const MEASURES: Record<string, Measure> = {
  g: { dimension: "mass", inBase: 1 },
  kg: { dimension: "mass", inBase: 1000 },
  oz: { dimension: "mass", inBase: 28.3495 },
  lb: { dimension: "mass", inBase: 453.592 },
  ml: { dimension: "volume", inBase: 1 },
  l: { dimension: "volume", inBase: 1000 },
  cup: { dimension: "volume", inBase: 240 },
  tbsp: { dimension: "volume", inBase: 15 },
  tsp: { dimension: "volume", inBase: 5 },
};

// Trailing words that describe a piece of an ingredient rather than the ingredient itself.
const PIECE_WORDS = new Set([
  "bag",
  "bottle",
  "box",
  "breast",
  "bunch",
  "can",
  "carton",
  "clove",
  "drumstick",
  "fillet",
  "head",
  "jar",
  "loaf",
  "pack",
  "piece",
  "slice",
  "sprig",
  "stalk",
  "stick",
  "thigh",
]);

const IRREGULAR_PLURALS: Record<string, string> = {
  halves: "half",
  knives: "knife",
  leaves: "leaf",
  loaves: "loaf",
};

const INVARIANT_WORDS = new Set([
  "asparagus",
  "couscous",
  "grits",
  "hummus",
  "molasses",
  "swiss",
]);

export function compactWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function singularize(word: string): string {
  if (word.length <= 3 || INVARIANT_WORDS.has(word)) {
    return word;
  }

  const irregular = IRREGULAR_PLURALS[word];
  if (irregular) {
    return irregular;
  }
  if (word.endsWith("ies") && word.length > 4) {
    return `${word.slice(0, -3)}y`;
  }
  if (word.endsWith("oes")) {
    return word.slice(0, -2);
  }
  if (/(ches|shes|sses|xes|zes)$/.test(word)) {
    return word.slice(0, -2);
  }
  if (word.endsWith("ss") || word.endsWith("us") || word.endsWith("is")) {
    return word;
  }
  if (word.endsWith("s")) {
    return word.slice(0, -1);
  }
  return word;
}

/**
 * Canonical key for an ingredient: lower case, punctuation stripped,
 * whitespace collapsed and the final word singularized.
 */
export function normalizeIngredientName(name: string): string {
  const words = compactWhitespace(name.toLowerCase().replace(/[^a-z0-9\s-]/g, " "))
    .split(" ")
    .map((word) => word.replace(/^-+|-+$/g, ""))
    .filter((word) => word.length > 0);

  const last = words.pop();
  if (last === undefined) {
    return "";
  }
  return [...words, singularize(last)].join(" ");
}

export function ingredientTokens(name: string): string[] {
  const normalized = normalizeIngredientName(name);
  return normalized ? normalized.split(" ") : [];
}

export function normalizeUnit(unit: string | undefined): string | undefined {
  if (!unit) {
    return undefined;
  }

  const normalized = unit.trim().toLowerCase().replace(/\.$/, "");
  if (!normalized) {
    return undefined;
  }

  const alias = UNIT_ALIASES[normalized];
  if (alias) {
    return alias;
  }

  const singular = singularize(normalized);
  return PIECE_WORDS.has(singular) ? singular : normalized;
}

export function isMeasureUnit(unit: string): boolean {
  return MEASURES[unit] !== undefined;
}

/** Converts a quantity between two normalized units of the same dimension; undefined when they do not convert. */
export function convertQuantity(quantity: number, from: string, to: string): number | undefined {
  if (from === to) {
    return quantity;
  }
  const source = MEASURES[from];
  const target = MEASURES[to];
  if (!source || !target || source.dimension !== target.dimension) {
    return undefined;
  }
  return (quantity * source.inBase) / target.inBase;
}

export function isPieceWord(word: string): boolean {
  return PIECE_WORDS.has(singularize(word.toLowerCase()));
}

export function isUnitWord(word: string): boolean {
  const lowered = word.toLowerCase().replace(/\.$/, "");
  return UNIT_ALIASES[lowered] !== undefined || isPieceWord(lowered);
}

/**
 * Splits a trailing piece word off a name, so "chicken breasts" becomes
 * the ingredient "chicken" counted in "breast".
 */
export function splitPieceWord(name: string): { name: string; unit?: string } {
  const tokens = ingredientTokens(name);
  const last = tokens.at(-1);
  if (tokens.length > 1 && last && PIECE_WORDS.has(last)) {
    return { name: tokens.slice(0, -1).join(" "), unit: last };
  }
  return { name: tokens.join(" ") };
}

export function containsTokenSequence(haystack: string[], needle: string[]): boolean {
  if (needle.length === 0 || needle.length > haystack.length) {
    return false;
  }

  for (let start = 0; start + needle.length <= haystack.length; start += 1) {
    if (needle.every((token, offset) => haystack[start + offset] === token)) {
      return true;
    }
  }
  return false;
}

/**
 * A pantry item covers a recipe ingredient when the names are equal or the
 * pantry name is a leading word sequence of the ingredient ("garlic" covers
 * "garlic clove").
 */
export function pantryNameCovers(pantryName: string, ingredientName: string): boolean {
  const pantryTokens = ingredientTokens(pantryName);
  const ingredient = ingredientTokens(ingredientName);
  if (pantryTokens.length === 0 || pantryTokens.length > ingredient.length) {
    return false;
  }
  return pantryTokens.every((token, index) => ingredient[index] === token);
}

export function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].toSorted((left, right) => left.localeCompare(right));
}
