import type { PantryDelta, PreferenceDelta, SkillLevel } from "@kitchen-assistant/contracts";
import { DietaryRulebook } from "../domain/dietary-rules.js";
import { addDays, toIsoDate } from "../domain/expiry.js";
import { compactWhitespace, isUnitWord, normalizeUnit, splitPieceWord } from "../domain/ingredients.js";
import {
  UNCLEAR_CLARIFICATION,
  orderIntents,
  resolveSelection,
  type ClassifierContext,
  type Intent,
} from "./intents.js";

const NUMBER_WORDS: Record<string, number> = {
  a: 1,
  an: 1,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  dozen: 12,
  several: 3,
  some: 1,
};

// Checked before single number words so the longest phrase wins.
const QUANTITY_PHRASES: Array<[RegExp, number]> = [
  [/^(?:a|one)\s+dozen\s+(?:of\s+)?/, 12],
  [/^two\s+dozen\s+(?:of\s+)?/, 24],
  [/^half\s+(?:a|an)\s+/, 0.5],
  [/^a\s+couple(?:\s+of)?\s+/, 2],
  [/^a\s+few\s+/, 3],
];

const ORDINALS: Record<string, number> = {
  first: 1,
  "1st": 1,
  second: 2,
  "2nd": 2,
  third: 3,
  "3rd": 3,
  fourth: 4,
  "4th": 4,
  fifth: 5,
  "5th": 5,
  one: 1,
  two: 2,
  three: 3,
};

const CUISINES = [
  "american",
  "chinese",
  "french",
  "greek",
  "indian",
  "italian",
  "japanese",
  "korean",
  "mediterranean",
  "mexican",
  "middle eastern",
  "nordic",
  "spanish",
  "thai",
  "vietnamese",
];

const CLAUSE_KEYWORDS =
  "what|what's|whats|how|can|could|would|should|any|suggest|recommend|give|show|find|please|i|i'm|im|we|do|does|is|are|why|when|where|which|let's|tell";

const CLAUSE_BREAK = new RegExp(
  `\\s*,\\s*(?:and\\s+|so\\s+|then\\s+|also\\s+)?(?=(?:${CLAUSE_KEYWORDS})\\b)|\\s+(?:and|so|then)\\s+(?=(?:${CLAUSE_KEYWORDS})\\b)|\\s+but\\s+`,
  "i",
);

const SELECTION =
  /^(?:(?:i(?:'ll| will)?|let's|lets|we(?:'ll)?|please)\s+)?(?:(?:take|pick|choose|go with|try|make|cook|select|want)\s+)?(?:(?:the|option|number|recipe|no\.?|#)\s*)*(\d+|first|second|third|fourth|fifth|1st|2nd|3rd|4th|5th|one|two|three)(?:\s+(?:one|option|recipe|please))*\s*[.!]*$/;

const QUESTION_START =
  /^(?:what|what's|whats|how|why|when|where|which|who|can i|could i|should i|would i|do i|do you|does|is|are|will)\b/;

const ADD_VERBS = /\b(?:bought|buy|got|picked up|purchased|added|add|restocked|grabbed|stocked up on)\b/;
const USE_VERBS =
  /\b(?:used up|used|use|ate|eaten|finished|consumed|cooked with|threw (?:out|away)|throw (?:out|away)|tossed|removed|remove)\b/;
const OUT_VERBS = /\b(?:ran out of|run out of|out of|no more)\b/;

const EXPIRY =
  /,?\s*(?:(?:that|which|they|it|and)\s+)?(?:expires?|expiring|go(?:es)? bad|use by|best before|good until)\s+(?:in\s+([a-z0-9]+)\s+days?|(today)|(tomorrow)|(?:on\s+)?(\d{4}-\d{2}-\d{2}))/;

const ITEM_TRAILERS = [
  /\s+(?:to|from|in|into|out of)\s+(?:my|the|our)\s+(?:pantry|fridge|kitchen|inventory|freezer|cupboard|list)\b.*$/,
  /\s+(?:today|yesterday|this morning|this week|last night|earlier|at the (?:store|market|shop)|from the (?:store|market|shop))\b.*$/,
  /\s+(?:while|when|making|to make|for (?:dinner|lunch|breakfast))\b.*$/,
];

const SEARCH_CUE =
  /\b(?:what (?:can|could|should|shall) (?:i|we) (?:make|cook|eat|have)|what to (?:make|cook|eat)|recipes?|ideas?|suggest\w*|recommend\w*|something (?:to (?:make|cook|eat)|for (?:dinner|lunch|breakfast))|(?:make|cook) (?:something|me)|hungry|dinner|lunch|breakfast|meal)\b/;

const GENERAL_TOPIC =
  /\b(?:substitutes?|instead of|replace|swap|how (?:long|do|to|much|many)|store|keep|freeze|difference between|why)\b/;

const PANTRY_TOPIC = /\b(?:pantry|inventory|do (?:i|we) have|in stock|expir\w*|going bad|(?:have|what's|whats) left)\b/;

const GREETING = /^(?:hi|hello|hey|thanks|thank you|good (?:morning|afternoon|evening))\b/;

const VAGUE_QUANTITIES = new Set(["a", "an", "some", "several"]);

const NON_ITEMS = new Set(["it", "them", "that", "this", "stuff", "something", "groceries", "food", "everything", "all"]);

const ALLERGY_STOP_WORDS = new Set(["a", "an", "the", "my", "food", "severe", "bad", "have", "got", "mild", "any"]);

type ParsedClause = {
  deltas: PantryDelta[];
  search?: string;
  general?: { question: string; aboutPantry: boolean; greeting: boolean };
};

export type ParsedMessage = {
  intents: Intent[];
  preferenceDelta: PreferenceDelta;
};

/**
 * Rule-based reading of one message: clause splitting, pantry deltas,
 * recipe requests, selections and preference statements.
 */
export class MessageParser {
  private readonly rulebook: DietaryRulebook;
  private readonly dietPatterns: Array<{ pattern: RegExp; diet: string }>;

  constructor(rulebook: DietaryRulebook = new DietaryRulebook()) {
    this.rulebook = rulebook;
    this.dietPatterns = rulebook
      .knownDiets()
      .toSorted((left, right) => right.length - left.length)
      .map((word) => ({
        pattern: new RegExp(`\\b${escapeRegExp(word).replace(/(?:\\-|\s)/g, "[-\\s]")}\\b`),
        diet: rulebook.normalizeDiet(word),
      }));
  }

  parse(context: Pick<ClassifierContext, "message" | "stage" | "pendingCount" | "now">): ParsedMessage {
    const text = normalizeText(context.message);
    if (!text) {
      return { intents: [ambiguous()], preferenceDelta: {} };
    }

    const selection = parseSelection(text);
    if (selection !== null) {
      return {
        intents: [resolveSelection(selection, context.stage, context.pendingCount)],
        preferenceDelta: {},
      };
    }

    const preferenceDelta: PreferenceDelta = {};
    const deltas: PantryDelta[] = [];
    const searches: string[] = [];
    const questions: string[] = [];
    let aboutPantry = false;
    let greeted = false;

    for (const clause of splitClauses(text)) {
      const parsed = this.parseClause(clause, preferenceDelta, context.now);
      deltas.push(...parsed.deltas);
      if (parsed.search !== undefined) {
        searches.push(parsed.search);
      }
      if (parsed.general) {
        if (parsed.general.greeting) {
          greeted = true;
        } else {
          questions.push(parsed.general.question);
        }
        aboutPantry ||= parsed.general.aboutPantry;
      }
    }

    const intents: Intent[] = [];
    if (deltas.length > 0) {
      intents.push({ type: "mutate_pantry", deltas });
    }
    if (questions.length > 0) {
      intents.push({ type: "general_query", question: questions.join(" "), acknowledgeOnly: false, aboutPantry });
    }
    if (searches.length > 0) {
      intents.push({ type: "search_recipes", query: compactWhitespace(searches.join(" ")) });
    }

    if (intents.length === 0) {
      const hasPreferences = Object.keys(preferenceDelta).length > 0;
      if (hasPreferences || greeted) {
        intents.push({
          type: "general_query",
          question: context.message.trim(),
          acknowledgeOnly: true,
          aboutPantry: false,
        });
      } else {
        intents.push(ambiguous());
      }
    }

    return { intents: orderIntents(intents), preferenceDelta };
  }

  private parseClause(clause: string, preferences: PreferenceDelta, now: Date): ParsedClause {
    const body = clause.replace(/[.!?;]+$/, "").trim();
    const isQuestion = clause.endsWith("?") || QUESTION_START.test(body);

    // Allergy statements never double as pantry updates.
    const allergyMatched = this.collectAllergies(body, preferences);
    if (!allergyMatched && !QUESTION_START.test(body)) {
      const deltas = parseMutation(body, now);
      if (deltas.length > 0) {
        return { deltas };
      }
    }

    this.collectDiets(body, preferences);
    collectCuisines(body, preferences);
    collectSkill(body, preferences);
    collectServings(body, preferences);

    if (GREETING.test(body) && !SEARCH_CUE.test(body)) {
      return { deltas: [], general: { question: body, aboutPantry: false, greeting: true } };
    }
    if (SEARCH_CUE.test(body) && !(isQuestion && GENERAL_TOPIC.test(body))) {
      return { deltas: [], search: body };
    }
    if (isQuestion) {
      return { deltas: [], general: { question: clause, aboutPantry: PANTRY_TOPIC.test(body), greeting: false } };
    }
    return { deltas: [] };
  }

  private collectAllergies(body: string, preferences: PreferenceDelta): boolean {
    const removal = /\b(?:no longer|not|isn't|am not|not actually)\s+allergic to\s+(.+)$/.exec(body);
    if (removal?.[1]) {
      preferences.removeAllergies = [...(preferences.removeAllergies ?? []), ...splitList(removal[1])];
      return true;
    }

    let matched = false;
    const allergicTo = /\ballergic to\s+(.+)$/.exec(body);
    if (allergicTo?.[1]) {
      preferences.allergies = [...(preferences.allergies ?? []), ...splitList(allergicTo[1])];
      matched = true;
    }

    for (const match of body.matchAll(/\b((?:tree\s+)?[a-z]+)\s+allerg(?:y|ies)\b/g)) {
      const allergen = match[1];
      if (allergen && !ALLERGY_STOP_WORDS.has(allergen)) {
        preferences.allergies = [...(preferences.allergies ?? []), allergen];
        matched = true;
      }
    }
    return matched;
  }

  private collectDiets(body: string, preferences: PreferenceDelta): void {
    for (const { pattern, diet } of this.dietPatterns) {
      const found = pattern.exec(body);
      if (!found) {
        continue;
      }

      const before = body.slice(0, found.index);
      const negated = /\b(?:no longer|not|stopped being|quit being)\b[^,]*$/.test(before);
      if (negated) {
        preferences.removeDietaryRestrictions = [...(preferences.removeDietaryRestrictions ?? []), diet];
      } else if (!(preferences.dietaryRestrictions ?? []).includes(diet)) {
        preferences.dietaryRestrictions = [...(preferences.dietaryRestrictions ?? []), diet];
      }
      // Consume the match so "ketogenic" does not also read as "keto".
      body = `${body.slice(0, found.index)} ${body.slice(found.index + found[0].length)}`;
    }
  }
}

function normalizeText(message: string): string {
  return compactWhitespace(message.toLowerCase().replace(/[‘’]/g, "'"));
}

function ambiguous(): Intent {
  return { type: "ambiguous", reason: "unclear", clarification: UNCLEAR_CLARIFICATION };
}

export function parseSelection(text: string): number | null {
  const match = SELECTION.exec(text);
  const token = match?.[1];
  if (!token) {
    return null;
  }
  if (/^\d+$/.test(token)) {
    return Number.parseInt(token, 10);
  }
  return ORDINALS[token] ?? null;
}

export function splitClauses(text: string): string[] {
  // A dot before a digit is a decimal point, not a sentence end.
  const sentences = text.match(/(?:[^.!?;]|\.(?=\d))+[.!?;]*/g) ?? [];
  return sentences
    .flatMap((sentence) => {
      const terminal = /[.!?;]+$/.exec(sentence)?.[0] ?? "";
      const parts = sentence
        .replace(/[.!?;]+$/, "")
        .split(CLAUSE_BREAK)
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
      return parts.map((part, index) => (index === parts.length - 1 ? `${part}${terminal}` : part));
    })
    .map((clause) => clause.trim())
    .filter((clause) => clause.length > 0);
}

function splitList(value: string): string[] {
  return value
    .split(/\s*(?:,|\band\b|\bor\b|&)\s*/)
    .map((entry) =>
      entry
        .replace(/^(?:also|all|any|the|some)\s+/, "")
        .replace(/\s+(?:too|as well|also)$/, "")
        .trim(),
    )
    .filter((entry) => entry.length > 0 && !ALLERGY_STOP_WORDS.has(entry));
}

function collectCuisines(body: string, preferences: PreferenceDelta): void {
  const liking = /\b(?:like|love|prefer|enjoy|into|fan of|craving|in the mood for|feel like)\b/.test(body);
  const disliking = /\b(?:don't|do not|dont|not a fan of|tired of|no more)\b/.test(body);

  for (const cuisine of CUISINES) {
    const mentioned = new RegExp(`\\b${cuisine}\\b`).test(body);
    if (!mentioned) {
      continue;
    }
    const asFood = new RegExp(`\\b${cuisine}\\s+(?:food|cuisine|dishes|cooking)\\b`).test(body);
    if (disliking) {
      preferences.removeCuisinePreferences = [...(preferences.removeCuisinePreferences ?? []), cuisine];
    } else if (liking || asFood) {
      preferences.cuisinePreferences = [...(preferences.cuisinePreferences ?? []), cuisine];
    }
  }
}

function collectSkill(body: string, preferences: PreferenceDelta): void {
  const skill = detectSkill(body);
  if (skill) {
    preferences.skillLevel = skill;
  }
}

function detectSkill(body: string): SkillLevel | undefined {
  if (/\b(?:beginner|novice|new to cooking|not (?:a |very )*(?:good|confident|great) cook|can't cook)\b/.test(body)) {
    return "beginner";
  }
  if (/\b(?:intermediate|decent cook|home cook|okay cook|ok cook)\b/.test(body)) {
    return "intermediate";
  }
  if (/\b(?:advanced|experienced|expert|confident cook|professional|chef)\b/.test(body)) {
    return "advanced";
  }
  return undefined;
}

function collectServings(body: string, preferences: PreferenceDelta): void {
  const match =
    /\bfor\s+([a-z0-9]+)\s+(?:people|persons|servings|of us|guests|adults)\b/.exec(body) ??
    /\bserv(?:es|ing|ings)?\s+([a-z0-9]+)\b/.exec(body);
  const token = match?.[1];
  const servings = token && !VAGUE_QUANTITIES.has(token) ? parseNumber(token) : undefined;
  if (servings !== undefined && Number.isInteger(servings) && servings >= 1 && servings <= 24) {
    preferences.servings = servings;
  }
}

function parseNumber(token: string): number | undefined {
  if (/^\d+(?:\.\d+)?$/.test(token)) {
    return Number.parseFloat(token);
  }
  return NUMBER_WORDS[token];
}

/** Signed pantry deltas for a clause such as "bought 2 chicken breasts". */
export function parseMutation(body: string, now: Date): PantryDelta[] {
  const verb = earliestVerb(body);
  if (!verb) {
    return [];
  }

  let rest = body.slice(verb.end);
  let expirationDate: string | undefined;
  const expiry = EXPIRY.exec(rest);
  if (expiry) {
    expirationDate = resolveExpiry(expiry, now);
    rest = `${rest.slice(0, expiry.index)}${rest.slice(expiry.index + expiry[0].length)}`;
  }
  for (const trailer of ITEM_TRAILERS) {
    rest = rest.replace(trailer, "");
  }

  const deltas: PantryDelta[] = [];
  for (const rawItem of rest.split(/\s*(?:,|\band\b|&|\bplus\b)\s*/)) {
    const item = parseItem(rawItem);
    if (!item) {
      continue;
    }

    const delta: PantryDelta = { name: item.name, change: 0 };
    if (verb.kind === "out" || (verb.kind === "use" && item.implicitQuantity && verb.exhaustive)) {
      delta.removeAll = true;
    } else {
      delta.change = verb.kind === "add" ? item.quantity : -item.quantity;
    }
    if (item.unit) {
      delta.unit = item.unit;
    }
    if (expirationDate && verb.kind === "add") {
      delta.expirationDate = expirationDate;
    }
    deltas.push(delta);
  }
  return deltas;
}

type VerbMatch = { kind: "add" | "use" | "out"; end: number; exhaustive: boolean };

function earliestVerb(body: string): VerbMatch | undefined {
  const candidates: Array<VerbMatch & { start: number }> = [];
  const add = ADD_VERBS.exec(body);
  // "i've got eggs" states possession, not a purchase.
  if (add && !(add[0] === "got" && /(?:'ve|\bhave)\s+$/.test(body.slice(0, add.index)))) {
    candidates.push({ kind: "add", start: add.index, end: add.index + add[0].length, exhaustive: false });
  }
  const use = USE_VERBS.exec(body);
  // A bare "use" only counts as an instruction ("use 2 eggs", "i use the milk"), not "recipes that use eggs".
  if (use && !(use[0] === "use" && !/(?:^|\b(?:i|we|please|just)\s+)$/.test(body.slice(0, use.index)))) {
    candidates.push({
      kind: "use",
      start: use.index,
      end: use.index + use[0].length,
      exhaustive: /^(?:used up|finished|threw|throw|tossed|removed|remove)/.test(use[0]),
    });
  }
  const out = OUT_VERBS.exec(body);
  if (out) {
    candidates.push({ kind: "out", start: out.index, end: out.index + out[0].length, exhaustive: true });
  }

  const [first] = candidates.toSorted((left, right) => left.start - right.start);
  return first ? { kind: first.kind, end: first.end, exhaustive: first.exhaustive } : undefined;
}

function resolveExpiry(match: RegExpExecArray, now: Date): string | undefined {
  const [, inDays, today, tomorrow, isoDate] = match;
  if (isoDate) {
    return isoDate;
  }
  if (today) {
    return toIsoDate(now);
  }
  if (tomorrow) {
    return toIsoDate(addDays(now, 1));
  }
  const days = inDays ? parseNumber(inDays) : undefined;
  return days === undefined ? undefined : toIsoDate(addDays(now, Math.round(days)));
}

type ParsedItem = { name: string; quantity: number; unit?: string; implicitQuantity: boolean };

export function parseItem(raw: string): ParsedItem | undefined {
  let text = raw.trim().replace(/^(?:the|my|our|all the|all of the|all|more)\s+/, "");
  let quantity = 1;
  let implicitQuantity = true;

  const phrase = QUANTITY_PHRASES.find(([pattern]) => pattern.test(text));
  if (phrase) {
    quantity = phrase[1];
    implicitQuantity = false;
    text = text.replace(phrase[0], "");
  } else {
    const numeric = /^(\d+(?:\.\d+)?)\s*(.*)$/.exec(text);
    const [first = "", ...others] = text.split(" ");
    if (numeric?.[1] !== undefined) {
      quantity = Number.parseFloat(numeric[1]);
      implicitQuantity = false;
      text = numeric[2] ?? "";
    } else if (others.length > 0 && NUMBER_WORDS[first] !== undefined) {
      quantity = NUMBER_WORDS[first] ?? 1;
      implicitQuantity = first === "some";
      text = others.join(" ");
    }
  }

  let unit: string | undefined;
  const words = text.trim().split(" ");
  const [maybeUnit = "", ...afterUnit] = words;
  if (afterUnit.length > 0 && isUnitWord(maybeUnit)) {
    unit = normalizeUnit(maybeUnit);
    text = afterUnit.join(" ");
    if (maybeUnit === "dozen") {
      quantity *= 12;
    }
  }

  text = text
    .replace(/^of\s+/, "")
    .replace(/^(?:the|some|fresh|more|old|leftover|remaining)\s+/, "")
    .replace(/\s+(?:too|as well|also)$/, "")
    .trim();
  if (!text || NON_ITEMS.has(text)) {
    return undefined;
  }

  const split = splitPieceWord(text);
  if (!split.name || NON_ITEMS.has(split.name)) {
    return undefined;
  }

  const resolvedUnit = unit === "count" ? undefined : (unit ?? split.unit);
  const item: ParsedItem = { name: split.name, quantity, implicitQuantity };
  if (resolvedUnit) {
    item.unit = resolvedUnit;
  }
  return item;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
