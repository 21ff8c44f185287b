/**
 * Likely-valid actions read off the room text and the inventory. The
 * interpreter has no valid-action query of its own, so the session answers
 * get_valid_actions from here: exits named in the text, then examine/take
 * (and open, for containers) for each object mentioned, examine/drop for
 * carried items, and the remaining compass directions last.
 */

import { CARDINAL_DIRECTIONS } from "@grue/planner";

export interface ValidActionsContext {
  location: string;
  /** Latest play_action text, without the status line. */
  observation: string;
  /** Carried items as the inventory listed them, e.g. "A brass lantern". */
  inventory: readonly string[];
}

export type ValidActionsProvider = (context: ValidActionsContext) => Promise<string[]>;

const EXIT_WORDS = new Set<string>([
  ...CARDINAL_DIRECTIONS,
  "northeast", "northwest", "southeast", "southwest",
]);

const ARTICLES = new Set(["a", "an", "the", "some"]);

// Words that end a noun phrase
const STOP_WORDS = new Set<string>([
  ...EXIT_WORDS,
  "of", "with", "to", "in", "on", "at", "into", "from", "by", "for", "as",
  "here", "there", "nearby", "is", "are", "was", "were", "and", "or", "but",
  "which", "that", "leads", "lead", "runs", "lies", "sits", "you", "your", "it", "its", "this",
]);

const OPENABLE = new Set([
  "door", "mailbox", "window", "sack", "bag", "box", "chest", "case",
  "trapdoor", "gate", "bottle", "egg", "lid", "grating", "coffin",
]);

const MAX_PHRASE_WORDS = 3;

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z][a-z-]*|[.,;:!?]/g) ?? [];
}

/** Direction words in order of first mention. */
export function mentionedExits(text: string): string[] {
  const exits: string[] = [];
  for (const token of tokenize(text)) {
    if (EXIT_WORDS.has(token) && !exits.includes(token)) exits.push(token);
  }
  return exits;
}

/**
 * Head nouns of article phrases ("a dark staircase leads up" gives
 * "staircase"), skipping words of the location's own name.
 */
export function mentionedObjects(text: string, location = ""): string[] {
  const tokens = tokenize(text);
  const locationWords = new Set(tokenize(location));
  const nouns: string[] = [];
  tokens.forEach((token, i) => {
    if (!ARTICLES.has(token)) return;
    let noun: string | undefined;
    for (const word of tokens.slice(i + 1, i + 1 + MAX_PHRASE_WORDS)) {
      if (!/^[a-z]/.test(word) || STOP_WORDS.has(word) || ARTICLES.has(word)) break;
      noun = word;
    }
    if (noun !== undefined && !locationWords.has(noun) && !nouns.includes(noun)) nouns.push(noun);
  });
  return nouns;
}

function itemNoun(item: string): string | undefined {
  const words = tokenize(item).filter(w => /^[a-z]/.test(w));
  return words[words.length - 1];
}

export function candidateActions(context: ValidActionsContext): string[] {
  const actions: string[] = [];
  const add = (action: string): void => {
    if (!actions.includes(action)) actions.push(action);
  };

  for (const exit of mentionedExits(context.observation)) add(exit);

  const carried = context.inventory.map(itemNoun).filter((n): n is string => n !== undefined);
  for (const noun of mentionedObjects(context.observation, context.location)) {
    if (carried.includes(noun)) continue;
    add(`examine ${noun}`);
    add(`take ${noun}`);
    if (OPENABLE.has(noun)) add(`open ${noun}`);
  }
  for (const noun of carried) {
    add(`examine ${noun}`);
    add(`drop ${noun}`);
  }

  add("look");
  add("inventory");
  for (const direction of CARDINAL_DIRECTIONS) add(direction);
  return actions;
}

/** Default get_valid_actions provider for interpreter-backed sessions. */
export const suggestActions: ValidActionsProvider = async context => candidateActions(context);
