import { readFileSync } from "node:fs";
import { z } from "zod";

export const MAX_QUERY_TERMS = 32;
const MIN_TERM_LENGTH = 3;

const stopWords = new Set(
  z
    .array(z.string())
    .parse(
      JSON.parse(
        readFileSync(new URL("./stopwords.json", import.meta.url), "utf-8"),
      ),
    ),
);

/**
 * Lowercase word terms worth matching on, first occurrence order, without
 * duplicates or stop words.
 */
export function extractTerms(text: string, max = MAX_QUERY_TERMS): string[] {
  const words = text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
  const terms: string[] = [];
  const seen = new Set<string>();

  for (const word of words) {
    if (word.length < MIN_TERM_LENGTH || stopWords.has(word) || seen.has(word)) {
      continue;
    }
    seen.add(word);
    terms.push(word);
    if (terms.length >= max) {
      break;
    }
  }

  return terms;
}

// Every term is quoted, so FTS5 operators in user text are matched literally.
export function toMatchExpression(terms: string[]): string {
  return terms.map((term) => `"${term.replace(/"/g, '""')}"`).join(" OR ");
}
