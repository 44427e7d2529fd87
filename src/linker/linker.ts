import { DateTime } from "luxon";
import type { Logger } from "pino";
import { extractTerms } from "../store/fts";
import type { ContentStore, DiscussionMatch } from "../store/store";

const RECENCY_HALF_LIFE_DAYS = 30;
const MIN_CANDIDATE_POOL = 20;

interface ScoredCandidate {
  id: string;
  createdAt: number;
  score: number;
}

export function recencyWeight(ageDays: number): number {
  const age = Math.max(0, ageDays);
  return 0.5 + 0.5 * Math.pow(2, -age / RECENCY_HALF_LIFE_DAYS);
}

/**
 * Suggests discussion and decision records related to a piece of text.
 * Results depend only on the text, the store contents and the clock.
 */
export class Linker {
  constructor(
    private readonly store: ContentStore,
    private readonly logger: Logger,
    private readonly now: () => DateTime = () => DateTime.utc(),
  ) {}

  async findCandidates(text: string, limit: number): Promise<string[]> {
    if (limit <= 0) {
      return [];
    }
    const terms = extractTerms(text);
    if (terms.length === 0) {
      return [];
    }

    const pool = await this.store.searchDiscussions(
      terms,
      Math.max(limit * 4, MIN_CANDIDATE_POOL),
    );
    const ranked = this.rank(pool).slice(0, limit);
    this.logger.debug(
      { terms: terms.length, pool: pool.length, linked: ranked.length },
      "Linker candidates ranked",
    );
    return ranked.map((candidate) => candidate.id);
  }

  private rank(matches: DiscussionMatch[]): ScoredCandidate[] {
    const now = this.now();
    return matches
      .map((match) => {
        const ageDays = now.diff(DateTime.fromJSDate(match.createdAt), "days").days;
        return {
          id: match.id,
          createdAt: match.createdAt.getTime(),
          score: match.relevance * recencyWeight(ageDays),
        };
      })
      .sort(
        (a, b) =>
          b.score - a.score ||
          b.createdAt - a.createdAt ||
          (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
      );
  }
}
