import type { FilmScore, FilmTally, VoteTally } from "../types";

// A vote from someone who has already seen the film counts half.
export const SEEN_WEIGHT = 0.5;
export const UNSEEN_WEIGHT = 1.0;

export function scoreTally(tally: VoteTally): number {
    return tally.seen * SEEN_WEIGHT + tally.unseen * UNSEEN_WEIGHT;
}

/**
 * Score table for one round. Films without votes are dropped; order is score
 * descending, then film id ascending so equal scores always list the same way.
 */
export function rankFilms(tallies: FilmTally[]): FilmScore[] {
    return tallies
        .filter((t) => t.seen + t.unseen > 0)
        .map((t) => ({ film: t.film, seen: t.seen, unseen: t.unseen, score: scoreTally(t) }))
        .sort((a, b) => b.score - a.score || a.film.id - b.film.id);
}
