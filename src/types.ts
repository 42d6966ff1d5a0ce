export interface Film {
    id: number;
    title: string;
}

export interface Round {
    id: number;
    name: string;
    isActive: boolean;
    createdAt: number; // epoch ms
}

export interface Vote {
    id: number;
    // opaque platform user id (Discord snowflakes do not fit in a JS number)
    userId: string;
    filmId: number;
    roundId: number;
    seen: boolean;
    createdAt: number;
}

export interface VoteTally {
    seen: number;
    unseen: number;
}

export interface FilmTally extends VoteTally {
    film: Film;
}

export interface FilmScore extends FilmTally {
    score: number;
}

export interface CastVote {
    vote: Vote;
    film: Film;
    round: Round;
    tally: VoteTally; // tally of the chosen film in the round, including this vote
}

export interface ExistingVote {
    film: Film;
    seen: boolean;
    round: Round;
}

export type LedgerError =
    | { kind: "DuplicateFilm"; title: string }
    | { kind: "DuplicateVote"; existing: ExistingVote }
    | { kind: "NotFound"; entity: "film" | "round"; ref: string | number }
    | { kind: "NoActiveRound" }
    | { kind: "InvalidInput"; field: string; reason: string }
    | { kind: "FilmInUse"; film: Film; votes: number };

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: LedgerError };

export function ok<T>(value: T): Outcome<T> {
    return { ok: true, value };
}

export function fail<T = never>(error: LedgerError): Outcome<T> {
    return { ok: false, error };
}
