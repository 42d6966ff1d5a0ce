// Storage contract shared by the SQLite and Supabase adapters.
// Constraint outcomes (duplicate title, duplicate vote, missing rows) come back as
// Outcome values; anything else is thrown as a StoreError.
import type { CastVote, Film, FilmTally, Outcome, Round, Vote } from "../../types";

export interface FilmStore {
    readonly kind: "sqlite" | "supabase";
    insertFilm(title: string): Promise<Outcome<Film>>;
    removeFilm(title: string): Promise<Outcome<Film>>;
    listFilms(): Promise<Film[]>;
    getFilm(id: number): Promise<Film | null>;
    getRound(id: number): Promise<Round | null>;
    getActiveRound(): Promise<Round | null>;
    listRounds(): Promise<Round[]>;
    // deactivates the current round and inserts the new one atomically
    startRound(name: string): Promise<Round>;
    // resolves the active round and inserts the vote in one transaction
    insertVote(userId: string, filmId: number, seen: boolean): Promise<Outcome<CastVote>>;
    findVote(userId: string, roundId: number): Promise<Vote | null>;
    // one entry per film with at least one vote in the round, in no particular order
    tallyRound(roundId: number): Promise<FilmTally[]>;
    close(): Promise<void>;
}

export class StoreError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = "StoreError";
    }
}
