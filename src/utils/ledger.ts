import type { FilmStore } from "./db";
import { rankFilms } from "./scoring";
import {
    type CastVote,
    type Film,
    type FilmScore,
    type LedgerError,
    type Outcome,
    type Round,
    type Vote,
    fail,
    ok,
} from "../types";

export const MAX_TITLE_LENGTH = 200;
export const MAX_ROUND_NAME_LENGTH = 100;

function invalid(field: string, reason: string): LedgerError {
    return { kind: "InvalidInput", field, reason };
}

function checkId(field: string, id: number): LedgerError | null {
    if (!Number.isInteger(id) || id <= 0) return invalid(field, "must be a positive integer");
    return null;
}

function checkText(field: string, raw: string, max: number): Outcome<string> {
    const text = raw.trim();
    if (!text) return fail(invalid(field, "must not be empty"));
    if (text.length > max) return fail(invalid(field, `must be at most ${max} characters`));
    return ok(text);
}

/**
 * Round-scoped voting ledger and film registry.
 *
 * Every operation returns plain records; expected failures (duplicates, misses,
 * bad input) come back as `{ ok: false, error }` and storage faults are thrown.
 * Authorization is the caller's job.
 */
export class FilmLedger {
    constructor(private readonly store: FilmStore) {}

    /* ---------- films ---------- */

    async addFilm(title: string): Promise<Outcome<Film>> {
        const checked = checkText("title", title, MAX_TITLE_LENGTH);
        if (!checked.ok) return checked;
        const result = await this.store.insertFilm(checked.value);
        if (result.ok) console.log(`[ledger] film #${result.value.id} "${result.value.title}" added`);
        else console.warn(`[ledger] film "${checked.value}" already exists`);
        return result;
    }

    // Films referenced by a vote are never deleted, so past results stay intact.
    async deleteFilm(title: string): Promise<Outcome<Film>> {
        const checked = checkText("title", title, MAX_TITLE_LENGTH);
        if (!checked.ok) return checked;
        const result = await this.store.removeFilm(checked.value);
        if (result.ok) console.log(`[ledger] film #${result.value.id} "${result.value.title}" deleted`);
        return result;
    }

    async listFilms(): Promise<Film[]> {
        return this.store.listFilms();
    }

    async getFilm(filmId: number): Promise<Outcome<Film>> {
        const bad = checkId("filmId", filmId);
        if (bad) return fail(bad);
        const film = await this.store.getFilm(filmId);
        return film ? ok(film) : fail({ kind: "NotFound", entity: "film", ref: filmId });
    }

    /* ---------- rounds ---------- */

    async startNewRound(name: string): Promise<Outcome<Round>> {
        const checked = checkText("name", name, MAX_ROUND_NAME_LENGTH);
        if (!checked.ok) return checked;
        const round = await this.store.startRound(checked.value);
        console.log(`[ledger] round #${round.id} "${round.name}" is now active`);
        return ok(round);
    }

    async activeRound(): Promise<Round | null> {
        return this.store.getActiveRound();
    }

    async getRound(roundId: number): Promise<Outcome<Round>> {
        const bad = checkId("roundId", roundId);
        if (bad) return fail(bad);
        const round = await this.store.getRound(roundId);
        return round ? ok(round) : fail({ kind: "NotFound", entity: "round", ref: roundId });
    }

    async listRounds(): Promise<Round[]> {
        return this.store.listRounds();
    }

    /* ---------- votes ---------- */

    async castVote(userId: string, filmId: number, seen: boolean): Promise<Outcome<CastVote>> {
        if (!userId.trim()) return fail(invalid("userId", "must not be empty"));
        const bad = checkId("filmId", filmId);
        if (bad) return fail(bad);

        const result = await this.store.insertVote(userId, filmId, seen);
        if (!result.ok && result.error.kind === "DuplicateVote") {
            console.warn(`[ledger] user ${userId} already voted in round #${result.error.existing.round.id}`);
        }
        return result;
    }

    async findVote(userId: string, roundId: number): Promise<Vote | null> {
        return this.store.findVote(userId, roundId);
    }

    /* ---------- results ---------- */

    async computeResults(roundId: number): Promise<Outcome<FilmScore[]>> {
        const round = await this.getRound(roundId);
        if (!round.ok) return round;
        return ok(rankFilms(await this.store.tallyRound(roundId)));
    }

    async winner(roundId: number): Promise<Outcome<FilmScore | null>> {
        const results = await this.computeResults(roundId);
        if (!results.ok) return results;
        return ok(results.value[0] ?? null);
    }

    async currentResults(): Promise<Outcome<{ round: Round; scores: FilmScore[] }>> {
        const round = await this.store.getActiveRound();
        if (!round) return fail({ kind: "NoActiveRound" });
        return ok({ round, scores: rankFilms(await this.store.tallyRound(round.id)) });
    }

    async currentWinner(): Promise<Outcome<{ round: Round; winner: FilmScore | null }>> {
        const current = await this.currentResults();
        if (!current.ok) return current;
        return ok({ round: current.value.round, winner: current.value.scores[0] ?? null });
    }
}
