import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { type CastVote, type Film, type FilmTally, type Outcome, type Round, type Vote, fail, ok } from "../../types";
import { type FilmStore, StoreError } from "./base";

/* ---------- Postgres error codes surfaced by PostgREST ---------- */

export type PgViolation = "unique" | "foreign-key" | "other";

export function classifyPgError(code: string | undefined): PgViolation {
    if (code === "23505") return "unique";
    if (code === "23503") return "foreign-key";
    return "other";
}

/* ---------- Row decoding (the client is untyped, so rows arrive as unknown) ---------- */

type Row = Map<string, unknown>;

export function toRow(value: unknown, what: string): Row {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        throw new StoreError(`malformed ${what} row from supabase`);
    }
    return new Map(Object.entries(value));
}

function num(row: Row, key: string): number {
    const v = Number(row.get(key));
    if (!Number.isFinite(v)) throw new StoreError(`column ${key} is not a number`);
    return v;
}

function str(row: Row, key: string): string {
    const v = row.get(key);
    if (typeof v !== "string") throw new StoreError(`column ${key} is not a string`);
    return v;
}

function timestamp(row: Row, key: string): number {
    const v = row.get(key);
    const ms = typeof v === "number" ? v : Date.parse(String(v));
    if (Number.isNaN(ms)) throw new StoreError(`column ${key} is not a timestamp`);
    return ms;
}

export function decodeFilm(value: unknown): Film {
    const row = toRow(value, "film");
    return { id: num(row, "id"), title: str(row, "title") };
}

export function decodeRound(value: unknown): Round {
    const row = toRow(value, "round");
    return { id: num(row, "id"), name: str(row, "name"), isActive: row.get("is_active") === true, createdAt: timestamp(row, "created_at") };
}

export function decodeVote(value: unknown): Vote {
    const row = toRow(value, "vote");
    return {
        id: num(row, "id"),
        userId: str(row, "user_id"),
        filmId: num(row, "film_id"),
        roundId: num(row, "round_id"),
        seen: row.get("seen") === true,
        createdAt: timestamp(row, "created_at"),
    };
}

export function decodeTally(value: unknown): FilmTally {
    const row = toRow(value, "tally");
    return { film: { id: num(row, "film_id"), title: str(row, "title") }, seen: num(row, "seen"), unseen: num(row, "unseen") };
}

// Result of the cast_vote() function in supabase/migrations/0001_film_voting.sql
export function decodeCastVote(value: unknown, userId: string, filmId: number): Outcome<CastVote> {
    const row = toRow(value, "cast_vote");
    const status = row.get("status");
    switch (status) {
        case "no_active_round":
            return fail({ kind: "NoActiveRound" });
        case "film_not_found":
            return fail({ kind: "NotFound", entity: "film", ref: filmId });
        case "duplicate": {
            const existing = decodeVote(row.get("vote"));
            return fail({
                kind: "DuplicateVote",
                existing: { film: decodeFilm(row.get("film")), seen: existing.seen, round: decodeRound(row.get("round")) },
            });
        }
        case "ok":
            return ok({
                vote: decodeVote(row.get("vote")),
                film: decodeFilm(row.get("film")),
                round: decodeRound(row.get("round")),
                tally: { seen: num(row, "seen"), unseen: num(row, "unseen") },
            });
        default:
            throw new StoreError(`cast_vote returned unknown status ${String(status)} for user ${userId}`);
    }
}

/* ---------- Supabase client (server-side) ---------- */

export interface SupabaseStoreOptions {
    url: string;
    serviceKey: string;
}

interface PgError {
    message: string;
    code?: string;
}

function raise(op: string, error: PgError): never {
    throw new StoreError(`supabase ${op} failed: ${error.message}`, error);
}

export class SupabaseFilmStore implements FilmStore {
    readonly kind = "supabase";
    private readonly supabase: SupabaseClient;

    constructor(options: SupabaseStoreOptions) {
        this.supabase = createClient(options.url, options.serviceKey, {
            auth: { persistSession: false },
            global: { headers: { "x-client-info": "film-night-bot" } },
        });
    }

    async insertFilm(title: string): Promise<Outcome<Film>> {
        const { data, error } = await this.supabase.from("films").insert({ title }).select("id,title").single();
        if (error) {
            if (classifyPgError(error.code) === "unique") return fail({ kind: "DuplicateFilm", title });
            raise("insertFilm", error);
        }
        return ok(decodeFilm(data));
    }

    async removeFilm(title: string): Promise<Outcome<Film>> {
        const found = await this.supabase.from("films").select("id,title").eq("title", title).maybeSingle();
        if (found.error) raise("removeFilm", found.error);
        if (!found.data) return fail({ kind: "NotFound", entity: "film", ref: title });
        const film = decodeFilm(found.data);

        const { error } = await this.supabase.from("films").delete().eq("id", film.id);
        if (error) {
            if (classifyPgError(error.code) !== "foreign-key") raise("removeFilm", error);
            const counted = await this.supabase.from("votes").select("id", { count: "exact", head: true }).eq("film_id", film.id);
            if (counted.error) raise("removeFilm", counted.error);
            return fail({ kind: "FilmInUse", film, votes: counted.count ?? 0 });
        }
        return ok(film);
    }

    async listFilms(): Promise<Film[]> {
        const { data, error } = await this.supabase.from("films").select("id,title").order("id", { ascending: true });
        if (error) raise("listFilms", error);
        return (data ?? []).map(decodeFilm);
    }

    async getFilm(id: number): Promise<Film | null> {
        const { data, error } = await this.supabase.from("films").select("id,title").eq("id", id).maybeSingle();
        if (error) raise("getFilm", error);
        return data ? decodeFilm(data) : null;
    }

    async getRound(id: number): Promise<Round | null> {
        const { data, error } = await this.supabase.from("rounds").select("*").eq("id", id).maybeSingle();
        if (error) raise("getRound", error);
        return data ? decodeRound(data) : null;
    }

    async getActiveRound(): Promise<Round | null> {
        const { data, error } = await this.supabase.from("rounds").select("*").eq("is_active", true).maybeSingle();
        if (error) raise("getActiveRound", error);
        return data ? decodeRound(data) : null;
    }

    async listRounds(): Promise<Round[]> {
        const { data, error } = await this.supabase.from("rounds").select("*").order("id", { ascending: true });
        if (error) raise("listRounds", error);
        return (data ?? []).map(decodeRound);
    }

    async startRound(name: string): Promise<Round> {
        const { data, error } = await this.supabase.rpc("start_new_round", { p_name: name });
        if (error) raise("startRound", error);
        return decodeRound(data);
    }

    async insertVote(userId: string, filmId: number, seen: boolean): Promise<Outcome<CastVote>> {
        const { data, error } = await this.supabase.rpc("cast_vote", { p_user_id: userId, p_film_id: filmId, p_seen: seen });
        if (error) raise("insertVote", error);
        return decodeCastVote(data, userId, filmId);
    }

    async findVote(userId: string, roundId: number): Promise<Vote | null> {
        const { data, error } = await this.supabase
            .from("votes")
            .select("*")
            .eq("user_id", userId)
            .eq("round_id", roundId)
            .maybeSingle();
        if (error) raise("findVote", error);
        return data ? decodeVote(data) : null;
    }

    async tallyRound(roundId: number): Promise<FilmTally[]> {
        const { data, error } = await this.supabase.rpc("round_tallies", { p_round_id: roundId });
        if (error) raise("tallyRound", error);
        if (!Array.isArray(data)) throw new StoreError("round_tallies did not return a list");
        return data.map(decodeTally);
    }

    async close(): Promise<void> {
        await this.supabase.removeAllChannels();
    }
}
