import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { type CastVote, type Film, type FilmTally, type Outcome, type Round, type Vote, fail, ok } from "../../types";
import { type FilmStore, StoreError } from "./base";

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS films (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL UNIQUE
    );

    CREATE TABLE IF NOT EXISTS rounds (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        is_active INTEGER NOT NULL DEFAULT 0 CHECK (is_active IN (0, 1)),
        created_at INTEGER NOT NULL
    );

    -- at most one active round
    CREATE UNIQUE INDEX IF NOT EXISTS rounds_single_active ON rounds (is_active) WHERE is_active = 1;

    CREATE TABLE IF NOT EXISTS votes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        film_id INTEGER NOT NULL,
        round_id INTEGER NOT NULL,
        seen INTEGER NOT NULL CHECK (seen IN (0, 1)),
        created_at INTEGER NOT NULL,
        UNIQUE (user_id, round_id),
        FOREIGN KEY (film_id) REFERENCES films (id) ON DELETE RESTRICT,
        FOREIGN KEY (round_id) REFERENCES rounds (id) ON DELETE RESTRICT
    );

    CREATE INDEX IF NOT EXISTS votes_round_film ON votes (round_id, film_id);
`;

interface FilmRow {
    id: number;
    title: string;
}

interface RoundRow {
    id: number;
    name: string;
    is_active: number;
    created_at: number;
}

interface VoteRow {
    id: number;
    user_id: string;
    film_id: number;
    round_id: number;
    seen: number;
    created_at: number;
}

interface TallyRow {
    film_id: number;
    title: string;
    seen: number;
    unseen: number;
}

export interface SqliteStoreOptions {
    // file path, or ":memory:"
    path: string;
    // when set, a round with this name is created if no round is active
    seedRoundName?: string;
    now?: () => number;
}

function toRound(row: RoundRow): Round {
    return { id: row.id, name: row.name, isActive: row.is_active === 1, createdAt: row.created_at };
}

function toVote(row: VoteRow): Vote {
    return {
        id: row.id,
        userId: row.user_id,
        filmId: row.film_id,
        roundId: row.round_id,
        seen: row.seen === 1,
        createdAt: row.created_at,
    };
}

export function sqliteCode(err: unknown): string | undefined {
    if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
    return undefined;
}

export class SqliteFilmStore implements FilmStore {
    readonly kind = "sqlite";
    private readonly db: Database.Database;
    private readonly now: () => number;

    constructor(options: SqliteStoreOptions) {
        this.now = options.now ?? Date.now;
        const inMemory = options.path === ":memory:";
        if (!inMemory) {
            const dir = path.dirname(options.path);
            if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
        }
        this.db = new Database(options.path);
        this.db.pragma("foreign_keys = ON");
        if (!inMemory) this.db.pragma("journal_mode = WAL");
        this.db.exec(SCHEMA);
        if (options.seedRoundName) this.seedRound(options.seedRoundName);
    }

    private seedRound(name: string) {
        const seed = this.db.transaction(() => {
            if (this.activeRoundRow()) return;
            this.db.prepare<[string, number]>("INSERT INTO rounds (name, is_active, created_at) VALUES (?, 1, ?)").run(name, this.now());
            console.log(`[db] seeded active round "${name}"`);
        });
        seed.immediate();
    }

    private guard<T>(op: string, fn: () => T): T {
        try {
            return fn();
        } catch (err) {
            if (err instanceof StoreError) throw err;
            throw new StoreError(`sqlite ${op} failed`, err);
        }
    }

    private filmById(id: number): Film | null {
        return this.db.prepare<[number], FilmRow>("SELECT id, title FROM films WHERE id = ?").get(id) ?? null;
    }

    private roundRow(id: number): RoundRow | undefined {
        return this.db.prepare<[number], RoundRow>("SELECT id, name, is_active, created_at FROM rounds WHERE id = ?").get(id);
    }

    private activeRoundRow(): RoundRow | undefined {
        return this.db
            .prepare<[], RoundRow>("SELECT id, name, is_active, created_at FROM rounds WHERE is_active = 1")
            .get();
    }

    private voteRow(userId: string, roundId: number): VoteRow | undefined {
        return this.db
            .prepare<[string, number], VoteRow>(
                "SELECT id, user_id, film_id, round_id, seen, created_at FROM votes WHERE user_id = ? AND round_id = ?"
            )
            .get(userId, roundId);
    }

    async insertFilm(title: string): Promise<Outcome<Film>> {
        return this.guard("insertFilm", () => {
            try {
                const info = this.db.prepare<[string]>("INSERT INTO films (title) VALUES (?)").run(title);
                return ok({ id: Number(info.lastInsertRowid), title });
            } catch (err) {
                if (sqliteCode(err) === "SQLITE_CONSTRAINT_UNIQUE") return fail({ kind: "DuplicateFilm", title });
                throw err;
            }
        });
    }

    async removeFilm(title: string): Promise<Outcome<Film>> {
        const remove = this.db.transaction((): Outcome<Film> => {
            const film = this.db.prepare<[string], FilmRow>("SELECT id, title FROM films WHERE title = ?").get(title);
            if (!film) return fail({ kind: "NotFound", entity: "film", ref: title });
            const row = this.db.prepare<[number], { n: number }>("SELECT COUNT(*) AS n FROM votes WHERE film_id = ?").get(film.id);
            const votes = row?.n ?? 0;
            if (votes > 0) return fail({ kind: "FilmInUse", film, votes });
            this.db.prepare<[number]>("DELETE FROM films WHERE id = ?").run(film.id);
            return ok(film);
        });
        return this.guard("removeFilm", () => remove.immediate());
    }

    async listFilms(): Promise<Film[]> {
        return this.guard("listFilms", () => this.db.prepare<[], FilmRow>("SELECT id, title FROM films ORDER BY id").all());
    }

    async getFilm(id: number): Promise<Film | null> {
        return this.guard("getFilm", () => this.filmById(id));
    }

    async getRound(id: number): Promise<Round | null> {
        return this.guard("getRound", () => {
            const row = this.roundRow(id);
            return row ? toRound(row) : null;
        });
    }

    async getActiveRound(): Promise<Round | null> {
        return this.guard("getActiveRound", () => {
            const row = this.activeRoundRow();
            return row ? toRound(row) : null;
        });
    }

    async listRounds(): Promise<Round[]> {
        return this.guard("listRounds", () =>
            this.db
                .prepare<[], RoundRow>("SELECT id, name, is_active, created_at FROM rounds ORDER BY id")
                .all()
                .map(toRound)
        );
    }

    async startRound(name: string): Promise<Round> {
        const start = this.db.transaction((): Round => {
            this.db.prepare("UPDATE rounds SET is_active = 0 WHERE is_active = 1").run();
            const createdAt = this.now();
            const info = this.db
                .prepare<[string, number]>("INSERT INTO rounds (name, is_active, created_at) VALUES (?, 1, ?)")
                .run(name, createdAt);
            return { id: Number(info.lastInsertRowid), name, isActive: true, createdAt };
        });
        return this.guard("startRound", () => start.immediate());
    }

    async insertVote(userId: string, filmId: number, seen: boolean): Promise<Outcome<CastVote>> {
        const cast = this.db.transaction((): Outcome<CastVote> => {
            const roundRow = this.activeRoundRow();
            if (!roundRow) return fail({ kind: "NoActiveRound" });
            const round = toRound(roundRow);
            const film = this.filmById(filmId);
            if (!film) return fail({ kind: "NotFound", entity: "film", ref: filmId });

            const createdAt = this.now();
            let voteId: number;
            try {
                const info = this.db
                    .prepare<[string, number, number, number, number]>(
                        "INSERT INTO votes (user_id, film_id, round_id, seen, created_at) VALUES (?, ?, ?, ?, ?)"
                    )
                    .run(userId, film.id, round.id, seen ? 1 : 0, createdAt);
                voteId = Number(info.lastInsertRowid);
            } catch (err) {
                if (sqliteCode(err) !== "SQLITE_CONSTRAINT_UNIQUE") throw err;
                const existing = this.voteRow(userId, round.id);
                const existingFilm = existing ? this.filmById(existing.film_id) : null;
                if (!existing || !existingFilm) throw new StoreError(`vote for user ${userId} in round ${round.id} vanished`, err);
                return fail({ kind: "DuplicateVote", existing: { film: existingFilm, seen: existing.seen === 1, round } });
            }

            const tally = this.db
                .prepare<[number, number], { seen: number | null; unseen: number | null }>(
                    `SELECT SUM(CASE WHEN seen = 1 THEN 1 ELSE 0 END) AS seen,
                            SUM(CASE WHEN seen = 0 THEN 1 ELSE 0 END) AS unseen
                     FROM votes WHERE film_id = ? AND round_id = ?`
                )
                .get(film.id, round.id);
            return ok({
                vote: { id: voteId, userId, filmId: film.id, roundId: round.id, seen, createdAt },
                film,
                round,
                tally: { seen: tally?.seen ?? 0, unseen: tally?.unseen ?? 0 },
            });
        });
        return this.guard("insertVote", () => cast.immediate());
    }

    async findVote(userId: string, roundId: number): Promise<Vote | null> {
        return this.guard("findVote", () => {
            const row = this.voteRow(userId, roundId);
            return row ? toVote(row) : null;
        });
    }

    async tallyRound(roundId: number): Promise<FilmTally[]> {
        return this.guard("tallyRound", () =>
            this.db
                .prepare<[number], TallyRow>(
                    `SELECT f.id AS film_id, f.title AS title,
                            SUM(CASE WHEN v.seen = 1 THEN 1 ELSE 0 END) AS seen,
                            SUM(CASE WHEN v.seen = 0 THEN 1 ELSE 0 END) AS unseen
                     FROM votes v JOIN films f ON f.id = v.film_id
                     WHERE v.round_id = ?
                     GROUP BY f.id, f.title`
                )
                .all(roundId)
                .map((r) => ({ film: { id: r.film_id, title: r.title }, seen: r.seen, unseen: r.unseen }))
        );
    }

    async close(): Promise<void> {
        if (this.db.open) this.db.close();
    }
}
