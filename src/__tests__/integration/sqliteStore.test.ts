import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, it, expect } from "vitest";
import { SqliteFilmStore } from "../../utils/db";

const T0 = Date.UTC(2024, 0, 1);

function ticking() {
    let clock = T0;
    return () => (clock += 1000);
}

const tmpDirs: string[] = [];

afterEach(() => {
    for (const dir of tmpDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe("SqliteFilmStore", () => {
    it("seeds the default round once and keeps data across reopen", async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), "film-votes-"));
        tmpDirs.push(dir);
        const file = path.join(dir, "nested", "votes.db");

        const first = new SqliteFilmStore({ path: file, seedRoundName: "Round 1", now: ticking() });
        expect(fs.existsSync(file)).toBe(true);
        const film = await first.insertFilm("Heat");
        expect(film).toEqual({ ok: true, value: { id: 1, title: "Heat" } });
        await first.close();

        const second = new SqliteFilmStore({ path: file, seedRoundName: "Round 1", now: ticking() });
        const rounds = await second.listRounds();
        expect(rounds).toEqual([{ id: 1, name: "Round 1", isActive: true, createdAt: T0 + 1000 }]);
        expect(await second.listFilms()).toEqual([{ id: 1, title: "Heat" }]);
        await second.close();
    });

    it("does not seed without a round name", async () => {
        const store = new SqliteFilmStore({ path: ":memory:" });
        expect(await store.getActiveRound()).toBeNull();
        await store.close();
    });

    it("stamps rounds and votes with the injected clock", async () => {
        const store = new SqliteFilmStore({ path: ":memory:", now: ticking() });
        await store.insertFilm("Heat");
        const round = await store.startRound("R1");
        expect(round).toEqual({ id: 1, name: "R1", isActive: true, createdAt: T0 + 1000 });

        const cast = await store.insertVote("42", 1, false);
        expect(cast.ok && cast.value.vote).toEqual({ id: 1, userId: "42", filmId: 1, roundId: 1, seen: false, createdAt: T0 + 2000 });
        expect(await store.findVote("42", 1)).toEqual({ id: 1, userId: "42", filmId: 1, roundId: 1, seen: false, createdAt: T0 + 2000 });
        expect(await store.findVote("43", 1)).toBeNull();
        await store.close();
    });

    it("tallies only the requested round", async () => {
        const store = new SqliteFilmStore({ path: ":memory:" });
        await store.insertFilm("A");
        await store.insertFilm("B");
        await store.startRound("R1");
        await store.insertVote("1", 1, true);
        await store.insertVote("2", 2, false);
        await store.insertVote("3", 2, true);
        await store.startRound("R2");
        await store.insertVote("1", 1, false);

        const r1 = (await store.tallyRound(1)).sort((x, y) => x.film.id - y.film.id);
        expect(r1).toEqual([
            { film: { id: 1, title: "A" }, seen: 1, unseen: 0 },
            { film: { id: 2, title: "B" }, seen: 1, unseen: 1 },
        ]);
        expect(await store.tallyRound(2)).toEqual([{ film: { id: 1, title: "A" }, seen: 0, unseen: 1 }]);
        expect(await store.tallyRound(3)).toEqual([]);
        await store.close();
    });
});
