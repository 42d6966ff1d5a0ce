import fs from "fs";
import path from "path";
import { describe, it, expect } from "vitest";

const sql = fs.readFileSync(path.join(__dirname, "../../../supabase/migrations/0001_film_voting.sql"), "utf8");

function functionBody(name: string) {
    const start = sql.indexOf(`create or replace function ${name}(`);
    const end = sql.indexOf("$$;", start);
    return sql.slice(start, end);
}

describe("supabase migration", () => {
    it("serializes round switches before deactivating the old round", () => {
        const body = functionBody("start_new_round");
        const lock = body.indexOf("lock table rounds in share row exclusive mode;");
        expect(lock).toBeGreaterThan(-1);
        expect(lock).toBeLessThan(body.indexOf("update rounds set is_active = false"));
    });

    it("looks up the active round again when a switch lands while casting a vote", () => {
        const body = functionBody("cast_vote");
        expect(body.split("select * into v_round from rounds where is_active for share;")).toHaveLength(3);
    });
});
