import { describe, it, expect } from "vitest";
import { StoreError } from "../../utils/db";
import { classifyPgError, decodeCastVote, decodeRound, decodeTally } from "../../utils/db/supabase";

const roundRow = { id: 3, name: "R3", is_active: true, created_at: "2024-01-01T00:00:00+00:00" };
const filmRow = { id: 7, title: "Heat" };
const voteRow = { id: 11, user_id: "42", film_id: 7, round_id: 3, seen: true, created_at: "2024-01-01T00:00:05+00:00" };

describe("classifyPgError", () => {
    it("maps constraint violations", () => {
        expect(classifyPgError("23505")).toBe("unique");
        expect(classifyPgError("23503")).toBe("foreign-key");
        expect(classifyPgError("42P01")).toBe("other");
        expect(classifyPgError(undefined)).toBe("other");
    });
});

describe("row decoding", () => {
    it("decodes rounds with timestamptz columns", () => {
        expect(decodeRound(roundRow)).toEqual({ id: 3, name: "R3", isActive: true, createdAt: Date.UTC(2024, 0, 1) });
    });

    it("decodes bigint counts sent as strings", () => {
        expect(decodeTally({ film_id: "7", title: "Heat", seen: "2", unseen: 0 })).toEqual({
            film: { id: 7, title: "Heat" },
            seen: 2,
            unseen: 0,
        });
    });

    it("throws a StoreError for malformed rows", () => {
        expect(() => decodeRound(null)).toThrow(StoreError);
        expect(() => decodeRound([roundRow])).toThrow(StoreError);
        expect(() => decodeRound({ ...roundRow, name: 5 })).toThrow("column name is not a string");
    });
});

describe("decodeCastVote", () => {
    it("returns the vote and tally on success", () => {
        const outcome = decodeCastVote({ status: "ok", round: roundRow, film: filmRow, vote: voteRow, seen: 1, unseen: "4" }, "42", 7);
        expect(outcome).toEqual({
            ok: true,
            value: {
                vote: { id: 11, userId: "42", filmId: 7, roundId: 3, seen: true, createdAt: Date.UTC(2024, 0, 1, 0, 0, 5) },
                film: { id: 7, title: "Heat" },
                round: { id: 3, name: "R3", isActive: true, createdAt: Date.UTC(2024, 0, 1) },
                tally: { seen: 1, unseen: 4 },
            },
        });
    });

    it("maps the failure statuses to ledger errors", () => {
        expect(decodeCastVote({ status: "no_active_round" }, "42", 7)).toEqual({ ok: false, error: { kind: "NoActiveRound" } });
        expect(decodeCastVote({ status: "film_not_found" }, "42", 7)).toEqual({
            ok: false,
            error: { kind: "NotFound", entity: "film", ref: 7 },
        });
        expect(decodeCastVote({ status: "duplicate", round: roundRow, film: filmRow, vote: voteRow }, "42", 8)).toEqual({
            ok: false,
            error: {
                kind: "DuplicateVote",
                existing: { film: { id: 7, title: "Heat" }, seen: true, round: { id: 3, name: "R3", isActive: true, createdAt: Date.UTC(2024, 0, 1) } },
            },
        });
    });

    it("rejects an unknown status", () => {
        expect(() => decodeCastVote({ status: "maybe" }, "42", 7)).toThrow("cast_vote returned unknown status maybe for user 42");
    });
});
