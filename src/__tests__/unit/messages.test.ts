import { describe, it, expect } from "vitest";
import { describeError, helpText, voteConfirmation } from "../../utils/messages";

const round = { id: 2, name: "Week 2", isActive: true, createdAt: 0 };
const film = { id: 1, title: "Alien" };

describe("describeError", () => {
    it("has a message for every error kind", () => {
        expect(describeError({ kind: "DuplicateFilm", title: "Alien" })).toBe("Film **Alien** is already on the list.");
        expect(describeError({ kind: "DuplicateVote", existing: { film, seen: false, round } })).toBe(
            "You already voted in **Week 2**: **Alien** (Not seen). Wait for the next round to vote again."
        );
        expect(describeError({ kind: "NotFound", entity: "film", ref: "Heat" })).toBe("Film **Heat** was not found.");
        expect(describeError({ kind: "NotFound", entity: "round", ref: 9 })).toBe("Round **9** was not found.");
        expect(describeError({ kind: "NoActiveRound" })).toBe("There is no active round. Ask an admin to start one with /newround.");
        expect(describeError({ kind: "InvalidInput", field: "title", reason: "must not be empty" })).toBe("Invalid title: must not be empty.");
        expect(describeError({ kind: "FilmInUse", film, votes: 3 })).toBe("Film **Alien** has 3 vote(s) and cannot be deleted.");
    });
});

describe("voteConfirmation", () => {
    it("shows the film, the choice and the tally", () => {
        const text = voteConfirmation({
            vote: { id: 5, userId: "1", filmId: 1, roundId: 2, seen: true, createdAt: 0 },
            film,
            round,
            tally: { seen: 2, unseen: 1 },
        });
        expect(text.split("\n")).toEqual([
            "Vote recorded for **Week 2**!",
            "Film: **Alien**",
            "Status: Seen",
            "Tally for this film: 2 seen • 1 not seen",
        ]);
    });
});

describe("helpText", () => {
    it("ends with the scoring rule", () => {
        const lines = helpText().split("\n");
        expect(lines[lines.length - 1]).toBe("Scoring: Seen = 0.5 points, Not seen = 1.0 points");
        expect(lines).toContain("`/vote [film] [seen]` vote for one film in the current round");
    });
});
