import { describe, it, expect } from "vitest";
import { SEEN_REQUIRED, voteByButton, voteByOption } from "../../commands/vote";
import { voteButtonId, voteButtonPages } from "../../utils/buttons";
import { addFilms, createTestLedger, unwrap } from "../helpers/factories";

const titles = (n: number) => Array.from({ length: n }, (_, i) => `Film ${i + 1}`);

describe("/vote film option", () => {
    it("votes for a film that has no button", async () => {
        const { ledger } = createTestLedger();
        const films = await addFilms(ledger, ...titles(30));
        const round = unwrap(await ledger.startNewRound("R1"));
        const late = films[29];
        expect(voteButtonPages(films).flat()).toHaveLength(25);

        const reply = await voteByOption(ledger, "user-1", String(late.id), false);
        expect(reply.split("\n")).toEqual([
            "Vote recorded for **R1**!",
            "Film: **Film 30**",
            "Status: Not seen",
            "Tally for this film: 0 seen • 1 not seen",
        ]);
        expect(await ledger.findVote("user-1", round.id)).toMatchObject({ filmId: late.id, seen: false });
    });

    it("accepts a typed title", async () => {
        const { ledger } = createTestLedger();
        await addFilms(ledger, ...titles(27));
        unwrap(await ledger.startNewRound("R1"));

        const reply = await voteByOption(ledger, "user-2", " Film 26 ", true);
        expect(reply.split("\n")[1]).toBe("Film: **Film 26**");
    });

    it("reports an unknown film", async () => {
        const { ledger } = createTestLedger();
        unwrap(await ledger.startNewRound("R1"));
        expect(await voteByOption(ledger, "user-1", "Heat", true)).toBe("Film **Heat** was not found.");
    });

    it("keeps one vote per round", async () => {
        const { ledger } = createTestLedger();
        await addFilms(ledger, "A", "B");
        unwrap(await ledger.startNewRound("R1"));
        await voteByOption(ledger, "user-1", "A", true);

        expect(await voteByOption(ledger, "user-1", "B", false)).toBe(
            "You already voted in **R1**: **A** (Seen). Wait for the next round to vote again."
        );
    });

    it("asks for the seen choice", () => {
        expect(SEEN_REQUIRED).toBe("Tell me whether you have seen it with the `seen` option.");
    });
});

describe("vote buttons", () => {
    it("casts the vote encoded in the button", async () => {
        const { ledger } = createTestLedger();
        const [a] = await addFilms(ledger, "Alien");
        unwrap(await ledger.startNewRound("R1"));

        const reply = await voteByButton(ledger, "user-1", voteButtonId(a.id, true));
        expect(reply.split("\n")[2]).toBe("Status: Seen");
    });

    it("answers an unknown button instead of staying silent", async () => {
        const { ledger } = createTestLedger();
        unwrap(await ledger.startNewRound("R1"));

        expect(await voteByButton(ledger, "user-1", "end_btn:1")).toBe("Unknown button.");
        expect(await voteByButton(ledger, "user-1", "vote_btn:0:1")).toBe("Unknown button.");
    });
});
