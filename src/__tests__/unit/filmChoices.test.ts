import { describe, it, expect } from "vitest";
import { filmChoices, findFilmChoice } from "../../utils/filmChoices";

const films = Array.from({ length: 40 }, (_, i) => ({ id: i + 1, title: `Film ${i + 1}` }));

describe("filmChoices", () => {
    it("offers the first 25 films for an empty query", () => {
        const choices = filmChoices(films, "");
        expect(choices).toHaveLength(25);
        expect(choices[0]).toEqual({ name: "Film 1", value: "1" });
    });

    it("reaches films past the 25th by title", () => {
        expect(filmChoices(films, "film 3")).toEqual([
            { name: "Film 3", value: "3" },
            ...Array.from({ length: 10 }, (_, i) => ({ name: `Film ${30 + i}`, value: String(30 + i) })),
        ]);
    });

    it("shortens long titles to 100 characters", () => {
        const [choice] = filmChoices([{ id: 7, title: "q".repeat(150) }], "");
        expect(choice).toEqual({ name: `${"q".repeat(99)}…`, value: "7" });
    });
});

describe("findFilmChoice", () => {
    it("resolves an id or an exact title", () => {
        expect(findFilmChoice(films, "33")).toEqual({ id: 33, title: "Film 33" });
        expect(findFilmChoice(films, " Film 40 ")).toEqual({ id: 40, title: "Film 40" });
    });

    it("returns null for anything else", () => {
        expect(findFilmChoice(films, "film 40")).toBeNull();
        expect(findFilmChoice(films, "41")).toBeNull();
        expect(findFilmChoice(films, "")).toBeNull();
    });
});
