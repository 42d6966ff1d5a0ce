import type { Film } from "../types";

// Discord caps autocomplete at 25 choices, each name and value at 100 characters
export const MAX_CHOICES = 25;
const CHOICE_NAME_LIMIT = 100;

export interface FilmChoice {
    name: string;
    value: string;
}

/**
 * Autocomplete choices for the /vote `film` option. The value is the film id,
 * so titles of any length resolve back to one film.
 */
export function filmChoices(films: Film[], query: string): FilmChoice[] {
    const q = query.trim().toLowerCase();
    return films
        .filter((f) => !q || f.title.toLowerCase().includes(q) || String(f.id) === q)
        .slice(0, MAX_CHOICES)
        .map((f) => ({
            name: f.title.length <= CHOICE_NAME_LIMIT ? f.title : `${f.title.slice(0, CHOICE_NAME_LIMIT - 1)}…`,
            value: String(f.id),
        }));
}

// A picked choice carries the id; a typed value is matched against titles.
export function findFilmChoice(films: Film[], value: string): Film | null {
    const v = value.trim();
    if (/^[1-9]\d*$/.test(v)) {
        const byId = films.find((f) => f.id === Number(v));
        if (byId) return byId;
    }
    return films.find((f) => f.title === v) ?? null;
}
