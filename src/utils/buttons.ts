import { ActionRowBuilder, ButtonBuilder, ButtonStyle } from "discord.js";
import type { Film } from "../types";

export const VOTE_BUTTON_PREFIX = "vote_btn";
// Discord allows five action rows per message; each film takes one row.
export const FILMS_PER_MESSAGE = 5;
export const MAX_VOTE_MESSAGES = 5;

const LABEL_LIMIT = 80;

// vote button: vote_btn:{filmId}:{1 = seen | 0 = not seen}
export function voteButtonId(filmId: number, seen: boolean) {
    return `${VOTE_BUTTON_PREFIX}:${filmId}:${seen ? 1 : 0}`;
}

export function parseVoteButton(customId: string): { filmId: number; seen: boolean } | null {
    const parts = customId.split(":");
    if (parts.length !== 3 || parts[0] !== VOTE_BUTTON_PREFIX) return null;
    if (!/^[1-9]\d*$/.test(parts[1])) return null;
    if (parts[2] !== "0" && parts[2] !== "1") return null;
    return { filmId: Number(parts[1]), seen: parts[2] === "1" };
}

function label(prefix: string, title: string) {
    const text = `${prefix}: ${title}`;
    return text.length <= LABEL_LIMIT ? text : `${text.slice(0, LABEL_LIMIT - 1)}…`;
}

/**
 * One row per film with a Seen and a Not seen button, grouped into messages of
 * FILMS_PER_MESSAGE rows. Films past MAX_VOTE_MESSAGES messages are left out.
 */
export function voteButtonPages(films: Film[]): ActionRowBuilder<ButtonBuilder>[][] {
    const pages: ActionRowBuilder<ButtonBuilder>[][] = [];
    const shown = films.slice(0, FILMS_PER_MESSAGE * MAX_VOTE_MESSAGES);
    for (let i = 0; i < shown.length; i += FILMS_PER_MESSAGE) {
        pages.push(
            shown.slice(i, i + FILMS_PER_MESSAGE).map((film) =>
                new ActionRowBuilder<ButtonBuilder>().addComponents(
                    new ButtonBuilder().setCustomId(voteButtonId(film.id, true)).setLabel(label("Seen", film.title)).setStyle(ButtonStyle.Secondary),
                    new ButtonBuilder().setCustomId(voteButtonId(film.id, false)).setLabel(label("Not seen", film.title)).setStyle(ButtonStyle.Primary)
                )
            )
        );
    }
    return pages;
}
