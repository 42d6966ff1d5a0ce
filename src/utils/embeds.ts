import { EmbedBuilder } from "discord.js";
import type { Film, FilmScore, Round } from "../types";
import { formatScore, scoringRule } from "./messages";

const MEDALS = ["🥇", "🥈", "🥉"];

// Discord rejects embeds past these lengths
export const FIELD_VALUE_LIMIT = 1024;
export const DESCRIPTION_LIMIT = 4096;
const BAR_LABEL_LIMIT = 20;

/**
 * Joins lines while the text stays within `limit`. Lines that do not fit are
 * replaced by a final "…and N more" line.
 */
export function clipLines(lines: string[], limit: number) {
    const full = lines.join("\n");
    if (full.length <= limit) return full;

    const kept: string[] = [];
    let length = 0;
    for (const line of lines) {
        const next = length + (kept.length ? 1 : 0) + line.length;
        const more = `…and ${lines.length - kept.length - 1} more`;
        if (next + 1 + more.length > limit) break;
        kept.push(line);
        length = next;
    }
    return [...kept, `…and ${lines.length - kept.length} more`].join("\n");
}

function clipLabel(label: string) {
    return label.length <= BAR_LABEL_LIMIT ? label : `${label.slice(0, BAR_LABEL_LIMIT - 1)}…`;
}

export function makeBar(entries: { label: string; value: number }[], total: number) {
    const labels = entries.map((e) => clipLabel(e.label));
    const maxLabel = Math.max(...labels.map((l) => l.length), 4);
    const lines = entries.map(({ value }, i) => {
        const pct = total === 0 ? 0 : value / total;
        const barLen = Math.round(pct * 20);
        const bar = "█".repeat(barLen) + "░".repeat(20 - barLen);
        const pctStr = `${Math.round(pct * 100)}%`.padStart(4, " ");
        return `\`${labels[i].padEnd(maxLabel)}\` ${bar} ${formatScore(value)} (${pctStr})`;
    });
    return clipLines(lines, FIELD_VALUE_LIMIT);
}

export function filmListEmbed(films: Film[]) {
    return new EmbedBuilder()
        .setTitle("Films")
        .setDescription(
            films.length
                ? clipLines(
                      films.map((f, i) => `${i + 1}. ${f.title}`),
                      DESCRIPTION_LIMIT
                  )
                : "No films yet. Ask an admin to add some!"
        )
        .setColor(0x00ae86);
}

export function resultsEmbed(round: Round, scores: FilmScore[]) {
    const e = new EmbedBuilder()
        .setTitle(`Results: ${round.name}`)
        .setColor(0x0099ff)
        .setFooter({ text: scoringRule() });
    if (!scores.length) return e.setDescription("No votes yet in this round.");

    const lines = scores.map(
        (s, i) => `${MEDALS[i] ?? "📊"} **${s.film.title}**: ${formatScore(s.score)} points (${s.seen} seen • ${s.unseen} not seen)`
    );
    const total = scores.reduce((sum, s) => sum + s.score, 0);
    const bar = makeBar(
        scores.map((s) => ({ label: s.film.title, value: s.score })),
        total
    );
    return e.setDescription(clipLines(lines, DESCRIPTION_LIMIT)).addFields({ name: "Results (visual)", value: bar });
}

export function winnerEmbed(round: Round, winner: FilmScore | null) {
    const e = new EmbedBuilder().setTitle(`Winner: ${round.name}`).setColor(0x00ff99);
    if (!winner) return e.setDescription("No votes yet in this round.");
    return e.setDescription(`👑 **${winner.film.title}**\nScore: **${formatScore(winner.score)}** points`);
}

export function roundsEmbed(rounds: Round[]) {
    const lines = rounds.map((r) => `#${r.id} ${r.name} (<t:${Math.floor(r.createdAt / 1000)}:d>)${r.isActive ? " **(active)**" : ""}`);
    return new EmbedBuilder()
        .setTitle("Rounds")
        .setDescription(lines.length ? clipLines(lines, DESCRIPTION_LIMIT) : "No rounds yet.")
        .setColor(0x00ae86);
}
