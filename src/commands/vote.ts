import { SlashCommandBuilder, type AutocompleteInteraction, type ChatInputCommandInteraction } from "discord.js";
import type { BotContext } from "./base";
import { FILMS_PER_MESSAGE, MAX_VOTE_MESSAGES, parseVoteButton, voteButtonPages } from "../utils/buttons";
import { filmChoices, findFilmChoice } from "../utils/filmChoices";
import type { FilmLedger } from "../utils/ledger";
import { alreadyVoted, describeError, UNKNOWN_BUTTON, voteConfirmation } from "../utils/messages";

/**
 * /vote [film] [seen]
 * Without options, shows a Seen / Not seen pair of buttons for the first films
 * (handled in events/interactionCreate). With `film` and `seen`, votes for any
 * film directly; `film` autocompletes over the whole list.
 */
export const data = new SlashCommandBuilder()
    .setName("vote")
    .setDescription("Vote for ONE film in the current round")
    .addStringOption((o) => o.setName("film").setDescription("Film to vote for").setAutocomplete(true))
    .addBooleanOption((o) => o.setName("seen").setDescription("Have you already seen it?"));

export const SEEN_REQUIRED = "Tell me whether you have seen it with the `seen` option.";

export async function voteByOption(ledger: FilmLedger, userId: string, filmOption: string, seen: boolean) {
    const film = findFilmChoice(await ledger.listFilms(), filmOption);
    if (!film) return describeError({ kind: "NotFound", entity: "film", ref: filmOption.trim() });
    const result = await ledger.castVote(userId, film.id, seen);
    return result.ok ? voteConfirmation(result.value) : describeError(result.error);
}

export async function voteByButton(ledger: FilmLedger, userId: string, customId: string) {
    const parsed = parseVoteButton(customId);
    if (!parsed) return UNKNOWN_BUTTON;
    const result = await ledger.castVote(userId, parsed.filmId, parsed.seen);
    return result.ok ? voteConfirmation(result.value) : describeError(result.error);
}

export async function autocomplete(interaction: AutocompleteInteraction, ctx: BotContext) {
    const films = await ctx.ledger.listFilms();
    await interaction.respond(filmChoices(films, interaction.options.getFocused()));
}

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
    await interaction.deferReply({ ephemeral: true });

    const filmOption = interaction.options.getString("film");
    if (filmOption !== null) {
        const seen = interaction.options.getBoolean("seen");
        const content = seen === null ? SEEN_REQUIRED : await voteByOption(ctx.ledger, interaction.user.id, filmOption, seen);
        await interaction.editReply({ content });
        return;
    }

    const round = await ctx.ledger.activeRound();
    if (!round) {
        await interaction.editReply({ content: describeError({ kind: "NoActiveRound" }) });
        return;
    }

    const existing = await ctx.ledger.findVote(interaction.user.id, round.id);
    if (existing) {
        const film = await ctx.ledger.getFilm(existing.filmId);
        if (film.ok) {
            await interaction.editReply({ content: alreadyVoted({ film: film.value, seen: existing.seen, round }) });
            return;
        }
    }

    const films = await ctx.ledger.listFilms();
    if (!films.length) {
        await interaction.editReply({ content: "No films available. Ask an admin to add some!" });
        return;
    }

    const [first, ...rest] = voteButtonPages(films);
    const hidden = films.length - FILMS_PER_MESSAGE * MAX_VOTE_MESSAGES;
    await interaction.editReply({
        content: `Vote for **${round.name}**! Choose ONE film and tap **Seen** or **Not seen**.`,
        components: first,
    });
    for (const components of rest) {
        await interaction.followUp({ components, ephemeral: true });
    }
    if (hidden > 0) {
        await interaction.followUp({
            content: `${hidden} more film(s) are not on the buttons. Use \`/vote film:<title> seen:<true|false>\` to vote for them.`,
            ephemeral: true,
        });
    }
}
