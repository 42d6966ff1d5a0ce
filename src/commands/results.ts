import { SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import type { BotContext } from "./base";
import { resultsEmbed } from "../utils/embeds";
import { describeError } from "../utils/messages";

export const data = new SlashCommandBuilder()
    .setName("results")
    .setDescription("Show film scores for the current round")
    .addIntegerOption((o) => o.setName("round").setDescription("Round id (defaults to the active round)").setMinValue(1));

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
    await interaction.deferReply({ ephemeral: false });
    const roundId = interaction.options.getInteger("round");

    if (roundId === null) {
        const current = await ctx.ledger.currentResults();
        if (!current.ok) {
            await interaction.editReply({ content: describeError(current.error) });
            return;
        }
        await interaction.editReply({ embeds: [resultsEmbed(current.value.round, current.value.scores)] });
        return;
    }

    const round = await ctx.ledger.getRound(roundId);
    if (!round.ok) {
        await interaction.editReply({ content: describeError(round.error) });
        return;
    }
    const scores = await ctx.ledger.computeResults(roundId);
    if (!scores.ok) {
        await interaction.editReply({ content: describeError(scores.error) });
        return;
    }
    await interaction.editReply({ embeds: [resultsEmbed(round.value, scores.value)] });
}
