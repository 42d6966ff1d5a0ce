import { SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import type { BotContext } from "./base";
import { winnerEmbed } from "../utils/embeds";
import { describeError } from "../utils/messages";

export const data = new SlashCommandBuilder()
    .setName("winner")
    .setDescription("Show the top-scoring film")
    .addIntegerOption((o) => o.setName("round").setDescription("Round id (defaults to the active round)").setMinValue(1));

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
    await interaction.deferReply({ ephemeral: false });
    const roundId = interaction.options.getInteger("round");

    if (roundId === null) {
        const current = await ctx.ledger.currentWinner();
        if (!current.ok) {
            await interaction.editReply({ content: describeError(current.error) });
            return;
        }
        await interaction.editReply({ embeds: [winnerEmbed(current.value.round, current.value.winner)] });
        return;
    }

    const round = await ctx.ledger.getRound(roundId);
    if (!round.ok) {
        await interaction.editReply({ content: describeError(round.error) });
        return;
    }
    const winner = await ctx.ledger.winner(roundId);
    if (!winner.ok) {
        await interaction.editReply({ content: describeError(winner.error) });
        return;
    }
    await interaction.editReply({ embeds: [winnerEmbed(round.value, winner.value)] });
}
