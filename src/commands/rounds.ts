import { SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import type { BotContext } from "./base";
import { roundsEmbed } from "../utils/embeds";

export const data = new SlashCommandBuilder().setName("rounds").setDescription("List all voting rounds");

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
    await interaction.deferReply({ ephemeral: false });
    const rounds = await ctx.ledger.listRounds();
    await interaction.editReply({ embeds: [roundsEmbed(rounds)] });
}
