import { SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import type { BotContext } from "./base";
import { filmListEmbed } from "../utils/embeds";

export const data = new SlashCommandBuilder().setName("films").setDescription("List the films");

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
    await interaction.deferReply({ ephemeral: false });
    const films = await ctx.ledger.listFilms();
    await interaction.editReply({ embeds: [filmListEmbed(films)] });
}
