import { SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import { helpText } from "../utils/messages";

export const data = new SlashCommandBuilder().setName("help").setDescription("How film night voting works");

export async function execute(interaction: ChatInputCommandInteraction) {
    await interaction.reply({ content: helpText(), ephemeral: true });
}
