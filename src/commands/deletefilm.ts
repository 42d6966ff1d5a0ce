import { PermissionFlagsBits, SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import type { BotContext } from "./base";
import { MAX_TITLE_LENGTH } from "../utils/ledger";
import { describeError } from "../utils/messages";
import { ensureAdmin } from "../utils/permissions";

export const data = new SlashCommandBuilder()
    .setName("deletefilm")
    .setDescription("Delete a film that has no votes (admin only)")
    .addStringOption((o) => o.setName("title").setDescription("Exact film title").setRequired(true).setMaxLength(MAX_TITLE_LENGTH))
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild);

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
    await interaction.deferReply({ ephemeral: true });
    if (!(await ensureAdmin(interaction, ctx.isAdmin, "delete films"))) return;

    const result = await ctx.ledger.deleteFilm(interaction.options.getString("title", true));
    if (!result.ok) {
        await interaction.editReply({ content: describeError(result.error) });
        return;
    }
    await interaction.editReply({ content: `Film **${result.value.title}** deleted.` });
}
