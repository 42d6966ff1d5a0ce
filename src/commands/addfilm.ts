import { PermissionFlagsBits, SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import type { BotContext } from "./base";
import { MAX_TITLE_LENGTH } from "../utils/ledger";
import { describeError } from "../utils/messages";
import { ensureAdmin } from "../utils/permissions";

export const data = new SlashCommandBuilder()
    .setName("addfilm")
    .setDescription("Add a film to vote on (admin only)")
    .addStringOption((o) => o.setName("title").setDescription("Film title").setRequired(true).setMaxLength(MAX_TITLE_LENGTH))
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild);

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
    await interaction.deferReply({ ephemeral: true });
    if (!(await ensureAdmin(interaction, ctx.isAdmin, "add films"))) return;

    const result = await ctx.ledger.addFilm(interaction.options.getString("title", true));
    if (!result.ok) {
        await interaction.editReply({ content: describeError(result.error) });
        return;
    }
    await interaction.editReply({ content: `Film **${result.value.title}** added!` });
}
