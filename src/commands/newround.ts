import { PermissionFlagsBits, SlashCommandBuilder, type ChatInputCommandInteraction } from "discord.js";
import type { BotContext } from "./base";
import { MAX_ROUND_NAME_LENGTH } from "../utils/ledger";
import { describeError } from "../utils/messages";
import { ensureAdmin } from "../utils/permissions";

export const data = new SlashCommandBuilder()
    .setName("newround")
    .setDescription("Start a new voting round (admin only)")
    .addStringOption((o) => o.setName("name").setDescription("Round name").setRequired(true).setMaxLength(MAX_ROUND_NAME_LENGTH))
    .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild);

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
    await interaction.deferReply({ ephemeral: false });
    if (!(await ensureAdmin(interaction, ctx.isAdmin, "start new rounds"))) return;

    const result = await ctx.ledger.startNewRound(interaction.options.getString("name", true));
    if (!result.ok) {
        await interaction.editReply({ content: describeError(result.error) });
        return;
    }
    await interaction.editReply({ content: `Round **${result.value.name}** has started! Everyone can vote again with /vote.` });
}
