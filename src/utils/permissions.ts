import { type ChatInputCommandInteraction, type Client, PermissionFlagsBits } from "discord.js";

// Injected capability check; the ledger never decides who is an admin.
export type AdminCheck = (userId: string, guildId: string) => Promise<boolean>;

// Admins are members with Manage Server in the guild the command came from.
export function createDiscordAdminCheck(client: Client): AdminCheck {
    return async (userId, guildId) => {
        try {
            const guild = await client.guilds.fetch(guildId);
            const member = await guild.members.fetch(userId);
            return member.permissions.has(PermissionFlagsBits.ManageGuild);
        } catch (err) {
            console.warn(`[bot] admin check failed for user ${userId} in guild ${guildId}:`, err);
            return false;
        }
    };
}

export async function ensureAdmin(interaction: ChatInputCommandInteraction, isAdmin: AdminCheck, action: string) {
    const allowed = interaction.guildId ? await isAdmin(interaction.user.id, interaction.guildId) : false;
    if (!allowed) await interaction.editReply({ content: `Sorry, only admins can ${action}.` });
    return allowed;
}
