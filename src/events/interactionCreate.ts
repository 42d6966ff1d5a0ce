import { Events, type ButtonInteraction, type Interaction, type RepliableInteraction } from "discord.js";
import { findCommand, type BotContext } from "../commands";
import { voteByButton } from "../commands/vote";

export const name = Events.InteractionCreate;

async function replyError(interaction: RepliableInteraction, content: string) {
    try {
        if (interaction.deferred || interaction.replied) await interaction.editReply({ content });
        else await interaction.reply({ content, ephemeral: true });
    } catch (err) {
        console.error("[bot] could not send error reply:", err);
    }
}

async function handleVoteButton(interaction: ButtonInteraction, ctx: BotContext) {
    await interaction.deferReply({ ephemeral: true });
    const content = await voteByButton(ctx.ledger, interaction.user.id, interaction.customId);
    await interaction.editReply({ content });
}

export async function execute(interaction: Interaction, ctx: BotContext) {
    // film suggestions for /vote
    if (interaction.isAutocomplete()) {
        const command = findCommand(interaction.commandName);
        try {
            if (command?.autocomplete) await command.autocomplete(interaction, ctx);
            else await interaction.respond([]);
        } catch (err) {
            console.error(`[bot] /${interaction.commandName} autocomplete failed:`, err);
        }
        return;
    }

    // Slash command handling
    if (interaction.isChatInputCommand()) {
        const command = findCommand(interaction.commandName);
        if (!command) {
            await interaction.reply({ content: "Command not found.", ephemeral: true });
            return;
        }
        try {
            await command.execute(interaction, ctx);
        } catch (err) {
            console.error(`[bot] /${interaction.commandName} failed:`, err);
            await replyError(interaction, "There was an error executing that command.");
        }
        return;
    }

    // vote buttons from /vote
    if (interaction.isButton()) {
        try {
            await handleVoteButton(interaction, ctx);
        } catch (err) {
            console.error("[bot] button interaction error:", err);
            await replyError(interaction, "There was an error processing your button press.");
        }
    }
}
