import type { AutocompleteInteraction, ChatInputCommandInteraction } from "discord.js";
import type { FilmLedger } from "../utils/ledger";
import type { AdminCheck } from "../utils/permissions";

export interface BotContext {
    ledger: FilmLedger;
    isAdmin: AdminCheck;
}

export interface Command {
    data: { name: string; toJSON(): unknown };
    execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void>;
    autocomplete?(interaction: AutocompleteInteraction, ctx: BotContext): Promise<void>;
}
