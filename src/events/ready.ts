import { Events, type Client } from "discord.js";
import type { BotContext } from "../commands";

export const name = Events.ClientReady;

export async function execute(client: Client<true>, ctx: BotContext) {
    console.log(`[bot] logged in as ${client.user.tag}`);
    const round = await ctx.ledger.activeRound();
    if (round) console.log(`[bot] active round: #${round.id} "${round.name}"`);
    else console.warn("[bot] no active round; votes are rejected until an admin runs /newround");
}
