import http from "http";
import { Client, GatewayIntentBits, REST, Routes } from "discord.js";
import dotenv from "dotenv";
import { loadConfig } from "./config";
import { commands, type BotContext } from "./commands";
import * as interactionCreate from "./events/interactionCreate";
import * as ready from "./events/ready";
import { openStore } from "./utils/db";
import { FilmLedger } from "./utils/ledger";
import { createDiscordAdminCheck } from "./utils/permissions";
dotenv.config();

const config = loadConfig(process.env);
const TOKEN = config.discordToken;

if (!TOKEN) {
    console.error("DISCORD_TOKEN is required in .env");
    process.exit(1);
}

const store = openStore(config);
const client = new Client({ intents: [GatewayIntentBits.Guilds] });
const ctx: BotContext = {
    ledger: new FilmLedger(store),
    isAdmin: createDiscordAdminCheck(client),
};

// register events
client.once(ready.name, (c) => {
    ready.execute(c, ctx).catch((err) => console.error("[bot] ready handler failed:", err));
});
client.on(interactionCreate.name, (interaction) => {
    interactionCreate.execute(interaction, ctx).catch((err) => console.error("[bot] interaction handler failed:", err));
});

async function registerCommands(token: string) {
    // register commands only if CLIENT_ID is set; otherwise warn but continue
    if (!config.clientId) {
        console.warn("[bot] CLIENT_ID not set, skipping command registration.");
        return;
    }
    const rest = new REST({ version: "10" }).setToken(token);
    const body = commands.map((c) => c.data.toJSON());
    const route = config.guildId
        ? Routes.applicationGuildCommands(config.clientId, config.guildId)
        : Routes.applicationCommands(config.clientId);
    try {
        console.log(`[bot] registering ${body.length} application commands...`);
        await rest.put(route, { body });
        console.log("[bot] commands registered.");
    } catch (err) {
        console.error("[bot] failed to register commands:", err);
    }
}

client
    .login(TOKEN)
    .then(() => registerCommands(TOKEN))
    .catch((err) => {
        console.error("[bot] login failed:", err);
        process.exit(1);
    });

// Small HTTP health + readiness server for hosts that expect a bound port
let shuttingDown = false;

const server = http.createServer((req, res) => {
    // readiness endpoint: 200 only if the bot is logged in and not shutting down
    if (req.url === "/healthz") {
        const isReady = client.isReady() && !shuttingDown;
        res.writeHead(isReady ? 200 : 503, { "Content-Type": "application/json" });
        res.end(
            JSON.stringify({
                status: isReady ? "ok" : "starting",
                uptime: process.uptime(),
                ts: new Date().toISOString(),
                botUser: client.user ? client.user.tag : null,
                store: store.kind,
            }) + "\n"
        );
        return;
    }

    // root / basic liveness endpoint
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end(shuttingDown ? "Shutting down\n" : "OK\n");
});

server.listen(config.port, () => {
    console.log(`[http] health server listening on port ${config.port}`);
});

// graceful shutdown: stop accepting requests, wait for in-flight work, then tear down
const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log("[bot] shutting down...");

    server.close(() => console.log("[http] server closed"));

    console.log(`[bot] waiting ${config.shutdownGraceMs}ms for in-flight work to finish...`);
    await new Promise((resolve) => setTimeout(resolve, config.shutdownGraceMs));

    try {
        await client.destroy();
        console.log("[bot] discord client destroyed");
    } catch (e) {
        console.error("[bot] error destroying discord client:", e);
    }
    try {
        await store.close();
        console.log("[db] store closed");
    } catch (e) {
        console.error("[db] error closing store:", e);
    }

    process.exit(0);
};

const onSignal = () => {
    shutdown().catch((err) => {
        console.error("[bot] shutdown failed:", err);
        process.exit(1);
    });
};
process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

// log unhandled errors so host logs show the cause
process.on("uncaughtException", (err) => {
    console.error("[bot] uncaughtException:", err);
});
process.on("unhandledRejection", (reason) => {
    console.error("[bot] unhandledRejection:", reason);
});
