import path from "path";

export interface BotConfig {
    discordToken?: string;
    clientId?: string;
    // register commands to one guild (instant) instead of globally
    guildId?: string;
    dbPath: string;
    // seeded as the first active round when none exists; undefined disables seeding
    defaultRoundName?: string;
    supabase?: { url: string; serviceKey: string };
    port: number;
    shutdownGraceMs: number;
}

export const DEFAULT_DB_PATH = path.join(__dirname, "../data/film-voting.db");

function nonNegativeInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw === "") return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < 0) {
        console.warn(`[config] ${key}=${raw} is not a valid number, using ${fallback}`);
        return fallback;
    }
    return n;
}

function optional(env: NodeJS.ProcessEnv, key: string): string | undefined {
    const v = env[key]?.trim();
    return v ? v : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv): BotConfig {
    const supabaseUrl = optional(env, "SUPABASE_URL");
    const supabaseKey = optional(env, "SUPABASE_SERVICE_KEY");
    if (Boolean(supabaseUrl) !== Boolean(supabaseKey)) {
        console.warn("[config] SUPABASE_URL and SUPABASE_SERVICE_KEY must both be set, falling back to sqlite");
    }

    return {
        discordToken: optional(env, "DISCORD_TOKEN"),
        clientId: optional(env, "CLIENT_ID"),
        guildId: optional(env, "GUILD_ID"),
        dbPath: optional(env, "DB_PATH") ?? DEFAULT_DB_PATH,
        // unset -> "Round 1", explicitly empty -> no seeding
        defaultRoundName: env.DEFAULT_ROUND_NAME === undefined ? "Round 1" : optional(env, "DEFAULT_ROUND_NAME"),
        supabase: supabaseUrl && supabaseKey ? { url: supabaseUrl, serviceKey: supabaseKey } : undefined,
        port: nonNegativeInt(env, "PORT", 3000),
        shutdownGraceMs: nonNegativeInt(env, "SHUTDOWN_GRACE_MS", 10000),
    };
}
