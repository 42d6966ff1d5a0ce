import type { BotConfig } from "../../config";
import type { FilmStore } from "./base";
import { SqliteFilmStore } from "./sqlite";
import { SupabaseFilmStore } from "./supabase";

// Supabase when both credentials are configured, local SQLite file otherwise
export function openStore(config: BotConfig): FilmStore {
    if (config.supabase) {
        console.log("[db] using supabase store");
        return new SupabaseFilmStore(config.supabase);
    }
    console.log(`[db] using sqlite store at ${config.dbPath}`);
    return new SqliteFilmStore({ path: config.dbPath, seedRoundName: config.defaultRoundName });
}

export type { FilmStore } from "./base";
export { StoreError } from "./base";
export { SqliteFilmStore } from "./sqlite";
export { SupabaseFilmStore } from "./supabase";
