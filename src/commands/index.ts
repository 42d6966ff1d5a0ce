import type { Command } from "./base";
import * as addFilm from "./addfilm";
import * as deleteFilm from "./deletefilm";
import * as films from "./films";
import * as help from "./help";
import * as newRound from "./newround";
import * as results from "./results";
import * as rounds from "./rounds";
import * as vote from "./vote";
import * as winner from "./winner";

export const commands: Command[] = [help, addFilm, deleteFilm, films, vote, results, winner, newRound, rounds];

export function findCommand(name: string): Command | undefined {
    return commands.find((c) => c.data.name === name);
}

export type { BotContext, Command } from "./base";
