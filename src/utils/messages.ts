import type { CastVote, ExistingVote, LedgerError } from "../types";
import { SEEN_WEIGHT, UNSEEN_WEIGHT } from "./scoring";

export function choiceLabel(seen: boolean) {
    return seen ? "Seen" : "Not seen";
}

export function formatScore(score: number) {
    return score.toFixed(1);
}

// User-facing text for every ledger error; the ledger itself never formats text.
export function describeError(error: LedgerError): string {
    switch (error.kind) {
        case "DuplicateFilm":
            return `Film **${error.title}** is already on the list.`;
        case "DuplicateVote":
            return alreadyVoted(error.existing);
        case "NotFound":
            return error.entity === "film" ? `Film **${error.ref}** was not found.` : `Round **${error.ref}** was not found.`;
        case "NoActiveRound":
            return "There is no active round. Ask an admin to start one with /newround.";
        case "InvalidInput":
            return `Invalid ${error.field}: ${error.reason}.`;
        case "FilmInUse":
            return `Film **${error.film.title}** has ${error.votes} vote(s) and cannot be deleted.`;
    }
}

export function alreadyVoted(existing: ExistingVote) {
    return `You already voted in **${existing.round.name}**: **${existing.film.title}** (${choiceLabel(existing.seen)}). Wait for the next round to vote again.`;
}

export function voteConfirmation(cast: CastVote) {
    return [
        `Vote recorded for **${cast.round.name}**!`,
        `Film: **${cast.film.title}**`,
        `Status: ${choiceLabel(cast.vote.seen)}`,
        `Tally for this film: ${cast.tally.seen} seen • ${cast.tally.unseen} not seen`,
    ].join("\n");
}

export const UNKNOWN_BUTTON = "Unknown button.";

export function scoringRule() {
    return `Scoring: Seen = ${formatScore(SEEN_WEIGHT)} points, Not seen = ${formatScore(UNSEEN_WEIGHT)} points`;
}

export function helpText() {
    return [
        "**Film night voting**",
        "Propose films, vote for ONE film per round, and see which one wins.",
        "",
        "`/vote [film] [seen]` vote for one film in the current round",
        "`/films` list the films",
        "`/results [round]` scores for the current (or given) round",
        "`/winner [round]` top-scoring film",
        "`/rounds` list all rounds",
        "`/addfilm <title>` add a film (admin)",
        "`/deletefilm <title>` delete a film without votes (admin)",
        "`/newround <name>` start a new round (admin)",
        "",
        scoringRule(),
    ].join("\n");
}
