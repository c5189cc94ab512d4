import { actionsInCycle, ofKind } from "./actions";
import { GameRuleError } from "./types";
import type { GameState, LynchOutcome } from "./types";
import { clonePlayers, ensureNotEnded, ensurePhase, findPlayerByName, lastPerPlayer, tallyTargets } from "./utils";
import type { Tally } from "./utils";
import { settleWinner } from "./win";

/**
 * Live lynch tally for the current day: every voter's latest `vote_lynch` counts once.
 * Read-only; the host previews it while voting is open.
 */
export function tallyVotes(game: GameState): Tally {
  const today = actionsInCycle(game, "day", game.dayNumber);
  const ballots = lastPerPlayer(ofKind(today, ["vote_lynch"])).map(entry => ({
    seq: entry.seq,
    target: entry.action.target
  }));
  return tallyTargets(ballots);
}

/**
 * Resolves the day's vote. The top target dies unless they are an unrevealed prince,
 * who is revealed and spared exactly once. Voting state resets either way, then the
 * win check runs.
 */
export function resolveDay(game: GameState): GameState {
  ensureNotEnded(game);
  ensurePhase(game, "day", "Day resolution only runs during the day");
  if (game.resolvedDay === game.dayNumber) {
    throw new GameRuleError("INVALID_PHASE", `Day ${game.dayNumber} was already resolved`);
  }

  const players = clonePlayers(game.players);
  const { candidate } = tallyVotes(game);
  const target = candidate === null ? null : findPlayerByName(players, candidate);

  let lastLynch: LynchOutcome = { day: game.dayNumber, target: null, lynched: false, princeRevealed: false };
  if (target?.alive) {
    if (target.role === "prince" && !target.princeRevealed) {
      target.princeRevealed = true;
      lastLynch = { ...lastLynch, target: target.name, princeRevealed: true };
    } else {
      target.alive = false;
      lastLynch = { ...lastLynch, target: target.name, lynched: true };
    }
  }

  return settleWinner({
    ...game,
    players,
    lastLynch,
    activeCall: null,
    votingStatus: "idle",
    voteDurationSec: null,
    resolvedDay: game.dayNumber
  });
}

/** Host-facing announcement for a lynch outcome. */
export function describeLynch(outcome: LynchOutcome): string {
  if (outcome.target === null) return "Nobody was lynched.";
  if (outcome.princeRevealed) return `${outcome.target} is the Prince! Spared this time.`;
  return `${outcome.target} was lynched.`;
}
