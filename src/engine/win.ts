import type { GameState, Winner } from "./types";
import { countAlive, livingPlayers } from "./utils";

/**
 * Derives the winning faction from the living roster. Never cached.
 * - Village wins once no werewolf is alive and someone else is.
 * - Werewolves win on parity (wolvesAlive >= othersAlive).
 */
export function checkWin(state: GameState): Winner | null {
  const wolvesAlive = countAlive(state.players, "werewolf");
  const othersAlive = livingPlayers(state.players).length - wolvesAlive;

  if (wolvesAlive === 0 && othersAlive > 0) return "village";
  if (wolvesAlive > 0 && wolvesAlive >= othersAlive) return "werewolves";
  return null;
}

/** Applies the win check to a freshly resolved snapshot, ending the game when a faction has won. */
export function settleWinner(state: GameState): GameState {
  const winner = checkWin(state);
  if (!winner) return state;
  return {
    ...state,
    phase: "ended",
    winner,
    activeCall: null,
    votingStatus: "idle",
    voteDurationSec: null
  };
}
