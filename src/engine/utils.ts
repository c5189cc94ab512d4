/** Utility helpers shared across engine modules. */
import { GameRuleError } from "./types";
import type { GameState, LoggedAction, Phase, Player, Role } from "./types";

export type RandomFn = () => number;

/** Default RNG, override in tests for determinism. */
export const defaultRandom: RandomFn = () => Math.random();

/** Fisher-Yates shuffle (pure). */
export function shuffle<T>(items: readonly T[], random: RandomFn = defaultRandom): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/** Deep clone players list (shallow per player). */
export function clonePlayers(players: Player[]): Player[] {
  return players.map(player => ({ ...player }));
}

/** Counts alive players, optionally filtered by role. */
export function countAlive(players: Player[], role?: Role): number {
  return players.filter(p => p.alive && (!role || p.role === role)).length;
}

/** Returns only the living players. */
export function livingPlayers(players: Player[]): Player[] {
  return players.filter(p => p.alive);
}

/** Safe player lookup, null when missing. */
export function getPlayer(players: Player[], playerId: string): Player | null {
  return players.find(p => p.playerId === playerId) ?? null;
}

/** Targets are addressed by display name; names are unique per room. */
export function findPlayerByName(players: Player[], name: string): Player | null {
  return players.find(p => p.name === name) ?? null;
}

/** Rejects any mutation once a faction has won. */
export function ensureNotEnded(game: GameState): void {
  if (game.winner) {
    throw new GameRuleError("GAME_ENDED", `The game is over: ${game.winner} won`);
  }
}

/**
 * Ensures the room is in one of the allowed phases before continuing.
 * Throws a GameRuleError if the guard fails.
 */
export function ensurePhase(game: GameState, expected: Phase | Phase[], message: string): void {
  const allowed = Array.isArray(expected) ? expected : [expected];
  if (!allowed.includes(game.phase)) {
    throw new GameRuleError("INVALID_PHASE", message);
  }
}

/** Looks up a player or throws NOT_FOUND. */
export function requirePlayer(game: GameState, playerId: string): Player {
  const player = getPlayer(game.players, playerId);
  if (!player) {
    throw new GameRuleError("NOT_FOUND", `Player ${playerId} is not in room ${game.code}`);
  }
  return player;
}

/** Keeps only the latest entry per sender, ordered by log position. */
export function lastPerPlayer<T extends LoggedAction>(entries: T[]): T[] {
  const latest = new Map<string, T>();
  for (const entry of entries) {
    latest.set(entry.playerId, entry);
  }
  return [...latest.values()].sort((a, b) => a.seq - b.seq);
}

export interface Tally {
  candidate: string | null;
  counts: Record<string, number>;
}

/**
 * Counts one ballot per (target, entry) pair in log order.
 * Ties go to the target whose first counted ballot sits earliest in the log.
 */
export function tallyTargets(ballots: { seq: number; target: string }[]): Tally {
  const ordered = [...ballots].sort((a, b) => a.seq - b.seq);
  const counts = new Map<string, number>();
  for (const ballot of ordered) {
    counts.set(ballot.target, (counts.get(ballot.target) ?? 0) + 1);
  }

  let candidate: string | null = null;
  let best = 0;
  for (const [target, count] of counts) {
    if (count > best) {
      best = count;
      candidate = target;
    }
  }
  return { candidate, counts: Object.fromEntries(counts) };
}
