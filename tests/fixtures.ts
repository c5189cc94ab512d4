import { submitAction } from "../src/engine/actions";
import { createInitialRoom } from "../src/engine/transitions";
import { GameRuleError } from "../src/engine/types";
import type { GameState, Player, PlayerAction, Role } from "../src/engine/types";

export const HOST_SECRET = "test-secret";

/** Player ids are derived from names so tests can act by name. */
export const idOf = (name: string) => `id-${name}`;

export const createPlayer = (name: string, role: Role | null = "villager", alive = true): Player => ({
  playerId: idOf(name),
  name,
  role,
  alive,
  mutedToday: false,
  princeRevealed: false
});

/** A started room on night 1 unless overridden. */
export function makeState(partial: Partial<GameState> = {}): GameState {
  return {
    ...createInitialRoom("1234", HOST_SECRET),
    started: true,
    phase: "night",
    nightNumber: 1,
    ...partial
  };
}

/** Submits a sequence of (actor, action) pairs in order. */
export function act(game: GameState, ...steps: [string, PlayerAction][]): GameState {
  return steps.reduce((state, [name, action]) => submitAction(state, idOf(name), action), game);
}

/** Error code thrown by `fn`, or null when it succeeds. */
export function errorCode(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof GameRuleError ? err.code : "UNEXPECTED";
  }
}

export const byName = (game: GameState, name: string): Player | undefined => game.players.find(p => p.name === name);
