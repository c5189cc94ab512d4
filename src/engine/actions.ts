import { GameRuleError } from "./types";
import type { ActionKind, GameState, LoggedAction, PlayerAction } from "./types";
import { ensureNotEnded, requirePlayer } from "./utils";

/** Every action kind a client may submit. */
export const ACTION_KINDS = [
  "mage_mute",
  "guard_protect",
  "wolf_kill",
  "seer_inspect",
  "witch_heal",
  "witch_no_heal",
  "witch_poison",
  "witch_no_poison",
  "gambler_bet",
  "gambler_skip",
  "vote_lynch"
] as const satisfies readonly ActionKind[];

/** Log entry narrowed to a subset of action kinds. */
export type Logged<K extends ActionKind> = Omit<LoggedAction, "action"> & { action: Extract<PlayerAction, { kind: K }> };

/**
 * Builds a typed action from a loose (kind, target) pair.
 * Kinds that aim at someone require a non-blank target; the rest ignore it.
 */
export function toAction(kind: ActionKind, target?: string | null): PlayerAction {
  switch (kind) {
    case "witch_heal":
    case "witch_no_heal":
    case "witch_no_poison":
    case "gambler_skip":
      return { kind };
    case "mage_mute":
    case "guard_protect":
    case "wolf_kill":
    case "seer_inspect":
    case "witch_poison":
    case "gambler_bet":
    case "vote_lynch": {
      const name = target?.trim();
      if (!name) {
        throw new GameRuleError("VALIDATION_ERROR", `Action ${kind} requires a target`);
      }
      return { kind, target: name };
    }
    default: {
      const exhaustive: never = kind;
      throw new GameRuleError("VALIDATION_ERROR", `Unknown action ${exhaustive}`);
    }
  }
}

/** Night number while it is night, day number while it is day, null otherwise. */
export function currentCycle(game: GameState): number | null {
  if (game.phase === "night") return game.nightNumber;
  if (game.phase === "day") return game.dayNumber;
  return null;
}

/**
 * Appends an action to the log, stamped with the room's current phase and cycle.
 * Neither the kind nor the target is checked against the room: resolvers filter by kind
 * and skip names that match no living player, so such submissions are inert.
 */
export function submitAction(game: GameState, playerId: string, action: PlayerAction): GameState {
  const player = requirePlayer(game, playerId);
  if (!player.alive) {
    throw new GameRuleError("DEAD_PLAYER", `${player.name} is dead and cannot act`);
  }
  ensureNotEnded(game);

  const entry: LoggedAction = {
    seq: game.actions.length,
    playerId: player.playerId,
    action,
    phase: game.phase,
    cycle: currentCycle(game)
  };
  return { ...game, actions: [...game.actions, entry] };
}

/** Entries submitted during the given night or day. */
export function actionsInCycle(game: GameState, phase: "night" | "day", cycle: number): LoggedAction[] {
  return game.actions.filter(entry => entry.phase === phase && entry.cycle === cycle);
}

export function ofKind<K extends ActionKind>(entries: LoggedAction[], kinds: readonly K[]): Logged<K>[] {
  const wanted: readonly ActionKind[] = kinds;
  return entries.filter((entry): entry is Logged<K> => wanted.includes(entry.action.kind));
}

/** Most recent entry among `kinds`, or null. Implements last-submitted-wins for a decision slot. */
export function lastOfKind<K extends ActionKind>(entries: LoggedAction[], kinds: readonly K[]): Logged<K> | null {
  const matching = ofKind(entries, kinds);
  return matching.length > 0 ? matching[matching.length - 1] : null;
}
