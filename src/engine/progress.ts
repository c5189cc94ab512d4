import { actionsInCycle, ofKind } from "./actions";
import { CALLABLE_ROLES, GameRuleError } from "./types";
import type { ActionKind, CallableRole, GameState } from "./types";

export interface RoleProgress {
  pending: string[];
  done: boolean;
}

/** Kinds that count as "acted" for each single-decision role. */
const DONE_KINDS: Record<Exclude<CallableRole, "witch">, readonly ActionKind[]> = {
  mage: ["mage_mute"],
  guard: ["guard_protect"],
  werewolf: ["wolf_kill"],
  seer: ["seer_inspect"],
  gambler: ["gambler_bet", "gambler_skip"]
};

const HEAL_DECISIONS = ["witch_heal", "witch_no_heal"] as const;
const POISON_DECISIONS = ["witch_poison", "witch_no_poison"] as const;

export function isCallableRole(role: string): role is CallableRole {
  const callable: readonly string[] = CALLABLE_ROLES;
  return callable.includes(role);
}

/**
 * Names of living holders of `role` who have not finished their decision for the current night.
 * The witch owes two decisions (heal slot and poison slot); everyone else owes one.
 * Pure query: safe to poll.
 */
export function pendingForRole(game: GameState, role: string): RoleProgress {
  if (!isCallableRole(role)) {
    throw new GameRuleError("INVALID_ROLE", `Role ${role} is never called at night`);
  }
  const called: CallableRole = role;

  const holders = game.players.filter(p => p.alive && p.role === called);
  const tonight = actionsInCycle(game, "night", game.nightNumber);

  const pending = holders
    .filter(holder => {
      const own = tonight.filter(entry => entry.playerId === holder.playerId);
      if (called === "witch") {
        return ofKind(own, HEAL_DECISIONS).length === 0 || ofKind(own, POISON_DECISIONS).length === 0;
      }
      return ofKind(own, DONE_KINDS[called]).length === 0;
    })
    .map(holder => holder.name);

  return { pending, done: pending.length === 0 };
}
