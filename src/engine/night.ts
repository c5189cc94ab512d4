import { actionsInCycle, lastOfKind, ofKind } from "./actions";
import { GameRuleError } from "./types";
import type { GameState, LoggedAction } from "./types";
import {
  ensureNotEnded,
  ensurePhase,
  findPlayerByName,
  lastPerPlayer,
  requirePlayer,
  tallyTargets
} from "./utils";
import { settleWinner } from "./win";

const HEAL_DECISIONS = ["witch_heal", "witch_no_heal"] as const;
const POISON_DECISIONS = ["witch_poison", "witch_no_poison"] as const;
const GAMBLER_DECISIONS = ["gambler_bet", "gambler_skip"] as const;

/** Each wolf's latest pick counts once; see tallyTargets for the tie-break. */
export function wolfChoice(tonight: LoggedAction[]): string | null {
  const ballots = lastPerPlayer(ofKind(tonight, ["wolf_kill"])).map(entry => ({
    seq: entry.seq,
    target: entry.action.target
  }));
  return tallyTargets(ballots).candidate;
}

/**
 * Resolves the current night in fixed order: mute, guard, wolf kill, gambler, heal, poison.
 * - A guard match or a heal each cancel the wolf victim on their own.
 * - The heal is only spent when it is what saved the victim.
 * - Gambler and poison targets die regardless of guard or heal.
 * Returns a new snapshot; the caller's state is untouched.
 */
export function resolveNight(game: GameState): GameState {
  ensureNotEnded(game);
  ensurePhase(game, "night", "Night resolution only runs during the night");
  if (game.resolvedNight === game.nightNumber) {
    throw new GameRuleError("INVALID_PHASE", `Night ${game.nightNumber} was already resolved`);
  }

  const players = game.players.map(p => ({ ...p, mutedToday: false }));
  const tonight = actionsInCycle(game, "night", game.nightNumber);

  const mutedForToday: string[] = [];
  const mute = lastOfKind(tonight, ["mage_mute"]);
  if (mute) {
    mutedForToday.push(mute.action.target);
    const muted = findPlayerByName(players, mute.action.target);
    if (muted) muted.mutedToday = true;
  }

  const guard = lastOfKind(tonight, ["guard_protect"]);
  const protectedName = guard ? guard.action.target : null;

  let wolfVictim = wolfChoice(tonight);

  let gamblerTarget: string | null = null;
  if (game.nightNumber >= game.options.gamblerFromNight) {
    const gamble = lastOfKind(tonight, GAMBLER_DECISIONS);
    if (gamble && gamble.action.kind === "gambler_bet") {
      gamblerTarget = gamble.action.target;
    }
  }

  if (wolfVictim !== null && wolfVictim === protectedName) {
    wolfVictim = null;
  }

  let witchHasHeal = game.witchHasHeal;
  if (witchHasHeal && wolfVictim !== null) {
    const heal = lastOfKind(tonight, HEAL_DECISIONS);
    if (heal && heal.action.kind === "witch_heal") {
      wolfVictim = null;
      witchHasHeal = false;
    }
  }

  let witchHasPoison = game.witchHasPoison;
  let poisonTarget: string | null = null;
  if (witchHasPoison) {
    const poison = lastOfKind(tonight, POISON_DECISIONS);
    if (poison && poison.action.kind === "witch_poison") {
      poisonTarget = poison.action.target;
      witchHasPoison = false;
    }
  }

  const doomed: string[] = [];
  for (const name of [wolfVictim, gamblerTarget, poisonTarget]) {
    if (name !== null && !doomed.includes(name)) doomed.push(name);
  }

  const deaths: string[] = [];
  for (const name of doomed) {
    const victim = findPlayerByName(players, name);
    if (victim?.alive) {
      victim.alive = false;
      deaths.push(victim.name);
    }
  }

  return settleWinner({
    ...game,
    players,
    witchHasHeal,
    witchHasPoison,
    lastGuardTarget: guard ? protectedName : game.lastGuardTarget,
    deathsLastNight: deaths,
    mutedForToday,
    activeCall: null,
    resolvedNight: game.nightNumber
  });
}

export interface WitchInfo {
  victimName: string | null;
  canHeal: boolean;
  canPoison: boolean;
}

/** What a living witch is shown when called: tonight's current wolf pick and the potions left. */
export function witchInfo(game: GameState, playerId: string): WitchInfo {
  const witch = requirePlayer(game, playerId);
  if (witch.role !== "witch" || !witch.alive) {
    throw new GameRuleError("FORBIDDEN", "Only a living witch may see the wolves' victim");
  }
  const victimName = wolfChoice(actionsInCycle(game, "night", game.nightNumber));
  return {
    victimName,
    canHeal: victimName !== null && game.witchHasHeal,
    canPoison: game.witchHasPoison
  };
}

export interface SeerResult {
  targetName: string;
  isWerewolf: boolean;
}

/** Reveals whether the target is a werewolf, for a living seer during the night. */
export function seerInspect(game: GameState, playerId: string, targetName: string): SeerResult {
  const seer = requirePlayer(game, playerId);
  if (seer.role !== "seer" || !seer.alive) {
    throw new GameRuleError("FORBIDDEN", "Only a living seer may inspect");
  }
  ensurePhase(game, "night", "The seer inspects at night");
  const target = findPlayerByName(game.players, targetName);
  if (!target) {
    throw new GameRuleError("NOT_FOUND", `No player named ${targetName}`);
  }
  return { targetName: target.name, isWerewolf: target.role === "werewolf" };
}
