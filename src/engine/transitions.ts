import { GameRuleError } from "./types";
import type { CallableRole, GameOptions, GameState, HostPhase, Player, Role } from "./types";
import { defaultRandom, ensureNotEnded, ensurePhase, shuffle } from "./utils";
import type { RandomFn } from "./utils";

/** Partial overrides to tweak defaults when creating a room. */
export type GameOptionsOverrides = Partial<GameOptions>;

export const DEFAULT_GAME_OPTIONS: GameOptions = {
  minPlayers: 4,
  gamblerFromNight: 2
};

/** Special roles dealt after the werewolves, in this order, before any villager. */
export const SPECIAL_ROLES = ["seer", "witch", "guard", "gambler", "prince", "mage"] as const satisfies readonly Role[];

/** Merges supplied overrides with the default options. */
export function mergeOptions(overrides?: GameOptionsOverrides): GameOptions {
  return { ...DEFAULT_GAME_OPTIONS, ...overrides };
}

/** Minimal identity payload issued by the room layer when someone joins. */
export interface PlayerIdentity {
  playerId: string;
  name: string;
}

/** Promotes an identity payload to a lobby player without a role. */
export function toPlayer(identity: PlayerIdentity): Player {
  return {
    playerId: identity.playerId,
    name: identity.name,
    role: null,
    alive: true,
    mutedToday: false,
    princeRevealed: false
  };
}

/** Creates the very first snapshot of an empty lobby. */
export function createInitialRoom(code: string, hostSecret: string, overrides?: GameOptionsOverrides): GameState {
  return {
    code,
    hostSecret,
    players: [],
    phase: "lobby",
    nightNumber: 0,
    dayNumber: 0,
    started: false,
    actions: [],
    witchHasHeal: true,
    witchHasPoison: true,
    lastGuardTarget: null,
    deathsLastNight: [],
    mutedForToday: [],
    activeCall: null,
    votingStatus: "idle",
    voteDurationSec: null,
    lastLynch: null,
    resolvedNight: 0,
    resolvedDay: 0,
    winner: null,
    options: mergeOptions(overrides)
  };
}

/** Seats a new player. Names double as action targets, so they must be unique. */
export function addPlayer(game: GameState, identity: PlayerIdentity): GameState {
  if (game.started) {
    throw new GameRuleError("ALREADY_STARTED", "The game has already started; no more players can join");
  }
  const name = identity.name.trim();
  if (name.length === 0) {
    throw new GameRuleError("VALIDATION_ERROR", "Player name must not be blank");
  }
  if (game.players.some(p => p.name === name)) {
    throw new GameRuleError("DUPLICATE_NAME", `Name ${name} is already taken`);
  }
  return { ...game, players: [...game.players, toPlayer({ ...identity, name })] };
}

/**
 * Role deck for `count` seats: 1 werewolf below 5 players (2 otherwise), then the special
 * roles in order, then villagers for every remaining seat.
 */
export function buildRoleDeck(count: number): Role[] {
  const wolves = Array.from({ length: count < 5 ? 1 : 2 }, (): Role => "werewolf");
  const base: Role[] = [...wolves, ...SPECIAL_ROLES];
  if (count <= base.length) return base.slice(0, count);
  return [...base, ...Array.from({ length: count - base.length }, (): Role => "villager")];
}

/** Deals the deck over a random shuffle of the roster. Roster order is left as joined. */
export function assignRoles(game: GameState, random: RandomFn = defaultRandom): GameState {
  if (game.players.length < game.options.minPlayers) {
    throw new GameRuleError("VALIDATION_ERROR", `Need at least ${game.options.minPlayers} players`);
  }
  const deck = buildRoleDeck(game.players.length);
  const order = shuffle(
    game.players.map(p => p.playerId),
    random
  );
  const dealt = new Map(order.map((playerId, index): [string, Role] => [playerId, deck[index]]));

  const players = game.players.map(p => ({
    ...p,
    role: dealt.get(p.playerId) ?? "villager",
    alive: true,
    mutedToday: false,
    princeRevealed: false
  }));
  return { ...game, players };
}

/** Lobby-only entry point: deals roles and opens night 1. */
export function startGame(game: GameState, random: RandomFn = defaultRandom): GameState {
  if (game.started) {
    throw new GameRuleError("ALREADY_STARTED", "The game has already started");
  }
  ensurePhase(game, "lobby", "The game can only start from the lobby");
  const dealt = assignRoles(game, random);
  return {
    ...dealt,
    started: true,
    phase: "night",
    nightNumber: 1,
    dayNumber: 0,
    witchHasHeal: true,
    witchHasPoison: true,
    deathsLastNight: [],
    mutedForToday: [],
    activeCall: null,
    votingStatus: "idle",
    voteDurationSec: null
  };
}

/**
 * Host-driven phase change.
 * - night: next night number, clears last night's deaths, mutes, call and voting state.
 * - day: next day number, clears call and voting state.
 * - lobby: only moves the phase.
 */
export function setPhase(game: GameState, phase: HostPhase): GameState {
  ensureNotEnded(game);
  if (phase !== "lobby" && !game.started) {
    throw new GameRuleError("INVALID_PHASE", "Start the game before moving to night or day");
  }

  switch (phase) {
    case "night":
      return {
        ...game,
        phase,
        nightNumber: game.nightNumber + 1,
        players: game.players.map(p => ({ ...p, mutedToday: false })),
        deathsLastNight: [],
        mutedForToday: [],
        activeCall: null,
        votingStatus: "idle",
        voteDurationSec: null
      };
    case "day":
      return {
        ...game,
        phase,
        dayNumber: game.dayNumber + 1,
        activeCall: null,
        votingStatus: "idle",
        voteDurationSec: null
      };
    case "lobby":
      return { ...game, phase };
    default: {
      const exhaustive: never = phase;
      throw new GameRuleError("VALIDATION_ERROR", `Unknown phase ${exhaustive}`);
    }
  }
}

/** Marks which role the host is currently prompting; null clears the prompt. */
export function callRole(game: GameState, role: CallableRole | null): GameState {
  ensureNotEnded(game);
  return { ...game, activeCall: role };
}

/** Opens lynch voting. The duration is advisory only; nothing enforces it. */
export function startVoting(game: GameState, durationSec: number | null): GameState {
  ensureNotEnded(game);
  ensurePhase(game, "day", "Voting only opens during the day");
  return { ...game, votingStatus: "voting", voteDurationSec: durationSec };
}
