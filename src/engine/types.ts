/**
 * Core domain types for the werewolf phase-resolution engine.
 * Keep this file dependency-free so it can be shared across layers.
 */

/** Every role a seat can be dealt. Exactly one per player, fixed once assigned. */
export type Role = "werewolf" | "seer" | "witch" | "guard" | "gambler" | "prince" | "mage" | "villager";

/** Roles the host prompts during the night; the only roles progress can be queried for. */
export const CALLABLE_ROLES = ["mage", "guard", "werewolf", "seer", "witch", "gambler"] as const;
export type CallableRole = (typeof CALLABLE_ROLES)[number];

/** Lifecycle phases. Exactly one holds at a time. */
export type Phase = "lobby" | "night" | "day" | "ended";

/** Phases the host may move the room into by hand. */
export type HostPhase = Exclude<Phase, "ended">;

/** Faction that permanently ends the game. */
export type Winner = "village" | "werewolves";

export type VotingStatus = "idle" | "voting";

/**
 * Server-side record of a seated player.
 * Players are never removed once the game starts; dead ones stay for display and win counting.
 */
export interface Player {
  playerId: string;
  name: string;
  role: Role | null;
  alive: boolean;
  mutedToday: boolean;
  princeRevealed: boolean;
}

/** Actions that only mean something at night. */
export type NightAction =
  | { kind: "mage_mute"; target: string }
  | { kind: "guard_protect"; target: string }
  | { kind: "wolf_kill"; target: string }
  | { kind: "seer_inspect"; target: string }
  | { kind: "witch_heal" }
  | { kind: "witch_no_heal" }
  | { kind: "witch_poison"; target: string }
  | { kind: "witch_no_poison" }
  | { kind: "gambler_bet"; target: string }
  | { kind: "gambler_skip" };

/** Actions that only mean something during the day. */
export type DayAction = { kind: "vote_lynch"; target: string };

export type PlayerAction = NightAction | DayAction;
export type ActionKind = PlayerAction["kind"];

/**
 * One entry of the append-only action log.
 * `cycle` is the night number for night submissions, the day number for day ones, and null in the lobby.
 */
export interface LoggedAction {
  seq: number;
  playerId: string;
  action: PlayerAction;
  phase: Phase;
  cycle: number | null;
}

/** Result of the most recent day resolution, kept so the host can replay the announcement. */
export interface LynchOutcome {
  day: number;
  target: string | null;
  lynched: boolean;
  princeRevealed: boolean;
}

/** Tunable knobs for balancing and play-testing. */
export interface GameOptions {
  minPlayers: number;
  gamblerFromNight: number;
}

/**
 * Immutable snapshot of one room.
 * Key invariants:
 * - `winner !== null` implies `phase === "ended"`, and nothing mutates the room afterwards.
 * - `witchHasHeal` / `witchHasPoison` only ever go from true to false.
 * - A player with `alive === false` never comes back.
 * - `resolvedNight` / `resolvedDay` hold the last cycle resolved; each cycle resolves once.
 */
export interface GameState {
  code: string;
  hostSecret: string;
  players: Player[];
  phase: Phase;
  nightNumber: number;
  dayNumber: number;
  started: boolean;
  actions: LoggedAction[];
  witchHasHeal: boolean;
  witchHasPoison: boolean;
  lastGuardTarget: string | null; // recorded each night, not read by any rule yet
  deathsLastNight: string[];
  mutedForToday: string[];
  activeCall: CallableRole | null;
  votingStatus: VotingStatus;
  voteDurationSec: number | null;
  lastLynch: LynchOutcome | null;
  resolvedNight: number;
  resolvedDay: number;
  winner: Winner | null;
  options: GameOptions;
}

export type GameErrorCode =
  | "NOT_FOUND"
  | "FORBIDDEN"
  | "INVALID_PHASE"
  | "GAME_ENDED"
  | "DEAD_PLAYER"
  | "INVALID_ROLE"
  | "VALIDATION_ERROR"
  | "ALREADY_STARTED"
  | "DUPLICATE_NAME";

/** Application-level error for rejected operations. Surfaces to clients as structured error codes. */
export class GameRuleError extends Error {
  constructor(public code: GameErrorCode, message: string) {
    super(message);
    this.name = "GameRuleError";
  }
}
