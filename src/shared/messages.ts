import { z } from "zod";
import { GameRuleError } from "../engine/types";
import type { CallableRole, GameState, LynchOutcome, Phase, Role, VotingStatus, Winner } from "../engine/types";

/**
 * Subscriptions a client may open over the WebSocket channel.
 * The socket only receives pushed views; every mutation goes through the HTTP API.
 */
export const ClientMessageSchema = z.discriminatedUnion("type", [
  /** Private view for one seated player. */
  z.object({
    type: z.literal("SUBSCRIBE_PLAYER"),
    payload: z.object({ roomCode: z.string().min(1), playerId: z.string().min(1) })
  }),
  /** Full view for the host device; requires the room's host secret. */
  z.object({
    type: z.literal("SUBSCRIBE_HOST"),
    payload: z.object({ roomCode: z.string().min(1), hostSecret: z.string().min(1) })
  }),
  /** Public board, e.g. a shared screen. */
  z.object({
    type: z.literal("SUBSCRIBE_VILLAGE"),
    payload: z.object({ roomCode: z.string().min(1) })
  })
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

/** Public info exposed to every viewer, with all secret info stripped. */
export interface PublicPlayerView {
  name: string;
  alive: boolean;
  mutedToday: boolean;
}

/** A player's private view of themself, including their role. */
export interface SelfPlayerView extends PublicPlayerView {
  playerId: string;
  role: Role | null;
  princeRevealed: boolean;
}

export interface PlayerView {
  roomCode: string;
  player: SelfPlayerView;
  players: PublicPlayerView[];
  phase: Phase;
  nightNumber: number;
  dayNumber: number;
  deathsLastNight: string[];
  activeCall: CallableRole | null;
  wolfMates: string[];
  winner: Winner | null;
}

export interface HostPlayerView extends PublicPlayerView {
  role: Role | null;
  princeRevealed: boolean;
}

export interface HostView {
  roomCode: string;
  phase: Phase;
  nightNumber: number;
  dayNumber: number;
  players: HostPlayerView[];
  deathsLastNight: string[];
  mutedForToday: string[];
  witchHasHeal: boolean;
  witchHasPoison: boolean;
  lastGuardTarget: string | null;
  activeCall: CallableRole | null;
  votingStatus: VotingStatus;
  voteDurationSec: number | null;
  lastLynch: LynchOutcome | null;
  winner: Winner | null;
}

export interface VillageView {
  roomCode: string;
  phase: Phase;
  nightNumber: number;
  dayNumber: number;
  players: PublicPlayerView[];
  winner: Winner | null;
}

function publicPlayers(game: GameState): PublicPlayerView[] {
  return game.players.map(p => ({ name: p.name, alive: p.alive, mutedToday: p.mutedToday }));
}

/**
 * Builds a per-player view by redacting hidden information.
 * Only the viewer's own role is revealed; a living werewolf additionally sees every other werewolf.
 */
export function buildPlayerView(game: GameState, playerId: string): PlayerView {
  const viewer = game.players.find(p => p.playerId === playerId);
  if (!viewer) {
    throw new GameRuleError("NOT_FOUND", `Player ${playerId} is not in room ${game.code}`);
  }

  const wolfMates =
    viewer.role === "werewolf" && viewer.alive
      ? game.players.filter(p => p.role === "werewolf" && p.playerId !== viewer.playerId).map(p => p.name)
      : [];

  return {
    roomCode: game.code,
    player: {
      playerId: viewer.playerId,
      name: viewer.name,
      role: viewer.role,
      alive: viewer.alive,
      mutedToday: viewer.mutedToday,
      princeRevealed: viewer.princeRevealed
    },
    players: publicPlayers(game),
    phase: game.phase,
    nightNumber: game.nightNumber,
    dayNumber: game.dayNumber,
    deathsLastNight: game.deathsLastNight,
    activeCall: game.activeCall,
    wolfMates,
    winner: game.winner
  };
}

/** Everything the host device needs, secrets included. Never send this to a player socket. */
export function buildHostView(game: GameState): HostView {
  return {
    roomCode: game.code,
    phase: game.phase,
    nightNumber: game.nightNumber,
    dayNumber: game.dayNumber,
    players: game.players.map(p => ({
      name: p.name,
      alive: p.alive,
      mutedToday: p.mutedToday,
      role: p.role,
      princeRevealed: p.princeRevealed
    })),
    deathsLastNight: game.deathsLastNight,
    mutedForToday: game.mutedForToday,
    witchHasHeal: game.witchHasHeal,
    witchHasPoison: game.witchHasPoison,
    lastGuardTarget: game.lastGuardTarget,
    activeCall: game.activeCall,
    votingStatus: game.votingStatus,
    voteDurationSec: game.voteDurationSec,
    lastLynch: game.lastLynch,
    winner: game.winner
  };
}

export function buildVillageView(game: GameState): VillageView {
  return {
    roomCode: game.code,
    phase: game.phase,
    nightNumber: game.nightNumber,
    dayNumber: game.dayNumber,
    players: publicPlayers(game),
    winner: game.winner
  };
}

/** Messages emitted by the server: one pushed view per committed room change, or an error. */
export type ServerMessage =
  | { type: "ERROR"; payload: { code: string; message: string } }
  | { type: "PLAYER_STATE"; payload: { view: PlayerView } }
  | { type: "HOST_STATE"; payload: { view: HostView } }
  | { type: "VILLAGE_STATE"; payload: { view: VillageView } };
