import { randomInt, randomUUID } from "crypto";
import { submitAction, toAction } from "../engine/actions";
import { describeLynch, resolveDay, tallyVotes } from "../engine/day";
import { resolveNight, seerInspect, witchInfo } from "../engine/night";
import type { SeerResult, WitchInfo } from "../engine/night";
import { pendingForRole } from "../engine/progress";
import type { RoleProgress } from "../engine/progress";
import * as transitions from "../engine/transitions";
import { GameRuleError } from "../engine/types";
import type { ActionKind, CallableRole, GameState, HostPhase, Winner } from "../engine/types";
import { defaultRandom } from "../engine/utils";
import type { RandomFn } from "../engine/utils";
import { buildHostView, buildPlayerView, buildVillageView } from "../shared/messages";
import type { HostView, PlayerView, VillageView } from "../shared/messages";
import type { RoomStore } from "./store";

export interface RoomServiceOptions {
  game?: transitions.GameOptionsOverrides;
  random?: RandomFn;
  codeLength?: number;
}

export interface CreatedRoom {
  roomCode: string;
  hostSecret: string;
}

export interface JoinedRoom {
  roomCode: string;
  playerId: string;
}

export interface NightReport {
  deaths: string[];
  mutedForToday: string[];
  winner: Winner | null;
}

export interface DayReport {
  lynched: string | null;
  princeRevealed: boolean;
  message: string;
  winner: Winner | null;
}

export interface VotePreview {
  candidateName: string | null;
  votes: Record<string, number>;
}

/**
 * Command layer between the transports and the engine.
 * Issues room codes, player ids and host secrets, checks the host secret on host commands,
 * and runs every mutation through `RoomStore.withRoom` so it commits as one snapshot.
 */
export class RoomService {
  private random: RandomFn;

  constructor(private store: RoomStore, private options: RoomServiceOptions = {}) {
    this.random = options.random ?? defaultRandom;
  }

  createRoom(): CreatedRoom {
    const code = this.generateRoomCode();
    const hostSecret = randomUUID();
    this.store.create(transitions.createInitialRoom(code, hostSecret, this.options.game));
    console.info(`Room ${code} created`);
    return { roomCode: code, hostSecret };
  }

  join(code: string, name: string): JoinedRoom {
    const playerId = randomUUID();
    this.store.withRoom(code, room => transitions.addPlayer(room, { playerId, name }));
    return { roomCode: code, playerId };
  }

  startGame(code: string, hostSecret: string): GameState {
    const room = this.mutateAsHost(code, hostSecret, current => transitions.startGame(current, this.random));
    console.info(`Room ${code} started with ${room.players.length} players`);
    return room;
  }

  setPhase(code: string, hostSecret: string, phase: HostPhase): GameState {
    return this.mutateAsHost(code, hostSecret, room => transitions.setPhase(room, phase));
  }

  callRole(code: string, hostSecret: string, role: CallableRole | null): GameState {
    return this.mutateAsHost(code, hostSecret, room => transitions.callRole(room, role));
  }

  startVoting(code: string, hostSecret: string, durationSec: number | null): GameState {
    return this.mutateAsHost(code, hostSecret, room => transitions.startVoting(room, durationSec));
  }

  resolveNight(code: string, hostSecret: string): NightReport {
    const room = this.mutateAsHost(code, hostSecret, resolveNight);
    this.logIfEnded(room);
    return { deaths: room.deathsLastNight, mutedForToday: room.mutedForToday, winner: room.winner };
  }

  resolveDay(code: string, hostSecret: string): DayReport {
    const room = this.mutateAsHost(code, hostSecret, resolveDay);
    this.logIfEnded(room);
    const outcome = room.lastLynch ?? { day: room.dayNumber, target: null, lynched: false, princeRevealed: false };
    return {
      lynched: outcome.target,
      princeRevealed: outcome.princeRevealed,
      message: describeLynch(outcome),
      winner: room.winner
    };
  }

  votePreview(code: string, hostSecret: string): VotePreview {
    const { candidate, counts } = tallyVotes(this.readAsHost(code, hostSecret));
    return { candidateName: candidate, votes: counts };
  }

  roleProgress(code: string, hostSecret: string, role: string): RoleProgress {
    return pendingForRole(this.readAsHost(code, hostSecret), role);
  }

  hostState(code: string, hostSecret: string): HostView {
    return buildHostView(this.readAsHost(code, hostSecret));
  }

  playerState(code: string, playerId: string): PlayerView {
    return buildPlayerView(this.store.require(code), playerId);
  }

  villageState(code: string): VillageView {
    return buildVillageView(this.store.require(code));
  }

  submitAction(code: string, playerId: string, kind: ActionKind, target?: string | null): void {
    const action = toAction(kind, target);
    this.store.withRoom(code, room => submitAction(room, playerId, action));
  }

  seerResult(code: string, playerId: string, targetName: string): SeerResult {
    return seerInspect(this.store.require(code), playerId, targetName);
  }

  witchInfo(code: string, playerId: string): WitchInfo {
    return witchInfo(this.store.require(code), playerId);
  }

  /** Hook that gates every host command and host query. */
  authorize(room: GameState, hostSecret: string): void {
    if (room.hostSecret !== hostSecret) {
      throw new GameRuleError("FORBIDDEN", "Wrong host secret");
    }
  }

  private readAsHost(code: string, hostSecret: string): GameState {
    const room = this.store.require(code);
    this.authorize(room, hostSecret);
    return room;
  }

  private mutateAsHost(code: string, hostSecret: string, updater: (room: GameState) => GameState): GameState {
    return this.store.withRoom(code, room => {
      this.authorize(room, hostSecret);
      return updater(room);
    });
  }

  private logIfEnded(room: GameState): void {
    if (room.winner) {
      console.info(`Room ${room.code} ended: ${room.winner} win`);
    }
  }

  /** Numeric room code, re-rolled until unused. */
  private generateRoomCode(): string {
    const length = this.options.codeLength ?? 4;
    let code: string;
    do {
      code = Array.from({ length }, () => String(randomInt(10))).join("");
    } while (this.store.has(code));
    return code;
  }
}
