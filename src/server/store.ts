import { GameRuleError } from "../engine/types";
import type { GameState } from "../engine/types";

export type RoomListener = (room: GameState) => void;

/**
 * In-memory room registry keyed by room code.
 * Each entry holds an immutable snapshot. `withRoom` is the only write path: it runs the
 * updater synchronously against one room and swaps the result in, so readers see either
 * the previous snapshot or the next one, never a half-applied resolution. There is no
 * lock spanning the whole store.
 */
export class RoomStore {
  private rooms = new Map<string, GameState>();
  private listeners = new Set<RoomListener>();

  /** Inserts a brand new room, throwing if the code already exists. */
  create(room: GameState): GameState {
    if (this.rooms.has(room.code)) {
      throw new Error(`Room ${room.code} already exists`);
    }
    this.rooms.set(room.code, room);
    this.notify(room);
    return room;
  }

  has(code: string): boolean {
    return this.rooms.has(code);
  }

  /** Fetches a room by code, throwing NOT_FOUND when missing. */
  require(code: string): GameState {
    const room = this.rooms.get(code);
    if (!room) {
      throw new GameRuleError("NOT_FOUND", `Room ${code} does not exist`);
    }
    return room;
  }

  /**
   * Load-modify-store for one room. If the updater throws, the stored snapshot is untouched.
   * Listeners only hear about snapshots that actually changed.
   */
  withRoom(code: string, updater: (current: GameState) => GameState): GameState {
    const current = this.require(code);
    const updated = updater(current);
    if (updated.code !== code) {
      throw new Error("Room code mismatch");
    }
    if (updated !== current) {
      this.rooms.set(code, updated);
      this.notify(updated);
    }
    return updated;
  }

  /** Returns all rooms, useful for diagnostics. */
  list(): GameState[] {
    return Array.from(this.rooms.values());
  }

  /** Registers a change listener; returns the unsubscribe function. */
  subscribe(listener: RoomListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(room: GameState): void {
    for (const listener of this.listeners) {
      try {
        listener(room);
      } catch (err) {
        console.error(`Room listener failed for ${room.code}`, err);
      }
    }
  }
}
