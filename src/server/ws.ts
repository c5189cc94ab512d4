import type http from "http";
import { WebSocketServer, WebSocket } from "ws";
import { GameRuleError } from "../engine/types";
import type { GameState } from "../engine/types";
import { ClientMessageSchema, buildHostView, buildPlayerView, buildVillageView } from "../shared/messages";
import type { ClientMessage, ServerMessage } from "../shared/messages";
import type { RoomStore } from "./store";

type Subscription =
  | { audience: "player"; roomCode: string; playerId: string }
  | { audience: "host"; roomCode: string }
  | { audience: "village"; roomCode: string };

/**
 * WebSocket gateway responsible for:
 * - binding sockets to a room as a player, the host or the village board,
 * - pushing a freshly filtered view to every bound socket after each committed room change.
 * Sockets never mutate state; commands go through the HTTP API.
 */
export class WebSocketGateway {
  private subscriptions = new Map<WebSocket, Subscription>();
  private rooms = new Map<string, Set<WebSocket>>();
  private unsubscribe: () => void;

  constructor(private store: RoomStore) {
    this.unsubscribe = store.subscribe(room => this.broadcastState(room));
  }

  /** Binds the gateway to an HTTP server and starts accepting connections. */
  attach(server: http.Server): WebSocketServer {
    const wss = new WebSocketServer({ server });
    wss.on("connection", socket => {
      socket.on("message", data => this.handleMessage(socket, data.toString()));
      socket.on("close", () => this.detach(socket));
      socket.on("error", err => console.error("WebSocket error", err));
    });
    wss.on("close", () => this.unsubscribe());
    return wss;
  }

  /** Parses an incoming payload and binds the socket to the requested view. */
  private handleMessage(socket: WebSocket, raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.sendError(socket, "BAD_JSON", "Invalid JSON payload");
      return;
    }

    const parsed = ClientMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.sendError(socket, "INVALID_MESSAGE", parsed.error.issues.map(issue => issue.message).join("; "));
      return;
    }

    try {
      const subscription = this.toSubscription(parsed.data);
      this.detach(socket);
      this.subscriptions.set(socket, subscription);
      const room = this.rooms.get(subscription.roomCode) ?? new Set<WebSocket>();
      room.add(socket);
      this.rooms.set(subscription.roomCode, room);
      this.sendView(socket, subscription, this.store.require(subscription.roomCode));
    } catch (err) {
      if (err instanceof GameRuleError) {
        this.sendError(socket, err.code, err.message);
      } else {
        console.error("Subscription error", err);
        this.sendError(socket, "SERVER_ERROR", "Internal error");
      }
    }
  }

  /** Checks the room exists and the subscriber is entitled to the view they asked for. */
  private toSubscription(msg: ClientMessage): Subscription {
    const room = this.store.require(msg.payload.roomCode);
    switch (msg.type) {
      case "SUBSCRIBE_PLAYER":
        if (!room.players.some(p => p.playerId === msg.payload.playerId)) {
          throw new GameRuleError("NOT_FOUND", "Player is not in this room");
        }
        return { audience: "player", roomCode: room.code, playerId: msg.payload.playerId };
      case "SUBSCRIBE_HOST":
        if (room.hostSecret !== msg.payload.hostSecret) {
          throw new GameRuleError("FORBIDDEN", "Wrong host secret");
        }
        return { audience: "host", roomCode: room.code };
      case "SUBSCRIBE_VILLAGE":
        return { audience: "village", roomCode: room.code };
      default: {
        const exhaustive: never = msg;
        throw new GameRuleError("VALIDATION_ERROR", `Unknown message ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  private detach(socket: WebSocket): void {
    const subscription = this.subscriptions.get(socket);
    if (!subscription) return;

    this.subscriptions.delete(socket);
    const room = this.rooms.get(subscription.roomCode);
    if (room) {
      room.delete(socket);
      if (room.size === 0) {
        this.rooms.delete(subscription.roomCode);
      }
    }
  }

  private send(socket: WebSocket, message: ServerMessage): void {
    if (socket.readyState !== WebSocket.OPEN) return;
    socket.send(JSON.stringify(message));
  }

  private sendError(socket: WebSocket, code: string, message: string): void {
    this.send(socket, { type: "ERROR", payload: { code, message } });
  }

  private sendView(socket: WebSocket, subscription: Subscription, room: GameState): void {
    switch (subscription.audience) {
      case "player":
        this.send(socket, { type: "PLAYER_STATE", payload: { view: buildPlayerView(room, subscription.playerId) } });
        break;
      case "host":
        this.send(socket, { type: "HOST_STATE", payload: { view: buildHostView(room) } });
        break;
      case "village":
        this.send(socket, { type: "VILLAGE_STATE", payload: { view: buildVillageView(room) } });
        break;
    }
  }

  /** Fans out the committed snapshot, hydrating each socket's own view before sending. */
  private broadcastState(room: GameState): void {
    const sockets = this.rooms.get(room.code);
    if (!sockets) return;

    for (const socket of sockets) {
      const subscription = this.subscriptions.get(socket);
      if (!subscription) continue;
      try {
        this.sendView(socket, subscription, room);
      } catch (err) {
        console.warn(`Failed to push view for room ${room.code}`, err);
      }
    }
  }
}
