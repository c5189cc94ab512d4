import http from "http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WebSocket, WebSocketServer } from "ws";
import { RoomService } from "../../src/server/rooms";
import { RoomStore } from "../../src/server/store";
import { WebSocketGateway } from "../../src/server/ws";

const nextMessage = (socket: WebSocket): Promise<unknown> =>
  new Promise((resolve, reject) => {
    socket.once("message", data => resolve(JSON.parse(data.toString())));
    socket.once("error", reject);
  });

describe("WebSocketGateway", () => {
  let server: http.Server;
  let wss: WebSocketServer;
  let service: RoomService;
  let url: string;
  const clients: WebSocket[] = [];

  const connect = async (): Promise<WebSocket> => {
    const socket = new WebSocket(url);
    clients.push(socket);
    await new Promise<void>((resolve, reject) => {
      socket.once("open", () => resolve());
      socket.once("error", reject);
    });
    return socket;
  };

  const subscribe = (socket: WebSocket, message: object): Promise<unknown> => {
    const reply = nextMessage(socket);
    socket.send(JSON.stringify(message));
    return reply;
  };

  beforeEach(async () => {
    const store = new RoomStore();
    service = new RoomService(store);
    server = http.createServer();
    wss = new WebSocketGateway(store).attach(server);
    await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    url = `ws://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) client.terminate();
    for (const client of wss.clients) client.terminate();
    await new Promise<void>((resolve, reject) => wss.close(err => (err ? reject(err) : resolve())));
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  it("sends the village board on subscribe and pushes every committed change", async () => {
    const { roomCode } = service.createRoom();
    const socket = await connect();

    const initial = await subscribe(socket, { type: "SUBSCRIBE_VILLAGE", payload: { roomCode } });
    expect(initial).toEqual({
      type: "VILLAGE_STATE",
      payload: {
        view: { roomCode, phase: "lobby", nightNumber: 0, dayNumber: 0, players: [], winner: null }
      }
    });

    const pushed = nextMessage(socket);
    service.join(roomCode, "Ana");
    expect(await pushed).toMatchObject({
      type: "VILLAGE_STATE",
      payload: { view: { players: [{ name: "Ana", alive: true, mutedToday: false }] } }
    });
  });

  it("sends a seated player their own view", async () => {
    const { roomCode } = service.createRoom();
    const { playerId } = service.join(roomCode, "Bo");
    const socket = await connect();

    const reply = await subscribe(socket, { type: "SUBSCRIBE_PLAYER", payload: { roomCode, playerId } });
    expect(reply).toMatchObject({
      type: "PLAYER_STATE",
      payload: { view: { roomCode, player: { playerId, name: "Bo", role: null, alive: true }, wolfMates: [] } }
    });
  });

  it("refuses the host view without the right secret", async () => {
    const { roomCode } = service.createRoom();
    const socket = await connect();

    const reply = await subscribe(socket, { type: "SUBSCRIBE_HOST", payload: { roomCode, hostSecret: "wrong" } });
    expect(reply).toEqual({ type: "ERROR", payload: { code: "FORBIDDEN", message: "Wrong host secret" } });
  });

  it("reports bad JSON, unknown message types and unknown rooms", async () => {
    const socket = await connect();

    const badJson = nextMessage(socket);
    socket.send("{oops");
    expect(await badJson).toEqual({ type: "ERROR", payload: { code: "BAD_JSON", message: "Invalid JSON payload" } });

    expect(await subscribe(socket, { type: "PING", payload: {} })).toMatchObject({
      type: "ERROR",
      payload: { code: "INVALID_MESSAGE" }
    });

    expect(await subscribe(socket, { type: "SUBSCRIBE_VILLAGE", payload: { roomCode: "nope" } })).toEqual({
      type: "ERROR",
      payload: { code: "NOT_FOUND", message: "Room nope does not exist" }
    });
  });
});
