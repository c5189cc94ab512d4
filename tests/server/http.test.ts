import http from "http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createHttpApp } from "../../src/server/http";
import { RoomService } from "../../src/server/rooms";
import { RoomStore } from "../../src/server/store";
import type { VillageView } from "../../src/shared/messages";

const CreatedRoom = z.object({ roomCode: z.string(), hostSecret: z.string() });

class BrokenVillageService extends RoomService {
  villageState(): VillageView {
    throw new Error("board offline");
  }
}

describe("HTTP API", () => {
  let server: http.Server;
  let baseUrl: string;

  const listen = async (service: RoomService, store: RoomStore) => {
    server = http.createServer(createHttpApp(service, store, { allowedOrigins: "*" }));
    await new Promise<void>(resolve => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  };

  const request = async (method: string, path: string, body?: string) => {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { "content-type": "application/json" },
      body
    });
    const json: unknown = await res.json();
    return { status: res.status, json };
  };

  const createRoom = async () => CreatedRoom.parse((await request("POST", "/api/rooms")).json);

  beforeEach(async () => {
    const store = new RoomStore();
    await listen(new RoomService(store), store);
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
  });

  it("creates a room and reports health", async () => {
    const created = await request("POST", "/api/rooms");
    expect(created.status).toBe(201);
    expect(CreatedRoom.parse(created.json).roomCode).toMatch(/^\d{4}$/);

    const health = await request("GET", "/health");
    expect(health.status).toBe(200);
    expect(health.json).toMatchObject({ status: "ok", rooms: 1 });
  });

  it("answers 403 for a wrong host secret", async () => {
    const { roomCode } = await createRoom();
    const res = await request("POST", `/api/rooms/${roomCode}/start`, JSON.stringify({ hostSecret: "wrong" }));
    expect(res).toEqual({ status: 403, json: { error: { code: "FORBIDDEN", message: "Wrong host secret" } } });
  });

  it("answers 404 for an unknown room", async () => {
    const res = await request("GET", "/api/rooms/nope/village_state");
    expect(res).toEqual({ status: 404, json: { error: { code: "NOT_FOUND", message: "Room nope does not exist" } } });
  });

  it("answers 409 for a duplicate name", async () => {
    const { roomCode } = await createRoom();
    const first = await request("POST", `/api/rooms/${roomCode}/join`, JSON.stringify({ name: "Ana" }));
    expect(first.status).toBe(201);

    const second = await request("POST", `/api/rooms/${roomCode}/join`, JSON.stringify({ name: "Ana" }));
    expect(second.status).toBe(409);
    expect(second.json).toMatchObject({ error: { code: "DUPLICATE_NAME" } });
  });

  it("answers 400 BAD_JSON for a malformed body", async () => {
    const { roomCode } = await createRoom();
    const res = await request("POST", `/api/rooms/${roomCode}/join`, "{bad");
    expect(res).toEqual({ status: 400, json: { error: { code: "BAD_JSON", message: "Invalid JSON payload" } } });
  });

  it("answers 400 VALIDATION_ERROR listing the bad field", async () => {
    const { roomCode } = await createRoom();
    const res = await request(
      "POST",
      `/api/rooms/${roomCode}/actions`,
      JSON.stringify({ playerId: "id-Ana", kind: "fly", target: "Bo" })
    );
    expect(res.status).toBe(400);
    const { error } = z.object({ error: z.object({ code: z.string(), message: z.string() }) }).parse(res.json);
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.message).toMatch(/^kind: /);
  });

  it("answers 500 SERVER_ERROR for anything that is not a rule violation", async () => {
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    const store = new RoomStore();
    const service = new BrokenVillageService(store);
    await listen(service, store);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const res = await request("GET", "/api/rooms/1234/village_state");
    expect(res).toEqual({ status: 500, json: { error: { code: "SERVER_ERROR", message: "Internal error" } } });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });
});
