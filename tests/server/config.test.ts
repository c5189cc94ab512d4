import { describe, it, expect } from "vitest";
import { loadConfig } from "../../src/server/config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      allowedOrigins: "*",
      game: { minPlayers: 4, gamblerFromNight: 2 }
    });
  });

  it("parses numbers and origin lists from strings", () => {
    const config = loadConfig({
      PORT: "4001",
      ALLOWED_ORIGINS: "http://host.local, http://board.local",
      MIN_PLAYERS: "6",
      GAMBLER_FROM_NIGHT: "1"
    });
    expect(config).toEqual({
      port: 4001,
      allowedOrigins: ["http://host.local", "http://board.local"],
      game: { minPlayers: 6, gamblerFromNight: 1 }
    });
  });

  it("rejects a minimum below four players", () => {
    expect(() => loadConfig({ MIN_PLAYERS: "3" })).toThrowError(/MIN_PLAYERS/);
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrowError(/Invalid configuration: PORT/);
  });
});
