import { describe, it, expect } from "vitest";
import { checkWin, settleWinner } from "../../src/engine/win";
import { createPlayer, makeState } from "../fixtures";

const wolf = (name: string, alive = true) => createPlayer(name, "werewolf", alive);
const other = (name: string, alive = true) => createPlayer(name, "villager", alive);

describe("checkWin", () => {
  it("village wins when the only wolf is dead", () => {
    const players = [wolf("W", false), other("A"), other("B"), other("C"), other("D")];
    expect(checkWin(makeState({ players }))).toBe("village");
  });

  it("werewolves win on parity", () => {
    const players = [wolf("W"), other("A"), other("B", false), other("C", false), other("D", false)];
    expect(checkWin(makeState({ players }))).toBe("werewolves");
  });

  it("werewolves win when they outnumber everyone else", () => {
    const players = [wolf("W1"), wolf("W2"), other("A")];
    expect(checkWin(makeState({ players }))).toBe("werewolves");
  });

  it("returns null while both sides live and the village leads", () => {
    const players = [wolf("W"), other("A"), other("B")];
    expect(checkWin(makeState({ players }))).toBeNull();
  });

  it("returns null when nobody is alive", () => {
    expect(checkWin(makeState({ players: [wolf("W", false), other("A", false)] }))).toBeNull();
  });

  it("counts every non-wolf role on the village side", () => {
    const players = [wolf("W"), createPlayer("P", "prince"), createPlayer("G", "gambler")];
    expect(checkWin(makeState({ players }))).toBeNull();
  });
});

describe("settleWinner", () => {
  it("ends the game and resets voting when a faction has won", () => {
    const state = makeState({
      players: [wolf("W"), other("A")],
      phase: "day",
      votingStatus: "voting",
      voteDurationSec: 30,
      activeCall: "guard"
    });
    expect(settleWinner(state)).toMatchObject({
      phase: "ended",
      winner: "werewolves",
      votingStatus: "idle",
      voteDurationSec: null,
      activeCall: null
    });
  });

  it("returns the same snapshot while the game goes on", () => {
    const state = makeState({ players: [wolf("W"), other("A"), other("B")] });
    expect(settleWinner(state)).toBe(state);
  });
});
