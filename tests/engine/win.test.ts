import { describe, expect, it } from "vitest";
import { GLOBAL_CHAT } from "../../src/engine/chat";
import { checkWin, settleWinner } from "../../src/engine/win";
import { act, NOW, mafia, makeGame, town, withDead } from "../support";

const seats = () => ({ Alice: town("Cop"), Bob: town("Vanilla"), Eve: mafia(), Mal: mafia() });

describe("checkWin", () => {
  it("keeps going while rival factions are alive", () => {
    expect(checkWin(makeGame(seats()))).toBeNull();
    expect(checkWin(withDead(makeGame(seats()), "Eve"))).toBeNull();
  });

  it("awards the last faction standing", () => {
    expect(checkWin(withDead(makeGame(seats()), "Eve", "Mal"))).toEqual(["Town"]);
    expect(checkWin(withDead(makeGame(seats()), "Alice", "Bob"))).toEqual(["Mafia"]);
  });

  it("calls a draw when nobody is left", () => {
    expect(checkWin(withDead(makeGame(seats()), "Alice", "Bob", "Eve", "Mal"))).toEqual([]);
  });

  it("lets a serial killer win by outliving everyone", () => {
    const game = makeGame({ Sam: { role: "Vanilla", alignment: "Serial Killer" }, Alice: town("Vanilla"), Eve: mafia() });
    expect(checkWin(game)).toBeNull();
    expect(checkWin(withDead(game, "Alice", "Eve"))).toEqual(["Serial Killer"]);
    expect(checkWin(withDead(game, "Sam", "Eve"))).toEqual(["Town"]);
  });

  it("returns the recorded winners of a resolved game", () => {
    const over = { ...makeGame(seats()), phase: "RESOLVED" as const, winners: ["Mafia"] };
    expect(checkWin(over)).toEqual(["Mafia"]);
  });
});

describe("settleWinner", () => {
  it("resolves the game, drops the queue and announces the result", () => {
    const game = withDead(act(makeGame(seats()), "Alice", "Cop", ["Eve"]), "Eve", "Mal");
    settleWinner(game, NOW);
    expect(game.phase).toBe("RESOLVED");
    expect(game.lastPhase).toBe("NIGHT");
    expect(game.winners).toEqual(["Town"]);
    expect(game.queue).toEqual([]);
    expect(game.chats[GLOBAL_CHAT].messages.at(-1)?.content).toBe("The game is over. Winners: Town.");
  });

  it("announces a draw", () => {
    const game = withDead(makeGame(seats()), "Alice", "Bob", "Eve", "Mal");
    settleWinner(game, NOW);
    expect(game.winners).toEqual([]);
    expect(game.chats[GLOBAL_CHAT].messages.at(-1)?.content).toBe("The game is over. Nobody won.");
  });

  it("leaves an ongoing game alone", () => {
    const game = makeGame(seats());
    settleWinner(game, NOW);
    expect(game.phase).toBe("NIGHT");
    expect(game.winners).toBeNull();
  });
});
