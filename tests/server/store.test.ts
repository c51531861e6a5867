import { describe, expect, it } from "vitest";
import { GameStore } from "../../src/server/store";
import type { GameState } from "../../src/engine/types";
import { mafia, makeGame, ruleErrorCode, town } from "../support";

const newGame = () => makeGame({ Alice: town("Vanilla"), Eve: mafia() });

describe("GameStore", () => {
  it("creates and fetches games", () => {
    const store = new GameStore();
    const game = newGame();
    store.create(game, "test-secret", 5);
    expect(store.get("g1")).toBe(game);
    expect(store.getRecord("g1")).toEqual({ game, modToken: "test-secret", createdAt: 5 });
    expect(store.list()).toHaveLength(1);
    expect(() => store.create(game, "test-secret", 5)).toThrowError(/already exists/);
  });

  it("reports missing games as rule errors", () => {
    expect(ruleErrorCode(() => new GameStore().require("nope"))).toBe("GAME_NOT_FOUND");
  });

  it("commits updates and notifies listeners", () => {
    const store = new GameStore();
    store.create(newGame(), "test-secret", 0);
    const seen: GameState[] = [];
    const unsubscribe = store.subscribe(game => seen.push(game));

    const updated = store.withGame("g1", game => ({ ...game, dayNumber: 2 }));
    expect(store.get("g1")).toBe(updated);
    expect(seen).toEqual([updated]);

    store.withGame("g1", game => game);
    expect(seen).toHaveLength(1);

    unsubscribe();
    store.withGame("g1", game => ({ ...game, dayNumber: 3 }));
    expect(seen).toHaveLength(1);
  });

  it("keeps the stored snapshot when an update throws", () => {
    const store = new GameStore();
    const game = newGame();
    store.create(game, "test-secret", 0);
    expect(() =>
      store.withGame("g1", () => {
        throw new Error("boom");
      })
    ).toThrowError("boom");
    expect(store.get("g1")).toBe(game);
  });

  it("refuses updates that change the game id", () => {
    const store = new GameStore();
    store.create(newGame(), "test-secret", 0);
    expect(() => store.withGame("g1", game => ({ ...game, gameId: "other" }))).toThrowError(/mismatch/);
  });

  it("deletes games", () => {
    const store = new GameStore();
    store.create(newGame(), "test-secret", 0);
    store.delete("g1");
    expect(store.get("g1")).toBeUndefined();
  });
});
