import { describe, expect, it } from "vitest";
import {
  assertQueueUnique,
  clearQueue,
  dequeueAbility,
  findQueued,
  queueAbilities,
  queueKey,
  queueSnapshot
} from "../../src/engine/queue";
import { InvariantError } from "../../src/engine/types";
import { NOW, act, factionalKill, mafia, makeGame, ruleErrorCode, town, withDead } from "../support";

const seats = () => ({ Alice: town("Cop"), Bob: town("Bus Driver"), Carl: town("Vanilla"), Eve: mafia(), Mal: mafia() });

describe("queueAbility", () => {
  it("stores an entry stamped with the phase and an insertion number", () => {
    const game = act(makeGame(seats()), "Alice", "Cop", ["Eve"]);
    expect(game.queue).toEqual([
      {
        abilityId: "Cop",
        type: "ACTION",
        user: "Alice",
        owner: "Alice",
        targets: ["Eve"],
        phase: "NIGHT",
        dayNumber: 1,
        seq: 1
      }
    ]);
    expect(game.nextSeq).toBe(2);
  });

  it("never modifies the input snapshot", () => {
    const game = makeGame(seats());
    act(game, "Alice", "Cop", ["Eve"]);
    expect(game.queue).toEqual([]);
  });

  it("replaces an earlier entry for the same ability", () => {
    let game = act(makeGame(seats()), "Alice", "Cop", ["Carl"]);
    game = act(game, "Alice", "Cop", ["Eve"]);
    expect(game.queue).toHaveLength(1);
    expect(game.queue[0].targets).toEqual(["Eve"]);
    expect(game.queue[0].seq).toBe(2);
  });

  it("lets another member take over a shared action", () => {
    let game = factionalKill(makeGame(seats()), "Eve", "Alice");
    game = factionalKill(game, "Mal", "Bob");
    expect(game.queue).toHaveLength(1);
    expect(game.queue[0]).toMatchObject({ user: "Mal", owner: "Mafia", targets: ["Bob"] });
    expect(findQueued(game, "Eve", "Factional Kill", "SHARED_ACTION")?.user).toBe("Mal");
  });

  it("rejects abilities the player does not hold", () => {
    expect(ruleErrorCode(() => act(makeGame(seats()), "Carl", "Cop", ["Eve"]))).toBe("UNKNOWN_ABILITY");
    expect(ruleErrorCode(() => factionalKill(makeGame(seats()), "Alice", "Eve"))).toBe("UNKNOWN_ABILITY");
  });

  it("rejects abilities outside their phase or held by the dead", () => {
    expect(ruleErrorCode(() => act(makeGame(seats(), { phase: "DAY" }), "Alice", "Cop", ["Eve"]))).toBe("INELIGIBLE_NOW");
    const game = withDead(makeGame(seats()), "Alice");
    expect(ruleErrorCode(() => act(game, "Alice", "Cop", ["Eve"]))).toBe("INELIGIBLE_NOW");
  });

  it("validates the target count", () => {
    const game = makeGame(seats());
    expect(ruleErrorCode(() => act(game, "Alice", "Cop", []))).toBe("INVALID_TARGET_COUNT");
    expect(ruleErrorCode(() => act(game, "Alice", "Cop", ["Eve", "Mal"]))).toBe("INVALID_TARGET_COUNT");
  });

  it("validates each target", () => {
    const game = withDead(makeGame(seats()), "Carl");
    expect(ruleErrorCode(() => act(game, "Alice", "Cop", ["Alice"]))).toBe("INVALID_TARGET");
    expect(ruleErrorCode(() => act(game, "Alice", "Cop", ["Zed"]))).toBe("INVALID_TARGET");
    expect(ruleErrorCode(() => act(game, "Alice", "Cop", ["Carl"]))).toBe("INVALID_TARGET");
    expect(ruleErrorCode(() => factionalKill(game, "Eve", "Mal"))).toBe("INVALID_TARGET");
  });

  it("rejects a selection the ability refuses as a whole", () => {
    expect(ruleErrorCode(() => act(makeGame(seats()), "Bob", "Bus Driver", ["Carl", "Carl"]))).toBe("INELIGIBLE_NOW");
  });

  it("rejects unknown users and resolved games", () => {
    const game = makeGame(seats());
    expect(ruleErrorCode(() => act(game, "Zed", "Cop", ["Eve"]))).toBe("PLAYER_NOT_FOUND");
    const over = { ...game, phase: "RESOLVED" as const, winners: ["Town"] };
    expect(ruleErrorCode(() => act(over, "Alice", "Cop", ["Eve"]))).toBe("GAME_ALREADY_RESOLVED");
  });
});

describe("dequeue and batches", () => {
  it("withdraws a queued entry and ignores a missing one", () => {
    const game = act(makeGame(seats()), "Alice", "Cop", ["Eve"]);
    expect(dequeueAbility(game, "Alice", "Cop", "ACTION").queue).toEqual([]);
    const empty = makeGame(seats());
    expect(dequeueAbility(empty, "Alice", "Cop", "ACTION")).toBe(empty);
  });

  it("lets any member withdraw the shared claim", () => {
    const game = factionalKill(makeGame(seats()), "Eve", "Alice");
    expect(dequeueAbility(game, "Mal", "Factional Kill", "SHARED_ACTION").queue).toEqual([]);
  });

  it("applies a batch as one change", () => {
    const game = makeGame(seats());
    const next = queueAbilities(
      game,
      "Eve",
      [{ abilityId: "Factional Kill", type: "SHARED_ACTION", targets: ["Carl"] }],
      NOW
    );
    expect(next.queue.map(queueKey)).toEqual(["alignment:Mafia:Factional Kill"]);

    const withdrawn = queueAbilities(next, "Eve", [{ abilityId: "Factional Kill", type: "SHARED_ACTION", targets: null }], NOW);
    expect(withdrawn.queue).toEqual([]);

    expect(
      ruleErrorCode(() =>
        queueAbilities(
          game,
          "Alice",
          [
            { abilityId: "Cop", type: "ACTION", targets: ["Eve"] },
            { abilityId: "Doctor", type: "ACTION", targets: ["Bob"] }
          ],
          NOW
        )
      )
    ).toBe("UNKNOWN_ABILITY");
    expect(game.queue).toEqual([]);
  });

  it("clears every pending entry", () => {
    const game = factionalKill(act(makeGame(seats()), "Alice", "Cop", ["Eve"]), "Eve", "Carl");
    expect(clearQueue(game).queue).toEqual([]);
  });
});

describe("queue helpers", () => {
  it("hands out copies in snapshots", () => {
    const game = act(makeGame(seats()), "Alice", "Cop", ["Eve"]);
    const [entry] = queueSnapshot(game);
    entry.targets.push("Mal");
    expect(game.queue[0].targets).toEqual(["Eve"]);
  });

  it("treats a duplicate key as a defect", () => {
    const game = act(makeGame(seats()), "Alice", "Cop", ["Eve"]);
    expect(() => assertQueueUnique([...game.queue, { ...game.queue[0], seq: 9 }])).toThrowError(InvariantError);
  });
});
