import type { Ruleset } from "./catalog";
import { DEFAULT_RULESET } from "./catalog";
import { isEligible, liveAbility } from "./instances";
import { resolveImmediate } from "./resolver";
import type { GameState, QueuedAbility } from "./types";
import { GameRuleError, InvariantError } from "./types";
import { assertPlayer, cloneGame, ensureActive, getPlayer } from "./utils";

/** Abilities a player can queue by hand. Passives fire on their own. */
export type QueueableType = "ACTION" | "SHARED_ACTION";

export interface AbilityRequest {
  abilityId: string;
  type: QueueableType;
  /** Null withdraws a queued use. */
  targets: string[] | null;
}

/** Identity of a queue slot: one entry per ability and owner. */
export function queueKey(entry: Pick<QueuedAbility, "type" | "owner" | "abilityId">): string {
  const scope = entry.type === "SHARED_ACTION" ? "alignment" : "player";
  return `${scope}:${entry.owner}:${entry.abilityId}`;
}

/** Throws when two entries share a key. A duplicate means the queue logic is broken. */
export function assertQueueUnique(queue: readonly QueuedAbility[]): void {
  const seen = new Set<string>();
  for (const entry of queue) {
    const key = queueKey(entry);
    if (seen.has(key)) {
      throw new InvariantError(`Duplicate queue entry ${key}`);
    }
    seen.add(key);
  }
}

/** Read-only view of the pending entries in insertion order. */
export function queueSnapshot(game: GameState): readonly QueuedAbility[] {
  return game.queue.map(entry => ({ ...entry, targets: [...entry.targets] }));
}

/** The pending entry a player sees for an ability, including a teammate's claim on a shared action. */
export function findQueued(game: GameState, user: string, abilityId: string, type: QueueableType): QueuedAbility | null {
  const player = getPlayer(game.players, user);
  if (!player) return null;
  const owner = type === "SHARED_ACTION" ? player.alignmentId : player.name;
  const key = queueKey({ type, owner, abilityId });
  return game.queue.find(entry => queueKey(entry) === key) ?? null;
}

/**
 * Queues (or re-queues) an ability with the chosen targets.
 * Re-queuing replaces the previous entry; for shared actions the new member takes over the claim.
 * Immediate abilities resolve right away instead of entering the queue.
 * Returns a new snapshot; the input is never modified.
 */
export function queueAbility(
  game: GameState,
  userName: string,
  abilityId: string,
  type: QueueableType,
  targets: string[],
  now: number,
  ruleset: Ruleset = DEFAULT_RULESET
): GameState {
  const phase = ensureActive(game);
  const user = assertPlayer(game, userName);
  const live = liveAbility(game, ruleset, user, abilityId, type);
  if (!live) {
    throw new GameRuleError("UNKNOWN_ABILITY", `${userName} has no ${type === "ACTION" ? "action" : "shared action"} ${abilityId}`);
  }
  const { ability, ctx } = live;
  if (!isEligible(ability, ctx)) {
    throw new GameRuleError("INELIGIBLE_NOW", `${abilityId} cannot be used by ${userName} now`);
  }
  if (targets.length !== ability.targetCount) {
    throw new GameRuleError(
      "INVALID_TARGET_COUNT",
      `${abilityId} takes ${ability.targetCount} target(s), got ${targets.length}`
    );
  }
  const chosen = targets.map(name => {
    const target = getPlayer(game.players, name);
    if (!target || !target.alive || !ability.legalTarget(ctx, target)) {
      throw new GameRuleError("INVALID_TARGET", `${name} is not a legal target for ${abilityId}`);
    }
    return target;
  });
  if (!ability.allowTargets(ctx, chosen)) {
    throw new GameRuleError("INELIGIBLE_NOW", `${abilityId} cannot be used on that selection now`);
  }

  const entry: QueuedAbility = {
    abilityId,
    type,
    user: user.name,
    owner: live.owner,
    targets: [...targets],
    phase,
    dayNumber: game.dayNumber,
    seq: game.nextSeq
  };
  if (ability.immediate) {
    return resolveImmediate(game, entry, now, ruleset);
  }

  const key = queueKey(entry);
  const next = cloneGame(game);
  next.queue = [...next.queue.filter(e => queueKey(e) !== key), entry];
  next.nextSeq += 1;
  assertQueueUnique(next.queue);
  return next;
}

/** Removes a pending entry; no-op when nothing is queued. Any alignment member may withdraw a shared claim. */
export function dequeueAbility(game: GameState, userName: string, abilityId: string, type: QueueableType): GameState {
  ensureActive(game);
  const user = assertPlayer(game, userName);
  const queued = findQueued(game, user.name, abilityId, type);
  if (!queued) return game;
  const key = queueKey(queued);
  return { ...game, queue: game.queue.filter(e => queueKey(e) !== key) };
}

/** Applies a batch of queue and dequeue requests as one change: all succeed or none do. */
export function queueAbilities(
  game: GameState,
  userName: string,
  requests: readonly AbilityRequest[],
  now: number,
  ruleset: Ruleset = DEFAULT_RULESET
): GameState {
  return requests.reduce(
    (current, request) =>
      request.targets === null
        ? dequeueAbility(current, userName, request.abilityId, request.type)
        : queueAbility(current, userName, request.abilityId, request.type, request.targets, now, ruleset),
    game
  );
}

/** Drops every pending entry. */
export function clearQueue(game: GameState): GameState {
  ensureActive(game);
  return { ...game, queue: [] };
}
