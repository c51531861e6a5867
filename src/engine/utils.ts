/** Utility helpers shared across engine modules. */
import type { GameState, Phase, Player } from "./types";
import { GameRuleError } from "./types";

export type RandomFn = () => number;

/** Default RNG, override in tests for determinism. */
export const defaultRandom: RandomFn = () => Math.random();

/** Wall-clock helper for transitions. */
export const nowMs = () => Date.now();

/** Fisher-Yates shuffle (pure). */
export function shuffle<T>(items: readonly T[], random: RandomFn = defaultRandom): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/** Deep copy of a snapshot; every engine mutation works on one of these. */
export function cloneGame(game: GameState): GameState {
  return structuredClone(game);
}

/** Returns only the living players. */
export function livingPlayers(players: readonly Player[]): Player[] {
  return players.filter(p => p.alive);
}

/** Strict majority threshold: floor(n/2) + 1. */
export function majorityThreshold(aliveCount: number): number {
  return Math.floor(aliveCount / 2) + 1;
}

/** Safe player lookup, null when missing. */
export function getPlayer(players: readonly Player[], name: string): Player | null {
  return players.find(p => p.name === name) ?? null;
}

/** Marks a player dead, recording why. No-op on the already dead. */
export function killPlayer(player: Player, cause: string): boolean {
  if (!player.alive) return false;
  player.alive = false;
  player.deathCauses.push(cause);
  return true;
}

/** Returns the running phase, rejecting any operation on a resolved game. */
export function ensureActive(game: GameState): Phase {
  if (game.phase === "RESOLVED") {
    throw new GameRuleError("GAME_ALREADY_RESOLVED", `Game ${game.gameId} is already resolved`);
  }
  return game.phase;
}

interface AssertOptions {
  mustBeAlive?: boolean;
}

/**
 * Looks up a player and enforces additional invariants (e.g. being alive).
 * @returns the player reference; callers mutate it only on a cloned snapshot.
 */
export function assertPlayer(game: GameState, name: string, opts: AssertOptions = {}): Player {
  const player = getPlayer(game.players, name);
  if (!player) {
    throw new GameRuleError("PLAYER_NOT_FOUND", `Player ${name} not found`);
  }
  if (opts.mustBeAlive && !player.alive) {
    throw new GameRuleError("INELIGIBLE_NOW", `Player ${name} is dead`);
  }
  return player;
}
