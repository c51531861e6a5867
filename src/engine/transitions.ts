import type { Ruleset } from "./catalog";
import { DEFAULT_RULESET } from "./catalog";
import { clearQueue } from "./queue";
import { resolvePhase } from "./resolver";
import type { GameState, Phase } from "./types";
import { GameRuleError } from "./types";
import { clearVotes, eliminateByVote, postVoteCount } from "./votes";

/** Moderator commands accepted by `applyActions`, listed in the order they run. */
export const GAME_ACTIONS = [
  "clear_queue",
  "resolve",
  "eliminate",
  "post_vote_count",
  "clear_votes",
  "next_phase"
] as const;

export type GameAction = (typeof GAME_ACTIONS)[number];

/**
 * Ensures the state machine is in one of the allowed phases before continuing.
 * Throws a GameRuleError if the guard fails.
 */
export function ensurePhase(game: GameState, expected: Phase | Phase[], message: string): void {
  const allowed: string[] = Array.isArray(expected) ? expected : [expected];
  if (!allowed.includes(game.phase)) {
    throw new GameRuleError("ILLEGAL_PHASE_TRANSITION", message);
  }
}

/** Resolves everything queued for the current phase. */
export function resolve(game: GameState, now: number, ruleset: Ruleset = DEFAULT_RULESET): GameState {
  return resolvePhase(game, now, ruleset);
}

/**
 * DAY(n) -> NIGHT(n) and NIGHT(n) -> DAY(n + 1).
 * Refused from RESOLVED and while entries for the current phase are still queued;
 * those must be resolved or cleared first. Votes are reset.
 */
export function nextPhase(game: GameState): GameState {
  ensurePhase(game, ["DAY", "NIGHT"], "A resolved game has no further phases");
  const phase: Phase = game.phase === "DAY" ? "DAY" : "NIGHT";
  const pending = game.queue.some(e => e.phase === phase && e.dayNumber === game.dayNumber);
  if (pending) {
    throw new GameRuleError("ILLEGAL_PHASE_TRANSITION", "Resolve or clear the queue before advancing");
  }
  const next: Phase = phase === "DAY" ? "NIGHT" : "DAY";
  return {
    ...game,
    phase: next,
    lastPhase: next,
    dayNumber: phase === "NIGHT" ? game.dayNumber + 1 : game.dayNumber,
    queue: [],
    votes: {}
  };
}

export interface PhaseUpdate {
  phase?: Phase;
  dayNumber?: number;
}

/** Moderator override of the phase and day counter. Pending entries and votes are dropped. */
export function setPhase(game: GameState, update: PhaseUpdate): GameState {
  ensurePhase(game, ["DAY", "NIGHT"], "A resolved game cannot change phase");
  const dayNumber = update.dayNumber ?? game.dayNumber;
  if (!Number.isInteger(dayNumber) || dayNumber < 1) {
    throw new GameRuleError("ILLEGAL_PHASE_TRANSITION", "dayNumber must be a positive integer");
  }
  const phase = update.phase ?? game.lastPhase;
  return { ...game, phase, lastPhase: phase, dayNumber, queue: [], votes: {} };
}

/**
 * Runs a moderator action list. Actions always run in `GAME_ACTIONS` order whatever
 * order they were sent in, so a resolve lands before the phase advance.
 * Once an action in the call ends the game the remaining ones are skipped.
 */
export function applyActions(
  game: GameState,
  actions: readonly GameAction[],
  now: number,
  ruleset: Ruleset = DEFAULT_RULESET
): GameState {
  const requested = new Set(actions);
  let current = game;
  for (const action of GAME_ACTIONS) {
    if (!requested.has(action)) continue;
    if (current.phase === "RESOLVED" && game.phase !== "RESOLVED") break;
    switch (action) {
      case "clear_queue":
        current = clearQueue(current);
        break;
      case "resolve":
        current = resolve(current, now, ruleset);
        break;
      case "eliminate":
        current = eliminateByVote(current, now, ruleset);
        break;
      case "post_vote_count":
        current = postVoteCount(current, now);
        break;
      case "clear_votes":
        current = clearVotes(current);
        break;
      case "next_phase":
        current = nextPhase(current);
        break;
      default: {
        const exhaustive: never = action;
        throw new GameRuleError("ILLEGAL_PHASE_TRANSITION", `Unknown action ${exhaustive}`);
      }
    }
  }
  return current;
}
