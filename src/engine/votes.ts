import type { Ruleset } from "./catalog";
import { DEFAULT_RULESET } from "./catalog";
import { announce } from "./chat";
import type { GameState } from "./types";
import { GameRuleError } from "./types";
import { assertPlayer, cloneGame, ensureActive, killPlayer, livingPlayers, majorityThreshold } from "./utils";
import { settleWinner } from "./win";

export const ELIMINATION_CAUSE = "Eliminated";

/** Votes for one choice; `target === null` is a vote for no elimination. */
export interface VoteTally {
  target: string | null;
  voters: string[];
}

function ensureVoting(game: GameState): void {
  const phase = ensureActive(game);
  if (!game.options.votingPhases.includes(phase)) {
    throw new GameRuleError("NOT_A_VOTING_PHASE", `No voting during ${phase}`);
  }
}

/** Records a living player's vote, replacing any earlier one. Announced in the global channel. */
export function castVote(game: GameState, voterName: string, targetName: string | null, now: number): GameState {
  ensureVoting(game);
  const voter = assertPlayer(game, voterName, { mustBeAlive: true });
  let target: string | null = null;
  if (targetName !== null) {
    const player = assertPlayer(game, targetName);
    if (!player.alive) {
      throw new GameRuleError("INVALID_TARGET", `${targetName} is dead`);
    }
    target = player.name;
  }

  const next = cloneGame(game);
  delete next.votes[voter.name];
  next.votes[voter.name] = target;
  announce(next, target === null ? `${voter.name} voted for no elimination.` : `${voter.name} voted for ${target}.`, now);
  return next;
}

/** Withdraws a vote; no-op when the player has not voted. */
export function withdrawVote(game: GameState, voterName: string, now: number): GameState {
  ensureVoting(game);
  const voter = assertPlayer(game, voterName, { mustBeAlive: true });
  if (!(voter.name in game.votes)) return game;
  const next = cloneGame(game);
  delete next.votes[voter.name];
  announce(next, `${voter.name} withdrew their vote.`, now);
  return next;
}

/** Current votes of living voters, most votes first, ties in order of the first vote cast. */
export function tallyVotes(game: GameState): VoteTally[] {
  const alive = new Set(livingPlayers(game.players).map(p => p.name));
  const tallies: VoteTally[] = [];
  for (const [voter, target] of Object.entries(game.votes)) {
    if (!alive.has(voter)) continue;
    const tally = tallies.find(t => t.target === target);
    if (tally) tally.voters.push(voter);
    else tallies.push({ target, voters: [voter] });
  }
  return tallies.sort((a, b) => b.voters.length - a.voters.length);
}

/** Human readable vote count, one line per choice. */
export function formatVoteCount(game: GameState): string {
  const alive = livingPlayers(game.players);
  const tallies = tallyVotes(game);
  const lines = tallies.map(t => `${t.target ?? "No elimination"} (${t.voters.length}): ${t.voters.join(", ")}`);
  const idle = alive.filter(p => !(p.name in game.votes)).map(p => p.name);
  if (idle.length > 0) lines.push(`Not voting (${idle.length}): ${idle.join(", ")}`);
  const needed = majorityThreshold(alive.length);
  const header = `Vote count, day ${game.dayNumber}:`;
  const footer = `With ${alive.length} alive, it takes ${needed} to eliminate.`;
  return [header, ...lines, footer].join("\n");
}

export function postVoteCount(game: GameState, now: number): GameState {
  ensureActive(game);
  const next = cloneGame(game);
  announce(next, formatVoteCount(game), now);
  return next;
}

export function clearVotes(game: GameState): GameState {
  ensureActive(game);
  return { ...game, votes: {} };
}

/**
 * Eliminates the player holding a strict majority of living voters, then runs the win check.
 * Votes are cleared either way. Returns a new snapshot.
 */
export function eliminateByVote(game: GameState, now: number, ruleset: Ruleset = DEFAULT_RULESET): GameState {
  ensureVoting(game);
  const next = cloneGame(game);
  const needed = majorityThreshold(livingPlayers(next.players).length);
  const leader = tallyVotes(next).find(t => t.target !== null && t.voters.length >= needed);
  next.votes = {};

  if (!leader || leader.target === null) {
    announce(next, "Nobody was eliminated.", now);
    return next;
  }
  const victim = assertPlayer(next, leader.target);
  killPlayer(victim, ELIMINATION_CAUSE);
  announce(next, `${victim.name} was eliminated.`, now);
  settleWinner(next, now, ruleset);
  return next;
}
