import { DEFAULT_RULESET, type Ruleset } from "../src/engine/catalog";
import { inboxChatId } from "../src/engine/chat";
import { queueAbility } from "../src/engine/queue";
import { createGame, type GameSetup, type RoleAssignment } from "../src/engine/setup";
import { GameRuleError, type GameState, type Player } from "../src/engine/types";
import { cloneGame, getPlayer, killPlayer } from "../src/engine/utils";

export const NOW = 1_000;

export const town = (role: string, modifiers: RoleAssignment["modifiers"] = []): RoleAssignment => ({
  role,
  alignment: "Town",
  modifiers
});

export const mafia = (role = "Vanilla"): RoleAssignment => ({ role, alignment: "Mafia" });

/** Seats players in insertion order; defaults to night one with no shuffling. */
export function makeGame(
  seats: Record<string, RoleAssignment>,
  overrides: Partial<GameSetup> = {},
  ruleset: Ruleset = DEFAULT_RULESET
): GameState {
  const setup: GameSetup = {
    players: Object.keys(seats),
    roles: Object.values(seats),
    phase: "NIGHT",
    ...overrides
  };
  return createGame("g1", setup, NOW, () => 0, ruleset);
}

export const act = (
  game: GameState,
  user: string,
  abilityId: string,
  targets: string[],
  ruleset: Ruleset = DEFAULT_RULESET
) => queueAbility(game, user, abilityId, "ACTION", targets, NOW, ruleset);

export const factionalKill = (game: GameState, user: string, target: string, ruleset: Ruleset = DEFAULT_RULESET) =>
  queueAbility(game, user, "Factional Kill", "SHARED_ACTION", [target], NOW, ruleset);

export const inbox = (game: GameState, name: string) => game.chats[inboxChatId(name)].messages.map(m => m.content);

export function player(game: GameState, name: string): Player {
  const found = getPlayer(game.players, name);
  if (!found) throw new Error(`No player ${name} in test game`);
  return found;
}

/** Copy of the game with the named players dead. */
export function withDead(game: GameState, ...names: string[]): GameState {
  const next = cloneGame(game);
  for (const name of names) killPlayer(player(next, name), "Test");
  return next;
}

/** Code of the rule error thrown by `fn`, or null when it does not throw. Other errors propagate. */
export function ruleErrorCode(fn: () => unknown): string | null {
  try {
    fn();
  } catch (err) {
    if (err instanceof GameRuleError) return err.code;
    throw err;
  }
  return null;
}
