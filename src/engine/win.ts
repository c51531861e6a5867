import type { Ruleset } from "./catalog";
import { DEFAULT_RULESET } from "./catalog";
import { announce } from "./chat";
import type { GameState } from "./types";
import { GameRuleError } from "./types";

/**
 * Computes the winners (if the game is over) for the supplied state.
 * - Only faction alignments decide the end: the game ends when exactly one reports WIN.
 * - With nobody alive the game always ends; an empty list is a draw.
 * - The returned list holds every alignment whose predicate reports WIN.
 */
export function checkWin(game: GameState, ruleset: Ruleset = DEFAULT_RULESET): string[] | null {
  if (game.winners) return game.winners;

  const evaluated = game.alignments.map(alignment => {
    const template = ruleset.alignments.get(alignment.templateId);
    if (!template) {
      throw new GameRuleError("INVALID_SETUP", `Unknown alignment ${alignment.templateId}`);
    }
    return { alignment, template };
  });
  const factions = evaluated.filter(e => e.template.tags.includes("faction")).map(e => e.alignment);
  const results = evaluated.map(({ alignment, template }) => ({
    alignment,
    faction: factions.includes(alignment),
    result: template.checkWin({ game, alignment, factions })
  }));

  const winners = results.filter(r => r.result === "WIN").map(r => r.alignment.id);
  const deciding = results.filter(r => r.faction && r.result === "WIN");
  const anyoneAlive = game.players.some(p => p.alive);

  if (!anyoneAlive || deciding.length === 1) return winners;
  return null;
}

/** Ends the game when a win condition holds. Mutates the supplied working snapshot. */
export function settleWinner(game: GameState, now: number, ruleset: Ruleset = DEFAULT_RULESET): void {
  if (game.phase === "RESOLVED") return;
  const winners = checkWin(game, ruleset);
  if (!winners) return;
  game.lastPhase = game.phase;
  game.phase = "RESOLVED";
  game.winners = winners;
  game.queue = [];
  announce(
    game,
    winners.length > 0 ? `The game is over. Winners: ${winners.join(", ")}.` : "The game is over. Nobody won.",
    now
  );
}
