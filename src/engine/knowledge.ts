import type { GameState, KnowledgeBook, KnowledgeFact, Player, Viewer } from "./types";

const FACT_FIELDS = ["alignment", "role", "roleName"] as const;

/**
 * Records what `observer` learned about `subject`.
 * Fields already known are kept; learning is monotonic and never revokes anything.
 * Mutates the supplied book; callers pass a cloned snapshot.
 */
export function learn(book: KnowledgeBook, observer: string, subject: string, fact: KnowledgeFact): void {
  const known = (book[observer] ??= {});
  const current = (known[subject] ??= {});
  for (const field of FACT_FIELDS) {
    const value = fact[field];
    if (value !== undefined && current[field] === undefined) {
      current[field] = value;
    }
  }
}

/** Returns the merged fact `observer` holds about `subject`, or null when nothing is known. */
export function knows(book: KnowledgeBook, observer: string, subject: string): KnowledgeFact | null {
  const fact = book[observer]?.[subject];
  if (!fact) return null;
  return FACT_FIELDS.some(field => fact[field] !== undefined) ? { ...fact } : null;
}

/** Every fact a player can state about someone: role, role name and alignment. */
export function fullFact(player: Player): KnowledgeFact {
  return { alignment: player.alignmentId, role: player.roleId, roleName: player.roleName };
}

/**
 * What a viewer is allowed to see about a subject beyond name and alive status.
 * Moderators and the subject see everything, as does anyone once a dead player is revealed.
 */
export function disclosedFact(game: GameState, subject: Player, viewer: Viewer): KnowledgeFact {
  if (viewer.kind === "MODERATOR") return fullFact(subject);
  if (viewer.kind === "PLAYER" && viewer.name === subject.name) return fullFact(subject);
  if (!subject.alive && game.options.revealOnDeath) return fullFact(subject);
  if (viewer.kind === "NONE") return {};
  return knows(game.knowledge, viewer.name, subject.name) ?? {};
}

/** Players about whom the observer holds at least one fact. */
export function knownPlayers(game: GameState, observer: string): string[] {
  return game.players
    .filter(p => p.name !== observer && knows(game.knowledge, observer, p.name) !== null)
    .map(p => p.name);
}
