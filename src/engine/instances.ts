import type { Ability, AbilityContext } from "./abilities";
import type { Ruleset } from "./catalog";
import { alignmentTagsOf, composeAbility } from "./catalog";
import type { AbilitySlot, AbilityType, AbilityUsage, GameState, Player } from "./types";
import { InvariantError } from "./types";

/** An ability slot resolved against its owner and counters. */
export interface OwnedSlot {
  slot: AbilitySlot;
  /** Player name, or alignment id for shared actions. */
  owner: string;
  usage: AbilityUsage;
}

export const emptyUsage = (): AbilityUsage => ({ uses: 0, lastUsedDay: null, lastTargets: [] });

/** Locates a slot a player may use: own actions and passives, or the alignment's shared actions. */
export function ownedSlot(game: GameState, user: Player, abilityId: string, type: AbilityType): OwnedSlot | null {
  if (type === "SHARED_ACTION") {
    const alignment = game.alignments.find(a => a.id === user.alignmentId);
    const slot = alignment?.sharedActions.find(s => s.abilityId === abilityId);
    if (!alignment || !slot) return null;
    return { slot, owner: alignment.id, usage: alignment.usage[abilityId] ?? emptyUsage() };
  }
  const list = type === "ACTION" ? user.actions : user.passives;
  const slot = list.find(s => s.abilityId === abilityId);
  if (!slot) return null;
  return { slot, owner: user.name, usage: user.usage[abilityId] ?? emptyUsage() };
}

export function abilityContext(
  game: GameState,
  ruleset: Ruleset,
  user: Player,
  type: AbilityType,
  usage: AbilityUsage
): AbilityContext {
  return { game, user, type, usage, alignmentTags: player => alignmentTagsOf(ruleset, game, player) };
}

/** Phase and liveness gate shared by every ability, followed by the ability's own checks. */
export function isEligible(ability: Ability, ctx: AbilityContext): boolean {
  const { game } = ctx;
  if (game.phase === "RESOLVED" || !ctx.user.alive) return false;
  if (ability.phase !== null && ability.phase !== game.phase) return false;
  return ability.eligible(ctx);
}

/** Living players the ability could be aimed at, in seating order. */
export function legalTargets(ability: Ability, ctx: AbilityContext): string[] {
  return ctx.game.players.filter(p => p.alive && ability.legalTarget(ctx, p)).map(p => p.name);
}

/** A usable ability together with everything needed to check or resolve it. */
export interface LiveAbility extends OwnedSlot {
  ability: Ability;
  ctx: AbilityContext;
}

export function liveAbility(
  game: GameState,
  ruleset: Ruleset,
  user: Player,
  abilityId: string,
  type: AbilityType
): LiveAbility | null {
  const owned = ownedSlot(game, user, abilityId, type);
  if (!owned) return null;
  return {
    ...owned,
    ability: composeAbility(ruleset, owned.slot),
    ctx: abilityContext(game, ruleset, user, type, owned.usage)
  };
}

/** Bumps the counters of an ability after it was used `count` times. Mutates the snapshot. */
export function recordUse(
  game: GameState,
  type: AbilityType,
  owner: string,
  abilityId: string,
  targets: string[],
  count = 1
): void {
  const book =
    type === "SHARED_ACTION"
      ? game.alignments.find(a => a.id === owner)?.usage
      : game.players.find(p => p.name === owner)?.usage;
  if (!book) {
    throw new InvariantError(`No owner ${owner} for ${abilityId}`);
  }
  const usage = (book[abilityId] ??= emptyUsage());
  usage.uses += count;
  usage.lastUsedDay = game.dayNumber;
  usage.lastTargets = [...targets];
}
