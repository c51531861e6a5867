import type { Ability } from "./abilities";
import { ABILITIES } from "./abilities";
import type { ModifierDefinition } from "./modifiers";
import { MODIFIERS } from "./modifiers";
import type { AbilitySlot, AlignmentState, GameState, Player, WinResult } from "./types";
import { GameRuleError } from "./types";

/** Immutable role definition. Instantiated per player at game creation. */
export interface RoleTemplate {
  id: string;
  description: string;
  actions: string[];
  passives: string[];
  /**
   * - informed: holders of this role know each other.
   * - chat: holders share a group channel.
   */
  tags: string[];
  /** Named as "<role> <demonym>" rather than "<alignment> <role>". */
  adjective: boolean;
}

export interface WinContext {
  game: GameState;
  alignment: AlignmentState;
  /** Every faction alignment in play, including this one. */
  factions: readonly AlignmentState[];
}

export interface AlignmentTemplate {
  id: string;
  description: string;
  /**
   * - faction: its win predicate can end the game.
   * - town: counted as Town by Weak, Lazy and similar modifiers.
   * - informed: members know each other.
   * - chat: members share a faction channel.
   */
  tags: string[];
  /** Abilities every member gets as personal actions. */
  actions: string[];
  passives: string[];
  /** Abilities owned by the alignment; one member per phase uses each. */
  sharedActions: string[];
  demonym?: string;
  /** Overrides keyed by composed role id. */
  roleNames: Record<string, string>;
  checkWin(ctx: WinContext): WinResult;
}

export interface Ruleset {
  abilities: ReadonlyMap<string, Ability>;
  modifiers: ReadonlyMap<string, ModifierDefinition>;
  roles: ReadonlyMap<string, RoleTemplate>;
  alignments: ReadonlyMap<string, AlignmentTemplate>;
}

export interface RulesetParts {
  abilities?: readonly Ability[];
  modifiers?: readonly ModifierDefinition[];
  roles?: readonly RoleTemplate[];
  alignments?: readonly AlignmentTemplate[];
}

const aliveIn = (game: GameState, alignmentId: string) =>
  game.players.some(p => p.alive && p.alignmentId === alignmentId);

/** Loses when wiped out, wins once no other faction has a living member. */
export function factionWin({ game, alignment, factions }: WinContext): WinResult {
  if (!aliveIn(game, alignment.id)) return "LOSE";
  const rivals = factions.filter(f => f.id !== alignment.id && aliveIn(game, f.id));
  return rivals.length === 0 ? "WIN" : "ONGOING";
}

function role(id: string, description: string, parts: Partial<Omit<RoleTemplate, "id" | "description">> = {}): RoleTemplate {
  return { id, description, actions: [], passives: [], tags: [], adjective: false, ...parts };
}

export const ROLES: readonly RoleTemplate[] = [
  role("Vanilla", "No abilities.", { adjective: true }),
  role("Cop", "Checks the alignment of a player each night.", { actions: ["Cop"] }),
  role("Rolecop", "Checks the role of a player each night.", { actions: ["Rolecop"] }),
  role("Doctor", "Protects a player from one kill each night.", { actions: ["Doctor"] }),
  role("Bodyguard", "Protects a player each night and dies in their place.", { actions: ["Bodyguard"] }),
  role("Bulletproof", "Survives every night kill.", { passives: ["Bulletproof"], adjective: true }),
  role("Jailkeeper", "Blocks and protects a player each night.", { actions: ["Jailkeeper"] }),
  role("Roleblocker", "Blocks a player each night.", { actions: ["Roleblocker"] }),
  role("Bus Driver", "Swaps two players each night.", { actions: ["Bus Driver"] }),
  role("Tracker", "Learns who a player visits.", { actions: ["Tracker"] }),
  role("Watcher", "Learns who visits a player.", { actions: ["Watcher"] }),
  role("Vigilante", "Kills a player at night.", { actions: ["Kill"] }),
  role("Friendly Neighbor", "Reveals their alignment to a player.", { actions: ["Friendly Neighbor"] }),
  role("Innocent Child", "May publicly reveal their alignment once.", { actions: ["Innocent Child"] }),
  role("Mason", "Masons know each other and share a chat.", { tags: ["informed", "chat"] })
];

export const ALIGNMENTS: readonly AlignmentTemplate[] = [
  {
    id: "Town",
    description: "The uninformed majority.",
    tags: ["faction", "town"],
    actions: [],
    passives: [],
    sharedActions: [],
    demonym: "Townie",
    roleNames: {},
    checkWin: factionWin
  },
  {
    id: "Mafia",
    description: "The informed minority.",
    tags: ["faction", "mafia", "informed", "chat"],
    actions: [],
    passives: [],
    sharedActions: ["Factional Kill"],
    demonym: "Mafioso",
    roleNames: { Vanilla: "Mafia Goon" },
    checkWin: factionWin
  },
  {
    id: "Serial Killer",
    description: "A lone killer who wins by outliving everyone.",
    tags: ["faction"],
    actions: ["Serial Kill"],
    passives: [],
    sharedActions: [],
    roleNames: { Vanilla: "Serial Killer" },
    checkWin: ctx => (ctx.game.players.every(p => !p.alive) ? "WIN" : factionWin(ctx))
  }
];

function indexById<T extends { id: string }>(items: readonly T[]): Map<string, T> {
  return new Map(items.map(item => [item.id, item]));
}

export function createRuleset(parts: RulesetParts): Ruleset {
  return {
    abilities: indexById(parts.abilities ?? []),
    modifiers: indexById(parts.modifiers ?? []),
    roles: indexById(parts.roles ?? []),
    alignments: indexById(parts.alignments ?? [])
  };
}

/** Returns a new ruleset with extra or replaced entries; the base is untouched. */
export function extendRuleset(base: Ruleset, parts: RulesetParts): Ruleset {
  return {
    abilities: new Map([...base.abilities, ...indexById(parts.abilities ?? [])]),
    modifiers: new Map([...base.modifiers, ...indexById(parts.modifiers ?? [])]),
    roles: new Map([...base.roles, ...indexById(parts.roles ?? [])]),
    alignments: new Map([...base.alignments, ...indexById(parts.alignments ?? [])])
  };
}

export const DEFAULT_RULESET: Ruleset = createRuleset({
  abilities: ABILITIES,
  modifiers: MODIFIERS,
  roles: ROLES,
  alignments: ALIGNMENTS
});

export function requireModifier(ruleset: Ruleset, id: string): ModifierDefinition {
  const modifier = ruleset.modifiers.get(id);
  if (!modifier) {
    throw new GameRuleError("INVALID_SETUP", `Unknown modifier ${id}`);
  }
  return modifier;
}

/** Builds the live ability of a slot: the registered base wrapped by its modifier chain. */
export function composeAbility(ruleset: Ruleset, slot: AbilitySlot): Ability {
  const base = ruleset.abilities.get(slot.abilityId);
  if (!base) {
    throw new GameRuleError("UNKNOWN_ABILITY", `Unknown ability ${slot.abilityId}`);
  }
  return slot.modifiers.reduce<Ability>((ability, spec) => {
    const applied = requireModifier(ruleset, spec.id).instantiate(spec.params);
    return applied.ability ? applied.ability(ability) : ability;
  }, base);
}

/** Template of an alignment instance in play. */
export function alignmentTemplate(ruleset: Ruleset, game: GameState, alignmentId: string): AlignmentTemplate {
  const instance = game.alignments.find(a => a.id === alignmentId);
  const template = instance ? ruleset.alignments.get(instance.templateId) : undefined;
  if (!template) {
    throw new GameRuleError("INVALID_SETUP", `Unknown alignment ${alignmentId}`);
  }
  return template;
}

/** Alignment tags of a player's alignment. */
export function alignmentTagsOf(ruleset: Ruleset, game: GameState, player: Player): readonly string[] {
  return alignmentTemplate(ruleset, game, player.alignmentId).tags;
}

/**
 * Display name of a role within an alignment:
 * an override by the alignment, "<role> <demonym>" for adjectives, "<alignment> <role>" otherwise.
 */
export function composeRoleName(
  roleId: string,
  adjective: boolean,
  alignmentId: string,
  template: AlignmentTemplate
): string {
  const override = template.roleNames[roleId];
  if (override) return override;
  if (adjective) return `${roleId} ${template.demonym ?? alignmentId}`;
  return `${alignmentId} ${roleId}`;
}
