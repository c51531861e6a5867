import type { AlignmentTemplate, RoleTemplate, Ruleset } from "./catalog";
import { DEFAULT_RULESET, composeAbility, composeRoleName, requireModifier } from "./catalog";
import { GLOBAL_CHAT, SYSTEM_AUTHOR, appendMessage, factionChatId, groupChatId, notifyPlayer, openChannel } from "./chat";
import { fullFact, learn } from "./knowledge";
import type { AppliedModifier, RoleShape } from "./modifiers";
import type {
  AbilitySlot,
  AbilityType,
  AlignmentState,
  GameOptions,
  GameState,
  ModifierSpec,
  Phase,
  Player
} from "./types";
import { EFFECT_CATEGORIES, GameRuleError } from "./types";
import { type RandomFn, defaultRandom, shuffle } from "./utils";

/** One role handed to one player. */
export interface RoleAssignment {
  /** A role id, or several ids combined into one role. */
  role: string | string[];
  /** Applied in order; the first wraps the base abilities. */
  modifiers?: ModifierSpec[];
  /** Alignment template id. */
  alignment: string;
  /** Instance id, to field two teams built from one template. Defaults to the template id. */
  alignmentId?: string;
}

export interface GameSetup {
  players: string[];
  roles: RoleAssignment[];
  phase?: Phase;
  dayNumber?: number;
  shuffleRoles?: boolean;
  options?: Partial<GameOptions>;
}

export const DEFAULT_GAME_OPTIONS: GameOptions = {
  revealOnDeath: true,
  quietPhases: ["NIGHT"],
  votingPhases: ["DAY"],
  categoryOrder: [...EFFECT_CATEGORIES]
};

/** Merges supplied overrides with the default options. */
export function mergeOptions(overrides: Partial<GameOptions> = {}): GameOptions {
  const order = overrides.categoryOrder ?? DEFAULT_GAME_OPTIONS.categoryOrder;
  const complete = order.length === EFFECT_CATEGORIES.length && EFFECT_CATEGORIES.every(c => order.includes(c));
  if (!complete) {
    throw new GameRuleError("INVALID_SETUP", "categoryOrder must list every effect category exactly once");
  }
  return {
    revealOnDeath: overrides.revealOnDeath ?? DEFAULT_GAME_OPTIONS.revealOnDeath,
    quietPhases: [...(overrides.quietPhases ?? DEFAULT_GAME_OPTIONS.quietPhases)],
    votingPhases: [...(overrides.votingPhases ?? DEFAULT_GAME_OPTIONS.votingPhases)],
    categoryOrder: [...order]
  };
}

function invalid(message: string): never {
  throw new GameRuleError("INVALID_SETUP", message);
}

const unique = (ids: string[]) => [...new Set(ids)];

function slots(ids: string[], type: AbilityType, modifiers: ModifierSpec[]): AbilitySlot[] {
  return ids.map(abilityId => ({ abilityId, type, modifiers: modifiers.map(m => ({ ...m })) }));
}

function checkSlots(ruleset: Ruleset, owner: string, list: AbilitySlot[]): void {
  const seen = new Set<string>();
  for (const slot of list) {
    if (!ruleset.abilities.has(slot.abilityId)) invalid(`Unknown ability ${slot.abilityId} for ${owner}`);
    if (seen.has(slot.abilityId)) invalid(`${owner} holds ${slot.abilityId} twice`);
    seen.add(slot.abilityId);
    const ability = composeAbility(ruleset, slot);
    if (slot.type === "PASSIVE" && ability.targetCount !== 0) {
      invalid(`Passive ${slot.abilityId} of ${owner} cannot take targets`);
    }
  }
}

function alignmentFor(
  ruleset: Ruleset,
  alignments: Map<string, AlignmentState>,
  assignment: RoleAssignment
): { state: AlignmentState; template: AlignmentTemplate } {
  const template = ruleset.alignments.get(assignment.alignment) ?? invalid(`Unknown alignment ${assignment.alignment}`);
  const id = assignment.alignmentId ?? template.id;
  const existing = alignments.get(id);
  if (existing) {
    if (existing.templateId !== template.id) invalid(`Alignment ${id} is used with two templates`);
    return { state: existing, template };
  }
  const state: AlignmentState = {
    id,
    templateId: template.id,
    sharedActions: slots(template.sharedActions, "SHARED_ACTION", []),
    usage: {}
  };
  checkSlots(ruleset, id, state.sharedActions);
  alignments.set(id, state);
  return { state, template };
}

/** Builds the player record for one assignment, composing the modifier chain. */
function instantiatePlayer(
  ruleset: Ruleset,
  name: string,
  assignment: RoleAssignment,
  alignments: Map<string, AlignmentState>
): Player {
  const roleIds = Array.isArray(assignment.role) ? assignment.role : [assignment.role];
  if (roleIds.length === 0) invalid(`No role given for ${name}`);
  const templates: RoleTemplate[] = roleIds.map(id => ruleset.roles.get(id) ?? invalid(`Unknown role ${id}`));
  const { state: alignment, template: alignmentTemplate } = alignmentFor(ruleset, alignments, assignment);

  const specs = assignment.modifiers ?? [];
  const applied: AppliedModifier[] = specs.map(spec => requireModifier(ruleset, spec.id).instantiate(spec.params));

  let shape: RoleShape = {
    actions: unique(templates.flatMap(t => t.actions)),
    passives: unique(templates.flatMap(t => t.passives))
  };
  for (const modifier of applied) {
    if (modifier.role) shape = modifier.role(shape);
  }
  const abilitySpecs = specs.filter((_, index) => applied[index].ability !== undefined);

  const actions = [
    ...slots(shape.actions, "ACTION", abilitySpecs),
    ...slots(alignmentTemplate.actions, "ACTION", [])
  ];
  const passives = [
    ...slots(shape.passives, "PASSIVE", abilitySpecs),
    ...slots(alignmentTemplate.passives, "PASSIVE", [])
  ];
  checkSlots(ruleset, name, [...actions, ...passives]);

  const roleId = applied.reduce((id, modifier) => `${modifier.label} ${id}`, templates.map(t => t.id).join(" "));
  const adjective = templates.every(t => t.adjective);

  return {
    name,
    alive: true,
    deathCauses: [],
    roleId,
    roleName: composeRoleName(roleId, adjective, alignment.id, alignmentTemplate),
    roleTemplates: templates.map(t => t.id),
    alignmentId: alignment.id,
    actions,
    passives,
    usage: {}
  };
}

/** Members of an informed group learn each other's full identity. */
function introduce(game: GameState, members: Player[]): void {
  for (const observer of members) {
    for (const subject of members) {
      if (observer.name !== subject.name) learn(game.knowledge, observer.name, subject.name, fullFact(subject));
    }
  }
}

function openGroupChannel(game: GameState, id: string, kind: "FACTION" | "GROUP", members: Player[], now: number): void {
  const channel = openChannel(game, id, kind, members.map(m => m.name));
  for (const member of members) {
    appendMessage(channel, SYSTEM_AUTHOR, `${member.name} is a ${member.roleName}.`, now);
  }
}

/**
 * Creates the first snapshot of a game: assigns roles (optionally shuffled), composes
 * every modifier chain, seeds informed knowledge and opens the channels.
 * Throws INVALID_SETUP on any inconsistency, so a created game is always well formed.
 */
export function createGame(
  gameId: string,
  setup: GameSetup,
  now: number,
  random: RandomFn = defaultRandom,
  ruleset: Ruleset = DEFAULT_RULESET
): GameState {
  const names = setup.players;
  if (names.length === 0) invalid("A game needs at least one player");
  if (names.length !== setup.roles.length) {
    invalid(`Got ${names.length} players but ${setup.roles.length} roles`);
  }
  for (const name of names) {
    if (name.trim().length === 0 || name.includes(":")) invalid(`Invalid player name "${name}"`);
  }
  if (new Set(names).size !== names.length) invalid("Player names must be unique");
  const dayNumber = setup.dayNumber ?? 1;
  if (!Number.isInteger(dayNumber) || dayNumber < 1) invalid("dayNumber must be a positive integer");

  const assignments = setup.shuffleRoles ? shuffle(setup.roles, random) : setup.roles;
  const alignments = new Map<string, AlignmentState>();
  const players = names.map((name, index) => instantiatePlayer(ruleset, name, assignments[index], alignments));
  const phase = setup.phase ?? "DAY";

  const game: GameState = {
    gameId,
    phase,
    lastPhase: phase,
    dayNumber,
    players,
    alignments: [...alignments.values()],
    queue: [],
    nextSeq: 1,
    knowledge: {},
    chats: {},
    votes: {},
    log: [],
    winners: null,
    options: mergeOptions(setup.options)
  };

  openChannel(game, GLOBAL_CHAT, "GLOBAL", []);
  for (const player of players) {
    notifyPlayer(game, player.name, `You are a ${player.roleName}.`, now);
  }

  for (const alignment of game.alignments) {
    const template = ruleset.alignments.get(alignment.templateId) ?? invalid(`Unknown alignment ${alignment.templateId}`);
    const members = players.filter(p => p.alignmentId === alignment.id);
    if (template.tags.includes("informed")) introduce(game, members);
    if (template.tags.includes("chat")) openGroupChannel(game, factionChatId(alignment.id), "FACTION", members, now);
  }

  for (const template of ruleset.roles.values()) {
    const holders = players.filter(p => p.roleTemplates.includes(template.id));
    if (holders.length === 0) continue;
    if (template.tags.includes("informed")) introduce(game, holders);
    if (template.tags.includes("chat")) openGroupChannel(game, groupChatId(template.id), "GROUP", holders, now);
  }

  return game;
}
