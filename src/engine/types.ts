/**
 * Core domain types for the resolution engine.
 * Keep this file dependency-free so it can be shared across layers.
 */

/** The two phases a running game alternates between. */
export type Phase = "DAY" | "NIGHT";

/** Phase marker stored on the game; `RESOLVED` is terminal. */
export type GamePhase = Phase | "RESOLVED";

export type AbilityType = "ACTION" | "SHARED_ACTION" | "PASSIVE";

/** Tie-break buckets for abilities that share a priority. */
export type EffectCategory = "CONTROL" | "PROTECTIVE" | "INFORMATIONAL" | "OFFENSIVE" | "CLEANUP";

export const EFFECT_CATEGORIES: readonly EffectCategory[] = [
  "CONTROL",
  "PROTECTIVE",
  "INFORMATIONAL",
  "OFFENSIVE",
  "CLEANUP"
];

/** Result an alignment reports when its win predicate is evaluated. */
export type WinResult = "WIN" | "LOSE" | "ONGOING";

/**
 * What happened to one entry of a resolution pass.
 * - SUCCESS: the effect applied.
 * - BLOCKED: a kill stopped by protection.
 * - FAILED: the ability ran but had nothing to act on.
 * - FIZZLED: skipped (roleblocked, user or target dead, resolve-time veto).
 */
export type ResolutionOutcome = "SUCCESS" | "BLOCKED" | "FAILED" | "FIZZLED";

/** A modifier reference as written in a role assignment. */
export interface ModifierSpec {
  id: string;
  params?: Record<string, unknown>;
}

/** One ability owned by a player or an alignment, with the modifier chain composed onto it. */
export interface AbilitySlot {
  abilityId: string;
  type: AbilityType;
  /** Applied in order; the first entry wraps the base ability. */
  modifiers: ModifierSpec[];
}

/** Mutable per-game counters of a single ability instance. */
export interface AbilityUsage {
  uses: number;
  lastUsedDay: number | null;
  lastTargets: string[];
}

/**
 * Server-side representation of a seated player.
 * Players are never removed; death flips `alive` and appends a cause.
 */
export interface Player {
  name: string;
  alive: boolean;
  deathCauses: string[];
  /** Composed role id, e.g. "1-Shot Doctor". */
  roleId: string;
  /** Display name combining role and alignment, e.g. "Town Doctor". */
  roleName: string;
  /** Base role templates the role was built from. */
  roleTemplates: string[];
  alignmentId: string;
  actions: AbilitySlot[];
  passives: AbilitySlot[];
  usage: Record<string, AbilityUsage>;
}

/** A faction instance in a game; several may share one template. */
export interface AlignmentState {
  id: string;
  templateId: string;
  sharedActions: AbilitySlot[];
  usage: Record<string, AbilityUsage>;
}

/** A pending ability invocation waiting for the phase to resolve. */
export interface QueuedAbility {
  abilityId: string;
  type: AbilityType;
  /** Player performing the ability. */
  user: string;
  /** Player name for actions and passives, alignment id for shared actions. */
  owner: string;
  targets: string[];
  phase: Phase;
  dayNumber: number;
  /** Insertion stamp, the last tie-break of the resolution order. */
  seq: number;
}

/** Fields one player has learned about another. */
export interface KnowledgeFact {
  alignment?: string;
  role?: string;
  roleName?: string;
}

/** observer -> subject -> fact */
export type KnowledgeBook = Record<string, Record<string, KnowledgeFact>>;

export type ChannelKind = "GLOBAL" | "FACTION" | "GROUP" | "INBOX" | "DIRECT";

export interface ChatMessage {
  author: string;
  timestamp: number;
  content: string;
}

export interface ChatChannel {
  id: string;
  kind: ChannelKind;
  /** Empty for the global channel. */
  members: string[];
  messages: ChatMessage[];
}

/** Audit record of one resolved (or skipped) ability. Moderator-only. */
export interface ResolutionLogEntry {
  dayNumber: number;
  phase: Phase;
  abilityId: string;
  type: AbilityType;
  user: string;
  targets: string[];
  outcome: ResolutionOutcome;
  detail?: string;
}

/** Per-game knobs chosen at creation. */
export interface GameOptions {
  /** Dead players are disclosed to everyone. */
  revealOnDeath: boolean;
  /** Phases in which the global channel is closed to players. */
  quietPhases: Phase[];
  votingPhases: Phase[];
  /** Tie-break order for equal priorities; must list every category once. */
  categoryOrder: EffectCategory[];
}

/**
 * Immutable snapshot of the entire game world.
 * Key invariants:
 * - `winners !== null` iff `phase === "RESOLVED"`.
 * - `queue` holds at most one entry per (ability, owner).
 * - `lastPhase` is the phase the game was in when it resolved, otherwise equal to `phase`.
 */
export interface GameState {
  gameId: string;
  phase: GamePhase;
  lastPhase: Phase;
  dayNumber: number;
  players: Player[];
  alignments: AlignmentState[];
  queue: QueuedAbility[];
  nextSeq: number;
  knowledge: KnowledgeBook;
  chats: Record<string, ChatChannel>;
  votes: Record<string, string | null>;
  log: ResolutionLogEntry[];
  winners: string[] | null;
  options: GameOptions;
}

/** Who is looking at the game. Authorization itself happens outside the engine. */
export type Viewer = { kind: "NONE" } | { kind: "PLAYER"; name: string } | { kind: "MODERATOR" };

export type RuleErrorCode =
  | "INVALID_TARGET"
  | "INVALID_TARGET_COUNT"
  | "INELIGIBLE_NOW"
  | "UNKNOWN_ABILITY"
  | "ILLEGAL_PHASE_TRANSITION"
  | "GAME_ALREADY_RESOLVED"
  | "INVALID_SETUP"
  | "PLAYER_NOT_FOUND"
  | "CHAT_NOT_FOUND"
  | "CHAT_FORBIDDEN"
  | "NOT_A_VOTING_PHASE"
  | "GAME_NOT_FOUND"
  | "NOT_AUTHENTICATED"
  | "FORBIDDEN";

/** Application-level error for rejected operations. Surfaces to clients as structured error codes. */
export class GameRuleError extends Error {
  constructor(public code: RuleErrorCode, message: string) {
    super(message);
    this.name = "GameRuleError";
  }
}

/** Raised when an internal invariant breaks. Indicates a defect, never a user mistake. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}
