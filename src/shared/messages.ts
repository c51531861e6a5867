import type { Ruleset } from "../engine/catalog";
import { DEFAULT_RULESET, composeAbility } from "../engine/catalog";
import type { ChannelSummary } from "../engine/chat";
import { channelSummaries, inboxChatId } from "../engine/chat";
import { isEligible, legalTargets, liveAbility } from "../engine/instances";
import { disclosedFact, knownPlayers } from "../engine/knowledge";
import { findQueued } from "../engine/queue";
import type { AbilitySlot, GamePhase, GameState, Phase, Player, Viewer } from "../engine/types";
import { GameRuleError } from "../engine/types";
import { getPlayer } from "../engine/utils";

/**
 * What a viewer sees of one player. Name and alive status are public;
 * the identity fields only appear when the viewer is entitled to them.
 */
export interface PlayerView {
  name: string;
  alive: boolean;
  role?: string;
  roleName?: string;
  alignment?: string;
  deathCauses?: string[];
}

/** Sanitized game snapshot tailored for a specific viewer. */
export interface GameView {
  gameId: string;
  phase: GamePhase;
  dayNumber: number;
  winners: string[] | null;
  players: PlayerView[];
  chats: ChannelSummary[];
}

/** Full sheet of one player, for the player themself and the moderator. */
export interface PlayerDetailView extends PlayerView {
  actions: string[];
  passives: string[];
  sharedActions: string[];
  knownPlayers: PlayerView[];
  totalMessages: number;
}

export interface ActionView {
  id: string;
  description: string;
  phase: Phase | null;
  immediate: boolean;
  targetCount: number;
  /** Whether it can be queued right now. */
  eligible: boolean;
  /** Legal targets, empty when not eligible. */
  targets: string[];
  /** Targets of the pending entry, null when nothing is queued. */
  queued: string[] | null;
}

export interface SharedActionView extends ActionView {
  /** Member holding the queued use. */
  usedBy: string | null;
}

export interface PassiveView {
  id: string;
  description: string;
  phase: Phase | null;
  /** Fires when the current phase resolves. */
  active: boolean;
}

export interface AbilityListing {
  actions: ActionView[];
  sharedActions: SharedActionView[];
  passives: PassiveView[];
}

/** Redacts a player for the viewer according to their knowledge. */
export function describePlayer(game: GameState, subject: Player, viewer: Viewer): PlayerView {
  const fact = disclosedFact(game, subject, viewer);
  const view: PlayerView = { name: subject.name, alive: subject.alive };
  if (fact.role !== undefined) view.role = fact.role;
  if (fact.roleName !== undefined) view.roleName = fact.roleName;
  if (fact.alignment !== undefined) view.alignment = fact.alignment;
  const revealed =
    viewer.kind === "MODERATOR" ||
    (viewer.kind === "PLAYER" && viewer.name === subject.name) ||
    game.options.revealOnDeath;
  if (!subject.alive && revealed) view.deathCauses = [...subject.deathCauses];
  return view;
}

/** Overview of the game for one viewer. */
export function buildGameView(game: GameState, viewer: Viewer): GameView {
  return {
    gameId: game.gameId,
    phase: game.phase,
    dayNumber: game.dayNumber,
    winners: game.winners ? [...game.winners] : null,
    players: game.players.map(p => describePlayer(game, p, viewer)),
    chats: channelSummaries(game, viewer)
  };
}

/** Only the player themself and the moderator may open a player's sheet. */
export function assertSelfOrModerator(viewer: Viewer, name: string): void {
  if (viewer.kind === "MODERATOR") return;
  if (viewer.kind === "PLAYER" && viewer.name === name) return;
  if (viewer.kind === "NONE") {
    throw new GameRuleError("NOT_AUTHENTICATED", "Authentication required");
  }
  throw new GameRuleError("FORBIDDEN", `Only ${name} or the moderator may see this`);
}

function requirePlayer(game: GameState, name: string): Player {
  const player = getPlayer(game.players, name);
  if (!player) {
    throw new GameRuleError("PLAYER_NOT_FOUND", `Player ${name} not found`);
  }
  return player;
}

export function buildPlayerDetail(game: GameState, name: string, viewer: Viewer): PlayerDetailView {
  assertSelfOrModerator(viewer, name);
  const player = requirePlayer(game, name);
  const alignment = game.alignments.find(a => a.id === player.alignmentId);
  const ids = (slots: AbilitySlot[]) => slots.map(s => s.abilityId);
  return {
    ...describePlayer(game, player, viewer),
    actions: ids(player.actions),
    passives: ids(player.passives),
    sharedActions: alignment ? ids(alignment.sharedActions) : [],
    knownPlayers: knownPlayers(game, player.name).map(known =>
      describePlayer(game, requirePlayer(game, known), { kind: "PLAYER", name: player.name })
    ),
    totalMessages: game.chats[inboxChatId(player.name)]?.messages.length ?? 0
  };
}

function actionView(game: GameState, ruleset: Ruleset, player: Player, slot: AbilitySlot): ActionView {
  const type = slot.type === "SHARED_ACTION" ? "SHARED_ACTION" : "ACTION";
  const live = liveAbility(game, ruleset, player, slot.abilityId, type);
  const ability = live?.ability ?? composeAbility(ruleset, slot);
  const eligible = live !== null && isEligible(ability, live.ctx);
  const queued = findQueued(game, player.name, slot.abilityId, type);
  return {
    id: ability.id,
    description: ability.description,
    phase: ability.phase,
    immediate: ability.immediate,
    targetCount: ability.targetCount,
    eligible,
    targets: live && eligible ? legalTargets(ability, live.ctx) : [],
    queued: queued ? [...queued.targets] : null
  };
}

/** Everything a player can do, with the current queue state. */
export function buildAbilityListing(game: GameState, name: string, ruleset: Ruleset = DEFAULT_RULESET): AbilityListing {
  const player = requirePlayer(game, name);
  const alignment = game.alignments.find(a => a.id === player.alignmentId);

  const passives = player.passives.map(slot => {
    const live = liveAbility(game, ruleset, player, slot.abilityId, "PASSIVE");
    const ability = live?.ability ?? composeAbility(ruleset, slot);
    return {
      id: ability.id,
      description: ability.description,
      phase: ability.phase,
      active: live !== null && isEligible(ability, live.ctx)
    };
  });

  return {
    actions: player.actions.map(slot => actionView(game, ruleset, player, slot)),
    sharedActions: (alignment?.sharedActions ?? []).map(slot => ({
      ...actionView(game, ruleset, player, slot),
      usedBy: findQueued(game, player.name, slot.abilityId, "SHARED_ACTION")?.user ?? null
    })),
    passives
  };
}

/** Messages a WebSocket client may send. */
export type ClientMessage =
  /** Start receiving views of a game, as a player or as the moderator (or anonymously). */
  | { type: "SUBSCRIBE"; payload: { gameId: string; playerName?: string; modToken?: string } }
  | { type: "UNSUBSCRIBE"; payload: { gameId: string } };

/** Messages emitted by the server. Game views are always redacted for the receiving socket. */
export type ServerMessage =
  | { type: "ERROR"; payload: { code: string; message: string } }
  | { type: "SUBSCRIBED"; payload: { gameId: string } }
  | { type: "GAME_STATE"; payload: { game: GameView } };
