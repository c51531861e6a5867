import type { ChannelKind, ChatChannel, ChatMessage, GameState, Player, Viewer } from "./types";
import { GameRuleError } from "./types";
import { cloneGame, getPlayer } from "./utils";

export const GLOBAL_CHAT = "global";
export const MODERATOR_AUTHOR = "Moderator";
export const SYSTEM_AUTHOR = "Game";
export const DEFAULT_PAGE_LIMIT = 25;

export const factionChatId = (alignmentId: string) => `faction:${alignmentId}`;
export const groupChatId = (roleTemplate: string) => `group:${roleTemplate}`;
export const inboxChatId = (player: string) => `inbox:${player}`;

/** Private channel of a player pair; the id is independent of who writes first. */
export function directChatId(a: string, b: string): string {
  const [first, second] = [a, b].sort();
  return `dm:${first}:${second}`;
}

/** Summary row used by listings; never includes message bodies. */
export interface ChannelSummary {
  id: string;
  kind: ChannelKind;
  members: string[];
  totalMessages: number;
  writable: boolean;
}

export interface MessagePage {
  chatId: string;
  total: number;
  start: number;
  messages: ChatMessage[];
}

/** Registers a channel on a mutable snapshot. Existing channels are left alone. */
export function openChannel(game: GameState, id: string, kind: ChannelKind, members: string[]): ChatChannel {
  const existing = game.chats[id];
  if (existing) return existing;
  const channel: ChatChannel = { id, kind, members: [...members], messages: [] };
  game.chats[id] = channel;
  return channel;
}

/** Appends to a channel of a mutable snapshot. */
export function appendMessage(channel: ChatChannel, author: string, content: string, now: number): void {
  channel.messages.push({ author, timestamp: now, content });
}

/** Drops a system notice into a player's inbox. Mutates the supplied snapshot. */
export function notifyPlayer(game: GameState, player: string, content: string, now: number): void {
  const inbox = openChannel(game, inboxChatId(player), "INBOX", [player]);
  appendMessage(inbox, SYSTEM_AUTHOR, content, now);
}

/** Posts a system line to the global channel. Mutates the supplied snapshot. */
export function announce(game: GameState, content: string, now: number): void {
  const global = openChannel(game, GLOBAL_CHAT, "GLOBAL", []);
  appendMessage(global, SYSTEM_AUTHOR, content, now);
}

/**
 * Looks a channel up by id. A direct channel between two existing players
 * exists implicitly, so an unopened pair yields an empty channel.
 */
export function findChannel(game: GameState, chatId: string): ChatChannel | null {
  const existing = game.chats[chatId];
  if (existing) return existing;
  const match = /^dm:([^:]+):([^:]+)$/.exec(chatId);
  if (!match) return null;
  const [, a, b] = match;
  if (a === b || directChatId(a, b) !== chatId) return null;
  if (!getPlayer(game.players, a) || !getPlayer(game.players, b)) return null;
  return { id: chatId, kind: "DIRECT", members: [a, b], messages: [] };
}

function requireChannel(game: GameState, chatId: string): ChatChannel {
  const channel = findChannel(game, chatId);
  if (!channel) {
    throw new GameRuleError("CHAT_NOT_FOUND", `Chat ${chatId} not found`);
  }
  return channel;
}

function memberOf(channel: ChatChannel, viewer: Viewer): Player["name"] | null {
  if (viewer.kind !== "PLAYER") return null;
  return channel.members.includes(viewer.name) ? viewer.name : null;
}

export function canRead(channel: ChatChannel, viewer: Viewer): boolean {
  if (viewer.kind === "MODERATOR") return true;
  if (channel.kind === "GLOBAL") return true;
  return memberOf(channel, viewer) !== null;
}

/**
 * Write rules:
 * - global: living players outside quiet phases,
 * - faction/group/direct: living members,
 * - inbox: the moderator only.
 * Once the game is resolved the living restriction is lifted.
 */
export function canWrite(game: GameState, channel: ChatChannel, viewer: Viewer): boolean {
  if (viewer.kind === "MODERATOR") return true;
  if (viewer.kind === "NONE") return false;
  const player = getPlayer(game.players, viewer.name);
  if (!player) return false;

  const over = game.phase === "RESOLVED";
  switch (channel.kind) {
    case "GLOBAL":
      if (over) return true;
      return player.alive && !game.options.quietPhases.some(p => p === game.phase);
    case "FACTION":
    case "GROUP":
    case "DIRECT":
      return memberOf(channel, viewer) !== null && (over || player.alive);
    case "INBOX":
      return false;
    default: {
      const exhaustive: never = channel.kind;
      throw new GameRuleError("CHAT_NOT_FOUND", `Unknown channel kind ${exhaustive}`);
    }
  }
}

/** Author label attached to a viewer's posts. */
export function authorOf(viewer: Viewer): string {
  switch (viewer.kind) {
    case "MODERATOR":
      return MODERATOR_AUTHOR;
    case "PLAYER":
      return viewer.name;
    default:
      throw new GameRuleError("NOT_AUTHENTICATED", "Posting requires a player or moderator");
  }
}

/** Appends a message written by `viewer`. Returns the new snapshot. */
export function postMessage(game: GameState, chatId: string, viewer: Viewer, content: string, now: number): GameState {
  const author = authorOf(viewer);
  const channel = requireChannel(game, chatId);
  if (!canWrite(game, channel, viewer)) {
    throw new GameRuleError("CHAT_FORBIDDEN", `Cannot write to ${chatId} now`);
  }
  const next = cloneGame(game);
  const target = openChannel(next, channel.id, channel.kind, channel.members);
  appendMessage(target, author, content, now);
  return next;
}

/**
 * Paginated read in posting order.
 * A negative start is clamped to zero; a negative limit falls back to the default page size.
 */
export function readMessages(
  game: GameState,
  chatId: string,
  viewer: Viewer,
  start = 0,
  limit = DEFAULT_PAGE_LIMIT
): MessagePage {
  const channel = requireChannel(game, chatId);
  if (!canRead(channel, viewer)) {
    throw new GameRuleError("CHAT_FORBIDDEN", `Cannot read ${chatId}`);
  }
  const from = Math.max(0, start);
  const size = limit < 0 ? DEFAULT_PAGE_LIMIT : limit;
  return {
    chatId: channel.id,
    total: channel.messages.length,
    start: from,
    messages: channel.messages.slice(from, from + size)
  };
}

/** Channels readable by the viewer, in creation order. */
export function channelSummaries(game: GameState, viewer: Viewer): ChannelSummary[] {
  return Object.values(game.chats)
    .filter(channel => canRead(channel, viewer))
    .map(channel => ({
      id: channel.id,
      kind: channel.kind,
      members: [...channel.members],
      totalMessages: channel.messages.length,
      writable: canWrite(game, channel, viewer)
    }));
}
