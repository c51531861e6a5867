import express, { type ErrorRequestHandler, type Request } from "express";
import { randomUUID } from "crypto";
import { z } from "zod";
import { ABILITIES } from "../engine/abilities";
import { ALIGNMENTS, DEFAULT_RULESET, ROLES, type Ruleset } from "../engine/catalog";
import { channelSummaries, findChannel, canRead, inboxChatId, postMessage, readMessages } from "../engine/chat";
import { MODIFIERS } from "../engine/modifiers";
import { queueAbilities, type AbilityRequest, type QueueableType } from "../engine/queue";
import { createGame } from "../engine/setup";
import { applyActions, setPhase } from "../engine/transitions";
import { GameRuleError, type GameState, type RuleErrorCode, type Viewer } from "../engine/types";
import { type RandomFn, defaultRandom, nowMs } from "../engine/utils";
import { castVote, formatVoteCount, tallyVotes, withdrawVote } from "../engine/votes";
import {
  assertSelfOrModerator,
  buildAbilityListing,
  buildGameView,
  buildPlayerDetail,
  describePlayer
} from "../shared/messages";
import { MOD_TOKEN_HEADER, PLAYER_NAME_HEADER, requireModerator, resolveViewer } from "./auth";
import { DEFAULT_PAGE_LIMITS, type PageLimits } from "./config";
import {
  createGameSchema,
  gameActionsSchema,
  messageSchema,
  paginationSchema,
  queueRequestSchema,
  updateGameSchema,
  voteSchema
} from "./schemas";
import type { GameStore, StoredGame } from "./store";

/** Collaborators the HTTP layer needs; tests pin the clock and RNG. */
export interface HttpDeps {
  clock?: () => number;
  random?: RandomFn;
  ruleset?: Ruleset;
  pageLimits?: PageLimits;
  newId?: () => string;
}

const STATUS_BY_CODE: Record<RuleErrorCode, number> = {
  INVALID_TARGET: 400,
  INVALID_TARGET_COUNT: 400,
  INELIGIBLE_NOW: 400,
  UNKNOWN_ABILITY: 400,
  INVALID_SETUP: 400,
  NOT_A_VOTING_PHASE: 400,
  PLAYER_NOT_FOUND: 404,
  CHAT_NOT_FOUND: 404,
  GAME_NOT_FOUND: 404,
  NOT_AUTHENTICATED: 401,
  FORBIDDEN: 403,
  CHAT_FORBIDDEN: 403,
  ILLEGAL_PHASE_TRANSITION: 409,
  GAME_ALREADY_RESOLVED: 409
};

function credentialsOf(req: Request) {
  return { modToken: req.header(MOD_TOKEN_HEADER), playerName: req.header(PLAYER_NAME_HEADER) };
}

function toRequests(body: z.infer<typeof queueRequestSchema>): AbilityRequest[] {
  const entries = (type: QueueableType, selections: Record<string, { targets: string[] } | null>) =>
    Object.entries(selections).map(([abilityId, selection]) => ({
      abilityId,
      type,
      targets: selection ? selection.targets : null
    }));
  return [...entries("ACTION", body.actions), ...entries("SHARED_ACTION", body.sharedActions)];
}

/**
 * Express app exposing the game API under /api/v1.
 * Every mutation goes through `store.withGame`, so a rejected request leaves the game untouched.
 */
export function createHttpApp(store: GameStore, deps: HttpDeps = {}) {
  const clock = deps.clock ?? nowMs;
  const random = deps.random ?? defaultRandom;
  const ruleset = deps.ruleset ?? DEFAULT_RULESET;
  const newId = deps.newId ?? randomUUID;
  const pagination = paginationSchema(deps.pageLimits ?? DEFAULT_PAGE_LIMITS);

  const app = express();
  app.use(express.json());
  const api = express.Router();

  /** Loads the game addressed by the route and the viewer its credentials map to. */
  const load = (req: Request<{ gameId: string }>): { record: StoredGame; viewer: Viewer } => {
    const record = store.require(req.params.gameId);
    return { record, viewer: resolveViewer(record, credentialsOf(req)) };
  };

  const mutate = (gameId: string, updater: (game: GameState) => GameState) => store.withGame(gameId, updater);

  /** Health probe for load balancers / ops. Returns process stats only. */
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", games: store.list().length, timestamp: clock() });
  });

  api.get("/games", (req, res) => {
    const { start, limit } = pagination.parse(req.query);
    const games = store.list();
    const from = Math.max(0, start);
    res.json({
      total: games.length,
      games: games.slice(from, from + limit).map(({ game }) => ({
        id: game.gameId,
        phase: game.phase,
        dayNumber: game.dayNumber,
        players: game.players.length,
        winners: game.winners
      }))
    });
  });

  api.post("/games", (req, res) => {
    const body = createGameSchema.parse(req.body);
    const now = clock();
    const game = createGame(newId(), body, now, random, ruleset);
    const modToken = newId();
    store.create(game, modToken, now);
    console.log(`Game ${game.gameId} created with ${game.players.length} players`);
    res.status(201).json({ id: game.gameId, modToken });
  });

  api.get("/games/:gameId", (req, res) => {
    const { record, viewer } = load(req);
    res.json(buildGameView(record.game, viewer));
  });

  api.put("/games/:gameId", (req, res) => {
    const { record, viewer } = load(req);
    requireModerator(viewer);
    const body = updateGameSchema.parse(req.body);
    mutate(record.game.gameId, game => setPhase(game, body));
    res.status(204).end();
  });

  api.patch("/games/:gameId", (req, res) => {
    const { record, viewer } = load(req);
    requireModerator(viewer);
    const { actions } = gameActionsSchema.parse(req.body);
    const before = record.game.log.length;
    const game = mutate(record.game.gameId, current => applyActions(current, actions, clock(), ruleset));
    if (actions.includes("resolve")) {
      console.log(`Game ${game.gameId}: resolved ${game.log.length - before} abilities`);
    }
    if (game.phase === "RESOLVED" && record.game.phase !== "RESOLVED") {
      console.log(`Game ${game.gameId} is over, winners: ${game.winners?.join(", ") || "none"}`);
    }
    res.status(204).end();
  });

  api.get("/games/:gameId/log", (req, res) => {
    const { record, viewer } = load(req);
    requireModerator(viewer);
    res.json({ entries: record.game.log });
  });

  api.get("/games/:gameId/players", (req, res) => {
    const { record, viewer } = load(req);
    res.json({ players: record.game.players.map(p => describePlayer(record.game, p, viewer)) });
  });

  api.get("/games/:gameId/players/:name", (req, res) => {
    const { record, viewer } = load(req);
    res.json(buildPlayerDetail(record.game, req.params.name, viewer));
  });

  api.get("/games/:gameId/players/:name/abilities", (req, res) => {
    const { record, viewer } = load(req);
    assertSelfOrModerator(viewer, req.params.name);
    res.json(buildAbilityListing(record.game, req.params.name, ruleset));
  });

  api.post("/games/:gameId/players/:name/abilities", (req, res) => {
    const { record, viewer } = load(req);
    assertSelfOrModerator(viewer, req.params.name);
    const requests = toRequests(queueRequestSchema.parse(req.body));
    mutate(record.game.gameId, game => queueAbilities(game, req.params.name, requests, clock(), ruleset));
    res.status(204).end();
  });

  api.get("/games/:gameId/players/:name/messages", (req, res) => {
    const { record, viewer } = load(req);
    assertSelfOrModerator(viewer, req.params.name);
    const { start, limit } = pagination.parse(req.query);
    res.json(readMessages(record.game, inboxChatId(req.params.name), viewer, start, limit));
  });

  api.post("/games/:gameId/players/:name/messages", (req, res) => {
    const { record, viewer } = load(req);
    const { content } = messageSchema.parse(req.body);
    mutate(record.game.gameId, game => postMessage(game, inboxChatId(req.params.name), viewer, content, clock()));
    res.status(201).end();
  });

  api.post("/games/:gameId/players/:name/vote", (req, res) => {
    const { record, viewer } = load(req);
    assertSelfOrModerator(viewer, req.params.name);
    const { target } = voteSchema.parse(req.body);
    mutate(record.game.gameId, game => castVote(game, req.params.name, target, clock()));
    res.status(204).end();
  });

  api.delete("/games/:gameId/players/:name/vote", (req, res) => {
    const { record, viewer } = load(req);
    assertSelfOrModerator(viewer, req.params.name);
    mutate(record.game.gameId, game => withdrawVote(game, req.params.name, clock()));
    res.status(204).end();
  });

  api.get("/games/:gameId/votes", (req, res) => {
    const { record } = load(req);
    res.json({ votes: tallyVotes(record.game), summary: formatVoteCount(record.game) });
  });

  api.get("/games/:gameId/chats", (req, res) => {
    const { record, viewer } = load(req);
    res.json({ chats: channelSummaries(record.game, viewer) });
  });

  api.get("/games/:gameId/chats/:chatId", (req, res) => {
    const { record, viewer } = load(req);
    const channel = findChannel(record.game, req.params.chatId);
    if (!channel) {
      throw new GameRuleError("CHAT_NOT_FOUND", `Chat ${req.params.chatId} not found`);
    }
    if (!canRead(channel, viewer)) {
      throw new GameRuleError("CHAT_FORBIDDEN", `Cannot read ${channel.id}`);
    }
    res.json({ id: channel.id, kind: channel.kind, members: channel.members, totalMessages: channel.messages.length });
  });

  api.get("/games/:gameId/chats/:chatId/messages", (req, res) => {
    const { record, viewer } = load(req);
    const { start, limit } = pagination.parse(req.query);
    res.json(readMessages(record.game, req.params.chatId, viewer, start, limit));
  });

  api.post("/games/:gameId/chats/:chatId/messages", (req, res) => {
    const { record, viewer } = load(req);
    const { content } = messageSchema.parse(req.body);
    mutate(record.game.gameId, game => postMessage(game, req.params.chatId, viewer, content, clock()));
    res.status(201).end();
  });

  api.get("/reference/roles", (_req, res) => {
    res.json({ roles: ROLES.map(({ id, description, actions, passives, tags }) => ({ id, description, actions, passives, tags })) });
  });

  api.get("/reference/alignments", (_req, res) => {
    res.json({
      alignments: ALIGNMENTS.map(({ id, description, tags, actions, sharedActions }) => ({
        id,
        description,
        tags,
        actions,
        sharedActions
      }))
    });
  });

  api.get("/reference/modifiers", (_req, res) => {
    res.json({ modifiers: MODIFIERS.map(({ id, description, params }) => ({ id, description, params })) });
  });

  api.get("/reference/abilities", (_req, res) => {
    res.json({
      abilities: ABILITIES.map(a => ({
        id: a.id,
        description: a.description,
        category: a.category,
        priority: a.priority,
        phase: a.phase,
        immediate: a.immediate,
        targetCount: a.targetCount
      }))
    });
  });

  app.use("/api/v1", api);

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof GameRuleError) {
      res.status(STATUS_BY_CODE[err.code]).json({ error: { code: err.code, message: err.message } });
      return;
    }
    if (err instanceof z.ZodError) {
      res.status(400).json({ error: { code: "BAD_REQUEST", message: "Invalid request", issues: err.issues } });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { code: "BAD_JSON", message: "Invalid JSON payload" } });
      return;
    }
    console.error("Unhandled request error", err);
    res.status(500).json({ error: { code: "SERVER_ERROR", message: "Internal error" } });
  };
  app.use(onError);

  return app;
}
