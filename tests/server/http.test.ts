import type { Server } from "http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createHttpApp } from "../../src/server/http";
import { MOD_TOKEN_HEADER, PLAYER_NAME_HEADER } from "../../src/server/auth";
import { GameStore } from "../../src/server/store";

interface Reply {
  status: number;
  body: unknown;
}

interface RequestOptions {
  body?: unknown;
  raw?: string;
  player?: string;
  modToken?: string;
}

const GAME_ID = "test-id-1";
const MOD_TOKEN = "test-id-2";

const setup = {
  players: ["Alice", "Bob", "Eve"],
  roles: [
    { role: "Cop", alignment: "Town" },
    { role: "Vanilla", alignment: "Town" },
    { role: "Vanilla", alignment: "Mafia" }
  ],
  phase: "NIGHT"
};

let server: Server;
let baseUrl: string;

beforeEach(async () => {
  let counter = 0;
  const app = createHttpApp(new GameStore(), {
    clock: () => 42,
    random: () => 0,
    newId: () => `test-id-${++counter}`
  });
  server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
});

async function call(method: string, path: string, options: RequestOptions = {}): Promise<Reply> {
  const headers: Record<string, string> = {};
  if (options.player) headers[PLAYER_NAME_HEADER] = options.player;
  if (options.modToken) headers[MOD_TOKEN_HEADER] = options.modToken;
  let payload: string | undefined;
  if (options.raw !== undefined || options.body !== undefined) {
    headers["content-type"] = "application/json";
    payload = options.raw ?? JSON.stringify(options.body);
  }
  const res = await fetch(`${baseUrl}${path}`, { method, headers, body: payload });
  const text = await res.text();
  return { status: res.status, body: text ? JSON.parse(text) : null };
}

const game = (suffix = "") => `/api/v1/games/${GAME_ID}${suffix}`;
const createGame = (body: unknown = setup) => call("POST", "/api/v1/games", { body });

describe("HTTP API", () => {
  it("answers health checks", async () => {
    expect(await call("GET", "/health")).toEqual({ status: 200, body: { status: "ok", games: 0, timestamp: 42 } });
  });

  it("creates games and hands the moderator a token", async () => {
    expect(await createGame()).toEqual({ status: 201, body: { id: GAME_ID, modToken: MOD_TOKEN } });
    const listing = await call("GET", "/api/v1/games");
    expect(listing.body).toEqual({
      total: 1,
      games: [{ id: GAME_ID, phase: "NIGHT", dayNumber: 1, players: 3, winners: null }]
    });
  });

  it("rejects malformed setups", async () => {
    const mismatched = await createGame({ ...setup, players: ["Alice"] });
    expect(mismatched.status).toBe(400);
    expect(mismatched.body).toMatchObject({ error: { code: "BAD_REQUEST" } });

    const unknownRole = await createGame({ ...setup, roles: [...setup.roles.slice(0, 2), { role: "Mime", alignment: "Mafia" }] });
    expect(unknownRole).toMatchObject({ status: 400, body: { error: { code: "INVALID_SETUP" } } });

    const broken = await call("POST", "/api/v1/games", { raw: "{" });
    expect(broken).toMatchObject({ status: 400, body: { error: { code: "BAD_JSON" } } });
  });

  it("redacts the overview per viewer", async () => {
    await createGame();
    const anonymous = await call("GET", game());
    expect(anonymous.body).toMatchObject({
      gameId: GAME_ID,
      phase: "NIGHT",
      dayNumber: 1,
      winners: null,
      players: [
        { name: "Alice", alive: true },
        { name: "Bob", alive: true },
        { name: "Eve", alive: true }
      ]
    });
    const asEve = await call("GET", game(), { player: "Eve" });
    expect(asEve.body).toMatchObject({
      players: [{ name: "Alice", alive: true }, { name: "Bob", alive: true }, { name: "Eve", roleName: "Mafia Goon" }]
    });
    expect(await call("GET", "/api/v1/games/missing")).toMatchObject({ status: 404, body: { error: { code: "GAME_NOT_FOUND" } } });
    expect((await call("GET", game(), { player: "Zed" })).status).toBe(401);
  });

  it("lists what a player can do", async () => {
    await createGame();
    const listing = await call("GET", game("/players/Alice/abilities"), { player: "Alice" });
    expect(listing).toEqual({
      status: 200,
      body: {
        actions: [
          {
            id: "Cop",
            description: "Learn the alignment of a player.",
            phase: "NIGHT",
            immediate: false,
            targetCount: 1,
            eligible: true,
            targets: ["Bob", "Eve"],
            queued: null
          }
        ],
        sharedActions: [],
        passives: []
      }
    });
    expect((await call("GET", game("/players/Alice/abilities"), { player: "Bob" })).status).toBe(403);
  });

  it("runs a night: queue, resolve, advance and read the result", async () => {
    await createGame();
    const queued = await call("POST", game("/players/Alice/abilities"), {
      player: "Alice",
      body: { actions: { Cop: { targets: ["Eve"] } } }
    });
    expect(queued.status).toBe(204);

    const advanced = await call("PATCH", game(), { modToken: MOD_TOKEN, body: { actions: ["next_phase", "resolve"] } });
    expect(advanced.status).toBe(204);

    const inbox = await call("GET", game("/players/Alice/messages"), { player: "Alice" });
    expect(inbox.body).toEqual({
      chatId: "inbox:Alice",
      total: 2,
      start: 0,
      messages: [
        { author: "Game", timestamp: 42, content: "You are a Town Cop." },
        { author: "Game", timestamp: 42, content: "Eve is aligned with the Mafia." }
      ]
    });

    const overview = await call("GET", game(), { player: "Alice" });
    expect(overview.body).toMatchObject({ phase: "DAY", dayNumber: 2 });
    expect(overview.body).toMatchObject({ players: [{}, {}, { name: "Eve", alignment: "Mafia" }] });

    const log = await call("GET", game("/log"), { modToken: MOD_TOKEN });
    expect(log.body).toMatchObject({ entries: [{ abilityId: "Cop", outcome: "SUCCESS", targets: ["Eve"] }] });
  });

  it("rejects illegal queue requests", async () => {
    await createGame();
    const wrongTarget = await call("POST", game("/players/Alice/abilities"), {
      player: "Alice",
      body: { actions: { Cop: { targets: ["Alice"] } } }
    });
    expect(wrongTarget).toMatchObject({ status: 400, body: { error: { code: "INVALID_TARGET" } } });

    const forSomeoneElse = await call("POST", game("/players/Alice/abilities"), {
      player: "Bob",
      body: { actions: { Cop: { targets: ["Eve"] } } }
    });
    expect(forSomeoneElse.status).toBe(403);
  });

  it("keeps moderator commands to the moderator", async () => {
    await createGame();
    expect((await call("PATCH", game(), { body: { actions: ["resolve"] } })).status).toBe(401);
    expect((await call("PATCH", game(), { player: "Alice", body: { actions: ["resolve"] } })).status).toBe(403);
    expect((await call("PATCH", game(), { modToken: MOD_TOKEN, body: { actions: ["dance"] } })).status).toBe(400);
    expect((await call("GET", game("/log"), { player: "Alice" })).status).toBe(403);
  });

  it("moves the phase on a moderator override", async () => {
    await createGame();
    expect((await call("PUT", game(), { modToken: MOD_TOKEN, body: { phase: "DAY", dayNumber: 3 } })).status).toBe(204);
    expect((await call("GET", game())).body).toMatchObject({ phase: "DAY", dayNumber: 3 });
  });

  it("takes votes during the day", async () => {
    await createGame({ ...setup, phase: "DAY" });
    expect((await call("POST", game("/players/Alice/vote"), { player: "Alice", body: { target: "Eve" } })).status).toBe(204);
    const votes = await call("GET", game("/votes"));
    expect(votes.body).toMatchObject({ votes: [{ target: "Eve", voters: ["Alice"] }] });

    expect((await call("DELETE", game("/players/Alice/vote"), { player: "Alice" })).status).toBe(204);
    expect((await call("GET", game("/votes"))).body).toMatchObject({ votes: [] });

    const atNight = await call("PUT", game(), { modToken: MOD_TOKEN, body: { phase: "NIGHT" } });
    expect(atNight.status).toBe(204);
    const refused = await call("POST", game("/players/Alice/vote"), { player: "Alice", body: { target: "Eve" } });
    expect(refused).toMatchObject({ status: 400, body: { error: { code: "NOT_A_VOTING_PHASE" } } });
  });

  it("serves chats to the players allowed to see them", async () => {
    await createGame({ ...setup, phase: "DAY" });
    const chats = await call("GET", game("/chats"), { player: "Eve" });
    expect(chats.body).toMatchObject({
      chats: [{ id: "global" }, { id: "inbox:Eve" }, { id: "faction:Mafia", members: ["Eve"], totalMessages: 1 }]
    });

    const faction = encodeURIComponent("faction:Mafia");
    expect((await call("GET", game(`/chats/${faction}/messages`), { player: "Alice" })).status).toBe(403);
    expect((await call("GET", game("/chats/nowhere"), { player: "Alice" })).status).toBe(404);

    expect((await call("POST", game("/chats/global/messages"), { player: "Alice", body: { content: "morning" } })).status).toBe(201);
    expect((await call("POST", game("/chats/global/messages"), { player: "Bob", body: { content: "hi" } })).status).toBe(201);
    const page = await call("GET", game("/chats/global/messages?start=1&limit=1"));
    expect(page.body).toEqual({
      chatId: "global",
      total: 2,
      start: 1,
      messages: [{ author: "Bob", timestamp: 42, content: "hi" }]
    });
  });

  it("lets only the moderator write to an inbox", async () => {
    await createGame();
    expect(
      (await call("POST", game("/players/Bob/messages"), { modToken: MOD_TOKEN, body: { content: "Stay quiet." } })).status
    ).toBe(201);
    expect((await call("POST", game("/players/Bob/messages"), { player: "Bob", body: { content: "ok" } })).status).toBe(403);
    const inbox = await call("GET", game("/players/Bob/messages?limit=1&start=1"), { player: "Bob" });
    expect(inbox.body).toMatchObject({ total: 2, messages: [{ author: "Moderator", content: "Stay quiet." }] });
  });

  it("publishes the reference catalog", async () => {
    const roles = await call("GET", "/api/v1/reference/roles");
    expect(roles.body).toMatchObject({ roles: expect.arrayContaining([expect.objectContaining({ id: "Cop", actions: ["Cop"] })]) });
    const modifiers = await call("GET", "/api/v1/reference/modifiers");
    expect(modifiers.body).toMatchObject({
      modifiers: expect.arrayContaining([{ id: "X-Shot", description: "Can only be used a limited number of times.", params: ["uses"] }])
    });
    const abilities = await call("GET", "/api/v1/reference/abilities");
    expect(abilities.body).toMatchObject({
      abilities: expect.arrayContaining([expect.objectContaining({ id: "Doctor", priority: 20, category: "PROTECTIVE" })])
    });
    const alignments = await call("GET", "/api/v1/reference/alignments");
    expect(alignments.body).toMatchObject({
      alignments: expect.arrayContaining([expect.objectContaining({ id: "Mafia", sharedActions: ["Factional Kill"] })])
    });
  });
});
