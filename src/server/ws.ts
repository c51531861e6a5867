import type http from "http";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { z } from "zod";
import { GameRuleError, type GameState } from "../engine/types";
import { type ClientMessage, type ServerMessage, buildGameView } from "../shared/messages";
import { type Credentials, resolveViewer } from "./auth";
import type { GameStore } from "./store";

const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("SUBSCRIBE"),
    payload: z.object({
      gameId: z.string().min(1),
      playerName: z.string().min(1).optional(),
      modToken: z.string().min(1).optional()
    })
  }),
  z.object({
    type: z.literal("UNSUBSCRIBE"),
    payload: z.object({ gameId: z.string().min(1) })
  })
]);

/**
 * Push gateway. Sockets subscribe to games and receive a freshly redacted
 * GAME_STATE every time the store commits a change to one of them.
 * All writes go through the HTTP API; the socket is read-only.
 */
export class WebSocketGateway {
  /** Per socket, the credentials it subscribed each game with. */
  private subscriptions = new Map<WebSocket, Map<string, Credentials>>();
  private rooms = new Map<string, Set<WebSocket>>();
  private wss: WebSocketServer | null = null;
  private unsubscribeStore: () => void;

  constructor(private store: GameStore) {
    this.unsubscribeStore = store.subscribe(game => this.broadcastState(game));
  }

  /** Binds the gateway to an HTTP server and starts accepting connections. */
  attach(server: http.Server): void {
    const wss = new WebSocketServer({ server });
    wss.on("connection", socket => {
      this.subscriptions.set(socket, new Map());
      socket.on("message", data => this.handleMessage(socket, data));
      socket.on("close", () => this.detach(socket));
      socket.on("error", err => console.error("WebSocket error", err));
    });
    this.wss = wss;
  }

  /** Stops listening to the store and closes every open socket. */
  close(): Promise<void> {
    this.unsubscribeStore();
    const wss = this.wss;
    if (!wss) return Promise.resolve();
    for (const socket of wss.clients) {
      socket.terminate();
    }
    return new Promise((resolve, reject) => {
      wss.close(err => (err ? reject(err) : resolve()));
    });
  }

  /** Parses an incoming payload and dispatches typed client messages. */
  private handleMessage(socket: WebSocket, data: RawData): void {
    let message: ClientMessage;
    try {
      message = clientMessageSchema.parse(JSON.parse(data.toString()));
    } catch (err) {
      if (err instanceof SyntaxError) {
        this.sendError(socket, "BAD_JSON", "Invalid JSON payload");
      } else if (err instanceof z.ZodError) {
        this.sendError(socket, "INVALID_TYPE", "Unknown or malformed message");
      } else {
        console.error("Unexpected parse error", err);
        this.sendError(socket, "SERVER_ERROR", "Unexpected error");
      }
      return;
    }

    try {
      switch (message.type) {
        case "SUBSCRIBE":
          this.handleSubscribe(socket, message.payload);
          break;
        case "UNSUBSCRIBE":
          this.handleUnsubscribe(socket, message.payload.gameId);
          break;
        default: {
          const exhaustive: never = message;
          throw new GameRuleError("FORBIDDEN", `Unhandled message ${JSON.stringify(exhaustive)}`);
        }
      }
    } catch (err) {
      if (err instanceof GameRuleError) {
        this.sendError(socket, err.code, err.message);
      } else {
        console.error("Handler error", err);
        this.sendError(socket, "SERVER_ERROR", "Internal error");
      }
    }
  }

  /** Checks the credentials up front so a bad token fails here, not on every broadcast. */
  private handleSubscribe(socket: WebSocket, payload: { gameId: string; playerName?: string; modToken?: string }): void {
    const record = this.store.require(payload.gameId);
    const credentials: Credentials = { playerName: payload.playerName, modToken: payload.modToken };
    const viewer = resolveViewer(record, credentials);

    const subscriptions = this.subscriptions.get(socket) ?? new Map<string, Credentials>();
    subscriptions.set(payload.gameId, credentials);
    this.subscriptions.set(socket, subscriptions);
    const room = this.rooms.get(payload.gameId) ?? new Set<WebSocket>();
    room.add(socket);
    this.rooms.set(payload.gameId, room);

    this.send(socket, { type: "SUBSCRIBED", payload: { gameId: payload.gameId } });
    this.send(socket, { type: "GAME_STATE", payload: { game: buildGameView(record.game, viewer) } });
  }

  private handleUnsubscribe(socket: WebSocket, gameId: string): void {
    this.subscriptions.get(socket)?.delete(gameId);
    this.leaveRoom(socket, gameId);
  }

  private leaveRoom(socket: WebSocket, gameId: string): void {
    const room = this.rooms.get(gameId);
    if (!room) return;
    room.delete(socket);
    if (room.size === 0) {
      this.rooms.delete(gameId);
    }
  }

  private detach(socket: WebSocket): void {
    const subscriptions = this.subscriptions.get(socket);
    if (!subscriptions) return;
    for (const gameId of subscriptions.keys()) {
      this.leaveRoom(socket, gameId);
    }
    this.subscriptions.delete(socket);
  }

  private send(socket: WebSocket, message: ServerMessage): void {
    socket.send(JSON.stringify(message));
  }

  private sendError(socket: WebSocket, code: string, message: string): void {
    this.send(socket, { type: "ERROR", payload: { code, message } });
  }

  /** Fans out the latest state, building each socket's view from its own credentials. */
  private broadcastState(game: GameState): void {
    const room = this.rooms.get(game.gameId);
    const record = this.store.getRecord(game.gameId);
    if (!room || !record) return;

    for (const socket of room) {
      const credentials = this.subscriptions.get(socket)?.get(game.gameId);
      if (!credentials) continue;
      try {
        const view = buildGameView(game, resolveViewer(record, credentials));
        this.send(socket, { type: "GAME_STATE", payload: { game: view } });
      } catch (err) {
        console.error("Failed to build view", err);
      }
    }
  }
}
