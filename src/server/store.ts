import { GameRuleError, type GameState } from "../engine/types";

/** A game together with the secret that grants moderator access to it. */
export interface StoredGame {
  game: GameState;
  modToken: string;
  createdAt: number;
}

export type GameListener = (game: GameState) => void;

/**
 * In-memory game registry.
 * The HTTP and WS layers both treat it as the single source of truth per process.
 * Snapshots are immutable, so readers never observe a half-applied change.
 */
export class GameStore {
  private games = new Map<string, StoredGame>();
  private listeners = new Set<GameListener>();

  /** Inserts a brand new game, throwing if the ID already exists. */
  create(game: GameState, modToken: string, createdAt: number): StoredGame {
    if (this.games.has(game.gameId)) {
      throw new Error(`Game ${game.gameId} already exists`);
    }
    const record: StoredGame = { game, modToken, createdAt };
    this.games.set(game.gameId, record);
    return record;
  }

  /** Fetches the current snapshot by ID or undefined when missing. */
  get(gameId: string): GameState | undefined {
    return this.games.get(gameId)?.game;
  }

  getRecord(gameId: string): StoredGame | undefined {
    return this.games.get(gameId);
  }

  /** Like getRecord, but a missing game is a GAME_NOT_FOUND rule error. */
  require(gameId: string): StoredGame {
    const record = this.games.get(gameId);
    if (!record) {
      throw new GameRuleError("GAME_NOT_FOUND", `Game ${gameId} not found`);
    }
    return record;
  }

  /**
   * Atomically load-modify-store a game snapshot.
   * The updater is synchronous and the map lives on a single thread, so this is the
   * per-game critical section: a throwing updater leaves the stored snapshot untouched.
   */
  withGame(gameId: string, updater: (current: GameState) => GameState): GameState {
    const record = this.require(gameId);
    const updated = updater(record.game);
    if (updated.gameId !== gameId) {
      throw new Error("Game ID mismatch");
    }
    if (updated === record.game) return updated;
    this.games.set(gameId, { ...record, game: updated });
    this.emit(updated);
    return updated;
  }

  /** Removes a game entirely. Archival is the caller's concern. */
  delete(gameId: string): void {
    this.games.delete(gameId);
  }

  /** Returns all games in creation order. */
  list(): StoredGame[] {
    return Array.from(this.games.values());
  }

  /** Registers a callback for every committed change. Returns the unsubscribe function. */
  subscribe(listener: GameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(game: GameState): void {
    for (const listener of this.listeners) {
      try {
        listener(game);
      } catch (err) {
        console.error(`Game listener failed for ${game.gameId}`, err);
      }
    }
  }
}
