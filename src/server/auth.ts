import { timingSafeEqual } from "crypto";
import { GameRuleError, type Viewer } from "../engine/types";
import { getPlayer } from "../engine/utils";
import type { StoredGame } from "./store";

export const MOD_TOKEN_HEADER = "authorization-mod-token";
export const PLAYER_NAME_HEADER = "authorization-player-name";

export interface Credentials {
  modToken?: string;
  playerName?: string;
}

function sameToken(expected: string, given: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(given);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Maps request credentials to a viewer of one game.
 * No credentials means an anonymous viewer; wrong credentials are rejected.
 */
export function resolveViewer(record: StoredGame, credentials: Credentials): Viewer {
  const { modToken, playerName } = credentials;
  if (modToken !== undefined) {
    if (!sameToken(record.modToken, modToken)) {
      throw new GameRuleError("NOT_AUTHENTICATED", "Invalid moderator token");
    }
    return { kind: "MODERATOR" };
  }
  if (playerName !== undefined) {
    if (!getPlayer(record.game.players, playerName)) {
      throw new GameRuleError("NOT_AUTHENTICATED", `No player named ${playerName} in this game`);
    }
    return { kind: "PLAYER", name: playerName };
  }
  return { kind: "NONE" };
}

export function requireModerator(viewer: Viewer): void {
  if (viewer.kind === "MODERATOR") return;
  if (viewer.kind === "NONE") {
    throw new GameRuleError("NOT_AUTHENTICATED", "Moderator token required");
  }
  throw new GameRuleError("FORBIDDEN", "Only the moderator may do this");
}
