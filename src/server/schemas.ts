import { z } from "zod";
import { GAME_ACTIONS } from "../engine/transitions";
import type { PageLimits } from "./config";

const phase = z.enum(["DAY", "NIGHT"]);
const category = z.enum(["CONTROL", "PROTECTIVE", "INFORMATIONAL", "OFFENSIVE", "CLEANUP"]);

const playerName = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .refine(name => !name.includes(":"), "Player names cannot contain ':'");

const modifierSpec = z.object({
  id: z.string().min(1),
  params: z.record(z.unknown()).optional()
});

const roleAssignment = z.object({
  role: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  modifiers: z.array(modifierSpec).optional(),
  alignment: z.string().min(1),
  alignmentId: z.string().min(1).optional()
});

export const createGameSchema = z
  .object({
    players: z.array(playerName).min(1),
    roles: z.array(roleAssignment),
    dayNumber: z.number().int().positive().optional(),
    phase: phase.optional(),
    shuffleRoles: z.boolean().optional(),
    options: z
      .object({
        revealOnDeath: z.boolean().optional(),
        quietPhases: z.array(phase).optional(),
        votingPhases: z.array(phase).optional(),
        categoryOrder: z.array(category).optional()
      })
      .optional()
  })
  .refine(body => body.players.length === body.roles.length, {
    message: "players and roles must have the same length",
    path: ["roles"]
  });

export const updateGameSchema = z
  .object({
    dayNumber: z.number().int().positive().optional(),
    phase: phase.optional()
  })
  .refine(body => body.dayNumber !== undefined || body.phase !== undefined, "Nothing to update");

export const gameActionsSchema = z.object({
  actions: z.array(z.enum(GAME_ACTIONS)).min(1)
});

const selection = z.object({ targets: z.array(z.string()) }).nullable();

/** `null` for an ability withdraws its queued use. */
export const queueRequestSchema = z.object({
  actions: z.record(selection).default({}),
  sharedActions: z.record(selection).default({})
});

export const messageSchema = z.object({
  content: z.string().trim().min(1).max(2000)
});

export const voteSchema = z.object({
  target: z.string().min(1).nullable()
});

/** Query-string pagination, clamped to the configured maximum. */
export function paginationSchema(limits: PageLimits) {
  return z.object({
    start: z.coerce.number().int().default(0),
    limit: z.coerce
      .number()
      .int()
      .default(limits.defaultLimit)
      .transform(limit => (limit < 0 ? limits.defaultLimit : Math.min(limit, limits.maxLimit)))
  });
}
