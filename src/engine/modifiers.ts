import { z } from "zod";
import type { Ability, AbilityContext } from "./abilities";
import { GameRuleError } from "./types";

/** Ability lists of a role before slots are built. Role modifiers reshape it. */
export interface RoleShape {
  actions: string[];
  passives: string[];
}

/** A modifier with its parameters bound, ready to transform. */
export interface AppliedModifier {
  id: string;
  /** Prefix added to the composed role id, e.g. "2-Shot". */
  label: string;
  ability?: (base: Ability) => Ability;
  role?: (shape: RoleShape) => RoleShape;
}

export interface ModifierDefinition {
  id: string;
  description: string;
  /** Parameters a role assignment must supply, for reference listings. */
  params: string[];
  instantiate(params: unknown): AppliedModifier;
}

interface ModifierSpecDef<P> {
  id: string;
  description: string;
  params: z.ZodType<P, z.ZodTypeDef, unknown>;
  label?: (params: P) => string;
  ability?: (base: Ability, params: P) => Ability;
  role?: (shape: RoleShape, params: P) => RoleShape;
}

const noParams = z.object({}).strict();

function defineModifier<P>(def: ModifierSpecDef<P>): ModifierDefinition {
  const shape = def.params instanceof z.ZodObject ? Object.keys(def.params.shape) : [];
  return {
    id: def.id,
    description: def.description,
    params: shape,
    instantiate(raw) {
      const parsed = def.params.safeParse(raw ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "params"}: ${issue.message}`);
        throw new GameRuleError("INVALID_SETUP", `Invalid parameters for ${def.id}: ${issues.join("; ")}`);
      }
      const params = parsed.data;
      const { ability, role } = def;
      return {
        id: def.id,
        label: def.label ? def.label(params) : def.id,
        ability: ability ? base => ability(base, params) : undefined,
        role: role ? current => role(current, params) : undefined
      };
    }
  };
}

/** Narrows eligibility; the base ability keeps its own checks. */
function gate(base: Ability, extra: (ctx: AbilityContext) => boolean): Ability {
  return { ...base, eligible: ctx => base.eligible(ctx) && extra(ctx) };
}

/** Limits an ability to N uses per game. */
export const X_SHOT = defineModifier({
  id: "X-Shot",
  description: "Can only be used a limited number of times.",
  params: z.object({ uses: z.number().int().positive().default(1) }),
  label: ({ uses }) => `${uses}-Shot`,
  ability: (base, { uses }) => ({
    ...gate(base, ctx => ctx.usage.uses < uses),
    usesLeft: ctx => {
      const own = Math.max(uses - ctx.usage.uses, 0);
      const inner = base.usesLeft(ctx);
      return inner === null ? own : Math.min(inner, own);
    }
  })
});

export const NIGHT_X = defineModifier({
  id: "Night X",
  description: "Can only be used on the listed nights.",
  params: z.object({ nights: z.array(z.number().int().positive()).nonempty() }),
  label: ({ nights }) => `Night ${[...new Set(nights)].sort((a, b) => a - b).join(",")}`,
  ability: (base, { nights }) => ({
    ...gate(base, ctx => nights.includes(ctx.game.dayNumber)),
    phase: "NIGHT"
  })
});

export const ODD_NIGHT = defineModifier({
  id: "Odd Night",
  description: "Can only be used on odd nights.",
  params: noParams,
  ability: base => ({ ...gate(base, ctx => ctx.game.dayNumber % 2 === 1), phase: "NIGHT" })
});

export const EVEN_NIGHT = defineModifier({
  id: "Even Night",
  description: "Can only be used on even nights.",
  params: noParams,
  ability: base => ({ ...gate(base, ctx => ctx.game.dayNumber % 2 === 0), phase: "NIGHT" })
});

export const NON_CONSECUTIVE = defineModifier({
  id: "Non-Consecutive",
  description: "Cannot be used two days or nights in a row.",
  params: noParams,
  ability: base =>
    gate(base, ctx => ctx.usage.lastUsedDay === null || ctx.game.dayNumber > ctx.usage.lastUsedDay + 1)
});

export const INDECISIVE = defineModifier({
  id: "Indecisive",
  description: "Cannot target the same player two days or nights in a row.",
  params: noParams,
  ability: base => ({
    ...base,
    allowTargets: (ctx, targets) => {
      if (!base.allowTargets(ctx, targets)) return false;
      const { lastUsedDay, lastTargets } = ctx.usage;
      if (lastUsedDay === null || ctx.game.dayNumber > lastUsedDay + 1) return true;
      const previous = new Set(lastTargets);
      return !targets.some(target => previous.has(target.name));
    }
  })
});

export const LOYAL = defineModifier({
  id: "Loyal",
  description: "Fails when used on a player outside your alignment.",
  params: noParams,
  ability: base => ({
    ...base,
    apply: (run, entry) => {
      const user = run.player(entry.user);
      const stranger = entry.targets.find(name => run.player(name).alignmentId !== user.alignmentId);
      if (stranger) return { outcome: "FAILED", detail: `${stranger} is not an ally` };
      return base.apply(run, entry);
    }
  })
});

export const DISLOYAL = defineModifier({
  id: "Disloyal",
  description: "Fails when used on a player of your own alignment.",
  params: noParams,
  ability: base => ({
    ...base,
    apply: (run, entry) => {
      const user = run.player(entry.user);
      const ally = entry.targets.find(name => run.player(name).alignmentId === user.alignmentId);
      if (ally) return { outcome: "FAILED", detail: `${ally} is an ally` };
      return base.apply(run, entry);
    }
  })
});

export const WEAK = defineModifier({
  id: "Weak",
  description: "You die if you use this on anyone not aligned with the Town.",
  params: noParams,
  ability: base => ({
    ...base,
    apply: (run, entry) => {
      const user = run.player(entry.user);
      const hostile = entry.targets.some(name => !run.alignmentTags(run.player(name)).includes("town"));
      if (hostile) run.kill(user, "Weak");
      return base.apply(run, entry);
    }
  })
});

export const PERSONAL = defineModifier({
  id: "Personal",
  description: "Can only be used on yourself.",
  params: noParams,
  ability: base => ({
    ...base,
    legalTarget: (ctx, target) => target.name === ctx.user.name
  })
});

export const LAZY = defineModifier({
  id: "Lazy",
  description: "Fails unless at least two players outside the Town are alive.",
  params: noParams,
  ability: base => ({
    ...base,
    resolveVeto: (ctx, targets) => {
      const outsiders = ctx.game.players.filter(p => p.alive && !ctx.alignmentTags(p).includes("town"));
      if (outsiders.length < 2) return "too lazy";
      return base.resolveVeto(ctx, targets);
    }
  })
});

export const ACTIVATED = defineModifier({
  id: "Activated",
  description: "Passive abilities must be activated as actions.",
  params: noParams,
  role: shape => ({ actions: [...shape.actions, ...shape.passives], passives: [] })
});

export const MODIFIERS: readonly ModifierDefinition[] = [
  X_SHOT,
  NIGHT_X,
  ODD_NIGHT,
  EVEN_NIGHT,
  NON_CONSECUTIVE,
  INDECISIVE,
  LOYAL,
  DISLOYAL,
  WEAK,
  PERSONAL,
  LAZY,
  ACTIVATED
];
