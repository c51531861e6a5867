import type {
  AbilityType,
  AbilityUsage,
  EffectCategory,
  GameState,
  KnowledgeFact,
  Phase,
  Player,
  QueuedAbility,
  ResolutionOutcome
} from "./types";
import { knows } from "./knowledge";

/** Read-only facts an ability consults when deciding whether it may be used. */
export interface AbilityContext {
  game: GameState;
  user: Player;
  type: AbilityType;
  /** Counters of this ability instance (the alignment's for shared actions). */
  usage: AbilityUsage;
  alignmentTags(player: Player): readonly string[];
}

/** Protection placed on a player during a resolution pass. */
export interface Shield {
  source: string;
  abilityId: string;
  /** Kills it can still stop; null means unlimited. */
  remaining: number | null;
  /** The source dies in place of the protected player. */
  guardianDies: boolean;
}

/**
 * Operations an effect may perform on the working copy of a resolution pass.
 * Implemented by the resolver; effects never touch the queue directly.
 */
export interface EffectRun {
  readonly game: GameState;
  readonly now: number;
  player(name: string): Player;
  alignmentTags(player: Player): readonly string[];
  kill(victim: Player, cause: string): void;
  protect(target: string, shield: Shield): void;
  /**
   * Spends one charge of the first shield on the target; null when unprotected.
   * A shield raised by a passive also uses up one of the passive's uses.
   */
  absorbKill(target: string): Shield | null;
  /** Blocks every pending non-passive entry of `user`. Returns how many were blocked. */
  block(user: string, by: string): number;
  /** Exchanges `a` and `b` in the targets of pending entries. Returns how many changed. */
  swapTargets(a: string, b: string, by: string): number;
  /** Players `user` visited so far in this pass. */
  visitsBy(user: string): string[];
  /** Players who visited `target` so far in this pass. */
  visitorsOf(target: string): string[];
  learn(observer: string, subject: string, fact: KnowledgeFact): void;
  notify(player: string, content: string): void;
  announce(content: string): void;
}

export interface EffectResult {
  outcome: Exclude<ResolutionOutcome, "FIZZLED">;
  detail?: string;
}

/**
 * Capability interface every ability variant implements.
 * Phase, liveness and target existence are checked by the engine; these hooks add
 * ability-specific rules on top and are the seams modifiers wrap.
 */
export interface Ability {
  readonly id: string;
  readonly description: string;
  readonly category: EffectCategory;
  /** Lower resolves first. */
  readonly priority: number;
  /** Phase it may be used in; null means any. */
  readonly phase: Phase | null;
  readonly immediate: boolean;
  readonly targetCount: number;
  readonly tags: readonly string[];
  eligible(ctx: AbilityContext): boolean;
  legalTarget(ctx: AbilityContext, target: Player): boolean;
  allowTargets(ctx: AbilityContext, targets: readonly Player[]): boolean;
  /** Resolve-time veto; a reason string makes the entry fizzle. */
  resolveVeto(ctx: AbilityContext, targets: readonly Player[]): string | null;
  /** Uses still available to this instance; null when unlimited. */
  usesLeft(ctx: AbilityContext): number | null;
  apply(run: EffectRun, entry: QueuedAbility): EffectResult;
}

type AbilitySpec = Pick<Ability, "id" | "description" | "category" | "priority" | "apply"> &
  Partial<Omit<Ability, "id" | "description" | "category" | "priority" | "apply">>;

/** Fills in the defaults: night-only, one target, anyone but yourself. */
export function defineAbility(spec: AbilitySpec): Ability {
  return {
    phase: "NIGHT",
    immediate: false,
    targetCount: 1,
    tags: [],
    eligible: () => true,
    legalTarget: (ctx, target) => target.name !== ctx.user.name,
    allowTargets: () => true,
    resolveVeto: () => null,
    usesLeft: () => null,
    ...spec
  };
}

const success = (detail?: string): EffectResult => (detail ? { outcome: "SUCCESS", detail } : { outcome: "SUCCESS" });

/** Kills cannot be aimed at players the user knows to be on their own side. */
function notKnownAlly(ctx: AbilityContext, target: Player): boolean {
  if (target.name === ctx.user.name) return false;
  const fact = knows(ctx.game.knowledge, ctx.user.name, target.name);
  return fact?.alignment !== ctx.user.alignmentId;
}

function killAbility(id: string, description: string, tags: string[]): Ability {
  return defineAbility({
    id,
    description,
    category: "OFFENSIVE",
    priority: 50,
    tags: ["kill", ...tags],
    legalTarget: notKnownAlly,
    apply(run, entry) {
      const target = run.player(entry.targets[0]);
      const shield = run.absorbKill(target.name);
      if (shield) {
        return { outcome: "BLOCKED", detail: `protected by ${shield.source}` };
      }
      run.kill(target, id);
      return success();
    }
  });
}

function protectAbility(id: string, description: string, limit: number | null, guardianDies: boolean): Ability {
  return defineAbility({
    id,
    description,
    category: "PROTECTIVE",
    priority: 20,
    tags: ["protect"],
    apply(run, entry) {
      run.protect(entry.targets[0], { source: entry.user, abilityId: id, remaining: limit, guardianDies });
      return success();
    }
  });
}

export const KILL = killAbility("Kill", "Kill a player at night.", []);
export const FACTIONAL_KILL = killAbility(
  "Factional Kill",
  "Kill a player at night on behalf of your faction. One member performs it.",
  ["factional"]
);
export const SERIAL_KILL = killAbility("Serial Kill", "Kill a player at night.", ["personal"]);

export const DOCTOR = protectAbility("Doctor", "Protect a player from one kill tonight.", 1, false);
export const BODYGUARD = protectAbility(
  "Bodyguard",
  "Protect a player tonight. If they are attacked you die in their place.",
  1,
  true
);

export const BULLETPROOF = defineAbility({
  id: "Bulletproof",
  description: "You cannot be killed at night.",
  category: "PROTECTIVE",
  priority: 0,
  phase: null,
  targetCount: 0,
  tags: ["protect", "self"],
  apply(run, entry) {
    run.protect(entry.user, { source: entry.user, abilityId: "Bulletproof", remaining: null, guardianDies: false });
    return success();
  }
});

export const JAILKEEPER = defineAbility({
  id: "Jailkeeper",
  description: "Jail a player: they cannot act and cannot be killed tonight.",
  category: "CONTROL",
  priority: 10,
  tags: ["roleblock", "protect"],
  apply(run, entry) {
    const [target] = entry.targets;
    const blocked = run.block(target, entry.user);
    run.protect(target, { source: entry.user, abilityId: "Jailkeeper", remaining: null, guardianDies: false });
    return success(blocked > 0 ? `blocked ${blocked}` : undefined);
  }
});

export const ROLEBLOCKER = defineAbility({
  id: "Roleblocker",
  description: "Prevent a player from performing their actions tonight.",
  category: "CONTROL",
  priority: 10,
  tags: ["roleblock"],
  apply(run, entry) {
    const blocked = run.block(entry.targets[0], entry.user);
    if (blocked === 0) return { outcome: "FAILED", detail: "nothing to block" };
    return success(`blocked ${blocked}`);
  }
});

export const BUS_DRIVER = defineAbility({
  id: "Bus Driver",
  description: "Swap two players: every action aimed at one lands on the other.",
  category: "CONTROL",
  priority: 5,
  targetCount: 2,
  tags: ["redirect"],
  allowTargets: (_ctx, targets) => targets[0].name !== targets[1].name,
  apply(run, entry) {
    const [a, b] = entry.targets;
    const moved = run.swapTargets(a, b, entry.user);
    return success(`redirected ${moved}`);
  }
});

export const COP = defineAbility({
  id: "Cop",
  description: "Learn the alignment of a player.",
  category: "INFORMATIONAL",
  priority: 30,
  tags: ["investigate"],
  apply(run, entry) {
    const target = run.player(entry.targets[0]);
    run.learn(entry.user, target.name, { alignment: target.alignmentId });
    run.notify(entry.user, `${target.name} is aligned with the ${target.alignmentId}.`);
    return success();
  }
});

export const ROLECOP = defineAbility({
  id: "Rolecop",
  description: "Learn the role of a player.",
  category: "INFORMATIONAL",
  priority: 30,
  tags: ["investigate"],
  apply(run, entry) {
    const target = run.player(entry.targets[0]);
    run.learn(entry.user, target.name, { role: target.roleId });
    run.notify(entry.user, `${target.name}'s role is ${target.roleId}.`);
    return success();
  }
});

export const TRACKER = defineAbility({
  id: "Tracker",
  description: "Learn who a player visited tonight.",
  category: "INFORMATIONAL",
  priority: 60,
  tags: ["investigate"],
  apply(run, entry) {
    const [target] = entry.targets;
    const visited = run.visitsBy(target);
    run.notify(
      entry.user,
      visited.length > 0 ? `${target} visited ${visited.join(", ")}.` : `${target} did not visit anyone.`
    );
    return success();
  }
});

export const WATCHER = defineAbility({
  id: "Watcher",
  description: "Learn who visited a player tonight.",
  category: "INFORMATIONAL",
  priority: 60,
  tags: ["investigate"],
  apply(run, entry) {
    const [target] = entry.targets;
    const visitors = run.visitorsOf(target).filter(name => name !== entry.user);
    run.notify(
      entry.user,
      visitors.length > 0 ? `${target} was visited by ${visitors.join(", ")}.` : `${target} was not visited by anyone.`
    );
    return success();
  }
});

export const FRIENDLY_NEIGHBOR = defineAbility({
  id: "Friendly Neighbor",
  description: "Tell a player your alignment.",
  category: "INFORMATIONAL",
  priority: 30,
  tags: ["inform"],
  apply(run, entry) {
    const user = run.player(entry.user);
    const [target] = entry.targets;
    run.learn(target, user.name, { alignment: user.alignmentId });
    run.notify(target, `${user.name} is aligned with the ${user.alignmentId}.`);
    return success();
  }
});

export const INNOCENT_CHILD = defineAbility({
  id: "Innocent Child",
  description: "Once per game, publicly reveal your alignment.",
  category: "INFORMATIONAL",
  priority: 0,
  phase: null,
  immediate: true,
  targetCount: 0,
  tags: ["reveal"],
  eligible: ctx => ctx.usage.uses === 0,
  apply(run, entry) {
    const user = run.player(entry.user);
    for (const observer of run.game.players) {
      if (observer.name !== user.name) {
        run.learn(observer.name, user.name, { alignment: user.alignmentId });
      }
    }
    run.announce(`${user.name} is aligned with the ${user.alignmentId}!`);
    return success();
  }
});

/** Every ability shipped with the default ruleset. */
export const ABILITIES: readonly Ability[] = [
  KILL,
  FACTIONAL_KILL,
  SERIAL_KILL,
  DOCTOR,
  BODYGUARD,
  BULLETPROOF,
  JAILKEEPER,
  ROLEBLOCKER,
  BUS_DRIVER,
  COP,
  ROLECOP,
  TRACKER,
  WATCHER,
  FRIENDLY_NEIGHBOR,
  INNOCENT_CHILD
];
