import type { Ability, EffectResult, EffectRun, Shield } from "./abilities";
import type { Ruleset } from "./catalog";
import { DEFAULT_RULESET, alignmentTagsOf } from "./catalog";
import { announce, notifyPlayer } from "./chat";
import { abilityContext, isEligible, liveAbility, recordUse } from "./instances";
import { learn } from "./knowledge";
import type {
  AbilityUsage,
  EffectCategory,
  GameState,
  KnowledgeFact,
  Player,
  QueuedAbility,
  ResolutionLogEntry,
  ResolutionOutcome
} from "./types";
import { InvariantError } from "./types";
import { cloneGame, ensureActive, getPlayer, killPlayer } from "./utils";
import { settleWinner } from "./win";

export const NO_RESULT_NOTICE = "Your ability failed, and you did not receive a result.";

/** A queue entry prepared for one pass. Targets may be rewritten by redirection. */
interface PlannedEntry {
  entry: QueuedAbility;
  ability: Ability;
  /** Counters as they stood when the pass started. */
  usage: AbilityUsage;
  usesLeft: number | null;
  /** Kills stopped by shields this entry raised. */
  absorbed: number;
  blockedBy: string | null;
  outcome: ResolutionOutcome | null;
}

interface PlacedShield {
  shield: Shield;
  raisedBy: PlannedEntry | null;
}

interface Visit {
  user: string;
  target: string;
}

type Outcome = EffectResult | { outcome: "FIZZLED"; detail: string };

/**
 * Sort key of the resolution order: priority, then the category tie-break,
 * then insertion order. Returns a new array.
 */
export function resolutionOrder<T extends { entry: QueuedAbility; ability: Ability }>(
  planned: readonly T[],
  categoryOrder: readonly EffectCategory[]
): T[] {
  const rank = (category: EffectCategory) => categoryOrder.indexOf(category);
  return [...planned].sort(
    (a, b) =>
      a.ability.priority - b.ability.priority ||
      rank(a.ability.category) - rank(b.ability.category) ||
      a.entry.seq - b.entry.seq
  );
}

/**
 * One resolution pass over a working snapshot.
 * Protection is consulted when a kill lands, and blocking or redirection only touch
 * entries that have not resolved yet, so the order of `plan` decides every interaction.
 */
class ResolutionRun implements EffectRun {
  private shields = new Map<string, PlacedShield[]>();
  private current: PlannedEntry | null = null;
  private visits: Visit[] = [];
  readonly entries: ResolutionLogEntry[] = [];

  constructor(
    readonly game: GameState,
    readonly now: number,
    private readonly ruleset: Ruleset,
    private readonly plan: PlannedEntry[]
  ) {}

  player(name: string): Player {
    const player = getPlayer(this.game.players, name);
    if (!player) {
      throw new InvariantError(`Player ${name} vanished during resolution`);
    }
    return player;
  }

  alignmentTags(player: Player): readonly string[] {
    return alignmentTagsOf(this.ruleset, this.game, player);
  }

  kill(victim: Player, cause: string): void {
    killPlayer(victim, cause);
  }

  protect(target: string, shield: Shield): void {
    const placed: Shield = { ...shield };
    const raisedBy = this.current;
    // a passive shield cannot stop more kills than the passive has uses left
    if (raisedBy?.entry.type === "PASSIVE" && raisedBy.usesLeft !== null) {
      placed.remaining = placed.remaining === null ? raisedBy.usesLeft : Math.min(placed.remaining, raisedBy.usesLeft);
    }
    const list = this.shields.get(target) ?? [];
    list.push({ shield: placed, raisedBy });
    this.shields.set(target, list);
  }

  absorbKill(target: string): Shield | null {
    const placed = (this.shields.get(target) ?? []).find(
      p => p.shield.remaining === null || p.shield.remaining > 0
    );
    if (!placed) return null;
    const { shield, raisedBy } = placed;
    if (shield.remaining !== null) shield.remaining -= 1;
    if (raisedBy) raisedBy.absorbed += 1;
    if (shield.guardianDies) this.kill(this.player(shield.source), shield.abilityId);
    return { ...shield };
  }

  block(user: string, by: string): number {
    let blocked = 0;
    for (const planned of this.pending()) {
      if (planned.entry.user !== user || planned.entry.type === "PASSIVE") continue;
      if (planned.ability.tags.includes("unstoppable") || planned.blockedBy !== null) continue;
      planned.blockedBy = by;
      blocked++;
    }
    return blocked;
  }

  swapTargets(a: string, b: string, by: string): number {
    let changed = 0;
    for (const planned of this.pending()) {
      if (planned.entry.user === by) continue;
      const swapped = planned.entry.targets.map(t => (t === a ? b : t === b ? a : t));
      if (swapped.some((t, i) => t !== planned.entry.targets[i])) {
        planned.entry.targets = swapped;
        changed++;
      }
    }
    return changed;
  }

  visitsBy(user: string): string[] {
    return this.visits.filter(v => v.user === user).map(v => v.target);
  }

  visitorsOf(target: string): string[] {
    return [...new Set(this.visits.filter(v => v.target === target).map(v => v.user))];
  }

  learn(observer: string, subject: string, fact: KnowledgeFact): void {
    learn(this.game.knowledge, observer, subject, fact);
  }

  notify(player: string, content: string): void {
    notifyPlayer(this.game, player, content, this.now);
  }

  announce(content: string): void {
    announce(this.game, content, this.now);
  }

  execute(): void {
    for (const planned of this.plan) {
      this.process(planned);
    }
  }

  private pending(): PlannedEntry[] {
    return this.plan.filter(p => p.outcome === null);
  }

  private process(planned: PlannedEntry): void {
    const { entry, ability } = planned;
    this.current = planned;
    const result = this.evaluate(planned);
    this.current = null;
    planned.outcome = result.outcome;

    if (result.outcome !== "FIZZLED" && entry.type !== "PASSIVE") {
      for (const target of entry.targets) {
        if (target !== entry.user) this.visits.push({ user: entry.user, target });
      }
    }
    if ((result.outcome === "FIZZLED" || result.outcome === "FAILED") && ability.tags.includes("investigate")) {
      this.notify(entry.user, NO_RESULT_NOTICE);
    }

    const logged: ResolutionLogEntry = {
      dayNumber: entry.dayNumber,
      phase: entry.phase,
      abilityId: entry.abilityId,
      type: entry.type,
      user: entry.user,
      targets: [...entry.targets],
      outcome: result.outcome
    };
    if (result.detail) logged.detail = result.detail;
    this.entries.push(logged);
  }

  private evaluate(planned: PlannedEntry): Outcome {
    const { entry, ability } = planned;
    if (planned.blockedBy !== null) {
      return { outcome: "FIZZLED", detail: `roleblocked by ${planned.blockedBy}` };
    }
    const user = this.player(entry.user);
    if (!user.alive) {
      return { outcome: "FIZZLED", detail: `${user.name} is dead` };
    }
    const targets = entry.targets.map(name => this.player(name));
    const dead = targets.find(t => !t.alive);
    if (dead) {
      return { outcome: "FIZZLED", detail: `${dead.name} is dead` };
    }
    const ctx = abilityContext(this.game, this.ruleset, user, entry.type, planned.usage);
    const veto = ability.resolveVeto(ctx, targets);
    if (veto !== null) {
      return { outcome: "FIZZLED", detail: veto };
    }
    return ability.apply(this, entry);
  }
}

function plan(game: GameState, ruleset: Ruleset, entries: QueuedAbility[]): PlannedEntry[] {
  return entries.map(entry => {
    const user = getPlayer(game.players, entry.user);
    const live = user ? liveAbility(game, ruleset, user, entry.abilityId, entry.type) : null;
    if (!live) {
      throw new InvariantError(`Queued ${entry.abilityId} of ${entry.user} has no matching ability`);
    }
    return {
      entry: { ...entry, targets: [...entry.targets] },
      ability: live.ability,
      usage: { ...live.usage, lastTargets: [...live.usage.lastTargets] },
      usesLeft: live.ability.usesLeft(live.ctx),
      absorbed: 0,
      blockedBy: null,
      outcome: null
    };
  });
}

/** Passive entries for every living player whose passive fires this phase. */
function passiveEntries(game: GameState, ruleset: Ruleset): QueuedAbility[] {
  const phase = ensureActive(game);
  const entries: QueuedAbility[] = [];
  for (const player of game.players) {
    if (!player.alive) continue;
    for (const slot of player.passives) {
      const live = liveAbility(game, ruleset, player, slot.abilityId, "PASSIVE");
      if (!live || !isEligible(live.ability, live.ctx)) continue;
      entries.push({
        abilityId: slot.abilityId,
        type: "PASSIVE",
        user: player.name,
        owner: player.name,
        targets: [],
        phase,
        dayNumber: game.dayNumber,
        seq: game.nextSeq++
      });
    }
  }
  return entries;
}

/** Uses an entry spent in this pass. */
function usesSpent({ entry, ability, outcome, absorbed }: PlannedEntry): number {
  if (entry.type !== "PASSIVE") return 1;
  if (ability.tags.includes("protect")) return absorbed;
  return outcome === "SUCCESS" ? 1 : 0;
}

/**
 * Every queued action that reached the pass counts one use. A protective passive counts
 * one per kill it stopped, any other passive one when it succeeded.
 */
function recordUsage(game: GameState, planned: readonly PlannedEntry[]): void {
  for (const entry of planned) {
    const count = usesSpent(entry);
    if (count === 0) continue;
    recordUse(game, entry.entry.type, entry.entry.owner, entry.entry.abilityId, entry.entry.targets, count);
  }
}

function runPass(working: GameState, now: number, ruleset: Ruleset, planned: PlannedEntry[]): GameState {
  const run = new ResolutionRun(working, now, ruleset, planned);
  run.execute();
  recordUsage(working, planned);
  working.log.push(...run.entries);
  settleWinner(working, now, ruleset);
  return working;
}

/**
 * Resolves the current phase: collects queued entries stamped with this phase and the
 * passives that fire, orders them, applies every effect, then clears the queue,
 * consumes uses and evaluates the win conditions. Returns a new snapshot.
 */
export function resolvePhase(game: GameState, now: number, ruleset: Ruleset = DEFAULT_RULESET): GameState {
  const phase = ensureActive(game);
  const working = cloneGame(game);
  const queued = working.queue.filter(e => e.phase === phase && e.dayNumber === working.dayNumber);
  const entries = [...queued, ...passiveEntries(working, ruleset)];
  const ordered = resolutionOrder(plan(working, ruleset, entries), working.options.categoryOrder);
  working.queue = [];
  return runPass(working, now, ruleset, ordered);
}

/** Resolves a single immediate ability at queue time. Returns a new snapshot. */
export function resolveImmediate(
  game: GameState,
  entry: QueuedAbility,
  now: number,
  ruleset: Ruleset = DEFAULT_RULESET
): GameState {
  ensureActive(game);
  const working = cloneGame(game);
  working.nextSeq = Math.max(working.nextSeq, entry.seq + 1);
  return runPass(working, now, ruleset, plan(working, ruleset, [entry]));
}
