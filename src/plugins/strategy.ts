import type { Logger } from "../utils/logger.ts";

/**
 * Outcome of one strategy in a fallback chain. `found` decides the chain,
 * `notApplicable` and `failed` pass control to the next strategy.
 */
export type Outcome<T> =
  | { kind: "found"; value: T }
  | { kind: "notApplicable"; reason: string }
  | { kind: "failed"; reason: string };

export function found<T>(value: T): Outcome<T> {
  return { kind: "found", value };
}

export function notApplicable<T = never>(reason: string): Outcome<T> {
  return { kind: "notApplicable", reason };
}

export function failed<T = never>(reason: string): Outcome<T> {
  return { kind: "failed", reason };
}

export interface Strategy<C, T> {
  name: string;
  run(ctx: C): Promise<Outcome<T>>;
}

export interface ChainStep<T> {
  name: string;
  outcome: Outcome<T>;
}

export interface ChainResult<T> {
  /** The deciding `found` outcome, or the last outcome when nothing decided. */
  outcome: Outcome<T>;
  decidedBy?: string;
  /** Every strategy that ran, in order. Strategies after the decision never appear. */
  trail: ChainStep<T>[];
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Runs `fn`, turning a thrown error into a `failed` outcome. */
export async function attempt<T>(fn: () => Promise<Outcome<T>>): Promise<Outcome<T>> {
  try {
    return await fn();
  } catch (err) {
    return failed(errorMessage(err));
  }
}

/**
 * Runs strategies in order until one returns `found`. A strategy that throws
 * counts as `failed`; failures are logged at warn level and never stop the
 * chain.
 */
export async function runChain<C, T>(
  strategies: ReadonlyArray<Strategy<C, T>>,
  ctx: C,
  log?: Logger,
): Promise<ChainResult<T>> {
  const trail: ChainStep<T>[] = [];

  for (const strategy of strategies) {
    const outcome = await attempt(() => strategy.run(ctx));
    trail.push({ name: strategy.name, outcome });

    if (outcome.kind === "found") {
      log?.debug(`${strategy.name}: decided`);
      return { outcome, decidedBy: strategy.name, trail };
    }
    if (outcome.kind === "failed") {
      log?.warn(`${strategy.name} failed: ${outcome.reason}`);
    } else {
      log?.debug(`${strategy.name} not applicable: ${outcome.reason}`);
    }
  }

  const last = trail[trail.length - 1];
  return {
    outcome: last ? last.outcome : notApplicable("no strategies"),
    trail,
  };
}
