import { config } from "../common/config";
import type { LoggerLike } from "../common/logger";
import { logger as defaultLogger } from "../common/logger";
import { LRUCache } from "../common/lru-cache";
import type { RandomSource } from "../common/random";
import type { BatchResult } from "../engine/batch";
import { drawMany } from "../engine/batch";
import type { Engine } from "../engine/factory";
import { createEngine } from "../engine/factory";
import type { SimParams } from "../types";

export type Session = {
  readonly id: string;
  readonly params: SimParams;
  readonly engine: Engine;
  /** Draws performed since the engine was built. */
  draws: number;
};

export type SessionStoreOptions = {
  capacity?: number;
  /** Source handed to every engine the store builds; defaults to the crypto source. */
  source?: RandomSource;
  logger?: LoggerLike;
};

function sameOffProbs(
  a: readonly number[] | undefined,
  b: readonly number[] | undefined
): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.length === b.length && a.every((p, i) => p === b[i]);
}

function sameParams(a: SimParams, b: SimParams): boolean {
  return (
    a.pBase === b.pBase &&
    a.pity === b.pity &&
    a.softMode === b.softMode &&
    a.rampStart === b.rampStart &&
    a.rampStartPct === b.rampStartPct &&
    a.targetProb === b.targetProb &&
    a.increment === b.increment &&
    a.easing === b.easing &&
    (a.cushion ?? 0) === (b.cushion ?? 0) &&
    sameOffProbs(a.offProbs, b.offProbs) &&
    a.maxOff === b.maxOff
  );
}

/**
 * Per-session engine ownership. Each session id owns one engine, so draws in
 * one session never advance another session's counters. The least recently
 * used session is dropped once `capacity` is reached.
 */
export class SessionStore {
  private readonly sessions: LRUCache<string, Session>;
  private readonly source?: RandomSource;
  private readonly log: LoggerLike;

  constructor(options: SessionStoreOptions = {}) {
    this.log = options.logger ?? defaultLogger;
    this.source = options.source;
    this.sessions = new LRUCache<string, Session>(
      options.capacity ?? config.sessionCapacity,
      (id, session) =>
        this.log.debug({ session: id, draws: session.draws }, "session-evicted")
    );
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Return the session for `id`, building its engine on first use. Opening an
   * existing session with different params rebuilds its engine from scratch.
   * `source` overrides the store-wide source for a newly built engine only.
   */
  open(id: string, params: SimParams, source?: RandomSource): Session {
    const existing = this.sessions.get(id);
    if (existing !== undefined && sameParams(existing.params, params)) {
      return existing;
    }

    const session: Session = {
      id,
      params,
      engine: createEngine(params, source ?? this.source),
      draws: 0,
    };
    this.sessions.set(id, session);
    this.log.debug(
      { session: id, rebuilt: existing !== undefined },
      existing === undefined ? "session-opened" : "session-rebuilt"
    );
    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  /** Advance one session by `n` draws; undefined when the session is unknown. */
  draw(id: string, n = 1): BatchResult | undefined {
    const session = this.sessions.get(id);
    if (session === undefined) return undefined;

    const result = drawMany(session.engine, session.params.pBase, n);
    session.draws += result.outcomes.length;
    return result;
  }

  close(id: string): boolean {
    return this.sessions.delete(id);
  }
}
