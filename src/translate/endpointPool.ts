import type { EndpointConfig } from "../config.js";
import type { Logger } from "../logger.js";

export type EndpointHealth = "healthy" | "degraded" | "unreachable";

export interface EndpointState extends EndpointConfig {
  id: number;
  health: EndpointHealth;
  consecutiveFailures: number;
  successes: number;
  failures: number;
  lastError?: string;
}

/**
 * Translation endpoints with observed health. One failure degrades an endpoint,
 * `unreachableAfter` consecutive failures retire it for the life of the pool, and
 * any success makes it healthy again.
 */
export class EndpointPool {
  private readonly states: EndpointState[];

  constructor(
    endpoints: readonly EndpointConfig[],
    private readonly unreachableAfter: number,
    private readonly log?: Logger
  ) {
    this.states = endpoints.map((e, id) => ({
      ...e,
      id,
      health: "healthy",
      consecutiveFailures: 0,
      successes: 0,
      failures: 0,
    }));
  }

  get size(): number {
    return this.states.length;
  }

  health(id: number): EndpointHealth {
    return this.state(id).health;
  }

  /**
   * Preference order for one batch: healthy endpoints rotated by `rotation` so parallel
   * batches start on different servers, then degraded ones in configured order.
   */
  candidates(rotation = 0): EndpointState[] {
    const healthy = this.states.filter((s) => s.health === "healthy");
    const degraded = this.states.filter((s) => s.health === "degraded");
    const shift = healthy.length ? rotation % healthy.length : 0;
    return [...healthy.slice(shift), ...healthy.slice(0, shift), ...degraded].map((s) => ({ ...s }));
  }

  recordSuccess(id: number): void {
    const s = this.state(id);
    if (s.health !== "healthy") {
      this.log?.info({ endpoint: s.url, from: s.health }, "translation endpoint recovered");
    }
    s.successes += 1;
    s.consecutiveFailures = 0;
    s.health = "healthy";
  }

  recordFailure(id: number, error: string): EndpointHealth {
    const s = this.state(id);
    s.failures += 1;
    s.consecutiveFailures += 1;
    s.lastError = error;
    const next: EndpointHealth = s.consecutiveFailures >= this.unreachableAfter ? "unreachable" : "degraded";
    if (next !== s.health) {
      this.log?.warn({ endpoint: s.url, from: s.health, to: next, error }, "translation endpoint health changed");
    }
    s.health = next;
    return next;
  }

  allUnreachable(): boolean {
    return this.states.every((s) => s.health === "unreachable");
  }

  snapshot(): EndpointState[] {
    return this.states.map((s) => ({ ...s }));
  }

  private state(id: number): EndpointState {
    const s = this.states[id];
    if (!s) throw new RangeError(`Unknown endpoint id ${id}`);
    return s;
  }
}
