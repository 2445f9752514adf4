import type { Redis } from "ioredis";
import { log } from "../logger.js";

/**
 * Newest createdAt a fully dispatched run has covered
 */
export interface WatermarkStore {
  get(): Promise<Date | undefined>;
  /** Never moves the watermark backwards */
  advance(to: Date): Promise<void>;
}

// Atomic compare-and-set: only store a larger epoch-ms value
const ADVANCE_SCRIPT = `
  local current = tonumber(redis.call('GET', KEYS[1]) or '0')
  local candidate = tonumber(ARGV[1])
  if candidate > current then
    redis.call('SET', KEYS[1], ARGV[1])
    return 1
  end
  return 0
`;

/** The Redis commands the store needs */
export type WatermarkRedis = Pick<Redis, "get" | "eval">;

export class RedisWatermarkStore implements WatermarkStore {
  constructor(
    private readonly redis: WatermarkRedis,
    private readonly key: string
  ) {}

  async get(): Promise<Date | undefined> {
    const raw = await this.redis.get(this.key);
    if (raw === null) return undefined;

    const epochMs = Number(raw);
    if (!Number.isFinite(epochMs) || epochMs <= 0) {
      log.db.warn({ key: this.key, raw }, "ignoring malformed watermark");
      return undefined;
    }
    return new Date(epochMs);
  }

  async advance(to: Date): Promise<void> {
    const moved = await this.redis.eval(ADVANCE_SCRIPT, 1, this.key, String(to.getTime()));
    log.db.debug({ key: this.key, to: to.toISOString(), moved: moved === 1 }, "watermark advance");
  }
}

/**
 * Watermark kept in process memory (tests and single-node runs)
 */
export class InMemoryWatermarkStore implements WatermarkStore {
  private value: Date | undefined;

  constructor(initial?: Date) {
    this.value = initial;
  }

  async get(): Promise<Date | undefined> {
    return this.value;
  }

  async advance(to: Date): Promise<void> {
    if (!this.value || to.getTime() > this.value.getTime()) {
      this.value = to;
    }
  }
}
