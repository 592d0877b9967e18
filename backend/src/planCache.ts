export interface PlanCache<T> {
  get(key: string): Promise<T | undefined>;
  set(key: string, value: T, ttlSeconds: number): Promise<void>;
}

export interface RedisLikeClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options?: { EX: number }): Promise<unknown>;
}

export class MemoryPlanCache<T> implements PlanCache<T> {
  private store = new Map<string, { value: T; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    return this.store.size;
  }

  async get(key: string): Promise<T | undefined> {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: T, ttlSeconds: number): Promise<void> {
    const now = this.now();
    for (const [storedKey, entry] of this.store) {
      if (now >= entry.expiresAt) this.store.delete(storedKey);
    }
    this.store.set(key, { value, expiresAt: now + ttlSeconds * 1000 });
  }
}

export class RedisPlanCache<T> implements PlanCache<T> {
  constructor(
    private readonly redis: RedisLikeClient,
    private readonly decode: (raw: unknown) => T
  ) {}

  async get(key: string): Promise<T | undefined> {
    const raw = await this.redis.get(key);
    if (!raw) return undefined;
    return this.decode(JSON.parse(raw));
  }

  async set(key: string, value: T, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, JSON.stringify(value), { EX: ttlSeconds });
  }
}
