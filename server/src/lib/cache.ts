import NodeCache from 'node-cache';
import { ENV } from './env';

export type GetOrFetchOptions<V> = {
  ttlSec?: number;
  /** stored only when this returns true; defaults to storing everything */
  shouldCache?: (value: V) => boolean;
};

/**
 * TTL 메모이즈 캐시. 같은 키의 동시 호출은 하나의 producer 를 공유한다.
 */
export class ResultCache<V> {
  private readonly store: NodeCache;
  private readonly inflight = new Map<string, Promise<V>>();
  private readonly defaultTtlSec: number;

  constructor(defaultTtlSec: number = ENV.CACHE_TTL_SEC) {
    this.defaultTtlSec = defaultTtlSec;
    // checkperiod 0: expiry is checked on read, no background timer
    this.store = new NodeCache({ stdTTL: defaultTtlSec, checkperiod: 0, useClones: false });
  }

  get(key: string): V | undefined {
    return this.store.get<V>(key);
  }

  set(key: string, value: V, ttlSec: number = this.defaultTtlSec): void {
    this.store.set(key, value, ttlSec);
  }

  async getOrFetch(key: string, producer: () => Promise<V>, options: GetOrFetchOptions<V> = {}): Promise<V> {
    const hit = this.store.get<V>(key);
    if (hit !== undefined) return hit;

    const pending = this.inflight.get(key);
    if (pending) return pending;

    // producer 는 다음 tick 에 실행되므로 동기 throw 도 inflight 등록 뒤에 정리된다
    const run: Promise<V> = Promise.resolve()
      .then(producer)
      .then((value) => {
        const keep = options.shouldCache ? options.shouldCache(value) : true;
        if (keep) {
          this.store.set(key, value, options.ttlSec ?? this.defaultTtlSec);
        }
        return value;
      })
      .finally(() => {
        if (this.inflight.get(key) === run) {
          this.inflight.delete(key);
        }
      });

    this.inflight.set(key, run);
    return run;
  }

  delete(key: string): void {
    this.store.del(key);
  }

  flush(): void {
    this.store.flushAll();
    this.inflight.clear();
  }

  keys(): string[] {
    return this.store.keys();
  }
}
