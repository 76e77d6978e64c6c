/**
 * 세션별 AppState 보관 (X-Session-ID). 프로세스 메모리, TTL 만료.
 */

import NodeCache from 'node-cache';
import { randomUUID } from 'crypto';
import { ENV } from '../lib/env';
import { createAppState, type AppState } from '../types';

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,64}$/;

export type Session = {
  id: string;
  state: AppState;
  created: boolean;
};

export class SessionService {
  private readonly store: NodeCache;
  private readonly ttlSec: number;

  constructor(ttlSec: number = ENV.SESSION_TTL_SEC) {
    this.ttlSec = ttlSec;
    this.store = new NodeCache({ stdTTL: ttlSec, checkperiod: 0, useClones: false });
  }

  /** 알 수 없는/형식이 틀린 id 는 새 세션으로 대체한다. */
  acquire(sessionId?: string): Session {
    const id = sessionId?.trim();
    if (id && SESSION_ID_PATTERN.test(id)) {
      const existing = this.store.get<AppState>(id);
      if (existing) {
        this.store.ttl(id, this.ttlSec);
        return { id, state: existing, created: false };
      }
      const state = createAppState();
      this.store.set(id, state);
      return { id, state, created: true };
    }

    const fresh = randomUUID();
    const state = createAppState();
    this.store.set(fresh, state);
    return { id: fresh, state, created: true };
  }

  get(sessionId: string): AppState | undefined {
    return this.store.get<AppState>(sessionId);
  }

  clear(): void {
    this.store.flushAll();
  }
}

export const sessionService = new SessionService();
