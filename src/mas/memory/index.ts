/**
 * Session Store — per-conversation state for the ordering workflow
 *
 * Sessions are plain JSON-shaped documents; the in-memory store keeps
 * copies so a saved session behaves like a persisted record.
 */

import type { Address, Industry, Product, SearchResult } from '../tools/types';
import type { DetailField, DetailFields, FieldValidationInfo, RequestType } from '../agents/fields';
import type { LanguageCode } from '../translation/languages';

export type AgentId = 'product_request' | 'request_details' | 'address_purpose' | 'completed';

export const AGENT_IDS: readonly AgentId[] = ['product_request', 'request_details', 'address_purpose', 'completed'];

export interface HistoryTurn {
  user: string;
  agent: string;
}

export interface TranscriptEntry {
  role: 'user' | 'assistant';
  content: string;
  language: LanguageCode;
  timestamp: string;
}

export interface SearchCache {
  /** normalized query → stripped vendor result */
  searches: Record<string, SearchResult>;
  productsById: Record<string, Product>;
  /** 1-based list position → product id */
  listIndex: Record<string, string>;
  currentList: Product[];
}

export type OrderOutcome =
  | { status: 'placed'; message: string; orderId?: string; requirementId?: string; placedAt: string }
  | { status: 'failed'; message: string; errorType: string; failedAt: string };

export interface Session {
  sessionId: string;
  userAuth: string;
  language: LanguageCode;
  agent: AgentId;

  productId: string | null;
  productName: string | null;
  product: Product | null;
  request: RequestType | null;
  fields: DetailFields;
  validationInfo: Partial<Record<DetailField, FieldValidationInfo>>;

  address: Address | null;
  industryId: string | null;
  industryName: string | null;

  history: HistoryTurn[];
  transcript: TranscriptEntry[];
  cache: SearchCache;

  cachedAddresses: Address[];
  cachedIndustries: Industry[];
  cachedDataFetched: boolean;
  confirmationShown: boolean;
  order: OrderOutcome | null;

  createdAt: string;
  lastUpdated: string;
}

export function emptySearchCache(): SearchCache {
  return { searches: {}, productsById: {}, listIndex: {}, currentList: [] };
}

export function createSession(
  sessionId: string,
  userAuth: string,
  language: LanguageCode,
  now: Date = new Date()
): Session {
  const timestamp = now.toISOString();
  return {
    sessionId,
    userAuth,
    language,
    agent: 'product_request',
    productId: null,
    productName: null,
    product: null,
    request: null,
    fields: {},
    validationInfo: {},
    address: null,
    industryId: null,
    industryName: null,
    history: [],
    transcript: [],
    cache: emptySearchCache(),
    cachedAddresses: [],
    cachedIndustries: [],
    cachedDataFetched: false,
    confirmationShown: false,
    order: null,
    createdAt: timestamp,
    lastUpdated: timestamp,
  };
}

export interface SessionStore {
  load(sessionId: string): Promise<Session | undefined>;
  save(session: Session): Promise<void>;
  delete(sessionId: string): Promise<boolean>;
  /** Drop sessions idle for longer than the TTL; returns how many were removed */
  purgeExpired(now?: number): Promise<number>;
  list(): Promise<Session[]>;
}

/**
 * In-memory session store
 */
export class MemorySessionStore implements SessionStore {
  private sessions: Map<string, Session> = new Map();
  private ttlMs: number;

  constructor(ttlMs: number = 24 * 60 * 60 * 1000) {
    this.ttlMs = ttlMs;
  }

  async load(sessionId: string): Promise<Session | undefined> {
    await this.purgeExpired();
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : undefined;
  }

  async save(session: Session): Promise<void> {
    this.sessions.set(session.sessionId, structuredClone(session));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async purgeExpired(now: number = Date.now()): Promise<number> {
    const cutoff = now - this.ttlMs;
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (Date.parse(session.lastUpdated) < cutoff) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(`[Sessions] Purged ${removed} expired session(s)`);
    }
    return removed;
  }

  async list(): Promise<Session[]> {
    return Array.from(this.sessions.values()).map((s) => structuredClone(s));
  }

  /**
   * Clear all sessions (for testing)
   */
  clear(): void {
    this.sessions.clear();
  }
}

/**
 * Periodic purge; the timer does not keep the process alive
 */
export function startSessionSweeper(store: SessionStore, intervalMs: number): () => void {
  const timer = setInterval(() => {
    store.purgeExpired().catch((error: unknown) => {
      console.error('[Sessions] Sweep failed:', error);
    });
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}
