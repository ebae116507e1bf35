/**
 * Chat Runtime — agent manager for the ordering workflow
 *
 * One call per chat turn:
 * - sign-in gate and inbound translation
 * - load or create the session
 * - dispatch to the stage that owns it
 * - apply staged updates, then the hand-off if the state machine accepts it
 * - persist, translate outbound
 */

import type { AppConfig } from './config';
import { ErrorHandler, SessionError } from './errors';
import { createLLMClient, type LLMClient } from './llm/client';
import { MemorySessionStore, createSession, type AgentId, type Session, type SessionStore } from './memory';
import {
  COMPLETED_MESSAGE,
  UNKNOWN_AGENT_MESSAGE,
  expandSession,
  isAgentId,
  pendingRequiredFields,
  transition,
} from './orchestrator';
import { OrderPlacementService } from './orders/placement';
import { VendorClient } from './tools/vendor-client';
import { Tracer, tracer as defaultTracer } from './tracing';
import { ERROR_MESSAGES, SIGN_IN_MESSAGES, normalizeLanguage, type LanguageCode } from './translation/languages';
import { TranslationQueue } from './translation/queue';
import { GoogleTranslateClient, TranslationManager } from './translation/translator';
import type { AgentTurn } from './agents/base';
import { ProductRequestAgent } from './agents/product-request';
import { RequestDetailsAgent } from './agents/request-details';
import { AddressPurposeAgent } from './agents/address-purpose';

export interface StageHandler {
  readonly id: AgentId;
  handle(userInput: string, session: Session): Promise<AgentTurn>;
}

type ActiveStage = Exclude<AgentId, 'completed'>;

export interface ChatRuntimeDeps {
  llm: LLMClient;
  vendor: VendorClient;
  /** Omitted: every language passes through untranslated */
  translation?: TranslationManager;
  store?: SessionStore;
  tracer?: Tracer;
  model?: string;
  finalModel?: string;
  today?: () => string;
  now?: () => Date;
}

export interface SessionSummary {
  sessionId: string;
  agent: AgentId;
  language: LanguageCode;
  request: string | null;
  product: string | null;
  fields: Session['fields'];
  pendingFields: string[];
  address: string | null;
  industry: string | null;
  order: Session['order'];
  turns: number;
  createdAt: string;
  lastUpdated: string;
}

export class ChatRuntime {
  readonly store: SessionStore;
  readonly tracer: Tracer;
  private readonly translation?: TranslationManager;
  private readonly stages: Record<ActiveStage, StageHandler>;
  private readonly now: () => Date;

  constructor(deps: ChatRuntimeDeps) {
    this.store = deps.store ?? new MemorySessionStore();
    this.tracer = deps.tracer ?? defaultTracer;
    this.translation = deps.translation;
    this.now = deps.now ?? (() => new Date());

    const base = { llm: deps.llm, tracer: this.tracer, model: deps.model };
    this.stages = {
      product_request: new ProductRequestAgent({ ...base, vendor: deps.vendor }),
      request_details: new RequestDetailsAgent({ ...base, today: deps.today }),
      address_purpose: new AddressPurposeAgent({
        ...base,
        model: deps.finalModel ?? deps.model,
        vendor: deps.vendor,
        placement: new OrderPlacementService(deps.vendor),
      }),
    };
  }

  /**
   * Handle one chat turn; returns the reply in the user's language
   */
  async route(userInput: string, sessionId: string, userAuth: string | undefined, language?: string): Promise<string> {
    const lang = normalizeLanguage(language);
    if (!userAuth?.trim()) {
      console.log(`[Runtime] ${sessionId}: no userAuth, asking to sign in`);
      return SIGN_IN_MESSAGES[lang];
    }

    const englishInput = this.translation ? await this.translation.toEnglish(userInput, lang, sessionId) : userInput;

    const session = (await this.store.load(sessionId)) ?? this.newSession(sessionId, userAuth, lang);
    session.userAuth = userAuth;
    session.language = lang;
    session.transcript.push({ role: 'user', content: userInput, language: lang, timestamp: this.now().toISOString() });
    this.tracer.traceMessage(sessionId, 'user', englishInput);

    let reply: string;
    try {
      const answer = await this.dispatch(session, englishInput);
      this.tracer.traceMessage(sessionId, 'agent', answer, session.agent);
      reply = this.translation ? await this.translation.fromEnglish(answer, lang, sessionId) : answer;
    } catch (error) {
      ErrorHandler.log(error, { sessionId, agentId: session.agent });
      this.tracer.traceError(sessionId, error instanceof Error ? error.message : String(error), { agent: session.agent });
      reply = ERROR_MESSAGES[lang];
    }

    session.transcript.push({ role: 'assistant', content: reply, language: lang, timestamp: this.now().toISOString() });
    session.lastUpdated = this.now().toISOString();
    await this.store.save(session);
    return reply;
  }

  private newSession(sessionId: string, userAuth: string, language: LanguageCode): Session {
    console.log(`[Runtime] New session ${sessionId} (${language})`);
    return createSession(sessionId, userAuth, language, this.now());
  }

  private async dispatch(session: Session, input: string): Promise<string> {
    // Persisted documents may carry a stage this build does not know
    const agent: string = session.agent;
    if (!isAgentId(agent)) {
      console.warn(`[Runtime] Unknown agent state "${agent}" in ${session.sessionId}, restarting`);
      const fresh = createSession(session.sessionId, session.userAuth, session.language, this.now());
      Object.assign(session, fresh, { transcript: session.transcript });
      return UNKNOWN_AGENT_MESSAGE;
    }

    switch (agent) {
      case 'product_request':
      case 'request_details':
      case 'address_purpose': {
        const turn = await this.stages[agent].handle(input, session);
        this.applyTurn(session, turn);
        return turn.reply;
      }

      case 'completed':
        session.history.push({ user: input, agent: COMPLETED_MESSAGE });
        return COMPLETED_MESSAGE;

    }
  }

  private applyTurn(session: Session, turn: AgentTurn): void {
    if (turn.updates) {
      Object.assign(session, turn.updates);
    }
    if (!turn.handoff) return;

    const result = transition(session, turn.handoff);
    if (!result.ok) {
      ErrorHandler.log(SessionError.invalidTransition(session.sessionId, result.from, result.to, result.reason));
      return;
    }

    session.agent = result.to;
    expandSession(session, result.to);
    this.tracer.traceHandoff(session.sessionId, result.from, result.to, 'stage complete');
    console.log(`[Runtime] ${session.sessionId}: ${result.from} → ${result.to}`);
  }

  getTrace(sessionId: string): string {
    return this.tracer.formatTrace(sessionId);
  }

  getTraceJson(sessionId: string): string {
    return this.tracer.exportTrace(sessionId);
  }

  async getSessionSummary(sessionId: string): Promise<SessionSummary> {
    const session = await this.store.load(sessionId);
    if (!session) {
      throw SessionError.notFound(sessionId);
    }

    return {
      sessionId: session.sessionId,
      agent: session.agent,
      language: session.language,
      request: session.request,
      product: session.productName,
      fields: session.fields,
      pendingFields: session.request ? pendingRequiredFields(session) : [],
      address: session.address?.addressLine ?? null,
      industry: session.industryName,
      order: session.order,
      turns: session.history.length,
      createdAt: session.createdAt,
      lastUpdated: session.lastUpdated,
    };
  }

  translationStats(): ReturnType<TranslationManager['stats']> | null {
    return this.translation ? this.translation.stats() : null;
  }
}

/**
 * Wire the runtime from environment configuration
 */
export function createChatRuntime(config: AppConfig): ChatRuntime {
  const vendor = new VendorClient({ baseUrl: config.vendor.baseUrl, timeoutMs: config.vendor.timeoutMs });
  const translation = new TranslationManager({
    translator: new GoogleTranslateClient({ apiUrl: config.translation.apiUrl }),
    queue: new TranslationQueue({ maxPerWindow: config.translation.maxPerMinute, windowMs: 60_000 }),
  });

  return new ChatRuntime({
    llm: createLLMClient(config.llm),
    vendor,
    translation,
    store: new MemorySessionStore(config.sessions.ttlMs),
    model: config.llm.model,
    finalModel: config.llm.finalModel,
  });
}
