/**
 * Test doubles shared by the suites: scripted LLM, in-process vendor, fake
 * translator, virtual clock
 */

import type { ChatOptions, LLMClient, LLMMessage, LLMResponse, ToolSchema } from '../src/mas/llm/client';
import type { LanguageCode } from '../src/mas/translation/languages';
import type { TextTranslator } from '../src/mas/translation/translator';
import type { Clock } from '../src/mas/resilience';
import { MockVendorAPI, mockFetch } from '../src/api/mock-vendor';
import { VendorClient } from '../src/mas/tools/vendor-client';
import { createSession, type Session } from '../src/mas/memory';
import type { Product } from '../src/mas/tools/types';

export const TEST_TOKEN = 'test-secret';
export const TODAY = '2030-01-15';

export const CAUSTIC_FLAKES_ID = '6650a1b2c3d4e5f600000001';
export const DHANMONDI_ADDRESS_ID = '6650b1b2c3d4e5f600000011';
export const INDUSTRIAL_AREA_ADDRESS_ID = '6650b1b2c3d4e5f600000012';
export const TEXTILE_ID = '6650c1b2c3d4e5f600000021';

type Step = LLMResponse | ((messages: LLMMessage[]) => LLMResponse);

export interface RecordedCall {
  messages: LLMMessage[];
  tools?: ToolSchema[];
  options?: ChatOptions;
}

export interface ScriptedLLM extends LLMClient {
  calls: RecordedCall[];
  remaining(): number;
}

/**
 * Replays responses in order; throws when the script runs out
 */
export function scriptedLLM(steps: Step[]): ScriptedLLM {
  const queue = [...steps];
  const calls: RecordedCall[] = [];
  return {
    calls,
    remaining: () => queue.length,
    async chat(messages, tools, options) {
      calls.push({ messages: [...messages], tools, options });
      const step = queue.shift();
      if (!step) {
        throw new Error('Scripted LLM has no response left');
      }
      return typeof step === 'function' ? step(messages) : step;
    },
  };
}

let callCounter = 0;

export function toolCall(name: string, args: Record<string, unknown> | string): LLMResponse {
  callCounter++;
  return {
    content: null,
    tool_calls: [
      {
        id: `call_${callCounter}`,
        type: 'function',
        function: { name, arguments: typeof args === 'string' ? args : JSON.stringify(args) },
      },
    ],
  };
}

export function say(content: string): LLMResponse {
  return { content };
}

/** Content of the tool message answering the most recent tool call */
export function lastToolOutput(messages: LLMMessage[]): Record<string, unknown> {
  const tool = [...messages].reverse().find((m) => m.role === 'tool');
  const parsed: unknown = JSON.parse(tool?.content ?? '{}');
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed) ? { ...parsed } : {};
}

export function vendorFixture(): { api: MockVendorAPI; vendor: VendorClient } {
  const api = new MockVendorAPI();
  const vendor = new VendorClient({ baseUrl: 'http://vendor.test', fetchImpl: mockFetch(api), retryDelayMs: 0 });
  return { api, vendor };
}

export function causticFlakes(): Product {
  return {
    _id: CAUSTIC_FLAKES_ID,
    name_en: 'Caustic Soda Flakes 99%',
    brand_en: 'Meghna Chem',
    unit: 'KG',
    minQuantity: 100,
    maxQuantity: 5000,
  };
}

export function sessionAt(agent: Session['agent'], overrides: Partial<Session> = {}): Session {
  const session = createSession('session-1', TEST_TOKEN, 'en', new Date('2030-01-15T09:00:00Z'));
  return { ...session, agent, ...overrides };
}

/**
 * Session ready for Agent 3: product chosen, every Order field filled
 */
export function readyForAddress(overrides: Partial<Session> = {}): Session {
  return sessionAt('address_purpose', {
    productId: CAUSTIC_FLAKES_ID,
    productName: 'Caustic Soda Flakes 99%',
    product: causticFlakes(),
    request: 'Order',
    fields: {
      unit: 'KG',
      quantity: 500,
      price_per_unit: 120,
      expected_price: 60000,
      phone: '+12015550123',
      incoterm: 'Ex Factory',
      mode_of_payment: 'LC',
      packaging_pref: 'Drum',
      delivery_date: '2030-03-01',
    },
    ...overrides,
  });
}

export class FakeTranslator implements TextTranslator {
  readonly calls: { text: string; source: LanguageCode; target: LanguageCode }[] = [];
  private responses: Map<string, string>;
  failWith?: Error;

  constructor(responses: Record<string, string> = {}) {
    this.responses = new Map(Object.entries(responses));
  }

  async translate(text: string, source: LanguageCode, target: LanguageCode): Promise<string> {
    this.calls.push({ text, source, target });
    if (this.failWith) throw this.failWith;
    return this.responses.get(text) ?? `[${target}] ${text}`;
  }
}

export interface VirtualClock extends Clock {
  advance(ms: number): void;
}

export function virtualClock(start: number = 0): VirtualClock {
  let now = start;
  return {
    now: () => now,
    sleep: async (ms) => {
      now += ms;
    },
    advance: (ms) => {
      now += ms;
    },
  };
}
