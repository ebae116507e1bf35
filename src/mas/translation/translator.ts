/**
 * Translation Manager — inbound and outbound translation around the agents
 *
 * Every call goes through the shared TranslationQueue. Arabic gets the term
 * memory; product fields already in the target language (name_bn: "...")
 * are masked before translation and restored afterwards. A failed
 * translation logs and returns the input unchanged.
 */

import { z } from 'zod';
import { ErrorHandler, TranslationError } from '../errors';
import { TranslationQueue, type TranslationQueueStats } from './queue';
import { TranslationMemory, type TranslationMemoryStats } from './memory';
import type { LanguageCode } from './languages';

export interface TextTranslator {
  translate(text: string, source: LanguageCode, target: LanguageCode): Promise<string>;
}

// [[["translated","source",...], ...], ...]
const GtxResponseSchema = z
  .tuple([z.array(z.tuple([z.string().nullable()]).rest(z.unknown()))])
  .rest(z.unknown());

/**
 * Public translate endpoint (client=gtx), no key required
 */
export class GoogleTranslateClient implements TextTranslator {
  private readonly apiUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: { apiUrl: string; fetchImpl?: typeof fetch }) {
    this.apiUrl = options.apiUrl;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async translate(text: string, source: LanguageCode, target: LanguageCode): Promise<string> {
    const url = new URL(this.apiUrl);
    url.searchParams.set('client', 'gtx');
    url.searchParams.set('sl', source);
    url.searchParams.set('tl', target);
    url.searchParams.set('dt', 't');
    url.searchParams.set('q', text);

    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      throw TranslationError.failed(this.apiUrl, error instanceof Error ? error.message : String(error));
    }
    if (!response.ok) {
      throw TranslationError.failed(this.apiUrl, `HTTP ${response.status}`, response.status);
    }

    const parsed = GtxResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw TranslationError.failed(this.apiUrl, 'unexpected response shape', response.status);
    }
    return parsed.data[0].map(([segment]) => segment ?? '').join('');
  }
}

const LANGUAGE_FIELD = /\b(name|description|specification|brand)_(en|ar|bn)\s*:\s*"([^"]*)"/gi;

/**
 * Replace target-language product fields with [PRESERVED_i] placeholders
 */
export function maskLanguageFields(text: string, target: LanguageCode): { text: string; preserved: string[] } {
  const preserved: string[] = [];
  const masked = text.replace(LANGUAGE_FIELD, (match: string, field: string, lang: string, value: string) => {
    if (lang.toLowerCase() !== target) return match;
    preserved.push(`${field}_${lang}: "${value}"`);
    return `[PRESERVED_${preserved.length - 1}]`;
  });
  return { text: masked, preserved };
}

/**
 * Put preserved fields back; any placeholder the translator dropped is appended
 */
export function restoreLanguageFields(text: string, preserved: string[]): string {
  let result = text;
  preserved.forEach((field, i) => {
    const placeholder = `[PRESERVED_${i}]`;
    result = result.includes(placeholder) ? result.split(placeholder).join(field) : `${result}\n${field}`;
  });
  return result;
}

export interface TranslationManagerDeps {
  translator: TextTranslator;
  queue?: TranslationQueue;
  memory?: TranslationMemory;
}

export class TranslationManager {
  readonly queue: TranslationQueue;
  readonly memory: TranslationMemory;
  private readonly translator: TextTranslator;

  constructor(deps: TranslationManagerDeps) {
    this.translator = deps.translator;
    this.queue = deps.queue ?? new TranslationQueue();
    this.memory = deps.memory ?? new TranslationMemory();
  }

  async toEnglish(text: string, source: LanguageCode, sessionId: string = ''): Promise<string> {
    if (source === 'en' || !text.trim()) return text;

    try {
      let prepared = text;
      if (source === 'ar') {
        const reversed = this.memory.reverse(text);
        prepared = reversed.text;
        if (Object.keys(reversed.applied).length > 0) {
          console.log('[Translation] Reverse memory applied:', reversed.applied);
        }
      }

      const translated = await this.queue.enqueue(() => this.translator.translate(prepared, source, 'en'));
      console.log(`[Translation] ${source.toUpperCase()} → EN${sessionId ? ` (${sessionId})` : ''}: "${translated.slice(0, 80)}"`);
      return translated;
    } catch (error) {
      ErrorHandler.log(error, { sessionId, direction: 'to_english' });
      return text;
    }
  }

  async fromEnglish(text: string, target: LanguageCode, sessionId: string = ''): Promise<string> {
    if (target === 'en' || !text.trim()) return text;

    try {
      const masked = maskLanguageFields(text, target);
      if (masked.preserved.length > 0) {
        console.log(`[Translation] Preserving ${masked.preserved.length} ${target.toUpperCase()} field(s)`);
      }

      let translated = await this.queue.enqueue(() => this.translator.translate(masked.text, 'en', target));
      if (target === 'ar') {
        const corrected = this.memory.apply(translated);
        translated = corrected.text;
        if (Object.keys(corrected.applied).length > 0) {
          console.log('[Translation] Memory corrections:', corrected.applied);
        }
      }

      const result = restoreLanguageFields(translated, masked.preserved);
      console.log(`[Translation] EN → ${target.toUpperCase()}${sessionId ? ` (${sessionId})` : ''}: "${result.slice(0, 80)}"`);
      return result;
    } catch (error) {
      ErrorHandler.log(error, { sessionId, direction: 'from_english' });
      return text;
    }
  }

  stats(): { queue: TranslationQueueStats; memory: TranslationMemoryStats } {
    return { queue: this.queue.stats(), memory: this.memory.stats() };
  }
}
