/**
 * API Server — HTTP interface for the ordering chat
 *
 * Endpoints:
 * - POST /api/chat — one chat turn {sessionId, userAuth, message, language}
 * - GET /api/chat/translation-status — languages, term memory, queue stats
 * - GET /session/:id/trace — session trace (?format=json)
 * - GET /session/:id/summary — session state summary
 * - GET /health — Health check
 */

// Load environment variables first
import 'dotenv/config';

import type http from 'node:http';
import { z } from 'zod';
import { loadConfig, type AppConfig } from '../mas/config';
import { ErrorCode, ErrorHandler, PipelineError, ValidationError } from '../mas/errors';
import { startSessionSweeper } from '../mas/memory';
import { createChatRuntime, type ChatRuntime } from '../mas/runtime';
import { LANGUAGE_NAMES, SUPPORTED_LANGUAGES } from '../mas/translation/languages';
import { createNodeServer } from './http-adapter';

type Handler = (req: Request, params: string[]) => Promise<Response>;

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const ChatRequestSchema = z.object({
  sessionId: z.string().trim().min(1),
  userAuth: z.string().nullish(),
  message: z.string(),
  language: z.string().default('English'),
});

export interface APIServerOptions {
  corsOrigins?: string[];
}

export class APIServer {
  private runtime: ChatRuntime;
  private routes: Route[] = [];
  private corsOrigins: string[];

  constructor(runtime: ChatRuntime, options: APIServerOptions = {}) {
    this.runtime = runtime;
    this.corsOrigins = options.corsOrigins ?? ['*'];
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.routes.push({
      method: 'GET',
      pattern: /^\/$/,
      handler: async () => this.json({ service: 'chem-order-agents', status: 'running', chat: 'POST /api/chat' }),
    });

    // Health check
    this.routes.push({
      method: 'GET',
      pattern: /^\/health$/,
      handler: async () => this.json({ status: 'healthy', timestamp: new Date().toISOString() }),
    });

    this.routes.push({
      method: 'POST',
      pattern: /^\/api\/chat\/?$/,
      handler: async (req) => {
        let raw: unknown;
        try {
          raw = await req.json();
        } catch {
          return this.json({ success: false, error: 'Request body must be JSON' }, 400);
        }

        const parsed = ChatRequestSchema.safeParse(raw);
        if (!parsed.success) {
          return this.json(ErrorHandler.toAPIResponse(ValidationError.fromZod('chat request', parsed.error)), 400);
        }

        const { sessionId, userAuth, message, language } = parsed.data;
        const reply = await this.runtime.route(message, sessionId, userAuth ?? undefined, language);
        return this.json({ reply, sessionId });
      },
    });

    this.routes.push({
      method: 'GET',
      pattern: /^\/api\/chat\/translation-status$/,
      handler: async () =>
        this.json({
          supportedLanguages: SUPPORTED_LANGUAGES,
          languageMapping: LANGUAGE_NAMES,
          translation: this.runtime.translationStats(),
        }),
    });

    this.routes.push({
      method: 'GET',
      pattern: /^\/session\/([^/]+)\/trace$/,
      handler: async (req, [sessionId]) => {
        const format = new URL(req.url).searchParams.get('format') || 'text';
        if (format === 'json') {
          const trace: unknown = JSON.parse(this.runtime.getTraceJson(sessionId));
          return this.json({ success: true, trace });
        }
        return new Response(this.runtime.getTrace(sessionId), {
          headers: { 'Content-Type': 'text/plain' },
        });
      },
    });

    this.routes.push({
      method: 'GET',
      pattern: /^\/session\/([^/]+)\/summary$/,
      handler: async (_req, [sessionId]) => {
        const summary = await this.runtime.getSessionSummary(sessionId);
        return this.json({ success: true, summary });
      },
    });
  }

  /**
   * Handle incoming request
   */
  async handle(req: Request): Promise<Response> {
    const url = new URL(req.url);
    const cors = this.corsHeaders(req.headers.get('origin'));

    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: cors });
    }

    let response: Response | undefined;
    for (const route of this.routes) {
      const match = req.method === route.method ? route.pattern.exec(url.pathname) : null;
      if (!match) continue;

      try {
        response = await route.handler(req, match.slice(1).map(decodeURIComponent));
      } catch (error) {
        ErrorHandler.log(error, { endpoint: `${req.method} ${url.pathname}` });
        const status = error instanceof PipelineError && error.code === ErrorCode.SESSION_NOT_FOUND ? 404 : 500;
        response = this.json(ErrorHandler.toAPIResponse(error), status);
      }
      break;
    }

    response ??= this.json({ success: false, error: 'Not found' }, 404);
    for (const [key, value] of Object.entries(cors)) {
      response.headers.set(key, value);
    }
    return response;
  }

  private corsHeaders(origin: string | null): Record<string, string> {
    const headers: Record<string, string> = {
      'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
      'Access-Control-Allow-Headers': 'Content-Type, Authorization',
    };
    if (this.corsOrigins.includes('*')) {
      headers['Access-Control-Allow-Origin'] = '*';
    } else if (origin && this.corsOrigins.includes(origin)) {
      headers['Access-Control-Allow-Origin'] = origin;
      headers['Access-Control-Allow-Credentials'] = 'true';
      headers['Vary'] = 'Origin';
    }
    return headers;
  }

  private json(data: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(data, null, 2), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
  }
}

/**
 * Create and start the chat server
 */
export function startServer(config: AppConfig = loadConfig(), runtime: ChatRuntime = createChatRuntime(config)): http.Server {
  const api = new APIServer(runtime, { corsOrigins: config.corsOrigins });
  const stopSweeper = startSessionSweeper(runtime.store, config.sessions.sweepIntervalMs);

  console.log(`\n${'='.repeat(60)}`);
  console.log('Chat server starting...');
  console.log(`Vendor API: ${config.vendor.baseUrl}`);
  console.log(`Models: ${config.llm.model} / ${config.llm.finalModel}`);
  console.log(`Port: ${config.port}`);
  console.log(`${'='.repeat(60)}\n`);

  const server = createNodeServer((req) => api.handle(req), config.port, 'API');
  server.on('close', stopSweeper);
  server.listen(config.port, () => {
    console.log(`[API] Server running on http://localhost:${config.port}`);
  });
  return server;
}

// CLI entry point (ESM compatible)
const isMainModule = import.meta.url === `file://${process.argv[1]}` ||
                     process.argv[1]?.endsWith('server.ts') ||
                     process.argv[1]?.endsWith('server.js');

if (isMainModule) {
  startServer();
}
