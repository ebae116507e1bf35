/**
 * Stage Agent — LLM tool loop shared by the three workflow stages
 *
 * Connects: stage prompt + bounded history + typed tools + LLM → reply
 *
 * Each stage declares its tool calls as a zod discriminated union on `name`,
 * so a dispatched call arrives with validated, typed arguments.
 */

import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { LLMClient, LLMMessage, ToolCall, ToolSchema } from '../llm/client';
import type { AgentId, Session } from '../memory';
import type { Tracer } from '../tracing';
import { ErrorHandler } from '../errors';

export const HANDOFF_MESSAGE = "I'll hand you over to the next specialist.";
export const FALLBACK_REPLY = 'I apologize, but I was unable to process your request.';

export type ToolOutput = Record<string, unknown>;

/** Session fields a stage asks the manager to apply after the turn */
export type SessionUpdates = Partial<Pick<Session, 'productId' | 'productName' | 'product' | 'request'>>;

export interface TurnContext {
  session: Session;
  userInput: string;
  handoff?: AgentId;
  updates?: SessionUpdates;
}

export interface AgentTurn {
  reply: string;
  handoff?: AgentId;
  updates?: SessionUpdates;
}

export interface StageAgentDeps {
  llm: LLMClient;
  tracer: Tracer;
  model?: string;
  maxToolRounds?: number;
}

export interface ToolDefinition {
  name: string;
  description: string;
  args: z.ZodTypeAny;
}

export function toToolSchema(def: ToolDefinition): ToolSchema {
  return {
    type: 'function',
    function: {
      name: def.name,
      description: def.description,
      parameters: zodToJsonSchema(def.args, { target: 'openApi3', $refStrategy: 'none' }),
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Malformed or non-object argument JSON degrades to {}
 */
export function parseArguments(raw: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(raw || '{}');
    return isRecord(value) ? value : {};
  } catch {
    console.warn(`[Agent] Malformed tool arguments, using {}: ${raw.slice(0, 80)}`);
    return {};
  }
}

export function isFailure(output: ToolOutput): boolean {
  return output.status === 'error' || output.error === true;
}

export abstract class StageAgent<S extends z.ZodTypeAny> {
  abstract readonly id: AgentId;
  protected abstract readonly historyWindow: number;
  protected abstract readonly callSchema: S;
  protected abstract readonly toolDefinitions: readonly ToolDefinition[];

  protected readonly llm: LLMClient;
  protected readonly tracer: Tracer;
  protected readonly model?: string;
  private readonly maxToolRounds: number;

  constructor(deps: StageAgentDeps) {
    this.llm = deps.llm;
    this.tracer = deps.tracer;
    this.model = deps.model;
    this.maxToolRounds = deps.maxToolRounds ?? 5;
  }

  protected abstract systemPrompt(session: Session): string;

  protected abstract executeTool(call: z.output<S>, ctx: TurnContext): Promise<ToolOutput>;

  /** Stage-specific system hints placed just before the user message */
  protected stageHints(_session: Session): string[] {
    return [];
  }

  /** Runs before the model; a returned string ends the turn with that reply */
  protected async beforeModel(_ctx: TurnContext): Promise<string | undefined> {
    return undefined;
  }

  protected errorReply(_session: Session): string {
    return "I apologize, but I'm having trouble processing your request. Please try again.";
  }

  /**
   * Handle one user turn for this stage
   */
  async handle(userInput: string, session: Session): Promise<AgentTurn> {
    if (session.agent !== this.id) {
      return { reply: HANDOFF_MESSAGE };
    }

    const ctx: TurnContext = { session, userInput };
    let reply: string;
    try {
      reply = (await this.beforeModel(ctx)) ?? (await this.runToolLoop(ctx));
    } catch (error) {
      ErrorHandler.log(error, { agentId: this.id, sessionId: session.sessionId });
      this.tracer.traceError(session.sessionId, error instanceof Error ? error.message : String(error), { agent: this.id });
      reply = this.errorReply(session);
    }

    session.history.push({ user: userInput, agent: reply });
    return { reply, handoff: ctx.handoff, updates: ctx.updates };
  }

  private get toolSchemas(): ToolSchema[] {
    return this.toolDefinitions.map(toToolSchema);
  }

  private async runToolLoop(ctx: TurnContext): Promise<string> {
    const messages = this.buildMessages(ctx.session, ctx.userInput);
    const tools = this.toolSchemas;

    for (let round = 0; round < this.maxToolRounds; round++) {
      const response = await this.llm.chat(messages, tools, { model: this.model });
      const calls = response.tool_calls ?? [];
      if (calls.length === 0) {
        return response.content?.trim() || FALLBACK_REPLY;
      }

      messages.push({ role: 'assistant', content: response.content, tool_calls: calls });
      for (const call of calls) {
        const output = await this.dispatch(call, ctx);
        messages.push({ role: 'tool', tool_call_id: call.id, content: JSON.stringify(output) });
      }
    }

    // Out of tool rounds: ask for a plain answer
    const final = await this.llm.chat(messages, undefined, { model: this.model });
    return final.content?.trim() || FALLBACK_REPLY;
  }

  private async dispatch(call: ToolCall, ctx: TurnContext): Promise<ToolOutput> {
    const name = call.function.name;
    const args = parseArguments(call.function.arguments);
    const sessionId = ctx.session.sessionId;

    if (!this.toolDefinitions.some((def) => def.name === name)) {
      const message = `Unknown tool: ${name}`;
      this.tracer.traceToolCall(sessionId, this.id, name, args, false, message);
      return { status: 'error', message };
    }

    const parsed = this.callSchema.safeParse({ name, args });
    if (!parsed.success) {
      const message = parsed.error.issues
        .map((issue: z.ZodIssue) => `${issue.path.filter((p: string | number) => p !== 'args').join('.') || 'arguments'}: ${issue.message}`)
        .join('; ');
      this.tracer.traceToolCall(sessionId, this.id, name, args, false, message);
      return { status: 'error', message: `Invalid arguments for ${name}. ${message}` };
    }

    const output = await this.executeTool(parsed.data, ctx);
    const failed = isFailure(output);
    this.tracer.traceToolCall(
      sessionId,
      this.id,
      name,
      args,
      !failed,
      failed ? String(output.message ?? output.error) : undefined
    );
    return output;
  }

  private buildMessages(session: Session, userInput: string): LLMMessage[] {
    const messages: LLMMessage[] = [{ role: 'system', content: this.systemPrompt(session) }];

    for (const turn of session.history.slice(-this.historyWindow)) {
      messages.push({ role: 'user', content: turn.user });
      messages.push({ role: 'assistant', content: turn.agent });
    }

    for (const hint of this.stageHints(session)) {
      messages.push({ role: 'system', content: hint });
    }

    messages.push({ role: 'user', content: userInput });
    return messages;
  }
}
