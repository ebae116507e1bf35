/**
 * Request Details Agent — collects and validates the transactional fields
 * required for the confirmed request type
 */

import { z } from 'zod';
import type { AgentId, Session } from '../memory';
import {
  DETAIL_FIELDS,
  isFilled,
  normalizeRequestType,
  requiredFieldsFor,
  type DetailField,
  type DetailFields,
} from './fields';
import {
  calculateExpectedPrice,
  describeField,
  todayISO,
  validateField,
  type ValidationContext,
} from './validators';
import { StageAgent, type StageAgentDeps, type ToolDefinition, type ToolOutput, type TurnContext } from './base';

const FieldName = z.enum(DETAIL_FIELDS);
const FieldValueSchema = z.union([z.string(), z.number()]);

const BulkArgs = z.object({
  fields: z
    .record(FieldName, FieldValueSchema)
    .describe('Every field value found in the user message, keyed by field name'),
  request_type: z.string().optional(),
});

const ValidateSingleArgs = z.object({
  field_name: FieldName,
  field_value: FieldValueSchema,
  request_type: z.string().optional(),
});

const ComputeArgs = z.object({
  quantity: FieldValueSchema,
  price_per_unit: FieldValueSchema,
});

const CommitArgs = z.object({
  field_name: FieldName,
  field_value: FieldValueSchema,
});

const CheckArgs = z.object({
  completed_fields: z.array(z.string()).default([]).describe('Field names the user has provided and confirmed'),
});

const DetailsToolCallSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('extract_and_validate_bulk'), args: BulkArgs }),
  z.object({ name: z.literal('validate_single'), args: ValidateSingleArgs }),
  z.object({ name: z.literal('compute_expected_price'), args: ComputeArgs }),
  z.object({ name: z.literal('commit_field'), args: CommitArgs }),
  z.object({ name: z.literal('check_completion'), args: CheckArgs }),
]);

type DetailsToolCall = z.infer<typeof DetailsToolCallSchema>;

const TOOLS: readonly ToolDefinition[] = [
  {
    name: 'extract_and_validate_bulk',
    description:
      'Validate several fields from one message and save them. All-or-nothing: if any field is invalid, nothing is saved.',
    args: BulkArgs,
  },
  {
    name: 'validate_single',
    description: 'Check one field value without saving it.',
    args: ValidateSingleArgs,
  },
  {
    name: 'compute_expected_price',
    description: 'Multiply quantity by price per unit.',
    args: ComputeArgs,
  },
  {
    name: 'commit_field',
    description: 'Validate and save a single field.',
    args: CommitArgs,
  },
  {
    name: 'check_completion',
    description:
      'After the user confirms the summary, report which required fields are complete. When nothing is pending the conversation moves on to address and industry selection.',
    args: CheckArgs,
  },
];

function formatValue(value: string | number | undefined): string {
  return value === undefined || value === '' ? '(pending)' : String(value);
}

export class RequestDetailsAgent extends StageAgent<typeof DetailsToolCallSchema> {
  readonly id: AgentId = 'request_details';
  protected readonly historyWindow = 20;
  protected readonly callSchema = DetailsToolCallSchema;
  protected readonly toolDefinitions = TOOLS;

  private readonly today: () => string;

  constructor(deps: StageAgentDeps & { today?: () => string }) {
    super(deps);
    this.today = deps.today ?? (() => todayISO());
  }

  protected systemPrompt(session: Session): string {
    const product = session.product;
    const required = requiredFieldsFor(session.request);
    const fieldLines = required
      .map((field) => `- ${field}: ${formatValue(session.fields[field])} (${describeField(field)})`)
      .join('\n');
    const sample = session.request === 'Sample';

    return `You are the request details assistant of a chemical marketplace.
Today is ${this.today()}.

PRODUCT: ${session.productName ?? 'unknown'} (id ${session.productId ?? 'unknown'})
REQUEST TYPE: ${session.request ?? 'unknown'}
Available Stock: ${product?.maxQuantity ?? 'N/A'}
Minimum Order: ${sample ? 'none for samples' : product?.minQuantity ?? 1}

REQUIRED FIELDS:
${fieldLines}

PENDING: ${this.pendingFields(session).join(', ') || 'none'}

STEPS:
1. Ask for the pending fields, a few at a time. Show the allowed options for select fields.
2. When the user gives values, call extract_and_validate_bulk with every value from the message. If it reports errors, explain each one and ask again for all of them.
3. expected_price is quantity × price_per_unit; it is filled in automatically once both are saved.
4. When nothing is pending, show a summary and ask the user to confirm.
5. After the user confirms, call check_completion with the completed field names.

RULES:
- Never save a value the user did not give.
- Dates must be YYYY-MM-DD and after today. Phone numbers need the country code.`;
  }

  protected errorReply(session: Session): string {
    const pending = this.pendingFields(session);
    return pending.length > 0
      ? `I'm having trouble right now. Still needed: ${pending.join(', ')}. Please try again.`
      : "I apologize, but I'm having trouble processing your request. Please try again.";
  }

  protected async executeTool(call: DetailsToolCall, ctx: TurnContext): Promise<ToolOutput> {
    const session = ctx.session;
    switch (call.name) {
      case 'extract_and_validate_bulk':
        return this.extractBulk(call.args.fields, session, call.args.request_type);
      case 'validate_single': {
        const result = validateField(call.args.field_name, call.args.field_value, this.validationContext(session, call.args.request_type));
        return result.valid
          ? { status: 'success', field: call.args.field_name, value: result.value, message: result.message }
          : { status: 'error', field: call.args.field_name, message: result.error };
      }
      case 'compute_expected_price':
        return calculateExpectedPrice(call.args.quantity, call.args.price_per_unit);
      case 'commit_field':
        return this.commitField(call.args.field_name, call.args.field_value, session);
      case 'check_completion':
        return this.checkCompletion(call.args.completed_fields, ctx);
    }
  }

  /**
   * Validate every supplied field; commit only if all pass
   */
  extractBulk(fields: DetailFields, session: Session, requestType?: string): ToolOutput {
    const vctx = this.validationContext(session, requestType);
    const accepted: DetailFields = {};
    const errors: Partial<Record<DetailField, string>> = {};
    let supplied = 0;

    for (const field of DETAIL_FIELDS) {
      const raw = fields[field];
      if (raw === undefined) continue;
      supplied++;
      const result = validateField(field, raw, vctx);
      if (result.valid) accepted[field] = result.value;
      else errors[field] = result.error;
    }

    if (supplied === 0) {
      return { status: 'error', message: 'No fields supplied' };
    }
    if (Object.keys(errors).length > 0) {
      return {
        status: 'error',
        committed: false,
        message: 'No fields were saved. Ask the user to correct the invalid fields, then resend all of them together.',
        errors,
        valid_fields: accepted,
      };
    }

    Object.assign(session.fields, accepted);
    this.refreshExpectedPrice(session);
    return {
      status: 'success',
      committed: true,
      saved: { ...accepted, ...(session.fields.expected_price !== undefined ? { expected_price: session.fields.expected_price } : {}) },
      pending_fields: this.pendingFields(session),
    };
  }

  commitField(field: DetailField, value: string | number, session: Session): ToolOutput {
    const result = validateField(field, value, this.validationContext(session));
    if (!result.valid) {
      return { status: 'error', field, message: result.error };
    }

    session.fields[field] = result.value;
    this.refreshExpectedPrice(session);
    return {
      status: 'success',
      field,
      value: session.fields[field],
      pending_fields: this.pendingFields(session),
    };
  }

  /**
   * A field counts only if the model lists it and the session holds a value
   */
  checkCompletion(completedFields: string[], ctx: TurnContext): ToolOutput {
    const session = ctx.session;
    const listed = new Set(completedFields);
    const required = requiredFieldsFor(session.request);
    const completed = required.filter((field) => listed.has(field) && isFilled(session.fields[field]));
    const pending = required.filter((field) => !completed.includes(field));

    if (pending.length === 0) {
      ctx.handoff = 'address_purpose';
    }

    return {
      all_completed: pending.length === 0,
      completed_count: completed.length,
      total_required: required.length,
      pending_fields: pending,
    };
  }

  pendingFields(session: Session): DetailField[] {
    return requiredFieldsFor(session.request).filter((field) => !isFilled(session.fields[field]));
  }

  private validationContext(session: Session, requestType?: string): ValidationContext {
    return {
      request: session.request ?? normalizeRequestType(requestType),
      limits: {
        minQuantity: session.product?.minQuantity,
        maxQuantity: session.product?.maxQuantity,
      },
      today: this.today(),
    };
  }

  private refreshExpectedPrice(session: Session): void {
    const { quantity, price_per_unit } = session.fields;
    if (!isFilled(quantity) || !isFilled(price_per_unit)) return;

    const result = calculateExpectedPrice(quantity, price_per_unit);
    if (result.status === 'success') {
      session.fields.expected_price = result.expected_price;
    }
  }
}
