/**
 * Address & Purpose Agent — picks the delivery address and the industry the
 * product is for, confirms the summary, then places the order
 */

import { z } from 'zod';
import type { VendorClient } from '../tools/vendor-client';
import type { Address, Industry } from '../tools/types';
import type { AgentId, Session } from '../memory';
import type { OrderPlacementService } from '../orders/placement';
import { ORDER_LOCKED_MESSAGE, addressPurposePhase } from '../orchestrator';
import { StageAgent, type StageAgentDeps, type ToolDefinition, type ToolOutput, type TurnContext } from './base';

export const DATA_UNAVAILABLE_MESSAGE =
  "I apologize, but I'm unable to fetch the required data (industries and addresses) at the moment. Please try again later or contact support.";

const NoArgs = z.object({});

const SelectIndustryArgs = z.object({
  industry_id: z.string().min(1).describe('_id of the industry from list_industries'),
  industry_name: z.string().optional(),
});

const SelectAddressArgs = z.object({
  address: z
    .union([z.string(), z.number(), z.record(z.unknown())])
    .describe('List number (1-based), address _id, part of the address line, or the address object'),
});

const ShowConfirmationArgs = z.object({
  ready: z.boolean().default(true),
});

const PlaceOrderArgs = z.object({
  user_confirmed: z.boolean().describe('True only if the user explicitly confirmed the order summary'),
});

const AddressToolCallSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('list_industries'), args: NoArgs }),
  z.object({ name: z.literal('list_addresses'), args: NoArgs }),
  z.object({ name: z.literal('select_industry'), args: SelectIndustryArgs }),
  z.object({ name: z.literal('select_address'), args: SelectAddressArgs }),
  z.object({ name: z.literal('show_final_confirmation'), args: ShowConfirmationArgs }),
  z.object({ name: z.literal('place_order'), args: PlaceOrderArgs }),
]);

type AddressToolCall = z.infer<typeof AddressToolCallSchema>;

const TOOLS: readonly ToolDefinition[] = [
  { name: 'list_industries', description: 'Numbered list of industries the product can be used in.', args: NoArgs },
  { name: 'list_addresses', description: "Numbered list of the user's saved delivery addresses.", args: NoArgs },
  { name: 'select_industry', description: 'Record the industry the user picked.', args: SelectIndustryArgs },
  { name: 'select_address', description: 'Record the delivery address the user picked.', args: SelectAddressArgs },
  {
    name: 'show_final_confirmation',
    description: 'Build the order summary once industry and address are selected.',
    args: ShowConfirmationArgs,
  },
  {
    name: 'place_order',
    description: 'Submit the order. Only after the user explicitly confirmed the summary.',
    args: PlaceOrderArgs,
  },
];

/**
 * Object with a cached _id, list number, _id or address-line substring; then
 * a bare number in what the user typed. Digit strings never fall through to
 * substring matching.
 */
export function resolveAddress(
  input: string | number | Record<string, unknown>,
  addresses: Address[],
  userInput: string = ''
): Address | undefined {
  const byIndex = (n: number): Address | undefined =>
    Number.isInteger(n) && n >= 1 && n <= addresses.length ? addresses[n - 1] : undefined;

  let found: Address | undefined;
  if (typeof input === 'number') {
    found = byIndex(input);
  } else if (typeof input === 'string') {
    const value = input.trim();
    if (/^\d+$/.test(value)) {
      found = byIndex(Number(value));
    } else if (value) {
      const needle = value.toLowerCase();
      found =
        addresses.find((a) => a._id === value) ??
        addresses.find((a) => (a.addressLine ?? '').toLowerCase().includes(needle));
    }
  } else {
    const id = input._id;
    found = typeof id === 'string' ? addresses.find((a) => a._id === id) : undefined;
  }
  if (found) return found;

  for (const token of userInput.split(/\s+/)) {
    if (!/^\d+$/.test(token)) continue;
    const picked = byIndex(Number(token));
    if (picked) return picked;
  }
  return undefined;
}

export function formatIndustries(industries: Industry[]): Record<string, unknown>[] {
  return industries.map((industry, i) => ({ number: i + 1, id: industry._id, name: industry.name_en }));
}

export function formatAddresses(addresses: Address[]): Record<string, unknown>[] {
  return addresses.map((a, i) => ({
    number: i + 1,
    id: a._id,
    addressLine: a.addressLine,
    name: a.name,
    email: a.email,
    phoneNumber: a.phoneNumber,
    countryCode: a.countryCode,
    city: a.city,
    state: a.state,
    country: a.country,
    latitude: a.latitude,
    longitude: a.longitude,
  }));
}

export function buildOrderSummary(session: Session): Record<string, unknown> {
  const { fields, address, product } = session;
  return {
    product: {
      name: session.productName,
      id: session.productId,
      brand: product?.brand_en ?? 'N/A',
    },
    request_type: session.request,
    quantity_details: {
      quantity: fields.quantity,
      unit: fields.unit,
      price_per_unit: fields.price_per_unit,
      total_price: fields.expected_price,
    },
    delivery: {
      address: address?.addressLine,
      contact: address?.name,
      delivery_date: fields.delivery_date,
      incoterm: fields.incoterm,
    },
    payment: {
      method: fields.mode_of_payment,
      contact_phone: fields.phone,
    },
    packaging: fields.packaging_pref,
    industry_use: session.industryName,
    message: 'Please review the summary and confirm to place the order.',
  };
}

export class AddressPurposeAgent extends StageAgent<typeof AddressToolCallSchema> {
  readonly id: AgentId = 'address_purpose';
  protected readonly historyWindow = 18;
  protected readonly callSchema = AddressToolCallSchema;
  protected readonly toolDefinitions = TOOLS;

  private readonly vendor: VendorClient;
  private readonly placement: OrderPlacementService;

  constructor(deps: StageAgentDeps & { vendor: VendorClient; placement: OrderPlacementService }) {
    super(deps);
    this.vendor = deps.vendor;
    this.placement = deps.placement;
  }

  /**
   * Fetch addresses and industries once per session
   */
  protected async beforeModel(ctx: TurnContext): Promise<string | undefined> {
    const session = ctx.session;
    if (session.cachedDataFetched) return undefined;

    const [addresses, industries] = await Promise.all([
      this.vendor.fetchAddresses(session.userAuth),
      this.vendor.fetchIndustries(),
    ]);
    session.cachedAddresses = addresses.success ? addresses.data : [];
    session.cachedIndustries = industries.success ? industries.data : [];

    if (session.cachedAddresses.length === 0 && session.cachedIndustries.length === 0) {
      return DATA_UNAVAILABLE_MESSAGE;
    }
    session.cachedDataFetched = true;
    console.log(
      `[Agent:address_purpose] Loaded ${session.cachedAddresses.length} address(es), ${session.cachedIndustries.length} industries`
    );
    return undefined;
  }

  protected stageHints(session: Session): string[] {
    const phase = addressPurposePhase(session);
    switch (phase) {
      case 'data_fetched':
        return session.address
          ? ['SYSTEM: Address is selected but industry is not. Call list_industries and show the numbered list.']
          : ['SYSTEM: Industry not selected yet. Call list_industries and show the numbered list, then ask which industry the product is for.'];
      case 'industry_selected':
        return ['SYSTEM: Industry is selected. Call list_addresses and show the numbered list, then ask for the delivery address.'];
      case 'address_selected':
        return ['SYSTEM: Industry and address are selected. Call show_final_confirmation and present the summary.'];
      case 'confirmation_shown':
        return ['SYSTEM: The summary has been shown. If the user confirms, call place_order with user_confirmed true.'];
      case 'order_failed':
        return [`SYSTEM: The last order attempt failed: ${session.order?.message ?? 'unknown error'}. Explain and offer to retry.`];
      case 'idle':
      case 'order_placed':
        return [];
    }
  }

  protected systemPrompt(session: Session): string {
    const f = session.fields;
    return `You are the final-step assistant of a chemical marketplace order.
The product and request details are already collected:
- Product: ${session.productName ?? 'unknown'} (${session.request ?? 'Order'})
- Quantity: ${f.quantity ?? ''} ${f.unit ?? ''}, price per unit ${f.price_per_unit ?? ''}, total ${f.expected_price ?? ''}

Your job:
1. Ask which industry the product will be used in (list_industries, then select_industry).
2. Ask for the delivery address (list_addresses, then select_address).
3. Show the order summary (show_final_confirmation) and ask the user to confirm.
4. When the user confirms, call place_order with user_confirmed true and report the result exactly.

CURRENT SELECTION:
- Industry: ${session.industryName ?? 'not selected'}
- Address: ${session.address?.addressLine ?? 'not selected'}

RULES:
- Only offer industries and addresses returned by the tools. Never make one up.
- Show lists with their numbers so the user can answer with a number.
- Never call place_order without an explicit confirmation from the user.`;
  }

  protected async executeTool(call: AddressToolCall, ctx: TurnContext): Promise<ToolOutput> {
    const session = ctx.session;
    switch (call.name) {
      case 'list_industries':
        return session.cachedIndustries.length > 0
          ? { status: 'success', count: session.cachedIndustries.length, industries: formatIndustries(session.cachedIndustries) }
          : { status: 'error', count: 0, industries: [], message: 'Industry list is unavailable right now.' };

      case 'list_addresses':
        return session.cachedAddresses.length > 0
          ? { status: 'success', count: session.cachedAddresses.length, addresses: formatAddresses(session.cachedAddresses) }
          : { status: 'error', count: 0, addresses: [], message: 'No saved addresses could be loaded.' };

      case 'select_industry':
        return this.selectIndustry(call.args.industry_id, session);

      case 'select_address':
        return this.selectAddress(call.args.address, ctx);

      case 'show_final_confirmation':
        return this.showConfirmation(call.args.ready, session);

      case 'place_order':
        return this.placeOrder(call.args.user_confirmed, ctx);
    }
  }

  private locked(session: Session): ToolOutput | undefined {
    return session.order?.status === 'placed' ? { status: 'error', message: ORDER_LOCKED_MESSAGE } : undefined;
  }

  private selectIndustry(industryId: string, session: Session): ToolOutput {
    const locked = this.locked(session);
    if (locked) return locked;

    const industry = session.cachedIndustries.find((i) => i._id === industryId);
    if (!industry) {
      return { status: 'error', message: `Industry ${industryId} is not in the available list. Use an id from list_industries.` };
    }

    session.industryId = industry._id;
    session.industryName = industry.name_en;
    session.confirmationShown = false;
    return { status: 'success', industry: { id: industry._id, name: industry.name_en } };
  }

  private selectAddress(input: string | number | Record<string, unknown>, ctx: TurnContext): ToolOutput {
    const session = ctx.session;
    const locked = this.locked(session);
    if (locked) return locked;

    const address = resolveAddress(input, session.cachedAddresses, ctx.userInput);
    if (!address) {
      return {
        status: 'error',
        message: `Address not found. Choose a number between 1 and ${session.cachedAddresses.length} from list_addresses.`,
      };
    }

    session.address = address;
    session.confirmationShown = false;
    return { status: 'success', address: formatAddresses([address])[0] };
  }

  private showConfirmation(ready: boolean, session: Session): ToolOutput {
    if (!ready) {
      return { status: 'not_ready', message: 'Confirmation not requested.' };
    }

    const missing = [
      ...(session.industryId ? [] : ['industry']),
      ...(session.address ? [] : ['address']),
    ];
    if (missing.length > 0) {
      return { status: 'not_ready', missing, message: `Select ${missing.join(' and ')} first.` };
    }

    session.confirmationShown = true;
    return { status: 'success', order_summary: buildOrderSummary(session) };
  }

  private async placeOrder(userConfirmed: boolean, ctx: TurnContext): Promise<ToolOutput> {
    const session = ctx.session;
    const locked = this.locked(session);
    if (locked) return locked;

    if (!userConfirmed) {
      return { status: 'error', message: 'User confirmation required to place order' };
    }
    if (!session.industryId || !session.address) {
      return { status: 'error', message: 'Industry and address must be selected before placing the order.' };
    }
    if (!session.confirmationShown) {
      return { status: 'error', message: 'Show the final confirmation to the user before placing the order.' };
    }

    const result = await this.placement.place(session);
    const now = new Date().toISOString();

    if (result.status === 'success') {
      session.order = {
        status: 'placed',
        message: result.message,
        orderId: result.order_id,
        requirementId: result.requirement_id,
        placedAt: now,
      };
      ctx.handoff = 'completed';
      this.tracer.traceOrder(session.sessionId, true, { orderId: result.order_id, requirementId: result.requirement_id });
    } else {
      session.order = { status: 'failed', message: result.message, errorType: result.error_type, failedAt: now };
      this.tracer.traceOrder(session.sessionId, false, { errorType: result.error_type, message: result.message });
    }
    return result;
  }
}
