/**
 * Order Placement — submits the collected session to the marketplace
 *
 * PPR requests go to createRequirement as JSON; Sample, Quote and Order go
 * to placeOrder as multipart form data.
 */

import { ErrorCode, VendorError } from '../errors';
import type { Session } from '../memory';
import { messageOf, type RawResponse, type VendorClient } from '../tools/vendor-client';
import { OrderResponseSchema, type Address, type OrderResponse, type RequirementPayload } from '../tools/types';
import { isFilled, type DetailField } from '../agents/fields';
import { parseNumber } from '../agents/validators';

export type PlacementResult =
  | {
      status: 'success';
      message: string;
      order_id?: string;
      requirement_id?: string;
      data?: Record<string, unknown>;
    }
  | {
      status: 'error';
      error_type: ErrorCode;
      message: string;
      status_code?: number;
    };

const OBJECT_ID = /^[a-f0-9]{24}$/i;

function fail(errorType: ErrorCode, message: string, statusCode?: number): PlacementResult {
  return { status: 'error', error_type: errorType, message, ...(statusCode !== undefined ? { status_code: statusCode } : {}) };
}

function idOf(record: Record<string, unknown> | undefined): string | undefined {
  const id = record?._id;
  return typeof id === 'string' ? id : undefined;
}

/**
 * Stored industry id if well-formed, else an exact name match against the
 * cached industry list
 */
export function resolveIndustryId(session: Session): string | null {
  const candidates = [session.industryId, session.industryName].filter(
    (value): value is string => typeof value === 'string' && value !== ''
  );
  const wellFormed = candidates.find((value) => OBJECT_ID.test(value));
  if (wellFormed) return wellFormed;

  for (const candidate of candidates) {
    const match = session.cachedIndustries.find((industry) => industry.name_en === candidate);
    if (match) return match._id;
  }
  return null;
}

export class OrderPlacementService {
  private vendor: VendorClient;

  constructor(vendor: VendorClient) {
    this.vendor = vendor;
  }

  async place(session: Session): Promise<PlacementResult> {
    if (!session.userAuth) {
      return fail(ErrorCode.AUTH_ERROR, 'No authentication token provided');
    }

    try {
      return session.request === 'PPR'
        ? await this.placeRequirement(session)
        : await this.placeOrder(session);
    } catch (error) {
      if (error instanceof VendorError) {
        console.error(`[Orders] ${error.message}`);
        return fail(error.code, error.message, error.context.statusCode);
      }
      console.error('[Orders] Unexpected error:', error);
      return fail(ErrorCode.UNKNOWN_ERROR, `Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private missingField(session: Session, fields: readonly DetailField[]): PlacementResult | undefined {
    if (!session.productId) {
      return fail(ErrorCode.DATA_ERROR, 'Product information missing. Please restart the order process.');
    }
    const missing = fields.find((field) => !isFilled(session.fields[field]));
    if (missing) {
      return fail(ErrorCode.DATA_ERROR, `Required field '${missing}' is missing. Please restart the order process.`);
    }
    return undefined;
  }

  private async placeRequirement(session: Session): Promise<PlacementResult> {
    const addressId = session.address?._id;
    if (!addressId || addressId === 'unknown') {
      return fail(ErrorCode.ADDRESS_ERROR, 'Valid address ID not found. Please select a valid address.');
    }
    const missing = this.missingField(session, ['quantity', 'unit', 'delivery_date']);
    if (missing) return missing;

    const payload: RequirementPayload = {
      product: session.productId ?? '',
      expectedPrice: parseNumber(session.fields.expected_price) ?? 0,
      address: addressId,
      quantity: parseNumber(session.fields.quantity) ?? 0,
      quantityType: String(session.fields.unit),
      endDate: String(session.fields.delivery_date),
    };

    console.log(`[Orders] PPR → createRequirement (product ${payload.product})`);
    const response = await this.vendor.createRequirement(payload, session.userAuth);
    return this.interpret(response, [200, 201], 'Invalid JSON returned from PPR API', (body) => {
      const requirement = body.results?.requirement;
      return {
        status: 'success',
        message: body.message ?? 'Requirement created successfully',
        data: requirement,
        requirement_id: idOf(requirement),
      };
    });
  }

  private async placeOrder(session: Session): Promise<PlacementResult> {
    const address = session.address;
    if (!address) {
      return fail(ErrorCode.ADDRESS_ERROR, 'Valid address not found. Please select a valid address.');
    }
    const missing = this.missingField(session, ['quantity', 'unit']);
    if (missing) return missing;

    let industryId: string | null = null;
    if (session.industryId || session.industryName) {
      industryId = resolveIndustryId(session);
      if (!industryId) {
        return fail(ErrorCode.DATA_ERROR, `Could not resolve industry "${session.industryName ?? session.industryId}". Please select it again.`);
      }
    }

    const form = buildOrderForm(session, address, industryId);
    console.log(`[Orders] ${session.request ?? 'Order'} → placeOrder (product ${session.productId})`);
    const response = await this.vendor.placeOrder(form, session.userAuth);
    return this.interpret(response, [200, 201, 206], 'Invalid JSON from server', (body) => ({
      status: 'success',
      message: body.message ?? 'Order placed successfully!',
      data: body.results?.order,
      order_id: idOf(body.results?.order),
    }));
  }

  private interpret(
    response: RawResponse,
    okStatuses: readonly number[],
    parseMessage: string,
    onSuccess: (body: OrderResponse) => PlacementResult
  ): PlacementResult {
    const parsed = OrderResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      return fail(ErrorCode.PARSING_ERROR, parseMessage, response.status);
    }

    const body = parsed.data;
    if (okStatuses.includes(response.status) && body.error === false) {
      return onSuccess(body);
    }
    return fail(ErrorCode.API_ERROR, messageOf(response.body, 'Unknown error'), response.status);
  }
}

/**
 * Multipart body for placeOrder; optional fields only when present
 */
export function buildOrderForm(session: Session, address: Address, industryId: string | null): FormData {
  const form = new FormData();

  for (const [key, value] of Object.entries(address)) {
    if (key === '_id' || value === null || value === undefined || value === '') continue;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      form.append(`address[${key}]`, String(value));
    }
  }

  const { fields } = session;
  form.append('product', session.productId ?? '');
  form.append('quantity', String(fields.quantity ?? ''));
  form.append('expectedAmount', String(fields.expected_price ?? ''));
  form.append('quantityType', String(fields.unit ?? ''));
  form.append('type', session.request ?? 'Order');

  if (session.request === 'Sample') {
    form.append('isSampleOrder', 'TRUE');
  }

  const optional: [string, string | number | null | undefined][] = [
    ['industry', industryId],
    ['incoterm', fields.incoterm],
    ['modeOfPayment', fields.mode_of_payment],
    ['packingType', fields.packaging_pref],
    ['expectedPurchaseDate', fields.delivery_date],
    ['shippingContactNumber', fields.phone],
  ];
  for (const [name, value] of optional) {
    if (isFilled(value)) {
      form.append(name, String(value));
    }
  }

  return form;
}
