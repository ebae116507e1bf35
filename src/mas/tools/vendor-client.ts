/**
 * Vendor Client — REST calls against the chemical marketplace API
 *
 * Reads (inventory, addresses, industries) return a VendorResult envelope and
 * are retried once on network failure. Order submissions hand the raw status
 * and body back to the placement service, which owns the success rules.
 */

import type { z } from 'zod';
import { ErrorCode, VendorError } from '../errors';
import { withRetry } from '../resilience';
import {
  AddressListSchema,
  IndustryListSchema,
  SearchResultSchema,
  type Address,
  type Industry,
  type RequirementPayload,
  type SearchResult,
} from './types';

export type VendorResult<T> =
  | { success: true; status: number; data: T }
  | {
      success: false;
      error: string;
      errorCode: ErrorCode;
      statusCode?: number;
      retryable: boolean;
      suggestion?: string;
    };

export interface RawResponse {
  status: number;
  body: unknown;
}

export interface VendorClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  retryDelayMs?: number;
}

export const ENDPOINTS = {
  search: '/inventory/getBotSearchResult',
  addresses: '/user/getAddresses',
  industries: '/category/getAllIndustries',
  createRequirement: '/order/createRequirement',
  placeOrder: '/order/placeOrder',
} as const;

interface SendOptions {
  json?: unknown;
  form?: FormData;
  userAuth?: string;
}

function failure(err: VendorError): VendorResult<never> {
  return {
    success: false,
    error: err.message,
    errorCode: err.code,
    statusCode: err.context.statusCode,
    retryable: err.context.retryable,
    suggestion: err.context.suggestion,
  };
}

export function messageOf(body: unknown, fallback: string): string {
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return fallback;
}

export class VendorClient {
  private baseUrl: string;
  private timeout: number;
  private fetchImpl: typeof fetch;
  private retryDelayMs: number;

  constructor(options: VendorClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeoutMs ?? 30000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  /**
   * Inventory search; drops the sellers and rawResult blocks from results
   */
  async searchInventory(query: string): Promise<VendorResult<SearchResult>> {
    const result = await this.read(ENDPOINTS.search, SearchResultSchema, { json: { query } });
    if (!result.success) return result;

    const results = { ...result.data.results };
    delete results.sellers;
    delete results.rawResult;
    return { ...result, data: { ...result.data, results } };
  }

  async fetchAddresses(userAuth: string): Promise<VendorResult<Address[]>> {
    if (!userAuth) {
      return failure(VendorError.authMissing(ENDPOINTS.addresses));
    }
    const result = await this.read(ENDPOINTS.addresses, AddressListSchema, { userAuth });
    if (!result.success) return result;
    return { ...result, data: result.data.results.address };
  }

  /**
   * Active, non-deleted industries reduced to id and English name
   */
  async fetchIndustries(): Promise<VendorResult<Industry[]>> {
    const result = await this.read(ENDPOINTS.industries, IndustryListSchema, {});
    if (!result.success) return result;

    const industries = result.data.results.inventories
      .filter((i) => i.status === true && i.isDeleted === false)
      .map((i) => ({ _id: i._id, name_en: i.name_en }));
    return { ...result, data: industries };
  }

  /** PPR submission (JSON). Throws VendorError on transport failure. */
  createRequirement(payload: RequirementPayload, userAuth: string): Promise<RawResponse> {
    return this.send('POST', ENDPOINTS.createRequirement, { json: payload, userAuth });
  }

  /** Order submission (multipart). Throws VendorError on transport failure. */
  placeOrder(form: FormData, userAuth: string): Promise<RawResponse> {
    return this.send('POST', ENDPOINTS.placeOrder, { form, userAuth });
  }

  private async read<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    options: SendOptions
  ): Promise<VendorResult<z.output<S>>> {
    try {
      const response = await withRetry(
        () => this.send('PATCH', endpoint, options),
        { maxAttempts: 2, initialDelayMs: this.retryDelayMs }
      );

      if (response.status < 200 || response.status >= 300) {
        return failure(VendorError.api(endpoint, response.status, messageOf(response.body, `HTTP ${response.status}`)));
      }

      const parsed = schema.safeParse(response.body);
      if (!parsed.success) {
        return failure(VendorError.parsing(endpoint, response.status));
      }
      return { success: true, status: response.status, data: parsed.data };
    } catch (error) {
      const err = error instanceof VendorError ? error : VendorError.connection(endpoint, error);
      console.error(`[Vendor] ${endpoint} failed: ${err.message}`);
      return failure(err);
    }
  }

  private async send(method: 'PATCH' | 'POST', endpoint: string, options: SendOptions): Promise<RawResponse> {
    const url = `${this.baseUrl}${endpoint}`;
    const headers: Record<string, string> = {
      'x-user-type': 'Buyer',
      'x-auth-language': 'English',
    };
    if (options.userAuth) {
      headers['x-auth-token-user'] = options.userAuth;
    }

    let body: string | FormData | undefined;
    if (options.form) {
      // fetch sets the multipart boundary itself
      body = options.form;
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method, headers, body, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw VendorError.timeout(endpoint, this.timeout);
      }
      throw VendorError.connection(endpoint, error);
    } finally {
      clearTimeout(timeoutId);
    }

    const text = await response.text();
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw VendorError.parsing(endpoint, response.status);
    }
    return { status: response.status, body: parsed };
  }
}
