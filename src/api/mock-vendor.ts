/**
 * Mock Vendor API — in-process stand-in for the chemical marketplace
 *
 * Serves the five endpoints the workflow calls from fixture data in
 * src/data/vendor-fixtures.json. Used by the demo, the smoke test and the
 * test suites (through mockFetch, no sockets).
 */

import { readFileSync } from 'node:fs';
import type http from 'node:http';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { AddressSchema, IndustryRecordSchema, ProductSchema } from '../mas/tools/types';
import { createNodeServer } from './http-adapter';

const FixturesSchema = z.object({
  products: z.array(ProductSchema),
  addresses: z.array(AddressSchema),
  industries: z.array(IndustryRecordSchema),
});

export type VendorFixtures = z.infer<typeof FixturesSchema>;

const FIXTURES_PATH = fileURLToPath(new URL('../data/vendor-fixtures.json', import.meta.url));

export function loadFixtures(path: string = FIXTURES_PATH): VendorFixtures {
  return FixturesSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

const SearchBody = z.object({ query: z.string() });

const RequirementBody = z.object({
  product: z.string().min(1),
  expectedPrice: z.number().nonnegative(),
  address: z.string().min(1),
  quantity: z.number().positive(),
  quantityType: z.string().min(1),
  endDate: z.string().min(1),
});

const ORDER_FORM_REQUIRED = ['product', 'quantity', 'quantityType', 'type'] as const;

function json(data: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

interface ForcedResponse {
  status: number;
  body: unknown;
}

export class MockVendorAPI {
  readonly orders: Record<string, string>[] = [];
  readonly requirements: z.infer<typeof RequirementBody>[] = [];
  readonly calls: string[] = [];

  private fixtures: VendorFixtures;
  private forced: Map<string, ForcedResponse> = new Map();
  private nextId = 1;

  constructor(fixtures: VendorFixtures = loadFixtures()) {
    this.fixtures = fixtures;
  }

  /**
   * Answer the next call to `path` with a canned status and body
   */
  failNext(path: string, status: number, body: unknown = { error: true, message: 'Internal server error' }): void {
    this.forced.set(path, { status, body });
  }

  handle = async (req: Request): Promise<Response> => {
    const path = new URL(req.url).pathname.replace(/^\/v1\/api/, '');
    this.calls.push(`${req.method} ${path}`);
    console.log(`[MockVendor] ${req.method} ${path}`);

    const forced = this.forced.get(path);
    if (forced) {
      this.forced.delete(path);
      return json(forced.body, forced.status);
    }

    switch (`${req.method} ${path}`) {
      case 'PATCH /inventory/getBotSearchResult':
        return this.search(req);
      case 'PATCH /user/getAddresses':
        if (!req.headers.get('x-auth-token-user')) return json({ error: true, message: 'Unauthorized' }, 401);
        return json({ error: false, message: 'Success', results: { address: this.fixtures.addresses } });
      case 'PATCH /category/getAllIndustries':
        return json({ error: false, message: 'Success', results: { inventories: this.fixtures.industries } });
      case 'POST /order/createRequirement':
        return this.createRequirement(req);
      case 'POST /order/placeOrder':
        return this.placeOrder(req);
      default:
        return json({ error: true, message: `Route not found: ${req.method} ${path}` }, 404);
    }
  };

  private objectId(): string {
    return `6651${String(this.nextId++).padStart(20, '0')}`;
  }

  private async search(req: Request): Promise<Response> {
    const parsed = SearchBody.safeParse(await req.json().catch(() => null));
    if (!parsed.success) {
      return json({ error: true, message: 'query is required' }, 400);
    }

    const words = parsed.data.query.toLowerCase().split(/\s+/).filter(Boolean);
    const products = this.fixtures.products.filter((product) => {
      const haystack = `${product.name_en ?? ''} ${product.brand_en ?? ''}`.toLowerCase();
      return words.length > 0 && words.every((word) => haystack.includes(word));
    });

    return json({
      error: false,
      message: products.length > 0 ? 'Products found' : 'No products found',
      results: {
        products,
        sellers: products.map((product) => product.seller),
        rawResult: { hits: products.length, query: parsed.data.query },
      },
    });
  }

  private async createRequirement(req: Request): Promise<Response> {
    if (!req.headers.get('x-auth-token-user')) {
      return json({ error: true, message: 'Unauthorized' }, 401);
    }

    const parsed = RequirementBody.safeParse(await req.json().catch(() => null));
    if (!parsed.success) {
      return json({ error: true, message: 'Invalid requirement payload' }, 400);
    }
    if (!this.fixtures.products.some((product) => product._id === parsed.data.product)) {
      return json({ error: true, message: 'Product not found' }, 404);
    }

    this.requirements.push(parsed.data);
    return json(
      {
        error: false,
        message: 'Requirement created successfully',
        results: { requirement: { _id: this.objectId(), ...parsed.data, status: 'Pending' } },
      },
      201
    );
  }

  private async placeOrder(req: Request): Promise<Response> {
    if (!req.headers.get('x-auth-token-user')) {
      return json({ error: true, message: 'Unauthorized' }, 401);
    }

    const form = await req.formData();
    const fields: Record<string, string> = {};
    form.forEach((value, key) => {
      if (typeof value === 'string') fields[key] = value;
    });

    const missing = ORDER_FORM_REQUIRED.find((key) => !fields[key]);
    if (missing) {
      return json({ error: true, message: `Missing required field: ${missing}` }, 400);
    }

    this.orders.push(fields);
    return json(
      {
        error: false,
        message: 'Order placed successfully!',
        results: { order: { _id: this.objectId(), product: fields.product, type: fields.type, status: 'Placed' } },
      },
      201
    );
  }
}

/**
 * fetch implementation answered by the mock, no network involved
 */
export function mockFetch(api: MockVendorAPI): typeof fetch {
  return async (input, init) => api.handle(new Request(input, init));
}

export function createMockServer(port: number = 4010, api: MockVendorAPI = new MockVendorAPI()): http.Server {
  const server = createNodeServer(api.handle, port, 'MockVendor');
  server.listen(port, () => {
    console.log(`[MockVendor] Mock vendor API running on http://localhost:${port}`);
    console.log(`[MockVendor] Set VENDOR_API_URL=http://localhost:${port} to use`);
  });
  return server;
}
