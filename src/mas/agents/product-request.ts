/**
 * Product Request Agent — resolves a free-text query to a confirmed product
 * and request type
 *
 * Search results are memoized per session; the id and list-number maps let
 * the model confirm "number 2" without restating the record.
 */

import { z } from 'zod';
import type { VendorClient } from '../tools/vendor-client';
import { ProductSchema, type Product } from '../tools/types';
import type { AgentId, SearchCache, Session } from '../memory';
import { normalizeRequestType } from './fields';
import { StageAgent, type StageAgentDeps, type ToolDefinition, type ToolOutput, type TurnContext } from './base';

export const INVALID_PRODUCT_DETAILS =
  'Invalid product_details - must contain complete product object from API with _id field. Use exact data from cached results.';

const SearchArgs = z.object({
  query: z.string().trim().min(1).describe('Product name or keywords exactly as the user gave them'),
});

const ConfirmSelectionArgs = z.object({
  product_id: z.string().default('').describe('_id of the chosen product from the search results'),
  product_name: z.string().default('').describe('name_en of the chosen product'),
  product_details: z
    .record(z.unknown())
    .default({})
    .describe('The complete product object exactly as returned by search, including _id'),
  request_type: z.string().describe('One of: Sample, Quote, PPR, Order'),
  next_agent: z.literal('request_details').default('request_details'),
});

const ProductToolCallSchema = z.discriminatedUnion('name', [
  z.object({ name: z.literal('search'), args: SearchArgs }),
  z.object({ name: z.literal('confirm_selection'), args: ConfirmSelectionArgs }),
]);

type ProductToolCall = z.infer<typeof ProductToolCallSchema>;

const TOOLS: readonly ToolDefinition[] = [
  {
    name: 'search',
    description: 'Search the marketplace inventory. Repeated queries are answered from the session cache.',
    args: SearchArgs,
  },
  {
    name: 'confirm_selection',
    description:
      'Record the product the user chose and the request type, then hand over to request-details collection. ' +
      'Only call after the user has picked a product and said whether they want a sample, quote, PPR or order.',
    args: ConfirmSelectionArgs,
  },
];

export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase();
}

/**
 * Replace the current list and register each product by id and 1-based position
 */
export function indexProducts(cache: SearchCache, products: Product[]): void {
  cache.listIndex = {};
  cache.currentList = products;
  products.forEach((product, i) => {
    cache.productsById[product._id] = product;
    cache.listIndex[String(i + 1)] = product._id;
  });
}

function text(value: unknown): string {
  if (typeof value === 'string' && value) return value;
  if (typeof value === 'number') return String(value);
  return 'N/A';
}

export function formatProductList(products: Product[]): string {
  const rows = products.map((product, i) => ({
    list_number: i + 1,
    name: text(product.name_en),
    brand: text(product.brand_en),
    seller_name: text(product.seller),
    unit: text(product.unit),
    minQuantity: text(product.minQuantity),
    maxQuantity: text(product.maxQuantity ?? product.quantity),
    specification: text(product.specification_en),
    description: text(product.description_en),
    _id: product._id,
  }));
  return JSON.stringify(rows, null, 2);
}

export class ProductRequestAgent extends StageAgent<typeof ProductToolCallSchema> {
  readonly id: AgentId = 'product_request';
  protected readonly historyWindow = 18;
  protected readonly callSchema = ProductToolCallSchema;
  protected readonly toolDefinitions = TOOLS;

  private readonly vendor: VendorClient;

  constructor(deps: StageAgentDeps & { vendor: VendorClient }) {
    super(deps);
    this.vendor = deps.vendor;
  }

  protected systemPrompt(session: Session): string {
    const list = session.cache.currentList;
    return `You are the product request assistant of a chemical marketplace.
Your job: help the buyer find one product and decide the request type.

STEPS:
1. When the user names a product or keywords, call search and show the results as a numbered list: "1. <name> - <seller>".
2. When the user picks a product (by number or name), ask whether they want a Sample, Quote, PPR (purchase price request) or Order, unless they already said.
3. Call confirm_selection with the product _id, its name, the COMPLETE product object from the search results, and the request type.

RULES:
- Never invent products. Only use products returned by search.
- If search returns no products, say so and ask for different keywords.
- Keep replies short.

CURRENT PRODUCT LIST:
${list.length > 0 ? formatProductList(list) : '(no search yet)'}`;
  }

  protected async executeTool(call: ProductToolCall, ctx: TurnContext): Promise<ToolOutput> {
    switch (call.name) {
      case 'search':
        return this.search(call.args.query, ctx.session);
      case 'confirm_selection':
        return this.confirmSelection(call.args, ctx);
    }
  }

  async search(query: string, session: Session): Promise<ToolOutput> {
    const key = normalizeQuery(query);
    const cache = session.cache;

    const cached = Object.hasOwn(cache.searches, key) ? cache.searches[key] : undefined;
    if (cached) {
      if (cached.results.products.length > 0) {
        console.log(`[Agent:product_request] Cache hit: "${key}"`);
        indexProducts(cache, cached.results.products);
        return { ...cached, cached: true };
      }
      delete cache.searches[key];
    }

    const result = await this.vendor.searchInventory(query);
    if (!result.success) {
      return { error: true, message: result.error, results: { products: [] } };
    }

    const products = result.data.results.products;
    if (products.length > 0) {
      cache.searches[key] = result.data;
      indexProducts(cache, products);
    }
    return { ...result.data, cached: false };
  }

  private confirmSelection(args: z.infer<typeof ConfirmSelectionArgs>, ctx: TurnContext): ToolOutput {
    const request = normalizeRequestType(args.request_type);
    if (!request) {
      return {
        status: 'error',
        message: `Invalid request_type "${args.request_type}". Use one of: Sample, Quote, PPR, Order.`,
      };
    }

    const product = this.resolveProduct(args.product_id, args.product_details, ctx.session.cache);
    if (!product) {
      return { status: 'error', message: INVALID_PRODUCT_DETAILS };
    }

    const productName = args.product_name || product.name_en || product._id;
    ctx.updates = { productId: product._id, productName, product, request };
    ctx.handoff = args.next_agent;

    return {
      status: 'success',
      message: `Selected ${productName} for a ${request} request. Request details come next.`,
      product_id: product._id,
      request_type: request,
    };
  }

  /**
   * Prefer the cached vendor record; fall back to the details the model sent
   * when they carry an _id. A bare list number also resolves.
   */
  private resolveProduct(productId: string, details: Record<string, unknown>, cache: SearchCache): Product | undefined {
    const detailId = typeof details._id === 'string' ? details._id : '';
    const id = detailId || productId;

    const byId = Object.hasOwn(cache.productsById, id) ? cache.productsById[id] : undefined;
    if (byId) return byId;

    const indexed = Object.hasOwn(cache.listIndex, productId) ? cache.productsById[cache.listIndex[productId]] : undefined;
    if (indexed) return indexed;

    if (detailId) {
      const parsed = ProductSchema.safeParse(details);
      if (parsed.success) return parsed.data;
    }
    return undefined;
  }
}
