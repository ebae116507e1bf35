import { describe, it, expect } from 'vitest';
import { VendorClient } from '../src/mas/tools/vendor-client';
import { ErrorCode } from '../src/mas/errors';
import { TEST_TOKEN, vendorFixture } from './helpers';

describe('VendorClient', () => {
  it('searches inventory and strips sellers and rawResult', async () => {
    const { vendor, api } = vendorFixture();
    const result = await vendor.searchInventory('caustic soda');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.results.products.map((p) => p.name_en)).toEqual(['Caustic Soda Flakes 99%', 'Caustic Soda Lye 50%']);
    expect(Object.keys(result.data.results)).toEqual(['products']);
    expect(api.calls).toEqual(['PATCH /inventory/getBotSearchResult']);
  });

  it('sends the buyer headers and the auth token', async () => {
    const seen: Headers[] = [];
    const vendor = new VendorClient({
      baseUrl: 'http://vendor.test/',
      fetchImpl: async (_input, init) => {
        seen.push(new Headers(init?.headers));
        return new Response(JSON.stringify({ results: { address: [] } }));
      },
    });

    await vendor.fetchAddresses(TEST_TOKEN);

    expect(seen[0].get('x-user-type')).toBe('Buyer');
    expect(seen[0].get('x-auth-language')).toBe('English');
    expect(seen[0].get('x-auth-token-user')).toBe(TEST_TOKEN);
  });

  it('refuses to fetch addresses without a token', async () => {
    const { vendor, api } = vendorFixture();
    const result = await vendor.fetchAddresses('');

    expect(result).toMatchObject({ success: false, errorCode: ErrorCode.AUTH_ERROR });
    expect(api.calls).toEqual([]);
  });

  it('keeps only active, non-deleted industries', async () => {
    const { vendor } = vendorFixture();
    const result = await vendor.fetchIndustries();

    expect(result.success && result.data).toEqual([
      { _id: '6650c1b2c3d4e5f600000021', name_en: 'Textile' },
      { _id: '6650c1b2c3d4e5f600000022', name_en: 'Pharmaceutical' },
      { _id: '6650c1b2c3d4e5f600000023', name_en: 'Water Treatment' },
    ]);
  });

  it('maps vendor error statuses to API_ERROR with the vendor message', async () => {
    const { vendor, api } = vendorFixture();
    api.failNext('/inventory/getBotSearchResult', 422, { error: true, message: 'Query too short' });

    const result = await vendor.searchInventory('x');

    expect(result).toMatchObject({ success: false, errorCode: ErrorCode.API_ERROR, statusCode: 422 });
  });

  it('maps a non-JSON body to PARSING_ERROR', async () => {
    const vendor = new VendorClient({
      baseUrl: 'http://vendor.test',
      retryDelayMs: 0,
      fetchImpl: async () => new Response('<html>gateway</html>', { status: 200 }),
    });

    const result = await vendor.fetchIndustries();

    expect(result).toMatchObject({ success: false, errorCode: ErrorCode.PARSING_ERROR });
  });

  it('retries a read once after a network failure', async () => {
    let attempts = 0;
    const vendor = new VendorClient({
      baseUrl: 'http://vendor.test',
      retryDelayMs: 0,
      fetchImpl: async () => {
        attempts++;
        if (attempts === 1) throw new TypeError('fetch failed');
        return new Response(JSON.stringify({ results: { inventories: [] } }));
      },
    });

    const result = await vendor.fetchIndustries();

    expect(attempts).toBe(2);
    expect(result).toEqual({ success: true, status: 200, data: [] });
  });

  it('reports CONNECTION_ERROR when every attempt fails', async () => {
    const vendor = new VendorClient({
      baseUrl: 'http://vendor.test',
      retryDelayMs: 0,
      fetchImpl: async () => {
        throw new TypeError('fetch failed');
      },
    });

    const result = await vendor.searchInventory('acid');

    expect(result).toMatchObject({ success: false, errorCode: ErrorCode.CONNECTION_ERROR });
  });

  it('maps an aborted request to TIMEOUT_ERROR', async () => {
    const vendor = new VendorClient({
      baseUrl: 'http://vendor.test',
      timeoutMs: 5,
      retryDelayMs: 0,
      fetchImpl: (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const error = new Error('The operation was aborted');
            error.name = 'AbortError';
            reject(error);
          });
        }),
    });

    const result = await vendor.fetchIndustries();

    expect(result).toMatchObject({ success: false, errorCode: ErrorCode.TIMEOUT_ERROR });
  });
});
