import { describe, it, expect } from 'vitest';
import {
  AddressPurposeAgent,
  DATA_UNAVAILABLE_MESSAGE,
  buildOrderSummary,
  resolveAddress,
} from '../src/mas/agents/address-purpose';
import { OrderPlacementService } from '../src/mas/orders/placement';
import { ORDER_LOCKED_MESSAGE } from '../src/mas/orchestrator';
import { loadFixtures } from '../src/api/mock-vendor';
import { Tracer } from '../src/mas/tracing';
import type { LLMClient } from '../src/mas/llm/client';
import type { Session } from '../src/mas/memory';
import {
  DHANMONDI_ADDRESS_ID,
  INDUSTRIAL_AREA_ADDRESS_ID,
  TEXTILE_ID,
  lastToolOutput,
  readyForAddress,
  say,
  scriptedLLM,
  toolCall,
  vendorFixture,
} from './helpers';

const ADDRESSES = loadFixtures().addresses;
const [DHANMONDI, INDUSTRIAL_AREA] = ADDRESSES;

const INDUSTRIES = [
  { _id: TEXTILE_ID, name_en: 'Textile' },
  { _id: '6650c1b2c3d4e5f600000022', name_en: 'Pharmaceutical' },
  { _id: '6650c1b2c3d4e5f600000023', name_en: 'Water Treatment' },
];

function setup(llm: LLMClient) {
  const { api, vendor } = vendorFixture();
  const agent = new AddressPurposeAgent({
    llm,
    tracer: new Tracer('minimal'),
    vendor,
    placement: new OrderPlacementService(vendor),
  });
  return { api, agent };
}

/** Agent 3 session with addresses and industries already loaded */
function loaded(overrides: Partial<Session> = {}): Session {
  return readyForAddress({
    cachedDataFetched: true,
    cachedAddresses: ADDRESSES,
    cachedIndustries: INDUSTRIES,
    ...overrides,
  });
}

describe('resolveAddress', () => {
  it('resolves list numbers as numbers or digit strings', () => {
    expect(resolveAddress(2, ADDRESSES)?._id).toBe(INDUSTRIAL_AREA_ADDRESS_ID);
    expect(resolveAddress(' 1 ', ADDRESSES)?._id).toBe(DHANMONDI_ADDRESS_ID);
    expect(resolveAddress(3, ADDRESSES)).toBeUndefined();
  });

  it('resolves an _id, an address-line fragment or an address object', () => {
    expect(resolveAddress(DHANMONDI_ADDRESS_ID, ADDRESSES)?._id).toBe(DHANMONDI_ADDRESS_ID);
    expect(resolveAddress('bscic', ADDRESSES)?._id).toBe(INDUSTRIAL_AREA_ADDRESS_ID);
    expect(resolveAddress({ _id: INDUSTRIAL_AREA_ADDRESS_ID }, ADDRESSES)?._id).toBe(INDUSTRIAL_AREA_ADDRESS_ID);
  });

  it('never substring-matches a digit string', () => {
    // "Plot 7" contains 7, but 7 is not a valid list number
    expect(resolveAddress('7', ADDRESSES)).toBeUndefined();
  });

  it('falls back to a bare number in the user message', () => {
    expect(resolveAddress('the factory one', ADDRESSES, 'use number 2 please')?._id).toBe(INDUSTRIAL_AREA_ADDRESS_ID);
    expect(resolveAddress('the factory one', ADDRESSES, 'the factory one')).toBeUndefined();
  });

  it('only reads whole numeric words from the user message', () => {
    expect(resolveAddress('Uttara office', ADDRESSES, 'Ship to Uttara office before 2030-02-01')).toBeUndefined();
  });

  it('skips out-of-range numbers in the user message', () => {
    expect(resolveAddress('nowhere', ADDRESSES, 'deliver 500 kg to address 2')?._id).toBe(INDUSTRIAL_AREA_ADDRESS_ID);
  });
});

describe('Address and industry data', () => {
  it('loads addresses and industries before the first model call', async () => {
    const llm = scriptedLLM([say('Which industry will this be used in?')]);
    const { api, agent } = setup(llm);
    const session = readyForAddress();

    const turn = await agent.handle('ok', session);

    expect(turn.reply).toBe('Which industry will this be used in?');
    expect(session.cachedDataFetched).toBe(true);
    expect(session.cachedAddresses.map((a) => a._id)).toEqual([DHANMONDI_ADDRESS_ID, INDUSTRIAL_AREA_ADDRESS_ID]);
    expect(session.cachedIndustries).toEqual(INDUSTRIES);
    expect(api.calls.sort()).toEqual(['PATCH /category/getAllIndustries', 'PATCH /user/getAddresses']);

    const messages = llm.calls[0].messages;
    expect(messages[messages.length - 2].content).toBe(
      'SYSTEM: Industry not selected yet. Call list_industries and show the numbered list, then ask which industry the product is for.'
    );
  });

  it('does not fetch again once loaded', async () => {
    const { api, agent } = setup(scriptedLLM([say('Pick an industry.')]));

    await agent.handle('hi', loaded());

    expect(api.calls).toEqual([]);
  });

  it('apologizes without calling the model when both lists are empty', async () => {
    const llm = scriptedLLM([]);
    const { api, agent } = setup(llm);
    api.failNext('/category/getAllIndustries', 500);
    const session = readyForAddress({ userAuth: '' });

    const turn = await agent.handle('ok', session);

    expect(turn.reply).toBe(DATA_UNAVAILABLE_MESSAGE);
    expect(session.cachedDataFetched).toBe(false);
    expect(llm.calls).toEqual([]);
  });

  it('lists industries with their numbers', async () => {
    const llm = scriptedLLM([toolCall('list_industries', {}), say('1. Textile ...')]);
    const { agent } = setup(llm);

    await agent.handle('which industries?', loaded());

    expect(lastToolOutput(llm.calls[1].messages)).toEqual({
      status: 'success',
      count: 3,
      industries: [
        { number: 1, id: TEXTILE_ID, name: 'Textile' },
        { number: 2, id: '6650c1b2c3d4e5f600000022', name: 'Pharmaceutical' },
        { number: 3, id: '6650c1b2c3d4e5f600000023', name: 'Water Treatment' },
      ],
    });
  });

  it('reports an empty address list', async () => {
    const llm = scriptedLLM([toolCall('list_addresses', {}), say('No addresses found.')]);
    const { agent } = setup(llm);

    await agent.handle('addresses?', loaded({ cachedAddresses: [] }));

    expect(lastToolOutput(llm.calls[1].messages)).toEqual({
      status: 'error',
      count: 0,
      addresses: [],
      message: 'No saved addresses could be loaded.',
    });
  });
});

describe('Selections and confirmation', () => {
  it('selects industry and address, then shows the summary', async () => {
    const llm = scriptedLLM([
      toolCall('select_industry', { industry_id: TEXTILE_ID, industry_name: 'Textile' }),
      toolCall('select_address', { address: 2 }),
      toolCall('show_final_confirmation', {}),
      say('Here is your summary. Shall I place the order?'),
    ]);
    const { agent } = setup(llm);
    const session = loaded();

    await agent.handle('textile, deliver to address 2', session);

    expect(lastToolOutput(llm.calls[1].messages)).toEqual({
      status: 'success',
      industry: { id: TEXTILE_ID, name: 'Textile' },
    });
    expect(lastToolOutput(llm.calls[2].messages)).toMatchObject({
      status: 'success',
      address: { number: 1, id: INDUSTRIAL_AREA_ADDRESS_ID, addressLine: 'Plot 7, BSCIC Industrial Area' },
    });
    expect(lastToolOutput(llm.calls[3].messages)).toEqual({
      status: 'success',
      order_summary: buildOrderSummary(session),
    });
    expect(session.industryName).toBe('Textile');
    expect(session.address?._id).toBe(INDUSTRIAL_AREA_ADDRESS_ID);
    expect(session.confirmationShown).toBe(true);
  });

  it('summarizes the collected order', () => {
    const session = loaded({ address: INDUSTRIAL_AREA, industryId: TEXTILE_ID, industryName: 'Textile' });

    expect(buildOrderSummary(session)).toEqual({
      product: { name: 'Caustic Soda Flakes 99%', id: '6650a1b2c3d4e5f600000001', brand: 'Meghna Chem' },
      request_type: 'Order',
      quantity_details: { quantity: 500, unit: 'KG', price_per_unit: 120, total_price: 60000 },
      delivery: {
        address: 'Plot 7, BSCIC Industrial Area',
        contact: 'Test Buyer',
        delivery_date: '2030-03-01',
        incoterm: 'Ex Factory',
      },
      payment: { method: 'LC', contact_phone: '+12015550123' },
      packaging: 'Drum',
      industry_use: 'Textile',
      message: 'Please review the summary and confirm to place the order.',
    });
  });

  it('refuses an industry outside the loaded list', async () => {
    const llm = scriptedLLM([toolCall('select_industry', { industry_id: '6650c1b2c3d4e5f600000024' }), say('Please pick another.')]);
    const { agent } = setup(llm);
    const session = loaded();

    await agent.handle('leather', session);

    expect(lastToolOutput(llm.calls[1].messages)).toEqual({
      status: 'error',
      message: 'Industry 6650c1b2c3d4e5f600000024 is not in the available list. Use an id from list_industries.',
    });
    expect(session.industryId).toBeNull();
  });

  it('names the valid range for an unknown address', async () => {
    const llm = scriptedLLM([toolCall('select_address', { address: 9 }), say('Which one?')]);
    const { agent } = setup(llm);

    await agent.handle('the ninth', loaded());

    expect(lastToolOutput(llm.calls[1].messages)).toEqual({
      status: 'error',
      message: 'Address not found. Choose a number between 1 and 2 from list_addresses.',
    });
  });

  it('hides the summary again after a new selection', async () => {
    const llm = scriptedLLM([toolCall('select_address', { address: '1' }), say('Changed.')]);
    const { agent } = setup(llm);
    const session = loaded({ address: INDUSTRIAL_AREA, industryId: TEXTILE_ID, confirmationShown: true });

    await agent.handle('use my Dhanmondi address instead', session);

    expect(session.address).toEqual(DHANMONDI);
    expect(session.confirmationShown).toBe(false);
  });

  it('withholds the summary until both are selected', async () => {
    const llm = scriptedLLM([toolCall('show_final_confirmation', {}), say('First pick an industry.')]);
    const { agent } = setup(llm);

    await agent.handle('show me', loaded());

    expect(lastToolOutput(llm.calls[1].messages)).toEqual({
      status: 'not_ready',
      missing: ['industry', 'address'],
      message: 'Select industry and address first.',
    });
  });
});

describe('place_order', () => {
  function confirmed(overrides: Partial<Session> = {}): Session {
    return loaded({ address: INDUSTRIAL_AREA, industryId: TEXTILE_ID, industryName: 'Textile', confirmationShown: true, ...overrides });
  }

  it('places the order and hands off to completed', async () => {
    const llm = scriptedLLM([toolCall('place_order', { user_confirmed: true }), say('Your order has been placed.')]);
    const { api, agent } = setup(llm);
    const session = confirmed();

    const turn = await agent.handle('yes, place it', session);

    expect(turn.handoff).toBe('completed');
    expect(session.order).toMatchObject({ status: 'placed', message: 'Order placed successfully!' });
    expect(api.orders[0]['address[addressLine]']).toBe('Plot 7, BSCIC Industrial Area');
    expect(api.orders[0].industry).toBe(TEXTILE_ID);
  });

  it('requires explicit confirmation', async () => {
    const llm = scriptedLLM([toolCall('place_order', { user_confirmed: false }), say('Please confirm.')]);
    const { api, agent } = setup(llm);

    await agent.handle('maybe', confirmed());

    expect(lastToolOutput(llm.calls[1].messages)).toEqual({
      status: 'error',
      message: 'User confirmation required to place order',
    });
    expect(api.calls).toEqual([]);
  });

  it('requires the summary to have been shown', async () => {
    const llm = scriptedLLM([toolCall('place_order', { user_confirmed: true }), say('Let me show the summary first.')]);
    const { agent } = setup(llm);

    await agent.handle('yes', confirmed({ confirmationShown: false }));

    expect(lastToolOutput(llm.calls[1].messages)).toEqual({
      status: 'error',
      message: 'Show the final confirmation to the user before placing the order.',
    });
  });

  it('requires both selections', async () => {
    const llm = scriptedLLM([toolCall('place_order', { user_confirmed: true }), say('Pick an address first.')]);
    const { agent } = setup(llm);

    await agent.handle('yes', confirmed({ address: null }));

    expect(lastToolOutput(llm.calls[1].messages)).toEqual({
      status: 'error',
      message: 'Industry and address must be selected before placing the order.',
    });
  });

  it('records a failed placement and hints at it on the next turn', async () => {
    const llm = scriptedLLM([
      toolCall('place_order', { user_confirmed: true }),
      say('The marketplace could not take the order.'),
      say('Shall I try again?'),
    ]);
    const { api, agent } = setup(llm);
    api.failNext('/order/placeOrder', 500, { error: true, message: 'Database unavailable' });
    const session = confirmed();

    const turn = await agent.handle('yes', session);
    await agent.handle('what happened?', session);

    expect(turn.handoff).toBeUndefined();
    expect(session.order).toMatchObject({ status: 'failed', message: 'Database unavailable', errorType: 'API_ERROR' });
    const messages = llm.calls[2].messages;
    expect(messages[messages.length - 2].content).toBe(
      'SYSTEM: The last order attempt failed: Database unavailable. Explain and offer to retry.'
    );
  });

  it('locks selections and placement once the order is placed', async () => {
    const llm = scriptedLLM([
      toolCall('select_industry', { industry_id: TEXTILE_ID }),
      toolCall('place_order', { user_confirmed: true }),
      say('That order is already placed.'),
    ]);
    const { api, agent } = setup(llm);
    const session = confirmed({
      order: { status: 'placed', message: 'Order placed successfully!', placedAt: '2030-01-15T09:05:00.000Z' },
    });

    await agent.handle('change it to textile and order again', session);

    expect(lastToolOutput(llm.calls[1].messages)).toEqual({ status: 'error', message: ORDER_LOCKED_MESSAGE });
    expect(lastToolOutput(llm.calls[2].messages)).toEqual({ status: 'error', message: ORDER_LOCKED_MESSAGE });
    expect(api.calls).toEqual([]);
  });
});
