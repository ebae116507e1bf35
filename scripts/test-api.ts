/**
 * Test API — Verify the vendor endpoints the agents depend on
 *
 * Usage: npx tsx scripts/test-api.ts [userAuth]
 */

import 'dotenv/config';
import { loadConfig } from '../src/mas/config';
import { VendorClient, type VendorResult } from '../src/mas/tools/vendor-client';

async function testVendor() {
  const config = loadConfig();
  const userAuth = process.argv[2] || process.env.DEMO_USER_AUTH || 'demo-token';
  const vendor = new VendorClient({ baseUrl: config.vendor.baseUrl, timeoutMs: config.vendor.timeoutMs });

  console.log('Testing vendor API...\n');
  console.log(`API URL: ${config.vendor.baseUrl}\n`);

  const tests: { name: string; run: () => Promise<VendorResult<unknown>> }[] = [
    { name: 'Search inventory "caustic soda"', run: () => vendor.searchInventory('caustic soda') },
    { name: 'Fetch addresses', run: () => vendor.fetchAddresses(userAuth) },
    { name: 'Fetch industries', run: () => vendor.fetchIndustries() }
  ];

  for (const test of tests) {
    console.log(`Testing: ${test.name}`);
    const result = await test.run();
    console.log(`  Result: ${result.success ? '✓ SUCCESS' : '✗ FAILED'}`);
    if (result.success) {
      console.log(`  Data: ${JSON.stringify(result.data).slice(0, 200)}...`);
    } else {
      console.log(`  Error: ${result.errorCode} ${result.error}`);
    }
    console.log('');
  }
}

testVendor().catch(console.error);
