#!/usr/bin/env npx tsx
/**
 * Start Mock API — fixture-backed vendor API for demos
 */

import { createMockServer } from '../src/api/mock-vendor';

const port = parseInt(process.env.MOCK_PORT || '4010');
createMockServer(port);

console.log('\n=== Mock Vendor API ===');
console.log(`Port: ${port}`);
console.log(`Use: VENDOR_API_URL=http://localhost:${port}`);
console.log('\nPress Ctrl+C to stop\n');
