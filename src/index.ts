/**
 * chem-order-agents — multi-agent ordering chat for a chemical marketplace
 *
 * Main entry point exporting all components
 */

import 'dotenv/config';

export * from './mas';

// API
export * from './api/server';
export * from './api/mock-vendor';

import type http from 'node:http';
import { loadConfig } from './mas/config';
import { startServer } from './api/server';

export function quickStart(port?: number): http.Server {
  const config = loadConfig();
  console.log(`\n╔════════════════════════════════════════════╗`);
  console.log(`║  chem-order-agents Quick Start             ║`);
  console.log(`║  Vendor: ${config.vendor.baseUrl.padEnd(33)}║`);
  console.log(`╚════════════════════════════════════════════╝\n`);

  return startServer({ ...config, port: port ?? config.port });
}

// CLI
if (import.meta.url === `file://${process.argv[1]}`) {
  const port = process.argv[2] ? parseInt(process.argv[2], 10) : undefined;
  quickStart(port);
}
