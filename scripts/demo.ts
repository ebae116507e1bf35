/**
 * Demo Script — Interactive CLI chat against the configured vendor API
 *
 * Usage: npx tsx scripts/demo.ts [language] [userAuth]
 * Start scripts/start-mock-api.ts first to run against fixture data.
 */

import 'dotenv/config';
import { createInterface } from 'readline';
import { randomUUID } from 'crypto';
import { loadConfig } from '../src/mas/config';
import { createChatRuntime } from '../src/mas/runtime';

async function main() {
  const config = loadConfig();
  const language = process.argv[2] || 'English';
  const userAuth = process.argv[3] || process.env.DEMO_USER_AUTH || 'demo-token';

  console.log(`
╔════════════════════════════════════════════════════════════════════════════╗
║                    CHEMICAL ORDERING CHAT DEMO                             ║
╠════════════════════════════════════════════════════════════════════════════╣
║  Vendor API: ${config.vendor.baseUrl}
║  Language:   ${language}
╚════════════════════════════════════════════════════════════════════════════╝
`);

  const runtime = createChatRuntime(config);
  const sessionId = randomUUID();

  console.log(`[DEMO] Session: ${sessionId}`);
  console.log('[DEMO] Type messages as the buyer. "trace" shows the trace, "summary" the session, "quit" exits.');
  console.log('');

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout
  });

  const ask = (): Promise<string> => new Promise((resolve) => rl.question('Buyer: ', resolve));

  for (;;) {
    const input = (await ask()).trim();

    if (!input || input.toLowerCase() === 'quit') {
      console.log('\n[DEMO] Session ended.');
      console.log(runtime.getTrace(sessionId));
      rl.close();
      return;
    }

    if (input.toLowerCase() === 'trace') {
      console.log(runtime.getTrace(sessionId));
      continue;
    }

    if (input.toLowerCase() === 'summary') {
      console.log(JSON.stringify(await runtime.getSessionSummary(sessionId), null, 2));
      continue;
    }

    const reply = await runtime.route(input, sessionId, userAuth, language);
    console.log(`\nAgent: ${reply}\n`);
  }
}

main().catch(console.error);
