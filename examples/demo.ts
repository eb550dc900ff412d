#!/usr/bin/env npx tsx
/**
 * Link demo
 *
 * Runs a host and a client over an in-memory link: text, an image
 * transfer, a dropped connection that resumes, and a key rotation.
 *
 * Run with: npm run demo            (interactive)
 *           npm run demo -- --auto  (scripted walkthrough)
 */

import * as readline from 'readline';
import {
  LinkSession,
  MemoryLink,
  Role,
  SessionState,
  createLogger,
  isImageMime,
  sniffMime,
  type LinkConfigOverrides,
  type LinkEvent,
} from '../src/index.js';

const CONFIG: LinkConfigOverrides = {
  chunkSize: 16 * 1024,
  heartbeatIntervalMs: 2_000,
  degradedAfterMs: 5_000,
  hardTimeoutMs: 10_000,
  reconnect: { maxAttempts: 5, backoff: { initial: 100, max: 1_000 } },
  logLevel: 'warn',
};

const log = createLogger('demo', 'info');

function fakeImage(size: number): Uint8Array {
  const bytes = new Uint8Array(size);
  bytes.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
  for (let i = 8; i < size; i++) {
    bytes[i] = i % 251;
  }
  return bytes;
}

function describeEvent(name: string, event: LinkEvent): string | null {
  switch (event.type) {
    case 'message':
      return `${name} received: "${event.text}"`;
    case 'media': {
      const kind = isImageMime(event.mimeHint) ? 'image' : 'file';
      return `${name} received ${kind} ${event.transferId} (${event.bytes.length} bytes, ${event.mimeHint})`;
    }
    case 'state':
      return `${name}: ${event.from} -> ${event.to}`;
    case 'error':
      return `${name} error${event.fatal ? ' (fatal)' : ''}: ${event.kind} ${event.detail}`;
  }
}

function waitFor(session: LinkSession, predicate: (event: LinkEvent) => boolean): Promise<LinkEvent> {
  return new Promise((resolve) => {
    const unsubscribe = session.onEvent((event) => {
      if (predicate(event)) {
        unsubscribe();
        resolve(event);
      }
    });
  });
}

function reached(session: LinkSession, state: SessionState): Promise<LinkEvent> {
  return waitFor(session, (event) => event.type === 'state' && event.to === state);
}

async function openPair(): Promise<{ link: MemoryLink; host: LinkSession; client: LinkSession }> {
  const link = new MemoryLink({ fragmentSize: 512 });
  const host = new LinkSession({ role: Role.HOST, streams: link.streams, config: CONFIG });
  const client = new LinkSession({ role: Role.CLIENT, streams: link.streams, config: CONFIG });

  await Promise.all([host.listen(), client.connect('memory-host')]);
  return { link, host, client };
}

// Scripted walkthrough (for quick verification)
async function runAutomatedDemo() {
  console.log('\nRunning automated link demo...\n');

  const { link, host, client } = await openPair();
  console.log(`Connected: host sees ${host.getPeerAddress()}, client sees ${client.getPeerAddress()}`);

  console.log('\nStep 1: Client sends text to the host');
  console.log('-'.repeat(40));

  const greeting = waitFor(host, (event) => event.type === 'message');
  const frameId = await client.sendText('Hello host, can you hear me?');
  console.log(`Client: Sent ${frameId}`);
  const heard = await greeting;
  console.log(describeEvent('Host', heard));

  console.log('\nStep 2: Host sends an image');
  console.log('-'.repeat(40));

  const image = fakeImage(100 * 1024);
  console.log(`Host: Detected ${sniffMime(image)}`);
  const delivered = waitFor(client, (event) => event.type === 'media');
  const transferId = await host.sendMedia(image);
  console.log(`Host: Sent transfer ${transferId}`);
  console.log(describeEvent('Client', await delivered));

  console.log('\nStep 3: Drop the link and resume');
  console.log('-'.repeat(40));

  const resumed = reached(client, SessionState.ESTABLISHED);
  link.drop();
  await resumed;
  console.log(`Client: Resumed, sequences ${JSON.stringify(client.getSequenceState())}`);

  const afterDrop = waitFor(host, (event) => event.type === 'message');
  await client.sendText('Still here after the drop');
  console.log(describeEvent('Host', await afterDrop));
  console.log(`Connections made: ${link.connections}`);

  console.log('\nStep 4: Rotate the session key');
  console.log('-'.repeat(40));

  const rotated = reached(client, SessionState.ESTABLISHED);
  await host.rotateKey();
  await rotated;
  console.log(`Client: New key in place, sequences ${JSON.stringify(client.getSequenceState())}`);

  await client.disconnect();
  await host.disconnect();
  console.log('\nAutomated demo completed successfully!\n');
}

// Interactive CLI
async function main() {
  console.log('\nInteractive link demo (host <-> client over memory)\n');

  const { link, host, client } = await openPair();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  let current: 'host' | 'client' = 'client';

  const printHelp = () => {
    console.log('\nCommands:');
    console.log('   /switch     - Switch between host and client');
    console.log('   /image      - Send a 200 KiB fake PNG');
    console.log('   /drop       - Cut the link');
    console.log('   /corrupt    - Corrupt the next frame toward the other side');
    console.log('   /rotate     - Rotate the session key (host only)');
    console.log('   /status     - Show states and sequence numbers');
    console.log('   /quit       - Exit demo');
    console.log('   <message>   - Send text to the other side\n');
  };

  const printPrompt = () => {
    process.stdout.write(`\n[${current}] > `);
  };

  function print(line: string | null): void {
    if (line !== null) {
      console.log(`\n   ${line}`);
      printPrompt();
    }
  }

  host.onEvent((event) => print(describeEvent('Host', event)));
  client.onEvent((event) => print(describeEvent('Client', event)));

  const session = () => (current === 'host' ? host : client);

  const shutdown = async () => {
    await client.disconnect();
    await host.disconnect();
  };

  const handle = async (input: string) => {
    if (input === '/switch') {
      current = current === 'host' ? 'client' : 'host';
      console.log(`\n   Switched to ${current.toUpperCase()}`);
    } else if (input === '/image') {
      const id = await session().sendMedia(fakeImage(200 * 1024), 'image/png');
      console.log(`\n   Sent transfer ${id}`);
    } else if (input === '/drop') {
      link.drop();
      console.log('\n   Link dropped');
    } else if (input === '/corrupt') {
      link.corruptNext(current === 'host' ? 'host-to-client' : 'client-to-host');
      console.log('\n   Next frame will be corrupted');
    } else if (input === '/rotate') {
      await host.rotateKey();
      console.log('\n   Key rotated');
    } else if (input === '/status') {
      for (const [name, s] of [['host', host], ['client', client]] as const) {
        console.log(`\n   ${name}: ${s.getState()} ${JSON.stringify(s.getSequenceState())}`);
      }
    } else if (input === '/quit' || input === '/exit') {
      console.log('\n   Goodbye!\n');
      rl.close();
      return;
    } else if (input.startsWith('/')) {
      console.log(`\n   Unknown command: ${input}`);
      printHelp();
    } else {
      const id = await session().sendText(input);
      console.log(`\n   Sent ${id}`);
    }
    printPrompt();
  };

  printHelp();
  printPrompt();

  rl.on('line', (line) => {
    const trimmed = line.trim();
    if (!trimmed) {
      printPrompt();
      return;
    }
    handle(trimmed).catch((error: unknown) => {
      log.error('Command failed', { error: error instanceof Error ? error.message : String(error) });
      printPrompt();
    });
  });

  rl.on('close', () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
  });
}

// Check command line args
const args = process.argv.slice(2);
const run = args.includes('--auto') || args.includes('-a') ? runAutomatedDemo : main;
run().catch((error: unknown) => {
  log.error('Demo failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
