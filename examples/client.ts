// Storage gateway client -- Example
//
// Walks one operator through its whole life on a running gateway:
//   1. List the schemes the gateway can open (GET /schemes)
//   2. Open an operator (POST /operators)
//   3. Write an object, then read it back (PUT/GET /operators/:handle/objects/*)
//   4. Stat and list (GET /operators/:handle/stat/*, /list/*)
//   5. Delete the object and observe STORAGE_NOT_FOUND
//   6. Release the handle and observe STORAGE_USED_AFTER_RELEASE
//
// Usage:
//   SCHEME=memory tsx examples/client.ts
//
// Environment variables:
//   SERVER_URL  (optional) -- Gateway URL (default: http://localhost:3000)
//   SCHEME      (optional) -- Scheme to open (default: memory)
//   ROOT        (optional) -- Operator root passed as the "root" config key
//                             (the gateway must list "root" in clientKeys)
//   FILE_PATH   (optional) -- Path to a file to upload (default: generated text)

import { readFileSync } from 'node:fs';

import { GatewayClient, isOperationError } from '../src/sdk/index.js';

// ---------------------------------------------------------------------------
// Configuration from environment
// ---------------------------------------------------------------------------

const SERVER_URL = process.env.SERVER_URL ?? 'http://localhost:3000';
const SCHEME = process.env.SCHEME ?? 'memory';
const ROOT = process.env.ROOT;
const FILE_PATH = process.env.FILE_PATH;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function log(step: string, message: string): void {
  console.log(`\n[${'='.repeat(60)}]`);
  console.log(`[STEP] ${step}`);
  console.log(`       ${message}`);
  console.log(`[${'='.repeat(60)}]`);
}

function logDetail(label: string, value: string): void {
  console.log(`  ${label}: ${value}`);
}

/** Run a call that is expected to fail and report the error code it failed with */
async function expectFailure(call: () => Promise<unknown>): Promise<string> {
  try {
    await call();
  } catch (error) {
    if (isOperationError(error)) {
      return error.code;
    }
    throw error;
  }
  throw new Error('call succeeded but was expected to fail');
}

// ---------------------------------------------------------------------------
// Main flow
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  console.log('\n  Storage Gateway Client -- Example');
  console.log('  =================================\n');
  console.log(`  Server: ${SERVER_URL}`);
  console.log(`  Scheme: ${SCHEME}`);

  const client = new GatewayClient({ baseUrl: SERVER_URL });

  // ---- Step 1: Schemes ----
  log('1/6', 'Listing schemes (GET /schemes)');

  const schemes = await client.schemes();
  logDetail('Schemes', schemes.join(', '));

  if (!schemes.includes(SCHEME)) {
    console.error(`\nThe gateway does not offer scheme "${SCHEME}".`);
    process.exit(1);
  }

  // ---- Step 2: Open ----
  log('2/6', 'Opening an operator (POST /operators)');

  const opened = await client.open(SCHEME, ROOT ? { root: ROOT } : {});
  logDetail('Handle', opened.handle);
  logDetail('Capabilities', JSON.stringify(opened.capabilities));

  // ---- Step 3: Write and read ----
  log('3/6', 'Writing an object and reading it back');

  const content = FILE_PATH
    ? readFileSync(FILE_PATH)
    : Buffer.from(`stowage example written at ${new Date().toISOString()}`, 'utf-8');
  const path = 'examples/hello.txt';

  await client.write(opened.handle, path, content);
  const readBack = await client.read(opened.handle, path);

  logDetail('Written', `${content.length} bytes to ${path}`);
  logDetail(
    'Round-trip match',
    Buffer.compare(content, readBack) === 0 ? 'YES' : 'NO -- mismatch detected'
  );

  // ---- Step 4: Stat and list ----
  log('4/6', 'Stat and list');

  const stat = await client.stat(opened.handle, path);
  logDetail('Mode', stat.mode);
  logDetail('Content-Length', String(stat.contentLength));
  logDetail('Last modified', stat.lastModified?.toISOString() ?? 'unknown');

  if (opened.capabilities.list) {
    const entries = await client.list(opened.handle, 'examples/');
    logDetail('Entries', entries.map((entry) => entry.path).join(', '));
  } else {
    logDetail('Entries', `listing is not supported by ${SCHEME}`);
  }

  // ---- Step 5: Delete ----
  log('5/6', 'Deleting the object');

  await client.delete(opened.handle, path);
  logDetail('Read after delete', await expectFailure(() => client.read(opened.handle, path)));

  // ---- Step 6: Release ----
  log('6/6', 'Releasing the handle (DELETE /operators/:handle)');

  await client.release(opened.handle);
  logDetail('Read after release', await expectFailure(() => client.read(opened.handle, path)));
  await client.release(opened.handle);
  logDetail('Second release', 'accepted');

  console.log('\n  Operator lifecycle complete\n');
}

main().catch((error: unknown) => {
  console.error('\nFATAL:', error instanceof Error ? error.message : error);
  process.exit(1);
});
