#!/usr/bin/env node
import {
  AAAA_RECORD,
  A_RECORD,
  DnsResolver,
  PTR_RECORD,
  getRandomRootServer,
  isValidIp,
  reverseIp,
  toDnsError,
  toRecordType,
} from '../src/index.js';

// usage: resolve <name> [type] [--trace] [--verbose] [--random-root] [--server <ip>]
// without --server the name is walked from the root, with it a single RD query is sent
const args = process.argv.slice(2);
const serverIndex = args.indexOf('--server');
const server = serverIndex >= 0 ? args[serverIndex + 1] : undefined;
const flags = new Set(args.filter(arg => arg.startsWith('--')));
const positional = args.filter(
  (arg, i) => !arg.startsWith('--') && (serverIndex < 0 || i !== serverIndex + 1)
);
const query = positional[0] || 'example.com';

async function main() {
  const recordType = toRecordType(positional[1] || A_RECORD);
  const resolver = new DnsResolver({
    verbose: flags.has('--verbose'),
    ...(flags.has('--random-root') && { rootServer: getRandomRootServer() }),
  });

  // stub query against a recursive server, PTR lookups may give the IP itself
  if (server) {
    const name = recordType === PTR_RECORD && isValidIp(query) ? reverseIp(query) : query;
    const response = await resolver.query(name, recordType, server);
    console.log(JSON.stringify(response, null, 2));
    return;
  }

  const addressType = recordType === AAAA_RECORD ? AAAA_RECORD : A_RECORD;
  if (recordType !== addressType) {
    throw new Error(`Only A and AAAA can be walked from the root, use --server for ${recordType}`);
  }

  if (flags.has('--trace')) {
    console.log(JSON.stringify(await resolver.resolveTrace(query, addressType), null, 2));
    return;
  }
  console.log(await resolver.resolve(query, addressType));
}

main().catch((error: unknown) => {
  const dnsError = toDnsError(error);
  console.error(`${dnsError.name}: ${dnsError.message}`);
  process.exitCode = 1;
});
