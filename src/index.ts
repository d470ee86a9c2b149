import {
  A_RECORD,
  DEFAULT_PUBLIC_DNS_SERVER,
  DEFAULT_ROOT_SERVER,
  DNS_ADDRESS_RECORD_TYPES,
  DNS_PORT,
  NS_RECORD,
  CNAME_RECORD,
} from './constants.js';
import {
  AbortError,
  ConfigurationError,
  InvalidResponseError,
  NoResolutionPathError,
  ResolutionDepthExceededError,
} from './errors.js';
import { buildQuery, decodeMessage } from './packets.js';
import { udpTransport } from './transports/udp.js';
import type {
  AddressRecord,
  ARecord,
  CnameRecord,
  DnsAddressRecordType,
  DnsHopOutcome,
  DnsMessage,
  DnsRecordType,
  DnsResolution,
  DnsResolutionHop,
  NsRecord,
  RecordType,
  ResolverOptions,
} from './types.js';
import { isValidIp, normalizeHost, randomTransactionId, toRecordType } from './utils.js';

// default options for DnsResolver
export const DEFAULT_OPTIONS: ResolverOptions = {
  rootServer: DEFAULT_ROOT_SERVER, // iterative resolution starts here
  server: DEFAULT_PUBLIC_DNS_SERVER, // recursive server for stub queries
  port: DNS_PORT,
  timeout: 5_000, // timeout in ms
  maxDepth: 30, // max queries per resolution
  followCnames: true, // restart at the canonical name when only a CNAME comes back
  verbose: false, // log every hop
  transport: udpTransport, // one UDP datagram round trip
  generateId: randomTransactionId, // fresh 16-bit transaction id per query
};

// a decoded reply and what it cost
interface DnsExchange {
  response: DnsMessage;
  elapsed: number;
  bytes: number;
}

// upper-case a record type and require one the resolver can return an address for
function toAddressRecordType(type: string): DnsAddressRecordType {
  const recordType = toRecordType(type);
  const addressType = DNS_ADDRESS_RECORD_TYPES.find(t => t === recordType);
  if (!addressType) {
    throw new ConfigurationError(`Cannot resolve an address from record type: ${recordType}`);
  }
  return addressType;
}

// first answer of the requested address type, whatever name it is under
export function findAnswer(response: DnsMessage, type: DnsAddressRecordType): AddressRecord | null {
  return (
    response.answers.find((record): record is AddressRecord => record.type === type) ?? null
  );
}

// glue: an additional A record for one of the nameservers the reply refers to
// when the reply names no nameserver, any additional A record will do
export function findGlueAddress(response: DnsMessage): string | null {
  const nameservers = response.authorities
    .filter((record): record is NsRecord => record.type === NS_RECORD)
    .map(record => record.target.toLowerCase());
  const glue = response.additionals.filter((record): record is ARecord => record.type === A_RECORD);
  const match =
    nameservers.length > 0
      ? glue.find(record => nameservers.includes(record.name.toLowerCase()))
      : glue[0];
  return match?.address ?? null;
}

// the first nameserver named in the authority section
export function findReferral(response: DnsMessage): string | null {
  const nsRecord = response.authorities.find(
    (record): record is NsRecord => record.type === NS_RECORD
  );
  return nsRecord?.target ?? null;
}

// the canonical name an alias answer points to
export function findCanonicalName(response: DnsMessage): string | null {
  const cname = response.answers.find(
    (record): record is CnameRecord => record.type === CNAME_RECORD
  );
  return cname?.target ?? null;
}

export class DnsResolver {
  // the resolver-level options
  options: ResolverOptions;

  constructor(opts?: Partial<ResolverOptions>) {
    this.options = this.getOptions(opts);
  }

  // process partial options into full ResolverOptions with all defaults
  protected getOptions(opts: Partial<ResolverOptions> = {}): ResolverOptions {
    const options: ResolverOptions = {
      ...DEFAULT_OPTIONS,
      ...opts,
    };

    if (!isValidIp(options.rootServer)) {
      throw new ConfigurationError(`Root server must be an IP address: ${options.rootServer}`);
    }
    if (!isValidIp(options.server)) {
      throw new ConfigurationError(`Server must be an IP address: ${options.server}`);
    }
    if (!Number.isInteger(options.port) || options.port < 1 || options.port > 0xffff) {
      throw new ConfigurationError(`Invalid port: ${options.port}`);
    }
    if (!Number.isFinite(options.timeout) || options.timeout <= 0) {
      throw new ConfigurationError(`Timeout must be a positive number of ms: ${options.timeout}`);
    }
    if (!Number.isInteger(options.maxDepth) || options.maxDepth < 1) {
      throw new ConfigurationError(`maxDepth must be a positive integer: ${options.maxDepth}`);
    }
    return options;
  }

  // walk from the root to an address for `domain`
  public async resolve(
    domain: string,
    type: DnsAddressRecordType | Lowercase<DnsAddressRecordType> = A_RECORD
  ): Promise<string> {
    const { address } = await this.resolveTrace(domain, type);
    return address;
  }

  // walk from the root to an address for `domain`, keeping every hop
  public async resolveTrace(
    domain: string,
    type: DnsAddressRecordType | Lowercase<DnsAddressRecordType> = A_RECORD
  ): Promise<DnsResolution> {
    const recordType = toAddressRecordType(type);
    const query = normalizeHost(domain);
    const trace: DnsResolutionHop[] = [];
    const address = await this.walk(query, recordType, 0, trace);
    return { query, type: recordType, address, trace };
  }

  // single query with recursion desired, for use against a recursive server
  public async query(
    domain: string,
    type: RecordType = A_RECORD,
    server: string = this.options.server
  ): Promise<DnsMessage> {
    if (!isValidIp(server)) {
      throw new ConfigurationError(`Server must be an IP address: ${server}`);
    }
    const { response } = await this.exchange(server, normalizeHost(domain), toRecordType(type), true);
    return response;
  }

  // iterative resolution, `depth` counts nested nameserver lookups
  // `trace` is shared with nested walks so the query budget covers all of them
  protected async walk(
    name: string,
    type: DnsAddressRecordType,
    depth: number,
    trace: DnsResolutionHop[]
  ): Promise<string> {
    let nameserver = this.options.rootServer;
    let query = name;

    for (;;) {
      if (trace.length >= this.options.maxDepth) {
        throw new ResolutionDepthExceededError(
          `Gave up resolving '${name}' after ${trace.length} queries (maxDepth ${this.options.maxDepth})`
        );
      }

      const server = nameserver;
      const { response, elapsed, bytes } = await this.exchange(server, query, type, false);
      const addHop = (outcome: DnsHopOutcome, next: string) => {
        trace.push({
          server,
          query,
          type,
          depth,
          outcome,
          next,
          elapsed,
          bytes,
          timestamp: new Date(),
        });
      };

      // terminal: the server answered with an address
      const answer = findAnswer(response, type);
      if (answer) {
        addHop('answer', answer.address);
        return answer.address;
      }

      // referral with glue: continue at the nameserver's address
      const glue = findGlueAddress(response);
      if (glue) {
        addHop('glue', glue);
        nameserver = glue;
        continue;
      }

      // referral without glue: look up the nameserver's own address first
      const referral = findReferral(response);
      if (referral) {
        addHop('referral', referral);
        nameserver = await this.walk(normalizeHost(referral), A_RECORD, depth + 1, trace);
        continue;
      }

      // alias only: start over at the canonical name
      const canonicalName = this.options.followCnames ? findCanonicalName(response) : null;
      if (canonicalName) {
        addHop('cname', canonicalName);
        query = normalizeHost(canonicalName);
        nameserver = this.options.rootServer;
        continue;
      }

      throw new NoResolutionPathError(
        `No answer, glue or referral for '${query}' (${type}) from '${server}'`
      );
    }
  }

  // send one query and decode the reply
  protected async exchange(
    server: string,
    name: string,
    type: DnsRecordType,
    recursionDesired: boolean
  ): Promise<DnsExchange> {
    if (this.options.signal?.aborted) {
      throw new AbortError(`Resolution of '${name}' was aborted`);
    }

    const id = this.options.generateId();
    const payload = buildQuery(name, type, { id, recursionDesired });

    if (this.options.verbose) {
      console.log(`Querying ${server} for ${name} (${type})`);
    }

    // track query elapsed time
    const startTime = performance.now();
    const reply = await this.options.transport({
      server,
      port: this.options.port,
      payload,
      timeout: this.options.timeout,
      signal: this.options.signal,
    });
    const elapsed = Math.round(performance.now() - startTime);

    const response = decodeMessage(reply);
    if (response.header.id !== id) {
      throw new InvalidResponseError(
        `Reply from '${server}' has id ${response.header.id}, expected ${id}`
      );
    }
    if (response.trailingBytes > 0) {
      console.warn(`Reply from '${server}' has ${response.trailingBytes} trailing byte(s)`);
    }

    return { response, elapsed, bytes: reply.length };
  }
}

// export types and constants
export type * from './types.js';
export * from './constants.js';
export * from './utils.js';
export * from './errors.js';
export * from './wire.js';
export * from './names.js';
export * from './packets.js';
export { udpTransport } from './transports/udp.js';
