import type { Buffer } from 'buffer';
import {
  A_RECORD,
  AAAA_RECORD,
  CNAME_RECORD,
  MX_RECORD,
  NS_RECORD,
  PTR_RECORD,
  SOA_RECORD,
  SRV_RECORD,
  TXT_RECORD,
  DNS_ADDRESS_RECORD_TYPES,
  DNS_FLAGS,
  DNS_RECORD_CLASSES,
  DNS_RECORD_CODES,
  DNS_RECORD_TYPES,
} from './constants.js';

// a value read from a buffer and the offset just past it
export type Decoded<T> = [value: T, offset: number];

// a modeled DNS record type, e.g. 'A', 'MX'
export type DnsRecordType = (typeof DNS_RECORD_TYPES)[number];

// record types the resolver returns an address for
export type DnsAddressRecordType = (typeof DNS_ADDRESS_RECORD_TYPES)[number];

// case-insensitive version of DnsRecordType for better DX
export type RecordType = DnsRecordType | Lowercase<DnsRecordType>;

// the numeric code of a modeled record type
export type DnsRecordCode = (typeof DNS_RECORD_CODES)[DnsRecordType];

// the DNS record class mnemonic, e.g. 'IN'
export type DnsRecordClass = keyof typeof DNS_RECORD_CLASSES;

// any DNS header flag
export type DnsFlag = keyof typeof DNS_FLAGS;

//--------------------------------
// message model
//--------------------------------

export interface DnsHeader {
  id: number;
  flags: number; // RD is bit 8, every other bit passes through untouched
  questionCount: number;
  answerCount: number;
  authorityCount: number;
  additionalCount: number;
}

// type and class stay numeric so unmodeled values round-trip
export interface DnsQuestion {
  name: string;
  type: number;
  class: number;
}

// common base interface for all DNS records
interface BaseDnsRecord {
  name: string;
  ttl: number;
  class: number;
}

export interface ARecord extends BaseDnsRecord {
  type: typeof A_RECORD;
  address: string;
}

export interface AaaaRecord extends BaseDnsRecord {
  type: typeof AAAA_RECORD;
  address: string;
}

export interface NsRecord extends BaseDnsRecord {
  type: typeof NS_RECORD;
  target: string;
}

export interface CnameRecord extends BaseDnsRecord {
  type: typeof CNAME_RECORD;
  target: string;
}

export interface PtrRecord extends BaseDnsRecord {
  type: typeof PTR_RECORD;
  target: string;
}

export interface MxRecord extends BaseDnsRecord {
  type: typeof MX_RECORD;
  preference: number;
  exchange: string;
}

export interface SrvRecord extends BaseDnsRecord {
  type: typeof SRV_RECORD;
  priority: number;
  weight: number;
  port: number;
  target: string;
}

export interface SoaRecord extends BaseDnsRecord {
  type: typeof SOA_RECORD;
  masterName: string;
  responsibleName: string;
  serial: number;
  refresh: number;
  retry: number;
  expire: number;
  minimum: number;
}

export interface TxtRecord extends BaseDnsRecord {
  type: typeof TXT_RECORD;
  segments: string[];
}

// fallback for any class other than IN, unmodeled types,
// and A/AAAA data of the wrong length
export interface OpaqueRecord extends BaseDnsRecord {
  type: number;
  data: Buffer;
}

export type DnsRecord =
  | ARecord
  | AaaaRecord
  | NsRecord
  | CnameRecord
  | PtrRecord
  | MxRecord
  | SrvRecord
  | SoaRecord
  | TxtRecord
  | OpaqueRecord;

// records that carry an address
export type AddressRecord = ARecord | AaaaRecord;

export interface DnsMessage {
  header: DnsHeader;
  questions: DnsQuestion[];
  answers: DnsRecord[];
  authorities: DnsRecord[];
  additionals: DnsRecord[];
  trailingBytes: number; // bytes left over after the last section
}

//--------------------------------
// transport
//--------------------------------

export interface DnsTransportRequest {
  server: string; // nameserver IP address
  port: number;
  payload: Buffer;
  timeout: number; // in ms
  signal?: AbortSignal;
}

// one datagram round trip, resolves with the raw reply bytes
export interface DnsTransport {
  (request: DnsTransportRequest): Promise<Buffer>;
}

// produces a fresh 16-bit transaction id
export type TransactionIdGenerator = () => number;

//--------------------------------
// resolver
//--------------------------------

// configuration options for the resolver
// external API uses Partial<ResolverOptions>, internal uses full ResolverOptions
export interface ResolverOptions {
  rootServer: string; // where iterative resolution starts (default: a.root-servers.net)
  server: string; // recursive server for stub queries (default: 1.1.1.1)
  port: number; // nameserver port (default: 53)
  timeout: number; // per-query receive timeout in ms (default: 5000)
  maxDepth: number; // max queries per resolution, nested lookups included (default: 30)
  followCnames: boolean; // restart from the root at a CNAME target (default: true)
  verbose: boolean; // log every hop (default: false)
  signal?: AbortSignal; // bounds the whole resolution
  transport: DnsTransport; // sends a query and returns the reply (default: UDP)
  generateId: TransactionIdGenerator; // default: uniform random
}

// what a single query during resolution led to
export type DnsHopOutcome = 'answer' | 'glue' | 'referral' | 'cname';

// a single entry of a DNS resolution hop, with the details of the nameserver and query
export type DnsResolutionHop = {
  server: string;
  query: string;
  type: DnsAddressRecordType;
  depth: number; // 0 for the top-level walk, +1 per nested nameserver lookup
  outcome: DnsHopOutcome;
  next: string; // the address returned, the next nameserver, or the name looked up next
  elapsed: number; // ms
  bytes: number;
  timestamp: Date;
};

// result of an iterative resolution
export interface DnsResolution {
  query: string;
  type: DnsAddressRecordType;
  address: string;
  trace: DnsResolutionHop[];
}
