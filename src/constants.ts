// the root server the iterative walk starts from (a.root-servers.net)
export const DEFAULT_ROOT_SERVER = '198.41.0.4';

// the public recursive server used for stub (RD=1) queries if none is provided
export const DEFAULT_PUBLIC_DNS_SERVER = '1.1.1.1';

// standard DNS port
export const DNS_PORT = 53;

// record types with a structured representation, anything else decodes as opaque data
export const A_RECORD = 'A';
export const NS_RECORD = 'NS';
export const CNAME_RECORD = 'CNAME';
export const SOA_RECORD = 'SOA';
export const PTR_RECORD = 'PTR';
export const MX_RECORD = 'MX';
export const TXT_RECORD = 'TXT';
export const AAAA_RECORD = 'AAAA';
export const SRV_RECORD = 'SRV';

// numeric codes for the modeled record types
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-4
export const DNS_RECORD_CODES = {
  [A_RECORD]: 1, // a host address
  [NS_RECORD]: 2, // an authoritative name server
  [CNAME_RECORD]: 5, // the canonical name for an alias
  [SOA_RECORD]: 6, // marks the start of a zone of authority
  [PTR_RECORD]: 12, // a domain name pointer
  [MX_RECORD]: 15, // mail exchange
  [TXT_RECORD]: 16, // text strings
  [AAAA_RECORD]: 28, // IP6 Address
  [SRV_RECORD]: 33, // Server Selection
} as const;

// list of supported record types
export const DNS_RECORD_TYPES = [
  A_RECORD,
  NS_RECORD,
  CNAME_RECORD,
  SOA_RECORD,
  PTR_RECORD,
  MX_RECORD,
  TXT_RECORD,
  AAAA_RECORD,
  SRV_RECORD,
] as const;

// record types the resolver can return an address for
export const DNS_ADDRESS_RECORD_TYPES = [A_RECORD, AAAA_RECORD] as const;

// DNS record classes
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-2
export const DNS_RECORD_CLASSES = {
  IN: 1, // Internet
  CS: 2, // CSNET (obsolete)
  CH: 3, // CHAOS
  HS: 4, // Hesiod
  ANY: 255, // ANY (query class)
} as const;

// the only class with typed record data
export const CLASS_IN = DNS_RECORD_CLASSES.IN;

// dns packet header flags
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-12
export const FLAG_QUERY_RESPONSE = 'QR'; // set on responses
export const FLAG_AUTHORITATIVE_ANSWER = 'AA'; // Authoritative Answer: server is authoritative for this domain
export const FLAG_TRUNCATED_RESPONSE = 'TC'; // Truncated Response: response was truncated due to size limits
export const FLAG_RECURSION_DESIRED = 'RD'; // Recursion Desired: client requested recursive resolution
export const FLAG_RECURSION_AVAILABLE = 'RA'; // Recursion Available: server supports recursive queries
export const FLAG_AUTHENTIC_DATA = 'AD'; // Authentic Data: response data was authenticated via dnssec
export const FLAG_CHECKING_DISABLED = 'CD'; // Checking Disabled

// all dns header flags
export const DNS_FLAGS = {
  [FLAG_QUERY_RESPONSE]: 1 << 15, // 32768
  [FLAG_AUTHORITATIVE_ANSWER]: 1 << 10, // 1024
  [FLAG_TRUNCATED_RESPONSE]: 1 << 9, // 512
  [FLAG_RECURSION_DESIRED]: 1 << 8, // 256
  [FLAG_RECURSION_AVAILABLE]: 1 << 7, // 128
  [FLAG_AUTHENTIC_DATA]: 1 << 5, // 32
  [FLAG_CHECKING_DISABLED]: 1 << 4, // 16
} as const;

// wire format limits (RFC 1035 section 2.3.4)
export const HEADER_LENGTH = 12;
export const MAX_LABEL_LENGTH = 63;
export const MAX_NAME_LENGTH = 255;
export const MAX_CHARACTER_STRING_LENGTH = 255;

// the two top bits of a label length byte
export const LABEL_TYPE_MASK = 0b1100_0000;
export const LABEL_TYPE_POINTER = 0b1100_0000;
export const POINTER_OFFSET_MASK = 0b0011_1111;

// smallest wire size of a question (root name + type + class)
// and a record (root name + type + class + ttl + rdlength)
export const MIN_QUESTION_LENGTH = 5;
export const MIN_RECORD_LENGTH = 11;

// map of root servers to their IP addresses
// https://www.iana.org/domains/root/servers
// https://www.internic.net/domain/named.root
export const ROOT_SERVERS = {
  'a.root-servers.net': ['198.41.0.4', '2001:503:ba3e::2:30'],
  'b.root-servers.net': ['170.247.170.2', '2801:1b8:10::b'],
  'c.root-servers.net': ['192.33.4.12', '2001:500:2::c'],
  'd.root-servers.net': ['199.7.91.13', '2001:500:2d::d'],
  'e.root-servers.net': ['192.203.230.10', '2001:500:a8::e'],
  'f.root-servers.net': ['192.5.5.241', '2001:500:2f::f'],
  'g.root-servers.net': ['192.112.36.4', '2001:500:12::d0d'],
  'h.root-servers.net': ['198.97.190.53', '2001:500:1::53'],
  'i.root-servers.net': ['192.36.148.17', '2001:7fe::53'],
  'j.root-servers.net': ['192.58.128.30', '2001:503:c27::2:30'],
  'k.root-servers.net': ['193.0.14.129', '2001:7fd::1'],
  'l.root-servers.net': ['199.7.83.42', '2001:500:9f::42'],
  'm.root-servers.net': ['202.12.27.33', '2001:dc3::35'],
} as const;
