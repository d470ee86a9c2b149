import { Buffer } from 'buffer';
import {
  A_RECORD,
  AAAA_RECORD,
  CLASS_IN,
  CNAME_RECORD,
  DNS_FLAGS,
  DNS_RECORD_CODES,
  DNS_RECORD_TYPES,
  FLAG_RECURSION_DESIRED,
  HEADER_LENGTH,
  MAX_CHARACTER_STRING_LENGTH,
  MIN_QUESTION_LENGTH,
  MIN_RECORD_LENGTH,
  MX_RECORD,
  NS_RECORD,
  PTR_RECORD,
  SOA_RECORD,
  SRV_RECORD,
  TXT_RECORD,
} from './constants.js';
import { InvalidFieldError, TruncatedBufferError } from './errors.js';
import { decodeName, encodeName } from './names.js';
import type {
  Decoded,
  DnsHeader,
  DnsMessage,
  DnsQuestion,
  DnsRecord,
  DnsRecordCode,
  DnsRecordType,
  OpaqueRecord,
} from './types.js';
import { formatIpv4, formatIpv6, parseIpv4, parseIpv6 } from './utils.js';
import { ensureAvailable, readBytes, readU16, readU32, readU8, writeU16, writeU32 } from './wire.js';

// numeric code for a modeled record type
export function getRecordTypeCode(type: DnsRecordType): DnsRecordCode {
  return DNS_RECORD_CODES[type];
}

// mnemonic for a numeric record type code, null when the type is not modeled
export function getRecordTypeName(code: number): DnsRecordType | null {
  return DNS_RECORD_TYPES.find(type => DNS_RECORD_CODES[type] === code) ?? null;
}

//-----------------------------------------
// header
//-----------------------------------------

export function encodeHeader(header: DnsHeader): Buffer {
  return Buffer.concat([
    writeU16(header.id),
    writeU16(header.flags),
    writeU16(header.questionCount),
    writeU16(header.answerCount),
    writeU16(header.authorityCount),
    writeU16(header.additionalCount),
  ]);
}

export function decodeHeader(buffer: Buffer, offset = 0): Decoded<DnsHeader> {
  ensureAvailable(buffer, offset, HEADER_LENGTH);
  const [id, afterId] = readU16(buffer, offset);
  const [flags, afterFlags] = readU16(buffer, afterId);
  const [questionCount, afterQuestions] = readU16(buffer, afterFlags);
  const [answerCount, afterAnswers] = readU16(buffer, afterQuestions);
  const [authorityCount, afterAuthorities] = readU16(buffer, afterAnswers);
  const [additionalCount, end] = readU16(buffer, afterAuthorities);
  return [{ id, flags, questionCount, answerCount, authorityCount, additionalCount }, end];
}

//-----------------------------------------
// question
//-----------------------------------------

export function encodeQuestion(question: DnsQuestion): Buffer {
  return Buffer.concat([
    encodeName(question.name),
    writeU16(question.type),
    writeU16(question.class),
  ]);
}

export function decodeQuestion(buffer: Buffer, offset: number): Decoded<DnsQuestion> {
  const [name, afterName] = decodeName(buffer, offset);
  const [type, afterType] = readU16(buffer, afterName);
  const [qclass, end] = readU16(buffer, afterType);
  return [{ name, type, class: qclass }, end];
}

//-----------------------------------------
// resource records
//-----------------------------------------

// encode one character-string (RFC 1035 section 3.3)
function encodeCharacterString(value: string): Buffer {
  const bytes = Buffer.from(value, 'utf8');
  if (bytes.length > MAX_CHARACTER_STRING_LENGTH) {
    throw new InvalidFieldError(
      `Text segment is ${bytes.length} bytes, the limit is ${MAX_CHARACTER_STRING_LENGTH}`
    );
  }
  return Buffer.concat([Buffer.from([bytes.length]), bytes]);
}

// opaque records keep their numeric type code
export function isOpaqueRecord(record: DnsRecord): record is OpaqueRecord {
  return typeof record.type === 'number';
}

// encode the rdata of a record, names are written uncompressed
export function encodeRecordData(record: DnsRecord): Buffer {
  if (isOpaqueRecord(record)) {
    return Buffer.from(record.data);
  }

  switch (record.type) {
    case A_RECORD:
      return parseIpv4(record.address);

    case AAAA_RECORD:
      return parseIpv6(record.address);

    case NS_RECORD:
    case CNAME_RECORD:
    case PTR_RECORD:
      return encodeName(record.target);

    case MX_RECORD:
      return Buffer.concat([writeU16(record.preference), encodeName(record.exchange)]);

    case SRV_RECORD:
      return Buffer.concat([
        writeU16(record.priority),
        writeU16(record.weight),
        writeU16(record.port),
        encodeName(record.target),
      ]);

    case SOA_RECORD:
      return Buffer.concat([
        encodeName(record.masterName),
        encodeName(record.responsibleName),
        writeU32(record.serial),
        writeU32(record.refresh),
        writeU32(record.retry),
        writeU32(record.expire),
        writeU32(record.minimum),
      ]);

    case TXT_RECORD:
      return Buffer.concat(record.segments.map(encodeCharacterString));
  }
}

export function encodeRecord(record: DnsRecord): Buffer {
  const type = isOpaqueRecord(record) ? record.type : getRecordTypeCode(record.type);
  const data = encodeRecordData(record);
  return Buffer.concat([
    encodeName(record.name),
    writeU16(type),
    writeU16(record.class),
    writeU32(record.ttl),
    writeU16(data.length),
    data,
  ]);
}

// the fixed fields that precede every record's data
interface RecordFields {
  name: string;
  type: number;
  class: number;
  ttl: number;
}

// decode a name inside record data, its inline bytes must stay within the record
function decodeNameWithin(buffer: Buffer, offset: number, dataEnd: number): Decoded<string> {
  const [name, end] = decodeName(buffer, offset);
  if (end > dataEnd) {
    throw new TruncatedBufferError(
      `Name at offset ${offset} runs past the record data ending at ${dataEnd}`
    );
  }
  return [name, end];
}

// read a fixed-width field inside record data
function readWithin(
  read: (buffer: Buffer, offset: number) => Decoded<number>,
  buffer: Buffer,
  offset: number,
  dataEnd: number
): Decoded<number> {
  const [value, end] = read(buffer, offset);
  if (end > dataEnd) {
    throw new TruncatedBufferError(
      `Field at offset ${offset} runs past the record data ending at ${dataEnd}`
    );
  }
  return [value, end];
}

// decode consecutive character-strings filling the record data exactly
function decodeTextSegments(buffer: Buffer, dataOffset: number, dataEnd: number): string[] {
  const segments: string[] = [];
  let cursor = dataOffset;
  while (cursor < dataEnd) {
    const [length, start] = readU8(buffer, cursor);
    if (start + length > dataEnd) {
      throw new TruncatedBufferError(
        `Text segment at offset ${cursor} needs ${length} byte(s), record data ends at ${dataEnd}`
      );
    }
    segments.push(buffer.toString('utf8', start, start + length));
    cursor = start + length;
  }
  return segments;
}

// pick the record variant for (type, class) and decode its data
export function decodeRecordData(
  buffer: Buffer,
  fields: RecordFields,
  dataOffset: number,
  dataLength: number
): DnsRecord {
  const dataEnd = dataOffset + dataLength;
  const [raw] = readBytes(buffer, dataOffset, dataLength);
  const opaque: DnsRecord = { ...fields, data: raw };

  // only the Internet class has typed record data
  if (fields.class !== CLASS_IN) {
    return opaque;
  }

  const recordType = getRecordTypeName(fields.type);
  const { name, ttl } = fields;
  const base = { name, ttl, class: fields.class };
  switch (recordType) {
    case A_RECORD:
      return dataLength === 4 ? { ...base, type: A_RECORD, address: formatIpv4(raw) } : opaque;

    case AAAA_RECORD:
      return dataLength === 16 ? { ...base, type: AAAA_RECORD, address: formatIpv6(raw) } : opaque;

    case NS_RECORD:
    case CNAME_RECORD:
    case PTR_RECORD: {
      const [target] = decodeNameWithin(buffer, dataOffset, dataEnd);
      return { ...base, type: recordType, target };
    }

    case MX_RECORD: {
      const [preference, afterPreference] = readWithin(readU16, buffer, dataOffset, dataEnd);
      const [exchange] = decodeNameWithin(buffer, afterPreference, dataEnd);
      return { ...base, type: MX_RECORD, preference, exchange };
    }

    case SRV_RECORD: {
      const [priority, afterPriority] = readWithin(readU16, buffer, dataOffset, dataEnd);
      const [weight, afterWeight] = readWithin(readU16, buffer, afterPriority, dataEnd);
      const [port, afterPort] = readWithin(readU16, buffer, afterWeight, dataEnd);
      const [target] = decodeNameWithin(buffer, afterPort, dataEnd);
      return { ...base, type: SRV_RECORD, priority, weight, port, target };
    }

    case SOA_RECORD: {
      const [masterName, afterMaster] = decodeNameWithin(buffer, dataOffset, dataEnd);
      const [responsibleName, afterResponsible] = decodeNameWithin(buffer, afterMaster, dataEnd);
      const [serial, afterSerial] = readWithin(readU32, buffer, afterResponsible, dataEnd);
      const [refresh, afterRefresh] = readWithin(readU32, buffer, afterSerial, dataEnd);
      const [retry, afterRetry] = readWithin(readU32, buffer, afterRefresh, dataEnd);
      const [expire, afterExpire] = readWithin(readU32, buffer, afterRetry, dataEnd);
      const [minimum] = readWithin(readU32, buffer, afterExpire, dataEnd);
      return {
        ...base,
        type: SOA_RECORD,
        masterName,
        responsibleName,
        serial,
        refresh,
        retry,
        expire,
        minimum,
      };
    }

    case TXT_RECORD:
      return { ...base, type: TXT_RECORD, segments: decodeTextSegments(buffer, dataOffset, dataEnd) };

    default:
      return opaque;
  }
}

// decode one record, the cursor always lands on the declared end of its data
export function decodeRecord(buffer: Buffer, offset: number): Decoded<DnsRecord> {
  const [name, afterName] = decodeName(buffer, offset);
  const [type, afterType] = readU16(buffer, afterName);
  const [rclass, afterClass] = readU16(buffer, afterType);
  const [ttl, afterTtl] = readU32(buffer, afterClass);
  const [dataLength, dataOffset] = readU16(buffer, afterTtl);
  ensureAvailable(buffer, dataOffset, dataLength);

  const record = decodeRecordData(buffer, { name, type, class: rclass, ttl }, dataOffset, dataLength);
  return [record, dataOffset + dataLength];
}

//-----------------------------------------
// messages
//-----------------------------------------

// header for an outbound query with a single question
export function createQueryHeader(id: number, recursionDesired: boolean): DnsHeader {
  return {
    id,
    flags: recursionDesired ? DNS_FLAGS[FLAG_RECURSION_DESIRED] : 0,
    questionCount: 1,
    answerCount: 0,
    authorityCount: 0,
    additionalCount: 0,
  };
}

// encode an outbound query, only one question and no records are ever sent
export function encodeQuery(header: DnsHeader, question: DnsQuestion): Buffer {
  if (
    header.questionCount !== 1 ||
    header.answerCount !== 0 ||
    header.authorityCount !== 0 ||
    header.additionalCount !== 0
  ) {
    throw new InvalidFieldError(
      `A query carries exactly one question and no records, got counts ` +
        `${header.questionCount}/${header.answerCount}/${header.authorityCount}/${header.additionalCount}`
    );
  }
  return Buffer.concat([encodeHeader(header), encodeQuestion(question)]);
}

export interface QueryOptions {
  id: number;
  recursionDesired: boolean;
}

// create the wire form of a query for `name`
export function buildQuery(name: string, type: DnsRecordType, options: QueryOptions): Buffer {
  return encodeQuery(createQueryHeader(options.id, options.recursionDesired), {
    name,
    type: getRecordTypeCode(type),
    class: CLASS_IN,
  });
}

function decodeRecords(buffer: Buffer, offset: number, count: number): Decoded<DnsRecord[]> {
  const records: DnsRecord[] = [];
  let cursor = offset;
  for (let i = 0; i < count; i++) {
    const [record, next] = decodeRecord(buffer, cursor);
    records.push(record);
    cursor = next;
  }
  return [records, cursor];
}

// decode a full message, reading exactly as many entries as the header declares
export function decodeMessage(buffer: Buffer): DnsMessage {
  const [header, afterHeader] = decodeHeader(buffer, 0);

  // reject counts that cannot possibly fit before reading any section
  const recordCount = header.answerCount + header.authorityCount + header.additionalCount;
  const minimumLength =
    header.questionCount * MIN_QUESTION_LENGTH + recordCount * MIN_RECORD_LENGTH;
  if (afterHeader + minimumLength > buffer.length) {
    throw new TruncatedBufferError(
      `Header declares ${header.questionCount} question(s) and ${recordCount} record(s), ` +
        `which need at least ${minimumLength} byte(s), only ${buffer.length - afterHeader} remain`
    );
  }

  const questions: DnsQuestion[] = [];
  let cursor = afterHeader;
  for (let i = 0; i < header.questionCount; i++) {
    const [question, next] = decodeQuestion(buffer, cursor);
    questions.push(question);
    cursor = next;
  }

  const [answers, afterAnswers] = decodeRecords(buffer, cursor, header.answerCount);
  const [authorities, afterAuthorities] = decodeRecords(buffer, afterAnswers, header.authorityCount);
  const [additionals, end] = decodeRecords(buffer, afterAuthorities, header.additionalCount);

  return {
    header,
    questions,
    answers,
    authorities,
    additionals,
    trailingBytes: buffer.length - end,
  };
}
