import { Buffer } from 'buffer';
import {
  LABEL_TYPE_MASK,
  LABEL_TYPE_POINTER,
  MAX_LABEL_LENGTH,
  MAX_NAME_LENGTH,
  POINTER_OFFSET_MASK,
} from './constants.js';
import {
  CompressionCycleError,
  InvalidLabelError,
  InvalidNameError,
  TruncatedBufferError,
} from './errors.js';
import type { Decoded } from './types.js';
import { readU8 } from './wire.js';

// domain names on the wire: a run of length-prefixed labels ended by a zero byte,
// or cut short by a 2-byte pointer to labels elsewhere in the same message
// https://www.rfc-editor.org/rfc/rfc1035#section-4.1.4

const ASCII_PATTERN = /^[\x00-\x7f]*$/;

function isAscii(bytes: Uint8Array): boolean {
  return bytes.every(byte => byte < 0x80);
}

// encode a dotted name as uncompressed labels
export function encodeName(name: string): Buffer {
  // a single trailing dot marks a fully qualified name, '' and '.' are the root
  const dotted = name.endsWith('.') ? name.slice(0, -1) : name;
  if (dotted === '') {
    return Buffer.from([0]);
  }

  const chunks: Buffer[] = [];
  for (const label of dotted.split('.')) {
    if (!ASCII_PATTERN.test(label)) {
      throw new InvalidNameError(`Label '${label}' in name '${name}' is not ASCII`);
    }
    const bytes = Buffer.from(label, 'ascii');
    if (bytes.length === 0) {
      throw new InvalidNameError(`Empty label in name '${name}'`);
    }
    if (bytes.length > MAX_LABEL_LENGTH) {
      throw new InvalidNameError(
        `Label '${label}' is ${bytes.length} bytes, the limit is ${MAX_LABEL_LENGTH}`
      );
    }
    chunks.push(Buffer.from([bytes.length]), bytes);
  }
  chunks.push(Buffer.from([0]));

  const encoded = Buffer.concat(chunks);
  if (encoded.length > MAX_NAME_LENGTH) {
    throw new InvalidNameError(
      `Name '${name}' is ${encoded.length} bytes on the wire, the limit is ${MAX_NAME_LENGTH}`
    );
  }
  return encoded;
}

// decode a possibly compressed name starting at `offset`
// the returned offset is just past the first terminator (zero byte or pointer pair)
// of the labels at `offset`, wherever the pointers lead afterwards
export function decodeName(buffer: Buffer, offset: number): Decoded<string> {
  const labels: string[] = [];
  const end = readLabels(buffer, offset, labels, new Set([offset]));
  return [labels.join('.'), end];
}

// append the labels found at `offset` and return the offset after their terminator
// `visited` holds every offset decoding has started or jumped to for one top-level name
export function readLabels(
  buffer: Buffer,
  offset: number,
  labels: string[],
  visited: Set<number>
): number {
  let cursor = offset;
  for (;;) {
    const [length, next] = readU8(buffer, cursor);

    // end of name
    if (length === 0) {
      return next;
    }

    // compression pointer: 14-bit absolute offset from the start of the message
    if ((length & LABEL_TYPE_MASK) === LABEL_TYPE_POINTER) {
      const [low, after] = readU8(buffer, next);
      const pointer = ((length & POINTER_OFFSET_MASK) << 8) | low;
      if (visited.has(pointer)) {
        throw new CompressionCycleError(
          `Compression pointer at offset ${cursor} revisits offset ${pointer}`
        );
      }
      visited.add(pointer);
      readLabels(buffer, pointer, labels, visited);
      return after;
    }

    // 0b01 and 0b10 prefixes are reserved (RFC 6891 section 5)
    if ((length & LABEL_TYPE_MASK) !== 0) {
      throw new InvalidLabelError(
        `Unsupported label type 0x${length.toString(16)} at offset ${cursor}`
      );
    }

    const labelEnd = next + length;
    if (labelEnd > buffer.length) {
      throw new TruncatedBufferError(
        `Label at offset ${cursor} needs ${length} byte(s), buffer is ${buffer.length} bytes`
      );
    }
    const bytes = buffer.subarray(next, labelEnd);
    if (!isAscii(bytes)) {
      throw new InvalidLabelError(`Label at offset ${cursor} is not ASCII`);
    }
    labels.push(bytes.toString('ascii'));
    cursor = labelEnd;
  }
}
