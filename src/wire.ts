import { Buffer } from 'buffer';
import { InvalidFieldError, TruncatedBufferError } from './errors.js';
import type { Decoded } from './types.js';

// fixed-width big-endian integer codec shared by every section of a message

// throw unless `length` bytes are available at `offset`
export function ensureAvailable(buffer: Buffer, offset: number, length: number): void {
  if (offset < 0 || offset + length > buffer.length) {
    throw new TruncatedBufferError(
      `Need ${length} byte(s) at offset ${offset}, buffer is ${buffer.length} bytes`
    );
  }
}

export function readU8(buffer: Buffer, offset: number): Decoded<number> {
  ensureAvailable(buffer, offset, 1);
  return [buffer.readUInt8(offset), offset + 1];
}

export function readU16(buffer: Buffer, offset: number): Decoded<number> {
  ensureAvailable(buffer, offset, 2);
  return [buffer.readUInt16BE(offset), offset + 2];
}

export function readU32(buffer: Buffer, offset: number): Decoded<number> {
  ensureAvailable(buffer, offset, 4);
  return [buffer.readUInt32BE(offset), offset + 4];
}

// copy `length` raw bytes starting at `offset`
export function readBytes(buffer: Buffer, offset: number, length: number): Decoded<Buffer> {
  ensureAvailable(buffer, offset, length);
  return [Buffer.from(buffer.subarray(offset, offset + length)), offset + length];
}

function checkUnsigned(value: number, bits: 8 | 16 | 32): void {
  if (!Number.isInteger(value) || value < 0 || value > 2 ** bits - 1) {
    throw new InvalidFieldError(`Value ${value} does not fit in an unsigned ${bits}-bit field`);
  }
}

export function writeU8(value: number): Buffer {
  checkUnsigned(value, 8);
  const buffer = Buffer.alloc(1);
  buffer.writeUInt8(value, 0);
  return buffer;
}

export function writeU16(value: number): Buffer {
  checkUnsigned(value, 16);
  const buffer = Buffer.alloc(2);
  buffer.writeUInt16BE(value, 0);
  return buffer;
}

export function writeU32(value: number): Buffer {
  checkUnsigned(value, 32);
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32BE(value, 0);
  return buffer;
}
