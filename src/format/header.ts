/**
 * Compressed container format.
 *
 * A container holds everything needed to decompress:
 * - Magic bytes for identification
 * - Version for format compatibility
 * - Symbol count and final-byte valid-bit count of the payload
 * - Serialized tree and payload lengths
 * - Checksum of the original symbol stream
 *
 * Layout: [header: 24 bytes][tree bytes][payload bytes]
 */

import { MalformedPayloadError } from '../errors.js';
import { validatePacking } from '../core/bit-stream.js';

/**
 * Magic bytes identifying a container.
 * "HUFC" in ASCII.
 */
export const MAGIC_BYTES = new Uint8Array([0x48, 0x55, 0x46, 0x43]);

/**
 * Current format version.
 */
export const FORMAT_VERSION = 1;

/**
 * Header size in bytes.
 */
export const HEADER_SIZE = 24;

/**
 * Container header structure.
 */
export interface CompressedHeader {
  /** Magic bytes: "HUFC" */
  magic: Uint8Array;

  /** Format version */
  version: number;

  /** Valid bits in the final payload byte (0 for an empty payload) */
  validBitsInLastByte: number;

  /** Number of symbols encoded */
  symbolCount: number;

  /** Length of the serialized tree in bytes (0 when there are no symbols) */
  treeLength: number;

  /** Length of the packed payload in bytes */
  payloadLength: number;

  /** FNV-1a checksum of the original symbols */
  checksum: number;
}

/**
 * Parts of a container after splitting.
 */
export interface ContainerParts {
  header: CompressedHeader;
  tree: Uint8Array;
  payload: Uint8Array;
}

/**
 * Create a header for a container.
 */
export function createHeader(
  symbolCount: number,
  validBitsInLastByte: number,
  treeLength: number,
  payloadLength: number,
  checksum: number
): CompressedHeader {
  return {
    magic: new Uint8Array(MAGIC_BYTES),
    version: FORMAT_VERSION,
    validBitsInLastByte,
    symbolCount,
    treeLength,
    payloadLength,
    checksum,
  };
}

/**
 * Serialize a header to bytes.
 */
export function serializeHeader(header: CompressedHeader): Uint8Array {
  const buffer = new ArrayBuffer(HEADER_SIZE);
  const view = new DataView(buffer);
  const bytes = new Uint8Array(buffer);

  // Magic (4 bytes)
  bytes.set(header.magic, 0);

  // Version (1 byte)
  view.setUint8(4, header.version);

  // Valid bits in last payload byte (1 byte)
  view.setUint8(5, header.validBitsInLastByte);

  // Reserved (2 bytes) stay zero

  // Symbol count (4 bytes, little-endian)
  view.setUint32(8, header.symbolCount, true);

  // Tree length (4 bytes, little-endian)
  view.setUint32(12, header.treeLength, true);

  // Payload length (4 bytes, little-endian)
  view.setUint32(16, header.payloadLength, true);

  // Checksum (4 bytes, little-endian)
  view.setUint32(20, header.checksum, true);

  return bytes;
}

/**
 * Deserialize a header from bytes.
 */
export function deserializeHeader(data: Uint8Array): CompressedHeader {
  if (data.length < HEADER_SIZE) {
    throw new MalformedPayloadError(
      `Invalid header: expected ${HEADER_SIZE} bytes, got ${data.length}`
    );
  }

  if (!isHuffmanContainer(data)) {
    throw new MalformedPayloadError('Invalid file format: magic bytes mismatch');
  }

  const view = new DataView(data.buffer, data.byteOffset, HEADER_SIZE);

  const version = view.getUint8(4);
  if (version < 1 || version > FORMAT_VERSION) {
    throw new MalformedPayloadError(
      `Unsupported format version: ${version} (supported: 1..${FORMAT_VERSION})`
    );
  }

  if (view.getUint16(6, true) !== 0) {
    throw new MalformedPayloadError('Invalid header: reserved bytes must be zero');
  }

  return {
    magic: data.slice(0, 4),
    version,
    validBitsInLastByte: view.getUint8(5),
    symbolCount: view.getUint32(8, true),
    treeLength: view.getUint32(12, true),
    payloadLength: view.getUint32(16, true),
    checksum: view.getUint32(20, true),
  };
}

/**
 * Combine header, serialized tree and payload into a single buffer.
 */
export function combineHeaderAndPayload(
  header: Uint8Array,
  tree: Uint8Array,
  payload: Uint8Array
): Uint8Array {
  const result = new Uint8Array(header.length + tree.length + payload.length);
  result.set(header, 0);
  result.set(tree, header.length);
  result.set(payload, header.length + tree.length);
  return result;
}

/**
 * Split a container into header, tree bytes and payload bytes.
 * Bytes past the declared payload are ignored with a warning.
 */
export function splitHeaderAndPayload(data: Uint8Array): ContainerParts {
  const header = deserializeHeader(data);
  validatePacking(header.payloadLength, header.validBitsInLastByte);

  const treeEnd = HEADER_SIZE + header.treeLength;
  const payloadEnd = treeEnd + header.payloadLength;
  if (payloadEnd > data.length) {
    throw new MalformedPayloadError(
      `Container truncated: header declares ${payloadEnd} bytes, got ${data.length}`
    );
  }
  if (payloadEnd < data.length) {
    console.warn(
      `Ignoring ${data.length - payloadEnd} trailing bytes after compressed payload`
    );
  }

  return {
    header,
    tree: data.slice(HEADER_SIZE, treeEnd),
    payload: data.slice(treeEnd, payloadEnd),
  };
}

/**
 * Check if data starts with the container magic bytes.
 */
export function isHuffmanContainer(data: Uint8Array): boolean {
  if (data.length < 4) return false;
  return (
    data[0] === MAGIC_BYTES[0] &&
    data[1] === MAGIC_BYTES[1] &&
    data[2] === MAGIC_BYTES[2] &&
    data[3] === MAGIC_BYTES[3]
  );
}
