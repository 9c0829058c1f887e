/**
 * Serialized tree formats.
 *
 * Record form: nested `{ kind, symbol }` / `{ kind, left, right }` objects,
 * safe to pass through JSON. Untrusted records go through
 * {@link parseSerializedTree}.
 *
 * Byte form, pre-order:
 * - `0x00` internal node, followed by its left then right subtree
 * - `0x01` leaf, followed by the symbol as unsigned LEB128
 */

import { z } from 'zod';
import { MalformedPayloadError } from '../errors.js';
import type { HuffmanNode, SerializedTree } from '../core/huffman-tree.js';
import { MAX_SYMBOL } from '../core/symbols.js';

export const TAG_INTERNAL = 0x00;
export const TAG_LEAF = 0x01;

/**
 * Schema for one node of the record form. Children are checked when the
 * walk reaches them, so nesting depth never turns into call depth. Extra
 * keys (such as `frequency`) are stripped.
 */
export const TreeNodeRecordSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('leaf'),
    symbol: z.number().int().min(0).max(MAX_SYMBOL),
  }),
  z.object({
    kind: z.literal('internal'),
    left: z.unknown(),
    right: z.unknown(),
  }),
]);

type Side = 'left' | 'right';

/** A node in pre-order, with links to its parent and children by index. */
interface Slot {
  symbol: number | null;
  parent: number;
  side: Side | null;
  left: number;
  right: number;
}

interface RecordVisit {
  value: unknown;
  parent: number;
  side: Side | null;
}

/**
 * Drop frequencies, keeping only the shape and the leaf symbols.
 */
export function serializeTree(root: HuffmanNode): SerializedTree {
  const slots: Slot[] = [];
  const stack: Array<{ node: HuffmanNode; parent: number; side: Side | null }> = [
    { node: root, parent: -1, side: null },
  ];

  let visit = stack.pop();
  while (visit !== undefined) {
    const { node, parent, side } = visit;
    const index = slots.length;
    if (side !== null) slots[parent][side] = index;

    if (node.kind === 'leaf') {
      slots.push({ symbol: node.symbol, parent, side, left: -1, right: -1 });
    } else {
      slots.push({ symbol: null, parent, side, left: -1, right: -1 });
      stack.push(
        { node: node.right, parent: index, side: 'right' },
        { node: node.left, parent: index, side: 'left' }
      );
    }
    visit = stack.pop();
  }

  return assembleTree(slots);
}

/**
 * Validate an untrusted value (typically from `JSON.parse`) as a tree.
 *
 * @throws MalformedPayloadError if the shape is wrong, a symbol repeats or
 * a node object is reached twice
 */
export function parseSerializedTree(value: unknown): SerializedTree {
  const slots: Slot[] = [];
  const symbols = new Set<number>();
  const objects = new Set<object>();
  const stack: RecordVisit[] = [{ value, parent: -1, side: null }];

  let visit = stack.pop();
  while (visit !== undefined) {
    const { parent, side } = visit;

    if (typeof visit.value === 'object' && visit.value !== null) {
      if (objects.has(visit.value)) {
        throw new MalformedPayloadError(
          `Invalid serialized tree at ${recordPath(slots, parent, side, [])}: node is reached twice`
        );
      }
      objects.add(visit.value);
    }

    const result = TreeNodeRecordSchema.safeParse(visit.value);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new MalformedPayloadError(
        `Invalid serialized tree at ${recordPath(slots, parent, side, issue.path)}: ${issue.message}`
      );
    }

    const index = slots.length;
    if (side !== null) slots[parent][side] = index;

    const node = result.data;
    if (node.kind === 'leaf') {
      if (symbols.has(node.symbol)) {
        throw new MalformedPayloadError(`Symbol ${node.symbol} appears twice in serialized tree`);
      }
      symbols.add(node.symbol);
      slots.push({ symbol: node.symbol, parent, side, left: -1, right: -1 });
    } else {
      slots.push({ symbol: null, parent, side, left: -1, right: -1 });
      stack.push(
        { value: node.right, parent: index, side: 'right' },
        { value: node.left, parent: index, side: 'left' }
      );
    }
    visit = stack.pop();
  }

  return assembleTree(slots);
}

/**
 * Build nested records from pre-order slots. Children always follow their
 * parent, so a backward pass finds them already built.
 */
function assembleTree(slots: readonly Slot[]): SerializedTree {
  const built = new Array<SerializedTree>(slots.length);
  for (let i = slots.length - 1; i >= 0; i--) {
    const slot = slots[i];
    built[i] =
      slot.symbol !== null
        ? { kind: 'leaf', symbol: slot.symbol }
        : { kind: 'internal', left: built[slot.left], right: built[slot.right] };
  }
  return built[0];
}

/** Dotted path of a record node, e.g. `left.right.symbol`. */
function recordPath(
  slots: readonly Slot[],
  parent: number,
  side: Side | null,
  tail: ReadonlyArray<string | number>
): string {
  const segments: Array<string | number> = [];
  let index = parent;
  let current = side;
  while (current !== null) {
    segments.push(current);
    current = slots[index].side;
    index = slots[index].parent;
  }
  segments.reverse().push(...tail);
  return segments.length > 0 ? segments.join('.') : '(root)';
}

/**
 * Encode a tree in the byte form.
 */
export function treeToBytes(tree: SerializedTree): Uint8Array {
  const out: number[] = [];
  const stack: SerializedTree[] = [tree];

  let node = stack.pop();
  while (node !== undefined) {
    if (node.kind === 'leaf') {
      out.push(TAG_LEAF);
      writeVarint(out, node.symbol);
    } else {
      out.push(TAG_INTERNAL);
      stack.push(node.right);
      stack.push(node.left);
    }
    node = stack.pop();
  }

  return new Uint8Array(out);
}

interface PendingInternal {
  left: SerializedTree | null;
}

/**
 * Decode a tree from the byte form. The whole buffer must be consumed.
 *
 * @throws MalformedPayloadError on unknown tags, truncation, trailing
 * bytes, out-of-range symbols or repeated symbols
 */
export function treeFromBytes(bytes: Uint8Array): SerializedTree {
  const pending: PendingInternal[] = [];
  const seen = new Set<number>();
  let offset = 0;

  while (offset < bytes.length) {
    const tag = bytes[offset++];

    if (tag === TAG_INTERNAL) {
      pending.push({ left: null });
      continue;
    }
    if (tag !== TAG_LEAF) {
      throw new MalformedPayloadError(
        `Unknown tree node tag 0x${tag.toString(16).padStart(2, '0')} at byte ${offset - 1}`
      );
    }

    const { value: symbol, next } = readVarint(bytes, offset);
    offset = next;
    if (seen.has(symbol)) {
      throw new MalformedPayloadError(`Symbol ${symbol} appears twice in serialized tree`);
    }
    seen.add(symbol);

    // Fold the finished subtree into its ancestors
    let completed: SerializedTree = { kind: 'leaf', symbol };
    for (;;) {
      const top = pending.at(-1);
      if (top === undefined) {
        if (offset !== bytes.length) {
          throw new MalformedPayloadError(
            `Trailing ${bytes.length - offset} bytes after serialized tree`
          );
        }
        return completed;
      }
      if (top.left === null) {
        top.left = completed;
        break;
      }
      pending.pop();
      completed = { kind: 'internal', left: top.left, right: completed };
    }
  }

  throw new MalformedPayloadError(
    bytes.length === 0 ? 'Serialized tree is empty' : 'Serialized tree is truncated'
  );
}

/** Write an unsigned LEB128 varint. */
function writeVarint(out: number[], value: number): void {
  let remaining = value;
  while (remaining > 127) {
    out.push((remaining & 127) | 128);
    remaining >>>= 7;
  }
  out.push(remaining);
}

/** Read an unsigned LEB128 varint holding a symbol. */
function readVarint(bytes: Uint8Array, offset: number): { value: number; next: number } {
  let value = 0;
  let shift = 0;
  let position = offset;

  for (;;) {
    if (position >= bytes.length) {
      throw new MalformedPayloadError('Serialized tree is truncated inside a symbol');
    }
    const byte = bytes[position++];
    value |= (byte & 127) << shift;
    if ((byte & 128) === 0) break;
    shift += 7;
    if (shift > 14) {
      throw new MalformedPayloadError(`Symbol varint too long at byte ${offset}`);
    }
  }

  if (value > MAX_SYMBOL) {
    throw new MalformedPayloadError(`Symbol ${value} out of range at byte ${offset}`);
  }
  return { value, next: position };
}
