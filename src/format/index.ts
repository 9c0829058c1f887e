export {
  type CompressedHeader,
  type ContainerParts,
  MAGIC_BYTES,
  FORMAT_VERSION,
  HEADER_SIZE,
  createHeader,
  serializeHeader,
  deserializeHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
  isHuffmanContainer,
} from './header.js';

export {
  TAG_INTERNAL,
  TAG_LEAF,
  TreeNodeRecordSchema,
  serializeTree,
  parseSerializedTree,
  treeToBytes,
  treeFromBytes,
} from './tree-codec.js';
