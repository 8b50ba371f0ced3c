export {
  type CompressedHeader,
  MAGIC_BYTES,
  BASE_HEADER_SIZE,
  FREQUENCY_TABLE_SIZE,
  FULL_HEADER_SIZE,
  createHeader,
  headerSize,
  serializeHeader,
  deserializeHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
} from './header.js';
