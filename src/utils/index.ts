export { symbolChecksum } from './checksum.js';
