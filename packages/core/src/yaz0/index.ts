export { YAZ0_MAGIC, compressYaz0, decompressIfYaz0, decompressYaz0, isYaz0 } from './yaz0.js';
