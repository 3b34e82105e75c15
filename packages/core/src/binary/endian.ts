/** Byte order of scalar values in a binary resource. */
export type Endian = 'big' | 'little';

/** Human label for the platform that uses a given byte order. */
export function platformLabel(endian: Endian): string {
  return endian === 'big' ? 'Wii U' : 'Switch';
}

/** Decode an ASCII tag (magic) from the first `length` bytes. */
export function readMagic(bytes: Uint8Array, length: number): string {
  let magic = '';
  for (let i = 0; i < length && i < bytes.length; i++) {
    magic += String.fromCharCode(bytes[i] ?? 0);
  }
  return magic;
}

/** Whether `bytes` starts with the ASCII `magic`. */
export function hasMagic(bytes: Uint8Array, magic: string): boolean {
  return bytes.length >= magic.length && readMagic(bytes, magic.length) === magic;
}
