import { MissingResourceError, SchemaMismatchError, platformLabel, type Endian } from '@modmerge/core';
import type { Mergeable } from '@modmerge/content';

export interface PlatformBytes {
  readonly big?: Uint8Array;
  readonly little?: Uint8Array;
}

export type BinaryVariant =
  | { readonly type: 'agnostic'; readonly data: Uint8Array }
  | ({ readonly type: 'platform' } & PlatformBytes);

function bytesEqual(a: Uint8Array | undefined, b: Uint8Array | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined || a.byteLength !== b.byteLength) return false;
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Opaque bytes. Agnostic data is the same on every platform; platform data
 * keeps the big- and little-endian encodings side by side.
 */
export class BinaryResource implements Mergeable<BinaryResource> {
  private constructor(readonly variant: BinaryVariant) {}

  static agnostic(data: Uint8Array): BinaryResource {
    return new BinaryResource({ type: 'agnostic', data });
  }

  static platform(bytes: PlatformBytes): BinaryResource {
    return new BinaryResource({ type: 'platform', big: bytes.big, little: bytes.little });
  }

  static forEndian(endian: Endian, data: Uint8Array): BinaryResource {
    return BinaryResource.platform(endian === 'big' ? { big: data } : { little: data });
  }

  /** @throws MissingResourceError when the platform variant for `endian` is absent. */
  toBinary(endian: Endian, path = 'binary resource'): Uint8Array {
    const variant = this.variant;
    if (variant.type === 'agnostic') return variant.data;
    const data = variant[endian];
    if (data === undefined) throw new MissingResourceError(`${path} (${platformLabel(endian)})`);
    return data;
  }

  /** @throws SchemaMismatchError when one side is agnostic and the other per-platform. */
  diff(other: BinaryResource): BinaryResource {
    const base = this.variant;
    const modified = other.variant;
    if (base.type === 'agnostic' && modified.type === 'agnostic') return other;
    if (base.type !== 'platform' || modified.type !== 'platform') {
      throw new SchemaMismatchError('diff', `${base.type} binary`, `${modified.type} binary`);
    }
    return BinaryResource.platform({
      big: bytesEqual(base.big, modified.big) ? undefined : modified.big,
      little: bytesEqual(base.little, modified.little) ? undefined : modified.little,
    });
  }

  /** @throws SchemaMismatchError when one side is agnostic and the other per-platform. */
  merge(diff: BinaryResource): BinaryResource {
    const base = this.variant;
    const changes = diff.variant;
    if (base.type === 'agnostic' && changes.type === 'agnostic') return diff;
    if (base.type !== 'platform' || changes.type !== 'platform') {
      throw new SchemaMismatchError('merge', `${base.type} binary`, `${changes.type} binary`);
    }
    return BinaryResource.platform({
      big: changes.big ?? base.big,
      little: changes.little ?? base.little,
    });
  }

  equals(other: BinaryResource): boolean {
    const a = this.variant;
    const b = other.variant;
    if (a.type === 'agnostic' || b.type === 'agnostic') {
      return a.type === 'agnostic' && b.type === 'agnostic' && bytesEqual(a.data, b.data);
    }
    return bytesEqual(a.big, b.big) && bytesEqual(a.little, b.little);
  }
}
