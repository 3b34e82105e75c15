import {
  MissingResourceError,
  canonicalKey,
  compressYaz0,
  isCompressedName,
  writeSarc,
  type Endian,
  type SarcArchive,
} from '@modmerge/core';
import { SortedDeleteMap, type Mergeable } from '@modmerge/content';
import type { EngineLogger } from './logger.js';
import { resourceDataToBinary, reusableSource, type ResourceData, type ResourceTable } from './resource-data.js';

export interface ArchiveWriteOptions {
  /** `'skip'` leaves out entries whose resource is missing instead of failing. */
  onMissing?: 'throw' | 'skip';
  /** Receives one error per skipped entry. */
  failures?: MissingResourceError[];
  /** Minimum data alignment passed to the SARC writer. */
  alignment?: number;
  logger?: EngineLogger;
}

/**
 * An archive as a map from entry path to the canonical key of the resource
 * stored there. The resources themselves live in a {@link ResourceTable}.
 */
export class ArchiveMap implements Mergeable<ArchiveMap> {
  constructor(
    readonly endian: Endian,
    readonly entries: SortedDeleteMap<string, string> = new SortedDeleteMap<string, string>(),
  ) {}

  static fromSarc(archive: SarcArchive): ArchiveMap {
    return new ArchiveMap(
      archive.endian,
      new SortedDeleteMap([...archive.files.keys()].map((name) => [name, canonicalKey(name)] as const)),
    );
  }

  diff(other: ArchiveMap): ArchiveMap {
    return new ArchiveMap(other.endian, this.entries.diff(other.entries));
  }

  merge(diff: ArchiveMap): ArchiveMap {
    return new ArchiveMap(diff.endian, this.entries.merge(diff.entries));
  }

  equals(other: ArchiveMap): boolean {
    return this.endian === other.endian && this.entries.equals(other.entries);
  }

  /**
   * Rebuild the archive for `endian`, resolving every entry in `table`.
   * Members nobody modified are copied from their source bytes as stored;
   * re-encoded members are compressed when their name says so.
   *
   * @throws MissingResourceError for an unresolved entry unless `onMissing` is `'skip'`.
   */
  toSarc(endian: Endian, table: ResourceTable, options: ArchiveWriteOptions = {}): SarcArchive {
    const { onMissing = 'throw', failures, logger = console } = options;
    const files = new Map<string, Uint8Array>();
    for (const [entryPath, canonical] of this.entries) {
      const data = table.get(canonical);
      if (data === undefined) {
        const error = new MissingResourceError(canonical, entryPath);
        if (onMissing === 'throw') throw error;
        failures?.push(error);
        logger.warn(`[archive] skipping ${entryPath}: ${error.message}`);
        continue;
      }
      files.set(entryPath, encodeEntry(entryPath, data, endian, table, options));
    }
    return { endian, files };
  }

  toBinary(endian: Endian, table: ResourceTable, options: ArchiveWriteOptions = {}): Uint8Array {
    return writeSarc(this.toSarc(endian, table, options), { alignment: options.alignment });
  }
}

function encodeEntry(
  entryPath: string,
  data: ResourceData,
  endian: Endian,
  table: ResourceTable,
  options: ArchiveWriteOptions,
): Uint8Array {
  const source = reusableSource(data, endian, table);
  if (source) return source.raw;
  const bytes = resourceDataToBinary(data, endian, table, options);
  return isCompressedName(entryPath) ? compressYaz0(bytes) : bytes;
}
