import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MissingResourceError, decompressIfYaz0, parseSarc } from '@modmerge/core';
import { AreaData } from '@modmerge/content';

/** Separates an archive path from the path of a member inside it. */
export const ARCHIVE_MEMBER_SEPARATOR = '//';

export const AREA_DATA_PATH = 'Ecosystem/AreaData.byml';
export const AREA_DATA_FALLBACK = 'Pack/Bootup.pack//Ecosystem/AreaData.sbyml';

/** Source of unmodified game resources. */
export interface ResourceDump {
  /**
   * Uncompressed bytes of `primaryPath`, or of the archive member named by
   * `fallbackPath` (`Archive.pack//Member/Path`) when the primary file is
   * not available.
   */
  getFromSarc(primaryPath: string, fallbackPath: string): Promise<Uint8Array>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/** A dump unpacked into a directory, one file per content path. */
export class DirectoryDump implements ResourceDump {
  constructor(readonly rootDir: string) {}

  async getFromSarc(primaryPath: string, fallbackPath: string): Promise<Uint8Array> {
    const primary = await this.readOptional(primaryPath);
    if (primary !== undefined) return decompressIfYaz0(primary);

    const [archivePath, ...members] = fallbackPath.split(ARCHIVE_MEMBER_SEPARATOR);
    const archive = archivePath === undefined ? undefined : await this.readOptional(archivePath);
    if (archive === undefined || members.length === 0) {
      throw new MissingResourceError(primaryPath, fallbackPath);
    }
    let data = decompressIfYaz0(archive);
    for (const member of members) {
      const next = parseSarc(data).files.get(member);
      if (next === undefined) throw new MissingResourceError(primaryPath, fallbackPath);
      data = decompressIfYaz0(next);
    }
    return data;
  }

  private async readOptional(path: string): Promise<Uint8Array | undefined> {
    try {
      return new Uint8Array(await readFile(join(this.rootDir, path)));
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }
  }
}

/** Merge a logged area data diff onto the dump's unmodified table. */
export async function applyAreaDataLog(dump: ResourceDump, diff: AreaData): Promise<AreaData> {
  const base = AreaData.fromBinary(await dump.getFromSarc(AREA_DATA_PATH, AREA_DATA_FALLBACK));
  return base.merge(diff);
}
