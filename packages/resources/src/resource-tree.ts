import {
  MissingResourceError,
  UnsupportedFormatError,
  canonicalKey,
  decompressIfYaz0,
  parseSarc,
  sarcEndian,
} from '@modmerge/core';
import { BinaryResource } from './binary-resource.js';
import { identifyAndParse } from './dispatch.js';
import type { EngineLogger } from './logger.js';
import { archiveData, binaryData, type ResourceData, type ResourceTable } from './resource-data.js';

export interface LoadOptions {
  logger?: EngineLogger;
  /** Table to add resources to; a new one is created when omitted. */
  table?: ResourceTable;
}

export interface ResourceTree {
  /** Canonical key of the loaded file. */
  root: string;
  table: ResourceTable;
}

/**
 * Load a file and, when it is an archive, every member below it. Archive
 * members in an unknown format are kept as opaque bytes. Archives remember
 * their stored bytes and members, so a subtree nobody changes is written back
 * as it was read.
 */
export function loadResourceTree(path: string, bytes: Uint8Array, options: LoadOptions = {}): ResourceTree {
  const { logger = console } = options;
  const table = options.table ?? new Map<string, ResourceData>();

  const visit = (entryPath: string, entryBytes: Uint8Array, nested: boolean): string => {
    const key = canonicalKey(entryPath);
    let data: ResourceData;
    try {
      data = identifyAndParse(entryPath, entryBytes);
    } catch (err) {
      if (!nested || !(err instanceof UnsupportedFormatError)) throw err;
      logger.debug(`[load] keeping ${key} as opaque data (header "${err.magic}")`);
      data = binaryData(BinaryResource.agnostic(decompressIfYaz0(entryBytes)), { raw: entryBytes });
    }
    if (data.type === 'archive') {
      const payload = decompressIfYaz0(entryBytes);
      const members = new Map<string, ResourceData>();
      for (const [name, member] of parseSarc(payload).files) {
        const memberKey = visit(name, member, true);
        const memberData = table.get(memberKey);
        if (memberData !== undefined) members.set(memberKey, memberData);
      }
      data = archiveData(data.map, { raw: entryBytes, endian: sarcEndian(payload), members });
    }
    table.set(key, data);
    return key;
  };

  return { root: visit(path, bytes, false), table };
}

/** Archive entries reachable from `root` whose canonical key is not in the table. */
export function findMissingResources(table: ResourceTable, root: string): MissingResourceError[] {
  const missing: MissingResourceError[] = [];
  const seen = new Set<string>();

  const walk = (key: string, entryPath?: string): void => {
    const data = table.get(key);
    if (data === undefined) {
      missing.push(new MissingResourceError(key, entryPath));
      return;
    }
    if (seen.has(key)) return;
    seen.add(key);
    if (data.type !== 'archive') return;
    for (const [name, canonical] of data.map.entries) walk(canonical, name);
  };

  walk(root);
  return missing;
}
