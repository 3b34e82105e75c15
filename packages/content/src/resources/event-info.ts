import { Byml, expectHash, parseByml, writeByml, type BymlNode, type Endian } from '@modmerge/core';
import { DeleteMap } from '../collections/delete-map.js';
import { mergeableEquals } from '../collections/mergeable.js';
import { bymlFields, type BymlFields } from './byml-fields.js';
import type { Resource } from './resource.js';

/** Event flow metadata keyed by `<flow>[<entry point>]` name. */
export class EventInfo implements Resource<EventInfo> {
  readonly kind = 'EventInfo' as const;
  static readonly pathPattern = /^Event\/EventInfo\.product\.byml$/;

  constructor(
    readonly events: DeleteMap<string, BymlFields> = new DeleteMap<string, BymlFields>(undefined, mergeableEquals),
  ) {}

  static fromBinary(data: Uint8Array): EventInfo {
    return EventInfo.fromByml(parseByml(data).root);
  }

  static fromByml(root: BymlNode): EventInfo {
    const events = new DeleteMap<string, BymlFields>(undefined, mergeableEquals);
    for (const [name, node] of expectHash(root, 'root')) events.set(name, bymlFields(node, name));
    return new EventInfo(events);
  }

  toByml(): BymlNode {
    return Byml.hash([...this.events].map(([name, fields]) => [name, Byml.hash(fields)] as const));
  }

  toBinary(endian: Endian): Uint8Array {
    return writeByml(this.toByml(), endian);
  }

  diff(other: EventInfo): EventInfo {
    return new EventInfo(this.events.deepDiff(other.events));
  }

  merge(diff: EventInfo): EventInfo {
    return new EventInfo(this.events.deepMerge(diff.events));
  }

  equals(other: EventInfo): boolean {
    return this.events.equals(other.events);
  }
}
