import { NodeId } from '../protocol/NodeId';

export interface SurfaceSize {
  width: number;
  height: number;
}

export interface ProgressGroup {
  name: string;
  members: NodeId[];
  /** Text shown beside the group; empty for continuation chunks */
  label: string;
}

/** Columns taken by everything on a progress line except label and cells */
export const HORIZONTAL_CHROME = 9;
/** Lines of the progress area not available to groups */
export const VERTICAL_CHROME = 6;
const MIN_GROUP_SPACE = 30;
const DEFAULT_NAME_WIDTH = 10;

const CHUNK_SUFFIX = /^(.*)\[(\d+)\]$/;

function sortKey(name: string): [string, number] {
  const match = CHUNK_SUFFIX.exec(name);
  return match ? [match[1], Number(match[2])] : [name, 0];
}

function compareGroupNames(a: string, b: string): number {
  const [baseA, indexA] = sortKey(a);
  const [baseB, indexB] = sortKey(b);
  if (baseA !== baseB) {
    return baseA < baseB ? -1 : 1;
  }
  return indexA - indexB;
}

/**
 * Lays the tests of a run out as progress groups that fit the surface.
 *
 * Tests are grouped by source file, and groups too long for one line are cut
 * into chunks `G`, `G[2]`, `G[3]`... When that needs more lines than the
 * surface has, tests are grouped by directory instead.
 */
export class ProgressMapper {
  private groupMap = new Map<string, ProgressGroup>();
  private readonly nodeToGroup = new Map<string, string>();
  private readonly nodeSet: ReadonlySet<string>;

  constructor(
    readonly size: SurfaceSize,
    nodeids: Iterable<NodeId>
  ) {
    const ids = [...nodeids];
    this.nodeSet = new Set(ids.map(id => id.value));

    this.buildGroups(ids, id => id.filePath);
    if (this.groupMap.size > size.height - VERTICAL_CHROME) {
      this.buildGroups(ids, id => id.directory);
    }

    const sorted = [...this.groupMap.keys()].sort(compareGroupNames);
    this.groupMap = new Map(sorted.map(name => [name, this.groupFor(name)]));
  }

  get groups(): ProgressGroup[] {
    return [...this.groupMap.values()];
  }

  /** Widest group name; used for the label column */
  get nameWidth(): number {
    let width = 0;
    for (const name of this.groupMap.keys()) {
      width = Math.max(width, name.length);
    }
    return this.groupMap.size === 0 ? DEFAULT_NAME_WIDTH : width;
  }

  groupOf(nodeid: string | NodeId): string | undefined {
    return this.nodeToGroup.get(String(nodeid));
  }

  membersOf(nodeid: string | NodeId): NodeId[] {
    const name = this.groupOf(nodeid);
    return name === undefined ? [] : this.groupFor(name).members;
  }

  /** True when `nodeids` is exactly the set this mapping was built for */
  matches(nodeids: Iterable<NodeId>): boolean {
    const ids = new Set([...nodeids].map(id => id.value));
    if (ids.size !== this.nodeSet.size) {
      return false;
    }
    for (const id of ids) {
      if (!this.nodeSet.has(id)) {
        return false;
      }
    }
    return true;
  }

  private groupFor(name: string): ProgressGroup {
    const group = this.groupMap.get(name);
    if (!group) {
      throw new Error(`No progress group named ${name}`);
    }
    return group;
  }

  private buildGroups(ids: NodeId[], keyOf: (id: NodeId) => string): void {
    this.groupMap = new Map();
    this.nodeToGroup.clear();
    for (const id of ids) {
      const name = keyOf(id);
      let group = this.groupMap.get(name);
      if (!group) {
        group = { name, members: [], label: name };
        this.groupMap.set(name, group);
      }
      group.members.push(id);
      this.nodeToGroup.set(id.value, name);
    }
    this.splitLongGroups();
  }

  private splitLongGroups(): void {
    const space = Math.max(MIN_GROUP_SPACE, this.size.width - this.nameWidth - HORIZONTAL_CHROME);
    for (const [name, group] of [...this.groupMap]) {
      if (group.members.length <= space) {
        continue;
      }
      this.groupMap.delete(name);
      for (let start = 0, n = 1; start < group.members.length; start += space, n++) {
        const chunkName = n === 1 ? name : `${name}[${n}]`;
        const members = group.members.slice(start, start + space);
        this.groupMap.set(chunkName, { name: chunkName, members, label: n === 1 ? name : '' });
        for (const id of members) {
          this.nodeToGroup.set(id.value, chunkName);
        }
      }
    }
  }
}
