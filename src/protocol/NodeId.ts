import path from 'path';

export const SCOPE_SEPARATOR = '::';

export interface NodeIdComponents {
  /** Source file path relative to the root, with forward slashes */
  filePath: string;
  /** Enclosing suites, outermost first */
  scope: string[];
  /** Test name, or the last path component for a file-level node */
  name: string;
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * Identifier for one node (file, suite or test) in a run.
 *
 * The string form is `<file>::<suite>::...::<test>`. The file part is relative
 * to the root path; an absolute file part inside the root is made relative when
 * the components are computed.
 */
export class NodeId {
  private cached: NodeIdComponents | null = null;

  constructor(
    readonly value: string,
    readonly rootPath: string = ''
  ) {}

  get components(): NodeIdComponents {
    if (!this.cached) {
      const [rawFile = '', ...rest] = this.value.split(SCOPE_SEPARATOR);
      let filePath = toPosix(rawFile);
      if (this.rootPath && path.isAbsolute(rawFile)) {
        const relative = path.relative(this.rootPath, rawFile);
        if (!relative.startsWith('..')) {
          filePath = toPosix(relative);
        }
      }
      const name = rest.length > 0
        ? rest[rest.length - 1]
        : filePath.slice(filePath.lastIndexOf('/') + 1);
      this.cached = { filePath, scope: rest.slice(0, -1), name };
    }
    return this.cached;
  }

  get filePath(): string {
    return this.components.filePath;
  }

  /** Directory of the source file, `.` for files at the root */
  get directory(): string {
    return path.posix.dirname(this.filePath);
  }

  get scope(): string[] {
    return this.components.scope;
  }

  get name(): string {
    return this.components.name;
  }

  /** Path segments followed by suite names and the test name */
  get parts(): string[] {
    const { filePath, scope } = this.components;
    const tail = this.value.split(SCOPE_SEPARATOR).length > 1 ? [...scope, this.name] : [];
    return [...filePath.split('/').filter(Boolean), ...tail];
  }

  /** Suite chain and test name joined the way Vitest builds a full test name */
  get fullName(): string {
    return [...this.scope, this.name].join(' ');
  }

  get absolutePath(): string {
    return path.resolve(this.rootPath || process.cwd(), this.filePath);
  }

  withRoot(rootPath: string): NodeId {
    return new NodeId(this.value, rootPath);
  }

  equals(other: NodeId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}
