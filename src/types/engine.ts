/**
 * Engine-side objects handed to the emitter by a reporter adapter. The codec
 * recognises these classes and turns each into its Representation; anything
 * else reaching the codec is represented generically or as a placeholder.
 */

export type Phase = 'setup' | 'call' | 'teardown';

export type Outcome = 'passed' | 'failed' | 'skipped';

/** File, line (null when unknown), qualified name */
export type Location = [string, number | null, string];

export class EngineConfig {
  constructor(
    readonly rootPath: string,
    readonly args: string[] = [],
    readonly options: Record<string, unknown> = {},
    readonly workerCount: number = 1
  ) {}
}

export class EngineSession {
  constructor(
    readonly config: EngineConfig,
    readonly startTime: number
  ) {}
}

export interface EngineItemInit {
  nodeid: string;
  name: string;
  path: string;
  originalName?: string;
  markers?: string[];
  location?: Location;
}

/** A collected test */
export class EngineItem {
  readonly nodeid: string;
  readonly name: string;
  readonly path: string;
  readonly originalName?: string;
  readonly markers: string[];
  readonly location?: Location;

  constructor(init: EngineItemInit) {
    this.nodeid = init.nodeid;
    this.name = init.name;
    this.path = init.path;
    this.originalName = init.originalName;
    this.markers = init.markers ?? [];
    this.location = init.location;
  }
}

export type CollectorType = 'file' | 'suite';

/** A collected container node (file or suite) */
export class EngineCollector {
  constructor(
    readonly nodeid: string,
    readonly name: string,
    readonly path: string,
    readonly nodeType: CollectorType
  ) {}
}

export interface EngineCollectReportInit {
  nodeid: string;
  outcome: Outcome;
  result?: Array<EngineItem | EngineCollector>;
  longrepr?: unknown;
  sections?: Array<[string, string]>;
}

export class EngineCollectReport {
  readonly nodeid: string;
  readonly outcome: Outcome;
  readonly result: Array<EngineItem | EngineCollector>;
  readonly longrepr?: unknown;
  readonly sections: Array<[string, string]>;

  constructor(init: EngineCollectReportInit) {
    this.nodeid = init.nodeid;
    this.outcome = init.outcome;
    this.result = init.result ?? [];
    this.longrepr = init.longrepr;
    this.sections = init.sections ?? [];
  }
}

export interface EngineTestReportInit {
  nodeid: string;
  when: Phase;
  outcome: Outcome;
  duration?: number;
  start?: number;
  stop?: number;
  location?: Location;
  longrepr?: unknown;
  sections?: Array<[string, string]>;
  wasxfail?: string;
  workerId?: string;
}

/** Result of one phase of one test */
export class EngineTestReport {
  readonly nodeid: string;
  readonly when: Phase;
  readonly outcome: Outcome;
  readonly duration: number;
  readonly start: number;
  readonly stop: number;
  readonly location?: Location;
  readonly longrepr?: unknown;
  readonly sections: Array<[string, string]>;
  readonly wasxfail?: string;
  readonly workerId?: string;

  constructor(init: EngineTestReportInit) {
    this.nodeid = init.nodeid;
    this.when = init.when;
    this.outcome = init.outcome;
    this.duration = init.duration ?? 0;
    this.start = init.start ?? 0;
    this.stop = init.stop ?? this.start + this.duration;
    this.location = init.location;
    this.longrepr = init.longrepr;
    this.sections = init.sections ?? [];
    this.wasxfail = init.wasxfail;
    this.workerId = init.workerId;
  }
}

export type WarningWhen = 'config' | 'collect' | 'runtest';

export interface EngineWarningInit {
  message: string;
  when: WarningWhen;
  nodeid?: string;
  category?: string;
  filename?: string;
  lineNumber?: number;
}

export class EngineWarning {
  readonly message: string;
  readonly when: WarningWhen;
  readonly nodeid: string;
  readonly category?: string;
  readonly filename?: string;
  readonly lineNumber?: number;

  constructor(init: EngineWarningInit) {
    this.message = init.message;
    this.when = init.when;
    this.nodeid = init.nodeid ?? '';
    this.category = init.category;
    this.filename = init.filename;
    this.lineNumber = init.lineNumber;
  }

  /** Identity used to report each distinct warning once */
  get key(): string {
    return [this.message, this.category ?? '', this.filename ?? '', this.lineNumber ?? ''].join('\u0000');
  }
}
