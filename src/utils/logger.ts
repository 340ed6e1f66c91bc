import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogData = Record<string, unknown>;

export interface LoggerOptions {
  logDir?: string;
  debug?: boolean;
}

export function defaultLogDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.TESTRELAY_LOG_DIR || path.join(process.cwd(), '.testrelay');
}

export class Logger {
  private readonly logPath: string;
  private readonly component: string;
  private readonly debugEnabled: boolean;
  private isInitComplete: boolean = false;

  private constructor(component: string, options: LoggerOptions) {
    this.component = component;
    this.logPath = path.join(options.logDir ?? defaultLogDir(), 'debug.log');
    this.debugEnabled = options.debug ?? process.env.TESTRELAY_DEBUG === '1';
    this.ensureLogDirectory();
  }

  static create(component: string, options: LoggerOptions = {}): Logger {
    return new Logger(component, options);
  }

  /**
   * Logger for a sub-component sharing this logger's destination
   */
  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`, {
      logDir: path.dirname(this.logPath),
      debug: this.debugEnabled
    });
  }

  get initialized(): boolean {
    return this.isInitComplete;
  }

  private ensureLogDirectory(): void {
    try {
      fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    } catch {
      // Directory might already exist
    }
  }

  private formatMessage(level: LogLevel, message: string, data?: LogData): string {
    const timestamp = new Date().toISOString();
    const dataStr = data ? ` | ${JSON.stringify(data)}` : '';
    return `${timestamp} ${level.padEnd(5)} | [${this.component}] ${message}${dataStr}`;
  }

  private writeLog(level: LogLevel, message: string, data?: LogData): void {
    try {
      const formattedMessage = this.formatMessage(level, message, data);
      fs.appendFileSync(this.logPath, formattedMessage + '\n', 'utf8');
    } catch {
      // Logging must never take the run down with it
    }
  }

  /**
   * Log human-readable startup preamble without timestamps
   */
  startupPreamble(lines: string[]): void {
    try {
      const preamble = lines.map(line => `[${this.component}] ${line}`).join('\n');
      fs.appendFileSync(this.logPath, preamble + '\n', 'utf8');
    } catch {
      // Same as writeLog
    }
  }

  /**
   * Log machine-readable initialization complete
   */
  initComplete(config: LogData): void {
    this.isInitComplete = true;
    this.info('Initialization complete', config);
  }

  debug(message: string, data?: LogData): void {
    if (this.debugEnabled) {
      this.writeLog('DEBUG', message, data);
    }
  }

  info(message: string, data?: LogData): void {
    this.writeLog('INFO', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.writeLog('WARN', message, data);
  }

  error(message: string, error?: unknown, data?: LogData): void {
    const errorData: LogData = { ...data };
    if (error instanceof Error) {
      errorData.error = error.message;
      errorData.stack = error.stack;
    } else if (error !== undefined) {
      errorData.error = String(error);
    }
    this.writeLog('ERROR', message, errorData);
  }

  /**
   * Log lifecycle events with consistent narrative structure
   */
  lifecycle(event: string, details?: LogData): void {
    this.info(`Lifecycle: ${event}`, details);
  }

  /**
   * Log protocol traffic
   */
  protocol(direction: 'send' | 'receive', messageName: string, details?: LogData): void {
    this.debug(`Protocol ${direction}: ${messageName}`, details);
  }

  command(cmd: string, args?: string[]): void {
    this.info(`Executing command: ${cmd}`, { args });
  }

  decision(description: string, choice: string, reason?: string): void {
    this.info(`Decision: ${description}`, { choice, reason });
  }
}
