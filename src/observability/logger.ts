import crypto from 'crypto';
import { maskRegisteredSecrets } from '../errors/secrets.js';

export interface LogContext {
  runId: string;
  ref?: string;
  version?: string;
}

type LogLevel = 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  runId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  ref?: string;
  version?: string;
}

export type LogSink = (line: string, level: LogLevel) => void;

const consoleSink: LogSink = (line) => {
  console.log(line);
};

function maskValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskRegisteredSecrets(value);
  }
  if (Array.isArray(value)) {
    return value.map(maskValue);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, nested]) => [key, maskValue(nested)])
    );
  }
  return value;
}

export class Logger {
  private context: LogContext | null;
  private sink: LogSink = consoleSink;

  constructor(context: LogContext | null = null) {
    this.context = context;
  }

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  resetSink(): void {
    this.sink = consoleSink;
  }

  /** A logger bound to one run; writes through the parent's sink. */
  forRun(context: LogContext): Logger {
    const child = new Logger(context);
    child.sink = (line, level) => this.sink(line, level);
    return child;
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      runId: this.context?.runId || 'unknown',
      phase,
      message: maskRegisteredSecrets(message),
    };

    if (data) {
      // JSON round trip first so Credential.toJSON and friends apply before masking.
      const plain: unknown = JSON.parse(JSON.stringify(data));
      const masked = maskValue(plain);
      if (masked !== null && typeof masked === 'object' && !Array.isArray(masked)) {
        entry.data = Object.fromEntries(Object.entries(masked));
      }
    }

    if (this.context?.ref) entry.ref = maskRegisteredSecrets(this.context.ref);
    if (this.context?.version) entry.version = this.context.version;

    this.sink(JSON.stringify(entry), level);
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();

export function generateRunId(): string {
  return crypto.randomBytes(8).toString('hex');
}
