/**
 * Workflow Logger
 *
 * Structured logging for every orchestration decision: analysis results,
 * decomposition strategy, graph validation, dispatch and task state changes.
 *
 * Features:
 * - Structured log entries with categories
 * - Minimum level filtering
 * - Bounded in-memory buffer for recent logs
 * - Subscriber pattern for streaming (console, UI, audit trail)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogCategory =
  | 'ANALYSIS'
  | 'DECOMPOSITION'
  | 'GRAPH'
  | 'PLANNING'
  | 'DISPATCH'
  | 'TASK_STATE'
  | 'EVENT_BUS'
  | 'RESULTS'
  | 'WORKFLOW'
  | 'CONFIG'
  | 'ERROR';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  details?: Record<string, unknown>;
  taskId?: string;
  workflowId?: string;
}

export interface LogSubscriber {
  onLog(entry: LogEntry): void;
}

export interface LogOptions {
  details?: Record<string, unknown>;
  taskId?: string;
  workflowId?: string;
}

export interface WorkflowLoggerOptions {
  maxEntries?: number;
  minLevel?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class WorkflowLogger {
  private entries: LogEntry[] = [];
  private subscribers: Set<LogSubscriber> = new Set();
  private subscriberErrors: number = 0;
  private readonly maxEntries: number;
  private minLevel: LogLevel;

  constructor(options: WorkflowLoggerOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.minLevel = options.minLevel ?? 'debug';
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Record an entry. Entries below the minimum level are dropped and
   * `null` is returned.
   */
  log(level: LogLevel, category: LogCategory, message: string, options: LogOptions = {}): LogEntry | null {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return null;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      details: options.details,
      taskId: options.taskId,
      workflowId: options.workflowId,
    };

    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }

    for (const subscriber of this.subscribers) {
      try {
        subscriber.onLog(entry);
      } catch {
        this.subscriberErrors++;
      }
    }

    return entry;
  }

  debug(category: LogCategory, message: string, options: LogOptions = {}): LogEntry | null {
    return this.log('debug', category, message, options);
  }

  info(category: LogCategory, message: string, options: LogOptions = {}): LogEntry | null {
    return this.log('info', category, message, options);
  }

  warn(category: LogCategory, message: string, options: LogOptions = {}): LogEntry | null {
    return this.log('warn', category, message, options);
  }

  error(category: LogCategory, message: string, options: LogOptions = {}): LogEntry | null {
    return this.log('error', category, message, options);
  }

  logError(message: string, error: unknown, options: Omit<LogOptions, 'details'> = {}): LogEntry | null {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;

    return this.log('error', 'ERROR', message, {
      details: {
        error: errorMessage,
        stack: errorStack,
      },
      ...options,
    });
  }

  // Retrieval

  getAll(): LogEntry[] {
    return [...this.entries];
  }

  getByTaskId(taskId: string): LogEntry[] {
    return this.entries.filter((e) => e.taskId === taskId);
  }

  getByWorkflowId(workflowId: string): LogEntry[] {
    return this.entries.filter((e) => e.workflowId === workflowId);
  }

  getByCategory(category: LogCategory): LogEntry[] {
    return this.entries.filter((e) => e.category === category);
  }

  getByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  getRecent(count: number = 50): LogEntry[] {
    return this.entries.slice(-count);
  }

  clear(): void {
    this.entries = [];
  }

  // Subscription

  /**
   * Subscribe to log entries; returns the unsubscribe function
   */
  subscribe(subscriber: LogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  getSubscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Number of subscriber calls that threw; those entries stay recorded
   */
  getSubscriberErrorCount(): number {
    return this.subscriberErrors;
  }
}

/**
 * Format an entry as a single console line
 */
export function formatLogEntry(entry: LogEntry): string {
  const scope = entry.taskId ? ` [${entry.taskId}]` : '';
  return `${entry.timestamp} ${entry.level.toUpperCase().padEnd(5)} ${entry.category}${scope} ${entry.message}`;
}

/**
 * Subscriber that mirrors entries to the console (stderr for warnings and errors)
 */
export function createConsoleSubscriber(): LogSubscriber {
  return {
    onLog(entry: LogEntry): void {
      const line = formatLogEntry(entry);
      if (entry.level === 'error' || entry.level === 'warn') {
        console.error(line);
      } else {
        console.log(line);
      }
    },
  };
}
