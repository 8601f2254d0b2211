/**
 * Event Bus
 *
 * Async publish/subscribe between the orchestrator and its observers.
 *
 * - publish() only enqueues and records history; it never waits on subscribers
 * - A single delivery loop drains the queue in publish order
 * - Callbacks run one at a time, so a subscriber never sees two messages at once
 * - A throwing callback is logged and counted; delivery continues
 */

import { MessageType } from '../models/enums';
import type { Message } from '../models/message';
import type { WorkflowLogger } from '../logging/workflow-logger';

export type MessageCallback = (message: Message) => void | Promise<void>;

interface Subscription {
  type: MessageType;
  subscriberId: string;
  callbacks: MessageCallback[];
}

export interface EventBusOptions {
  /** Messages kept for audit/replay; oldest dropped first (default 1000) */
  historyLimit?: number;
  logger?: WorkflowLogger;
}

export interface HistoryFilter {
  type?: MessageType;
  sender?: string;
  limit?: number;
}

export interface EventBusStats {
  running: boolean;
  queueSize: number;
  historySize: number;
  subscribers: number;
  delivered: number;
  deliveryErrors: number;
}

export const DEFAULT_HISTORY_LIMIT = 1000;

function subscriptionKey(type: MessageType, subscriberId: string): string {
  return `${type}:${subscriberId}`;
}

export class EventBus {
  private queue: Message[] = [];
  private history: Message[] = [];
  private readonly subscriptions: Map<string, Subscription> = new Map();
  private readonly historyLimit: number;
  private readonly logger?: WorkflowLogger;
  private running: boolean = false;
  private draining: Promise<void> | null = null;
  private delivered: number = 0;
  private deliveryErrors: number = 0;

  constructor(options: EventBusOptions = {}) {
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.logger = options.logger;
  }

  /**
   * Start the delivery loop. Messages published before start() are
   * delivered once it runs.
   */
  start(): void {
    if (this.running) {
      this.logger?.warn('EVENT_BUS', 'Event bus already running');
      return;
    }
    this.running = true;
    this.logger?.debug('EVENT_BUS', 'Event bus started');
    if (this.queue.length > 0) {
      this.scheduleDrain();
    }
  }

  /**
   * Deliver everything already queued, then stop
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    await this.flush();
    this.running = false;
    this.logger?.debug('EVENT_BUS', 'Event bus stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  publish(message: Message): void {
    this.queue.push(message);

    this.history.push(message);
    if (this.history.length > this.historyLimit) {
      this.history = this.history.slice(-this.historyLimit);
    }

    this.logger?.debug('EVENT_BUS', `Published ${message.type} from ${message.sender}`, {
      details: { messageId: message.id, recipient: message.recipient },
    });

    if (this.running) {
      this.scheduleDrain();
    }
  }

  /**
   * Register a callback for one message type under a subscriber id.
   * Returns a function removing this callback only.
   */
  subscribe(type: MessageType, callback: MessageCallback, subscriberId: string): () => void {
    const key = subscriptionKey(type, subscriberId);
    let subscription = this.subscriptions.get(key);
    if (!subscription) {
      subscription = { type, subscriberId, callbacks: [] };
      this.subscriptions.set(key, subscription);
    }
    subscription.callbacks.push(callback);

    this.logger?.debug('EVENT_BUS', `Subscriber ${subscriberId} registered for ${type}`);

    return () => {
      const current = this.subscriptions.get(key);
      if (!current) {
        return;
      }
      current.callbacks = current.callbacks.filter((cb) => cb !== callback);
      if (current.callbacks.length === 0) {
        this.subscriptions.delete(key);
      }
    };
  }

  /**
   * Remove every callback of a subscriber for one type
   */
  unsubscribe(type: MessageType, subscriberId: string): boolean {
    const removed = this.subscriptions.delete(subscriptionKey(type, subscriberId));
    if (removed) {
      this.logger?.debug('EVENT_BUS', `Subscriber ${subscriberId} unsubscribed from ${type}`);
    }
    return removed;
  }

  /**
   * Resolves once the delivery loop has drained the queue.
   * Returns immediately while the bus is stopped.
   */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  getHistory(filter: HistoryFilter = {}): Message[] {
    let messages = [...this.history];
    if (filter.type !== undefined) {
      messages = messages.filter((m) => m.type === filter.type);
    }
    if (filter.sender !== undefined) {
      messages = messages.filter((m) => m.sender === filter.sender);
    }
    const limit = filter.limit ?? 100;
    if (limit <= 0) {
      return [];
    }
    return messages.slice(-limit);
  }

  clearHistory(): void {
    this.history = [];
  }

  getStats(): EventBusStats {
    return {
      running: this.running,
      queueSize: this.queue.length,
      historySize: this.history.length,
      subscribers: this.subscriptions.size,
      delivered: this.delivered,
      deliveryErrors: this.deliveryErrors,
    };
  }

  private scheduleDrain(): void {
    if (this.draining) {
      return;
    }
    this.draining = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.drain())
      .catch((error: unknown) => {
        this.logger?.logError('Event bus delivery loop failed', error);
      })
      .finally(() => {
        this.draining = null;
        if (this.running && this.queue.length > 0) {
          this.scheduleDrain();
        }
      });
  }

  private async drain(): Promise<void> {
    while (this.running && this.queue.length > 0) {
      const message = this.queue.shift();
      if (message) {
        await this.deliver(message);
      }
    }
  }

  private async deliver(message: Message): Promise<void> {
    let count = 0;

    for (const subscription of [...this.subscriptions.values()]) {
      if (subscription.type !== message.type) {
        continue;
      }
      if (message.recipient !== undefined && message.recipient !== subscription.subscriberId) {
        continue;
      }

      for (const callback of [...subscription.callbacks]) {
        try {
          await callback(message);
          count++;
        } catch (error) {
          this.deliveryErrors++;
          this.logger?.logError(`Subscriber ${subscription.subscriberId} failed on ${message.type}`, error);
        }
      }
    }

    this.delivered += count;
    this.logger?.debug('EVENT_BUS', `Delivered ${message.id} to ${count} callback(s)`);
  }
}
