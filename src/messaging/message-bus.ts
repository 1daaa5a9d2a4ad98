/**
 * Message Bus — in-process router between agents.
 *
 * Every registered handler owns a bounded FIFO queue and a delivery loop that
 * drains it, so a slow handler never stalls another handler's traffic.
 * Senders wait when the recipient's queue is full.
 */
import type { Logger } from '@/observability/logger.js';
import type { BoundedQueue } from './message-queue.js';
import { createBoundedQueue } from './message-queue.js';
import { TERMINAL_STATUSES } from './types.js';
import type {
  BusStats,
  HandlerStats,
  HistoryFilter,
  Message,
  MessageBus,
  MessageHandler,
} from './types.js';

// ─── Handler Tracking ───────────────────────────────────────────

interface HandlerEntry {
  id: string;
  handler: MessageHandler;
  queue: BoundedQueue<Message>;
  broadcastOnly: boolean;
  isActive: boolean;
  messageCount: number;
  lastActivity?: Date;
  loop: Promise<void>;
}

// ─── Bus Dependencies ───────────────────────────────────────────

export interface MessageBusOptions {
  logger: Logger;
  /** Messages retained for history queries. Defaults to 1000. */
  historySize?: number;
  /** Per-handler queue bound. Defaults to 1000. */
  queueCapacity?: number;
  /** How long a delivery loop waits for a message before re-checking shutdown. Defaults to 1000. */
  pollIntervalMs?: number;
}

const DEFAULT_HISTORY_LIMIT = 100;

// ─── Factory Function ───────────────────────────────────────────

/**
 * Create a message bus. The bus accepts traffic only between `start()` and `stop()`.
 */
export function createMessageBus(options: MessageBusOptions): MessageBus {
  const { logger, historySize = 1000, queueCapacity = 1000, pollIntervalMs = 1000 } = options;

  const handlers = new Map<string, HandlerEntry>();
  const history: Message[] = [];
  let running = false;
  let totalMessages = 0;

  function record(message: Message): void {
    totalMessages++;
    history.push(message);
    if (history.length > historySize) {
      history.splice(0, history.length - historySize);
    }
  }

  async function deliveryLoop(entry: HandlerEntry): Promise<void> {
    while (entry.isActive) {
      const message = await entry.queue.take(pollIntervalMs);
      if (!message || !entry.isActive) continue;

      entry.messageCount++;
      entry.lastActivity = new Date();

      try {
        await entry.handler(message);
      } catch (error) {
        logger.error('Message handler failed', {
          component: 'message-bus',
          handlerId: entry.id,
          messageId: message.id,
          messageType: message.type,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  function addHandler(handlerId: string, handler: MessageHandler, broadcastOnly: boolean): boolean {
    if (handlers.has(handlerId)) {
      logger.warn('Handler already registered', { component: 'message-bus', handlerId });
      return false;
    }

    const entry: HandlerEntry = {
      id: handlerId,
      handler,
      queue: createBoundedQueue<Message>(queueCapacity),
      broadcastOnly,
      isActive: true,
      messageCount: 0,
      loop: Promise.resolve(),
    };
    handlers.set(handlerId, entry);
    entry.loop = deliveryLoop(entry);

    logger.info('Registered message handler', {
      component: 'message-bus',
      handlerId,
      broadcastOnly,
    });
    return true;
  }

  /** Deactivate and remove a handler; returns its loop so callers may await it. */
  function removeHandler(handlerId: string): Promise<void> | undefined {
    const entry = handlers.get(handlerId);
    if (!entry) return undefined;

    entry.isActive = false;
    handlers.delete(handlerId);

    const dropped = entry.queue.close();
    for (const message of dropped) {
      if (message.recipientId === handlerId) message.status = 'cancelled';
    }

    logger.info('Unregistered message handler', {
      component: 'message-bus',
      handlerId,
      droppedMessages: dropped.length,
    });
    return entry.loop;
  }

  function refuseTerminal(message: Message): boolean {
    if (!TERMINAL_STATUSES.has(message.status)) return false;
    logger.warn('Refusing to resend a message in a terminal state', {
      component: 'message-bus',
      messageId: message.id,
      status: message.status,
    });
    return true;
  }

  function refuseStopped(message: Message): boolean {
    if (running) return false;
    message.status = 'failed';
    logger.warn('Message bus not running', {
      component: 'message-bus',
      messageId: message.id,
      messageType: message.type,
    });
    return true;
  }

  async function fanOut(message: Message): Promise<boolean> {
    record(message);
    message.status = 'processing';

    const targets = [...handlers.values()].filter((entry) => entry.isActive);
    const accepted = await Promise.all(targets.map((entry) => entry.queue.put(message)));

    message.status = 'completed';
    logger.debug('Broadcast message', {
      component: 'message-bus',
      messageId: message.id,
      messageType: message.type,
      deliveries: accepted.filter(Boolean).length,
    });
    return true;
  }

  const bus: MessageBus = {
    start(): void {
      if (running) return;
      running = true;
      logger.info('Message bus started', { component: 'message-bus' });
    },

    async stop(): Promise<void> {
      if (!running) return;
      running = false;

      const loops = [...handlers.keys()]
        .map((handlerId) => removeHandler(handlerId))
        .filter((loop): loop is Promise<void> => loop !== undefined);
      await Promise.all(loops);

      logger.info('Message bus stopped', { component: 'message-bus' });
    },

    isRunning(): boolean {
      return running;
    },

    registerHandler(handlerId, handler): boolean {
      return addHandler(handlerId, handler, false);
    },

    registerBroadcastHandler(handlerId, handler): boolean {
      return addHandler(handlerId, handler, true);
    },

    unregisterHandler(handlerId): boolean {
      return removeHandler(handlerId) !== undefined;
    },

    hasHandler(handlerId): boolean {
      return handlers.get(handlerId)?.isActive === true;
    },

    async sendMessage(message): Promise<boolean> {
      if (refuseTerminal(message) || refuseStopped(message)) return false;

      const recipientId = message.recipientId;
      if (recipientId === undefined) {
        return fanOut(message);
      }

      record(message);
      message.status = 'processing';

      const entry = handlers.get(recipientId);
      if (!entry || !entry.isActive || entry.broadcastOnly) {
        message.status = 'failed';
        logger.warn('Recipient not found', {
          component: 'message-bus',
          messageId: message.id,
          recipientId,
        });
        return false;
      }

      const accepted = await entry.queue.put(message);
      if (!accepted) {
        message.status = 'failed';
        logger.warn('Recipient queue closed before delivery', {
          component: 'message-bus',
          messageId: message.id,
          recipientId,
        });
        return false;
      }

      message.status = 'completed';
      logger.debug('Sent message', {
        component: 'message-bus',
        messageId: message.id,
        messageType: message.type,
        senderId: message.senderId,
        recipientId,
      });
      return true;
    },

    async broadcastMessage(message): Promise<boolean> {
      if (refuseTerminal(message) || refuseStopped(message)) return false;
      return fanOut(message);
    },

    getMessageHistory(filter: HistoryFilter = {}): Message[] {
      const { handlerId, type, limit = DEFAULT_HISTORY_LIMIT } = filter;
      let messages = history;

      if (handlerId !== undefined) {
        messages = messages.filter(
          (message) => message.senderId === handlerId || message.recipientId === handlerId,
        );
      }
      if (type !== undefined) {
        messages = messages.filter((message) => message.type === type);
      }

      return limit > 0 ? messages.slice(-limit) : [];
    },

    getHandlerStats(): Record<string, HandlerStats> {
      const stats: Record<string, HandlerStats> = {};
      for (const [handlerId, entry] of handlers) {
        stats[handlerId] = {
          isActive: entry.isActive,
          broadcastOnly: entry.broadcastOnly,
          messageCount: entry.messageCount,
          lastActivity: entry.lastActivity,
          queueSize: entry.queue.size,
        };
      }
      return stats;
    },

    getBusStats(): BusStats {
      const queueSizes: Record<string, number> = {};
      let activeHandlers = 0;
      for (const [handlerId, entry] of handlers) {
        queueSizes[handlerId] = entry.queue.size;
        if (entry.isActive) activeHandlers++;
      }
      return {
        isRunning: running,
        totalHandlers: handlers.size,
        activeHandlers,
        totalMessages,
        historySize: history.length,
        queueSizes,
      };
    },
  };

  return bus;
}
