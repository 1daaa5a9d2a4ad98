// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  component: string;
  agentId?: string;
  conversationId?: string;
  messageId?: string;
  [key: string]: unknown;
}
