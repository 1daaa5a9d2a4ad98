// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a TaskId where a MessageId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type MessageId = Brand<string, 'MessageId'>;
export type ConversationId = Brand<string, 'ConversationId'>;
export type TaskId = Brand<string, 'TaskId'>;
export type ExecutionId = Brand<string, 'ExecutionId'>;
