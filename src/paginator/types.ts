import type { ControlRole } from './controls.js';
import type { ComponentsPayload, MessagePayload } from './render.js';

export type Author = { id: string };

/** One button press or menu choice, as delivered to a paginator. */
export interface InteractionContext {
  readonly user: Author;
  readonly customId: string;
  /** Chosen option values; empty for buttons. */
  readonly values: readonly string[];
  /** Acknowledge without changing anything visible. */
  deferInPlace(): Promise<void>;
  ephemeralReply(text: string): Promise<void>;
  /** Acknowledge by replacing the message the control belongs to. */
  editOriginInPlace(payload: MessagePayload): Promise<void>;
}

export type InteractionHandler = (ctx: InteractionContext) => Promise<unknown>;

export type PaginatorCallback = (ctx: InteractionContext) => Promise<unknown> | unknown;

/**
 * What a paginator needs from the chat client. `TContext` is whatever
 * triggered the paginator (a command, a message); `THandle` is a sent message.
 */
export interface MessagingClient<TContext, THandle> {
  sendMessage(context: TContext, payload: MessagePayload): Promise<THandle>;
  replyMessage(context: TContext, payload: MessagePayload): Promise<THandle>;
  editMessage(handle: THandle, payload: MessagePayload | ComponentsPayload): Promise<void>;
  /** Route every `{sessionId}|{role}` custom id to `handler`. */
  registerInteractionHandler(sessionId: string, roles: readonly ControlRole[], handler: InteractionHandler): void;
  unregisterInteractionHandler(sessionId: string): void;
  /** Id of the user who triggered `context`. */
  resolveAuthor(context: TContext): string;
}
