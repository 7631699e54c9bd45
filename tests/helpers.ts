import { ComponentRouter } from '../src/discord/router.js';
import type { ControlRole } from '../src/paginator/controls.js';
import type { ComponentsPayload, MessagePayload } from '../src/paginator/render.js';
import type { InteractionContext, InteractionHandler, MessagingClient } from '../src/paginator/types.js';

export type FakeContext = { authorId: string };
export type FakeMessage = { id: number; via: 'send' | 'reply' };

/** In-process stand-in for a chat client; records every call. */
export class FakeMessaging implements MessagingClient<FakeContext, FakeMessage> {
  readonly router = new ComponentRouter();
  readonly sent: { via: 'send' | 'reply'; payload: MessagePayload }[] = [];
  readonly edits: { message: FakeMessage; payload: MessagePayload | ComponentsPayload }[] = [];
  failEdits = false;
  private nextId = 1;

  async sendMessage(_ctx: FakeContext, payload: MessagePayload): Promise<FakeMessage> {
    this.sent.push({ via: 'send', payload });
    return { id: this.nextId++, via: 'send' };
  }

  async replyMessage(_ctx: FakeContext, payload: MessagePayload): Promise<FakeMessage> {
    this.sent.push({ via: 'reply', payload });
    return { id: this.nextId++, via: 'reply' };
  }

  async editMessage(message: FakeMessage, payload: MessagePayload | ComponentsPayload): Promise<void> {
    if (this.failEdits) throw new Error('Unknown Message');
    this.edits.push({ message, payload });
  }

  registerInteractionHandler(sessionId: string, roles: readonly ControlRole[], handler: InteractionHandler): void {
    this.router.register(sessionId, roles, handler);
  }

  unregisterInteractionHandler(sessionId: string): void {
    this.router.unregister(sessionId);
  }

  resolveAuthor(ctx: FakeContext): string {
    return ctx.authorId;
  }
}

export type FakeInteraction = InteractionContext & {
  calls: string[];
  ephemeral: string[];
  updates: MessagePayload[];
};

export function fakeInteraction(userId: string, customId: string, values: string[] = []): FakeInteraction {
  const calls: string[] = [];
  const ephemeral: string[] = [];
  const updates: MessagePayload[] = [];
  return {
    user: { id: userId },
    customId,
    values,
    calls,
    ephemeral,
    updates,
    async deferInPlace() {
      calls.push('defer');
    },
    async ephemeralReply(text) {
      calls.push('ephemeral');
      ephemeral.push(text);
    },
    async editOriginInPlace(payload) {
      calls.push('edit-origin');
      updates.push(payload);
    },
  };
}

/** Lets every pending promise chain run (setImmediate is left real in timer tests). */
export const settle = () => new Promise<void>((resolve) => setImmediate(resolve));
