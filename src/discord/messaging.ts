import { ChatInputCommandInteraction, type Client, type Message } from 'discord.js';
import type { ControlRole } from '../paginator/controls.js';
import { StateError } from '../paginator/errors.js';
import type { ComponentsPayload, MessagePayload } from '../paginator/render.js';
import type { InteractionHandler, MessagingClient } from '../paginator/types.js';
import { ComponentRouter } from './router.js';

/** What can start a paginator: a slash command or a plain message. */
export type PaginatorContext = ChatInputCommandInteraction | Message;

/**
 * discord.js implementation of {@link MessagingClient}.
 *
 * @example
 * const messaging = new DiscordMessaging(client);
 * await Paginator.fromList(messaging, lines, { config: { idleTimeoutSeconds: 120 } }).send(interaction);
 */
export class DiscordMessaging implements MessagingClient<PaginatorContext, Message> {
  readonly router: ComponentRouter;

  constructor(client?: Client, router = new ComponentRouter()) {
    this.router = router;
    if (client) router.attach(client);
  }

  async sendMessage(context: PaginatorContext, payload: MessagePayload): Promise<Message> {
    if (context instanceof ChatInputCommandInteraction) {
      if (context.deferred || context.replied) return context.editReply(payload);
      await context.reply(payload);
      return context.fetchReply();
    }
    if (!context.channel.isSendable()) {
      throw new StateError(`Channel ${context.channelId} does not accept messages`);
    }
    return context.channel.send(payload);
  }

  async replyMessage(context: PaginatorContext, payload: MessagePayload): Promise<Message> {
    if (context instanceof ChatInputCommandInteraction) {
      if (!context.deferred && !context.replied) return this.sendMessage(context, payload);
      return context.followUp(payload);
    }
    return context.reply(payload);
  }

  async editMessage(handle: Message, payload: MessagePayload | ComponentsPayload): Promise<void> {
    await handle.edit(payload);
  }

  registerInteractionHandler(sessionId: string, roles: readonly ControlRole[], handler: InteractionHandler): void {
    this.router.register(sessionId, roles, handler);
  }

  unregisterInteractionHandler(sessionId: string): void {
    this.router.unregister(sessionId);
  }

  resolveAuthor(context: PaginatorContext): string {
    return context instanceof ChatInputCommandInteraction ? context.user.id : context.author.id;
  }
}
