import {
  Events,
  MessageFlags,
  type ButtonInteraction,
  type Client,
  type Interaction,
  type StringSelectMenuInteraction,
} from 'discord.js';
import { withScope } from '../log.js';
import { customIdFor, parseCustomId, type ControlRole } from '../paginator/controls.js';
import type { InteractionContext, InteractionHandler } from '../paginator/types.js';

const log = withScope('router');

export type PaginatorComponentInteraction = ButtonInteraction | StringSelectMenuInteraction;

/** Context handed to paginators; `interaction` is the raw discord.js object for callbacks that need it. */
export interface DiscordInteractionContext extends InteractionContext {
  readonly interaction: PaginatorComponentInteraction;
}

export function isDiscordContext(ctx: InteractionContext): ctx is DiscordInteractionContext {
  return 'interaction' in ctx;
}

export function toInteractionContext(interaction: PaginatorComponentInteraction): DiscordInteractionContext {
  return {
    interaction,
    user: { id: interaction.user.id },
    customId: interaction.customId,
    values: interaction.isStringSelectMenu() ? interaction.values : [],
    async deferInPlace() {
      await interaction.deferUpdate();
    },
    async ephemeralReply(text) {
      await interaction.reply({ content: text, flags: MessageFlags.Ephemeral });
    },
    async editOriginInPlace(payload) {
      await interaction.update(payload);
    },
  };
}

/**
 * Maps `{sessionId}|{role}` custom ids to paginator handlers. One router can
 * serve any number of paginators.
 */
export class ComponentRouter {
  private readonly handlers = new Map<string, InteractionHandler>();
  private readonly sessions = new Map<string, string[]>();

  get size(): number {
    return this.sessions.size;
  }

  register(sessionId: string, roles: readonly ControlRole[], handler: InteractionHandler): void {
    this.unregister(sessionId);
    const ids = roles.map((role) => customIdFor(sessionId, role));
    for (const id of ids) this.handlers.set(id, handler);
    this.sessions.set(sessionId, ids);
  }

  unregister(sessionId: string): void {
    for (const id of this.sessions.get(sessionId) ?? []) this.handlers.delete(id);
    this.sessions.delete(sessionId);
  }

  has(customId: string): boolean {
    return this.handlers.has(customId);
  }

  /**
   * Runs the handler bound to `ctx.customId`; false when nothing is bound.
   * A paginator id whose session is gone is still acknowledged so the client
   * does not report a failed interaction.
   */
  async dispatch(ctx: InteractionContext): Promise<boolean> {
    const handler = this.handlers.get(ctx.customId);
    if (!handler) {
      if (parseCustomId(ctx.customId)) await ctx.deferInPlace();
      return false;
    }
    await handler(ctx);
    return true;
  }

  attach(client: Client): void {
    client.on(Events.InteractionCreate, (i: Interaction) => {
      if (!i.isButton() && !i.isStringSelectMenu()) return;
      if (!parseCustomId(i.customId)) return;
      void this.handle(i);
    });
  }

  private async handle(i: PaginatorComponentInteraction): Promise<void> {
    try {
      await this.dispatch(toInteractionContext(i));
    } catch (err) {
      log.error({ err, customId: i.customId, userId: i.user.id }, 'paginator interaction failed');
      if (i.replied || i.deferred) return;
      await i
        .reply({ content: 'Something went wrong. Try again.', flags: MessageFlags.Ephemeral })
        .catch((replyErr: unknown) => log.warn({ err: replyErr }, 'could not report interaction failure'));
    }
  }
}
