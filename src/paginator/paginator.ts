import { randomUUID } from 'node:crypto';
import type { EmbedBuilder } from 'discord.js';
import { resolvePaginatorConfig, type PaginatorConfig } from '../config/paginator.js';
import { withScope } from '../log.js';
import { CONTROL_ROLES, parseCustomId, type LayoutInput } from './controls.js';
import { RenderError, StateError } from './errors.js';
import { embedPage, textPage, type PageEntry } from './page.js';
import { renderControls, toMessagePayload, type MessagePayload } from './render.js';
import { DEFAULT_PAGE_SIZE, codePointLength, packEntries, wrapText } from './segment.js';
import type { InteractionContext, MessagingClient, PaginatorCallback } from './types.js';
import { IdleWatchdog } from './watchdog.js';

const log = withScope('paginator');

export type PaginatorState = 'unsent' | 'active' | 'stopped';

export type PaginatorOptions = {
  pages?: PageEntry[];
  /** Invoked by the callback button; it owns the interaction response. */
  callback?: PaginatorCallback;
  config?: Partial<PaginatorConfig>;
};

export type TextPaginatorOptions = Omit<PaginatorOptions, 'pages'> & {
  prefix?: string;
  suffix?: string;
  /** Maximum characters per page, prefix and suffix included. */
  pageSize?: number;
};

export class Paginator<TContext, THandle> {
  readonly sessionId: string = randomUUID();
  readonly pages: PageEntry[];
  readonly config: PaginatorConfig;
  callback: PaginatorCallback | undefined;

  private index = 0;
  private state: PaginatorState = 'unsent';
  private handle: THandle | undefined;
  private author: string | undefined;
  private watchdog: IdleWatchdog | undefined;
  private registered = false;

  constructor(private readonly client: MessagingClient<TContext, THandle>, options: PaginatorOptions = {}) {
    this.pages = options.pages ?? [];
    this.callback = options.callback;
    this.config = resolvePaginatorConfig(options.config);
  }

  /** Pages are the given embeds, shown as they are. */
  static fromEmbeds<C, H>(
    client: MessagingClient<C, H>,
    embeds: readonly EmbedBuilder[],
    options: Omit<PaginatorOptions, 'pages'> = {},
  ): Paginator<C, H> {
    return new Paginator(client, { ...options, pages: embeds.map(embedPage) });
  }

  /** Word-wraps `content`, so whitespace at page breaks is dropped. */
  static fromString<C, H>(client: MessagingClient<C, H>, content: string, options: TextPaginatorOptions = {}): Paginator<C, H> {
    const { prefix = '', suffix = '', pageSize = DEFAULT_PAGE_SIZE, ...rest } = options;
    const chunks = wrapText(content, pageSize - (codePointLength(prefix) + codePointLength(suffix)));
    return new Paginator(client, { ...rest, pages: chunks.map((c) => textPage(c, { prefix, suffix })) });
  }

  /** Packs whole entries into pages; useful to keep line formatting intact. */
  static fromList<C, H>(client: MessagingClient<C, H>, entries: readonly string[], options: TextPaginatorOptions = {}): Paginator<C, H> {
    const { prefix = '', suffix = '', pageSize = DEFAULT_PAGE_SIZE, ...rest } = options;
    const bodies = packEntries(entries, pageSize);
    return new Paginator(client, { ...rest, pages: bodies.map((b) => textPage(b, { prefix, suffix })) });
  }

  get pageIndex(): number {
    return this.index;
  }

  /** Clamped into the page range; call `update()` afterwards to show it. */
  set pageIndex(value: number) {
    const last = Math.max(this.pages.length - 1, 0);
    this.index = Math.min(Math.max(Math.trunc(value) || 0, 0), last);
  }

  get status(): PaginatorState {
    return this.state;
  }

  get message(): THandle | undefined {
    return this.handle;
  }

  get authorId(): string | undefined {
    return this.author;
  }

  toMessagePayload(): MessagePayload {
    // pages may have been edited in place since the index was last set
    this.pageIndex = this.index;
    const payload = toMessagePayload(this.layout(false));
    if (this.state === 'stopped') payload.components = renderControls(this.layout(true));
    return payload;
  }

  send(context: TContext): Promise<THandle> {
    return this.dispatch(context, (ctx, payload) => this.client.sendMessage(ctx, payload));
  }

  reply(context: TContext): Promise<THandle> {
    return this.dispatch(context, (ctx, payload) => this.client.replyMessage(ctx, payload));
  }

  /** Disables every control. Safe to call again once stopped. */
  async stop(): Promise<void> {
    const handle = this.requireMessage('stop');
    if (this.state === 'stopped') return;
    await this.shutdown(handle, 'stopped');
  }

  /** Re-renders the live message, e.g. after `pageIndex` was set directly. */
  async update(): Promise<void> {
    const handle = this.requireMessage('update');
    await this.client.editMessage(handle, this.toMessagePayload());
  }

  async onInteraction(ctx: InteractionContext): Promise<unknown> {
    if (ctx.user.id !== this.author) {
      log.debug({ sessionId: this.sessionId, userId: ctx.user.id }, 'interaction from non-owner');
      if (this.config.wrongUserMessage) return ctx.ephemeralReply(this.config.wrongUserMessage);
      return ctx.deferInPlace();
    }
    if (this.state !== 'active') return ctx.deferInPlace();

    this.watchdog?.ping();

    const role = parseCustomId(ctx.customId)?.role;
    switch (role) {
      case 'first':
        this.index = 0;
        break;
      case 'last':
        this.index = this.pages.length - 1;
        break;
      case 'next':
        if (this.index + 1 < this.pages.length) this.index += 1;
        break;
      case 'back':
        if (this.index - 1 >= 0) this.index -= 1;
        break;
      case 'select': {
        const raw = ctx.values[0] ?? '';
        const picked = /^\d+$/.test(raw) ? Number(raw) : NaN;
        if (picked < this.pages.length) this.index = picked;
        else log.debug({ sessionId: this.sessionId, value: raw }, 'ignoring out-of-range page selection');
        break;
      }
      case 'callback':
        if (this.callback) return this.callback(ctx);
        break;
      default:
        break;
    }

    await ctx.editOriginInPlace(this.toMessagePayload());
    return undefined;
  }

  private layout(disabled: boolean): LayoutInput {
    return {
      sessionId: this.sessionId,
      pages: this.pages,
      pageIndex: this.index,
      config: this.config,
      disabled,
    };
  }

  private requireMessage(op: string): THandle {
    if (this.handle === undefined) throw new StateError(`Cannot ${op} a paginator that has not been sent`);
    return this.handle;
  }

  private async dispatch(
    context: TContext,
    deliver: (ctx: TContext, payload: MessagePayload) => Promise<THandle>,
  ): Promise<THandle> {
    if (this.state === 'stopped') throw new StateError('Paginator was stopped; create a new one');
    if (this.pages.length === 0) throw new RenderError('Paginator has no pages to send');

    const handle = await deliver(context, this.toMessagePayload());
    this.handle = handle;
    this.author = this.client.resolveAuthor(context);
    this.state = 'active';

    if (!this.registered) {
      this.client.registerInteractionHandler(this.sessionId, CONTROL_ROLES, (ctx) => this.onInteraction(ctx));
      this.registered = true;
    }

    this.watchdog?.stop();
    this.watchdog = undefined;
    const seconds = this.config.idleTimeoutSeconds;
    if (seconds > 0) {
      const watchdog: IdleWatchdog = new IdleWatchdog(seconds * 1000, () => this.expire(watchdog));
      this.watchdog = watchdog;
      void watchdog.start().catch((err: unknown) => {
        log.error({ err, sessionId: this.sessionId }, 'failed to disable paginator after idle timeout');
      });
    }

    log.debug({ sessionId: this.sessionId, pages: this.pages.length, idleTimeoutSeconds: seconds }, 'paginator sent');
    return handle;
  }

  private async expire(watchdog: IdleWatchdog): Promise<void> {
    // a newer send replaced this watchdog, or stop() got there first
    if (watchdog !== this.watchdog || this.state !== 'active' || this.handle === undefined) return;
    log.debug({ sessionId: this.sessionId }, 'paginator idle, disabling controls');
    await this.shutdown(this.handle, 'timed out');
  }

  private async shutdown(handle: THandle, reason: string): Promise<void> {
    this.state = 'stopped';
    this.watchdog?.stop();
    this.client.unregisterInteractionHandler(this.sessionId);
    this.registered = false;
    log.debug({ sessionId: this.sessionId, reason }, 'paginator stopped');
    await this.client.editMessage(handle, { components: renderControls(this.layout(true)) });
  }
}
