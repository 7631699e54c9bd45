export { Paginator } from './paginator/paginator.js';
export type { PaginatorOptions, PaginatorState, TextPaginatorOptions } from './paginator/paginator.js';
export { textPage, embedPage, pageSummary, pageEmbed, shorten } from './paginator/page.js';
export type { PageEntry, TextPage, EmbedPage } from './paginator/page.js';
export { wrapText, packEntries, DEFAULT_PAGE_SIZE } from './paginator/segment.js';
export { buildControls, spreadToRows, customIdFor, parseCustomId, CONTROL_ROLES } from './paginator/controls.js';
export type { ControlRole, ControlSpec, ButtonControl, SelectControl, LayoutInput } from './paginator/controls.js';
export { toMessagePayload, renderControls, toActionRows } from './paginator/render.js';
export type { MessagePayload, ComponentsPayload, ControlRow } from './paginator/render.js';
export { IdleWatchdog, ActivitySignal } from './paginator/watchdog.js';
export { PaginatorError, RenderError, StateError, ConfigError } from './paginator/errors.js';
export type { MessagingClient, InteractionContext, InteractionHandler, PaginatorCallback, Author } from './paginator/types.js';
export { resolvePaginatorConfig, DEFAULT_PAGINATOR_CONFIG, paginatorConfigSchema } from './config/paginator.js';
export type { PaginatorConfig } from './config/paginator.js';
export { DiscordMessaging } from './discord/messaging.js';
export type { PaginatorContext } from './discord/messaging.js';
export { ComponentRouter, toInteractionContext, isDiscordContext } from './discord/router.js';
export type { DiscordInteractionContext } from './discord/router.js';
export { log } from './log.js';
