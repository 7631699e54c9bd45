import { ButtonStyle } from 'discord.js';
import { z } from 'zod';
import { ConfigError } from '../paginator/errors.js';
import { readEnv } from '../util/env.js';

export const MAX_IDLE_TIMEOUT_SECONDS = 2_147_483;

const emojiSchema = z.union([
  z.string().min(1),
  z.object({
    id: z.string().optional(),
    name: z.string().optional(),
    animated: z.boolean().optional(),
  }).strict(),
]);

export const paginatorConfigSchema = z.object({
  showFirst: z.boolean(),
  showBack: z.boolean(),
  showNext: z.boolean(),
  showLast: z.boolean(),
  showCallback: z.boolean(),
  showSelectMenu: z.boolean(),
  firstEmoji: emojiSchema,
  backEmoji: emojiSchema,
  nextEmoji: emojiSchema,
  lastEmoji: emojiSchema,
  callbackEmoji: emojiSchema,
  buttonStyle: z.union([
    z.literal(ButtonStyle.Primary),
    z.literal(ButtonStyle.Secondary),
    z.literal(ButtonStyle.Success),
    z.literal(ButtonStyle.Danger),
  ]),
  wrongUserMessage: z.string().max(2000),
  defaultTitle: z.string().min(1).max(256).optional(),
  defaultColor: z.number().int().min(0).max(0xffffff),
  // setTimeout caps delays at 2^31-1 ms
  idleTimeoutSeconds: z.number().finite().min(0).max(MAX_IDLE_TIMEOUT_SECONDS),
}).strict();

export type PaginatorConfig = z.infer<typeof paginatorConfigSchema>;
export type ControlEmoji = PaginatorConfig['firstEmoji'];

export const DEFAULT_PAGINATOR_CONFIG: Readonly<PaginatorConfig> = Object.freeze({
  showFirst: true,
  showBack: true,
  showNext: true,
  showLast: true,
  showCallback: false,
  showSelectMenu: false,
  firstEmoji: '⏮️',
  backEmoji: '⬅️',
  nextEmoji: '➡️',
  lastEmoji: '⏩',
  callbackEmoji: '✅',
  buttonStyle: ButtonStyle.Primary,
  wrongUserMessage: 'This paginator is not for you',
  defaultColor: 0x5865f2, // blurple
  idleTimeoutSeconds: 0,
});

function parseColor(raw: string): number | string {
  const hex = raw.replace(/^(#|0x)/i, '');
  return /^[0-9a-f]{1,6}$/i.test(hex) ? parseInt(hex, 16) : raw;
}

/**
 * Values taken from the process environment. Unparseable numbers are passed
 * through as strings so the schema reports them.
 */
export function envOverrides(): Partial<Record<keyof PaginatorConfig, unknown>> {
  const out: Partial<Record<keyof PaginatorConfig, unknown>> = {};
  const timeout = readEnv('PAGINATOR_IDLE_TIMEOUT_SECONDS');
  if (timeout !== undefined) out.idleTimeoutSeconds = Number.isNaN(Number(timeout)) ? timeout : Number(timeout);
  // an empty value is meaningful here: it switches the notice off
  const wrongUser = process.env.PAGINATOR_WRONG_USER_MESSAGE;
  if (wrongUser !== undefined) out.wrongUserMessage = wrongUser;
  const color = readEnv('PAGINATOR_DEFAULT_COLOR');
  if (color !== undefined) out.defaultColor = parseColor(color);
  return out;
}

/**
 * Merge defaults, environment and explicit overrides (later wins) and validate.
 * Keys explicitly set to `undefined` in `overrides` are ignored.
 */
export function resolvePaginatorConfig(overrides: Partial<PaginatorConfig> = {}): PaginatorConfig {
  const explicit = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  const parsed = paginatorConfigSchema.safeParse({ ...DEFAULT_PAGINATOR_CONFIG, ...envOverrides(), ...explicit });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid paginator config: ${issues}`);
  }
  return parsed.data;
}
