import {
  ActionRowBuilder,
  ButtonBuilder,
  EmbedBuilder,
  StringSelectMenuBuilder,
  StringSelectMenuOptionBuilder,
  type MessageActionRowComponentBuilder,
} from 'discord.js';
import { buildControls, spreadToRows, type ControlSpec, type LayoutInput } from './controls.js';
import { RenderError } from './errors.js';
import { pageEmbed } from './page.js';

export type ControlRow = ActionRowBuilder<MessageActionRowComponentBuilder>;

export type MessagePayload = {
  embeds: EmbedBuilder[];
  components: ControlRow[];
};

/** Edit that only swaps the controls and leaves the embed alone. */
export type ComponentsPayload = Pick<MessagePayload, 'components'>;

function toComponent(spec: ControlSpec): MessageActionRowComponentBuilder {
  if (spec.kind === 'select') {
    return new StringSelectMenuBuilder()
      .setCustomId(spec.customId)
      .setPlaceholder(spec.placeholder)
      .setMinValues(1)
      .setMaxValues(1)
      .setDisabled(spec.disabled)
      .addOptions(spec.options.map((o) => new StringSelectMenuOptionBuilder().setLabel(o.label).setValue(o.value)));
  }
  return new ButtonBuilder()
    .setCustomId(spec.customId)
    .setStyle(spec.style)
    .setEmoji(spec.emoji)
    .setDisabled(spec.disabled);
}

export function toActionRows(controls: readonly ControlSpec[]): ControlRow[] {
  return spreadToRows(controls).map((row) =>
    new ActionRowBuilder<MessageActionRowComponentBuilder>().addComponents(row.map(toComponent)),
  );
}

export function renderControls(input: LayoutInput): ControlRow[] {
  return toActionRows(buildControls(input));
}

/**
 * Full message for the current page: the page embed with default title and
 * colour filled in, a `Page i/N` footer, and the controls for this position.
 */
export function toMessagePayload(input: LayoutInput): MessagePayload {
  const { pages, pageIndex, config } = input;
  const page = pages[pageIndex];
  if (!page) throw new RenderError(`No page at index ${pageIndex} (${pages.length} pages)`);

  const embed = pageEmbed(page);
  if (!embed.data.title && config.defaultTitle) embed.setTitle(config.defaultTitle);
  if (embed.data.color === undefined) embed.setColor(config.defaultColor);
  embed.setFooter({ text: `Page ${pageIndex + 1}/${pages.length}` });

  return { embeds: [embed], components: renderControls(input) };
}
