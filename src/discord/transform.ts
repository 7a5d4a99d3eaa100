/**
 * Discord Module - Pure Transformations
 *
 * Maps notification payloads onto discord.js builders and discord.js
 * failures onto ChatError values.
 */
import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
} from "discord.js";
import type {
  ChatError,
  NotificationAction,
  NotificationPayload,
} from "../notifications/index.js";
import {
  notFound,
  permissionDenied,
  sendFailed,
} from "../notifications/index.js";

/**
 * Discord JSON error codes we react to.
 * @see https://discord.com/developers/docs/topics/opcodes-and-status-codes#json
 */
export const DISCORD_ERROR_CODES = {
  unknownChannel: 10003,
  unknownMessage: 10008,
  missingAccess: 50001,
  missingPermissions: 50013,
} as const;

// =============================================================================
// Message Building
// =============================================================================

/**
 * One-button action row.
 */
export function buildActionRow(
  action: NotificationAction,
): ActionRowBuilder<ButtonBuilder> {
  const button = new ButtonBuilder()
    .setCustomId(action.customId)
    .setLabel(action.label)
    .setStyle(ButtonStyle.Danger)
    .setDisabled(action.disabled);

  return new ActionRowBuilder<ButtonBuilder>().addComponents(button);
}

/**
 * Embed for the notification card.
 */
export function buildEmbed(payload: NotificationPayload): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(payload.title)
    .setDescription(payload.description)
    .setColor(payload.color)
    .addFields(
      payload.fields.map((field) => ({
        name: field.name,
        value: field.value,
        inline: false,
      })),
    );
}

export type DiscordMessageOptions = {
  embeds: EmbedBuilder[];
  components: ActionRowBuilder<ButtonBuilder>[];
};

/**
 * Message options for TextChannel.send().
 */
export function buildMessageOptions(
  payload: NotificationPayload,
): DiscordMessageOptions {
  return {
    embeds: [buildEmbed(payload)],
    components: [buildActionRow(payload.action)],
  };
}

// =============================================================================
// Error Mapping
// =============================================================================

function readCode(error: unknown): unknown {
  return typeof error === "object" && error !== null && "code" in error
    ? error.code
    : undefined;
}

function readStatus(error: unknown): unknown {
  return typeof error === "object" && error !== null && "status" in error
    ? error.status
    : undefined;
}

/**
 * Classify a discord.js rejection (usually a DiscordAPIError).
 *
 * @param resource - What the failed call was looking up
 */
export function toChatError(
  error: unknown,
  resource: "message" | "channel",
): ChatError {
  const message = error instanceof Error ? error.message : String(error);
  const code = readCode(error);
  const status = readStatus(error);

  if (
    code === DISCORD_ERROR_CODES.unknownMessage ||
    code === DISCORD_ERROR_CODES.unknownChannel ||
    status === 404
  ) {
    return notFound(
      code === DISCORD_ERROR_CODES.unknownChannel ? "channel" : resource,
      message,
    );
  }

  if (
    code === DISCORD_ERROR_CODES.missingPermissions ||
    code === DISCORD_ERROR_CODES.missingAccess ||
    status === 403
  ) {
    return permissionDenied(message);
  }

  return sendFailed(message, error instanceof Error ? error : undefined);
}
