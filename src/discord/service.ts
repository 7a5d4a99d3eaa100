/**
 * Discord Module - Service Layer
 *
 * discord.js session, the ChatChannel implementation used by the
 * notification manager, and the lock-all interaction adapter.
 */
import {
  type ActionRowBuilder,
  type ButtonBuilder,
  ChannelType,
  Client,
  Events,
  GatewayIntentBits,
  MessageFlags,
} from "discord.js";
import { type Result, err, ok } from "neverthrow";
import type { LockAllInteraction } from "../lock-all/index.js";
import { createLogger } from "../logger.js";
import type {
  ChatChannel,
  ChatError,
  NotificationAction,
  NotificationPayload,
} from "../notifications/index.js";
import {
  channelUnavailable,
  formatChatError,
  LOCK_ALL_CUSTOM_ID,
  notFound,
} from "../notifications/index.js";
import {
  type DiscordMessageOptions,
  buildActionRow,
  buildMessageOptions,
  toChatError,
} from "./transform.js";

const log = createLogger("discord");

// =============================================================================
// Types
// =============================================================================

/**
 * The parts of a discord.js TextChannel the adapter calls.
 */
export type DiscordTextChannel = {
  type: ChannelType.GuildText;
  send(options: DiscordMessageOptions): Promise<{ id: string }>;
  messages: {
    fetch(options: { message: string; force: boolean }): Promise<unknown>;
    edit(
      messageId: string,
      options: { components: ActionRowBuilder<ButtonBuilder>[] },
    ): Promise<unknown>;
  };
};

/**
 * Any channel the client can return, narrowed on `type`.
 */
export type DiscordChannel =
  | DiscordTextChannel
  | { type: Exclude<ChannelType, ChannelType.GuildText> };

/**
 * Channel lookup of a discord.js Client.
 */
export type DiscordChannelSource = {
  channels: {
    cache: { get(id: string): DiscordChannel | undefined };
    fetch(id: string): Promise<DiscordChannel | null>;
  };
};

/**
 * The parts of a discord.js ButtonInteraction the adapter calls.
 */
export type DiscordButtonPress = {
  message: { id: string };
  user: { tag: string };
  deferReply(options: { flags: MessageFlags.Ephemeral }): Promise<unknown>;
  editReply(options: { content: string }): Promise<unknown>;
};

// =============================================================================
// Channel
// =============================================================================

/**
 * ChatChannel backed by one Discord text channel.
 */
export function createDiscordChannel(
  client: DiscordChannelSource,
  channelId: string,
): ChatChannel {
  async function getTextChannel(): Promise<
    Result<DiscordTextChannel, ChatError>
  > {
    let channel: DiscordChannel | null | undefined;
    try {
      channel =
        client.channels.cache.get(channelId) ??
        (await client.channels.fetch(channelId));
    } catch (error) {
      return err(toChatError(error, "channel"));
    }

    if (!channel) {
      return err(notFound("channel", `Channel ${channelId} not found`));
    }
    if (channel.type !== ChannelType.GuildText) {
      return err(
        channelUnavailable(`Channel ${channelId} is not a text channel`),
      );
    }
    return ok(channel);
  }

  async function resolve(): Promise<Result<void, ChatError>> {
    const result = await getTextChannel();
    return result.map(() => undefined);
  }

  async function send(
    payload: NotificationPayload,
  ): Promise<Result<string, ChatError>> {
    const channelResult = await getTextChannel();
    if (channelResult.isErr()) {
      return err(channelResult.error);
    }

    try {
      const message = await channelResult.value.send(
        buildMessageOptions(payload),
      );
      return ok(message.id);
    } catch (error) {
      return err(toChatError(error, "channel"));
    }
  }

  async function exists(messageId: string): Promise<Result<void, ChatError>> {
    const channelResult = await getTextChannel();
    if (channelResult.isErr()) {
      return err(channelResult.error);
    }

    try {
      // force: a cached copy would hide a deletion
      await channelResult.value.messages.fetch({
        message: messageId,
        force: true,
      });
      return ok(undefined);
    } catch (error) {
      return err(toChatError(error, "message"));
    }
  }

  async function updateAction(
    messageId: string,
    action: NotificationAction,
  ): Promise<Result<void, ChatError>> {
    const channelResult = await getTextChannel();
    if (channelResult.isErr()) {
      return err(channelResult.error);
    }

    try {
      await channelResult.value.messages.edit(messageId, {
        components: [buildActionRow(action)],
      });
      return ok(undefined);
    } catch (error) {
      return err(toChatError(error, "message"));
    }
  }

  return { resolve, send, exists, updateAction };
}

/**
 * Log at error level when the notification channel is unusable.
 * Polling still starts and skips cycles until it is fixed.
 */
export async function reportChannelStatus(
  channel: Pick<ChatChannel, "resolve">,
  channelId: string,
): Promise<boolean> {
  const result = await channel.resolve();
  if (result.isErr()) {
    log.error(
      { channelId, errorType: result.error.type },
      `Notification channel check failed: ${formatChatError(result.error)}`,
    );
    return false;
  }
  log.info({ channelId }, "Notification channel ready");
  return true;
}

// =============================================================================
// Interactions
// =============================================================================

/**
 * Adapt a button interaction to the lock-all handler's port.
 * Replies are ephemeral.
 */
export function toLockAllInteraction(
  interaction: DiscordButtonPress,
): LockAllInteraction {
  return {
    messageId: interaction.message.id,
    userTag: interaction.user.tag,
    deferReply: async () => {
      try {
        await interaction.deferReply({ flags: MessageFlags.Ephemeral });
        return ok(undefined);
      } catch (error) {
        return err(toChatError(error, "message"));
      }
    },
    reply: async (content: string) => {
      try {
        await interaction.editReply({ content });
        return ok(undefined);
      } catch (error) {
        return err(toChatError(error, "message"));
      }
    },
  };
}

/**
 * True for presses of the "lock all" button. Select menus and modals
 * carry a customId too, so the component kind is checked as well.
 */
export function isLockAllInteraction(
  interaction: Readonly<{ isButton: () => boolean; customId?: string }>,
): boolean {
  return interaction.isButton() && interaction.customId === LOCK_ALL_CUSTOM_ID;
}

// =============================================================================
// Gateway
// =============================================================================

export type DiscordGateway = Readonly<{
  channel: ChatChannel;
  /** Resolves once the bot session is ready */
  waitUntilReady: () => Promise<void>;
  onLockAll: (
    handler: (interaction: LockAllInteraction) => Promise<unknown>,
  ) => void;
  login: (token: string) => Promise<void>;
  destroy: () => Promise<void>;
}>;

export function createDiscordGateway(channelId: string): DiscordGateway {
  const client = new Client({ intents: [GatewayIntentBits.Guilds] });
  const channel = createDiscordChannel(client, channelId);

  const ready = new Promise<void>((resolveReady) => {
    client.once(Events.ClientReady, (readyClient) => {
      log.info(
        { user: readyClient.user.tag, id: readyClient.user.id },
        `Bot is ready: ${readyClient.user.tag}`,
      );
      resolveReady();
    });
  });

  client.once(Events.ClientReady, () => {
    reportChannelStatus(channel, channelId).catch((error: unknown) => {
      log.error({ error }, "Notification channel check crashed");
    });
  });

  function onLockAll(
    handler: (interaction: LockAllInteraction) => Promise<unknown>,
  ): void {
    client.on(Events.InteractionCreate, (interaction) => {
      if (!interaction.isButton() || !isLockAllInteraction(interaction)) return;

      log.info({ user: interaction.user.tag }, "Lock-all button pressed");
      handler(toLockAllInteraction(interaction)).catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ error: message }, "Lock-all handler crashed");
      });
    });
  }

  async function login(token: string): Promise<void> {
    await client.login(token);
  }

  async function destroy(): Promise<void> {
    await client.destroy();
  }

  return {
    channel,
    waitUntilReady: () => ready,
    onLockAll,
    login,
    destroy,
  };
}
