/**
 * Discord Service Tests
 *
 * Runs the channel and interaction adapters against plain objects shaped
 * like the discord.js structures they call.
 */
import { beforeEach, describe, expect, test, vi } from "vitest";

const { mockLog } = vi.hoisted(() => ({
  mockLog: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  },
}));

vi.mock("../../logger.js", () => ({
  createLogger: () => mockLog,
}));

// Import after mocks
import {
  type ActionRowBuilder,
  type ButtonBuilder,
  ChannelType,
  MessageFlags,
} from "discord.js";
import { err, ok } from "neverthrow";
import {
  buildLockAllAction,
  buildUnlockNotification,
  notFound,
} from "../../notifications/index.js";
import {
  type DiscordButtonPress,
  type DiscordChannel,
  type DiscordChannelSource,
  type DiscordTextChannel,
  createDiscordChannel,
  isLockAllInteraction,
  reportChannelStatus,
  toLockAllInteraction,
} from "../service.js";
import type { DiscordMessageOptions } from "../transform.js";

const CHANNEL_ID = "42";

function apiFailure(message: string, code: number, status: number): Error {
  return Object.assign(new Error(message), { code, status });
}

function createTextChannel() {
  const send = vi.fn(async (_options: DiscordMessageOptions) => ({
    id: "msg-1",
  }));
  const fetchMessage = vi.fn(
    async (_options: { message: string; force: boolean }): Promise<unknown> =>
      ({ id: "msg-1" }),
  );
  const edit = vi.fn(
    async (
      _messageId: string,
      _options: { components: ActionRowBuilder<ButtonBuilder>[] },
    ): Promise<unknown> => ({ id: "msg-1" }),
  );
  const channel: DiscordTextChannel = {
    type: ChannelType.GuildText,
    send,
    messages: { fetch: fetchMessage, edit },
  };
  return { channel, send, fetchMessage, edit };
}

function createSource(found: DiscordChannel | null) {
  const fetchChannel = vi.fn(async (_id: string) => found);
  const source: DiscordChannelSource = {
    channels: {
      cache: { get: () => undefined },
      fetch: fetchChannel,
    },
  };
  return { source, fetchChannel };
}

const FRONT = { id: "a", name: "Front door", lockState: "unlocked" } as const;

describe("Discord Service", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  // ===========================================================================
  // Channel lookup
  // ===========================================================================

  describe("resolve", () => {
    test("accepts a guild text channel", async () => {
      // Arrange
      const { channel } = createTextChannel();
      const { source, fetchChannel } = createSource(channel);

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).resolve();

      // Assert
      expect(result.isOk()).toBe(true);
      expect(fetchChannel).toHaveBeenCalledWith(CHANNEL_ID);
    });

    test("uses the cached channel without fetching", async () => {
      // Arrange
      const { channel } = createTextChannel();
      const { source, fetchChannel } = createSource(null);
      source.channels.cache.get = () => channel;

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).resolve();

      // Assert
      expect(result.isOk()).toBe(true);
      expect(fetchChannel).not.toHaveBeenCalled();
    });

    test("rejects a channel that is not a text channel", async () => {
      // Arrange
      const voice: DiscordChannel = { type: ChannelType.GuildVoice };
      const { source } = createSource(voice);

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).resolve();

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "CHANNEL_UNAVAILABLE",
        message: "Channel 42 is not a text channel",
      });
    });

    test("reports a channel the client cannot find", async () => {
      // Arrange
      const { source } = createSource(null);

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).resolve();

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "NOT_FOUND",
        resource: "channel",
        message: "Channel 42 not found",
      });
    });

    test("maps a rejected channel fetch", async () => {
      // Arrange
      const { source, fetchChannel } = createSource(null);
      fetchChannel.mockRejectedValue(apiFailure("Missing Access", 50001, 403));

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).resolve();

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "PERMISSION_DENIED",
        message: "Missing Access",
      });
    });
  });

  // ===========================================================================
  // send
  // ===========================================================================

  describe("send", () => {
    test("posts one embed with the lock-all row and returns the message id", async () => {
      // Arrange
      const { channel, send } = createTextChannel();
      const { source } = createSource(channel);

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).send(
        buildUnlockNotification([FRONT]),
      );

      // Assert
      expect(result._unsafeUnwrap()).toBe("msg-1");
      expect(send).toHaveBeenCalledTimes(1);
      const options = send.mock.calls[0]?.[0];
      expect(options?.embeds[0]?.toJSON().fields).toEqual([
        { name: "デバイス名", value: "**Front door**", inline: false },
      ]);
      expect(options?.components[0]?.toJSON().components[0]).toMatchObject({
        custom_id: "lock_all",
        disabled: false,
      });
    });

    test("maps a permission failure", async () => {
      // Arrange
      const { channel, send } = createTextChannel();
      send.mockRejectedValue(apiFailure("Missing Permissions", 50013, 403));
      const { source } = createSource(channel);

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).send(
        buildUnlockNotification([FRONT]),
      );

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "PERMISSION_DENIED",
        message: "Missing Permissions",
      });
    });
  });

  // ===========================================================================
  // exists
  // ===========================================================================

  describe("exists", () => {
    test("fetches the message bypassing the cache", async () => {
      // Arrange
      const { channel, fetchMessage } = createTextChannel();
      const { source } = createSource(channel);

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).exists("msg-1");

      // Assert
      expect(result.isOk()).toBe(true);
      expect(fetchMessage).toHaveBeenCalledWith({ message: "msg-1", force: true });
    });

    test("maps Unknown Message to NOT_FOUND for the message", async () => {
      // Arrange
      const { channel, fetchMessage } = createTextChannel();
      fetchMessage.mockRejectedValue(apiFailure("Unknown Message", 10008, 404));
      const { source } = createSource(channel);

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).exists("msg-1");

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "NOT_FOUND",
        resource: "message",
        message: "Unknown Message",
      });
    });

    test("reports a missing channel as NOT_FOUND for the channel", async () => {
      // Arrange
      const { source } = createSource(null);

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).exists("msg-1");

      // Assert
      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "NOT_FOUND",
        resource: "channel",
      });
    });
  });

  // ===========================================================================
  // updateAction
  // ===========================================================================

  describe("updateAction", () => {
    test("replaces the message components with a disabled button row", async () => {
      // Arrange
      const { channel, edit } = createTextChannel();
      const { source } = createSource(channel);

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).updateAction(
        "msg-1",
        buildLockAllAction(true),
      );

      // Assert
      expect(result.isOk()).toBe(true);
      expect(edit).toHaveBeenCalledTimes(1);
      expect(edit.mock.calls[0]?.[0]).toBe("msg-1");
      const rows = edit.mock.calls[0]?.[1].components ?? [];
      expect(rows).toHaveLength(1);
      expect(rows[0]?.toJSON().components[0]).toMatchObject({
        custom_id: "lock_all",
        label: "すべて施錠",
        disabled: true,
      });
    });

    test("maps a deleted message to NOT_FOUND", async () => {
      // Arrange
      const { channel, edit } = createTextChannel();
      edit.mockRejectedValue(apiFailure("Unknown Message", 10008, 404));
      const { source } = createSource(channel);

      // Act
      const result = await createDiscordChannel(source, CHANNEL_ID).updateAction(
        "msg-1",
        buildLockAllAction(true),
      );

      // Assert
      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "NOT_FOUND",
        resource: "message",
      });
    });
  });

  // ===========================================================================
  // reportChannelStatus
  // ===========================================================================

  describe("reportChannelStatus", () => {
    test("logs an unusable channel at error level", async () => {
      // Act
      const usable = await reportChannelStatus(
        { resolve: async () => err(notFound("channel", "Unknown Channel")) },
        CHANNEL_ID,
      );

      // Assert
      expect(usable).toBe(false);
      expect(mockLog.error).toHaveBeenCalledTimes(1);
      expect(mockLog.error).toHaveBeenCalledWith(
        { channelId: CHANNEL_ID, errorType: "NOT_FOUND" },
        "Notification channel check failed: channel not found: Unknown Channel",
      );
    });

    test("stays quiet about a usable channel", async () => {
      const usable = await reportChannelStatus(
        { resolve: async () => ok(undefined) },
        CHANNEL_ID,
      );

      expect(usable).toBe(true);
      expect(mockLog.error).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // Interactions
  // ===========================================================================

  describe("isLockAllInteraction", () => {
    test("accepts the lock-all button", () => {
      expect(
        isLockAllInteraction({ isButton: () => true, customId: "lock_all" }),
      ).toBe(true);
    });

    test("rejects other buttons", () => {
      expect(
        isLockAllInteraction({ isButton: () => true, customId: "snooze" }),
      ).toBe(false);
    });

    test("rejects non-button components with the same custom id", () => {
      expect(
        isLockAllInteraction({ isButton: () => false, customId: "lock_all" }),
      ).toBe(false);
    });

    test("rejects interactions without a custom id", () => {
      expect(isLockAllInteraction({ isButton: () => false })).toBe(false);
    });
  });

  describe("toLockAllInteraction", () => {
    function createPress() {
      const deferReply = vi.fn(
        async (_options: { flags: MessageFlags.Ephemeral }): Promise<unknown> =>
          undefined,
      );
      const editReply = vi.fn(
        async (_options: { content: string }): Promise<unknown> => undefined,
      );
      const press: DiscordButtonPress = {
        message: { id: "msg-9" },
        user: { tag: "tester#0001" },
        deferReply,
        editReply,
      };
      return { press, deferReply, editReply };
    }

    test("exposes the message id and user tag", () => {
      const { press } = createPress();

      const interaction = toLockAllInteraction(press);

      expect(interaction.messageId).toBe("msg-9");
      expect(interaction.userTag).toBe("tester#0001");
    });

    test("defers ephemerally", async () => {
      // Arrange
      const { press, deferReply } = createPress();

      // Act
      const result = await toLockAllInteraction(press).deferReply();

      // Assert
      expect(result.isOk()).toBe(true);
      expect(deferReply).toHaveBeenCalledWith({ flags: MessageFlags.Ephemeral });
    });

    test("replies by editing the deferred reply", async () => {
      // Arrange
      const { press, editReply } = createPress();

      // Act
      const result = await toLockAllInteraction(press).reply("done");

      // Assert
      expect(result.isOk()).toBe(true);
      expect(editReply).toHaveBeenCalledWith({ content: "done" });
    });

    test("returns a failed acknowledgement as an error value", async () => {
      // Arrange
      const { press, deferReply } = createPress();
      deferReply.mockRejectedValue(new Error("Unknown interaction"));

      // Act
      const result = await toLockAllInteraction(press).deferReply();

      // Assert
      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "SEND_FAILED",
        message: "Unknown interaction",
      });
    });
  });
});
