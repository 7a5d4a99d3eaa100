/**
 * Discord Transform Tests
 */
import { describe, expect, it } from "vitest";
import { buildLockAllAction, buildUnlockNotification } from "../../notifications/index.js";
import {
  buildActionRow,
  buildEmbed,
  buildMessageOptions,
  toChatError,
} from "../transform.js";

function apiFailure(message: string, code: number, status: number): Error {
  return Object.assign(new Error(message), { code, status });
}

describe("Discord Transform", () => {
  // ===========================================================================
  // Message Building
  // ===========================================================================

  describe("buildActionRow", () => {
    it("builds a red lock-all button", () => {
      const row = buildActionRow(buildLockAllAction(false)).toJSON();

      expect(row.components).toHaveLength(1);
      expect(row.components[0]).toMatchObject({
        custom_id: "lock_all",
        label: "すべて施錠",
        style: 4,
        disabled: false,
      });
    });

    it("greys the button out", () => {
      const row = buildActionRow(buildLockAllAction(true)).toJSON();

      expect(row.components[0]).toMatchObject({ disabled: true });
    });
  });

  describe("buildEmbed", () => {
    it("maps title, description, colour and one field per device", () => {
      const payload = buildUnlockNotification([
        { id: "a", name: "Front door", lockState: "unlocked" },
        { id: "b", name: "Garage", lockState: "unlocked" },
      ]);

      expect(buildEmbed(payload).toJSON()).toEqual({
        title: "🔓 解錠されているスマートロックがあります",
        description: "下のボタンを押して、遠隔で施錠できます。",
        color: 0xed4245,
        fields: [
          { name: "デバイス名", value: "**Front door**", inline: false },
          { name: "デバイス名", value: "**Garage**", inline: false },
        ],
      });
    });
  });

  describe("buildMessageOptions", () => {
    it("sends one embed and one action row", () => {
      const options = buildMessageOptions(
        buildUnlockNotification([
          { id: "a", name: "Front door", lockState: "unlocked" },
        ]),
      );

      expect(options.embeds).toHaveLength(1);
      expect(options.components).toHaveLength(1);
    });
  });

  // ===========================================================================
  // Error Mapping
  // ===========================================================================

  describe("toChatError", () => {
    it("maps Unknown Message to NOT_FOUND for the message", () => {
      expect(
        toChatError(apiFailure("Unknown Message", 10008, 404), "message"),
      ).toEqual({
        type: "NOT_FOUND",
        resource: "message",
        message: "Unknown Message",
      });
    });

    it("maps Unknown Channel to NOT_FOUND for the channel", () => {
      expect(
        toChatError(apiFailure("Unknown Channel", 10003, 404), "message"),
      ).toEqual({
        type: "NOT_FOUND",
        resource: "channel",
        message: "Unknown Channel",
      });
    });

    it("maps a bare 404 to NOT_FOUND", () => {
      expect(toChatError({ status: 404 }, "message")).toEqual({
        type: "NOT_FOUND",
        resource: "message",
        message: "[object Object]",
      });
    });

    it("maps Missing Permissions and Missing Access to PERMISSION_DENIED", () => {
      expect(
        toChatError(apiFailure("Missing Permissions", 50013, 403), "channel"),
      ).toEqual({ type: "PERMISSION_DENIED", message: "Missing Permissions" });
      expect(
        toChatError(apiFailure("Missing Access", 50001, 403), "channel"),
      ).toEqual({ type: "PERMISSION_DENIED", message: "Missing Access" });
    });

    it("maps anything else to SEND_FAILED with the cause", () => {
      const cause = new Error("socket hang up");

      expect(toChatError(cause, "channel")).toEqual({
        type: "SEND_FAILED",
        message: "socket hang up",
        cause,
      });
    });

    it("maps non-Error rejections to SEND_FAILED without a cause", () => {
      expect(toChatError("timeout", "channel")).toEqual({
        type: "SEND_FAILED",
        message: "timeout",
      });
    });
  });
});
