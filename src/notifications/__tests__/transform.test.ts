/**
 * Notifications Transform Tests
 */
import { describe, expect, it } from "vitest";
import { buildLockAllAction, buildUnlockNotification } from "../transform.js";

describe("Notifications Transform", () => {
  describe("buildUnlockNotification", () => {
    it("lists every device by display name with an enabled lock-all button", () => {
      const payload = buildUnlockNotification([
        { id: "a", name: "Front door", lockState: "unlocked" },
        { id: "b", name: "Garage", lockState: "unlocked" },
      ]);

      expect(payload).toEqual({
        title: "🔓 解錠されているスマートロックがあります",
        description: "下のボタンを押して、遠隔で施錠できます。",
        color: 0xed4245,
        fields: [
          { name: "デバイス名", value: "**Front door**" },
          { name: "デバイス名", value: "**Garage**" },
        ],
        action: { customId: "lock_all", label: "すべて施錠", disabled: false },
      });
    });
  });

  describe("buildLockAllAction", () => {
    it("builds a disabled button", () => {
      expect(buildLockAllAction(true)).toEqual({
        customId: "lock_all",
        label: "すべて施錠",
        disabled: true,
      });
    });
  });
});
