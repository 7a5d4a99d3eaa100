/**
 * Lock-All Service Tests
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
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import { err } from "neverthrow";
import { FakeInteraction } from "../../__tests__/fakes.js";
import type { DeviceConfig } from "../../config.js";
import { sendFailed } from "../../notifications/index.js";
import type { DeviceStatus } from "../../sesame/index.js";
import { createLockAllHandler } from "../service.js";

const FRONT: DeviceConfig = {
  id: "a",
  name: "Front door",
  secret: "0102030405060708090a0b0c0d0e0f10",
};
const GARAGE: DeviceConfig = {
  id: "b",
  name: "Garage",
  secret: "00112233445566778899aabbccddeeff",
};
const SHED: DeviceConfig = {
  id: "c",
  name: "Shed",
  secret: "ffeeddccbbaa99887766554433221100",
};

function setup(statuses: DeviceStatus[], lockOutcomes: Record<string, boolean>) {
  const events: string[] = [];
  const getAllStatuses = vi.fn(async () => {
    events.push("status");
    return statuses;
  });
  const sendLockCommand = vi.fn(async (device: DeviceConfig) => {
    events.push(`lock:${device.id}`);
    return lockOutcomes[device.id] ?? false;
  });
  const disableAction = vi.fn(async (_messageId: string) => {
    events.push("disable");
  });
  const handler = createLockAllHandler({
    devices: [FRONT, GARAGE, SHED],
    client: { getAllStatuses, sendLockCommand },
    notifications: { disableAction },
  });
  return { events, getAllStatuses, sendLockCommand, disableAction, handler };
}

describe("Lock-All Service", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test("replies that everything was already locked without sending commands", async () => {
    // Arrange
    const { sendLockCommand, disableAction, handler } = setup(
      [
        { id: "a", name: "Front door", lockState: "locked" },
        { id: "b", name: "Garage", lockState: "locked" },
        { id: "c", name: "Shed", lockState: "unknown" },
      ],
      {},
    );
    const interaction = new FakeInteraction("msg-1");

    // Act
    const report = await handler.handle(interaction);

    // Assert
    expect(sendLockCommand).not.toHaveBeenCalled();
    expect(report).toEqual({ locked: [], failed: [] });
    expect(interaction.replies).toEqual([
      "✅ すべてのデバイスは既に施錠されていました。",
    ]);
    expect(disableAction).toHaveBeenCalledWith("msg-1");
  });

  test("locks only devices that are still unlocked", async () => {
    // Arrange
    const { sendLockCommand, handler } = setup(
      [
        { id: "a", name: "Front door", lockState: "unlocked" },
        { id: "b", name: "Garage", lockState: "locked" },
        { id: "c", name: "Shed", lockState: "unlocked" },
      ],
      { a: true, c: true },
    );
    const interaction = new FakeInteraction("msg-1");

    // Act
    await handler.handle(interaction);

    // Assert
    expect(sendLockCommand.mock.calls.map(([device]) => device.id)).toEqual([
      "a",
      "c",
    ]);
    expect(interaction.replies).toEqual([
      "✅ **Front door, Shed** を施錠しました。",
    ]);
  });

  test("reports partial success in a single reply", async () => {
    // Arrange
    const { disableAction, handler } = setup(
      [
        { id: "a", name: "Front door", lockState: "unlocked" },
        { id: "b", name: "Garage", lockState: "unlocked" },
        { id: "c", name: "Shed", lockState: "locked" },
      ],
      { a: true, b: false },
    );
    const interaction = new FakeInteraction("msg-7");

    // Act
    const report = await handler.handle(interaction);

    // Assert
    expect(report).toEqual({ locked: ["Front door"], failed: ["Garage"] });
    expect(interaction.replies).toEqual([
      "✅ **Front door** を施錠しました。\n❌ **Garage** の施錠に失敗しました。",
    ]);
    expect(disableAction).toHaveBeenCalledTimes(1);
    expect(disableAction).toHaveBeenCalledWith("msg-7");
  });

  test("disables the button even when every lock fails", async () => {
    // Arrange
    const { disableAction, handler } = setup(
      [{ id: "a", name: "Front door", lockState: "unlocked" }],
      { a: false },
    );
    const interaction = new FakeInteraction("msg-2");

    // Act
    await handler.handle(interaction);

    // Assert
    expect(interaction.replies).toEqual(["❌ **Front door** の施錠に失敗しました。"]);
    expect(disableAction).toHaveBeenCalledWith("msg-2");
  });

  test("acknowledges first, then re-checks, locks, replies and disables", async () => {
    // Arrange
    const { events, handler } = setup(
      [
        { id: "a", name: "Front door", lockState: "unlocked" },
        { id: "b", name: "Garage", lockState: "locked" },
      ],
      { a: true },
    );
    const interaction = new FakeInteraction("msg-1");
    const deferReply = interaction.deferReply;
    const reply = interaction.reply;
    interaction.deferReply = async () => {
      events.push("defer");
      return deferReply();
    };
    interaction.reply = async (content: string) => {
      events.push("reply");
      return reply(content);
    };

    // Act
    await handler.handle(interaction);

    // Assert
    expect(events).toEqual(["defer", "status", "lock:a", "reply", "disable"]);
  });

  test("still locks when the acknowledgement fails", async () => {
    // Arrange
    const { sendLockCommand, handler } = setup(
      [{ id: "a", name: "Front door", lockState: "unlocked" }],
      { a: true },
    );
    const interaction = new FakeInteraction("msg-1");
    interaction.deferReply = async () => {
      interaction.events.push("defer");
      return err(sendFailed("Unknown interaction"));
    };

    // Act
    const report = await handler.handle(interaction);

    // Assert
    expect(sendLockCommand).toHaveBeenCalledTimes(1);
    expect(report.locked).toEqual(["Front door"]);
    expect(mockLog.error).toHaveBeenCalledTimes(1);
  });
});
