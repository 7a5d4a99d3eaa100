/**
 * Discord Module - Public API
 */

// Types
export type {
  DiscordButtonPress,
  DiscordChannel,
  DiscordChannelSource,
  DiscordGateway,
  DiscordTextChannel,
} from "./service.js";
export type { DiscordMessageOptions } from "./transform.js";

// Service functions
export {
  createDiscordChannel,
  createDiscordGateway,
  isLockAllInteraction,
  reportChannelStatus,
  toLockAllInteraction,
} from "./service.js";

// Pure transformations
export {
  DISCORD_ERROR_CODES,
  buildActionRow,
  buildEmbed,
  buildMessageOptions,
  toChatError,
} from "./transform.js";
