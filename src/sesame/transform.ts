/**
 * Sesame Module - Pure Transformations
 *
 * Command signing, payload building and response parsing.
 * No side effects, no I/O - just data in, data out.
 */
import { createCipheriv } from "node:crypto";
import { type Result, err, ok } from "neverthrow";
import { type SesameError, invalidKey } from "./errors.js";
import type {
  LockState,
  SesameCommandPayload,
  SesameStatusResponse,
} from "./schema.js";
import { SESAME_COMMANDS } from "./schema.js";

// =============================================================================
// AES-CMAC (RFC 4493)
// =============================================================================

const BLOCK_SIZE = 16;
const RB = 0x87;

/**
 * Encrypt a single 16-byte block with AES-128.
 */
function encryptBlock(key: Buffer, block: Buffer): Buffer {
  const cipher = createCipheriv("aes-128-ecb", key, null);
  cipher.setAutoPadding(false);
  return Buffer.concat([cipher.update(block), cipher.final()]);
}

/**
 * Left-shift a block by one bit, folding in Rb when the top bit falls off.
 */
function doubleBlock(block: Buffer): Buffer {
  const out = Buffer.alloc(BLOCK_SIZE);
  for (let i = 0; i < BLOCK_SIZE; i++) {
    const next = i + 1 < BLOCK_SIZE ? (block[i + 1] ?? 0) : 0;
    out[i] = (((block[i] ?? 0) << 1) | (next >>> 7)) & 0xff;
  }
  if (((block[0] ?? 0) & 0x80) !== 0) {
    out[BLOCK_SIZE - 1] = (out[BLOCK_SIZE - 1] ?? 0) ^ RB;
  }
  return out;
}

function xorBlock(a: Buffer, b: Buffer): Buffer {
  const out = Buffer.alloc(BLOCK_SIZE);
  for (let i = 0; i < BLOCK_SIZE; i++) {
    out[i] = (a[i] ?? 0) ^ (b[i] ?? 0);
  }
  return out;
}

/**
 * Compute the AES-128-CMAC tag of a message.
 *
 * @param key - 16 raw key bytes
 * @param message - Message of any length (including empty)
 * @returns 16-byte tag
 */
export function aesCmac(key: Buffer, message: Buffer): Buffer {
  const k1 = doubleBlock(encryptBlock(key, Buffer.alloc(BLOCK_SIZE)));
  const k2 = doubleBlock(k1);

  const blockCount = Math.max(1, Math.ceil(message.length / BLOCK_SIZE));
  const lastIsComplete =
    message.length > 0 && message.length % BLOCK_SIZE === 0;

  const lastStart = (blockCount - 1) * BLOCK_SIZE;
  const lastBlock = lastIsComplete
    ? xorBlock(message.subarray(lastStart), k1)
    : xorBlock(
        Buffer.concat([
          message.subarray(lastStart),
          Buffer.from([0x80]),
          Buffer.alloc(BLOCK_SIZE - (message.length - lastStart) - 1),
        ]),
        k2,
      );

  let state: Buffer = Buffer.alloc(BLOCK_SIZE);
  for (let i = 0; i < blockCount - 1; i++) {
    const block = message.subarray(i * BLOCK_SIZE, (i + 1) * BLOCK_SIZE);
    state = encryptBlock(key, xorBlock(state, block));
  }

  return encryptBlock(key, xorBlock(state, lastBlock));
}

// =============================================================================
// Command Signing
// =============================================================================

const SECRET_HEX_PATTERN = /^[0-9a-fA-F]{32}$/;

/**
 * Build the 3-byte message the vendor expects to be signed.
 *
 * The UNIX time is written as a little-endian uint32 and the first byte
 * is dropped, so the signature only changes every 256 seconds.
 *
 * @param nowSeconds - UNIX time in whole seconds
 */
export function buildSignMessage(nowSeconds: number): Buffer {
  const timestamp = Buffer.alloc(4);
  timestamp.writeUInt32LE(Math.floor(nowSeconds) >>> 0, 0);
  return timestamp.subarray(1, 4);
}

/**
 * Sign a lock command for one device.
 *
 * @param secretHex - Device secret, 32 hex characters
 * @param nowSeconds - UNIX time in whole seconds
 * @returns Lowercase hex AES-CMAC tag or INVALID_KEY
 */
export function generateSign(
  secretHex: string,
  nowSeconds: number,
): Result<string, SesameError> {
  if (!SECRET_HEX_PATTERN.test(secretHex)) {
    return err(
      invalidKey(
        `Secret must be 32 hex characters (got ${secretHex.length} characters)`,
      ),
    );
  }

  const key = Buffer.from(secretHex, "hex");
  return ok(aesCmac(key, buildSignMessage(nowSeconds)).toString("hex"));
}

/**
 * Shorten a signature for log output.
 */
export function maskSign(sign: string): string {
  return `${sign.slice(0, 10)}...`;
}

// =============================================================================
// Request Building
// =============================================================================

/**
 * Base64 of the label recorded in the lock history.
 */
export function encodeHistoryTag(label: string): string {
  return Buffer.from(label, "utf8").toString("base64");
}

/**
 * Build the lock command payload.
 */
export function buildLockPayload(
  sign: string,
  historyLabel: string,
): SesameCommandPayload {
  return {
    cmd: SESAME_COMMANDS.lock,
    history: encodeHistoryTag(historyLabel),
    sign,
  };
}

/**
 * Status endpoint for a device.
 */
export function buildStatusUrl(baseUrl: string, deviceId: string): string {
  return `${baseUrl}/${encodeURIComponent(deviceId)}`;
}

/**
 * Command endpoint for a device.
 */
export function buildCommandUrl(baseUrl: string, deviceId: string): string {
  return `${buildStatusUrl(baseUrl, deviceId)}/cmd`;
}

// =============================================================================
// Response Parsing
// =============================================================================

/**
 * Map the vendor's status string onto a LockState.
 * Anything other than "locked"/"unlocked" (e.g. "moved") is UNKNOWN.
 */
export function parseLockState(response: SesameStatusResponse): LockState {
  switch (response.CHSesame2Status) {
    case "locked":
      return "locked";
    case "unlocked":
      return "unlocked";
    default:
      return "unknown";
  }
}
