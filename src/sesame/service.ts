/**
 * Sesame Module - Service Layer
 *
 * Side effects happen here: HTTP calls to the Sesame cloud API.
 * Every failure is contained at this boundary - callers get a status
 * value or a boolean, never an exception.
 */
import { type Result, err, ok } from "neverthrow";
import type { DeviceConfig } from "../config.js";
import { createLogger } from "../logger.js";
import type { SesameError } from "./errors.js";
import {
  apiError,
  formatSesameError,
  invalidResponse,
  networkError,
} from "./errors.js";
import type { DeviceStatus, LockState } from "./schema.js";
import { SesameStatusResponseSchema } from "./schema.js";
import {
  buildCommandUrl,
  buildLockPayload,
  buildStatusUrl,
  generateSign,
  maskSign,
  parseLockState,
} from "./transform.js";

const log = createLogger("sesame");

export type SesameClientOptions = Readonly<{
  apiKey: string;
  baseUrl: string;
  historyLabel: string;
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
}>;

export type SesameClient = Readonly<{
  fetchStatus: (deviceId: string) => Promise<Result<LockState, SesameError>>;
  getStatus: (device: DeviceConfig) => Promise<DeviceStatus>;
  getAllStatuses: (
    devices: ReadonlyArray<DeviceConfig>,
  ) => Promise<DeviceStatus[]>;
  sendLockCommand: (device: DeviceConfig) => Promise<boolean>;
}>;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create a client bound to one API key.
 *
 * The global fetch keeps a pooled keep-alive agent, so one client
 * shared by the poller and the lock-all handler reuses connections.
 */
export function createSesameClient(options: SesameClientOptions): SesameClient {
  const { apiKey, baseUrl, historyLabel } = options;
  const now = options.now ?? Date.now;
  const headers = { "x-api-key": apiKey };

  /**
   * Fetch the lock state of one device.
   */
  async function fetchStatus(
    deviceId: string,
  ): Promise<Result<LockState, SesameError>> {
    const url = buildStatusUrl(baseUrl, deviceId);
    log.debug({ deviceId }, "Requesting device status...");

    let response: Response;
    try {
      response = await fetch(url, { method: "GET", headers });
    } catch (error) {
      return err(networkError("Failed to reach Sesame API", toError(error)));
    }

    if (response.status !== 200) {
      const body = await response.text().catch(() => "<unreadable body>");
      return err(apiError(response.status, body));
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      return err(invalidResponse("Response body is not valid JSON"));
    }

    const parsed = SesameStatusResponseSchema.safeParse(data);
    if (!parsed.success) {
      return err(invalidResponse("CHSesame2Status missing from response", data));
    }

    const lockState = parseLockState(parsed.data);
    if (lockState === "unknown") {
      return err(
        invalidResponse(
          `Unrecognised lock state "${parsed.data.CHSesame2Status}"`,
          data,
        ),
      );
    }

    log.debug({ deviceId, lockState }, "Device status retrieved");
    return ok(lockState);
  }

  /**
   * Status of one device. Failures are logged once and become "unknown".
   */
  async function getStatus(device: DeviceConfig): Promise<DeviceStatus> {
    const result = await fetchStatus(device.id);

    if (result.isErr()) {
      log.error(
        { deviceId: device.id, errorType: result.error.type },
        `Status request failed for ${device.name}: ${formatSesameError(result.error)}`,
      );
      return { id: device.id, name: device.name, lockState: "unknown" };
    }

    return { id: device.id, name: device.name, lockState: result.value };
  }

  /**
   * Status of every device, fetched concurrently. Order follows the input.
   */
  async function getAllStatuses(
    devices: ReadonlyArray<DeviceConfig>,
  ): Promise<DeviceStatus[]> {
    return Promise.all(devices.map((device) => getStatus(device)));
  }

  /**
   * Sign and send a lock command. True only on HTTP 200, no retry.
   */
  async function sendLockCommand(device: DeviceConfig): Promise<boolean> {
    const signResult = generateSign(device.secret, Math.floor(now() / 1000));

    if (signResult.isErr()) {
      log.error(
        { deviceId: device.id },
        `Cannot sign lock command for ${device.name}: ${formatSesameError(signResult.error)}`,
      );
      return false;
    }

    const payload = buildLockPayload(signResult.value, historyLabel);
    const url = buildCommandUrl(baseUrl, device.id);

    log.info(
      {
        deviceId: device.id,
        cmd: payload.cmd,
        history: payload.history,
        sign: maskSign(payload.sign),
      },
      `Sending lock command to ${device.name}`,
    );

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { ...headers, "Content-Type": "application/json" },
        body: JSON.stringify(payload),
      });
    } catch (error) {
      const failure = networkError("Failed to reach Sesame API", toError(error));
      log.error(
        { deviceId: device.id },
        `Lock command failed for ${device.name}: ${formatSesameError(failure)}`,
      );
      return false;
    }

    if (response.status !== 200) {
      const body = await response.text().catch(() => "<unreadable body>");
      const failure = apiError(response.status, body);
      log.error(
        { deviceId: device.id, statusCode: response.status },
        `Lock command failed for ${device.name}: ${formatSesameError(failure)}`,
      );
      return false;
    }

    log.info({ deviceId: device.id }, `Lock command accepted for ${device.name}`);
    return true;
  }

  return { fetchStatus, getStatus, getAllStatuses, sendLockCommand };
}
