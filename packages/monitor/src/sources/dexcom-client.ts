/**
 * Dexcom Share API Client
 *
 * Authenticates against Dexcom Share and fetches glucose readings for the
 * us, ous and jp regions. Transient failures (network errors, 429, 5xx)
 * are retried with exponential backoff; account and session errors are not.
 */

import { z } from "zod";
import { MonitorErrorCode, SourceError, describeCause } from "@glucose-alarm/core";
import { retryWithBackoff, type BackoffOptions } from "../backoff.js";
import { maskSecret, type Logger } from "../logger.js";

export type DexcomRegion = "us" | "ous" | "jp";

export const DEXCOM_REGIONS: readonly DexcomRegion[] = ["us", "ous", "jp"];

/** Dexcom Share API endpoints per region */
export const DEXCOM_BASE_URLS: Record<DexcomRegion, string> = {
  us: "https://share2.dexcom.com/ShareWebServices/Services",
  ous: "https://shareous1.dexcom.com/ShareWebServices/Services",
  jp: "https://share.dexcom.jp/ShareWebServices/Services",
};

export const DEXCOM_APP_IDS: Record<DexcomRegion, string> = {
  us: "d89443d2-327c-4a6f-89e5-496bbb0317db",
  ous: "d89443d2-327c-4a6f-89e5-496bbb0317db",
  jp: "d8665ade-9673-4e27-9ff6-92db4ce13d13",
};

/** Returned in place of an id when the account is unknown */
export const DEFAULT_UUID = "00000000-0000-0000-0000-000000000000";

/** Dexcom only serves the last 24 hours, at most 288 readings */
export const MAX_MINUTES = 1440;
export const MAX_COUNT = 288;

/** Credentials for Dexcom Share authentication */
export interface DexcomCredentials {
  username: string;
  password: string;
}

export interface DexcomRequestOptions {
  region?: DexcomRegion;
  signal?: AbortSignal;
  retry?: BackoffOptions;
  /** Delay between retries (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const zDexcomReading = z.object({
  /** Timestamp in Dexcom format: "Date(1234567890000)" */
  WT: z.string(),
  ST: z.string().optional(),
  DT: z.string().optional(),
  /** Glucose value in mg/dL */
  Value: z.number(),
  /** Trend direction (e.g., "Flat", "SingleUp", "FortyFiveDown") */
  Trend: z.string(),
});

export type DexcomReading = z.infer<typeof zDexcomReading>;

const zDexcomReadings = z.array(zDexcomReading);
const zId = z.string().min(1);
const zErrorBody = z.object({
  Code: z.string().optional(),
  Message: z.string().optional(),
});

const DEFAULT_HEADERS = {
  "Content-Type": "application/json",
  Accept: "application/json",
};

/**
 * Parse Dexcom timestamp format "Date(1234567890000)" to milliseconds.
 */
export function parseDexcomTimestamp(wt: string): number {
  const match = wt.match(/Date\((\d+)\)/);
  return match ? parseInt(match[1], 10) : 0;
}

/**
 * Map a failed response onto a SourceError
 */
export function errorFromResponse(status: number, body: unknown): SourceError {
  const parsed = zErrorBody.safeParse(body);
  const code = parsed.success ? parsed.data.Code : undefined;
  const message = parsed.success ? parsed.data.Message : undefined;

  switch (code) {
    case "SessionIdNotFound":
    case "SessionNotValid":
      return new SourceError(MonitorErrorCode.SOURCE_SESSION_INVALID, code, status);
    case "AccountPasswordInvalid":
    case "SSO_AuthenticateMaxAttemptsExceeded":
      return new SourceError(MonitorErrorCode.SOURCE_AUTH_FAILED, code, status);
    case "SSO_InternalError":
      if (message?.includes("Cannot Authenticate")) {
        return new SourceError(MonitorErrorCode.SOURCE_AUTH_FAILED, code, status);
      }
      break;
  }

  const detail = code ? `HTTP ${status} ${code}` : `HTTP ${status}`;
  return new SourceError(MonitorErrorCode.SOURCE_UNEXPECTED, detail, status);
}

/**
 * Network errors, rate limiting and server errors are worth retrying
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof SourceError)) return false;
  if (error.code !== MonitorErrorCode.SOURCE_UNEXPECTED) return false;
  return error.status === undefined || error.status === 429 || error.status >= 500;
}

async function readErrorBody(response: Response): Promise<unknown> {
  const text = await response.text().catch(() => "");
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

async function post(
  path: string,
  body: unknown,
  options: DexcomRequestOptions
): Promise<unknown> {
  const url = `${DEXCOM_BASE_URLS[options.region ?? "us"]}/${path}`;

  return retryWithBackoff(
    async () => {
      let response: Response;
      try {
        response = await fetch(url, {
          method: "POST",
          headers: DEFAULT_HEADERS,
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: options.signal,
        });
      } catch (error) {
        throw new SourceError(MonitorErrorCode.SOURCE_UNEXPECTED, describeCause(error));
      }

      if (!response.ok) {
        throw errorFromResponse(response.status, await readErrorBody(response));
      }
      return response.json();
    },
    {
      ...options.retry,
      shouldRetry: isTransientError,
      signal: options.signal,
      sleep: options.sleep,
    }
  );
}

function parseId(data: unknown, what: string): string {
  const result = zId.safeParse(data);
  if (!result.success) {
    throw new SourceError(MonitorErrorCode.SOURCE_UNEXPECTED, `malformed ${what}`);
  }
  if (result.data === DEFAULT_UUID) {
    throw new SourceError(MonitorErrorCode.SOURCE_AUTH_FAILED, `no ${what} for account`);
  }
  return result.data;
}

/**
 * Authenticate with Dexcom Share and get a session ID.
 *
 * Two-step process:
 * 1. Authenticate with username/password to get account ID
 * 2. Login with account ID to get session ID
 */
export async function getSessionId(
  credentials: DexcomCredentials,
  options: DexcomRequestOptions = {}
): Promise<string> {
  const { username, password } = credentials;
  const region = options.region ?? "us";
  const applicationId = DEXCOM_APP_IDS[region];

  options.logger?.log(`Authenticating with Dexcom Share (${region}) as ${maskSecret(username)}`);

  const accountId = parseId(
    await post(
      "General/AuthenticatePublisherAccount",
      { accountName: username, password, applicationId },
      options
    ),
    "account ID"
  );

  return parseId(
    await post("General/LoginPublisherAccountById", { accountId, password, applicationId }, options),
    "session ID"
  );
}

/**
 * Fetch glucose readings from Dexcom Share.
 *
 * @param sessionId - Session ID from getSessionId()
 * @param minutes - Time window in minutes (max 1440 = 24 hours)
 * @param maxCount - Maximum number of readings to return
 * @returns Array of readings, newest first
 */
export async function fetchGlucoseReadings(
  sessionId: string,
  minutes: number = 10,
  maxCount: number = 1,
  options: DexcomRequestOptions = {}
): Promise<DexcomReading[]> {
  const params = new URLSearchParams({
    sessionId,
    minutes: String(Math.min(Math.max(1, minutes), MAX_MINUTES)),
    maxCount: String(Math.min(Math.max(1, maxCount), MAX_COUNT)),
  });

  const data = await post(
    `Publisher/ReadPublisherLatestGlucoseValues?${params.toString()}`,
    undefined,
    options
  );

  const result = zDexcomReadings.safeParse(data);
  if (!result.success) {
    throw new SourceError(MonitorErrorCode.SOURCE_UNEXPECTED, "malformed glucose readings");
  }
  return result.data;
}
