import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MonitorErrorCode, SourceError } from "@glucose-alarm/core";
import {
  parseDexcomTimestamp,
  getSessionId,
  fetchGlucoseReadings,
  errorFromResponse,
  isTransientError,
  DEXCOM_BASE_URLS,
  DEXCOM_APP_IDS,
  DEFAULT_UUID,
  type DexcomCredentials,
  type DexcomRequestOptions,
} from "./dexcom-client.js";

function jsonResponse(data: unknown, status: number = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.resolve(data),
    text: () => Promise.resolve(JSON.stringify(data)),
  };
}

const credentials: DexcomCredentials = {
  username: "test-user",
  password: "test-pass",
};

const noDelay: DexcomRequestOptions = {
  retry: { jitter: false },
  sleep: () => Promise.resolve(),
};

describe("parseDexcomTimestamp", () => {
  it("parses valid Dexcom timestamp format", () => {
    expect(parseDexcomTimestamp("Date(1705678901234)")).toBe(1705678901234);
  });

  it("ignores a timezone suffix", () => {
    expect(parseDexcomTimestamp("Date(1705678901234-0500)")).toBe(1705678901234);
  });

  it("returns 0 for invalid format", () => {
    expect(parseDexcomTimestamp("invalid")).toBe(0);
    expect(parseDexcomTimestamp("")).toBe(0);
    expect(parseDexcomTimestamp("Date()")).toBe(0);
  });
});

describe("errorFromResponse", () => {
  it("maps session errors", () => {
    const error = errorFromResponse(500, { Code: "SessionNotValid", Message: "expired" });
    expect(error.code).toBe(MonitorErrorCode.SOURCE_SESSION_INVALID);
    expect(error.status).toBe(500);
  });

  it("maps account errors", () => {
    expect(errorFromResponse(500, { Code: "AccountPasswordInvalid" }).code).toBe(
      MonitorErrorCode.SOURCE_AUTH_FAILED
    );
    expect(
      errorFromResponse(500, {
        Code: "SSO_InternalError",
        Message: "Cannot Authenticate by AccountName",
      }).code
    ).toBe(MonitorErrorCode.SOURCE_AUTH_FAILED);
  });

  it("falls back to an unexpected-response error", () => {
    const error = errorFromResponse(502, "Bad Gateway");
    expect(error.code).toBe(MonitorErrorCode.SOURCE_UNEXPECTED);
    expect(error.message).toBe("Unexpected response from glucose source: HTTP 502");
  });
});

describe("isTransientError", () => {
  it("retries network errors, 429 and 5xx only", () => {
    const unexpected = (status?: number) =>
      new SourceError(MonitorErrorCode.SOURCE_UNEXPECTED, "x", status);

    expect(isTransientError(unexpected())).toBe(true);
    expect(isTransientError(unexpected(429))).toBe(true);
    expect(isTransientError(unexpected(503))).toBe(true);
    expect(isTransientError(unexpected(400))).toBe(false);
    expect(isTransientError(new SourceError(MonitorErrorCode.SOURCE_AUTH_FAILED, "x", 500))).toBe(
      false
    );
    expect(isTransientError(new Error("boom"))).toBe(false);
  });
});

describe("getSessionId", () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  const originalFetch = global.fetch;

  beforeEach(() => {
    fetchMock = vi.fn();
    global.fetch = fetchMock;
  });

  afterEach(() => {
    global.fetch = originalFetch;
    vi.clearAllMocks();
  });

  it("authenticates and returns session ID", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse("mock-account-id"))
      .mockResolvedValueOnce(jsonResponse("mock-session-id"));

    const sessionId = await getSessionId(credentials);

    expect(sessionId).toBe("mock-session-id");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("calls both endpoints with the region's URL and application ID", async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse("the-account-id"))
      .mockResolvedValueOnce(jsonResponse("mock-session-id"));

    await getSessionId(credentials, { region: "jp" });

    const [authUrl, authOptions] = fetchMock.mock.calls[0];
    expect(authUrl).toBe(`${DEXCOM_BASE_URLS.jp}/General/AuthenticatePublisherAccount`);
    expect(JSON.parse(authOptions.body)).toEqual({
      accountName: "test-user",
      password: "test-pass",
      applicationId: DEXCOM_APP_IDS.jp,
    });

    const [loginUrl, loginOptions] = fetchMock.mock.calls[1];
    expect(loginUrl).toBe(`${DEXCOM_BASE_URLS.jp}/General/LoginPublisherAccountById`);
    expect(JSON.parse(loginOptions.body)).toEqual({
      accountId: "the-account-id",
      password: "test-pass",
      applicationId: DEXCOM_APP_IDS.jp,
    });
  });

  it("does not retry invalid credentials", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ Code: "AccountPasswordInvalid", Message: "bad password" }, 500)
    );

    await expect(getSessionId(credentials, noDelay)).rejects.toMatchObject({
      code: MonitorErrorCode.SOURCE_AUTH_FAILED,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects the placeholder account ID", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(DEFAULT_UUID));

    await expect(getSessionId(credentials, noDelay)).rejects.toMatchObject({
      code: MonitorErrorCode.SOURCE_AUTH_FAILED,
    });
  });

  it("retries server errors with backoff", async () => {
    const sleep = vi.fn(() => Promise.resolve());
    fetchMock
      .mockResolvedValueOnce(jsonResponse("Service Unavailable", 503))
      .mockResolvedValueOnce(jsonResponse("mock-account-id"))
      .mockResolvedValueOnce(jsonResponse("mock-session-id"));

    const sessionId = await getSessionId(credentials, { retry: { jitter: false }, sleep });

    expect(sessionId).toBe("mock-session-id");
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it("retries network errors", async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse("mock-account-id"))
      .mockResolvedValueOnce(jsonResponse("mock-session-id"));

    await expect(getSessionId(credentials, noDelay)).resolves.toBe("mock-session-id");
  });

  it("gives up once retries are exhausted", async () => {
    fetchMock.mockResolvedValue(jsonResponse("Service Unavailable", 503));

    await expect(
      getSessionId(credentials, { ...noDelay, retry: { maxAttempts: 2, jitter: false } })
    ).rejects.toMatchObject({ code: MonitorErrorCode.SOURCE_UNEXPECTED, status: 503 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});

describe("fetchGlucoseReadings", () => {
  let fetchMock: ReturnType<typeof vi.fn>;
  const originalFetch = global.fetch;

  beforeEach(() => {
    fetchMock = vi.fn();
    global.fetch = fetchMock;
  });

  afterEach(() => {
    global.fetch = originalFetch;
    vi.clearAllMocks();
  });

  it("fetches readings with session and window parameters", async () => {
    const readings = [
      { WT: "Date(1705678901234)", ST: "Date(1705678901234)", DT: "Date(1705678901234-0500)", Value: 120, Trend: "Flat" },
    ];
    fetchMock.mockResolvedValueOnce(jsonResponse(readings));

    const result = await fetchGlucoseReadings("session-123", 10, 1);

    expect(result).toEqual(readings);
    const [url, options] = fetchMock.mock.calls[0];
    expect(url).toBe(
      `${DEXCOM_BASE_URLS.us}/Publisher/ReadPublisherLatestGlucoseValues?sessionId=session-123&minutes=10&maxCount=1`
    );
    expect(options.method).toBe("POST");
  });

  it("clamps the window to what Dexcom serves", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([]));

    await fetchGlucoseReadings("session-123", 5000, 1000);

    expect(fetchMock.mock.calls[0][0]).toContain("minutes=1440&maxCount=288");
  });

  it("reports an expired session", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ Code: "SessionIdNotFound" }, 500));

    await expect(fetchGlucoseReadings("stale", 10, 1, noDelay)).rejects.toMatchObject({
      code: MonitorErrorCode.SOURCE_SESSION_INVALID,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects malformed readings", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([{ Value: "high" }]));

    await expect(fetchGlucoseReadings("session-123")).rejects.toMatchObject({
      code: MonitorErrorCode.SOURCE_UNEXPECTED,
    });
  });
});
