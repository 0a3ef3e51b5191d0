import type { TransportResponse } from "./Transport.js";

export const MOCK_STATUSES = [200, 201, 400, 404, 500] as const;
export type MockStatus = (typeof MOCK_STATUSES)[number];

const MOCK_REASONS: Record<MockStatus, string> = {
  200: "OK",
  201: "Created",
  400: "Bad Request",
  404: "Not Found",
  500: "Server Error",
};

export interface MockResponse extends TransportResponse {
  elapsedMs: number;
}

/** Canned response for debug-mode mocking. `random` returns values in [0, 1). */
export const createMockResponse = (random: () => number): MockResponse => {
  const index = Math.min(Math.floor(random() * MOCK_STATUSES.length), MOCK_STATUSES.length - 1);
  const status = MOCK_STATUSES[index];
  const rawBody = JSON.stringify({ mock: true, status, message: "This is a mock response." }, null, 2);
  return {
    status,
    reasonPhrase: MOCK_REASONS[status],
    headers: { "Content-Type": "application/json" },
    rawBody,
    byteLength: Buffer.byteLength(rawBody, "utf8"),
    elapsedMs: 10 + random() * 90,
  };
};
