import { AxiosError, AxiosHeaders } from "axios";
import { describe, expect, it } from "vitest";
import { isServerUnreachable } from "./http";

const answered = (status: number) =>
  new AxiosError("Request failed", "ERR_BAD_RESPONSE", undefined, undefined, {
    data: {},
    status,
    statusText: "",
    headers: {},
    config: { headers: new AxiosHeaders() }
  });

describe("isServerUnreachable", () => {
  it("holds for network failures and server errors", () => {
    expect(isServerUnreachable(new AxiosError("Network Error", "ERR_NETWORK"))).toBe(true);
    expect(isServerUnreachable(answered(500))).toBe(true);
    expect(isServerUnreachable(answered(503))).toBe(true);
  });

  it("does not hold for client errors or non-HTTP errors", () => {
    expect(isServerUnreachable(answered(400))).toBe(false);
    expect(isServerUnreachable(answered(401))).toBe(false);
    expect(isServerUnreachable(new Error("offline"))).toBe(false);
  });
});
