import { describe, expect, it } from "vitest";
import { createLogger, toLogValue, type LogRecord, type LogSink } from "./logger.js";

const memorySink = () => {
  const records: LogRecord[] = [];
  const sink: LogSink = {
    write: (record) => {
      records.push(record);
    },
    close: async () => undefined
  };
  return { sink, records };
};

describe("toLogValue", () => {
  it("redacts credentials whatever their casing", () => {
    expect(toLogValue("Authorization", "Bearer test-token")).toBe("[redacted]");
    expect(toLogValue("apiKey", "test-secret")).toBe("[redacted]");
  });

  it("summarizes image bytes and data urls", () => {
    expect(toLogValue("image", Buffer.alloc(12))).toEqual({ bytes: 12 });
    expect(toLogValue("preview", "data:image/png;base64,AAAA")).toBe("data:image/png;base64,[26 chars]");
  });

  it("flattens errors", () => {
    const value = toLogValue("error", new TypeError("bad input"));
    expect(value).toMatchObject({ name: "TypeError", message: "bad input" });
  });

  it("passes everything else through", () => {
    expect(toLogValue("userId", "user-1")).toBe("user-1");
    expect(toLogValue("count", 3)).toBe(3);
  });
});

describe("createLogger", () => {
  it("drops records below the configured level and ranks request lines with info", () => {
    const { sink, records } = memorySink();
    const logger = createLogger({ level: "warn", sink });

    logger.debug("cache_miss");
    logger.info("asset_saved");
    logger.http("http_request");
    logger.warn("gemstone_refund_repeated");
    logger.error("asset_query_failed");

    expect(records.map((record) => `${record.level}:${record.event}`)).toEqual([
      "warn:gemstone_refund_repeated",
      "error:asset_query_failed"
    ]);
  });

  it("writes the service name and cleaned data", () => {
    const { sink, records } = memorySink();
    const logger = createLogger({ level: "debug", sink });

    logger.info("asset_saved", { userId: "user-1", token: "test-token" });

    expect(records[0]).toMatchObject({
      level: "info",
      event: "asset_saved",
      service: "assetcraft-api",
      data: { userId: "user-1", token: "[redacted]" }
    });
  });

  it("omits data when none is given", () => {
    const { sink, records } = memorySink();
    createLogger({ level: "info", sink }).info("api_server_started");

    expect(records[0]).not.toHaveProperty("data");
  });
});
