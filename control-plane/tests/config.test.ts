import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadConfig({});
    expect(config.apiPort).toBe(8080);
    expect(config.storeBackend).toBe("postgres");
    expect(config.queueBackend).toBe("redis");
    expect(config.dispatchTopic).toBe("dispatches");
    expect(config.resultsDir).toBe("./results");
    expect(config.storeTimeoutMs).toBe(5000);
    expect(config.completionWebhookUrl).toBeNull();
  });

  it("reads overrides and ignores unparseable numbers", () => {
    const config = loadConfig({
      API_PORT: "9090",
      STORE_BACKEND: "memory",
      QUEUE_BACKEND: "memory",
      REQUESTS_PER_MINUTE: "lots",
      COMPLETION_WEBHOOK_URL: "http://hooks.test/done"
    });
    expect(config.apiPort).toBe(9090);
    expect(config.storeBackend).toBe("memory");
    expect(config.queueBackend).toBe("memory");
    expect(config.requestPerMinute).toBe(600);
    expect(config.completionWebhookUrl).toBe("http://hooks.test/done");
  });
});
