import { describe, it, expect } from "vitest";
import { config, validateConfig } from "../config";

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(() => validateConfig({ ...config, restEnabled: false })).not.toThrow();
  });

  it("rejects an inverted port range", () => {
    expect(() => validateConfig({ ...config, portRangeStart: 62000, portRangeEnd: 61000 })).toThrow(
      "PORT_RANGE_START must not be greater than PORT_RANGE_END"
    );
  });

  it("rejects ports outside 1-65535", () => {
    expect(() => validateConfig({ ...config, portRangeEnd: 70000 })).toThrow(
      "PORT_RANGE_START and PORT_RANGE_END must be ports between 1 and 65535"
    );
  });

  it("rejects a zero worker count", () => {
    expect(() => validateConfig({ ...config, autoConnectWorkers: 0 })).toThrow(
      "AUTO_CONNECT_WORKERS must be a positive integer"
    );
  });

  it("rejects unparsable numbers", () => {
    expect(() => validateConfig({ ...config, launchGraceMs: Number.NaN })).toThrow(
      "LAUNCH_GRACE_MS must be a non-negative integer"
    );
  });
});
