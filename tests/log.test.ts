import log, { configureLogger } from "../log";

import { afterEach, describe, expect, test } from "vitest";

describe("configureLogger", () => {
  afterEach(() => {
    configureLogger({ level: "silent", pretty: false });
  });

  test("applies the level read from the environment", () => {
    expect(log.level).toBe("silent");

    configureLogger({ level: "warn", pretty: false });

    expect(log.level).toBe("warn");
  });
});
