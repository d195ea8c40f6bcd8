import { describe, it, expect } from "vitest";
import { parseConfigFile, resolveConfig } from "../src/lib/config.js";

describe("CLI config", () => {
  it("uses the local node by default", () => {
    expect(resolveConfig({}, {})).toEqual({
      node: "http://localhost:3200",
      token: undefined,
      account: undefined,
    });
  });

  it("layers env over the file and trims trailing slashes", () => {
    const file = parseConfigFile(JSON.stringify({ node: "http://ledger.test/", token: "file-token" }));
    expect(resolveConfig(file, { TAPA_TOKEN: "env-token" })).toEqual({
      node: "http://ledger.test",
      token: "env-token",
      account: undefined,
    });
    expect(resolveConfig(file, { TAPA_NODE: "http://other.test" }).node).toBe("http://other.test");
  });

  it("ignores unreadable or mistyped files", () => {
    expect(parseConfigFile("not json")).toEqual({});
    expect(parseConfigFile(JSON.stringify({ node: 42 }))).toEqual({});
  });
});
