import { describe, it } from "mocha";
import { expect } from "chai";

import { readBool, readEnum, readOptionalBool, readOptionalString } from "../src/config/env.js";
import { loadSettings } from "../src/config/settings.js";

describe("config", () => {
  describe("env readers", () => {
    it("accepts human-friendly boolean literals", () => {
      const env = { YES: " Yes ", OFF: "off", ODD: "maybe", BLANK: "  " };

      expect(readOptionalBool("YES", env)).to.equal(true);
      expect(readOptionalBool("OFF", env)).to.equal(false);
      expect(readOptionalBool("ODD", env)).to.equal(undefined);
      expect(readBool("BLANK", true, env)).to.equal(true);
      expect(readBool("MISSING", false, env)).to.equal(false);
    });

    it("trims strings and treats blank values as unset", () => {
      expect(readOptionalString("PATH_VALUE", { PATH_VALUE: "  ./tmp/graph.log " })).to.equal("./tmp/graph.log");
      expect(readOptionalString("PATH_VALUE", { PATH_VALUE: "   " })).to.equal(undefined);
    });

    it("matches enum values case-insensitively", () => {
      const allowed = ["debug", "info"] as const;
      expect(readEnum("LEVEL", allowed, "info", { LEVEL: "DEBUG" })).to.equal("debug");
      expect(readEnum("LEVEL", allowed, "info", { LEVEL: "verbose" })).to.equal("info");
    });
  });

  describe("loadSettings", () => {
    it("uses defaults for an empty environment", () => {
      expect(loadSettings({})).to.deep.equal({
        directed: false,
        onMalformedLine: "abort",
        logLevel: "warn",
        logFile: null,
      });
    });

    it("reads every GRAPH_* variable", () => {
      const settings = loadSettings({
        GRAPH_DIRECTED: "true",
        GRAPH_SKIP_MALFORMED: "1",
        GRAPH_LOG_LEVEL: "Debug",
        GRAPH_LOG_FILE: "/tmp/graph.log",
      });

      expect(settings).to.deep.equal({
        directed: true,
        onMalformedLine: "skip",
        logLevel: "debug",
        logFile: "/tmp/graph.log",
      });
    });
  });
});
