import { describe, it, expect } from "vitest";
import { parseQuestionCount, resolveConfig } from "./config";

describe("config", () => {
  describe("parseQuestionCount", () => {
    it("accepts positive whole numbers", () => {
      expect(parseQuestionCount("5")).toBe(5);
      expect(parseQuestionCount(" 3 ")).toBe(3);
      expect(parseQuestionCount("+4")).toBe(4);
    });

    it("falls back to the full catalog for anything else", () => {
      for (const raw of [undefined, "", "0", "-2", "abc", "2.5", "1e3"]) {
        expect(parseQuestionCount(raw)).toBe(undefined);
      }
    });
  });

  describe("resolveConfig", () => {
    it("uses defaults when nothing is set", () => {
      expect(resolveConfig({}, {})).toEqual({ restartMode: "reselect", logLevel: "warn" });
    });

    it("reads options", () => {
      expect(
        resolveConfig(
          { count: "7", seed: " demo ", questions: "quiz.json", restartMode: "reshuffle", logLevel: "debug" },
          {}
        )
      ).toEqual({ count: 7, seed: "demo", questionsFile: "quiz.json", restartMode: "reshuffle", logLevel: "debug" });
    });

    it("takes the log level from the environment unless given", () => {
      expect(resolveConfig({}, { QUIZ_LOG_LEVEL: "info" }).logLevel).toBe("info");
      expect(resolveConfig({ logLevel: "error" }, { QUIZ_LOG_LEVEL: "info" }).logLevel).toBe("error");
      expect(resolveConfig({}, { QUIZ_LOG_LEVEL: "loud" }).logLevel).toBe("warn");
    });

    it("ignores unknown restart modes and blank seeds", () => {
      const config = resolveConfig({ restartMode: "sideways", seed: "  " }, {});
      expect(config.restartMode).toBe("reselect");
      expect(config.seed).toBe(undefined);
    });
  });
});
