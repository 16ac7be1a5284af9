import { describe, it, expect } from "vitest";
import {
  ConfigError,
  DEFAULT_CONFIG,
  mapType,
  parseTranslatorConfig,
  resolveConfig,
} from "../src/codegen/index.js";

describe("translator config", () => {
  describe("parseTranslatorConfig", () => {
    it("accepts an empty object", () => {
      expect(parseTranslatorConfig({})).toEqual({});
    });

    it("accepts every section", () => {
      const input = {
        typeMap: { double: "f32" },
        builtins: {
          laneId: { attribute: "subgroup_invocation_id", type: "u32" },
          warpSize: { unresolved: "no fixed subgroup size" },
        },
        functionMap: { rsqrtf: "inverseSqrt" },
      };
      expect(parseTranslatorConfig(input)).toEqual(input);
    });

    it("rejects unknown sections", () => {
      expect(() => parseTranslatorConfig({ types: {} })).toThrow(ConfigError);
    });

    it("lists every validation error", () => {
      try {
        parseTranslatorConfig({ typeMap: { int: 32 } });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        if (err instanceof ConfigError) {
          expect(err.errors.length).toBeGreaterThan(0);
          expect(err.errors.some((e) => e.startsWith("/typeMap/int: "))).toBe(true);
          expect(err.message.startsWith("Invalid translator config:\n  ")).toBe(true);
        }
      }
    });

    it("rejects non-object values", () => {
      expect(() => parseTranslatorConfig(null)).toThrow(ConfigError);
      expect(() => parseTranslatorConfig([])).toThrow(ConfigError);
    });
  });

  describe("resolveConfig", () => {
    it("returns the defaults without input", () => {
      expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    });

    it("merges overrides key by key", () => {
      const config = resolveConfig({ typeMap: { float: "f16", double: "f32" } });
      expect(config.typeMap.float).toBe("f16");
      expect(config.typeMap.double).toBe("f32");
      expect(config.typeMap.int).toBe("i32");
      expect(config.functionMap).toEqual(DEFAULT_CONFIG.functionMap);
    });

    it("keeps default builtins first in injection order", () => {
      const config = resolveConfig({
        builtins: { laneId: { attribute: "subgroup_invocation_id", type: "u32" } },
      });
      expect(Object.keys(config.builtins)).toEqual([
        "threadIdx",
        "blockIdx",
        "gridDim",
        "blockDim",
        "laneId",
      ]);
    });

    it("does not modify the defaults", () => {
      resolveConfig({ typeMap: { int: "u32" } });
      expect(DEFAULT_CONFIG.typeMap.int).toBe("i32");
    });
  });

  describe("mapType", () => {
    it("maps known scalar types", () => {
      expect(mapType(DEFAULT_CONFIG, "int")).toBe("i32");
      expect(mapType(DEFAULT_CONFIG, "float")).toBe("f32");
      expect(mapType(DEFAULT_CONFIG, "unsigned")).toBe("u32");
    });

    it("passes unknown names through", () => {
      expect(mapType(DEFAULT_CONFIG, "vec4f")).toBe("vec4f");
    });

    it("ignores inherited object properties", () => {
      expect(mapType(DEFAULT_CONFIG, "constructor")).toBe("constructor");
      expect(mapType(DEFAULT_CONFIG, "toString")).toBe("toString");
    });
  });
});
