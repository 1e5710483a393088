import { DEFAULT_ATTRIBUTES, mergeAttributes, resolveConfig } from "./FrameConfig";

describe("FrameConfig", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe("DEFAULT_ATTRIBUTES", () => {
    it("has no shadow, radius or border by default", () => {
      expect(DEFAULT_ATTRIBUTES.shadowWidth).toBe(0);
      expect(DEFAULT_ATTRIBUTES.dx).toBe(0);
      expect(DEFAULT_ATTRIBUTES.dy).toBe(0);
      expect(DEFAULT_ATTRIBUTES.cornerRadius).toBe(0);
      expect(DEFAULT_ATTRIBUTES.borderWidth).toBe(0);
    });

    it("enables all shadow sides", () => {
      expect(DEFAULT_ATTRIBUTES.shadowSides).toBe(15);
    });
  });

  describe("mergeAttributes", () => {
    it("should return defaults when null is passed", () => {
      expect(mergeAttributes(null)).toEqual(DEFAULT_ATTRIBUTES);
    });

    it("should return a copy, not the defaults object", () => {
      expect(mergeAttributes(undefined)).not.toBe(DEFAULT_ATTRIBUTES);
    });

    it("should override specific fields", () => {
      const result = mergeAttributes({ shadowWidth: 6, borderColor: "#123456" });
      expect(result.shadowWidth).toBe(6);
      expect(result.borderColor).toBe("#123456");
      expect(result.cornerRadius).toBe(0);
      expect(result.shadowSides).toBe(15);
    });

    it("should treat explicit undefined as missing", () => {
      const result = mergeAttributes({ dx: undefined });
      expect(result.dx).toBe(0);
    });
  });

  describe("resolveConfig", () => {
    it("resolves defaults to physical values", () => {
      const config = resolveConfig(null, 3);
      expect(config.shadowColor).toEqual({ r: 0, g: 0, b: 0, a: 1 });
      expect(config.borderColor).toEqual({ r: 255, g: 255, b: 255, a: 1 });
      expect(config.shadowWidth).toBe(0);
      expect(config.cornerRadius).toBe(0);
      expect(config.borderWidth).toBe(0);
      expect(config.shadowSides).toEqual(new Set(["top", "right", "bottom", "left"]));
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it("converts lengths with the display density", () => {
      const config = resolveConfig(
        { shadowWidth: 4, dx: -1, dy: 2, cornerRadius: 6, borderWidth: 1 },
        2,
      );
      expect(config.shadowWidth).toBe(8.5);
      expect(config.dx).toBe(-1.5);
      expect(config.dy).toBe(4.5);
      expect(config.cornerRadius).toBe(12.5);
      expect(config.borderWidth).toBe(2.5);
    });

    it("accepts the sides as a list", () => {
      const config = resolveConfig({ shadowSides: ["bottom"] }, 1);
      expect([...config.shadowSides]).toEqual(["bottom"]);
    });

    it("clamps negative widths to zero with a warning", () => {
      const config = resolveConfig({ shadowWidth: -2 }, 1);
      expect(config.shadowWidth).toBe(0);
      expect(warnSpy).toHaveBeenCalledWith(
        "[ShadowFrame] shadowWidth: negative length -2, clamped to 0",
      );
    });

    it("falls back to the default color for unparseable input", () => {
      const config = resolveConfig({ borderColor: "teal" }, 1);
      expect(config.borderColor).toEqual({ r: 255, g: 255, b: 255, a: 1 });
      expect(warnSpy).toHaveBeenCalledWith(
        '[ShadowFrame] borderColor: unrecognized color "teal", using default',
      );
    });

    it("zeroes non-finite offsets", () => {
      const config = resolveConfig({ dy: Number.POSITIVE_INFINITY }, 1);
      expect(config.dy).toBe(0);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it("returns a frozen config", () => {
      const config = resolveConfig({ shadowWidth: 1 }, 1);
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.shadowColor)).toBe(true);
    });

    it("rejects an invalid density", () => {
      expect(() => resolveConfig(null, -1)).toThrow(RangeError);
    });
  });
});
