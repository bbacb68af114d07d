import { describe, expect, it } from "vitest";
import { FormatDetectionError } from "../model/errors";
import { detectFormat, getAdapter } from "./registry";

describe("detectFormat", () => {
  it.each([
    ["robot.urdf", "urdf"],
    ["models/robot.SDF", "sdf"],
    ["scene.xml", "mjcf"],
    ["arm.usda", "usd"],
    ["arm.usd", "usd"],
  ])("maps %s to %s", (file, format) => {
    expect(detectFormat(file)).toBe(format);
  });

  it("prefers an override and normalizes its case", () => {
    expect(detectFormat("robot.xml", " SDF ")).toBe("sdf");
  });

  it.each([
    ["README", undefined, "file has no extension"],
    ["mesh.obj", undefined, "unrecognized extension '.obj'"],
    ["robot.urdf", "step", "unknown format 'step'"],
  ])("rejects %s (override %s)", (file, override, reason) => {
    expect(() => detectFormat(file, override)).toThrow(FormatDetectionError);
    expect(() => detectFormat(file, override)).toThrow(reason);
  });
});

describe("getAdapter", () => {
  it("returns the registered adapter for each format", () => {
    expect(getAdapter("mjcf").extensions).toEqual([".xml", ".mjcf"]);
    expect(getAdapter("usd").format).toBe("usd");
  });
});
