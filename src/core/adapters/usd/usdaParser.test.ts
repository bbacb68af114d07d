import { describe, expect, it } from "vitest";
import { ParseError } from "../../model/errors";
import { parseUsdaLayer, tokenizeUsda } from "./usdaParser";

const LAYER = `#usda 1.0
(
    defaultPrim = "bot"
    metersPerUnit = 1
    subLayers = [@./sub.usda@]
)

def Xform "bot" (
    prepend apiSchemas = ["PhysicsArticulationRootAPI"]
)
{
    float physics:mass = 2.5
    double3 xformOp:translate = (0, 0, 0.1)
    uniform token[] xformOpOrder = ["xformOp:translate"]
    rel physics:body0 = </bot/a>
    float radius.timeSamples = {
        0: 2,
        -1: 3,
    }
    custom string note = """two
lines"""
    float lower = -inf

    def Sphere "ball" {}
    def "untyped" {}
}
`;

describe("tokenizeUsda", () => {
  it("keeps namespaced names and array types in one token", () => {
    const tokens = tokenizeUsda("uniform token[] xformOpOrder = [@a.usda@, </p>] # note", "t.usda");
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      ["ident", "uniform"],
      ["ident", "token[]"],
      ["ident", "xformOpOrder"],
      ["punct", "="],
      ["punct", "["],
      ["asset", "a.usda"],
      ["punct", ","],
      ["path", "/p"],
      ["punct", "]"],
      ["eof", ""],
    ]);
  });

  it("counts lines through block comments", () => {
    const tokens = tokenizeUsda("/* one\ntwo */\nx", "t.usda");
    expect(tokens[0]).toEqual({ kind: "ident", text: "x", line: 3 });
  });

  it("reports an unterminated string at its line", () => {
    expect(() => tokenizeUsda('a\n"open', "t.usda")).toThrow("unterminated string");
  });
});

describe("parseUsdaLayer", () => {
  const layer = parseUsdaLayer(LAYER, "bot.usda");
  const [bot] = layer.prims;

  it("reads layer metadata", () => {
    expect(layer.metadata.get("defaultPrim")?.value).toBe("bot");
    expect(layer.metadata.get("metersPerUnit")?.value).toBe(1);
    expect(layer.metadata.get("subLayers")?.value).toEqual([{ kind: "asset", asset: "./sub.usda" }]);
  });

  it("reads prim specs with list-edited metadata", () => {
    expect(bot.specifier).toBe("def");
    expect(bot.typeName).toBe("Xform");
    expect(bot.path).toBe("/bot");
    expect(bot.metadata.get("apiSchemas")).toMatchObject({ op: "prepend", value: ["PhysicsArticulationRootAPI"] });
    expect(bot.children.map((c) => [c.path, c.typeName])).toEqual([
      ["/bot/ball", "Sphere"],
      ["/bot/untyped", null],
    ]);
  });

  it("reads attribute and relationship values", () => {
    expect(bot.properties.get("physics:mass")).toMatchObject({ typeName: "float", value: 2.5, isRelationship: false });
    expect(bot.properties.get("xformOp:translate")?.value).toEqual([0, 0, 0.1]);
    expect(bot.properties.get("xformOpOrder")).toMatchObject({ typeName: "token[]", value: ["xformOp:translate"] });
    expect(bot.properties.get("physics:body0")).toMatchObject({ isRelationship: true, value: { kind: "path", path: "/bot/a" } });
    expect(bot.properties.get("note")?.value).toBe("two\nlines");
    expect(bot.properties.get("lower")?.value).toBe(-Infinity);
  });

  it("takes the earliest time sample when no default is authored", () => {
    expect(bot.properties.get("radius")?.value).toBe(3);
  });

  it("skips variant sets with a warning", () => {
    const parsed = parseUsdaLayer(
      `#usda 1.0
      def "p" {
          variantSet "look" = {
              "red" { float r = 1 }
          }
          float g = 2
      }`,
      "v.usda"
    );
    expect(parsed.warnings.map((w) => w.element)).toEqual(["variantSet 'look'"]);
    expect(Array.from(parsed.prims[0].properties.keys())).toEqual(["g"]);
  });

  it("rejects binary layers and a missing header", () => {
    expect(() => parseUsdaLayer("PXR-USDC....", "b.usd")).toThrow("binary USD (crate) layers are not supported");
    expect(() => parseUsdaLayer('def "p" {}', "h.usda")).toThrow("missing '#usda <version>' header");
  });

  it("locates syntax errors", () => {
    try {
      parseUsdaLayer('#usda 1.0\ndef "p" {\n  float x = \n}', "e.usda");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({ location: { file: "e.usda", line: 4 } });
    }
  });
});
