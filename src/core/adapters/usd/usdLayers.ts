import { readFile } from "node:fs/promises";
import { scopedLogger } from "../../services/logger";
import { type UsdPrimSpec, type UsdValue, isAssetValue, isList, parseUsdaLayer } from "./usdaParser";
import { resolveAssetPath } from "./usdStage";

const logger = scopedLogger("usd");

export type ReadText = (file: string) => Promise<string>;

const readUtf8: ReadText = (file) => readFile(file, "utf8");

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "EISDIR");

const assetsIn = (value: UsdValue | undefined): string[] =>
  (isList(value) ? value : [value]).flatMap((item) => (isAssetValue(item) ? [item.asset] : []));

function collectAssets(specs: readonly UsdPrimSpec[], out: string[]) {
  for (const spec of specs) {
    out.push(...assetsIn(spec.metadata.get("references")?.value), ...assetsIn(spec.metadata.get("payload")?.value));
    collectAssets(spec.children, out);
  }
}

/**
 * Reads every layer a text USD file reaches through sublayers, references and
 * payloads, keyed the way the stage resolves them. Layers that do not exist
 * are left out; composing the stage then reports them where they are named.
 */
export async function loadUsdLayers(rootFile: string, rootText: string, readText: ReadText = readUtf8) {
  const layers = new Map<string, string>();
  const seen = new Set([rootFile]);
  let pending: [string, string][] = [[rootFile, rootText]];

  while (pending.length) {
    const next: string[] = [];
    for (const [file, text] of pending) {
      const layer = parseUsdaLayer(text, file);
      const assets = assetsIn(layer.metadata.get("subLayers")?.value);
      collectAssets(layer.prims, assets);
      for (const asset of assets) {
        const resolved = resolveAssetPath(file, asset);
        if (seen.has(resolved)) continue;
        seen.add(resolved);
        next.push(resolved);
      }
    }
    const loaded = await Promise.all(
      next.map(async (file): Promise<[string, string] | null> => {
        try {
          return [file, await readText(file)];
        } catch (error) {
          if (!isMissingFile(error)) throw error;
          logger.debug(`Layer '${file}' not found.`);
          return null;
        }
      })
    );
    pending = loaded.flatMap((entry) => (entry ? [entry] : []));
    for (const [file, text] of pending) layers.set(file, text);
  }
  return layers;
}
