import path from "node:path";
import { createStore } from "zustand/vanilla";
import { FormatDetectionError } from "../model/errors";
import { MODEL_FORMATS, type ModelFormat } from "../model/types";
import { mjcfAdapter } from "./mjcf/mjcfAdapter";
import { sdfAdapter } from "./sdf/sdfAdapter";
import type { FormatAdapter } from "./types";
import { urdfAdapter } from "./urdf/urdfAdapter";
import { usdAdapter } from "./usd/usdAdapter";

type AdapterState = {
  adapters: Partial<Record<ModelFormat, FormatAdapter>>;
  registerAdapter: (adapter: FormatAdapter) => void;
};

export const adapterStore = createStore<AdapterState>((set) => ({
  adapters: {},
  registerAdapter: (adapter) => set((state) => ({ adapters: { ...state.adapters, [adapter.format]: adapter } })),
}));

export function registerCoreAdapters() {
  const { registerAdapter } = adapterStore.getState();
  registerAdapter(urdfAdapter);
  registerAdapter(sdfAdapter);
  registerAdapter(mjcfAdapter);
  registerAdapter(usdAdapter);
}

registerCoreAdapters();

export const isModelFormat = (value: string): value is ModelFormat => MODEL_FORMATS.some((format) => format === value);

export function getAdapter(format: ModelFormat): FormatAdapter {
  const adapter = adapterStore.getState().adapters[format];
  if (!adapter) throw new FormatDetectionError(`<${format}>`, `no adapter registered for format '${format}'`);
  return adapter;
}

/** Picks the format from the file extension unless an override names one. */
export function detectFormat(file: string, override?: string): ModelFormat {
  if (override !== undefined) {
    const wanted = override.trim().toLowerCase();
    if (!isModelFormat(wanted)) {
      throw new FormatDetectionError(file, `unknown format '${override}'; expected one of ${MODEL_FORMATS.join(", ")}`);
    }
    return getAdapter(wanted).format;
  }
  const ext = path.extname(file).toLowerCase();
  if (!ext) throw new FormatDetectionError(file, "file has no extension; pass a format override");
  const adapter = Object.values(adapterStore.getState().adapters).find((a) => a.extensions.includes(ext));
  if (!adapter) throw new FormatDetectionError(file, `unrecognized extension '${ext}'`);
  return adapter.format;
}
