import type { CanonicalModel, FieldCategory, ModelFormat } from "../model/types";

export type ModelSource = {
  /** Label used in locations, normally the file path. */
  path: string;
  text: string;
  /**
   * Additional layers a composed format may pull in, keyed by resolved path.
   * Adapters never touch the file system; the caller materializes these.
   */
  layers?: ReadonlyMap<string, string>;
};

export type FormatAdapter = {
  format: ModelFormat;
  extensions: readonly string[];
  /** Field categories this format can ever populate. */
  categories: ReadonlySet<FieldCategory>;
  parse: (source: ModelSource) => CanonicalModel;
};
