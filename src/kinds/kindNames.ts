import { mergeMaps } from "../utils/mergeMaps.js";

export const KIND_NAMES: ReadonlyMap<number, string> = new Map([
  [0, "profile metadata"],
  [1, "text note"],
  [2, "relay recommendation"],
  [3, "contact list"],
  [4, "encrypted direct message"],
  [5, "event deletion"],
  [6, "repost"],
  [7, "reaction"],
  [8, "badge award"],
  [40, "channel creation"],
  [41, "channel metadata"],
  [42, "channel message"],
  [43, "channel hide message"],
  [44, "channel mute user"],
  [1984, "report"],
  [9735, "zap"],
  [9734, "zap request"],
  [10002, "relay list"],
  [30008, "profile badges"],
  [30009, "badge definition"],
  [30078, "app-specific data"],
  [30023, "article"]
]);

export function kindLabel(kind: number, catalog: ReadonlyMap<number, string> = KIND_NAMES): string | undefined {
  return catalog.get(kind);
}

export function describeKind(kind: number, catalog: ReadonlyMap<number, string> = KIND_NAMES): string {
  return kindLabel(kind, catalog) ?? `kind ${kind}`;
}

// Configured labels take precedence over the built-in ones.
export function buildKindCatalog(overrides: ReadonlyMap<number, string>): ReadonlyMap<number, string> {
  return mergeMaps(new Map(KIND_NAMES), overrides);
}
