// Centralized site registry

import { createAdapter as homedepotCa } from "./retail/homedepot-ca/adapter";
import type { AdapterFactory } from "./types";

// Adapter factories (single source of truth for site keys)
const adapters = {
  "homedepot-ca": homedepotCa,
} satisfies Record<string, AdapterFactory>;

export const registry = new Map<string, AdapterFactory>(
  Object.entries(adapters),
);

export function getSiteKeys(): string[] {
  return Array.from(registry.keys());
}
