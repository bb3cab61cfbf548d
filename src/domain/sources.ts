import { YahooAuctionsAdapter } from "../services/sources/yahoo.js";
import type { SourceAdapter } from "../types/listing.js";

export interface AdapterFactoryOptions {
  timeoutMs: number;
}

export interface SourceDefinition {
  id: string;
  title: string;
  link: string;
  create: (options: AdapterFactoryOptions) => SourceAdapter;
}

export const SOURCE_DEFINITIONS: readonly SourceDefinition[] = [
  {
    id: "yahoo",
    title: "Yahoo!オークション",
    link: "https://auctions.yahoo.co.jp",
    create: (options) => new YahooAuctionsAdapter(options),
  },
];

export const SOURCE_MAP = new Map<string, SourceDefinition>(
  SOURCE_DEFINITIONS.map((source) => [source.id, source]),
);

export function isSupportedSource(source: string): boolean {
  return SOURCE_MAP.has(source);
}

/** Builds adapters for the named sources; names without a definition are left out. */
export function createAdapters(
  names: Iterable<string>,
  options: AdapterFactoryOptions,
): Map<string, SourceAdapter> {
  const adapters = new Map<string, SourceAdapter>();
  for (const name of names) {
    const definition = SOURCE_MAP.get(name);
    if (!definition || adapters.has(name)) continue;
    adapters.set(name, definition.create(options));
  }
  return adapters;
}

/** One adapter per registered source, so sources enabled later need no restart. */
export function createRegisteredAdapters(options: AdapterFactoryOptions): Map<string, SourceAdapter> {
  return createAdapters(
    SOURCE_DEFINITIONS.map((source) => source.id),
    options,
  );
}
