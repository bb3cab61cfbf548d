export interface Item {
  source: string;
  id: string;
  title: string;
  /** Smallest currency unit. */
  price: number;
  url: string;
}

export interface SearchOptions {
  signal?: AbortSignal;
}

export interface SourceAdapter<TRaw = unknown> {
  readonly name: string;
  search(keyword: string, options?: SearchOptions): Promise<Item[]>;
  extractId(raw: TRaw): string;
}

export interface SourceConfig {
  enabled: boolean;
  keywords: string[];
  minPrice: number;
  seedOnFirstRun: boolean;
}

export type SourceConfigMap = Record<string, SourceConfig>;

export interface SeenRecord {
  source: string;
  id: string;
  firstSeenAt: string;
}
