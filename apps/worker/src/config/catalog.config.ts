import { registerAs } from '@nestjs/config';
import { readFileSync } from 'fs';
import { resolve } from 'path';

/** One catalog entry: a series and the playlist its episodes come from */
export interface SeriesDefinition {
  name: string;
  playlistUrl: string;
}

export interface CatalogConfig {
  series: readonly SeriesDefinition[];
}

export const DEFAULT_CATALOG_FILE = 'config/catalog.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Series names become path segments and ledger keys */
const SERIES_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9 _.-]*$/;

/**
 * Validates the catalog document. Accepts either an object keyed by series
 * name (`{ "demo": { "link": "https://..." } }`) or an array of
 * `{ name, playlistUrl }` entries.
 */
export function parseCatalog(document: unknown): CatalogConfig {
  const entries: SeriesDefinition[] = [];

  if (Array.isArray(document)) {
    for (const item of document) {
      if (!isRecord(item)) {
        throw new Error('Catalog entries must be objects');
      }
      const { name, playlistUrl } = item;
      if (typeof name !== 'string' || typeof playlistUrl !== 'string') {
        throw new Error('Catalog entries need string "name" and "playlistUrl"');
      }
      entries.push({ name, playlistUrl });
    }
  } else if (isRecord(document)) {
    for (const [name, value] of Object.entries(document)) {
      const link = isRecord(value) ? value.link : value;
      if (typeof link !== 'string') {
        throw new Error(`Catalog series "${name}" has no playlist link`);
      }
      entries.push({ name, playlistUrl: link });
    }
  } else {
    throw new Error('Catalog must be an object or an array');
  }

  const seen = new Set<string>();
  for (const entry of entries) {
    if (!SERIES_NAME_PATTERN.test(entry.name)) {
      throw new Error(`Invalid series name "${entry.name}"`);
    }
    if (seen.has(entry.name)) {
      throw new Error(`Duplicate series name "${entry.name}"`);
    }
    seen.add(entry.name);
  }

  return { series: Object.freeze(entries) };
}

export function loadCatalogFile(path: string): CatalogConfig {
  const raw = readFileSync(resolve(path), 'utf8');
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Catalog file ${path} is not valid JSON: ${message}`);
  }
  return parseCatalog(document);
}

/** `catalog` config namespace, read once at startup */
export const catalogConfig = registerAs('catalog', (): CatalogConfig =>
  loadCatalogFile(process.env.CATALOG_FILE || DEFAULT_CATALOG_FILE),
);
