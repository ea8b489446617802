import { cityMetaKey, type CityCatalog } from './cities';

const SUMMARY_ENDPOINT = 'https://en.wikipedia.org/api/rest_v1/page/summary/';
const LOOKUP_TIMEOUT_MS = 6_000;
const USER_AGENT = 'TrafficDashboard/1.0';

type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ImageLookupOptions {
  fetchImpl?: FetchFn;
  timeoutMs?: number;
  logger?: Pick<Console, 'log' | 'warn'>;
}

export function extractWikipediaTitle(url: string | undefined): string | null {
  if (!url) {
    return null;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  if (!parsed.hostname.includes('wikipedia.org') || !parsed.pathname.startsWith('/wiki/')) {
    return null;
  }
  try {
    return decodeURIComponent(parsed.pathname.slice('/wiki/'.length)) || null;
  } catch {
    return null;
  }
}

function pickImageSource(payload: unknown): string | null {
  if (typeof payload !== 'object' || payload === null) {
    return null;
  }
  for (const field of ['originalimage', 'thumbnail']) {
    const image: unknown = Reflect.get(payload, field);
    if (typeof image === 'object' && image !== null) {
      const source: unknown = Reflect.get(image, 'source');
      if (typeof source === 'string' && source) {
        return source;
      }
    }
  }
  return null;
}

export async function fetchWikipediaImage(title: string, options: ImageLookupOptions = {}): Promise<string | null> {
  const { fetchImpl = fetch, timeoutMs = LOOKUP_TIMEOUT_MS } = options;
  const response = await fetchImpl(`${SUMMARY_ENDPOINT}${encodeURIComponent(title)}`, {
    headers: { 'User-Agent': USER_AGENT },
    signal: AbortSignal.timeout(timeoutMs)
  });
  if (!response.ok) {
    throw new Error(`summary lookup for "${title}" returned HTTP ${response.status}`);
  }
  return pickImageSource(await response.json());
}

/**
 * Fills the catalog's image cache for every city with a known landmark page.
 * Cities whose metadata already names an image are cached without a lookup.
 */
export async function warmCityImageCache(catalog: CityCatalog, options: ImageLookupOptions = {}): Promise<number> {
  const logger = options.logger ?? console;
  const names = new Set<string>();
  for (const record of catalog.records) {
    names.add(cityMetaKey(record.city));
  }
  for (const name of catalog.meta.keys()) {
    names.add(name);
  }

  for (const name of names) {
    const meta = catalog.meta.get(name) ?? {};
    if (meta.imageUrl) {
      catalog.imageCache.set(name, meta.imageUrl);
      continue;
    }

    const title = extractWikipediaTitle(meta.landmarkUrl);
    if (!title) {
      continue;
    }

    try {
      const image = await fetchWikipediaImage(title, options);
      if (image) {
        catalog.imageCache.set(name, image);
      }
    } catch (error) {
      logger.warn(`[city-images] ${name}: ${(error as Error).message}`);
    }
  }

  logger.log(`[city-images] cached ${catalog.imageCache.size} city images`);
  return catalog.imageCache.size;
}
