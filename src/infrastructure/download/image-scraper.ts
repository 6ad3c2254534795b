import path from 'node:path';

import * as cheerio from 'cheerio';

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp', '.svg'] as const;

export interface ImageItem {
  readonly url: string;
  readonly filenameHint: string;
}

const SRCSET_ATTRIBUTES = ['srcset', 'data-srcset'] as const;

const SRC_ATTRIBUTES = ['src', 'data-src', 'data-original', 'data-lazy-src'] as const;

export function isDataUrl(url: string): boolean {
  return url.trim().toLowerCase().startsWith('data:');
}

export function looksLikeDirectImage(url: string): boolean {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return false;
  }
  return IMAGE_EXTENSIONS.some((extension) => pathname.endsWith(extension));
}

/**
 * Picks the candidate with the largest `w` (or `x`) descriptor. Candidates
 * without a readable descriptor score 0; ties keep document order.
 */
export function parseSrcset(srcset: string): string | null {
  let best: { score: number; url: string } | null = null;

  for (const part of srcset.split(',')) {
    const [candidateUrl, descriptor] = part.trim().split(/\s+/);
    if (!candidateUrl) {
      continue;
    }

    const score = descriptorScore(descriptor);
    if (!best || score > best.score) {
      best = { score, url: candidateUrl };
    }
  }

  return best?.url ?? null;
}

export function extractImageItems(html: string, baseUrl: string): ImageItem[] {
  const $ = cheerio.load(html);

  let base = baseUrl;
  const baseHref = $('base[href]').first().attr('href');
  if (baseHref) {
    base = resolveUrl(baseHref, baseUrl) ?? baseUrl;
  }

  const raw: string[] = [];

  const ogImage = $('meta[property="og:image"]').first().attr('content');
  if (ogImage) {
    raw.push(ogImage);
  }

  const linkImage = $('link[rel="image_src"]').first().attr('href');
  if (linkImage) {
    raw.push(linkImage);
  }

  $('img').each((_, element) => {
    const img = $(element);
    const source = bestImageSource((name) => img.attr(name));
    if (source) {
      raw.push(source);
    }
  });

  const seen = new Set<string>();
  const items: ImageItem[] = [];

  for (const candidate of raw) {
    if (isDataUrl(candidate)) {
      continue;
    }

    const absolute = resolveUrl(candidate, base);
    if (!absolute || seen.has(absolute)) {
      continue;
    }

    seen.add(absolute);
    items.push({ url: absolute, filenameHint: filenameHintFor(absolute) });
  }

  return items;
}

function bestImageSource(attribute: (name: string) => string | undefined): string | null {
  for (const name of SRCSET_ATTRIBUTES) {
    const srcset = attribute(name);
    const best = srcset ? parseSrcset(srcset) : null;
    if (best) {
      return best;
    }
  }

  for (const name of SRC_ATTRIBUTES) {
    const src = attribute(name);
    if (src && src.trim()) {
      return src;
    }
  }

  return null;
}

function descriptorScore(descriptor: string | undefined): number {
  if (!descriptor) {
    return 0;
  }

  if (descriptor.endsWith('w')) {
    const width = Number.parseInt(descriptor.slice(0, -1), 10);
    return Number.isFinite(width) ? width : 0;
  }

  if (descriptor.endsWith('x')) {
    const density = Number.parseFloat(descriptor.slice(0, -1));
    return Number.isFinite(density) ? density : 0;
  }

  return 0;
}

function resolveUrl(candidate: string, base: string): string | null {
  try {
    return new URL(candidate.trim(), base).toString();
  } catch {
    return null;
  }
}

function filenameHintFor(url: string): string {
  const name = path.posix.basename(new URL(url).pathname);
  return name || 'image';
}
