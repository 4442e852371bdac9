/**
 * Localized error messages
 *
 * Messages live in `packages/core/locales/<culture>.json`, keyed by error
 * code, with `{name}` placeholders. The culture is negotiated from the
 * Accept-Language header and falls back to en-US.
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

export const SUPPORTED_LOCALES = ['en-US', 'fr-FR', 'de-DE'] as const;
export type SupportedLocale = (typeof SUPPORTED_LOCALES)[number];
export const DEFAULT_LOCALE: SupportedLocale = 'en-US';

const MessageCatalogSchema = z.record(z.string(), z.string());
type MessageCatalog = z.infer<typeof MessageCatalogSchema>;

export type MessageParams = Record<string, string | number>;

const DEFAULT_LOCALES_DIR = fileURLToPath(new URL('../locales/', import.meta.url));

interface LanguageRange {
  tag: string;
  quality: number;
}

/**
 * Parse an Accept-Language header into ranges ordered by quality.
 * Ranges with equal quality keep header order.
 */
export function parseAcceptLanguage(header: string | undefined): LanguageRange[] {
  if (!header) return [];

  const ranges: LanguageRange[] = [];
  for (const part of header.split(',')) {
    const [rawTag, ...params] = part.trim().split(';');
    const tag = rawTag?.trim();
    if (!tag) continue;

    let quality = 1;
    for (const param of params) {
      const [key, value] = param.trim().split('=');
      if (key === 'q' && value !== undefined) {
        const parsed = Number.parseFloat(value);
        quality = Number.isFinite(parsed) ? parsed : 0;
      }
    }
    if (quality > 0) {
      ranges.push({ tag, quality });
    }
  }

  return ranges
    .map((range, index) => ({ range, index }))
    .sort((a, b) => b.range.quality - a.range.quality || a.index - b.index)
    .map(({ range }) => range);
}

function isSupportedLocale(value: string): value is SupportedLocale {
  return SUPPORTED_LOCALES.some((locale) => locale === value);
}

/**
 * Pick the best supported culture for an Accept-Language header
 */
export function negotiateLocale(header: string | undefined): SupportedLocale {
  for (const { tag } of parseAcceptLanguage(header)) {
    if (tag === '*') return DEFAULT_LOCALE;

    const exact = SUPPORTED_LOCALES.find((locale) => locale.toLowerCase() === tag.toLowerCase());
    if (exact) return exact;

    const language = tag.split('-')[0]?.toLowerCase();
    const sameLanguage = SUPPORTED_LOCALES.find(
      (locale) => locale.split('-')[0]?.toLowerCase() === language
    );
    if (sameLanguage) return sameLanguage;
  }
  return DEFAULT_LOCALE;
}

function interpolate(template: string, params: MessageParams): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}

export interface LocalizerOptions {
  /** Directory holding `<culture>.json` catalogs */
  directory?: string;
}

/**
 * Loads every supported catalog once and translates error codes
 */
export class Localizer {
  private readonly catalogs: ReadonlyMap<SupportedLocale, MessageCatalog>;

  constructor(options: LocalizerOptions = {}) {
    const directory = options.directory ?? DEFAULT_LOCALES_DIR;
    const catalogs = new Map<SupportedLocale, MessageCatalog>();

    for (const locale of SUPPORTED_LOCALES) {
      const raw: unknown = JSON.parse(readFileSync(path.join(directory, `${locale}.json`), 'utf8'));
      catalogs.set(locale, MessageCatalogSchema.parse(raw));
    }
    this.catalogs = catalogs;
  }

  /**
   * Translate a code; falls back to en-US, then to `fallback`, then to the code itself
   */
  translate(
    locale: SupportedLocale,
    code: string,
    params: MessageParams = {},
    fallback?: string
  ): string {
    const template =
      this.catalogs.get(locale)?.[code] ?? this.catalogs.get(DEFAULT_LOCALE)?.[code] ?? fallback;
    return template === undefined ? code : interpolate(template, params);
  }

  /**
   * Whether a code has a message in the default catalog
   */
  has(code: string): boolean {
    return this.catalogs.get(DEFAULT_LOCALE)?.[code] !== undefined;
  }
}
