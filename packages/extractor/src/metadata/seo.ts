import * as cheerio from 'cheerio';
import type { HreflangEntry, SeoData } from '@cloakscope/shared';

const FEED_TYPES = ['rss', 'atom'];

function nonEmpty(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Extract the SEO metadata search engines read from a document
 */
export function extractSeoData(html: string): SeoData {
  const $ = cheerio.load(html);

  const metaContent = (name: string): string | null => {
    const meta = $('meta[name]')
      .filter((_, el) => ($(el).attr('name') ?? '').toLowerCase() === name)
      .first();
    return nonEmpty(meta.attr('content'));
  };

  const firstText = (selector: string): string | null => {
    const element = $(selector).first();
    return element.length === 0 ? null : element.text().trim();
  };

  const hreflang: HreflangEntry[] = [];
  const alternateUrls: string[] = [];

  $('link[rel~="alternate"]').each((_, el) => {
    const link = $(el);
    const href = nonEmpty(link.attr('href'));
    const lang = nonEmpty(link.attr('hreflang'));

    if (lang !== null) {
      if (href !== null) hreflang.push({ lang, url: href });
      return;
    }

    const type = (link.attr('type') ?? '').toLowerCase();
    if (href !== null && !FEED_TYPES.some(feed => type.includes(feed))) {
      alternateUrls.push(href);
    }
  });

  return {
    title: firstText('title'),
    h1: firstText('h1'),
    description: metaContent('description'),
    canonical: nonEmpty($('link[rel~="canonical"]').first().attr('href')),
    htmlLang: nonEmpty($('html').attr('lang')),
    robots: metaContent('robots'),
    hreflang,
    alternateUrls,
  };
}
