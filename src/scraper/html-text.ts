import * as cheerio from 'cheerio';

// Plain-text reduction of fetched HTML pages

const DROPPED = 'head, script, style, noscript, svg, template, iframe, nav, header, footer, aside, form';

const BLOCKS =
  'p, div, section, article, main, h1, h2, h3, h4, h5, h6, li, ul, ol, tr, table, blockquote, pre, dd, dt, figcaption';

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Document title, falling back to the first heading */
export function extractTitle(html: string): string | null {
  const $ = cheerio.load(html);
  const title = collapse($('title').first().text()) || collapse($('h1').first().text());
  return title || null;
}

export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $(DROPPED).remove();
  $('br').replaceWith('\n');
  $(BLOCKS).each((_i, el) => {
    $(el).before('\n').after('\n');
  });

  return $.root()
    .text()
    .split('\n')
    .map(collapse)
    .filter((line) => line.length > 0)
    .join('\n');
}
