import * as cheerio from 'cheerio';

/**
 * Reduces feed markup to plain text. Text from neighbouring elements is kept
 * apart by a space, then all whitespace runs collapse to one space.
 */
export function cleanMarkup(markup: string | null | undefined): string {
  if (!markup) return '';

  const $ = cheerio.load(markup, null, false);
  $('*').each((_, el) => {
    $(el).prepend(' ').append(' ');
  });

  return $.root().text().replace(/\s+/g, ' ').trim();
}
