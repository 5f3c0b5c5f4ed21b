import { EnrichedArticle } from './news.types';

const BOM = '\uFEFF';
const RULE = '='.repeat(60);

const CSV_COLUMNS: ReadonlyArray<[header: string, pick: (a: EnrichedArticle) => string]> = [
  ['키워드', (a) => a.keyword],
  ['제목', (a) => a.title],
  ['요약', (a) => a.summary],
  ['감성', (a) => a.sentiment],
  ['콘텐츠톤', (a) => a.tone],
  ['키워드추출', (a) => a.extractedKeywords],
  ['태그', (a) => a.tags],
  ['한줄평', (a) => a.opinion],
  ['링크', (a) => a.link],
];

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** BOM-prefixed CSV so spreadsheet apps pick up UTF-8. */
export function toCsv(articles: EnrichedArticle[]): string {
  const lines = [
    CSV_COLUMNS.map(([header]) => header).join(','),
    ...articles.map((article) =>
      CSV_COLUMNS.map(([, pick]) => csvField(pick(article))).join(','),
    ),
  ];
  return `${BOM}${lines.join('\n')}\n`;
}

export function toText(articles: EnrichedArticle[]): string {
  const blocks = articles.map(
    (a) =>
      [
        '',
        `📰 제목: ${a.title}`,
        `🔗 링크: ${a.link}`,
        `📅 날짜: ${a.published}`,
        `🧾 요약: ${a.summary}`,
        `💭 한줄평: ${a.opinion}`,
        `😶 감성: ${a.sentiment} | 🧐 톤: ${a.tone}`,
        `🏷️ 키워드: ${a.extractedKeywords}`,
        `🏷️ 태그: ${a.tags}`,
        '',
        RULE,
        '',
        '',
      ].join('\n'),
  );
  return `=== 북마크된 뉴스 요약 ===\n\n${blocks.join('')}`;
}

const pad = (n: number) => String(n).padStart(2, '0');

export function exportFileName(extension: string, at: Date = new Date()): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `bookmarked_news_${date}_${time}.${extension}`;
}
