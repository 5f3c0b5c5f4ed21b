import { Sentiment, Tone } from './news.types';

export const INSUFFICIENT_CONTENT = '요약 불가 (본문 부족)';
export const NO_KEYWORDS = '키워드 없음';
export const DEFAULT_TAG = '#일반';

const MIN_SUMMARY_INPUT = 30;
const MIN_SENTENCE_LENGTH = 15;
const MAX_FALLBACK_LENGTH = 300;

const STOPWORDS = new Set([
  '있다', '하다', '수', '등', '및', '에서', '으로', '이번', '관한',
  '하여', '대한', '관련', '한', '더', '있으며', '따라', '등의',
]);

const POSITIVE_WORDS = ['좋다', '훌륭', '성공', '발전', '혁신', '개선', '증가', '상승', '긍정'];
const NEGATIVE_WORDS = ['나쁘다', '문제', '실패', '우려', '논란', '감소', '하락', '부정', '위험'];

const ANALYTICAL_MARKERS = ['분석', '연구', '조사', '데이터', '통계'];
const EMOTIONAL_MARKERS = ['놀라', '충격', '감동', '기쁘', '슬프'];

const TAG_RULES: ReadonlyArray<{ tag: string; triggers: string[] }> = [
  { tag: '#기술동향', triggers: ['기술', 'AI'] },
  { tag: '#시장분석', triggers: ['시장', '수요'] },
  { tag: '#이슈', triggers: ['논란', '문제'] },
];

const SENTIMENT_PHRASES: Record<Sentiment, string> = {
  긍정: '🟢 긍정적인 관점',
  부정: '🔴 비판적인 관점',
  중립: '🟡 중립적인 관점',
};

const TONE_PHRASES: Record<Tone, string> = {
  정보성: 'ℹ️ 정보 전달',
  감정적: '💬 감정 표현',
  분석적: '🧐 분석적 접근',
};

// Lengths in code points, so an emoji counts once and is never split.
const charLength = (text: string) => [...text].length;

const containsAny = (text: string, words: readonly string[]) =>
  words.some((word) => text.includes(word));

const countMatches = (text: string, words: readonly string[]) =>
  words.filter((word) => text.includes(word)).length;

/**
 * Extractive summary: the first sentence plus the middle one.
 * Short bodies come back whole, capped at 300 characters.
 */
export function summarize(text: string, sentenceCount = 2): string {
  if (!text || charLength(text.trim()) < MIN_SUMMARY_INPUT) {
    return INSUFFICIENT_CONTENT;
  }

  const sentences = text
    .replace(/!/g, '.')
    .split('. ')
    .map((s) => s.trim())
    .filter((s) => charLength(s) > MIN_SENTENCE_LENGTH);

  if (sentences.length <= sentenceCount) {
    const chars = [...text];
    return chars.length > MAX_FALLBACK_LENGTH
      ? `${chars.slice(0, MAX_FALLBACK_LENGTH).join('')}...`
      : text;
  }

  const selected = [sentences[0]];
  if (sentences.length > 2) {
    selected.push(sentences[Math.floor(sentences.length / 2)]);
  }
  return selected.join('. ');
}

/** Most frequent Hangul terms, ties in order of first appearance. */
export function extractKeywords(text: string, topN = 5): string {
  const counts = new Map<string, number>();
  for (const word of text.match(/[가-힣]{2,}/g) ?? []) {
    if (STOPWORDS.has(word)) continue;
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }
  if (counts.size === 0) return NO_KEYWORDS;

  // Array.prototype.sort is stable, so equal counts keep insertion order.
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, topN)
    .map(([word]) => word)
    .join(', ');
}

/**
 * Substring containment, not token matching: "혁신적" counts for "혁신".
 * Each list word counts once however often it appears.
 */
export function classifySentiment(text: string): Sentiment {
  const positive = countMatches(text, POSITIVE_WORDS);
  const negative = countMatches(text, NEGATIVE_WORDS);

  if (positive > negative) return '긍정';
  if (negative > positive) return '부정';
  return '중립';
}

export function classifyTone(text: string): Tone {
  if (containsAny(text, ANALYTICAL_MARKERS)) return '분석적';
  if (containsAny(text, EMOTIONAL_MARKERS)) return '감정적';
  return '정보성';
}

export function generateTags(text: string): string {
  const tags = TAG_RULES.filter((rule) => containsAny(text, rule.triggers)).map(
    (rule) => rule.tag,
  );
  return tags.length > 0 ? tags.join(' ') : DEFAULT_TAG;
}

export function generateOpinion(sentiment: Sentiment, tone: Tone): string {
  return `${SENTIMENT_PHRASES[sentiment]} + ${TONE_PHRASES[tone]}의 뉴스입니다.`;
}
