/**
 * Predicate Extractor
 *
 * Turns a free-text research query into QueryPredicates using ordered,
 * deterministic pattern rules. No sub-extraction can fail: each one falls
 * back to its default independently, so any string yields a predicate set.
 *
 * RULE PRECEDENCE:
 * - Topic rules run from most to least specific and stop at the first
 *   non-trivial capture (length > 2, not purely numeric)
 * - Relative year phrases are resolved before absolute 4-digit years
 * - Specific paper titles are only looked for when citation intent is present
 */

import type { QueryPredicates } from '@research-finder/shared';
import { QUERY_STOPWORDS, canonicalizeTopic, findDictionaryTopic } from './vocabulary';

export const DEFAULT_RESULT_COUNT = 5;
export const MIN_RESULT_COUNT = 1;
export const MAX_RESULT_COUNT = 100;
export const MIN_PLAUSIBLE_YEAR = 1900;
export const MAX_PLAUSIBLE_YEAR = 2030;
const MIN_TITLE_LENGTH = 6;

// ============ Topic ============

/** Tokens stripped from either end of a captured topic phrase */
const TOPIC_FILLER = new Set([
  ...QUERY_STOPWORDS,
  'a', 'an', 'me', 'all', 'any', 'new', 'good', 'important', 'key', 'major', 'for', 'on', 'in', 'of',
]);

const TOPIC_STOP_LOOKAHEAD =
  '(?=\\s+(?:published|from|since|after|before|in|and|with|between|during|that|which)\\b|\\s*[,.;:?!]|\\s*$)';

interface TopicRule {
  name: string;
  pattern: RegExp;
}

const TOPIC_RULES: TopicRule[] = [
  // "most cited X papers", "top cited X papers", "highly cited X papers"
  {
    name: 'cited-phrase',
    pattern: /\b(?:most|top|highly|highest)\s+cited\s+([\w\s-]+?)\s+(?:papers|articles|research|studies|publications)\b/,
  },
  // "influential X papers"
  {
    name: 'influential-phrase',
    pattern: /\binfluential\s+([\w\s-]+?)\s+(?:papers|articles|research|studies)\b/,
  },
  // "best X papers"
  {
    name: 'best-phrase',
    pattern: /\bbest\s+([\w\s-]+?)\s+(?:papers|articles)\b/,
  },
  // "papers about X", "research on X"
  {
    name: 'prepositional',
    pattern: new RegExp(
      `\\b(?:papers?|research|articles?|studies|publications|work)\\s+(?:about|on|regarding|concerning)\\s+([\\w\\s'-]+?)${TOPIC_STOP_LOOKAHEAD}`
    ),
  },
  // "about X"
  {
    name: 'about',
    pattern: new RegExp(`\\babout\\s+([\\w\\s'-]+?)${TOPIC_STOP_LOOKAHEAD}`),
  },
  // "X papers published/from/since ..."
  {
    name: 'subject-before-noun',
    pattern: /([\w\s-]+?)\s+(?:papers|research|articles|studies)\s+(?:published|from|since|after|in)\b/,
  },
];

function isFillerToken(token: string): boolean {
  return TOPIC_FILLER.has(token) || /^\d+$/.test(token);
}

/**
 * Strip filler words and numbers from both ends of a captured phrase,
 * then rewrite known misspellings to their canonical topic.
 */
export function cleanTopicPhrase(phrase: string): string {
  const tokens = phrase.replace(/['"]/g, ' ').trim().split(/\s+/).filter(Boolean);
  let start = 0;
  let end = tokens.length;
  while (start < end && isFillerToken(tokens[start])) start++;
  while (end > start && isFillerToken(tokens[end - 1])) end--;
  return canonicalizeTopic(tokens.slice(start, end).join(' '));
}

function isMeaningfulTopic(topic: string): boolean {
  return topic.length > 2 && !/^\d+$/.test(topic);
}

export function extractTopic(query: string): string | null {
  const lower = query.toLowerCase();

  for (const rule of TOPIC_RULES) {
    const match = lower.match(rule.pattern);
    if (!match || !match[1]) continue;
    const topic = cleanTopicPhrase(match[1]);
    if (isMeaningfulTopic(topic)) {
      return topic;
    }
  }

  return findDictionaryTopic(lower);
}

// ============ Year ============

const NUMBER_WORDS: Record<string, number> = {
  one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7, eight: 8, nine: 9, ten: 10,
};

const RELATIVE_YEAR_RULES: Array<{
  pattern: RegExp;
  resolve: (match: RegExpMatchArray, currentYear: number) => number;
}> = [
  // "last 5 years", "past three years"
  {
    pattern: /\b(?:last|past|previous)\s+(\d{1,3}|one|two|three|four|five|six|seven|eight|nine|ten)\s+years?\b/,
    resolve: (m, currentYear) => currentYear - (NUMBER_WORDS[m[1]] ?? parseInt(m[1], 10)),
  },
  // "recent years"
  {
    pattern: /\brecent\s+years\b/,
    resolve: (_m, currentYear) => currentYear - 5,
  },
  // "last year", "past year"
  {
    pattern: /\b(?:last|past|previous)\s+year\b/,
    resolve: (_m, currentYear) => currentYear - 1,
  },
  // "this year"
  {
    pattern: /\bthis\s+year\b/,
    resolve: (_m, currentYear) => currentYear,
  },
];

const ABSOLUTE_YEAR_PATTERNS: RegExp[] = [
  /(?:after|since|from)\s+(\d{4})\b/g,
  /published\s+in\s+(\d{4})\b/g,
  /(?:in|from)\s+(\d{4})\s+to\s+\d{4}\b/g,
  /\b(\d{4})\b/g,
  /\b(\d{4})s\b/g,
];

export function isPlausibleYear(year: number): boolean {
  return Number.isInteger(year) && year >= MIN_PLAUSIBLE_YEAR && year <= MAX_PLAUSIBLE_YEAR;
}

export function extractYear(query: string, referenceDate: Date = new Date()): number | null {
  const lower = query.toLowerCase();
  const currentYear = referenceDate.getFullYear();

  for (const { pattern, resolve } of RELATIVE_YEAR_RULES) {
    const match = lower.match(pattern);
    if (!match) continue;
    const year = resolve(match, currentYear);
    if (isPlausibleYear(year)) {
      return year;
    }
    break;
  }

  for (const pattern of ABSOLUTE_YEAR_PATTERNS) {
    for (const match of lower.matchAll(pattern)) {
      const year = parseInt(match[1], 10);
      if (isPlausibleYear(year)) {
        return year;
      }
    }
  }

  return null;
}

// ============ Citation intent ============

const CITATION_PATTERNS: RegExp[] = [
  /\bmost cited\b/,
  /\btop cited\b/,
  /\bhighly cited\b/,
  /\bhighest cited\b/,
  /\bcitations?\b/,
  /\bcited papers\b/,
  /\binfluential\b/,
  /\bimpact\b/,
  /\bwith more than\b/,
  /\bat least\b/,
  /\bh-?index\b/,
  /\bcitation count\b/,
];

export function detectCitationPriority(query: string): boolean {
  const lower = query.toLowerCase();
  return CITATION_PATTERNS.some((pattern) => pattern.test(lower));
}

// ============ Specific paper ============

const QUOTE = `['"‘’“”]`;
const QUOTED_TITLE = `${QUOTE}([^'"‘’“”]+)${QUOTE}`;
const PAPER_NOUN = '(?:the\\s+)?(?:paper|article)?\\s*';

const SPECIFIC_PAPER_PATTERNS: RegExp[] = [
  new RegExp(`how many citations (?:does|for) ${PAPER_NOUN}${QUOTED_TITLE}`),
  new RegExp(`citation count (?:of|for) ${PAPER_NOUN}${QUOTED_TITLE}`),
  new RegExp(`citations (?:of|for) ${PAPER_NOUN}${QUOTED_TITLE}`),
  new RegExp(`(?:paper|article) titled?\\s*${QUOTED_TITLE}\\s*(?:citations?|cited)`),
  new RegExp(`${QUOTED_TITLE}\\s*(?:paper|article)?\\s*(?:citations?|citation count)`),
];

/**
 * Quoted title after a citation-lookup phrase, lower-cased.
 * Titles of 5 characters or fewer are treated as absent.
 */
export function extractSpecificPaperTitle(query: string): string | null {
  const lower = query.toLowerCase();

  for (const pattern of SPECIFIC_PAPER_PATTERNS) {
    const match = lower.match(pattern);
    if (!match) continue;
    const title = match[1].replace(/\s+/g, ' ').trim();
    if (title.length >= MIN_TITLE_LENGTH) {
      return title;
    }
  }

  return null;
}

// ============ Result count ============

const RESULT_COUNT_PATTERNS: RegExp[] = [
  /\b(?:find|get|retrieve|show|give me|list)\s+(?:me\s+)?(\d+)\s+(?:[\w-]+\s+){0,4}?(?:papers|articles|results)\b/,
  /\btop\s+(\d+)\b/,
  /\bfirst\s+(\d+)\s+(?:papers|articles|results)\b/,
  /\b(\d+)\s+(?:papers|articles|results|studies)\s+(?:about|on|for|in|regarding)\b/,
  /\b(\d+)\s+(?:most\s+)?(?:relevant|recent|cited|influential)\s+(?:papers|articles)\b/,
  /\bexactly\s+(\d+)\s+(?:papers?|articles?)\b/,
];

export function clampResultCount(count: number): number {
  if (!Number.isFinite(count)) return DEFAULT_RESULT_COUNT;
  return Math.min(Math.max(Math.trunc(count), MIN_RESULT_COUNT), MAX_RESULT_COUNT);
}

export function extractResultCount(query: string): number {
  const lower = query.toLowerCase();

  for (const pattern of RESULT_COUNT_PATTERNS) {
    const match = lower.match(pattern);
    if (match) {
      return clampResultCount(parseInt(match[1], 10));
    }
  }

  return DEFAULT_RESULT_COUNT;
}

// ============ Summary intent ============

const SUMMARY_PATTERNS: RegExp[] = [
  /\bsummari[sz]\w*/,
  /\bsummary\b/,
  /\banaly[sz]\w*/,
  /\bexplain\b/,
  /\bcompare\b/,
  /\bcontrast\b/,
  /\breview\b/,
  /\binsights?\b/,
  /\btrends?\b/,
  /\bmain (?:findings|points|ideas)\b/,
  /\bkey findings\b/,
  /\bhighlight\b/,
  /\bwith (?:summaries|abstracts|analysis)\b/,
  /\bincluding summaries\b/,
  /\boverview\b/,
];

export function detectSummaryRequest(query: string): boolean {
  const lower = query.toLowerCase();
  return SUMMARY_PATTERNS.some((pattern) => pattern.test(lower));
}

// ============ Entry point ============

export function extractPredicates(query: string, referenceDate: Date = new Date()): QueryPredicates {
  const citationPriority = detectCitationPriority(query);
  const specificPaperTitle = citationPriority ? extractSpecificPaperTitle(query) : null;

  return Object.freeze({
    topic: extractTopic(query),
    year: extractYear(query, referenceDate),
    citationPriority,
    specificPaperLookup: specificPaperTitle !== null,
    specificPaperTitle,
    resultCount: extractResultCount(query),
    wantSummary: detectSummaryRequest(query),
  });
}

/** One-line trace of a predicate set for logs and CLI output */
export function describePredicates(predicates: QueryPredicates): string {
  const parts = [
    `topic=${predicates.topic === null ? 'none' : JSON.stringify(predicates.topic)}`,
    `year=${predicates.year ?? 'none'}`,
    `citationPriority=${predicates.citationPriority}`,
    `specificPaperTitle=${predicates.specificPaperTitle === null ? 'none' : JSON.stringify(predicates.specificPaperTitle)}`,
    `resultCount=${predicates.resultCount}`,
    `wantSummary=${predicates.wantSummary}`,
  ];
  return parts.join(', ');
}
