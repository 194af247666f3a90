/**
 * Topic vocabulary and stopword lists shared by extraction, SQL synthesis
 * and local summaries. The word lists live in ./data.
 */

import topicVocabulary from './data/topic-vocabulary.json';
import stopwords from './data/stopwords.json';

export interface TopicEntry {
  /** Canonical topic string emitted by the extractor */
  topic: string;
  /** Spellings and misspellings rewritten to `topic` */
  aliases: string[];
  /** Abbreviations and related words that signal `topic` in free text only */
  keywords: string[];
}

export interface SynonymSet {
  /** Topic matches when it contains one of these phrases */
  contains: string[];
  /** Topic matches when it equals one of these */
  equals: string[];
  /** Title substrings OR-ed together in SQL */
  terms: string[];
}

const TOPICS: readonly TopicEntry[] = topicVocabulary.topics;
const SYNONYM_SETS: readonly SynonymSet[] = topicVocabulary.synonymSets;

const ALIAS_TO_TOPIC = new Map<string, string>(
  TOPICS.flatMap((entry) => entry.aliases.map((alias) => [alias, entry.topic] as const))
);

export const QUERY_STOPWORDS: ReadonlySet<string> = new Set(stopwords.queryWords);
export const ENGLISH_STOPWORDS: ReadonlySet<string> = new Set(stopwords.englishWords);

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** True when `phrase` occurs in `text` on word boundaries */
export function containsPhrase(text: string, phrase: string): boolean {
  return new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(phrase)}(?=$|[^a-z0-9])`).test(text);
}

/** Lower-case, collapse whitespace and rewrite known misspellings */
export function canonicalizeTopic(topic: string): string {
  const normalized = topic.toLowerCase().replace(/\s+/g, ' ').trim();
  return ALIAS_TO_TOPIC.get(normalized) ?? normalized;
}

/** First dictionary topic whose spelling, alias or keyword appears in `lowerText` */
export function findDictionaryTopic(lowerText: string): string | null {
  for (const entry of TOPICS) {
    const spellings = [entry.topic, ...entry.aliases, ...entry.keywords];
    if (spellings.some((spelling) => containsPhrase(lowerText, spelling))) {
      return entry.topic;
    }
  }
  return null;
}

export function findSynonymSet(canonicalTopic: string): SynonymSet | null {
  return (
    SYNONYM_SETS.find(
      (set) =>
        set.equals.includes(canonicalTopic) ||
        set.contains.some((phrase) => canonicalTopic.includes(phrase))
    ) ?? null
  );
}
