/**
 * Summarizers for a ResultSet.
 * LocalSummarizer works offline from titles, dates, venues and citations.
 * LLMSummarizer asks an OpenAI-compatible model and falls back to the local
 * summary when the call fails or returns next to nothing.
 */

import type { ResultSet } from '@research-finder/shared';
import type { LLMMessage, LLMResponse } from '../llm';
import { silentLogger, type Logger } from '../logger';
import { ENGLISH_STOPWORDS } from './vocabulary';

export interface Summarizer {
  summarize(resultSet: ResultSet, instruction: string): Promise<string>;
}

export const EMPTY_RESULT_SUMMARY = 'No papers found to analyze.';

const MAX_THEMES = 5;
const MAX_VENUES = 3;
const RECENT_WINDOW_YEARS = 5;
const MIN_LLM_SUMMARY_LENGTH = 20;
const MAX_TITLES_FOR_LLM = 10;

const INSIGHT_RULES: Array<{ words: string[]; insight: string }> = [
  {
    words: ['neural', 'network', 'deep', 'learning'],
    insight: 'Strong focus on neural networks and deep learning methodologies',
  },
  {
    words: ['machine', 'algorithm', 'classification'],
    insight: 'Emphasis on machine learning algorithms and classification techniques',
  },
  {
    words: ['medical', 'clinical', 'patient', 'diagnosis'],
    insight: 'Significant medical and clinical applications',
  },
  {
    words: ['optimization', 'performance', 'efficiency'],
    insight: 'Focus on optimization and performance improvement',
  },
];

/** Title keywords ranked by frequency, ties by first appearance */
export function titleThemes(titles: readonly string[], limit = 10): Array<{ word: string; count: number }> {
  const counts = new Map<string, number>();
  for (const title of titles) {
    const words = title.toLowerCase().match(/\b[a-z][a-z0-9]*\b/g) ?? [];
    for (const word of words) {
      if (word.length <= 3 || ENGLISH_STOPWORDS.has(word)) continue;
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

function headline(instruction: string, total: number): string {
  const lower = instruction.toLowerCase();
  if (lower.includes('summarize') || lower.includes('summary')) {
    return `Research Summary: ${total} Papers Analyzed`;
  }
  if (lower.includes('analyze') || lower.includes('analysis')) {
    return `Research Analysis: ${total} Papers`;
  }
  return `Research Overview: ${total} Papers`;
}

export interface LocalSummarizerOptions {
  now?: () => Date;
}

export class LocalSummarizer implements Summarizer {
  private readonly now: () => Date;

  constructor(options: LocalSummarizerOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async summarize(resultSet: ResultSet, instruction: string): Promise<string> {
    return this.render(resultSet, instruction);
  }

  /** Synchronous form used as the LLM fallback */
  render(resultSet: ResultSet, instruction: string): string {
    const { papers, statistics } = resultSet;
    if (papers.length === 0) {
      return EMPTY_RESULT_SUMMARY;
    }

    const sections: string[] = [headline(instruction, papers.length)];

    const themes = titleThemes(papers.map((paper) => paper.title));
    if (themes.length > 0) {
      const list = themes.slice(0, MAX_THEMES).map(({ word, count }) => `${word} (${count})`);
      sections.push(`Key Research Themes: ${list.join(', ')}`);
    }

    const years = statistics.yearHistogram.map((bucket) => parseInt(bucket.key, 10)).sort((a, b) => a - b);
    const recentSince = this.now().getFullYear() - RECENT_WINDOW_YEARS;
    const recentCount = statistics.yearHistogram
      .filter((bucket) => parseInt(bucket.key, 10) >= recentSince)
      .reduce((sum, bucket) => sum + bucket.count, 0);
    if (years.length > 0) {
      const first = years[0];
      const last = years[years.length - 1];
      const range = first === last ? String(first) : `${first}-${last}`;
      sections.push(`Publication Timeline: ${range} (${recentCount} papers from ${recentSince} onwards)`);
    }

    if (statistics.venueHistogram.length > 0) {
      const venues = statistics.venueHistogram.slice(0, MAX_VENUES).map((bucket) => bucket.key);
      sections.push(`Primary Venues: ${venues.join(', ')}`);
    }

    if (statistics.totalCitations > 0) {
      sections.push(
        `Research Impact: ${statistics.totalCitations.toLocaleString('en-US')} total citations, ` +
          `averaging ${statistics.avgCitations.toFixed(1)} per resolved paper`
      );
    }

    const themeWords = new Set(themes.map((theme) => theme.word));
    const insights = INSIGHT_RULES.filter((rule) => rule.words.some((word) => themeWords.has(word))).map(
      (rule) => rule.insight
    );
    if (insights.length > 0) {
      sections.push(`Research Insights: ${insights.join('; ')}`);
    }

    if (recentCount > papers.length / 2) {
      sections.push(
        `Conclusion: This represents active, contemporary research with ${recentCount} recent publications.`
      );
    } else {
      const span = years.length > 0 ? years[years.length - 1] - years[0] : 0;
      sections.push(`Conclusion: This research spans ${span} years, showing the evolution of the field.`);
    }

    return sections.join('\n\n');
  }
}

/** The part of LLMClient the summarizer needs */
export interface ChatClient {
  chat(messages: LLMMessage[], options?: { maxTokens?: number; temperature?: number }): Promise<LLMResponse>;
}

export class LLMSummarizer implements Summarizer {
  private readonly logger: Logger;

  constructor(
    private readonly client: ChatClient,
    private readonly fallback: LocalSummarizer = new LocalSummarizer(),
    logger: Logger = silentLogger
  ) {
    this.logger = logger;
  }

  async summarize(resultSet: ResultSet, instruction: string): Promise<string> {
    if (resultSet.papers.length === 0) {
      return EMPTY_RESULT_SUMMARY;
    }

    const titles = resultSet.papers
      .slice(0, MAX_TITLES_FOR_LLM)
      .map((paper, index) => `${index + 1}. ${paper.title} (${paper.pubDate ?? 'n.d.'}, ${paper.citationCount} citations)`);

    const messages: LLMMessage[] = [
      {
        role: 'system',
        content:
          'You summarize sets of research papers. Answer in plain prose, under 200 words, and mention only papers from the list.',
      },
      {
        role: 'user',
        content: `Request: ${instruction}\n\nPapers:\n${titles.join('\n')}`,
      },
    ];

    try {
      const response = await this.client.chat(messages);
      const content = response.content?.trim() ?? '';
      if (content.length >= MIN_LLM_SUMMARY_LENGTH) {
        return content;
      }
      this.logger.warn('LLM summary too short; using local summary');
    } catch (error) {
      this.logger.warn(`LLM summary failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    return this.fallback.render(resultSet, instruction);
  }
}
