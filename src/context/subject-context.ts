/**
 * Subject Context Collector
 *
 * Turns a list of subjects into context sections: one "interactions" section
 * per subject listing what each source returned, and one "articles" section
 * per subject when the article provider found papers. Interaction sections
 * always outrank article sections, and earlier subjects outrank later ones.
 */

import type { ArticleProvider, ArxivPaper } from "../adapters/arxiv/types.js";
import type { SourceAdapter, SourceResult } from "../adapters/sources/types.js";
import { collectNeighbors } from "../interactions/aggregate.js";
import { parseSubjectList } from "../interactions/subject.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { logger } from "../utils/simple-logger.js";
import { createSection } from "./sections.js";
import type { ContextSection } from "./types.js";

export const INTERACTIONS_PRIORITY_BASE = 10;
export const ARTICLES_PRIORITY_BASE = 100;

export interface SubjectContextOptions {
  adapters: readonly SourceAdapter[];
  articles?: ArticleProvider | null;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface SubjectContext {
  subjects: string[];
  sections: ContextSection[];
  sources: Record<string, readonly SourceResult[]>;
}

export function interactionsLabel(subject: string): string {
  return `${subject} — interactions`;
}

export function articlesLabel(subject: string): string {
  return `${subject} — articles`;
}

/**
 * One line per source, in adapter order
 */
export function describeSources(results: readonly SourceResult[]): string[] {
  return results.map((result) => {
    if (!result.ok) {
      return `${result.source}: unavailable (${result.reason})`;
    }
    const names = [...result.neighbors].sort();
    return `${result.source}: ${names.length > 0 ? names.join(", ") : "none"}`;
  });
}

export function describePapers(papers: readonly ArxivPaper[]): string[] {
  return papers.map((paper) => `${paper.title}: ${paper.summary}`);
}

async function searchArticles(
  provider: ArticleProvider | null | undefined,
  subject: string,
  signal: AbortSignal | undefined,
): Promise<ArxivPaper[]> {
  if (!provider) {
    return [];
  }
  try {
    const result = await provider.searchPapers(subject, { signal });
    return result.ok ? result.papers : [];
  } catch (error) {
    logger.warn({
      event: "context.articles.failed",
      provider: provider.name,
      subject,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
}

/**
 * Collect sections for every subject concurrently.
 * Throws ValidationError when the list names no valid subject.
 */
export async function collectSubjectContext(
  rawSubjects: string | readonly string[],
  options: SubjectContextOptions,
): Promise<SubjectContext> {
  const subjects = parseSubjectList(rawSubjects);
  const aggregateOptions = { timeoutMs: options.timeoutMs, signal: options.signal };

  const collected = await Promise.all(
    subjects.map(async (subject) => {
      const [aggregation, papers] = await Promise.all([
        collectNeighbors(subject, options.adapters, aggregateOptions),
        searchArticles(options.articles, subject, options.signal),
      ]);
      return { subject, aggregation, papers };
    }),
  );

  options.signal?.throwIfAborted();

  const sections: ContextSection[] = [];
  const sources: Record<string, readonly SourceResult[]> = {};
  let articleSections = 0;

  collected.forEach(({ subject, aggregation, papers }, index) => {
    sources[subject] = aggregation.sources;
    sections.push(
      createSection(
        interactionsLabel(subject),
        describeSources(aggregation.sources),
        INTERACTIONS_PRIORITY_BASE + index,
      ),
    );
    if (papers.length > 0) {
      articleSections += 1;
      sections.push(createSection(articlesLabel(subject), describePapers(papers), ARTICLES_PRIORITY_BASE + index));
    }
  });

  emit(TelemetryEvents.SubjectContextCollected, {
    subject_count: subjects.length,
    section_count: sections.length,
    article_sections: articleSections,
  });

  return { subjects, sections, sources };
}
