/**
 * Token Budget Allocator
 *
 * Single pass, priority ordered, strict cutoff:
 *  1. measure every serialized section with the tokenizer
 *  2. if the total fits, return everything untouched
 *  3. otherwise keep whole sections while they fit, cut the first one that
 *     does not to the remaining budget (tail removed, decoded by the
 *     tokenizer, backed off to a clean prefix) and drop every section after it
 *
 * Whole sections are returned byte-identical; only the cut section goes
 * through a decode. Postcondition: totalTokens <= maxTokens.
 */

import { ValidationError } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { orderSections, serializeSection } from "./sections.js";
import { decodeTokens, encodeText, gptTokenizer } from "./tokenizer.js";
import type { BundleSection, ContextBundle, ContextSection, Tokenizer } from "./types.js";

interface MeasuredSection {
  label: string;
  content: string;
  tokens: readonly number[];
}

/**
 * Longest token-boundary head of a section that decodes to a true prefix of
 * its content and re-encodes within `budget`. A cut inside a multi-byte
 * character decodes to a replacement character, so those heads are skipped.
 * Null when no non-empty head qualifies.
 */
function cutToBudget(
  section: MeasuredSection,
  budget: number,
  tokenizer: Tokenizer,
): { content: string; tokens: number } | null {
  for (let keep = Math.min(budget, section.tokens.length); keep > 0; keep--) {
    const content = decodeTokens(tokenizer, section.tokens.slice(0, keep));
    if (content.length === 0 || !section.content.startsWith(content)) continue;

    const tokens = encodeText(tokenizer, content).length;
    if (tokens <= budget) {
      return { content, tokens };
    }
  }
  return null;
}

export function validateMaxTokens(maxTokens: number): void {
  if (!Number.isSafeInteger(maxTokens) || maxTokens <= 0) {
    throw new ValidationError("max_tokens must be a positive integer", "max_tokens");
  }
}

function sumTokens(sections: readonly BundleSection[]): number {
  return sections.reduce((sum, section) => sum + section.tokens, 0);
}

export function assembleContext(
  sections: readonly ContextSection[],
  maxTokens: number,
  tokenizer: Tokenizer = gptTokenizer,
): ContextBundle {
  validateMaxTokens(maxTokens);
  const ordered = orderSections(sections);

  const measured: MeasuredSection[] = ordered.map((section) => {
    const content = serializeSection(section);
    return { label: section.label, content, tokens: encodeText(tokenizer, content) };
  });
  const total = measured.reduce((sum, section) => sum + section.tokens.length, 0);

  if (total <= maxTokens) {
    const whole = measured.map(({ label, content, tokens }) => ({ label, content, tokens: tokens.length }));
    emit(TelemetryEvents.ContextAssembled, {
      section_count: whole.length,
      total_tokens: total,
      max_tokens: maxTokens,
      truncated: false,
    });
    return { maxTokens, totalTokens: total, sections: whole, truncated: null, dropped: [] };
  }

  const kept: BundleSection[] = [];
  const dropped: string[] = [];
  let truncated: string | null = null;
  let remaining = maxTokens;
  let stopped = false;

  for (const section of measured) {
    if (stopped) {
      dropped.push(section.label);
      continue;
    }

    if (section.tokens.length <= remaining) {
      kept.push({ label: section.label, content: section.content, tokens: section.tokens.length });
      remaining -= section.tokens.length;
      continue;
    }

    stopped = true;
    const cut = cutToBudget(section, remaining, tokenizer);
    if (cut === null) {
      dropped.push(section.label);
      continue;
    }

    kept.push({ label: section.label, content: cut.content, tokens: cut.tokens });
    truncated = section.label;
    remaining -= cut.tokens;
  }

  const totalTokens = sumTokens(kept);

  emit(TelemetryEvents.ContextTruncated, {
    measured_tokens: total,
    max_tokens: maxTokens,
    truncated_section: truncated,
    dropped_sections: dropped,
  });
  emit(TelemetryEvents.ContextAssembled, {
    section_count: kept.length,
    total_tokens: totalTokens,
    max_tokens: maxTokens,
    truncated: true,
  });

  return { maxTokens, totalTokens, sections: kept, truncated, dropped };
}
