import { z } from "zod";
import type { ContextBundle } from "../context/types.js";

// Range checks (positive budget, integer priority) live in the allocator so
// direct callers get the same ValidationError as HTTP callers.
const MaxTokens = z.number().optional();

export const SectionInput = z
  .object({
    label: z.string().min(1).max(200),
    value: z.union([z.string(), z.array(z.string())]),
    priority: z.number(),
  })
  .strict();

export const ContextInput = z
  .object({
    sections: z.array(SectionInput).max(100),
    max_tokens: MaxTokens,
  })
  .strict();

export const SubjectContextInput = z
  .object({
    subjects: z.union([z.string(), z.array(z.string()).max(20)]),
    max_tokens: MaxTokens,
  })
  .strict();

export interface ContextBundleV1 {
  schema: "context-bundle.v1";
  max_tokens: number;
  total_tokens: number;
  truncated: string | null;
  dropped: string[];
  sections: Array<{ label: string; content: string; tokens: number }>;
}

export function toContextBundleV1(bundle: ContextBundle): ContextBundleV1 {
  return {
    schema: "context-bundle.v1",
    max_tokens: bundle.maxTokens,
    total_tokens: bundle.totalTokens,
    truncated: bundle.truncated,
    dropped: [...bundle.dropped],
    sections: bundle.sections.map((section) => ({
      label: section.label,
      content: section.content,
      tokens: section.tokens,
    })),
  };
}
