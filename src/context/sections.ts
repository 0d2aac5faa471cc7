import { ValidationError } from "../utils/errors.js";
import type { ContextSection, SectionValue } from "./types.js";

/** Joins TextList items into one serialized string */
export const LIST_SEPARATOR = "\n";

export function scalarText(text: string): SectionValue {
  return { kind: "scalar", text };
}

export function textList(items: readonly string[]): SectionValue {
  return { kind: "list", items: [...items] };
}

function checkPriority(priority: number, label: string): void {
  if (!Number.isSafeInteger(priority)) {
    throw new ValidationError(`priority of section "${label}" must be an integer`, "priority");
  }
}

/**
 * Build a section, tagging `value` as scalar or list at construction
 */
export function createSection(label: string, value: string | readonly string[], priority: number): ContextSection {
  checkPriority(priority, label);
  return {
    label,
    value: typeof value === "string" ? scalarText(value) : textList(value),
    priority,
  };
}

export function serializeSection(section: ContextSection): string {
  switch (section.value.kind) {
    case "scalar":
      return section.value.text;
    case "list":
      return section.value.items.join(LIST_SEPARATOR);
  }
}

/**
 * Stable ascending-priority order: equal priorities keep input order.
 * Throws ValidationError on duplicate labels or non-integer priorities.
 */
export function orderSections(sections: readonly ContextSection[]): ContextSection[] {
  const seen = new Set<string>();
  for (const section of sections) {
    checkPriority(section.priority, section.label);
    if (seen.has(section.label)) {
      throw new ValidationError(`duplicate section label "${section.label}"`, "label");
    }
    seen.add(section.label);
  }

  return sections
    .map((section, index) => ({ section, index }))
    .sort((a, b) => a.section.priority - b.section.priority || a.index - b.index)
    .map(({ section }) => section);
}
