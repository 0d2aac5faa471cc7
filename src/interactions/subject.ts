/**
 * Subject normalization
 *
 * A subject is a drug or disease name. Two subjects are the same subject
 * iff their normalized forms are equal (case is preserved).
 */

import { ValidationError } from "../utils/errors.js";

/** Longest accepted subject, after normalization */
export const MAX_SUBJECT_LENGTH = 200;

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * Trim and collapse internal whitespace runs to a single space.
 */
export function normalizeName(raw: string): string {
  return raw.trim().replace(/\s+/g, " ");
}

/**
 * Validate and normalize a subject. Throws ValidationError for empty or
 * malformed names so callers can reject input before any source is queried.
 */
export function parseSubject(raw: unknown, field = "subject"): string {
  if (typeof raw !== "string") {
    throw new ValidationError(`${field} must be a string`, field);
  }
  // Tabs and newlines count as whitespace; any other control character is rejected
  if (CONTROL_CHARS.test(raw.replace(/[\t\n\r]/g, " "))) {
    throw new ValidationError(`${field} contains control characters`, field);
  }
  const subject = normalizeName(raw);
  if (subject.length === 0) {
    throw new ValidationError(`${field} must not be empty`, field);
  }
  if (subject.length > MAX_SUBJECT_LENGTH) {
    throw new ValidationError(`${field} must be at most ${MAX_SUBJECT_LENGTH} characters`, field);
  }
  return subject;
}

export function subjectsEqual(a: string, b: string): boolean {
  return normalizeName(a) === normalizeName(b);
}

/**
 * Split a comma-separated subject list ("warfarin, aspirin,,Warfarin"),
 * normalizing each entry, dropping empties and keeping first occurrences.
 */
export function parseSubjectList(raw: string | readonly string[], field = "subjects"): string[] {
  const parts = typeof raw === "string" ? raw.split(",") : raw.flatMap((entry) => entry.split(","));
  const seen = new Set<string>();
  const subjects: string[] = [];

  for (const part of parts) {
    if (normalizeName(part).length === 0) continue;
    const subject = parseSubject(part, field);
    if (!seen.has(subject)) {
      seen.add(subject);
      subjects.push(subject);
    }
  }

  if (subjects.length === 0) {
    throw new ValidationError(`${field} must name at least one subject`, field);
  }
  return subjects;
}

/**
 * Resource-style name used by sources that key pages by title
 * ("acetylsalicylic acid" -> "Acetylsalicylic_acid").
 */
export function toResourceName(subject: string): string {
  const name = normalizeName(subject).replace(/ /g, "_");
  return name.charAt(0).toUpperCase() + name.slice(1);
}

/**
 * Turn a source identifier into a display name comparable across sources:
 * last URI path segment, percent-decoded, underscores as spaces.
 */
export function entityNameFromIdentifier(identifier: string): string {
  const trimmed = identifier.trim();
  const withoutFragment = trimmed.split("#")[0] ?? trimmed;
  const segments = withoutFragment.split("/");
  const last = segments[segments.length - 1] ?? withoutFragment;

  return normalizeName(safeDecode(last).replace(/_/g, " "));
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
