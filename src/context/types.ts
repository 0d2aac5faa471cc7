/**
 * Context Section Model
 *
 * A section's value is decided once, at construction: either a single text
 * (`ScalarText`) or a list of lines (`TextList`). Serialization switches on
 * the tag, never on the runtime shape of the value.
 */

export interface ScalarText {
  readonly kind: "scalar";
  readonly text: string;
}

export interface TextList {
  readonly kind: "list";
  readonly items: readonly string[];
}

export type SectionValue = ScalarText | TextList;

export interface ContextSection {
  readonly label: string;
  readonly value: SectionValue;
  /** Lower number = higher priority. Fixed by the caller. */
  readonly priority: number;
}

/**
 * Encode/decode pair used only for measuring and cutting text.
 * Token ids are opaque; only sequence length and the round trip matter.
 */
export interface Tokenizer {
  encode(text: string): readonly number[];
  decode(tokens: readonly number[]): string;
}

export interface BundleSection {
  readonly label: string;
  readonly content: string;
  readonly tokens: number;
}

/**
 * Budget-compliant result of assembly. `sections` is in priority order and
 * `totalTokens <= maxTokens` always holds.
 */
export interface ContextBundle {
  readonly maxTokens: number;
  readonly totalTokens: number;
  readonly sections: readonly BundleSection[];
  /** Label of the section that was cut, if any */
  readonly truncated: string | null;
  /** Labels of sections left out entirely, in priority order */
  readonly dropped: readonly string[];
}
