export { assembleContext, validateMaxTokens } from "./assembler.js";
export { createSection, orderSections, scalarText, serializeSection, textList, LIST_SEPARATOR } from "./sections.js";
export { countTokens, decodeTokens, encodeText, gptTokenizer } from "./tokenizer.js";
export {
  articlesLabel,
  collectSubjectContext,
  describePapers,
  describeSources,
  interactionsLabel,
  ARTICLES_PRIORITY_BASE,
  INTERACTIONS_PRIORITY_BASE,
} from "./subject-context.js";
export type { SubjectContext, SubjectContextOptions } from "./subject-context.js";
export type {
  BundleSection,
  ContextBundle,
  ContextSection,
  ScalarText,
  SectionValue,
  TextList,
  Tokenizer,
} from "./types.js";
