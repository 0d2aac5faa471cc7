export { ArxivClient, parseArxivFeed } from "./client.js";
export type { ArticleProvider, ArxivClientConfig, ArxivPaper, ArxivSearchResult } from "./types.js";
