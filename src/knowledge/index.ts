/**
 * Knowledge facade.
 */
export {
  loadKnowledge, keywordHits, matchIndustry, matchSolutions, matchDataElements,
} from './reference.js';
export type { KnowledgeBase, Industry, Solution, DataElement } from './reference.js';
