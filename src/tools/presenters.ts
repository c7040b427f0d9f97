import { GuidelineSummaryMatch } from "../domain/types.js";
import { RankedPassage, SearchGuidelinesResult } from "../services/guidelineSearchService.js";

export const NO_CONTEXT_MESSAGE = "No additional context available";

export function presentGuideline(guideline: GuidelineSummaryMatch) {
  return {
    id: guideline.id,
    title: guideline.title,
    similarity: Number(guideline.similarity.toFixed(4)),
    version: guideline.version,
    adopted_date: guideline.adoptedDate,
    document_type: guideline.documentType,
    summary: guideline.summary,
  };
}

export function presentPassage(passage: RankedPassage) {
  return {
    rank: passage.rank,
    chunk_id: passage.chunkId,
    guideline_id: passage.guidelineId,
    guideline_title: passage.guidelineTitle,
    similarity: Number(passage.similarity.toFixed(4)),
    content: passage.content,
    full_context:
      passage.context.kind === "stitched" ? passage.context.text : NO_CONTEXT_MESSAGE,
  };
}

export function presentSearch(result: SearchGuidelinesResult) {
  return {
    query: result.query,
    scope: result.scope,
    chunk_search_degraded: result.chunkSearchDegraded,
    guidance: result.guidance,
    guidelines: result.guidelines.map(presentGuideline),
    passages: result.passages.map(presentPassage),
  };
}
