import { ContextChunk, StitchResult } from "../domain/types.js";
import { DEFAULT_MIN_OVERLAP_LENGTH, findOverlap } from "./overlap.js";

export interface StitchOptions {
  minOverlapLength?: number;
}

/**
 * Joins a matched chunk with its neighbouring windows into one block of text.
 *
 * Windows are sequenced by `positionKey`, never by arrival order. The anchor
 * (the window whose id equals `targetChunkId`) is kept verbatim; every other
 * window loses the text it shares with the original text of the window
 * before it (leading edge) and after it (trailing edge). Whitespace is
 * trimmed only where a cut was made.
 */
export function stitchContext(
  targetChunkId: string,
  contextChunks: ContextChunk[],
  options: StitchOptions = {},
): StitchResult {
  if (contextChunks.length === 0) {
    return { kind: "no_context" };
  }

  const minLength = options.minOverlapLength ?? DEFAULT_MIN_OVERLAP_LENGTH;
  const ordered = sortByPosition(contextChunks);
  const windows: string[] = [];

  for (let i = 0; i < ordered.length; i += 1) {
    const current = ordered[i];
    if (current.chunkId === targetChunkId) {
      windows.push(current.content);
      continue;
    }

    let start = 0;
    let end = current.content.length;

    if (i > 0) {
      const leading = findOverlap(ordered[i - 1].content, current.content, minLength);
      start = leading.length;
    }

    if (i < ordered.length - 1) {
      const trailing = findOverlap(current.content, ordered[i + 1].content, minLength);
      end = current.content.length - trailing.length;
    }

    // Both edges can claim the same characters when a window is mostly overlap.
    if (start >= end) {
      continue;
    }
    let text = current.content.slice(start, end);
    if (start > 0) {
      text = text.trimStart();
    }
    if (end < current.content.length) {
      text = text.trimEnd();
    }
    if (text.trim()) {
      windows.push(text);
    }
  }

  return {
    kind: "stitched",
    text: windows.join("\n\n"),
    windows,
  };
}

function sortByPosition(chunks: ContextChunk[]): ContextChunk[] {
  return [...chunks].sort((a, b) => {
    if (a.positionKey !== b.positionKey) {
      return a.positionKey - b.positionKey;
    }
    if (a.chunkId === b.chunkId) {
      return 0;
    }
    return a.chunkId < b.chunkId ? -1 : 1;
  });
}
