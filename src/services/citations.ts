import type { CitationAnnotation, CitationRecord, EvidenceChunk } from '../types/assessment';

// 【<n>:<k>†<label>】 where k indexes the retrieved chunk list
const MARKER_RE = /^【(\d+):(\d+)†[^】]*】$/;

export const MARKER_PATTERN = /【[^】]*】/g;

export function parseChunkIndex(marker: string): number | null {
  const m = MARKER_RE.exec(marker.trim());
  if (!m) return null;
  const k = Number(m[2]);
  return Number.isSafeInteger(k) ? k : null;
}

/**
 * One record per resolvable annotation, in annotation order. Markers that
 * do not parse or point past the chunk list are skipped.
 */
export function extractCitations(annotations: readonly CitationAnnotation[], chunks: readonly EvidenceChunk[]): CitationRecord[] {
  const out: CitationRecord[] = [];
  for (const annotation of annotations) {
    const k = parseChunkIndex(annotation.marker);
    if (k === null || k >= chunks.length) continue;
    const chunk = chunks[k];
    const record: CitationRecord = {
      marker: annotation.marker,
      evidenceText: chunk.text,
      relevanceScore: chunk.score
    };
    if (chunk.fileName) record.sourceName = chunk.fileName;
    out.push(record);
  }
  return out;
}

export function dedupeCitations(citations: readonly CitationRecord[]): CitationRecord[] {
  const seen = new Set<string>();
  return citations.filter((c) => {
    if (seen.has(c.marker)) return false;
    seen.add(c.marker);
    return true;
  });
}
