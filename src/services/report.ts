import type { AssessmentResult, CitationRecord } from '../types/assessment';
import { dedupeCitations, MARKER_PATTERN } from './citations';

const EXCERPT_LENGTH = 200;

export type Report = {
  text: string;
  sources: CitationRecord[];
};

/**
 * Markers become [i] footnotes numbered by first appearance; markers with
 * no citation record are removed from the text.
 */
export function formatReport(result: AssessmentResult): Report {
  const sources = dedupeCitations(result.citations);
  const position = new Map(sources.map((c, i) => [c.marker, i + 1]));
  const body = result.verdictText.replace(MARKER_PATTERN, (marker) => {
    const n = position.get(marker);
    return n === undefined ? '' : `[${n}]`;
  });
  if (!sources.length) return { text: body, sources };

  const lines = sources.map((c, i) => {
    const snippet = c.evidenceText.replace(/\s+/g, ' ').trim();
    const clipped = snippet.length > EXCERPT_LENGTH ? snippet.slice(0, EXCERPT_LENGTH) + '…' : snippet;
    return `[${i + 1}] ${c.sourceName ?? 'source'} (score ${c.relevanceScore.toFixed(2)}): ${clipped}`;
  });
  return { text: `${body}\n\nSources:\n${lines.join('\n')}`, sources };
}
