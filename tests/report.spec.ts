import { formatReport } from '../src/services/report';
import type { CitationRecord } from '../src/types/assessment';

const article5: CitationRecord = {
  marker: '【4:0†source】',
  evidenceText: 'Article 5 prohibits certain practices.',
  relevanceScore: 0.91,
  sourceName: 'eu-ai-act.pdf'
};
const annex3: CitationRecord = {
  marker: '【4:1†source】',
  evidenceText: 'Annex III lists\n  high-risk systems.',
  relevanceScore: 0.77
};

describe('formatReport', () => {
  it('numbers resolved markers and drops unresolved ones', () => {
    const report = formatReport({
      verdictText: 'High risk【4:0†source】. Biometric identification【4:1†source】 is listed【4:9†source】 again【4:0†source】.',
      citations: [article5, annex3, article5]
    });

    expect(report.sources).toEqual([article5, annex3]);
    expect(report.text).toBe(
      'High risk[1]. Biometric identification[2] is listed again[1].\n\n' +
        'Sources:\n' +
        '[1] eu-ai-act.pdf (score 0.91): Article 5 prohibits certain practices.\n' +
        '[2] source (score 0.77): Annex III lists high-risk systems.'
    );
  });

  it('returns only the verdict when nothing is cited', () => {
    const report = formatReport({ verdictText: 'Minimal risk【1:0†source】', citations: [] });

    expect(report).toEqual({ text: 'Minimal risk', sources: [] });
  });

  it('clips long evidence', () => {
    const long: CitationRecord = { ...article5, evidenceText: 'x'.repeat(250) };
    const report = formatReport({ verdictText: 'Limited【4:0†source】', citations: [long] });

    expect(report.text.split('\n').pop()).toBe(`[1] eu-ai-act.pdf (score 0.91): ${'x'.repeat(200)}…`);
  });
});
