import type { MetadataRecord } from '../types/repository';

export type LanguageShare = { language: string; percent: number };

/** Shares rounded to one decimal place, largest first. */
export function languageShares(histogram: Readonly<Record<string, number>>): LanguageShare[] {
  const entries = Object.entries(histogram);
  const total = entries.reduce((sum, [, bytes]) => sum + bytes, 0);
  return entries
    .map(([language, bytes]) => ({
      language,
      percent: total > 0 ? Math.round((bytes / total) * 1000) / 10 : 0
    }))
    .sort((a, b) => b.percent - a.percent || a.language.localeCompare(b.language));
}

export function formatLanguages(histogram: Readonly<Record<string, number>>): string {
  const shares = languageShares(histogram);
  if (!shares.length) return 'none';
  return shares.map((s) => `${s.language} ${s.percent}%`).join(', ');
}

function list(items: readonly string[]) {
  return items.length ? items.join(', ') : 'none';
}

export function renderDocument(record: MetadataRecord): string {
  const a = record.activityCounters;
  return [
    `Repository: ${record.repository}`,
    `Summary: ${record.readmeExcerpt || 'none'}`,
    `Tags: ${list(record.domainTags)}`,
    `Domain: ${record.domain}`,
    `Dependencies: ${list(record.dependencies)}`,
    `Languages: ${formatLanguages(record.languageHistogram)}`,
    `Topics: ${list(record.topics)}`,
    `License: ${record.license}`,
    `Activity: ${a.stars} stars, ${a.forks} forks, ${a.openIssues} open issues, ${a.contributors} contributors, last push ${record.lastPushTimestamp ?? 'unknown'}, size ${record.sizeKb} KB`,
    `CI configured: ${record.hasCI}`,
    `Biometric data used: ${record.biometricFlag}`,
    `Human-in-the-loop: ${record.humanOversightFlag}`
  ].join('\n');
}
