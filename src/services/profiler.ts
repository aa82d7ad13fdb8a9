import { logger as rootLogger, Logger } from '../lib/logger';
import { RepositoryNotFoundError } from '../lib/errors';
import {
  BIOMETRIC_TERMS,
  DEFAULT_DOMAIN_VOCABULARY,
  GENERAL_DOMAIN,
  HUMAN_OVERSIGHT_TERMS,
  NO_LICENSE
} from '../config/heuristics';
import type { MetadataRecord, RepositoryInfo, RepositoryRef, SourceControlClient } from '../types/repository';
import { parseRepositoryUrl } from './github';

export type RepositoryProfilerOptions = {
  client: SourceControlClient;
  readmeExcerptLength?: number;
  manifestPath?: string;
  ciConfigPath?: string;
  vocabulary?: readonly string[];
  logger?: Logger;
};

export function excerpt(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength) + '…' : text;
}

export function parseManifest(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export function searchBlob(readme: string, dependencies: readonly string[]): string {
  return (readme + '\n' + dependencies.join(' ')).toLowerCase();
}

/** Matches are reported in vocabulary order, not in the order they occur in the blob. */
export function detectDomainTags(blob: string, vocabulary: readonly string[] = DEFAULT_DOMAIN_VOCABULARY): string[] {
  return vocabulary.filter((term) => blob.includes(term.toLowerCase()));
}

export function detectFlags(blob: string) {
  return {
    biometricFlag: BIOMETRIC_TERMS.some((t) => blob.includes(t)),
    humanOversightFlag: HUMAN_OVERSIGHT_TERMS.some((t) => blob.includes(t))
  };
}

export function primaryDomain(domainTags: readonly string[]): string {
  return domainTags[0] ?? GENERAL_DOMAIN;
}

export class RepositoryProfiler {
  private readonly client: SourceControlClient;
  private readonly readmeExcerptLength: number;
  private readonly manifestPath: string;
  private readonly ciConfigPath: string;
  private readonly vocabulary: readonly string[];
  private readonly logger: Logger;

  constructor(opts: RepositoryProfilerOptions) {
    this.client = opts.client;
    this.readmeExcerptLength = opts.readmeExcerptLength ?? 500;
    this.manifestPath = opts.manifestPath ?? 'requirements.txt';
    this.ciConfigPath = opts.ciConfigPath ?? '.github/workflows';
    this.vocabulary = opts.vocabulary ?? DEFAULT_DOMAIN_VOCABULARY;
    this.logger = opts.logger ?? rootLogger;
  }

  async profile(repositoryUrl: string): Promise<MetadataRecord> {
    const ref = parseRepositoryUrl(repositoryUrl);
    const repository = `${ref.owner}/${ref.name}`;
    const log = this.logger.child({ repository });

    let info: RepositoryInfo;
    try {
      info = await this.client.getRepository(ref);
    } catch (err) {
      log.warn({ err }, 'repository lookup failed');
      throw new RepositoryNotFoundError(repository, err);
    }

    const [readme, dependencies, languageHistogram, hasCI, contributors] = await Promise.all([
      this.optional<string>(log, 'readme', '', () => this.client.getReadme(ref)),
      this.optional<string[]>(log, 'manifest', [], async () => parseManifest(await this.client.getFileContent(ref, this.manifestPath))),
      this.optional<Record<string, number>>(log, 'languages', {}, () => this.client.getLanguages(ref)),
      this.optional<boolean>(log, 'ci', false, () => this.probeCI(ref)),
      this.optional<number>(log, 'contributors', 0, () => this.client.getContributorCount(ref))
    ]);

    const blob = searchBlob(readme, dependencies);
    const domainTags = detectDomainTags(blob, this.vocabulary);
    const flags = detectFlags(blob);

    const record: MetadataRecord = {
      repository: info.fullName || repository,
      readmeExcerpt: excerpt(readme, this.readmeExcerptLength),
      dependencies: Object.freeze(dependencies),
      languageHistogram: Object.freeze({ ...languageHistogram }),
      topics: Object.freeze(Array.from(new Set(info.topics))),
      license: info.license || NO_LICENSE,
      activityCounters: Object.freeze({
        stars: info.stars,
        forks: info.forks,
        openIssues: info.openIssues,
        contributors
      }),
      lastPushTimestamp: info.pushedAt,
      sizeKb: info.sizeKb,
      hasCI,
      domainTags: Object.freeze(domainTags),
      domain: primaryDomain(domainTags),
      ...flags
    };
    log.debug({ domainTags, hasCI, dependencies: dependencies.length }, 'repository profiled');
    return Object.freeze(record);
  }

  private async probeCI(ref: RepositoryRef): Promise<boolean> {
    const entries = await this.client.listDirectory(ref, this.ciConfigPath);
    return entries.length > 0;
  }

  private async optional<T>(log: Logger, field: string, fallback: T, fetch: () => Promise<T>): Promise<T> {
    try {
      return await fetch();
    } catch (err) {
      log.warn({ err, field }, 'optional field unavailable, using default');
      return fallback;
    }
  }
}

export default RepositoryProfiler;
