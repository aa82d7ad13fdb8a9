export interface RepositoryRef {
  owner: string;
  name: string;
}

export interface ActivityCounters {
  stars: number;
  forks: number;
  openIssues: number;
  contributors: number;
}

/** Top-level repository attributes; the only lookup whose failure aborts a profile. */
export interface RepositoryInfo {
  fullName: string;
  stars: number;
  forks: number;
  openIssues: number;
  pushedAt?: string;
  sizeKb: number;
  topics: string[];
  license: string | null;
}

export interface MetadataRecord {
  readonly repository: string;            // owner/name
  readonly readmeExcerpt: string;         // first N chars, '…' appended when truncated
  readonly dependencies: readonly string[];
  readonly languageHistogram: Readonly<Record<string, number>>; // language -> bytes
  readonly topics: readonly string[];
  readonly license: string;               // identifier or NO_LICENSE
  readonly activityCounters: Readonly<ActivityCounters>;
  readonly lastPushTimestamp?: string;    // ISO-8601
  readonly sizeKb: number;
  readonly hasCI: boolean;
  readonly domainTags: readonly string[]; // vocabulary order
  readonly domain: string;                // first tag or 'general'
  readonly biometricFlag: boolean;
  readonly humanOversightFlag: boolean;
}

/**
 * Read-only view of a hosted source-control service. Every method rejects
 * when the resource is absent; callers decide which absences are fatal.
 */
export interface SourceControlClient {
  getRepository(ref: RepositoryRef): Promise<RepositoryInfo>;
  getReadme(ref: RepositoryRef): Promise<string>;
  getFileContent(ref: RepositoryRef, filePath: string): Promise<string>;
  listDirectory(ref: RepositoryRef, dirPath: string): Promise<string[]>;
  getLanguages(ref: RepositoryRef): Promise<Record<string, number>>;
  getContributorCount(ref: RepositoryRef): Promise<number>;
}
