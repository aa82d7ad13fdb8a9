import axios from 'axios';
import { InvalidRepositoryReferenceError } from '../lib/errors';
import type { RepositoryInfo, RepositoryRef, SourceControlClient } from '../types/repository';
import {
  contentResponseSchema,
  directoryResponseSchema,
  languagesResponseSchema,
  repoResponseSchema,
  RepoResponse
} from '../validators/githubSchema';

/**
 * Owner and name are the first two path segments; anything after them
 * (tree/main/..., issues, a trailing slash) is ignored.
 */
export function parseRepositoryUrl(repoUrl: string): RepositoryRef {
  let url: URL;
  try {
    url = new URL(repoUrl.trim());
  } catch {
    throw new InvalidRepositoryReferenceError(repoUrl);
  }
  const segments = url.pathname.split('/').filter(Boolean);
  if (segments.length < 2) throw new InvalidRepositoryReferenceError(repoUrl);
  const owner = segments[0];
  const name = segments[1].replace(/\.git$/i, '');
  if (!owner || !name) throw new InvalidRepositoryReferenceError(repoUrl);
  return { owner, name };
}

export function licenseIdentifier(license: RepoResponse['license']): string | null {
  if (!license) return null;
  if (license.spdx_id && license.spdx_id !== 'NOASSERTION') return license.spdx_id;
  return license.name || license.key || null;
}

export function contributorCountFromLink(link: string | undefined, pageLength: number): number {
  if (!link) return pageLength;
  const m = link.match(/[?&]page=(\d+)>; rel="last"/);
  return m ? Number(m[1]) : pageLength;
}

export type GitHubClientOptions = {
  token?: string;
  baseUrl?: string;
  timeoutMs?: number;
};

export class GitHubClient implements SourceControlClient {
  private readonly headers: Record<string, string>;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(opts: GitHubClientOptions = {}) {
    this.headers = { Accept: 'application/vnd.github+json', 'User-Agent': 'repo-risk-classifier/1.0' };
    if (opts.token) this.headers.Authorization = `token ${opts.token}`;
    this.baseUrl = (opts.baseUrl || 'https://api.github.com').replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 15000;
  }

  private repoPath(ref: RepositoryRef) {
    return `${this.baseUrl}/repos/${encodeURIComponent(ref.owner)}/${encodeURIComponent(ref.name)}`;
  }

  private async get(url: string, params?: Record<string, string | number | boolean>) {
    return axios.get<unknown>(url, { headers: this.headers, params, timeout: this.timeoutMs });
  }

  async getRepository(ref: RepositoryRef): Promise<RepositoryInfo> {
    const r = await this.get(this.repoPath(ref));
    const data = repoResponseSchema.parse(r.data);
    return {
      fullName: data.full_name,
      stars: data.stargazers_count,
      forks: data.forks_count,
      openIssues: data.open_issues_count,
      pushedAt: data.pushed_at ?? undefined,
      sizeKb: data.size,
      topics: data.topics,
      license: licenseIdentifier(data.license)
    };
  }

  async getReadme(ref: RepositoryRef): Promise<string> {
    const r = await this.get(`${this.repoPath(ref)}/readme`);
    return decodeContent(r.data);
  }

  async getFileContent(ref: RepositoryRef, filePath: string): Promise<string> {
    const r = await this.get(`${this.repoPath(ref)}/contents/${encodeContentPath(filePath)}`);
    return decodeContent(r.data);
  }

  async listDirectory(ref: RepositoryRef, dirPath: string): Promise<string[]> {
    const r = await this.get(`${this.repoPath(ref)}/contents/${encodeContentPath(dirPath)}`);
    return directoryResponseSchema.parse(r.data).map((entry) => entry.name);
  }

  async getLanguages(ref: RepositoryRef): Promise<Record<string, number>> {
    const r = await this.get(`${this.repoPath(ref)}/languages`);
    return languagesResponseSchema.parse(r.data);
  }

  async getContributorCount(ref: RepositoryRef): Promise<number> {
    const r = await this.get(`${this.repoPath(ref)}/contributors`, { per_page: 1, anon: true });
    // 204 with an empty body for repositories without commits
    const pageLength = Array.isArray(r.data) ? r.data.length : 0;
    const link = typeof r.headers?.link === 'string' ? r.headers.link : undefined;
    return contributorCountFromLink(link, pageLength);
  }
}

function encodeContentPath(p: string) {
  return p.split('/').filter(Boolean).map(encodeURIComponent).join('/');
}

function decodeContent(data: unknown): string {
  const parsed = contentResponseSchema.parse(data);
  if (parsed.encoding && parsed.encoding !== 'base64') return parsed.content;
  return Buffer.from(parsed.content, 'base64').toString('utf8');
}

export default GitHubClient;
