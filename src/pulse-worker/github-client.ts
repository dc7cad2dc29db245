import { workflowRunsResponseSchema, type WorkflowRun } from '@core/workflow-runs';
import { ConfigurationError, GitHubApiError } from '@shared/errors';

export interface GitHubClientOptions {
  token: string;
  owner: string;
  repo: string;
  apiUrl?: string;
  perPage?: number;
}

/** Source of workflow runs, newest first. */
export interface WorkflowRunSource {
  listWorkflowRuns(): Promise<WorkflowRun[]>;
}

const MAX_ERROR_BODY = 200;

export class GitHubClient implements WorkflowRunSource {
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly perPage: number;

  constructor(
    private readonly options: GitHubClientOptions,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    this.token = options.token.trim();
    if (!this.token) {
      throw new ConfigurationError('GitHub token not found in environment variables');
    }
    if (!options.owner || !options.repo) {
      throw new ConfigurationError('GITHUB_USER and GITHUB_REPO must both be set');
    }
    this.apiUrl = (options.apiUrl ?? 'https://api.github.com').replace(/\/+$/, '');
    this.perPage = options.perPage ?? 30;
  }

  get runsUrl(): string {
    const owner = encodeURIComponent(this.options.owner);
    const repo = encodeURIComponent(this.options.repo);
    return `${this.apiUrl}/repos/${owner}/${repo}/actions/runs?per_page=${this.perPage}`;
  }

  async listWorkflowRuns(): Promise<WorkflowRun[]> {
    const res = await this.fetchImpl(this.runsUrl, {
      headers: {
        Authorization: `Bearer ${this.token}`,
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
      },
    });

    if (!res.ok) {
      const body = await res.text();
      throw new GitHubApiError(res.status, body.slice(0, MAX_ERROR_BODY));
    }

    const payload = workflowRunsResponseSchema.parse(await res.json());
    return payload.workflow_runs;
  }
}
