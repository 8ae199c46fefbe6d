import { z } from 'zod';
import { requestJson, type GitHubConfig, type ToolDefinition } from '@steward/shared';

const operations = ['list_repos', 'get_repo_info', 'create_issue', 'list_issues', 'get_file_content'] as const;
const needsRepository = new Set<string>(['get_repo_info', 'create_issue', 'list_issues', 'get_file_content']);

const inputSchema = z.object({
  operation: z.enum(operations).describe('GitHub operation to perform'),
  repository: z.string().regex(/^[\w.-]+\/[\w.-]+$/).optional()
    .describe('Repository as owner/name; required for everything except list_repos'),
  title: z.string().min(1).optional().describe('Issue title (create_issue)'),
  body: z.string().optional().describe('Issue body (create_issue)'),
  path: z.string().min(1).optional().describe('File path inside the repository (get_file_content)'),
  ref: z.string().optional().describe('Branch, tag or commit (get_file_content)'),
  state: z.enum(['open', 'closed', 'all']).default('open').describe('Issue state filter (list_issues)'),
  limit: z.number().int().min(1).max(50).default(10).describe('Maximum items to return'),
}).superRefine((input, ctx) => {
  if (needsRepository.has(input.operation) && !input.repository) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['repository'], message: `repository is required for ${input.operation}` });
  }
  if (input.operation === 'create_issue' && !input.title) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['title'], message: 'title is required for create_issue' });
  }
  if (input.operation === 'get_file_content' && !input.path) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['path'], message: 'path is required for get_file_content' });
  }
});

const outputSchema = z.object({
  operation: z.enum(operations),
  summary: z.string(),
});

export type GitHubInput = z.infer<typeof inputSchema>;
export type GitHubOutput = z.infer<typeof outputSchema>;

const repoSchema = z.object({
  full_name: z.string(),
  description: z.string().nullable().default(null),
  private: z.boolean().default(false),
  html_url: z.string(),
  stargazers_count: z.number().default(0),
  forks_count: z.number().default(0),
  open_issues_count: z.number().default(0),
  default_branch: z.string().default('main'),
  language: z.string().nullable().default(null),
});

const issueSchema = z.object({
  number: z.number(),
  title: z.string(),
  state: z.string(),
  html_url: z.string(),
  pull_request: z.unknown().optional(),
});

const fileSchema = z.object({
  type: z.string(),
  path: z.string(),
  content: z.string().optional(),
  encoding: z.string().optional(),
});

export class GitHubClient {
  constructor(private readonly config: GitHubConfig & { token: string }) {}

  private request(path: string, init: { method?: string; body?: unknown } = {}): Promise<unknown> {
    return requestJson(`${this.config.apiUrl.replace(/\/$/, '')}${path}`, {
      capability: 'github',
      timeoutMs: this.config.timeoutMs,
      method: init.method,
      body: init.body,
      headers: {
        Accept: 'application/vnd.github+json',
        Authorization: `Bearer ${this.config.token}`,
        'X-GitHub-Api-Version': '2022-11-28',
        'User-Agent': 'steward-assistant',
      },
    });
  }

  async listRepos(limit: number): Promise<string> {
    const repos = z.array(repoSchema).parse(await this.request(`/user/repos?sort=updated&per_page=${limit}`));
    if (repos.length === 0) return 'No repositories found.';
    return repos
      .map(r => `- ${r.full_name}${r.private ? ' (private)' : ''}${r.description ? `: ${r.description}` : ''}`)
      .join('\n');
  }

  async getRepoInfo(repository: string): Promise<string> {
    const repo = repoSchema.parse(await this.request(`/repos/${repository}`));
    return [
      `Repository: ${repo.full_name}`,
      `Description: ${repo.description ?? 'none'}`,
      `Language: ${repo.language ?? 'unknown'}`,
      `Stars: ${repo.stargazers_count}, Forks: ${repo.forks_count}, Open issues: ${repo.open_issues_count}`,
      `Default branch: ${repo.default_branch}`,
      `URL: ${repo.html_url}`,
    ].join('\n');
  }

  async createIssue(repository: string, title: string, body?: string): Promise<string> {
    const issue = issueSchema.parse(await this.request(`/repos/${repository}/issues`, {
      method: 'POST',
      body: { title, body: body ?? '' },
    }));
    return `Created issue #${issue.number}: ${issue.html_url}`;
  }

  async listIssues(repository: string, state: string, limit: number): Promise<string> {
    const raw = z.array(issueSchema).parse(
      await this.request(`/repos/${repository}/issues?state=${state}&per_page=${limit}`),
    );
    // The issues endpoint also returns pull requests.
    const issues = raw.filter(i => i.pull_request === undefined);
    if (issues.length === 0) return `No ${state} issues in ${repository}.`;
    return issues.map(i => `#${i.number} [${i.state}] ${i.title}`).join('\n');
  }

  async getFileContent(repository: string, path: string, ref?: string): Promise<string> {
    const query = ref ? `?ref=${encodeURIComponent(ref)}` : '';
    const encodedPath = path.split('/').map(encodeURIComponent).join('/');
    const body = await this.request(`/repos/${repository}/contents/${encodedPath}${query}`);

    const listing = z.array(fileSchema).safeParse(body);
    if (listing.success) {
      return listing.data.map(f => `${f.type === 'dir' ? 'dir ' : 'file'} ${f.path}`).join('\n');
    }
    const file = fileSchema.parse(body);
    if (file.content === undefined) return `${file.path} has no inline content.`;
    return file.encoding === 'base64'
      ? Buffer.from(file.content, 'base64').toString('utf-8')
      : file.content;
  }
}

function runOperation(client: GitHubClient, input: GitHubInput): Promise<string> {
  const repository = input.repository ?? '';
  switch (input.operation) {
    case 'list_repos':
      return client.listRepos(input.limit);
    case 'get_repo_info':
      return client.getRepoInfo(repository);
    case 'create_issue':
      return client.createIssue(repository, input.title ?? '', input.body);
    case 'list_issues':
      return client.listIssues(repository, input.state, input.limit);
    case 'get_file_content':
      return client.getFileContent(repository, input.path ?? '', input.ref);
  }
}

/** Returns null when no GitHub token is configured. */
export function createGitHubTool(config: GitHubConfig): ToolDefinition<GitHubInput, GitHubOutput> | null {
  const { token } = config;
  if (!token) return null;
  const client = new GitHubClient({ ...config, token });

  return {
    name: 'github',
    description:
      'Work with GitHub: list_repos, get_repo_info, create_issue, list_issues, get_file_content. ' +
      'Use it when the question is about the user\'s repositories, issues or code.',
    inputSchema,
    outputSchema,
    tags: ['network', 'github'],
    timeoutMs: config.timeoutMs + 1_000,
    async execute(input) {
      return { operation: input.operation, summary: await runOperation(client, input) };
    },
  };
}
