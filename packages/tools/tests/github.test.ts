import { describe, it, expect, vi, afterEach } from 'vitest';
import { AuthenticationError, githubConfigSchema } from '@steward/shared';
import { createGitHubTool } from '../src/index.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function makeTool() {
  const tool = createGitHubTool(githubConfigSchema.parse({ token: 'test-token', apiUrl: 'https://gh.example.test' }));
  if (!tool) throw new Error('tool should exist with a token');
  return tool;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('github tool', () => {
  it('is null without a token', () => {
    expect(createGitHubTool(githubConfigSchema.parse({}))).toBeNull();
  });

  it('requires a repository for repository operations', () => {
    const tool = makeTool();
    const result = tool.inputSchema.safeParse({ operation: 'list_issues' });
    expect(result.success).toBe(false);
    expect(tool.inputSchema.safeParse({ operation: 'list_repos' }).success).toBe(true);
  });

  it('lists repositories with auth headers', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse([
      { full_name: 'me/notes', description: 'Notes', private: true, html_url: 'https://gh.test/me/notes' },
      { full_name: 'me/site', description: null, private: false, html_url: 'https://gh.test/me/site' },
    ]));
    vi.stubGlobal('fetch', fetchMock);

    const tool = makeTool();
    const output = await tool.execute(tool.inputSchema.parse({ operation: 'list_repos', limit: 2 }));

    expect(output).toEqual({
      operation: 'list_repos',
      summary: '- me/notes (private): Notes\n- me/site',
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://gh.example.test/user/repos?sort=updated&per_page=2');
    expect(init.headers.Authorization).toBe('Bearer test-token');
    expect(init.method).toBe('GET');
  });

  it('creates issues with a POST body', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({
      number: 7, title: 'Bug', state: 'open', html_url: 'https://gh.test/me/site/issues/7',
    }, 201));
    vi.stubGlobal('fetch', fetchMock);

    const tool = makeTool();
    const output = await tool.execute(tool.inputSchema.parse({
      operation: 'create_issue', repository: 'me/site', title: 'Bug', body: 'Broken',
    }));

    expect(output.summary).toBe('Created issue #7: https://gh.test/me/site/issues/7');
    const [, init] = fetchMock.mock.calls[0];
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body)).toEqual({ title: 'Bug', body: 'Broken' });
  });

  it('filters pull requests out of issue listings', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse([
      { number: 1, title: 'Real issue', state: 'open', html_url: 'u1' },
      { number: 2, title: 'A PR', state: 'open', html_url: 'u2', pull_request: { url: 'x' } },
    ])));

    const tool = makeTool();
    const output = await tool.execute(tool.inputSchema.parse({ operation: 'list_issues', repository: 'me/site' }));
    expect(output.summary).toBe('#1 [open] Real issue');
  });

  it('decodes base64 file content', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({
      type: 'file',
      path: 'README.md',
      content: Buffer.from('# Hello\n').toString('base64'),
      encoding: 'base64',
    })));

    const tool = makeTool();
    const output = await tool.execute(tool.inputSchema.parse({
      operation: 'get_file_content', repository: 'me/site', path: 'README.md',
    }));
    expect(output.summary).toBe('# Hello\n');
  });

  it('surfaces 401 as AuthenticationError', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ message: 'Bad credentials' }, 401)));
    const tool = makeTool();
    await expect(tool.execute(tool.inputSchema.parse({ operation: 'list_repos' })))
      .rejects.toBeInstanceOf(AuthenticationError);
  });
});
