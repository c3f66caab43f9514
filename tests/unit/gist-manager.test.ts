import { describe, it, expect, vi } from 'vitest';
import { Octokit } from '@octokit/rest';
import { RemoteError } from '../../src/errors.ts';
import { GistManager } from '../../src/gist-manager.ts';

interface Reply {
	status: number;
	body?: unknown;
}

/** Answers GitHub API requests in-process, keyed by "METHOD path". */
function fakeGitHub(routes: Record<string, Reply>) {
	const fetch = vi.fn(async (url: string, init?: RequestInit) => {
		const { pathname } = new URL(url);
		const reply = routes[`${init?.method ?? 'GET'} ${pathname}`] ?? { status: 404, body: { message: 'Not Found' } };
		const body = reply.body === undefined ? null : JSON.stringify(reply.body);
		return new Response(body, {
			status: reply.status,
			headers: body === null ? {} : { 'content-type': 'application/json; charset=utf-8' },
		});
	});
	const manager = new GistManager('test-token', new Octokit({ auth: 'test-token', request: { fetch } }));
	return { fetch, manager };
}

describe('GistManager', () => {
	it('lists gists with their visibility and description', async () => {
		const { manager } = fakeGitHub({
			'GET /gists': {
				status: 200,
				body: [
					{ id: 'aaa', public: true, description: 'shell tricks' },
					{ id: 'bbb', public: false, description: null },
				],
			},
		});

		expect(await manager.list()).toEqual([
			{ id: 'aaa', public: true, description: 'shell tricks' },
			{ id: 'bbb', public: false, description: undefined },
		]);
	});

	it('submits the content plan when creating a gist', async () => {
		const { fetch, manager } = fakeGitHub({
			'POST /gists': { status: 201, body: { id: 'new1', html_url: 'https://gist.github.com/new1' } },
		});

		const created = await manager.create('notes', { 'file1.txt': 'hello\n' }, false);

		expect(created).toEqual({ id: 'new1', url: 'https://gist.github.com/new1' });
		const [, init] = fetch.mock.calls[0];
		expect(JSON.parse(String(init?.body))).toEqual({
			description: 'notes',
			public: false,
			files: { 'file1.txt': { content: 'hello\n' } },
		});
	});

	it('reads file names and contents', async () => {
		const { manager } = fakeGitHub({
			'GET /gists/abc': {
				status: 200,
				body: {
					id: 'abc',
					files: {
						'a.txt': { filename: 'a.txt', content: 'alpha' },
						'b.txt': { filename: 'b.txt', content: 'beta' },
					},
				},
			},
		});

		expect(await manager.content('abc')).toEqual({ 'a.txt': 'alpha', 'b.txt': 'beta' });
		expect(await manager.files('abc')).toEqual(['a.txt', 'b.txt']);
	});

	it('returns the id of a fork', async () => {
		const { manager } = fakeGitHub({ 'POST /gists/abc/forks': { status: 201, body: { id: 'fork1' } } });
		expect(await manager.fork('abc')).toBe('fork1');
	});

	it('deletes a gist', async () => {
		const { fetch, manager } = fakeGitHub({ 'DELETE /gists/abc': { status: 204 } });

		await manager.delete('abc');

		expect(fetch).toHaveBeenCalledTimes(1);
	});

	it('wraps API failures in a RemoteError', async () => {
		const { manager } = fakeGitHub({});

		const failure = await manager.info('missing').catch((error: unknown) => error);

		expect(failure).toBeInstanceOf(RemoteError);
		expect(failure).toMatchObject({ message: expect.stringMatching(/^Fetching gist missing failed: Not Found/) });
	});
});
