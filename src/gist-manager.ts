import { Octokit } from '@octokit/rest';
import { RemoteError, describeError } from './errors.ts';
import type { ContentPlan, CreatedGist, GistId, GistSummary } from './types.ts';

/** The remote operations the CLI needs from the hosting service. */
export interface GistApi {
	list(): Promise<GistSummary[]>;
	info(id: GistId): Promise<object>;
	create(description: string, plan: ContentPlan, isPublic: boolean): Promise<CreatedGist>;
	fork(id: GistId): Promise<GistId>;
	delete(id: GistId): Promise<void>;
	files(id: GistId): Promise<string[]>;
	content(id: GistId): Promise<Record<string, string>>;
}

export class GistManager implements GistApi {
	private octokit: Octokit;

	constructor(token: string, octokit?: Octokit) {
		this.octokit = octokit ?? new Octokit({ auth: token, userAgent: 'gistcli' });
	}

	private async call<T>(action: string, request: () => Promise<T>): Promise<T> {
		try {
			return await request();
		} catch (error) {
			throw new RemoteError(`${action} failed: ${describeError(error)}`, { cause: error });
		}
	}

	public async list(): Promise<GistSummary[]> {
		const gists = await this.call('Listing gists', () =>
			this.octokit.paginate(this.octokit.gists.list, { per_page: 100 })
		);

		return gists.map(gist => ({
			id: gist.id,
			public: gist.public,
			description: gist.description ?? undefined,
		}));
	}

	public async info(id: GistId): Promise<object> {
		const response = await this.call(`Fetching gist ${id}`, () => this.octokit.gists.get({ gist_id: id }));
		return response.data;
	}

	public async create(description: string, plan: ContentPlan, isPublic: boolean): Promise<CreatedGist> {
		const files: { [key: string]: { content: string } } = {};
		for (const [name, content] of Object.entries(plan)) {
			files[name] = { content };
		}

		const response = await this.call('Creating gist', () =>
			this.octokit.gists.create({ description, public: isPublic, files })
		);

		if (!response.data.id) {
			throw new RemoteError('Failed to get gist ID from response');
		}

		return { id: response.data.id, url: response.data.html_url ?? '' };
	}

	public async fork(id: GistId): Promise<GistId> {
		const response = await this.call(`Forking gist ${id}`, () => this.octokit.gists.fork({ gist_id: id }));
		return response.data.id;
	}

	public async delete(id: GistId): Promise<void> {
		await this.call(`Deleting gist ${id}`, () => this.octokit.gists.delete({ gist_id: id }));
	}

	public async files(id: GistId): Promise<string[]> {
		return Object.keys(await this.content(id));
	}

	public async content(id: GistId): Promise<Record<string, string>> {
		const gist = await this.call(`Fetching gist ${id}`, () => this.octokit.gists.get({ gist_id: id }));

		const content: Record<string, string> = {};
		for (const [filename, file] of Object.entries(gist.data.files ?? {})) {
			content[filename] = file?.content ?? '';
		}
		return content;
	}
}
