import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { extract } from 'tar';
import { archiveGist } from '../../src/archive.ts';
import { RemoteError } from '../../src/errors.ts';
import type { GistApi } from '../../src/gist-manager.ts';

function apiServing(content: (id: string) => Promise<Record<string, string>>): GistApi {
	const unused = async (): Promise<never> => {
		throw new Error('not used by archive');
	};
	return {
		list: unused,
		info: unused,
		create: unused,
		fork: unused,
		delete: unused,
		files: unused,
		content,
	};
}

describe('archiveGist', () => {
	let destination: string;

	beforeEach(() => {
		destination = fs.mkdtempSync(path.join(os.tmpdir(), 'gist-archive-'));
	});

	afterEach(() => {
		fs.rmSync(destination, { recursive: true, force: true });
	});

	it('packages every file under a folder named after the gist', async () => {
		let workdir = '';
		const api = apiServing(async () => ({ 'a.txt': 'alpha\n', 'b.py': 'print("b")\n' }));

		const archivePath = await archiveGist('abc123', api, {
			destination,
			onWorkingDirectory: dir => {
				workdir = dir;
			},
		});

		expect(archivePath).toBe(path.join(destination, 'abc123.tar.gz'));
		expect(fs.existsSync(workdir)).toBe(false);

		const unpacked = path.join(destination, 'unpacked');
		fs.mkdirSync(unpacked);
		await extract({ file: archivePath, cwd: unpacked });

		expect(fs.readdirSync(path.join(unpacked, 'abc123')).sort()).toEqual(['a.txt', 'b.py']);
		expect(fs.readFileSync(path.join(unpacked, 'abc123', 'b.py'), 'utf-8')).toBe('print("b")\n');
	});

	it('writes nothing when the download fails', async () => {
		const api = apiServing(async id => {
			throw new RemoteError(`Fetching gist ${id} failed: Not Found`);
		});

		await expect(archiveGist('gone', api, { destination })).rejects.toThrow('Fetching gist gone failed: Not Found');
		expect(fs.readdirSync(destination)).toEqual([]);
	});
});
