import fs from 'fs';
import path from 'path';
import { create } from 'tar';
import type { GistApi } from './gist-manager.ts';
import { withWorkingDirectory } from './scratch.ts';
import type { GistId } from './types.ts';

export interface ArchiveOptions {
	/** Directory the tarball is written to. */
	destination: string;
	onWorkingDirectory?: (dir: string) => void;
}

function moveFile(from: string, to: string): void {
	try {
		fs.renameSync(from, to);
	} catch (error) {
		// the scratch directory usually lives on another filesystem
		if (!(error instanceof Error && 'code' in error && error.code === 'EXDEV')) throw error;
		fs.copyFileSync(from, to);
	}
}

/**
 * Download every file of a gist and package them as `<id>.tar.gz`, with the
 * files under a top-level `<id>/` folder.
 *
 * @returns path of the written archive
 */
export async function archiveGist(id: GistId, api: GistApi, options: ArchiveOptions): Promise<string> {
	const files = await api.content(id);
	const archivePath = path.resolve(options.destination, `${id}.tar.gz`);

	await withWorkingDirectory(async workdir => {
		options.onWorkingDirectory?.(workdir.path);

		const folder = path.join(workdir.path, id);
		fs.mkdirSync(folder);
		for (const [name, content] of Object.entries(files)) {
			fs.writeFileSync(path.join(folder, name), content);
		}

		// a partial archive stays in the scratch directory
		const staged = path.join(workdir.path, `${id}.tar.gz`);
		await create({ gzip: true, file: staged, cwd: workdir.path }, [id]);
		moveFile(staged, archivePath);
	});

	return archivePath;
}
