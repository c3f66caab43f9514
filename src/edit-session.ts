import fs from 'fs';
import { RemoteError, describeError } from './errors.ts';
import type { EditorLauncher } from './editor.ts';
import type { GitTransport } from './git.ts';
import { withInterruptGuard, withWorkingDirectory } from './scratch.ts';
import type { EditOutcome, GistId } from './types.ts';

export const COMMIT_MESSAGE = 'Update gist';

export interface EditSessionDeps {
	git: GitTransport;
	launcher: EditorLauncher;
	confirm: (message: string) => Promise<boolean>;
	onWorkingDirectory?: (dir: string) => void;
}

/** Gists are flat, so the top level of the clone is every file there is. */
function clonedFiles(dir: string): string[] {
	return fs.readdirSync(dir).filter(name => name !== '.git').sort();
}

/**
 * Clone the gist into a scratch directory, hand it to the editor, and push
 * back whatever the user changed once they agree to it.
 *
 * The scratch directory is removed on every way out, Ctrl+C included,
 * except a failed or interrupted push, where it holds the only copy of the
 * user's committed work.
 */
export async function editGist(id: GistId, editor: string, deps: EditSessionDeps): Promise<EditOutcome> {
	return withInterruptGuard<EditOutcome>(guard => withWorkingDirectory<EditOutcome>(async workdir => {
		deps.onWorkingDirectory?.(workdir.path);

		await guard.race(deps.git.clone(id, workdir.path));
		await guard.passThrough(() => deps.launcher.launch(editor, clonedFiles(workdir.path), workdir.path));

		if (!(await guard.race(deps.git.hasChanges(workdir.path)))) {
			return { state: 'no-changes' };
		}

		if (!(await guard.race(deps.confirm(`Push your changes to gist ${id}?`)))) {
			return { state: 'discarded' };
		}

		try {
			await guard.race(deps.git.commit(workdir.path, COMMIT_MESSAGE));
		} catch (error) {
			throw new RemoteError(`Commit failed, changes discarded: ${describeError(error)}`, { cause: error });
		}

		try {
			await guard.race(deps.git.push(workdir.path));
		} catch (error) {
			workdir.keep();
			throw new RemoteError(`Push failed: ${describeError(error)}`, { cause: error, preservedPath: workdir.path });
		}

		return { state: 'pushed' };
	}));
}
