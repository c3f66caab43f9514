import { spawn } from 'child_process';
import fs from 'fs';
import { ConfigurationError } from './errors.ts';
import type { GistConfig } from './types.ts';

/** Debian-style system default editor, maintained by update-alternatives. */
export const ALTERNATIVES_EDITOR = '/usr/bin/editor';

export interface EditorSources {
	config: Pick<GistConfig, 'editor'>;
	env: NodeJS.ProcessEnv;
	exists?: (candidate: string) => boolean;
}

function alternativesEditor(exists: (candidate: string) => boolean, fallback?: string): string | undefined {
	return exists(ALTERNATIVES_EDITOR) ? ALTERNATIVES_EDITOR : fallback;
}

function environmentEditor(env: NodeJS.ProcessEnv, fallback?: string): string | undefined {
	const editor = env.EDITOR?.trim();
	return editor ? editor : fallback;
}

function configurationEditor(config: Pick<GistConfig, 'editor'>, fallback?: string): string | undefined {
	const editor = config.editor?.trim();
	return editor ? editor : fallback;
}

/**
 * Pick the editor command. Each stage receives the previous stage's result
 * as its fallback, so the configuration file overrides `$EDITOR`, which
 * overrides the system alternatives editor.
 */
export function resolveEditor({ config, env, exists = fs.existsSync }: EditorSources): string {
	const editor = configurationEditor(config, environmentEditor(env, alternativesEditor(exists)));
	if (!editor) {
		throw new ConfigurationError(
			`No editor available: set $EDITOR or add "editor" under [gist] in the configuration file`
		);
	}
	return editor;
}

export interface EditorLauncher {
	/**
	 * Run the editor in the foreground and wait for it to exit.
	 *
	 * @returns the editor's exit code, or null when it was killed by a signal
	 */
	launch(editor: string, args: string[], cwd?: string): Promise<number | null>;
}

export class ProcessEditorLauncher implements EditorLauncher {
	launch(editor: string, args: string[], cwd?: string): Promise<number | null> {
		// "code --wait" and friends carry their own flags
		const [command, ...flags] = editor.trim().split(/\s+/);

		// The editor owns the terminal; Ctrl+C is its business, and we must
		// live long enough to clean up after it.
		const ignoreInterrupt = (): void => {};
		process.on('SIGINT', ignoreInterrupt);

		return new Promise<number | null>((resolve, reject) => {
			const child = spawn(command, [...flags, ...args], { cwd, stdio: 'inherit' });

			child.on('exit', code => resolve(code));
			child.on('error', error => {
				reject(new ConfigurationError(`Failed to launch editor "${editor}": ${error.message}`, { cause: error }));
			});
		}).finally(() => {
			process.off('SIGINT', ignoreInterrupt);
		});
	}
}
