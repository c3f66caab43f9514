import fs from 'fs';
import path from 'path';
import { InputError, describeError } from './errors.ts';
import type { EditorLauncher } from './editor.ts';
import { withScratchFile } from './scratch.ts';
import type { ContentPlan, ContentSource } from './types.ts';

/** Name given to content that arrives without one (stdin, interactive editor). */
export const DEFAULT_FILENAME = 'file1.txt';

/**
 * Piped input wins whenever stdin is not a terminal, even if paths were
 * given; explicit paths are only consulted from an interactive shell.
 */
export function selectContentSource(stdinIsTTY: boolean, paths: string[]): ContentSource {
	if (!stdinIsTTY) return { mode: 'piped' };
	if (paths.length > 0) return { mode: 'files', paths };
	return { mode: 'interactive' };
}

export async function planFromStdin(readStdin: () => Promise<string>): Promise<ContentPlan> {
	try {
		return { [DEFAULT_FILENAME]: await readStdin() };
	} catch (error) {
		throw new InputError(`Unable to read standard input: ${describeError(error)}`, { cause: error });
	}
}

/**
 * Files are keyed by base name. Two paths with the same base name collide
 * and the later one replaces the earlier.
 */
export async function planFromFiles(
	paths: string[],
	readFile: (file: string) => Promise<string> = file => fs.promises.readFile(file, 'utf-8')
): Promise<ContentPlan> {
	const plan: ContentPlan = {};
	for (const filePath of paths) {
		try {
			plan[path.basename(filePath)] = await readFile(filePath);
		} catch (error) {
			throw new InputError(`Unable to read ${filePath}: ${describeError(error)}`, { cause: error });
		}
	}
	return plan;
}

/** Whatever the file holds once the editor exits is the content, even if empty. */
export async function planFromEditor(editor: string, launcher: EditorLauncher): Promise<ContentPlan> {
	return withScratchFile('.txt', async file => {
		await launcher.launch(editor, [file]);
		return { [DEFAULT_FILENAME]: await fs.promises.readFile(file, 'utf-8') };
	});
}

export interface ContentCapabilities {
	readStdin: () => Promise<string>;
	/** Resolved lazily: piped and file-list modes never need an editor. */
	editor: () => string;
	launcher: EditorLauncher;
	readFile?: (file: string) => Promise<string>;
}

export async function resolveContent(source: ContentSource, capabilities: ContentCapabilities): Promise<ContentPlan> {
	switch (source.mode) {
		case 'piped':
			return planFromStdin(capabilities.readStdin);
		case 'files':
			return planFromFiles(source.paths, capabilities.readFile);
		case 'interactive':
			return planFromEditor(capabilities.editor(), capabilities.launcher);
	}
}

export async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
	}
	return Buffer.concat(chunks).toString('utf-8');
}
