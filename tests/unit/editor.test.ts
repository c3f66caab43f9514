import { describe, it, expect } from 'vitest';
import { ALTERNATIVES_EDITOR, ProcessEditorLauncher, resolveEditor } from '../../src/editor.ts';
import { ConfigurationError } from '../../src/errors.ts';

describe('resolveEditor', () => {
	const combinations = [true, false].flatMap(alternatives =>
		[true, false].flatMap(environment =>
			[true, false].map(configured => ({ alternatives, environment, configured }))
		)
	);

	it.each(combinations)(
		'alternatives=$alternatives env=$environment config=$configured',
		({ alternatives, environment, configured }) => {
			const sources = {
				exists: (candidate: string) => alternatives && candidate === ALTERNATIVES_EDITOR,
				env: environment ? { EDITOR: 'vim' } : { EDITOR: '   ' },
				config: configured ? { editor: 'emacs -nw' } : {},
			};

			const expected = configured
				? 'emacs -nw'
				: environment
					? 'vim'
					: alternatives
						? ALTERNATIVES_EDITOR
						: undefined;

			if (expected === undefined) {
				expect(() => resolveEditor(sources)).toThrow(ConfigurationError);
			} else {
				expect(resolveEditor(sources)).toBe(expected);
			}
		}
	);

	it('trims surrounding whitespace from $EDITOR', () => {
		expect(resolveEditor({ exists: () => false, env: { EDITOR: '  nano ' }, config: {} })).toBe('nano');
	});

	it('treats a blank configured editor as absent', () => {
		expect(resolveEditor({ exists: () => false, env: { EDITOR: 'vim' }, config: { editor: ' ' } })).toBe('vim');
	});
});

describe('ProcessEditorLauncher', () => {
	const launcher = new ProcessEditorLauncher();

	it('resolves with the exit code of the editor', async () => {
		const code = await launcher.launch(`${process.execPath} -e process.exit(3)`, ['ignored.txt']);
		expect(code).toBe(3);
	});

	it('rejects with a ConfigurationError when the editor cannot be started', async () => {
		await expect(launcher.launch('gist-test-no-such-editor', [])).rejects.toBeInstanceOf(ConfigurationError);
	});

	it('stops ignoring interrupts once the editor has exited', async () => {
		const before = process.listenerCount('SIGINT');
		await launcher.launch(`${process.execPath} -e process.exit(0)`, []);
		expect(process.listenerCount('SIGINT')).toBe(before);
	});
});
