#!/usr/bin/env tsx

import { Command } from 'commander';
import inquirer from 'inquirer';
import chalk from 'chalk';
import fs from 'fs';
import { archiveGist } from './archive.ts';
import { readStream, resolveContent, selectContentSource } from './content.ts';
import { apiFor, createContext, editorFor, type GistContext } from './context.ts';
import { editGist } from './edit-session.ts';
import { ProcessEditorLauncher } from './editor.ts';
import { RemoteError, describeError } from './errors.ts';
import { elide, formatContent, formatSummary, terminalWidth } from './format.ts';
import { GitCli } from './git.ts';

function readVersion(): string {
	const manifest: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
	if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
		return manifest.version;
	}
	return 'unknown';
}

const VERSION = readVersion();
const program = new Command();

function context(): GistContext {
	const ctx = createContext(program.opts<{ verbose?: boolean }>().verbose ?? false);
	debug(ctx, `Using configuration ${ctx.config.source}`);
	return ctx;
}

function debug(ctx: GistContext, message: string): void {
	if (ctx.verbose) {
		console.error(chalk.gray(message));
	}
}

async function confirm(message: string): Promise<boolean> {
	const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
		{
			type: 'confirm',
			name: 'confirmed',
			message,
			default: true
		}
	]);
	return confirmed;
}

program
	.name('gist')
	.description('Command-line client for GitHub Gists')
	.version(VERSION)
	.option('-v, --verbose', 'Print diagnostic details to stderr');

program
	.command('list')
	.description('List your gists')
	.action(async () => {
		const gists = await apiFor(context()).list();
		const width = terminalWidth();
		for (const gist of gists) {
			console.log(elide(formatSummary(gist), width));
		}
	});

program
	.command('edit <id>')
	.description('Clone a gist, open it in your editor and push the changes back')
	.action(async (id: string) => {
		const ctx = context();
		const editor = editorFor(ctx);
		debug(ctx, `Using editor ${editor}`);

		const outcome = await editGist(id, editor, {
			git: new GitCli(),
			launcher: new ProcessEditorLauncher(),
			confirm,
			onWorkingDirectory: dir => debug(ctx, `Working directory ${dir}`)
		});

		switch (outcome.state) {
			case 'no-changes':
				console.log(chalk.yellow('No changes made.'));
				break;
			case 'discarded':
				console.log(chalk.yellow('Changes discarded.'));
				break;
			case 'pushed':
				console.log(chalk.green(`Gist ${id} updated.`));
				break;
		}
	});

program
	.command('info <id>')
	.description('Print the full metadata of a gist as JSON')
	.action(async (id: string) => {
		const info = await apiFor(context()).info(id);
		console.log(JSON.stringify(info, null, 2));
	});

program
	.command('fork <id>')
	.description('Fork a gist and print the id of the fork')
	.action(async (id: string) => {
		console.log(await apiFor(context()).fork(id));
	});

program
	.command('files <id>')
	.description('List the files of a gist')
	.action(async (id: string) => {
		const files = await apiFor(context()).files(id);
		files.forEach(file => console.log(file));
	});

program
	.command('delete <id>')
	.description('Delete a gist')
	.action(async (id: string) => {
		await apiFor(context()).delete(id);
		console.log(chalk.green(`Gist ${id} deleted.`));
	});

program
	.command('archive <id>')
	.description('Download a gist as <id>.tar.gz into the current directory')
	.action(async (id: string) => {
		const ctx = context();
		const archivePath = await archiveGist(id, apiFor(ctx), {
			destination: ctx.cwd,
			onWorkingDirectory: dir => debug(ctx, `Working directory ${dir}`)
		});
		console.log(chalk.green(`Archive written to ${archivePath}`));
	});

program
	.command('content <id>')
	.description('Print the content of every file in a gist')
	.action(async (id: string) => {
		process.stdout.write(formatContent(await apiFor(context()).content(id)));
	});

program
	.command('create <description> [files...]')
	.description('Create a gist from stdin, from files, or from your editor')
	.option('-p, --public', 'Make the gist public', false)
	.action(async (description: string, files: string[], options: { public: boolean }) => {
		const ctx = context();
		const api = apiFor(ctx);

		const source = selectContentSource(Boolean(process.stdin.isTTY), files);
		if (source.mode === 'piped' && files.length > 0) {
			console.error(chalk.yellow(`Reading from stdin; ignoring ${files.join(', ')}`));
		}

		const plan = await resolveContent(source, {
			readStdin: () => readStream(process.stdin),
			editor: () => {
				const editor = editorFor(ctx);
				debug(ctx, `Using editor ${editor}`);
				return editor;
			},
			launcher: new ProcessEditorLauncher()
		});

		const created = await api.create(description, plan, options.public);
		console.log(created.url || created.id);
	});

program
	.command('clone <id> [name]')
	.description('Clone a gist into ./<name> (default: ./<id>)')
	.action(async (id: string, name: string | undefined) => {
		const ctx = context();
		const target = name ?? id;
		await new GitCli().clone(id, target, ctx.cwd);
		console.log(chalk.green(`Cloned gist ${id} into ${target}`));
	});

program
	.command('version')
	.description('Print the version')
	.action(() => {
		console.log(VERSION);
	});

program.parseAsync().catch((error: unknown) => {
	console.error(chalk.red(`Error: ${describeError(error)}`));
	if (error instanceof RemoteError && error.preservedPath) {
		console.error(chalk.yellow(`Your committed changes are kept in ${error.preservedPath}; run "git push" there to retry.`));
	}
	process.exit(1);
});
