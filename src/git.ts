import { spawn } from 'child_process';
import { RemoteError } from './errors.ts';
import type { GistId } from './types.ts';

export function remoteUrl(id: GistId): string {
	return `git@gist.github.com:${id}.git`;
}

export interface GitTransport {
	clone(id: GistId, target: string, cwd?: string): Promise<void>;
	/** True when the work tree differs from HEAD: edits, additions or deletions. */
	hasChanges(dir: string): Promise<boolean>;
	commit(dir: string, message: string): Promise<void>;
	push(dir: string): Promise<void>;
}

export class GitCli implements GitTransport {
	private readonly executable: string;

	constructor(executable = 'git') {
		this.executable = executable;
	}

	public async clone(id: GistId, target: string, cwd?: string): Promise<void> {
		await this.run(['clone', '--quiet', remoteUrl(id), target], cwd);
	}

	public async hasChanges(dir: string): Promise<boolean> {
		const status = await this.run(['status', '--porcelain'], dir);
		return status.trim().length > 0;
	}

	public async commit(dir: string, message: string): Promise<void> {
		await this.run(['add', '--all'], dir);
		await this.run(['commit', '--quiet', '-m', message], dir);
	}

	public async push(dir: string): Promise<void> {
		await this.run(['push', '--quiet'], dir);
	}

	private run(args: string[], cwd?: string): Promise<string> {
		return new Promise((resolve, reject) => {
			// stdin stays attached so ssh can ask for a passphrase
			const child = spawn(this.executable, args, { cwd, stdio: ['inherit', 'pipe', 'pipe'] });
			let stdout = '';
			let stderr = '';

			child.stdout.on('data', (data: Buffer) => {
				stdout += data.toString();
			});
			child.stderr.on('data', (data: Buffer) => {
				stderr += data.toString();
			});

			child.on('error', error => {
				reject(new RemoteError(`Failed to run ${this.executable}: ${error.message}`, { cause: error }));
			});
			child.on('close', code => {
				if (code === 0) {
					resolve(stdout);
				} else {
					reject(new RemoteError(`git ${args[0]} failed (exit ${code}): ${stderr.trim()}`));
				}
			});
		});
	}
}
