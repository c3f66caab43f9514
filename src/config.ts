import fs from 'fs';
import path from 'path';
import os from 'os';
import { parse } from 'ini';
import { ConfigurationError, describeError } from './errors.ts';
import type { GistConfig } from './types.ts';

export interface ConfigLocation {
	home: string;
	env: NodeJS.ProcessEnv;
}

export class ConfigManager {
	private readonly location: ConfigLocation;

	constructor(location: ConfigLocation = { home: os.homedir(), env: process.env }) {
		this.location = location;
	}

	/** Candidate files in lookup order; the first one that exists is used. */
	public candidatePaths(): string[] {
		const { home, env } = this.location;
		const configHome = env.XDG_CONFIG_HOME || path.join(home, '.config');
		const dataHome = env.XDG_DATA_HOME || path.join(home, '.local', 'share');
		return [
			path.join(home, '.gist'),
			path.join(configHome, 'gist'),
			path.join(dataHome, 'gist'),
		];
	}

	public locate(): string | undefined {
		return this.candidatePaths().find(candidate => fs.existsSync(candidate));
	}

	public load(): GistConfig {
		const configPath = this.locate();
		if (!configPath) {
			throw new ConfigurationError(
				`No configuration file found. Create one of: ${this.candidatePaths().join(', ')}`
			);
		}

		let text: string;
		try {
			text = fs.readFileSync(configPath, 'utf-8');
		} catch (error) {
			throw new ConfigurationError(`Unable to read configuration file ${configPath}: ${describeError(error)}`, { cause: error });
		}

		return { ...readGistSection(parse(text)), source: configPath };
	}
}

function readGistSection(parsed: Record<string, unknown>): Omit<GistConfig, 'source'> {
	const section = parsed.gist;
	if (typeof section !== 'object' || section === null) {
		return {};
	}

	const values = new Map(Object.entries(section));
	return {
		token: nonBlank(values.get('token')),
		editor: nonBlank(values.get('editor')),
	};
}

function nonBlank(value: unknown): string | undefined {
	if (typeof value !== 'string') return undefined;
	const trimmed = value.trim();
	return trimmed === '' ? undefined : trimmed;
}

export function requireToken(config: GistConfig): string {
	if (!config.token) {
		throw new ConfigurationError(`No token configured: add "token" under [gist] in ${config.source}`);
	}
	return config.token;
}
