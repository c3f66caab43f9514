import { ConfigManager, requireToken } from './config.ts';
import { resolveEditor } from './editor.ts';
import { GistManager, type GistApi } from './gist-manager.ts';
import type { GistConfig } from './types.ts';

/** Everything a command may consult about its surroundings, fixed at startup. */
export interface GistContext {
	readonly config: Readonly<GistConfig>;
	readonly env: NodeJS.ProcessEnv;
	readonly cwd: string;
	readonly verbose: boolean;
}

export function createContext(verbose: boolean, manager: ConfigManager = new ConfigManager()): GistContext {
	return Object.freeze({
		config: Object.freeze(manager.load()),
		env: process.env,
		cwd: process.cwd(),
		verbose,
	});
}

export function editorFor(context: GistContext): string {
	return resolveEditor({ config: context.config, env: context.env });
}

export function apiFor(context: GistContext): GistApi {
	return new GistManager(requireToken(context.config));
}
