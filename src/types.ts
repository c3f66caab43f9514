export type GistId = string;

export interface GistSummary {
	id: GistId;
	public: boolean;
	description?: string;
}

/** filename → content, as submitted by `create`. */
export type ContentPlan = Record<string, string>;

export interface GistConfig {
	token?: string;
	editor?: string;
	/** Path of the configuration file the values were read from. */
	source: string;
}

export interface CreatedGist {
	id: GistId;
	url: string;
}

export type ContentSource =
	| { mode: 'piped' }
	| { mode: 'files'; paths: string[] }
	| { mode: 'interactive' };

export type EditOutcome =
	| { state: 'no-changes' }
	| { state: 'discarded' }
	| { state: 'pushed' };
