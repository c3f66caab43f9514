import type { GistSummary } from './types.ts';

const ELLIPSIS = '...';

/**
 * Cut `text` to at most `width` characters, ending in "..." when something
 * was cut. An undefined width (no terminal) leaves the text alone; widths
 * narrower than the ellipsis get as much of the ellipsis as fits.
 */
export function elide(text: string, width?: number): string {
	if (width === undefined || text.length <= width) return text;
	if (width < ELLIPSIS.length) return ELLIPSIS.slice(0, Math.max(width, 0));
	return text.slice(0, width - ELLIPSIS.length) + ELLIPSIS;
}

export function terminalWidth(stream: { isTTY?: boolean; columns?: number } = process.stdout): number | undefined {
	return stream.isTTY ? stream.columns : undefined;
}

export function formatSummary(gist: GistSummary): string {
	return `${gist.id} ${gist.public ? '+' : '-'} ${gist.description ?? ''}`.trimEnd();
}

export function formatContent(files: Record<string, string>): string {
	return Object.entries(files)
		.map(([name, content]) => `${name}:\n${content}\n`)
		.join('\n');
}
