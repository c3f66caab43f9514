import tmp from 'tmp';
import { InterruptedError } from './errors.ts';

export interface WorkingDirectory {
	readonly path: string;
	/** Leave the directory on disk when the scope exits. */
	keep(): void;
}

/**
 * Run `task` inside a fresh temporary directory that is removed when the
 * task settles, whichever way it settles, unless the task called `keep()`.
 */
export async function withWorkingDirectory<T>(task: (dir: WorkingDirectory) => Promise<T>): Promise<T> {
	const { name, removeCallback } = tmp.dirSync({ prefix: 'gist-', unsafeCleanup: true });
	let kept = false;

	try {
		return await task({
			path: name,
			keep: () => {
				kept = true;
			},
		});
	} finally {
		if (!kept) {
			removeCallback();
		}
	}
}

/** Run `task` against an empty temporary file that is removed afterwards. */
export async function withScratchFile<T>(postfix: string, task: (file: string) => Promise<T>): Promise<T> {
	const { name, removeCallback } = tmp.fileSync({ prefix: 'gist-', postfix, discardDescriptor: true });

	try {
		return await task(name);
	} finally {
		removeCallback();
	}
}

export interface SignalSource {
	on(event: 'SIGINT', listener: () => void): unknown;
	off(event: 'SIGINT', listener: () => void): unknown;
}

export interface InterruptGuard {
	/** Settle with `task`, or reject with InterruptedError on the first SIGINT. */
	race<T>(task: Promise<T>): Promise<Awaited<T>>;
	/** Run a foreground child that owns the terminal; interrupts are its business meanwhile. */
	passThrough<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * Keep SIGINT from killing the process for as long as `task` runs, turning
 * it into a rejection of whatever step is being raced so that enclosing
 * `finally` blocks still get to run.
 */
export async function withInterruptGuard<T>(
	task: (guard: InterruptGuard) => Promise<T>,
	signals: SignalSource = process
): Promise<T> {
	const pending = new Set<(error: InterruptedError) => void>();
	let interrupted = false;
	let delegated = 0;

	const onInterrupt = (): void => {
		if (delegated > 0) return;
		interrupted = true;
		for (const reject of pending) {
			reject(new InterruptedError());
		}
	};

	const guard: InterruptGuard = {
		race: <R>(step: Promise<R>) => {
			if (interrupted) return Promise.reject(new InterruptedError());

			let settle = (): void => {};
			const interruption = new Promise<never>((_resolve, reject) => {
				pending.add(reject);
				settle = () => {
					pending.delete(reject);
				};
			});
			return Promise.race([step, interruption]).finally(settle);
		},
		passThrough: async <R>(step: () => Promise<R>) => {
			delegated++;
			try {
				return await step();
			} finally {
				delegated--;
			}
		},
	};

	signals.on('SIGINT', onInterrupt);
	try {
		return await task(guard);
	} finally {
		signals.off('SIGINT', onInterrupt);
	}
}
