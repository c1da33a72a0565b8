import type { ChildProcess } from "node:child_process";
import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { vi } from "vitest";

export type FakeRun = {
	stdout?: Array<string | Buffer>;
	stderr?: Array<string | Buffer>;
	exitCode?: number | null;
	signal?: NodeJS.Signals | null;
	launchError?: Error;
	/** Fails the stdout pipe after the scripted output instead of ending it. */
	stdoutError?: Error;
};

class FakeChild extends EventEmitter {
	readonly stdout = new PassThrough();
	readonly stderr = new PassThrough();
}

/**
 * In-process stand-in for child_process.spawn. The scripted output is
 * written on the next turn of the event loop, after the caller has wired
 * its listeners, and "exit" follows once both pipes have ended.
 */
export function fakeSpawn(run: FakeRun) {
	return vi.fn(
		(_command: string, _args: readonly string[], _options: unknown) => {
			const child = new FakeChild();

			setImmediate(() => {
				if (run.launchError) {
					child.emit("error", run.launchError);
					child.stdout.end();
					child.stderr.end();
					return;
				}

				child.emit("spawn");
				for (const chunk of run.stdout ?? []) {
					child.stdout.write(chunk);
				}
				for (const chunk of run.stderr ?? []) {
					child.stderr.write(chunk);
				}
				if (!run.stdoutError) {
					child.stdout.end();
				}
				child.stderr.end();
				setImmediate(() => {
					if (run.stdoutError) {
						child.stdout.destroy(run.stdoutError);
					}
					child.emit("exit", run.exitCode ?? 0, run.signal ?? null);
				});
			});

			return child as unknown as ChildProcess;
		},
	);
}
