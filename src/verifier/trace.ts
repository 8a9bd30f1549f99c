export type Trace = TraceBranch | TraceDetails;

export type TraceDetails = {
	tag: "trace-details",
	title: string | unknown[],
	details: string | null,
	time: number,
};

export type TraceBranch = {
	tag: "trace-branch",
	title: string | unknown[],
	start: number,
	end: null | number,
	children: Trace[],
};

export class Stopwatch {
	state: {
		tag: "paused",
		runForMs: number,
	} | {
		tag: "playing",
		runForMs: number,
		playedAtMs: number,
	};

	constructor(private internalClock: () => number) {
		this.state = {
			tag: "playing",
			runForMs: 0,
			playedAtMs: internalClock(),
		};
	}

	resume() {
		if (this.state.tag === "playing") {
			return;
		}
		this.state = {
			tag: "playing",
			runForMs: this.state.runForMs,
			playedAtMs: this.internalClock(),
		};
	}

	pause() {
		if (this.state.tag === "paused") {
			return;
		}
		const now = this.internalClock();
		this.state = {
			tag: "paused",
			runForMs: this.state.runForMs + now - this.state.playedAtMs,
		};
	}

	measureMs(): number {
		if (this.state.tag === "paused") {
			return this.state.runForMs;
		} else {
			const now = this.internalClock();
			return this.state.runForMs + now - this.state.playedAtMs;
		}
	}
}

/**
 * `Tracer` records a tree of timed spans. Each verification pass owns its
 * own tracer; nothing is recorded globally.
 */
export interface Tracer {
	start(title: string | unknown[]): void;
	stop(title?: string): void;

	/// `details` is only invoked when the tracer records details, since
	/// rendering them can be slow.
	mark(title: string | unknown[], details?: () => string): void;
}

/// `NO_TRACE` discards everything.
export const NO_TRACE: Tracer = {
	start() { },
	stop() { },
	mark() { },
};

export class TraceRecorder implements Tracer {
	private readonly stopwatch: Stopwatch;
	private readonly root: TraceBranch;
	private readonly active: TraceBranch[];

	/// `detailed` controls whether `mark` evaluates its details.
	constructor(
		title: string,
		private readonly detailed = false,
		clock: () => number = () => performance.now(),
	) {
		this.stopwatch = new Stopwatch(clock);
		this.root = {
			tag: "trace-branch",
			title,
			start: this.stopwatch.measureMs(),
			end: null,
			children: [],
		};
		this.active = [this.root];
	}

	private top(): TraceBranch {
		return this.active[this.active.length - 1];
	}

	start(title: string | unknown[]): void {
		const e: TraceBranch = {
			tag: "trace-branch",
			title,
			start: this.stopwatch.measureMs(),
			end: null,
			children: [],
		};
		this.top().children.push(e);
		this.active.push(e);
	}

	mark(title: string | unknown[], details?: () => string): void {
		// Time spent rendering details is not attributed to the span.
		this.stopwatch.pause();
		this.top().children.push({
			tag: "trace-details",
			title,
			details: details
				? (this.detailed ? details() : "(details skipped)")
				: null,
			time: this.stopwatch.measureMs(),
		});
		this.stopwatch.resume();
	}

	stop(title?: string): void {
		const closing = this.top();
		if (title !== undefined && title !== closing.title) {
			throw new Error("mismatched stack:\n\t" + JSON.stringify(title) + "\n\t!=\n\t" + JSON.stringify(closing.title));
		} else if (this.active.length === 1) {
			throw new Error("mismatched stack:\n\tno stack open for\n\t" + JSON.stringify(title));
		}
		closing.end = this.stopwatch.measureMs();
		this.active.pop();
	}

	publish(): TraceBranch {
		this.root.end = this.stopwatch.measureMs();
		return this.root;
	}
}

function showTitle(title: string | unknown[]): string {
	if (typeof title === "string") {
		return title;
	}
	return title.map(x => typeof x === "string" ? x : typeof x === "bigint" ? x.toString() : JSON.stringify(x)).join(" ");
}

/**
 * `renderText(tree)` renders a published trace as indented lines, one per
 * span or mark, with each span's duration in milliseconds.
 */
export function renderText(tree: Trace, indent = ""): string[] {
	if (tree.tag === "trace-details") {
		const lines = [indent + "- " + showTitle(tree.title)];
		if (tree.details !== null) {
			for (const line of tree.details.split("\n")) {
				lines.push(indent + "    " + line);
			}
		}
		return lines;
	}

	const elapsed = tree.end === null ? "..." : (tree.end - tree.start).toFixed(1) + " ms";
	const lines = [indent + showTitle(tree.title) + " (" + elapsed + ")"];
	for (const child of tree.children) {
		lines.push(...renderText(child, indent + "\t"));
	}
	return lines;
}
