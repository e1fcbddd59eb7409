export interface ThinkSegment {
	kind: "delta" | "thinking";
	text: string;
}

/**
 * Length of the longest suffix of `text` that is a proper prefix of `tag`.
 */
function partialTagLength(text: string, tag: string): number {
	for (let len = Math.min(tag.length - 1, text.length); len > 0; len--) {
		if (text.endsWith(tag.slice(0, len))) return len;
	}
	return 0;
}

/**
 * Splits streamed text into visible and thinking segments on `<think>…</think>`
 * tags, including tags that arrive split across chunks ("<th" + "ink>").
 *
 * Only a possible partial tag is held back between pushes, so the buffer never
 * grows past the tag length.
 */
export class ThinkTagParser {
	private _buffer = "";
	private _inThinking = false;

	constructor(
		private readonly _openTag = "<think>",
		private readonly _closeTag = "</think>",
	) {}

	get inThinking(): boolean {
		return this._inThinking;
	}

	push(text: string): ThinkSegment[] {
		const segments: ThinkSegment[] = [];
		this._buffer += text;

		for (;;) {
			const tag = this._inThinking ? this._closeTag : this._openTag;
			const index = this._buffer.indexOf(tag);
			if (index === -1) break;

			this._emit(segments, this._buffer.slice(0, index));
			this._buffer = this._buffer.slice(index + tag.length);
			this._inThinking = !this._inThinking;
		}

		const tag = this._inThinking ? this._closeTag : this._openTag;
		const held = partialTagLength(this._buffer, tag);
		this._emit(segments, this._buffer.slice(0, this._buffer.length - held));
		this._buffer = this._buffer.slice(this._buffer.length - held);

		return segments;
	}

	flush(): ThinkSegment[] {
		const segments: ThinkSegment[] = [];
		this._emit(segments, this._buffer);
		this._buffer = "";
		return segments;
	}

	private _emit(segments: ThinkSegment[], text: string): void {
		if (!text) return;
		segments.push({ kind: this._inThinking ? "thinking" : "delta", text });
	}
}
