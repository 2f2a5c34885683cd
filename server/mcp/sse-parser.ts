export interface SseEvent {
	event: string;
	data: string;
	id?: string;
}

/**
 * Incremental text/event-stream framing. Feed decoded chunks with `push`,
 * which returns every event completed by that chunk. A chunk may end in the
 * middle of a line; the tail is kept until the next push.
 */
export class SseParser {
	private lineRemainder = "";
	private pendingCarriageReturn = false;
	private eventType: string | null = null;
	private dataLines: string[] = [];
	private lastEventId: string | undefined;

	push(chunk: string): SseEvent[] {
		if (chunk.length === 0) {
			return [];
		}

		let text = chunk;
		// A "\r" ending the previous chunk may be the first half of "\r\n".
		if (this.pendingCarriageReturn) {
			this.pendingCarriageReturn = false;
			if (text.startsWith("\n")) {
				text = text.slice(1);
			}
		}
		text = `${this.lineRemainder}${text}`;
		this.pendingCarriageReturn = text.endsWith("\r");
		const lines = text.split(/\r\n|\r|\n/);
		this.lineRemainder = lines.pop() ?? "";

		const events: SseEvent[] = [];
		for (const line of lines) {
			const event = this.handleLine(line);
			if (event) {
				events.push(event);
			}
		}
		return events;
	}

	/** Dispatch whatever is buffered once the stream has ended. */
	flush(): SseEvent[] {
		const events: SseEvent[] = [];
		const trailing = this.lineRemainder;
		this.lineRemainder = "";
		this.pendingCarriageReturn = false;
		if (trailing.length > 0) {
			this.handleLine(trailing);
		}
		const event = this.dispatch();
		if (event) {
			events.push(event);
		}
		return events;
	}

	private handleLine(line: string): SseEvent | null {
		if (line.length === 0) {
			return this.dispatch();
		}
		if (line.startsWith(":")) {
			return null;
		}

		const colon = line.indexOf(":");
		const field = colon === -1 ? line : line.slice(0, colon);
		let value = colon === -1 ? "" : line.slice(colon + 1);
		if (value.startsWith(" ")) {
			value = value.slice(1);
		}

		switch (field) {
			case "event":
				this.eventType = value;
				break;
			case "data":
				this.dataLines.push(value);
				break;
			case "id":
				this.lastEventId = value;
				break;
			default:
				break;
		}
		return null;
	}

	private dispatch(): SseEvent | null {
		if (this.dataLines.length === 0) {
			this.eventType = null;
			return null;
		}

		const event: SseEvent = {
			event: this.eventType ?? "message",
			data: this.dataLines.join("\n"),
			...(this.lastEventId !== undefined ? { id: this.lastEventId } : {}),
		};
		this.eventType = null;
		this.dataLines = [];
		return event;
	}
}
