import EventEmitter from "eventemitter3";

/**
 * A broadcast-once signal telling the workers of a batch to finish.
 *
 * It moves from unset to set exactly once and never back. The owning
 * coordinator is the only writer; workers only read or wait on it.
 */
export class TerminationSignal {
	private readonly emitter = new EventEmitter<{ set: [] }>();
	private _isSet = false;

	get isSet(): boolean {
		return this._isSet;
	}

	/**
	 * Set the signal and wake every waiter. Calling it again has no effect.
	 */
	set(): void {
		if (this._isSet) return;
		this._isSet = true;
		this.emitter.emit("set");
		this.emitter.removeAllListeners();
	}

	/**
	 * Wait until the signal is set or `timeoutMs` elapses, whichever comes first.
	 *
	 * @returns true if the signal is set, false on timeout
	 */
	wait(timeoutMs?: number): Promise<boolean> {
		if (this._isSet) return Promise.resolve(true);

		return new Promise((resolve) => {
			let timer: ReturnType<typeof setTimeout> | null = null;
			const onSet = () => {
				if (timer) clearTimeout(timer);
				resolve(true);
			};

			if (timeoutMs !== undefined) {
				timer = setTimeout(() => {
					this.emitter.off("set", onSet);
					resolve(false);
				}, timeoutMs);
			}
			this.emitter.once("set", onSet);
		});
	}
}
