import EventEmitter from "eventemitter3";

/**
 * Handler signature per event name. Declare maps as type aliases: interfaces
 * carry no index signature.
 */
export type EventMap = Record<string, (...args: never[]) => void>;

/** Receives the event name and whatever a listener threw. */
export type ListenerErrorHandler = (event: string, error: unknown) => void;

export interface TypedEmitterOptions {
	/** When set, listener failures are reported here instead of reaching the emitter */
	readonly onListenerError?: ListenerErrorHandler;
}

type Listener = (...args: unknown[]) => void;

/**
 * Typed facade over eventemitter3. Listeners run synchronously in
 * registration order.
 *
 * @example
 * ```ts
 * type Events = { block: (height: number) => void };
 * const emitter = new TypedEmitter<Events>({
 *   onListenerError: (event, error) => logger.error({ event, error }, "Listener threw"),
 * });
 * emitter.on("block", (height) => logger.info({ height }, "Block"));
 * emitter.emit("block", 42);
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();
	private readonly onListenerError: ListenerErrorHandler | undefined;

	constructor(options: TypedEmitterOptions = {}) {
		this.onListenerError = options.onListenerError;
	}

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as Listener);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as Listener);
		return this;
	}

	/**
	 * Calls every listener of `event`. Without an `onListenerError` hook a
	 * throwing listener propagates and the rest are not called.
	 * @returns the number of listeners called
	 */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): number {
		const listeners = this.ee.listeners(event);
		for (const listener of listeners) {
			if (this.onListenerError === undefined) {
				listener(...args);
				continue;
			}
			try {
				listener(...args);
			} catch (error: unknown) {
				this.onListenerError(event, error);
			}
		}
		return listeners.length;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
