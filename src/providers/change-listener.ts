import { HubConnectionBuilder } from "@microsoft/signalr";

export type ListenerConnection = {
	start(): Promise<void>;
	stop(): Promise<void>;
	invoke(methodName: string, ...args: unknown[]): Promise<unknown>;
	on(methodName: string, handler: (...args: unknown[]) => void): void;
	onclose(callback: (error?: Error) => void): void;
	onreconnected(callback: (connectionId?: string) => void): void;
};

export type ChangeListenerOptions = {
	hubEndpoint: string;
	channel: string;
	retryDelay?: number;
	connect?: (hubEndpoint: string) => ListenerConnection;
};

export type ChangeListener = {
	start(): void;
	stop(): Promise<void>;
};

export function logChangeMessage(channel: string, payload: unknown) {
	console.log(`|> Change notification on '${channel}':`, payload);
}

function connectHub(hubEndpoint: string): ListenerConnection {
	return new HubConnectionBuilder()
		.withAutomaticReconnect({ nextRetryDelayInMilliseconds: () => 10_000 })
		.withKeepAliveInterval(10_000)
		.withServerTimeout(30_000)
		.withUrl(hubEndpoint)
		.build();
}

// Nothing thrown here reaches the caller: every failure is logged and retried on a timer.
export function createChangeListener(
	{ hubEndpoint, channel, retryDelay = 10_000, connect = connectHub }: ChangeListenerOptions,
	onMessage: (channel: string, payload: unknown) => void = logChangeMessage,
): ChangeListener {
	let connection: ListenerConnection | undefined;
	let retryTimer: NodeJS.Timeout | undefined;
	let stopped = false;

	const join = async () => {
		if (typeof connection !== "undefined") await connection.invoke("Join", channel);
	};

	const scheduleRetry = () => {
		if (stopped || typeof retryTimer !== "undefined") return;
		retryTimer = setTimeout(() => {
			retryTimer = undefined;
			void open();
		}, retryDelay);
	};

	const open = async () => {
		let current: ListenerConnection | undefined;
		try {
			current = connect(hubEndpoint);
			connection = current;

			current.on("dataReceived", (payload: unknown) => {
				try {
					onMessage(channel, payload);
				} catch (cause) {
					console.error(new Error("An error occurred in the change notification handler.", { cause }));
				}
			});
			current.onreconnected(() =>
				join().catch((cause) => console.error(new Error(`Unable to rejoin channel '${channel}'.`, { cause }))),
			);
			const opened = current;
			current.onclose((error) => {
				if (stopped || connection !== opened) return;
				console.error("|> Change listener connection closed, reconnecting:", error);
				scheduleRetry();
			});

			await current.start();
			await join();
			console.log(`|> Listening for change notifications on '${channel}'.`);
		} catch (cause) {
			console.error(new Error("Unable to connect to the change notification hub.", { cause }));
			// A connection that started but could not join is closed before the next attempt opens another one.
			if (typeof current !== "undefined") {
				if (connection === current) connection = undefined;
				await current
					.stop()
					.catch((error) => console.error(new Error("Unable to close the change listener connection.", { cause: error })));
			}
			scheduleRetry();
		}
	};

	return {
		start() {
			stopped = false;
			void open();
		},
		async stop() {
			stopped = true;
			clearTimeout(retryTimer);
			retryTimer = undefined;
			await connection?.stop();
		},
	};
}
