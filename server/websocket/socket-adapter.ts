import type { RawData, WebSocket } from "ws";

/** The slice of a socket the registry needs to deliver and drop. */
export interface ClientSocket {
	send(payload: string, callback: (error?: Error) => void): void;
	close(code?: number, reason?: string): void;
}

/** A socket the connection handler can also listen on. */
export interface RelaySocket extends ClientSocket {
	onMessage(listener: (text: string) => void): void;
	onClose(listener: () => void): void;
	onError(listener: (error: Error) => void): void;
}

function rawDataToString(data: RawData): string {
	if (Array.isArray(data)) {
		return Buffer.concat(data).toString("utf-8");
	}
	if (Buffer.isBuffer(data)) {
		return data.toString("utf-8");
	}
	return Buffer.from(data).toString("utf-8");
}

export function adaptWebSocket(socket: WebSocket): RelaySocket {
	return {
		send(payload, callback) {
			socket.send(payload, callback);
		},
		close(code, reason) {
			socket.close(code, reason);
		},
		onMessage(listener) {
			socket.on("message", (data: RawData) => {
				listener(rawDataToString(data));
			});
		},
		onClose(listener) {
			socket.on("close", () => listener());
		},
		onError(listener) {
			socket.on("error", (error: Error) => listener(error));
		},
	};
}
