import type { ServerMessage } from "../../shared/protocol";
import type { CurrentSessionResponse } from "../../shared/types";

export type ConnectionState =
	| "disconnected"
	| "connecting"
	| "connected"
	| "polling";

/** Everything a transport can tell the reconciler. */
export type TransportEvent =
	| { kind: "state"; state: ConnectionState }
	| { kind: "message"; message: ServerMessage }
	| { kind: "session"; session: CurrentSessionResponse }
	| { kind: "no_session" }
	| { kind: "exhausted" };

/** A strategy that learns about session changes and reports them. */
export interface SessionChangeNotifier {
	start(): void;
	stop(): void;
}
