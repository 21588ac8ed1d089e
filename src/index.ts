/**
 * failover-link
 *
 * Client-side reconnection and failover for messaging connections: cycles
 * through an original address, a failover list and an optional sticky
 * address, with exponential backoff and options that can change while the
 * connection is running.
 *
 * @example
 * ```ts
 * import { Container } from "failover-link";
 *
 * const container = new Container({
 *   hooks: {
 *     onOpen: (connection, reconnected) => {
 *       console.log(`open on ${connection.url}`, { reconnected });
 *     },
 *     onTransportError: (connection, error) => {
 *       if (error.code === "authentication_failed") connection.close();
 *     },
 *   },
 * });
 *
 * container.connect("amqp://primary:5672", {
 *   failoverUrls: ["amqp://backup-1:5672", "amqp://backup-2:5672"],
 *   reconnect: { initialDelay: 100, maxDelay: 5000 },
 *   user: "guest",
 * });
 *
 * await container.run();
 * ```
 */

// Adapters
export {
	classifyWebSocketError,
	createWebSocketTransport,
	type WebSocketTransportOptions,
} from "./adapters/index.js";
// Candidates
export { type CandidateConfig, CandidateList } from "./candidates.js";
// Connections
export {
	Connection,
	type EngineState,
	ReconnectEngine,
} from "./connection/index.js";
export { Container, type ContainerOptions } from "./container.js";
// Errors
export {
	AddressUnreachableError,
	AuthenticationError,
	BarrierError,
	ContainerStoppedError,
	InvalidOptionsError,
	InvalidTargetError,
	LinkError,
	type LinkErrorCode,
	LinkErrorCodes,
	LocalAbortError,
	NotConnectedError,
	PeerRefusedError,
	PolicyExhaustedError,
	ProtocolNegotiationError,
	type RemoteCondition,
} from "./errors.js";
// Options
export {
	type ConnectionOptionValues,
	ConnectionOptions,
	type ConnectionOptionsInit,
	ConnectionOptionsSchema,
	type OptionField,
} from "./options.js";
// Scheduling
export {
	type IScheduler,
	type ScheduledTask,
	TimerScheduler,
} from "./scheduler.js";
// Targets
export {
	type ConnectionTarget,
	formatTarget,
	parseTarget,
	sameTarget,
} from "./target.js";
// Core types
export {
	type ConnectionHooks,
	type ContainerHooks,
	type ITransport,
	type IWebSocket,
	type TransportFactory,
	type TransportSettings,
	type TransportSink,
	type WebSocketOptions,
	WebSocketReadyState,
} from "./types.js";
// Utilities
export {
	CountdownBarrier,
	calculateReconnectDelay,
	createLogger,
	defaultReconnectOptions,
	type Logger,
	type LogLevel,
	type ReconnectOptions,
	ReconnectPolicy,
	silentLogger,
} from "./utils/index.js";
