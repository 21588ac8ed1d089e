/**
 * Adapter Exports
 */

export {
	classifyWebSocketError,
	createWebSocketTransport,
	handshakeHeaders,
	toWebSocketUrl,
	type WebSocketTransportOptions,
} from "./websocket.js";
