/**
 * Connection Exports
 */

export { Connection } from "./connection.js";
export {
	type EngineContext,
	type EngineState,
	ReconnectEngine,
} from "./engine.js";
