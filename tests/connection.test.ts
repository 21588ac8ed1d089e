import { afterEach, beforeEach, describe, vi } from "vitest";
import { Container } from "../src/container.js";
import type { Connection } from "../src/connection/connection.js";
import {
	AddressUnreachableError,
	AuthenticationError,
	LocalAbortError,
	NotConnectedError,
	PeerRefusedError,
	PolicyExhaustedError,
} from "../src/errors.js";
import type { ConnectionOptionsInit } from "../src/options.js";
import type { ContainerHooks, TransportFactory } from "../src/types.js";
import { silentLogger } from "../src/utils/logger.js";
import { type FakeTransport, FakeNetwork } from "./fixtures/fake-network.js";

describe("Connection", () => {
	let network: FakeNetwork;

	beforeEach(() => {
		vi.useFakeTimers();
		network = new FakeNetwork();
	});

	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	function createContainer(
		hooks: ContainerHooks = {},
		transport: TransportFactory = network.transport,
	) {
		return new Container({ transport, logger: silentLogger, hooks });
	}

	/**
	 * Connect to hostA and let the first attempt start
	 */
	function connect(
		options?: ConnectionOptionsInit,
		hooks: ContainerHooks = {},
	): { container: Container; conn: Connection } {
		const container = createContainer(hooks);
		const conn = container.connect("hostA", options);
		vi.runOnlyPendingTimers();
		return { container, conn };
	}

	function current(): FakeTransport {
		const transport = network.last;
		if (!transport) throw new Error("No attempt has been made");
		return transport;
	}

	describe("opening", (it) => {
		it("should start in connecting and attempt on the next tick", ({
			expect,
		}) => {
			const container = createContainer();
			const conn = container.connect("hostA");

			expect(conn.state).toBe("connecting");
			expect(network.attempts).toHaveLength(0);

			vi.runOnlyPendingTimers();
			expect(network.hosts).toEqual(["hostA"]);
		});

		it("should report the first open as not reconnected", ({ expect }) => {
			const onOpen = vi.fn();
			const { conn } = connect(undefined, { onOpen });

			current().simulateOpen();

			expect(conn.state).toBe("open");
			expect(conn.isOpen).toBe(true);
			expect(conn.reconnected).toBe(false);
			expect(conn.url).toBe("hostA");
			expect(onOpen).toHaveBeenCalledExactlyOnceWith(conn, false);
		});

		it("should throw for the url before any transport opened", ({
			expect,
		}) => {
			const { conn } = connect();

			expect(() => conn.url).toThrow(NotConnectedError);
			expect(conn.target?.host).toBe("hostA");
		});

		it("should pass connection settings to the transport", ({ expect }) => {
			const { container } = connect({
				user: "user0",
				password: "test-secret",
				virtualHost: "vhost",
				idleTimeout: 30000,
			});

			const { settings } = current();
			expect(settings.user).toBe("user0");
			expect(settings.password).toBe("test-secret");
			expect(settings.virtualHost).toBe("vhost");
			expect(settings.containerId).toBe(container.id);
			expect(settings.idleTimeout).toBe(30000);
		});

		it("should prefer the connection's own hooks", ({ expect }) => {
			const containerOpen = vi.fn();
			const ownOpen = vi.fn();
			const { conn } = connect(
				{ hooks: { onOpen: ownOpen } },
				{ onOpen: containerOpen },
			);

			current().simulateOpen();

			expect(ownOpen).toHaveBeenCalledWith(conn, false);
			expect(containerOpen).not.toHaveBeenCalled();
		});
	});

	describe("without reconnect", (it) => {
		it("should close after a single failure", ({ expect }) => {
			const onTransportError = vi.fn();
			const onTransportClose = vi.fn();
			const onReconnect = vi.fn();
			const { container, conn } = connect(undefined, {
				onTransportError,
				onTransportClose,
				onReconnect,
			});

			current().simulateFailure();

			expect(conn.state).toBe("closed");
			expect(onTransportError).toHaveBeenCalledOnce();
			expect(onTransportClose).toHaveBeenCalledOnce();
			expect(onReconnect).not.toHaveBeenCalled();
			expect(conn.error).toBeInstanceOf(AddressUnreachableError);
			expect(conn.error?.message).toBe("hostA: getaddrinfo ENOTFOUND hostA");
			expect(container.connections).toHaveLength(0);
			expect(vi.getTimerCount()).toBe(0);
		});

		it("should treat a peer close as a transport failure", ({ expect }) => {
			const onConnectionClose = vi.fn();
			const onTransportClose = vi.fn();
			const { conn } = connect(undefined, {
				onConnectionClose,
				onTransportClose,
			});
			current().simulateOpen();

			current().simulatePeerClose();

			expect(conn.state).toBe("closed");
			expect(conn.error?.message).toBe("hostA: connection closed by peer");
			expect(onConnectionClose).not.toHaveBeenCalled();
			expect(onTransportClose).toHaveBeenCalledOnce();
		});

		it("should route a throwing transport factory through the failure path", ({
			expect,
		}) => {
			const onTransportError = vi.fn();
			const container = createContainer({ onTransportError }, () => {
				throw new Error("boom");
			});
			const conn = container.connect("hostA");

			vi.runOnlyPendingTimers();

			expect(conn.state).toBe("closed");
			expect(conn.error).toBeInstanceOf(AddressUnreachableError);
			expect(conn.error?.message).toBe("hostA: boom");
			expect(onTransportError).toHaveBeenCalledOnce();
		});
	});

	describe("reconnecting", (it) => {
		it("should walk the original address and then the failover list", ({
			expect,
		}) => {
			const onOpen = vi.fn();
			const onReconnect = vi.fn();
			const { conn } = connect(
				{ failoverUrls: ["hostB"] },
				{ onOpen, onReconnect },
			);

			current().simulateFailure();
			expect(conn.state).toBe("retry_wait");
			expect(onReconnect).toHaveBeenLastCalledWith(conn, 1, 10);

			vi.runOnlyPendingTimers();
			current().simulateFailure();
			expect(onReconnect).toHaveBeenLastCalledWith(conn, 2, 20);

			vi.runOnlyPendingTimers();
			expect(conn.state).toBe("connecting");
			current().simulateOpen();

			expect(network.hosts).toEqual(["hostA", "hostA", "hostB"]);
			expect(onOpen).toHaveBeenCalledExactlyOnceWith(conn, true);
			expect(conn.reconnected).toBe(true);
			expect(conn.attempts).toBe(0);
			expect(conn.url).toBe("hostB");
			expect(conn.error).toBeNull();
		});

		it("should wait for the backoff delay before the next attempt", ({
			expect,
		}) => {
			connect({ reconnect: { initialDelay: 100 }, failoverUrls: ["hostB"] });

			current().simulateFailure();
			vi.advanceTimersByTime(99);
			expect(network.attempts).toHaveLength(1);

			vi.advanceTimersByTime(1);
			expect(network.attempts).toHaveLength(2);
		});

		it("should restart the backoff after a successful open", ({ expect }) => {
			const onReconnect = vi.fn();
			const { conn } = connect({ failoverUrls: ["hostB"] }, { onReconnect });

			current().simulateFailure();
			vi.runOnlyPendingTimers();
			current().simulateOpen();
			current().simulatePeerClose();

			expect(conn.state).toBe("retry_wait");
			expect(onReconnect).toHaveBeenLastCalledWith(conn, 1, 10);

			vi.runOnlyPendingTimers();
			expect(network.hosts).toEqual(["hostA", "hostA", "hostB"]);
		});

		it("should give up when the policy runs out", ({ expect }) => {
			const onTransportError = vi.fn();
			const onReconnectFailed = vi.fn();
			const onTransportClose = vi.fn();
			const { conn } = connect(
				{ reconnect: { maxAttempts: 2 }, failoverUrls: ["hostB"] },
				{ onTransportError, onReconnectFailed, onTransportClose },
			);

			current().simulateFailure();
			vi.runOnlyPendingTimers();
			current().simulateFailure();
			vi.runOnlyPendingTimers();
			current().simulateFailure();

			expect(network.hosts).toEqual(["hostA", "hostA", "hostB"]);
			expect(conn.state).toBe("closed");
			expect(onTransportError).toHaveBeenCalledTimes(3);
			expect(onReconnectFailed).toHaveBeenCalledOnce();
			expect(onTransportClose).toHaveBeenCalledOnce();
			expect(conn.error).toBeInstanceOf(PolicyExhaustedError);
			expect(conn.error?.message).toBe(
				"Reconnect gave up after 2 attempts: hostB: getaddrinfo ENOTFOUND hostB",
			);
			expect(vi.getTimerCount()).toBe(0);
		});

		it("should retry after an authentication failure", ({ expect }) => {
			const { conn } = connect({ failoverUrls: ["hostB"] });

			current().simulateFailure(
				new AuthenticationError(current().settings.target, "PLAIN rejected"),
			);

			expect(conn.state).toBe("retry_wait");
			expect(conn.error?.message).toBe("hostA: PLAIN rejected");
		});

		it("should ignore events from a retired transport", ({ expect }) => {
			const onOpen = vi.fn();
			const { conn } = connect({ failoverUrls: ["hostB"] }, { onOpen });
			const first = current();

			first.simulateFailure();
			first.simulateOpen();

			expect(conn.state).toBe("retry_wait");
			expect(onOpen).not.toHaveBeenCalled();
		});
	});

	describe("remote errors", (it) => {
		it("should report the condition and then reconnect", ({ expect }) => {
			const onConnectionError = vi.fn();
			const onTransportError = vi.fn();
			const { conn } = connect(
				{ failoverUrls: ["hostB"] },
				{ onConnectionError, onTransportError },
			);
			const first = current();
			first.simulateOpen();

			first.simulateRemoteError({
				name: "amqp:connection:forced",
				description: "shutting down",
			});

			expect(onConnectionError).toHaveBeenCalledOnce();
			const error: unknown = onConnectionError.mock.calls[0]?.[1];
			expect(error).toBeInstanceOf(PeerRefusedError);
			expect(conn.error?.message).toBe(
				"hostA: amqp:connection:forced: shutting down",
			);
			expect(first.state).toBe("destroyed");
			expect(onTransportError).toHaveBeenCalledOnce();
			expect(conn.state).toBe("retry_wait");
		});
	});

	describe("close()", (it) => {
		it("should close an open connection cleanly", ({ expect }) => {
			const events: string[] = [];
			const { conn } = connect(undefined, {
				onConnectionClose: () => events.push("connection"),
				onTransportClose: () => events.push("transport"),
			});
			current().simulateOpen();

			conn.close();
			expect(conn.state).toBe("closing");
			expect(current().closeRequested).toBe(true);

			vi.runOnlyPendingTimers();
			expect(conn.state).toBe("closed");
			expect(events).toEqual(["connection", "transport"]);
		});

		it("should not notify a clean close when the handshake fails", ({
			expect,
		}) => {
			const onConnectionClose = vi.fn();
			const onTransportClose = vi.fn();
			const { conn } = connect(undefined, {
				onConnectionClose,
				onTransportClose,
			});
			current().simulateOpen();

			conn.close();
			current().simulateCloseComplete(false);

			expect(conn.state).toBe("closed");
			expect(onConnectionClose).not.toHaveBeenCalled();
			expect(onTransportClose).toHaveBeenCalledOnce();
		});

		it("should abort reconnection when called from onTransportError", ({
			expect,
		}) => {
			const onConnectionClose = vi.fn();
			const onTransportClose = vi.fn();
			const { conn } = connect(
				{ failoverUrls: ["hostB"] },
				{
					onTransportError: (connection) => connection.close(),
					onConnectionClose,
					onTransportClose,
				},
			);

			current().simulateFailure();

			expect(conn.state).toBe("closed");
			expect(conn.error).toBeInstanceOf(LocalAbortError);
			expect(onConnectionClose).not.toHaveBeenCalled();
			expect(onTransportClose).toHaveBeenCalledOnce();
			expect(vi.getTimerCount()).toBe(0);
			expect(network.attempts).toHaveLength(1);
		});

		it("should cancel a pending retry", ({ expect }) => {
			const onTransportClose = vi.fn();
			const { conn } = connect({ failoverUrls: ["hostB"] }, { onTransportClose });
			current().simulateFailure();

			conn.close();

			expect(conn.state).toBe("closed");
			expect(onTransportClose).toHaveBeenCalledOnce();
			expect(vi.getTimerCount()).toBe(0);
		});

		it("should do nothing once closed", ({ expect }) => {
			const onTransportClose = vi.fn();
			const { conn } = connect(undefined, { onTransportClose });
			current().simulateFailure();

			conn.close();

			expect(onTransportClose).toHaveBeenCalledOnce();
		});
	});

	describe("updateOptions()", (it) => {
		it("should apply a sticky address set from inside onTransportError", ({
			expect,
		}) => {
			let updated = false;
			const { conn } = connect(undefined, {
				onTransportError: (connection) => {
					if (updated) return;
					updated = true;
					connection.updateOptions({ reconnectUrl: "hostX" });
				},
			});

			current().simulateFailure();
			expect(conn.state).toBe("retry_wait");

			vi.runOnlyPendingTimers();
			current().simulateFailure();
			vi.runOnlyPendingTimers();

			expect(network.hosts).toEqual(["hostA", "hostX", "hostX"]);
		});

		it("should keep fields that the update does not name", ({ expect }) => {
			const { conn } = connect({ user: "user0", failoverUrls: ["hostB"] });

			conn.updateOptions({ virtualHost: "vhost" });

			expect(conn.user).toBe("user0");
			expect(conn.virtualHost).toBe("vhost");
			expect(conn.options.get("failoverUrls")).toEqual(["hostB"]);
		});

		it("should use new credentials for the next attempt only", ({
			expect,
		}) => {
			const { conn } = connect({ user: "user0", failoverUrls: ["hostB"] });
			const first = current();

			conn.updateOptions({ user: "user1" });
			first.simulateFailure();
			vi.runOnlyPendingTimers();

			expect(first.settings.user).toBe("user0");
			expect(current().settings.user).toBe("user1");
		});

		for (const cleared of [null, ""]) {
			it(`should keep reconnecting after the sticky address is set to ${JSON.stringify(cleared)}`, ({
				expect,
			}) => {
				let failures = 0;
				const { conn } = connect(
					{ reconnectUrl: "hostX" },
					{
						onTransportError: (connection) => {
							failures++;
							if (failures === 2) {
								connection.updateOptions({ reconnectUrl: cleared });
							}
						},
					},
				);

				current().simulateFailure();
				vi.runOnlyPendingTimers();
				current().simulateFailure();

				expect(conn.state).toBe("retry_wait");
				expect(conn.options.get("reconnectUrl")).toBeNull();

				vi.runOnlyPendingTimers();
				expect(network.hosts).toEqual(["hostA", "hostX", "hostA"]);
			});
		}

		it("should retry the original address after the failover list is emptied", ({
			expect,
		}) => {
			const { conn } = connect({ failoverUrls: ["hostB"] });

			conn.updateOptions({ failoverUrls: [] });
			current().simulateFailure();
			expect(conn.state).toBe("retry_wait");

			vi.runOnlyPendingTimers();
			current().simulateFailure();
			expect(conn.state).toBe("retry_wait");

			vi.runOnlyPendingTimers();
			expect(network.hosts).toEqual(["hostA", "hostA", "hostA"]);
		});

		it("should stop reconnecting once reconnect is set to false", ({
			expect,
		}) => {
			const onReconnectFailed = vi.fn();
			const { conn } = connect(
				{ failoverUrls: ["hostB"] },
				{ onReconnectFailed },
			);

			conn.updateOptions({ reconnect: false });
			current().simulateFailure();

			expect(conn.state).toBe("closed");
			expect(onReconnectFailed).not.toHaveBeenCalled();
			expect(network.hosts).toEqual(["hostA"]);
			expect(vi.getTimerCount()).toBe(0);
		});
	});

	describe("container stop", (it) => {
		it("should cancel the pending retry without notifications", ({
			expect,
		}) => {
			const onTransportClose = vi.fn();
			const { container, conn } = connect(
				{ failoverUrls: ["hostB"] },
				{ onTransportClose },
			);
			current().simulateFailure();

			container.stop();

			expect(conn.state).toBe("closed");
			expect(onTransportClose).not.toHaveBeenCalled();
			expect(vi.getTimerCount()).toBe(0);
			expect(container.connections).toHaveLength(0);
		});

		it("should destroy a transport in flight", ({ expect }) => {
			const { container, conn } = connect();
			const transport = current();

			container.stop();

			expect(transport.state).toBe("destroyed");
			expect(conn.error?.message).toBe("Container stopped");
		});
	});
});
