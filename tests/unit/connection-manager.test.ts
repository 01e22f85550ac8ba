/**
 * ConnectionManager Tests
 */

import {
	ConnectionError,
	ConnectionManager,
	ConnectionPool,
	createConnectionEvent,
	ObserverNotificationError,
	unwrapConnection,
} from "harnesslink";
import { beforeEach, describe, expect, it } from "vitest";
import {
	createFailingObserver,
	createFakeProvider,
	createRecordingObserver,
	type FakeProvider,
	type RecordingObserver,
} from "../mocks/fakeProvider";

describe("ConnectionManager", () => {
	let manager: ConnectionManager;
	let provider: FakeProvider;
	let observer: RecordingObserver;

	beforeEach(async () => {
		manager = new ConnectionManager();
		provider = createFakeProvider();
		observer = createRecordingObserver();
		await manager.initialize();
		await manager.registerProvider("svc", provider);
		await manager.attachObserver(observer);
	});

	describe("lifecycle", () => {
		it("should stay initialized when initialize is called twice", async () => {
			expect(manager.isInitialized()).toBe(true);

			await manager.initialize();

			expect(manager.isInitialized()).toBe(true);
		});

		it("should be usable again after shutdown and initialize", async () => {
			await manager.createConnection("svc", "c1");

			const outcomes = await manager.shutdown();
			expect(manager.isInitialized()).toBe(false);
			expect(outcomes).toEqual([{ serviceType: "svc", connectionId: "c1", closed: true }]);

			await manager.initialize();
			const result = await manager.createConnection("svc", "c2");

			expect(manager.isInitialized()).toBe(true);
			expect(result.ok).toBe(true);
			expect(manager.getProvider("svc")).toBe(provider);
		});
	});

	describe("providers", () => {
		it("should return the registered provider until overwritten", async () => {
			expect(manager.getProvider("svc")).toBe(provider);

			const replacement = createFakeProvider();
			await manager.registerProvider("svc", replacement);

			expect(manager.getProvider("svc")).toBe(replacement);
		});

		it("should return undefined for unknown service types", () => {
			expect(manager.getProvider("unknown")).toBeUndefined();
		});

		it("should unregister providers", async () => {
			await expect(manager.unregisterProvider("svc")).resolves.toBe(true);
			await expect(manager.unregisterProvider("svc")).resolves.toBe(false);

			const result = await manager.createConnection("svc", "c1");
			expect(result).toEqual({ ok: false, reason: "not_configured", serviceType: "svc" });
		});
	});

	describe("createConnection", () => {
		it("should return the connection and emit exactly one created event", async () => {
			const result = await manager.createConnection("svc", "c1");

			expect(result).toEqual({ ok: true, connection: provider.created[0] });
			expect(observer.events).toHaveLength(1);
			expect(observer.events[0]).toMatchObject({ connectionId: "c1", serviceType: "svc", eventType: "created" });
			expect(manager.listConnections()).toEqual([{ serviceType: "svc", connectionId: "c1" }]);
		});

		it("should return not_configured and emit nothing for unregistered service types", async () => {
			const result = await manager.createConnection("svc2", "c2");

			expect(result).toEqual({ ok: false, reason: "not_configured", serviceType: "svc2" });
			expect(observer.events).toEqual([]);
		});

		it("should notify observers in attachment order", async () => {
			const log: string[] = [];
			const local = new ConnectionManager();
			await local.registerProvider("svc", createFakeProvider());
			await local.attachObserver(createRecordingObserver("O1", log));
			await local.attachObserver(createRecordingObserver("O2", log));

			await local.createConnection("svc", "c1");

			expect(log).toEqual(["O1:created:c1", "O2:created:c1"]);
		});

		it("should deliver to an observer once per attachment", async () => {
			await manager.attachObserver(observer);

			await manager.createConnection("svc", "c1");

			expect(observer.events).toHaveLength(2);
		});

		it("should return failed without pooling or events when the provider throws", async () => {
			const error = new Error("connection refused");
			await manager.registerProvider("svc", createFakeProvider({ failOnCreate: error }));

			const result = await manager.createConnection("svc", "c1");

			expect(result).toEqual({ ok: false, reason: "failed", serviceType: "svc", connectionId: "c1", error });
			expect(observer.events).toEqual([]);
			expect(manager.listConnections()).toEqual([]);
		});

		it("should return failed when the provider produces nothing", async () => {
			await manager.registerProvider("svc", createFakeProvider({ returnNothing: true }));

			const result = await manager.createConnection("svc", "c1");

			expect(result.ok).toBe(false);
			expect(result).toMatchObject({
				reason: "failed",
				error: new ConnectionError("Provider for svc returned no connection for c1"),
			});
			expect(observer.events).toEqual([]);
		});

		it("should not retry failed creations", async () => {
			const failing = createFakeProvider({ failOnCreate: true });
			await manager.registerProvider("svc", failing);

			await manager.createConnection("svc", "c1");

			expect(failing.calls).toHaveLength(1);
		});

		it("should fall back to the provider's default connection id", async () => {
			await manager.registerProvider("svc", createFakeProvider({ defaultConnectionId: "primary" }));

			const connection = unwrapConnection(await manager.createConnection("svc"));

			expect(connection?.id).toBe("primary");
		});

		it("should fail when no connection id can be resolved", async () => {
			const result = await manager.createConnection("svc");

			expect(result).toMatchObject({
				ok: false,
				reason: "failed",
				serviceType: "svc",
				error: new ConnectionError("No connection id given and svc has no default connection"),
			});
			expect(provider.calls).toEqual([]);
		});

		it("should replace a pooled connection with the same id", async () => {
			const first = unwrapConnection(await manager.createConnection("svc", "c1"));
			const second = unwrapConnection(await manager.createConnection("svc", "c1"));

			expect(second).not.toBe(first);
			expect(first?.isConnected()).toBe(false);
			expect(manager.listConnections()).toHaveLength(1);
			expect(observer.events.map((event) => event.eventType)).toEqual(["created", "closed", "created"]);
		});

		it("should throw ObserverNotificationError and keep the connection when an observer fails", async () => {
			await manager.attachObserver(createFailingObserver("disk full"));

			const error = await manager.createConnection("svc", "c1").catch((e: unknown) => e);

			expect(error).toBeInstanceOf(ObserverNotificationError);
			expect(error).toMatchObject({
				message: "Observer failed on created event for svc:c1: disk full",
				cause: new Error("disk full"),
			});
			expect(manager.getConnectionStatus("svc", "c1")).toBe(true);
		});
	});

	describe("getConnection", () => {
		it("should pass the configuration to the provider unchanged", async () => {
			const config = { host: "localhost", port: 6379 };

			const result = await manager.getConnection("svc", "c1", config);

			expect(result.ok).toBe(true);
			expect(provider.calls).toEqual([{ connectionId: "c1", config }]);
			expect(provider.calls[0]?.config).toBe(config);
		});

		it("should return the existing connection without a new event", async () => {
			const created = unwrapConnection(await manager.createConnection("svc", "c1"));

			const result = await manager.getConnection("svc", "c1");

			expect(unwrapConnection(result)).toBe(created);
			expect(observer.events).toHaveLength(1);
		});

		it("should return not_configured for unregistered service types", async () => {
			const result = await manager.getConnection("svc2", "c1");

			expect(result).toEqual({ ok: false, reason: "not_configured", serviceType: "svc2" });
		});

		it("should return failed when the provider throws", async () => {
			await manager.registerProvider("svc", createFakeProvider({ failOnCreate: true }));

			const result = await manager.getConnection("svc", "c1");

			expect(result).toMatchObject({
				ok: false,
				reason: "failed",
				connectionId: "c1",
				error: new Error("create failed for c1"),
			});
			expect(observer.events).toEqual([]);
		});

		it("should behave as if nothing existed after closeAllConnections", async () => {
			const first = unwrapConnection(await manager.createConnection("svc", "c1"));

			await manager.closeAllConnections();
			const second = unwrapConnection(await manager.getConnection("svc", "c1"));

			expect(second).not.toBe(first);
			expect(provider.calls).toHaveLength(2);
			expect(observer.events.map((event) => event.eventType)).toEqual(["created", "closed", "created"]);
		});

		it("should create once for concurrent callers", async () => {
			const slow = createFakeProvider({ createDelay: 10 });
			await manager.registerProvider("svc", slow);

			const [a, b] = await Promise.all([manager.getConnection("svc", "c1"), manager.getConnection("svc", "c1")]);

			expect(unwrapConnection(a)).toBe(unwrapConnection(b));
			expect(slow.calls).toHaveLength(1);
			expect(observer.events).toHaveLength(1);
		});
	});

	describe("closeConnection", () => {
		it("should close and emit closed", async () => {
			const connection = unwrapConnection(await manager.createConnection("svc", "c1"));

			await expect(manager.closeConnection("svc", "c1")).resolves.toBe(true);

			expect(connection?.isConnected()).toBe(false);
			expect(manager.getConnectionStatus("svc", "c1")).toBeUndefined();
			expect(observer.events[1]).toMatchObject({ eventType: "closed", connectionId: "c1" });
		});

		it("should be a no-op for unknown connections", async () => {
			await expect(manager.closeConnection("svc", "missing")).resolves.toBe(false);
			expect(observer.events).toEqual([]);
		});

		it("should rethrow close failures", async () => {
			await manager.registerProvider("svc", createFakeProvider({ failOnClose: true }));
			await manager.createConnection("svc", "c1");

			await expect(manager.closeConnection("svc", "c1")).rejects.toThrow("close failed");
			expect(manager.listConnections()).toEqual([]);
		});

		it("should throw ObserverNotificationError after a successful close", async () => {
			const connection = unwrapConnection(await manager.createConnection("svc", "c1"));
			await manager.attachObserver(createFailingObserver("observer down", "closed"));

			const error = await manager.closeConnection("svc", "c1").catch((e: unknown) => e);

			expect(error).toBeInstanceOf(ObserverNotificationError);
			expect(connection?.isConnected()).toBe(false);
			expect(manager.listConnections()).toEqual([]);
		});
	});

	describe("closeAllConnections", () => {
		it("should close every connection best-effort", async () => {
			await manager.registerProvider("flaky", createFakeProvider({ serviceType: "flaky", failOnClose: true }));
			await manager.createConnection("svc", "c1");
			await manager.createConnection("flaky", "c2");

			const outcomes = await manager.closeAllConnections();

			expect(outcomes.map(({ connectionId, closed }) => [connectionId, closed])).toEqual([
				["c1", true],
				["c2", false],
			]);
			expect(manager.listConnections()).toEqual([]);
		});

		it("should report observer failures apart from close failures", async () => {
			await manager.createConnection("svc", "c1");
			await manager.attachObserver(createFailingObserver("observer down", "closed"));

			const [outcome] = await manager.shutdown();

			expect(outcome).toMatchObject({ connectionId: "c1", closed: true });
			expect(outcome?.error).toBeUndefined();
			expect(outcome?.notifyError).toBeInstanceOf(ObserverNotificationError);
			expect(outcome?.notifyError?.message).toBe("Observer failed on closed event for svc:c1: observer down");
		});
	});

	describe("observers", () => {
		it("should stop notifying detached observers", async () => {
			await expect(manager.detachObserver(observer)).resolves.toBe(true);
			await expect(manager.detachObserver(observer)).resolves.toBe(false);

			await manager.createConnection("svc", "c1");

			expect(observer.events).toEqual([]);
		});

		it("should propagate the first observer failure and skip the rest", async () => {
			const log: string[] = [];
			const local = new ConnectionManager();
			await local.attachObserver(createRecordingObserver("O1", log));
			await local.attachObserver(createFailingObserver("broken"));
			await local.attachObserver(createRecordingObserver("O3", log));

			await expect(local.notifyObservers(createConnectionEvent("svc", "c1", "created"))).rejects.toThrow("broken");

			expect(log).toEqual(["O1:created:c1"]);
		});

		it("should forward runtime errors of pooled connections", async () => {
			await manager.createConnection("svc", "c1");

			provider.created[0]?.simulateError(new Error("connection reset"));
			await new Promise((resolve) => setTimeout(resolve, 0));

			expect(observer.events[1]).toMatchObject({
				eventType: "error",
				connectionId: "c1",
				details: { error: "connection reset" },
			});
			expect(manager.getConnectionStatus("svc", "c1")).toBe(false);
		});

		it("should deliver events from an injected pool", async () => {
			const pool = new ConnectionPool();
			const local = new ConnectionManager({ pool });
			const localObserver = createRecordingObserver();
			await local.attachObserver(localObserver);
			pool.registerProvider("svc", createFakeProvider());

			await pool.getConnection("svc", "c1");

			expect(localObserver.events.map((event) => event.eventType)).toEqual(["created"]);
			expect(local.getProvider("svc")).toBeDefined();
		});
	});
});
