import { describe, it, expect, vi, beforeEach } from "vitest";

/**
 * NatsClient builds its connection, stream and consumer settings from
 * config; the broker itself is mocked.
 */

interface Captured {
  connectionOptions: Record<string, unknown> | null;
  streamConfig: Record<string, unknown> | null;
  consumerConfig: Record<string, unknown> | null;
  streamExists: boolean;
}

const nats = vi.hoisted(() => {
  const state: Captured = {
    connectionOptions: null,
    streamConfig: null,
    consumerConfig: null,
    streamExists: false,
  };

  const connection = {
    jetstream: vi.fn(() => ({})),
    jetstreamManager: vi.fn(async () => ({
      streams: {
        info: vi.fn(async () => {
          if (!state.streamExists) throw new Error("stream not found");
          return {};
        }),
        add: vi.fn(async (cfg: Record<string, unknown>) => {
          state.streamConfig = cfg;
          return {};
        }),
      },
      consumers: {
        info: vi.fn(async () => {
          throw new Error("consumer not found");
        }),
        add: vi.fn(async (_stream: string, cfg: Record<string, unknown>) => {
          state.consumerConfig = cfg;
          return {};
        }),
      },
    })),
    closed: vi.fn(() => new Promise<void>(() => {})),
    status: vi.fn(() => ({
      [Symbol.asyncIterator]: () => ({
        next: () => new Promise<IteratorResult<{ type: string; data: string }>>(() => {}),
      }),
    })),
    drain: vi.fn(async () => undefined),
    flush: vi.fn(async () => undefined),
  };

  return { state, connection };
});

vi.mock("nats", () => ({
  connect: vi.fn(async (options: Record<string, unknown>) => {
    nats.state.connectionOptions = options;
    return nats.connection;
  }),
  RetentionPolicy: { Workqueue: "workqueue" },
  StorageType: { File: "file" },
  DiscardPolicy: { Old: "old" },
  AckPolicy: { Explicit: "explicit" },
  DeliverPolicy: { All: "all" },
  ReplayPolicy: { Instant: "instant" },
}));

vi.mock("@missive/config", () => ({
  config: {
    NATS_CLUSTER: "nats://localhost:4222,nats://localhost:4223",
    NATS_REPLICAS: 3,
    NATS_TLS_ENABLED: false,
    WORKER_ID: "test-worker",
    TRANSPORT_TIMEOUT_MS: 10000,
    DELIVERY_MAX_ATTEMPTS: 5,
    DELIVERY_CONCURRENCY: 4,
  },
}));

vi.mock("../../../logger.js", () => ({
  log: {
    nats: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
  },
}));

import { NatsClient } from "../../../nats/client.js";

describe("NatsClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    nats.state.connectionOptions = null;
    nats.state.streamConfig = null;
    nats.state.consumerConfig = null;
    nats.state.streamExists = false;
  });

  describe("connection options", () => {
    it("should connect to every server in the cluster list", async () => {
      await new NatsClient().connect();

      expect(nats.state.connectionOptions).toMatchObject({
        servers: ["nats://localhost:4222", "nats://localhost:4223"],
        name: "missive-test-worker",
      });
    });

    it("should reconnect forever with keepalive pings", async () => {
      await new NatsClient().connect();

      expect(nats.state.connectionOptions).toMatchObject({
        reconnect: true,
        maxReconnectAttempts: -1,
        pingInterval: 30000,
        maxPingOut: 3,
      });
    });

    it("should not include TLS options when disabled", async () => {
      await new NatsClient().connect();

      expect(nats.state.connectionOptions?.tls).toBeUndefined();
    });
  });

  describe("stream and consumer", () => {
    it("should create the delivery stream as a work queue", async () => {
      await new NatsClient().connect();

      expect(nats.state.streamConfig).toMatchObject({
        name: "notifications",
        subjects: ["delivery.>"],
        retention: "workqueue",
        num_replicas: 3,
        duplicate_window: 120e9,
      });
    });

    it("should leave an existing stream alone", async () => {
      nats.state.streamExists = true;

      await new NatsClient().connect();

      expect(nats.state.streamConfig).toBeNull();
    });

    it("should size the consumer from the delivery settings", async () => {
      await new NatsClient().connect();

      expect(nats.state.consumerConfig).toMatchObject({
        durable_name: "delivery-worker",
        filter_subject: "delivery.send",
        max_deliver: 5,
        max_ack_pending: 8,
        ack_wait: 30e9,
      });
    });
  });

  describe("health check", () => {
    it("should return false when not connected", async () => {
      expect(await new NatsClient().healthCheck()).toBe(false);
    });

    it("should return true when connected and flush succeeds", async () => {
      const client = new NatsClient();
      await client.connect();

      expect(await client.healthCheck()).toBe(true);
    });

    it("should return false when flush fails", async () => {
      const client = new NatsClient();
      await client.connect();
      nats.connection.flush.mockRejectedValueOnce(new Error("disconnected"));

      expect(await client.healthCheck()).toBe(false);
    });
  });

  describe("close", () => {
    it("should drain the connection", async () => {
      const client = new NatsClient();
      await client.connect();

      await client.close();

      expect(nats.connection.drain).toHaveBeenCalledTimes(1);
    });

    it("should refuse JetStream access before connecting", () => {
      expect(() => new NatsClient().getJetStream()).toThrow("JetStream not initialized");
    });
  });
});
