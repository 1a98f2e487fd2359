/**
 * NATS execution endpoint: joins a queue group with `concurrency` members on
 * the invocation subject so each request is handled by exactly one member,
 * and listens on `<subject>.cancel` for cancellation notices.
 */

import { connect, StringCodec, type ConnectionOptions } from "nats";
import {
  type InvocationResult,
  CancelRequestSchema,
  immediateFailure,
  parseInvocationRequest,
} from "@flowhost/core";
import { invocationIdOf, type ExecutionSink } from "./execution-server.js";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "flowhost-worker:nats-endpoint";
const sc = StringCodec();

// The subset of the nats client this endpoint relies on.
export interface NatsMsgLike {
  data: Uint8Array;
  reply?: string;
  respond(data: Uint8Array): boolean;
}

export interface NatsSubscriptionLike extends AsyncIterable<NatsMsgLike> {
  drain(): Promise<void>;
}

export interface NatsConnectionLike {
  subscribe(subject: string, opts?: { queue?: string }): NatsSubscriptionLike;
  drain(): Promise<void>;
}

export type NatsConnectFn = (opts: ConnectionOptions) => Promise<NatsConnectionLike>;

export interface NatsExecutionEndpointParams {
  url: string;
  subject: string;
  queueGroup: string;
  concurrency: number;
  connectionName?: string;
  sink: ExecutionSink;
  log: Logger;
  connectFn?: NatsConnectFn;
}

export class NatsExecutionEndpoint {
  private readonly params: NatsExecutionEndpointParams;
  private readonly log: Logger;
  private connection: NatsConnectionLike | null = null;
  private subscriptions: NatsSubscriptionLike[] = [];
  private loops: Promise<void>[] = [];

  constructor(params: NatsExecutionEndpointParams) {
    this.params = params;
    this.log = params.log;
  }

  get address(): string {
    return `${this.params.url}#${this.params.subject}`;
  }

  /**
   * Connect and start the queue-group members and the cancel listener.
   */
  async start(): Promise<void> {
    const { url, subject, queueGroup, concurrency } = this.params;
    this.log.info({ url, subject, queueGroup, concurrency }, `${LOG_PREFIX}:start - Connecting`);
    const connectFn = this.params.connectFn ?? connect;
    const connection = await connectFn({
      servers: url,
      name: this.params.connectionName ?? "flowhost-supervisor",
    });
    this.connection = connection;

    for (let w = 0; w < concurrency; w++) {
      const sub = connection.subscribe(subject, { queue: queueGroup });
      this.subscriptions.push(sub);
      this.loops.push(this.runWorker(sub, w));
    }

    const cancelSub = connection.subscribe(`${subject}.cancel`);
    this.subscriptions.push(cancelSub);
    this.loops.push(this.runCancelListener(cancelSub));
    this.log.info({ subject }, `${LOG_PREFIX}:start - Subscribed`);
  }

  /**
   * Run a single queue-group member: consume messages, execute, reply.
   * Messages are handled one after another; concurrency comes from members.
   * A message that fails still gets a Failure reply and the loop goes on.
   */
  private async runWorker(sub: NatsSubscriptionLike, worker: number): Promise<void> {
    try {
      for await (const msg of sub) {
        const payload = await this.replyFor(msg.data, worker);
        if (!msg.reply) continue;
        try {
          msg.respond(payload);
        } catch (err) {
          this.log.error(
            { subject: this.params.subject, worker, error: err instanceof Error ? err.message : String(err) },
            `${LOG_PREFIX}:runWorker - Reply failed`
          );
        }
      }
    } catch (err) {
      this.log.error(
        { subject: this.params.subject, worker, error: err instanceof Error ? err.message : String(err) },
        `${LOG_PREFIX}:runWorker - Worker loop error`
      );
    }
  }

  private async replyFor(data: Uint8Array, worker: number): Promise<Uint8Array> {
    try {
      return sc.encode(JSON.stringify(await this.handleMessage(data)));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.error({ subject: this.params.subject, worker, error: message }, `${LOG_PREFIX}:runWorker - Invocation failed`);
      const failure = immediateFailure({ invocationId: invocationIdOf(decode(data)), kind: "INTERNAL_ERROR", message });
      return sc.encode(JSON.stringify(failure));
    }
  }

  private async runCancelListener(sub: NatsSubscriptionLike): Promise<void> {
    try {
      for await (const msg of sub) {
        const parsed = CancelRequestSchema.safeParse(decode(msg.data));
        if (!parsed.success) {
          this.log.warn({}, `${LOG_PREFIX}:runCancelListener - Invalid cancel notice`);
          continue;
        }
        const cancelled = this.params.sink.cancel(parsed.data.invocationId);
        this.log.info({ invocationId: parsed.data.invocationId, cancelled }, `${LOG_PREFIX}:runCancelListener - Cancel requested`);
      }
    } catch (err) {
      this.log.error(
        { error: err instanceof Error ? err.message : String(err) },
        `${LOG_PREFIX}:runCancelListener - Listener loop error`
      );
    }
  }

  private async handleMessage(data: Uint8Array): Promise<InvocationResult> {
    const parsed = parseInvocationRequest(decode(data));
    if (!parsed.success) {
      this.log.warn({ errors: parsed.error.flatten() }, `${LOG_PREFIX}:handleMessage - Invalid invocation request`);
      return immediateFailure({
        invocationId: "",
        kind: "VALIDATION_ERROR",
        message: "Invalid invocation request",
        details: parsed.error.flatten(),
      });
    }
    return this.params.sink.execute(parsed.data);
  }

  /**
   * Stop: drain subscriptions (in-flight messages finish), then the connection.
   */
  async stop(): Promise<void> {
    this.log.info({}, `${LOG_PREFIX}:stop - Stopping`);
    for (const sub of this.subscriptions) {
      await sub.drain();
    }
    await Promise.all(this.loops);
    this.subscriptions = [];
    this.loops = [];
    if (this.connection) {
      await this.connection.drain();
      this.connection = null;
    }
    this.log.info({}, `${LOG_PREFIX}:stop - Stopped`);
  }
}

function decode(data: Uint8Array): unknown {
  try {
    return JSON.parse(sc.decode(data));
  } catch {
    return undefined;
  }
}
