/**
 * @toroid/mesh — MeshRouter: local message routing.
 *
 * The router:
 *   - Delivers envelopes to registered actors
 *   - Correlates `ask` envelopes with their replies, with a timeout
 *   - Reports envelopes it cannot deliver
 *
 * Events go through a plain callback array (no EventEmitter).
 */

import { randomUUID } from "node:crypto";
import { AskTimeoutError, EngineStoppedError, UndeliverableError } from "@toroid/core";
import type {
	AskOptions,
	MeshEnvelope,
	MessageReceiver,
	MessageSender,
} from "./types.js";

// ─── Event system ───────────────────────────────────────────────────────────

export type RouterEvent =
	| { type: "undeliverable"; envelope: MeshEnvelope; reason: string };

type RouterEventHandler = (event: RouterEvent) => void;

// ─── Pending ask tracker ────────────────────────────────────────────────────

interface PendingAsk {
	resolve: (envelope: MeshEnvelope) => void;
	reject: (error: Error) => void;
	timer: ReturnType<typeof setTimeout>;
}

// ─── Router ─────────────────────────────────────────────────────────────────

const DEFAULT_ASK_TIMEOUT = 10_000;

export class MeshRouter implements MessageSender {
	private readonly actors = new Map<string, MessageReceiver>();
	private readonly pending = new Map<string, PendingAsk>();
	private readonly eventHandlers: RouterEventHandler[] = [];
	private readonly defaultAskTimeout: number;
	private destroyed = false;

	constructor(defaultAskTimeout = DEFAULT_ASK_TIMEOUT) {
		this.defaultAskTimeout = defaultAskTimeout;
	}

	// ─── Event subscription ────────────────────────────────────────

	/**
	 * Register a handler for router events.
	 * @returns An unsubscribe function.
	 */
	on(handler: RouterEventHandler): () => void {
		this.eventHandlers.push(handler);
		return () => {
			const idx = this.eventHandlers.indexOf(handler);
			if (idx >= 0) this.eventHandlers.splice(idx, 1);
		};
	}

	private emit(event: RouterEvent): void {
		for (const h of this.eventHandlers) {
			try { h(event); } catch { /* observer failures are non-fatal */ }
		}
	}

	// ─── Actor registry ────────────────────────────────────────────

	addActor(receiver: MessageReceiver): void {
		this.actors.set(receiver.actorId, receiver);
	}

	removeActor(actorId: string): void {
		this.actors.delete(actorId);
	}

	hasActor(actorId: string): boolean {
		return this.actors.has(actorId);
	}

	/** Number of asks still waiting for a reply. */
	get pendingAsks(): number {
		return this.pending.size;
	}

	// ─── Core routing ──────────────────────────────────────────────

	/**
	 * Route an envelope: replies settle their pending ask, everything
	 * else is delivered point-to-point. A reply whose ask has already
	 * settled is reported, never handed to an actor.
	 */
	route(envelope: MeshEnvelope): void {
		if (envelope.type === "reply") {
			const id = envelope.correlationId;
			const pending = id === undefined ? undefined : this.pending.get(id);
			if (id !== undefined && pending) {
				clearTimeout(pending.timer);
				this.pending.delete(id);
				pending.resolve(envelope);
				return;
			}
			this.emit({ type: "undeliverable", envelope, reason: `Reply for "${envelope.to}" has no pending ask` });
			return;
		}

		const local = this.actors.get(envelope.to);
		if (local) {
			local.receive(envelope);
			return;
		}

		const reason = `No actor registered as "${envelope.to}"`;
		this.emit({ type: "undeliverable", envelope, reason });

		if (envelope.type === "ask") {
			this.settle(envelope.id, new UndeliverableError(envelope.to, reason));
		}
	}

	// ─── Ask ───────────────────────────────────────────────────────

	/**
	 * Send an ask envelope and return a Promise for the reply envelope.
	 * Rejects with AskTimeoutError when no reply arrives in time.
	 */
	ask(
		from: string,
		to: string,
		payload: unknown,
		opts?: AskOptions,
	): Promise<MeshEnvelope> {
		if (this.destroyed) {
			return Promise.reject(new EngineStoppedError("Router destroyed"));
		}

		const id = randomUUID();
		const timeout = opts?.timeout ?? this.defaultAskTimeout;

		return new Promise<MeshEnvelope>((resolve, reject) => {
			const timer = setTimeout(() => {
				this.settle(id, new AskTimeoutError(to, timeout));
			}, timeout);

			this.pending.set(id, { resolve, reject, timer });

			this.route({
				id,
				from,
				to,
				type: "ask",
				payload,
				priority: opts?.priority ?? 1,
				timestamp: Date.now(),
			});
		});
	}

	private settle(id: string, error: Error): void {
		const pending = this.pending.get(id);
		if (!pending) return;
		clearTimeout(pending.timer);
		this.pending.delete(id);
		pending.reject(error);
	}

	// ─── Cleanup ───────────────────────────────────────────────────

	/**
	 * Reject all pending asks and clear internal state.
	 */
	destroy(): void {
		this.destroyed = true;
		for (const id of [...this.pending.keys()]) {
			this.settle(id, new EngineStoppedError("Router destroyed"));
		}
		this.actors.clear();
		this.eventHandlers.length = 0;
	}
}
