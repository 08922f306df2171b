/**
 * @toroid/mesh — The Actor: fundamental unit of computation.
 *
 * Each actor encapsulates:
 *   - An identity (string ID)
 *   - A guard describing the closed set of messages it accepts
 *   - A behaviour function that processes one message at a time
 *   - A priority mailbox (ActorMailbox)
 *   - A reference to the router for replies
 *
 * Processing is single-threaded per actor: `queueMicrotask` schedules a
 * drain loop and the loop awaits each behaviour call before popping the
 * next envelope, so an actor's state is only ever touched by itself.
 */

import { randomUUID } from "node:crypto";
import { MailboxFullError, ProtocolViolationError } from "@toroid/core";
import { ActorMailbox } from "./actor-mailbox.js";
import type { ActorRef } from "./actor-ref.js";
import type {
	ActorBehavior,
	ActorContext,
	AskOptions,
	FaultHandler,
	MeshEnvelope,
	MessageGuard,
	MessageReceiver,
	MessageSender,
	SendOptions,
} from "./types.js";

export interface ActorOptions<M> {
	behavior: ActorBehavior<M>;
	accepts: MessageGuard<M>;
	mailboxSize?: number;
	/** Called for rejected envelopes and for errors thrown by the behavior. */
	onFault: FaultHandler;
	/** Called once when the actor stops itself through its context. */
	onStop?: (actorId: string) => void;
}

/**
 * A single actor in the mesh — receives envelopes, checks them against
 * its guard, and processes accepted messages through its behavior.
 */
export class Actor<M> implements MessageReceiver {
	readonly actorId: string;
	private readonly behavior: ActorBehavior<M>;
	private readonly accepts: MessageGuard<M>;
	private readonly router: MessageSender;
	private readonly mailbox: ActorMailbox;
	private readonly onFault: FaultHandler;
	private readonly onStop?: (actorId: string) => void;
	private processing = false;
	private alive = true;

	constructor(id: string, router: MessageSender, options: ActorOptions<M>) {
		this.actorId = id;
		this.router = router;
		this.behavior = options.behavior;
		this.accepts = options.accepts;
		this.mailbox = new ActorMailbox(options.mailboxSize);
		this.onFault = options.onFault;
		this.onStop = options.onStop;
	}

	// ─── Public ────────────────────────────────────────────────────

	get isAlive(): boolean {
		return this.alive;
	}

	/** Envelopes waiting to be processed. */
	get pending(): number {
		return this.mailbox.size;
	}

	/**
	 * Accept an envelope into this actor's mailbox and schedule draining.
	 * A full mailbox is reported as a fault: a dropped query would stall
	 * whoever is waiting on it.
	 */
	receive(envelope: MeshEnvelope): void {
		if (!this.alive) return;
		if (!this.mailbox.push(envelope)) {
			this.fault(envelope, new MailboxFullError(this.actorId, this.mailbox.capacity));
			return;
		}
		this.schedule();
	}

	/**
	 * Mark this actor as dead and discard its mailbox. Used by the system;
	 * does not fire `onStop`.
	 */
	kill(): void {
		this.alive = false;
		this.mailbox.drain();
	}

	// ─── Private scheduling ────────────────────────────────────────

	/**
	 * Schedule a drain cycle if one is not already pending. The microtask
	 * lets the current synchronous call stack finish first, so `receive`
	 * never re-enters the behavior.
	 */
	private schedule(): void {
		if (this.processing) return;
		this.processing = true;
		queueMicrotask(() => {
			void this.drain();
		});
	}

	/**
	 * Drain the mailbox one envelope at a time. Never rejects: every
	 * failure is routed to the fault handler.
	 */
	private async drain(): Promise<void> {
		try {
			while (this.alive) {
				const envelope = this.mailbox.pop();
				if (!envelope) break;

				const payload = envelope.payload;
				if (!this.accepts(payload)) {
					this.fault(envelope, new ProtocolViolationError(this.actorId, payload));
					continue;
				}

				try {
					await this.behavior(payload, this.buildContext(envelope));
				} catch (err) {
					this.fault(envelope, err instanceof Error ? err : new Error(String(err)));
				}
			}
		} finally {
			this.processing = false;
			if (this.alive && !this.mailbox.isEmpty) {
				this.schedule();
			}
		}
	}

	private fault(envelope: MeshEnvelope, error: Error): void {
		this.onFault({ actorId: this.actorId, envelope, error });
	}

	private stopSelf(): void {
		if (!this.alive) return;
		this.kill();
		this.onStop?.(this.actorId);
	}

	// ─── Context factory ───────────────────────────────────────────

	/**
	 * Build an ActorContext scoped to a single incoming envelope.
	 */
	private buildContext(envelope: MeshEnvelope): ActorContext {
		const self = this.actorId;
		const router = this.router;
		const actor = this;

		return {
			self,
			sender: envelope.from,

			reply(payload: unknown): void {
				if (envelope.type !== "ask") return;
				router.route({
					id: randomUUID(),
					from: self,
					to: envelope.from,
					type: "reply",
					correlationId: envelope.id,
					payload,
					priority: envelope.priority,
					timestamp: Date.now(),
				});
			},

			tell<T>(to: ActorRef<T>, payload: T, opts?: SendOptions): void {
				to.tell(self, payload, opts);
			},

			ask<T>(to: ActorRef<T>, payload: T, opts?: AskOptions): Promise<MeshEnvelope> {
				return to.ask(self, payload, opts);
			},

			stop(): void {
				actor.stopSelf();
			},
		};
	}
}
