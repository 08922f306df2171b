/**
 * @toroid/mesh — in-process actor runtime type definitions.
 *
 * Actors communicate only through envelopes routed by a MeshRouter.
 * Each actor declares the closed set of messages it accepts through a
 * type guard; anything outside that set is reported to the supervisor
 * as a protocol violation instead of being processed.
 */

import type { ActorRef } from "./actor-ref.js";

// ─── Priority ───────────────────────────────────────────────────────────────

/** Message priority lane: 0 = low, 1 = normal, 2 = high, 3 = critical. */
export type MeshPriority = 0 | 1 | 2 | 3;

// ─── Envelope ───────────────────────────────────────────────────────────────

/** A message travelling through the router. */
export interface MeshEnvelope<P = unknown> {
	id: string;
	from: string;
	to: string;
	type: "tell" | "ask" | "reply";
	/** For replies: the id of the ask being answered. */
	correlationId?: string;
	payload: P;
	priority: MeshPriority;
	timestamp: number;
}

// ─── Behavior & Context ─────────────────────────────────────────────────────

/** Narrows an untyped payload to an actor's message union. */
export type MessageGuard<M> = (payload: unknown) => payload is M;

/** Processes one accepted message at a time. */
export type ActorBehavior<M> = (
	message: M,
	ctx: ActorContext,
) => void | Promise<void>;

/** Contextual handle provided to an actor during message processing. */
export interface ActorContext {
	/** This actor's ID. */
	self: string;
	/** ID of the sender of the message being processed. */
	sender: string;
	/** Answer the current message. A no-op unless it arrived through `ask`. */
	reply(payload: unknown): void;
	/** Fire-and-forget send. */
	tell<M>(to: ActorRef<M>, payload: M, opts?: SendOptions): void;
	/** Send and await the reply envelope. */
	ask<M>(to: ActorRef<M>, payload: M, opts?: AskOptions): Promise<MeshEnvelope>;
	/** Stop this actor once the current message is done. */
	stop(): void;
}

// ─── Options ────────────────────────────────────────────────────────────────

export interface SendOptions {
	priority?: MeshPriority;
}

export interface AskOptions extends SendOptions {
	/** Timeout in ms for the ask (default determined by system config). */
	timeout?: number;
}

// ─── Routing Contracts ──────────────────────────────────────────────────────

/** Any entity that can receive a MeshEnvelope. */
export interface MessageReceiver {
	readonly actorId: string;
	receive(envelope: MeshEnvelope): void;
}

/** Any entity that can route envelopes and correlate request-reply. */
export interface MessageSender {
	route(envelope: MeshEnvelope): void;
	ask(from: string, to: string, payload: unknown, opts?: AskOptions): Promise<MeshEnvelope>;
}

// ─── Supervision ────────────────────────────────────────────────────────────

/** A failure raised while an actor handled (or refused) an envelope. */
export interface ActorFault {
	actorId: string;
	envelope: MeshEnvelope;
	error: Error;
}

export type FaultHandler = (fault: ActorFault) => void;

// ─── System Configuration ───────────────────────────────────────────────────

export interface ActorSystemConfig {
	maxMailboxSize?: number;
	/** Default ask timeout in ms. */
	defaultAskTimeout?: number;
}
