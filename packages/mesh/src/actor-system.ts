/**
 * @toroid/mesh — ActorSystem: top-level coordinator.
 *
 * The ActorSystem creates, supervises, and destroys actors, wires them
 * to the router, and hands out typed ActorRefs. There is no global
 * registry: whoever spawns an actor gets its ref and passes it on.
 *
 * Supervision: every actor reports faults (unrecognized messages,
 * behavior errors, mailbox overflow) to the system, which logs them and
 * forwards them to `onFault` subscribers. Deciding whether a fault is
 * fatal is the subscriber's call.
 */

import { randomUUID } from "node:crypto";
import { EngineStoppedError, ToroidError, createLogger } from "@toroid/core";
import type { Logger } from "@toroid/core";
import { Actor } from "./actor.js";
import { ActorRef } from "./actor-ref.js";
import { MeshRouter } from "./mesh-router.js";
import type {
	ActorBehavior,
	ActorFault,
	ActorSystemConfig,
	FaultHandler,
	MeshEnvelope,
	MessageGuard,
	MessageReceiver,
	SendOptions,
} from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────

const DEFAULTS: Required<ActorSystemConfig> = {
	maxMailboxSize: 10_000,
	defaultAskTimeout: 10_000,
};

// ─── Events ─────────────────────────────────────────────────────────────────

export type SystemEvent =
	| { type: "actor:spawned"; actorId: string }
	| { type: "actor:stopped"; actorId: string }
	| { type: "actor:fault"; fault: ActorFault }
	| { type: "message:undeliverable"; envelope: MeshEnvelope; reason: string };

type SystemEventHandler = (event: SystemEvent) => void;

/** What the system needs from a spawned actor, whatever its message type. */
interface SupervisedActor extends MessageReceiver {
	kill(): void;
}

// ─── Spawn Options ──────────────────────────────────────────────────────────

export interface SpawnOptions<M> {
	behavior: ActorBehavior<M>;
	/** Guard for the closed set of messages this actor accepts. */
	accepts: MessageGuard<M>;
	mailboxSize?: number;
}

// ─── ActorSystem ────────────────────────────────────────────────────────────

/**
 * @example
 * ```ts
 * const system = new ActorSystem({ defaultAskTimeout: 1_000 });
 * const echo = system.spawn<string>("echo", {
 *   accepts: (p): p is string => typeof p === "string",
 *   behavior: (msg, ctx) => ctx.reply(msg),
 * });
 * const reply = await echo.ask("caller", "hello");
 * reply.payload; // "hello"
 * system.shutdown();
 * ```
 */
export class ActorSystem {
	private readonly config: Required<ActorSystemConfig>;
	private readonly router: MeshRouter;
	private readonly actors = new Map<string, SupervisedActor>();
	private readonly eventHandlers: SystemEventHandler[] = [];
	private readonly log: Logger;
	private running = true;

	constructor(config?: ActorSystemConfig & { logger?: Logger }) {
		const { logger, ...rest } = config ?? {};
		this.config = { ...DEFAULTS, ...rest };
		this.log = logger ?? createLogger("mesh");
		this.router = new MeshRouter(this.config.defaultAskTimeout);

		this.router.on((event) => {
			this.log.debug("Undeliverable envelope", {
				actorId: event.envelope.to,
				from: event.envelope.from,
				type: event.envelope.type,
				reason: event.reason,
			});
			this.emit({
				type: "message:undeliverable",
				envelope: event.envelope,
				reason: event.reason,
			});
		});
	}

	// ─── Event subscription ────────────────────────────────────────

	on(handler: SystemEventHandler): () => void {
		this.eventHandlers.push(handler);
		return () => {
			const idx = this.eventHandlers.indexOf(handler);
			if (idx >= 0) this.eventHandlers.splice(idx, 1);
		};
	}

	/** Subscribe to actor faults only. */
	onFault(handler: FaultHandler): () => void {
		return this.on((event) => {
			if (event.type === "actor:fault") handler(event.fault);
		});
	}

	private emit(event: SystemEvent): void {
		for (const h of [...this.eventHandlers]) {
			try { h(event); } catch { /* observer failures are non-fatal */ }
		}
	}

	// ─── Actor lifecycle ───────────────────────────────────────────

	/**
	 * Spawn a new actor.
	 *
	 * @throws ToroidError `DUPLICATE_ACTOR` if the ID is taken.
	 * @throws EngineStoppedError after shutdown.
	 */
	spawn<M>(id: string, options: SpawnOptions<M>): ActorRef<M> {
		if (!this.running) {
			throw new EngineStoppedError(`Cannot spawn "${id}": actor system is shut down`);
		}
		if (this.actors.has(id)) {
			throw new ToroidError(`Actor "${id}" already exists in this system.`, "DUPLICATE_ACTOR");
		}

		const actor = new Actor<M>(id, this.router, {
			behavior: options.behavior,
			accepts: options.accepts,
			mailboxSize: options.mailboxSize ?? this.config.maxMailboxSize,
			onFault: (fault) => this.handleFault(fault),
			onStop: (actorId) => this.stop(actorId),
		});

		this.actors.set(id, actor);
		this.router.addActor(actor);
		this.emit({ type: "actor:spawned", actorId: id });

		return new ActorRef<M>(id, this.router);
	}

	/**
	 * Stop and remove an actor.
	 *
	 * @returns `true` if the actor was found and stopped.
	 */
	stop(actorId: string): boolean {
		const actor = this.actors.get(actorId);
		if (!actor) return false;

		actor.kill();
		this.actors.delete(actorId);
		this.router.removeActor(actorId);
		this.emit({ type: "actor:stopped", actorId });
		return true;
	}

	has(actorId: string): boolean {
		return this.actors.has(actorId);
	}

	/**
	 * Untyped fire-and-forget send by actor ID. Skips the compile-time
	 * message check; the receiving actor's guard still applies.
	 */
	tell(from: string, to: string, payload: unknown, opts?: SendOptions): void {
		if (!this.running) return;
		this.router.route({
			id: randomUUID(),
			from,
			to,
			type: "tell",
			payload,
			priority: opts?.priority ?? 1,
			timestamp: Date.now(),
		});
	}

	/**
	 * Ask an actor from outside the mesh (e.g. the engine reading state).
	 */
	ask<M>(from: string, to: ActorRef<M>, payload: M, timeout?: number): Promise<MeshEnvelope> {
		if (!this.running) {
			return Promise.reject(new EngineStoppedError());
		}
		return to.ask(from, payload, { timeout });
	}

	private handleFault(fault: ActorFault): void {
		this.log.error("Actor fault", fault.error, {
			actorId: fault.actorId,
			from: fault.envelope.from,
			envelopeType: fault.envelope.type,
		});
		this.emit({ type: "actor:fault", fault });
	}

	// ─── Lifecycle ─────────────────────────────────────────────────

	/**
	 * Stop every actor and reject all pending asks. Idempotent.
	 */
	shutdown(): void {
		if (!this.running) return;
		this.running = false;

		for (const [id, actor] of this.actors) {
			actor.kill();
			this.emit({ type: "actor:stopped", actorId: id });
		}
		this.actors.clear();

		this.router.destroy();
		this.eventHandlers.length = 0;
		this.log.debug("Actor system shut down");
	}

	get isRunning(): boolean {
		return this.running;
	}

	/** Number of live actors in the system. */
	get actorCount(): number {
		return this.actors.size;
	}

	/** Number of asks still waiting for a reply. */
	get pendingAsks(): number {
		return this.router.pendingAsks;
	}
}
